import { describe, it, expect, beforeEach } from "vitest";
import type { GenerationStreamEvent } from "@shared/generationSchema";
import { ConflictError, NotFoundError } from "../../utils/errors";
import { GenerationService } from "../generationService";
import { MemoryJobStore } from "../jobStore";
import { CardGenerationPipeline } from "../pipeline/cardGenerator";
import { FactCheckPipeline, createClaimsCardVerifier } from "../pipeline/factChecker";
import { FakeGateway, cardsJson, makeRequest } from "./helpers";

async function collect(events: AsyncIterable<GenerationStreamEvent>): Promise<GenerationStreamEvent[]> {
  const collected: GenerationStreamEvent[] = [];
  for await (const event of events) {
    collected.push(event);
  }
  return collected;
}

describe("GenerationService", () => {
  let gateway: FakeGateway;
  let store: MemoryJobStore;
  let service: GenerationService;
  let nextId: number;

  beforeEach(() => {
    gateway = new FakeGateway();
    store = new MemoryJobStore();
    nextId = 0;
    service = new GenerationService({
      store,
      cardPipeline: new CardGenerationPipeline({ gateway, defaultModel: "test-model" }),
      factCheckPipeline: new FactCheckPipeline({ gateway, model: "test-model" }),
      now: () => new Date("2026-03-01T12:00:00.000Z"),
      generateId: () => `job-${++nextId}`,
    });
  });

  describe("createJob", () => {
    it("should persist a pending job and list it for its owner", async () => {
      const job = await service.createJob("user-1", makeRequest());

      expect(job).toMatchObject({ id: "job-1", userId: "user-1", status: "pending", cards: [], startedAt: null });
      expect(await service.getJob("job-1")).toEqual(job);
      expect((await service.listJobs("user-1")).map((j) => j.id)).toEqual(["job-1"]);
      expect(await service.listJobs("user-2")).toEqual([]);
    });

    it("should return the existing job for a repeated idempotency key", async () => {
      const first = await service.createJob("user-1", makeRequest({ idempotencyKey: "retry-1" }));
      const second = await service.createJob("user-1", makeRequest({ idempotencyKey: "retry-1" }));
      const other = await service.createJob("user-2", makeRequest({ idempotencyKey: "retry-1" }));

      expect(second.id).toBe(first.id);
      expect(other.id).not.toBe(first.id);
      expect(await service.listJobs("user-1")).toHaveLength(1);
    });

    it("should point a key whose job expired at the replacement job", async () => {
      await store.claimIdempotencyKey("user-1", "retry-2", "expired-job");

      const replacement = await service.createJob("user-1", makeRequest({ idempotencyKey: "retry-2" }));
      const retried = await service.createJob("user-1", makeRequest({ idempotencyKey: "retry-2" }));

      expect(replacement.id).toBe("job-1");
      expect(retried.id).toBe("job-1");
      expect(await service.listJobs("user-1")).toHaveLength(1);
    });
  });

  describe("runJob", () => {
    it("should complete a job with its cards", async () => {
      gateway.respondWith(cardsJson(3));
      const job = await service.createJob("user-1", makeRequest({ numCards: 3 }));

      const finished = await service.runJob(job.id);

      expect(finished.status).toBe("completed");
      expect(finished.numCardsGenerated).toBe(3);
      expect(finished.cards.map((card) => card.front)).toEqual(["Question 1", "Question 2", "Question 3"]);
      expect(finished.startedAt).toBe("2026-03-01T12:00:00.000Z");
      expect(finished.completedAt).toBe("2026-03-01T12:00:00.000Z");
    });

    it("should report a stable status once completed", async () => {
      gateway.respondWith(cardsJson(2));
      const job = await service.createJob("user-1", makeRequest({ numCards: 2 }));
      await service.runJob(job.id);

      const first = await service.getJobStatus(job.id);
      const second = await service.getJobStatus(job.id);

      expect(first).toEqual({
        jobId: job.id,
        status: "completed",
        progress: 100,
        numCardsGenerated: 2,
        numCardsRequested: 2,
        currentStep: null,
        errorMessage: null,
      });
      expect(second).toEqual(first);
    });

    it("should persist stage progress while running", async () => {
      const job = await service.createJob("user-1", makeRequest());
      let observed: Awaited<ReturnType<GenerationService["getJobStatus"]>> = null;
      gateway.beforeGenerate = async () => {
        observed = await service.getJobStatus(job.id);
      };

      await service.runJob(job.id);

      expect(observed).toMatchObject({ status: "running", currentStep: "fetch_context", progress: 20 });
    });

    it("should cancel without calling the gateway when flagged before the first stage", async () => {
      const job = await service.createJob("user-1", makeRequest());
      await store.setCancelFlag(job.id);

      const finished = await service.runJob(job.id);

      expect(finished.status).toBe("cancelled");
      expect(finished.cards).toEqual([]);
      expect(gateway.generateCalls).toHaveLength(0);
    });

    it("should stop a running job at the next stage boundary", async () => {
      gateway.respondWith(cardsJson(2));
      const job = await service.createJob("user-1", makeRequest({ numCards: 2 }));
      const outcomes: string[] = [];
      gateway.beforeGenerate = async () => {
        outcomes.push((await service.cancelJob(job.id)).outcome);
      };

      const finished = await service.runJob(job.id);

      expect(outcomes).toEqual(["cancelling"]);
      expect(finished.status).toBe("cancelled");
      expect(finished.cards).toEqual([]);
      expect(gateway.verifyCalls).toHaveLength(0);
    });

    it("should end cancelled when stopped during claim-based card verification", async () => {
      const factCheckPipeline = new FactCheckPipeline({ gateway, model: "test-model" });
      const claimsService = new GenerationService({
        store,
        cardPipeline: new CardGenerationPipeline({
          gateway,
          defaultModel: "test-model",
          cardVerifier: createClaimsCardVerifier(factCheckPipeline),
        }),
        factCheckPipeline,
        generateId: () => "claims-job",
      });
      gateway.respondWith(cardsJson(1));
      const job = await claimsService.createJob("user-1", makeRequest({ numCards: 1 }));
      const outcomes: string[] = [];
      gateway.beforeGenerate = async () => {
        if (gateway.generateCalls.length === 2) {
          outcomes.push((await claimsService.cancelJob(job.id)).outcome);
        }
      };

      const finished = await claimsService.runJob(job.id);

      expect(outcomes).toEqual(["cancelling"]);
      expect(gateway.generateCalls).toHaveLength(2);
      expect(gateway.verifyCalls).toHaveLength(0);
      expect(finished.status).toBe("cancelled");
      expect(finished.cards).toEqual([]);
    });

    it("should mark the job failed when generation fails", async () => {
      gateway.respondWith(new Error("upstream timeout"));
      const job = await service.createJob("user-1", makeRequest());

      const finished = await service.runJob(job.id);

      expect(finished.status).toBe("failed");
      expect(finished.errorMessage).toBe("Card generation failed: upstream timeout");
      expect((await service.getJobStatus(job.id))?.errorMessage).toBe("Card generation failed: upstream timeout");
    });

    it("should not rerun or reopen a finished job", async () => {
      gateway.respondWith(cardsJson(1));
      const job = await service.createJob("user-1", makeRequest({ numCards: 1 }));
      await service.runJob(job.id);

      const again = await service.runJob(job.id);
      const cancel = await service.cancelJob(job.id);

      expect(again.status).toBe("completed");
      expect(gateway.generateCalls).toHaveLength(1);
      expect(cancel).toEqual({ jobId: job.id, outcome: "already_finished", status: "completed" });
      expect((await service.getJob(job.id))?.status).toBe("completed");
    });

    it("should refuse a second concurrent run of the same job", async () => {
      gateway.respondWith(cardsJson(1));
      const job = await service.createJob("user-1", makeRequest({ numCards: 1 }));

      const first = service.runJob(job.id);
      await expect(service.runJob(job.id)).rejects.toBeInstanceOf(ConflictError);
      expect((await first).status).toBe("completed");
    });

    it("should reject unknown jobs", async () => {
      await expect(service.runJob("missing")).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("cancelJob", () => {
    it("should cancel a pending job immediately", async () => {
      const job = await service.createJob("user-1", makeRequest());

      const result = await service.cancelJob(job.id);
      const finished = await service.runJob(job.id);

      expect(result).toEqual({ jobId: job.id, outcome: "cancelled", status: "cancelled" });
      expect(finished.status).toBe("cancelled");
      expect(gateway.generateCalls).toHaveLength(0);
    });

    it("should report unknown jobs", async () => {
      expect(await service.cancelJob("missing")).toEqual({ jobId: "missing", outcome: "not_found", status: null });
    });
  });

  describe("submitJob", () => {
    it("should run the job in the background", async () => {
      gateway.respondWith(cardsJson(2));

      const { job, created } = await service.submitJob("user-1", makeRequest({ numCards: 2 }));
      expect(created).toBe(true);
      expect(job.status).toBe("pending");

      await service.drain();

      expect((await service.getJob(job.id))?.status).toBe("completed");
    });

    it("should not restart a job reused through its idempotency key", async () => {
      gateway.respondWith(cardsJson(1));
      const request = makeRequest({ numCards: 1, idempotencyKey: "once" });

      await service.submitJob("user-1", request);
      await service.drain();
      const { created } = await service.submitJob("user-1", request);
      await service.drain();

      expect(created).toBe(false);
      expect(gateway.generateCalls).toHaveLength(1);
    });
  });

  describe("listJobs", () => {
    it("should filter by status", async () => {
      gateway.respondWith(cardsJson(1));
      const done = await service.createJob("user-1", makeRequest({ numCards: 1 }));
      await service.createJob("user-1", makeRequest());
      await service.runJob(done.id);

      const completed = await service.listJobs("user-1", { status: "completed" });
      const all = await service.listJobs("user-1", { limit: 500 });

      expect(completed.map((job) => job.id)).toEqual([done.id]);
      expect(all.map((job) => job.id)).toEqual(["job-2", "job-1"]);
    });
  });

  describe("streamJob", () => {
    it("should stream stage progress, cards and completion", async () => {
      gateway.respondWith(cardsJson(2));

      const events = await collect(service.streamJob("user-1", makeRequest({ numCards: 2 })));

      expect(events.map((event) => (event.type === "progress" ? `${event.step}:${event.progress}` : event.type))).toEqual([
        "initializing:0",
        "fetch_context:20",
        "generate:50",
        "check_duplicates:65",
        "fact_check:80",
        "route:90",
        "save:100",
        "card",
        "card",
        "complete",
      ]);
      const cards = events.filter((event) => event.type === "card");
      expect(cards.map((event) => (event.type === "card" ? event.cardIndex : -1))).toEqual([0, 1]);
      const last = events[events.length - 1];
      expect(last.type === "complete" && last.totalCards).toBe(2);
      expect(await service.listJobs("user-1")).toEqual([]);
    });

    it("should end with an error when the caller disconnects", async () => {
      const controller = new AbortController();
      controller.abort();

      const events = await collect(service.streamJob("user-1", makeRequest(), controller.signal));

      expect(events).toEqual([
        { type: "progress", step: "initializing", progress: 0, message: "Starting generation" },
        { type: "error", error: "Generation cancelled" },
      ]);
      expect(gateway.generateCalls).toHaveLength(0);
    });

    it("should end with an error when generation fails", async () => {
      gateway.respondWith(new Error("upstream timeout"));

      const events = await collect(service.streamJob("user-1", makeRequest()));

      expect(events[events.length - 1]).toEqual({ type: "error", error: "Card generation failed: upstream timeout" });
    });
  });

  describe("replayJob", () => {
    it("should replay stored cards from the resume index", async () => {
      gateway.respondWith(cardsJson(3));
      const job = await service.createJob("user-1", makeRequest({ numCards: 3 }));
      await service.runJob(job.id);

      const events = await collect(service.replayJob(job.id, 1));

      expect(events.map((event) => (event.type === "card" ? `card:${event.cardIndex}` : event.type))).toEqual([
        "card:1",
        "card:2",
        "complete",
      ]);
    });

    it("should end a failed job with its error", async () => {
      gateway.respondWith(new Error("boom"));
      const job = await service.createJob("user-1", makeRequest());
      await service.runJob(job.id);

      expect(await collect(service.replayJob(job.id))).toEqual([
        { type: "error", error: "Card generation failed: boom" },
      ]);
    });

    it("should emit nothing for a job that has not started", async () => {
      const job = await service.createJob("user-1", makeRequest());
      expect(await collect(service.replayJob(job.id))).toEqual([]);
    });
  });

  describe("factCheck", () => {
    it("should run the standalone fact check", async () => {
      gateway.confidenceFor = () => 0.25;

      const report = await service.factCheck("The Sun orbits the Earth", { sourceType: "claim" });

      expect(report.verdict).toBe("likely_inaccurate");
      expect(report.summary).toBe("0/1 claims verified. The content contains significant inaccuracies.");
    });
  });
});
