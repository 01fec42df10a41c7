import { randomUUID } from "crypto";
import {
  isTerminalStatus,
  type FactCheckReport,
  type FactCheckSourceType,
  type GenerationJob,
  type GenerationJobStatus,
  type GenerationRequest,
  type GenerationStatus,
  type GenerationStreamEvent,
} from "@shared/generationSchema";
import { runWithContext } from "../middleware/correlationContext";
import { generationJobDuration, generationJobsTotal } from "../metrics/generationMetrics";
import { ConflictError, NotFoundError } from "../utils/errors";
import { createLogger, errorMessage } from "../utils/logger";
import { DEFAULT_JOB_TTL_SECONDS, DEFAULT_MAX_RECENT_JOBS, type JobStore } from "./jobStore";
import { CARD_GENERATION_PIPELINE, cardsOf, type CardGenerationPipeline } from "./pipeline/cardGenerator";
import { fromAbortSignal, type PipelineContext } from "./pipeline/executor";
import type { FactCheckPipeline } from "./pipeline/factChecker";
import { adaptPipelineStream } from "./streaming";

export interface GenerationServiceDeps {
  store: JobStore;
  cardPipeline: CardGenerationPipeline;
  factCheckPipeline: FactCheckPipeline;
  jobTtlSeconds?: number;
  maxRecentJobs?: number;
  now?: () => Date;
  generateId?: () => string;
}

export type CancelOutcome = "cancelled" | "cancelling" | "already_finished" | "not_found";

export interface CancelResult {
  jobId: string;
  outcome: CancelOutcome;
  status: GenerationStatus | null;
}

export interface ListJobsOptions {
  status?: GenerationStatus;
  limit?: number;
  offset?: number;
}

export interface SubmitResult {
  job: GenerationJob;
  created: boolean;
}

/**
 * Owns every generation job record: creation, background execution,
 * progress, cancellation and the single terminal write per run.
 */
export class GenerationService {
  private readonly logger = createLogger("GenerationService");
  private readonly store: JobStore;
  private readonly jobTtlSeconds: number;
  private readonly maxRecentJobs: number;
  private readonly now: () => Date;
  private readonly generateId: () => string;
  private readonly activeRuns = new Set<string>();
  private readonly background = new Set<Promise<void>>();

  constructor(private readonly deps: GenerationServiceDeps) {
    this.store = deps.store;
    this.jobTtlSeconds = deps.jobTtlSeconds ?? DEFAULT_JOB_TTL_SECONDS;
    this.maxRecentJobs = deps.maxRecentJobs ?? DEFAULT_MAX_RECENT_JOBS;
    this.now = deps.now ?? (() => new Date());
    this.generateId = deps.generateId ?? randomUUID;
  }

  async createJob(ownerId: string, request: GenerationRequest): Promise<GenerationJob> {
    const { job } = await this.createOrReuse(ownerId, request);
    return job;
  }

  /** Creates the job and schedules its run; a reused idempotent job is not restarted. */
  async submitJob(ownerId: string, request: GenerationRequest): Promise<SubmitResult> {
    const result = await this.createOrReuse(ownerId, request);
    if (result.created) {
      this.startJob(result.job.id);
    }
    return result;
  }

  startJob(jobId: string): void {
    const task: Promise<void> = new Promise<void>((resolve) => setImmediate(resolve))
      .then(() => this.runJob(jobId))
      .then(
        () => undefined,
        (error: unknown) => {
          this.logger.error("Background generation run failed", { jobId, error: errorMessage(error) });
        }
      )
      .finally(() => {
        this.background.delete(task);
      });
    this.background.add(task);
  }

  /** Resolves once every background run started so far has settled. */
  async drain(): Promise<void> {
    while (this.background.size > 0) {
      await Promise.allSettled([...this.background]);
    }
  }

  async runJob(jobId: string, request?: GenerationRequest): Promise<GenerationJob> {
    if (this.activeRuns.has(jobId)) {
      throw new ConflictError(`Generation job ${jobId} is already running`, { jobId });
    }
    this.activeRuns.add(jobId);

    try {
      const job = await this.store.get(jobId);
      if (!job) {
        throw new NotFoundError("Generation job", jobId);
      }
      if (job.status === "running") {
        throw new ConflictError(`Generation job ${jobId} is already running`, { jobId });
      }
      if (isTerminalStatus(job.status)) {
        this.logger.info("Skipping run of finished job", { jobId, status: job.status });
        return job;
      }

      const traceId = randomUUID();
      return await runWithContext({ traceId, userId: job.userId, jobId, startTime: Date.now() }, () =>
        this.execute(job, request ?? job.request, traceId)
      );
    } finally {
      this.activeRuns.delete(jobId);
    }
  }

  async getJob(jobId: string): Promise<GenerationJob | null> {
    return this.store.get(jobId);
  }

  async getJobStatus(jobId: string): Promise<GenerationJobStatus | null> {
    const job = await this.store.get(jobId);
    if (!job) return null;

    const storedProgress = job.metadata.progress;
    const storedStep = job.metadata.currentStep;

    return {
      jobId: job.id,
      status: job.status,
      progress: job.status === "completed" ? 100 : typeof storedProgress === "number" ? storedProgress : 0,
      numCardsGenerated: job.numCardsGenerated,
      numCardsRequested: job.request.numCards,
      currentStep: job.status === "running" && typeof storedStep === "string" ? storedStep : null,
      errorMessage: job.errorMessage,
    };
  }

  async cancelJob(jobId: string): Promise<CancelResult> {
    const job = await this.store.get(jobId);
    if (!job) {
      return { jobId, outcome: "not_found", status: null };
    }
    if (job.status === "completed" || job.status === "failed") {
      return { jobId, outcome: "already_finished", status: job.status };
    }
    if (job.status === "cancelled") {
      return { jobId, outcome: "cancelled", status: "cancelled" };
    }

    await this.store.setCancelFlag(jobId, this.jobTtlSeconds);

    if (job.status === "pending") {
      const updated = await this.update(jobId, (current) =>
        current.status === "pending" ? this.cancelledRecord(current) : null
      );
      if (updated.status === "cancelled") {
        generationJobsTotal.inc({ status: "cancelled", workflow: CARD_GENERATION_PIPELINE });
        this.logger.info("Pending job cancelled", { jobId });
        return { jobId, outcome: "cancelled", status: "cancelled" };
      }
      if (isTerminalStatus(updated.status)) {
        return { jobId, outcome: "already_finished", status: updated.status };
      }
    }

    this.logger.info("Cancellation requested for running job", { jobId });
    return { jobId, outcome: "cancelling", status: "running" };
  }

  /** Runs the card pipeline directly for the caller; nothing is persisted. */
  streamJob(
    ownerId: string,
    request: GenerationRequest,
    abortSignal?: AbortSignal
  ): AsyncGenerator<GenerationStreamEvent, void, undefined> {
    const traceId = randomUUID();
    const context: PipelineContext = {
      traceId,
      signal: fromAbortSignal(abortSignal),
      logger: this.logger.child({ userId: ownerId, traceId }),
    };
    return adaptPipelineStream(this.deps.cardPipeline.stream(request, context), { cardsOf });
  }

  async listJobs(ownerId: string, options: ListJobsOptions = {}): Promise<GenerationJob[]> {
    const limit = Math.min(100, Math.max(1, options.limit ?? 20));
    const offset = Math.max(0, options.offset ?? 0);

    const ids = await this.store.listRecent(ownerId, offset, limit);
    const jobs = await Promise.all(ids.map((id) => this.store.get(id)));

    return jobs.filter(
      (job): job is GenerationJob =>
        job !== null && job.userId === ownerId && (options.status === undefined || job.status === options.status)
    );
  }

  /** Re-emits a stored job's cards from `resumeFrom`, then its outcome. */
  async *replayJob(jobId: string, resumeFrom: number = 0): AsyncGenerator<GenerationStreamEvent, void, undefined> {
    const job = await this.store.get(jobId);
    if (!job) {
      yield { type: "error", error: `Generation job ${jobId} not found` };
      return;
    }

    const progress = job.status === "completed" ? 100 : typeof job.metadata.progress === "number" ? job.metadata.progress : 0;
    for (let cardIndex = Math.max(0, resumeFrom); cardIndex < job.cards.length; cardIndex++) {
      yield { type: "card", card: job.cards[cardIndex], progress, cardIndex };
    }

    switch (job.status) {
      case "completed":
        yield {
          type: "complete",
          progress: 100,
          message: `Generated ${job.numCardsGenerated} cards`,
          totalCards: job.numCardsGenerated,
        };
        break;
      case "failed":
        yield { type: "error", error: job.errorMessage ?? "Generation failed" };
        break;
      case "cancelled":
        yield { type: "error", error: "Generation cancelled" };
        break;
      case "pending":
      case "running":
        break;
    }
  }

  factCheck(
    content: string,
    options: { context?: string | null; sourceType?: FactCheckSourceType } = {}
  ): Promise<FactCheckReport> {
    return this.deps.factCheckPipeline.check(content, options);
  }

  // ===== Internals =====

  private async createOrReuse(ownerId: string, request: GenerationRequest): Promise<SubmitResult> {
    const jobId = this.generateId();
    let staleBinding = false;

    if (request.idempotencyKey) {
      const existingId = await this.store.claimIdempotencyKey(
        ownerId,
        request.idempotencyKey,
        jobId,
        this.jobTtlSeconds
      );
      if (existingId) {
        const existing = await this.store.get(existingId);
        if (existing && existing.userId === ownerId) {
          this.logger.info("Reusing job for idempotency key", { jobId: existing.id, userId: ownerId });
          return { job: existing, created: false };
        }
        this.logger.warn("Idempotency key points at an expired job, creating a new one", {
          staleJobId: existingId,
          userId: ownerId,
        });
        staleBinding = true;
      }
    }

    const timestamp = this.timestamp();
    const job: GenerationJob = {
      id: jobId,
      userId: ownerId,
      status: "pending",
      request,
      numCardsGenerated: 0,
      cards: [],
      errorMessage: null,
      createdAt: timestamp,
      updatedAt: timestamp,
      startedAt: null,
      completedAt: null,
      metadata: { progress: 0 },
    };

    await this.store.put(job, this.jobTtlSeconds);
    await this.store.pushRecent(ownerId, jobId, this.maxRecentJobs);
    if (request.idempotencyKey && staleBinding) {
      await this.store.bindIdempotencyKey(ownerId, request.idempotencyKey, jobId, this.jobTtlSeconds);
    }

    this.logger.info("Generation job created", { jobId, userId: ownerId, topic: request.topic });
    return { job, created: true };
  }

  private async execute(job: GenerationJob, request: GenerationRequest, traceId: string): Promise<GenerationJob> {
    const log = this.logger.child({ jobId: job.id, userId: job.userId });
    const startedAt = Date.now();

    try {
      const running = await this.update(job.id, (current) => ({
        ...current,
        status: "running",
        startedAt: this.timestamp(),
        metadata: { ...current.metadata, currentStep: "initializing", progress: 0 },
      }));
      if (running.status !== "running") {
        log.info("Job finished before it started", { status: running.status });
        return running;
      }

      log.info("Generation started", { topic: request.topic, numCards: request.numCards });

      const context: PipelineContext = {
        traceId,
        logger: log,
        signal: { isCancelled: () => this.store.isCancelled(job.id) },
        onProgress: async (stage, progress) => {
          await this.update(job.id, (current) => ({
            ...current,
            metadata: { ...current.metadata, currentStep: stage, progress },
          }));
        },
      };

      const result = await this.deps.cardPipeline.run(request, context);

      let final: GenerationJob;
      switch (result.outcome) {
        case "cancelled":
          final = await this.update(job.id, (current) => this.cancelledRecord(current));
          break;
        case "failed":
          final = await this.update(job.id, (current) => this.failedRecord(current, result.error ?? "Generation failed"));
          break;
        case "completed": {
          const cards = result.state.savedCards.slice(0, request.numCards);
          final = await this.update(job.id, (current) => ({
            ...current,
            status: "completed",
            cards,
            numCardsGenerated: cards.length,
            completedAt: this.timestamp(),
            metadata: { ...current.metadata, currentStep: "save", progress: 100 },
          }));
          break;
        }
      }

      this.recordOutcome(final.status, startedAt);
      log.info("Generation finished", {
        status: final.status,
        numCards: final.numCardsGenerated,
        durationMs: Date.now() - startedAt,
      });
      return final;
    } catch (error) {
      log.error("Generation run crashed", { error: errorMessage(error) });
      const failed = await this.update(job.id, (current) => this.failedRecord(current, errorMessage(error)));
      this.recordOutcome(failed.status, startedAt);
      return failed;
    }
  }

  /**
   * Read-modify-write of one job. Terminal records are returned untouched;
   * `mutate` may return null to skip the write.
   */
  private async update(
    jobId: string,
    mutate: (current: GenerationJob) => GenerationJob | null
  ): Promise<GenerationJob> {
    const current = await this.store.get(jobId);
    if (!current) {
      throw new NotFoundError("Generation job", jobId);
    }
    if (isTerminalStatus(current.status)) {
      return current;
    }

    const next = mutate(current);
    if (!next) return current;

    const updated: GenerationJob = { ...next, updatedAt: this.timestamp() };
    await this.store.put(updated, this.jobTtlSeconds);
    return updated;
  }

  private cancelledRecord(current: GenerationJob): GenerationJob {
    return {
      ...current,
      status: "cancelled",
      cards: [],
      numCardsGenerated: 0,
      completedAt: this.timestamp(),
    };
  }

  private failedRecord(current: GenerationJob, message: string): GenerationJob {
    return {
      ...current,
      status: "failed",
      errorMessage: message,
      completedAt: this.timestamp(),
    };
  }

  private recordOutcome(status: GenerationStatus, startedAt: number): void {
    if (!isTerminalStatus(status)) return;
    generationJobsTotal.inc({ status, workflow: CARD_GENERATION_PIPELINE });
    generationJobDuration.observe({ workflow: CARD_GENERATION_PIPELINE }, (Date.now() - startedAt) / 1000);
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}
