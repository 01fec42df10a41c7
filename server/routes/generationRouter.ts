import { Router, type Request, type Response } from "express";
import {
  FactCheckRequestSchema,
  GenerationRequestSchema,
  ListJobsQuerySchema,
  ReplayQuerySchema,
  type GenerationJob,
  type GenerationStreamEvent,
} from "@shared/generationSchema";
import type { GenerationService } from "../generation/generationService";
import { asyncHandler } from "../middleware/errorHandler";
import { getCallerId, requireUser } from "../middleware/requireUser";
import { AuthorizationError, BadRequestError, NotFoundError } from "../utils/errors";
import { createLogger, errorMessage } from "../utils/logger";

const logger = createLogger("GenerationRouter");

function openEventStream(res: Response): void {
  res.setHeader("Content-Type", "text/event-stream");
  res.setHeader("Cache-Control", "no-cache");
  res.setHeader("Connection", "keep-alive");
  res.setHeader("X-Accel-Buffering", "no");
  res.flushHeaders();
}

export function formatSseEvent(event: GenerationStreamEvent): string {
  return `event: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`;
}

async function pipeEvents(
  req: Request,
  res: Response,
  events: AsyncGenerator<GenerationStreamEvent, void, undefined>,
  disconnect: AbortController
): Promise<void> {
  openEventStream(res);
  try {
    for await (const event of events) {
      if (disconnect.signal.aborted) break;
      res.write(formatSseEvent(event));
    }
  } catch (error) {
    logger.error("Event stream failed", { path: req.path, error: errorMessage(error) });
    if (!disconnect.signal.aborted) {
      res.write(formatSseEvent({ type: "error", error: errorMessage(error) }));
    }
  } finally {
    res.end();
  }
}

function watchDisconnect(res: Response): AbortController {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  });
  return controller;
}

async function loadOwnedJob(service: GenerationService, jobId: string, userId: string): Promise<GenerationJob> {
  const job = await service.getJob(jobId);
  if (!job) {
    throw new NotFoundError("Generation job", jobId);
  }
  if (job.userId !== userId) {
    throw new AuthorizationError("Not authorized to access this job");
  }
  return job;
}

export function createGenerationRouter(service: GenerationService): Router {
  const router = Router();

  router.use(requireUser);

  router.post(
    "/generate",
    asyncHandler(async (req, res) => {
      const request = GenerationRequestSchema.parse(req.body);
      const { job, created } = await service.submitJob(getCallerId(req), request);

      res.status(202).json({
        jobId: job.id,
        status: job.status,
        message: created ? "Generation job started" : "Existing job returned for idempotency key",
      });
    })
  );

  router.get(
    "/generate/jobs",
    asyncHandler(async (req, res) => {
      const query = ListJobsQuerySchema.parse(req.query);
      const jobs = await service.listJobs(getCallerId(req), query);
      res.json(jobs);
    })
  );

  router.get(
    "/generate/jobs/:jobId",
    asyncHandler(async (req, res) => {
      const job = await loadOwnedJob(service, req.params.jobId, getCallerId(req));
      res.json(job);
    })
  );

  router.get(
    "/generate/jobs/:jobId/status",
    asyncHandler(async (req, res) => {
      const { jobId } = req.params;
      await loadOwnedJob(service, jobId, getCallerId(req));
      const status = await service.getJobStatus(jobId);
      if (!status) {
        throw new NotFoundError("Generation job", jobId);
      }
      res.json(status);
    })
  );

  router.post(
    "/generate/jobs/:jobId/cancel",
    asyncHandler(async (req, res) => {
      const { jobId } = req.params;
      await loadOwnedJob(service, jobId, getCallerId(req));
      const result = await service.cancelJob(jobId);

      switch (result.outcome) {
        case "not_found":
          throw new NotFoundError("Generation job", jobId);
        case "already_finished":
          throw new BadRequestError(`Job already ${result.status ?? "finished"}`, { jobId, status: result.status });
        case "cancelled":
          res.json({ jobId, status: "cancelled", message: "Job cancelled" });
          return;
        case "cancelling":
          res.json({ jobId, status: "running", message: "Cancellation requested; the job stops after its current stage" });
          return;
      }
    })
  );

  router.post(
    "/generate/stream",
    asyncHandler(async (req, res) => {
      const request = GenerationRequestSchema.parse(req.body);
      const disconnect = watchDisconnect(res);
      await pipeEvents(req, res, service.streamJob(getCallerId(req), request, disconnect.signal), disconnect);
    })
  );

  router.get(
    "/generate/stream",
    asyncHandler(async (req, res) => {
      const { jobId, resumeFrom } = ReplayQuerySchema.parse(req.query);
      await loadOwnedJob(service, jobId, getCallerId(req));
      const disconnect = watchDisconnect(res);
      await pipeEvents(req, res, service.replayJob(jobId, resumeFrom), disconnect);
    })
  );

  router.post(
    "/fact-check",
    asyncHandler(async (req, res) => {
      const { content, context, sourceType } = FactCheckRequestSchema.parse(req.body);
      const report = await service.factCheck(content, { context, sourceType });
      res.json(report);
    })
  );

  return router;
}
