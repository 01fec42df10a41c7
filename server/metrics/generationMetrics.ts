import { Registry, Counter, Histogram, collectDefaultMetrics } from "prom-client";

export const register = new Registry();

collectDefaultMetrics({ register, prefix: "cardgen_" });

export const generationJobsTotal = new Counter({
  name: "cardgen_generation_jobs_total",
  help: "Generation jobs by terminal status and workflow",
  labelNames: ["status", "workflow"] as const,
  registers: [register],
});

export const generationJobDuration = new Histogram({
  name: "cardgen_generation_job_duration_seconds",
  help: "Wall-clock duration of generation runs",
  labelNames: ["workflow"] as const,
  buckets: [0.5, 1, 2.5, 5, 10, 30, 60, 120, 300],
  registers: [register],
});

export const pipelineStageDuration = new Histogram({
  name: "cardgen_pipeline_stage_duration_seconds",
  help: "Duration of a single pipeline stage",
  labelNames: ["pipeline", "stage", "outcome"] as const,
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2.5, 5, 10, 30],
  registers: [register],
});

export const gatewayRequestsTotal = new Counter({
  name: "cardgen_model_gateway_requests_total",
  help: "Model gateway calls by model and outcome",
  labelNames: ["model", "status"] as const,
  registers: [register],
});

export const gatewayTokensTotal = new Counter({
  name: "cardgen_model_gateway_tokens_total",
  help: "Tokens consumed through the model gateway",
  labelNames: ["model", "direction"] as const,
  registers: [register],
});
