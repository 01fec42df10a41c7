import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(5000),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional(),

  REDIS_URL: z.string().url().optional(),

  // Any OpenAI-compatible endpoint
  LLM_BASE_URL: z.string().url().optional(),
  LLM_API_KEY: z.string().min(1).optional(),
  LLM_DEFAULT_MODEL: z.string().min(1).default("gpt-4o-mini"),
  LLM_FACT_CHECK_MODEL: z.string().min(1).optional(),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  LLM_STRUCTURED_OUTPUT: booleanFlag,

  GENERATION_JOB_TTL_SECONDS: z.coerce.number().int().positive().default(60 * 60 * 24),
  GENERATION_MAX_RECENT_JOBS: z.coerce.number().int().positive().default(100),
  FACT_CHECK_STRATEGY: z.enum(["direct", "claims"]).default("direct"),
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  nodeEnv: Env["NODE_ENV"];
  port: number;
  redisUrl?: string;
  llm: {
    baseUrl?: string;
    apiKey?: string;
    defaultModel: string;
    factCheckModel: string;
    timeoutMs: number;
    maxRetries: number;
    structuredOutput: boolean;
  };
  generation: {
    jobTtlSeconds: number;
    maxRecentJobs: number;
    factCheckStrategy: Env["FACT_CHECK_STRATEGY"];
  };
}

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const errors = result.error.flatten().fieldErrors;
    const lines = Object.entries(errors).map(([key, msgs]) => `   ${key}: ${msgs?.join(", ")}`);
    throw new Error(`Invalid environment variables:\n${lines.join("\n")}`);
  }

  return result.data;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = parseEnv(source);

  return {
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    redisUrl: env.REDIS_URL,
    llm: {
      baseUrl: env.LLM_BASE_URL,
      apiKey: env.LLM_API_KEY,
      defaultModel: env.LLM_DEFAULT_MODEL,
      factCheckModel: env.LLM_FACT_CHECK_MODEL ?? env.LLM_DEFAULT_MODEL,
      timeoutMs: env.LLM_TIMEOUT_MS,
      maxRetries: env.LLM_MAX_RETRIES,
      structuredOutput: env.LLM_STRUCTURED_OUTPUT,
    },
    generation: {
      jobTtlSeconds: env.GENERATION_JOB_TTL_SECONDS,
      maxRecentJobs: env.GENERATION_MAX_RECENT_JOBS,
      factCheckStrategy: env.FACT_CHECK_STRATEGY,
    },
  };
}
