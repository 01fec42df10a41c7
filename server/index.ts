import "./config/loadEnv";
import { createServer } from "http";
import { createApp } from "./app";
import { loadConfig } from "./config/env";
import { MemoryJobStore, RedisJobStore, createGenerationService, type JobStore } from "./generation";
import { OpenAIModelGateway, createOpenAIClient } from "./lib/modelGateway";
import { closeRedisClient, createRedisClient } from "./lib/redisConfig";
import { createLogger, errorMessage } from "./utils/logger";

const logger = createLogger("server");

const SHUTDOWN_TIMEOUT_MS = 10000;

async function main(): Promise<void> {
  const config = loadConfig();

  const redis = config.redisUrl ? createRedisClient(config.redisUrl) : null;
  let store: JobStore;
  if (redis) {
    store = new RedisJobStore(redis, config.generation.jobTtlSeconds);
  } else {
    logger.warn("REDIS_URL not set, jobs are kept in process memory only");
    store = new MemoryJobStore({ defaultTtlSeconds: config.generation.jobTtlSeconds });
  }

  const gateway = new OpenAIModelGateway(createOpenAIClient(config.llm), {
    factCheckModel: config.llm.factCheckModel,
    supportsResponseSchema: config.llm.structuredOutput,
  });

  const generationService = createGenerationService({ config, store, gateway });
  const app = createApp({ generationService });
  const httpServer = createServer(app);

  httpServer.listen({ port: config.port, host: "0.0.0.0" }, () => {
    logger.info("Server listening", {
      port: config.port,
      environment: config.nodeEnv,
      jobStore: redis ? "redis" : "memory",
      factCheckStrategy: config.generation.factCheckStrategy,
    });
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down", { signal });

    const forceExit = setTimeout(() => {
      logger.error("Shutdown timed out, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    await new Promise<void>((resolve) => httpServer.close(() => resolve()));
    await generationService.drain();
    if (redis) {
      await closeRedisClient(redis);
    }
    process.exit(0);
  };

  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error("Shutdown failed", { error: errorMessage(error) });
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  logger.error("Failed to start server", { error: errorMessage(error) });
  process.exit(1);
});
