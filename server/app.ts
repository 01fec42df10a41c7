import express, { type Express } from "express";
import type { GenerationService } from "./generation/generationService";
import { register } from "./metrics/generationMetrics";
import { asyncHandler, errorHandler, notFoundHandler } from "./middleware/errorHandler";
import { requestLoggerMiddleware } from "./middleware/requestLogger";
import { createGenerationRouter } from "./routes/generationRouter";

export interface AppDeps {
  generationService: GenerationService;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  app.disable("x-powered-by");
  app.use(requestLoggerMiddleware);
  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      uptime: Math.floor(process.uptime()),
      timestamp: new Date().toISOString(),
    });
  });

  app.get(
    "/metrics",
    asyncHandler(async (_req, res) => {
      res.setHeader("Content-Type", register.contentType);
      res.send(await register.metrics());
    })
  );

  app.use("/api", createGenerationRouter(deps.generationService));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
