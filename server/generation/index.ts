import type { AppConfig } from "../config/env";
import type { ModelGateway } from "../lib/modelGateway";
import { GenerationService } from "./generationService";
import type { JobStore } from "./jobStore";
import { CardGenerationPipeline } from "./pipeline/cardGenerator";
import type { DuplicateChecker, SourceSearcher } from "./pipeline/collaborators";
import { FactCheckPipeline, createClaimsCardVerifier } from "./pipeline/factChecker";

export interface GenerationModuleDeps {
  config: Pick<AppConfig, "llm" | "generation">;
  store: JobStore;
  gateway: ModelGateway;
  duplicateChecker?: DuplicateChecker;
  sourceSearcher?: SourceSearcher;
}

export function createGenerationService(deps: GenerationModuleDeps): GenerationService {
  const { config, gateway } = deps;

  const factCheckPipeline = new FactCheckPipeline({
    gateway,
    model: config.llm.factCheckModel,
    sourceSearcher: deps.sourceSearcher,
  });

  const cardPipeline = new CardGenerationPipeline({
    gateway,
    defaultModel: config.llm.defaultModel,
    duplicateChecker: deps.duplicateChecker,
    cardVerifier:
      config.generation.factCheckStrategy === "claims" ? createClaimsCardVerifier(factCheckPipeline) : undefined,
  });

  return new GenerationService({
    store: deps.store,
    cardPipeline,
    factCheckPipeline,
    jobTtlSeconds: config.generation.jobTtlSeconds,
    maxRecentJobs: config.generation.maxRecentJobs,
  });
}

export { GenerationService } from "./generationService";
export { MemoryJobStore, RedisJobStore, type JobStore } from "./jobStore";
