import { randomUUID } from "crypto";
import { z } from "zod";
import {
  ClaimImportanceSchema,
  type Claim,
  type ClaimImportance,
  type FactCheckReport,
  type FactCheckSourceType,
  type VerificationResult,
  type Verdict,
} from "@shared/generationSchema";
import type { ModelGateway } from "../../lib/modelGateway";
import { createLogger, errorMessage } from "../../utils/logger";
import {
  END,
  NEVER_CANCELLED,
  PipelineGraph,
  type BasePipelineState,
  type CompiledPipeline,
  type PipelineContext,
  type PipelineResult,
  type StageRegistry,
} from "./executor";
import { contextSourceSearcher, type CardVerifier, type SourceDocument, type SourceSearcher } from "./collaborators";
import { extractJsonArray } from "./jsonExtraction";
import {
  CLAIM_LIST_SCHEMA,
  buildClaimExtractionPrompt,
  buildClaimExtractionUserPrompt,
  cardClaim,
} from "./prompts";

export const FACT_CHECK_PIPELINE = "fact_check";

export type FactCheckStage = "parse_claims" | "search_sources" | "verify_claims" | "aggregate";

export interface FactCheckState extends BasePipelineState {
  content: string;
  context: string | null;
  sourceType: FactCheckSourceType;
  claims: Claim[];
  sources: SourceDocument[];
  verificationResults: VerificationResult[];
  overallConfidence: number | null;
  verdict: Verdict | null;
  summary: string | null;
}

export const VERIFIED_THRESHOLD = 0.7;

export const IMPORTANCE_WEIGHTS: Record<ClaimImportance, number> = {
  high: 1.5,
  medium: 1.0,
  low: 0.5,
};

const VERDICT_SENTENCES: Record<Exclude<Verdict, "unverifiable">, string> = {
  verified: "The content appears to be factually accurate.",
  likely_accurate: "The content is mostly accurate with minor uncertainties.",
  uncertain: "The content has mixed accuracy. Some claims could not be verified.",
  likely_inaccurate: "The content contains significant inaccuracies.",
  false: "The content appears to contain false information.",
};

const NO_CLAIMS_SUMMARY = "No claims could be extracted for verification.";

const RawClaimSchema = z.object({
  claim: z.string().trim().min(1),
  type: z.string().catch("unknown"),
  importance: ClaimImportanceSchema.catch("medium"),
});

export function parseClaims(content: string): Claim[] {
  const claims: Claim[] = [];
  for (const item of extractJsonArray(content, "claims")) {
    const parsed = RawClaimSchema.safeParse(item);
    if (parsed.success) claims.push(parsed.data);
  }
  return claims;
}

export function verdictFor(confidence: number): Exclude<Verdict, "unverifiable"> {
  if (confidence >= 0.8) return "verified";
  if (confidence >= 0.6) return "likely_accurate";
  if (confidence >= 0.4) return "uncertain";
  if (confidence >= 0.2) return "likely_inaccurate";
  return "false";
}

export interface Aggregate {
  confidence: number;
  verdict: Verdict;
  summary: string;
}

/**
 * Importance-weighted mean of the per-claim confidences. The result always
 * lies between the lowest and highest individual confidence.
 */
export function aggregateVerifications(claims: Claim[], results: VerificationResult[]): Aggregate {
  if (results.length === 0) {
    return { confidence: 0.5, verdict: "unverifiable", summary: NO_CLAIMS_SUMMARY };
  }

  const confidences = results.map((result) => result.confidence);
  let weightedSum = 0;
  let weightTotal = 0;
  for (const result of results) {
    const claim: Claim | undefined = claims[result.claimIndex];
    const weight = IMPORTANCE_WEIGHTS[claim?.importance ?? "medium"];
    weightedSum += result.confidence * weight;
    weightTotal += weight;
  }

  const mean =
    weightTotal > 0 ? weightedSum / weightTotal : confidences.reduce((sum, value) => sum + value, 0) / results.length;
  // Float rounding can push the mean just outside the observed range.
  const confidence = Math.min(Math.max(...confidences), Math.max(Math.min(...confidences), mean));

  const verdict = verdictFor(confidence);
  const verifiedCount = results.filter((result) => result.confidence >= VERIFIED_THRESHOLD).length;
  const summary = `${verifiedCount}/${results.length} claims verified. ${VERDICT_SENTENCES[verdict]}`;

  return { confidence, verdict, summary };
}

function routeAfterClaims(state: Readonly<FactCheckState>): "continue" | "skip" {
  return !state.error && state.claims.length > 0 ? "continue" : "skip";
}

export interface FactCheckPipelineDeps {
  gateway: ModelGateway;
  /** Model used for claim extraction. */
  model: string;
  sourceSearcher?: SourceSearcher;
  recursionLimit?: number;
}

export interface FactCheckOptions {
  context?: string | null;
  sourceType?: FactCheckSourceType;
  pipelineContext?: PipelineContext;
}

export class FactCheckPipeline {
  readonly graph: CompiledPipeline<FactCheckState, FactCheckStage>;
  private readonly logger = createLogger("FactCheckPipeline");
  private readonly sourceSearcher: SourceSearcher;

  constructor(private readonly deps: FactCheckPipelineDeps) {
    this.sourceSearcher = deps.sourceSearcher ?? contextSourceSearcher;

    const stages: StageRegistry<FactCheckState, FactCheckStage> = {
      parse_claims: (state, ctx) => this.parseClaimsStage(state, ctx),
      search_sources: (state, ctx) => this.searchSourcesStage(state, ctx),
      verify_claims: (state, ctx) => this.verifyClaimsStage(state, ctx),
      aggregate: async (state) => this.aggregateStage(state),
    };

    this.graph = new PipelineGraph<FactCheckState, FactCheckStage>(FACT_CHECK_PIPELINE, stages)
      .setEntryPoint("parse_claims")
      .addConditionalEdges("parse_claims", routeAfterClaims, {
        continue: "search_sources",
        skip: "aggregate",
      })
      .addEdge("search_sources", "verify_claims")
      .addEdge("verify_claims", "aggregate")
      .addEdge("aggregate", END)
      .compile({ recursionLimit: deps.recursionLimit });
  }

  initialState(content: string, options: FactCheckOptions = {}): FactCheckState {
    return {
      content,
      context: options.context ?? null,
      sourceType: options.sourceType ?? "text",
      claims: [],
      sources: [],
      verificationResults: [],
      overallConfidence: null,
      verdict: null,
      summary: null,
      step: "initializing",
      progress: 0,
      error: null,
      cancelled: false,
    };
  }

  async check(content: string, options: FactCheckOptions = {}): Promise<FactCheckReport> {
    const context: PipelineContext = options.pipelineContext ?? {
      traceId: randomUUID(),
      signal: NEVER_CANCELLED,
      logger: this.logger,
    };
    const result = await this.graph.invoke(this.initialState(content, options), context);
    return toReport(result);
  }

  checkCard(
    front: string,
    back: string,
    context: string | null,
    pipelineContext?: PipelineContext
  ): Promise<FactCheckReport> {
    return this.check(cardClaim(front, back), { context, sourceType: "card", pipelineContext });
  }

  // ===== Stages =====

  private async parseClaimsStage(
    state: Readonly<FactCheckState>,
    ctx: PipelineContext
  ): Promise<Partial<FactCheckState>> {
    const content = state.content.trim();
    const sourceType = state.sourceType;

    if (!content) {
      return { claims: [], progress: 25 };
    }

    if (sourceType === "claim") {
      return { claims: [{ claim: content, type: "unknown", importance: "medium" }], progress: 25 };
    }

    const fallback: Claim[] = [{ claim: content, type: "unknown", importance: "medium" }];
    const { gateway } = this.deps;

    try {
      const response = await gateway.generate({
        model: this.deps.model,
        systemPrompt: buildClaimExtractionPrompt(sourceType),
        userPrompt: buildClaimExtractionUserPrompt(content),
        temperature: 0.3,
        maxTokens: 1000,
        responseSchema: gateway.supportsResponseSchema ? CLAIM_LIST_SCHEMA : undefined,
      });

      const claims = parseClaims(response.content);
      ctx.logger.info("Claims extracted", { numClaims: claims.length });
      return { claims: claims.length > 0 ? claims : fallback, progress: 25 };
    } catch (error) {
      ctx.logger.warn("Claim extraction failed, checking content as a single claim", {
        error: errorMessage(error),
      });
      return { claims: fallback, progress: 25 };
    }
  }

  private async searchSourcesStage(
    state: Readonly<FactCheckState>,
    ctx: PipelineContext
  ): Promise<Partial<FactCheckState>> {
    try {
      const sources = await this.sourceSearcher.search(
        state.claims.map((claim) => claim.claim),
        state.context
      );
      return { sources, progress: 50 };
    } catch (error) {
      ctx.logger.warn("Source search failed", { error: errorMessage(error) });
      return { sources: [], progress: 50 };
    }
  }

  private async verifyClaimsStage(
    state: Readonly<FactCheckState>,
    ctx: PipelineContext
  ): Promise<Partial<FactCheckState>> {
    const sourceContext = state.sources.map((source) => source.content).join("\n\n") || null;
    const verificationResults: VerificationResult[] = [];

    for (const [claimIndex, claim] of state.claims.entries()) {
      try {
        const verification = await this.deps.gateway.verifyClaim(claim.claim, sourceContext);
        verificationResults.push({
          claimIndex,
          claim: claim.claim,
          confidence: verification.confidence,
          sources: verification.sources,
          reasoning: verification.reasoning,
          verified: verification.confidence >= VERIFIED_THRESHOLD,
        });
      } catch (error) {
        ctx.logger.warn("Claim verification failed", { claimIndex, error: errorMessage(error) });
        verificationResults.push({
          claimIndex,
          claim: claim.claim,
          confidence: 0.5,
          sources: [],
          reasoning: `Verification failed: ${errorMessage(error)}`,
          verified: false,
        });
      }
    }

    return { verificationResults, progress: 75 };
  }

  private aggregateStage(state: Readonly<FactCheckState>): Partial<FactCheckState> {
    const { confidence, verdict, summary } = aggregateVerifications(state.claims, state.verificationResults);
    return { overallConfidence: confidence, verdict, summary, progress: 100 };
  }
}

function toReport(result: PipelineResult<FactCheckState, FactCheckStage>): FactCheckReport {
  const { state } = result;

  if (
    result.outcome === "completed" &&
    state.verdict !== null &&
    state.summary !== null &&
    state.overallConfidence !== null
  ) {
    return {
      confidence: state.overallConfidence,
      verdict: state.verdict,
      summary: state.summary,
      claims: state.claims,
      verificationResults: state.verificationResults,
      cancelled: false,
    };
  }

  const cancelled = result.outcome === "cancelled";
  return {
    confidence: 0.5,
    verdict: "unverifiable",
    summary: cancelled ? "Fact check cancelled before completion." : `Fact check failed: ${result.error ?? "unknown error"}`,
    claims: state.claims,
    verificationResults: state.verificationResults,
    cancelled,
  };
}

/** Verifies a card by running the full claim pipeline on its question/answer pair. */
export function createClaimsCardVerifier(pipeline: FactCheckPipeline): CardVerifier {
  return {
    async verify(card, context, pipelineContext) {
      // Sub-runs share the parent's cancellation but never report job progress.
      const report = await pipeline.checkCard(card.front, card.back, context, {
        traceId: pipelineContext.traceId,
        signal: pipelineContext.signal,
        logger: pipelineContext.logger,
      });
      if (report.cancelled) {
        throw new Error("Verification cancelled");
      }
      const sources = [...new Set(report.verificationResults.flatMap((result) => result.sources))];
      return { confidence: report.confidence, sources, reasoning: report.summary };
    },
  };
}
