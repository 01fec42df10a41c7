import { z } from "zod";
import type { GeneratedCard, GenerationRequest } from "@shared/generationSchema";
import type { ModelGateway } from "../../lib/modelGateway";
import { errorMessage } from "../../utils/logger";
import {
  END,
  PipelineGraph,
  type BasePipelineState,
  type CompiledPipeline,
  type PipelineContext,
  type PipelineEvent,
  type PipelineResult,
  type StageRegistry,
} from "./executor";
import {
  createDirectCardVerifier,
  noDuplicateChecker,
  type CardDraft,
  type CardVerifier,
  type DuplicateChecker,
} from "./collaborators";
import { extractJsonArray } from "./jsonExtraction";
import { CARD_LIST_SCHEMA, buildCardSystemPrompt, buildCardUserPrompt } from "./prompts";

export const CARD_GENERATION_PIPELINE = "card_generation";

export type CardStage = "fetch_context" | "generate" | "check_duplicates" | "fact_check" | "route" | "save";

export const MIN_CONFIDENCE = 0.3;

/** Confidence carried by a card that was never fact-checked. */
export const UNVERIFIED_CONFIDENCE = 1.0;

export interface RetrievedContext {
  content: string;
  source: string;
  relevance: number;
}

export interface DuplicateResult {
  cardIndex: number;
  isDuplicate: boolean;
  similarityScore: number | null;
  duplicateCardId: string | null;
}

export interface CardVerificationResult {
  cardIndex: number;
  confidence: number;
  sources: string[];
  reasoning: string;
}

export interface RoutedCard extends CardDraft {
  confidence: number;
  source: string | null;
  isDuplicate: boolean;
  duplicateCardId: string | null;
  similarityScore: number | null;
}

export type RejectionReason = "duplicate" | "low_confidence";

export interface RejectedCard extends RoutedCard {
  rejectionReason: RejectionReason;
}

export interface CardGenerationState extends BasePipelineState {
  request: GenerationRequest;
  retrievedContext: RetrievedContext[];
  rawGeneration: string | null;
  cards: CardDraft[];
  duplicateResults: DuplicateResult[];
  factCheckResults: CardVerificationResult[];
  approvedCards: RoutedCard[];
  rejectedCards: RejectedCard[];
  savedCards: GeneratedCard[];
}

const CardTextSchema = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .pipe(z.string().min(1));

const RawCardSchema = z.object({
  front: CardTextSchema,
  back: CardTextSchema,
  tags: z.array(z.string()).optional().catch(undefined),
});

/**
 * Reads card drafts out of model output. Entries without a usable front or
 * back are dropped and at most `limit` drafts are kept.
 */
export function parseCards(content: string, defaultTags: string[], limit: number): CardDraft[] {
  const cards: CardDraft[] = [];
  for (const item of extractJsonArray(content, "cards")) {
    if (cards.length >= limit) break;
    const parsed = RawCardSchema.safeParse(item);
    if (!parsed.success) continue;
    cards.push({
      front: parsed.data.front,
      back: parsed.data.back,
      tags: parsed.data.tags ?? [...defaultTags],
    });
  }
  return cards;
}

export function shouldFactCheck(state: Readonly<CardGenerationState>): "fact_check" | "skip" {
  return !state.error && state.request.factCheck && state.cards.length > 0 ? "fact_check" : "skip";
}

/**
 * Splits drafts into approved and rejected. Duplicates are rejected first;
 * otherwise a card below MIN_CONFIDENCE is rejected. Cards that were never
 * verified carry UNVERIFIED_CONFIDENCE and pass.
 */
export function routeCards(
  cards: CardDraft[],
  duplicateResults: DuplicateResult[],
  factCheckResults: CardVerificationResult[]
): { approved: RoutedCard[]; rejected: RejectedCard[] } {
  const duplicates = new Map(duplicateResults.map((result) => [result.cardIndex, result]));
  const verifications = new Map(factCheckResults.map((result) => [result.cardIndex, result]));
  const approved: RoutedCard[] = [];
  const rejected: RejectedCard[] = [];

  cards.forEach((card, index) => {
    const duplicate = duplicates.get(index);
    const verification = verifications.get(index);

    const routed: RoutedCard = {
      ...card,
      confidence: verification?.confidence ?? UNVERIFIED_CONFIDENCE,
      source: verification && verification.sources.length > 0 ? verification.sources.join(", ") : null,
      isDuplicate: duplicate?.isDuplicate ?? false,
      duplicateCardId: duplicate?.duplicateCardId ?? null,
      similarityScore: duplicate?.similarityScore ?? null,
    };

    if (routed.isDuplicate) {
      rejected.push({ ...routed, rejectionReason: "duplicate" });
    } else if (routed.confidence < MIN_CONFIDENCE) {
      rejected.push({ ...routed, rejectionReason: "low_confidence" });
    } else {
      approved.push(routed);
    }
  });

  return { approved, rejected };
}

export function projectCards(approved: RoutedCard[], request: GenerationRequest): GeneratedCard[] {
  return approved.map((card) => ({
    front: card.front,
    back: card.back,
    cardType: request.cardType,
    tags: card.tags.length > 0 ? card.tags : [...request.tags],
    source: request.includeSources ? card.source : null,
    confidence: card.confidence,
    isDuplicate: card.isDuplicate,
    duplicateCardId: card.duplicateCardId,
    similarityScore: card.similarityScore,
  }));
}

/** Cards a stage made final; only `save` produces them. */
export function cardsOf(stage: CardStage, patch: Partial<CardGenerationState>): GeneratedCard[] {
  return stage === "save" ? patch.savedCards ?? [] : [];
}

export interface CardGenerationDeps {
  gateway: ModelGateway;
  defaultModel: string;
  duplicateChecker?: DuplicateChecker;
  cardVerifier?: CardVerifier;
  recursionLimit?: number;
}

export class CardGenerationPipeline {
  readonly graph: CompiledPipeline<CardGenerationState, CardStage>;
  private readonly duplicateChecker: DuplicateChecker;
  private readonly cardVerifier: CardVerifier;

  constructor(private readonly deps: CardGenerationDeps) {
    this.duplicateChecker = deps.duplicateChecker ?? noDuplicateChecker;
    this.cardVerifier = deps.cardVerifier ?? createDirectCardVerifier(deps.gateway);

    const stages: StageRegistry<CardGenerationState, CardStage> = {
      fetch_context: async (state) => this.fetchContext(state),
      generate: (state, ctx) => this.generate(state, ctx),
      check_duplicates: (state, ctx) => this.checkDuplicates(state, ctx),
      fact_check: (state, ctx) => this.factCheck(state, ctx),
      route: async (state, ctx) => this.route(state, ctx),
      save: async (state) => this.save(state),
    };

    this.graph = new PipelineGraph<CardGenerationState, CardStage>(CARD_GENERATION_PIPELINE, stages)
      .setEntryPoint("fetch_context")
      .addEdge("fetch_context", "generate")
      .addEdge("generate", "check_duplicates")
      .addConditionalEdges("check_duplicates", shouldFactCheck, {
        fact_check: "fact_check",
        skip: "route",
      })
      .addEdge("fact_check", "route")
      .addEdge("route", "save")
      .addEdge("save", END)
      .compile({ recursionLimit: deps.recursionLimit });
  }

  initialState(request: GenerationRequest): CardGenerationState {
    return {
      request,
      retrievedContext: [],
      rawGeneration: null,
      cards: [],
      duplicateResults: [],
      factCheckResults: [],
      approvedCards: [],
      rejectedCards: [],
      savedCards: [],
      step: "initializing",
      progress: 0,
      error: null,
      cancelled: false,
    };
  }

  run(request: GenerationRequest, context: PipelineContext): Promise<PipelineResult<CardGenerationState, CardStage>> {
    return this.graph.invoke(this.initialState(request), context);
  }

  stream(
    request: GenerationRequest,
    context: PipelineContext
  ): AsyncGenerator<PipelineEvent<CardGenerationState, CardStage>, void, undefined> {
    return this.graph.stream(this.initialState(request), context);
  }

  // ===== Stages =====

  private fetchContext(state: Readonly<CardGenerationState>): Partial<CardGenerationState> {
    const { context } = state.request;
    const retrievedContext: RetrievedContext[] = context
      ? [{ content: context, source: "user_provided", relevance: 1 }]
      : [];
    return { retrievedContext, progress: 20 };
  }

  private async generate(
    state: Readonly<CardGenerationState>,
    ctx: PipelineContext
  ): Promise<Partial<CardGenerationState>> {
    const { request } = state;
    const { gateway } = this.deps;
    const model = request.modelId ?? this.deps.defaultModel;

    try {
      const response = await gateway.generate({
        model,
        systemPrompt: buildCardSystemPrompt(request),
        userPrompt: buildCardUserPrompt(
          request,
          state.retrievedContext.map((item) => item.content)
        ),
        temperature: 0.7,
        maxTokens: 4000,
        responseSchema: gateway.supportsResponseSchema ? CARD_LIST_SCHEMA : undefined,
      });

      const cards = parseCards(response.content, request.tags, request.numCards);
      ctx.logger.info("Cards generated", {
        model: response.model,
        numCards: cards.length,
        outputTokens: response.outputTokens,
      });
      return { cards, rawGeneration: response.content, progress: 50 };
    } catch (error) {
      ctx.logger.error("Card generation failed", { model, error: errorMessage(error) });
      return { cards: [], error: `Card generation failed: ${errorMessage(error)}`, progress: 50 };
    }
  }

  private async checkDuplicates(
    state: Readonly<CardGenerationState>,
    ctx: PipelineContext
  ): Promise<Partial<CardGenerationState>> {
    const duplicateResults: DuplicateResult[] = [];

    for (const [cardIndex, card] of state.cards.entries()) {
      try {
        const verdict = await this.duplicateChecker.check(card, state.request.deckId);
        duplicateResults.push({ cardIndex, ...verdict });
      } catch (error) {
        ctx.logger.warn("Duplicate check failed", { cardIndex, error: errorMessage(error) });
        duplicateResults.push({ cardIndex, isDuplicate: false, similarityScore: null, duplicateCardId: null });
      }
    }

    return { duplicateResults, progress: 65 };
  }

  private async factCheck(
    state: Readonly<CardGenerationState>,
    ctx: PipelineContext
  ): Promise<Partial<CardGenerationState>> {
    const context = state.request.context ?? null;
    const factCheckResults: CardVerificationResult[] = [];

    for (const [cardIndex, card] of state.cards.entries()) {
      try {
        const verification = await this.cardVerifier.verify(card, context, ctx);
        factCheckResults.push({ cardIndex, ...verification });
      } catch (error) {
        ctx.logger.warn("Card fact check failed", { cardIndex, error: errorMessage(error) });
        factCheckResults.push({
          cardIndex,
          confidence: 0.5,
          sources: [],
          reasoning: `Fact check failed: ${errorMessage(error)}`,
        });
      }
    }

    return { factCheckResults, progress: 80 };
  }

  private route(state: Readonly<CardGenerationState>, ctx: PipelineContext): Partial<CardGenerationState> {
    const { approved, rejected } = routeCards(state.cards, state.duplicateResults, state.factCheckResults);
    ctx.logger.info("Cards routed", { approved: approved.length, rejected: rejected.length });
    return { approvedCards: approved, rejectedCards: rejected, progress: 90 };
  }

  private save(state: Readonly<CardGenerationState>): Partial<CardGenerationState> {
    return { savedCards: projectCards(state.approvedCards, state.request), progress: 100 };
  }
}
