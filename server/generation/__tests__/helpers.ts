import { GenerationRequestSchema, type GenerationRequest, type GenerationRequestInput } from "@shared/generationSchema";
import type { ClaimVerification, GenerateRequest, GenerateResult, ModelGateway } from "../../lib/modelGateway";
import { createLogger } from "../../utils/logger";
import { NEVER_CANCELLED, type PipelineContext } from "../pipeline/executor";

export const TEST_DECK_ID = "00000000-0000-4000-8000-000000000001";

export function makeRequest(overrides: Partial<GenerationRequestInput> = {}): GenerationRequest {
  return GenerationRequestSchema.parse({ topic: "Photosynthesis", deckId: TEST_DECK_ID, ...overrides });
}

export function cardsJson(count: number): string {
  return JSON.stringify(
    Array.from({ length: count }, (_, i) => ({
      front: `Question ${i + 1}`,
      back: `Answer ${i + 1}`,
      tags: ["biology"],
    }))
  );
}

export function testContext(overrides: Partial<PipelineContext> = {}): PipelineContext {
  return {
    traceId: "trace-test",
    signal: NEVER_CANCELLED,
    logger: createLogger("test"),
    ...overrides,
  };
}

type Scripted = string | Error;

/**
 * In-process gateway. `generate` answers from a queue (falling back to
 * `defaultContent`); `verifyClaim` scores through `confidenceFor`.
 */
export class FakeGateway implements ModelGateway {
  supportsResponseSchema = false;
  readonly generateCalls: GenerateRequest[] = [];
  readonly verifyCalls: Array<{ claim: string; context: string | null }> = [];
  readonly responses: Scripted[] = [];
  defaultContent = "[]";
  confidenceFor: (claim: string) => number = () => 0.9;
  verifySources: string[] = ["Biology textbook"];
  verifyError: Error | null = null;
  beforeGenerate: (() => void | Promise<void>) | null = null;

  respondWith(...responses: Scripted[]): this {
    this.responses.push(...responses);
    return this;
  }

  async generate(request: GenerateRequest): Promise<GenerateResult> {
    this.generateCalls.push(request);
    if (this.beforeGenerate) {
      await this.beforeGenerate();
    }
    const next = this.responses.shift() ?? this.defaultContent;
    if (next instanceof Error) {
      throw next;
    }
    return { content: next, model: request.model, inputTokens: 10, outputTokens: 20, finishReason: "stop" };
  }

  async verifyClaim(claim: string, context?: string | null): Promise<ClaimVerification> {
    this.verifyCalls.push({ claim, context: context ?? null });
    if (this.verifyError) {
      throw this.verifyError;
    }
    return { confidence: this.confidenceFor(claim), sources: [...this.verifySources], reasoning: "Consistent with references" };
  }
}
