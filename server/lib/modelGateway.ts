import OpenAI from "openai";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";
import { z } from "zod";
import { GatewayError } from "../utils/errors";
import { createLogger, errorMessage } from "../utils/logger";
import { gatewayRequestsTotal, gatewayTokensTotal } from "../metrics/generationMetrics";

const logger = createLogger("ModelGateway");

// ===== Contract =====

export type JsonSchema = Record<string, unknown>;

export interface GenerateRequest {
  model: string;
  systemPrompt: string;
  userPrompt: string;
  temperature: number;
  maxTokens: number;
  responseSchema?: JsonSchema;
}

export interface GenerateResult {
  content: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
  finishReason: string;
}

export interface ClaimVerification {
  confidence: number;
  sources: string[];
  reasoning: string;
}

/**
 * Text generation and claim verification. Implementations own retries and
 * must enforce a finite per-call timeout; failures surface as GatewayError.
 */
export interface ModelGateway {
  readonly supportsResponseSchema: boolean;
  generate(request: GenerateRequest): Promise<GenerateResult>;
  verifyClaim(claim: string, context?: string | null): Promise<ClaimVerification>;
}

// ===== Verification prompt =====

const FACT_CHECK_SYSTEM_PROMPT = `You are a fact-checking assistant. Your task is to verify claims using your knowledge and provide a confidence score.

You must respond in the following JSON format:
{
    "confidence": <float between 0.0 and 1.0>,
    "sources": [<list of source descriptions or URLs if known>],
    "reasoning": "<your reasoning for the confidence score>"
}

Confidence levels:
- 0.9-1.0: Highly confident, well-established fact
- 0.7-0.9: Confident, generally accepted
- 0.5-0.7: Moderate confidence, some uncertainty
- 0.3-0.5: Low confidence, conflicting information
- 0.0-0.3: Very low confidence, likely false or unverifiable`;

const VERIFICATION_SCHEMA: JsonSchema = {
  type: "object",
  properties: {
    confidence: { type: "number", minimum: 0, maximum: 1 },
    sources: { type: "array", items: { type: "string" } },
    reasoning: { type: "string" },
  },
  required: ["confidence", "sources", "reasoning"],
  additionalProperties: false,
};

const VerificationPayloadSchema = z.object({
  confidence: z.coerce.number().transform((value) => Math.min(1, Math.max(0, value))),
  sources: z.array(z.string()).catch([]),
  reasoning: z.string().catch("No reasoning provided"),
});

export function buildVerificationPrompt(claim: string, context?: string | null): string {
  let prompt = `Please fact-check the following claim:\n\nClaim: ${claim}`;
  if (context) {
    prompt += `\n\nContext: ${context}`;
  }
  return prompt;
}

/**
 * Reads a verification payload out of raw model output. Unparseable output
 * keeps the raw text as reasoning and scores a neutral 0.5.
 */
export function parseVerification(content: string): ClaimVerification {
  let raw: unknown;
  try {
    raw = JSON.parse(content.trim());
  } catch {
    logger.warn("Failed to parse fact-check response as JSON", { response: content.slice(0, 500) });
    return { confidence: 0.5, sources: [], reasoning: content };
  }

  const parsed = VerificationPayloadSchema.safeParse(raw);
  if (!parsed.success || Number.isNaN(parsed.data.confidence)) {
    return { confidence: 0.5, sources: [], reasoning: content };
  }
  return parsed.data;
}

// ===== OpenAI-compatible implementation =====

interface CompletionLike {
  model: string;
  choices: Array<{
    message: { content: string | null };
    finish_reason: string | null;
  }>;
  usage?: { prompt_tokens: number; completion_tokens: number } | null;
}

export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<CompletionLike>;
    };
  };
}

export interface OpenAIGatewayOptions {
  factCheckModel: string;
  supportsResponseSchema?: boolean;
}

export class OpenAIModelGateway implements ModelGateway {
  readonly supportsResponseSchema: boolean;
  private readonly factCheckModel: string;

  constructor(private readonly client: ChatCompletionsClient, options: OpenAIGatewayOptions) {
    this.factCheckModel = options.factCheckModel;
    this.supportsResponseSchema = options.supportsResponseSchema ?? false;
  }

  async generate(request: GenerateRequest): Promise<GenerateResult> {
    const { model } = request;
    const startTime = Date.now();

    const body: ChatCompletionCreateParamsNonStreaming = {
      model,
      messages: [
        { role: "system", content: request.systemPrompt },
        { role: "user", content: request.userPrompt },
      ],
      temperature: request.temperature,
      max_tokens: request.maxTokens,
    };

    if (request.responseSchema && this.supportsResponseSchema) {
      body.response_format = {
        type: "json_schema",
        json_schema: { name: "response", schema: request.responseSchema },
      };
    }

    let completion: CompletionLike;
    try {
      completion = await this.client.chat.completions.create(body);
    } catch (error) {
      gatewayRequestsTotal.inc({ model, status: "error" });
      const upstreamStatus = error instanceof OpenAI.APIError ? error.status : undefined;
      logger.error("Model request failed", { model, upstreamStatus, error: errorMessage(error) });
      throw new GatewayError(`Model request failed: ${errorMessage(error)}`, {
        model,
        upstreamStatus,
        cause: error,
      });
    }

    const choice = completion.choices[0];
    const inputTokens = completion.usage?.prompt_tokens ?? 0;
    const outputTokens = completion.usage?.completion_tokens ?? 0;

    gatewayRequestsTotal.inc({ model, status: "success" });
    gatewayTokensTotal.inc({ model, direction: "input" }, inputTokens);
    gatewayTokensTotal.inc({ model, direction: "output" }, outputTokens);

    logger.debug("Model request completed", {
      model,
      latencyMs: Date.now() - startTime,
      inputTokens,
      outputTokens,
    });

    return {
      content: choice?.message.content ?? "",
      model: completion.model || model,
      inputTokens,
      outputTokens,
      finishReason: choice?.finish_reason ?? "stop",
    };
  }

  async verifyClaim(claim: string, context?: string | null): Promise<ClaimVerification> {
    const response = await this.generate({
      model: this.factCheckModel,
      systemPrompt: FACT_CHECK_SYSTEM_PROMPT,
      userPrompt: buildVerificationPrompt(claim, context),
      temperature: 0.1,
      maxTokens: 1000,
      responseSchema: VERIFICATION_SCHEMA,
    });

    return parseVerification(response.content);
  }
}

export interface GatewayClientConfig {
  baseUrl?: string;
  apiKey?: string;
  timeoutMs: number;
  maxRetries: number;
}

export function createOpenAIClient(config: GatewayClientConfig): OpenAI {
  return new OpenAI({
    baseURL: config.baseUrl,
    apiKey: config.apiKey ?? "not-configured",
    timeout: config.timeoutMs,
    maxRetries: config.maxRetries,
  });
}
