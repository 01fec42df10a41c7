import { z } from "zod";

/**
 * Generation data model
 *
 * Shared between the job lifecycle manager, the pipelines and the HTTP layer.
 * Persisted job records are validated against these schemas on every read.
 */

// ============================================================================
// Enumerations
// ============================================================================

export const GenerationStatusSchema = z.enum([
  "pending",
  "running",
  "completed",
  "failed",
  "cancelled",
]);
export type GenerationStatus = z.infer<typeof GenerationStatusSchema>;

export const TERMINAL_STATUSES: readonly GenerationStatus[] = ["completed", "failed", "cancelled"];

export function isTerminalStatus(status: GenerationStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export const CardTypeSchema = z.enum(["basic", "cloze", "basic_reversed"]);
export type CardType = z.infer<typeof CardTypeSchema>;

export const DifficultySchema = z.enum(["easy", "medium", "hard"]);
export type Difficulty = z.infer<typeof DifficultySchema>;

// ============================================================================
// Requests
// ============================================================================

export const GenerationRequestSchema = z.object({
  topic: z.string().trim().min(1).max(500),
  deckId: z.string().uuid(),
  cardType: CardTypeSchema.default("basic"),
  numCards: z.number().int().min(1).max(20).default(5),
  difficulty: DifficultySchema.default("medium"),
  language: z.string().min(2).max(5).default("en"),
  includeSources: z.boolean().default(true),
  factCheck: z.boolean().default(true),
  context: z.string().max(5000).optional(),
  modelId: z.string().min(1).optional(),
  tags: z.array(z.string().min(1)).max(20).default([]),
  idempotencyKey: z.string().min(1).max(128).optional(),
});
export type GenerationRequest = z.infer<typeof GenerationRequestSchema>;
export type GenerationRequestInput = z.input<typeof GenerationRequestSchema>;

export const ListJobsQuerySchema = z.object({
  status: GenerationStatusSchema.optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});
export type ListJobsQuery = z.infer<typeof ListJobsQuerySchema>;

export const ReplayQuerySchema = z.object({
  jobId: z.string().min(1),
  resumeFrom: z.coerce.number().int().min(0).default(0),
});

export const FactCheckSourceTypeSchema = z.enum(["card", "text", "claim"]);
export type FactCheckSourceType = z.infer<typeof FactCheckSourceTypeSchema>;

export const FactCheckRequestSchema = z.object({
  content: z.string().max(10000),
  context: z.string().max(5000).optional(),
  sourceType: FactCheckSourceTypeSchema.default("text"),
});
export type FactCheckRequest = z.infer<typeof FactCheckRequestSchema>;

// ============================================================================
// Cards & Jobs
// ============================================================================

export const GeneratedCardSchema = z.object({
  front: z.string(),
  back: z.string(),
  cardType: CardTypeSchema,
  tags: z.array(z.string()),
  source: z.string().nullable(),
  confidence: z.number().min(0).max(1).nullable(),
  isDuplicate: z.boolean(),
  duplicateCardId: z.string().nullable(),
  similarityScore: z.number().min(0).max(1).nullable(),
});
export type GeneratedCard = z.infer<typeof GeneratedCardSchema>;

export const GenerationJobSchema = z.object({
  id: z.string(),
  userId: z.string(),
  status: GenerationStatusSchema,
  request: GenerationRequestSchema,
  numCardsGenerated: z.number().int().min(0),
  cards: z.array(GeneratedCardSchema),
  errorMessage: z.string().nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
  startedAt: z.string().nullable(),
  completedAt: z.string().nullable(),
  metadata: z.record(z.unknown()),
});
export type GenerationJob = z.infer<typeof GenerationJobSchema>;

export interface GenerationJobStatus {
  jobId: string;
  status: GenerationStatus;
  progress: number;
  numCardsGenerated: number;
  numCardsRequested: number;
  currentStep: string | null;
  errorMessage: string | null;
}

// ============================================================================
// Stream events
// ============================================================================

export type GenerationStreamEvent =
  | { type: "progress"; step: string; progress: number; message?: string }
  | { type: "card"; card: GeneratedCard; progress: number; cardIndex: number }
  | { type: "complete"; progress: 100; message: string; totalCards: number }
  | { type: "error"; error: string };

// ============================================================================
// Fact checking
// ============================================================================

export const ClaimImportanceSchema = z.enum(["high", "medium", "low"]);
export type ClaimImportance = z.infer<typeof ClaimImportanceSchema>;

export interface Claim {
  claim: string;
  type: string;
  importance: ClaimImportance;
}

export interface VerificationResult {
  claimIndex: number;
  claim: string;
  confidence: number;
  sources: string[];
  reasoning: string;
  verified: boolean;
}

export type Verdict =
  | "verified"
  | "likely_accurate"
  | "uncertain"
  | "likely_inaccurate"
  | "false"
  | "unverifiable";

export interface FactCheckReport {
  confidence: number;
  verdict: Verdict;
  summary: string;
  claims: Claim[];
  verificationResults: VerificationResult[];
  cancelled: boolean;
}
