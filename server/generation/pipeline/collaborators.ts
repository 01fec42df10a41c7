import type { ClaimVerification, ModelGateway } from "../../lib/modelGateway";
import type { PipelineContext } from "./executor";
import { cardClaim } from "./prompts";

export interface CardDraft {
  front: string;
  back: string;
  tags: string[];
}

// ===== Duplicate detection =====

export interface DuplicateVerdict {
  isDuplicate: boolean;
  similarityScore: number;
  duplicateCardId: string | null;
}

/** Similarity lookup against cards the user already owns. */
export interface DuplicateChecker {
  check(card: CardDraft, deckId: string): Promise<DuplicateVerdict>;
}

export const noDuplicateChecker: DuplicateChecker = {
  async check() {
    return { isDuplicate: false, similarityScore: 0, duplicateCardId: null };
  },
};

// ===== Source retrieval =====

export interface SourceDocument {
  type: string;
  content: string;
  reliability: number;
}

export interface SourceSearcher {
  search(claims: string[], context: string | null): Promise<SourceDocument[]>;
}

/** Uses the caller-supplied context as the only source. */
export const contextSourceSearcher: SourceSearcher = {
  async search(_claims, context) {
    if (!context) return [];
    return [{ type: "provided_context", content: context, reliability: 0.8 }];
  },
};

// ===== Card verification =====

export interface CardVerifier {
  verify(card: CardDraft, context: string | null, pipelineContext: PipelineContext): Promise<ClaimVerification>;
}

/** Sends the whole question/answer pair to the gateway as one claim. */
export function createDirectCardVerifier(gateway: ModelGateway): CardVerifier {
  return {
    verify(card, context) {
      return gateway.verifyClaim(cardClaim(card.front, card.back), context);
    },
  };
}
