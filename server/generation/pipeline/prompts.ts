import type { CardType, Difficulty, FactCheckSourceType, GenerationRequest } from "@shared/generationSchema";
import type { JsonSchema } from "../../lib/modelGateway";

const CARD_TYPE_INSTRUCTIONS: Record<CardType, string> = {
  basic: "Create basic flashcards with a question on the front and answer on the back.",
  cloze: "Create cloze deletion cards where key terms are wrapped in {{c1::term}}.",
  basic_reversed: "Create cards that can be studied in both directions.",
};

const DIFFICULTY_GUIDELINES: Record<Difficulty, string> = {
  easy: "Focus on fundamental concepts. Use simple language and short answers.",
  medium: "Cover moderate complexity. Include some details but stay concise.",
  hard: "Cover advanced topics. Include nuanced details and connections.",
};

export function buildCardSystemPrompt(request: Pick<GenerationRequest, "cardType" | "difficulty" | "language">): string {
  const { cardType, difficulty, language } = request;

  return `You are an expert flashcard creator. Your task is to create high-quality educational flashcards.

CARD TYPE: ${cardType}
${CARD_TYPE_INSTRUCTIONS[cardType]}

DIFFICULTY: ${difficulty}
${DIFFICULTY_GUIDELINES[difficulty]}

LANGUAGE: ${language}
Create all content in ${language}.

GUIDELINES:
1. Each card should focus on ONE concept
2. Questions should be clear and unambiguous
3. Answers should be concise but complete
4. Avoid yes/no questions
5. Include context when needed
6. Make cards that test understanding, not just recall

OUTPUT FORMAT:
Return cards as a JSON array:
\`\`\`json
[
  {
    "front": "Question or prompt",
    "back": "Answer or response",
    "tags": ["tag1", "tag2"]
  }
]
\`\`\``;
}

export function buildCardUserPrompt(
  request: Pick<GenerationRequest, "topic" | "numCards" | "tags">,
  contextContents: string[]
): string {
  let prompt = `Create ${request.numCards} flashcards about: ${request.topic}`;

  if (contextContents.length > 0) {
    prompt += `\n\nUSE THIS CONTEXT:\n${contextContents.join("\n\n")}`;
  }

  if (request.tags.length > 0) {
    prompt += `\n\nInclude these tags: ${request.tags.join(", ")}`;
  }

  return prompt;
}

export const CARD_LIST_SCHEMA: JsonSchema = {
  type: "object",
  properties: {
    cards: {
      type: "array",
      items: {
        type: "object",
        properties: {
          front: { type: "string" },
          back: { type: "string" },
          tags: { type: "array", items: { type: "string" } },
        },
        required: ["front", "back", "tags"],
        additionalProperties: false,
      },
    },
  },
  required: ["cards"],
  additionalProperties: false,
};

// ===== Claim extraction =====

const CLAIM_OUTPUT_FORMAT = `Respond with a JSON array of claims:
\`\`\`json
[
  {
    "claim": "The factual statement",
    "type": "historical/scientific/definition/statistic",
    "importance": "high/medium/low"
  }
]
\`\`\``;

const CARD_CLAIMS_PROMPT = `You are an expert at identifying factual claims in flashcard content.
Extract all verifiable factual claims from the given question-answer pair.
Focus on objective, checkable statements rather than opinions or definitions.

${CLAIM_OUTPUT_FORMAT}`;

const TEXT_CLAIMS_PROMPT = `You are an expert at identifying factual claims in text.
Extract all verifiable factual claims from the given content.
Focus on objective, checkable statements rather than opinions.

${CLAIM_OUTPUT_FORMAT}`;

export function buildClaimExtractionPrompt(sourceType: Exclude<FactCheckSourceType, "claim">): string {
  return sourceType === "card" ? CARD_CLAIMS_PROMPT : TEXT_CLAIMS_PROMPT;
}

export function buildClaimExtractionUserPrompt(content: string): string {
  return `Extract claims from:\n${content}`;
}

export const CLAIM_LIST_SCHEMA: JsonSchema = {
  type: "object",
  properties: {
    claims: {
      type: "array",
      items: {
        type: "object",
        properties: {
          claim: { type: "string" },
          type: { type: "string" },
          importance: { type: "string", enum: ["high", "medium", "low"] },
        },
        required: ["claim", "type", "importance"],
        additionalProperties: false,
      },
    },
  },
  required: ["claims"],
  additionalProperties: false,
};

/** The text submitted for verification when a whole card is checked. */
export function cardClaim(front: string, back: string): string {
  return `Question: ${front}\nAnswer: ${back}`;
}
