import { setImmediate as yieldToEventLoop } from "timers/promises";
import type { GeneratedCard, GenerationStreamEvent } from "@shared/generationSchema";
import { errorMessage } from "../utils/logger";
import type { BasePipelineState, PipelineEvent } from "./pipeline/executor";

export interface StreamAdapterOptions<S extends BasePipelineState, N extends string> {
  /** Final cards produced by a stage's patch. */
  cardsOf(stage: N, patch: Partial<S>): GeneratedCard[];
  now?: () => number;
}

/**
 * Turns a pipeline run into client-facing stream events: an initial
 * `progress`, one `progress` per stage followed by that stage's cards, then a
 * closing `complete` or `error`.
 */
export async function* adaptPipelineStream<S extends BasePipelineState, N extends string>(
  events: AsyncIterable<PipelineEvent<S, N>>,
  options: StreamAdapterOptions<S, N>
): AsyncGenerator<GenerationStreamEvent, void, undefined> {
  const now = options.now ?? Date.now;
  const startedAt = now();
  let cardIndex = 0;

  yield { type: "progress", step: "initializing", progress: 0, message: "Starting generation" };
  await yieldToEventLoop();

  try {
    for await (const event of events) {
      if (event.type === "stage") {
        yield { type: "progress", step: event.stage, progress: event.state.progress };
        await yieldToEventLoop();

        for (const card of options.cardsOf(event.stage, event.patch)) {
          yield { type: "card", card, progress: event.state.progress, cardIndex };
          cardIndex++;
          await yieldToEventLoop();
        }
        continue;
      }

      const { result } = event;
      if (result.outcome === "completed") {
        const seconds = (now() - startedAt) / 1000;
        yield {
          type: "complete",
          progress: 100,
          message: `Generated ${cardIndex} cards in ${seconds.toFixed(1)}s`,
          totalCards: cardIndex,
        };
      } else if (result.outcome === "cancelled") {
        yield { type: "error", error: "Generation cancelled" };
      } else {
        yield { type: "error", error: result.error ?? "Generation failed" };
      }
      return;
    }
  } catch (error) {
    yield { type: "error", error: errorMessage(error) };
  }
}
