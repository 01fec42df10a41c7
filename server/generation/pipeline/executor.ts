import { errorMessage, type Logger } from "../../utils/logger";
import { pipelineStageDuration } from "../../metrics/generationMetrics";

export const END = "__end__";
export type End = typeof END;

const DEFAULT_RECURSION_LIMIT = 25;

/** Fields every pipeline state carries. */
export interface BasePipelineState {
  step: string;
  progress: number;
  error: string | null;
  cancelled: boolean;
}

export interface CancellationSignal {
  isCancelled(): boolean | Promise<boolean>;
}

export type ProgressSink = (stage: string, progress: number) => void | Promise<void>;

/**
 * Side channel threaded through every stage call. Kept out of the state so
 * the state stays plain data.
 */
export interface PipelineContext {
  traceId: string;
  signal: CancellationSignal;
  onProgress?: ProgressSink;
  logger: Logger;
}

export const NEVER_CANCELLED: CancellationSignal = { isCancelled: () => false };

export function fromAbortSignal(signal?: AbortSignal): CancellationSignal {
  return { isCancelled: () => signal?.aborted ?? false };
}

export type StageFn<S extends BasePipelineState> = (
  state: Readonly<S>,
  context: PipelineContext
) => Promise<Partial<S>>;

export type StageRegistry<S extends BasePipelineState, N extends string> = Record<N, StageFn<S>>;

type Target<N extends string> = N | End;

type Edge<S extends BasePipelineState, N extends string> =
  | { kind: "direct"; targets: Target<N>[]; to: Target<N> }
  | { kind: "conditional"; targets: Target<N>[]; route: (state: Readonly<S>) => Target<N> };

export type PipelineOutcome = "completed" | "cancelled" | "failed";

export interface PipelineResult<S extends BasePipelineState, N extends string> {
  state: S;
  outcome: PipelineOutcome;
  stagesRun: N[];
  error: string | null;
}

export type PipelineEvent<S extends BasePipelineState, N extends string> =
  | { type: "stage"; stage: N; patch: Partial<S>; state: S }
  | { type: "end"; result: PipelineResult<S, N> };

function isEnd<N extends string>(target: Target<N>): target is End {
  return target === END;
}

// ============================================================================
// Graph builder
// ============================================================================

export class PipelineGraph<S extends BasePipelineState, N extends string> {
  private readonly edges = new Map<N, Edge<S, N>>();
  private entryPoint: N | null = null;

  constructor(
    readonly name: string,
    private readonly stages: StageRegistry<S, N>
  ) {}

  setEntryPoint(stage: N): this {
    this.entryPoint = stage;
    return this;
  }

  addEdge(from: N, to: Target<N>): this {
    this.assertNoEdge(from);
    this.edges.set(from, { kind: "direct", to, targets: [to] });
    return this;
  }

  /**
   * Branches on `router(state)`. The route table must name a target for every
   * key the router can return.
   */
  addConditionalEdges<R extends string>(
    from: N,
    router: (state: Readonly<S>) => R,
    routes: Record<R, Target<N>>
  ): this {
    this.assertNoEdge(from);
    this.edges.set(from, {
      kind: "conditional",
      targets: Object.values<Target<N>>(routes),
      route: (state) => routes[router(state)],
    });
    return this;
  }

  compile(options: { recursionLimit?: number } = {}): CompiledPipeline<S, N> {
    if (this.entryPoint === null) {
      throw new Error(`Pipeline "${this.name}" has no entry point`);
    }

    for (const stage of Object.keys(this.stages)) {
      if (this.isStage(stage) && !this.edges.has(stage)) {
        throw new Error(`Pipeline "${this.name}": stage "${stage}" has no outgoing edge`);
      }
    }

    for (const [from, edge] of this.edges) {
      for (const target of edge.targets) {
        if (!isEnd(target) && !this.isStage(target)) {
          throw new Error(`Pipeline "${this.name}": edge ${from} -> ${target} targets an unknown stage`);
        }
      }
    }

    return new CompiledPipeline(
      this.name,
      this.stages,
      new Map(this.edges),
      this.entryPoint,
      options.recursionLimit ?? DEFAULT_RECURSION_LIMIT
    );
  }

  private isStage(name: string): name is N {
    return Object.prototype.hasOwnProperty.call(this.stages, name);
  }

  private assertNoEdge(from: N): void {
    if (this.edges.has(from)) {
      throw new Error(`Pipeline "${this.name}": stage "${from}" already has an outgoing edge`);
    }
  }
}

// ============================================================================
// Execution
// ============================================================================

export class CompiledPipeline<S extends BasePipelineState, N extends string> {
  constructor(
    readonly name: string,
    private readonly stages: StageRegistry<S, N>,
    private readonly edges: ReadonlyMap<N, Edge<S, N>>,
    private readonly entryPoint: N,
    private readonly recursionLimit: number
  ) {}

  async invoke(initial: S, context: PipelineContext): Promise<PipelineResult<S, N>> {
    for await (const event of this.stream(initial, context)) {
      if (event.type === "end") {
        return event.result;
      }
    }
    return { state: initial, outcome: "failed", stagesRun: [], error: "Pipeline ended without a result" };
  }

  /**
   * Runs stages one at a time, yielding after each. The last event is always
   * `end`; the generator never throws.
   */
  async *stream(initial: S, context: PipelineContext): AsyncGenerator<PipelineEvent<S, N>, void, undefined> {
    const log = context.logger.child({ pipeline: this.name, traceId: context.traceId });
    const stagesRun: N[] = [];
    let state: S = { ...initial };
    let current: Target<N> = this.entryPoint;

    const finish = (outcome: PipelineOutcome): PipelineEvent<S, N> => ({
      type: "end",
      result: { state, outcome, stagesRun: [...stagesRun], error: state.error },
    });

    while (!isEnd(current)) {
      const stage: N = current;

      if (stagesRun.length >= this.recursionLimit) {
        state = { ...state, error: `Recursion limit of ${this.recursionLimit} stages reached` };
        log.error("Pipeline exceeded recursion limit", { stage });
        yield finish("failed");
        return;
      }

      let cancelled: boolean;
      try {
        cancelled = await context.signal.isCancelled();
      } catch (error) {
        state = { ...state, error: `Cancellation check failed: ${errorMessage(error)}` };
        log.error("Cancellation check failed", { stage, error: errorMessage(error) });
        yield finish("failed");
        return;
      }

      if (cancelled) {
        state = { ...state, cancelled: true };
        log.info("Pipeline cancelled before stage", { stage });
        yield finish("cancelled");
        return;
      }

      log.debug("Executing stage", { stage });
      const startedAt = Date.now();
      let patch: Partial<S>;
      try {
        patch = await this.stages[stage](state, context);
      } catch (error) {
        this.observe(stage, startedAt, "error");
        state = { ...state, error: errorMessage(error), step: stage };
        log.error("Stage failed", { stage, error: errorMessage(error) });
        yield finish("failed");
        return;
      }

      stagesRun.push(stage);
      state = { ...state, ...patch, step: stage };
      this.observe(stage, startedAt, state.error ? "error" : "ok");

      await this.reportProgress(context, log, stage, state.progress);

      yield { type: "stage", stage, patch, state };

      if (state.error) {
        log.warn("Stage reported an error, halting", { stage, error: state.error });
        yield finish("failed");
        return;
      }

      current = this.next(stage, state);
    }

    yield finish("completed");
  }

  private next(stage: N, state: S): Target<N> {
    const edge = this.edges.get(stage);
    if (!edge) return END;
    return edge.kind === "direct" ? edge.to : edge.route(state);
  }

  private async reportProgress(context: PipelineContext, log: Logger, stage: N, progress: number): Promise<void> {
    if (!context.onProgress) return;
    try {
      await context.onProgress(stage, progress);
    } catch (error) {
      log.warn("Progress callback failed", { stage, error: errorMessage(error) });
    }
  }

  private observe(stage: N, startedAt: number, outcome: "ok" | "error"): void {
    pipelineStageDuration.observe({ pipeline: this.name, stage, outcome }, (Date.now() - startedAt) / 1000);
  }
}
