import { AsyncLocalStorage } from "async_hooks";

/** Correlation ids for the current HTTP request or background job run. */
export interface CorrelationContext {
  traceId: string;
  userId?: string;
  jobId?: string;
  startTime: number;
}

const scopes = new AsyncLocalStorage<CorrelationContext>();

export const getContext = (): CorrelationContext | undefined => scopes.getStore();

export const runWithContext = <T>(context: CorrelationContext, fn: () => T): T => scopes.run(context, fn);

/** Records ids learned mid-request, such as the caller. No-op outside a scope. */
export function updateContext(updates: Partial<Omit<CorrelationContext, "traceId" | "startTime">>): void {
  const scope = scopes.getStore();
  if (scope) {
    Object.assign(scope, updates);
  }
}
