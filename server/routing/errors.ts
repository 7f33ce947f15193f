/**
 * Errors raised by the routing pipeline.
 *
 * Only `generation_unavailable` and `aborted` ever leave the orchestrator.
 * A `timeout` is caught by the stage whose call timed out and handled as
 * that call's failure.
 */

export type RoutingErrorCategory = "timeout" | "generation_unavailable" | "aborted";

export class RoutingError extends Error {
  readonly category: RoutingErrorCategory;

  constructor(message: string, category: RoutingErrorCategory, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RoutingError";
    this.category = category;
  }
}

/**
 * An external call exceeded its own timeout. Callers treat it exactly like
 * that call's failure.
 */
export class CallTimeoutError extends RoutingError {
  readonly callName: string;
  readonly timeoutMs: number;

  constructor(callName: string, timeoutMs: number) {
    super(`${callName} timed out after ${timeoutMs}ms`, "timeout");
    this.name = "CallTimeoutError";
    this.callName = callName;
    this.timeoutMs = timeoutMs;
  }
}

export class QueryAbortedError extends RoutingError {
  constructor(stage: string) {
    super(`Query aborted during ${stage}`, "aborted");
    this.name = "QueryAbortedError";
  }
}

/**
 * The generation capability cannot be reached at all (quota exhausted,
 * credentials rejected, no API key). No answer is possible, which is a
 * different outcome from an answer that is merely ungrounded.
 */
export class GenerationUnavailableError extends RoutingError {
  constructor(message = "Generation capability is unavailable", options?: { cause?: unknown }) {
    super(message, "generation_unavailable", options);
    this.name = "GenerationUnavailableError";
  }
}

export function throwIfAborted(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new QueryAbortedError(stage);
  }
}
