import type { RoutingState, TraceStep } from "./types";

type TraceDetail = Record<string, string | number | boolean>;

interface OpenStep {
  state: RoutingState;
  startedAt: number;
  detail: TraceDetail;
}

/**
 * Per-query record of state transitions with their durations.
 */
export class RoutingTrace {
  private readonly steps: TraceStep[] = [];
  private current: OpenStep | null = null;

  constructor(private readonly now: () => number = Date.now) {}

  enter(state: RoutingState, detail: TraceDetail = {}): void {
    this.close();
    this.current = { state, startedAt: this.now(), detail: { ...detail } };
  }

  annotate(detail: TraceDetail): void {
    if (this.current) {
      Object.assign(this.current.detail, detail);
    }
  }

  finish(): TraceStep[] {
    this.enter("done");
    this.close();
    return [...this.steps];
  }

  private close(): void {
    if (!this.current) return;
    const { state, startedAt, detail } = this.current;
    const step: TraceStep = { state, durationMs: this.now() - startedAt };
    if (Object.keys(detail).length > 0) step.detail = detail;
    this.steps.push(step);
    this.current = null;
  }
}
