import { FailureKind, LatencyStats, MetricsSnapshot, SendOutcome } from './types.js';

const MIN_ELAPSED_MS = 1;

/**
 * Value at rank `ceil(p * n) - 1` of an ascending array, clamped to the valid range.
 * `p` is a fraction (0.95 for p95). Returns undefined for an empty array.
 */
export function percentile(sorted: readonly number[], p: number): number | undefined {
  if (sorted.length === 0) return undefined;
  const index = Math.ceil(p * sorted.length) - 1;
  return sorted[Math.min(sorted.length - 1, Math.max(0, index))];
}

export function calculateLatencyStats(latencies: readonly number[]): LatencyStats | undefined {
  if (latencies.length === 0) {
    return undefined;
  }

  const sorted = [...latencies].sort((a, b) => a - b);
  const sum = sorted.reduce((a, b) => a + b, 0);
  const at = (p: number) => percentile(sorted, p) ?? 0;

  return {
    samples: sorted.length,
    min: sorted[0],
    max: sorted[sorted.length - 1],
    mean: sum / sorted.length,
    p50: at(0.5),
    p95: at(0.95),
    p99: at(0.99),
  };
}

export interface SnapshotOptions {
  /** Only count outcomes completed within this many ms of the latest completion. */
  windowMs?: number;
}

/**
 * Append-only outcome store for one run.
 *
 * `record` is a synchronous critical section: no await happens between the run
 * check and the push, so concurrent workers on the event loop cannot interleave
 * inside it. `snapshot` copies the store and derives every figure from the copy,
 * so it never holds up recorders and never serves a stale percentile.
 */
export class MetricsCollector {
  readonly runId: string;
  private outcomes: SendOutcome[] = [];

  constructor(runId: string) {
    this.runId = runId;
  }

  record(outcome: SendOutcome): void {
    if (outcome.runId !== this.runId) {
      throw new Error(`Outcome from run ${outcome.runId} cannot be recorded in run ${this.runId}`);
    }
    this.outcomes.push(outcome);
  }

  get size(): number {
    return this.outcomes.length;
  }

  snapshot(options: SnapshotOptions = {}): MetricsSnapshot {
    let outcomes = this.outcomes.slice();

    if (options.windowMs !== undefined && outcomes.length > 0) {
      const latest = outcomes.reduce((max, o) => Math.max(max, o.timestamp), -Infinity);
      const windowStart = latest - options.windowMs;
      outcomes = outcomes.filter(o => o.timestamp >= windowStart);
    }

    const failuresByKind: Record<FailureKind, number> = {
      'network-error': 0,
      timeout: 0,
      'protocol-rejected': 0,
    };
    const latencies: number[] = [];

    for (const outcome of outcomes) {
      switch (outcome.kind) {
        case 'success':
          latencies.push(outcome.latencyMs);
          break;
        case 'network-error':
        case 'timeout':
        case 'protocol-rejected':
          failuresByKind[outcome.kind]++;
          break;
        default: {
          const unhandled: never = outcome.kind;
          throw new Error(`Unknown outcome kind: ${String(unhandled)}`);
        }
      }
    }

    const attempted = outcomes.length;
    const succeeded = latencies.length;
    const failed = attempted - succeeded;
    const elapsedMs = elapsedWindow(outcomes);

    return Object.freeze({
      runId: this.runId,
      attempted,
      succeeded,
      failed,
      errorRate: attempted > 0 ? failed / attempted : undefined,
      latency: calculateLatencyStats(latencies),
      throughputPerSecond: attempted > 0 ? succeeded / (elapsedMs / 1000) : 0,
      elapsedMs,
      failuresByKind: Object.freeze(failuresByKind),
    });
  }
}

// From the start of the earliest send to the latest completion.
function elapsedWindow(outcomes: readonly SendOutcome[]): number {
  if (outcomes.length === 0) return 0;
  let first = Infinity;
  let last = -Infinity;
  for (const outcome of outcomes) {
    first = Math.min(first, outcome.timestamp - outcome.latencyMs);
    last = Math.max(last, outcome.timestamp);
  }
  return Math.max(MIN_ELAPSED_MS, last - first);
}
