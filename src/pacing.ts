import { systemClock } from './clock.js';
import { Clock } from './types.js';

export const DEFAULT_MAX_WAIT_SLICE_MS = 250;

export interface PacingGateOptions {
  /** Admissions per second. */
  ratePerSecond: number;
  /** Total admissions before the gate closes. */
  limit: number;
  /** Close the gate for slots at or past this many ms after the first admission. */
  deadlineMs?: number;
  clock?: Clock;
  maxWaitSliceMs?: number;
}

/**
 * Leaky-bucket admission control shared by all dispatcher workers.
 *
 * Slots are `1000 / ratePerSecond` ms apart. A slot is reserved synchronously
 * in `acquire`, so concurrent callers always get distinct tickets and slots.
 * A worker that falls behind gets the next free slot at "now", never a burst
 * of missed slots.
 */
export class PacingGate {
  readonly intervalMs: number;
  readonly limit: number;
  private readonly deadlineMs?: number;
  private readonly clock: Clock;
  private readonly maxWaitSliceMs: number;
  private issued = 0;
  private startedAt?: number;
  private nextSlotAt = 0;
  private closed = false;
  private deadlineReached = false;

  constructor(options: PacingGateOptions) {
    if (!(options.ratePerSecond > 0)) {
      throw new RangeError(`ratePerSecond must be positive, got ${options.ratePerSecond}`);
    }
    this.intervalMs = 1000 / options.ratePerSecond;
    this.limit = options.limit;
    this.deadlineMs = options.deadlineMs;
    this.clock = options.clock ?? systemClock;
    this.maxWaitSliceMs = options.maxWaitSliceMs ?? DEFAULT_MAX_WAIT_SLICE_MS;
  }

  get admitted(): number {
    return this.issued;
  }

  get isClosed(): boolean {
    return this.closed || this.deadlineReached || this.issued >= this.limit;
  }

  close(): void {
    this.closed = true;
  }

  /**
   * Waits for the next slot and returns its ticket (0, 1, 2, ...).
   * Resolves undefined once the limit or deadline is reached, or when `close`
   * is called or `signal` aborts before the slot arrives.
   */
  async acquire(signal?: AbortSignal): Promise<number | undefined> {
    if (this.isClosed || signal?.aborted) return undefined;

    const now = this.clock.now();
    if (this.startedAt === undefined) {
      this.startedAt = now;
      this.nextSlotAt = now;
    }

    const slot = Math.max(now, this.nextSlotAt);
    if (this.deadlineMs !== undefined && slot - this.startedAt >= this.deadlineMs) {
      this.deadlineReached = true;
      return undefined;
    }

    this.nextSlotAt = slot + this.intervalMs;
    const ticket = this.issued++;

    for (let remaining = slot - this.clock.now(); remaining > 0; remaining = slot - this.clock.now()) {
      if (signal?.aborted) return undefined;
      await this.clock.sleep(Math.min(remaining, this.maxWaitSliceMs), signal);
    }
    if (signal?.aborted || this.closed) return undefined;

    return ticket;
  }
}
