import { systemClock } from './clock.js';
import { ConfigError, formatError } from './errors.js';
import { Logger, silentLogger } from './logger.js';
import { MetricsCollector } from './metrics.js';
import { PacingGate } from './pacing.js';
import {
  Clock,
  LoadConfig,
  PayloadDescriptor,
  ProtocolClient,
  SendOutcome,
  SendResult,
  SendResultKind,
} from './types.js';

/** Which attempt results may be retried. Protocol rejections are terminal. */
export const RETRY_POLICY: Record<SendResultKind, boolean> = {
  success: false,
  'network-error': true,
  timeout: true,
  'protocol-rejected': false,
};

export interface DispatcherOptions {
  client: ProtocolClient;
  clock?: Clock;
  logger?: Logger;
}

export interface DispatchOptions {
  /** Admission gate shared by the workers. Defaults to one built from the config's rate and stop condition. */
  gate?: PacingGate;
  /** Run-scoped cancellation. Observed between operations, never mid-send. */
  signal?: AbortSignal;
  onOutcome?: (outcome: SendOutcome) => void;
}

export function totalSendsFor(config: Pick<LoadConfig, 'targetRate' | 'durationSeconds' | 'totalCount'>): number {
  if (config.totalCount !== undefined) return config.totalCount;
  if (config.durationSeconds !== undefined) return Math.ceil(config.targetRate * config.durationSeconds);
  throw new ConfigError('One of durationSeconds or totalCount is required', 'durationSeconds');
}

export function createGate(config: LoadConfig, clock: Clock = systemClock): PacingGate {
  return new PacingGate({
    ratePerSecond: config.targetRate,
    limit: totalSendsFor(config),
    deadlineMs: config.durationSeconds !== undefined ? config.durationSeconds * 1000 : undefined,
    clock,
  });
}

/**
 * Pool of async workers sending payloads through a ProtocolClient.
 *
 * Each logical send produces exactly one recorded SendOutcome, however many
 * attempts it took; its latency covers every attempt and retry delay.
 */
export class Dispatcher {
  private readonly client: ProtocolClient;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: DispatcherOptions) {
    this.client = options.client;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  async run(
    payloads: readonly PayloadDescriptor[],
    config: LoadConfig,
    collector: MetricsCollector,
    options: DispatchOptions = {},
  ): Promise<void> {
    if (payloads.length === 0) {
      throw new ConfigError('Dispatcher needs at least one payload');
    }
    const gate = options.gate ?? createGate(config, this.clock);

    const workers: Promise<void>[] = [];
    for (let id = 0; id < config.concurrency; id++) {
      workers.push(this.worker(id, payloads, config, collector, gate, options));
    }
    await Promise.all(workers);
  }

  private async worker(
    id: number,
    payloads: readonly PayloadDescriptor[],
    config: LoadConfig,
    collector: MetricsCollector,
    gate: PacingGate,
    options: DispatchOptions,
  ): Promise<void> {
    const { signal, onOutcome } = options;

    while (!signal?.aborted) {
      const ticket = await gate.acquire(signal);
      if (ticket === undefined) break;

      const payload = payloads[ticket % payloads.length];
      const outcome = await this.send(payload, config, collector.runId, signal);
      collector.record(outcome);
      onOutcome?.(outcome);
    }

    this.logger.debug(`Worker ${id} finished`);
  }

  /** One logical send: the first attempt plus any retries the policy allows. */
  private async send(
    payload: PayloadDescriptor,
    config: LoadConfig,
    runId: string,
    signal?: AbortSignal,
  ): Promise<SendOutcome> {
    const start = this.clock.now();
    let attempts = 0;
    let result: SendResult;

    for (;;) {
      attempts++;
      result = await this.attempt(payload, config);

      const canRetry = RETRY_POLICY[result.kind] && attempts <= config.retryCount && !signal?.aborted;
      if (!canRetry) break;

      this.logger.debug(`Retrying ${payload.path} after ${result.kind} (attempt ${attempts})`);
      if (config.retryDelayMs > 0) {
        await this.clock.sleep(config.retryDelayMs, signal);
        if (signal?.aborted) break;
      }
    }

    const end = this.clock.now();
    return Object.freeze({
      runId,
      kind: result.kind,
      latencyMs: end - start,
      timestamp: end,
      attempts,
      payloadPath: payload.path,
      detail: describeResult(result),
    });
  }

  /** A single attempt, bounded by `config.timeoutMs`. Thrown errors count as network errors. */
  private async attempt(payload: PayloadDescriptor, config: LoadConfig): Promise<SendResult> {
    const controller = new AbortController();
    const timeout: SendResult = { kind: 'timeout', detail: `No response within ${config.timeoutMs}ms` };

    const sent = Promise.resolve()
      .then(() => this.client.send(config.target, payload, controller.signal))
      .catch((error: unknown): SendResult => ({ kind: 'network-error', detail: formatError(error) }));
    const timedOut = this.clock.sleep(config.timeoutMs, controller.signal).then(() => timeout);

    try {
      return await Promise.race([sent, timedOut]);
    } finally {
      // Clears the timeout timer and releases the client call if it is still pending
      controller.abort();
    }
  }
}

function describeResult(result: SendResult): string | undefined {
  switch (result.kind) {
    case 'success':
      return undefined;
    case 'network-error':
    case 'timeout':
      return result.detail;
    case 'protocol-rejected':
      return result.status !== undefined
        ? `${result.detail} (status 0x${result.status.toString(16).padStart(4, '0')})`
        : result.detail;
    default: {
      const unhandled: never = result;
      return String(unhandled);
    }
  }
}
