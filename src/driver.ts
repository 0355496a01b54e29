import { randomUUID } from 'node:crypto';
import { DatasetCatalog } from './catalog.js';
import { systemClock } from './clock.js';
import { validateLoadConfig } from './config.js';
import { createGate, Dispatcher, totalSendsFor } from './dispatcher.js';
import { ConnectivityError, InsufficientDataError } from './errors.js';
import { Logger, silentLogger } from './logger.js';
import { MetricsCollector } from './metrics.js';
import {
  Clock,
  DriverState,
  LoadConfig,
  MetricsSnapshot,
  PayloadDescriptor,
  ProtocolClient,
  RunVerdict,
  ThresholdViolation,
} from './types.js';

export interface LoadDriverOptions {
  client: ProtocolClient;
  clock?: Clock;
  logger?: Logger;
  runId?: string;
  /** Log a progress line every this many recorded outcomes. */
  progressEvery?: number;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
}

/** Payload supply the driver pulls from. DatasetCatalog is the usual one. */
export type PayloadSource = Pick<DatasetCatalog, 'selectPayloads'>;

export function evaluateThresholds(
  snapshot: MetricsSnapshot,
  config: Pick<LoadConfig, 'maxErrorRate' | 'maxP95LatencyMs'>,
): ThresholdViolation[] {
  const violations: ThresholdViolation[] = [];

  if (snapshot.attempted === 0) {
    violations.push({ name: 'attempted', limit: 1, actual: 0 });
  }
  if (snapshot.errorRate !== undefined && snapshot.errorRate > config.maxErrorRate) {
    violations.push({ name: 'errorRate', limit: config.maxErrorRate, actual: snapshot.errorRate });
  }
  if (snapshot.latency !== undefined && snapshot.latency.p95 > config.maxP95LatencyMs) {
    violations.push({ name: 'p95LatencyMs', limit: config.maxP95LatencyMs, actual: snapshot.latency.p95 });
  }

  return violations;
}

/**
 * Top-level orchestrator for one load run.
 *
 * Idle -> Running -> Completed | Cancelled | Failed. Only setup problems
 * (configuration, catalog, unreachable target) move it to Failed; individual
 * send failures are metrics and only show up in the verdict.
 */
export class LoadDriver {
  readonly runId: string;
  private readonly client: ProtocolClient;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly progressEvery: number;
  private currentState: DriverState = 'idle';
  private collector?: MetricsCollector;

  constructor(options: LoadDriverOptions) {
    this.client = options.client;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
    this.runId = options.runId ?? randomUUID();
    this.progressEvery = options.progressEvery ?? 100;
  }

  get state(): DriverState {
    return this.currentState;
  }

  /** Mid-run view of the metrics. Undefined before the run starts sending. */
  snapshot(): MetricsSnapshot | undefined {
    return this.collector?.snapshot();
  }

  async execute(config: LoadConfig, catalog: PayloadSource, options: ExecuteOptions = {}): Promise<RunVerdict> {
    if (this.currentState !== 'idle') {
      throw new Error(`LoadDriver for run ${this.runId} has already been executed`);
    }
    this.currentState = 'running';
    const startedAt = new Date();

    let payloads: PayloadDescriptor[];
    let totalSends: number;
    try {
      validateLoadConfig(config);
      totalSends = totalSendsFor(config);
      payloads = await catalog.selectPayloads();
      if (payloads.length === 0) {
        throw new InsufficientDataError(1, 0, 'The payload selection is empty');
      }
      if (config.verifyConnectivity && !(await this.client.echo(config.target))) {
        throw new ConnectivityError(config.target);
      }
    } catch (error) {
      this.currentState = 'failed';
      throw error;
    }

    const { target } = config;
    this.logger.info(
      `Run ${this.runId}: ${totalSends} sends @ ${config.targetRate}/s with ${config.concurrency} workers ` +
        `to ${target.calledAeTitle}@${target.host}:${target.port} (${payloads.length} payloads)`,
    );

    const collector = new MetricsCollector(this.runId);
    this.collector = collector;
    const dispatcher = new Dispatcher({ client: this.client, clock: this.clock, logger: this.logger });

    await dispatcher.run(payloads, config, collector, {
      gate: createGate(config, this.clock),
      signal: options.signal,
      onOutcome: () => {
        if (collector.size % this.progressEvery === 0) {
          this.logger.info(`Progress: ${collector.size}/${totalSends}`);
        }
      },
    });

    const snapshot = collector.snapshot();
    const violatedThresholds = evaluateThresholds(snapshot, config);
    const state = options.signal?.aborted ? 'cancelled' : 'completed';
    this.currentState = state;

    const verdict: RunVerdict = Object.freeze({
      runId: this.runId,
      passed: violatedThresholds.length === 0,
      state,
      snapshot,
      violatedThresholds: Object.freeze(violatedThresholds),
      startedAt,
      finishedAt: new Date(),
    });

    if (verdict.passed) {
      this.logger.info(`Run ${this.runId} ${state}: passed`);
    } else {
      this.logger.warn(
        `Run ${this.runId} ${state}: failed (${violatedThresholds.map(v => v.name).join(', ')})`,
      );
    }
    return verdict;
  }
}
