/**
 * Unit Tests: Dispatcher workers, retry policy, timeouts and cancellation.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createGate, Dispatcher, RETRY_POLICY, totalSendsFor } from '../../src/dispatcher.js';
import { ConfigError } from '../../src/errors.js';
import { MetricsCollector } from '../../src/metrics.js';
import { DicomTarget, LoadConfig, PayloadDescriptor, SendOutcome, SendResult } from '../../src/types.js';
import { fakeTimerClock } from '../helpers/clock.js';
import { FakeClientOptions, FakeProtocolClient, scripted, SUCCESS } from '../helpers/fake-client.js';
import { testConfig, testPayloads } from '../helpers/fixtures.js';

const RUN_ID = 'run-dispatch';

async function dispatch(
  clientOptions: FakeClientOptions,
  config: Partial<LoadConfig>,
  payloadCount = 1,
): Promise<{ client: FakeProtocolClient; outcomes: SendOutcome[]; collector: MetricsCollector }> {
  const client = new FakeProtocolClient(clientOptions);
  const collector = new MetricsCollector(RUN_ID);
  const outcomes: SendOutcome[] = [];
  const dispatcher = new Dispatcher({ client, clock: fakeTimerClock });

  const run = dispatcher.run(testPayloads(payloadCount), testConfig(config), collector, {
    onOutcome: outcome => outcomes.push(outcome),
  });
  await vi.runAllTimersAsync();
  await run;
  return { client, outcomes, collector };
}

describe('totalSendsFor', () => {
  it('uses totalCount when set', () => {
    expect(totalSendsFor({ targetRate: 10, totalCount: 7 })).toBe(7);
  });

  it('rounds rate times duration up', () => {
    expect(totalSendsFor({ targetRate: 10, durationSeconds: 2.05 })).toBe(21);
  });

  it('needs a stop condition', () => {
    expect(() => totalSendsFor({ targetRate: 10 })).toThrow(ConfigError);
  });
});

describe('createGate', () => {
  it('limits a duration run to rate times duration', () => {
    const gate = createGate(testConfig({ totalCount: undefined, durationSeconds: 2, targetRate: 10 }), fakeTimerClock);
    expect(gate.limit).toBe(20);
    expect(gate.intervalMs).toBe(100);
  });
});

describe('RETRY_POLICY', () => {
  it('retries only transport failures', () => {
    expect(RETRY_POLICY).toEqual({
      success: false,
      'network-error': true,
      timeout: true,
      'protocol-rejected': false,
    });
  });
});

describe('Dispatcher', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('records one outcome per admitted send, cycling through payloads', async () => {
    const { client, outcomes, collector } = await dispatch(
      { latencyMs: 10 },
      { totalCount: 5, targetRate: 1000, concurrency: 2 },
      3,
    );

    expect(client.sentPaths).toEqual([
      '/data/img-0.dcm',
      '/data/img-1.dcm',
      '/data/img-2.dcm',
      '/data/img-0.dcm',
      '/data/img-1.dcm',
    ]);
    expect(outcomes).toHaveLength(5);
    expect(collector.size).toBe(5);
    expect(outcomes.every(o => o.kind === 'success' && o.attempts === 1 && o.latencyMs === 10)).toBe(true);
  });

  it('never runs more sends at once than the concurrency', async () => {
    const { client } = await dispatch({ latencyMs: 100 }, { totalCount: 9, targetRate: 1000, concurrency: 3 });

    expect(client.calls).toBe(9);
    expect(client.maxInFlight).toBe(3);
  });

  it('retries network errors and records one outcome with cumulative latency', async () => {
    const networkError = { kind: 'network-error', detail: 'connection reset' } as const;
    const { client, outcomes } = await dispatch(
      { latencyMs: 10, respond: scripted(networkError, networkError, SUCCESS) },
      { retryCount: 2, retryDelayMs: 5 },
    );

    expect(client.calls).toBe(3);
    expect(outcomes).toEqual([
      {
        runId: RUN_ID,
        kind: 'success',
        latencyMs: 40,
        timestamp: 40,
        attempts: 3,
        payloadPath: '/data/img-0.dcm',
        detail: undefined,
      },
    ]);
  });

  it('records the last failure once retries run out', async () => {
    const { outcomes } = await dispatch(
      { latencyMs: 10, respond: () => ({ kind: 'network-error', detail: 'connection refused' }) },
      { retryCount: 1 },
    );

    expect(outcomes).toHaveLength(1);
    expect(outcomes[0].kind).toBe('network-error');
    expect(outcomes[0].attempts).toBe(2);
    expect(outcomes[0].detail).toBe('connection refused');
  });

  it('treats a thrown error as a network error', async () => {
    const { outcomes } = await dispatch({ respond: () => new Error('ECONNRESET') }, {});

    expect(outcomes[0].kind).toBe('network-error');
    expect(outcomes[0].detail).toBe('ECONNRESET');
  });

  it('records a synchronous throw from the client and keeps the run going', async () => {
    class UnreadableFileClient extends FakeProtocolClient {
      send(target: DicomTarget, payload: PayloadDescriptor, signal?: AbortSignal): Promise<SendResult> {
        if (payload.path === '/data/img-1.dcm') {
          throw new Error('Cannot parse file');
        }
        return super.send(target, payload, signal);
      }
    }
    const client = new UnreadableFileClient();
    const collector = new MetricsCollector(RUN_ID);
    const outcomes: SendOutcome[] = [];
    const dispatcher = new Dispatcher({ client, clock: fakeTimerClock });

    const run = dispatcher.run(testPayloads(3), testConfig({ totalCount: 6, targetRate: 1000 }), collector, {
      onOutcome: outcome => outcomes.push(outcome),
    });
    await vi.runAllTimersAsync();
    await run;

    expect(outcomes.map(o => o.kind)).toEqual([
      'success',
      'network-error',
      'success',
      'success',
      'network-error',
      'success',
    ]);
    expect(outcomes[1].detail).toBe('Cannot parse file');
    expect(client.calls).toBe(4);
    expect(collector.snapshot().attempted).toBe(6);
    expect(collector.snapshot().failuresByKind['network-error']).toBe(2);
  });

  it('never retries a protocol rejection', async () => {
    const { client, outcomes } = await dispatch(
      { respond: () => ({ kind: 'protocol-rejected', status: 0xa700, detail: 'Refused: out of resources' }) },
      { retryCount: 3 },
    );

    expect(client.calls).toBe(1);
    expect(outcomes[0].kind).toBe('protocol-rejected');
    expect(outcomes[0].attempts).toBe(1);
    expect(outcomes[0].detail).toBe('Refused: out of resources (status 0xa700)');
  });

  it('times out slow attempts and retries them', async () => {
    const { client, outcomes } = await dispatch({ latencyMs: 500 }, { timeoutMs: 100, retryCount: 1 });

    expect(client.calls).toBe(2);
    expect(outcomes[0].kind).toBe('timeout');
    expect(outcomes[0].attempts).toBe(2);
    expect(outcomes[0].latencyMs).toBe(200);
    expect(outcomes[0].detail).toBe('No response within 100ms');
  });

  it('rejects an empty payload list', async () => {
    const dispatcher = new Dispatcher({ client: new FakeProtocolClient(), clock: fakeTimerClock });
    await expect(
      dispatcher.run([], testConfig(), new MetricsCollector(RUN_ID)),
    ).rejects.toThrow('Dispatcher needs at least one payload');
  });

  it('stops admitting on cancel and records sends already in flight', async () => {
    const client = new FakeProtocolClient({ latencyMs: 10 });
    const collector = new MetricsCollector(RUN_ID);
    const controller = new AbortController();
    const dispatcher = new Dispatcher({ client, clock: fakeTimerClock });

    const run = dispatcher.run(
      testPayloads(1),
      testConfig({ totalCount: 100, targetRate: 10, concurrency: 2 }),
      collector,
      { signal: controller.signal },
    );
    // Sends start at 0, 100 and 200; the third is still in flight at 205
    await vi.advanceTimersByTimeAsync(205);
    controller.abort();
    await vi.runAllTimersAsync();
    await run;

    expect(client.calls).toBe(3);
    expect(collector.size).toBe(3);
    expect(collector.snapshot().succeeded).toBe(3);
  });

  it('stops retrying once cancelled during the retry delay', async () => {
    const client = new FakeProtocolClient({
      latencyMs: 10,
      respond: () => ({ kind: 'network-error', detail: 'connection refused' }),
    });
    const outcomes: SendOutcome[] = [];
    const controller = new AbortController();
    const dispatcher = new Dispatcher({ client, clock: fakeTimerClock });

    const run = dispatcher.run(
      testPayloads(1),
      testConfig({ retryCount: 3, retryDelayMs: 100 }),
      new MetricsCollector(RUN_ID),
      { signal: controller.signal, onOutcome: outcome => outcomes.push(outcome) },
    );
    // First attempt fails at 10, the retry delay runs until 110
    await vi.advanceTimersByTimeAsync(50);
    controller.abort();
    await vi.runAllTimersAsync();
    await run;

    expect(client.calls).toBe(1);
    expect(outcomes).toHaveLength(1);
    expect(outcomes[0].kind).toBe('network-error');
    expect(outcomes[0].attempts).toBe(1);
    expect(outcomes[0].latencyMs).toBe(50);
  });
});
