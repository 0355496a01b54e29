export interface DicomTarget {
  host: string;
  port: number;
  /** AE title of the server under test. */
  calledAeTitle: string;
  /** AE title this client presents. */
  callingAeTitle: string;
}

export interface PayloadDescriptor {
  readonly path: string;
  readonly sizeBytes: number;
  readonly modality?: string;
  readonly patientId?: string;
  readonly studyInstanceUid?: string;
  readonly sopClassUid?: string;
  readonly sopInstanceUid?: string;
  readonly transferSyntaxUid?: string;
}

export type SizeBucket = 'small' | 'medium' | 'large';

// Size buckets and modality codes (uppercase, e.g. "CT") share one key space.
export type PayloadCategory = SizeBucket | (string & {});

export type SendResult =
  | { kind: 'success'; status?: number }
  | { kind: 'network-error'; detail: string }
  | { kind: 'timeout'; detail: string }
  | { kind: 'protocol-rejected'; status?: number; detail: string };

export type SendResultKind = SendResult['kind'];

export type FailureKind = Exclude<SendResultKind, 'success'>;

export interface ProtocolClient {
  /** C-ECHO verification. Resolves false when the target is unreachable or refuses verification. */
  echo(target: DicomTarget): Promise<boolean>;
  /** One C-STORE of the payload over its own association. */
  send(target: DicomTarget, payload: PayloadDescriptor, signal?: AbortSignal): Promise<SendResult>;
}

export interface SendOutcome {
  readonly runId: string;
  readonly kind: SendResultKind;
  /** Wall time from the first attempt's start to the last attempt's end. */
  readonly latencyMs: number;
  /** Completion time on the run clock. */
  readonly timestamp: number;
  readonly attempts: number;
  readonly payloadPath: string;
  readonly detail?: string;
}

export interface LatencyStats {
  readonly samples: number;
  readonly min: number;
  readonly max: number;
  readonly mean: number;
  readonly p50: number;
  readonly p95: number;
  readonly p99: number;
}

export interface MetricsSnapshot {
  readonly runId: string;
  readonly attempted: number;
  readonly succeeded: number;
  readonly failed: number;
  /** Undefined when nothing was attempted. */
  readonly errorRate: number | undefined;
  /** Undefined when no send succeeded. */
  readonly latency: LatencyStats | undefined;
  readonly throughputPerSecond: number;
  readonly elapsedMs: number;
  readonly failuresByKind: Readonly<Record<FailureKind, number>>;
}

export interface LoadConfig {
  readonly target: DicomTarget;
  /** Sends per second. */
  readonly targetRate: number;
  readonly concurrency: number;
  readonly durationSeconds?: number;
  readonly totalCount?: number;
  readonly timeoutMs: number;
  readonly retryCount: number;
  readonly retryDelayMs: number;
  readonly maxErrorRate: number;
  readonly maxP95LatencyMs: number;
  readonly verifyConnectivity: boolean;
}

export type ThresholdName = 'attempted' | 'errorRate' | 'p95LatencyMs';

export interface ThresholdViolation {
  readonly name: ThresholdName;
  readonly limit: number;
  readonly actual: number;
}

export type DriverState = 'idle' | 'running' | 'completed' | 'cancelled' | 'failed';

export interface RunVerdict {
  readonly runId: string;
  readonly passed: boolean;
  readonly state: Extract<DriverState, 'completed' | 'cancelled'>;
  readonly snapshot: MetricsSnapshot;
  readonly violatedThresholds: readonly ThresholdViolation[];
  readonly startedAt: Date;
  readonly finishedAt: Date;
}

export interface Clock {
  now(): number;
  /** Resolves after `ms`, or early once `signal` aborts. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export interface CheckResult {
  name: string;
  success: boolean;
  duration: number;
  message: string;
  details?: string;
  suggestion?: string;
}

export interface CheckContext {
  client: ProtocolClient;
  target: DicomTarget;
  catalogRoot: string;
  timeout: number;
}

export type CheckFunction = (ctx: CheckContext) => Promise<CheckResult>;

export interface Check {
  name: string;
  description: string;
  run: CheckFunction;
  quick?: boolean;
}
