import { config } from 'dotenv';
import { ConfigError } from './errors.js';
import { DicomTarget, LoadConfig } from './types.js';

config();

/** Named run options, as strings (environment, CLI) or already-typed values. */
export type LoadOptions = Record<string, unknown>;

export const DEFAULTS = {
  localIdentity: 'PERF_SENDER',
  timeoutMs: 30000,
  retryCount: 0,
  retryDelayMs: 0,
  maxErrorRate: 0.02,
  maxP95LatencyMs: 2000,
  loadMultiplier: 1,
  verifyConnectivity: true,
} as const;

const MAX_AE_TITLE_LENGTH = 16;

const ENV_KEYS: Record<string, string> = {
  targetHost: 'DICOM_TARGET_HOST',
  targetPort: 'DICOM_TARGET_PORT',
  targetIdentity: 'DICOM_TARGET_AE_TITLE',
  localIdentity: 'DICOM_LOCAL_AE_TITLE',
  targetRate: 'TARGET_RATE',
  peakRate: 'PEAK_IMAGES_PER_SECOND',
  loadMultiplier: 'LOAD_MULTIPLIER',
  concurrency: 'LOAD_CONCURRENCY',
  durationSeconds: 'TEST_DURATION_SECONDS',
  totalCount: 'TOTAL_COUNT',
  timeoutMs: 'SEND_TIMEOUT_MS',
  retryCount: 'RETRY_COUNT',
  retryDelayMs: 'RETRY_DELAY_MS',
  maxErrorRate: 'MAX_ERROR_RATE',
  maxP95LatencyMs: 'MAX_P95_LATENCY_MS',
  verifyConnectivity: 'VERIFY_CONNECTIVITY',
};

const CATALOG_ENV_KEYS: Record<string, string> = {
  root: 'DICOM_ROOT_DIR',
  sampleSize: 'SAMPLE_SIZE',
  seed: 'SAMPLE_SEED',
  category: 'PAYLOAD_CATEGORY',
};

const DEFAULT_CATALOG_ROOT = './dicom_samples';

function readEnv(env: NodeJS.ProcessEnv, keys: Record<string, string>): LoadOptions {
  const options: LoadOptions = {};
  for (const [key, envKey] of Object.entries(keys)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      options[key] = value;
    }
  }
  return options;
}

export function loadEnvOptions(env: NodeJS.ProcessEnv = process.env): LoadOptions {
  return readEnv(env, ENV_KEYS);
}

/** Raw catalog options from the environment, for layering CLI flags over. */
export function loadCatalogEnvOptions(env: NodeJS.ProcessEnv = process.env): LoadOptions {
  return readEnv(env, CATALOG_ENV_KEYS);
}

export interface CatalogEnvOptions {
  root: string;
  sampleSize?: number;
  seed?: number;
  category?: string;
}

export function parseCatalogOptions(options: LoadOptions): CatalogEnvOptions {
  return {
    root: optionalString(options, 'root') ?? DEFAULT_CATALOG_ROOT,
    sampleSize: optionalNumber(options, 'sampleSize'),
    seed: optionalNumber(options, 'seed'),
    category: optionalString(options, 'category'),
  };
}

export function loadCatalogOptions(env: NodeJS.ProcessEnv = process.env): CatalogEnvOptions {
  return parseCatalogOptions(loadCatalogEnvOptions(env));
}

function readValue(options: LoadOptions, key: string): unknown {
  const value = options[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string' && value.trim() === '') return undefined;
  return value;
}

function missing(key: string): ConfigError {
  return new ConfigError(`Missing required option: ${key}`, key);
}

function requiredString(options: LoadOptions, key: string): string {
  const value = readValue(options, key);
  if (value === undefined) throw missing(key);
  if (typeof value !== 'string') {
    throw new ConfigError(`${key} must be a string`, key);
  }
  return value.trim();
}

function optionalString(options: LoadOptions, key: string): string | undefined {
  return readValue(options, key) === undefined ? undefined : requiredString(options, key);
}

function optionalNumber(options: LoadOptions, key: string): number | undefined {
  const value = readValue(options, key);
  if (value === undefined) return undefined;
  const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number(value.trim()) : NaN;
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`${key} must be a number, got "${String(value)}"`, key);
  }
  return parsed;
}

function requiredNumber(options: LoadOptions, key: string): number {
  const value = optionalNumber(options, key);
  if (value === undefined) throw missing(key);
  return value;
}

function optionalBoolean(options: LoadOptions, key: string): boolean | undefined {
  const value = readValue(options, key);
  if (value === undefined) return undefined;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true' || normalized === '1') return true;
    if (normalized === 'false' || normalized === '0') return false;
  }
  throw new ConfigError(`${key} must be true or false, got "${String(value)}"`, key);
}

/** The target half of the options: host, port and both AE titles. */
export function parseTarget(options: LoadOptions): DicomTarget {
  const target: DicomTarget = {
    host: requiredString(options, 'targetHost'),
    port: requiredNumber(options, 'targetPort'),
    calledAeTitle: requiredString(options, 'targetIdentity'),
    callingAeTitle: optionalString(options, 'localIdentity') ?? DEFAULTS.localIdentity,
  };
  validateTarget(target);
  return target;
}

/**
 * Builds a LoadConfig from named options. Unknown keys are ignored; a missing
 * required key fails with a ConfigError naming it.
 */
export function parseLoadConfig(options: LoadOptions): LoadConfig {
  const target = parseTarget(options);

  let targetRate = optionalNumber(options, 'targetRate');
  if (targetRate === undefined) {
    const peakRate = optionalNumber(options, 'peakRate');
    if (peakRate === undefined) throw missing('targetRate');
    targetRate = peakRate * (optionalNumber(options, 'loadMultiplier') ?? DEFAULTS.loadMultiplier);
  }

  const concurrency = requiredNumber(options, 'concurrency');
  const durationSeconds = optionalNumber(options, 'durationSeconds');
  const totalCount = optionalNumber(options, 'totalCount');

  const loadConfig: LoadConfig = {
    target,
    targetRate,
    concurrency,
    durationSeconds,
    totalCount,
    timeoutMs: optionalNumber(options, 'timeoutMs') ?? DEFAULTS.timeoutMs,
    retryCount: optionalNumber(options, 'retryCount') ?? DEFAULTS.retryCount,
    retryDelayMs: optionalNumber(options, 'retryDelayMs') ?? DEFAULTS.retryDelayMs,
    maxErrorRate: optionalNumber(options, 'maxErrorRate') ?? DEFAULTS.maxErrorRate,
    maxP95LatencyMs: optionalNumber(options, 'maxP95LatencyMs') ?? DEFAULTS.maxP95LatencyMs,
    verifyConnectivity: optionalBoolean(options, 'verifyConnectivity') ?? DEFAULTS.verifyConnectivity,
  };

  validateLoadConfig(loadConfig);
  return Object.freeze(loadConfig);
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

function validateTarget(target: DicomTarget): void {
  if (target.host.length === 0) throw missing('targetHost');
  if (!isPositiveInteger(target.port) || target.port > 65535) {
    throw new ConfigError(`targetPort must be an integer between 1 and 65535, got ${target.port}`, 'targetPort');
  }
  for (const [key, title] of [['targetIdentity', target.calledAeTitle], ['localIdentity', target.callingAeTitle]] as const) {
    if (title.length === 0 || title.length > MAX_AE_TITLE_LENGTH) {
      throw new ConfigError(`${key} must be 1-${MAX_AE_TITLE_LENGTH} characters, got "${title}"`, key);
    }
  }
}

/** Throws a ConfigError for the first invalid field. */
export function validateLoadConfig(loadConfig: LoadConfig): void {
  validateTarget(loadConfig.target);

  if (!(loadConfig.targetRate > 0)) {
    throw new ConfigError(`targetRate must be positive, got ${loadConfig.targetRate}`, 'targetRate');
  }
  if (!isPositiveInteger(loadConfig.concurrency)) {
    throw new ConfigError(`concurrency must be a positive integer, got ${loadConfig.concurrency}`, 'concurrency');
  }

  const { durationSeconds, totalCount } = loadConfig;
  if (durationSeconds === undefined && totalCount === undefined) {
    throw new ConfigError('Missing required option: durationSeconds or totalCount', 'durationSeconds');
  }
  if (durationSeconds !== undefined && totalCount !== undefined) {
    throw new ConfigError('durationSeconds and totalCount are mutually exclusive', 'totalCount');
  }
  if (durationSeconds !== undefined && !(durationSeconds > 0)) {
    throw new ConfigError(`durationSeconds must be positive, got ${durationSeconds}`, 'durationSeconds');
  }
  if (totalCount !== undefined && !isPositiveInteger(totalCount)) {
    throw new ConfigError(`totalCount must be a positive integer, got ${totalCount}`, 'totalCount');
  }

  if (!(loadConfig.timeoutMs > 0)) {
    throw new ConfigError(`timeoutMs must be positive, got ${loadConfig.timeoutMs}`, 'timeoutMs');
  }
  if (!Number.isInteger(loadConfig.retryCount) || loadConfig.retryCount < 0) {
    throw new ConfigError(`retryCount must be a non-negative integer, got ${loadConfig.retryCount}`, 'retryCount');
  }
  if (!(loadConfig.retryDelayMs >= 0)) {
    throw new ConfigError(`retryDelayMs must not be negative, got ${loadConfig.retryDelayMs}`, 'retryDelayMs');
  }
  if (!(loadConfig.maxErrorRate >= 0 && loadConfig.maxErrorRate <= 1)) {
    throw new ConfigError(`maxErrorRate must be a fraction between 0 and 1, got ${loadConfig.maxErrorRate}`, 'maxErrorRate');
  }
  if (!(loadConfig.maxP95LatencyMs > 0)) {
    throw new ConfigError(`maxP95LatencyMs must be positive, got ${loadConfig.maxP95LatencyMs}`, 'maxP95LatencyMs');
  }
}
