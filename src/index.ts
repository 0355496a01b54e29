export * from './types.js';
export * from './errors.js';
export { createLogger, resolveLogLevel, silentLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export { sleep, systemClock } from './clock.js';
export {
  DatasetCatalog,
  DEFAULT_EXTENSIONS,
  DEFAULT_HEADER_BYTES,
  DEFAULT_SIZE_THRESHOLDS,
  seededRandom,
  sizeBucketOf,
} from './catalog.js';
export type { DatasetCatalogOptions, SizeThresholds } from './catalog.js';
export { hasDicomMagic, parseDicomHeader, readDicomHeader } from './dicom-header.js';
export type { DicomHeader } from './dicom-header.js';
export { calculateLatencyStats, MetricsCollector, percentile } from './metrics.js';
export { PacingGate } from './pacing.js';
export { createGate, Dispatcher, RETRY_POLICY, totalSendsFor } from './dispatcher.js';
export type { DispatcherOptions, DispatchOptions } from './dispatcher.js';
export {
  DEFAULTS,
  loadCatalogEnvOptions,
  loadCatalogOptions,
  loadEnvOptions,
  parseCatalogOptions,
  parseLoadConfig,
  parseTarget,
  validateLoadConfig,
} from './config.js';
export type { CatalogEnvOptions, LoadOptions } from './config.js';
export { evaluateThresholds, LoadDriver } from './driver.js';
export type { ExecuteOptions, LoadDriverOptions, PayloadSource } from './driver.js';
export { classifyStoreStatus, describeStatus, DimseProtocolClient, STATUS_SUCCESS } from './dicom-client.js';
export { runPreflight } from './runner.js';
export type { PreflightOptions, PreflightReport } from './runner.js';
export { formatCsv, formatJson, formatViolation, printVerdict } from './verdict-reporter.js';
export type { OutputFormat } from './verdict-reporter.js';
