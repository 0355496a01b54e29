import chalk from 'chalk';
import { formatDuration } from './reporter.js';
import { RunVerdict, ThresholdViolation } from './types.js';

export type OutputFormat = 'pretty' | 'json' | 'csv';

export interface VerdictReporterOptions {
  format: OutputFormat;
}

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['pretty', 'json', 'csv'];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value);
}

function formatLatency(ms: number | undefined): string {
  return ms === undefined ? 'n/a' : Math.round(ms).toString();
}

function formatPercent(fraction: number | undefined): string {
  return fraction === undefined ? 'n/a' : `${(fraction * 100).toFixed(1)}%`;
}

export function formatViolation(violation: ThresholdViolation): string {
  switch (violation.name) {
    case 'attempted':
      return 'no sends were attempted';
    case 'errorRate':
      return `error rate ${formatPercent(violation.actual)} > ${formatPercent(violation.limit)}`;
    case 'p95LatencyMs':
      return `p95 latency ${formatLatency(violation.actual)}ms > ${formatLatency(violation.limit)}ms`;
    default: {
      const unhandled: never = violation.name;
      return String(unhandled);
    }
  }
}

export function printVerdict(verdict: RunVerdict, options: VerdictReporterOptions = { format: 'pretty' }): void {
  switch (options.format) {
    case 'json':
      console.log(formatJson(verdict));
      break;
    case 'csv':
      console.log(formatCsv(verdict));
      break;
    default:
      printPretty(verdict);
  }
}

function printPretty(verdict: RunVerdict): void {
  const { snapshot } = verdict;
  const stats = snapshot.latency;
  const wallTime = verdict.finishedAt.getTime() - verdict.startedAt.getTime();

  console.log('');
  console.log(chalk.bold('DICOM C-STORE Load Test Results'));
  console.log(chalk.gray('══════════════════════════════════════'));
  console.log(`${chalk.cyan('Run:')}           ${verdict.runId}`);
  console.log(`${chalk.cyan('State:')}         ${verdict.state}`);
  console.log(`${chalk.cyan('Duration:')}      ${formatDuration(wallTime)}`);
  console.log('');

  console.log(chalk.bold('Sends:'));
  console.log(`  Attempted:    ${snapshot.attempted}`);
  console.log(`  Succeeded:    ${chalk.green(snapshot.succeeded)}`);
  console.log(`  Failed:       ${chalk.red(snapshot.failed)} (${formatPercent(snapshot.errorRate)})`);
  console.log('');

  if (stats) {
    console.log(chalk.bold('Latency (ms):'));
    console.log(`  Min:          ${formatLatency(stats.min)}`);
    console.log(`  Max:          ${formatLatency(stats.max)}`);
    console.log(`  Mean:         ${formatLatency(stats.mean)}`);
    console.log(`  p50:          ${formatLatency(stats.p50)}`);
    console.log(`  p95:          ${formatLatency(stats.p95)}`);
    console.log(`  p99:          ${formatLatency(stats.p99)}`);
    console.log('');
  } else {
    console.log(chalk.yellow('Latency: no successful sends'));
    console.log('');
  }

  const failures = Object.entries(snapshot.failuresByKind).filter(([, count]) => count > 0);
  if (failures.length > 0) {
    console.log(chalk.bold('Errors:'));
    for (const [kind, count] of failures) {
      console.log(`  ${chalk.red(kind)}:  ${count}`);
    }
    console.log('');
  }

  console.log(`${chalk.cyan('Throughput:')}   ${chalk.bold(snapshot.throughputPerSecond.toFixed(1))} stores/s`);
  console.log(chalk.gray('══════════════════════════════════════'));

  if (verdict.passed) {
    console.log(chalk.green.bold('\n   Verdict: PASS ✓\n'));
  } else {
    console.log(chalk.red.bold('\n   Verdict: FAIL ✗'));
    for (const violation of verdict.violatedThresholds) {
      console.log(chalk.red(`     └─ ${formatViolation(violation)}`));
    }
    console.log('');
  }
}

export function formatJson(verdict: RunVerdict): string {
  const { snapshot } = verdict;
  const stats = snapshot.latency;
  const output = {
    run_id: verdict.runId,
    state: verdict.state,
    passed: verdict.passed,
    started_at: verdict.startedAt.toISOString(),
    finished_at: verdict.finishedAt.toISOString(),
    sends: {
      attempted: snapshot.attempted,
      succeeded: snapshot.succeeded,
      failed: snapshot.failed,
      error_rate: snapshot.errorRate ?? null,
    },
    latency_ms: stats
      ? {
          min: stats.min,
          max: stats.max,
          mean: stats.mean,
          p50: stats.p50,
          p95: stats.p95,
          p99: stats.p99,
        }
      : null,
    errors: snapshot.failuresByKind,
    throughput_per_second: snapshot.throughputPerSecond,
    violated_thresholds: verdict.violatedThresholds,
  };

  return JSON.stringify(output, null, 2);
}

export const CSV_HEADER =
  'run_id,state,passed,attempted,succeeded,failed,error_rate,min_ms,max_ms,mean_ms,p50_ms,p95_ms,p99_ms,throughput_per_second,violations';

export function formatCsv(verdict: RunVerdict): string {
  const { snapshot } = verdict;
  const stats = snapshot.latency;
  const round = (value: number | undefined) => (value === undefined ? '' : Math.round(value).toString());

  const row = [
    verdict.runId,
    verdict.state,
    verdict.passed,
    snapshot.attempted,
    snapshot.succeeded,
    snapshot.failed,
    snapshot.errorRate === undefined ? '' : snapshot.errorRate.toFixed(4),
    round(stats?.min),
    round(stats?.max),
    round(stats?.mean),
    round(stats?.p50),
    round(stats?.p95),
    round(stats?.p99),
    snapshot.throughputPerSecond.toFixed(2),
    verdict.violatedThresholds.map(v => v.name).join(';'),
  ].join(',');

  return `${CSV_HEADER}\n${row}`;
}
