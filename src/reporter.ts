import chalk from 'chalk';
import { CheckResult, DicomTarget } from './types.js';
import { PreflightReport } from './runner.js';

export interface ReporterOptions {
  verbose?: boolean;
  json?: boolean;
  target?: DicomTarget;
  catalogRoot?: string;
}

const CHECK_ICON = chalk.green('✓');
const FAIL_ICON = chalk.red('✗');
const PENDING_ICON = chalk.yellow('○');

export function formatDuration(ms: number): string {
  if (ms < 1) return '<1ms';
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

function padRight(str: string, len: number): string {
  return str.padEnd(len);
}

export function formatTarget(target: DicomTarget): string {
  return `${target.calledAeTitle}@${target.host}:${target.port} (as ${target.callingAeTitle})`;
}

export function printHeader(options: ReporterOptions = {}): void {
  console.log(chalk.bold('\nDICOM Load Preflight'));
  if (options.target) {
    console.log(`${chalk.cyan('Target:')}   ${formatTarget(options.target)}`);
  }
  if (options.catalogRoot) {
    console.log(`${chalk.cyan('Dataset:')}  ${options.catalogRoot}`);
  }
  console.log(chalk.gray('═'.repeat(47)));
}

export function printCheckStart(name: string): void {
  process.stdout.write(`   ${PENDING_ICON} ${padRight(name, 22)}`);
}

export function printCheckResult(result: CheckResult, options: ReporterOptions = {}): void {
  // Clear the line and rewrite
  process.stdout.write('\r');

  const icon = result.success ? CHECK_ICON : FAIL_ICON;
  const duration = formatDuration(result.duration);
  const durationStr = result.duration > 0 ? chalk.gray(duration.padStart(8)) : chalk.gray('-'.padStart(8));

  console.log(`   ${icon} ${padRight(result.name, 22)}${durationStr}    ${result.message}`);

  if (result.details && options.verbose) {
    console.log(chalk.gray(`     └─ ${result.details}`));
  }

  if (!result.success && result.suggestion) {
    console.log(chalk.yellow(`     └─ Suggestion: ${result.suggestion}`));
  }
}

export function printSummary(result: PreflightReport): void {
  console.log(chalk.gray('═'.repeat(47)));

  const total = result.passed + result.failed;
  const passedStr = chalk.green(`${result.passed}/${total} checks passed`);
  const totalTime = formatDuration(result.totalDuration);

  console.log(`   ${passedStr}${' '.repeat(20)}Total: ${totalTime}`);
  if (result.skipped.length > 0) {
    console.log(chalk.gray(`   Skipped after a failure: ${result.skipped.join(', ')}`));
  }

  if (result.ready) {
    console.log(chalk.green.bold(`\n   Status: READY ✓\n`));
  } else {
    console.log(chalk.red.bold(`\n   Status: NOT READY ✗\n`));
  }
}

export function printJson(result: PreflightReport, options: ReporterOptions = {}): void {
  const output = {
    status: result.ready ? 'ready' : 'not_ready',
    ...(options.target && { target: options.target }),
    ...(options.catalogRoot && { dataset_root: options.catalogRoot }),
    checks: result.results.map(r => ({
      name: r.name,
      success: r.success,
      duration_ms: Math.round(r.duration),
      message: r.message,
      ...(r.details && { details: r.details }),
      ...(r.suggestion && { suggestion: r.suggestion }),
    })),
    summary: {
      total: result.passed + result.failed,
      passed: result.passed,
      failed: result.failed,
      skipped: result.skipped,
      duration_ms: Math.round(result.totalDuration),
    },
  };

  console.log(JSON.stringify(output, null, 2));
}

export class Reporter {
  private options: ReporterOptions;

  constructor(options: ReporterOptions = {}) {
    this.options = options;
  }

  start(): void {
    if (!this.options.json) {
      printHeader(this.options);
    }
  }

  onCheckStart(name: string): void {
    if (!this.options.json) {
      printCheckStart(name);
    }
  }

  onCheckComplete(result: CheckResult): void {
    if (!this.options.json) {
      printCheckResult(result, this.options);
    }
  }

  finish(result: PreflightReport): void {
    if (this.options.json) {
      printJson(result, this.options);
    } else {
      printSummary(result);
    }
  }
}
