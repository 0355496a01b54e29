import { systemClock } from './clock.js';
import { formatError } from './errors.js';
import { Check, CheckContext, CheckResult, Clock } from './types.js';

export interface PreflightOptions {
  checks: Check[];
  context: CheckContext;
  clock?: Clock;
  /** Stop at the first failing check and list the rest as skipped. */
  failFast?: boolean;
  onCheckStart?: (check: Check) => void;
  onCheckComplete?: (check: Check, result: CheckResult) => void;
}

export interface PreflightReport {
  results: CheckResult[];
  /** Names of checks not run because an earlier one failed. */
  skipped: string[];
  totalDuration: number;
  passed: number;
  failed: number;
  /** A load run may start: nothing failed and nothing was skipped. */
  ready: boolean;
}

/** Runs one check, bounded by `context.timeout`. A throw or a timeout fails it. */
async function runCheck(check: Check, context: CheckContext, clock: Clock): Promise<CheckResult> {
  const start = clock.now();
  const controller = new AbortController();

  const timedOut = clock.sleep(context.timeout, controller.signal).then(
    (): CheckResult => ({
      name: check.name,
      success: false,
      duration: clock.now() - start,
      message: `${check.name} check timed out after ${context.timeout}ms`,
      suggestion: 'Raise --timeout or check the target and dataset root are reachable',
    }),
  );
  const ran = Promise.resolve()
    .then(() => check.run(context))
    .catch(
      (error: unknown): CheckResult => ({
        name: check.name,
        success: false,
        duration: clock.now() - start,
        message: formatError(error) || 'Unknown error',
        details: `${check.name} check threw an exception`,
      }),
    );

  try {
    return await Promise.race([ran, timedOut]);
  } finally {
    controller.abort();
  }
}

export async function runPreflight(options: PreflightOptions): Promise<PreflightReport> {
  const { checks, context, failFast = false, onCheckStart, onCheckComplete } = options;
  const clock = options.clock ?? systemClock;
  const results: CheckResult[] = [];
  const skipped: string[] = [];
  const startTime = clock.now();

  for (const check of checks) {
    if (failFast && results.some(r => !r.success)) {
      skipped.push(check.name);
      continue;
    }
    onCheckStart?.(check);
    const result = await runCheck(check, context, clock);
    results.push(result);
    onCheckComplete?.(check, result);
  }

  const passed = results.filter(r => r.success).length;
  const failed = results.length - passed;

  return {
    results,
    skipped,
    totalDuration: clock.now() - startTime,
    passed,
    failed,
    ready: failed === 0 && skipped.length === 0,
  };
}
