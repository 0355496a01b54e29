#!/usr/bin/env node

import { Command } from 'commander';
import { config } from 'dotenv';
import chalk from 'chalk';
import { DatasetCatalog } from './catalog.js';
import { allChecks, quickChecks, getChecksByName } from './checks/index.js';
import {
  loadCatalogEnvOptions,
  loadEnvOptions,
  LoadOptions,
  parseCatalogOptions,
  parseLoadConfig,
  parseTarget,
} from './config.js';
import { DimseProtocolClient } from './dicom-client.js';
import { LoadDriver } from './driver.js';
import { formatError, LoadTestError } from './errors.js';
import { createLogger } from './logger.js';
import { Reporter } from './reporter.js';
import { runPreflight } from './runner.js';
import { CheckContext } from './types.js';
import { isOutputFormat, OUTPUT_FORMATS, printVerdict } from './verdict-reporter.js';

// Load environment variables
config();

interface TargetFlags {
  host?: string;
  port?: string;
  calledAet?: string;
  callingAet?: string;
}

interface RunFlags extends TargetFlags {
  rate?: string;
  peakRate?: string;
  multiplier?: string;
  concurrency?: string;
  duration?: string;
  total?: string;
  timeout?: string;
  retries?: string;
  retryDelay?: string;
  maxErrorRate?: string;
  maxP95?: string;
  root?: string;
  category?: string;
  sample?: string;
  seed?: string;
  echo: boolean;
  output: string;
}

interface CheckFlags extends TargetFlags {
  only?: string;
  quick?: boolean;
  verbose?: boolean;
  json?: boolean;
  failFast?: boolean;
  root?: string;
  timeout?: string;
}

const EXIT_PASS = 0;
const EXIT_FAIL = 1;
const EXIT_SETUP = 2;

function withTargetOptions(command: Command): Command {
  return command
    .option('--host <host>', 'Target host (DICOM_TARGET_HOST)')
    .option('--port <port>', 'Target port (DICOM_TARGET_PORT)')
    .option('--called-aet <title>', 'Target AE title (DICOM_TARGET_AE_TITLE)')
    .option('--calling-aet <title>', 'Local AE title (DICOM_LOCAL_AE_TITLE)');
}

/** CLI flags win over the environment; only flags that were given are copied. */
function mergeOptions(base: LoadOptions, flags: LoadOptions): LoadOptions {
  const merged: LoadOptions = { ...base };
  for (const [key, value] of Object.entries(flags)) {
    if (value !== undefined) merged[key] = value;
  }
  // A stop mode chosen on the command line replaces the one from the environment.
  if (flags.durationSeconds !== undefined && flags.totalCount === undefined) delete merged.totalCount;
  if (flags.totalCount !== undefined && flags.durationSeconds === undefined) delete merged.durationSeconds;
  return merged;
}

function targetFlags(flags: TargetFlags): LoadOptions {
  return {
    targetHost: flags.host,
    targetPort: flags.port,
    targetIdentity: flags.calledAet,
    localIdentity: flags.callingAet,
  };
}

function exitWithError(error: unknown): never {
  const label = error instanceof LoadTestError ? error.name : 'Error';
  console.error(chalk.red(`${label}: ${formatError(error)}`));
  process.exit(EXIT_SETUP);
}

const program = new Command();

program
  .name('dicom-load')
  .description('Drives paced C-STORE load at a DICOM node and checks the result against thresholds')
  .version('1.0.0');

withTargetOptions(program.command('run'))
  .description('Run a load test against the target')
  .option('-r, --rate <number>', 'Target sends per second (TARGET_RATE)')
  .option('--peak-rate <number>', 'Peak images per second, scaled by --multiplier (PEAK_IMAGES_PER_SECOND)')
  .option('--multiplier <number>', 'Load multiplier applied to the peak rate (LOAD_MULTIPLIER)')
  .option('-c, --concurrency <number>', 'Concurrent workers (LOAD_CONCURRENCY)')
  .option('-d, --duration <seconds>', 'Run for this many seconds (TEST_DURATION_SECONDS)')
  .option('-t, --total <number>', 'Run this many sends (TOTAL_COUNT)')
  .option('--timeout <ms>', 'Per-attempt timeout (SEND_TIMEOUT_MS)')
  .option('--retries <number>', 'Retries after a network error or timeout (RETRY_COUNT)')
  .option('--retry-delay <ms>', 'Delay between retries (RETRY_DELAY_MS)')
  .option('--max-error-rate <fraction>', 'Highest passing error rate (MAX_ERROR_RATE)')
  .option('--max-p95 <ms>', 'Highest passing p95 latency (MAX_P95_LATENCY_MS)')
  .option('--root <dir>', 'Dataset root (DICOM_ROOT_DIR)')
  .option('--category <name>', 'Only send payloads of this size bucket or modality (PAYLOAD_CATEGORY)')
  .option('--sample <number>', 'Sample this many payloads (SAMPLE_SIZE)')
  .option('--seed <number>', 'Sampling seed (SAMPLE_SEED)')
  .option('--no-echo', 'Skip the C-ECHO preflight')
  .option('-o, --output <format>', `Output format: ${OUTPUT_FORMATS.join(', ')}`, 'pretty')
  .action(async (flags: RunFlags) => {
    const format = flags.output;
    if (!isOutputFormat(format)) {
      console.error(`Unknown output format: ${format}`);
      process.exit(EXIT_SETUP);
    }

    const logger = createLogger('run');
    const controller = new AbortController();
    const onInterrupt = () => {
      if (controller.signal.aborted) {
        process.exit(130);
      }
      logger.warn('Interrupted, finishing in-flight sends (press Ctrl+C again to exit)');
      controller.abort();
    };
    process.on('SIGINT', onInterrupt);

    try {
      const loadConfig = parseLoadConfig(
        mergeOptions(loadEnvOptions(), {
          ...targetFlags(flags),
          targetRate: flags.rate,
          peakRate: flags.peakRate,
          loadMultiplier: flags.multiplier,
          concurrency: flags.concurrency,
          durationSeconds: flags.duration,
          totalCount: flags.total,
          timeoutMs: flags.timeout,
          retryCount: flags.retries,
          retryDelayMs: flags.retryDelay,
          maxErrorRate: flags.maxErrorRate,
          maxP95LatencyMs: flags.maxP95,
          verifyConnectivity: flags.echo ? undefined : false,
        }),
      );

      const catalog = new DatasetCatalog({
        ...parseCatalogOptions(
          mergeOptions(loadCatalogEnvOptions(), {
            root: flags.root,
            category: flags.category,
            sampleSize: flags.sample,
            seed: flags.seed,
          }),
        ),
        logger: createLogger('catalog'),
      });

      const driver = new LoadDriver({
        client: new DimseProtocolClient({ logger: createLogger('dimse') }),
        logger,
      });

      const verdict = await driver.execute(loadConfig, catalog, { signal: controller.signal });
      printVerdict(verdict, { format });
      process.exit(verdict.passed ? EXIT_PASS : EXIT_FAIL);
    } catch (error) {
      exitWithError(error);
    } finally {
      process.off('SIGINT', onInterrupt);
    }
  });

withTargetOptions(program.command('check'))
  .description('Run preflight checks against the dataset and the target')
  .option('--only <checks>', 'Run specific checks (comma-separated)')
  .option('--quick', 'Run only quick checks')
  .option('--verbose', 'Show check details')
  .option('--json', 'Output results as JSON')
  .option('--fail-fast', 'Skip the remaining checks after the first failure')
  .option('--root <dir>', 'Dataset root (DICOM_ROOT_DIR)')
  .option('--timeout <ms>', 'Per-check timeout', '30000')
  .action(async (flags: CheckFlags) => {
    try {
      let checksToRun = allChecks;

      if (flags.quick) {
        checksToRun = quickChecks;
      } else if (flags.only) {
        const checkNames = flags.only.split(',').map(s => s.trim());
        checksToRun = getChecksByName(checkNames);

        if (checksToRun.length === 0) {
          console.error(`No checks found matching: ${flags.only}`);
          console.error('Available checks:', allChecks.map(c => c.name).join(', '));
          process.exit(EXIT_SETUP);
        }
      }

      const target = parseTarget(mergeOptions(loadEnvOptions(), targetFlags(flags)));
      const { root: catalogRoot } = parseCatalogOptions(mergeOptions(loadCatalogEnvOptions(), { root: flags.root }));
      const timeout = Number(flags.timeout ?? 30000);

      const context: CheckContext = {
        client: new DimseProtocolClient({ logger: createLogger('dimse') }),
        target,
        catalogRoot,
        timeout: Number.isFinite(timeout) && timeout > 0 ? timeout : 30000,
      };

      const reporter = new Reporter({
        verbose: flags.verbose,
        json: flags.json,
        target,
        catalogRoot,
      });

      reporter.start();

      const result = await runPreflight({
        checks: checksToRun,
        context,
        failFast: flags.failFast,
        onCheckStart: (check) => reporter.onCheckStart(check.name),
        onCheckComplete: (_, checkResult) => reporter.onCheckComplete(checkResult),
      });

      reporter.finish(result);
      process.exit(result.ready ? EXIT_PASS : EXIT_FAIL);
    } catch (error) {
      exitWithError(error);
    }
  });

program
  .command('catalog')
  .description('List the payload categories found under the dataset root')
  .option('--root <dir>', 'Dataset root (DICOM_ROOT_DIR)')
  .action(async (flags: { root?: string }) => {
    try {
      const catalog = new DatasetCatalog({
        root: parseCatalogOptions(mergeOptions(loadCatalogEnvOptions(), { root: flags.root })).root,
        logger: createLogger('catalog'),
      });
      const descriptors = await catalog.discover();
      const categories = catalog.classify(descriptors);

      console.log(chalk.bold(`\n${descriptors.length} payloads under ${catalog.root}`));
      for (const [category, items] of categories) {
        const bytes = items.reduce((sum, item) => sum + item.sizeBytes, 0);
        console.log(`  ${chalk.cyan(category.padEnd(10))} ${String(items.length).padStart(6)}  ${(bytes / 1024 / 1024).toFixed(1)} MiB`);
      }
      console.log('');
    } catch (error) {
      exitWithError(error);
    }
  });

program.parse();
