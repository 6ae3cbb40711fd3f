/**
 * Command-line surface.
 *
 *   cdn-usage-reporter [report] [--out-dir dir] [--include-rules] [--include-products]
 *   cdn-usage-reporter combinations
 *   cdn-usage-reporter probe
 *
 * Every command shares --env-file, --account-switch-key, --debug and
 * --metrics-file. `runCli` resolves to the process exit code instead of
 * exiting so it can be driven from tests.
 */
import path from 'path';
import { Command, CommanderError } from 'commander';
import { CONFIG, Env, loadConfig, looksLikeApiHost, readEnvFile, redactKey, ReporterConfig } from './config';
import { errorMessage, HttpError, PropertyListingError } from './errors';
import logger, { setLogLevel } from './logger';
import { createRunMetrics, RunMetrics } from './metrics';
import { ApiClient, EdgeGridClient } from './net/edgegridClient';
import type { SourceContext } from './sources/fetchSource';
import { CombinationReport, findAllCombinations } from './discovery';
import { formatProbeResults, probeApis } from './probe';
import { runReport } from './reporter';
import { writeText } from './report/writers';

export const VERSION = '1.0.0';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CONFIG = 2;

export interface CliDeps {
  env: Env;
  createClient: (config: ReporterConfig, metrics: RunMetrics) => ApiClient;
  stdout: (text: string) => void;
}

interface CommonOptions {
  envFile?: string;
  accountSwitchKey?: string;
  debug?: boolean;
  metricsFile?: string;
}

interface ReportCliOptions extends CommonOptions {
  outDir: string;
  includeRules?: boolean;
  includeProducts?: boolean;
}

const defaultDeps: CliDeps = {
  env: process.env,
  createClient: (config, metrics) => new EdgeGridClient(config, { metrics }),
  stdout: (text) => {
    process.stdout.write(`${text}\n`);
  },
};

function withCommonOptions(cmd: Command): Command {
  return cmd
    .option('--env-file <path>', 'read credentials from a dotenv file (process environment wins)')
    .option('--account-switch-key <key>', 'account to act on (default: AKAMAI_ACCOUNT_SWITCH_KEY)')
    .option('--debug', 'debug-level logging')
    .option('--metrics-file <path>', 'write Prometheus metrics of the run to this file');
}

export function formatCombinations(reports: CombinationReport[]): string {
  if (!reports.length) return 'No contract/group combinations found';
  return reports
    .map((r) => {
      const contract = r.contractTypeName ? `${r.contractId} (${r.contractTypeName})` : r.contractId;
      const group = r.groupName ? `${r.groupId} (${r.groupName})` : r.groupId;
      const outcome = r.ok ? `${r.propertiesCount} properties` : `error: ${r.error ?? 'unknown'}`;
      return `${contract} + ${group}: ${outcome}`;
    })
    .join('\n');
}

function logFatal(error: unknown): void {
  if (error instanceof PropertyListingError) {
    logger.error({ err: error }, 'Failed to fetch properties');
    if (error.cause instanceof HttpError) {
      logger.error({ status: error.cause.status, body: error.cause.body }, 'Property listing HTTP error');
    }
    return;
  }
  logger.error({ err: error }, `Unexpected error: ${errorMessage(error)}`);
}

/**
 * Credentials, client and metrics for one command, or the exit code to
 * return when the configuration is unusable. No client exists before the
 * credentials have been validated.
 */
function prepare(deps: CliDeps, opts: CommonOptions): { ctx: SourceContext; metrics: RunMetrics } | number {
  if (opts.debug) setLogLevel('debug');

  let env: Env = deps.env;
  if (opts.envFile) {
    try {
      env = { ...readEnvFile(opts.envFile), ...deps.env };
    } catch (err) {
      logger.error({ err, envFile: opts.envFile }, 'Cannot read env file');
      return EXIT_CONFIG;
    }
  }

  const loaded = loadConfig(env, { accountSwitchKey: opts.accountSwitchKey });
  if (!loaded.ok) {
    logger.error({ missing: loaded.error.missing }, loaded.error.message);
    return EXIT_CONFIG;
  }
  const config = loaded.value;

  if (!looksLikeApiHost(config.host)) {
    logger.warn({ host: config.host }, 'AKAMAI_HOST does not look like an API host (expected akab-...)');
  }
  if (config.accountSwitchKey) {
    logger.info({ accountSwitchKey: redactKey(config.accountSwitchKey) }, 'Using account switch key');
  }

  const metrics = createRunMetrics();
  return { ctx: { client: deps.createClient(config, metrics), metrics }, metrics };
}

async function execute(
  deps: CliDeps,
  opts: CommonOptions,
  body: (ctx: SourceContext) => Promise<void>,
): Promise<number> {
  const prepared = prepare(deps, opts);
  if (typeof prepared === 'number') return prepared;

  let code = EXIT_OK;
  try {
    await body(prepared.ctx);
  } catch (error) {
    logFatal(error);
    code = EXIT_FAILURE;
  }

  if (opts.metricsFile) {
    try {
      await writeText(opts.metricsFile, await prepared.metrics.registry.metrics());
    } catch (err) {
      logger.error({ err, metricsFile: opts.metricsFile }, 'Cannot write metrics file');
      code = code || EXIT_FAILURE;
    }
  }
  return code;
}

export function buildProgram(deps: CliDeps, setExitCode: (code: number) => void): Command {
  const program = new Command();
  program
    .name('cdn-usage-reporter')
    .description('Inventory an Akamai account and write Cloudflare migration checklists')
    .version(VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => deps.stdout(str.trimEnd()),
      writeErr: (str) => logger.error(str.trimEnd()),
    });

  withCommonOptions(program.command('report', { isDefault: true }))
    .description('write CSV reports and per-domain checklists')
    .option('--out-dir <dir>', 'output directory', CONFIG.DEFAULT_OUT_DIR)
    .option('--include-rules', 'fetch and classify property rule trees')
    .option('--include-products', 'also inventory Edge DNS, GTM, EdgeWorkers, Cloudlets and Cloud Wrapper')
    .action(async (opts: ReportCliOptions) => {
      setExitCode(
        await execute(deps, opts, async (ctx) => {
          const summary = await runReport(ctx, {
            outDir: opts.outDir,
            includeRules: Boolean(opts.includeRules),
            includeProducts: Boolean(opts.includeProducts),
          });
          logger.info(
            { properties: summary.properties, hostnames: summary.hostnames, apexes: summary.apexes.length },
            'Report complete',
          );
          deps.stdout(`Wrote reports to ${path.resolve(summary.outDir)}`);
        }),
      );
    });

  withCommonOptions(program.command('combinations'))
    .description('list every contract/group pair and how many properties it exposes')
    .action(async (opts: CommonOptions) => {
      setExitCode(
        await execute(deps, opts, async (ctx) => {
          deps.stdout(formatCombinations(await findAllCombinations(ctx)));
        }),
      );
    });

  withCommonOptions(program.command('probe'))
    .description('check which administrative APIs the credentials can reach')
    .action(async (opts: CommonOptions) => {
      setExitCode(
        await execute(deps, opts, async (ctx) => {
          deps.stdout(formatProbeResults(await probeApis(ctx.client)));
        }),
      );
    });

  return program;
}

/** Parse `argv` (without node and script) and run the selected command. */
export async function runCli(argv: string[], overrides: Partial<CliDeps> = {}): Promise<number> {
  const deps: CliDeps = { ...defaultDeps, ...overrides };
  let exitCode = EXIT_OK;
  const program = buildProgram(deps, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    logFatal(error);
    return EXIT_FAILURE;
  }
  return exitCode;
}
