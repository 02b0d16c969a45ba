/**
 * CLI command: `dataset-sanity check <data-root>`
 *
 * Runs every sanity rule against each dataset version under the root,
 * prints the failures and a summary table, and optionally writes the
 * results as JSON.
 *
 * Exit codes:
 * - 0: No unfixed ERROR failures (and no WARNING failures with --strict)
 * - 1: Failures found, or invalid arguments/config
 *
 * @module cli/commands/check
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import {
  DEFAULT_CONFIG_PATH,
  SanityConfigError,
  effectiveConcurrency,
  readSanityConfig,
  type SanityConfig,
} from '../../config/sanity-config.js';
import { resolveExitCode } from '../../sanity/exit-status.js';
import { SanityReporter, resultLabel, resultsToJson, writeResults } from '../../sanity/reporter.js';
import { createDefaultRegistry } from '../../sanity/rules/index.js';
import { scanDatasets, type ScanOutcome } from '../../sanity/runner.js';
import { datasetStatus } from '../../sanity/summary.js';

export interface CheckArgs {
  root: string | undefined;
  output?: string;
  version?: string;
  excludes: string[];
  strict: boolean;
  includeWarnings: boolean;
  fix: boolean;
  json: boolean;
  concurrency?: string;
  configPath: string;
}

/** Malformed `check` arguments; reported as a usage error. */
export class CheckUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CheckUsageError';
  }
}

type ValueOption = 'output' | 'version' | 'exclude' | 'concurrency' | 'config';

/** Options taking a value, as `--name=value` or `--name value`. */
const VALUE_FLAGS: ReadonlyMap<string, ValueOption> = new Map([
  ['-o', 'output'],
  ['--output', 'output'],
  ['--version', 'version'],
  ['--dataset-version', 'version'],
  ['-e', 'exclude'],
  ['--exclude', 'exclude'],
  ['--concurrency', 'concurrency'],
  ['--config', 'config'],
]);

const BOOLEAN_FLAGS: ReadonlySet<string> = new Set(['--strict', '--include-warnings', '--fix', '--json', '--help', '-h']);

/**
 * Parse `check` arguments. `--exclude` may repeat and take
 * comma-separated lists; other value options keep their last value.
 *
 * @throws {CheckUsageError} On an unknown option, an option without its
 * value or a second positional argument
 */
export function parseCheckArgs(args: string[]): CheckArgs {
  const excludes: string[] = [];
  const values = new Map<ValueOption, string>();
  const flags = new Set<string>();
  let root: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith('-')) {
      if (root !== undefined) throw new CheckUsageError(`Unexpected argument: ${arg}`);
      root = arg;
      continue;
    }
    if (BOOLEAN_FLAGS.has(arg)) {
      flags.add(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg : arg.slice(0, eq);
    const option = VALUE_FLAGS.get(name);
    if (option === undefined) throw new CheckUsageError(`Unknown option: ${arg}`);

    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      const next = args[i + 1];
      // A following option means the value was left out
      if (next !== undefined && !next.startsWith('-')) {
        value = next;
        i++;
      }
    }
    if (value === undefined || value.length === 0) throw new CheckUsageError(`Option ${name} requires a value`);

    if (option === 'exclude') excludes.push(...value.split(','));
    else values.set(option, value);
  }

  return {
    root,
    output: values.get('output'),
    version: values.get('version'),
    excludes: excludes.map((e) => e.trim()).filter((e) => e.length > 0),
    strict: flags.has('--strict'),
    includeWarnings: flags.has('--include-warnings'),
    fix: flags.has('--fix'),
    json: flags.has('--json'),
    concurrency: values.get('concurrency'),
    configPath: values.get('config') ?? DEFAULT_CONFIG_PATH,
  };
}

function parsePositiveInt(value: string | undefined, allowZero: boolean): number | undefined | null {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value)) return null;
  const n = Number.parseInt(value, 10);
  return n === 0 && !allowZero ? null : n;
}

/**
 * Execute the `check` CLI command.
 *
 * @param args - CLI arguments after `check`
 * @returns Exit code
 */
export async function checkCommand(args: string[]): Promise<number> {
  if (args.includes('--help') || args.includes('-h')) {
    showHelp();
    return 0;
  }

  let parsed: CheckArgs;
  try {
    parsed = parseCheckArgs(args);
  } catch (err) {
    if (err instanceof CheckUsageError) {
      p.log.error(err.message);
      return 1;
    }
    throw err;
  }
  if (parsed.root === undefined) {
    p.log.error('Missing data root. Usage: dataset-sanity check <data-root> [options]');
    return 1;
  }

  const version = parsePositiveInt(parsed.version, true);
  if (version === null) {
    p.log.error(`Invalid dataset version: ${parsed.version}`);
    return 1;
  }
  const concurrencyFlag = parsePositiveInt(parsed.concurrency, false);
  if (concurrencyFlag === null) {
    p.log.error(`Invalid concurrency: ${parsed.concurrency}`);
    return 1;
  }

  let config: SanityConfig;
  try {
    config = await readSanityConfig(parsed.configPath);
  } catch (err) {
    if (err instanceof SanityConfigError) {
      p.log.error(err.message);
      return 1;
    }
    throw err;
  }

  const strict = parsed.strict || config.strict;
  const includeWarnings = parsed.includeWarnings || config.includeWarnings;
  const fix = parsed.fix || config.fix;
  const excludes = [...config.exclude, ...parsed.excludes];

  const registry = createDefaultRegistry();
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once('SIGINT', onInterrupt);

  const spinner = parsed.json ? null : p.spinner();
  spinner?.start(`Checking ${parsed.root}`);

  let outcome: ScanOutcome;
  try {
    outcome = await scanDatasets(parsed.root, {
      version,
      excludes,
      fix,
      registry,
      concurrency: concurrencyFlag ?? effectiveConcurrency(config),
      signal: controller.signal,
    });
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
  spinner?.stop(`Checked ${outcome.results.length} dataset version(s)`);

  const { results } = outcome;
  if (parsed.output) {
    await writeResults(parsed.output, results);
  }

  if (parsed.json) {
    for (const warning of outcome.warnings) console.error(warning.message);
    console.log(resultsToJson(results));
    return resolveExitCode(results, strict);
  }

  for (const warning of outcome.warnings) {
    p.log.warn(warning.message);
  }

  const reporter = new SanityReporter({ includeWarnings });
  for (const result of results) {
    const lines = reporter.formatChecklist(result);
    const status = datasetStatus(result.reports);
    const header = `${pc.bold(resultLabel(result))} ${status === 'SUCCESS' ? pc.green(status) : pc.red(status)}`;
    p.log.message([header, ...lines].join('\n'));
  }
  p.log.message(reporter.formatSummaryTable(results).join('\n'));

  if (parsed.output) {
    p.log.info(`Results written to ${parsed.output}`);
  }
  if (outcome.cancelled) {
    p.log.warn(`Interrupted: ${results.length} dataset version(s) checked before cancellation`);
  }

  const exitCode = resolveExitCode(results, strict);
  if (exitCode === 0) {
    p.outro(pc.green('Sanity check passed.'));
  } else {
    p.outro(pc.red(strict ? 'Sanity check failed (strict).' : 'Sanity check failed.'));
  }
  return exitCode;
}

function showHelp(): void {
  console.log(`
dataset-sanity check - Validate dataset structure, records and references

Usage:
  dataset-sanity check <data-root> [options]

Options:
  -o, --output FILE          Write results as JSON to FILE
  --version N                Check version N instead of the latest
  --dataset-version N        Same as --version N
  -e, --exclude ID|GROUP     Skip a rule or group (repeatable, comma lists allowed)
  --strict                   WARNING failures also fail the run
  --include-warnings         Print reasons of WARNING failures
  --fix                      Try to repair fixable failures
  --json                     Print results as JSON
  --concurrency N            Dataset versions checked at once
  --config PATH              Config file (default: ${DEFAULT_CONFIG_PATH})
  --help, -h                 Show this help message

Examples:
  dataset-sanity check ./datasets
  dataset-sanity check ./datasets/run-01 -e REF -e FMT010 --strict
  dataset-sanity check ./datasets --fix -o sanity.json
`);
}
