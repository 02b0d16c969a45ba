#!/usr/bin/env node
import { readFile } from 'fs/promises';
import * as p from '@clack/prompts';
import pc from 'picocolors';
import { checkCommand } from './cli/commands/check.js';
import { rulesCommand } from './cli/commands/rules.js';

async function printVersion(): Promise<void> {
  const raw: unknown = JSON.parse(await readFile(new URL('../package.json', import.meta.url), 'utf-8'));
  const version =
    typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string'
      ? raw.version
      : 'unknown';
  console.log(`dataset-sanity ${version}`);
}

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  if (command === '--version' || command === '-V') {
    await printVersion();
    return;
  }

  switch (command) {
    case 'check':
    case 'c': {
      const exitCode = await checkCommand(args.slice(1));
      process.exit(exitCode);
      break;
    }

    case 'rules':
    case 'r': {
      const exitCode = await rulesCommand(args.slice(1));
      process.exit(exitCode);
      break;
    }

    case undefined:
    case 'help':
    case '--help':
    case '-h':
      showHelp();
      break;

    default:
      p.log.error(`Unknown command: ${command}`);
      showHelp();
      process.exit(1);
  }
}

function showHelp() {
  console.log(`
${pc.bold('dataset-sanity')} - Sanity checks for relational JSON driving datasets

Usage:
  dataset-sanity <command> [options]

Commands:
  check, c <data-root>    Run the sanity rules against every dataset version
  rules, r                List the rule catalog
  help, -h                Show this help message

Options:
  --version, -V           Print the version

Run 'dataset-sanity check --help' for check options.

Rule groups (in execution order):
  STR   Directory and file layout
  REC   Table cardinality and uniqueness
  REF   Foreign keys, file references and next/prev chains
  FMT   Field types of every table
  TIV   Dataset loads as a whole
`);
}

main().catch((err) => {
  p.log.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
