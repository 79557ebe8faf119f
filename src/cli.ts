#!/usr/bin/env node
import { createRequire } from 'node:module';
import * as p from '@clack/prompts';
import pc from 'picocolors';
import type { IntentEngine } from './engine.js';
import { createCliEngine } from './cli/engine-factory.js';
import { hasFlag } from './cli/flags.js';
import { classifyCommand } from './cli/commands/classify.js';
import { modelsCommand, retrainCommand, rollbackCommand } from './cli/commands/models.js';
import { discoveredCommand, promoteCommand } from './cli/commands/discovered.js';
import { metricsCommand } from './cli/commands/metrics.js';
import { configCommand } from './cli/commands/config.js';

function printVersion(): void {
  const require = createRequire(import.meta.url);
  const pkg = require('../package.json') as { version: string; name: string };
  console.log(`${pkg.name} v${pkg.version}`);
  console.log(`node ${process.version}`);
}

/**
 * Run `command` against an initialized engine and close it afterwards.
 */
async function withEngine(
  args: string[],
  command: (engine: IntentEngine) => Promise<number>,
): Promise<number> {
  const engine = await createCliEngine(args);
  const spinner = hasFlag(args, 'json') ? undefined : p.spinner();
  spinner?.start('Loading intent engine...');
  await engine.init();
  spinner?.stop('Intent engine ready');

  try {
    return await command(engine);
  } finally {
    await engine.close();
  }
}

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];
  const rest = args.slice(1);

  if (command === '--version' || command === '-V') {
    printVersion();
    return;
  }

  let exitCode = 0;

  switch (command) {
    case 'classify':
    case 'c':
      exitCode = await withEngine(rest, (engine) => classifyCommand(rest, engine));
      break;

    case 'models':
      exitCode = await withEngine(rest, (engine) => modelsCommand(rest, engine));
      break;

    case 'retrain':
      exitCode = await withEngine(rest, (engine) => retrainCommand(rest, engine));
      break;

    case 'rollback':
      exitCode = await withEngine(rest, (engine) => rollbackCommand(rest, engine));
      break;

    case 'discovered':
      exitCode = await withEngine(rest, (engine) => discoveredCommand(rest, engine));
      break;

    case 'promote':
      exitCode = await withEngine(rest, (engine) => promoteCommand(rest, engine));
      break;

    case 'metrics':
      exitCode = await withEngine(rest, (engine) => metricsCommand(rest, engine));
      break;

    case 'config':
      exitCode = await configCommand(rest);
      break;

    case 'help':
    case '--help':
    case '-h':
    case undefined:
      showHelp();
      break;

    default:
      p.log.error(`Unknown command: ${command}`);
      showHelp();
      exitCode = 1;
  }

  if (exitCode !== 0) {
    process.exit(exitCode);
  }
}

function showHelp() {
  console.log(`
${pc.bold('intent-cascade')} - Tiered intent classification

Usage:
  intent-cascade <command> [options]

Commands:
  classify, c "<text>"   Classify a query (answers clarification prompts)
  models                 List stored model versions
  retrain                Train and publish a new model version now
  rollback <id>          Serve an older model version
  discovered             List labels found outside the taxonomy
  promote <label>        Add a discovered label to the taxonomy
  metrics                Show routing metrics and layer health
  config validate|show   Check the configuration file

Options:
  --config=PATH          Config file (default: intent-cascade.json)
  --data-dir=DIR         Override the data directory
  --json                 Machine-readable output
  --verbose, -v          Show engine info logs
  --version, -V          Show version information
  --help, -h             Show help

Examples:
  intent-cascade classify "how many products are in stock"
  intent-cascade promote refund_request --description="Requests for refunds"
  intent-cascade metrics --file=queries.txt --json
`);
}

main().catch((err: unknown) => {
  p.log.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
