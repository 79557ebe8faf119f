/**
 * CLI commands for labels found outside the taxonomy: `discovered` lists
 * them, `promote <label> --description=TEXT` adds one to the taxonomy.
 *
 * @module cli/commands/discovered
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { ZodError } from 'zod';
import type { IntentEngine } from '../../engine.js';
import { extractFlag, getNonFlagArgs, hasFlag } from '../flags.js';

export async function discoveredCommand(args: string[], engine: IntentEngine): Promise<number> {
  await engine.init();
  const intents = engine.listDiscoveredIntents();

  if (hasFlag(args, 'json')) {
    console.log(JSON.stringify(intents, null, 2));
    return 0;
  }

  if (intents.length === 0) {
    p.log.info('No discovered intents.');
    return 0;
  }

  p.log.message(pc.bold(`Discovered intents (${intents.length}):`));
  for (const intent of intents) {
    const status = intent.ready ? pc.green('ready for review') : pc.dim('collecting');
    p.log.message(`  ${intent.label}  ${pc.dim(`seen ${intent.count}x, last ${intent.lastSeen}`)}  ${status}`);
    for (const example of intent.examples.slice(0, 3)) {
      p.log.message(pc.dim(`    "${example.text}"`));
    }
  }
  return 0;
}

export async function promoteCommand(args: string[], engine: IntentEngine): Promise<number> {
  const label = getNonFlagArgs(args)[0];
  const description = extractFlag(args, 'description');
  if (!label || !description) {
    p.log.error('Usage: intent-cascade promote <label> --description=TEXT [--action=NAME]');
    return 1;
  }

  try {
    const intent = await engine.promoteIntent(label, description, extractFlag(args, 'action') ?? null);
    if (hasFlag(args, 'json')) {
      console.log(JSON.stringify(intent, null, 2));
    } else {
      p.log.success(
        `Added ${pc.bold(intent.label)} to the taxonomy (${intent.examples.length} examples queued for training)`,
      );
    }
    return 0;
  } catch (err) {
    if (err instanceof ZodError) {
      p.log.error(`Invalid intent: ${err.issues.map((issue) => issue.message).join(', ')}`);
      return 1;
    }
    throw err;
  }
}
