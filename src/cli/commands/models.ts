/**
 * CLI commands for model versions: `models`, `retrain` and `rollback <id>`.
 *
 * @module cli/commands/models
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import type { IntentEngine } from '../../engine.js';
import { ModelLoadError } from '../../learning/model-registry.js';
import { getNonFlagArgs, hasFlag } from '../flags.js';

/**
 * List stored model versions, newest first.
 */
export async function modelsCommand(args: string[], engine: IntentEngine): Promise<number> {
  const versions = await engine.listModelVersions();

  if (hasFlag(args, 'json')) {
    console.log(JSON.stringify(versions, null, 2));
    return 0;
  }

  if (versions.length === 0) {
    p.log.info('No model versions stored yet.');
    return 0;
  }

  p.log.message(pc.bold(`Model versions (${versions.length}):`));
  for (const version of versions) {
    const marker = version.active ? pc.green('*') : ' ';
    const score =
      version.validationScore === null ? 'bootstrap' : `accuracy ${version.validationScore.toFixed(3)}`;
    p.log.message(
      `  ${marker} ${version.id}  ${pc.dim(`${version.createdAt}  ${score}  ${version.trainingSetSize} learned examples`)}`,
    );
  }
  return 0;
}

/**
 * Train now, even while automatic retraining is paused.
 *
 * Exit codes: 0 when a version was published, 1 when the run was rejected.
 */
export async function retrainCommand(args: string[], engine: IntentEngine): Promise<number> {
  const jsonMode = hasFlag(args, 'json');
  const spinner = jsonMode ? undefined : p.spinner();
  spinner?.start('Training...');

  const result = await engine.retrainNow();

  if (jsonMode) {
    console.log(JSON.stringify(result, null, 2));
    return result.status === 'published' ? 0 : 1;
  }

  if (result.status === 'published') {
    spinner?.stop(`Published ${pc.bold(result.version.id)} (accuracy ${result.validationScore.toFixed(3)})`);
    return 0;
  }
  spinner?.stop(pc.red('Training run rejected'));
  p.log.error(result.reason);
  return 1;
}

export async function rollbackCommand(args: string[], engine: IntentEngine): Promise<number> {
  const versionId = getNonFlagArgs(args)[0];
  if (!versionId) {
    p.log.error('Usage: intent-cascade rollback <version-id>');
    return 1;
  }

  try {
    const summary = await engine.rollback(versionId);
    if (hasFlag(args, 'json')) {
      console.log(JSON.stringify(summary, null, 2));
    } else {
      p.log.success(`Serving ${pc.bold(summary.id)}`);
    }
    return 0;
  } catch (err) {
    if (err instanceof ModelLoadError) {
      p.log.error(err.message);
      return 1;
    }
    throw err;
  }
}
