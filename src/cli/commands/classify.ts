/**
 * CLI command: `intent-cascade classify "<text>"`
 *
 * Classifies one query. When the engine asks for clarification the user
 * picks an option interactively, or up front with `--select=N`.
 *
 * Exit codes:
 * - 0: Classified (or prompt shown in --json mode)
 * - 1: Missing text or an invalid selection
 *
 * @module cli/commands/classify
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import type { IntentEngine } from '../../engine.js';
import type { ClassifyResponse } from '../../types/classification.js';
import { InvalidSelectionError } from '../../router/errors.js';
import { extractFlag, formatConfidence, getNonFlagArgs, hasFlag } from '../flags.js';

export async function classifyCommand(args: string[], engine: IntentEngine): Promise<number> {
  if (hasFlag(args, 'help', 'h')) {
    showHelp();
    return 0;
  }

  const text = getNonFlagArgs(args).join(' ').trim();
  if (!text) {
    p.log.error('Usage: intent-cascade classify "<text>" [--tenant=ID] [--select=N] [--json]');
    return 1;
  }

  const jsonMode = hasFlag(args, 'json');
  const select = extractFlag(args, 'select');

  let response = await engine.classify({ text, tenant: extractFlag(args, 'tenant') });

  if (response.needsClarification && response.sessionId) {
    let optionId: string | undefined = select;

    if (optionId === undefined) {
      if (jsonMode || !process.stdin.isTTY) {
        // Leave the session open; the caller sees the options
        printResponse(response, jsonMode);
        return 0;
      }
      optionId = await promptForOption(response);
    }

    try {
      response = await engine.resolve({ sessionId: response.sessionId, optionId });
    } catch (err) {
      if (err instanceof InvalidSelectionError) {
        p.log.error(err.message);
        return 1;
      }
      throw err;
    }
  }

  printResponse(response, jsonMode);
  return 0;
}

/** Returns undefined when the prompt is cancelled. */
async function promptForOption(response: ClassifyResponse): Promise<string | undefined> {
  const choice = await p.select({
    message: response.question ?? 'Which of these did you mean?',
    options: (response.options ?? []).map((option) => ({
      value: option.id,
      label: option.label,
      hint: `${option.description} (${formatConfidence(option.confidence)})`,
    })),
  });
  return p.isCancel(choice) ? undefined : choice;
}

function printResponse(response: ClassifyResponse, jsonMode: boolean): void {
  if (jsonMode) {
    console.log(JSON.stringify(response, null, 2));
    return;
  }

  if (response.needsClarification) {
    p.log.warn(response.question ?? 'Clarification needed');
    for (const option of response.options ?? []) {
      p.log.message(
        `  ${pc.bold(option.id)}. ${option.label} ${pc.dim(`${option.description} (${formatConfidence(option.confidence)})`)}`,
      );
    }
    p.log.message(pc.dim(`Session ${response.sessionId ?? ''}: re-run with --select=N to choose`));
    return;
  }

  const flags: string[] = [];
  if (response.lowCertainty) flags.push(pc.yellow('low certainty'));
  if (response.novel) flags.push(pc.magenta('novel'));

  p.log.success(`${pc.bold(response.intent)} ${pc.dim(`${formatConfidence(response.confidence)} via ${response.method}`)}`);
  if (response.source) {
    p.log.message(pc.dim(`  cached from ${response.source}`));
  }
  if (flags.length > 0) {
    p.log.message(`  ${flags.join(', ')}`);
  }
  p.log.message(pc.dim(`  ${response.latencyMs}ms, model ${response.modelVersion ?? 'none'}`));
}

function showHelp(): void {
  console.log(`
intent-cascade classify - Classify a query

Usage:
  intent-cascade classify "<text>" [options]

Options:
  --tenant=ID       Scope the result cache to a tenant
  --select=N        Answer a clarification prompt with option N
  --json            Output the response as JSON (prompts are not answered)
  --help, -h        Show this help message

Examples:
  intent-cascade classify "how many products are in stock"
  intent-cascade classify "show me the numbers" --select=1
`);
}
