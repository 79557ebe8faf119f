/**
 * CLI command: `intent-cascade metrics [--file=PATH]`
 *
 * Metrics live in the engine process, so the command optionally replays a
 * file of queries (one per line) first and then prints the snapshot and
 * layer health. Clarification prompts raised during a replay stay
 * unanswered.
 *
 * @module cli/commands/metrics
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { readFile } from 'fs/promises';
import type { IntentEngine } from '../../engine.js';
import type { MetricsSnapshot } from '../../metrics/metrics-recorder.js';
import { extractFlag, formatConfidence, hasFlag } from '../flags.js';

export async function metricsCommand(args: string[], engine: IntentEngine): Promise<number> {
  const jsonMode = hasFlag(args, 'json');
  const file = extractFlag(args, 'file');

  if (file) {
    let content: string;
    try {
      content = await readFile(file, 'utf-8');
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      p.log.error(`Could not read queries: ${message}`);
      return 1;
    }

    const queries = content
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
    const spinner = jsonMode ? undefined : p.spinner();
    spinner?.start(`Classifying ${queries.length} queries...`);
    for (const text of queries) {
      await engine.classify({ text });
    }
    spinner?.stop(`Classified ${queries.length} queries`);
  }

  const snapshot = engine.getMetrics();
  const health = engine.health();

  if (jsonMode) {
    console.log(JSON.stringify({ metrics: snapshot, health }, null, 2));
    return 0;
  }

  displaySnapshot(snapshot);
  p.log.message(pc.bold('Layers:'));
  p.log.message(`  few-shot ${health.fewShot}, embedding ${health.embedding}, llm ${health.llm}, trainer ${health.trainer}`);
  return 0;
}

function displaySnapshot(snapshot: MetricsSnapshot): void {
  p.log.message(pc.bold(`Requests: ${snapshot.requests}`));
  for (const [method, count] of Object.entries(snapshot.byMethod)) {
    if (count > 0) p.log.message(`  ${method}: ${count}`);
  }

  p.log.message(
    `Cache hits ${formatConfidence(snapshot.cacheHitRate)}, ` +
      `disambiguation ${formatConfidence(snapshot.disambiguationRate)}, ` +
      `fallback ${formatConfidence(snapshot.fallbackRate)}`,
  );

  const { latency } = snapshot;
  p.log.message(
    pc.dim(`Latency (ms): mean ${latency.mean.toFixed(1)}, p50 ${latency.p50}, p95 ${latency.p95}, p99 ${latency.p99}`),
  );

  const { training } = snapshot;
  p.log.message(
    `Model ${training.activeModelVersion ?? 'none'}: ${training.successes}/${training.sessions} training runs published`,
  );

  for (const alert of snapshot.alerts) {
    p.log.warn(alert === 'training-paused' ? 'Automatic retraining is paused' : 'Fallback rate is above the alert threshold');
  }
}
