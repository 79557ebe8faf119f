/**
 * Router config file reader with Zod validation.
 *
 * Missing file = all defaults. Invalid input = RouterConfigError carrying the
 * first failing field path.
 *
 * @module config/reader
 */

import { readFile } from 'fs/promises';
import {
  RouterConfigSchema,
  DEFAULT_ROUTER_CONFIG,
  type RouterConfig,
  type RouterConfigPatch,
} from './schema.js';

/** Default path for the config file. */
export const DEFAULT_CONFIG_PATH = 'intent-cascade.json';

/**
 * Error thrown when config reading or validation fails.
 */
export class RouterConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'RouterConfigError';
  }
}

/**
 * Read and validate the router config from disk.
 *
 * @throws {RouterConfigError} On invalid JSON or validation failure
 */
export async function readRouterConfig(
  configPath: string = DEFAULT_CONFIG_PATH,
): Promise<RouterConfig> {
  let content: string;

  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      return DEFAULT_ROUTER_CONFIG;
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new RouterConfigError(`Invalid JSON in config file: ${configPath}`);
  }

  return parseRouterConfig(raw);
}

/**
 * Validate raw input against the schema (no I/O).
 *
 * @throws {RouterConfigError} With one `path: message` line per issue
 */
export function parseRouterConfig(raw: unknown): RouterConfig {
  const result = RouterConfigSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return `${path}: ${issue.message}`;
    });
    throw new RouterConfigError(
      `Config validation failed:\n${errors.join('\n')}`,
      result.error.issues[0]?.path.join('.'),
    );
  }

  return result.data;
}

/**
 * Merge a partial update section-by-section onto an existing config and
 * re-validate the result, so cross-field rules see the merged values.
 */
export function mergeRouterConfig(base: RouterConfig, patch: RouterConfigPatch): RouterConfig {
  return parseRouterConfig({
    dataDir: patch.dataDir ?? base.dataDir,
    thresholds: { ...base.thresholds, ...patch.thresholds },
    layers: { ...base.layers, ...patch.layers },
    cache: { ...base.cache, ...patch.cache },
    learning: { ...base.learning, ...patch.learning },
    llm: { ...base.llm, ...patch.llm },
    disambiguation: { ...base.disambiguation, ...patch.disambiguation },
    embedding: { ...base.embedding, ...patch.embedding },
    metrics: { ...base.metrics, ...patch.metrics },
    audit: { ...base.audit, ...patch.audit },
  });
}
