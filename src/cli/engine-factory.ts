import { IntentEngine } from '../engine.js';
import { readRouterConfig, DEFAULT_CONFIG_PATH } from '../config/reader.js';
import type { Logger } from '../config/logger.js';
import { extractFlag, hasFlag } from './flags.js';

/**
 * Console logger that drops info and debug lines unless `verbose` is set.
 */
export function createCliLogger(verbose: boolean): Logger {
  const quiet = (): void => {};
  return {
    info: verbose ? console.info : quiet,
    debug: verbose ? console.debug : quiet,
    warn: console.warn,
    error: console.error,
  };
}

/**
 * Build an engine from `--config=PATH` (default intent-cascade.json),
 * with `--data-dir=DIR` overriding the configured data directory.
 *
 * @throws {RouterConfigError} When the config file is invalid
 */
export async function createCliEngine(args: string[]): Promise<IntentEngine> {
  const config = await readRouterConfig(extractFlag(args, 'config') ?? DEFAULT_CONFIG_PATH);
  const dataDir = extractFlag(args, 'data-dir') ?? config.dataDir;

  return new IntentEngine({
    config: { ...config, dataDir },
    logger: createCliLogger(hasFlag(args, 'verbose', 'v')),
  });
}
