/**
 * Tests for the metrics CLI command.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

vi.mock('@clack/prompts', () => ({
  log: {
    message: vi.fn(),
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    success: vi.fn(),
  },
  spinner: vi.fn(() => ({ start: vi.fn(), stop: vi.fn() })),
}));

import * as p from '@clack/prompts';
import { metricsCommand } from './metrics.js';
import { IntentEngine } from '../../engine.js';
import { silentLogger } from '../../config/logger.js';

describe('metricsCommand', () => {
  let testDir: string;
  let engine: IntentEngine;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(async () => {
    vi.clearAllMocks();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    testDir = await mkdtemp(join(tmpdir(), 'cli-metrics-'));
    engine = new IntentEngine({
      config: { dataDir: testDir },
      embeddings: null,
      llm: null,
      logger: silentLogger,
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await engine.close();
    await rm(testDir, { recursive: true, force: true });
  });

  it('replays a query file and prints the snapshot', async () => {
    const queries = join(testDir, 'queries.txt');
    await writeFile(queries, 'hello\n\ngood morning\nhello\n', 'utf-8');

    const exitCode = await metricsCommand([`--file=${queries}`, '--json'], engine);

    expect(exitCode).toBe(0);
    const output = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
    expect(output.metrics).toMatchObject({
      requests: 3,
      byMethod: { pattern: 3, cache: 0, 'fast-model': 0 },
      fallbackRate: 0,
    });
    expect(output.health).toEqual({
      fewShot: 'ready',
      embedding: 'disabled',
      llm: 'disabled',
      trainer: 'idle',
    });
  });

  it('exits 1 when the query file cannot be read', async () => {
    const exitCode = await metricsCommand([`--file=${join(testDir, 'missing.txt')}`], engine);

    expect(exitCode).toBe(1);
    expect(p.log.error).toHaveBeenCalledWith(expect.stringContaining('Could not read queries'));
  });
});
