import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { DiscoveredIntents } from './discovered-intents.js';
import { silentLogger } from '../config/logger.js';
import type { TrainingExample } from '../types/learning.js';

function sighting(text: string, label: string, timestamp: string): TrainingExample {
  return { text, label, provenance: 'llm-inferred', timestamp };
}

describe('DiscoveredIntents', () => {
  it('counts sightings and keeps distinct example texts', () => {
    const discovered = new DiscoveredIntents(undefined, 3, silentLogger);

    discovered.record(sighting('refund my order', 'refund_request', '2026-03-01T00:00:00.000Z'));
    discovered.record(sighting('refund my order', 'refund_request', '2026-03-02T00:00:00.000Z'));
    const entry = discovered.record(
      sighting('money back please', 'refund_request', '2026-03-03T00:00:00.000Z'),
    );

    expect(entry).toMatchObject({
      label: 'refund_request',
      firstSeen: '2026-03-01T00:00:00.000Z',
      lastSeen: '2026-03-03T00:00:00.000Z',
      count: 3,
    });
    expect(entry.examples.map((e) => e.text)).toEqual(['refund my order', 'money back please']);
  });

  it('lists most frequent first and flags labels ready for review', () => {
    const discovered = new DiscoveredIntents(undefined, 2, silentLogger);
    discovered.record(sighting('a', 'warranty_question', '2026-03-01T00:00:00.000Z'));
    discovered.record(sighting('b', 'refund_request', '2026-03-01T00:00:00.000Z'));
    discovered.record(sighting('c', 'refund_request', '2026-03-01T00:00:00.000Z'));

    const list = discovered.list();

    expect(list.map((d) => [d.label, d.count, d.ready])).toEqual([
      ['refund_request', 2, true],
      ['warranty_question', 1, false],
    ]);
  });

  it('removes a label on take', () => {
    const discovered = new DiscoveredIntents(undefined, 3, silentLogger);
    discovered.record(sighting('a', 'refund_request', '2026-03-01T00:00:00.000Z'));

    expect(discovered.take('refund_request')?.count).toBe(1);
    expect(discovered.take('refund_request')).toBeUndefined();
    expect(discovered.size).toBe(0);
  });

  describe('persistence', () => {
    let testDir: string;

    beforeEach(async () => {
      testDir = await mkdtemp(join(tmpdir(), 'discovered-test-'));
    });

    afterEach(async () => {
      await rm(testDir, { recursive: true, force: true });
    });

    it('round-trips through its JSON file', async () => {
      const filePath = join(testDir, 'discovered.json');
      const discovered = new DiscoveredIntents(filePath, 3, silentLogger);
      discovered.record(sighting('a', 'refund_request', '2026-03-01T00:00:00.000Z'));
      await discovered.flush();

      const reloaded = new DiscoveredIntents(filePath, 3, silentLogger);
      await reloaded.load();

      expect(reloaded.get('refund_request')?.count).toBe(1);
    });
  });
});
