/**
 * On-disk store of model versions.
 *
 * Layout under the registry directory:
 *
 *   models/<id>.json   one file per version
 *   active.json        { id, activatedAt } pointer to the serving version
 *
 * Every write goes through temp-file-then-rename.
 */

import { readdir, readFile, unlink } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import type { ModelVersion, ModelVersionSummary } from '../types/learning.js';
import { parseModelVersion } from '../classifier/model-version.js';
import { writeJsonAtomic } from '../storage/atomic-write.js';
import type { Logger } from '../config/logger.js';

const ActivePointerSchema = z.object({
  id: z.string().min(1),
  activatedAt: z.string(),
});

const VERSION_ID_PATTERN = /^[A-Za-z0-9_.-]+$/;

/**
 * A model version could not be read: missing, unparseable, or not a
 * model version document.
 */
export class ModelLoadError extends Error {
  constructor(
    message: string,
    public readonly versionId?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ModelLoadError';
  }
}

export class ModelRegistry {
  private readonly modelsDir: string;
  private readonly activePath: string;
  private readonly logger: Logger;

  constructor(dir: string, logger: Logger = console) {
    this.modelsDir = join(dir, 'models');
    this.activePath = join(dir, 'active.json');
    this.logger = logger;
  }

  async save(version: ModelVersion): Promise<void> {
    await writeJsonAtomic(this.versionPath(version.id), version);
  }

  /**
   * @throws {ModelLoadError} When the version is missing or corrupt
   */
  async load(id: string): Promise<ModelVersion> {
    const path = this.versionPath(id);

    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
        throw new ModelLoadError(`Model version not found: ${id}`, id);
      }
      throw new ModelLoadError(`Cannot read model version ${id}`, id, { cause: err });
    }

    try {
      return parseModelVersion(JSON.parse(content));
    } catch (err) {
      throw new ModelLoadError(`Corrupt model version file: ${path}`, id, { cause: err });
    }
  }

  /**
   * Id of the active version, or null when nothing has been activated.
   *
   * @throws {ModelLoadError} When the pointer file is corrupt
   */
  async getActiveId(): Promise<string | null> {
    let content: string;
    try {
      content = await readFile(this.activePath, 'utf-8');
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw new ModelLoadError('Cannot read active model pointer', undefined, { cause: err });
    }

    try {
      return ActivePointerSchema.parse(JSON.parse(content)).id;
    } catch (err) {
      throw new ModelLoadError(`Corrupt active model pointer: ${this.activePath}`, undefined, {
        cause: err,
      });
    }
  }

  /** The active version, or null when none has been activated. */
  async loadActive(): Promise<ModelVersion | null> {
    const id = await this.getActiveId();
    return id === null ? null : this.load(id);
  }

  /**
   * Point `active.json` at an existing version and return it.
   * Used both for publishing and for rollback.
   */
  async activate(id: string): Promise<ModelVersion> {
    const version = await this.load(id);
    await writeJsonAtomic(this.activePath, { id, activatedAt: new Date().toISOString() });
    return version;
  }

  /** Summaries of every readable version, newest first. */
  async list(): Promise<ModelVersionSummary[]> {
    let files: string[];
    try {
      files = await readdir(this.modelsDir);
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
        return [];
      }
      throw err;
    }

    const activeId = await this.getActiveId().catch(() => null);
    const summaries: ModelVersionSummary[] = [];

    for (const file of files) {
      if (!file.endsWith('.json') || file.startsWith('.')) continue;
      const id = file.slice(0, -'.json'.length);
      try {
        const version = await this.load(id);
        summaries.push({
          id: version.id,
          createdAt: version.createdAt,
          labels: [...version.labels],
          validationScore: version.validationScore,
          predecessorId: version.predecessorId,
          trainingSetSize: version.trainingSet.length,
          active: version.id === activeId,
        });
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.warn(`[registry] Skipping unreadable model version ${id}: ${message}`);
      }
    }

    return summaries.sort((a, b) => b.createdAt.localeCompare(a.createdAt) || b.id.localeCompare(a.id));
  }

  /**
   * Delete all but the newest `keep` versions. The active version is never
   * deleted, however old.
   *
   * @returns Ids of the deleted versions
   */
  async garbageCollect(keep: number): Promise<string[]> {
    const versions = await this.list();
    const removed: string[] = [];

    for (const [index, version] of versions.entries()) {
      if (index < keep || version.active) continue;
      await unlink(this.versionPath(version.id));
      removed.push(version.id);
    }

    if (removed.length > 0) {
      this.logger.debug(`[registry] Removed ${removed.length} old model version(s)`);
    }
    return removed;
  }

  private versionPath(id: string): string {
    if (!VERSION_ID_PATTERN.test(id)) {
      throw new ModelLoadError(`Invalid model version id: ${id}`, id);
    }
    return join(this.modelsDir, `${id}.json`);
  }
}
