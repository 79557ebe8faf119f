// ============================================================================
// Classification Logger
// ============================================================================
// Append-only JSONL audit trail: one line per classify or resolve outcome.
// Writes are queued behind the request and failures go to stderr, so the
// audit trail can never fail a classification.

import { appendFile, readFile, mkdir } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { ClassificationMethodSchema } from '../types/classification.js';

export const ClassificationLogEntrySchema = z.object({
  /** ISO 8601 timestamp */
  timestamp: z.string(),
  event: z.enum(['classify', 'resolve']),
  /** Normalized query text */
  input: z.string(),
  tenant: z.string().nullable(),
  intent: z.string(),
  confidence: z.number(),
  method: ClassificationMethodSchema,
  source: ClassificationMethodSchema.nullable(),
  lowCertainty: z.boolean(),
  novel: z.boolean(),
  modelVersion: z.string().nullable(),
  latencyMs: z.number(),
  needsClarification: z.boolean(),
  sessionId: z.string().nullable(),
  /** Router states visited; empty for resolve events */
  trace: z.array(z.string()),
});

export type ClassificationLogEntry = z.infer<typeof ClassificationLogEntrySchema>;

/**
 * @example
 * ```ts
 * const audit = new ClassificationLogger('.intent-cascade');
 * audit.log(entry);
 * await audit.flush();
 * const entries = await audit.readAll();
 * ```
 */
export class ClassificationLogger {
  private readonly logDir: string;
  private readonly logFile: string;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(logDir: string) {
    this.logDir = logDir;
    this.logFile = join(logDir, 'classification-log.jsonl');
  }

  get path(): string {
    return this.logFile;
  }

  /**
   * Queue one entry. Never throws; a failed write is reported on stderr.
   */
  log(entry: ClassificationLogEntry): void {
    this.writeQueue = this.writeQueue.then(async () => {
      try {
        await mkdir(this.logDir, { recursive: true });
        await appendFile(this.logFile, JSON.stringify(entry) + '\n', 'utf-8');
      } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err);
        process.stderr.write(`[audit] Failed to log: ${message}\n`);
      }
    });
  }

  async flush(): Promise<void> {
    await this.writeQueue;
  }

  /**
   * Every well-formed entry; malformed lines are skipped and a missing
   * file reads as empty.
   */
  async readAll(): Promise<ClassificationLogEntry[]> {
    let content: string;
    try {
      content = await readFile(this.logFile, 'utf-8');
    } catch (err: unknown) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
        return [];
      }
      throw err;
    }

    const entries: ClassificationLogEntry[] = [];
    for (const line of content.split('\n')) {
      const trimmed = line.trim();
      if (!trimmed) continue;

      let raw: unknown;
      try {
        raw = JSON.parse(trimmed);
      } catch {
        continue;
      }
      const parsed = ClassificationLogEntrySchema.safeParse(raw);
      if (parsed.success) entries.push(parsed.data);
    }
    return entries;
  }
}
