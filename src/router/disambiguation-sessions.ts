/**
 * Disambiguation sessions: the continuation of a request suspended at
 * DISAMBIGUATE, keyed by session id. Nothing waits on a session; Resolve
 * looks it up and finishes the request.
 *
 * A session past its deadline is still resolvable (to its top candidate)
 * until the sweeper removes it one further timeout later.
 */

import { randomUUID } from 'crypto';
import type { DisambiguationOption } from '../types/classification.js';

export interface Candidate {
  label: string;
  confidence: number;
}

export interface DisambiguationSession {
  readonly id: string;
  readonly normalized: string;
  readonly cacheKey: string;
  readonly tenant?: string;
  /** Ranked candidates, best first */
  readonly candidates: readonly Candidate[];
  readonly options: readonly DisambiguationOption[];
  readonly layer: 'fast-model' | 'embedding';
  readonly modelVersion: string | null;
  readonly createdAt: number;
  readonly expiresAt: number;
}

export type NewSession = Omit<DisambiguationSession, 'id' | 'createdAt' | 'expiresAt'>;

export interface SessionStoreOptions {
  /** Time the user has to answer (default: 5 minutes) */
  timeoutMs?: number;
  now?: () => number;
}

export class DisambiguationSessionStore {
  private sessions = new Map<string, DisambiguationSession>();
  private timeoutMs: number;
  private readonly now: () => number;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(options: SessionStoreOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 5 * 60 * 1000;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.sessions.size;
  }

  open(input: NewSession): DisambiguationSession {
    const createdAt = this.now();
    const session: DisambiguationSession = Object.freeze({
      ...input,
      id: randomUUID(),
      createdAt,
      expiresAt: createdAt + this.timeoutMs,
    });
    this.sessions.set(session.id, session);
    return session;
  }

  get(id: string): { session: DisambiguationSession; expired: boolean } | undefined {
    const session = this.sessions.get(id);
    if (!session) return undefined;
    return { session, expired: session.expiresAt <= this.now() };
  }

  close(id: string): boolean {
    return this.sessions.delete(id);
  }

  /**
   * Remove sessions that expired more than one timeout ago.
   *
   * @returns The removed sessions
   */
  sweep(): DisambiguationSession[] {
    const cutoff = this.now() - this.timeoutMs;
    const removed: DisambiguationSession[] = [];
    for (const [id, session] of this.sessions) {
      if (session.expiresAt <= cutoff) {
        this.sessions.delete(id);
        removed.push(session);
      }
    }
    return removed;
  }

  /**
   * Sweep on an interval. The timer is unref'd so it never keeps the
   * process alive.
   */
  startSweeper(intervalMs: number, onSwept?: (removed: DisambiguationSession[]) => void): void {
    this.stopSweeper();
    this.timer = setInterval(() => {
      const removed = this.sweep();
      if (removed.length > 0) onSwept?.(removed);
    }, intervalMs);
    this.timer.unref();
  }

  stopSweeper(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  configure(options: { timeoutMs?: number }): void {
    this.timeoutMs = options.timeoutMs ?? this.timeoutMs;
  }
}
