/**
 * Atomically replaceable reference to the active model.
 *
 * Readers call `current()` once per request and keep that snapshot; the
 * trainer publishes by a single assignment, so a request never observes a
 * half-swapped model.
 */

import { EventEmitter } from 'events';
import type natural from 'natural';
import type { ModelVersion } from '../types/learning.js';
import { restoreBayesClassifier } from './bayes-classifier.js';

/** A model version plus the classifier restored from it. */
export interface CompiledModel {
  readonly version: ModelVersion;
  readonly classifier: natural.BayesClassifier;
  readonly labels: ReadonlySet<string>;
}

export function compileModel(version: ModelVersion): CompiledModel {
  return Object.freeze({
    version,
    classifier: restoreBayesClassifier(version.parameters.classifier),
    labels: new Set(version.labels),
  });
}

/**
 * Events:
 * - `swap` (next: CompiledModel, previous: CompiledModel | null)
 * - `unavailable` (reason: string)
 */
export class ModelHandle extends EventEmitter {
  private model: CompiledModel | null = null;
  private reason: string = 'no model has been trained yet';

  current(): CompiledModel | null {
    return this.model;
  }

  /** Why `current()` is null; undefined while a model is active. */
  get unavailableReason(): string | undefined {
    return this.model ? undefined : this.reason;
  }

  get versionId(): string | null {
    return this.model?.version.id ?? null;
  }

  publish(version: ModelVersion): CompiledModel {
    const next = compileModel(version);
    const previous = this.model;
    this.model = next;
    this.emit('swap', next, previous);
    return next;
  }

  /** Drop the active model, e.g. after the persisted one failed to load. */
  markUnavailable(reason: string): void {
    this.model = null;
    this.reason = reason;
    this.emit('unavailable', reason);
  }
}
