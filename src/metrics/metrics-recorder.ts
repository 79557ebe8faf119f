/**
 * In-process counters and latency window behind `engine.getMetrics()`.
 */

import { mean, quantile } from 'simple-statistics';
import type { ClassificationMethod, ClassificationResult } from '../types/classification.js';
import type { RouterConfig } from '../config/schema.js';
import type { Logger } from '../config/logger.js';
import type { TrainerStats } from '../learning/background-trainer.js';

type MetricsConfig = RouterConfig['metrics'];

export type MetricsAlert = 'training-paused' | 'high-fallback-rate';

export interface LatencySummary {
  count: number;
  mean: number;
  p50: number;
  p95: number;
  p99: number;
}

export interface MetricsSnapshot {
  /** Classify calls that produced an answer or a prompt */
  requests: number;
  byMethod: Record<ClassificationMethod, number>;
  cacheHitRate: number;
  disambiguationRate: number;
  /** LLM answers plus substituted answers */
  fallbackRate: number;
  disambiguation: { prompted: number; resolved: number; timedOut: number };
  latency: LatencySummary;
  training: TrainerStats & { activeModelVersion: string | null };
  alerts: MetricsAlert[];
}

function emptyMethodCounts(): Record<ClassificationMethod, number> {
  return {
    cache: 0,
    pattern: 0,
    'fast-model': 0,
    embedding: 0,
    llm: 0,
    'user-resolved': 0,
  };
}

export class MetricsRecorder {
  private requests = 0;
  private fallbacks = 0;
  private prompted = 0;
  private resolved = 0;
  private timedOut = 0;
  private byMethod = emptyMethodCounts();
  private latencies: number[] = [];
  private fallbackAlertActive = false;

  constructor(
    private config: MetricsConfig,
    private readonly logger: Logger = console,
  ) {}

  configure(config: MetricsConfig): void {
    this.config = config;
    if (this.latencies.length > config.latencyWindow) {
      this.latencies = this.latencies.slice(-config.latencyWindow);
    }
  }

  /** An accepted classify answer. */
  recordResult(result: ClassificationResult, substituted: boolean): void {
    this.requests++;
    this.byMethod[result.method]++;
    if (result.method === 'llm' || substituted) {
      this.fallbacks++;
    }
    this.pushLatency(result.latencyMs);
    this.checkFallbackRate();
  }

  /** A classify call that ended in a disambiguation prompt. */
  recordPrompt(latencyMs: number): void {
    this.requests++;
    this.prompted++;
    this.pushLatency(latencyMs);
    this.checkFallbackRate();
  }

  /** A resolve call; not a new request. */
  recordResolution(timedOut: boolean): void {
    if (timedOut) {
      this.timedOut++;
    } else {
      this.resolved++;
      this.byMethod['user-resolved']++;
    }
  }

  /** Sessions removed by the sweeper without ever being resolved. */
  recordExpired(count: number): void {
    this.timedOut += count;
  }

  snapshot(training: TrainerStats, activeModelVersion: string | null): MetricsSnapshot {
    const alerts: MetricsAlert[] = [];
    if (training.paused) alerts.push('training-paused');
    if (this.fallbackRateExceeded()) alerts.push('high-fallback-rate');

    return {
      requests: this.requests,
      byMethod: { ...this.byMethod },
      cacheHitRate: this.rate(this.byMethod.cache),
      disambiguationRate: this.rate(this.prompted),
      fallbackRate: this.rate(this.fallbacks),
      disambiguation: { prompted: this.prompted, resolved: this.resolved, timedOut: this.timedOut },
      latency: this.latencySummary(),
      training: { ...training, activeModelVersion },
      alerts,
    };
  }

  reset(): void {
    this.requests = 0;
    this.fallbacks = 0;
    this.prompted = 0;
    this.resolved = 0;
    this.timedOut = 0;
    this.byMethod = emptyMethodCounts();
    this.latencies = [];
    this.fallbackAlertActive = false;
  }

  private rate(count: number): number {
    return this.requests > 0 ? count / this.requests : 0;
  }

  private pushLatency(latencyMs: number): void {
    this.latencies.push(latencyMs);
    if (this.latencies.length > this.config.latencyWindow) {
      this.latencies.shift();
    }
  }

  private latencySummary(): LatencySummary {
    if (this.latencies.length === 0) {
      return { count: 0, mean: 0, p50: 0, p95: 0, p99: 0 };
    }
    return {
      count: this.latencies.length,
      mean: mean(this.latencies),
      p50: quantile(this.latencies, 0.5),
      p95: quantile(this.latencies, 0.95),
      p99: quantile(this.latencies, 0.99),
    };
  }

  private fallbackRateExceeded(): boolean {
    return (
      this.requests >= this.config.minRequestsForAlert &&
      this.rate(this.fallbacks) > this.config.fallbackRateAlert
    );
  }

  private checkFallbackRate(): void {
    const exceeded = this.fallbackRateExceeded();
    if (exceeded && !this.fallbackAlertActive) {
      this.logger.warn(
        `[metrics] Fallback rate ${this.rate(this.fallbacks).toFixed(2)} above ${this.config.fallbackRateAlert}`,
      );
    }
    this.fallbackAlertActive = exceeded;
  }
}
