/**
 * Per-transition reliability statistics.
 *
 * The tracker observes executions and, as a cost provider, makes the path
 * finder prefer transitions that fail less often:
 *
 *   multiplier = clamp(1 + failureRate × (penalty − 1), min, max)
 *   cost       = baseCost × multiplier
 */

import { createNoOpLogger, type Logger } from '../logging/logger.js';
import type { CostProvider, ExecutionObserver } from './callbacks.js';

export interface TransitionStats {
  transitionId: string;
  successCount: number;
  failureCount: number;
  totalTimeMs: number;
  lastSuccessAt?: number;
  lastFailureAt?: number;
}

export interface ReliabilityOptions {
  /** Multiplier reached at a 100% failure rate. */
  failurePenalty?: number;
  minMultiplier?: number;
  maxMultiplier?: number;
  logger?: Logger;
  now?: () => number;
}

export interface ReliabilitySummary {
  totalTransitions: number;
  totalAttempts: number;
  totalSuccesses: number;
  totalFailures: number;
  overallSuccessRate: number;
}

export function totalAttempts(stats: TransitionStats): number {
  return stats.successCount + stats.failureCount;
}

/**
 * 1.0 when there is no history.
 */
export function successRate(stats: TransitionStats): number {
  const attempts = totalAttempts(stats);
  return attempts === 0 ? 1 : stats.successCount / attempts;
}

export function averageTimeMs(stats: TransitionStats): number {
  const attempts = totalAttempts(stats);
  return attempts === 0 ? 0 : stats.totalTimeMs / attempts;
}

export class ReliabilityTracker implements CostProvider, ExecutionObserver {
  private readonly stats = new Map<string, TransitionStats>();
  private readonly failurePenalty: number;
  private readonly minMultiplier: number;
  private readonly maxMultiplier: number;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: ReliabilityOptions = {}) {
    this.failurePenalty = options.failurePenalty ?? 2;
    this.minMultiplier = options.minMultiplier ?? 1;
    this.maxMultiplier = options.maxMultiplier ?? 10;
    this.logger = options.logger ?? createNoOpLogger();
    this.now = options.now ?? Date.now;
    if (this.minMultiplier > this.maxMultiplier) {
      throw new RangeError(
        `minMultiplier (${this.minMultiplier}) exceeds maxMultiplier (${this.maxMultiplier})`
      );
    }
  }

  getStats(transitionId: string): TransitionStats {
    const existing = this.stats.get(transitionId);
    if (existing) return existing;
    const created: TransitionStats = {
      transitionId,
      successCount: 0,
      failureCount: 0,
      totalTimeMs: 0,
    };
    this.stats.set(transitionId, created);
    return created;
  }

  record(transitionId: string, success: boolean, elapsedMs: number): void {
    if (success) {
      this.recordSuccess(transitionId, elapsedMs);
    } else {
      this.recordFailure(transitionId, elapsedMs);
    }
  }

  recordSuccess(transitionId: string, elapsedMs = 0): void {
    const stats = this.getStats(transitionId);
    stats.successCount += 1;
    stats.totalTimeMs += elapsedMs;
    stats.lastSuccessAt = this.now();
    this.logger.debug('Transition succeeded', {
      transitionId,
      successRate: successRate(stats),
    });
  }

  recordFailure(transitionId: string, elapsedMs = 0): void {
    const stats = this.getStats(transitionId);
    stats.failureCount += 1;
    stats.totalTimeMs += elapsedMs;
    stats.lastFailureAt = this.now();
    this.logger.warn('Transition failed', {
      transitionId,
      successRate: successRate(stats),
    });
  }

  getDynamicCost(transitionId: string, baseCost: number): number {
    const stats = this.stats.get(transitionId);
    if (!stats || totalAttempts(stats) === 0) return baseCost;

    const failureRate = 1 - successRate(stats);
    const multiplier = Math.min(
      this.maxMultiplier,
      Math.max(this.minMultiplier, 1 + failureRate * (this.failurePenalty - 1))
    );
    return baseCost * multiplier;
  }

  reset(transitionId?: string): void {
    if (transitionId === undefined) {
      this.stats.clear();
      this.logger.info('Reset all transition statistics');
    } else if (this.stats.delete(transitionId)) {
      this.logger.info('Reset transition statistics', { transitionId });
    }
  }

  summary(): ReliabilitySummary {
    let attempts = 0;
    let successes = 0;
    let failures = 0;
    for (const stats of this.stats.values()) {
      attempts += totalAttempts(stats);
      successes += stats.successCount;
      failures += stats.failureCount;
    }
    return {
      totalTransitions: this.stats.size,
      totalAttempts: attempts,
      totalSuccesses: successes,
      totalFailures: failures,
      overallSuccessRate: attempts > 0 ? successes / attempts : 0,
    };
  }

  leastReliable(limit = 5): TransitionStats[] {
    return this.withHistory()
      .sort((a, b) => successRate(a) - successRate(b))
      .slice(0, limit);
  }

  mostReliable(limit = 5): TransitionStats[] {
    return this.withHistory()
      .sort((a, b) => successRate(b) - successRate(a))
      .slice(0, limit);
  }

  private withHistory(): TransitionStats[] {
    return Array.from(this.stats.values()).filter((s) => totalAttempts(s) > 0);
  }
}
