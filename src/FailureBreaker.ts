// src/FailureBreaker.ts
// Circuit breaker for one class of risky outbound operation.

import type { Clock } from './clock';
import { systemClock } from './clock';
import type { Logger } from './logger';
import { silentLogger } from './logger';
import { BreakerOpenError } from './errors';

export type CircuitStatus = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitState {
  status: CircuitStatus;
  consecutiveFailures: number;
  lastFailureAt: number | null;
}

export interface FailureBreakerOptions {
  name?: string;
  failureThreshold?: number;
  cooldownMs?: number;
  clock?: Clock;
  logger?: Logger;
}

/**
 * CLOSED -> OPEN after `failureThreshold` consecutive failures.
 * OPEN -> HALF_OPEN once `cooldownMs` has elapsed; exactly one trial call is let through.
 * HALF_OPEN -> CLOSED on success, or back to OPEN (with a fresh cooldown) on failure.
 *
 * Errors from the guarded operation always propagate to the caller.
 */
export class FailureBreaker {
  readonly name: string;
  private readonly failureThreshold: number;
  private readonly cooldownMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  private status: CircuitStatus = 'CLOSED';
  private consecutiveFailures = 0;
  private lastFailureAt: number | null = null;
  private trialInFlight = false;

  constructor(options: FailureBreakerOptions = {}) {
    this.name = options.name ?? 'default';
    this.failureThreshold = options.failureThreshold ?? 5;
    this.cooldownMs = options.cooldownMs ?? 60_000;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  get state(): CircuitState {
    return {
      status: this.status,
      consecutiveFailures: this.consecutiveFailures,
      lastFailureAt: this.lastFailureAt,
    };
  }

  async guard<T>(operation: () => Promise<T>): Promise<T> {
    this.admit();

    try {
      const result = await operation();
      this.onSuccess();
      return result;
    } catch (error) {
      this.onFailure();
      throw error;
    } finally {
      this.trialInFlight = false;
    }
  }

  reset(): void {
    this.status = 'CLOSED';
    this.consecutiveFailures = 0;
    this.lastFailureAt = null;
    this.trialInFlight = false;
  }

  private admit(): void {
    if (this.status === 'OPEN') {
      const elapsed = this.clock.now() - (this.lastFailureAt ?? 0);
      if (elapsed < this.cooldownMs) {
        throw new BreakerOpenError(this.name, this.cooldownMs - elapsed);
      }
      this.status = 'HALF_OPEN';
      this.logger.info(`[Breaker] ${this.name}: cooldown elapsed, probing recovery`);
    }

    if (this.status === 'HALF_OPEN') {
      if (this.trialInFlight) {
        throw new BreakerOpenError(this.name, 0);
      }
      this.trialInFlight = true;
    }
  }

  private onSuccess(): void {
    if (this.status === 'HALF_OPEN') {
      this.logger.success(`[Breaker] ${this.name}: recovered, circuit closed`);
    }
    this.status = 'CLOSED';
    this.consecutiveFailures = 0;
  }

  private onFailure(): void {
    this.consecutiveFailures += 1;
    this.lastFailureAt = this.clock.now();

    if (this.status === 'HALF_OPEN') {
      this.status = 'OPEN';
      this.logger.warn(`[Breaker] ${this.name}: trial call failed, circuit re-opened`);
      return;
    }

    if (this.status === 'CLOSED' && this.consecutiveFailures >= this.failureThreshold) {
      this.status = 'OPEN';
      this.logger.warn(
        `[Breaker] ${this.name}: ${this.consecutiveFailures} consecutive failures, circuit opened for ${Math.round(this.cooldownMs / 1000)}s`
      );
    }
  }
}
