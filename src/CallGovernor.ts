// src/CallGovernor.ts
// Paces outbound calls against a local per-minute ceiling and the remote
// source's self-reported quota.

import type { Clock } from './clock';
import { systemClock } from './clock';
import type { Logger } from './logger';
import { silentLogger } from './logger';
import { describeError } from './errors';

const WINDOW_MS = 60_000;

export interface QuotaSnapshot {
  limit: number;
  remaining: number;
  resetAt: Date;
}

/** Anything that can report the remote quota (the GitHub rateLimit query, a fake). */
export interface QuotaSource {
  fetchQuota(): Promise<QuotaSnapshot>;
}

export interface CallGovernorOptions {
  maxPerMinute?: number;
  safetyThreshold?: number;
  quotaCacheTtlMs?: number;
  resetBufferMs?: number;
  clock?: Clock;
  logger?: Logger;
}

export class CallGovernor {
  private readonly maxPerMinute: number;
  private readonly safetyThreshold: number;
  private readonly quotaCacheTtlMs: number;
  private readonly resetBufferMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  private readonly callTimes: number[] = [];
  private cachedQuota: { snapshot: QuotaSnapshot; fetchedAt: number } | null = null;
  private lastKnownQuota: QuotaSnapshot | null = null;
  private admitted = 0;

  constructor(
    private readonly quotaSource: QuotaSource | null,
    options: CallGovernorOptions = {}
  ) {
    this.maxPerMinute = options.maxPerMinute ?? 25;
    this.safetyThreshold = options.safetyThreshold ?? 100;
    this.quotaCacheTtlMs = options.quotaCacheTtlMs ?? 10_000;
    this.resetBufferMs = options.resetBufferMs ?? 1_000;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Resolves once it is safe to issue one outbound call, and records that call.
   */
  async admitCall(): Promise<void> {
    await this.waitForWindowSlot();
    await this.waitForRemoteQuota();
    this.callTimes.push(this.clock.now());
    this.admitted += 1;
  }

  /** Number of calls admitted so far. */
  get callCount(): number {
    return this.admitted;
  }

  /** Last quota seen from the remote source, if any query has succeeded. */
  get quotaSnapshot(): QuotaSnapshot | null {
    return this.lastKnownQuota;
  }

  /** Calls recorded in the current sliding window. */
  get callsInWindow(): number {
    this.pruneWindow(this.clock.now());
    return this.callTimes.length;
  }

  // ============================================================================
  // LOCAL CEILING
  // ============================================================================

  private async waitForWindowSlot(): Promise<void> {
    let now = this.clock.now();
    this.pruneWindow(now);

    while (this.callTimes.length >= this.maxPerMinute) {
      const waitMs = this.callTimes[0] + WINDOW_MS - now;
      this.logger.debug(
        `[Governor] ${this.callTimes.length} calls in the last minute; pausing ${Math.ceil(waitMs / 1000)}s`
      );
      await this.clock.sleep(waitMs);
      now = this.clock.now();
      this.pruneWindow(now);
    }
  }

  private pruneWindow(now: number): void {
    while (this.callTimes.length > 0 && now - this.callTimes[0] >= WINDOW_MS) {
      this.callTimes.shift();
    }
  }

  // ============================================================================
  // REMOTE QUOTA
  // ============================================================================

  private async waitForRemoteQuota(): Promise<void> {
    const quota = await this.readQuota();
    if (quota === null || quota.remaining >= this.safetyThreshold) {
      return;
    }

    const waitMs = Math.max(0, quota.resetAt.getTime() - this.clock.now()) + this.resetBufferMs;
    this.logger.warn(
      `[Governor] Remote quota low (${quota.remaining}/${quota.limit}); waiting ${Math.ceil(waitMs / 1000)}s until reset`
    );
    await this.clock.sleep(waitMs);
    this.cachedQuota = null;
  }

  private async readQuota(): Promise<QuotaSnapshot | null> {
    if (this.quotaSource === null) return null;

    const now = this.clock.now();
    if (this.cachedQuota !== null && now - this.cachedQuota.fetchedAt < this.quotaCacheTtlMs) {
      return this.cachedQuota.snapshot;
    }

    try {
      const snapshot = await this.quotaSource.fetchQuota();
      this.cachedQuota = { snapshot, fetchedAt: this.clock.now() };
      this.lastKnownQuota = snapshot;
      return snapshot;
    } catch (error) {
      // Optimistic: the per-minute ceiling still applies.
      this.logger.debug(`[Governor] Quota query failed (${describeError(error)}); proceeding`);
      this.cachedQuota = null;
      return null;
    }
  }
}
