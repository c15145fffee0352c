import { describe, expect, it } from 'vitest';
import type { QuotaSnapshot, QuotaSource } from './CallGovernor';
import { CallGovernor } from './CallGovernor';
import { FakeClock } from './testing/fakes';

class SequenceQuota implements QuotaSource {
  fetches = 0;
  constructor(private readonly answers: Array<QuotaSnapshot | Error>) {}

  async fetchQuota(): Promise<QuotaSnapshot> {
    const answer = this.answers[Math.min(this.fetches, this.answers.length - 1)];
    this.fetches += 1;
    if (answer instanceof Error) throw answer;
    return answer;
  }
}

describe('CallGovernor', () => {
  it('admits up to the per-minute ceiling without waiting', async () => {
    const clock = new FakeClock();
    const governor = new CallGovernor(null, { maxPerMinute: 25, clock });

    for (let i = 0; i < 25; i += 1) {
      await governor.admitCall();
    }

    expect(clock.sleeps).toEqual([]);
    expect(governor.callCount).toBe(25);
    expect(governor.callsInWindow).toBe(25);
  });

  it('suspends until the oldest call leaves the 60s window', async () => {
    const clock = new FakeClock();
    const governor = new CallGovernor(null, { maxPerMinute: 3, clock });

    await governor.admitCall();
    clock.advance(10_000);
    await governor.admitCall();
    await governor.admitCall();
    await governor.admitCall();

    // Oldest call at t0 ages out at t0+60s; the fourth call arrives at t0+10s.
    expect(clock.sleeps).toEqual([50_000]);
    expect(governor.callCount).toBe(4);
  });

  it('waits for the remote reset plus buffer when quota is below the safety threshold', async () => {
    const clock = new FakeClock();
    const start = clock.now();
    const quota = new SequenceQuota([
      { limit: 5000, remaining: 40, resetAt: new Date(start + 120_000) },
      { limit: 5000, remaining: 5000, resetAt: new Date(start + 3_720_000) },
    ]);
    const governor = new CallGovernor(quota, { safetyThreshold: 100, resetBufferMs: 1000, clock });

    await governor.admitCall();

    expect(clock.sleeps).toEqual([121_000]);

    // The cache was invalidated after the wait, so the next call re-queries.
    await governor.admitCall();
    expect(quota.fetches).toBe(2);
    expect(governor.quotaSnapshot?.remaining).toBe(5000);
  });

  it('caches the quota answer for the configured TTL', async () => {
    const clock = new FakeClock();
    const quota = new SequenceQuota([{ limit: 5000, remaining: 4000, resetAt: new Date(clock.now() + 3_600_000) }]);
    const governor = new CallGovernor(quota, { quotaCacheTtlMs: 10_000, clock });

    await governor.admitCall();
    clock.advance(9_999);
    await governor.admitCall();
    expect(quota.fetches).toBe(1);

    clock.advance(1);
    await governor.admitCall();
    expect(quota.fetches).toBe(2);
  });

  it('proceeds optimistically when the quota query fails', async () => {
    const clock = new FakeClock();
    const quota = new SequenceQuota([new Error('quota endpoint down')]);
    const governor = new CallGovernor(quota, { maxPerMinute: 2, clock });

    await governor.admitCall();
    await governor.admitCall();
    expect(clock.sleeps).toEqual([]);
    expect(governor.quotaSnapshot).toBeNull();

    // The local ceiling still applies.
    await governor.admitCall();
    expect(clock.sleeps).toEqual([60_000]);
  });
});
