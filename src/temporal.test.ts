import { describe, expect, it } from 'vitest';
import { computeTemporalMetadata } from './temporal';

const NOW = new Date('2024-06-01T00:00:00Z');

describe('computeTemporalMetadata', () => {
  it('derives age, activity and recency flags', () => {
    expect(computeTemporalMetadata('2024-01-01T00:00:00Z', '2024-05-20T00:00:00Z', NOW)).toEqual({
      createdAt: '2024-01-01T00:00:00.000Z',
      pushedAt: '2024-05-20T00:00:00.000Z',
      ageDays: 152,
      ageMonths: 5.1,
      daysSincePush: 12,
      isActive: true,
      isRecent: true,
      isNew: true,
      isLegacy: false,
    });
  });

  it('marks old, quiet repositories as legacy and inactive', () => {
    const meta = computeTemporalMetadata('2020-06-01T00:00:00Z', '2023-01-01T00:00:00Z', NOW);
    expect(meta.isLegacy).toBe(true);
    expect(meta.isNew).toBe(false);
    expect(meta.isActive).toBe(false);
  });

  it('falls back to the creation time when there is no push', () => {
    const meta = computeTemporalMetadata('2024-05-01T00:00:00Z', null, NOW);
    expect(meta.pushedAt).toBe('2024-05-01T00:00:00.000Z');
    expect(meta.daysSincePush).toBe(31);
  });

  it('uses the configured activity window', () => {
    const pushed = '2024-04-01T00:00:00Z'; // 61 days before NOW
    expect(computeTemporalMetadata('2023-01-01T00:00:00Z', pushed, NOW, 90).isActive).toBe(true);
    expect(computeTemporalMetadata('2023-01-01T00:00:00Z', pushed, NOW, 60).isActive).toBe(false);
  });
});
