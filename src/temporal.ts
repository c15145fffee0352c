// src/temporal.ts
// Per-repository temporal metadata, derived from creation and last-push timestamps.

import type { TemporalMetadata } from './model';

const DAY_MS = 24 * 60 * 60 * 1000;
const DAYS_PER_MONTH = 30;

export const RECENT_MONTHS = 6;
export const NEW_MONTHS = 12;
export const LEGACY_MONTHS = 24;
export const DEFAULT_ACTIVE_WINDOW_DAYS = 90;

/**
 * Pure: the same timestamps and `now` always give the same metadata.
 * A missing or unparsable push timestamp falls back to the creation timestamp.
 */
export function computeTemporalMetadata(
  createdAt: string,
  pushedAt: string | null,
  now: Date = new Date(),
  activeWindowDays: number = DEFAULT_ACTIVE_WINDOW_DAYS
): TemporalMetadata {
  const created = parseTimestamp(createdAt) ?? now;
  const pushed = (pushedAt ? parseTimestamp(pushedAt) : null) ?? created;

  const ageDays = wholeDaysBetween(created, now);
  const ageMonths = ageDays / DAYS_PER_MONTH;
  const daysSincePush = wholeDaysBetween(pushed, now);

  return {
    createdAt: created.toISOString(),
    pushedAt: pushed.toISOString(),
    ageDays,
    ageMonths: Math.round(ageMonths * 10) / 10,
    daysSincePush,
    isActive: daysSincePush < activeWindowDays,
    isRecent: ageMonths <= RECENT_MONTHS,
    isNew: ageMonths <= NEW_MONTHS,
    isLegacy: ageMonths > LEGACY_MONTHS,
  };
}

function parseTimestamp(value: string): Date | null {
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function wholeDaysBetween(from: Date, to: Date): number {
  return Math.max(0, Math.floor((to.getTime() - from.getTime()) / DAY_MS));
}
