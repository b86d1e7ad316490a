/**
 * Calendar bucketing on the UTC calendar.
 * Every key produced here sorts lexically in chronological order.
 */
import { LOOKBACK, type BucketKey, type Granularity } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

function assertValid(date: Date): void {
  if (Number.isNaN(date.getTime())) {
    throw new RangeError('Invalid reference instant');
  }
}

/** Midnight UTC of the given instant's calendar day */
function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

/** Days since the Monday of the ISO week (Monday = 0 … Sunday = 6) */
function isoWeekday(date: Date): number {
  return (date.getUTCDay() + 6) % 7;
}

/** YYYY-MM-DD */
export function dayKey(date: Date): BucketKey {
  return `${date.getUTCFullYear()}-${pad2(date.getUTCMonth() + 1)}-${pad2(date.getUTCDate())}`;
}

/** YYYY-MM */
export function monthKey(date: Date): BucketKey {
  return `${date.getUTCFullYear()}-${pad2(date.getUTCMonth() + 1)}`;
}

/**
 * ISO week-numbering year and week, e.g. 2024-12-30 → "2025-W01".
 * The week belongs to the year that contains its Thursday.
 */
export function isoWeekKey(date: Date): BucketKey {
  const day = startOfUtcDay(date);
  const thursday = addDays(day, 3 - isoWeekday(day));
  const year = thursday.getUTCFullYear();
  const dayOfYear = Math.round((thursday.getTime() - Date.UTC(year, 0, 1)) / DAY_MS) + 1;
  const week = Math.ceil(dayOfYear / 7);
  return `${year}-W${pad2(week)}`;
}

/** Bucket key of a single instant for the given granularity */
export function bucketKeyFor(date: Date, granularity: Granularity): BucketKey {
  switch (granularity) {
    case 'daily':
      return dayKey(date);
    case 'weekly':
      return isoWeekKey(date);
    case 'monthly':
      return monthKey(date);
  }
}

function dailyBuckets(reference: Date): BucketKey[] {
  const today = startOfUtcDay(reference);
  const count = LOOKBACK.daily;
  return Array.from({ length: count }, (_, index) => dayKey(addDays(today, index - (count - 1))));
}

function weeklyBuckets(reference: Date): BucketKey[] {
  const today = startOfUtcDay(reference);
  const weekStart = addDays(today, -isoWeekday(today));
  const count = LOOKBACK.weekly;
  return Array.from({ length: count }, (_, index) =>
    isoWeekKey(addDays(weekStart, (index - (count - 1)) * 7)),
  );
}

function monthlyBuckets(reference: Date): BucketKey[] {
  const year = reference.getUTCFullYear();
  const month = reference.getUTCMonth() + 1;
  const count = LOOKBACK.monthly;

  return Array.from({ length: count }, (_, index) => {
    const offset = count - 1 - index;
    let y = year;
    let m = month - offset;
    if (m <= 0) {
      y -= 1;
      m += 12;
    }
    return `${y}-${pad2(m)}`;
  });
}

/**
 * Ordered bucket keys (oldest first) covering the lookback window that ends
 * at `reference`: 30 days, 12 ISO weeks, or 12 months.
 */
export function generateBuckets(reference: Date, granularity: Granularity): BucketKey[] {
  assertValid(reference);
  switch (granularity) {
    case 'daily':
      return dailyBuckets(reference);
    case 'weekly':
      return weeklyBuckets(reference);
    case 'monthly':
      return monthlyBuckets(reference);
  }
}
