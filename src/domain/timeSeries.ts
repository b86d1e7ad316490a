/**
 * Per-bucket totals for one granularity, overall and split by category.
 */
import { bucketKeyFor } from './calendar.js';
import { readAmount, readCategory, readCreatedAt, readRecord } from './records.js';
import type {
  AggregationHooks,
  BucketKey,
  Granularity,
  GranularitySeries,
  MaybeRecord,
  TimeSeries,
} from './types.js';

/** All-zero series over the given keys */
export function zeroSeries(bucketKeys: readonly BucketKey[]): TimeSeries {
  return bucketKeys.map((key): [BucketKey, number] => [key, 0]);
}

function toSeries(bucketKeys: readonly BucketKey[], totals: Map<BucketKey, number>): TimeSeries {
  return bucketKeys.map((key): [BucketKey, number] => [key, totals.get(key) ?? 0]);
}

/** Distinct string categories in encounter order */
function observedCategories(records: readonly MaybeRecord[]): string[] {
  const seen = new Set<string>();
  for (const raw of records) {
    const record = readRecord(raw);
    if (!record.ok) continue;
    const category = readCategory(record.value.category);
    if (category.ok) seen.add(category.value);
  }
  return Array.from(seen);
}

function aggregate(
  records: readonly MaybeRecord[],
  bucketKeys: readonly BucketKey[],
  granularity: Granularity,
  hooks: AggregationHooks,
): GranularitySeries {
  const zeroed = (): Map<BucketKey, number> => new Map(bucketKeys.map((key): [BucketKey, number] => [key, 0]));

  const totals = zeroed();
  const byCategory = new Map<string, Map<BucketKey, number>>();
  for (const category of observedCategories(records)) {
    byCategory.set(category, zeroed());
  }

  for (const raw of records) {
    const row = readRecord(raw);
    if (!row.ok) {
      hooks.onSkip?.({ id: undefined, field: 'record', reason: row.reason, stage: granularity });
      continue;
    }
    const record = row.value;
    const createdAt = readCreatedAt(record.created_at);
    if (!createdAt.ok) {
      hooks.onSkip?.({ id: record.id, field: 'created_at', reason: createdAt.reason, stage: granularity });
      continue;
    }
    const amount = readAmount(record.amount);
    if (!amount.ok) {
      hooks.onSkip?.({ id: record.id, field: 'amount', reason: amount.reason, stage: granularity });
      continue;
    }

    const key = bucketKeyFor(createdAt.value, granularity);
    const current = totals.get(key);
    // outside the lookback window
    if (current === undefined) continue;
    totals.set(key, current + amount.value);

    const category = readCategory(record.category);
    if (!category.ok) continue;
    const series = byCategory.get(category.value);
    if (series) {
      series.set(key, (series.get(key) ?? 0) + amount.value);
    }
  }

  const by_category: Record<string, TimeSeries> = Object.fromEntries(
    Array.from(byCategory, ([category, series]) => [category, toSeries(bucketKeys, series)] as const),
  );

  return { total: toSeries(bucketKeys, totals), by_category };
}

/**
 * Totals per bucket for `granularity`, in the order of `bucketKeys`.
 *
 * Records falling outside the keys are dropped silently; unreadable records
 * are skipped and reported through `hooks.onSkip`. On an unexpected failure
 * the result is the all-zero series over `bucketKeys`, with the same category
 * keys the normal path would have produced.
 */
export function aggregateTimeSeries(
  records: readonly MaybeRecord[],
  bucketKeys: readonly BucketKey[],
  granularity: Granularity,
  hooks: AggregationHooks = {},
): GranularitySeries {
  try {
    return aggregate(records, bucketKeys, granularity, hooks);
  } catch (error) {
    hooks.onError?.(error, `${granularity} series`);
    const by_category: Record<string, TimeSeries> = Object.fromEntries(
      observedCategories(records).map((category) => [category, zeroSeries(bucketKeys)] as const),
    );
    return { total: zeroSeries(bucketKeys), by_category };
  }
}
