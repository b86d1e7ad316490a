/**
 * Dashboard composition.
 * Records + reference instant in, one summary out.
 */
import { generateBuckets, monthKey } from './calendar.js';
import { totalsByCategory, topN, DEFAULT_TOP_N } from './categories.js';
import { readCreatedAt, readRecord } from './records.js';
import { aggregateTimeSeries } from './timeSeries.js';
import {
  LOOKBACK,
  type AggregationHooks,
  type DashboardSummary,
  type ExpenseRecord,
  type Granularity,
  type GranularitySeries,
  type MaybeRecord,
  type TimeSeries,
} from './types.js';

export const RECENT_LIMIT = 5;

/** Canonical summary for no data, or when composition fails */
export function emptyDashboard(): DashboardSummary {
  return {
    total: 0,
    category_totals: {},
    top_categories: [],
    time_series: {
      daily: { total: [], by_category: {} },
      weekly: { total: [], by_category: {} },
      monthly: { total: [], by_category: {} },
    },
    recent_expenses: [],
    avg_daily_expense: 0,
    current_month_total: 0,
    mom_growth: 0,
  };
}

function seriesSum(series: TimeSeries): number {
  return series.reduce((sum, [, total]) => sum + total, 0);
}

/**
 * Newest first; records without a readable timestamp go last, in input order.
 * Holes in the batch are left out.
 */
export function recentExpenses(records: readonly MaybeRecord[], limit: number = RECENT_LIMIT): ExpenseRecord[] {
  const stamped: { record: ExpenseRecord; time: number }[] = [];
  for (const raw of records) {
    const row = readRecord(raw);
    if (!row.ok) continue;
    const createdAt = readCreatedAt(row.value.created_at);
    stamped.push({ record: row.value, time: createdAt.ok ? createdAt.value.getTime() : Number.NEGATIVE_INFINITY });
  }
  return stamped
    .sort((a, b) => {
      if (a.time === b.time) return 0;
      return a.time < b.time ? 1 : -1;
    })
    .slice(0, limit)
    .map(({ record }) => record);
}

/** Sum of the daily window divided by its fixed length */
export function averageDaily(daily: TimeSeries): number {
  if (daily.length === 0) return 0;
  return seriesSum(daily) / LOOKBACK.daily;
}

export function currentMonthTotal(monthly: TimeSeries, reference: Date): number {
  const key = monthKey(reference);
  const entry = monthly.find(([bucket]) => bucket === key);
  return entry ? entry[1] : 0;
}

/**
 * Percentage change between the last two monthly buckets.
 * 0 when there are fewer than two buckets or the earlier one is 0. An empty
 * month and a month with no spending look the same here.
 */
export function monthOverMonthGrowth(monthly: TimeSeries): number {
  if (monthly.length < 2) return 0;
  const [, latest] = monthly[monthly.length - 1];
  const [, previous] = monthly[monthly.length - 2];
  if (previous <= 0) return 0;
  return ((latest - previous) / previous) * 100;
}

function seriesFor(
  records: readonly MaybeRecord[],
  reference: Date,
  granularity: Granularity,
  hooks: AggregationHooks,
): GranularitySeries {
  return aggregateTimeSeries(records, generateBuckets(reference, granularity), granularity, hooks);
}

function compose(
  records: readonly MaybeRecord[],
  reference: Date,
  hooks: AggregationHooks,
): DashboardSummary {
  if (Number.isNaN(reference.getTime())) {
    throw new RangeError('Invalid reference instant');
  }

  const category_totals = totalsByCategory(records, hooks);
  const total = Object.values(category_totals).reduce((sum, amount) => sum + amount, 0);

  const daily = seriesFor(records, reference, 'daily', hooks);
  const weekly = seriesFor(records, reference, 'weekly', hooks);
  const monthly = seriesFor(records, reference, 'monthly', hooks);

  return {
    total,
    category_totals,
    top_categories: topN(category_totals, DEFAULT_TOP_N),
    time_series: { daily, weekly, monthly },
    recent_expenses: recentExpenses(records),
    avg_daily_expense: averageDaily(daily.total),
    current_month_total: currentMonthTotal(monthly.total, reference),
    mom_growth: monthOverMonthGrowth(monthly.total),
  };
}

/**
 * Build the dashboard summary for `records` as seen at `reference`.
 *
 * Empty input gives {@link emptyDashboard}. So does any failure: the error is
 * handed to `hooks.onError` with scope `"dashboard"` and the caller still gets
 * a structurally complete summary. Only a throwing `onError` escapes.
 */
export function composeDashboard(
  records: readonly MaybeRecord[] | null | undefined,
  reference: Date,
  hooks: AggregationHooks = {},
): DashboardSummary {
  if (!records || records.length === 0) return emptyDashboard();
  try {
    return compose(records, reference, hooks);
  } catch (error) {
    hooks.onError?.(error, 'dashboard');
    return emptyDashboard();
  }
}
