/**
 * Domain types for the expense dashboard.
 * Pure data: no HTTP, no DB, no IO.
 */

/** Stored expense as delivered by the record source */
export interface ExpenseRecord {
  id: string;
  description: string;
  name: string;
  amount: unknown;            // numbers and numeric strings count, anything else is skipped
  category: string;
  created_at: string;         // ISO-8601, may end in a literal Z
}

/** Element of a record batch; the source may hand over holes */
export type MaybeRecord = ExpenseRecord | null | undefined;

export type Granularity = 'daily' | 'weekly' | 'monthly';

/** YYYY-MM-DD, YYYY-Www or YYYY-MM depending on granularity */
export type BucketKey = string;

export type SeriesPoint = [key: BucketKey, total: number];
export type TimeSeries = SeriesPoint[];
export type CategorySeries = Record<string, TimeSeries>;

export interface GranularitySeries {
  total: TimeSeries;
  by_category: CategorySeries;
}

/** Wire shape consumed by the presentation layer; field names are part of it */
export interface DashboardSummary {
  total: number;
  category_totals: Record<string, number>;
  top_categories: [category: string, total: number][];
  time_series: Record<Granularity, GranularitySeries>;
  recent_expenses: ExpenseRecord[];
  avg_daily_expense: number;
  current_month_total: number;
  mom_growth: number;
}

export type FieldResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string };

export type SkipStage = 'totals' | Granularity;

/** A record left out of an aggregation, with the field that failed */
export interface RecordSkip {
  id: unknown;
  field: 'record' | 'amount' | 'category' | 'created_at';
  reason: string;
  stage: SkipStage;
}

/**
 * Observation hooks. The domain never logs; whoever calls it decides what a
 * skipped record or a degraded section is worth.
 *
 * Hooks must not throw. A throwing `onSkip` counts as a failure of the section
 * being built; a throwing `onError` propagates to the caller.
 */
export interface AggregationHooks {
  onSkip?: (skip: RecordSkip) => void;
  onError?: (error: unknown, scope: string) => void;
}

export const LOOKBACK: Record<Granularity, number> = {
  daily: 30,
  weekly: 12,
  monthly: 12,
};

export const GRANULARITIES: readonly Granularity[] = ['daily', 'weekly', 'monthly'];
