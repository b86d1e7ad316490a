/**
 * Category totals and ranking.
 *
 * Categories here are an open set: whatever label a record carries is
 * aggregated under that label. The closed list of valid categories lives with
 * request validation and is never consulted.
 */
import { readAmount, readCategory, readRecord } from './records.js';
import type { AggregationHooks, MaybeRecord } from './types.js';

export const DEFAULT_TOP_N = 5;

export interface ReadableRecord {
  amount: number;
  category: string;
}

/**
 * Records whose amount and category both read cleanly. Everything that feeds
 * the whole-set totals goes through here so the grand total always equals the
 * sum of the category totals.
 */
export function readableRecords(
  records: readonly MaybeRecord[],
  hooks: AggregationHooks = {},
): ReadableRecord[] {
  const readable: ReadableRecord[] = [];
  for (const raw of records) {
    const row = readRecord(raw);
    if (!row.ok) {
      hooks.onSkip?.({ id: undefined, field: 'record', reason: row.reason, stage: 'totals' });
      continue;
    }
    const record = row.value;
    const amount = readAmount(record.amount);
    if (!amount.ok) {
      hooks.onSkip?.({ id: record.id, field: 'amount', reason: amount.reason, stage: 'totals' });
      continue;
    }
    const category = readCategory(record.category);
    if (!category.ok) {
      hooks.onSkip?.({ id: record.id, field: 'category', reason: category.reason, stage: 'totals' });
      continue;
    }
    readable.push({ amount: amount.value, category: category.value });
  }
  return readable;
}

/** Sum per literal category label, in first-encounter order */
export function totalsByCategory(
  records: readonly MaybeRecord[],
  hooks: AggregationHooks = {},
): Record<string, number> {
  const map = new Map<string, number>();
  for (const { category, amount } of readableRecords(records, hooks)) {
    map.set(category, (map.get(category) ?? 0) + amount);
  }
  return Object.fromEntries(map);
}

/**
 * The `n` highest totals, descending. Equal totals keep the mapping's
 * iteration order (Array.prototype.sort is stable).
 */
export function topN(
  totals: Record<string, number>,
  n: number = DEFAULT_TOP_N,
): [category: string, total: number][] {
  if (n <= 0) return [];
  return Object.entries(totals)
    .sort((a, b) => b[1] - a[1])
    .slice(0, n);
}
