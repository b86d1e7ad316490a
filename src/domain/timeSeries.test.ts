import { describe, it, expect, vi } from 'vitest';
import { generateBuckets } from './calendar.js';
import { aggregateTimeSeries, zeroSeries } from './timeSeries.js';
import type { ExpenseRecord } from './types.js';

const REF = new Date('2025-03-15T12:00:00Z');

function makeRecord(overrides: Partial<ExpenseRecord> = {}): ExpenseRecord {
  return {
    id: 'exp-1',
    description: 'bus ticket',
    name: 'Bus',
    amount: 10,
    category: 'Transportation',
    created_at: '2025-03-15T09:00:00Z',
    ...overrides,
  };
}

function valueAt(series: [string, number][], key: string): number | undefined {
  return series.find(([bucket]) => bucket === key)?.[1];
}

describe('aggregateTimeSeries', () => {
  const dailyKeys = generateBuckets(REF, 'daily');

  it('sums into buckets and zero-fills the rest, in key order', () => {
    const { total } = aggregateTimeSeries(
      [
        makeRecord({ amount: 10 }),
        makeRecord({ id: '2', amount: 5, created_at: '2025-03-15T20:00:00Z' }),
        makeRecord({ id: '3', amount: 7, created_at: '2025-03-01T00:00:00Z' }),
      ],
      dailyKeys,
      'daily',
    );
    expect(total.map(([key]) => key)).toEqual(dailyKeys);
    expect(valueAt(total, '2025-03-15')).toBe(15);
    expect(valueAt(total, '2025-03-01')).toBe(7);
    expect(valueAt(total, '2025-03-02')).toBe(0);
    expect(total.reduce((sum, [, v]) => sum + v, 0)).toBe(22);
  });

  it('buckets by the UTC day after applying the offset', () => {
    const { total } = aggregateTimeSeries(
      [makeRecord({ amount: 3, created_at: '2025-03-14T23:30:00-02:00' })],
      dailyKeys,
      'daily',
    );
    expect(valueAt(total, '2025-03-15')).toBe(3);
    expect(valueAt(total, '2025-03-14')).toBe(0);
  });

  it('splits by every observed category, including off-list ones', () => {
    const { by_category } = aggregateTimeSeries(
      [
        makeRecord({ amount: 4, category: 'Transportation' }),
        makeRecord({ id: '2', amount: 6, category: 'Pets' }),
        // outside the window but its category still gets a series
        makeRecord({ id: '3', amount: 9, category: 'Shopping', created_at: '2024-01-01T00:00:00Z' }),
      ],
      dailyKeys,
      'daily',
    );
    expect(Object.keys(by_category).sort()).toEqual(['Pets', 'Shopping', 'Transportation']);
    expect(valueAt(by_category.Transportation, '2025-03-15')).toBe(4);
    expect(valueAt(by_category.Pets, '2025-03-15')).toBe(6);
    expect(by_category.Shopping).toEqual(zeroSeries(dailyKeys));
  });

  it('drops records outside the window without reporting them', () => {
    const onSkip = vi.fn();
    const monthlyKeys = generateBuckets(REF, 'monthly');
    const { total } = aggregateTimeSeries(
      [makeRecord({ amount: 50, created_at: '2023-01-10T00:00:00Z' })],
      monthlyKeys,
      'monthly',
      { onSkip },
    );
    expect(total).toEqual(zeroSeries(monthlyKeys));
    expect(onSkip).not.toHaveBeenCalled();
  });

  it('skips malformed records and keeps going', () => {
    const onSkip = vi.fn();
    const weeklyKeys = generateBuckets(REF, 'weekly');
    const { total } = aggregateTimeSeries(
      [
        makeRecord({ id: 'bad-date', created_at: 'last tuesday' }),
        makeRecord({ id: 'bad-amount', amount: 'twelve' }),
        makeRecord({ id: 'ok', amount: 12 }),
      ],
      weeklyKeys,
      'weekly',
      { onSkip },
    );
    expect(valueAt(total, '2025-W11')).toBe(12);
    expect(onSkip).toHaveBeenCalledTimes(2);
    expect(onSkip).toHaveBeenNthCalledWith(1, {
      id: 'bad-date',
      field: 'created_at',
      reason: 'unparseable created_at "last tuesday"',
      stage: 'weekly',
    });
    expect(onSkip).toHaveBeenNthCalledWith(2, {
      id: 'bad-amount',
      field: 'amount',
      reason: 'non-numeric amount "twelve"',
      stage: 'weekly',
    });
  });

  it('skips rows that are not objects', () => {
    const onSkip = vi.fn();
    const result = aggregateTimeSeries([null, makeRecord({ amount: 6 })], dailyKeys, 'daily', { onSkip });
    expect(valueAt(result.total, '2025-03-15')).toBe(6);
    expect(valueAt(result.by_category.Transportation, '2025-03-15')).toBe(6);
    expect(onSkip).toHaveBeenCalledWith({ id: undefined, field: 'record', reason: 'record is null', stage: 'daily' });
  });

  it('falls back to an all-zero series on an unexpected failure', () => {
    const onError = vi.fn();
    const failure = new Error('hook exploded');
    const result = aggregateTimeSeries(
      [makeRecord({ amount: 1 }), makeRecord({ id: 'bad', created_at: 'never' })],
      dailyKeys,
      'daily',
      {
        onSkip: () => {
          throw failure;
        },
        onError,
      },
    );
    expect(result).toEqual({
      total: zeroSeries(dailyKeys),
      by_category: { Transportation: zeroSeries(dailyKeys) },
    });
    expect(onError).toHaveBeenCalledWith(failure, 'daily series');
  });
});
