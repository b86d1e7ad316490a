import { describe, it, expect } from 'vitest';
import { bucketKeyFor, generateBuckets, isoWeekKey } from './calendar.js';
import { GRANULARITIES, LOOKBACK } from './types.js';

const utc = (iso: string) => new Date(`${iso}Z`);

function strictlyAscending(keys: string[]): boolean {
  return keys.every((key, i) => i === 0 || keys[i - 1] < key);
}

describe('generateBuckets', () => {
  it('daily: 30 days ending on the reference day', () => {
    const keys = generateBuckets(utc('2025-03-15T12:00:00'), 'daily');
    expect(keys).toHaveLength(30);
    expect(keys[0]).toBe('2025-02-14');
    expect(keys[29]).toBe('2025-03-15');
  });

  it('daily: window across a leap day', () => {
    const keys = generateBuckets(utc('2024-03-01T00:00:00'), 'daily');
    expect(keys[0]).toBe('2024-02-01');
    expect(keys[28]).toBe('2024-02-29');
    expect(keys[29]).toBe('2024-03-01');
  });

  it('weekly: anchored on the Monday of the reference week', () => {
    // 2025-01-01 is a Wednesday; its ISO week starts 2024-12-30
    const keys = generateBuckets(utc('2025-01-01T18:00:00'), 'weekly');
    expect(keys).toHaveLength(12);
    expect(keys[0]).toBe('2024-W42');
    expect(keys[10]).toBe('2024-W52');
    expect(keys[11]).toBe('2025-W01');
  });

  it('weekly: includes week 53 of a long ISO year', () => {
    const keys = generateBuckets(utc('2021-01-06T00:00:00'), 'weekly');
    expect(keys.slice(-2)).toEqual(['2020-W53', '2021-W01']);
  });

  it('monthly: rolls back over the year boundary', () => {
    const keys = generateBuckets(utc('2025-02-10T00:00:00'), 'monthly');
    expect(keys).toEqual([
      '2024-03', '2024-04', '2024-05', '2024-06', '2024-07', '2024-08',
      '2024-09', '2024-10', '2024-11', '2024-12', '2025-01', '2025-02',
    ]);
  });

  it('monthly: December reference stays inside one year', () => {
    const keys = generateBuckets(utc('2024-12-31T23:59:59'), 'monthly');
    expect(keys[0]).toBe('2024-01');
    expect(keys[11]).toBe('2024-12');
  });

  it('always produces the full window, strictly ascending', () => {
    const references = [
      '2024-02-29T00:00:00',
      '2024-12-31T23:59:59',
      '2025-01-01T00:00:00',
      '2020-12-31T12:00:00',
      '2023-06-15T08:30:00',
    ];
    for (const iso of references) {
      for (const granularity of GRANULARITIES) {
        const keys = generateBuckets(utc(iso), granularity);
        expect(keys).toHaveLength(LOOKBACK[granularity]);
        expect(new Set(keys).size).toBe(keys.length);
        expect(strictlyAscending(keys)).toBe(true);
      }
    }
  });

  it('rejects an invalid instant', () => {
    expect(() => generateBuckets(new Date('not a date'), 'daily')).toThrow(RangeError);
  });
});

describe('isoWeekKey', () => {
  it('uses the ISO week-numbering year', () => {
    expect(isoWeekKey(utc('2024-12-30T00:00:00'))).toBe('2025-W01');
    expect(isoWeekKey(utc('2024-12-29T00:00:00'))).toBe('2024-W52'); // Sunday
    expect(isoWeekKey(utc('2025-01-05T00:00:00'))).toBe('2025-W01'); // Sunday
    expect(isoWeekKey(utc('2021-01-03T00:00:00'))).toBe('2020-W53');
  });

  it('zero-pads single digit weeks', () => {
    expect(isoWeekKey(utc('2025-02-03T00:00:00'))).toBe('2025-W06');
  });
});

describe('bucketKeyFor', () => {
  it('formats a single instant per granularity', () => {
    const date = utc('2025-07-04T15:00:00');
    expect(bucketKeyFor(date, 'daily')).toBe('2025-07-04');
    expect(bucketKeyFor(date, 'weekly')).toBe('2025-W27');
    expect(bucketKeyFor(date, 'monthly')).toBe('2025-07');
  });
});
