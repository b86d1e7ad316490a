/**
 * Field readers for stored expense records.
 *
 * Records arrive from outside the domain, so nothing here trusts the static
 * type: each reader looks at the raw value and returns either the coerced
 * value or the reason the record has to be skipped.
 */
import type { ExpenseRecord, FieldResult, MaybeRecord } from './types.js';

// minutes are optional in both the time and the offset: T09, +05
const ISO_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2})(?::(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?)?(?:([+-])(\d{2})(?::?(\d{2}))?)?$/;

function fail(reason: string): { ok: false; reason: string } {
  return { ok: false, reason };
}

/** Short printable form of a raw value for skip reasons */
function printable(raw: unknown): string {
  if (typeof raw === 'string') return JSON.stringify(raw);
  if (typeof raw === 'bigint') return `${raw}n`;
  if (typeof raw === 'object' && raw !== null) return Array.isArray(raw) ? 'array' : 'object';
  return String(raw);
}

/** The row itself; anything that is not an object is skipped whole */
export function readRecord(raw: MaybeRecord): FieldResult<ExpenseRecord> {
  if (typeof raw !== 'object' || raw === null) return fail(`record is ${printable(raw)}`);
  return { ok: true, value: raw };
}

/** Numbers and numeric strings; NaN, Infinity, blanks and everything else fail */
export function readAmount(raw: unknown): FieldResult<number> {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? { ok: true, value: raw } : fail(`non-finite amount ${raw}`);
  }
  if (typeof raw === 'string' && raw.trim() !== '') {
    const value = Number(raw.trim());
    if (Number.isFinite(value)) return { ok: true, value };
  }
  return fail(`non-numeric amount ${printable(raw)}`);
}

/** Any string label, taken literally. Membership is not checked here */
export function readCategory(raw: unknown): FieldResult<string> {
  return typeof raw === 'string' ? { ok: true, value: raw } : fail('category is not a string');
}

/**
 * Parse an ISO-8601 timestamp. A trailing `Z` becomes `+00:00`; a timestamp
 * without an offset is read as UTC.
 */
export function readCreatedAt(raw: unknown): FieldResult<Date> {
  if (typeof raw !== 'string') return fail('created_at is not a string');

  const normalized = raw.trim().replace(/Z$/i, '+00:00');
  const match = ISO_TIMESTAMP.exec(normalized);
  if (!match) return fail(`unparseable created_at "${raw}"`);

  const [, y, mo, d, h = '0', mi = '0', s = '0', frac = '', sign, oh = '0', om = '0'] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  const millis = Number(frac.slice(0, 3).padEnd(3, '0'));

  const utc = Date.UTC(year, month - 1, day, hour, minute, second, millis);
  const check = new Date(utc);
  // Date.UTC rolls 2024-02-30 over into March; reject instead
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day ||
    hour > 23 ||
    minute > 59 ||
    second > 59
  ) {
    return fail(`out-of-range created_at "${raw}"`);
  }

  const offsetMinutes = sign ? (sign === '-' ? -1 : 1) * (Number(oh) * 60 + Number(om)) : 0;
  return { ok: true, value: new Date(utc - offsetMinutes * 60 * 1000) };
}
