import type { FieldType, FilterValue } from './types';

const INTEGER_RX = /^[+-]?\d+$/;
const FLOAT_RX = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;
const TIMESTAMP_RX =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?(Z|[+-]\d{2}:?\d{2})?$/;
const TRUTHY = new Set(['true', '1', 'yes']);

/**
 * Convert a query-string value to the field's semantic type.
 * Values that do not parse come back unchanged (the literal string).
 */
export function coerceValue(raw: string, type: FieldType): FilterValue {
  switch (type) {
    case 'text':
      return raw;
    case 'integer': {
      const s = raw.trim();
      if (!INTEGER_RX.test(s)) return raw;
      const n = Number.parseInt(s, 10);
      return Number.isSafeInteger(n) ? n : raw;
    }
    case 'float': {
      const s = raw.trim();
      return FLOAT_RX.test(s) ? Number(s) : raw;
    }
    case 'boolean':
      return TRUTHY.has(raw.trim().toLowerCase());
    case 'timestamp':
      return parseTimestamp(raw.trim()) ?? raw;
  }
}

/**
 * ISO-8601 date or date-time. A value without an offset is read as UTC.
 * Calendar-invalid dates (2023-02-30) are rejected rather than rolled over.
 */
export function parseTimestamp(s: string): Date | undefined {
  const m = TIMESTAMP_RX.exec(s);
  if (!m) return undefined;
  const [, y, mo, d, hh = '00', mi = '00', ss = '00', frac = '', tz] = m;
  const ms = (frac + '000').slice(0, 3);
  const offset = tz === undefined ? 'Z' : normalizeOffset(tz);
  const date = new Date(`${y}-${mo}-${d}T${hh}:${mi}:${ss}.${ms}${offset}`);
  if (Number.isNaN(date.getTime())) return undefined;

  // Day/month overflow check on the calendar date as written.
  const calendar = new Date(Date.UTC(Number(y), Number(mo) - 1, Number(d)));
  if (
    calendar.getUTCFullYear() !== Number(y) ||
    calendar.getUTCMonth() !== Number(mo) - 1 ||
    calendar.getUTCDate() !== Number(d)
  ) {
    return undefined;
  }
  return date;
}

function normalizeOffset(tz: string): string {
  if (tz === 'Z') return tz;
  return tz.includes(':') ? tz : `${tz.slice(0, 3)}:${tz.slice(3)}`;
}
