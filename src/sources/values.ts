import { DateTime } from 'luxon';

export function text(v: unknown): string | null {
  if (v === null || v === undefined) return null;
  if (v instanceof Date) return DateTime.fromJSDate(v).toFormat('yyyy-MM-dd HH:mm:ss');
  return String(v);
}

// numeric strings from NUMERIC/DECIMAL columns; anything else becomes NaN
export function num(v: unknown): number {
  if (typeof v === 'number') return v;
  if (typeof v === 'bigint') return Number(v);
  if (typeof v === 'string' && v.trim() !== '') return Number(v);
  return NaN;
}

export function numOrNull(v: unknown): number | null {
  return v === null || v === undefined ? null : num(v);
}

/** Source timestamp placed in `zone`; unparseable values come back invalid. */
export function stamp(v: unknown, zone: string): DateTime {
  if (v instanceof Date) return DateTime.fromJSDate(v, { zone });
  if (typeof v === 'number') return DateTime.fromMillis(v, { zone });
  if (typeof v === 'string') {
    const s = v.trim();
    const sql = DateTime.fromSQL(s, { zone });
    return sql.isValid ? sql : DateTime.fromISO(s, { zone });
  }
  return DateTime.invalid('unparseable timestamp');
}

export function batches<T>(items: readonly T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size));
  return out;
}
