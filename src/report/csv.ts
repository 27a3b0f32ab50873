import type { Cell, Table } from './columns.js';

function field(v: Cell): string {
  if (v === null) return '';
  const s = String(v);
  return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

/** RFC 4180: CRLF line ends, quoted only where needed. */
export function toCsv(columns: readonly string[], rows: readonly (readonly Cell[])[]): string {
  return [columns, ...rows].map(r => r.map(field).join(',')).join('\r\n') + '\r\n';
}

export const tableCsv = (t: Table) => toCsv(t.columns, t.rows);
