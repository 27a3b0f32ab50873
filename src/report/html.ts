import type { HeatmapMatrix } from '../schemas.js';

export function htmlEscape(s: string) {
  return s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

function fmt(n: number | null) {
  return n === null ? '' : n.toLocaleString('en-US', { maximumFractionDigits: 2 });
}

function maxOf(m: HeatmapMatrix): number {
  let max = 0;
  for (const row of m.cells) for (const v of row) if (v !== null && v > max) max = v;
  return max;
}

// red intensity proportional to value / max; null cells stay blank
export function cellStyle(v: number | null, max: number): string {
  if (v === null || max <= 0) return '';
  const alpha = Math.round(Math.min(1, Math.max(0, v / max)) * 1000) / 1000;
  return ` style="background:rgba(215,48,39,${alpha})"`;
}

/** Self-contained heatmap page: one row per MID, one column per bucket. */
export function renderHeatmapHtml(m: HeatmapMatrix, title: string): string {
  const max = maxOf(m);
  const head = ['<th>mid</th>', ...m.columns.map(c => `<th>${htmlEscape(c.label)}</th>`)].join('');
  const body = m.rows.map((mid, i) => {
    const cells = m.cells[i].map(v => `<td${cellStyle(v, max)}>${fmt(v)}</td>`).join('');
    return `<tr><th>${htmlEscape(mid)}</th>${cells}</tr>`;
  }).join('\n');
  return `<!doctype html><html><head><meta charset="utf-8"><title>${htmlEscape(title)}</title></head>
<body style="margin:24px;font-family:ui-sans-serif,system-ui;">
<h1 style="font-size:20px;">${htmlEscape(title)}</h1>
<p>Metric: ${htmlEscape(m.metric)}</p>
<table style="border-collapse:collapse;font-size:12px;" border="1">
<thead><tr>${head}</tr></thead>
<tbody>
${body}
</tbody>
</table>
</body></html>
`;
}
