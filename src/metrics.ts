import { Counter, Histogram, Registry } from 'prom-client';

export const registry = new Registry();

const sourceQueries = new Counter({
  name: 'heatmap_source_queries_total',
  help: 'Queries issued per source, by outcome',
  labelNames: ['source', 'outcome'] as const,
  registers: [registry],
});

const sourceLatency = new Histogram({
  name: 'heatmap_source_query_ms',
  help: 'Query latency per source in milliseconds',
  labelNames: ['source'] as const,
  buckets: [50, 250, 1000, 5000, 15000, 60000, 300000],
  registers: [registry],
});

const sourceRows = new Counter({
  name: 'heatmap_source_rows_total',
  help: 'Rows returned per source',
  labelNames: ['source'] as const,
  registers: [registry],
});

const integrityWarnings = new Counter({
  name: 'heatmap_integrity_warnings_total',
  help: 'Non-fatal data-integrity findings by kind',
  labelNames: ['kind'] as const,
  registers: [registry],
});

const stageRows = new Counter({
  name: 'heatmap_stage_rows_total',
  help: 'Rows produced per pipeline stage',
  labelNames: ['stage'] as const,
  registers: [registry],
});

export function recordSourceSuccess(source: string, latencyMs: number, rows: number) {
  sourceQueries.inc({ source, outcome: 'ok' });
  sourceLatency.observe({ source }, Math.max(0, latencyMs));
  sourceRows.inc({ source }, rows);
}

export function recordSourceFailure(source: string, latencyMs: number, outcome: 'error' | 'breaker_open' = 'error') {
  sourceQueries.inc({ source, outcome });
  if (outcome === 'error') sourceLatency.observe({ source }, Math.max(0, latencyMs));
}

export function incrIntegrityWarning(kind: string) { integrityWarnings.inc({ kind }); }
export function addStageRows(stage: string, rows: number) { stageRows.inc({ stage }, rows); }

/** Prometheus text exposition of everything recorded in this process. */
export async function metricsText(): Promise<string> {
  return registry.metrics();
}

export async function metricValue(name: string, labels: Record<string, string>): Promise<number> {
  const m = registry.getSingleMetric(name);
  if (!m) return 0;
  const snap = await m.get();
  const hit = snap.values.find(v => Object.entries(labels).every(([k, val]) => v.labels[k] === val));
  return hit?.value ?? 0;
}

export function resetMetrics() { registry.resetMetrics(); }
