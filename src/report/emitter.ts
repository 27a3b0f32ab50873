import fs from 'node:fs/promises';
import path from 'node:path';
import { metricsText } from '../metrics.js';
import { createLog } from '../observability/log.js';
import type { PipelineResult } from '../pipeline.js';
import {
  LONG_FORM_COLUMNS, MEMBER_INFO_COLUMNS, PROFILE_COLUMNS, RANKING_COLUMNS, TIMELINE_COLUMNS, heatmapTable, table,
} from './columns.js';
import { tableCsv } from './csv.js';
import { renderHeatmapHtml } from './html.js';

const log = createLog('report');

export type ReportPaths = Record<string, string>;

/** Writes every table of a run under `outDir`, file names suffixed with `stamp`. */
export async function writeReports(result: PipelineResult, outDir: string, stamp: string): Promise<ReportPaths> {
  await fs.mkdir(outDir, { recursive: true });
  const title = `Watchlist heatmap ${result.start.toFormat('yyyy-MM-dd HH:mm')} to ${result.end.toFormat('yyyy-MM-dd HH:mm')}`;
  const files: Array<[string, string, () => Promise<string> | string]> = [
    ['profiles', 'csv', () => tableCsv(table(PROFILE_COLUMNS, result.profiles))],
    ['member_info', 'csv', () => tableCsv(table(MEMBER_INFO_COLUMNS, result.members))],
    ['buckets', 'csv', () => tableCsv(table(LONG_FORM_COLUMNS, result.longForm))],
    ['daily_detail', 'csv', () => tableCsv(table(LONG_FORM_COLUMNS, result.dailyLongForm))],
    ['timeline', 'csv', () => tableCsv(table(TIMELINE_COLUMNS, result.timeline))],
    ['ranking', 'csv', () => tableCsv(table(RANKING_COLUMNS, result.ranking))],
    ['heatmap', 'csv', () => tableCsv(heatmapTable(result.matrix))],
    ['heatmap', 'html', () => renderHeatmapHtml(result.matrix, title)],
    ['metrics', 'prom', () => metricsText()],
  ];
  const out: ReportPaths = {};
  for (const [name, ext, render] of files) {
    const file = path.join(outDir, `${name}_${stamp}.${ext}`);
    await fs.writeFile(file, await render(), 'utf8');
    out[`${name}.${ext}`] = file;
  }
  log.info('reports written', { dir: outDir, files: Object.keys(out).length });
  return out;
}
