import fs from 'node:fs/promises';
import { createLog } from './observability/log.js';
import type { WatchlistIdentifier } from './schemas.js';

const log = createLog('watchlist');

export type WatchlistOptions = { header?: boolean };

const firstColumn = (line: string) => line.split(',')[0].trim().replace(/^"(.*)"$/, '$1').trim();

/**
 * One identifier per line (first CSV column). Blank lines and a leading `mid`
 * header are dropped; duplicates keep their first position.
 */
export function parseWatchlist(text: string, opts: WatchlistOptions = {}): WatchlistIdentifier[] {
  const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/).map(firstColumn);
  if (lines.length && (opts.header || lines[0].toLowerCase() === 'mid')) lines.shift();
  return [...new Set(lines.filter(Boolean))];
}

/** Keeps identifiers that start and end with `A`. */
export function filterMidFormat(ids: readonly WatchlistIdentifier[]): WatchlistIdentifier[] {
  const kept = ids.filter(id => id.length >= 2 && id.startsWith('A') && id.endsWith('A'));
  if (kept.length !== ids.length) log.warn('identifiers failed the format check', { rejected: ids.length - kept.length });
  return kept;
}

export async function readWatchlist(path: string, opts: WatchlistOptions = {}): Promise<WatchlistIdentifier[]> {
  const ids = parseWatchlist(await fs.readFile(path, 'utf8'), opts);
  log.info('watchlist loaded', { path, identifiers: ids.length });
  return ids;
}
