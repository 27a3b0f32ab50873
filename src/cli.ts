import path from 'node:path';
import { parseArgs } from 'node:util';
import { DateTime } from 'luxon';
import { readBudgets } from './config/budgets.js';
import { missingSourceSettings, readOracleConfig, readRedshiftConfig, readRunDefaults } from './config/sources.js';
import { InvalidInputError, SourceUnavailableError, errorMessage } from './errors.js';
import { FactFetcher } from './facts/fetcher.js';
import { decryptorFromEnv } from './identity/decrypt.js';
import { IdentityResolver } from './identity/resolver.js';
import { createLog } from './observability/log.js';
import { runPipeline } from './pipeline.js';
import { writeReports } from './report/emitter.js';
import { OracleSource } from './sources/oracle.js';
import { RedshiftSource } from './sources/redshift.js';
import { QueryLoader } from './sources/template.js';
import { filterMidFormat, readWatchlist } from './watchlist.js';

const log = createLog('cli');

export const USAGE = `usage: watchlist-heatmap --watchlist <file> --start <ts> --end <ts>
  [--checkpoint <date>] [--width <hours>] [--metric <name>] [--out <dir>] [--top <n>] [--skip-format-check]`;

export type CliOptions = {
  watchlist: string;
  start: DateTime;
  end: DateTime;
  checkpoint?: DateTime;
  width: number;
  metric: string;
  outDir: string;
  topN: number;
  formatCheck: boolean;
};

const FORMATS = ['yyyy-MM-dd HH:mm:ss', 'yyyy-MM-dd HH:mm', 'yyyy-MM-dd'];

/** `YYYY-MM-DD[ HH:mm[:ss]]` or ISO 8601, read in `zone`. */
export function parseTimestamp(s: string, zone: string): DateTime {
  const v = s.trim();
  for (const f of FORMATS) {
    const d = DateTime.fromFormat(v, f, { zone });
    if (d.isValid) return d;
  }
  const iso = DateTime.fromISO(v, { zone });
  if (!iso.isValid) throw new InvalidInputError(`cannot read timestamp ${JSON.stringify(s)}`);
  return iso;
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        watchlist: { type: 'string', short: 'w' },
        start: { type: 'string' },
        end: { type: 'string' },
        checkpoint: { type: 'string' },
        width: { type: 'string' },
        metric: { type: 'string' },
        out: { type: 'string' },
        top: { type: 'string' },
        'skip-format-check': { type: 'boolean', default: false },
      },
      strict: true,
    }).values;
  } catch (e) {
    throw new InvalidInputError(errorMessage(e));
  }
}

export function parseCliArgs(argv: string[], defaults = readRunDefaults()): CliOptions {
  const values = readArgs(argv);
  if (!values.watchlist || !values.start || !values.end) throw new InvalidInputError(`missing required option\n${USAGE}`);
  const zone = defaults.timezone;
  const top = values.top === undefined ? 20 : Number(values.top);
  if (!Number.isInteger(top) || top < 1) throw new InvalidInputError(`--top must be a positive integer`);
  return {
    watchlist: values.watchlist,
    start: parseTimestamp(values.start, zone),
    end: parseTimestamp(values.end, zone),
    checkpoint: values.checkpoint === undefined ? undefined : parseTimestamp(values.checkpoint, zone),
    width: values.width === undefined ? defaults.bucketWidthHours : Number(values.width),
    metric: values.metric ?? defaults.metric,
    outDir: values.out ?? defaults.outputDir,
    topN: top,
    formatCheck: defaults.midFormatCheck && !values['skip-format-check'],
  };
}

export function exitCodeFor(e: unknown): number {
  if (e instanceof InvalidInputError) return 2;
  if (e instanceof SourceUnavailableError) return 3;
  return 1;
}

export async function runCli(argv: string[]): Promise<number> {
  const defaults = readRunDefaults();
  let opts: CliOptions;
  try {
    opts = parseCliArgs(argv, defaults);
  } catch (e) {
    log.error(errorMessage(e));
    return exitCodeFor(e);
  }

  const missing = missingSourceSettings();
  if (missing.length) log.warn('source settings missing', { missing });

  const budgets = readBudgets();
  const oracle = new OracleSource(readOracleConfig(), budgets);
  const redshift = new RedshiftSource(readRedshiftConfig(), budgets);
  const queries = new QueryLoader(path.resolve(defaults.queryDir));
  try {
    let ids = await readWatchlist(opts.watchlist).catch((e: unknown) => {
      throw new InvalidInputError(`cannot read watchlist: ${errorMessage(e)}`);
    });
    if (opts.formatCheck) ids = filterMidFormat(ids);
    const result = await runPipeline({
      identifiers: ids,
      start: opts.start,
      end: opts.end,
      checkpoint: opts.checkpoint,
      bucketWidthHours: opts.width,
      metric: opts.metric,
      topN: opts.topN,
    }, {
      resolver: new IdentityResolver(oracle, queries, { decrypt: decryptorFromEnv() }),
      fetcher: new FactFetcher(redshift, queries, { zone: defaults.timezone }),
    });
    const stamp = DateTime.now().setZone(defaults.timezone).toFormat('yyyyMMdd_HHmmss');
    const paths = await writeReports(result, opts.outDir, stamp);
    for (const p of Object.values(paths)) log.info('wrote', { file: p });
    return 0;
  } catch (e) {
    log.error('run failed', { error: errorMessage(e), code: exitCodeFor(e) });
    return exitCodeFor(e);
  } finally {
    await Promise.allSettled([oracle.close(), redshift.close()]);
  }
}
