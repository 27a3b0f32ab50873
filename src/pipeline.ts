import type { DateTime } from 'luxon';
import { summarizeAccess } from './aggregate/access.js';
import { aggregate } from './aggregate/aggregator.js';
import { enumerateBuckets, parseBucketWidth, validateWindow } from './aggregate/buckets.js';
import { assertBuckets } from './contracts/invariants.js';
import { correlateMembers } from './correlate.js';
import { InvalidInputError } from './errors.js';
import type { FactFetcher } from './facts/fetcher.js';
import type { IdentityResolver } from './identity/resolver.js';
import { assemble, parseMetric, toLongForm } from './matrix/assembler.js';
import { rankUsers, toTimeline } from './matrix/summaries.js';
import { addStageRows, incrIntegrityWarning } from './metrics.js';
import { collectIntegrity, type DataIntegrityWarning } from './observability/events.js';
import { createLog } from './observability/log.js';
import type {
  AggregatedBucket, HeatmapMatrix, HeatmapMetric, LongFormRow, MemberInfo, Profile,
  TimeBucket, TimelinePoint, UserRanking, WatchlistIdentifier,
} from './schemas.js';

const log = createLog('pipeline');

export type PipelineRequest = {
  identifiers: readonly string[];
  start: DateTime;
  end: DateTime;
  checkpoint?: DateTime; // access rows since; defaults to the start of the window's first day
  bucketWidthHours: number;
  metric: string;
  topN?: number;
};

export type PipelineDeps = {
  resolver: Pick<IdentityResolver, 'resolve'>;
  fetcher: Pick<FactFetcher, 'zone' | 'fetchTrades' | 'fetchAccess' | 'fetchJoinDates'>;
};

export type PipelineResult = {
  identifiers: WatchlistIdentifier[];
  start: DateTime;
  end: DateTime;
  bucketWidthHours: number;
  metric: HeatmapMetric;
  profiles: Profile[];
  members: MemberInfo[];
  buckets: AggregatedBucket[];
  dailyDetail: AggregatedBucket[];
  windowBuckets: TimeBucket[];
  matrix: HeatmapMatrix;
  longForm: LongFormRow[];
  dailyLongForm: LongFormRow[];
  timeline: TimelinePoint[];
  ranking: UserRanking[];
  warnings: DataIntegrityWarning[];
};

type Validated = {
  identifiers: WatchlistIdentifier[];
  start: DateTime;
  end: DateTime;
  width: number;
  metric: HeatmapMetric;
  checkpoint: DateTime;
};

// the window moves to the source zone so its columns line up with fact buckets
function validateRequest(req: PipelineRequest, zone: string): Validated {
  const identifiers = [...new Set(req.identifiers.map(s => s.trim()).filter(Boolean))];
  if (identifiers.length === 0) throw new InvalidInputError('watchlist is empty');
  validateWindow(req.start, req.end);
  const start = req.start.setZone(zone);
  const end = req.end.setZone(zone);
  if (!start.isValid) throw new InvalidInputError(`unknown source zone ${zone}`);
  const checkpoint = req.checkpoint ?? start.startOf('day');
  if (!checkpoint.isValid) throw new InvalidInputError('checkpoint is an invalid timestamp');
  return { identifiers, start, end, width: parseBucketWidth(req.bucketWidthHours), metric: parseMetric(req.metric), checkpoint };
}

/**
 * One watchlist run: resolve identities and pull facts concurrently, then
 * bucket, assemble and correlate. Everything is validated before the first
 * source call; any source failure rejects the run.
 */
export async function runPipeline(req: PipelineRequest, deps: PipelineDeps): Promise<PipelineResult> {
  const v = validateRequest(req, deps.fetcher.zone);
  const { identifiers, start, end, width, metric } = v;

  const { value, warnings } = await collectIntegrity(async () => {
    const [profiles, trades, access, joins] = await Promise.all([
      deps.resolver.resolve(identifiers),
      deps.fetcher.fetchTrades(identifiers, start, end),
      deps.fetcher.fetchAccess(identifiers, v.checkpoint),
      deps.fetcher.fetchJoinDates(identifiers),
    ]);
    addStageRows('trades', trades.length);
    addStageRows('access', access.length);

    const buckets = aggregate(trades, width, 'intraday');
    const dailyDetail = aggregate(trades, width, 'daily');
    assertBuckets('intraday', buckets);
    assertBuckets('daily', dailyDetail);
    addStageRows('buckets', buckets.length);
    addStageRows('daily_detail', dailyDetail.length);

    const windowBuckets = enumerateBuckets(start, end, width, 'intraday');
    const matrix = assemble(buckets, identifiers, windowBuckets, metric);
    const members = correlateMembers(identifiers, profiles, joins, summarizeAccess(access));
    return {
      profiles,
      members,
      buckets,
      dailyDetail,
      windowBuckets,
      matrix,
      longForm: toLongForm(buckets),
      dailyLongForm: toLongForm(dailyDetail),
      timeline: toTimeline(buckets, windowBuckets),
      ranking: rankUsers(buckets, req.topN ?? 20),
    };
  });

  for (const w of warnings) {
    incrIntegrityWarning(w.kind);
    log.warn(w.message, { kind: w.kind, count: w.count });
  }
  log.info('run complete', {
    identifiers: identifiers.length,
    profiles: value.profiles.length,
    buckets: value.buckets.length,
    warnings: warnings.length,
  });
  return { identifiers, start, end, bucketWidthHours: width, metric, ...value, warnings };
}
