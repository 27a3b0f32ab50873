import type { AggregatedBucket, TimeBucket, TimelinePoint, UserRanking } from '../schemas.js';

/** Per-column totals across all users, zero-filled over the window. */
export function toTimeline(buckets: readonly AggregatedBucket[], windowBuckets: readonly TimeBucket[]): TimelinePoint[] {
  const points = windowBuckets.map(bucket => ({ bucket, buyAmount: 0, sellAmount: 0, totalAmount: 0, users: new Set<string>() }));
  const idx = new Map(windowBuckets.map((b, i) => [b.start.toMillis(), i]));
  for (const b of buckets) {
    const i = idx.get(b.bucket.start.toMillis());
    if (i === undefined) continue;
    const p = points[i];
    p.buyAmount += b.buyAmount;
    p.sellAmount += b.sellAmount;
    p.totalAmount += b.totalAmount;
    if (b.totalCount > 0) p.users.add(b.userId);
  }
  return points.map(({ users, ...p }) => ({ ...p, activeUsers: users.size }));
}

/** Users by total traded amount, largest first; ties by user id. */
export function rankUsers(buckets: readonly AggregatedBucket[], topN = 20): UserRanking[] {
  const byUser = new Map<string, UserRanking>();
  for (const b of buckets) {
    let r = byUser.get(b.userId);
    if (!r) {
      r = { mid: b.userId, buyAmount: 0, sellAmount: 0, totalAmount: 0, tradeCount: 0 };
      byUser.set(b.userId, r);
    }
    r.buyAmount += b.buyAmount;
    r.sellAmount += b.sellAmount;
    r.totalAmount += b.totalAmount;
    r.tradeCount += b.totalCount;
  }
  return [...byUser.values()]
    .sort((a, b) => b.totalAmount - a.totalAmount || (a.mid < b.mid ? -1 : a.mid > b.mid ? 1 : 0))
    .slice(0, Math.max(0, topN));
}
