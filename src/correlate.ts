import type { AccessSummary, MemberInfo, MemberJoin, Profile, WatchlistIdentifier } from './schemas.js';

function firstBy<T>(items: readonly T[], key: (t: T) => string | null): Map<string, T> {
  const m = new Map<string, T>();
  for (const it of items) {
    const k = key(it);
    if (k !== null && !m.has(k)) m.set(k, it);
  }
  return m;
}

/**
 * Outer join of profiles, join dates and access summaries by MID. Watchlist
 * identifiers come first in their order; MIDs only the sources know follow,
 * ascending. One row per MID.
 */
export function correlateMembers(
  identifiers: readonly WatchlistIdentifier[],
  profiles: readonly Profile[],
  joins: readonly MemberJoin[],
  access: readonly AccessSummary[],
): MemberInfo[] {
  const byProfile = firstBy(profiles, p => p.memberId);
  const byJoin = firstBy(joins, j => j.userId);
  const byAccess = firstBy(access, a => a.userId);

  const ordered = [...new Set(identifiers)];
  const listed = new Set(ordered);
  const extra = new Set<string>();
  for (const k of [...byProfile.keys(), ...byJoin.keys(), ...byAccess.keys()]) if (!listed.has(k)) extra.add(k);
  ordered.push(...[...extra].sort());

  return ordered.map(mid => ({
    mid,
    profile: byProfile.get(mid) ?? null,
    join: byJoin.get(mid) ?? null,
    access: byAccess.get(mid) ?? null,
  }));
}
