import type { AccessFact, AccessSummary } from '../schemas.js';

type Seen = { ip: Set<string>; device: Set<string>; os: Set<string>; browser: Set<string>; ua: Set<string> };

const add = (set: Set<string>, v: string | null) => {
  if (v !== null && v.trim() !== '') set.add(v.trim());
};

const joined = (set: Set<string>) => [...set].join(',');

/** Distinct access attributes per user, in first-seen order, userId ascending. */
export function summarizeAccess(facts: readonly AccessFact[]): AccessSummary[] {
  const byUser = new Map<string, Seen>();
  for (const f of facts) {
    let s = byUser.get(f.userId);
    if (!s) {
      s = { ip: new Set(), device: new Set(), os: new Set(), browser: new Set(), ua: new Set() };
      byUser.set(f.userId, s);
    }
    add(s.ip, f.ipAddress);
    add(s.device, f.deviceId);
    add(s.os, f.os);
    add(s.browser, f.browser);
    add(s.ua, f.userAgent);
  }
  return [...byUser.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([userId, s]) => ({
      userId,
      ipAddresses: joined(s.ip),
      deviceIds: joined(s.device),
      os: joined(s.os),
      browsers: joined(s.browser),
      userAgents: joined(s.ua),
    }));
}
