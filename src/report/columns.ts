import type { HeatmapMatrix, LongFormRow, MemberInfo, Profile, TimelinePoint, UserRanking } from '../schemas.js';

export type Cell = string | number | null;
export type Column<T> = { header: string; value: (row: T) => Cell };
export type Table = { columns: string[]; rows: Cell[][] };

export function table<T>(cols: readonly Column<T>[], items: readonly T[]): Table {
  return { columns: cols.map(c => c.header), rows: items.map(it => cols.map(c => c.value(it))) };
}

const profileFields: Array<[string, (p: Profile) => Cell]> = [
  ['customer_id', p => p.customerId],
  ['member_id', p => p.memberId],
  ['name', p => p.displayName],
  ['gender', p => p.gender],
  ['birth_date', p => p.birthDate],
  ['high_net_worth', p => p.highNetWorth],
  ['residential_address', p => p.residentialAddress],
  ['workplace_name', p => p.workplaceName],
  ['workplace_address', p => p.workplaceAddress],
  ['phone', p => p.phone],
  ['email', p => p.email],
  ['kyc_completed_at', p => p.kycCompletedAt],
];

export const PROFILE_COLUMNS: Column<Profile>[] = profileFields.map(([header, value]) => ({ header, value }));

export const MEMBER_INFO_COLUMNS: Column<MemberInfo>[] = [
  { header: 'mid', value: m => m.mid },
  ...profileFields.map(([header, value]): Column<MemberInfo> => ({ header, value: m => (m.profile ? value(m.profile) : null) })),
  { header: 'joined_at', value: m => m.join?.joinedAt ?? null },
  { header: 'user_address', value: m => m.join?.userAddress ?? null },
  { header: 'ip_addresses', value: m => m.access?.ipAddresses ?? null },
  { header: 'device_ids', value: m => m.access?.deviceIds ?? null },
  { header: 'os', value: m => m.access?.os ?? null },
  { header: 'browsers', value: m => m.access?.browsers ?? null },
  { header: 'user_agents', value: m => m.access?.userAgents ?? null },
];

export const LONG_FORM_COLUMNS: Column<LongFormRow>[] = [
  { header: 'mid', value: r => r.mid },
  { header: 'bucket_start', value: r => r.bucketStart },
  { header: 'bucket_label', value: r => r.bucketLabel },
  { header: 'market', value: r => r.market },
  { header: 'ticker', value: r => r.ticker },
  { header: 'buy_amount', value: r => r.buyAmount },
  { header: 'sell_amount', value: r => r.sellAmount },
  { header: 'total_amount', value: r => r.totalAmount },
  { header: 'buy_quantity', value: r => r.buyQuantity },
  { header: 'sell_quantity', value: r => r.sellQuantity },
  { header: 'buy_count', value: r => r.buyCount },
  { header: 'sell_count', value: r => r.sellCount },
  { header: 'total_count', value: r => r.totalCount },
  { header: 'distinct_instruments', value: r => r.distinctInstrumentCount },
  { header: 'avg_buy_price', value: r => r.avgBuyPrice },
  { header: 'avg_sell_price', value: r => r.avgSellPrice },
];

export const TIMELINE_COLUMNS: Column<TimelinePoint>[] = [
  { header: 'bucket_label', value: p => p.bucket.label },
  { header: 'buy_amount', value: p => p.buyAmount },
  { header: 'sell_amount', value: p => p.sellAmount },
  { header: 'total_amount', value: p => p.totalAmount },
  { header: 'active_users', value: p => p.activeUsers },
];

export const RANKING_COLUMNS: Column<UserRanking>[] = [
  { header: 'mid', value: r => r.mid },
  { header: 'buy_amount', value: r => r.buyAmount },
  { header: 'sell_amount', value: r => r.sellAmount },
  { header: 'total_amount', value: r => r.totalAmount },
  { header: 'trade_count', value: r => r.tradeCount },
];

/** Wide heatmap table: `mid` then one column per bucket label. */
export function heatmapTable(m: HeatmapMatrix): Table {
  return {
    columns: ['mid', ...m.columns.map(c => c.label)],
    rows: m.rows.map((mid, i) => [mid, ...m.cells[i]]),
  };
}
