import type { DateTime } from 'luxon';

export type WatchlistIdentifier = string;

export type Profile = {
  customerId: string;
  displayName: string | null;
  gender: string | null; // code-table name, never the raw code
  birthDate: string | null;
  highNetWorth: string | null; // Y / N flag as stored
  residentialAddress: string | null;
  workplaceName: string | null;
  workplaceAddress: string | null;
  phone: string | null;
  email: string | null;
  kycCompletedAt: string | null; // YYYY-MM-DD HH:mm:ss
  memberId: string | null;
};

export const BUY = 1;
export const SELL = 2;

export type TradeFact = {
  userId: string;
  tradedAt: DateTime;
  category: number; // 1 buy, 2 sell
  amount: number; // local currency
  quantity: number;
  price: number | null;
  market: string;
  ticker: string;
};

export type AccessFact = {
  userId: string;
  ipAddress: string | null;
  deviceId: string | null;
  os: string | null;
  browser: string | null;
  userAgent: string | null;
  orderCategory: number;
  orderedAt: DateTime;
};

export type AccessSummary = {
  userId: string;
  ipAddresses: string;
  deviceIds: string;
  os: string;
  browsers: string;
  userAgents: string;
};

export type MemberJoin = {
  userId: string;
  joinedAt: string | null;
  userAddress: string | null;
};

export type Granularity = 'intraday' | 'daily';

export type TimeBucket = {
  start: DateTime;
  end: DateTime; // exclusive
  label: string;
};

export type AggregatedBucket = {
  userId: string;
  bucket: TimeBucket;
  market: string | null; // set in daily detail only
  ticker: string | null;
  buyAmount: number;
  sellAmount: number;
  totalAmount: number;
  buyQuantity: number;
  sellQuantity: number;
  buyCount: number;
  sellCount: number;
  totalCount: number;
  distinctInstrumentCount: number;
  avgBuyPrice: number | null;
  avgSellPrice: number | null;
  buyPriceCount: number; // rows behind avgBuyPrice
  sellPriceCount: number;
};

export const AMOUNT_METRICS = [
  'totalAmount', 'buyAmount', 'sellAmount',
  'buyQuantity', 'sellQuantity',
  'totalCount', 'buyCount', 'sellCount',
  'distinctInstrumentCount',
] as const;
export const PRICE_METRICS = ['avgBuyPrice', 'avgSellPrice'] as const;

export type AmountMetric = typeof AMOUNT_METRICS[number];
export type PriceMetric = typeof PRICE_METRICS[number];
export type HeatmapMetric = AmountMetric | PriceMetric;

export type HeatmapMatrix = {
  metric: HeatmapMetric;
  rows: WatchlistIdentifier[];
  columns: TimeBucket[];
  cells: Array<Array<number | null>>; // [row][column]
};

export type LongFormRow = {
  mid: string;
  bucketStart: string;
  bucketLabel: string;
  market: string | null;
  ticker: string | null;
  buyAmount: number;
  sellAmount: number;
  totalAmount: number;
  buyQuantity: number;
  sellQuantity: number;
  buyCount: number;
  sellCount: number;
  totalCount: number;
  distinctInstrumentCount: number;
  avgBuyPrice: number | null;
  avgSellPrice: number | null;
};

export type TimelinePoint = {
  bucket: TimeBucket;
  buyAmount: number;
  sellAmount: number;
  totalAmount: number;
  activeUsers: number;
};

export type UserRanking = {
  mid: string;
  buyAmount: number;
  sellAmount: number;
  totalAmount: number;
  tradeCount: number;
};

export type MemberInfo = {
  mid: string;
  profile: Profile | null;
  join: MemberJoin | null;
  access: AccessSummary | null;
};

export function isHeatmapMetric(s: string): s is HeatmapMetric {
  return AMOUNT_METRICS.some(m => m === s) || PRICE_METRICS.some(m => m === s);
}

export function isPriceMetric(m: HeatmapMetric): m is PriceMetric {
  return PRICE_METRICS.some(p => p === m);
}
