import { DateTime } from 'luxon';
import type { TradeFact } from '../../src/schemas.js';

export const ZONE = 'Asia/Seoul';

export const at = (s: string, zone = ZONE) => DateTime.fromSQL(s, { zone });

export function trade(
  userId: string, ts: string, category: number, amount: number, quantity: number,
  price: number | null, ticker = 'BTC', market = 'KRW',
): TradeFact {
  return { userId, tradedAt: at(ts), category, amount, quantity, price, market, ticker };
}

// two users, one morning; A1 spans two 4h buckets and two tickers
export function sampleTrades(): TradeFact[] {
  return [
    trade('A1', '2024-03-05 09:10:00', 1, 100, 1, 100),
    trade('A1', '2024-03-05 10:59:59', 2, 50, 0.5, 100),
    trade('A1', '2024-03-05 11:00:00', 1, 30, 3, 10, 'ETH'),
    trade('A1', '2024-03-05 12:00:00', 1, 20, 1, null),
    trade('B1', '2024-03-05 08:00:00', 2, 70, 7, 10),
  ];
}
