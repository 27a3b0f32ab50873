import type { DateTime } from 'luxon';
import { validateWindow } from '../aggregate/buckets.js';
import { readBudgets } from '../config/budgets.js';
import { InvalidInputError } from '../errors.js';
import { createLog } from '../observability/log.js';
import type { AccessFact, MemberJoin, TradeFact } from '../schemas.js';
import type { QueryLoader, QueryParams } from '../sources/template.js';
import type { QuerySource, Row } from '../sources/types.js';
import { batches, num, numOrNull, stamp, text } from '../sources/values.js';

const log = createLog('facts');
const SOURCE = 'redshift';

export type FetcherOptions = {
  zone: string;
  batchSize?: number;
};

function requireIds(userIds: readonly string[]): string[] {
  const ids = [...new Set(userIds.map(s => s.trim()).filter(Boolean))];
  if (ids.length === 0) throw new InvalidInputError('no user ids to fetch facts for');
  return ids;
}

/**
 * Pulls trade, access and join rows from the warehouse. Only projection and
 * type normalisation happen here; malformed values pass through for the
 * aggregator to reject.
 */
export class FactFetcher {
  private readonly batchSize: number;

  constructor(private readonly source: QuerySource, private readonly queries: QueryLoader, private readonly opts: FetcherOptions) {
    this.batchSize = opts.batchSize ?? readBudgets().QUERY_BATCH_SIZE;
  }

  /** Zone the fetched timestamps are placed in. */
  get zone(): string {
    return this.opts.zone;
  }

  private async fetchAll(name: string, ids: string[], params: QueryParams): Promise<Row[]> {
    const rows: Row[] = [];
    // sequential so rows keep batch order
    for (const chunk of batches(ids, this.batchSize)) {
      const sql = await this.queries.render(SOURCE, name, { ...params, user_ids: chunk });
      rows.push(...await this.source.fetch(sql));
    }
    log.info(`${name} fetched`, { users: ids.length, rows: rows.length });
    return rows;
  }

  async fetchTrades(userIds: readonly string[], start: DateTime, end: DateTime): Promise<TradeFact[]> {
    validateWindow(start, end);
    const ids = requireIds(userIds);
    const rows = await this.fetchAll('trade_facts', ids, {
      start_time: start.setZone(this.opts.zone),
      end_time: end.setZone(this.opts.zone),
    });
    return rows.map(r => ({
      userId: text(r.user_id) ?? '',
      tradedAt: stamp(r.trade_date, this.opts.zone),
      category: num(r.trans_cat),
      amount: num(r.trade_amount_krw),
      quantity: num(r.trade_quantity),
      price: numOrNull(r.trade_price),
      market: text(r.market_nm) ?? '',
      ticker: text(r.ticker_nm) ?? '',
    }));
  }

  async fetchAccess(userIds: readonly string[], checkpoint: DateTime): Promise<AccessFact[]> {
    if (!checkpoint.isValid) throw new InvalidInputError('checkpoint is an invalid timestamp');
    const ids = requireIds(userIds);
    const rows = await this.fetchAll('access_facts', ids, { checkpoint_datetime: checkpoint.setZone(this.opts.zone) });
    return rows.map(r => ({
      userId: text(r.user_id) ?? '',
      ipAddress: text(r.ip_addr),
      deviceId: text(r.device_id),
      os: text(r.conn_os),
      browser: text(r.conn_brows),
      userAgent: text(r.http_user_agent),
      orderCategory: num(r.order_cat),
      orderedAt: stamp(r.order_date, this.opts.zone),
    }));
  }

  async fetchJoinDates(userIds: readonly string[]): Promise<MemberJoin[]> {
    const ids = requireIds(userIds);
    const rows = await this.fetchAll('member_join_date', ids, {});
    const seen = new Set<string>();
    const out: MemberJoin[] = [];
    for (const r of rows) {
      const j: MemberJoin = { userId: text(r.user_id) ?? '', joinedAt: text(r.join_datetime), userAddress: text(r.user_addr) };
      const key = JSON.stringify([j.userId, j.joinedAt]);
      if (seen.has(key)) continue;
      seen.add(key);
      out.push(j);
    }
    return out;
  }
}
