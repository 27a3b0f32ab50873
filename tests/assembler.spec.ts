import { describe, it, expect } from 'vitest';
import { aggregate } from '../src/aggregate/aggregator.js';
import { enumerateBuckets } from '../src/aggregate/buckets.js';
import { InvalidInputError } from '../src/errors.js';
import { assemble, parseMetric, toLongForm } from '../src/matrix/assembler.js';
import { rankUsers, toTimeline } from '../src/matrix/summaries.js';
import { collectIntegrity } from '../src/observability/events.js';
import { at, sampleTrades, trade } from './helpers/trades.js';

const intraday = aggregate(sampleTrades(), 4);
const morning = enumerateBuckets(at('2024-03-05 08:00:00'), at('2024-03-05 16:00:00'), 4);

describe('assemble', () => {
  it('keeps caller row order and collapses duplicates', () => {
    const m = assemble(intraday, ['B1', 'A1', 'B1'], morning, 'totalAmount');
    expect(m.rows).toEqual(['B1', 'A1']);
    expect(m.columns.map(c => c.label)).toEqual(['2024-03-05 08:00', '2024-03-05 12:00']);
    expect(m.cells).toEqual([[70, 0], [180, 20]]);
  });

  it('keeps rows for identifiers without trades', () => {
    const m = assemble(intraday, ['Z9', 'A1', 'B1'], morning, 'buyCount');
    expect(m.cells).toEqual([[0, 0], [2, 1], [0, 0]]);
  });

  it('leaves price cells null where nothing traded', () => {
    const m = assemble(intraday, ['B1', 'A1'], morning, 'avgBuyPrice');
    expect(m.cells).toEqual([[null, null], [55, null]]);
  });

  it('sums detail buckets into one cell and weights averages by count', () => {
    const daily = aggregate(sampleTrades(), 4, 'daily');
    const day = enumerateBuckets(at('2024-03-05 00:00:00'), at('2024-03-06 00:00:00'), 4, 'daily');
    expect(assemble(daily, ['A1', 'B1'], day, 'totalAmount').cells).toEqual([[200], [70]]);
    // BTC: one priced buy at 100 (the other has no price); ETH: one at 10
    expect(assemble(daily, ['A1'], day, 'avgBuyPrice').cells).toEqual([[55]]);
  });

  it('warns once per unknown user', async () => {
    const { value, warnings } = await collectIntegrity(async () => assemble(intraday, ['A1'], morning, 'totalAmount'));
    expect(value.rows).toEqual(['A1']);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatchObject({ kind: 'unknown_user', userId: 'B1', count: 1 });
  });

  it('warns about buckets outside the window', async () => {
    const first = morning.slice(0, 1);
    const { value, warnings } = await collectIntegrity(async () => assemble(intraday, ['A1', 'B1'], first, 'totalAmount'));
    expect(value.cells).toEqual([[180], [70]]);
    expect(warnings).toEqual([{ kind: 'out_of_window', message: 'buckets outside the requested window were left out', count: 1 }]);
  });

  it('rejects an unknown metric', () => {
    expect(() => parseMetric('volume')).toThrow(InvalidInputError);
    expect(parseMetric('sellAmount')).toBe('sellAmount');
  });
});

describe('long form and summaries', () => {
  it('flattens buckets with labels', () => {
    const rows = toLongForm(intraday);
    expect(rows).toHaveLength(3);
    expect(rows[0]).toMatchObject({ mid: 'A1', bucketStart: '2024-03-05 08:00:00', bucketLabel: '2024-03-05 08:00', totalAmount: 180 });
  });

  it('builds a zero-filled timeline', () => {
    const t = toTimeline(intraday, enumerateBuckets(at('2024-03-05 08:00:00'), at('2024-03-05 20:00:00'), 4));
    expect(t.map(p => [p.bucket.label, p.buyAmount, p.sellAmount, p.totalAmount, p.activeUsers])).toEqual([
      ['2024-03-05 08:00', 130, 120, 250, 2],
      ['2024-03-05 12:00', 20, 0, 20, 1],
      ['2024-03-05 16:00', 0, 0, 0, 0],
    ]);
  });

  it('ranks users by total amount', () => {
    expect(rankUsers(intraday)).toEqual([
      { mid: 'A1', buyAmount: 150, sellAmount: 50, totalAmount: 200, tradeCount: 4 },
      { mid: 'B1', buyAmount: 0, sellAmount: 70, totalAmount: 70, tradeCount: 1 },
    ]);
    expect(rankUsers(intraday, 1).map(r => r.mid)).toEqual(['A1']);
  });
});

describe('full-day scenario', () => {
  const facts = [trade('U1', '2024-01-01 01:00:00', 1, 100, 1, 100), trade('U1', '2024-01-01 03:00:00', 2, 50, 1, 50)];
  const window = enumerateBuckets(at('2024-01-01 00:00:00'), at('2024-01-02 00:00:00'), 4);

  it('folds both trades into the first bucket', () => {
    const out = aggregate(facts, 4);
    expect(out).toHaveLength(1);
    expect(out[0]).toMatchObject({ buyAmount: 100, sellAmount: 50, totalAmount: 150, totalCount: 2 });
    expect(out[0].bucket.end.toFormat('HH:mm')).toBe('04:00');
    expect(toLongForm(aggregate(facts, 4))).toEqual(toLongForm(out));
  });

  it('fills six columns for every identifier', () => {
    const m = assemble(aggregate(facts, 4), ['U1', 'U2'], window, 'totalAmount');
    expect(m.columns.map(c => c.start.toFormat('HH'))).toEqual(['00', '04', '08', '12', '16', '20']);
    expect(m.cells).toEqual([[150, 0, 0, 0, 0, 0], [0, 0, 0, 0, 0, 0]]);
  });
});
