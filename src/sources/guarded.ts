import { Breaker } from '../circuit.js';
import { SourceUnavailableError, errorMessage } from '../errors.js';
import { recordSourceFailure, recordSourceSuccess } from '../metrics.js';
import { createLog, type Log } from '../observability/log.js';
import type { QuerySource, Row } from './types.js';

/**
 * Base for driver-backed sources: breaker gate, latency/row metrics, and
 * mapping of every driver error to `SourceUnavailableError`. No retries.
 */
export abstract class GuardedSource implements QuerySource {
  readonly breaker: Breaker;
  protected readonly log: Log;

  constructor(readonly name: string, breaker?: Breaker) {
    this.breaker = breaker ?? new Breaker(name);
    this.log = createLog(name);
  }

  protected abstract run(query: string): Promise<Row[]>;
  abstract close(): Promise<void>;

  async fetch(query: string): Promise<Row[]> {
    if (!this.breaker.allow()) {
      recordSourceFailure(this.name, 0, 'breaker_open');
      throw new SourceUnavailableError(this.name, 'circuit open, not querying');
    }
    const t0 = Date.now();
    try {
      const rows = await this.run(query);
      this.breaker.success();
      recordSourceSuccess(this.name, Date.now() - t0, rows.length);
      this.log.debug('query ok', { rows: rows.length, ms: Date.now() - t0 });
      return rows;
    } catch (e) {
      this.breaker.fail();
      recordSourceFailure(this.name, Date.now() - t0);
      this.log.error('query failed', { error: errorMessage(e), ms: Date.now() - t0 });
      if (e instanceof SourceUnavailableError) throw e;
      throw new SourceUnavailableError(this.name, errorMessage(e), e);
    }
  }
}
