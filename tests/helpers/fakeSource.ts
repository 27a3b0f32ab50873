import { fileURLToPath } from 'node:url';
import type { QuerySource, Row } from '../../src/sources/types.js';

export const QUERY_DIR = fileURLToPath(new URL('../../query', import.meta.url));

/** In-process stand-in for a warehouse or KYC connection; records every query. */
export class FakeSource implements QuerySource {
  readonly queries: string[] = [];
  closed = false;

  constructor(readonly name: string, private readonly respond: (sql: string) => Row[] | Promise<Row[]>) {}

  async fetch(sql: string): Promise<Row[]> {
    this.queries.push(sql);
    return this.respond(sql);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
