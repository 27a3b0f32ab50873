import pg from 'pg';
import type { Pool } from 'pg';
import type { Budgets } from '../config/budgets.js';
import type { RedshiftConfig } from '../config/sources.js';
import { GuardedSource } from './guarded.js';
import type { Row } from './types.js';

// TIMESTAMP WITHOUT TIME ZONE stays text; the fact fetcher places it in the source zone
const TIMESTAMP_OID = 1114;
pg.types.setTypeParser(TIMESTAMP_OID, (v: string) => v);

const ident = (s: string) => `"${s.replace(/"/g, '""')}"`;

export class RedshiftSource extends GuardedSource {
  private readonly pool: Pool;

  constructor(private readonly cfg: RedshiftConfig, budgets: Budgets) {
    super('redshift');
    this.pool = new pg.Pool({
      host: cfg.host,
      port: cfg.port,
      database: cfg.database,
      user: cfg.username,
      password: cfg.password,
      ssl: cfg.ssl ? { rejectUnauthorized: false } : undefined,
      connectionTimeoutMillis: budgets.CONNECT_TIMEOUT_MS,
      query_timeout: budgets.QUERY_TIMEOUT_MS,
      max: 4,
    });
    this.pool.on('error', (e) => this.log.warn('idle client error', { error: e.message }));
  }

  protected async run(query: string): Promise<Row[]> {
    const client = await this.pool.connect();
    try {
      if (this.cfg.schema) await client.query(`SET search_path TO ${ident(this.cfg.schema)}`);
      const res = await client.query<Row>(query);
      return res.rows;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
