import oracledb from 'oracledb';
import type { Pool } from 'oracledb';
import type { Budgets } from '../config/budgets.js';
import type { OracleConfig } from '../config/sources.js';
import { GuardedSource } from './guarded.js';
import type { Row } from './types.js';

/** Identity (KYC) source over node-oracledb thin mode; the pool is created lazily. */
export class OracleSource extends GuardedSource {
  private pool: Promise<Pool> | null = null;

  constructor(private readonly cfg: OracleConfig, private readonly budgets: Budgets) {
    super('oracle');
  }

  private getPool(): Promise<Pool> {
    if (this.pool) return this.pool;
    const created = oracledb.createPool({
      user: this.cfg.username,
      password: this.cfg.password,
      connectString: `${this.cfg.host}:${this.cfg.port}/${this.cfg.serviceName}`,
      poolMin: 0,
      poolMax: 2,
      queueTimeout: this.budgets.CONNECT_TIMEOUT_MS,
    });
    this.pool = created;
    // let a later fetch retry pool creation instead of reusing the rejection
    void created.catch(() => { if (this.pool === created) this.pool = null; });
    return created;
  }

  protected async run(query: string): Promise<Row[]> {
    const pool = await this.getPool();
    const conn = await pool.getConnection();
    try {
      conn.callTimeout = this.budgets.QUERY_TIMEOUT_MS;
      const res = await conn.execute<Row>(query, [], { outFormat: oracledb.OUT_FORMAT_OBJECT });
      return res.rows ?? [];
    } finally {
      await conn.close();
    }
  }

  async close(): Promise<void> {
    if (!this.pool) return;
    const pending = this.pool;
    this.pool = null;
    // a failed pool creation was already surfaced by fetch
    const pool = await pending.catch(() => null);
    if (pool) await pool.close(0);
  }
}
