import type { PoolClient, PoolConfig } from 'pg';
import { Pool } from 'pg';

import { ConnectionError, classifyDriverError } from './errors.js';
import type { PostgresConfig } from './postgres-config.js';
import { toPoolConfig } from './postgres-config.js';
import { debug, describeError } from './runtime.js';
import type { DatabaseTransport, ExecuteOptions, QueryHandle, TransportResult } from './transport.js';

interface PidRow extends Record<string, unknown> {
  pid: number;
}

export type PoolFactory = (config: PoolConfig) => Pool;

const createPool: PoolFactory = config => new Pool(config);

/**
 * {@link DatabaseTransport} over a `pg` pool.
 *
 * Every statement runs on its own pooled client inside a `READ ONLY`
 * transaction with a transaction-local `statement_timeout`, so nothing this
 * engine sends can write and nothing can outlive its timeout.
 */
export class PgTransport implements DatabaseTransport {
  readonly config: Partial<PostgresConfig>;
  private readonly createPool: PoolFactory;
  private pool: Pool | null = null;
  private opening: Promise<Pool> | null = null;
  private reconnecting: Promise<void> | null = null;
  /** Handles whose statement is still executing on its backend. */
  private readonly running = new Set<QueryHandle>();

  constructor(config: Partial<PostgresConfig> = {}, poolFactory: PoolFactory = createPool) {
    this.config = config;
    this.createPool = poolFactory;
  }

  /**
   * Create the pool and check that a connection can be made. Concurrent
   * calls share one attempt.
   */
  async connect(): Promise<this> {
    await this.ensurePool();
    return this;
  }

  private ensurePool(): Promise<Pool> {
    if (this.pool) {
      return Promise.resolve(this.pool);
    }
    if (!this.opening) {
      this.opening = this.openPool().finally(() => {
        this.opening = null;
      });
    }
    return this.opening;
  }

  private async openPool(): Promise<Pool> {
    const pool = this.createPool(toPoolConfig(this.config));
    pool.on('error', (err: Error) => {
      debug.error(`PostgreSQL pool error: ${err.message}`);
    });

    try {
      const client = await pool.connect();
      try {
        await client.query('SELECT 1');
      } finally {
        client.release();
      }
    } catch (error) {
      debug.error(`Failed to connect to PostgreSQL: ${describeError(error)}`);
      await pool.end();
      throw classifyDriverError(error);
    }

    this.pool = pool;
    debug.db('PostgreSQL connection pool established');
    return pool;
  }

  async close(): Promise<void> {
    if (this.opening) {
      try {
        await this.opening;
      } catch (error) {
        debug.db(`Pending connect failed before close: ${describeError(error)}`);
      }
    }
    const pool = this.pool;
    if (!pool) {
      return;
    }
    this.pool = null;
    await pool.end();
    debug.db('PostgreSQL connection pool closed');
  }

  /**
   * Replace the pool. Callers arriving while a reconnect runs wait for it
   * instead of starting another.
   */
  reconnect(): Promise<void> {
    if (!this.reconnecting) {
      debug.db('Reconnecting PostgreSQL pool');
      this.reconnecting = this.replacePool().finally(() => {
        this.reconnecting = null;
      });
    }
    return this.reconnecting;
  }

  private async replacePool(): Promise<void> {
    await this.close();
    await this.ensurePool();
  }

  private async getConnection(): Promise<PoolClient> {
    if (!this.pool && this.reconnecting) {
      await this.reconnecting;
    }
    const pool = this.pool ?? (this.opening ? await this.opening : null);
    if (!pool) {
      throw new ConnectionError('Transport not connected. Call connect() first.');
    }
    return pool.connect();
  }

  async executeQuery<TRow extends Record<string, unknown> = Record<string, unknown>>(
    sql: string,
    params: readonly unknown[],
    options: ExecuteOptions
  ): Promise<TransportResult<TRow>> {
    const client = await this.getConnection();
    let broken = false;
    let handle: QueryHandle | null = null;

    try {
      await client.query('BEGIN READ ONLY');
      await client.query("SELECT set_config('statement_timeout', $1, true)", [
        String(options.timeoutMs),
      ]);

      if (options.onStart) {
        const pidResult = await client.query<PidRow>('SELECT pg_backend_pid() AS pid');
        const pid = pidResult.rows[0]?.pid;
        if (typeof pid === 'number') {
          handle = { backendPid: pid };
          this.running.add(handle);
          options.onStart(handle);
        }
      }

      const start = Date.now();
      const result = await client.query<TRow>(sql, [...params]);
      if (handle) {
        this.running.delete(handle);
      }
      debug.db(`Query executed in ${Date.now() - start}ms: ${sql.substring(0, 100)}...`);

      await client.query('COMMIT');
      return {
        rows: result.rows,
        fields: result.fields.map(field => ({ name: field.name, dataTypeID: field.dataTypeID })),
      };
    } catch (error) {
      debug.error(`Query error: ${describeError(error)}`);
      debug.error(`Query text: ${sql}`);
      broken = classifyDriverError(error) instanceof ConnectionError;
      if (!broken) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackError) {
          broken = true;
          debug.error(`Rollback failed: ${describeError(rollbackError)}`);
        }
      }
      throw error;
    } finally {
      if (handle) {
        this.running.delete(handle);
      }
      client.release(broken);
    }
  }

  /**
   * Cancel the statement behind `handle`. A handle whose statement already
   * finished is ignored: its backend may be running someone else's query.
   */
  async cancel(handle: QueryHandle): Promise<void> {
    const pool = this.pool;
    if (!pool || !this.running.has(handle)) {
      debug.db(`Backend ${handle.backendPid} is no longer running the statement; cancel skipped`);
      return;
    }

    const client = await pool.connect();
    try {
      if (!this.running.has(handle)) {
        debug.db(`Backend ${handle.backendPid} finished before the cancel was sent`);
        return;
      }
      await client.query('SELECT pg_cancel_backend($1)', [handle.backendPid]);
      debug.db(`Cancel requested for backend ${handle.backendPid}`);
    } finally {
      client.release();
    }
  }
}

export default PgTransport;
