import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { Pool, type PoolClient, type QueryResultRow } from 'pg';

const CURRENT_MIGRATION = '20261019_connections_v1';
const MIGRATION_FILE = 'src/db/migrations/001_initial.sql';

export interface Queryable {
  query<T extends QueryResultRow = QueryResultRow>(sql: string, params?: unknown[]): Promise<{ rows: T[] }>;
}

export interface DatabaseClient extends Queryable {
  /** Runs `work` on one pooled connection between BEGIN and COMMIT; rolls back if it throws. */
  transaction<T>(work: (tx: Queryable) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

function bindClient(client: PoolClient): Queryable {
  return {
    async query<T extends QueryResultRow = QueryResultRow>(sql: string, params: unknown[] = []): Promise<{ rows: T[] }> {
      const result = await client.query<T>(sql, params);
      return { rows: result.rows };
    }
  };
}

export class PgDatabaseClient implements DatabaseClient {
  private readonly pool: Pool;

  constructor(connectionString: string) {
    this.pool = new Pool({ connectionString });
  }

  async query<T extends QueryResultRow = QueryResultRow>(sql: string, params: unknown[] = []): Promise<{ rows: T[] }> {
    const result = await this.pool.query<T>(sql, params);
    return { rows: result.rows };
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }

  async transaction<T>(work: (tx: Queryable) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await work(bindClient(client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  /** Applies the schema once; the migration id is recorded in the same transaction. */
  async migrate(): Promise<boolean> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        id TEXT PRIMARY KEY,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);

    const applied = await this.pool.query<{ id: string }>('SELECT id FROM schema_migrations WHERE id = $1', [CURRENT_MIGRATION]);
    if (applied.rows.length > 0) return false;

    const sql = await readFile(resolve(process.cwd(), MIGRATION_FILE), 'utf-8');
    await this.transaction(async (tx) => {
      await tx.query(sql);
      await tx.query('INSERT INTO schema_migrations (id) VALUES ($1)', [CURRENT_MIGRATION]);
    });
    return true;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

export function createDatabaseClient(databaseUrl: string): PgDatabaseClient {
  return new PgDatabaseClient(databaseUrl);
}
