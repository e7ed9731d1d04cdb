import { describe, expect, it } from 'vitest';
import type { QueryResultRow } from 'pg';
import type { DatabaseClient, Queryable } from '../src/db/client.js';
import { ConnectionsRepository } from '../src/db/repositories/connections.js';
import { createEncryptionContext } from '../src/security/crypto.js';

interface Statement {
  sql: string;
  params: unknown[];
  inTransaction: boolean;
}

// Records every statement and answers with no rows.
class RecordingDatabase implements DatabaseClient {
  readonly statements: Statement[] = [];
  private depth = 0;

  async query<T extends QueryResultRow = QueryResultRow>(sql: string, params: unknown[] = []): Promise<{ rows: T[] }> {
    this.statements.push({ sql: sql.replace(/\s+/g, ' ').trim(), params, inTransaction: this.depth > 0 });
    return { rows: [] };
  }

  async transaction<T>(work: (tx: Queryable) => Promise<T>): Promise<T> {
    this.depth += 1;
    try {
      return await work(this);
    } finally {
      this.depth -= 1;
    }
  }

  async close(): Promise<void> {}
}

const crypto = createEncryptionContext('0123456789abcdef'.repeat(4));
const at = new Date('2026-10-19T12:00:00Z');

function setup() {
  const db = new RecordingDatabase();
  return { db, repository: new ConnectionsRepository(db, crypto) };
}

describe('ConnectionsRepository', () => {
  it('increments failures inside a transaction without touching tokens', async () => {
    const { db, repository } = setup();

    await expect(repository.recordFailure('conn-1', { reason: 'token_refresh_failed: invalid_grant', at, setNeedsReauth: true })).resolves.toBeNull();

    expect(db.statements).toHaveLength(1);
    const [update] = db.statements;
    expect(update?.inTransaction).toBe(true);
    expect(update?.sql).toContain('SET failure_count = failure_count + 1');
    expect(update?.sql).toContain('needs_reauth = needs_reauth OR $4::boolean');
    expect(update?.sql).not.toContain('access_token_enc');
    expect(update?.sql).not.toContain('expires_at');
    expect(update?.params).toEqual(['conn-1', 'token_refresh_failed: invalid_grant', at, true]);
  });

  it('writes success telemetry in one statement', async () => {
    const { db, repository } = setup();

    await expect(repository.recordSuccess('conn-1', { at, resetFailureCount: false })).resolves.toBe(false);

    const [update] = db.statements;
    expect(update?.inTransaction).toBe(false);
    expect(update?.sql).toContain('needs_reauth = FALSE');
    expect(update?.sql).toContain('failure_count = CASE WHEN $3::boolean THEN 0 ELSE failure_count END');
    expect(update?.sql).not.toContain('access_token_enc');
    expect(update?.params).toEqual(['conn-1', at, false]);
  });

  it('updates only token columns and keeps an unrotated refresh token', async () => {
    const { db, repository } = setup();
    const expiresAt = new Date('2026-10-19T13:00:00Z');

    await repository.updateTokens('conn-1', { accessToken: 'fresh-token', expiresAt });

    const [update] = db.statements;
    expect(update?.sql).toContain('refresh_token_enc = COALESCE($3, refresh_token_enc)');
    expect(update?.sql).not.toContain('failure_count');
    expect(update?.params[0]).toBe('conn-1');
    expect(update?.params[2]).toBeNull();
    expect(update?.params[3]).toBe(expiresAt);

    const sealed = update?.params[1];
    expect(Buffer.isBuffer(sealed) ? crypto.open(sealed) : null).toBe('fresh-token');
  });
});
