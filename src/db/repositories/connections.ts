import type { DatabaseClient } from '../client.js';
import type { EncryptionContext } from '../../security/crypto.js';
import { isPlatform, type Platform } from '../../platforms/platform.js';
import { toUtcDate } from '../../oauth/expiry.js';

export interface DigitalAsset {
  id: string;
  platform: Platform;
  externalId: string;
  name: string;
  isActive: boolean;
  meta: Record<string, unknown>;
}

export interface Connection {
  id: string;
  campaignerId: string;
  customerId: string | null;
  digitalAssetId: string;
  accessToken: string | null;
  refreshToken: string | null;
  expiresAt: Date | null;
  revoked: boolean;
  needsReauth: boolean;
  failureCount: number;
  failureReason: string | null;
  lastFailureAt: Date | null;
  lastValidatedAt: Date | null;
  lastUsedAt: Date | null;
  asset: DigitalAsset;
}

export interface FailingConnectionQuery {
  customerId?: string;
  minFailureCount: number;
}

export interface TokenUpdate {
  accessToken: string;
  /** Omitted when the provider did not rotate it. */
  refreshToken?: string;
  expiresAt: Date;
}

export interface FailureUpdate {
  reason: string;
  at: Date;
  setNeedsReauth: boolean;
}

export interface SuccessUpdate {
  at: Date;
  resetFailureCount: boolean;
}

/**
 * Read/write access to OAuth connections. `getByPlatform` ignores revoked
 * rows. Each write touches only its own columns, so token and telemetry
 * updates from concurrent runs never overwrite one another.
 */
export interface CredentialStore {
  get(id: string): Promise<Connection | null>;
  getByPlatform(platform: Platform, campaignerId: string, customerId?: string | null): Promise<Connection | null>;
  updateTokens(id: string, tokens: TokenUpdate): Promise<boolean>;
  /** Increments the failure count and returns the row as written, or null when it is missing. */
  recordFailure(id: string, failure: FailureUpdate): Promise<Connection | null>;
  recordSuccess(id: string, success: SuccessUpdate): Promise<boolean>;
}

export interface ConnectionStore extends CredentialStore {
  listFailing(query: FailingConnectionQuery): Promise<Connection[]>;
}

type Timestamp = Date | string | null;

interface Row {
  id: string;
  campaigner_id: string;
  customer_id: string | null;
  digital_asset_id: string;
  access_token_enc: Buffer | null;
  refresh_token_enc: Buffer | null;
  expires_at: Timestamp;
  revoked: boolean;
  needs_reauth: boolean;
  failure_count: number;
  failure_reason: string | null;
  last_failure_at: Timestamp;
  last_validated_at: Timestamp;
  last_used_at: Timestamp;
  platform: string;
  external_id: string;
  asset_name: string;
  is_active: boolean;
  meta: Record<string, unknown> | null;
}

const SELECT_CONNECTION = `
  SELECT c.id, c.campaigner_id, c.customer_id, c.digital_asset_id,
         c.access_token_enc, c.refresh_token_enc, c.expires_at,
         c.revoked, c.needs_reauth, c.failure_count, c.failure_reason,
         c.last_failure_at, c.last_validated_at, c.last_used_at,
         a.platform, a.external_id, a.name AS asset_name, a.is_active, a.meta
  FROM connections c
  JOIN digital_assets a ON a.id = c.digital_asset_id`;

export class ConnectionsRepository implements ConnectionStore {
  constructor(
    private readonly db: DatabaseClient,
    private readonly crypto: EncryptionContext
  ) {}

  private map(row: Row): Connection {
    if (!isPlatform(row.platform)) {
      throw new Error(`Digital asset ${row.digital_asset_id} has unsupported platform '${row.platform}'`);
    }

    return {
      id: row.id,
      campaignerId: row.campaigner_id,
      customerId: row.customer_id,
      digitalAssetId: row.digital_asset_id,
      accessToken: row.access_token_enc ? this.crypto.open(row.access_token_enc) : null,
      refreshToken: row.refresh_token_enc ? this.crypto.open(row.refresh_token_enc) : null,
      expiresAt: toUtcDate(row.expires_at),
      revoked: row.revoked,
      needsReauth: row.needs_reauth,
      failureCount: row.failure_count,
      failureReason: row.failure_reason,
      lastFailureAt: toUtcDate(row.last_failure_at),
      lastValidatedAt: toUtcDate(row.last_validated_at),
      lastUsedAt: toUtcDate(row.last_used_at),
      asset: {
        id: row.digital_asset_id,
        platform: row.platform,
        externalId: row.external_id,
        name: row.asset_name,
        isActive: row.is_active,
        meta: row.meta ?? {}
      }
    };
  }

  async get(id: string): Promise<Connection | null> {
    const rows = await this.db.query<Row>(`${SELECT_CONNECTION} WHERE c.id = $1`, [id]);
    return rows.rows[0] ? this.map(rows.rows[0]) : null;
  }

  async getByPlatform(platform: Platform, campaignerId: string, customerId?: string | null): Promise<Connection | null> {
    const rows = await this.db.query<Row>(
      `${SELECT_CONNECTION}
       WHERE a.platform = $1
         AND c.campaigner_id = $2
         AND ($3::text IS NULL OR c.customer_id = $3)
         AND c.revoked = FALSE
         AND a.is_active = TRUE
       ORDER BY c.updated_at DESC
       LIMIT 1`,
      [platform, campaignerId, customerId ?? null]
    );
    return rows.rows[0] ? this.map(rows.rows[0]) : null;
  }

  async listFailing(query: FailingConnectionQuery): Promise<Connection[]> {
    const rows = await this.db.query<Row>(
      `${SELECT_CONNECTION}
       WHERE c.revoked = FALSE
         AND c.failure_count >= $1
         AND ($2::text IS NULL OR c.customer_id = $2)
       ORDER BY c.failure_count DESC, c.last_failure_at DESC NULLS LAST`,
      [query.minFailureCount, query.customerId ?? null]
    );
    return rows.rows.map((row) => this.map(row));
  }

  async updateTokens(id: string, tokens: TokenUpdate): Promise<boolean> {
    const rows = await this.db.query<{ id: string }>(
      `UPDATE connections
       SET access_token_enc = $2,
           refresh_token_enc = COALESCE($3, refresh_token_enc),
           expires_at = $4,
           updated_at = NOW()
       WHERE id = $1
       RETURNING id`,
      [
        id,
        this.crypto.seal(tokens.accessToken),
        tokens.refreshToken === undefined ? null : this.crypto.seal(tokens.refreshToken),
        tokens.expiresAt
      ]
    );
    return rows.rows.length > 0;
  }

  async recordFailure(id: string, failure: FailureUpdate): Promise<Connection | null> {
    return this.db.transaction(async (tx) => {
      const updated = await tx.query<{ id: string }>(
        `UPDATE connections
         SET failure_count = failure_count + 1,
             failure_reason = $2,
             last_failure_at = $3,
             needs_reauth = needs_reauth OR $4::boolean,
             updated_at = NOW()
         WHERE id = $1
         RETURNING id`,
        [id, failure.reason, failure.at, failure.setNeedsReauth]
      );
      if (updated.rows.length === 0) return null;

      const rows = await tx.query<Row>(`${SELECT_CONNECTION} WHERE c.id = $1`, [id]);
      return rows.rows[0] ? this.map(rows.rows[0]) : null;
    });
  }

  async recordSuccess(id: string, success: SuccessUpdate): Promise<boolean> {
    const rows = await this.db.query<{ id: string }>(
      `UPDATE connections
       SET last_validated_at = $2,
           last_used_at = $2,
           needs_reauth = FALSE,
           failure_count = CASE WHEN $3::boolean THEN 0 ELSE failure_count END,
           failure_reason = CASE WHEN $3::boolean THEN NULL ELSE failure_reason END,
           last_failure_at = CASE WHEN $3::boolean THEN NULL ELSE last_failure_at END,
           updated_at = NOW()
       WHERE id = $1
       RETURNING id`,
      [id, success.at, success.resetFailureCount]
    );
    return rows.rows.length > 0;
  }
}
