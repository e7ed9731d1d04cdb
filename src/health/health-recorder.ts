import type { Connection, CredentialStore } from '../db/repositories/connections.js';
import type { IncidentSink } from '../alerts/incident-sink.js';
import type { Logger } from '../logging/logger.js';
import { PLATFORM_LABEL, type Platform } from '../platforms/platform.js';
import { errorMessage } from '../mcp/error-mapper.js';

export const DEFAULT_MAX_FAILURES = 3;

export interface HealthRecorder {
  recordFailure(connectionId: string, reason: string, alsoSetNeedsReauth?: boolean): Promise<boolean>;
  recordSuccess(connectionId: string, resetFailureCount?: boolean): Promise<boolean>;
}

export type ConnectionHealthState = 'healthy' | 'degraded' | 'needs_reauth' | 'revoked';

export interface ConnectionHealthSummary {
  connectionId: string;
  platform: Platform;
  assetName: string;
  state: ConnectionHealthState;
  failureCount: number;
  failureReason: string | null;
  lastFailureAt: string | null;
  lastValidatedAt: string | null;
  lastUsedAt: string | null;
  expiresAt: string | null;
  shouldRetry: boolean;
}

export function shouldRetry(connection: Pick<Connection, 'failureCount'>, maxFailures = DEFAULT_MAX_FAILURES): boolean {
  return connection.failureCount < maxFailures;
}

export function summarize(connection: Connection, maxFailures = DEFAULT_MAX_FAILURES): ConnectionHealthSummary {
  let state: ConnectionHealthState = 'healthy';
  if (connection.revoked) state = 'revoked';
  else if (connection.needsReauth) state = 'needs_reauth';
  else if (connection.failureCount > 0) state = 'degraded';

  return {
    connectionId: connection.id,
    platform: connection.asset.platform,
    assetName: connection.asset.name,
    state,
    failureCount: connection.failureCount,
    failureReason: connection.failureReason,
    lastFailureAt: connection.lastFailureAt?.toISOString() ?? null,
    lastValidatedAt: connection.lastValidatedAt?.toISOString() ?? null,
    lastUsedAt: connection.lastUsedAt?.toISOString() ?? null,
    expiresAt: connection.expiresAt?.toISOString() ?? null,
    shouldRetry: shouldRetry(connection, maxFailures)
  };
}

/**
 * Persists per-connection failure and success telemetry through the store's
 * column-scoped updates. Writes never throw: a missing row or store error is
 * logged and reported as `false`.
 */
export class ConnectionHealthRecorder implements HealthRecorder {
  private readonly pendingAlerts = new Set<Promise<void>>();

  constructor(
    private readonly store: CredentialStore,
    private readonly incidents: IncidentSink,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date()
  ) {}

  async recordFailure(connectionId: string, reason: string, alsoSetNeedsReauth = false): Promise<boolean> {
    try {
      const updated = await this.store.recordFailure(connectionId, {
        reason,
        at: this.now(),
        setNeedsReauth: alsoSetNeedsReauth
      });
      if (!updated) {
        this.logger.warn({ connectionId }, 'Connection not found, cannot record failure');
        return false;
      }

      this.logger.info(
        { connectionId, reason, failureCount: updated.failureCount, needsReauth: updated.needsReauth },
        'Recorded connection failure'
      );

      if (alsoSetNeedsReauth) {
        this.raiseReauthIncident(updated, reason);
      }
      return true;
    } catch (error) {
      this.logger.error({ connectionId, err: errorMessage(error) }, 'Failed to record connection failure');
      return false;
    }
  }

  async recordSuccess(connectionId: string, resetFailureCount = true): Promise<boolean> {
    try {
      const found = await this.store.recordSuccess(connectionId, { at: this.now(), resetFailureCount });
      if (!found) {
        this.logger.warn({ connectionId }, 'Connection not found, cannot record success');
        return false;
      }

      this.logger.debug({ connectionId }, 'Recorded connection success');
      return true;
    } catch (error) {
      this.logger.error({ connectionId, err: errorMessage(error) }, 'Failed to record connection success');
      return false;
    }
  }

  /** Resolves once every alert raised so far has settled. */
  async flush(): Promise<void> {
    await Promise.all([...this.pendingAlerts]);
  }

  private raiseReauthIncident(connection: Connection, reason: string): void {
    const label = PLATFORM_LABEL[connection.asset.platform];
    const title = `Re-authentication required: ${label} (${connection.asset.name})`;
    const body = [
      `# ${label} connection needs re-authentication`,
      '',
      `**Connection:** \`${connection.id}\``,
      `**Campaigner:** \`${connection.campaignerId}\``,
      `**Customer:** \`${connection.customerId ?? 'n/a'}\``,
      `**Asset:** ${connection.asset.name} (\`${connection.asset.externalId}\`)`,
      `**Reason:** ${reason}`,
      `**Failure count:** ${connection.failureCount}`,
      '',
      'The stored grant was rejected. Ask the campaigner to re-link the account.'
    ].join('\n');

    const alert = this.incidents
      .createIncident(title, body)
      .then(() => {
        this.logger.info({ connectionId: connection.id }, 'Re-authentication incident created');
      })
      .catch((error: unknown) => {
        this.logger.error({ connectionId: connection.id, err: errorMessage(error) }, 'Failed to create re-authentication incident');
      })
      .finally(() => {
        this.pendingAlerts.delete(alert);
      });
    this.pendingAlerts.add(alert);
  }
}
