import type { CredentialStore, Connection } from '../db/repositories/connections.js';
import type { HealthRecorder } from '../health/health-recorder.js';
import type { Logger } from '../logging/logger.js';
import { OAUTH_PROVIDER, type Platform } from '../platforms/platform.js';
import { WorkingSet } from '../platforms/working-set.js';
import {
  patchCredentials,
  withoutPlatforms,
  type CredentialPatch,
  type PlatformCredentialBundle
} from '../platforms/credentials.js';
import type { StageRemoval } from '../validation/result.js';
import { errorMessage } from '../mcp/error-mapper.js';
import { expiryFromNow, isTokenExpired } from './expiry.js';
import { OAuthRefreshError, RefreshUnavailableError, type OAuthRefreshClient } from './refresh-client.js';

export interface RefreshOutcome {
  set: WorkingSet;
  bundle: PlatformCredentialBundle;
  removals: StageRemoval[];
}

type Decision =
  | { platform: Platform; kind: 'keep'; patch?: CredentialPatch }
  | { platform: Platform; kind: 'remove'; removal: StageRemoval };

const failureReason = (error: string): string => `token_refresh_failed: ${error}`;

function refreshMaterial(platform: Platform, bundle: PlatformCredentialBundle, connection: Connection): string | null {
  switch (platform) {
    case 'google_analytics':
      return bundle.google_analytics?.refreshToken || connection.refreshToken;
    case 'google_ads':
      return bundle.google_ads?.refreshToken || connection.refreshToken;
    case 'facebook_ads':
      return bundle.facebook_ads?.accessToken || connection.accessToken;
  }
}

/**
 * Refreshes expiring OAuth tokens for every platform in the working set.
 * Platforms whose refresh fails leave the set; a failure of the refresh
 * machinery itself (store or provider configuration) empties it.
 */
export class TokenRefresher {
  constructor(
    private readonly store: CredentialStore,
    private readonly oauth: OAuthRefreshClient,
    private readonly health: HealthRecorder,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date()
  ) {}

  async refresh(
    campaignerId: string,
    set: WorkingSet,
    bundle: PlatformCredentialBundle,
    customerId?: string | null
  ): Promise<RefreshOutcome> {
    let decisions: Decision[];
    try {
      decisions = await Promise.all(set.toArray().map((platform) => this.refreshOne(platform, campaignerId, customerId, bundle)));
    } catch (error) {
      const detail = errorMessage(error);
      this.logger.error({ campaignerId, err: detail }, 'Token refresh unavailable, dropping every platform');
      const removals = set.toArray().map<StageRemoval>((platform) => ({
        platform,
        stage: 'refresh',
        reason: 'Token refresh unavailable',
        detail
      }));
      return { set: set.without(set.toArray()), bundle: withoutPlatforms(bundle, set.toArray()), removals };
    }

    let nextBundle = bundle;
    const removals: StageRemoval[] = [];
    for (const decision of decisions) {
      if (decision.kind === 'remove') {
        removals.push(decision.removal);
      } else if (decision.patch) {
        nextBundle = patchCredentials(nextBundle, decision.platform, decision.patch);
      }
    }

    const removed = removals.map((removal) => removal.platform);
    return {
      set: set.without(removed),
      bundle: withoutPlatforms(nextBundle, removed),
      removals
    };
  }

  private async refreshOne(
    platform: Platform,
    campaignerId: string,
    customerId: string | null | undefined,
    bundle: PlatformCredentialBundle
  ): Promise<Decision> {
    const connection = await this.store.getByPlatform(platform, campaignerId, customerId);
    if (!connection) {
      return { platform, kind: 'keep' };
    }

    if (connection.needsReauth) {
      this.logger.warn({ platform, connectionId: connection.id }, 'Connection needs re-authentication, skipping');
      return {
        platform,
        kind: 'remove',
        removal: {
          platform,
          stage: 'refresh',
          reason: 're-authentication required',
          detail: connection.failureReason ?? undefined,
          connectionId: connection.id
        }
      };
    }

    if (!isTokenExpired(connection.expiresAt, this.now())) {
      return { platform, kind: 'keep', patch: { connectionId: connection.id } };
    }

    const provider = OAUTH_PROVIDER[platform];
    if (!this.oauth.supports(provider)) {
      throw new RefreshUnavailableError(provider);
    }

    const material = refreshMaterial(platform, bundle, connection);
    if (!material) {
      return this.fail(platform, connection, 'missing_refresh_token', false);
    }

    this.logger.info({ platform, connectionId: connection.id }, 'Token expired, refreshing');
    try {
      const refreshed = await this.oauth.refresh(provider, material);
      await this.store.updateTokens(connection.id, {
        accessToken: refreshed.accessToken,
        refreshToken: refreshed.refreshToken,
        expiresAt: expiryFromNow(refreshed.expiresIn, this.now())
      });
      await this.health.recordSuccess(connection.id, true);
      return { platform, kind: 'keep', patch: { accessToken: refreshed.accessToken, connectionId: connection.id } };
    } catch (error) {
      if (error instanceof RefreshUnavailableError) throw error;
      if (error instanceof OAuthRefreshError) {
        return this.fail(platform, connection, error.error, error.permanent, error.errorDescription);
      }
      return this.fail(platform, connection, 'unexpected_error', false, errorMessage(error));
    }
  }

  private async fail(
    platform: Platform,
    connection: Connection,
    error: string,
    permanent: boolean,
    description?: string
  ): Promise<Decision> {
    const reason = failureReason(error);
    this.logger.error({ platform, connectionId: connection.id, error, permanent, description }, 'Token refresh failed');
    await this.health.recordFailure(connection.id, reason, permanent);
    return {
      platform,
      kind: 'remove',
      removal: {
        platform,
        stage: 'refresh',
        reason: permanent ? 're-authentication required' : 'Token refresh failed',
        detail: description ? `${reason} (${description})` : reason,
        connectionId: connection.id
      }
    };
  }
}
