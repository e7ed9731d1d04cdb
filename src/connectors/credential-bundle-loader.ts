import type { Connection, CredentialStore } from '../db/repositories/connections.js';
import type { Platform } from '../platforms/platform.js';
import { withCredentials, type PlatformCredentialBundle } from '../platforms/credentials.js';

export interface LoadedBundle {
  bundle: PlatformCredentialBundle;
  /** Platforms with no usable connection, with the reason. */
  missing: Array<{ platform: Platform; reason: string }>;
}

function metaString(connection: Connection, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = connection.asset.meta[key];
    if (typeof value === 'string' && value) return value;
    if (typeof value === 'number') return String(value);
  }
  return undefined;
}

/** Builds per-run credential bundles from stored connections and their digital assets. */
export class CredentialBundleLoader {
  constructor(private readonly store: CredentialStore) {}

  async load(campaignerId: string, customerId: string | null | undefined, platforms: readonly Platform[]): Promise<LoadedBundle> {
    const connections = await Promise.all(
      platforms.map(async (platform) => ({ platform, connection: await this.store.getByPlatform(platform, campaignerId, customerId) }))
    );

    let bundle: PlatformCredentialBundle = {};
    const missing: LoadedBundle['missing'] = [];

    for (const { platform, connection } of connections) {
      if (!connection) {
        missing.push({ platform, reason: 'No active connection' });
        continue;
      }

      switch (platform) {
        case 'google_analytics': {
          const propertyId = metaString(connection, 'property_id') ?? connection.asset.externalId;
          if (!connection.refreshToken) {
            missing.push({ platform, reason: 'Connection has no refresh token' });
            break;
          }
          bundle = withCredentials(bundle, platform, {
            refreshToken: connection.refreshToken,
            accessToken: connection.accessToken ?? undefined,
            propertyId,
            connectionId: connection.id
          });
          break;
        }
        case 'google_ads': {
          const customerAccountId = metaString(connection, 'customer_id') ?? connection.asset.externalId;
          if (!connection.refreshToken) {
            missing.push({ platform, reason: 'Connection has no refresh token' });
            break;
          }
          bundle = withCredentials(bundle, platform, {
            refreshToken: connection.refreshToken,
            accessToken: connection.accessToken ?? undefined,
            customerId: customerAccountId,
            loginCustomerId: metaString(connection, 'login_customer_id'),
            connectionId: connection.id
          });
          break;
        }
        case 'facebook_ads': {
          const accountId = metaString(connection, 'account_id', 'ad_account_id') ?? connection.asset.externalId;
          if (!connection.accessToken) {
            missing.push({ platform, reason: 'Connection has no access token' });
            break;
          }
          bundle = withCredentials(bundle, platform, {
            accessToken: connection.accessToken,
            accountId,
            connectionId: connection.id
          });
          break;
        }
      }
    }

    return { bundle, missing };
  }
}
