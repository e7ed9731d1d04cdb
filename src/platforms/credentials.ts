import type { Platform } from './platform.js';

export interface GoogleAnalyticsCredentials {
  refreshToken: string;
  accessToken?: string;
  propertyId: string;
  connectionId?: string;
}

export interface GoogleAdsCredentials {
  refreshToken: string;
  accessToken?: string;
  customerId: string;
  loginCustomerId?: string;
  connectionId?: string;
}

export interface FacebookAdsCredentials {
  accessToken: string;
  accountId: string;
  connectionId?: string;
}

export interface PlatformCredentialMap {
  google_analytics: GoogleAnalyticsCredentials;
  google_ads: GoogleAdsCredentials;
  facebook_ads: FacebookAdsCredentials;
}

export type PlatformCredentials = PlatformCredentialMap[Platform];

export type PlatformCredentialBundle = { [P in Platform]?: PlatformCredentialMap[P] };

export function withCredentials<P extends Platform>(
  bundle: PlatformCredentialBundle,
  platform: P,
  credentials: PlatformCredentialMap[P]
): PlatformCredentialBundle {
  const next: PlatformCredentialBundle = { ...bundle };
  next[platform] = credentials;
  return next;
}

export interface CredentialPatch {
  accessToken?: string;
  connectionId?: string;
}

/** Applies a token/connection patch to a platform entry already in the bundle. */
export function patchCredentials(bundle: PlatformCredentialBundle, platform: Platform, patch: CredentialPatch): PlatformCredentialBundle {
  const next: PlatformCredentialBundle = { ...bundle };
  switch (platform) {
    case 'google_analytics':
      if (next.google_analytics) next.google_analytics = { ...next.google_analytics, ...patch };
      break;
    case 'google_ads':
      if (next.google_ads) next.google_ads = { ...next.google_ads, ...patch };
      break;
    case 'facebook_ads':
      if (next.facebook_ads) next.facebook_ads = { ...next.facebook_ads, ...patch };
      break;
  }
  return next;
}

export function withoutPlatforms(bundle: PlatformCredentialBundle, removed: Iterable<Platform>): PlatformCredentialBundle {
  const next: PlatformCredentialBundle = { ...bundle };
  for (const platform of removed) {
    delete next[platform];
  }
  return next;
}

export function connectionIdsOf(bundle: PlatformCredentialBundle): Partial<Record<Platform, string>> {
  const ids: Partial<Record<Platform, string>> = {};
  if (bundle.google_analytics?.connectionId) ids.google_analytics = bundle.google_analytics.connectionId;
  if (bundle.google_ads?.connectionId) ids.google_ads = bundle.google_ads.connectionId;
  if (bundle.facebook_ads?.connectionId) ids.facebook_ads = bundle.facebook_ads.connectionId;
  return ids;
}
