export const PLATFORMS = ['google_analytics', 'google_ads', 'facebook_ads'] as const;

export type Platform = (typeof PLATFORMS)[number];

export type OAuthProvider = 'google' | 'facebook';

export const OAUTH_PROVIDER: Record<Platform, OAuthProvider> = {
  google_analytics: 'google',
  google_ads: 'google',
  facebook_ads: 'facebook'
};

export const PLATFORM_LABEL: Record<Platform, string> = {
  google_analytics: 'Google Analytics',
  google_ads: 'Google Ads',
  facebook_ads: 'Facebook Ads'
};

const ALIASES: Record<string, Platform[]> = {
  google_analytics: ['google_analytics'],
  'google-analytics': ['google_analytics'],
  ga4: ['google_analytics'],
  ga: ['google_analytics'],
  analytics: ['google_analytics'],
  google_ads: ['google_ads'],
  'google-ads': ['google_ads'],
  ads: ['google_ads'],
  adwords: ['google_ads'],
  facebook_ads: ['facebook_ads'],
  facebook: ['facebook_ads'],
  meta: ['facebook_ads'],
  meta_ads: ['facebook_ads'],
  fb: ['facebook_ads'],
  google: ['google_analytics', 'google_ads']
};

export function isPlatform(value: string): value is Platform {
  return (PLATFORMS as readonly string[]).includes(value);
}

/**
 * Resolves one requested platform name (or group alias such as `google`)
 * into canonical platforms. Returns an empty list for unknown names.
 */
export function canonicalizePlatform(name: string): Platform[] {
  const key = name.trim().toLowerCase();
  return ALIASES[key] ?? [];
}

export function expandPlatforms(names: readonly string[]): { platforms: Platform[]; unknown: string[] } {
  const platforms: Platform[] = [];
  const unknown: string[] = [];

  for (const name of names) {
    const resolved = canonicalizePlatform(name);
    if (resolved.length === 0) {
      unknown.push(name);
      continue;
    }
    for (const platform of resolved) {
      if (!platforms.includes(platform)) platforms.push(platform);
    }
  }

  return { platforms, unknown };
}

// Order matters: `meta_ads_mcp` contains `ads_mcp`, so Facebook is tested before Google Ads.
const SERVER_KEYWORDS: Array<[Platform, string[]]> = [
  ['google_analytics', ['google_analytics', 'google-analytics', 'googleanalytics', 'ga4', 'analytics']],
  ['facebook_ads', ['facebook', 'meta']],
  ['google_ads', ['google_ads', 'google-ads', 'googleads', 'ads_mcp', 'adwords']]
];

/**
 * Infers the platform behind a transport/server identifier. `null` means the
 * platform is indeterminate and callers must treat the failure as affecting
 * the whole working set.
 */
export function resolvePlatformFromServer(server: string): Platform | null {
  const normalized = server.toLowerCase();
  for (const [platform, keywords] of SERVER_KEYWORDS) {
    if (keywords.some((keyword) => normalized.includes(keyword))) {
      return platform;
    }
  }
  return null;
}
