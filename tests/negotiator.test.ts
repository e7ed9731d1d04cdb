import { describe, expect, it } from 'vitest';
import { TransportNegotiator } from '../src/connectors/negotiator.js';
import { ServerRegistry, type ServerRegistryConfig } from '../src/connectors/server-registry.js';
import type { HttpSessionConfig } from '../src/connectors/http-session.js';
import type { StdioServerParams } from '../src/connectors/stdio-adapter.js';
import type { Platform } from '../src/platforms/platform.js';
import { WorkingSet } from '../src/platforms/working-set.js';
import type { PlatformCredentialBundle } from '../src/platforms/credentials.js';
import { ADS_TOOLS, FB_TOOLS, FakeToolSource, GA_TOOLS, silentLogger, type FakeToolSourceOptions } from './support/fakes.js';

const bundle: PlatformCredentialBundle = {
  google_analytics: { refreshToken: 'refresh-ga', propertyId: '123456789' },
  google_ads: { refreshToken: 'refresh-ads', customerId: '1112223333', loginCustomerId: '9998887777' },
  facebook_ads: { accessToken: 'access-fb', accountId: 'act_42' }
};

const registryConfig: ServerRegistryConfig = {
  oauth: {
    googleClientId: 'test-client',
    googleClientSecret: 'test-secret',
    googleAdsDeveloperToken: 'test-developer-token',
    facebookAppId: 'test-app',
    facebookAppSecret: 'test-app-secret'
  },
  httpUrls: {
    google_analytics: 'http://ga.test',
    google_ads: 'http://ads.test',
    facebook_ads: 'http://fb.test'
  },
  stdioCommand: 'python3',
  serversDir: '/srv/mcps'
};

const TOOLS: Record<Platform, string[]> = {
  google_analytics: GA_TOOLS,
  google_ads: ADS_TOOLS,
  facebook_ads: FB_TOOLS
};

interface Harness {
  negotiator: TransportNegotiator;
  http: Array<{ config: HttpSessionConfig; source: FakeToolSource }>;
  stdio: Array<{ params: StdioServerParams; source: FakeToolSource }>;
}

function harness(
  options: {
    config?: ServerRegistryConfig;
    http?: Partial<Record<Platform, FakeToolSourceOptions>>;
    stdio?: Partial<Record<string, FakeToolSourceOptions>>;
  } = {}
): Harness {
  const http: Harness['http'] = [];
  const stdio: Harness['stdio'] = [];
  const negotiator = new TransportNegotiator(new ServerRegistry(options.config ?? registryConfig), silentLogger, {
    createHttpSession: (config) => {
      const source = new FakeToolSource(config.server, { tools: TOOLS[config.platform], ...options.http?.[config.platform] });
      http.push({ config, source });
      return source;
    },
    createStdioServer: (params) => {
      const source = new FakeToolSource(params.server, { tools: [], ...options.stdio?.[params.server] });
      stdio.push({ params, source });
      return source;
    }
  });
  return { negotiator, http, stdio };
}

const all = WorkingSet.of(['google_analytics', 'google_ads', 'facebook_ads']);

describe('TransportNegotiator', () => {
  it('connects every platform over HTTP with the init payloads', async () => {
    const h = harness();

    const result = await h.negotiator.connect(all, bundle, 'http');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.client.mode).toBe('http');
    expect(result.set.toArray()).toEqual(['google_analytics', 'google_ads', 'facebook_ads']);
    expect(result.client.sources().map((source) => source.server)).toEqual([
      'google_analytics_http',
      'google_ads_http',
      'facebook_ads_http'
    ]);
    expect(h.http.map((entry) => entry.config.payload)).toEqual([
      { refresh_token: 'refresh-ga', property_id: '123456789', client_id: 'test-client', client_secret: 'test-secret' },
      {
        refresh_token: 'refresh-ads',
        customer_id: '1112223333',
        client_id: 'test-client',
        client_secret: 'test-secret',
        developer_token: 'test-developer-token',
        login_customer_id: '9998887777'
      },
      { access_token: 'access-fb', account_id: 'act_42', app_id: 'test-app', app_secret: 'test-app-secret' }
    ]);
  });

  it('keeps the HTTP sessions that came up when some fail', async () => {
    const h = harness({ http: { google_ads: { startError: new Error('Upstream HTTP 503: unavailable') } } });

    const result = await h.negotiator.connect(all, bundle, 'http');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.set.toArray()).toEqual(['google_analytics', 'facebook_ads']);
    expect(result.client.platforms).toEqual(['google_analytics', 'facebook_ads']);
    expect(result.removals).toEqual([
      {
        platform: 'google_ads',
        stage: 'transport',
        reason: 'HTTP initialize failed',
        detail: 'Upstream HTTP 503: unavailable'
      }
    ]);
  });

  it('removes platforms without an endpoint or complete credentials', async () => {
    const h = harness({
      config: {
        ...registryConfig,
        oauth: { ...registryConfig.oauth, googleAdsDeveloperToken: undefined },
        httpUrls: { google_analytics: 'http://ga.test', google_ads: 'http://ads.test' }
      }
    });

    const result = await h.negotiator.connect(all, bundle, 'http');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.set.toArray()).toEqual(['google_analytics']);
    expect(result.removals).toEqual([
      {
        platform: 'google_ads',
        stage: 'transport',
        reason: 'HTTP initialize failed',
        detail: 'Google Ads HTTP initialize is missing developer_token'
      },
      { platform: 'facebook_ads', stage: 'transport', reason: 'No HTTP endpoint configured' }
    ]);
    expect(h.http.map((entry) => entry.config.platform)).toEqual(['google_analytics']);
  });

  it('fails HTTP mode when no session comes up', async () => {
    const h = harness({
      http: {
        google_analytics: { startError: new Error('fetch failed') },
        google_ads: { startError: new Error('fetch failed') },
        facebook_ads: { startError: new Error('fetch failed') }
      }
    });

    const result = await h.negotiator.connect(all, bundle, 'http');

    expect(result).toMatchObject({ ok: false, error: 'No HTTP tool server could be initialized' });
    expect(result.removals).toHaveLength(3);
    expect(h.stdio).toEqual([]);
  });

  it('falls back to stdio in auto mode only when HTTP fails entirely', async () => {
    const failing = { startError: new Error('fetch failed') };
    const h = harness({ http: { google_analytics: failing, facebook_ads: failing } });
    const set = WorkingSet.of(['google_analytics', 'facebook_ads']);

    const result = await h.negotiator.connect(set, bundle, 'auto');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.client.mode).toBe('stdio');
    expect(result.set.toArray()).toEqual(['google_analytics', 'facebook_ads']);
    expect(result.removals).toEqual([]);
    expect(h.stdio.map((entry) => entry.params.server)).toEqual(['google_analytics_oauth', 'meta_ads_mcp']);
    expect(h.stdio.every((entry) => entry.source.started)).toBe(true);
  });

  it('stays on HTTP in auto mode when one session comes up', async () => {
    const h = harness({ http: { google_analytics: { startError: new Error('fetch failed') } } });

    const result = await h.negotiator.connect(WorkingSet.of(['google_analytics', 'facebook_ads']), bundle, 'auto');

    expect(result.ok && result.client.mode).toBe('http');
    expect(h.stdio).toEqual([]);
  });

  it('builds stdio launch parameters from the bundle', async () => {
    const h = harness();

    await h.negotiator.connect(WorkingSet.of(['google_analytics', 'google_ads', 'facebook_ads']), bundle, 'stdio');

    const [ga, ads, fb] = h.stdio.map((entry) => entry.params);
    expect(ga).toMatchObject({
      server: 'google_analytics_oauth',
      command: 'python3',
      cwd: '/srv/mcps/google-analytics-oauth',
      args: ['/srv/mcps/google-analytics-oauth/ga4_oauth_server.py'],
      env: {
        GOOGLE_ANALYTICS_REFRESH_TOKEN: 'refresh-ga',
        GOOGLE_ANALYTICS_PROPERTY_ID: '123456789',
        GOOGLE_ANALYTICS_CLIENT_ID: 'test-client',
        GOOGLE_ANALYTICS_CLIENT_SECRET: 'test-secret'
      }
    });
    expect(ads).toMatchObject({ server: 'google_ads_mcp', args: ['-m', 'ads_mcp.server'] });
    expect(ads?.env.GOOGLE_ADS_LOGIN_CUSTOMER_ID).toBe('9998887777');
    expect(fb?.env).toEqual({
      FACEBOOK_ACCESS_TOKEN: 'access-fb',
      FACEBOOK_APP_ID: 'test-app',
      FACEBOOK_APP_SECRET: 'test-app-secret',
      FACEBOOK_AD_ACCOUNT_ID: 'act_42'
    });
  });

  it('tears down every stdio server when one fails to start', async () => {
    const h = harness({ stdio: { meta_ads_mcp: { startError: new Error('spawn python3 ENOENT') } } });

    const result = await h.negotiator.connect(all, bundle, 'stdio');

    expect(result).toMatchObject({ ok: false, error: 'spawn python3 ENOENT' });
    expect(result.removals.map((removal) => [removal.platform, removal.reason])).toEqual([
      ['google_analytics', 'Stdio transport failed'],
      ['google_ads', 'Stdio transport failed'],
      ['facebook_ads', 'Stdio transport failed']
    ]);
    expect(h.stdio.map((entry) => entry.source.closed)).toEqual([1, 1, 1]);
  });

  it('fails stdio when credentials are incomplete', async () => {
    const h = harness();

    const result = await h.negotiator.connect(
      WorkingSet.of(['google_analytics', 'facebook_ads']),
      { facebook_ads: bundle.facebook_ads },
      'stdio'
    );

    expect(result).toMatchObject({ ok: false, error: 'Google Analytics is missing credentials' });
    expect(h.stdio).toEqual([]);
  });

  it('refuses an empty working set', async () => {
    const result = await harness().negotiator.connect(WorkingSet.of([]), bundle, 'auto');
    expect(result).toEqual({ ok: false, removals: [], error: 'No platforms to connect' });
  });
});
