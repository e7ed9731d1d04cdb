import { describe, expect, it } from 'vitest';
import { TokenRefresher } from '../src/oauth/token-refresher.js';
import { OAuthRefreshError, type RefreshedToken } from '../src/oauth/refresh-client.js';
import { ConnectionHealthRecorder } from '../src/health/health-recorder.js';
import { WorkingSet } from '../src/platforms/working-set.js';
import type { PlatformCredentialBundle } from '../src/platforms/credentials.js';
import type { Connection } from '../src/db/repositories/connections.js';
import {
  FakeOAuthClient,
  InMemoryConnectionStore,
  RecordingIncidentSink,
  makeConnection,
  silentLogger
} from './support/fakes.js';

const now = new Date('2026-10-19T12:00:00Z');
const expired = new Date('2026-10-19T11:00:00Z');

const bundle: PlatformCredentialBundle = {
  google_analytics: { refreshToken: 'refresh-google_analytics', propertyId: '123456789' },
  google_ads: { refreshToken: 'refresh-google_ads', customerId: '1112223333' },
  facebook_ads: { accessToken: 'access-facebook_ads', accountId: 'act_42' }
};

function setup(connections: Connection[], oauth: FakeOAuthClient) {
  const store = new InMemoryConnectionStore(connections);
  const sink = new RecordingIncidentSink();
  const health = new ConnectionHealthRecorder(store, sink, silentLogger, () => now);
  const refresher = new TokenRefresher(store, oauth, health, silentLogger, () => now);
  return { store, sink, health, refresher };
}

const fresh = (accessToken: string): (() => Promise<RefreshedToken>) => async () => ({ accessToken, expiresIn: 3600 });

describe('TokenRefresher', () => {
  it('substitutes a refreshed token and records success', async () => {
    const connection = makeConnection('google_analytics', { expiresAt: expired, failureCount: 2 });
    const oauth = new FakeOAuthClient({ google: fresh('new-access') });
    const { store, refresher } = setup([connection], oauth);

    const outcome = await refresher.refresh('campaigner-1', WorkingSet.of(['google_analytics']), bundle, 'customer-1');

    expect(outcome.set.toArray()).toEqual(['google_analytics']);
    expect(outcome.removals).toEqual([]);
    expect(outcome.bundle.google_analytics).toEqual({
      refreshToken: 'refresh-google_analytics',
      propertyId: '123456789',
      accessToken: 'new-access',
      connectionId: connection.id
    });
    expect(oauth.calls).toEqual([{ provider: 'google', token: 'refresh-google_analytics' }]);

    const stored = store.require(connection.id);
    expect(stored.accessToken).toBe('new-access');
    expect(stored.refreshToken).toBe('refresh-google_analytics');
    expect(stored.expiresAt?.toISOString()).toBe('2026-10-19T13:00:00.000Z');
    expect(stored.failureCount).toBe(0);
    expect(stored.lastValidatedAt).toEqual(now);
  });

  it('exchanges the current access token for Facebook', async () => {
    const connection = makeConnection('facebook_ads', { expiresAt: null });
    const oauth = new FakeOAuthClient({ facebook: fresh('long-lived') });
    const { refresher } = setup([connection], oauth);

    const outcome = await refresher.refresh('campaigner-1', WorkingSet.of(['facebook_ads']), bundle);

    expect(oauth.calls).toEqual([{ provider: 'facebook', token: 'access-facebook_ads' }]);
    expect(outcome.bundle.facebook_ads?.accessToken).toBe('long-lived');
  });

  it('marks the connection for re-authentication on invalid_grant', async () => {
    const connection = makeConnection('google_ads', { expiresAt: expired });
    const oauth = new FakeOAuthClient({
      google: async () => {
        throw new OAuthRefreshError('google', 'invalid_grant', 'Token has been expired or revoked.', true);
      }
    });
    const { store, sink, health, refresher } = setup([connection], oauth);

    const outcome = await refresher.refresh('campaigner-1', WorkingSet.of(['google_ads']), bundle);
    await health.flush();

    expect(outcome.set.isEmpty()).toBe(true);
    expect(outcome.bundle.google_ads).toBeUndefined();
    expect(outcome.removals).toEqual([
      {
        platform: 'google_ads',
        stage: 'refresh',
        reason: 're-authentication required',
        detail: 'token_refresh_failed: invalid_grant (Token has been expired or revoked.)',
        connectionId: connection.id
      }
    ]);

    const stored = store.require(connection.id);
    expect(stored.needsReauth).toBe(true);
    expect(stored.failureCount).toBe(1);
    expect(stored.failureReason).toBe('token_refresh_failed: invalid_grant');
    expect(sink.incidents).toHaveLength(1);
  });

  it('records transient failures without flagging re-authentication', async () => {
    const connection = makeConnection('google_ads', { expiresAt: expired });
    const oauth = new FakeOAuthClient({
      google: async () => {
        throw new OAuthRefreshError('google', 'network_error', 'fetch failed', false);
      }
    });
    const { store, sink, health, refresher } = setup([connection], oauth);

    const outcome = await refresher.refresh('campaigner-1', WorkingSet.of(['google_ads']), bundle);
    await health.flush();

    expect(outcome.removals[0]?.reason).toBe('Token refresh failed');
    expect(store.require(connection.id).needsReauth).toBe(false);
    expect(store.require(connection.id).failureReason).toBe('token_refresh_failed: network_error');
    expect(sink.incidents).toEqual([]);
  });

  it('treats unexpected errors as transient', async () => {
    const connection = makeConnection('google_ads', { expiresAt: expired });
    const oauth = new FakeOAuthClient({
      google: async () => {
        throw new Error('socket hang up');
      }
    });
    const { refresher } = setup([connection], oauth);

    const outcome = await refresher.refresh('campaigner-1', WorkingSet.of(['google_ads']), bundle);
    expect(outcome.removals[0]?.detail).toBe('token_refresh_failed: unexpected_error (socket hang up)');
  });

  it('keeps unexpired tokens without calling the provider', async () => {
    const connection = makeConnection('google_ads');
    const oauth = new FakeOAuthClient({ google: fresh('unused') });
    const { store, refresher } = setup([connection], oauth);

    const outcome = await refresher.refresh('campaigner-1', WorkingSet.of(['google_ads']), bundle);

    expect(oauth.calls).toEqual([]);
    expect(store.tokenWrites).toBe(0);
    expect(outcome.set.toArray()).toEqual(['google_ads']);
    expect(outcome.bundle.google_ads?.connectionId).toBe(connection.id);
    expect(outcome.bundle.google_ads?.accessToken).toBeUndefined();
  });

  it('skips connections already flagged for re-authentication', async () => {
    const connection = makeConnection('google_analytics', {
      expiresAt: expired,
      needsReauth: true,
      failureCount: 1,
      failureReason: 'token_refresh_failed: invalid_grant'
    });
    const oauth = new FakeOAuthClient({ google: fresh('unused') });
    const { store, refresher } = setup([connection], oauth);

    const outcome = await refresher.refresh('campaigner-1', WorkingSet.of(['google_analytics']), bundle);

    expect(oauth.calls).toEqual([]);
    expect(outcome.removals).toEqual([
      {
        platform: 'google_analytics',
        stage: 'refresh',
        reason: 're-authentication required',
        detail: 'token_refresh_failed: invalid_grant',
        connectionId: connection.id
      }
    ]);
    expect(store.require(connection.id).failureCount).toBe(1);
  });

  it('fails a platform with no refresh material', async () => {
    const connection = makeConnection('google_analytics', { expiresAt: expired, refreshToken: null });
    const oauth = new FakeOAuthClient({ google: fresh('unused') });
    const { refresher } = setup([connection], oauth);

    const outcome = await refresher.refresh(
      'campaigner-1',
      WorkingSet.of(['google_analytics']),
      { google_analytics: { refreshToken: '', propertyId: '123456789' } }
    );

    expect(oauth.calls).toEqual([]);
    expect(outcome.removals[0]?.detail).toBe('token_refresh_failed: missing_refresh_token');
  });

  it('keeps platforms with no stored connection untouched', async () => {
    const oauth = new FakeOAuthClient({ google: fresh('unused') });
    const { refresher } = setup([], oauth);

    const outcome = await refresher.refresh('campaigner-1', WorkingSet.of(['google_ads']), bundle);

    expect(outcome.set.toArray()).toEqual(['google_ads']);
    expect(outcome.bundle.google_ads).toEqual(bundle.google_ads);
  });

  it('drops only the failing platform', async () => {
    const ga = makeConnection('google_analytics', { expiresAt: expired });
    const fb = makeConnection('facebook_ads');
    const oauth = new FakeOAuthClient({
      google: async () => {
        throw new OAuthRefreshError('google', 'invalid_grant', 'revoked', true);
      },
      facebook: fresh('unused')
    });
    const { refresher } = setup([ga, fb], oauth);

    const outcome = await refresher.refresh('campaigner-1', WorkingSet.of(['google_analytics', 'facebook_ads']), bundle);

    expect(outcome.set.toArray()).toEqual(['facebook_ads']);
    expect(outcome.removals.map((removal) => removal.platform)).toEqual(['google_analytics']);
    expect(Object.keys(outcome.bundle)).toEqual(['google_ads', 'facebook_ads']);
  });

  it('removes every platform when the store is unavailable', async () => {
    const oauth = new FakeOAuthClient({ google: fresh('unused') });
    const { store, refresher } = setup([makeConnection('google_ads')], oauth);
    store.unavailable = true;

    const outcome = await refresher.refresh('campaigner-1', WorkingSet.of(['google_analytics', 'google_ads']), bundle);

    expect(outcome.set.isEmpty()).toBe(true);
    expect(outcome.removals).toEqual([
      { platform: 'google_analytics', stage: 'refresh', reason: 'Token refresh unavailable', detail: 'connection refused' },
      { platform: 'google_ads', stage: 'refresh', reason: 'Token refresh unavailable', detail: 'connection refused' }
    ]);
  });

  it('removes every platform when a provider is not configured', async () => {
    const ga = makeConnection('google_analytics');
    const fb = makeConnection('facebook_ads', { expiresAt: expired });
    const oauth = new FakeOAuthClient({ google: fresh('unused') });
    const { refresher } = setup([ga, fb], oauth);

    const outcome = await refresher.refresh('campaigner-1', WorkingSet.of(['google_analytics', 'facebook_ads']), bundle);

    expect(outcome.set.isEmpty()).toBe(true);
    expect(outcome.removals.map((removal) => removal.reason)).toEqual(['Token refresh unavailable', 'Token refresh unavailable']);
    expect(outcome.removals[0]?.detail).toBe('OAuth client for facebook is not configured');
  });
});
