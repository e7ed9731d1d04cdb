import { describe, expect, it } from 'vitest';
import { CredentialBundleLoader } from '../src/connectors/credential-bundle-loader.js';
import { InMemoryConnectionStore, makeConnection } from './support/fakes.js';

describe('CredentialBundleLoader', () => {
  it('builds per-platform credentials from stored connections', async () => {
    const ga = makeConnection('google_analytics', {
      asset: { ...makeConnection('google_analytics').asset, meta: { property_id: 'properties/987' } }
    });
    const ads = makeConnection('google_ads', {
      asset: { ...makeConnection('google_ads').asset, meta: { login_customer_id: 4445556666 } }
    });
    const fb = makeConnection('facebook_ads');
    const loader = new CredentialBundleLoader(new InMemoryConnectionStore([ga, ads, fb]));

    const loaded = await loader.load('campaigner-1', 'customer-1', ['google_analytics', 'google_ads', 'facebook_ads']);

    expect(loaded.missing).toEqual([]);
    expect(loaded.bundle).toEqual({
      google_analytics: {
        refreshToken: 'refresh-google_analytics',
        accessToken: 'access-google_analytics',
        propertyId: 'properties/987',
        connectionId: ga.id
      },
      google_ads: {
        refreshToken: 'refresh-google_ads',
        accessToken: 'access-google_ads',
        customerId: '1112223333',
        loginCustomerId: '4445556666',
        connectionId: ads.id
      },
      facebook_ads: { accessToken: 'access-facebook_ads', accountId: 'act_42', connectionId: fb.id }
    });
  });

  it('reports platforms it cannot load', async () => {
    const ads = makeConnection('google_ads', { refreshToken: null });
    const revoked = makeConnection('facebook_ads', { revoked: true });
    const loader = new CredentialBundleLoader(new InMemoryConnectionStore([ads, revoked]));

    const loaded = await loader.load('campaigner-1', null, ['google_analytics', 'google_ads', 'facebook_ads']);

    expect(loaded.bundle).toEqual({});
    expect(loaded.missing).toEqual([
      { platform: 'google_analytics', reason: 'No active connection' },
      { platform: 'google_ads', reason: 'Connection has no refresh token' },
      { platform: 'facebook_ads', reason: 'No active connection' }
    ]);
  });
});
