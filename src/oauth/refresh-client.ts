import { z } from 'zod';
import type { OAuthProvider } from '../platforms/platform.js';
import { fetchWithTimeout, readJsonBody } from '../http/fetch-with-timeout.js';
import { errorMessage } from '../mcp/error-mapper.js';

export const GOOGLE_TOKEN_URL = 'https://oauth2.googleapis.com/token';
export const FACEBOOK_TOKEN_URL = 'https://graph.facebook.com/v18.0/oauth/access_token';
const REFRESH_TIMEOUT_MS = 10_000;

export interface RefreshedToken {
  accessToken: string;
  expiresIn: number;
  refreshToken?: string;
}

export interface OAuthRefreshClient {
  supports(provider: OAuthProvider): boolean;
  /**
   * Google exchanges a refresh token; Facebook exchanges the current
   * long-lived access token for a new one.
   */
  refresh(provider: OAuthProvider, token: string): Promise<RefreshedToken>;
}

export class OAuthRefreshError extends Error {
  readonly provider: OAuthProvider;
  readonly error: string;
  readonly errorDescription: string;
  /** The grant is dead and only a human re-link can fix it. */
  readonly permanent: boolean;

  constructor(provider: OAuthProvider, error: string, errorDescription: string, permanent: boolean) {
    super(`${provider} token refresh failed: ${error} - ${errorDescription}`);
    this.name = 'OAuthRefreshError';
    this.provider = provider;
    this.error = error;
    this.errorDescription = errorDescription;
    this.permanent = permanent;
  }
}

/** The provider's OAuth application credentials are not configured. */
export class RefreshUnavailableError extends Error {
  constructor(readonly provider: OAuthProvider) {
    super(`OAuth client for ${provider} is not configured`);
    this.name = 'RefreshUnavailableError';
  }
}

export interface OAuthClientSettings {
  google?: { clientId: string; clientSecret: string };
  facebook?: { appId: string; appSecret: string };
  timeoutMs?: number;
}

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().positive(),
  refresh_token: z.string().optional()
});

const oauthErrorSchema = z.object({
  error: z.string().optional(),
  error_description: z.string().optional()
});

const graphErrorSchema = z.object({
  error: z
    .object({
      type: z.string().optional(),
      message: z.string().optional(),
      code: z.number().optional()
    })
    .optional()
});

interface ProviderError {
  error?: string;
  description?: string;
  code?: number;
}

// The token endpoint answers either a flat OAuth error or a Graph API error object.
function readFacebookError(body: unknown): ProviderError {
  const flat = oauthErrorSchema.safeParse(body);
  if (flat.success && flat.data.error) {
    return { error: flat.data.error, description: flat.data.error_description };
  }
  const graph = graphErrorSchema.safeParse(body);
  const details = graph.success ? graph.data.error : undefined;
  return { error: details?.type, description: details?.message, code: details?.code };
}

// Graph API code 190 is an invalid or expired access token.
const FACEBOOK_INVALID_TOKEN_CODE = 190;

export function isPermanentRefreshFailure(provider: OAuthProvider, error: string, code?: number): boolean {
  if (provider === 'google') {
    return error === 'invalid_grant';
  }
  return error.toLowerCase().includes('invalid') || code === FACEBOOK_INVALID_TOKEN_CODE;
}

export class HttpOAuthRefreshClient implements OAuthRefreshClient {
  private readonly timeoutMs: number;

  constructor(private readonly settings: OAuthClientSettings) {
    this.timeoutMs = settings.timeoutMs ?? REFRESH_TIMEOUT_MS;
  }

  supports(provider: OAuthProvider): boolean {
    return provider === 'google' ? Boolean(this.settings.google) : Boolean(this.settings.facebook);
  }

  async refresh(provider: OAuthProvider, token: string): Promise<RefreshedToken> {
    return provider === 'google' ? this.refreshGoogle(token) : this.refreshFacebook(token);
  }

  private async refreshGoogle(refreshToken: string): Promise<RefreshedToken> {
    const google = this.settings.google;
    if (!google) throw new RefreshUnavailableError('google');

    const response = await this.send('google', GOOGLE_TOKEN_URL, {
      method: 'POST',
      headers: { 'content-type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({
        client_id: google.clientId,
        client_secret: google.clientSecret,
        refresh_token: refreshToken,
        grant_type: 'refresh_token'
      }).toString()
    });

    const body = await readJsonBody(response);
    if (!response.ok) {
      const parsed = oauthErrorSchema.safeParse(body);
      const error = (parsed.success ? parsed.data.error : undefined) ?? 'unknown';
      const description = (parsed.success ? parsed.data.error_description : undefined) ?? `HTTP ${response.status}`;
      throw new OAuthRefreshError('google', error, description, isPermanentRefreshFailure('google', error));
    }

    return this.toRefreshedToken('google', body);
  }

  private async refreshFacebook(accessToken: string): Promise<RefreshedToken> {
    const facebook = this.settings.facebook;
    if (!facebook) throw new RefreshUnavailableError('facebook');

    const url = new URL(FACEBOOK_TOKEN_URL);
    url.searchParams.set('grant_type', 'fb_exchange_token');
    url.searchParams.set('client_id', facebook.appId);
    url.searchParams.set('client_secret', facebook.appSecret);
    url.searchParams.set('fb_exchange_token', accessToken);

    const response = await this.send('facebook', url, { method: 'GET' });

    const body = await readJsonBody(response);
    if (!response.ok) {
      const details = readFacebookError(body);
      const error = details.error ?? 'unknown';
      const description = details.description ?? `HTTP ${response.status}`;
      throw new OAuthRefreshError('facebook', error, description, isPermanentRefreshFailure('facebook', error, details.code));
    }

    return this.toRefreshedToken('facebook', body);
  }

  private async send(provider: OAuthProvider, url: URL | string, init: RequestInit): Promise<Response> {
    try {
      return await fetchWithTimeout(url, init, this.timeoutMs);
    } catch (error) {
      throw new OAuthRefreshError(provider, 'network_error', errorMessage(error), false);
    }
  }

  private toRefreshedToken(provider: OAuthProvider, body: unknown): RefreshedToken {
    const parsed = tokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new OAuthRefreshError(provider, 'invalid_response', 'Token endpoint returned an unexpected payload', false);
    }
    return {
      accessToken: parsed.data.access_token,
      expiresIn: parsed.data.expires_in,
      refreshToken: parsed.data.refresh_token
    };
  }
}
