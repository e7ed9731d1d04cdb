import { resolve, join, basename } from 'node:path';
import { PLATFORM_LABEL, type Platform } from '../platforms/platform.js';
import type { PlatformCredentialBundle } from '../platforms/credentials.js';
import { MissingCredentialsError } from '../mcp/error-mapper.js';
import type { StdioServerParams } from './stdio-adapter.js';

export interface OAuthAppCredentials {
  googleClientId?: string;
  googleClientSecret?: string;
  googleAdsDeveloperToken?: string;
  facebookAppId?: string;
  facebookAppSecret?: string;
}

export interface ServerRegistryConfig {
  oauth: OAuthAppCredentials;
  httpUrls: Partial<Record<Platform, string>>;
  stdioCommand: string;
  serversDir: string;
}

type Fields = Record<string, string | undefined>;

interface ServerDefinition {
  httpServer: string;
  http: { required: string[]; optional: string[] };
  stdio: {
    directory: string;
    args: (directory: string) => string[];
    required: string[];
    env: Record<string, string>;
  };
}

const REGISTRY: Record<Platform, ServerDefinition> = {
  google_analytics: {
    httpServer: 'google_analytics_http',
    http: { required: ['refresh_token', 'property_id', 'client_id', 'client_secret'], optional: [] },
    stdio: {
      directory: 'google-analytics-oauth',
      args: (directory) => [join(directory, 'ga4_oauth_server.py')],
      required: ['refresh_token', 'property_id', 'client_id', 'client_secret'],
      env: {
        refresh_token: 'GOOGLE_ANALYTICS_REFRESH_TOKEN',
        property_id: 'GOOGLE_ANALYTICS_PROPERTY_ID',
        client_id: 'GOOGLE_ANALYTICS_CLIENT_ID',
        client_secret: 'GOOGLE_ANALYTICS_CLIENT_SECRET'
      }
    }
  },
  google_ads: {
    httpServer: 'google_ads_http',
    http: {
      required: ['refresh_token', 'customer_id', 'client_id', 'client_secret', 'developer_token'],
      optional: ['login_customer_id']
    },
    stdio: {
      directory: 'google-ads-mcp',
      args: () => ['-m', 'ads_mcp.server'],
      required: ['refresh_token', 'developer_token', 'client_id', 'client_secret'],
      env: {
        refresh_token: 'GOOGLE_ADS_REFRESH_TOKEN',
        developer_token: 'GOOGLE_ADS_DEVELOPER_TOKEN',
        client_id: 'GOOGLE_ADS_CLIENT_ID',
        client_secret: 'GOOGLE_ADS_CLIENT_SECRET',
        customer_id: 'GOOGLE_ADS_CUSTOMER_ID',
        login_customer_id: 'GOOGLE_ADS_LOGIN_CUSTOMER_ID'
      }
    }
  },
  facebook_ads: {
    httpServer: 'facebook_ads_http',
    http: { required: ['access_token', 'account_id'], optional: ['app_id', 'app_secret'] },
    stdio: {
      directory: 'meta-ads-mcp',
      args: () => ['-m', 'meta_ads_mcp'],
      required: ['access_token'],
      env: {
        access_token: 'FACEBOOK_ACCESS_TOKEN',
        app_id: 'FACEBOOK_APP_ID',
        app_secret: 'FACEBOOK_APP_SECRET',
        account_id: 'FACEBOOK_AD_ACCOUNT_ID'
      }
    }
  }
};

function pick(subject: string, fields: Fields, required: string[], optional: string[]): Record<string, string> {
  const missing = required.filter((key) => !fields[key]);
  if (missing.length > 0) {
    throw new MissingCredentialsError(subject, missing);
  }

  const picked: Record<string, string> = {};
  for (const key of [...required, ...optional]) {
    const value = fields[key];
    if (value) picked[key] = value;
  }
  return picked;
}

/**
 * Maps platform credentials plus app-level OAuth settings to the
 * transport-specific shapes each tool server expects.
 */
export class ServerRegistry {
  constructor(private readonly config: ServerRegistryConfig) {}

  httpServerName(platform: Platform): string {
    return REGISTRY[platform].httpServer;
  }

  httpBaseUrl(platform: Platform): string | undefined {
    return this.config.httpUrls[platform] || undefined;
  }

  buildHttpInitPayload(platform: Platform, bundle: PlatformCredentialBundle): Record<string, string> {
    const { required, optional } = REGISTRY[platform].http;
    return pick(`${PLATFORM_LABEL[platform]} HTTP initialize`, this.fields(platform, bundle), required, optional);
  }

  buildStdioParams(platform: Platform, bundle: PlatformCredentialBundle): StdioServerParams {
    const definition = REGISTRY[platform].stdio;
    const fields = this.fields(platform, bundle);
    pick(`${PLATFORM_LABEL[platform]} stdio server`, fields, definition.required, []);

    const env: Record<string, string> = {};
    for (const [field, variable] of Object.entries(definition.env)) {
      const value = fields[field];
      if (value) env[variable] = value;
    }

    const cwd = resolve(this.config.serversDir, definition.directory);
    return {
      server: basename(cwd).replace(/-/g, '_'),
      command: this.config.stdioCommand,
      args: definition.args(cwd),
      cwd,
      env
    };
  }

  private fields(platform: Platform, bundle: PlatformCredentialBundle): Fields {
    const oauth = this.config.oauth;
    switch (platform) {
      case 'google_analytics': {
        const credentials = bundle.google_analytics;
        if (!credentials) throw new MissingCredentialsError(PLATFORM_LABEL[platform], ['credentials']);
        return {
          refresh_token: credentials.refreshToken,
          property_id: credentials.propertyId,
          client_id: oauth.googleClientId,
          client_secret: oauth.googleClientSecret
        };
      }
      case 'google_ads': {
        const credentials = bundle.google_ads;
        if (!credentials) throw new MissingCredentialsError(PLATFORM_LABEL[platform], ['credentials']);
        return {
          refresh_token: credentials.refreshToken,
          customer_id: credentials.customerId,
          login_customer_id: credentials.loginCustomerId,
          client_id: oauth.googleClientId,
          client_secret: oauth.googleClientSecret,
          developer_token: oauth.googleAdsDeveloperToken
        };
      }
      case 'facebook_ads': {
        const credentials = bundle.facebook_ads;
        if (!credentials) throw new MissingCredentialsError(PLATFORM_LABEL[platform], ['credentials']);
        return {
          access_token: credentials.accessToken,
          account_id: credentials.accountId,
          app_id: oauth.facebookAppId,
          app_secret: oauth.facebookAppSecret
        };
      }
    }
  }
}
