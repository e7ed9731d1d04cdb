import { loadConfig } from './config/index.js';
import type { AppConfig } from './config/schema.js';
import { createLogger, type Logger } from './logging/logger.js';
import { buildServer } from './server/fastify.js';
import type { AppContext } from './app-context.js';
import { createDatabaseClient } from './db/client.js';
import { ConnectionsRepository } from './db/repositories/connections.js';
import { createEncryptionContext } from './security/crypto.js';
import { HttpOAuthRefreshClient } from './oauth/refresh-client.js';
import { TokenRefresher } from './oauth/token-refresher.js';
import { ClickUpIncidentSink, LoggingIncidentSink, type IncidentSink } from './alerts/incident-sink.js';
import { ConnectionHealthRecorder } from './health/health-recorder.js';
import { ServerRegistry } from './connectors/server-registry.js';
import { TransportNegotiator } from './connectors/negotiator.js';
import { CredentialBundleLoader } from './connectors/credential-bundle-loader.js';
import { ToolValidator } from './validation/tool-validator.js';
import { ConnectionOrchestrator } from './orchestrator/connection-orchestrator.js';

const DB_STARTUP_MAX_ATTEMPTS = 30;
const DB_STARTUP_RETRY_DELAY_MS = 1000;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isTransientStartupDbError(error: unknown): boolean {
  if (!error || typeof error !== 'object') return false;
  const code = 'code' in error ? String(error.code) : '';
  return code === '57P03' || code === 'ECONNREFUSED' || code === 'ETIMEDOUT';
}

async function waitForDatabaseReady(db: ReturnType<typeof createDatabaseClient>, logger: Logger): Promise<void> {
  for (let attempt = 1; attempt <= DB_STARTUP_MAX_ATTEMPTS; attempt += 1) {
    try {
      await db.ping();
      return;
    } catch (error) {
      if (!isTransientStartupDbError(error) || attempt === DB_STARTUP_MAX_ATTEMPTS) {
        throw error;
      }
      logger.warn(
        { attempt, maxAttempts: DB_STARTUP_MAX_ATTEMPTS },
        `Database not ready yet, retrying in ${DB_STARTUP_RETRY_DELAY_MS}ms`
      );
      await sleep(DB_STARTUP_RETRY_DELAY_MS);
    }
  }
}

function buildIncidentSink(config: AppConfig, logger: Logger): IncidentSink {
  if (config.CLICKUP_API_TOKEN && config.CLICKUP_LIST_ID) {
    return new ClickUpIncidentSink({ apiToken: config.CLICKUP_API_TOKEN, listId: config.CLICKUP_LIST_ID });
  }
  return new LoggingIncidentSink(logger);
}

async function main() {
  const config = loadConfig();
  const logger = createLogger(config.LOG_LEVEL);
  const encryption = createEncryptionContext(config.ENCRYPTION_KEY);
  const db = createDatabaseClient(config.DATABASE_URL);
  await waitForDatabaseReady(db, logger);
  if (config.AUTO_MIGRATE && (await db.migrate())) {
    logger.info('Applied database migration');
  }

  const connections = new ConnectionsRepository(db, encryption);
  const health = new ConnectionHealthRecorder(
    connections,
    buildIncidentSink(config, logger.child({ component: 'alerts' })),
    logger.child({ component: 'health' })
  );

  const oauth = new HttpOAuthRefreshClient({
    google:
      config.GOOGLE_CLIENT_ID && config.GOOGLE_CLIENT_SECRET
        ? { clientId: config.GOOGLE_CLIENT_ID, clientSecret: config.GOOGLE_CLIENT_SECRET }
        : undefined,
    facebook:
      config.FACEBOOK_APP_ID && config.FACEBOOK_APP_SECRET
        ? { appId: config.FACEBOOK_APP_ID, appSecret: config.FACEBOOK_APP_SECRET }
        : undefined
  });

  const registry = new ServerRegistry({
    oauth: {
      googleClientId: config.GOOGLE_CLIENT_ID,
      googleClientSecret: config.GOOGLE_CLIENT_SECRET,
      googleAdsDeveloperToken: config.GOOGLE_ADS_DEVELOPER_TOKEN,
      facebookAppId: config.FACEBOOK_APP_ID,
      facebookAppSecret: config.FACEBOOK_APP_SECRET
    },
    httpUrls: {
      google_analytics: config.MCP_GA4_HTTP_URL,
      google_ads: config.MCP_GOOGLE_ADS_HTTP_URL,
      facebook_ads: config.MCP_FACEBOOK_ADS_HTTP_URL
    },
    stdioCommand: config.MCP_STDIO_COMMAND,
    serversDir: config.MCP_SERVERS_DIR
  });

  const orchestrator = new ConnectionOrchestrator(
    new TokenRefresher(connections, oauth, health, logger.child({ component: 'token-refresher' })),
    new TransportNegotiator(registry, logger.child({ component: 'transport' }), {
      httpInitAttempts: config.MCP_HTTP_INIT_ATTEMPTS
    }),
    new ToolValidator(logger.child({ component: 'validator' })),
    health,
    {
      enableTokenRefresh: config.ENABLE_TOKEN_REFRESH,
      enableValidation: config.ENABLE_MCP_VALIDATION,
      defaultTransportMode: config.MCP_TRANSPORT_MODE
    },
    logger.child({ component: 'orchestrator' })
  );

  const ctx: AppContext = {
    config,
    logger,
    services: {
      connections,
      bundles: new CredentialBundleLoader(connections),
      orchestrator
    }
  };
  const app = await buildServer(ctx);

  const address = await app.listen({ host: config.HOST, port: config.PORT });
  logger.info({ address }, 'Connection orchestrator listening');

  const shutdown = async () => {
    logger.info('Shutting down');
    await app.close();
    await health.flush();
    await db.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      logger.error({ err: error }, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
