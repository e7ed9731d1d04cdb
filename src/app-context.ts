import type { AppConfig } from './config/schema.js';
import type { Logger } from './logging/logger.js';
import type { ConnectionStore } from './db/repositories/connections.js';
import type { CredentialBundleLoader } from './connectors/credential-bundle-loader.js';
import type { ConnectionInitializer } from './orchestrator/connection-orchestrator.js';

export interface Services {
  connections: ConnectionStore;
  bundles: CredentialBundleLoader;
  orchestrator: ConnectionInitializer;
}

export interface AppContext {
  config: AppConfig;
  logger: Logger;
  services: Services;
}
