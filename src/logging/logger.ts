import { pino, type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

const REDACTED_PATHS = [
  'authorization',
  'headers.authorization',
  '*.refresh_token',
  '*.access_token',
  '*.client_secret',
  '*.app_secret',
  '*.developer_token',
  '*.refreshToken',
  '*.accessToken'
];

export function createLogger(level: LevelWithSilent = 'info'): Logger {
  return pino({
    level,
    base: { service: 'connection-orchestrator' },
    redact: { paths: REDACTED_PATHS, censor: '***redacted***' }
  });
}
