import { z } from 'zod';

const flag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(fallback)
    .transform((value) => value === 'true');

const optionalSecret = z.preprocess((value) => (value === '' ? undefined : value), z.string().optional());

export const transportModeSchema = z.enum(['http', 'stdio', 'auto']);

export const configSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  API_TOKEN: z.string().min(12),
  DATABASE_URL: z.string().min(1),
  AUTO_MIGRATE: flag('true'),
  ENCRYPTION_KEY: z.string().min(32),

  GOOGLE_CLIENT_ID: optionalSecret,
  GOOGLE_CLIENT_SECRET: optionalSecret,
  GOOGLE_ADS_DEVELOPER_TOKEN: optionalSecret,
  FACEBOOK_APP_ID: optionalSecret,
  FACEBOOK_APP_SECRET: optionalSecret,

  MCP_TRANSPORT_MODE: transportModeSchema.default('auto'),
  MCP_GA4_HTTP_URL: z.string().url().default('http://localhost:8001'),
  MCP_GOOGLE_ADS_HTTP_URL: z.string().url().default('http://localhost:8002'),
  MCP_FACEBOOK_ADS_HTTP_URL: z.string().url().default('http://localhost:8003'),
  MCP_HTTP_INIT_ATTEMPTS: z.coerce.number().int().min(1).max(5).default(2),
  MCP_STDIO_COMMAND: z.string().min(1).default('python3'),
  MCP_SERVERS_DIR: z.string().min(1).default('./mcps'),

  ENABLE_TOKEN_REFRESH: flag('true'),
  ENABLE_MCP_VALIDATION: flag('true'),
  MAX_CONNECTION_FAILURES: z.coerce.number().int().positive().default(3),

  CLICKUP_API_TOKEN: optionalSecret,
  CLICKUP_LIST_ID: optionalSecret
});

export type AppConfig = z.infer<typeof configSchema>;
export type TransportMode = z.infer<typeof transportModeSchema>;
