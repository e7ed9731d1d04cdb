import Fastify, { type FastifyBaseLogger } from 'fastify';
import { authPlugin } from './middleware/auth.js';
import { registerConnectionRoutes } from './routes/connections.js';
import type { AppContext } from '../app-context.js';

export async function buildServer(ctx: AppContext) {
  const loggerInstance: FastifyBaseLogger = ctx.logger.child({ component: 'http' });
  const app = Fastify({ loggerInstance });

  app.get('/health', async () => ({ status: 'ok', uptime: process.uptime() }));

  await app.register(authPlugin, { ctx });
  await registerConnectionRoutes(app, ctx);

  return app;
}
