import { createHash, timingSafeEqual } from 'node:crypto';
import fp from 'fastify-plugin';
import type { FastifyReply, FastifyRequest } from 'fastify';
import type { AppContext } from '../../app-context.js';

declare module 'fastify' {
  interface FastifyRequest {
    auth?: {
      tokenPrefix: string;
    };
  }
}

const PUBLIC_PATHS = ['/health'];

function getBearerToken(request: FastifyRequest): string | null {
  const header = request.headers.authorization;
  if (!header) return null;
  const [scheme, token] = header.split(' ');
  if (!scheme || !token) return null;
  if (scheme.toLowerCase() !== 'bearer') return null;
  return token;
}

/** Constant-time comparison over digests so token length does not leak. */
export function tokensMatch(presented: string, expected: string): boolean {
  const a = createHash('sha256').update(presented).digest();
  const b = createHash('sha256').update(expected).digest();
  return timingSafeEqual(a, b);
}

export const authPlugin = fp<{ ctx: AppContext }>(async (fastify, opts) => {
  fastify.decorateRequest('auth', undefined);

  fastify.addHook('preHandler', async (request: FastifyRequest, reply: FastifyReply) => {
    const path = request.url.split('?')[0] ?? request.url;
    if (PUBLIC_PATHS.includes(path)) return;

    const token = getBearerToken(request);
    if (!token) {
      await reply.code(401).send({ error: 'Missing bearer token' });
      return;
    }

    if (!tokensMatch(token, opts.ctx.config.API_TOKEN)) {
      await reply.code(401).send({ error: 'Invalid token' });
      return;
    }

    request.auth = { tokenPrefix: token.slice(0, 4) };
  });
});
