import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { AppContext } from '../../app-context.js';
import { transportModeSchema } from '../../config/schema.js';
import { expandPlatforms } from '../../platforms/platform.js';
import { summarize } from '../../health/health-recorder.js';
import { removalToResult, summarizeResults, type ValidationResult } from '../../validation/result.js';
import type { PlatformTool } from '../../connectors/unified-client.js';

const validateSchema = z.object({
  campaignerId: z.string().min(1),
  customerId: z.string().min(1).nullable().optional(),
  platforms: z.array(z.string().min(1)).min(1),
  transportMode: transportModeSchema.optional()
});

const failingQuerySchema = z.object({
  customerId: z.string().min(1).optional(),
  minFailureCount: z.coerce.number().int().min(1).default(1)
});

const idParamsSchema = z.object({
  id: z.string().uuid()
});

function describeTool(tool: PlatformTool) {
  return { name: tool.name, description: tool.description, server: tool.server, platform: tool.platform };
}

export async function registerConnectionRoutes(app: FastifyInstance, ctx: AppContext): Promise<void> {
  const { connections, bundles, orchestrator } = ctx.services;
  const maxFailures = ctx.config.MAX_CONNECTION_FAILURES;

  app.post('/connections/validate', async (request, reply) => {
    const parsed = validateSchema.safeParse(request.body);
    if (!parsed.success) return reply.code(400).send({ error: parsed.error.flatten() });

    const { campaignerId, customerId, transportMode } = parsed.data;
    const { platforms, unknown } = expandPlatforms(parsed.data.platforms);
    const loaded = await bundles.load(campaignerId, customerId, platforms);

    const unavailable = new Set(loaded.missing.map((entry) => entry.platform));
    const preflight: ValidationResult[] = loaded.missing.map((entry) =>
      removalToResult({ platform: entry.platform, stage: 'request', reason: entry.reason }, null)
    );

    const outcome = await orchestrator.initialize({
      campaignerId,
      customerId,
      platforms: [...platforms.filter((platform) => !unavailable.has(platform)), ...unknown],
      credentials: loaded.bundle,
      transportMode
    });

    let tools: ReturnType<typeof describeTool>[] = [];
    if (outcome.client) {
      try {
        tools = (await outcome.client.listTools()).map(describeTool);
      } finally {
        await outcome.client.close();
      }
    }

    const results = [...preflight, ...outcome.results];
    return reply.code(200).send({
      ok: outcome.ok,
      transportMode: outcome.transportMode,
      platforms: outcome.platforms,
      tools,
      results,
      summary: summarizeResults(results)
    });
  });

  app.get('/connections/failing', async (request, reply) => {
    const parsed = failingQuerySchema.safeParse(request.query);
    if (!parsed.success) return reply.code(400).send({ error: parsed.error.flatten() });

    const failing = await connections.listFailing(parsed.data);
    return reply.code(200).send({ connections: failing.map((connection) => summarize(connection, maxFailures)) });
  });

  app.get('/connections/:id/health', async (request, reply) => {
    const parsed = idParamsSchema.safeParse(request.params);
    if (!parsed.success) return reply.code(400).send({ error: parsed.error.flatten() });

    const connection = await connections.get(parsed.data.id);
    if (!connection) return reply.code(404).send({ error: 'Connection not found' });
    return reply.code(200).send(summarize(connection, maxFailures));
  });
}
