import type { Logger } from '../logging/logger.js';
import type { TransportMode } from '../config/schema.js';
import type { Platform } from '../platforms/platform.js';
import type { WorkingSet } from '../platforms/working-set.js';
import type { PlatformCredentialBundle } from '../platforms/credentials.js';
import type { StageRemoval } from '../validation/result.js';
import type { StartableToolSource } from './adapter.js';
import { HttpToolSession, type HttpSessionConfig } from './http-session.js';
import { StdioToolServer, type StdioServerParams } from './stdio-adapter.js';
import { HttpUnifiedClient, StdioUnifiedClient, type UnifiedClient } from './unified-client.js';
import type { ServerRegistry } from './server-registry.js';
import { errorMessage, mapDownstreamError } from '../mcp/error-mapper.js';

export type NegotiationResult =
  | { ok: true; client: UnifiedClient; set: WorkingSet; removals: StageRemoval[] }
  | { ok: false; removals: StageRemoval[]; error: string };

export interface TransportNegotiatorOptions {
  httpInitAttempts?: number;
  httpRetryDelayMs?: number;
  createHttpSession?: (config: HttpSessionConfig) => StartableToolSource;
  createStdioServer?: (params: StdioServerParams) => StartableToolSource;
}

type PlatformAttempt =
  | { platform: Platform; ok: true; source: StartableToolSource }
  | { platform: Platform; ok: false; removal: StageRemoval };

/**
 * Builds a unified client for the working set. HTTP sessions tolerate partial
 * failure; the stdio path is all-or-nothing. AUTO tries HTTP first and falls
 * back to stdio only when no HTTP session came up.
 */
export class TransportNegotiator {
  private readonly createHttpSession: (config: HttpSessionConfig) => StartableToolSource;
  private readonly createStdioServer: (params: StdioServerParams) => StartableToolSource;

  constructor(
    private readonly registry: ServerRegistry,
    private readonly logger: Logger,
    private readonly options: TransportNegotiatorOptions = {}
  ) {
    this.createHttpSession = options.createHttpSession ?? ((config) => new HttpToolSession(config));
    this.createStdioServer = options.createStdioServer ?? ((params) => new StdioToolServer(params));
  }

  async connect(set: WorkingSet, bundle: PlatformCredentialBundle, mode: TransportMode): Promise<NegotiationResult> {
    if (set.isEmpty()) {
      return { ok: false, removals: [], error: 'No platforms to connect' };
    }

    switch (mode) {
      case 'http':
        return this.connectHttp(set, bundle);
      case 'stdio':
        return this.connectStdio(set, bundle);
      case 'auto': {
        const http = await this.connectHttp(set, bundle);
        if (http.ok) return http;
        this.logger.warn({ platforms: set.toArray(), err: http.error }, 'HTTP transport unavailable, falling back to stdio');
        return this.connectStdio(set, bundle);
      }
    }
  }

  private async connectHttp(set: WorkingSet, bundle: PlatformCredentialBundle): Promise<NegotiationResult> {
    const attempts = await Promise.all(set.toArray().map((platform) => this.startHttpSession(platform, bundle)));

    const sessions: StartableToolSource[] = [];
    const connected: Platform[] = [];
    const removals: StageRemoval[] = [];
    for (const attempt of attempts) {
      if (attempt.ok) {
        sessions.push(attempt.source);
        connected.push(attempt.platform);
      } else {
        removals.push(attempt.removal);
      }
    }

    if (sessions.length === 0) {
      return { ok: false, removals, error: 'No HTTP tool server could be initialized' };
    }

    this.logger.info({ platforms: connected, failed: removals.map((removal) => removal.platform) }, 'HTTP transport connected');
    return {
      ok: true,
      client: new HttpUnifiedClient(sessions, connected, this.logger),
      set: set.intersect(connected),
      removals
    };
  }

  private async startHttpSession(platform: Platform, bundle: PlatformCredentialBundle): Promise<PlatformAttempt> {
    const baseUrl = this.registry.httpBaseUrl(platform);
    if (!baseUrl) {
      return { platform, ok: false, removal: { platform, stage: 'transport', reason: 'No HTTP endpoint configured' } };
    }

    try {
      const payload = this.registry.buildHttpInitPayload(platform, bundle);
      const session = this.createHttpSession({
        platform,
        server: this.registry.httpServerName(platform),
        baseUrl,
        payload,
        initAttempts: this.options.httpInitAttempts,
        retryDelayMs: this.options.httpRetryDelayMs
      });
      await session.start();
      return { platform, ok: true, source: session };
    } catch (error) {
      const mapped = mapDownstreamError(error);
      this.logger.warn({ platform, code: mapped.code, err: errorMessage(error) }, 'HTTP session initialize failed');
      return {
        platform,
        ok: false,
        removal: { platform, stage: 'transport', reason: 'HTTP initialize failed', detail: errorMessage(error) }
      };
    }
  }

  private async connectStdio(set: WorkingSet, bundle: PlatformCredentialBundle): Promise<NegotiationResult> {
    const platforms = set.toArray();
    const fail = (error: unknown): NegotiationResult => {
      const detail = errorMessage(error);
      this.logger.error({ platforms, err: detail }, 'Stdio transport failed');
      return {
        ok: false,
        error: detail,
        removals: platforms.map<StageRemoval>((platform) => ({ platform, stage: 'transport', reason: 'Stdio transport failed', detail }))
      };
    };

    let servers: StartableToolSource[];
    try {
      servers = platforms.map((platform) => this.createStdioServer(this.registry.buildStdioParams(platform, bundle)));
    } catch (error) {
      return fail(error);
    }

    const started = await Promise.allSettled(servers.map((server) => server.start()));
    const failure = started.find((outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected');
    if (failure) {
      const client = new StdioUnifiedClient(servers, platforms, this.logger);
      await client.close();
      return fail(failure.reason);
    }

    this.logger.info({ servers: servers.map((server) => server.server) }, 'Stdio transport connected');
    return { ok: true, client: new StdioUnifiedClient(servers, platforms, this.logger), set, removals: [] };
  }
}
