import type { Platform } from '../platforms/platform.js';
import type { CallOptions, StartableToolSource } from './adapter.js';
import { collapseHttpToolResponse, type ToolOutput } from './tool-output.js';
import { initializeResponseSchema, toolListSchema, type ToolDefinition } from '../mcp/protocol.js';
import { ConnectorError, ErrorCode } from '../mcp/error-mapper.js';
import { fetchWithTimeout, parseJsonOrText, readJsonBody } from '../http/fetch-with-timeout.js';

export const HTTP_TIMEOUTS = {
  initializeMs: 10_000,
  listToolsMs: 10_000,
  callToolMs: 60_000,
  closeMs: 10_000
} as const;

export interface HttpSessionConfig {
  platform: Platform;
  server: string;
  baseUrl: string;
  payload: Record<string, string>;
  initAttempts?: number;
  retryDelayMs?: number;
}

function statusError(status: number, text: string): ConnectorError {
  const message = `Upstream HTTP ${status}: ${text.slice(0, 300)}`;
  if (status === 401 || status === 403) {
    return new ConnectorError(ErrorCode.Unauthorized, message, { status });
  }
  if (status === 404) {
    return new ConnectorError(ErrorCode.CapabilityMismatch, message, { status });
  }
  if (status >= 400 && status < 500) {
    return new ConnectorError(ErrorCode.InvalidRequest, message, { status });
  }
  return new ConnectorError(ErrorCode.Unavailable, message, { status });
}

function isClientError(error: unknown): boolean {
  if (!(error instanceof ConnectorError)) return false;
  const status = error.data?.status;
  return typeof status === 'number' && status >= 400 && status < 500;
}

/**
 * Session against one platform microservice. `start()` posts the platform
 * credentials to `/initialize` and keeps the returned session id for routing.
 */
export class HttpToolSession implements StartableToolSource {
  readonly server: string;
  readonly platform: Platform;

  private readonly config: HttpSessionConfig;
  private readonly baseUrl: string;
  private sessionId: string | null = null;
  private toolsCache: ToolDefinition[] | null = null;

  constructor(config: HttpSessionConfig) {
    this.server = config.server;
    this.platform = config.platform;
    this.config = config;
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
  }

  get session(): string | null {
    return this.sessionId;
  }

  /** Initializes with bounded exponential backoff; 4xx answers are not retried. */
  async start(): Promise<void> {
    const maxAttempts = this.config.initAttempts ?? 2;
    const baseDelay = this.config.retryDelayMs ?? 1000;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      try {
        this.sessionId = await this.initialize();
        return;
      } catch (error) {
        const isLastAttempt = attempt === maxAttempts - 1;
        if (isClientError(error) || isLastAttempt) {
          throw error;
        }

        const delay = baseDelay * Math.pow(2, attempt);
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }

    throw new ConnectorError(ErrorCode.Unavailable, `Initialize failed for ${this.server} after ${maxAttempts} attempts`);
  }

  async listTools(): Promise<ToolDefinition[]> {
    if (this.toolsCache) return this.toolsCache;

    const response = await fetchWithTimeout(
      `${this.baseUrl}/tools/${encodeURIComponent(this.requireSession())}`,
      { method: 'GET', headers: { accept: 'application/json' } },
      HTTP_TIMEOUTS.listToolsMs
    );

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw statusError(response.status, text);
    }

    const parsed = toolListSchema.safeParse(await readJsonBody(response));
    if (!parsed.success) {
      throw new ConnectorError(ErrorCode.InternalError, `${this.server} returned a malformed tool list`);
    }

    this.toolsCache = parsed.data.tools;
    return this.toolsCache;
  }

  async callTool(name: string, args: Record<string, unknown>, options?: CallOptions): Promise<ToolOutput> {
    const response = await fetchWithTimeout(
      `${this.baseUrl}/tool/${encodeURIComponent(this.requireSession())}/${encodeURIComponent(name)}`,
      {
        method: 'POST',
        headers: { 'content-type': 'application/json', accept: 'application/json' },
        body: JSON.stringify({ tool_name: name, arguments: args })
      },
      options?.timeoutMs ?? HTTP_TIMEOUTS.callToolMs
    );

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      return { text: `Error: HTTP ${response.status}: ${text.slice(0, 300)}`, isError: true };
    }

    return collapseHttpToolResponse(parseJsonOrText(await response.text()));
  }

  async close(): Promise<void> {
    const sessionId = this.sessionId;
    if (!sessionId) return;
    this.sessionId = null;
    this.toolsCache = null;

    const response = await fetchWithTimeout(
      `${this.baseUrl}/session/${encodeURIComponent(sessionId)}`,
      { method: 'DELETE' },
      HTTP_TIMEOUTS.closeMs
    );
    if (!response.ok && response.status !== 404) {
      throw statusError(response.status, await response.text().catch(() => ''));
    }
  }

  private async initialize(): Promise<string> {
    const response = await fetchWithTimeout(
      `${this.baseUrl}/initialize`,
      {
        method: 'POST',
        headers: { 'content-type': 'application/json', accept: 'application/json' },
        body: JSON.stringify(this.config.payload)
      },
      HTTP_TIMEOUTS.initializeMs
    );

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw statusError(response.status, text);
    }

    const parsed = initializeResponseSchema.safeParse(await readJsonBody(response));
    if (!parsed.success) {
      throw new ConnectorError(ErrorCode.InternalError, `${this.server} did not return a session_id`);
    }
    return parsed.data.session_id;
  }

  private requireSession(): string {
    if (!this.sessionId) {
      throw new ConnectorError(ErrorCode.InvalidRequest, `${this.server} session is not initialized`);
    }
    return this.sessionId;
  }
}
