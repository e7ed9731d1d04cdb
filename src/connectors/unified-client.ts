import type { Platform } from '../platforms/platform.js';
import { resolvePlatformFromServer } from '../platforms/platform.js';
import type { Logger } from '../logging/logger.js';
import type { ToolSource } from './adapter.js';
import { errorMessage } from '../mcp/error-mapper.js';

export type ClientMode = 'http' | 'stdio';

export interface PlatformTool {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
  server: string;
  platform: Platform | null;
  /** Always resolves; transport failures come back as `Error: ...` text. */
  invoke(args: Record<string, unknown>): Promise<string>;
}

export interface UnifiedClient {
  readonly mode: ClientMode;
  readonly platforms: readonly Platform[];
  sources(): ToolSource[];
  listTools(): Promise<PlatformTool[]>;
  /** Releases every server handle. Never rejects. */
  close(): Promise<void>;
}

abstract class SourceBackedClient implements UnifiedClient {
  abstract readonly mode: ClientMode;
  readonly platforms: readonly Platform[];

  private closed = false;

  protected constructor(
    private readonly handles: readonly ToolSource[],
    platforms: readonly Platform[],
    protected readonly logger: Logger
  ) {
    this.platforms = [...platforms];
  }

  sources(): ToolSource[] {
    return [...this.handles];
  }

  async listTools(): Promise<PlatformTool[]> {
    const listed = await Promise.allSettled(this.handles.map(async (source) => ({ source, tools: await source.listTools() })));

    const tools: PlatformTool[] = [];
    listed.forEach((outcome, index) => {
      if (outcome.status === 'rejected') {
        this.logger.warn({ server: this.handles[index]?.server, err: errorMessage(outcome.reason) }, 'Failed to list tools');
        return;
      }

      const { source, tools: definitions } = outcome.value;
      const platform = resolvePlatformFromServer(source.server);
      for (const definition of definitions) {
        tools.push({
          name: definition.name,
          description: definition.description ?? definition.title ?? '',
          inputSchema: definition.inputSchema,
          server: source.server,
          platform,
          invoke: (args) => this.invoke(source, definition.name, args)
        });
      }
    });
    return tools;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const outcomes = await Promise.allSettled(this.handles.map((source) => source.close()));
    outcomes.forEach((outcome, index) => {
      if (outcome.status === 'rejected') {
        this.logger.warn({ server: this.handles[index]?.server, err: errorMessage(outcome.reason) }, `Failed to close ${this.mode} tool server`);
      }
    });
  }

  private async invoke(source: ToolSource, name: string, args: Record<string, unknown>): Promise<string> {
    // Agents sometimes wrap the arguments as { kwargs: {...} }.
    const nested = args.kwargs;
    const unwrapped = Object.keys(args).length === 1 && isRecord(nested) ? nested : args;
    try {
      const output = await source.callTool(name, unwrapped);
      return output.text;
    } catch (error) {
      this.logger.error({ server: source.server, tool: name, err: errorMessage(error) }, 'Tool call failed');
      return `Error: ${errorMessage(error)}`;
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** One microservice session per platform; tools route by session id. */
export class HttpUnifiedClient extends SourceBackedClient {
  readonly mode = 'http' as const;

  constructor(sessions: readonly ToolSource[], platforms: readonly Platform[], logger: Logger) {
    super(sessions, platforms, logger);
  }
}

/** One subprocess per platform; closing terminates them. */
export class StdioUnifiedClient extends SourceBackedClient {
  readonly mode = 'stdio' as const;

  constructor(servers: readonly ToolSource[], platforms: readonly Platform[], logger: Logger) {
    super(servers, platforms, logger);
  }
}
