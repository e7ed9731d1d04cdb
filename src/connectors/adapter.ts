import type { ToolDefinition } from '../mcp/protocol.js';
import type { ToolOutput } from './tool-output.js';

export interface CallOptions {
  timeoutMs?: number;
}

/** One tool server reachable through a transport, as seen by validation and clients. */
export interface ToolSource {
  readonly server: string;
  listTools(): Promise<ToolDefinition[]>;
  callTool(name: string, args: Record<string, unknown>, options?: CallOptions): Promise<ToolOutput>;
  close(): Promise<void>;
}

export interface StartableToolSource extends ToolSource {
  start(): Promise<void>;
}
