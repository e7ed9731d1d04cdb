import { spawn, type ChildProcessWithoutNullStreams } from 'node:child_process';
import type { CallOptions, StartableToolSource } from './adapter.js';
import { collapseToolResult, type ToolOutput } from './tool-output.js';
import {
  CLIENT_INFO,
  PROTOCOL_VERSION,
  jsonRpcMessageSchema,
  toolListSchema,
  toolResultSchema,
  type JsonRpcRequest,
  type ToolDefinition
} from '../mcp/protocol.js';
import { ConnectorError, ErrorCode } from '../mcp/error-mapper.js';

interface PendingRequest {
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
  timeout: NodeJS.Timeout;
}

export interface StdioServerParams {
  server: string;
  command: string;
  args: string[];
  cwd?: string;
  env: Record<string, string>;
  timeoutMs?: number;
}

const STDERR_TAIL_BYTES = 2048;

/** Tool server running as a subprocess, spoken to with newline-delimited JSON-RPC. */
export class StdioToolServer implements StartableToolSource {
  readonly server: string;

  private readonly params: StdioServerParams;
  private process: ChildProcessWithoutNullStreams | null = null;
  private readBuffer = '';
  private stderrTail = '';
  private nextId = 1;
  private pending = new Map<number, PendingRequest>();

  constructor(params: StdioServerParams) {
    this.server = params.server;
    this.params = params;
  }

  async start(): Promise<void> {
    this.spawnProcess();
    await this.sendRequest('initialize', {
      protocolVersion: PROTOCOL_VERSION,
      capabilities: {},
      clientInfo: CLIENT_INFO
    });
    this.sendNotification('notifications/initialized');
  }

  async listTools(): Promise<ToolDefinition[]> {
    const parsed = toolListSchema.safeParse(await this.sendRequest('tools/list', {}));
    if (!parsed.success) {
      throw new ConnectorError(ErrorCode.InternalError, `${this.server} returned a malformed tool list`);
    }
    return parsed.data.tools;
  }

  async callTool(name: string, args: Record<string, unknown>, options?: CallOptions): Promise<ToolOutput> {
    const result = await this.sendRequest('tools/call', { name, arguments: args }, options?.timeoutMs);
    const parsed = toolResultSchema.safeParse(result);
    if (!parsed.success) {
      throw new ConnectorError(ErrorCode.InternalError, `${this.server} returned a malformed tool result for ${name}`);
    }
    return collapseToolResult(parsed.data);
  }

  async close(): Promise<void> {
    const child = this.process;
    if (!child) return;
    this.process = null;
    child.stdin.end();
    child.kill('SIGTERM');
  }

  private spawnProcess(): void {
    if (this.process) return;

    const child = spawn(this.params.command, this.params.args, {
      cwd: this.params.cwd,
      env: { ...process.env, ...this.params.env },
      stdio: ['pipe', 'pipe', 'pipe']
    });
    this.process = child;

    child.stdout.on('data', (chunk: Buffer) => {
      this.readBuffer += chunk.toString('utf-8');
      this.consumeBuffer();
    });

    child.stderr.on('data', (chunk: Buffer) => {
      this.stderrTail = (this.stderrTail + chunk.toString('utf-8')).slice(-STDERR_TAIL_BYTES);
    });

    child.stdin.on('error', (error) => {
      this.failPending(new ConnectorError(ErrorCode.Unavailable, `${this.server} stdin closed: ${error.message}`));
    });

    child.on('error', (error) => {
      this.failPending(new ConnectorError(ErrorCode.Unavailable, `${this.server} failed to start: ${error.message}`));
      this.process = null;
    });

    child.on('exit', (code) => {
      const tail = this.stderrTail.trim();
      const detail = tail ? `: ${tail.split('\n').slice(-3).join(' | ')}` : '';
      this.failPending(new ConnectorError(ErrorCode.Unavailable, `${this.server} exited with code ${code ?? 'null'}${detail}`));
      this.process = null;
    });
  }

  private failPending(error: Error): void {
    for (const pending of this.pending.values()) {
      clearTimeout(pending.timeout);
      pending.reject(error);
    }
    this.pending.clear();
  }

  private consumeBuffer(): void {
    const lines = this.readBuffer.split('\n');
    this.readBuffer = lines.pop() ?? '';

    for (const line of lines) {
      const trimmed = line.trim();
      if (!trimmed) continue;

      let raw: unknown;
      try {
        raw = JSON.parse(trimmed);
      } catch {
        continue;
      }

      const message = jsonRpcMessageSchema.safeParse(raw);
      if (!message.success || typeof message.data.id !== 'number') continue;

      const pending = this.pending.get(message.data.id);
      if (!pending) continue;

      clearTimeout(pending.timeout);
      this.pending.delete(message.data.id);

      if (message.data.error) {
        pending.reject(new ConnectorError(ErrorCode.InternalError, message.data.error.message));
      } else {
        pending.resolve(message.data.result);
      }
    }
  }

  private sendNotification(method: string, params?: unknown): void {
    if (!this.process) throw new ConnectorError(ErrorCode.Unavailable, `${this.server} is not running`);
    const notification: JsonRpcRequest = { jsonrpc: '2.0', method, params };
    this.process.stdin.write(`${JSON.stringify(notification)}\n`);
  }

  private sendRequest(method: string, params: unknown, timeoutMs?: number): Promise<unknown> {
    const child = this.process;
    if (!child) {
      return Promise.reject(new ConnectorError(ErrorCode.Unavailable, `${this.server} is not running`));
    }

    const id = this.nextId++;
    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        this.pending.delete(id);
        reject(new ConnectorError(ErrorCode.Timeout, `Request ${method} to ${this.server} timed out`));
      }, timeoutMs ?? this.params.timeoutMs ?? 30000);

      this.pending.set(id, { resolve, reject, timeout });
      const request: JsonRpcRequest = { jsonrpc: '2.0', id, method, params };
      child.stdin.write(`${JSON.stringify(request)}\n`);
    });
  }
}
