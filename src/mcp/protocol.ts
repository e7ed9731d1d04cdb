import { z } from 'zod';

export interface JsonRpcRequest<T = unknown> {
  jsonrpc: '2.0';
  id?: string | number | null;
  method: string;
  params?: T;
}

export const jsonRpcMessageSchema = z.object({
  jsonrpc: z.literal('2.0').optional(),
  id: z.union([z.number(), z.string(), z.null()]).optional(),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number().optional(),
      message: z.string(),
      data: z.unknown().optional()
    })
    .optional()
});

export const toolDefinitionSchema = z.object({
  name: z.string().min(1),
  title: z.string().optional(),
  description: z.string().optional(),
  inputSchema: z.record(z.unknown()).default({})
});

export type ToolDefinition = z.infer<typeof toolDefinitionSchema>;

export const toolListSchema = z.object({
  tools: z.array(toolDefinitionSchema).default([])
});

export const contentBlockSchema = z
  .object({
    type: z.string(),
    text: z.string().optional()
  })
  .passthrough();

/** `tools/call` result as returned by subprocess tool servers. */
export const toolResultSchema = z.object({
  content: z.array(contentBlockSchema).default([]),
  structuredContent: z.unknown().optional(),
  isError: z.boolean().optional()
});

export type ToolResult = z.infer<typeof toolResultSchema>;

/** `POST /tool/{session}/{name}` body as returned by platform microservices. */
export const httpToolResponseSchema = z.object({
  success: z.boolean().optional(),
  content: z.unknown().optional(),
  result: z.unknown().optional(),
  error: z.unknown().optional()
});

export const initializeResponseSchema = z.object({
  session_id: z.string().min(1),
  status: z.string().optional(),
  message: z.string().optional()
});

export const PROTOCOL_VERSION = '2025-06-18';
export const CLIENT_INFO = { name: 'connection-orchestrator', version: '0.1.0' } as const;
