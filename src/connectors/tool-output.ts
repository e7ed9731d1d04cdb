import { contentBlockSchema, httpToolResponseSchema, type ToolResult } from '../mcp/protocol.js';

export interface ToolOutput {
  text: string;
  isError: boolean;
}

export function stringifyValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === undefined) return '';
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

/** Joins the text of a content-block list, or `null` when `value` is not one. */
function contentText(value: unknown): string | null {
  const blocks = contentBlockSchema.array().safeParse(value);
  if (!blocks.success || blocks.data.length === 0) return null;

  const texts = blocks.data.flatMap((block) => (typeof block.text === 'string' ? [block.text] : []));
  return texts.length > 0 ? texts.join('\n') : null;
}

export function collapseToolResult(result: ToolResult): ToolOutput {
  const text = contentText(result.content);
  if (text !== null) return { text, isError: result.isError === true };
  if (result.structuredContent !== undefined) {
    return { text: stringifyValue(result.structuredContent), isError: result.isError === true };
  }
  return { text: result.content.length > 0 ? stringifyValue(result.content) : '', isError: result.isError === true };
}

export function collapseHttpToolResponse(body: unknown): ToolOutput {
  const blocks = contentText(body);
  if (blocks !== null) return { text: blocks, isError: false };

  const parsed = httpToolResponseSchema.safeParse(body);
  if (!parsed.success || Array.isArray(body)) {
    return { text: stringifyValue(body), isError: false };
  }

  const response = parsed.data;
  if (response.success === false) {
    return { text: `Error: ${stringifyValue(response.error ?? 'Unknown error')}`, isError: true };
  }
  if (response.content !== undefined) {
    return { text: contentText(response.content) ?? stringifyValue(response.content), isError: false };
  }
  if (response.result !== undefined) {
    return { text: stringifyValue(response.result), isError: false };
  }
  return { text: stringifyValue(body), isError: false };
}
