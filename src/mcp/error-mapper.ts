// Error codes shared by both transports (JSON-RPC 2.0 range plus tool-server specific codes)
export enum ErrorCode {
  ParseError = -32700,
  InvalidRequest = -32600,
  MethodNotFound = -32601,
  InvalidParams = -32602,
  InternalError = -32603,

  Unauthorized = -32010,
  CapabilityMismatch = -32011,
  Timeout = -32012,
  Unavailable = -32013,
  InvalidConfiguration = -32015
}

export interface MappedError {
  code: ErrorCode;
  message: string;
}

/**
 * Transport-level failure with a structured code. Thrown by HTTP sessions and
 * subprocess adapters; stages translate it into platform removal.
 */
export class ConnectorError extends Error {
  readonly code: ErrorCode;
  readonly data?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'ConnectorError';
    this.code = code;
    this.data = data;
  }

  toMappedError(): MappedError {
    return { code: this.code, message: this.message };
  }
}

export class MissingCredentialsError extends ConnectorError {
  readonly fields: string[];

  constructor(subject: string, fields: string[]) {
    super(ErrorCode.InvalidConfiguration, `${subject} is missing ${fields.join(', ')}`, { fields });
    this.name = 'MissingCredentialsError';
    this.fields = fields;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isTimeoutError(error: unknown): boolean {
  if (error instanceof ConnectorError) return error.code === ErrorCode.Timeout;
  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) return true;
  return false;
}

export function mapDownstreamError(error: unknown): MappedError {
  if (error instanceof ConnectorError) {
    return error.toMappedError();
  }

  const message = errorMessage(error);
  const lower = message.toLowerCase();

  if (isTimeoutError(error) || lower.includes('timed out') || lower.includes('abort')) {
    return { code: ErrorCode.Timeout, message: 'UPSTREAM_TIMEOUT' };
  }
  if (lower.includes('401') || lower.includes('403') || lower.includes('unauthorized')) {
    return { code: ErrorCode.Unauthorized, message: 'UPSTREAM_UNAUTHORIZED' };
  }
  if (lower.includes('404') || lower.includes('method not found')) {
    return { code: ErrorCode.CapabilityMismatch, message: 'UPSTREAM_CAPABILITY_MISMATCH' };
  }
  if (
    lower.includes('500') ||
    lower.includes('502') ||
    lower.includes('503') ||
    lower.includes('504') ||
    lower.includes('upstream http') ||
    lower.includes('econnrefused') ||
    lower.includes('fetch failed')
  ) {
    return { code: ErrorCode.Unavailable, message: 'UPSTREAM_UNAVAILABLE' };
  }

  return { code: ErrorCode.InternalError, message: 'UPSTREAM_ERROR' };
}
