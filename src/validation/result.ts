import type { Platform } from '../platforms/platform.js';

export type ValidationStatus = 'success' | 'failed' | 'skipped' | 'error';

export interface ValidationResult {
  server: string;
  platform: Platform | null;
  status: ValidationStatus;
  message: string;
  errorDetail: string | null;
  durationMs: number;
  connectionId: string | null;
}

/** A platform dropped from the working set before or outside validation. */
export interface StageRemoval {
  platform: Platform;
  stage: 'refresh' | 'transport' | 'request';
  reason: string;
  detail?: string;
  connectionId?: string;
}

export function removalToResult(removal: StageRemoval, connectionId: string | null = removal.connectionId ?? null): ValidationResult {
  return {
    server: removal.platform,
    platform: removal.platform,
    status: 'skipped',
    message: removal.reason,
    errorDetail: removal.detail ?? null,
    durationMs: 0,
    connectionId
  };
}

export function summarizeResults(results: readonly ValidationResult[]): Record<ValidationStatus | 'total', number> {
  const summary = { total: results.length, success: 0, failed: 0, skipped: 0, error: 0 };
  for (const result of results) {
    summary[result.status] += 1;
  }
  return summary;
}
