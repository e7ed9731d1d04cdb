import type { Logger } from '../logging/logger.js';
import type { ToolSource } from '../connectors/adapter.js';
import type { ToolOutput } from '../connectors/tool-output.js';
import { resolvePlatformFromServer, type Platform } from '../platforms/platform.js';
import { errorMessage, isTimeoutError } from '../mcp/error-mapper.js';
import type { ValidationResult, ValidationStatus } from './result.js';

export const DEFAULT_PROBE_TIMEOUT_MS = 10_000;

interface PlatformExpectation {
  expected: string[];
  /** First tool present in this list is called with empty arguments. */
  probes: string[];
  requireExpected: boolean;
}

const EXPECTATIONS: Record<Platform, PlatformExpectation> = {
  google_analytics: {
    expected: ['run_report', 'get_metadata', 'list_accounts', 'get_account_summaries'],
    probes: ['get_account_summaries', 'get_metadata'],
    requireExpected: true
  },
  google_ads: {
    expected: ['search', 'list_accessible_customers'],
    probes: ['list_accessible_customers'],
    requireExpected: true
  },
  facebook_ads: {
    expected: [],
    probes: [],
    requireExpected: false
  }
};

const CREDENTIAL_FAILURE_MARKERS = [
  'invalid',
  'expired',
  'revoked',
  'credentials',
  'unauthorized',
  'unauthenticated',
  'permission denied'
];

/** True when probe output reads like an auth or credential failure. */
export function looksLikeCredentialFailure(output: ToolOutput): boolean {
  if (output.isError) return true;
  const text = output.text.trim();
  if (text.startsWith('Error:')) return true;
  const lower = text.toLowerCase();
  return CREDENTIAL_FAILURE_MARKERS.some((marker) => lower.includes(marker));
}

export interface ValidationOutcome {
  results: ValidationResult[];
  /** Platforms to drop from the working set. */
  remove: Platform[];
  /** Set when a non-success result could not be attributed to a platform. */
  removeAll: boolean;
}

type Verdict = Pick<ValidationResult, 'status' | 'message'> & { errorDetail?: string };

type ProbeOutcome = { timedOut: true } | { timedOut: false; output: ToolOutput };

async function probeWithTimeout(source: ToolSource, tool: string, timeoutMs: number): Promise<ProbeOutcome> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<ProbeOutcome>((resolve) => {
    timer = setTimeout(() => resolve({ timedOut: true }), timeoutMs);
  });

  try {
    const call = source
      .callTool(tool, {}, { timeoutMs })
      .then<ProbeOutcome>((output) => ({ timedOut: false, output }));
    return await Promise.race([call, timeout]);
  } catch (error) {
    if (isTimeoutError(error)) return { timedOut: true };
    throw error;
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Exercises each tool server against live credentials. Listing and a cheap
 * read-only probe run concurrently per server.
 */
export class ToolValidator {
  private readonly probeTimeoutMs: number;

  constructor(
    private readonly logger: Logger,
    options: { probeTimeoutMs?: number } = {}
  ) {
    this.probeTimeoutMs = options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
  }

  async validateAll(
    sources: readonly ToolSource[],
    connectionIds: Partial<Record<Platform, string>> = {}
  ): Promise<ValidationOutcome> {
    const results = await Promise.all(sources.map((source) => this.validateOne(source, connectionIds)));

    const remove: Platform[] = [];
    let removeAll = false;
    for (const result of results) {
      if (result.status === 'success') continue;
      if (result.platform === null) {
        removeAll = true;
      } else if (!remove.includes(result.platform)) {
        remove.push(result.platform);
      }
    }

    if (removeAll) {
      this.logger.warn(
        { servers: results.filter((result) => result.platform === null).map((result) => result.server) },
        'Validation failed on a server with no identifiable platform, dropping every platform'
      );
    }

    return { results, remove, removeAll };
  }

  private async validateOne(source: ToolSource, connectionIds: Partial<Record<Platform, string>>): Promise<ValidationResult> {
    const started = Date.now();
    const platform = resolvePlatformFromServer(source.server);

    let verdict: Verdict;
    try {
      verdict = await this.evaluate(source, platform);
    } catch (error) {
      this.logger.error({ server: source.server, err: errorMessage(error) }, 'Validation error');
      verdict = { status: 'error', message: 'Validation error', errorDetail: errorMessage(error) };
    }

    const result: ValidationResult = {
      server: source.server,
      platform,
      status: verdict.status,
      message: verdict.message,
      errorDetail: verdict.errorDetail ?? null,
      durationMs: Date.now() - started,
      connectionId: platform ? connectionIds[platform] ?? null : null
    };
    this.log(result);
    return result;
  }

  private async evaluate(source: ToolSource, platform: Platform | null): Promise<Verdict> {
    const tools = (await source.listTools()).map((tool) => tool.name);
    if (tools.length === 0) {
      return { status: 'failed', message: 'No tools available' };
    }

    const expectation = platform ? EXPECTATIONS[platform] : null;
    if (!expectation || !expectation.requireExpected) {
      return { status: 'success', message: `Found ${tools.length} tools` };
    }

    const found = expectation.expected.filter((name) => tools.includes(name));
    if (found.length === 0) {
      return {
        status: 'failed',
        message: 'Missing expected tools',
        errorDetail: `Expected: ${expectation.expected.join(', ')}; found: ${tools.join(', ')}`
      };
    }

    const probe = expectation.probes.find((name) => tools.includes(name));
    if (!probe) {
      return { status: 'success', message: `Found ${found.length} tools (not tested)` };
    }

    const outcome = await probeWithTimeout(source, probe, this.probeTimeoutMs);
    if (outcome.timedOut) {
      this.logger.warn({ server: source.server, probe }, 'Probe timed out, tools are available');
      return { status: 'success', message: `Found ${found.length} tools (validation timed out)` };
    }

    if (looksLikeCredentialFailure(outcome.output)) {
      return { status: 'failed', message: 'Tool execution failed', errorDetail: outcome.output.text.slice(0, 500) };
    }
    return { status: 'success', message: `Validated ${found.length} tools` };
  }

  private log(result: ValidationResult): void {
    const levels: Record<ValidationStatus, 'info' | 'warn' | 'error'> = {
      success: 'info',
      skipped: 'warn',
      failed: 'error',
      error: 'error'
    };
    this.logger[levels[result.status]](
      { server: result.server, platform: result.platform, durationMs: result.durationMs, detail: result.errorDetail },
      `${result.server}: ${result.message}`
    );
  }
}
