import type { Logger } from '../logging/logger.js';
import type { TransportMode } from '../config/schema.js';
import { PLATFORMS, expandPlatforms, type Platform } from '../platforms/platform.js';
import { WorkingSet } from '../platforms/working-set.js';
import { connectionIdsOf, withoutPlatforms, type PlatformCredentialBundle } from '../platforms/credentials.js';
import type { TokenRefresher } from '../oauth/token-refresher.js';
import type { TransportNegotiator } from '../connectors/negotiator.js';
import type { ClientMode, UnifiedClient } from '../connectors/unified-client.js';
import type { ToolValidator } from '../validation/tool-validator.js';
import type { HealthRecorder } from '../health/health-recorder.js';
import { removalToResult, type StageRemoval, type ValidationResult } from '../validation/result.js';
import { errorMessage } from '../mcp/error-mapper.js';

export interface OrchestrationRequest {
  campaignerId: string;
  customerId?: string | null;
  /** Raw platform names; aliases such as `google` or `meta` are accepted. */
  platforms: readonly string[];
  credentials: PlatformCredentialBundle;
  transportMode?: TransportMode;
}

export interface OrchestrationResult {
  ok: boolean;
  client: UnifiedClient | null;
  results: ValidationResult[];
  platforms: Platform[];
  transportMode: ClientMode | null;
}

export interface OrchestratorSettings {
  enableTokenRefresh: boolean;
  enableValidation: boolean;
  defaultTransportMode: TransportMode;
}

const REAUTH_MARKERS = ['invalid_grant', 'revoked', 'unauthenticated', 'unauthorized', 'invalid credentials', 'invalid_credentials'];

function needsReauthFrom(result: ValidationResult): boolean {
  const text = `${result.message} ${result.errorDetail ?? ''}`.toLowerCase();
  return REAUTH_MARKERS.some((marker) => text.includes(marker));
}

export interface ConnectionInitializer {
  initialize(request: OrchestrationRequest): Promise<OrchestrationResult>;
}

/** Stages may only remove platforms; anything they add back is ignored. */
function shrink(current: WorkingSet, next: WorkingSet): WorkingSet {
  return current.intersect(next.toArray());
}

/**
 * Runs refresh, transport negotiation and validation for one session.
 * A failing platform is quarantined with a result entry; only an empty
 * working set fails the run.
 */
export class ConnectionOrchestrator implements ConnectionInitializer {
  constructor(
    private readonly refresher: TokenRefresher,
    private readonly negotiator: TransportNegotiator,
    private readonly validator: ToolValidator,
    private readonly health: HealthRecorder,
    private readonly settings: OrchestratorSettings,
    private readonly logger: Logger
  ) {}

  async initialize(request: OrchestrationRequest): Promise<OrchestrationResult> {
    const results: ValidationResult[] = [];
    let client: UnifiedClient | null = null;
    let succeeded = false;

    const log = this.logger.child({ campaignerId: request.campaignerId });
    const fail = (reason: string): OrchestrationResult => {
      log.error({ reason }, 'Connection initialization failed');
      return { ok: false, client: null, results, platforms: [], transportMode: null };
    };
    const addRemovals = (removals: StageRemoval[]): void => {
      results.push(...removals.map((removal) => removalToResult(removal)));
    };

    try {
      const { platforms, unknown } = expandPlatforms(request.platforms);
      for (const name of unknown) {
        results.push({
          server: name,
          platform: null,
          status: 'skipped',
          message: 'Unknown platform',
          errorDetail: null,
          durationMs: 0,
          connectionId: null
        });
      }

      let set = WorkingSet.of(platforms);
      let bundle = withoutPlatforms(request.credentials, PLATFORMS.filter((platform) => !set.has(platform)));
      if (set.isEmpty()) return fail('no recognised platforms requested');

      if (this.settings.enableTokenRefresh) {
        const sizeBefore = set.size;
        const refreshed = await this.refresher.refresh(request.campaignerId, set, bundle, request.customerId);
        set = shrink(set, refreshed.set);
        bundle = refreshed.bundle;
        addRemovals(refreshed.removals);
        if (set.size < sizeBefore) {
          log.warn({ removed: refreshed.removals.map((removal) => removal.platform), remaining: set.toArray() }, 'Token refresh dropped platforms');
        }
        if (set.isEmpty()) return fail('every platform failed token refresh');
      } else {
        log.info('Token refresh disabled');
      }

      const mode = request.transportMode ?? this.settings.defaultTransportMode;
      const negotiated = await this.negotiator.connect(set, bundle, mode);
      addRemovals(negotiated.removals);
      if (!negotiated.ok) return fail(`transport negotiation failed: ${negotiated.error}`);
      client = negotiated.client;
      set = shrink(set, negotiated.set);
      bundle = withoutPlatforms(bundle, negotiated.removals.map((removal) => removal.platform));

      if (this.settings.enableValidation) {
        const sizeBefore = set.size;
        const outcome = await this.validator.validateAll(client.sources(), connectionIdsOf(bundle));
        results.push(...outcome.results);
        await this.recordValidationFailures(outcome.results);

        const next = outcome.removeAll ? set.without(set.toArray()) : set.without(outcome.remove);
        set = shrink(set, next);
        if (set.isEmpty()) return fail('every platform failed validation');

        if (set.size < sizeBefore) {
          const usedMode = client.mode;
          log.warn({ remaining: set.toArray(), mode: usedMode }, 'Validation dropped platforms, reconnecting with the remaining set');
          await client.close();
          client = null;

          bundle = withoutPlatforms(bundle, PLATFORMS.filter((platform) => !set.has(platform)));
          const reconnected = await this.negotiator.connect(set, bundle, usedMode);
          addRemovals(reconnected.removals);
          if (!reconnected.ok) return fail(`reconnect failed: ${reconnected.error}`);
          client = reconnected.client;
          set = shrink(set, reconnected.set);
        }
        await this.recordValidationSuccesses(outcome.results, set);
      } else {
        log.info('Tool validation disabled');
      }

      succeeded = true;
      log.info({ platforms: set.toArray(), mode: client.mode }, 'Connections ready');
      return { ok: true, client, results, platforms: set.toArray(), transportMode: client.mode };
    } catch (error) {
      return fail(`unexpected error: ${errorMessage(error)}`);
    } finally {
      if (!succeeded && client) {
        await client.close();
      }
    }
  }

  private async recordValidationFailures(results: readonly ValidationResult[]): Promise<void> {
    await Promise.all(
      results.map(async (result) => {
        if (!result.connectionId || (result.status !== 'failed' && result.status !== 'error')) return;
        await this.health.recordFailure(
          result.connectionId,
          `mcp_validation_failed: ${result.errorDetail ?? result.message}`,
          needsReauthFrom(result)
        );
      })
    );
  }

  /** Written once the final client is up, and only for platforms it still serves. */
  private async recordValidationSuccesses(results: readonly ValidationResult[], set: WorkingSet): Promise<void> {
    await Promise.all(
      results.map(async (result) => {
        if (!result.connectionId || result.status !== 'success') return;
        if (result.platform && !set.has(result.platform)) return;
        await this.health.recordSuccess(result.connectionId, true);
      })
    );
  }
}
