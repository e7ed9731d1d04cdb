import type { Logger } from '../logging/logger.js';
import { fetchWithTimeout } from '../http/fetch-with-timeout.js';
import { ConnectorError, ErrorCode } from '../mcp/error-mapper.js';

export const CLICKUP_API_BASE = 'https://api.clickup.com/api/v2';
const INCIDENT_TIMEOUT_MS = 10_000;

/** Where re-authentication incidents go. Implementations may throw; callers log. */
export interface IncidentSink {
  createIncident(title: string, markdownBody: string): Promise<void>;
}

export interface ClickUpSinkConfig {
  apiToken: string;
  listId: string;
  tags?: string[];
  timeoutMs?: number;
}

export class ClickUpIncidentSink implements IncidentSink {
  constructor(private readonly config: ClickUpSinkConfig) {}

  async createIncident(title: string, markdownBody: string): Promise<void> {
    const url = `${CLICKUP_API_BASE}/list/${encodeURIComponent(this.config.listId)}/task`;
    const response = await fetchWithTimeout(
      url,
      {
        method: 'POST',
        headers: {
          accept: 'application/json',
          'content-type': 'application/json',
          authorization: this.config.apiToken
        },
        body: JSON.stringify({
          name: title,
          markdown_description: markdownBody,
          tags: this.config.tags ?? ['connection_reauth']
        })
      },
      this.config.timeoutMs ?? INCIDENT_TIMEOUT_MS
    );

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new ConnectorError(ErrorCode.Unavailable, `ClickUp HTTP ${response.status}: ${text.slice(0, 300)}`);
    }
  }
}

export class LoggingIncidentSink implements IncidentSink {
  constructor(private readonly logger: Logger) {}

  async createIncident(title: string, markdownBody: string): Promise<void> {
    this.logger.warn({ title, body: markdownBody }, 'Incident raised (no ticketing sink configured)');
  }
}
