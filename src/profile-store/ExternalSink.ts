/**
 * Best-effort forwarding of saved documents to an HTTP endpoint
 */

import type { ProfileLogger } from './types';

export interface ExternalSinkConfig {
  url: string;
  timeoutMs?: number;
  logger?: ProfileLogger;
}

export class ExternalSink {
  private timeoutMs: number;
  private logger: ProfileLogger;

  constructor(private config: ExternalSinkConfig) {
    this.timeoutMs = config.timeoutMs ?? 10000;
    this.logger = config.logger ?? console;
  }

  /**
   * POST `{ ownerId, version, document }`. Never rejects; failures are logged.
   */
  async forward(ownerId: string, version: number, document: string): Promise<boolean> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(this.config.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ ownerId, version, document }),
        signal: controller.signal,
      });

      if (!response.ok) {
        this.logger.warn(`[ExternalSink] ${ownerId}@${version} rejected: HTTP ${response.status}`);
        return false;
      }
      return true;
    } catch (error) {
      this.logger.warn(
        `[ExternalSink] ${ownerId}@${version} not forwarded:`,
        error instanceof Error ? error.message : error
      );
      return false;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
