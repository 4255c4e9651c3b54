/**
 * Backend health check
 *
 * Run once at startup; the result is injected into the store configuration
 * and gates persistence for every profile created afterwards.
 */

import type { RemoteStore } from '../remote-store';
import { withRetry } from './retry';
import type { ProfileLogger } from './types';

const PROBE_STORE = '__health__';
const PROBE_KEY = 'probe';

export interface BackendHealth {
  reachable: boolean;
  checkedAt: number;
  latencyMs?: number;
  message?: string;
}

export interface BackendCheckOptions {
  attempts?: number;
  delayMs?: number;
  logger?: ProfileLogger;
}

/**
 * Write then read back a probe key
 */
export async function checkBackend(store: RemoteStore, options: BackendCheckOptions = {}): Promise<BackendHealth> {
  const startedAt = Date.now();
  const token = String(startedAt);

  try {
    await withRetry(
      async () => {
        await store.put(PROBE_STORE, PROBE_KEY, token);
        const echoed = await store.get(PROBE_STORE, PROBE_KEY);
        if (echoed !== token) {
          throw new Error('Probe value did not round-trip');
        }
      },
      {
        attempts: options.attempts ?? 3,
        delayMs: options.delayMs ?? 1000,
        label: 'backend probe',
        logger: options.logger,
      }
    );

    return {
      reachable: true,
      checkedAt: Date.now(),
      latencyMs: Date.now() - startedAt,
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    options.logger?.warn(`[HealthCheck] Backend unreachable, persistence disabled: ${message}`);
    return {
      reachable: false,
      checkedAt: Date.now(),
      message,
    };
  }
}
