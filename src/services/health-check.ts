/**
 * Health Check Service
 *
 * Probes the notification store and reports summarizer availability.
 *
 * @module services/health-check
 */

import type { NotificationStore } from '../types/notification';
import type { SummarizerGateway } from '../ai/summarizer';
import { logger } from '../utils/logger';

export type HealthLevel = 'healthy' | 'degraded' | 'unhealthy';

export interface ComponentHealth {
  status: HealthLevel;
  message: string;
  latencyMs?: number;
  details?: Record<string, unknown>;
}

export interface HealthStatus {
  status: HealthLevel;
  timestamp: number;
  checks: {
    store: ComponentHealth;
    summarizer: ComponentHealth;
  };
}

async function checkStoreHealth(store: NotificationStore): Promise<ComponentHealth> {
  const start = Date.now();
  const available = await store.isAvailable();
  const latencyMs = Date.now() - start;

  if (available) {
    return {
      status: 'healthy',
      message: `${store.backend} store ready`,
      latencyMs,
      details: { backend: store.backend, state: store.getState() }
    };
  }

  return {
    status: 'unhealthy',
    message: `${store.backend} store not connected`,
    latencyMs,
    details: { backend: store.backend, state: store.getState() }
  };
}

function checkSummarizerHealth(summarizer: SummarizerGateway): ComponentHealth {
  if (summarizer.isAvailable()) {
    return {
      status: 'healthy',
      message: 'Summarizer configured',
      details: { provider: summarizer.provider }
    };
  }

  // Browsing still works without summaries
  return {
    status: 'degraded',
    message: 'Summarizer not configured; summary generation disabled',
    details: { provider: summarizer.provider }
  };
}

/**
 * Unhealthy when the store is unreachable, degraded when only summaries are
 * unavailable.
 */
export async function performHealthCheck(
  store: NotificationStore,
  summarizer: SummarizerGateway
): Promise<HealthStatus> {
  const storeHealth = await checkStoreHealth(store);
  const summarizerHealth = checkSummarizerHealth(summarizer);

  let status: HealthLevel = 'healthy';
  if (storeHealth.status === 'unhealthy') {
    status = 'unhealthy';
  } else if (summarizerHealth.status !== 'healthy') {
    status = 'degraded';
  }

  if (status !== 'healthy') {
    logger.debug('Health check not healthy', { status });
  }

  return {
    status,
    timestamp: Date.now(),
    checks: {
      store: storeHealth,
      summarizer: summarizerHealth
    }
  };
}
