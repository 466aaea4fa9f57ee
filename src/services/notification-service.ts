/**
 * Notification service
 *
 * The boundary the HTTP API and CLI talk to. It owns one store and one
 * summarizer gateway, both constructed explicitly at startup, and runs the
 * browse → detail → summarize → persist flow on top of them.
 *
 * @module services/notification-service
 */

import type { SummarizerGateway } from '../ai/summarizer';
import { EMPTY_STATS } from '../core/notification-normalizer';
import type {
  Country,
  Notification,
  NotificationOption,
  NotificationStats,
  NotificationStore,
  StoreBackend,
  StoreState
} from '../types/notification';
import { logger } from '../utils/logger';

export type SummarizeResult =
  | { status: 'generated'; notification: Notification }
  | { status: 'existing'; notification: Notification }
  | { status: 'not_found' }
  | { status: 'store_unavailable' }
  | { status: 'summarizer_unavailable' }
  | { status: 'generation_failed'; message: string }
  | { status: 'save_failed'; summary: string };

export interface SummarizeOptions {
  /** Regenerate even when a summary is already stored. */
  force?: boolean;
}

export interface ServiceStatus {
  store: StoreState;
  storeBackend: StoreBackend;
  summarizerAvailable: boolean;
  summarizerProvider: string;
}

export class NotificationService {
  constructor(
    private readonly store: NotificationStore,
    private readonly summarizer: SummarizerGateway
  ) {}

  async listOptions(country: Country, limit?: number): Promise<NotificationOption[]> {
    if (!(await this.store.isAvailable())) {
      return [];
    }
    return this.store.listOptions(country, limit);
  }

  async getNotification(country: Country, id: string): Promise<Notification | null> {
    if (!(await this.store.isAvailable())) {
      return null;
    }
    return this.store.getById(country, id);
  }

  async getStats(country: Country): Promise<NotificationStats> {
    if (!(await this.store.isAvailable())) {
      return { ...EMPTY_STATS };
    }
    return this.store.getStats(country);
  }

  /**
   * Return the stored summary, or generate one and persist it. Nothing is
   * written when generation fails.
   */
  async summarize(country: Country, id: string, options: SummarizeOptions = {}): Promise<SummarizeResult> {
    if (!(await this.store.isAvailable())) {
      return { status: 'store_unavailable' };
    }

    const notification = await this.store.getById(country, id);
    if (!notification) {
      return { status: 'not_found' };
    }

    if (notification.summary && !options.force) {
      return { status: 'existing', notification };
    }

    if (!this.summarizer.isAvailable()) {
      return { status: 'summarizer_unavailable' };
    }

    const outcome = await this.summarizer.summarize(notification.text, notification.title);
    if (!outcome.ok) {
      logger.warn('Summary generation failed', { country, id: notification.id, reason: outcome.reason });
      return { status: 'generation_failed', message: outcome.message };
    }

    const saved = await this.store.saveSummary(country, notification.id, outcome.summary);
    if (!saved) {
      logger.warn('Generated summary could not be saved', { country, id: notification.id });
      return { status: 'save_failed', summary: outcome.summary };
    }

    return { status: 'generated', notification: { ...notification, summary: outcome.summary } };
  }

  status(): ServiceStatus {
    return {
      store: this.store.getState(),
      storeBackend: this.store.backend,
      summarizerAvailable: this.summarizer.isAvailable(),
      summarizerProvider: this.summarizer.provider
    };
  }

  async close(): Promise<void> {
    await this.store.close();
  }
}
