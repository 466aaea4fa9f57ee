/**
 * Notification domain types and the store contract shared by every backend.
 *
 * @module types/notification
 */

export const COUNTRIES = ['India', 'USA'] as const;

export type Country = (typeof COUNTRIES)[number];

export interface Notification {
  id: string;
  date: string;
  title: string;
  url: string;
  text: string;
  /** Absent when no summary has been generated yet. Never an empty string. */
  summary?: string;
  createdAt?: Date;
  updatedAt?: Date;
}

/** Lightweight projection used to render selection lists. */
export interface NotificationOption {
  id: string;
  title: string;
  date: string;
  hasSummary: boolean;
}

export interface NotificationStats {
  total: number;
  withSummary: number;
  withoutSummary: number;
}

export type StoreState = 'disconnected' | 'ready';

export type StoreBackend = 'csv' | 'mongo';

/**
 * Country-scoped read/write access to notifications.
 *
 * Implementations never reject because of I/O: an unreachable source surfaces
 * as an empty list, `null`, `false` or zero stats.
 */
export interface NotificationStore {
  readonly backend: StoreBackend;

  isAvailable(): Promise<boolean>;
  getState(): StoreState;

  listOptions(country: Country | string, limit?: number): Promise<NotificationOption[]>;
  getById(country: Country | string, id: string | number): Promise<Notification | null>;
  saveSummary(country: Country | string, id: string | number, summary: string): Promise<boolean>;
  getStats(country: Country | string): Promise<NotificationStats>;

  close(): Promise<void>;
}
