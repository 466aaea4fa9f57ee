/**
 * Normalization rules shared by the CSV and MongoDB notification stores.
 *
 * Both backends must agree on what a country is, how ids compare and when a
 * record counts as summarized; everything here is pure.
 *
 * @module core/notification-normalizer
 */

import { COUNTRIES, type Country, type NotificationOption, type NotificationStats } from '../types/notification';

export const EMPTY_STATS: Readonly<NotificationStats> = Object.freeze({
  total: 0,
  withSummary: 0,
  withoutSummary: 0
});

/**
 * Resolve a user-supplied country name case-insensitively.
 * Returns null for anything outside the known partitions.
 */
export function parseCountry(input: string): Country | null {
  const normalized = input.trim().toLowerCase();
  return COUNTRIES.find((country) => country.toLowerCase() === normalized) ?? null;
}

/** Collection name for a country partition, e.g. `india_notifications`. */
export function collectionNameFor(country: Country): string {
  return `${country.toLowerCase()}_notifications`;
}

/**
 * Canonical string form of an identifier.
 *
 * Source data may carry ids as numbers, or as strings a spreadsheet export
 * turned into floats (`"12.0"`), so `12`, `"12"`, `" 12 "` and `"12.0"` all
 * normalize to `"12"`.
 */
export function normalizeId(id: string | number | null | undefined): string {
  if (id === null || id === undefined) {
    return '';
  }

  if (typeof id === 'number') {
    return Number.isFinite(id) ? String(id) : '';
  }

  const trimmed = id.trim();
  const integralFloat = /^(-?\d+)\.0+$/.exec(trimmed);
  return integralFloat ? integralFloat[1] : trimmed;
}

/** True when a summary is present and not blank after trimming. */
export function hasSummaryText(summary: unknown): summary is string {
  return typeof summary === 'string' && summary.trim().length > 0;
}

/** Empty or blank summaries mean "not generated yet". */
export function normalizeSummary(summary: unknown): string | undefined {
  return hasSummaryText(summary) ? summary : undefined;
}

/** Stringify a source cell, mapping missing values to the empty string. */
export function cellToString(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  return typeof value === 'string' ? value : String(value);
}

export function toOption(record: { id: unknown; title: unknown; date: unknown; summary?: unknown }): NotificationOption {
  return {
    id: normalizeId(cellToString(record.id)),
    title: cellToString(record.title).trim(),
    date: cellToString(record.date).trim(),
    hasSummary: hasSummaryText(record.summary)
  };
}

export function buildStats(total: number, withSummary: number): NotificationStats {
  return {
    total,
    withSummary,
    withoutSummary: total - withSummary
  };
}

/**
 * Clamp a caller-supplied listing limit to the backend cap.
 * An omitted or non-finite limit means "use the cap".
 */
export function resolveLimit(requested: number | undefined, cap: number): number {
  if (requested === undefined || !Number.isFinite(requested)) {
    return cap;
  }
  return Math.max(0, Math.min(Math.floor(requested), cap));
}
