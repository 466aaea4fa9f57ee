/**
 * CSV-backed notification store.
 *
 * Each country partition is one CSV file read whole into memory on first
 * access and kept for the lifetime of the store. Columns are addressed by
 * position, so header names in the file do not matter; the header row is
 * written back verbatim.
 *
 * Layouts:
 * - India: `index, id, date, title, url, text[, summary]`
 * - USA:   `index, date, title, url, text[, summary]` (id comes from `index`)
 *
 * Every summary save rewrites the whole partition file. Saves are serialized
 * through a single write queue so concurrent calls in one process cannot
 * drop each other's update; separate processes writing the same file still
 * race.
 *
 * @module services/stores/csv-notification-store
 */

import { access, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { logger } from '../../utils/logger';
import {
  EMPTY_STATS,
  buildStats,
  hasSummaryText,
  normalizeId,
  normalizeSummary,
  parseCountry,
  resolveLimit,
  toOption
} from '../../core/notification-normalizer';
import type {
  Country,
  Notification,
  NotificationOption,
  NotificationStats,
  NotificationStore,
  StoreState
} from '../../types/notification';

// ---------------------------------------------------------------------------
// Layouts
// ---------------------------------------------------------------------------

interface CsvLayout {
  /** Column holding the id, or null when it is synthesized from `index`. */
  idColumn: number | null;
  indexColumn: number;
  dateColumn: number;
  titleColumn: number;
  urlColumn: number;
  textColumn: number;
  /** Number of columns before the optional summary column. */
  baseColumns: number;
}

const CSV_LAYOUTS: Record<Country, CsvLayout> = {
  India: {
    idColumn: 1,
    indexColumn: 0,
    dateColumn: 2,
    titleColumn: 3,
    urlColumn: 4,
    textColumn: 5,
    baseColumns: 6
  },
  USA: {
    idColumn: null,
    indexColumn: 0,
    dateColumn: 1,
    titleColumn: 2,
    urlColumn: 3,
    textColumn: 4,
    baseColumns: 5
  }
};

const SUMMARY_HEADER = 'summary';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CsvNotificationStoreOptions {
  dataDir: string;
  files: Record<Country, string>;
  /** Cap applied to option listings. */
  optionLimit?: number;
}

interface CsvRow {
  id: string;
  cells: string[];
}

interface CsvPartition {
  header: string[];
  rows: CsvRow[];
}

const DEFAULT_OPTION_LIMIT = 100;

// ---------------------------------------------------------------------------
// Parsing helpers
// ---------------------------------------------------------------------------

function isStringMatrix(value: unknown): value is string[][] {
  return Array.isArray(value) && value.every(
    (row) => Array.isArray(row) && row.every((cell) => typeof cell === 'string')
  );
}

function cell(cells: string[], column: number): string {
  return cells[column] ?? '';
}

function rowId(cells: string[], layout: CsvLayout, position: number): string {
  if (layout.idColumn !== null) {
    return normalizeId(cell(cells, layout.idColumn));
  }
  // Ids follow row position: fall back to it when the index cell is blank
  return normalizeId(cell(cells, layout.indexColumn)) || String(position);
}

function rowToNotification(row: CsvRow, layout: CsvLayout): Notification {
  const notification: Notification = {
    id: row.id,
    date: cell(row.cells, layout.dateColumn),
    title: cell(row.cells, layout.titleColumn),
    url: cell(row.cells, layout.urlColumn),
    text: cell(row.cells, layout.textColumn)
  };

  const summary = normalizeSummary(cell(row.cells, layout.baseColumns));
  if (summary !== undefined) {
    notification.summary = summary;
  }

  return notification;
}

// ---------------------------------------------------------------------------
// CsvNotificationStore
// ---------------------------------------------------------------------------

export class CsvNotificationStore implements NotificationStore {
  readonly backend = 'csv' as const;

  private readonly dataDir: string;
  private readonly files: Record<Country, string>;
  private readonly optionLimit: number;
  private readonly partitions = new Map<Country, Promise<CsvPartition | null>>();
  private writeChain: Promise<unknown> = Promise.resolve();
  private state: StoreState = 'disconnected';

  constructor(options: CsvNotificationStoreOptions) {
    this.dataDir = options.dataDir;
    this.files = options.files;
    this.optionLimit = options.optionLimit ?? DEFAULT_OPTION_LIMIT;
  }

  getState(): StoreState {
    return this.state;
  }

  /**
   * Ready when at least one partition file exists and is readable.
   */
  async isAvailable(): Promise<boolean> {
    const checks = await Promise.all(
      Object.values(this.files).map(async (file) => {
        try {
          await access(path.join(this.dataDir, file));
          return true;
        } catch {
          return false;
        }
      })
    );

    const available = checks.some(Boolean);
    this.state = available ? 'ready' : 'disconnected';
    return available;
  }

  async listOptions(countryInput: Country | string, limit?: number): Promise<NotificationOption[]> {
    const partition = await this.partitionFor(countryInput);
    if (!partition) return [];

    const { layout, data } = partition;
    return data.rows
      .slice(0, resolveLimit(limit, this.optionLimit))
      .map((row) => toOption({
        id: row.id,
        title: cell(row.cells, layout.titleColumn),
        date: cell(row.cells, layout.dateColumn),
        summary: cell(row.cells, layout.baseColumns)
      }));
  }

  async getById(countryInput: Country | string, id: string | number): Promise<Notification | null> {
    const target = normalizeId(id);
    if (!target) return null;

    const partition = await this.partitionFor(countryInput);
    if (!partition) return null;

    const row = partition.data.rows.find((candidate) => candidate.id === target);
    return row ? rowToNotification(row, partition.layout) : null;
  }

  /**
   * Set the summary on every row matching `id` and rewrite the partition file.
   * Returns false when nothing matches or the write fails; a failed write
   * restores the previous in-memory values.
   */
  async saveSummary(countryInput: Country | string, id: string | number, summary: string): Promise<boolean> {
    const target = normalizeId(id);
    if (!target) return false;

    const partition = await this.partitionFor(countryInput);
    if (!partition) return false;

    const { country, layout, data } = partition;

    return this.enqueueWrite(async () => {
      const matches = data.rows.filter((row) => row.id === target);
      if (matches.length === 0) {
        logger.warn('CsvNotificationStore: no notification to update', { country, id: target });
        return false;
      }

      const summaryColumn = layout.baseColumns;
      const previous = matches.map((row) => row.cells.slice());

      for (const row of matches) {
        while (row.cells.length <= summaryColumn) {
          row.cells.push('');
        }
        row.cells[summaryColumn] = summary;
      }

      try {
        await this.writePartition(country, layout, data);
        logger.info('CsvNotificationStore: summary saved', { country, id: target, rows: matches.length });
        return true;
      } catch (error) {
        matches.forEach((row, i) => {
          row.cells = previous[i];
        });
        logger.error('CsvNotificationStore: failed to write partition', {
          country,
          id: target,
          error: error instanceof Error ? error.message : 'unknown'
        });
        return false;
      }
    });
  }

  async getStats(countryInput: Country | string): Promise<NotificationStats> {
    const partition = await this.partitionFor(countryInput);
    if (!partition) return { ...EMPTY_STATS };

    const summaryColumn = partition.layout.baseColumns;
    const withSummary = partition.data.rows.filter((row) => hasSummaryText(row.cells[summaryColumn])).length;
    return buildStats(partition.data.rows.length, withSummary);
  }

  /**
   * Every notification of a partition in file order, for bulk export.
   */
  async readAll(countryInput: Country | string): Promise<Notification[]> {
    const partition = await this.partitionFor(countryInput);
    if (!partition) return [];
    return partition.data.rows.map((row) => rowToNotification(row, partition.layout));
  }

  async close(): Promise<void> {
    await this.writeChain;
    this.partitions.clear();
    this.state = 'disconnected';
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private filePath(country: Country): string {
    return path.join(this.dataDir, this.files[country]);
  }

  private async partitionFor(
    countryInput: Country | string
  ): Promise<{ country: Country; layout: CsvLayout; data: CsvPartition } | null> {
    const country = parseCountry(countryInput);
    if (!country) {
      logger.debug('CsvNotificationStore: unknown country', { country: countryInput });
      return null;
    }

    let pending = this.partitions.get(country);
    if (!pending) {
      pending = this.loadPartition(country);
      this.partitions.set(country, pending);
    }

    const data = await pending;
    if (!data) {
      // Failed loads are retried on the next call
      this.partitions.delete(country);
      return null;
    }

    return { country, layout: CSV_LAYOUTS[country], data };
  }

  private async loadPartition(country: Country): Promise<CsvPartition | null> {
    const file = this.filePath(country);
    const layout = CSV_LAYOUTS[country];

    try {
      const content = await readFile(file, 'utf-8');
      const records: unknown = parse(content, {
        bom: true,
        relax_column_count: true,
        skip_empty_lines: true
      });

      if (!isStringMatrix(records)) {
        throw new Error('unexpected CSV structure');
      }

      const [header = [], ...body] = records;
      const rows = body.map((cells, position) => ({ id: rowId(cells, layout, position), cells }));

      this.state = 'ready';
      logger.info('CsvNotificationStore: partition loaded', { country, file, rows: rows.length });
      return { header, rows };
    } catch (error) {
      logger.warn('CsvNotificationStore: failed to load partition', {
        country,
        file,
        error: error instanceof Error ? error.message : 'unknown'
      });
      return null;
    }
  }

  private async writePartition(country: Country, layout: CsvLayout, data: CsvPartition): Promise<void> {
    const summaryColumn = layout.baseColumns;
    const header = data.header.slice();
    while (header.length < summaryColumn) {
      header.push('');
    }
    if (header.length === summaryColumn) {
      header.push(SUMMARY_HEADER);
    }

    const width = header.length;
    const body = data.rows.map((row) => {
      const cells = row.cells.slice();
      while (cells.length < width) {
        cells.push('');
      }
      return cells;
    });

    await writeFile(this.filePath(country), stringify([header, ...body]), 'utf-8');
  }

  private enqueueWrite<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writeChain.then(task, task);
    this.writeChain = run.catch(() => undefined);
    return run;
  }
}
