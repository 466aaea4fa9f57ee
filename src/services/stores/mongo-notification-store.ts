/**
 * MongoDB-backed notification store.
 *
 * One collection per country (`india_notifications`, `usa_notifications`),
 * uniquely indexed on `id` and indexed on `date`. Every operation pings the
 * server first; when the ping fails the operation returns its "not connected"
 * result instead of throwing.
 *
 * Collection layout:
 * - `id`          string, unique per collection
 * - `date`        free-form string
 * - `title`, `url`, `text`
 * - `summary`     string or null
 * - `created_at`, `updated_at`
 *
 * @module services/stores/mongo-notification-store
 */

import mongoose, { Schema, type Connection, type Model } from 'mongoose';
import { logger } from '../../utils/logger';
import {
  EMPTY_STATS,
  buildStats,
  cellToString,
  collectionNameFor,
  normalizeId,
  normalizeSummary,
  parseCountry,
  resolveLimit,
  toOption
} from '../../core/notification-normalizer';
import {
  COUNTRIES,
  type Country,
  type Notification,
  type NotificationOption,
  type NotificationStats,
  type NotificationStore,
  type StoreState
} from '../../types/notification';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

interface NotificationDocument {
  /** Normalized string on insert; imported data may hold numbers or `"12.0"`. */
  id: string | number;
  date: string;
  title: string;
  url: string;
  text: string;
  summary: string | null;
  created_at?: Date;
  updated_at?: Date;
}

type OptionProjection = Pick<NotificationDocument, 'id' | 'title' | 'date' | 'summary'>;

export const notificationSchema = new Schema<NotificationDocument>(
  {
    // Mixed so queries match numeric ids without casting them to strings
    id: { type: Schema.Types.Mixed, required: true, unique: true },
    date: { type: String, default: '', index: true },
    title: { type: String, default: '' },
    url: { type: String, default: '' },
    text: { type: String, default: '' },
    summary: { type: String, default: null },
    created_at: { type: Date },
    updated_at: { type: Date }
  },
  {
    // `id` is a stored field here, not mongoose's virtual alias of `_id`
    id: false,
    versionKey: false
  }
);

type NotificationModel = Model<NotificationDocument>;

/** Matches string summaries holding at least one non-whitespace character; null never matches. */
const HAS_SUMMARY_FILTER = { summary: { $regex: /\S/ } };

const DUPLICATE_KEY_ERROR = 11000;
const INTEGER_ID = /^-?\d+$/;

/**
 * Filter matching every stored form of a normalized id: `"42"`, `42` and
 * `"42.0"` all list as `"42"`, so all of them must resolve.
 */
export function idFilter(target: string): { id: string | { $in: Array<string | number> } } {
  if (!INTEGER_ID.test(target)) {
    return { id: target };
  }
  return { id: { $in: [target, Number(target), `${target}.0`] } };
}

const DEFAULT_OPTION_LIMIT = 1000;

// ---------------------------------------------------------------------------
// MongoNotificationStore
// ---------------------------------------------------------------------------

export interface MongoNotificationStoreOptions {
  /** Cap applied to option listings. */
  optionLimit?: number;
}

export class MongoNotificationStore implements NotificationStore {
  readonly backend = 'mongo' as const;

  private readonly connection: Connection;
  private readonly optionLimit: number;
  private readonly models = new Map<Country, NotificationModel>();
  private state: StoreState = 'disconnected';
  private indexesEnsured = false;

  constructor(connection: Connection, options?: MongoNotificationStoreOptions) {
    this.connection = connection;
    this.optionLimit = options?.optionLimit ?? DEFAULT_OPTION_LIMIT;
  }

  getState(): StoreState {
    return this.state;
  }

  /**
   * Ping the server. The first successful ping also ensures the indexes.
   */
  async isAvailable(): Promise<boolean> {
    try {
      const db = this.connection.db;
      if (!db) {
        throw new Error('connection has no database handle');
      }
      await db.admin().ping();
    } catch (error) {
      if (this.state === 'ready') {
        logger.warn('MongoNotificationStore: lost connection', {
          error: error instanceof Error ? error.message : 'unknown'
        });
      }
      this.state = 'disconnected';
      return false;
    }

    this.state = 'ready';
    if (!this.indexesEnsured) {
      this.indexesEnsured = true;
      await this.ensureIndexes();
    }
    return true;
  }

  async listOptions(countryInput: Country | string, limit?: number): Promise<NotificationOption[]> {
    const max = resolveLimit(limit, this.optionLimit);
    // A zero limit means "no limit" to MongoDB
    if (max === 0) return [];

    return this.withModel<NotificationOption[]>(countryInput, 'listOptions', [], async (model) => {
      const docs = await model
        .find({}, { _id: 0, id: 1, title: 1, date: 1, summary: 1 })
        .limit(max)
        .lean<OptionProjection[]>();
      return docs.map((doc) => toOption(doc));
    });
  }

  async getById(countryInput: Country | string, id: string | number): Promise<Notification | null> {
    const target = normalizeId(id);
    if (!target) return null;

    return this.withModel<Notification | null>(countryInput, 'getById', null, async (model) => {
      const doc: NotificationDocument | null = await model.findOne(idFilter(target)).lean<NotificationDocument>();
      return doc ? documentToNotification(doc) : null;
    });
  }

  /**
   * Targeted `$set` of `summary` and `updated_at`. Succeeds whenever a record
   * matched, including when the stored summary was already identical.
   */
  async saveSummary(countryInput: Country | string, id: string | number, summary: string): Promise<boolean> {
    const target = normalizeId(id);
    if (!target) return false;

    return this.withModel<boolean>(countryInput, 'saveSummary', false, async (model, country) => {
      const result = await model.updateOne(
        idFilter(target),
        { $set: { summary, updated_at: new Date() } }
      );

      if (result.matchedCount === 0) {
        logger.warn('MongoNotificationStore: no notification to update', { country, id: target });
        return false;
      }

      logger.info('MongoNotificationStore: summary saved', {
        country,
        id: target,
        modified: result.modifiedCount > 0
      });
      return true;
    });
  }

  async getStats(countryInput: Country | string): Promise<NotificationStats> {
    return this.withModel<NotificationStats>(countryInput, 'getStats', { ...EMPTY_STATS }, async (model) => {
      const [total, withSummary] = await Promise.all([
        model.countDocuments({}),
        model.countDocuments(HAS_SUMMARY_FILTER)
      ]);
      return buildStats(total, withSummary);
    });
  }

  /**
   * Insert a new notification. Returns false on a duplicate id or any write
   * error.
   */
  async insertNotification(countryInput: Country | string, notification: Notification): Promise<boolean> {
    return this.withModel<boolean>(countryInput, 'insertNotification', false, async (model, country) => {
      const now = new Date();
      try {
        await model.create({
          id: normalizeId(notification.id),
          date: notification.date,
          title: notification.title,
          url: notification.url,
          text: notification.text,
          summary: normalizeSummary(notification.summary) ?? null,
          created_at: now,
          updated_at: now
        });
        return true;
      } catch (error) {
        if (isDuplicateKeyError(error)) {
          logger.debug('MongoNotificationStore: duplicate notification id', { country, id: notification.id });
          return false;
        }
        throw error;
      }
    });
  }

  async close(): Promise<void> {
    await this.connection.close();
    this.state = 'disconnected';
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private modelFor(country: Country): NotificationModel {
    let model = this.models.get(country);
    if (!model) {
      model = this.connection.model<NotificationDocument>(
        `${country}Notification`,
        notificationSchema,
        collectionNameFor(country)
      );
      this.models.set(country, model);
    }
    return model;
  }

  private async ensureIndexes(): Promise<void> {
    try {
      await Promise.all(COUNTRIES.map((country) => this.modelFor(country).createIndexes()));
    } catch (error) {
      logger.warn('MongoNotificationStore: could not create indexes', {
        error: error instanceof Error ? error.message : 'unknown'
      });
    }
  }

  private async withModel<T>(
    countryInput: Country | string,
    action: string,
    fallback: T,
    operation: (model: NotificationModel, country: Country) => Promise<T>
  ): Promise<T> {
    const country = parseCountry(countryInput);
    if (!country) {
      logger.debug('MongoNotificationStore: unknown country', { country: countryInput });
      return fallback;
    }

    if (!(await this.isAvailable())) {
      return fallback;
    }

    try {
      return await operation(this.modelFor(country), country);
    } catch (error) {
      logger.error(`MongoNotificationStore: ${action} failed`, {
        country,
        error: error instanceof Error ? error.message : 'unknown'
      });
      return fallback;
    }
  }
}

function documentToNotification(doc: NotificationDocument): Notification {
  const notification: Notification = {
    id: normalizeId(cellToString(doc.id)),
    date: cellToString(doc.date),
    title: cellToString(doc.title),
    url: cellToString(doc.url),
    text: cellToString(doc.text)
  };

  const summary = normalizeSummary(doc.summary);
  if (summary !== undefined) notification.summary = summary;
  if (doc.created_at) notification.createdAt = doc.created_at;
  if (doc.updated_at) notification.updatedAt = doc.updated_at;

  return notification;
}

function isDuplicateKeyError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === DUPLICATE_KEY_ERROR;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export interface MongoConnectionOptions extends MongoNotificationStoreOptions {
  uri: string;
  database: string;
  connectTimeoutMs?: number;
}

/**
 * Open a connection and wrap it in a store. An unreachable server is logged
 * and yields a store in the `disconnected` state rather than an error.
 */
export async function connectMongoNotificationStore(options: MongoConnectionOptions): Promise<MongoNotificationStore> {
  const connection = mongoose.createConnection(options.uri, {
    dbName: options.database,
    serverSelectionTimeoutMS: options.connectTimeoutMs ?? 5000,
    // Fail fast instead of queueing operations while disconnected
    bufferCommands: false,
    autoIndex: false
  });

  connection.on('error', (err: Error) => {
    logger.error('MongoDB connection error', { error: err.message });
  });

  const store = new MongoNotificationStore(connection, { optionLimit: options.optionLimit });

  try {
    await connection.asPromise();
    await store.isAvailable();
    logger.info('MongoNotificationStore: connected', { database: options.database });
  } catch (error) {
    logger.warn('MongoNotificationStore: MongoDB unavailable', {
      error: error instanceof Error ? error.message : 'unknown'
    });
  }

  return store;
}
