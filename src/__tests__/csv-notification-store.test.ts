import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { CsvNotificationStore } from '../services/stores/csv-notification-store';

// ---------------------------------------------------------------------------
// Mocks
// ---------------------------------------------------------------------------

vi.mock('../utils/logger', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const INDIA_CSV = [
  ',id,date,title,url,text',
  '0,IND-001,2024-01-05,Circular on KYC norms,https://example.org/ind/1,"Banks must update KYC records. The deadline is 31 March 2024."',
  '1,IND-002,2024-02-10,  Revised export guidelines ,https://example.org/ind/2,Exporters must file returns quarterly.',
  '2,42,2024-03-01,Numeric id notice,https://example.org/ind/3,"Line one, with a comma."',
].join('\n') + '\n';

const USA_CSV = [
  ',date,title,url,text',
  '0,2024-01-01,Rule A,https://example.org/usa/0,Text A.',
  '1,2024-01-02,Rule B,https://example.org/usa/1,Text B.',
  '2,2024-01-03,Rule C,https://example.org/usa/2,Text C.',
].join('\n') + '\n';

const USA_WITH_SUMMARIES_CSV = [
  ',date,title,url,text,summary',
  '0,2024-01-01,Rule A,https://example.org/usa/0,Text A.,Existing summary.',
  '1,2024-01-02,Rule B,https://example.org/usa/1,Text B.,"   "',
  '2,2024-01-03,Rule C,https://example.org/usa/2,Text C.,',
].join('\n') + '\n';

const FILES = { India: 'IND_data.csv', USA: 'USA_data.csv' };

let dataDir: string;

async function writeFixtures(fixtures: { india?: string; usa?: string }): Promise<void> {
  if (fixtures.india !== undefined) {
    await writeFile(path.join(dataDir, FILES.India), fixtures.india, 'utf-8');
  }
  if (fixtures.usa !== undefined) {
    await writeFile(path.join(dataDir, FILES.USA), fixtures.usa, 'utf-8');
  }
}

function createStore(optionLimit?: number): CsvNotificationStore {
  return new CsvNotificationStore({ dataDir, files: FILES, optionLimit });
}

async function readCsv(file: string): Promise<string[][]> {
  const content = await readFile(path.join(dataDir, file), 'utf-8');
  return parse(content, { relax_column_count: true, skip_empty_lines: true });
}

beforeEach(async () => {
  dataDir = await mkdtemp(path.join(os.tmpdir(), 'notice-digest-csv-'));
});

afterEach(async () => {
  await rm(dataDir, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// Availability
// ---------------------------------------------------------------------------

describe('CsvNotificationStore availability', () => {
  it('starts disconnected and becomes ready once a partition file exists', async () => {
    await writeFixtures({ usa: USA_CSV });
    const store = createStore();

    expect(store.getState()).toBe('disconnected');
    await expect(store.isAvailable()).resolves.toBe(true);
    expect(store.getState()).toBe('ready');
  });

  it('reports unavailable and degrades to empty results when files are missing', async () => {
    const store = createStore();

    await expect(store.isAvailable()).resolves.toBe(false);
    expect(store.getState()).toBe('disconnected');
    await expect(store.listOptions('USA')).resolves.toEqual([]);
    await expect(store.getById('USA', '0')).resolves.toBeNull();
    await expect(store.saveSummary('USA', '0', 'text')).resolves.toBe(false);
    await expect(store.getStats('USA')).resolves.toEqual({ total: 0, withSummary: 0, withoutSummary: 0 });
  });

  it('retries a failed load on the next call', async () => {
    const store = createStore();
    await expect(store.listOptions('USA')).resolves.toEqual([]);

    await writeFixtures({ usa: USA_CSV });
    const options = await store.listOptions('USA');
    expect(options).toHaveLength(3);
  });
});

// ---------------------------------------------------------------------------
// listOptions
// ---------------------------------------------------------------------------

describe('CsvNotificationStore.listOptions', () => {
  it('synthesizes USA ids from the index column in source order', async () => {
    await writeFixtures({ usa: USA_CSV });
    const store = createStore();

    const options = await store.listOptions('USA');
    expect(options.map((o) => o.id)).toEqual(['0', '1', '2']);
    expect(options[0]).toEqual({ id: '0', title: 'Rule A', date: '2024-01-01', hasSummary: false });
  });

  it('falls back to the row position when a USA index cell is blank', async () => {
    await writeFixtures({
      usa: ',date,title,url,text\n,2024-01-01,Rule A,https://example.org/usa/0,Text A.\n',
    });
    const store = createStore();

    const options = await store.listOptions('usa');
    expect(options.map((o) => o.id)).toEqual(['0']);
  });

  it('uses the India id column verbatim and trims titles', async () => {
    await writeFixtures({ india: INDIA_CSV });
    const store = createStore();

    const options = await store.listOptions('india');
    expect(options.map((o) => o.id)).toEqual(['IND-001', 'IND-002', '42']);
    expect(options[1].title).toBe('Revised export guidelines');
  });

  it('marks only non-blank summaries as present', async () => {
    await writeFixtures({ usa: USA_WITH_SUMMARIES_CSV });
    const store = createStore();

    const options = await store.listOptions('USA');
    expect(options.map((o) => o.hasSummary)).toEqual([true, false, false]);
  });

  it('caps the listing at the configured limit', async () => {
    await writeFixtures({ usa: USA_CSV });
    const store = createStore(2);

    expect(await store.listOptions('USA')).toHaveLength(2);
    expect(await store.listOptions('USA', 1)).toHaveLength(1);
    expect(await store.listOptions('USA', 50)).toHaveLength(2);
  });

  it('returns an empty list for unknown countries', async () => {
    await writeFixtures({ usa: USA_CSV });
    const store = createStore();

    await expect(store.listOptions('France')).resolves.toEqual([]);
  });

  it('lists ids that getById resolves', async () => {
    await writeFixtures({ india: INDIA_CSV, usa: USA_CSV });
    const store = createStore();

    for (const country of ['India', 'USA']) {
      const options = await store.listOptions(country);
      for (const option of options) {
        const notification = await store.getById(country, option.id);
        expect(notification?.id).toBe(option.id);
      }
    }
  });
});

// ---------------------------------------------------------------------------
// getById
// ---------------------------------------------------------------------------

describe('CsvNotificationStore.getById', () => {
  it('returns the full notification without a summary when none is stored', async () => {
    await writeFixtures({ india: INDIA_CSV });
    const store = createStore();

    const notification = await store.getById('India', 'IND-001');
    expect(notification).toEqual({
      id: 'IND-001',
      date: '2024-01-05',
      title: 'Circular on KYC norms',
      url: 'https://example.org/ind/1',
      text: 'Banks must update KYC records. The deadline is 31 March 2024.',
    });
  });

  it('normalizes numeric and float-like ids', async () => {
    await writeFixtures({ india: INDIA_CSV, usa: USA_CSV });
    const store = createStore();

    expect((await store.getById('India', 42))?.title).toBe('Numeric id notice');
    expect((await store.getById('India', '42.0'))?.title).toBe('Numeric id notice');
    expect((await store.getById('USA', 1))?.title).toBe('Rule B');
  });

  it('returns null for an unknown id', async () => {
    await writeFixtures({ usa: USA_CSV });
    const store = createStore();

    await expect(store.getById('USA', '99')).resolves.toBeNull();
  });

  it('returns the first match when India ids repeat', async () => {
    await writeFixtures({
      india: [
        ',id,date,title,url,text',
        '0,DUP,2024-01-01,First,https://example.org/a,A',
        '1,DUP,2024-01-02,Second,https://example.org/b,B',
      ].join('\n'),
    });
    const store = createStore();

    expect((await store.getById('India', 'DUP'))?.title).toBe('First');
  });

  it('returns null for a blank id even when a row has a blank id cell', async () => {
    await writeFixtures({
      india: [
        ',id,date,title,url,text',
        '0,,2024-01-01,No id,https://example.org/a,A',
        '1,IND-1,2024-01-02,With id,https://example.org/b,B',
      ].join('\n'),
    });
    const store = createStore();

    await expect(store.getById('India', '')).resolves.toBeNull();
    await expect(store.getById('India', '   ')).resolves.toBeNull();
  });
});

// ---------------------------------------------------------------------------
// saveSummary
// ---------------------------------------------------------------------------

describe('CsvNotificationStore.saveSummary', () => {
  it('round-trips a saved summary', async () => {
    await writeFixtures({ usa: USA_CSV });
    const store = createStore();

    await expect(store.saveSummary('USA', '1', 'Rule B changes filing.')).resolves.toBe(true);
    expect((await store.getById('USA', '1'))?.summary).toBe('Rule B changes filing.');
  });

  it('rewrites the file keeping header, order and every other cell', async () => {
    await writeFixtures({ usa: USA_CSV });
    const before = await readCsv(FILES.USA);
    const store = createStore();

    await store.saveSummary('USA', '1', 'Summary for B.');
    const after = await readCsv(FILES.USA);

    expect(after).toHaveLength(before.length);
    expect(after[0]).toEqual([...before[0], 'summary']);
    after.slice(1).forEach((row, i) => {
      expect(row.slice(0, 5)).toEqual(before[i + 1]);
    });
    expect(after.slice(1).map((row) => row[5])).toEqual(['', 'Summary for B.', '']);
  });

  it('persists across store instances', async () => {
    await writeFixtures({ india: INDIA_CSV });
    await createStore().saveSummary('india', 'IND-002', 'Quarterly returns now required.');

    const reloaded = createStore();
    expect((await reloaded.getById('India', 'IND-002'))?.summary).toBe('Quarterly returns now required.');
    expect((await reloaded.getById('India', 'IND-001'))?.text).toBe(
      'Banks must update KYC records. The deadline is 31 March 2024.'
    );
    expect((await reloaded.getById('India', '42'))?.text).toBe('Line one, with a comma.');
  });

  it('returns false and writes nothing for a missing id', async () => {
    await writeFixtures({ india: INDIA_CSV });
    const store = createStore();

    await expect(store.saveSummary('india', 'missing-id', 'text')).resolves.toBe(false);
    expect(await readFile(path.join(dataDir, FILES.India), 'utf-8')).toBe(INDIA_CSV);
    expect((await store.getStats('India')).total).toBe(3);
  });

  it('refuses a blank id without touching the file', async () => {
    const india = [
      ',id,date,title,url,text',
      '0,,2024-01-01,No id,https://example.org/a,A',
    ].join('\n') + '\n';
    await writeFixtures({ india });
    const store = createStore();

    await expect(store.saveSummary('India', '', 'text')).resolves.toBe(false);
    expect(await readFile(path.join(dataDir, FILES.India), 'utf-8')).toBe(india);
    expect((await store.getStats('India')).withSummary).toBe(0);
  });

  it('keeps stats stable when the same summary is saved twice', async () => {
    await writeFixtures({ usa: USA_CSV });
    const store = createStore();

    await store.saveSummary('USA', '0', 'Same text.');
    const first = await store.getStats('USA');
    await expect(store.saveSummary('USA', '0', 'Same text.')).resolves.toBe(true);

    expect(await store.getStats('USA')).toEqual(first);
    expect(first).toEqual({ total: 3, withSummary: 1, withoutSummary: 2 });
  });

  it('updates every row sharing a duplicated India id', async () => {
    await writeFixtures({
      india: [
        ',id,date,title,url,text',
        '0,DUP,2024-01-01,First,https://example.org/a,A',
        '1,DUP,2024-01-02,Second,https://example.org/b,B',
      ].join('\n'),
    });
    const store = createStore();

    await store.saveSummary('India', 'DUP', 'Shared.');
    expect(await store.getStats('India')).toEqual({ total: 2, withSummary: 2, withoutSummary: 0 });
  });

  it('does not lose concurrent updates', async () => {
    await writeFixtures({ usa: USA_CSV });
    const store = createStore();

    const results = await Promise.all([
      store.saveSummary('USA', '0', 'Summary A.'),
      store.saveSummary('USA', '2', 'Summary C.'),
    ]);
    expect(results).toEqual([true, true]);

    const reloaded = createStore();
    expect((await reloaded.getById('USA', '0'))?.summary).toBe('Summary A.');
    expect((await reloaded.getById('USA', '2'))?.summary).toBe('Summary C.');
  });

  it('returns false and restores the cached value when the write fails', async () => {
    await writeFixtures({ usa: USA_CSV });
    const store = createStore();
    await store.listOptions('USA');

    await rm(dataDir, { recursive: true, force: true });

    await expect(store.saveSummary('USA', '0', 'Lost.')).resolves.toBe(false);
    expect((await store.getById('USA', '0'))?.summary).toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// getStats / readAll
// ---------------------------------------------------------------------------

describe('CsvNotificationStore.getStats', () => {
  it('counts blank summaries as without summary', async () => {
    await writeFixtures({ usa: USA_WITH_SUMMARIES_CSV });
    const store = createStore();

    expect(await store.getStats('USA')).toEqual({ total: 3, withSummary: 1, withoutSummary: 2 });
  });

  it('returns zeros for unknown countries', async () => {
    const store = createStore();
    expect(await store.getStats('Atlantis')).toEqual({ total: 0, withSummary: 0, withoutSummary: 0 });
  });
});

describe('CsvNotificationStore.readAll', () => {
  it('returns every notification in file order', async () => {
    await writeFixtures({ usa: USA_WITH_SUMMARIES_CSV });
    const store = createStore(1);

    const all = await store.readAll('USA');
    expect(all.map((n) => n.id)).toEqual(['0', '1', '2']);
    expect(all.map((n) => n.summary)).toEqual(['Existing summary.', undefined, undefined]);
  });
});
