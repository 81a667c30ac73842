import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { STORE_SCHEMA_VERSION, stageAndCommit, type BulkLoad, type CardStore } from '../contracts/cardStore';
import { childLogger, type Logger } from '../logger';
import type {
  CacheMetadata,
  CardDocument,
  CardId,
  CardRecord,
  MtgoId,
  UnixSeconds,
  UrlResponseCacheEntry,
} from '../types';

export const SQLITE_FILENAME = 'cards.sqlite3';

interface CardRow {
  id: string;
  name: string;
  mtgo_id: number | null;
  payload: string;
}

interface MetadataRow {
  last_bulk_refresh: number;
  schema_version: string;
}

interface UrlRow {
  url: string;
  fetched_at: number;
  payload: string;
}

// Columns each table must have; anything else is an older layout.
const EXPECTED_COLUMNS: Record<string, string[]> = {
  cards: ['id', 'name', 'mtgo_id', 'payload'],
  metadata: ['id', 'last_bulk_refresh', 'schema_version'],
  url_cache: ['url', 'fetched_at', 'payload'],
};

const STAGING_PREFIX = 'cards_staging_';

function cardTableSql(table: string) {
  return `
    CREATE TABLE IF NOT EXISTS ${table} (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      mtgo_id INTEGER,
      payload TEXT NOT NULL
    );`;
}

function createTables(db: Database.Database) {
  db.exec(`
    ${cardTableSql('cards')}
    CREATE INDEX IF NOT EXISTS idx_cards_name ON cards(name);
    CREATE INDEX IF NOT EXISTS idx_cards_mtgo_id ON cards(mtgo_id);
    CREATE TABLE IF NOT EXISTS metadata (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      last_bulk_refresh INTEGER NOT NULL,
      schema_version TEXT NOT NULL
    );
    CREATE TABLE IF NOT EXISTS url_cache (
      url TEXT PRIMARY KEY,
      fetched_at INTEGER NOT NULL,
      payload TEXT NOT NULL
    );
  `);
}

function dropTables(db: Database.Database, filter: (name: string) => boolean = () => true) {
  const tables = db
    .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%'")
    .all()
    .filter(({ name }) => filter(name));
  db.transaction(() => {
    for (const { name } of tables) {
      db.exec(`DROP TABLE IF EXISTS "${name.replace(/"/g, '""')}"`);
    }
  })();
}

/** Returns a reason string when the on-disk layout is not the current one. */
function findSchemaMismatch(db: Database.Database): string | null {
  for (const [table, expected] of Object.entries(EXPECTED_COLUMNS)) {
    const cols = db.prepare<[], { name: string }>(`PRAGMA table_info(${table})`).all();
    if (cols.length === 0) continue; // not created yet
    const names = new Set(cols.map((c) => c.name));
    if (names.size !== expected.length || expected.some((c) => !names.has(c))) {
      return `table ${table} has columns [${[...names].join(', ')}]`;
    }
  }

  const hasMetadata = db.prepare<[], { name: string }>(
    "SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'metadata'",
  ).get();
  if (hasMetadata) {
    const row = db
      .prepare<[], MetadataRow>('SELECT last_bulk_refresh, schema_version FROM metadata ORDER BY id LIMIT 1')
      .get();
    if (row && row.schema_version !== STORE_SCHEMA_VERSION) {
      return `schema version ${row.schema_version} != ${STORE_SCHEMA_VERSION}`;
    }
  }
  return null;
}

function toRecord(row: CardRow): CardRecord {
  const payload: CardDocument = JSON.parse(row.payload);
  const record: CardRecord = { id: row.id, name: row.name, payload };
  if (row.mtgo_id !== null) record.mtgoId = row.mtgo_id;
  return record;
}

export interface SqliteStoreOptions {
  logger?: Logger;
}

/**
 * `CardStore` on a single SQLite file. better-sqlite3 is synchronous, so each
 * method body is one implicit or explicit transaction and nothing interleaves.
 */
export class SqliteCardStore implements CardStore {
  private readonly db: Database.Database;
  private readonly log: Logger;
  private loads = 0;

  constructor(db: Database.Database, options: SqliteStoreOptions = {}) {
    this.db = db;
    this.log = options.logger ?? childLogger('sqlite-store');
    this.migrate();
  }

  /** Opens (creating if needed) the store file; `:memory:` is accepted. */
  static open(filename: string, options: SqliteStoreOptions = {}): SqliteCardStore {
    if (filename !== ':memory:') {
      const dir = path.dirname(filename);
      if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
    }
    const db = new Database(filename);
    db.pragma('journal_mode = WAL');
    return new SqliteCardStore(db, options);
  }

  private migrate() {
    const mismatch = findSchemaMismatch(this.db);
    if (mismatch) {
      this.log.warn({ reason: mismatch }, 'Store layout mismatch; dropping and recreating all tables');
      dropTables(this.db);
    } else {
      // staging left behind by an interrupted refresh
      dropTables(this.db, (name) => name.startsWith(STAGING_PREFIX));
    }
    createTables(this.db);
  }

  async getById(id: CardId): Promise<CardRecord | null> {
    const row = this.db.prepare<[string], CardRow>('SELECT * FROM cards WHERE id = ?').get(id);
    return row ? toRecord(row) : null;
  }

  async findByName(name: string): Promise<CardRecord[]> {
    return this.db
      .prepare<[string], CardRow>('SELECT * FROM cards WHERE name = ? ORDER BY id')
      .all(name)
      .map(toRecord);
  }

  async findByMtgoId(mtgoId: MtgoId): Promise<CardRecord[]> {
    return this.db
      .prepare<[number], CardRow>('SELECT * FROM cards WHERE mtgo_id = ? ORDER BY id')
      .all(mtgoId)
      .map(toRecord);
  }

  async insertCard(record: CardRecord): Promise<void> {
    this.insertStatement().run(record.id, record.name, record.mtgoId ?? null, JSON.stringify(record.payload));
  }

  async clearAllCards(): Promise<void> {
    this.db.prepare('DELETE FROM cards').run();
  }

  async beginBulkLoad(): Promise<BulkLoad> {
    this.loads += 1;
    const staging = `${STAGING_PREFIX}${this.loads}`;
    this.db.exec(`DROP TABLE IF EXISTS ${staging}; ${cardTableSql(staging)}`);
    const insert = this.db.prepare<[string, string, number | null, string]>(
      `INSERT OR IGNORE INTO ${staging} (id, name, mtgo_id, payload) VALUES (?, ?, ?, ?)`,
    );
    const addBatch = this.db.transaction((rows: CardRecord[]) => {
      for (const r of rows) insert.run(r.id, r.name, r.mtgoId ?? null, JSON.stringify(r.payload));
    });
    const swap = this.db.transaction((refreshedAt: UnixSeconds) => {
      this.db.prepare('DELETE FROM cards').run();
      const { changes } = this.db
        .prepare(`INSERT INTO cards (id, name, mtgo_id, payload) SELECT id, name, mtgo_id, payload FROM ${staging}`)
        .run();
      this.db.exec(`DROP TABLE ${staging}`);
      this.writeMetadata(refreshedAt);
      return changes;
    });

    let active = true;
    const ensureOpen = () => {
      if (!active) throw new Error(`bulk load ${staging} is already finished`);
    };
    return {
      add: async (records) => {
        ensureOpen();
        addBatch(records);
      },
      commit: async (refreshedAt) => {
        ensureOpen();
        const count = swap(refreshedAt);
        active = false;
        return count;
      },
      abort: async () => {
        active = false;
        if (this.db.open) this.db.exec(`DROP TABLE IF EXISTS ${staging}`);
      },
    };
  }

  async replaceAllCards(records: Iterable<CardRecord>, refreshedAt: UnixSeconds): Promise<number> {
    return stageAndCommit(await this.beginBulkLoad(), records, refreshedAt);
  }

  async countCards(): Promise<number> {
    const row = this.db.prepare<[], { cnt: number }>('SELECT COUNT(*) AS cnt FROM cards').get();
    return row?.cnt ?? 0;
  }

  async getMetadata(): Promise<CacheMetadata> {
    const read = this.db.transaction((): CacheMetadata => {
      const row = this.readMetadataRow();
      if (row) return { lastBulkRefresh: row.last_bulk_refresh, schemaVersion: row.schema_version };
      this.db
        .prepare<[number, string]>('INSERT INTO metadata (last_bulk_refresh, schema_version) VALUES (?, ?)')
        .run(0, STORE_SCHEMA_VERSION);
      return { lastBulkRefresh: 0, schemaVersion: STORE_SCHEMA_VERSION };
    });
    return read();
  }

  async setMetadata(lastBulkRefresh: UnixSeconds): Promise<void> {
    this.db.transaction(() => this.writeMetadata(lastBulkRefresh))();
  }

  async getUrlEntry(url: string): Promise<UrlResponseCacheEntry | null> {
    const row = this.db.prepare<[string], UrlRow>('SELECT * FROM url_cache WHERE url = ?').get(url);
    if (!row) return null;
    return { url: row.url, fetchedAt: row.fetched_at, payload: JSON.parse(row.payload) };
  }

  async putUrlEntry(url: string, fetchedAt: UnixSeconds, payload: unknown): Promise<void> {
    this.db
      .prepare<[string, number, string]>('INSERT OR REPLACE INTO url_cache (url, fetched_at, payload) VALUES (?, ?, ?)')
      .run(url, fetchedAt, JSON.stringify(payload));
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }

  // Records are never updated in place; a duplicate id is left as it was.
  private insertStatement() {
    return this.db.prepare<[string, string, number | null, string]>(
      'INSERT OR IGNORE INTO cards (id, name, mtgo_id, payload) VALUES (?, ?, ?, ?)',
    );
  }

  private readMetadataRow(): MetadataRow | undefined {
    return this.db
      .prepare<[], MetadataRow>('SELECT last_bulk_refresh, schema_version FROM metadata ORDER BY id LIMIT 1')
      .get();
  }

  // Singleton is kept by the application: only the first row is ever touched.
  private writeMetadata(lastBulkRefresh: UnixSeconds) {
    const updated = this.db
      .prepare<[number, string]>(
        'UPDATE metadata SET last_bulk_refresh = ?, schema_version = ? WHERE id = (SELECT MIN(id) FROM metadata)',
      )
      .run(lastBulkRefresh, STORE_SCHEMA_VERSION);
    if (updated.changes === 0) {
      this.db
        .prepare<[number, string]>('INSERT INTO metadata (last_bulk_refresh, schema_version) VALUES (?, ?)')
        .run(lastBulkRefresh, STORE_SCHEMA_VERSION);
    }
  }
}
