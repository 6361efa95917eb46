import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname, resolve } from 'path';
import { getConfig, type DatabaseConfig } from '../config/index.js';
import { CREATE_TABLES, DROP_TABLES, SCHEMA_VERSION, UTC_NOW_SQL } from './schema.js';
import type {
  BookmakerRow,
  EventRow,
  LatestOdds,
  NewBookmaker,
  NewEvent,
  NewOddsSnapshot,
  OddsSnapshot,
  OddsSnapshotRow,
} from './schema.js';
import { toUtcTimestamp } from './timestamps.js';

let db: Database.Database | null = null;

export type JournalMode = DatabaseConfig['journalMode'];

/**
 * Get or create database connection.
 * Without a path, the location comes from config (database.path / ODDS_DB_PATH).
 */
export function getDb(dbPath?: string, journalMode?: JournalMode): Database.Database {
  if (db) return db;

  let path = dbPath;
  let mode = journalMode;
  if (!path) {
    const config = getConfig();
    path = config.database.path;
    mode = mode ?? config.database.journalMode;
  }

  if (path !== ':memory:') {
    path = resolve(process.cwd(), path);
    mkdirSync(dirname(path), { recursive: true });
  }

  db = new Database(path);
  db.pragma(`journal_mode = ${mode ?? 'WAL'}`);

  initializeSchema(db);

  return db;
}

/**
 * Initialize database schema if not exists
 */
function initializeSchema(database: Database.Database): void {
  const tableExists = database
    .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type='table' AND name='schema_version'")
    .get();

  if (!tableExists) {
    applySchema(database);
    console.log(`Database initialized with schema version ${SCHEMA_VERSION}`);
    return;
  }

  const version = getSchemaVersion(database);
  if (version < SCHEMA_VERSION) {
    console.log(`Database migration needed: ${version} -> ${SCHEMA_VERSION}`);
    applySchema(database);
  }
}

/**
 * Create every schema object that is missing and record the schema version
 */
export function applySchema(database: Database.Database): void {
  database.transaction(() => {
    database.exec(CREATE_TABLES);
    database.prepare('INSERT OR IGNORE INTO schema_version (version) VALUES (?)').run(SCHEMA_VERSION);
  })();
}

/**
 * Drop and recreate every schema object. Stored rows are lost.
 */
export function resetSchema(database: Database.Database): void {
  database.transaction(() => {
    database.exec(DROP_TABLES);
    database.exec(CREATE_TABLES);
    database.prepare('INSERT INTO schema_version (version) VALUES (?)').run(SCHEMA_VERSION);
  })();
}

/**
 * Highest applied schema version, 0 for an empty database
 */
export function getSchemaVersion(database: Database.Database = getDb()): number {
  const row = database
    .prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM schema_version')
    .get();
  return row?.version ?? 0;
}

/**
 * Close database connection
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

// ============================================
// Row mapping
// ============================================

interface EventParams {
  event_id: string;
  sport_key: string;
  sport_title: string | null;
  commence_time_utc: string | null;
  home_team: string | null;
  away_team: string | null;
}

interface BookmakerParams {
  bookmaker_key: string;
  bookmaker_title: string | null;
}

type SnapshotParams = OddsSnapshotRow;

function toEventParams(event: NewEvent): EventParams {
  return {
    event_id: event.event_id,
    sport_key: event.sport_key,
    sport_title: event.sport_title ?? null,
    commence_time_utc: toUtcTimestamp(event.commence_time_utc, 'commence_time_utc'),
    home_team: event.home_team ?? null,
    away_team: event.away_team ?? null,
  };
}

function toBookmakerParams(bookmaker: NewBookmaker): BookmakerParams {
  return {
    bookmaker_key: bookmaker.bookmaker_key,
    bookmaker_title: bookmaker.bookmaker_title ?? null,
  };
}

function toSnapshotParams(snapshot: NewOddsSnapshot): SnapshotParams {
  const isHome = snapshot.is_home_team;
  return {
    event_id: snapshot.event_id,
    bookmaker_key: snapshot.bookmaker_key,
    market_key: snapshot.market_key,
    outcome_name: snapshot.outcome_name,
    is_home_team: isHome === null || isHome === undefined ? null : isHome ? 1 : 0,
    price_american: snapshot.price_american,
    line_point: snapshot.line_point ?? null,
    event_commence_utc: toUtcTimestamp(snapshot.event_commence_utc, 'event_commence_utc'),
    market_last_update: toUtcTimestamp(snapshot.market_last_update, 'market_last_update'),
    ingest_ts_utc: toUtcTimestamp(snapshot.ingest_ts_utc, 'ingest_ts_utc'),
  };
}

function toSnapshot(row: OddsSnapshotRow): OddsSnapshot {
  return {
    ...row,
    is_home_team: row.is_home_team === null ? null : row.is_home_team === 1,
  };
}

// ============================================
// Event Operations
// ============================================

const EVENT_COLUMNS = 'event_id, sport_key, sport_title, commence_time_utc, home_team, away_team';
const EVENT_VALUES = '@event_id, @sport_key, @sport_title, @commence_time_utc, @home_team, @away_team';

/**
 * Insert a new event. A duplicate or missing event_id is rejected by SQLite.
 */
export function insertEvent(event: NewEvent): void {
  const database = getDb();
  database
    .prepare<EventParams>(`INSERT INTO events (${EVENT_COLUMNS}) VALUES (${EVENT_VALUES})`)
    .run(toEventParams(event));
}

/**
 * Insert events whose event_id is new (batch). Existing events are
 * reference data and stay as first seen.
 * @returns Number of rows inserted
 */
export function upsertEvents(events: NewEvent[]): number {
  if (events.length === 0) return 0;

  const database = getDb();
  const params = events.map(toEventParams);
  const stmt = database.prepare<EventParams>(`
    INSERT INTO events (${EVENT_COLUMNS})
    VALUES (${EVENT_VALUES})
    ON CONFLICT(event_id) DO NOTHING
  `);

  const upsertMany = database.transaction((items: EventParams[]) => {
    let inserted = 0;
    for (const item of items) {
      inserted += stmt.run(item).changes;
    }
    return inserted;
  });

  return upsertMany(params);
}

/**
 * Get an event by ID
 */
export function getEvent(eventId: string): EventRow | undefined {
  const database = getDb();
  return database.prepare<[string], EventRow>('SELECT * FROM events WHERE event_id = ?').get(eventId);
}

/**
 * Get events matching filter criteria, soonest first
 */
export function listEvents(options: {
  sportKey?: string;
  commenceFrom?: string | Date;
  commenceTo?: string | Date;
} = {}): EventRow[] {
  const database = getDb();
  const conditions: string[] = [];
  const params: Record<string, string> = {};

  if (options.sportKey) {
    conditions.push('sport_key = @sportKey');
    params.sportKey = options.sportKey;
  }
  const from = toUtcTimestamp(options.commenceFrom, 'commenceFrom');
  if (from) {
    conditions.push('commence_time_utc >= @commenceFrom');
    params.commenceFrom = from;
  }
  const to = toUtcTimestamp(options.commenceTo, 'commenceTo');
  if (to) {
    conditions.push('commence_time_utc <= @commenceTo');
    params.commenceTo = to;
  }

  const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
  const sql = `SELECT * FROM events ${where} ORDER BY commence_time_utc ASC NULLS LAST, event_id ASC`;
  return database.prepare<Record<string, string>, EventRow>(sql).all(params);
}

// ============================================
// Bookmaker Operations
// ============================================

/**
 * Insert a new bookmaker. A duplicate or missing key is rejected by SQLite.
 */
export function insertBookmaker(bookmaker: NewBookmaker): void {
  const database = getDb();
  database
    .prepare<BookmakerParams>(
      'INSERT INTO bookmakers (bookmaker_key, bookmaker_title) VALUES (@bookmaker_key, @bookmaker_title)',
    )
    .run(toBookmakerParams(bookmaker));
}

/**
 * Insert bookmakers whose key is new (batch); known keys are left untouched
 * @returns Number of rows inserted
 */
export function upsertBookmakers(bookmakers: NewBookmaker[]): number {
  if (bookmakers.length === 0) return 0;

  const database = getDb();
  const params = bookmakers.map(toBookmakerParams);
  const stmt = database.prepare<BookmakerParams>(`
    INSERT INTO bookmakers (bookmaker_key, bookmaker_title)
    VALUES (@bookmaker_key, @bookmaker_title)
    ON CONFLICT(bookmaker_key) DO NOTHING
  `);

  const upsertMany = database.transaction((items: BookmakerParams[]) => {
    let inserted = 0;
    for (const item of items) {
      inserted += stmt.run(item).changes;
    }
    return inserted;
  });

  return upsertMany(params);
}

/**
 * Get a bookmaker by key
 */
export function getBookmaker(bookmakerKey: string): BookmakerRow | undefined {
  const database = getDb();
  return database
    .prepare<[string], BookmakerRow>('SELECT * FROM bookmakers WHERE bookmaker_key = ?')
    .get(bookmakerKey);
}

/**
 * Get all bookmakers
 */
export function listBookmakers(): BookmakerRow[] {
  const database = getDb();
  return database.prepare<[], BookmakerRow>('SELECT * FROM bookmakers ORDER BY bookmaker_key ASC').all();
}

// ============================================
// Odds Snapshot Operations
// ============================================

/**
 * Append odds snapshots (batch). Rows are never updated or deduplicated;
 * event and bookmaker references are not checked.
 * @returns Number of rows written
 */
export function appendOddsSnapshots(snapshots: NewOddsSnapshot[]): number {
  if (snapshots.length === 0) return 0;

  const database = getDb();
  const params = snapshots.map(toSnapshotParams);
  const stmt = database.prepare<SnapshotParams>(`
    INSERT INTO odds_snapshots (
      event_id, bookmaker_key, market_key, outcome_name, is_home_team,
      price_american, line_point, event_commence_utc, market_last_update, ingest_ts_utc
    )
    VALUES (
      @event_id, @bookmaker_key, @market_key, @outcome_name, @is_home_team,
      @price_american, @line_point, @event_commence_utc, @market_last_update,
      COALESCE(@ingest_ts_utc, ${UTC_NOW_SQL})
    )
  `);

  const insertMany = database.transaction((items: SnapshotParams[]) => {
    for (const item of items) {
      stmt.run(item);
    }
  });

  insertMany(params);
  return params.length;
}

export interface OddsFilter {
  eventId?: string;
  bookmakerKey?: string;
  marketKey?: string;
}

function buildOddsConditions(filter: OddsFilter & { outcomeName?: string }): {
  where: string;
  params: Record<string, string | number>;
} {
  const conditions: string[] = [];
  const params: Record<string, string | number> = {};

  if (filter.eventId) {
    conditions.push('event_id = @eventId');
    params.eventId = filter.eventId;
  }
  if (filter.bookmakerKey) {
    conditions.push('bookmaker_key = @bookmakerKey');
    params.bookmakerKey = filter.bookmakerKey;
  }
  if (filter.marketKey) {
    conditions.push('market_key = @marketKey');
    params.marketKey = filter.marketKey;
  }
  if (filter.outcomeName) {
    conditions.push('outcome_name = @outcomeName');
    params.outcomeName = filter.outcomeName;
  }

  return {
    where: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
    params,
  };
}

/**
 * Latest snapshot per (event, bookmaker, market, outcome), read from the latest_odds view
 */
export function getLatestOdds(filter: OddsFilter & { limit?: number } = {}): LatestOdds[] {
  const database = getDb();
  const { where, params } = buildOddsConditions(filter);

  let sql = `
    SELECT * FROM latest_odds ${where}
    ORDER BY event_id, bookmaker_key, market_key, outcome_name
  `;
  if (filter.limit !== undefined) {
    sql += ' LIMIT @limit';
    params.limit = filter.limit;
  }

  return database.prepare<Record<string, string | number>, OddsSnapshotRow>(sql).all(params).map(toSnapshot);
}

/**
 * Every snapshot for an event in observation order
 */
export function getOddsHistory(filter: {
  eventId: string;
  bookmakerKey?: string;
  marketKey?: string;
  outcomeName?: string;
}): OddsSnapshot[] {
  const database = getDb();
  const { where, params } = buildOddsConditions(filter);

  const sql = `
    SELECT * FROM odds_snapshots ${where}
    ORDER BY market_last_update ASC NULLS FIRST, ingest_ts_utc ASC, rowid ASC
  `;
  return database.prepare<Record<string, string | number>, OddsSnapshotRow>(sql).all(params).map(toSnapshot);
}

export interface OrphanedSnapshot extends OddsSnapshot {
  missing_event: boolean;
  missing_bookmaker: boolean;
}

interface OrphanedSnapshotRow extends OddsSnapshotRow {
  missing_event: number;
  missing_bookmaker: number;
}

/**
 * Snapshots whose event or bookmaker has no dimension row, in insertion order
 */
export function getOrphanedSnapshots(options: { limit?: number } = {}): OrphanedSnapshot[] {
  const database = getDb();
  const limit = options.limit ?? -1;

  const rows = database.prepare<[number], OrphanedSnapshotRow>(`
    SELECT
      o.*,
      (e.event_id IS NULL) AS missing_event,
      (b.bookmaker_key IS NULL) AS missing_bookmaker
    FROM odds_snapshots AS o
    LEFT JOIN events AS e ON e.event_id = o.event_id
    LEFT JOIN bookmakers AS b ON b.bookmaker_key = o.bookmaker_key
    WHERE e.event_id IS NULL OR b.bookmaker_key IS NULL
    ORDER BY o.rowid ASC
    LIMIT ?
  `).all(limit);

  return rows.map(({ missing_event, missing_bookmaker, ...row }) => ({
    ...toSnapshot(row),
    missing_event: missing_event === 1,
    missing_bookmaker: missing_bookmaker === 1,
  }));
}

// ============================================
// Utility Operations
// ============================================

/**
 * Get database statistics
 */
export function getDbStats(): {
  eventCount: number;
  bookmakerCount: number;
  snapshotCount: number;
  latestOddsCount: number;
  orphanedSnapshotCount: number;
} {
  const database = getDb();
  const count = (sql: string): number => database.prepare<[], { count: number }>(sql).get()?.count ?? 0;

  return {
    eventCount: count('SELECT COUNT(*) AS count FROM events'),
    bookmakerCount: count('SELECT COUNT(*) AS count FROM bookmakers'),
    snapshotCount: count('SELECT COUNT(*) AS count FROM odds_snapshots'),
    latestOddsCount: count('SELECT COUNT(*) AS count FROM latest_odds'),
    orphanedSnapshotCount: count(`
      SELECT COUNT(*) AS count
      FROM odds_snapshots AS o
      LEFT JOIN events AS e ON e.event_id = o.event_id
      LEFT JOIN bookmakers AS b ON b.bookmaker_key = o.bookmaker_key
      WHERE e.event_id IS NULL OR b.bookmaker_key IS NULL
    `),
  };
}
