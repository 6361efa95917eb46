/**
 * SQLite schema for the odds store
 */

export const SCHEMA_VERSION = 1;

/**
 * Current UTC time in the same shape as Date#toISOString(),
 * so stored timestamps sort lexically in time order.
 */
export const UTC_NOW_SQL = `strftime('%Y-%m-%dT%H:%M:%fZ', 'now')`;

/**
 * SQL statements to create the database schema
 */
export const CREATE_TABLES = `
-- Schema version tracking for migrations
CREATE TABLE IF NOT EXISTS schema_version (
  version INTEGER PRIMARY KEY,
  applied_at TEXT NOT NULL DEFAULT (${UTC_NOW_SQL})
);

-- One row per game/event
CREATE TABLE IF NOT EXISTS events (
  event_id TEXT NOT NULL,         -- "id" in the feed
  sport_key TEXT NOT NULL,        -- "americanfootball_nfl"
  sport_title TEXT,
  commence_time_utc TEXT,
  home_team TEXT,
  away_team TEXT,
  created_at_utc TEXT DEFAULT (${UTC_NOW_SQL}),
  PRIMARY KEY (event_id)
) STRICT;

-- One row per bookmaker
CREATE TABLE IF NOT EXISTS bookmakers (
  bookmaker_key TEXT NOT NULL,    -- "draftkings"
  bookmaker_title TEXT,
  created_at_utc TEXT DEFAULT (${UTC_NOW_SQL}),
  PRIMARY KEY (bookmaker_key)
) STRICT;

-- One row per (event, bookmaker, market, outcome, snapshot).
-- Append-only: no key, no foreign keys, duplicates allowed.
CREATE TABLE IF NOT EXISTS odds_snapshots (
  event_id TEXT NOT NULL,
  bookmaker_key TEXT NOT NULL,
  market_key TEXT NOT NULL,       -- "h2h", "spreads", "totals"
  outcome_name TEXT NOT NULL,     -- "Chicago Bears", "Over", etc.
  is_home_team INTEGER,           -- 1/0 when the outcome names a team
  price_american INTEGER NOT NULL,
  line_point REAL,                -- spread or total line
  event_commence_utc TEXT,        -- denormalized from events
  market_last_update TEXT,
  ingest_ts_utc TEXT DEFAULT (${UTC_NOW_SQL})
) STRICT;

CREATE INDEX IF NOT EXISTS idx_odds_snapshots_tuple
  ON odds_snapshots(event_id, bookmaker_key, market_key, outcome_name);

-- Latest snapshot per event/book/market/outcome.
-- NULLS LAST is deliberate: a snapshot without a market update time never
-- outranks one with a known time. rowid makes full ties pick the last insert.
CREATE VIEW IF NOT EXISTS latest_odds AS
SELECT
  event_id, bookmaker_key, market_key, outcome_name, is_home_team,
  price_american, line_point, event_commence_utc, market_last_update, ingest_ts_utc
FROM (
  SELECT
    o.*,
    ROW_NUMBER() OVER (
      PARTITION BY o.event_id, o.bookmaker_key, o.market_key, o.outcome_name
      ORDER BY o.market_last_update DESC NULLS LAST,
               o.ingest_ts_utc DESC NULLS LAST,
               o.rowid DESC
    ) AS rn
  FROM odds_snapshots AS o
)
WHERE rn = 1;
`;

/**
 * SQL statements to drop every schema object, view first
 */
export const DROP_TABLES = `
DROP VIEW IF EXISTS latest_odds;
DROP INDEX IF EXISTS idx_odds_snapshots_tuple;
DROP TABLE IF EXISTS odds_snapshots;
DROP TABLE IF EXISTS bookmakers;
DROP TABLE IF EXISTS events;
DROP TABLE IF EXISTS schema_version;
`;

/**
 * TypeScript types matching the database schema
 */
export interface EventRow {
  event_id: string;
  sport_key: string;
  sport_title: string | null;
  commence_time_utc: string | null;
  home_team: string | null;
  away_team: string | null;
  created_at_utc: string | null;
}

export interface BookmakerRow {
  bookmaker_key: string;
  bookmaker_title: string | null;
  created_at_utc: string | null;
}

/**
 * Raw odds_snapshots row as SQLite returns it (booleans as 0/1)
 */
export interface OddsSnapshotRow {
  event_id: string;
  bookmaker_key: string;
  market_key: string;
  outcome_name: string;
  is_home_team: number | null;
  price_american: number;
  line_point: number | null;
  event_commence_utc: string | null;
  market_last_update: string | null;
  ingest_ts_utc: string | null;
}

/**
 * Odds snapshot as the store hands it out
 */
export interface OddsSnapshot extends Omit<OddsSnapshotRow, 'is_home_team'> {
  is_home_team: boolean | null;
}

/**
 * latest_odds has the same columns as odds_snapshots
 */
export type LatestOdds = OddsSnapshot;

/**
 * Timestamp input accepted by the write paths
 */
export type TimestampInput = string | Date | null;

export interface NewEvent {
  event_id: string;
  sport_key: string;
  sport_title?: string | null;
  commence_time_utc?: TimestampInput;
  home_team?: string | null;
  away_team?: string | null;
}

export interface NewBookmaker {
  bookmaker_key: string;
  bookmaker_title?: string | null;
}

export interface NewOddsSnapshot {
  event_id: string;
  bookmaker_key: string;
  market_key: string;
  outcome_name: string;
  is_home_team?: boolean | null;
  price_american: number;
  line_point?: number | null;
  event_commence_utc?: TimestampInput;
  market_last_update?: TimestampInput;
  /** Defaults to write time when omitted */
  ingest_ts_utc?: TimestampInput;
}
