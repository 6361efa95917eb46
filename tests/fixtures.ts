import type { NewBookmaker, NewEvent, NewOddsSnapshot } from '../src/db/schema.js';

export const EVENT_ID = 'evt-bears-packers';

export function makeEvent(overrides: Partial<NewEvent> = {}): NewEvent {
  return {
    event_id: EVENT_ID,
    sport_key: 'americanfootball_nfl',
    sport_title: 'NFL',
    commence_time_utc: '2025-09-07T17:00:00Z',
    home_team: 'Chicago Bears',
    away_team: 'Green Bay Packers',
    ...overrides,
  };
}

export function makeBookmaker(overrides: Partial<NewBookmaker> = {}): NewBookmaker {
  return {
    bookmaker_key: 'draftkings',
    bookmaker_title: 'DraftKings',
    ...overrides,
  };
}

export function makeSnapshot(overrides: Partial<NewOddsSnapshot> = {}): NewOddsSnapshot {
  return {
    event_id: EVENT_ID,
    bookmaker_key: 'draftkings',
    market_key: 'h2h',
    outcome_name: 'Chicago Bears',
    is_home_team: true,
    price_american: -150,
    line_point: null,
    event_commence_utc: '2025-09-07T17:00:00Z',
    market_last_update: '2025-09-06T12:00:00Z',
    ...overrides,
  };
}
