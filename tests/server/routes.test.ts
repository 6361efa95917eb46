import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { Server } from 'http';
import { createApp } from '../../src/server/app.js';
import { parseLimit } from '../../src/server/routes.js';
import { getDb, closeDb, upsertEvents, upsertBookmakers, appendOddsSnapshots } from '../../src/db/client.js';
import { EVENT_ID, makeBookmaker, makeEvent, makeSnapshot } from '../fixtures.js';

const LIMITS = { defaultLimit: 2, maxLimit: 3 };

let server: Server;
let baseUrl: string;

async function getJson(path: string): Promise<{ status: number; body: unknown }> {
  const response = await fetch(`${baseUrl}${path}`);
  return { status: response.status, body: await response.json() };
}

beforeAll(async () => {
  getDb(':memory:');
  upsertEvents([makeEvent()]);
  upsertBookmakers([makeBookmaker(), makeBookmaker({ bookmaker_key: 'fanduel', bookmaker_title: 'FanDuel' })]);
  appendOddsSnapshots([
    makeSnapshot({ price_american: -150, market_last_update: '2025-09-06T12:00:00Z' }),
    makeSnapshot({ price_american: -140, market_last_update: '2025-09-06T18:00:00Z' }),
    makeSnapshot({ bookmaker_key: 'fanduel', price_american: -145 }),
    makeSnapshot({ outcome_name: 'Green Bay Packers', is_home_team: false, price_american: 125 }),
    makeSnapshot({ event_id: 'evt-unknown', price_american: 300 }),
  ]);

  server = createApp(LIMITS).listen(0, '127.0.0.1');
  await new Promise<void>(resolve => server.once('listening', () => resolve()));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server did not bind to a TCP port');
  }
  baseUrl = `http://127.0.0.1:${address.port}/api`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
  closeDb();
});

describe('parseLimit', () => {
  it('uses the default when absent and caps at the maximum', () => {
    expect(parseLimit(undefined, LIMITS)).toBe(2);
    expect(parseLimit('1', LIMITS)).toBe(1);
    expect(parseLimit('50', LIMITS)).toBe(3);
  });

  it('rejects zero and non-numeric values', () => {
    expect(() => parseLimit('0', LIMITS)).toThrow('limit must be a positive integer, got "0"');
    expect(() => parseLimit('-5', LIMITS)).toThrow('limit must be a positive integer, got "-5"');
  });
});

describe('GET /api', () => {
  it('reports health', async () => {
    const { status, body } = await getJson('/health');
    expect(status).toBe(200);
    expect(body).toMatchObject({ status: 'ok' });
  });

  it('reports stats including orphans', async () => {
    const { body } = await getJson('/stats');
    expect(body).toEqual({
      eventCount: 1,
      bookmakerCount: 2,
      snapshotCount: 5,
      latestOddsCount: 4,
      orphanedSnapshotCount: 1,
    });
  });

  it('returns an event or 404', async () => {
    const found = await getJson(`/events/${EVENT_ID}`);
    expect(found.status).toBe(200);
    expect(found.body).toMatchObject({ event_id: EVENT_ID, home_team: 'Chicago Bears' });

    const missing = await getJson('/events/nope');
    expect(missing.status).toBe(404);
    expect(missing.body).toEqual({ error: 'Event not found' });
  });

  it('rejects a bad commence window', async () => {
    const { status, body } = await getJson('/events?from=whenever');
    expect(status).toBe(400);
    expect(body).toEqual({ error: 'Invalid timestamp for from: whenever' });
  });

  it('returns latest odds for an event', async () => {
    const { body } = await getJson(`/events/${EVENT_ID}/odds?bookmaker=draftkings`);
    expect(body).toMatchObject([
      { outcome_name: 'Chicago Bears', price_american: -140, is_home_team: true },
      { outcome_name: 'Green Bay Packers', price_american: 125, is_home_team: false },
    ]);
  });

  it('returns odds for an event that was never recorded', async () => {
    const { status, body } = await getJson('/events/evt-unknown/odds');
    expect(status).toBe(200);
    expect(body).toMatchObject([{ event_id: 'evt-unknown', price_american: 300 }]);
  });

  it('returns history for one outcome', async () => {
    const { body } = await getJson(`/events/${EVENT_ID}/history?bookmaker=draftkings&outcome=Chicago%20Bears`);
    expect(body).toMatchObject([{ price_american: -150 }, { price_american: -140 }]);
  });

  it('limits latest odds across events', async () => {
    const defaulted = await getJson('/odds/latest');
    expect(defaulted.body).toHaveLength(2);

    const capped = await getJson('/odds/latest?limit=10');
    expect(capped.body).toHaveLength(3);

    const bad = await getJson('/odds/latest?limit=abc');
    expect(bad.status).toBe(400);
    expect(bad.body).toEqual({ error: 'limit must be a positive integer, got "abc"' });
  });

  it('lists bookmakers and orphans', async () => {
    const books = await getJson('/bookmakers');
    expect(books.body).toMatchObject([{ bookmaker_key: 'draftkings' }, { bookmaker_key: 'fanduel' }]);

    const orphans = await getJson('/orphans');
    expect(orphans.body).toMatchObject([{ event_id: 'evt-unknown', missing_event: true, missing_bookmaker: false }]);
  });

  it('answers unknown paths with 404', async () => {
    const { status, body } = await getJson('/nothing-here');
    expect(status).toBe(404);
    expect(body).toEqual({ error: 'Not found' });
  });
});
