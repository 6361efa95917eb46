/**
 * Read-only API routes over the odds store
 */

import { Router, type Request, type Response } from 'express';
import type { ServerConfig } from '../config/index.js';
import {
  getDbStats,
  getEvent,
  listEvents,
  listBookmakers,
  getLatestOdds,
  getOddsHistory,
  getOrphanedSnapshots,
} from '../db/client.js';
import { toUtcTimestamp } from '../db/timestamps.js';

class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BadRequestError';
  }
}

/**
 * Read a single string query parameter
 */
function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Read a timestamp query parameter as ISO UTC
 */
function queryTimestamp(req: Request, name: string): string | undefined {
  try {
    return toUtcTimestamp(queryString(req, name), name) ?? undefined;
  } catch (error) {
    throw new BadRequestError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Parse ?limit= against the configured default and maximum
 * @throws BadRequestError if the value is not a positive integer
 */
export function parseLimit(raw: string | undefined, limits: Pick<ServerConfig, 'defaultLimit' | 'maxLimit'>): number {
  if (raw === undefined) return limits.defaultLimit;
  if (!/^\d+$/.test(raw) || Number.parseInt(raw, 10) === 0) {
    throw new BadRequestError(`limit must be a positive integer, got "${raw}"`);
  }
  return Math.min(Number.parseInt(raw, 10), limits.maxLimit);
}

function sendError(res: Response, error: unknown): void {
  if (error instanceof BadRequestError) {
    res.status(400).json({ error: error.message });
    return;
  }
  res.status(500).json({ error: String(error) });
}

export function createRoutes(limits: Pick<ServerConfig, 'defaultLimit' | 'maxLimit'>): Router {
  const router = Router();

  // ============================================
  // Health & Stats
  // ============================================

  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  router.get('/stats', (_req: Request, res: Response) => {
    try {
      res.json(getDbStats());
    } catch (error) {
      sendError(res, error);
    }
  });

  // ============================================
  // Events
  // ============================================

  /**
   * List events, optionally by sport and commence window
   */
  router.get('/events', (req: Request, res: Response) => {
    try {
      const events = listEvents({
        sportKey: queryString(req, 'sport'),
        commenceFrom: queryTimestamp(req, 'from'),
        commenceTo: queryTimestamp(req, 'to'),
      });
      res.json(events);
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get('/events/:id', (req: Request, res: Response) => {
    try {
      const event = getEvent(req.params.id);
      if (!event) {
        res.status(404).json({ error: 'Event not found' });
        return;
      }
      res.json(event);
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * Latest odds for one event. Snapshots are returned even when
   * the event itself was never recorded.
   */
  router.get('/events/:id/odds', (req: Request, res: Response) => {
    try {
      const odds = getLatestOdds({
        eventId: req.params.id,
        bookmakerKey: queryString(req, 'bookmaker'),
        marketKey: queryString(req, 'market'),
      });
      res.json(odds);
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get('/events/:id/history', (req: Request, res: Response) => {
    try {
      const history = getOddsHistory({
        eventId: req.params.id,
        bookmakerKey: queryString(req, 'bookmaker'),
        marketKey: queryString(req, 'market'),
        outcomeName: queryString(req, 'outcome'),
      });
      res.json(history);
    } catch (error) {
      sendError(res, error);
    }
  });

  // ============================================
  // Bookmakers & Odds
  // ============================================

  router.get('/bookmakers', (_req: Request, res: Response) => {
    try {
      res.json(listBookmakers());
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get('/odds/latest', (req: Request, res: Response) => {
    try {
      const odds = getLatestOdds({
        bookmakerKey: queryString(req, 'bookmaker'),
        marketKey: queryString(req, 'market'),
        limit: parseLimit(queryString(req, 'limit'), limits),
      });
      res.json(odds);
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get('/orphans', (req: Request, res: Response) => {
    try {
      res.json(getOrphanedSnapshots({ limit: parseLimit(queryString(req, 'limit'), limits) }));
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
