import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadConfig, parseConfig, clearConfigCache } from '../../src/config/index.js';

describe('parseConfig', () => {
  it('applies defaults', () => {
    expect(parseConfig({ database: { path: './data/odds.db' } }, {})).toEqual({
      database: { path: './data/odds.db', journalMode: 'WAL' },
      server: { port: 3000, defaultLimit: 100, maxLimit: 1000 },
    });
  });

  it('lists every invalid field', () => {
    expect(() =>
      parseConfig({ database: { path: '', journalMode: 'MEMORY' }, server: { port: -1 } }, {}),
    ).toThrow(/Invalid configuration:\n {2}- database\.path: .*\n {2}- database\.journalMode: .*\n {2}- server\.port: /);
  });

  it('rejects a default limit above the maximum', () => {
    expect(() =>
      parseConfig({ database: { path: 'x.db' }, server: { defaultLimit: 500, maxLimit: 100 } }, {}),
    ).toThrow('server.defaultLimit must not exceed server.maxLimit');
  });

  it('lets the environment override path and port', () => {
    const config = parseConfig({ database: { path: 'x.db' } }, { ODDS_DB_PATH: '/tmp/other.db', PORT: '8080' });

    expect(config.database.path).toBe('/tmp/other.db');
    expect(config.server.port).toBe(8080);
  });

  it('rejects a malformed PORT', () => {
    expect(() => parseConfig({ database: { path: 'x.db' } }, { PORT: 'eighty' })).toThrow('Invalid PORT: eighty');
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'odds-config-'));
    clearConfigCache();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads a config file', () => {
    const path = join(dir, 'config.json');
    writeFileSync(path, JSON.stringify({ database: { path: 'odds.db', journalMode: 'DELETE' } }));

    expect(loadConfig(path).database.journalMode).toBe('DELETE');
  });

  it('reports a missing file', () => {
    const path = join(dir, 'missing.json');
    expect(() => loadConfig(path)).toThrow(`Config file not found: ${path}`);
  });

  it('reports malformed JSON', () => {
    const path = join(dir, 'config.json');
    writeFileSync(path, '{ database: ');

    expect(() => loadConfig(path)).toThrow(/^Failed to parse config file: SyntaxError/);
  });
});
