import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import Database from 'better-sqlite3';
import { SqliteStorageAdapter } from '../../adapters/storage/SqliteStorageAdapter.js';
import { DisabledStorageAdapter } from '../../adapters/storage/DisabledStorageAdapter.js';
import { createStorageAdapter } from '../../adapters/storage/index.js';
import { resolveDatabaseLocation } from '../../persistence/database.js';

describe('SqliteStorageAdapter', () => {
  let dir: string;
  let dbPath: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'law-firm-storage-'));
    dbPath = join(dir, 'law.db');
    const db = new Database(dbPath);
    db.exec('CREATE TABLE clients (id INTEGER PRIMARY KEY); CREATE TABLE appointments (id INTEGER PRIMARY KEY);');
    db.close();
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should list tables of an existing database', () => {
    const adapter = new SqliteStorageAdapter(dbPath);
    expect(adapter.probe()).toEqual({ status: 'available', collections: ['appointments', 'clients'] });
    adapter.close();
  });

  it('should report an empty in-memory database as available', () => {
    const adapter = new SqliteStorageAdapter(':memory:');
    expect(adapter.probe()).toEqual({ status: 'available', collections: [] });
    adapter.close();
  });

  it('should report an error for a missing database file', () => {
    const adapter = new SqliteStorageAdapter(join(dir, 'missing.db'));
    expect(adapter.probe().status).toBe('error');
  });

  it('should report an error for a missing directory', () => {
    const probe = new SqliteStorageAdapter(join(dir, 'nope', 'law.db')).probe();
    expect(probe.status).toBe('error');
    if (probe.status === 'error') {
      expect(probe.connected).toBe(false);
      expect(probe.message).toContain('directory does not exist');
    }
  });

  it('should report a connected error when listing tables fails', () => {
    const adapter = new SqliteStorageAdapter('law.db', () => {
      const db = new Database(':memory:');
      db.close();
      return db;
    });

    expect(adapter.probe()).toEqual({
      status: 'error',
      connected: true,
      message: 'The database connection is not open',
    });
  });

  it('should pass the location to the opener', () => {
    const opened: string[] = [];
    const adapter = new SqliteStorageAdapter('/srv/law.db', (location) => {
      opened.push(location);
      return new Database(':memory:');
    });

    expect(adapter.probe()).toEqual({ status: 'available', collections: [] });
    adapter.probe();
    expect(opened).toEqual(['/srv/law.db']);
    adapter.close();
  });

  it('should tolerate close before and after probing', () => {
    const adapter = new SqliteStorageAdapter(dbPath);
    adapter.close();
    adapter.probe();
    adapter.close();
    adapter.close();
  });
});

describe('createStorageAdapter', () => {
  it('should return the disabled adapter without a database url', () => {
    const adapter = createStorageAdapter({});
    expect(adapter).toBeInstanceOf(DisabledStorageAdapter);
    expect(adapter.probe()).toEqual({ status: 'unavailable', reason: 'DATABASE_URL not configured' });
  });

  it('should return the sqlite adapter with a database url', () => {
    expect(createStorageAdapter({ databaseUrl: ':memory:' })).toBeInstanceOf(SqliteStorageAdapter);
  });
});

describe('resolveDatabaseLocation', () => {
  it.each([
    ['sqlite:///var/data/law.db', '/var/data/law.db'],
    ['sqlite:law.db', 'law.db'],
    ['file:law.db', 'law.db'],
    [':memory:', ':memory:'],
    ['sqlite://', ':memory:'],
    ['  ./data/law.db  ', './data/law.db'],
  ])('should resolve %j to %j', (url, expected) => {
    expect(resolveDatabaseLocation(url)).toBe(expected);
  });
});
