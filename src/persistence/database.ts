import Database from 'better-sqlite3';
import { createLogger } from '../utils/logger.js';

const logger = createLogger({ component: 'database' });

const MEMORY_LOCATION = ':memory:';

/** Maps DATABASE_URL forms such as `sqlite:///data/app.db` or `file:app.db` to a path. */
export function resolveDatabaseLocation(databaseUrl: string): string {
  const location = databaseUrl.trim().replace(/^sqlite:(\/\/)?/i, '').replace(/^file:/i, '');
  return location === '' ? MEMORY_LOCATION : location;
}

/**
 * Opens an existing database for inspection. File databases are opened
 * read-only and are never created here.
 */
export function openDatabase(location: string): Database.Database {
  logger.info({ location }, 'Opening database');

  if (location === MEMORY_LOCATION) {
    return new Database(location);
  }
  return new Database(location, { readonly: true, fileMustExist: true });
}

export function listTables(db: Database.Database): string[] {
  return db
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
    )
    .all()
    .map((row) => row.name);
}
