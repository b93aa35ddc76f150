import type { Database } from 'better-sqlite3';
import type { StoragePort, StorageProbe } from '../../ports/StoragePort.js';
import { listTables, openDatabase } from '../../persistence/database.js';
import { createLogger } from '../../utils/logger.js';
import { StorageError } from '../../utils/errors.js';

export type DatabaseOpener = (location: string) => Database;

export class SqliteStorageAdapter implements StoragePort {
  private readonly logger = createLogger({ adapter: 'SqliteStorageAdapter' });
  private db: Database | null = null;

  constructor(
    private readonly location: string,
    private readonly open: DatabaseOpener = openDatabase
  ) {}

  probe(): StorageProbe {
    let db: Database;
    try {
      db = this.connect();
    } catch (error) {
      return this.failed(error, false);
    }

    try {
      return { status: 'available', collections: listTables(db) };
    } catch (error) {
      return this.failed(error, true);
    }
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private connect(): Database {
    if (!this.db) {
      this.db = this.open(this.location);
    }
    return this.db;
  }

  private failed(error: unknown, connected: boolean): StorageProbe {
    const storageError = new StorageError(error instanceof Error ? error.message : String(error), {
      cause: error,
    });
    this.logger.warn({ error: storageError, location: this.location, connected }, 'Storage probe failed');
    return { status: 'error', connected, message: storageError.message };
  }
}
