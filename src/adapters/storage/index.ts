import type { Config } from '../../config/index.js';
import type { StoragePort } from '../../ports/StoragePort.js';
import { resolveDatabaseLocation } from '../../persistence/database.js';
import { DisabledStorageAdapter } from './DisabledStorageAdapter.js';
import { SqliteStorageAdapter } from './SqliteStorageAdapter.js';

export function createStorageAdapter(config: Pick<Config, 'databaseUrl'>): StoragePort {
  return config.databaseUrl
    ? new SqliteStorageAdapter(resolveDatabaseLocation(config.databaseUrl))
    : new DisabledStorageAdapter();
}
