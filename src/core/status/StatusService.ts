import type { StoragePort, StorageProbe } from '../../ports/StoragePort.js';
import type { Config } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';

const MAX_COLLECTIONS = 10;
const MAX_ERROR_LENGTH = 50;

const SET = '✅ Set';
const NOT_SET = '❌ Not Set';

export interface DiagnosticReport {
  backend: string;
  database: string;
  database_url: string;
  database_name: string;
  connection_status: 'Connected' | 'Not Connected';
  collections: string[];
}

/**
 * Builds the `/test` diagnostic report. Never throws: probe failures are
 * rendered as status strings. Environment values are reported as set/unset only.
 */
export class StatusService {
  private readonly logger = createLogger({ component: 'StatusService' });

  constructor(
    private readonly storage: StoragePort,
    private readonly env: Pick<Config, 'databaseUrl' | 'databaseName'>
  ) {}

  getReport(): DiagnosticReport {
    const probe = this.runProbe();
    this.logger.debug({ status: probe.status }, 'Storage probe completed');

    return {
      backend: '✅ Running',
      ...describeProbe(probe),
      database_url: this.env.databaseUrl ? SET : NOT_SET,
      database_name: this.env.databaseName ? SET : NOT_SET,
    };
  }

  private runProbe(): StorageProbe {
    try {
      return this.storage.probe();
    } catch (error) {
      this.logger.error({ error }, 'Storage probe threw');
      return {
        status: 'error',
        connected: false,
        message: error instanceof Error ? error.message : String(error),
      };
    }
  }
}

function describeProbe(
  probe: StorageProbe
): Pick<DiagnosticReport, 'database' | 'connection_status' | 'collections'> {
  switch (probe.status) {
    case 'available':
      return {
        database: '✅ Connected & Working',
        connection_status: 'Connected',
        collections: probe.collections.slice(0, MAX_COLLECTIONS),
      };
    case 'unavailable':
      return {
        database: '❌ Database module not found (run enable-database first)',
        connection_status: 'Not Connected',
        collections: [],
      };
    case 'error':
      if (probe.connected) {
        return {
          database: `⚠️  Connected but Error: ${probe.message.slice(0, MAX_ERROR_LENGTH)}`,
          connection_status: 'Connected',
          collections: [],
        };
      }
      return {
        database: `❌ Error: ${probe.message.slice(0, MAX_ERROR_LENGTH)}`,
        connection_status: 'Not Connected',
        collections: [],
      };
  }
}
