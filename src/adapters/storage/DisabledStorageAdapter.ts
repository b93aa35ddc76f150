import type { StoragePort, StorageProbe } from '../../ports/StoragePort.js';

export class DisabledStorageAdapter implements StoragePort {
  probe(): StorageProbe {
    return { status: 'unavailable', reason: 'DATABASE_URL not configured' };
  }

  close(): void {
    // Nothing to release
  }
}
