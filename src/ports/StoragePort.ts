/**
 * Outcome of checking whether the optional storage backend can be reached.
 * An `error` with `connected: true` means the backend opened but could not be queried.
 */
export type StorageProbe =
  | { status: 'available'; collections: string[] }
  | { status: 'unavailable'; reason: string }
  | { status: 'error'; connected: boolean; message: string };

export interface StoragePort {
  probe(): StorageProbe;
  close(): void;
}
