import type { FixtureKey, SyncedFixture } from './types.js';

/**
 * Persisted mapping of fixture key to its Discord scheduled event.
 * Written one record at a time, right after the remote change it records.
 */
export interface FixtureStore {
  load(): Promise<SyncedFixture[]>;
  /** Inserts or replaces the record with the same key */
  put(record: SyncedFixture): Promise<void>;
  remove(key: FixtureKey): Promise<void>;
}

function copyRecord(record: SyncedFixture): SyncedFixture {
  return { ...record, kickoff: new Date(record.kickoff.getTime()) };
}

/**
 * Keeps the mapping for the lifetime of the process. Used when no
 * DATABASE_URL is configured.
 */
export class MemoryFixtureStore implements FixtureStore {
  private records = new Map<FixtureKey, SyncedFixture>();

  constructor(initial: readonly SyncedFixture[] = []) {
    for (const record of initial) {
      this.records.set(record.key, copyRecord(record));
    }
  }

  async load(): Promise<SyncedFixture[]> {
    return [...this.records.values()].map(copyRecord);
  }

  async put(record: SyncedFixture): Promise<void> {
    this.records.set(record.key, copyRecord(record));
  }

  async remove(key: FixtureKey): Promise<void> {
    this.records.delete(key);
  }
}
