import { eq, sql } from 'drizzle-orm';
import type { Database } from './index.js';
import { syncedFixture, type NewSyncedFixtureRow, type SyncedFixtureRow } from './schema.js';
import type { FixtureStore } from '../fixtures/store.js';
import type { FixtureKey, SyncedFixture } from '../fixtures/types.js';

export function fromRow(row: SyncedFixtureRow): SyncedFixture {
  return {
    key: row.key,
    opponent: row.opponent,
    kickoff: row.kickoff,
    location: row.location,
    remoteEventId: row.remoteEventId,
    announced: row.announced,
  };
}

export function toRow(record: SyncedFixture, updatedAt: Date = new Date()): NewSyncedFixtureRow {
  return {
    key: record.key,
    opponent: record.opponent,
    kickoff: record.kickoff,
    location: record.location,
    remoteEventId: record.remoteEventId,
    announced: record.announced,
    updatedAt,
  };
}

/**
 * Stores the fixture mapping in PostgreSQL, one row per fixture.
 */
export class PostgresFixtureStore implements FixtureStore {
  constructor(private readonly database: Database) {}

  async ensureSchema(): Promise<void> {
    await this.database.execute(sql`
      CREATE TABLE IF NOT EXISTS synced_fixture (
        key text PRIMARY KEY,
        opponent text NOT NULL,
        kickoff timestamptz NOT NULL,
        location text,
        remote_event_id text NOT NULL,
        announced boolean NOT NULL DEFAULT false,
        updated_at timestamptz NOT NULL DEFAULT now()
      )
    `);
    await this.database.execute(
      sql`CREATE INDEX IF NOT EXISTS idx_synced_fixture_kickoff ON synced_fixture (kickoff)`
    );
  }

  async load(): Promise<SyncedFixture[]> {
    const rows = await this.database.select().from(syncedFixture);
    return rows.map(fromRow);
  }

  async put(record: SyncedFixture): Promise<void> {
    const row = toRow(record);
    await this.database
      .insert(syncedFixture)
      .values(row)
      .onConflictDoUpdate({
        target: syncedFixture.key,
        set: {
          opponent: row.opponent,
          kickoff: row.kickoff,
          location: row.location,
          remoteEventId: row.remoteEventId,
          announced: row.announced,
          updatedAt: row.updatedAt,
        },
      });
  }

  async remove(key: FixtureKey): Promise<void> {
    await this.database.delete(syncedFixture).where(eq(syncedFixture.key, key));
  }
}
