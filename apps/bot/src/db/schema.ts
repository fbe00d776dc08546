import { pgTable, text, timestamp, boolean, index } from 'drizzle-orm/pg-core';

// Fixtures that have a Discord scheduled event, keyed by fixture identity
export const syncedFixture = pgTable(
  'synced_fixture',
  {
    key: text('key').primaryKey(),
    opponent: text('opponent').notNull(),
    kickoff: timestamp('kickoff', { withTimezone: true }).notNull(),
    location: text('location'),
    remoteEventId: text('remote_event_id').notNull(),
    announced: boolean('announced')
      .$default(() => false)
      .notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .$defaultFn(() => new Date())
      .notNull(),
  },
  (table) => [index('idx_synced_fixture_kickoff').on(table.kickoff)]
);

export type SyncedFixtureRow = typeof syncedFixture.$inferSelect;
export type NewSyncedFixtureRow = typeof syncedFixture.$inferInsert;
