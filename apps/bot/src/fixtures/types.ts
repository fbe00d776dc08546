/** Identity of a fixture across cycles: normalised opponent + local match date */
export type FixtureKey = string;

export interface Fixture {
  key: FixtureKey;
  opponent: string;
  kickoff: Date;
  location: string | null;
}

/**
 * A fixture that has a scheduled event on Discord. `announced` stays false
 * until the announcement message went out, so it can be retried.
 */
export interface SyncedFixture extends Fixture {
  remoteEventId: string;
  announced: boolean;
}

/** Fixtures known as of the end of the previous cycle */
export type FixtureSnapshot = ReadonlyMap<FixtureKey, Fixture>;

/** Outcome of parsing one row of the schedule page */
export type ParsedRow =
  | { kind: 'fixture'; fixture: Fixture }
  | { kind: 'skipped'; index: number; reason: string };

export interface SkippedRow {
  index: number;
  reason: string;
}

export interface ParsedSchedule {
  fixtures: Fixture[];
  skipped: SkippedRow[];
}

export interface FixtureUpdate {
  previous: Fixture;
  next: Fixture;
}

export interface FixtureDiff {
  added: Fixture[];
  updated: FixtureUpdate[];
  removed: Fixture[];
  unchanged: Fixture[];
}

export type SyncTrigger = 'scheduled' | 'startup' | 'manual';

export interface SyncSummary {
  trigger: SyncTrigger;
  startedAt: Date;
  completedAt: Date;
  added: number;
  /** New fixtures linked to an event that was already in the guild */
  adopted: number;
  updated: number;
  removed: number;
  /** Removed fixtures whose kickoff had passed; forgotten without a remote call */
  expired: number;
  unchanged: number;
  /** Announcements sent for fixtures created in an earlier cycle */
  announced: number;
  failed: number;
  skippedRows: number;
}

/**
 * Builds the identity key. Opponent names are compared case- and
 * whitespace-insensitively.
 */
export function fixtureKey(opponent: string, dateKey: string): FixtureKey {
  const normalised = opponent.trim().replace(/\s+/g, ' ').toLowerCase();
  return `${normalised}|${dateKey}`;
}
