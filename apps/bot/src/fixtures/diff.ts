import type { Fixture, FixtureDiff, FixtureSnapshot } from './types.js';

/**
 * Compares freshly parsed fixtures against the previous snapshot.
 *
 * Identity is the fixture key alone, so a kickoff moved within the same day
 * is reported as updated rather than removed and re-added. Location changes
 * on a matching key are ignored. Neither input is mutated.
 */
export function diffFixtures(previous: FixtureSnapshot, next: readonly Fixture[]): FixtureDiff {
  const diff: FixtureDiff = { added: [], updated: [], removed: [], unchanged: [] };
  const nextKeys = new Set<string>();

  for (const fixture of next) {
    if (nextKeys.has(fixture.key)) continue;
    nextKeys.add(fixture.key);

    const known = previous.get(fixture.key);
    if (!known) {
      diff.added.push(fixture);
    } else if (known.kickoff.getTime() !== fixture.kickoff.getTime()) {
      diff.updated.push({ previous: known, next: fixture });
    } else {
      diff.unchanged.push(fixture);
    }
  }

  for (const [key, fixture] of previous) {
    if (!nextKeys.has(key)) {
      diff.removed.push(fixture);
    }
  }

  return diff;
}

/**
 * Builds a snapshot keyed by fixture identity.
 */
export function toSnapshot(fixtures: Iterable<Fixture>): FixtureSnapshot {
  const snapshot = new Map<string, Fixture>();
  for (const fixture of fixtures) {
    snapshot.set(fixture.key, fixture);
  }
  return snapshot;
}
