import { describe, it, expect } from 'vitest';
import { diffFixtures, toSnapshot } from './diff.js';
import { fixtureKey, type Fixture } from './types.js';

function fixture(opponent: string, date: string, time: string, location: string | null = null): Fixture {
  return {
    key: fixtureKey(opponent, date),
    opponent,
    kickoff: new Date(`${date}T${time}:00.000Z`),
    location,
  };
}

describe('diffFixtures', () => {
  it('reports a time change on the same date as updated, not added and removed', () => {
    const previous = toSnapshot([fixture('TeamA', '2024-05-01', '14:00')]);
    const next = [fixture('TeamA', '2024-05-01', '15:00'), fixture('TeamB', '2024-05-08', '10:00')];

    const diff = diffFixtures(previous, next);

    expect(diff.updated).toHaveLength(1);
    expect(diff.updated[0].previous.kickoff.toISOString()).toBe('2024-05-01T14:00:00.000Z');
    expect(diff.updated[0].next.kickoff.toISOString()).toBe('2024-05-01T15:00:00.000Z');
    expect(diff.added.map((f) => f.key)).toEqual(['teamb|2024-05-08']);
    expect(diff.removed).toEqual([]);
    expect(diff.unchanged).toEqual([]);
  });

  it('treats location-only changes as unchanged', () => {
    const previous = toSnapshot([fixture('TeamA', '2024-05-01', '14:00', 'North Field')]);
    const next = [fixture('TeamA', '2024-05-01', '14:00', 'South Field')];

    const diff = diffFixtures(previous, next);

    expect(diff.unchanged.map((f) => f.key)).toEqual(['teama|2024-05-01']);
    expect(diff.updated).toEqual([]);
  });

  it('reports fixtures missing from the new set as removed', () => {
    const kept = fixture('TeamA', '2024-05-01', '14:00');
    const dropped = fixture('TeamC', '2024-05-15', '18:00');

    const diff = diffFixtures(toSnapshot([kept, dropped]), [kept]);

    expect(diff.removed).toEqual([dropped]);
    expect(diff.unchanged).toEqual([kept]);
  });

  it('treats a match moved to another date as a different fixture', () => {
    const diff = diffFixtures(toSnapshot([fixture('TeamA', '2024-05-01', '14:00')]), [
      fixture('TeamA', '2024-05-02', '14:00'),
    ]);

    expect(diff.added.map((f) => f.key)).toEqual(['teama|2024-05-02']);
    expect(diff.removed.map((f) => f.key)).toEqual(['teama|2024-05-01']);
  });

  it('partitions the new set and only removes known keys', () => {
    const previous = toSnapshot([
      fixture('TeamA', '2024-05-01', '14:00'),
      fixture('TeamB', '2024-05-08', '10:00'),
      fixture('TeamC', '2024-05-15', '18:00'),
    ]);
    const next = [
      fixture('TeamA', '2024-05-01', '14:00'),
      fixture('TeamB', '2024-05-08', '11:00'),
      fixture('TeamD', '2024-05-22', '12:00'),
    ];

    const diff = diffFixtures(previous, next);
    const classified = [
      ...diff.added.map((f) => f.key),
      ...diff.updated.map((u) => u.next.key),
      ...diff.unchanged.map((f) => f.key),
    ].sort();

    expect(classified).toEqual(next.map((f) => f.key).sort());
    for (const removed of diff.removed) {
      expect(previous.has(removed.key)).toBe(true);
    }
  });

  it('returns the same result when run twice and leaves inputs untouched', () => {
    const previousFixtures = [fixture('TeamA', '2024-05-01', '14:00')];
    const previous = toSnapshot(previousFixtures);
    const next = [fixture('TeamA', '2024-05-01', '16:00'), fixture('TeamB', '2024-05-08', '10:00')];

    const first = diffFixtures(previous, next);
    const second = diffFixtures(previous, next);

    expect(second).toEqual(first);
    expect(previous.size).toBe(1);
    expect(next).toHaveLength(2);
    expect(previousFixtures[0].kickoff.toISOString()).toBe('2024-05-01T14:00:00.000Z');
  });
});
