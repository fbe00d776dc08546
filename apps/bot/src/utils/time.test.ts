import { describe, it, expect } from 'vitest';
import { isValidTimeZone, toDateKey, toWallClock, zonedTimeToUtc } from './time.js';

describe('time zone helpers', () => {
  describe('zonedTimeToUtc', () => {
    it('applies daylight saving offset in summer', () => {
      const instant = zonedTimeToUtc(
        { year: 2024, month: 5, day: 1, hour: 14, minute: 0 },
        'America/Los_Angeles'
      );
      expect(instant.toISOString()).toBe('2024-05-01T21:00:00.000Z');
    });

    it('applies standard offset in winter', () => {
      const instant = zonedTimeToUtc(
        { year: 2024, month: 1, day: 15, hour: 19, minute: 30 },
        'America/Los_Angeles'
      );
      expect(instant.toISOString()).toBe('2024-01-16T03:30:00.000Z');
    });

    it('leaves UTC wall times unchanged', () => {
      const instant = zonedTimeToUtc({ year: 2024, month: 3, day: 10, hour: 8, minute: 15 }, 'UTC');
      expect(instant.toISOString()).toBe('2024-03-10T08:15:00.000Z');
    });
  });

  describe('toWallClock', () => {
    it('reads fields in the given zone', () => {
      expect(toWallClock(new Date('2024-01-16T03:30:00.000Z'), 'America/Los_Angeles')).toEqual({
        year: 2024,
        month: 1,
        day: 15,
        hour: 19,
        minute: 30,
      });
    });
  });

  describe('toDateKey', () => {
    it('uses the local calendar date, not the UTC one', () => {
      const instant = new Date('2024-01-16T03:30:00.000Z');
      expect(toDateKey(instant, 'America/Los_Angeles')).toBe('2024-01-15');
      expect(toDateKey(instant, 'UTC')).toBe('2024-01-16');
    });
  });

  describe('isValidTimeZone', () => {
    it('accepts IANA names and rejects unknown ones', () => {
      expect(isValidTimeZone('America/Los_Angeles')).toBe(true);
      expect(isValidTimeZone('Mars/Olympus_Mons')).toBe(false);
    });
  });
});
