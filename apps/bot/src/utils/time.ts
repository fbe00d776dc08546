/**
 * Time zone helpers built on Intl. The schedule page prints wall-clock
 * times for the club's home time zone; fixtures are stored as instants.
 */

export interface WallClockTime {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
  hour: number;
  minute: number;
}

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatterCache.set(timeZone, formatter);
  }
  return formatter;
}

/**
 * Returns true if the runtime knows the IANA time zone name.
 */
export function isValidTimeZone(timeZone: string): boolean {
  try {
    getFormatter(timeZone);
    return true;
  } catch {
    return false;
  }
}

/**
 * Reads the wall-clock fields of an instant as seen in a time zone.
 */
export function toWallClock(date: Date, timeZone: string): WallClockTime {
  const fields: Record<string, number> = {};
  for (const part of getFormatter(timeZone).formatToParts(date)) {
    if (part.type !== 'literal') {
      fields[part.type] = Number(part.value);
    }
  }
  return {
    year: fields.year,
    month: fields.month,
    day: fields.day,
    hour: fields.hour,
    minute: fields.minute,
  };
}

/** Offset of the zone from UTC at the given instant, in milliseconds */
function zoneOffsetMs(epochMs: number, timeZone: string): number {
  const wall = toWallClock(new Date(epochMs), timeZone);
  const asUtc = Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute);
  const truncated = epochMs - (((epochMs % 60000) + 60000) % 60000);
  return asUtc - truncated;
}

/**
 * Converts a wall-clock time in a time zone to the instant it denotes.
 * Times that fall into a DST gap resolve using the offset before the gap.
 */
export function zonedTimeToUtc(wall: WallClockTime, timeZone: string): Date {
  const naive = Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute);
  const firstGuess = naive - zoneOffsetMs(naive, timeZone);
  const secondOffset = zoneOffsetMs(firstGuess, timeZone);
  return new Date(naive - secondOffset);
}

/**
 * Calendar date (YYYY-MM-DD) of an instant in a time zone.
 */
export function toDateKey(date: Date, timeZone: string): string {
  const { year, month, day } = toWallClock(date, timeZone);
  return `${year}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}
