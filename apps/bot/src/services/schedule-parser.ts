/**
 * Schedule Parser
 *
 * The schedule page is server-rendered HTML. The season year sits in the
 * page's <h1>; each upcoming match is an element with class "Upcoming":
 *
 *   <div class="Upcoming">
 *     <span class="GameDate">May 1</span>
 *     <span class="GameTime">2:00 PM</span>
 *     <span class="OpponentName">vs Harbor City FC</span>
 *     <span class="ThemeNight">Lakeside Park</span>   (optional)
 *   </div>
 *
 * Rows that cannot be read are skipped with a reason; only a page that no
 * longer has this structure at all raises ParseError.
 */

import * as cheerio from 'cheerio';
import { isValid, parse } from 'date-fns';
import { ParseError } from '../errors.js';
import { fixtureKey, type ParsedRow, type ParsedSchedule, type SkippedRow } from '../fixtures/types.js';
import { toDateKey, zonedTimeToUtc } from '../utils/time.js';

export interface ParseScheduleOptions {
  /** IANA zone the page's wall-clock times are in */
  timeZone: string;
}

export interface RowFields {
  date: string;
  time: string;
  opponent: string;
  location: string;
}

const DATE_FORMATS = ['MMMM d', 'MMM d'];
const TIME_FORMATS = ['h:mm a', 'h a'];

function cleanText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function normaliseDate(text: string): string {
  return text
    .replace(/^(mon|tue|wed|thu|fri|sat|sun)[a-z]*\.?,?\s+/i, '')
    .replace(/\b(\d{1,2})(st|nd|rd|th)\b/i, '$1')
    .replace(/\bsept\b/i, 'Sep')
    .replace(/^([a-z]+)\./i, '$1')
    .trim();
}

function normaliseTime(text: string): string {
  return text
    .replace(/\s*([ap])\.?\s*m\.?$/i, (_match, meridiem: string) => ` ${meridiem.toUpperCase()}M`)
    .trim();
}

function normaliseOpponent(text: string): string {
  return text.replace(/^(vs\.?|v\.?|@|at)\s+/i, '').trim();
}

/**
 * Reads date and time text as a wall-clock time. Returns null when no known
 * format matches.
 */
function parseWallClock(date: string, time: string, year: number): Date | null {
  const reference = new Date(year, 0, 1);
  for (const dateFormat of DATE_FORMATS) {
    for (const timeFormat of TIME_FORMATS) {
      const parsed = parse(`${date} ${year} ${time}`, `${dateFormat} yyyy ${timeFormat}`, reference);
      if (isValid(parsed)) return parsed;
    }
  }
  return null;
}

/**
 * Turns the text of one schedule row into a fixture, or says why it was skipped.
 */
export function parseFixtureRow(
  fields: RowFields,
  index: number,
  year: number,
  timeZone: string
): ParsedRow {
  const dateText = normaliseDate(cleanText(fields.date));
  const timeText = normaliseTime(cleanText(fields.time));
  const opponent = normaliseOpponent(cleanText(fields.opponent));
  const location = cleanText(fields.location);

  if (!dateText) return { kind: 'skipped', index, reason: 'Missing date' };
  if (!timeText) return { kind: 'skipped', index, reason: 'Missing time' };
  if (!opponent) return { kind: 'skipped', index, reason: 'Missing opponent' };

  const wallClock = parseWallClock(dateText, timeText, year);
  if (!wallClock) {
    return {
      kind: 'skipped',
      index,
      reason: `Unrecognised date/time "${fields.date.trim()} ${fields.time.trim()}"`,
    };
  }

  // date-fns returns the fields in the host zone; re-read them in the club's zone
  const kickoff = zonedTimeToUtc(
    {
      year: wallClock.getFullYear(),
      month: wallClock.getMonth() + 1,
      day: wallClock.getDate(),
      hour: wallClock.getHours(),
      minute: wallClock.getMinutes(),
    },
    timeZone
  );

  return {
    kind: 'fixture',
    fixture: {
      key: fixtureKey(opponent, toDateKey(kickoff, timeZone)),
      opponent,
      kickoff,
      location: location || null,
    },
  };
}

export function parseSchedulePage(html: string, options: ParseScheduleOptions): ParsedSchedule {
  const $ = cheerio.load(html);

  const blocks = $('.Upcoming');
  if (blocks.length === 0 && $('.GameDate').length === 0) {
    throw new ParseError('Schedule page has no fixture rows; the site layout may have changed');
  }

  const headerText = $('h1').first().text();
  const yearMatch = headerText.match(/\b(\d{4})\b/);
  if (!yearMatch) {
    throw new ParseError('Could not determine the season year from the page header', {
      header: cleanText(headerText),
    });
  }
  const year = Number(yearMatch[1]);

  const rows: ParsedRow[] = [];
  blocks.each((index, element) => {
    const $row = $(element);
    rows.push(
      parseFixtureRow(
        {
          date: $row.find('.GameDate').first().text(),
          time: $row.find('.GameTime').first().text(),
          opponent: $row.find('.OpponentName').first().text(),
          location: $row.find('.ThemeNight').first().text(),
        },
        index,
        year,
        options.timeZone
      )
    );
  });

  const fixtures: ParsedSchedule['fixtures'] = [];
  const skipped: SkippedRow[] = [];
  const seen = new Set<string>();

  for (const [index, row] of rows.entries()) {
    if (row.kind === 'skipped') {
      skipped.push({ index: row.index, reason: row.reason });
      continue;
    }
    // First row wins when the page lists the same match twice
    if (seen.has(row.fixture.key)) {
      skipped.push({ index, reason: `Duplicate fixture ${row.fixture.key}` });
      continue;
    }
    seen.add(row.fixture.key);
    fixtures.push(row.fixture);
  }

  for (const row of skipped) {
    console.warn(`[ScheduleParser] Skipped row ${row.index + 1}: ${row.reason}`);
  }
  console.log(
    `[ScheduleParser] Parsed ${fixtures.length} fixtures for ${year} (${skipped.length} rows skipped)`
  );

  return { fixtures, skipped };
}
