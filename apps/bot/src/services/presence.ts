import { eventName } from '../fixtures/format.js';
import type { Fixture } from '../fixtures/types.js';

// Discord caps activity names
const MAX_ACTIVITY_LENGTH = 128;

/**
 * Text for the bot's "Watching …" activity: hours until the next match, or
 * the club schedule when nothing is coming up.
 *
 * @param upcoming fixtures after `now`, soonest first
 */
export function presenceText(upcoming: readonly Fixture[], clubName: string, now: Date): string {
  const next = upcoming[0];
  if (!next) {
    return `the ${clubName} schedule`.slice(0, MAX_ACTIVITY_LENGTH);
  }

  const hours = Math.max(0, Math.floor((next.kickoff.getTime() - now.getTime()) / (60 * 60 * 1000)));
  return `Matchday in ${hours}h: ${eventName(next, clubName)}`.slice(0, MAX_ACTIVITY_LENGTH);
}
