import type { ScheduledEventInput } from '../services/chat-platform.js';
import type { Fixture } from './types.js';

export interface ClubSettings {
  name: string;
  eventDurationMinutes: number;
}

export function eventName(fixture: Fixture, clubName: string): string {
  return `${clubName} vs ${fixture.opponent}`;
}

export function eventTimes(fixture: Fixture, durationMinutes: number): { startTime: Date; endTime: Date } {
  return {
    startTime: fixture.kickoff,
    endTime: new Date(fixture.kickoff.getTime() + durationMinutes * 60 * 1000),
  };
}

export function toScheduledEventInput(fixture: Fixture, club: ClubSettings): ScheduledEventInput {
  const location = fixture.location ?? 'TBD';
  return {
    name: eventName(fixture, club.name),
    ...eventTimes(fixture, club.eventDurationMinutes),
    location,
    description: `Match vs ${fixture.opponent} at ${location}`,
  };
}

/**
 * Announcement for a newly scheduled match. The timestamp uses Discord's
 * <t:…:F> markup so every reader sees their own local time.
 */
export function announcementMessage(fixture: Fixture, clubName: string): string {
  const unixSeconds = Math.floor(fixture.kickoff.getTime() / 1000);
  return [
    `📅 New Match Scheduled: **${eventName(fixture, clubName)}**`,
    `🕒 When: <t:${unixSeconds}:F>`,
    `📍 Where: ${fixture.location ?? 'TBD'}`,
    '🔗 RSVP via the Events tab!',
  ].join('\n');
}
