import { vi } from 'vitest';
import type { Config } from './config.js';
import type {
  ChatPlatform,
  RemoteScheduledEvent,
  ScheduledEventInput,
  ScheduledEventTimes,
} from './services/chat-platform.js';

export interface ScheduleRow {
  date: string;
  time: string;
  opponent: string;
  location?: string;
}

/** Renders a 2024 schedule page in the club site's markup */
export function schedulePage(rows: ScheduleRow[]): string {
  const blocks = rows
    .map(
      (row) => `
    <div class="Upcoming">
      <span class="GameDate">${row.date}</span>
      <span class="GameTime">${row.time}</span>
      <span class="OpponentName">${row.opponent}</span>
      ${row.location ? `<span class="ThemeNight">${row.location}</span>` : ''}
    </div>`
    )
    .join('');
  return `<html><body><h1>2024 Schedule</h1>${blocks}</body></html>`;
}

export const testConfig: Config = {
  discord: {
    token: 'test-token',
    guildId: 'guild-1',
    announceChannelId: 'channel-1',
    privilegedRoleId: 'role-referees',
    nickname: 'Fourth Official',
  },
  schedule: {
    url: 'https://club.example/schedule/',
    fetchTimeoutMs: 5000,
  },
  club: {
    name: 'Lakeside FC',
    timeZone: 'America/Los_Angeles',
    eventDurationMinutes: 120,
  },
  scheduler: {
    syncCron: '0 9 * * *',
    syncOnStartup: false,
  },
  database: {
    url: null,
  },
};

/**
 * ChatPlatform whose operations are vi.fn mocks backed by `events`, the
 * guild's scheduled events. Created events get ids event-1, event-2, …
 */
export function createFakePlatform(events: RemoteScheduledEvent[] = []) {
  let nextId = 1;
  return {
    listScheduledEvents: vi.fn(async () => events.map((event) => ({ ...event }))),
    createScheduledEvent: vi.fn(async (input: ScheduledEventInput) => {
      const id = `event-${nextId++}`;
      events.push({ id, name: input.name, startTime: input.startTime });
      return id;
    }),
    updateScheduledEvent: vi.fn(async (eventId: string, times: ScheduledEventTimes) => {
      const event = events.find((candidate) => candidate.id === eventId);
      if (event) event.startTime = times.startTime;
    }),
    deleteScheduledEvent: vi.fn(async (eventId: string) => {
      const index = events.findIndex((candidate) => candidate.id === eventId);
      if (index >= 0) events.splice(index, 1);
    }),
    postAnnouncement: vi.fn(async (_content: string) => {}),
  } satisfies ChatPlatform;
}

export type FakePlatform = ReturnType<typeof createFakePlatform>;

export function remoteCallCount(platform: FakePlatform): number {
  return (
    platform.listScheduledEvents.mock.calls.length +
    platform.createScheduledEvent.mock.calls.length +
    platform.updateScheduledEvent.mock.calls.length +
    platform.deleteScheduledEvent.mock.calls.length +
    platform.postAnnouncement.mock.calls.length
  );
}
