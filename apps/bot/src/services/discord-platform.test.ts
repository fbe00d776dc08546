import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  DiscordAPIError,
  GuildScheduledEventEntityType,
  GuildScheduledEventPrivacyLevel,
  RESTJSONErrorCodes,
  type GuildScheduledEventCreateOptions,
} from 'discord.js';
import { RemoteApiError } from '../errors.js';
import { testConfig } from '../test-utils.js';
import type { RemoteScheduledEvent } from './chat-platform.js';
import { DiscordChatPlatform, type AnnouncementChannel } from './discord-platform.js';

function createFakeApi() {
  const channel = {
    send: vi.fn(async (_content: string) => ({ id: 'message-1' })),
  };
  return {
    channel,
    api: {
      listScheduledEvents: vi.fn(async (_guildId: string): Promise<RemoteScheduledEvent[]> => []),
      createScheduledEvent: vi.fn(async (_guildId: string, options: GuildScheduledEventCreateOptions) => ({
        id: 'event-1',
        name: options.name,
      })),
      editScheduledEvent: vi.fn(
        async (_guildId: string, _eventId: string, _options: { scheduledStartTime: Date; scheduledEndTime: Date }) => {}
      ),
      deleteScheduledEvent: vi.fn(async (_guildId: string, _eventId: string) => {}),
      fetchAnnouncementChannel: vi.fn(
        async (_channelId: string): Promise<AnnouncementChannel | null> => channel
      ),
    },
  };
}

async function captureRemoteError(promise: Promise<unknown>): Promise<RemoteApiError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof RemoteApiError) return error;
    throw error;
  }
  throw new Error('Expected a RemoteApiError');
}

const startTime = new Date('2024-05-01T21:00:00.000Z');
const endTime = new Date('2024-05-01T23:00:00.000Z');

describe('DiscordChatPlatform', () => {
  let fake: ReturnType<typeof createFakeApi>;
  let platform: DiscordChatPlatform;

  beforeEach(() => {
    fake = createFakeApi();
    platform = new DiscordChatPlatform(fake.api, testConfig);
  });

  it('creates an external guild-only event', async () => {
    const id = await platform.createScheduledEvent({
      name: 'Lakeside FC vs TeamA',
      startTime,
      endTime,
      location: 'Lakeside Park',
      description: 'Match vs TeamA at Lakeside Park',
    });

    expect(id).toBe('event-1');
    expect(fake.api.createScheduledEvent).toHaveBeenCalledWith('guild-1', {
      name: 'Lakeside FC vs TeamA',
      scheduledStartTime: startTime,
      scheduledEndTime: endTime,
      privacyLevel: GuildScheduledEventPrivacyLevel.GuildOnly,
      entityType: GuildScheduledEventEntityType.External,
      entityMetadata: { location: 'Lakeside Park' },
      description: 'Match vs TeamA at Lakeside Park',
    });
  });

  it('cuts names and descriptions to the lengths Discord accepts', async () => {
    await platform.createScheduledEvent({
      name: 'N'.repeat(150),
      startTime,
      endTime,
      location: 'TBD',
      description: 'D'.repeat(1200),
    });

    const [, options] = fake.api.createScheduledEvent.mock.calls[0];
    expect(options.name).toBe('N'.repeat(100));
    expect(options.description).toBe('D'.repeat(1000));
  });

  it('reports a failed creation as a RemoteApiError', async () => {
    fake.api.createScheduledEvent.mockRejectedValueOnce(new Error('Missing Permissions'));

    const error = await captureRemoteError(
      platform.createScheduledEvent({ name: 'Lakeside FC vs TeamA', startTime, endTime, location: 'TBD', description: '' })
    );

    expect(error.operation).toBe('create');
    expect(error.message).toBe('Failed to create scheduled event "Lakeside FC vs TeamA": Missing Permissions');
  });

  it('moves an event to new times', async () => {
    await platform.updateScheduledEvent('event-3', { startTime, endTime });

    expect(fake.api.editScheduledEvent).toHaveBeenCalledWith('guild-1', 'event-3', {
      scheduledStartTime: startTime,
      scheduledEndTime: endTime,
    });
  });

  it('reports a failed update as a RemoteApiError', async () => {
    fake.api.editScheduledEvent.mockRejectedValueOnce(new Error('Rate limited'));

    const error = await captureRemoteError(platform.updateScheduledEvent('event-3', { startTime, endTime }));

    expect(error.operation).toBe('update');
    expect(error.context).toEqual({ operation: 'update', eventId: 'event-3' });
  });

  it('treats deleting an event that no longer exists as done', async () => {
    fake.api.deleteScheduledEvent.mockRejectedValueOnce(
      new DiscordAPIError(
        { code: RESTJSONErrorCodes.UnknownGuildScheduledEvent, message: 'Unknown Guild Scheduled Event' },
        RESTJSONErrorCodes.UnknownGuildScheduledEvent,
        404,
        'DELETE',
        'https://discord.com/api/v10/guilds/guild-1/scheduled-events/event-3',
        {}
      )
    );

    await expect(platform.deleteScheduledEvent('event-3')).resolves.toBeUndefined();
  });

  it('reports other delete failures as a RemoteApiError', async () => {
    fake.api.deleteScheduledEvent.mockRejectedValueOnce(new Error('Service unavailable'));

    const error = await captureRemoteError(platform.deleteScheduledEvent('event-3'));

    expect(error.operation).toBe('delete');
    expect(error.message).toBe('Failed to delete scheduled event event-3: Service unavailable');
  });

  it('lists the configured guild events', async () => {
    const events = [{ id: 'event-5', name: 'Lakeside FC vs TeamC', startTime }];
    fake.api.listScheduledEvents.mockResolvedValueOnce(events);

    await expect(platform.listScheduledEvents()).resolves.toEqual(events);
    expect(fake.api.listScheduledEvents).toHaveBeenCalledWith('guild-1');
  });

  it('reports a failed listing as a RemoteApiError', async () => {
    fake.api.listScheduledEvents.mockRejectedValueOnce(new Error('Missing Access'));

    const error = await captureRemoteError(platform.listScheduledEvents());

    expect(error.operation).toBe('list');
  });

  it('posts announcements to the configured channel', async () => {
    await platform.postAnnouncement('📅 New Match Scheduled');

    expect(fake.api.fetchAnnouncementChannel).toHaveBeenCalledWith('channel-1');
    expect(fake.channel.send).toHaveBeenCalledWith('📅 New Match Scheduled');
  });

  it('refuses to announce in a channel the bot cannot post in', async () => {
    fake.api.fetchAnnouncementChannel.mockResolvedValueOnce(null);

    const error = await captureRemoteError(platform.postAnnouncement('hello'));

    expect(error.operation).toBe('announce');
    expect(error.message).toBe(
      'Failed to post announcement: Channel channel-1 is not a text channel the bot can post in'
    );
    expect(fake.channel.send).not.toHaveBeenCalled();
  });
});
