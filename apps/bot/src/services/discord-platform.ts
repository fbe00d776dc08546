import {
  DiscordAPIError,
  GuildScheduledEventEntityType,
  GuildScheduledEventPrivacyLevel,
  RESTJSONErrorCodes,
  type Client,
  type GuildScheduledEventCreateOptions,
} from 'discord.js';
import type { Config } from '../config.js';
import { RemoteApiError, getErrorMessage } from '../errors.js';
import {
  MAX_EVENT_DESCRIPTION_LENGTH,
  MAX_EVENT_NAME_LENGTH,
  type ChatPlatform,
  type RemoteScheduledEvent,
  type ScheduledEventInput,
  type ScheduledEventTimes,
} from './chat-platform.js';

export interface AnnouncementChannel {
  send(content: string): Promise<{ id: string }>;
}

/** The discord.js calls the platform makes, addressed by guild and channel id */
export interface DiscordGuildApi {
  listScheduledEvents(guildId: string): Promise<RemoteScheduledEvent[]>;
  createScheduledEvent(
    guildId: string,
    options: GuildScheduledEventCreateOptions
  ): Promise<{ id: string; name: string }>;
  editScheduledEvent(
    guildId: string,
    eventId: string,
    options: { scheduledStartTime: Date; scheduledEndTime: Date }
  ): Promise<void>;
  deleteScheduledEvent(guildId: string, eventId: string): Promise<void>;
  /** Resolves to null when the channel is missing or the bot cannot post in it */
  fetchAnnouncementChannel(channelId: string): Promise<AnnouncementChannel | null>;
}

/** DiscordGuildApi over a logged-in client */
export function clientGuildApi(client: Client): DiscordGuildApi {
  return {
    async listScheduledEvents(guildId) {
      const guild = await client.guilds.fetch(guildId);
      const events = await guild.scheduledEvents.fetch({ withUserCount: false });
      const listed: RemoteScheduledEvent[] = [];
      for (const event of events.values()) {
        if (event.scheduledStartAt) {
          listed.push({ id: event.id, name: event.name, startTime: event.scheduledStartAt });
        }
      }
      return listed;
    },

    async createScheduledEvent(guildId, options) {
      const guild = await client.guilds.fetch(guildId);
      const event = await guild.scheduledEvents.create(options);
      return { id: event.id, name: event.name };
    },

    async editScheduledEvent(guildId, eventId, options) {
      const guild = await client.guilds.fetch(guildId);
      await guild.scheduledEvents.edit(eventId, options);
    },

    async deleteScheduledEvent(guildId, eventId) {
      const guild = await client.guilds.fetch(guildId);
      await guild.scheduledEvents.delete(eventId);
    },

    async fetchAnnouncementChannel(channelId) {
      const channel = await client.channels.fetch(channelId);
      if (!channel || !channel.isSendable()) return null;
      return {
        send: async (content) => {
          const message = await channel.send({ content });
          return { id: message.id };
        },
      };
    },
  };
}

/**
 * ChatPlatform backed by Discord. Scheduled events are external events in
 * the configured guild.
 */
export class DiscordChatPlatform implements ChatPlatform {
  private api: DiscordGuildApi;
  private config: Config;

  constructor(api: DiscordGuildApi, config: Config) {
    this.api = api;
    this.config = config;
  }

  async listScheduledEvents(): Promise<RemoteScheduledEvent[]> {
    try {
      return await this.api.listScheduledEvents(this.config.discord.guildId);
    } catch (error) {
      throw new RemoteApiError(`Failed to list scheduled events: ${getErrorMessage(error)}`, 'list');
    }
  }

  async createScheduledEvent(input: ScheduledEventInput): Promise<string> {
    try {
      const event = await this.api.createScheduledEvent(this.config.discord.guildId, {
        name: input.name.slice(0, MAX_EVENT_NAME_LENGTH),
        scheduledStartTime: input.startTime,
        scheduledEndTime: input.endTime,
        privacyLevel: GuildScheduledEventPrivacyLevel.GuildOnly,
        entityType: GuildScheduledEventEntityType.External,
        entityMetadata: { location: input.location },
        description: input.description.slice(0, MAX_EVENT_DESCRIPTION_LENGTH),
      });
      console.log(`[DiscordPlatform] Created scheduled event ${event.name} (ID: ${event.id})`);
      return event.id;
    } catch (error) {
      throw new RemoteApiError(
        `Failed to create scheduled event "${input.name}": ${getErrorMessage(error)}`,
        'create',
        { name: input.name }
      );
    }
  }

  async updateScheduledEvent(eventId: string, times: ScheduledEventTimes): Promise<void> {
    try {
      await this.api.editScheduledEvent(this.config.discord.guildId, eventId, {
        scheduledStartTime: times.startTime,
        scheduledEndTime: times.endTime,
      });
      console.log(`[DiscordPlatform] Moved scheduled event ${eventId} to ${times.startTime.toISOString()}`);
    } catch (error) {
      throw new RemoteApiError(
        `Failed to update scheduled event ${eventId}: ${getErrorMessage(error)}`,
        'update',
        { eventId }
      );
    }
  }

  async deleteScheduledEvent(eventId: string): Promise<void> {
    try {
      await this.api.deleteScheduledEvent(this.config.discord.guildId, eventId);
      console.log(`[DiscordPlatform] Deleted scheduled event ${eventId}`);
    } catch (error) {
      // Someone already removed it by hand
      if (
        error instanceof DiscordAPIError &&
        error.code === RESTJSONErrorCodes.UnknownGuildScheduledEvent
      ) {
        console.warn(`[DiscordPlatform] Scheduled event ${eventId} no longer exists`);
        return;
      }
      throw new RemoteApiError(
        `Failed to delete scheduled event ${eventId}: ${getErrorMessage(error)}`,
        'delete',
        { eventId }
      );
    }
  }

  async postAnnouncement(content: string): Promise<void> {
    const channelId = this.config.discord.announceChannelId;
    try {
      const channel = await this.api.fetchAnnouncementChannel(channelId);
      if (!channel) {
        throw new Error(`Channel ${channelId} is not a text channel the bot can post in`);
      }
      const message = await channel.send(content);
      console.log(`[DiscordPlatform] Announcement sent (Message ID: ${message.id})`);
    } catch (error) {
      throw new RemoteApiError(`Failed to post announcement: ${getErrorMessage(error)}`, 'announce', {
        channelId,
      });
    }
  }
}
