/**
 * The operations the fixture sync needs from the chat platform. Implementations
 * report failures as RemoteApiError.
 */

// Discord rejects longer event names and descriptions
export const MAX_EVENT_NAME_LENGTH = 100;
export const MAX_EVENT_DESCRIPTION_LENGTH = 1000;

export interface ScheduledEventInput {
  name: string;
  startTime: Date;
  endTime: Date;
  location: string;
  description: string;
}

export interface ScheduledEventTimes {
  startTime: Date;
  endTime: Date;
}

/** A scheduled event that already exists on the platform */
export interface RemoteScheduledEvent {
  id: string;
  name: string;
  startTime: Date;
}

export interface ChatPlatform {
  /** Scheduled events currently in the guild, whoever created them */
  listScheduledEvents(): Promise<RemoteScheduledEvent[]>;
  /** Creates a scheduled event and returns its remote id */
  createScheduledEvent(input: ScheduledEventInput): Promise<string>;
  updateScheduledEvent(eventId: string, times: ScheduledEventTimes): Promise<void>;
  deleteScheduledEvent(eventId: string): Promise<void>;
  /** Posts to the configured announcement channel */
  postAnnouncement(content: string): Promise<void>;
}
