/**
 * Fixture Sync
 *
 * Runs one cycle: fetch the schedule page, parse it, diff it against the
 * stored mapping and apply the result to Discord. Owns the fixture mapping;
 * nothing else writes to the store. New fixtures are linked to a matching
 * guild event when one already exists, so a lost mapping does not repost.
 */

import type { Config } from '../config.js';
import { SyncInProgressError, getErrorMessage } from '../errors.js';
import { diffFixtures, toSnapshot } from '../fixtures/diff.js';
import { announcementMessage, eventName, eventTimes, toScheduledEventInput } from '../fixtures/format.js';
import type { FixtureStore } from '../fixtures/store.js';
import type {
  Fixture,
  FixtureUpdate,
  SyncSummary,
  SyncTrigger,
  SyncedFixture,
} from '../fixtures/types.js';
import { toDateKey } from '../utils/time.js';
import { MAX_EVENT_NAME_LENGTH, type ChatPlatform, type RemoteScheduledEvent } from './chat-platform.js';
import { fetchSchedulePage, type FetchScheduleOptions } from './schedule-fetcher.js';
import { parseSchedulePage } from './schedule-parser.js';

export type FetchPage = (url: string, options: FetchScheduleOptions) => Promise<string>;

export interface FixtureSyncOptions {
  config: Pick<Config, 'schedule' | 'club'>;
  store: FixtureStore;
  platform: ChatPlatform;
  /** Defaults to fetchSchedulePage */
  fetchPage?: FetchPage;
  /** Clock used to tell past fixtures from upcoming ones */
  now?: () => Date;
}

type SummaryCounts = Omit<SyncSummary, 'trigger' | 'startedAt' | 'completedAt' | 'skippedRows'>;

export class FixtureSync {
  private config: Pick<Config, 'schedule' | 'club'>;
  private store: FixtureStore;
  private platform: ChatPlatform;
  private fetchPage: FetchPage;
  private now: () => Date;
  private running = false;

  constructor(options: FixtureSyncOptions) {
    this.config = options.config;
    this.store = options.store;
    this.platform = options.platform;
    this.fetchPage = options.fetchPage ?? fetchSchedulePage;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Checks if a cycle is currently in progress.
   */
  isRunning(): boolean {
    return this.running;
  }

  /**
   * Runs one full cycle. Only one cycle runs at a time.
   *
   * @throws SyncInProgressError if another cycle has not finished yet
   * @throws FetchError or ParseError when the schedule could not be read;
   *   nothing is applied or stored in that case
   */
  async runCycle(trigger: SyncTrigger): Promise<SyncSummary> {
    if (this.running) {
      throw new SyncInProgressError();
    }

    this.running = true;
    try {
      return await this.executeCycle(trigger);
    } finally {
      this.running = false;
    }
  }

  /**
   * Stored fixtures that have not kicked off yet, soonest first.
   */
  async upcomingFixtures(at: Date = this.now()): Promise<SyncedFixture[]> {
    const records = await this.store.load();
    return records
      .filter((record) => record.kickoff.getTime() > at.getTime())
      .sort((a, b) => a.kickoff.getTime() - b.kickoff.getTime());
  }

  private async executeCycle(trigger: SyncTrigger): Promise<SyncSummary> {
    const startedAt = this.now();
    const { url, fetchTimeoutMs } = this.config.schedule;
    console.log(`[FixtureSync] Starting ${trigger} sync from ${url}`);

    const html = await this.fetchPage(url, { timeoutMs: fetchTimeoutMs });
    const parsed = parseSchedulePage(html, { timeZone: this.config.club.timeZone });

    const stored = await this.store.load();
    const records = new Map(stored.map((record) => [record.key, record]));
    const diff = diffFixtures(toSnapshot(stored), parsed.fixtures);

    console.log(
      `[FixtureSync] Diff: ${diff.added.length} added, ${diff.updated.length} updated, ` +
        `${diff.removed.length} removed, ${diff.unchanged.length} unchanged`
    );

    const counts: SummaryCounts = {
      added: 0,
      adopted: 0,
      updated: 0,
      removed: 0,
      expired: 0,
      unchanged: diff.unchanged.length,
      announced: 0,
      failed: 0,
    };

    const cycleStart = this.now().getTime();
    const upcomingAdded = diff.added.filter((fixture) => {
      if (fixture.kickoff.getTime() > cycleStart) return true;
      console.log(`[FixtureSync] Skipping ${fixture.key}: kickoff has already passed`);
      return false;
    });

    if (upcomingAdded.length > 0) {
      const existing = await this.listExistingEvents(records);
      if (existing) {
        for (const fixture of upcomingAdded) {
          await this.applyAdded(fixture, existing, records, counts);
        }
      } else {
        // Nothing is created until the guild's events can be checked
        counts.failed += upcomingAdded.length;
      }
    }
    for (const update of diff.updated) {
      await this.applyUpdated(update, records, counts);
    }
    for (const fixture of diff.removed) {
      await this.applyRemoved(fixture, records, counts);
    }

    // Fixtures created in an earlier cycle whose announcement did not go out
    for (const fixture of [...diff.unchanged, ...diff.updated.map((update) => update.next)]) {
      const record = records.get(fixture.key);
      if (!record || record.announced) continue;
      if (await this.announce(record, records)) {
        counts.announced++;
      } else {
        counts.failed++;
      }
    }

    const completedAt = this.now();
    const summary: SyncSummary = {
      trigger,
      startedAt,
      completedAt,
      ...counts,
      skippedRows: parsed.skipped.length,
    };

    const seconds = ((completedAt.getTime() - startedAt.getTime()) / 1000).toFixed(2);
    console.log(
      `[FixtureSync] ${trigger} sync completed in ${seconds}s: ${summary.added} added, ` +
        `${summary.adopted} adopted, ${summary.updated} updated, ${summary.removed} removed, ` +
        `${summary.expired} expired, ${summary.failed} failed`
    );

    return summary;
  }

  /**
   * Guild events not yet linked to a stored fixture. Null when they could not
   * be listed.
   */
  private async listExistingEvents(
    records: Map<string, SyncedFixture>
  ): Promise<RemoteScheduledEvent[] | null> {
    let events: RemoteScheduledEvent[];
    try {
      events = await this.platform.listScheduledEvents();
    } catch (error) {
      console.error(`[FixtureSync] Could not list existing events: ${getErrorMessage(error)}`);
      return null;
    }
    const linked = new Set([...records.values()].map((record) => record.remoteEventId));
    return events.filter((event) => !linked.has(event.id));
  }

  /**
   * Finds a guild event for the fixture: same name on the same local date,
   * preferring one that starts at the listed kickoff.
   */
  private findExistingEvent(
    fixture: Fixture,
    existing: RemoteScheduledEvent[]
  ): RemoteScheduledEvent | undefined {
    const { name: clubName, timeZone } = this.config.club;
    const name = eventName(fixture, clubName).slice(0, MAX_EVENT_NAME_LENGTH);
    const dateKey = toDateKey(fixture.kickoff, timeZone);
    const candidates = existing.filter(
      (event) => event.name === name && toDateKey(event.startTime, timeZone) === dateKey
    );
    return (
      candidates.find((event) => event.startTime.getTime() === fixture.kickoff.getTime()) ??
      candidates[0]
    );
  }

  private async applyAdded(
    fixture: Fixture,
    existing: RemoteScheduledEvent[],
    records: Map<string, SyncedFixture>,
    counts: SummaryCounts
  ): Promise<void> {
    const match = this.findExistingEvent(fixture, existing);
    if (match) {
      existing.splice(existing.indexOf(match), 1);
      await this.adopt(fixture, match, records, counts);
      return;
    }

    let remoteEventId: string;
    try {
      remoteEventId = await this.platform.createScheduledEvent(
        toScheduledEventInput(fixture, this.config.club)
      );
    } catch (error) {
      // Not recorded, so the next cycle sees it as added again
      console.error(`[FixtureSync] Could not create event for ${fixture.key}: ${getErrorMessage(error)}`);
      counts.failed++;
      return;
    }

    const record: SyncedFixture = { ...fixture, remoteEventId, announced: false };
    await this.persist(record, records);
    counts.added++;

    if (!(await this.announce(record, records))) {
      counts.failed++;
    }
  }

  /**
   * Links a fixture to an event that is already in the guild. Its
   * announcement went out when the event was made, so none is posted.
   */
  private async adopt(
    fixture: Fixture,
    event: RemoteScheduledEvent,
    records: Map<string, SyncedFixture>,
    counts: SummaryCounts
  ): Promise<void> {
    console.log(`[FixtureSync] Linking ${fixture.key} to existing event ${event.id}`);
    let kickoff = fixture.kickoff;

    if (event.startTime.getTime() !== fixture.kickoff.getTime()) {
      try {
        await this.platform.updateScheduledEvent(
          event.id,
          eventTimes(fixture, this.config.club.eventDurationMinutes)
        );
        counts.updated++;
      } catch (error) {
        // Record the event's own start so the next cycle sees the change again
        console.error(`[FixtureSync] Could not update event for ${fixture.key}: ${getErrorMessage(error)}`);
        kickoff = event.startTime;
        counts.failed++;
      }
    }

    await this.persist({ ...fixture, kickoff, remoteEventId: event.id, announced: true }, records);
    counts.adopted++;
  }

  private async applyUpdated(
    update: FixtureUpdate,
    records: Map<string, SyncedFixture>,
    counts: SummaryCounts
  ): Promise<void> {
    const record = records.get(update.next.key);
    if (!record) return;

    try {
      await this.platform.updateScheduledEvent(
        record.remoteEventId,
        eventTimes(update.next, this.config.club.eventDurationMinutes)
      );
    } catch (error) {
      // Keep the old kickoff so the change is picked up again next cycle
      console.error(`[FixtureSync] Could not update event for ${record.key}: ${getErrorMessage(error)}`);
      counts.failed++;
      return;
    }

    await this.persist(
      { ...update.next, remoteEventId: record.remoteEventId, announced: record.announced },
      records
    );
    counts.updated++;
  }

  private async applyRemoved(
    fixture: Fixture,
    records: Map<string, SyncedFixture>,
    counts: SummaryCounts
  ): Promise<void> {
    const record = records.get(fixture.key);
    if (!record) return;

    // Played matches drop off the upcoming list; Discord completes those events itself
    if (record.kickoff.getTime() <= this.now().getTime()) {
      await this.forget(record, records);
      counts.expired++;
      return;
    }

    try {
      await this.platform.deleteScheduledEvent(record.remoteEventId);
    } catch (error) {
      console.error(`[FixtureSync] Could not delete event for ${record.key}: ${getErrorMessage(error)}`);
      counts.failed++;
      return;
    }

    await this.forget(record, records);
    counts.removed++;
  }

  /**
   * Writes the record as soon as the remote change it describes has happened.
   * A failed write aborts the cycle.
   */
  private async persist(record: SyncedFixture, records: Map<string, SyncedFixture>): Promise<void> {
    try {
      await this.store.put(record);
    } catch (error) {
      console.error(
        `[FixtureSync] Could not record ${record.key} -> event ${record.remoteEventId}; ` +
          `the event may be duplicated next sync: ${getErrorMessage(error)}`
      );
      throw error;
    }
    records.set(record.key, record);
  }

  private async forget(record: SyncedFixture, records: Map<string, SyncedFixture>): Promise<void> {
    try {
      await this.store.remove(record.key);
    } catch (error) {
      console.error(`[FixtureSync] Could not forget ${record.key}: ${getErrorMessage(error)}`);
      throw error;
    }
    records.delete(record.key);
  }

  /**
   * Posts the announcement and marks the record. Returns false on failure.
   */
  private async announce(record: SyncedFixture, records: Map<string, SyncedFixture>): Promise<boolean> {
    try {
      await this.platform.postAnnouncement(announcementMessage(record, this.config.club.name));
    } catch (error) {
      console.error(`[FixtureSync] Could not announce ${record.key}: ${getErrorMessage(error)}`);
      return false;
    }
    await this.persist({ ...record, announced: true }, records);
    return true;
  }
}
