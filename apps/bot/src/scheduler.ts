import * as cron from 'node-cron';
import type { Config } from './config.js';
import { SyncInProgressError, getErrorMessage } from './errors.js';
import type { SyncSummary, SyncTrigger } from './fixtures/types.js';
import type { FixtureSync } from './services/fixture-sync.js';
import { presenceText } from './services/presence.js';

export type PresenceSetter = (text: string) => void;

// Top of every hour
const PRESENCE_CRON = '0 * * * *';

/**
 * Scheduler handles the periodic jobs of the bot:
 * - the fixture sync (daily by default, plus once at startup)
 * - the hourly presence refresh showing the next match
 *
 * Failures are logged and never stop the jobs; the next run tries again.
 */
export class Scheduler {
  private config: Config;
  private sync: FixtureSync;
  private setPresence: PresenceSetter;
  private syncJob: cron.ScheduledTask | null = null;
  private presenceJob: cron.ScheduledTask | null = null;

  constructor(config: Config, sync: FixtureSync, setPresence: PresenceSetter) {
    this.config = config;
    this.sync = sync;
    this.setPresence = setPresence;
  }

  start(): void {
    if (this.syncJob) {
      console.warn('[Scheduler] Scheduler is already running');
      return;
    }

    const { syncCron, syncOnStartup } = this.config.scheduler;
    const timezone = this.config.club.timeZone;

    if (!cron.validate(syncCron)) {
      throw new Error(`Invalid cron expression: ${syncCron}`);
    }

    console.log(`[Scheduler] Scheduling fixture sync with cron: "${syncCron}" (timezone: ${timezone})`);
    this.syncJob = cron.schedule(
      syncCron,
      () => {
        void this.runScheduledSync('scheduled');
      },
      { timezone }
    );

    console.log('[Scheduler] Setting up hourly presence updates');
    this.presenceJob = cron.schedule(
      PRESENCE_CRON,
      () => {
        void this.updatePresence();
      },
      { timezone }
    );

    if (syncOnStartup) {
      console.log('[Scheduler] Running initial fixture sync...');
      void this.runScheduledSync('startup');
    } else {
      void this.updatePresence();
    }

    console.log('[Scheduler] Scheduler started');
  }

  stop(): void {
    this.syncJob?.stop();
    this.syncJob = null;
    this.presenceJob?.stop();
    this.presenceJob = null;
    console.log('[Scheduler] Scheduler stopped');
  }

  /**
   * Runs a sync cycle and refreshes the presence afterwards. Never rejects;
   * returns null when the cycle was skipped or failed.
   */
  async runScheduledSync(trigger: SyncTrigger): Promise<SyncSummary | null> {
    let summary: SyncSummary | null = null;
    try {
      summary = await this.sync.runCycle(trigger);
    } catch (error) {
      if (error instanceof SyncInProgressError) {
        console.log('[Scheduler] Fixture sync already in progress, skipping this run');
        return null;
      }
      console.error(`[Scheduler] ${trigger} fixture sync failed: ${getErrorMessage(error)}`);
    }

    await this.updatePresence();
    return summary;
  }

  async updatePresence(): Promise<void> {
    try {
      const now = new Date();
      const upcoming = await this.sync.upcomingFixtures(now);
      const text = presenceText(upcoming, this.config.club.name, now);
      this.setPresence(text);
      console.log(`[Scheduler] Presence updated to: ${text}`);
    } catch (error) {
      console.error('[Scheduler] Failed to update presence:', error);
    }
  }
}
