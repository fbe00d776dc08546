import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { FetchError } from './errors.js';
import { MemoryFixtureStore } from './fixtures/store.js';
import { Scheduler } from './scheduler.js';
import { FixtureSync } from './services/fixture-sync.js';
import { createFakePlatform, schedulePage, testConfig } from './test-utils.js';

describe('Scheduler', () => {
  let fetchPage: (url: string) => Promise<string>;
  let setPresence: Mock<(text: string) => void>;
  let scheduler: Scheduler;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2024-01-01T00:00:00.000Z'));
    fetchPage = async () =>
      schedulePage([{ date: 'December 31', time: '11:00 PM', opponent: 'TeamZ' }]);
    setPresence = vi.fn<(text: string) => void>();
    const sync = new FixtureSync({
      config: testConfig,
      store: new MemoryFixtureStore(),
      platform: createFakePlatform(),
      fetchPage: (url) => fetchPage(url),
      now: () => new Date('2024-01-01T00:00:00.000Z'),
    });
    scheduler = new Scheduler(testConfig, sync, setPresence);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('refreshes the presence after a scheduled sync', async () => {
    const summary = await scheduler.runScheduledSync('scheduled');

    expect(summary?.added).toBe(1);
    expect(setPresence).toHaveBeenCalledTimes(1);
    expect(setPresence).toHaveBeenCalledWith('Matchday in 8791h: Lakeside FC vs TeamZ');
  });

  it('logs a failed sync instead of rejecting', async () => {
    fetchPage = async (url) => {
      throw new FetchError('Failed to load schedule page: HTTP 503', url, 503);
    };

    await expect(scheduler.runScheduledSync('scheduled')).resolves.toBeNull();
    expect(setPresence).toHaveBeenCalledWith('the Lakeside FC schedule');
  });

  it('refuses an invalid cron expression', () => {
    const broken = new Scheduler(
      { ...testConfig, scheduler: { syncCron: 'every day', syncOnStartup: false } },
      new FixtureSync({ config: testConfig, store: new MemoryFixtureStore(), platform: createFakePlatform() }),
      setPresence
    );

    expect(() => broken.start()).toThrow('Invalid cron expression: every day');
  });
});
