import { loadConfig } from './config.js';
import { FixtureBot } from './bot.js';

async function main(): Promise<void> {
  console.log('====================================');
  console.log('     Fixture Bot - Match Events     ');
  console.log('====================================');
  console.log();

  try {
    // Load configuration
    const config = loadConfig();
    console.log('[Main] Configuration loaded');
    console.log(`[Main] Schedule URL: ${config.schedule.url}`);
    console.log(`[Main] Sync cron: ${config.scheduler.syncCron} (${config.club.timeZone})`);

    // Create and start the bot
    const bot = new FixtureBot(config);
    await bot.start();

    // Handle graceful shutdown
    const shutdown = async (signal: string) => {
      console.log(`\n[Main] Received ${signal}, shutting down...`);
      try {
        await bot.stop();
      } catch (error) {
        console.error('[Main] Error during shutdown:', error);
      }
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));

    // Keep the process alive
    console.log('[Main] Bot is running. Press Ctrl+C to stop.');
  } catch (error) {
    console.error('[Main] Fatal error:', error);
    process.exit(1);
  }
}

void main();
