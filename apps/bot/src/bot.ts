import {
  ActivityType,
  Client,
  GatewayIntentBits,
  REST,
  Routes,
  Events,
} from 'discord.js';
import type { Config } from './config.js';
import { Scheduler } from './scheduler.js';
import { commands } from './commands.js';
import { closeDatabase, getDatabase } from './db/index.js';
import { PostgresFixtureStore } from './db/fixture-store.js';
import { MemoryFixtureStore, type FixtureStore } from './fixtures/store.js';
import { DiscordChatPlatform, clientGuildApi } from './services/discord-platform.js';
import { FixtureSync } from './services/fixture-sync.js';

export class FixtureBot {
  private config: Config;
  private client: Client;
  private postgresStore: PostgresFixtureStore | null = null;
  private sync: FixtureSync;
  private scheduler: Scheduler;

  constructor(config: Config) {
    this.config = config;

    // Slash commands and scheduled events only need the guild intent
    this.client = new Client({
      intents: [GatewayIntentBits.Guilds],
    });

    let store: FixtureStore;
    if (config.database.url) {
      this.postgresStore = new PostgresFixtureStore(getDatabase(config.database.url));
      store = this.postgresStore;
    } else {
      console.log('[FixtureBot] No DATABASE_URL set, keeping the fixture mapping in memory');
      store = new MemoryFixtureStore();
    }

    this.sync = new FixtureSync({
      config,
      store,
      platform: new DiscordChatPlatform(clientGuildApi(this.client), config),
    });
    this.scheduler = new Scheduler(config, this.sync, (text) => {
      this.client.user?.setPresence({
        activities: [{ name: text, type: ActivityType.Watching }],
      });
    });

    this.setupEventHandlers();
  }

  private setupEventHandlers(): void {
    // Ready event
    this.client.once(Events.ClientReady, async (readyClient) => {
      console.log(`[FixtureBot] Logged in as ${readyClient.user.tag} (ID: ${readyClient.user.id})`);

      try {
        const guild = await readyClient.guilds.fetch(this.config.discord.guildId);
        console.log(`[FixtureBot] Connected to guild: ${guild.name} (ID: ${guild.id}) with ${guild.memberCount} members`);
        await guild.members.me?.setNickname(this.config.discord.nickname);
        console.log(`[FixtureBot] Bot nickname set to '${this.config.discord.nickname}'`);
      } catch (error) {
        console.warn('[FixtureBot] Failed to set up guild:', error);
      }

      // Register slash commands
      await this.registerCommands(readyClient.user.id);

      try {
        this.scheduler.start();
      } catch (error) {
        console.error('[FixtureBot] Failed to start scheduler:', error);
      }

      console.log('[FixtureBot] Bot is ready!');
    });

    // Slash command interactions
    this.client.on(Events.InteractionCreate, async (interaction) => {
      if (!interaction.isChatInputCommand()) return;

      const command = commands.find((cmd) => cmd.data.name === interaction.commandName);

      if (!command) {
        console.warn(`[FixtureBot] Unknown command: ${interaction.commandName}`);
        return;
      }

      try {
        console.log(`[FixtureBot] Executing command: ${interaction.commandName}`);
        await command.execute(interaction, { config: this.config, sync: this.sync });
      } catch (error) {
        console.error(`[FixtureBot] Error executing command ${interaction.commandName}:`, error);

        const errorMessage = 'There was an error executing this command.';
        try {
          if (interaction.replied || interaction.deferred) {
            await interaction.followUp({ content: errorMessage, ephemeral: true });
          } else {
            await interaction.reply({ content: errorMessage, ephemeral: true });
          }
        } catch (replyError) {
          console.error('[FixtureBot] Failed to report command error:', replyError);
        }
      }
    });

    this.client.on(Events.GuildCreate, (guild) => {
      console.log(`[FixtureBot] Joined guild: ${guild.name} (ID: ${guild.id}) with ${guild.memberCount} members`);
    });

    this.client.on(Events.GuildDelete, (guild) => {
      console.log(`[FixtureBot] Removed from guild: ${guild.name} (ID: ${guild.id})`);
    });

    this.client.on(Events.ShardDisconnect, (_event, shardId) => {
      console.warn(`[FixtureBot] Shard ${shardId} disconnected from Discord`);
    });

    this.client.on(Events.ShardResume, (shardId) => {
      console.log(`[FixtureBot] Shard ${shardId} connection resumed`);
    });

    this.client.on(Events.Error, (error) => {
      console.error('[FixtureBot] Client error:', error);
    });
  }

  private async registerCommands(applicationId: string): Promise<void> {
    const rest = new REST().setToken(this.config.discord.token);

    try {
      console.log(`[FixtureBot] Registering ${commands.length} slash commands...`);

      const commandData = commands.map((cmd) => cmd.data);

      await rest.put(Routes.applicationGuildCommands(applicationId, this.config.discord.guildId), {
        body: commandData,
      });

      console.log('[FixtureBot] Slash commands registered successfully');
    } catch (error) {
      console.error('[FixtureBot] Failed to register commands:', error);
    }
  }

  async start(): Promise<void> {
    if (this.postgresStore) {
      await this.postgresStore.ensureSchema();
      console.log('[FixtureBot] Fixture table ready');
    }
    console.log('[FixtureBot] Starting bot...');
    await this.client.login(this.config.discord.token);
  }

  async stop(): Promise<void> {
    console.log('[FixtureBot] Stopping bot...');
    this.scheduler.stop();
    await this.client.destroy();
    // Gracefully close database connections
    await closeDatabase();
  }
}
