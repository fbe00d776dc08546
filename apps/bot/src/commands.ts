import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
  EmbedBuilder,
} from 'discord.js';
import type { Config } from './config.js';
import { AuthorizationError, SyncInProgressError, getErrorMessage } from './errors.js';
import type { SyncSummary } from './fixtures/types.js';
import type { FixtureSync } from './services/fixture-sync.js';

export interface CommandContext {
  config: Config;
  sync: FixtureSync;
}

export interface Command {
  data: RESTPostAPIChatInputApplicationCommandsJSONBody;
  execute: (interaction: ChatInputCommandInteraction, context: CommandContext) => Promise<void>;
}

/** The parts of a guild member the role check reads (GuildMember or the raw API member) */
export type MemberLike = {
  roles: string[] | { cache: { keys(): Iterable<string> } };
} | null;

export interface Invoker {
  userId: string;
  guildId: string | null;
  roleIds: readonly string[];
}

export const NOT_AUTHORIZED_MESSAGE = "❌ You don't have permission to run this command.";
export const SYNC_BUSY_MESSAGE = 'A fixture sync is already running. Try again in a moment.';

export function roleIdsOf(member: MemberLike): string[] {
  if (!member) return [];
  const roles = member.roles;
  if (Array.isArray(roles)) return [...roles];
  return [...roles.cache.keys()];
}

/**
 * Only members of the configured guild holding the privileged role may sync.
 *
 * @throws AuthorizationError otherwise
 */
export function authorizeSync(
  invoker: Invoker,
  discord: Pick<Config['discord'], 'guildId' | 'privilegedRoleId'>
): void {
  if (invoker.guildId !== discord.guildId) {
    throw new AuthorizationError('Command used outside the configured server', {
      userId: invoker.userId,
      guildId: invoker.guildId,
    });
  }
  if (!invoker.roleIds.includes(discord.privilegedRoleId)) {
    throw new AuthorizationError('Missing the privileged role', { userId: invoker.userId });
  }
}

export function buildSummaryEmbed(summary: SyncSummary): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setTitle('Fixtures Synced')
    .setColor(summary.failed > 0 ? 0xfee75c : 0x57f287)
    .addFields(
      { name: 'Added', value: String(summary.added), inline: true },
      { name: 'Updated', value: String(summary.updated), inline: true },
      { name: 'Removed', value: String(summary.removed), inline: true }
    )
    .setTimestamp(summary.completedAt);

  const notes: string[] = [];
  if (summary.adopted > 0) notes.push(`${summary.adopted} existing event(s) linked`);
  if (summary.expired > 0) notes.push(`${summary.expired} played fixture(s) cleared`);
  if (summary.announced > 0) notes.push(`${summary.announced} pending announcement(s) sent`);
  if (summary.failed > 0) notes.push(`${summary.failed} operation(s) failed, will retry next sync`);
  if (summary.skippedRows > 0) notes.push(`${summary.skippedRows} schedule row(s) could not be read`);
  if (notes.length > 0) {
    embed.setDescription(notes.join('\n'));
  }

  return embed;
}

/** The parts of a command interaction the refresh handler uses */
export interface RefreshEventsInteraction {
  user: { id: string; tag: string };
  guildId: string | null;
  member: MemberLike;
  reply(options: { content: string; ephemeral: boolean }): Promise<unknown>;
  deferReply(): Promise<unknown>;
  editReply(options: string | { embeds: EmbedBuilder[] }): Promise<unknown>;
}

/**
 * Checks the invoker's role before anything else happens, then runs a sync
 * and replies with its summary.
 */
export async function runRefreshEvents(
  interaction: RefreshEventsInteraction,
  context: CommandContext
): Promise<void> {
  const invoker: Invoker = {
    userId: interaction.user.id,
    guildId: interaction.guildId,
    roleIds: roleIdsOf(interaction.member),
  };

  try {
    authorizeSync(invoker, context.config.discord);
  } catch (error) {
    if (!(error instanceof AuthorizationError)) throw error;
    console.warn(
      `[RefreshEventsCommand] Unauthorized refresh attempt by ${interaction.user.tag} (${invoker.userId}): ${error.message}`
    );
    await interaction.reply({ content: NOT_AUTHORIZED_MESSAGE, ephemeral: true });
    return;
  }

  if (context.sync.isRunning()) {
    await interaction.reply({ content: SYNC_BUSY_MESSAGE, ephemeral: true });
    return;
  }

  console.log(`[RefreshEventsCommand] Manual refresh requested by ${interaction.user.tag} (${invoker.userId})`);
  await interaction.deferReply();

  try {
    const summary = await context.sync.runCycle('manual');
    await interaction.editReply({ embeds: [buildSummaryEmbed(summary)] });
  } catch (error) {
    if (error instanceof SyncInProgressError) {
      await interaction.editReply(SYNC_BUSY_MESSAGE);
      return;
    }
    console.error('[RefreshEventsCommand] Error:', error);
    await interaction.editReply(`❌ Refresh failed: ${getErrorMessage(error)}`);
  }
}

// /refresh-events command - manually run a fixture sync
const refreshEventsCommand: Command = {
  data: new SlashCommandBuilder()
    .setName('refresh-events')
    .setDescription('Sync match events from the club schedule now')
    .toJSON(),
  execute: (interaction, context) => runRefreshEvents(interaction, context),
};

// Export all commands
export const commands: Command[] = [refreshEventsCommand];
