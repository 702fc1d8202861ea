import {
  ActionRowBuilder,
  ButtonBuilder,
  ChatInputCommandInteraction,
  EmbedBuilder,
  MessageFlags,
  PermissionFlagsBits,
  VoiceBasedChannel,
} from 'discord.js';
import { Command, CommandCategory, CommandData } from '../types/command';
import { BotContext } from '../types/client';
import { VoiceChannelRef } from '../types/music';
import { MusicPlayer } from '../music/player';
import { EmbedUtils } from './embed-builder.util';
import { Logger } from './logger';

export const DJ_ROLE_NAME = 'dj';

export interface ReplyPayload {
  content?: string;
  embeds?: EmbedBuilder[];
  components?: ActionRowBuilder<ButtonBuilder>[];
  ephemeral?: boolean;
}

export interface PlayerControl {
  interaction: ChatInputCommandInteraction<'cached'>;
  player: MusicPlayer;
}

export interface DjAccessInput {
  hasManageGuild: boolean;
  roleNames: readonly string[];
  /** Humans in the member's voice channel, the member included */
  listenerCount: number;
}

/**
 * Manage Server, a role named DJ (any case), or being the only listener
 */
export function hasDjAccess(input: DjAccessInput): boolean {
  if (input.hasManageGuild) {
    return true;
  }
  if (input.roleNames.some(name => name.toLowerCase() === DJ_ROLE_NAME)) {
    return true;
  }
  return input.listenerCount === 1;
}

export function isBotOwner(userId: string, ownerId: string | undefined): boolean {
  return ownerId !== undefined && ownerId === userId;
}

export function toChannelRef(channel: VoiceBasedChannel): VoiceChannelRef {
  return { id: channel.id, guildId: channel.guild.id, name: channel.name };
}

/**
 * Base class for slash commands with shared guards and reply helpers
 */
export abstract class BaseCommand implements Command {
  protected logger: Logger;
  public data: CommandData;
  public category: CommandCategory;
  public cooldown: number;
  public ownerOnly: boolean;

  constructor(config: { data: CommandData; category: CommandCategory; cooldown?: number; ownerOnly?: boolean }) {
    this.logger = new Logger();
    this.data = config.data;
    this.category = config.category;
    this.cooldown = config.cooldown || 0;
    this.ownerOnly = config.ownerOnly || false;
  }

  abstract execute(interaction: ChatInputCommandInteraction, context: BotContext): Promise<void>;

  /**
   * Narrow to a cached guild interaction, replying when used elsewhere
   */
  protected async requireGuild(
    interaction: ChatInputCommandInteraction,
  ): Promise<ChatInputCommandInteraction<'cached'> | null> {
    if (interaction.inCachedGuild()) {
      return interaction;
    }
    await this.sendGuildOnlyError(interaction);
    return null;
  }

  /**
   * The caller's voice channel, or null after telling them to join one
   */
  protected async requireVoiceChannel(
    interaction: ChatInputCommandInteraction<'cached'>,
  ): Promise<VoiceBasedChannel | null> {
    const channel = interaction.member.voice.channel;
    if (!channel) {
      await this.replyError(interaction, 'Você precisa estar em um canal de voz para usar este comando!');
      return null;
    }
    return channel;
  }

  /**
   * Caller must share the bot's voice channel when the bot is connected
   */
  protected async requireSameChannel(
    interaction: ChatInputCommandInteraction<'cached'>,
    player: MusicPlayer | undefined,
  ): Promise<VoiceBasedChannel | null> {
    const channel = await this.requireVoiceChannel(interaction);
    if (!channel) {
      return null;
    }

    const botChannelId = player?.isConnected ? player.channelId : null;
    if (botChannelId && botChannelId !== channel.id) {
      await this.replyError(interaction, `Você precisa estar em <#${botChannelId}> para usar este comando!`);
      return null;
    }
    return channel;
  }

  /**
   * Guild, player and same-channel checks shared by the playback controls
   */
  protected async resolvePlayerControl(
    interaction: ChatInputCommandInteraction,
    context: BotContext,
  ): Promise<PlayerControl | null> {
    const guildInteraction = await this.requireGuild(interaction);
    if (!guildInteraction) {
      return null;
    }

    const player = await context.music.getPlayer(guildInteraction.guildId);
    if (!(await this.requireSameChannel(guildInteraction, player))) {
      return null;
    }

    this.rememberChannel(guildInteraction, context);
    return { interaction: guildInteraction, player };
  }

  protected async requireDj(interaction: ChatInputCommandInteraction<'cached'>): Promise<boolean> {
    const member = interaction.member;
    const channel = member.voice.channel;

    const allowed = hasDjAccess({
      hasManageGuild: member.permissions.has(PermissionFlagsBits.ManageGuild),
      roleNames: member.roles.cache.map(role => role.name),
      listenerCount: channel ? channel.members.filter(m => !m.user.bot).size : 0,
    });

    if (!allowed) {
      await this.replyError(
        interaction,
        'Você precisa do cargo DJ ou da permissão Gerenciar Servidor para usar este comando.',
      );
    }
    return allowed;
  }

  protected async requireOwner(interaction: ChatInputCommandInteraction, context: BotContext): Promise<boolean> {
    if (isBotOwner(interaction.user.id, context.config.botOwnerId)) {
      return true;
    }
    await this.sendPermissionError(interaction);
    return false;
  }

  /**
   * Connect the guild player to the caller's channel when it is not already there
   */
  protected async ensureConnected(
    interaction: ChatInputCommandInteraction<'cached'>,
    player: MusicPlayer,
    channel: VoiceBasedChannel,
  ): Promise<boolean> {
    if (player.isConnected) {
      return true;
    }
    const connected = await player.connect(toChannelRef(channel));
    if (!connected) {
      await this.replyError(interaction, 'Não foi possível conectar ao canal de voz.');
    }
    return connected;
  }

  /**
   * Remember the text channel so track announcements land there
   */
  protected rememberChannel(interaction: ChatInputCommandInteraction<'cached'>, context: BotContext): void {
    const channel = interaction.channel;
    if (channel) {
      context.music.setAnnouncementChannel(interaction.guildId, channel);
    }
  }

  protected async sendPermissionError(interaction: ChatInputCommandInteraction): Promise<void> {
    await this.replyError(interaction, 'Você não tem permissão para executar este comando.');
  }

  protected async sendGuildOnlyError(interaction: ChatInputCommandInteraction): Promise<void> {
    await this.replyError(interaction, 'Este comando só pode ser usado em servidores.');
  }

  protected async replyError(interaction: ChatInputCommandInteraction, title: string, description?: string): Promise<void> {
    await this.safeReply(interaction, {
      embeds: [EmbedUtils.createErrorEmbed(title, description)],
      ephemeral: true,
    });
  }

  /**
   * Safe reply to interaction (handles already replied scenarios)
   */
  protected async safeReply(interaction: ChatInputCommandInteraction, payload: ReplyPayload): Promise<void> {
    const { ephemeral, ...body } = payload;
    try {
      if (interaction.replied || interaction.deferred) {
        await interaction.editReply(body);
      } else {
        await interaction.reply({ ...body, flags: ephemeral ? MessageFlags.Ephemeral : undefined });
      }
    } catch (error) {
      this.logger.error('Failed to reply to interaction', {
        commandName: interaction.commandName,
        userId: interaction.user.id,
        error: error instanceof Error ? error : new Error(String(error)),
      });
    }
  }
}
