import { SlashCommandBuilder, ChatInputCommandInteraction, EmbedBuilder } from 'discord.js';
import { Command, CommandCategory } from '../../types/command';
import { BotContext } from '../../types/client';
import { Track } from '../../music/track';
import { THEME_COLORS } from '../../constants/colors';
import { BaseCommand } from '../../utils/base-command.util';
import { EmbedUtils } from '../../utils/embed-builder.util';

export const PLAYLIST_NAME_MAX_LENGTH = 50;

/**
 * Playlist command - Personal saved queues (save, load, list, delete)
 */
class PlaylistCommand extends BaseCommand {
  constructor() {
    super({
      data: new SlashCommandBuilder()
        .setName('playlist')
        .setDescription('📂 Gerencia suas playlists pessoais')
        .addSubcommand(subcommand =>
          subcommand
            .setName('save')
            .setDescription('Salva a fila atual como playlist')
            .addStringOption(option =>
              option
                .setName('name')
                .setDescription('Nome da playlist')
                .setMaxLength(PLAYLIST_NAME_MAX_LENGTH)
                .setRequired(true),
            ),
        )
        .addSubcommand(subcommand =>
          subcommand
            .setName('load')
            .setDescription('Carrega uma playlist salva na fila')
            .addStringOption(option =>
              option
                .setName('name')
                .setDescription('Nome da playlist')
                .setMaxLength(PLAYLIST_NAME_MAX_LENGTH)
                .setRequired(true),
            ),
        )
        .addSubcommand(subcommand => subcommand.setName('list').setDescription('Lista suas playlists salvas'))
        .addSubcommand(subcommand =>
          subcommand
            .setName('delete')
            .setDescription('Apaga uma playlist salva')
            .addStringOption(option =>
              option
                .setName('name')
                .setDescription('Nome da playlist')
                .setMaxLength(PLAYLIST_NAME_MAX_LENGTH)
                .setRequired(true),
            ),
        ),
      category: CommandCategory.PLAYLIST,
      cooldown: 3,
    });
  }

  async execute(interaction: ChatInputCommandInteraction, context: BotContext): Promise<void> {
    const subcommand = interaction.options.getSubcommand();

    switch (subcommand) {
      case 'save':
        await this.handleSave(interaction, context);
        break;
      case 'load':
        await this.handleLoad(interaction, context);
        break;
      case 'list':
        await this.handleList(interaction, context);
        break;
      case 'delete':
        await this.handleDelete(interaction, context);
        break;
      default:
        throw new Error(`Unknown subcommand: ${subcommand}`);
    }
  }

  private readName(interaction: ChatInputCommandInteraction): string | null {
    const name = interaction.options.getString('name', true).trim();
    if (name.length === 0 || name.length > PLAYLIST_NAME_MAX_LENGTH) {
      return null;
    }
    return name;
  }

  private async handleSave(interaction: ChatInputCommandInteraction, context: BotContext): Promise<void> {
    const guildInteraction = await this.requireGuild(interaction);
    if (!guildInteraction) {
      return;
    }

    const name = this.readName(guildInteraction);
    if (!name) {
      await this.replyError(guildInteraction, `O nome deve ter entre 1 e ${PLAYLIST_NAME_MAX_LENGTH} caracteres.`);
      return;
    }

    const player = await context.music.getPlayer(guildInteraction.guildId);
    if (player.queue.isEmpty) {
      await this.replyError(guildInteraction, 'A fila está vazia. Não há nada para salvar.');
      return;
    }

    const tracks = player.queue.tracks;
    const saved = await context.database.savePlaylist(guildInteraction.user.id, name, tracks);
    if (!saved) {
      await this.replyError(guildInteraction, 'Não foi possível salvar a playlist.');
      return;
    }

    await this.safeReply(guildInteraction, {
      embeds: [EmbedUtils.createSuccessEmbed('Playlist salva', `**${name}** salva com ${tracks.length} músicas.`)],
    });
  }

  private async handleLoad(interaction: ChatInputCommandInteraction, context: BotContext): Promise<void> {
    const guildInteraction = await this.requireGuild(interaction);
    if (!guildInteraction) {
      return;
    }

    const name = this.readName(guildInteraction);
    if (!name) {
      await this.replyError(guildInteraction, `O nome deve ter entre 1 e ${PLAYLIST_NAME_MAX_LENGTH} caracteres.`);
      return;
    }

    const channel = await this.requireVoiceChannel(guildInteraction);
    if (!channel) {
      return;
    }

    await guildInteraction.deferReply();

    const stored = await context.database.loadPlaylist(guildInteraction.user.id, name);
    if (!stored || stored.length === 0) {
      await this.replyError(guildInteraction, `Playlist **${name}** não encontrada.`);
      return;
    }

    const player = await context.music.getPlayer(guildInteraction.guildId);
    this.rememberChannel(guildInteraction, context);

    if (!(await this.ensureConnected(guildInteraction, player, channel))) {
      return;
    }

    const tracks = stored.map(data =>
      Track.fromDict({
        ...data,
        requester_id: guildInteraction.user.id,
        requester_name: guildInteraction.member.displayName,
      }),
    );

    const added = await player.addTracks(tracks);
    if (added === 0) {
      await this.replyError(guildInteraction, 'A fila está cheia! Remova algumas músicas primeiro.');
      return;
    }

    if (!player.isPlaying && !player.isPaused) {
      await player.play();
    }

    await this.safeReply(guildInteraction, {
      embeds: [EmbedUtils.createSuccessEmbed('Playlist carregada', `**${name}** carregada com ${added} músicas.`)],
    });
  }

  private async handleList(interaction: ChatInputCommandInteraction, context: BotContext): Promise<void> {
    const names = await context.database.listPlaylists(interaction.user.id);

    if (names.length === 0) {
      await this.safeReply(interaction, {
        embeds: [
          EmbedUtils.createInfoEmbed(
            'Nenhuma playlist salva',
            'Use `/playlist save <nome>` para salvar a fila atual.',
          ),
        ],
      });
      return;
    }

    const embed = new EmbedBuilder()
      .setTitle('📋 Suas Playlists')
      .setDescription(names.map(name => `• **${name}**`).join('\n'))
      .setColor(THEME_COLORS.PLAYLIST)
      .setFooter({ text: 'Use /playlist load <nome> para carregar uma playlist' });

    await this.safeReply(interaction, { embeds: [embed] });
  }

  private async handleDelete(interaction: ChatInputCommandInteraction, context: BotContext): Promise<void> {
    const name = this.readName(interaction);
    if (!name) {
      await this.replyError(interaction, `O nome deve ter entre 1 e ${PLAYLIST_NAME_MAX_LENGTH} caracteres.`);
      return;
    }

    const deleted = await context.database.deletePlaylist(interaction.user.id, name);
    if (!deleted) {
      await this.replyError(interaction, `Playlist **${name}** não encontrada.`);
      return;
    }

    await this.safeReply(interaction, {
      embeds: [EmbedUtils.createSuccessEmbed('Playlist apagada', `**${name}** foi apagada.`)],
    });
  }
}

const command: Command = new PlaylistCommand();

export default command;
