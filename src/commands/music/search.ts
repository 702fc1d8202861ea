import {
  SlashCommandBuilder,
  ChatInputCommandInteraction,
  ActionRowBuilder,
  ButtonBuilder,
  ButtonInteraction,
  ButtonStyle,
  ComponentType,
  MessageFlags,
} from 'discord.js';
import { Command, CommandCategory } from '../../types/command';
import { BotContext } from '../../types/client';
import { SearchSource } from '../../types/music';
import { Track } from '../../music/track';
import { MusicPlayer } from '../../music/player';
import { BaseCommand, toChannelRef } from '../../utils/base-command.util';
import { EmbedUtils } from '../../utils/embed-builder.util';
import { ErrorHandler } from '../../utils/error-handler.util';

export const SEARCH_RESULT_LIMIT = 5;
export const SEARCH_TIMEOUT_MS = 60_000;
const CANCEL_ID = 'cancel';

export function parseSearchSource(value: string | null): SearchSource {
  return value === 'soundcloud' ? 'soundcloud' : 'youtube';
}

/**
 * Buttons 1..n for the results plus a cancel button, ids scoped to one search
 */
export function buildResultButtons(prefix: string, count: number): ActionRowBuilder<ButtonBuilder> {
  const row = new ActionRowBuilder<ButtonBuilder>();
  for (let i = 1; i <= Math.min(count, SEARCH_RESULT_LIMIT); i++) {
    row.addComponents(
      new ButtonBuilder().setCustomId(`${prefix}:${i}`).setLabel(String(i)).setStyle(ButtonStyle.Primary),
    );
  }
  row.addComponents(
    new ButtonBuilder().setCustomId(`${prefix}:${CANCEL_ID}`).setLabel('Cancelar').setStyle(ButtonStyle.Danger),
  );
  return row;
}

/**
 * Search command - Lists a few results and lets the caller pick one
 */
class SearchCommand extends BaseCommand {
  constructor() {
    super({
      data: new SlashCommandBuilder()
        .setName('search')
        .setDescription('🔍 Busca uma música e escolhe entre os resultados')
        .addStringOption(option =>
          option.setName('query').setDescription('Termo de busca').setRequired(true),
        )
        .addStringOption(option =>
          option
            .setName('source')
            .setDescription('Onde buscar (padrão: YouTube)')
            .setRequired(false)
            .addChoices({ name: 'YouTube', value: 'youtube' }, { name: 'SoundCloud', value: 'soundcloud' }),
        ),
      category: CommandCategory.MUSIC,
      cooldown: 5,
    });
  }

  async execute(interaction: ChatInputCommandInteraction, context: BotContext): Promise<void> {
    const guildInteraction = await this.requireGuild(interaction);
    if (!guildInteraction) {
      return;
    }

    if (!(await this.requireVoiceChannel(guildInteraction))) {
      return;
    }

    const query = guildInteraction.options.getString('query', true);
    const source = parseSearchSource(guildInteraction.options.getString('source'));
    await guildInteraction.deferReply();

    const player = await context.music.getPlayer(guildInteraction.guildId);
    this.rememberChannel(guildInteraction, context);

    const tracks = await context.music.extractor.search(
      query,
      guildInteraction.user.id,
      guildInteraction.member.displayName,
      SEARCH_RESULT_LIMIT,
      source,
    );

    if (tracks.length === 0) {
      await this.replyError(guildInteraction, 'Nenhum resultado encontrado', `Nada encontrado para: \`${query}\``);
      return;
    }

    const prefix = `search:${guildInteraction.id}`;
    const response = await guildInteraction.editReply({
      embeds: [EmbedUtils.createSearchEmbed(tracks, query)],
      components: [buildResultButtons(prefix, tracks.length)],
    });

    const collector = response.createMessageComponentCollector({
      componentType: ComponentType.Button,
      time: SEARCH_TIMEOUT_MS,
    });

    collector.on('collect', button => {
      this.handleChoice(button, prefix, guildInteraction.user.id, tracks, player)
        .then(done => {
          if (done) {
            collector.stop('chosen');
          }
        })
        .catch(error => {
          this.logger.error('Failed to handle search choice', {
            guildId: guildInteraction.guildId,
            userId: button.user.id,
            error: ErrorHandler.toError(error),
          });
        });
    });

    collector.on('end', (_collected, reason) => {
      if (reason !== 'time') {
        return;
      }
      guildInteraction.editReply({ components: [] }).catch(error => {
        this.logger.warn('Failed to expire search buttons', {
          guildId: guildInteraction.guildId,
          error: ErrorHandler.toError(error),
        });
      });
    });
  }

  /**
   * Returns true once the search is settled (a track chosen or cancelled)
   */
  private async handleChoice(
    button: ButtonInteraction<'cached'>,
    prefix: string,
    ownerId: string,
    tracks: readonly Track[],
    player: MusicPlayer,
  ): Promise<boolean> {
    if (!button.customId.startsWith(`${prefix}:`)) {
      return false;
    }

    if (button.user.id !== ownerId) {
      await button.reply({
        content: '❌ Esta busca foi iniciada por outra pessoa.',
        flags: MessageFlags.Ephemeral,
      });
      return false;
    }

    const choice = button.customId.slice(prefix.length + 1);
    if (choice === CANCEL_ID) {
      await button.update({ embeds: [EmbedUtils.createInfoEmbed('Busca cancelada')], components: [] });
      return true;
    }

    const track = tracks[Number.parseInt(choice, 10) - 1];
    if (!track) {
      return false;
    }

    await button.deferUpdate();

    if (!player.isConnected) {
      const channel = button.member.voice.channel;
      if (!channel || !(await player.connect(toChannelRef(channel)))) {
        await button.followUp({
          content: '❌ Não foi possível conectar ao canal de voz.',
          flags: MessageFlags.Ephemeral,
        });
        return false;
      }
    }

    if (!(await player.addTrack(track))) {
      await button.editReply({
        embeds: [EmbedUtils.createErrorEmbed('A fila está cheia! Remova algumas músicas primeiro.')],
        components: [],
      });
      return true;
    }

    if (!player.isPlaying && !player.isPaused) {
      await player.play();
    }

    const position = player.queue.tracks.indexOf(track) + 1;
    await button.editReply({
      embeds: [EmbedUtils.createTrackEmbed(track, '✅ Adicionado à Fila', position > 0 ? position : undefined)],
      components: [],
    });
    return true;
  }
}

const command: Command = new SearchCommand();

export default command;
