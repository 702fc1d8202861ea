import { EmbedBuilder } from 'discord.js';
import { THEME_COLORS, ColorUtils } from '../constants/colors';
import { Track } from '../music/track';
import { LoopMode, MusicQueue } from '../music/queue';
import { FormatUtils } from './format.util';

export const QUEUE_PAGE_SIZE = 10;

export const LOOP_MODE_EMOJIS: Record<LoopMode, string> = {
  [LoopMode.OFF]: '➡️',
  [LoopMode.ONE]: '🔂',
  [LoopMode.ALL]: '🔁',
};

const SOURCE_LABELS: Record<string, string> = {
  youtube: '▶️ YouTube',
  soundcloud: '☁️ SoundCloud',
};

export interface QueuePage {
  embed: EmbedBuilder;
  /** 1-based, clamped into range */
  page: number;
  totalPages: number;
}

/**
 * Utility class for creating standardized embeds
 */
export class EmbedUtils {
  private static readonly COLORS = {
    ERROR: THEME_COLORS.ERROR,
    SUCCESS: THEME_COLORS.SUCCESS,
    WARNING: THEME_COLORS.WARNING,
    INFO: THEME_COLORS.INFO,
    PRIMARY: THEME_COLORS.PRIMARY,
  } as const;

  static createErrorEmbed(title: string, description?: string): EmbedBuilder {
    const embed = new EmbedBuilder().setColor(this.COLORS.ERROR).setTitle(`❌ ${title}`);

    if (description) {
      embed.setDescription(description);
    }

    return embed;
  }

  static createSuccessEmbed(title: string, description?: string): EmbedBuilder {
    const embed = new EmbedBuilder().setColor(this.COLORS.SUCCESS).setTitle(`✅ ${title}`);

    if (description) {
      embed.setDescription(description);
    }

    return embed;
  }

  static createInfoEmbed(title: string, description?: string): EmbedBuilder {
    const embed = new EmbedBuilder().setColor(this.COLORS.INFO).setTitle(`ℹ️ ${title}`);

    if (description) {
      embed.setDescription(description);
    }

    return embed;
  }

  static createCategoryEmbed(category: string, title: string, description?: string): EmbedBuilder {
    const embed = new EmbedBuilder()
      .setTitle(title)
      .setColor(ColorUtils.getCategoryColor(category))
      .setTimestamp();

    if (description) {
      embed.setDescription(description);
    }

    return embed;
  }

  static createMusicEmbed(title: string, description?: string): EmbedBuilder {
    return this.createCategoryEmbed('MUSIC', `🎵 ${title}`, description);
  }

  /**
   * Track card; `position` is the 1-based place in the queue
   */
  static createTrackEmbed(track: Track, title: string = '🎵 Tocando Agora', position?: number): EmbedBuilder {
    const embed = new EmbedBuilder()
      .setTitle(title)
      .setDescription(`**[${track.displayTitle}](${track.link})**`)
      .setColor(THEME_COLORS.MUSIC)
      .addFields(
        { name: '⏱️ Duração', value: track.durationString, inline: true },
        { name: '🔗 Fonte', value: SOURCE_LABELS[track.source] ?? FormatUtils.capitalize(track.source), inline: true },
      )
      .setFooter({ text: `Solicitado por ${track.requesterName}` });

    if (position !== undefined) {
      embed.addFields({ name: '📍 Posição na Fila', value: `#${position}`, inline: true });
    }

    if (track.thumbnail) {
      embed.setThumbnail(track.thumbnail);
    }

    return embed;
  }

  /**
   * Queue listing. Upcoming tracks are numbered by their absolute queue
   * position, the same numbers /remove, /move and /jump take.
   */
  static createQueueEmbed(queue: MusicQueue, page: number = 1, perPage: number = QUEUE_PAGE_SIZE): QueuePage {
    const embed = new EmbedBuilder().setTitle('📜 Fila de Música').setColor(THEME_COLORS.INFO);

    if (queue.isEmpty) {
      embed.setDescription('A fila está vazia. Use `/play` para adicionar músicas!');
      return { embed, page: 1, totalPages: 1 };
    }

    const current = queue.current;
    if (current) {
      embed.addFields({
        name: '🎵 Tocando Agora',
        value: `**[${current.displayTitle}](${current.link})** [${current.durationString}]`,
        inline: false,
      });
    }

    const upcoming = queue.upcoming;
    const totalPages = Math.max(1, Math.ceil(upcoming.length / perPage));
    const safePage = Math.max(1, Math.min(Math.floor(page), totalPages));
    const start = (safePage - 1) * perPage;
    const firstPosition = queue.currentIndex + 2;

    const lines = upcoming
      .slice(start, start + perPage)
      .map((track, offset) => `\`${firstPosition + start + offset}.\` [${track.displayTitle}](${track.link}) [${track.durationString}]`);

    if (lines.length > 0) {
      embed.addFields({
        name: `📋 Próximas (${upcoming.length})`,
        value: lines.join('\n'),
        inline: false,
      });
    }

    embed.setFooter({
      text: `Página ${safePage}/${totalPages} • ${queue.size} músicas • ${FormatUtils.formatQueueLength(queue.totalDuration)} • Loop: ${LOOP_MODE_EMOJIS[queue.loopMode]}`,
    });

    return { embed, page: safePage, totalPages };
  }

  static createSearchEmbed(tracks: readonly Track[], query: string): EmbedBuilder {
    const embed = new EmbedBuilder()
      .setTitle(`🔍 Resultados para: ${FormatUtils.truncate(query, 200)}`)
      .setColor(THEME_COLORS.INFO);

    if (tracks.length === 0) {
      return embed.setDescription('Nenhum resultado encontrado. Tente outra busca.');
    }

    const lines = tracks.map((track, index) => `\`${index + 1}.\` **${track.displayTitle}** [${track.durationString}]`);
    return embed
      .setDescription(lines.join('\n'))
      .setFooter({ text: 'Escolha um número abaixo ou cancele' });
  }
}
