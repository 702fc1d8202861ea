import { SlashCommandBuilder, ChatInputCommandInteraction } from 'discord.js';
import { Command, CommandCategory } from '../../types/command';
import { BotContext } from '../../types/client';
import { BaseCommand } from '../../utils/base-command.util';
import { EmbedUtils, LOOP_MODE_EMOJIS } from '../../utils/embed-builder.util';
import { FormatUtils } from '../../utils/format.util';

/**
 * Now playing command - Details of the current track
 */
class NowPlayingCommand extends BaseCommand {
  constructor() {
    super({
      data: new SlashCommandBuilder().setName('nowplaying').setDescription('🎶 Mostra a música atual'),
      category: CommandCategory.MUSIC,
      cooldown: 3,
    });
  }

  async execute(interaction: ChatInputCommandInteraction, context: BotContext): Promise<void> {
    const guildInteraction = await this.requireGuild(interaction);
    if (!guildInteraction) {
      return;
    }

    const player = await context.music.getPlayer(guildInteraction.guildId);
    const track = player.currentTrack;

    if (!track) {
      await this.safeReply(guildInteraction, {
        embeds: [EmbedUtils.createInfoEmbed('Nada está tocando no momento.')],
      });
      return;
    }

    const embed = EmbedUtils.createTrackEmbed(track, '🎵 Tocando Agora');
    const status = player.isPaused ? '⏸️ Pausado' : player.isPlaying ? '▶️ Tocando' : '⏹️ Parado';

    embed.addFields(
      { name: 'Status', value: status, inline: true },
      { name: 'Volume', value: `🔊 ${player.volume}%`, inline: true },
      { name: 'Loop', value: `${LOOP_MODE_EMOJIS[player.queue.loopMode]} ${FormatUtils.capitalize(player.queue.loopMode)}`, inline: true },
    );

    if (!track.isLive) {
      const position = Math.min(player.position, track.duration);
      embed.addFields({
        name: 'Progresso',
        value: `${FormatUtils.formatClock(position)} ${FormatUtils.formatProgressBar(position, track.duration, 15)} ${track.durationString}`,
        inline: false,
      });
    }

    await this.safeReply(guildInteraction, { embeds: [embed] });
  }
}

const command: Command = new NowPlayingCommand();

export default command;
