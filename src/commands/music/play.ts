import { SlashCommandBuilder, ChatInputCommandInteraction } from 'discord.js';
import { Command, CommandCategory } from '../../types/command';
import { BotContext } from '../../types/client';
import { BaseCommand } from '../../utils/base-command.util';
import { EmbedUtils } from '../../utils/embed-builder.util';

/**
 * Play command - Queues a URL, playlist or search result and starts playback
 */
class PlayCommand extends BaseCommand {
  constructor() {
    super({
      data: new SlashCommandBuilder()
        .setName('play')
        .setDescription('🎵 Toca uma música ou playlist')
        .addStringOption(option =>
          option
            .setName('query')
            .setDescription('URL do YouTube/SoundCloud ou termo de busca')
            .setRequired(true),
        ),
      category: CommandCategory.MUSIC,
      cooldown: 3,
    });
  }

  async execute(interaction: ChatInputCommandInteraction, context: BotContext): Promise<void> {
    const guildInteraction = await this.requireGuild(interaction);
    if (!guildInteraction) {
      return;
    }

    const channel = await this.requireVoiceChannel(guildInteraction);
    if (!channel) {
      return;
    }

    const query = guildInteraction.options.getString('query', true);
    await guildInteraction.deferReply();

    const player = await context.music.getPlayer(guildInteraction.guildId);
    this.rememberChannel(guildInteraction, context);

    if (!(await this.ensureConnected(guildInteraction, player, channel))) {
      return;
    }

    this.logger.debug(`🔍 Searching for: "${query}"`, { guildId: guildInteraction.guildId });
    const tracks = await context.music.extractor.extract(
      query,
      guildInteraction.user.id,
      guildInteraction.member.displayName,
    );

    if (tracks.length === 0) {
      await this.replyError(
        guildInteraction,
        'Nenhum resultado encontrado',
        `Nada encontrado para: \`${query}\`\nVerifique se a URL é válida ou tente outra busca.`,
      );
      return;
    }

    const added = await player.addTracks(tracks);
    if (added === 0) {
      await this.replyError(guildInteraction, 'A fila está cheia! Remova algumas músicas primeiro.');
      return;
    }

    if (!player.isPlaying && !player.isPaused) {
      await player.play();
    }

    if (tracks.length === 1) {
      const [track] = tracks;
      const position = player.queue.tracks.indexOf(track) + 1;
      await this.safeReply(guildInteraction, {
        embeds: [EmbedUtils.createTrackEmbed(track, '✅ Adicionado à Fila', position > 0 ? position : undefined)],
      });
      return;
    }

    const skipped = tracks.length - added;
    const description =
      `**${added}** músicas adicionadas à fila.\nA fila agora tem **${player.queue.size}** músicas.` +
      (skipped > 0 ? `\n⚠️ ${skipped} não couberam na fila.` : '');
    await this.safeReply(guildInteraction, {
      embeds: [EmbedUtils.createSuccessEmbed('Playlist adicionada', description)],
    });
  }
}

const command: Command = new PlayCommand();

export default command;
