import { SlashCommandBuilder, ChatInputCommandInteraction } from 'discord.js';
import { Command, CommandCategory } from '../../types/command';
import { BotContext } from '../../types/client';
import { BaseCommand } from '../../utils/base-command.util';
import { EmbedUtils } from '../../utils/embed-builder.util';

/**
 * Skip command - Moves on to the next track
 */
class SkipCommand extends BaseCommand {
  constructor() {
    super({
      data: new SlashCommandBuilder().setName('skip').setDescription('⏭️ Pula para a próxima música'),
      category: CommandCategory.MUSIC,
      cooldown: 2,
    });
  }

  async execute(interaction: ChatInputCommandInteraction, context: BotContext): Promise<void> {
    const control = await this.resolvePlayerControl(interaction, context);
    if (!control) {
      return;
    }

    const skipped = control.player.currentTrack;
    if (!skipped) {
      await this.replyError(control.interaction, 'Nada está tocando no momento.');
      return;
    }

    await control.interaction.deferReply();
    const next = await control.player.skip();

    const description = next
      ? `⏭️ Pulada: **${skipped.displayTitle}**\n🎵 Agora: **${next.displayTitle}**`
      : `⏭️ Pulada: **${skipped.displayTitle}**\nNão há mais músicas na fila.`;

    await this.safeReply(control.interaction, {
      embeds: [EmbedUtils.createMusicEmbed('Música pulada', description)],
    });
  }
}

const command: Command = new SkipCommand();

export default command;
