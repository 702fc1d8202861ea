import { SlashCommandBuilder, ChatInputCommandInteraction } from 'discord.js';
import { Command, CommandCategory } from '../../types/command';
import { BotContext } from '../../types/client';
import { BaseCommand } from '../../utils/base-command.util';
import { EmbedUtils } from '../../utils/embed-builder.util';
import { FormatUtils } from '../../utils/format.util';

/**
 * Seek command - Restarts the current track at a given second
 */
class SeekCommand extends BaseCommand {
  constructor() {
    super({
      data: new SlashCommandBuilder()
        .setName('seek')
        .setDescription('⏩ Vai para uma posição da música atual')
        .addIntegerOption(option =>
          option.setName('seconds').setDescription('Posição em segundos').setMinValue(0).setRequired(true),
        ),
      category: CommandCategory.MUSIC,
      cooldown: 3,
    });
  }

  async execute(interaction: ChatInputCommandInteraction, context: BotContext): Promise<void> {
    const control = await this.resolvePlayerControl(interaction, context);
    if (!control) {
      return;
    }

    const seconds = control.interaction.options.getInteger('seconds', true);
    if (!control.player.currentTrack) {
      await this.replyError(control.interaction, 'Nada está tocando no momento.');
      return;
    }

    await control.interaction.deferReply();

    if (!(await control.player.seek(seconds))) {
      await this.replyError(control.interaction, 'Não foi possível avançar. A posição pode ser inválida.');
      return;
    }

    await this.safeReply(control.interaction, {
      embeds: [EmbedUtils.createMusicEmbed('Posição alterada', `⏩ Avançado para **${FormatUtils.formatClock(seconds)}**`)],
    });
  }
}

const command: Command = new SeekCommand();

export default command;
