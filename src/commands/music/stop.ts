import { SlashCommandBuilder, ChatInputCommandInteraction } from 'discord.js';
import { Command, CommandCategory } from '../../types/command';
import { BotContext } from '../../types/client';
import { BaseCommand } from '../../utils/base-command.util';
import { EmbedUtils } from '../../utils/embed-builder.util';

/**
 * Stop command - Halts playback and empties the queue (DJ only)
 */
class StopCommand extends BaseCommand {
  constructor() {
    super({
      data: new SlashCommandBuilder().setName('stop').setDescription('⏹️ Para a reprodução e limpa a fila'),
      category: CommandCategory.MUSIC,
      cooldown: 3,
    });
  }

  async execute(interaction: ChatInputCommandInteraction, context: BotContext): Promise<void> {
    const control = await this.resolvePlayerControl(interaction, context);
    if (!control || !(await this.requireDj(control.interaction))) {
      return;
    }

    await control.player.stop();

    await this.safeReply(control.interaction, {
      embeds: [EmbedUtils.createMusicEmbed('Parado', '⏹️ Reprodução parada e fila limpa.')],
    });
  }
}

const command: Command = new StopCommand();

export default command;
