import { SlashCommandBuilder, ChatInputCommandInteraction } from 'discord.js';
import { Command, CommandCategory } from '../../types/command';
import { BotContext } from '../../types/client';
import { BaseCommand } from '../../utils/base-command.util';
import { EmbedUtils } from '../../utils/embed-builder.util';

/**
 * Pause command - Pauses the current track
 */
class PauseCommand extends BaseCommand {
  constructor() {
    super({
      data: new SlashCommandBuilder().setName('pause').setDescription('⏸️ Pausa a reprodução'),
      category: CommandCategory.MUSIC,
      cooldown: 2,
    });
  }

  async execute(interaction: ChatInputCommandInteraction, context: BotContext): Promise<void> {
    const control = await this.resolvePlayerControl(interaction, context);
    if (!control) {
      return;
    }

    if (!control.player.isPlaying || !(await control.player.pause())) {
      await this.replyError(control.interaction, 'Nada está tocando no momento.');
      return;
    }

    await this.safeReply(control.interaction, {
      embeds: [EmbedUtils.createMusicEmbed('Pausado', '⏸️ Reprodução pausada. Use `/resume` para continuar.')],
    });
  }
}

const command: Command = new PauseCommand();

export default command;
