import { SlashCommandBuilder, ChatInputCommandInteraction } from 'discord.js';
import { Command, CommandCategory } from '../../types/command';
import { BotContext } from '../../types/client';
import { BaseCommand } from '../../utils/base-command.util';
import { EmbedUtils } from '../../utils/embed-builder.util';

/**
 * Resume command - Continues a paused track
 */
class ResumeCommand extends BaseCommand {
  constructor() {
    super({
      data: new SlashCommandBuilder().setName('resume').setDescription('▶️ Retoma a reprodução'),
      category: CommandCategory.MUSIC,
      cooldown: 2,
    });
  }

  async execute(interaction: ChatInputCommandInteraction, context: BotContext): Promise<void> {
    const control = await this.resolvePlayerControl(interaction, context);
    if (!control) {
      return;
    }

    if (!control.player.isPaused || !(await control.player.resume())) {
      await this.replyError(control.interaction, 'A reprodução não está pausada.');
      return;
    }

    await this.safeReply(control.interaction, {
      embeds: [EmbedUtils.createMusicEmbed('Retomado', '▶️ Reprodução retomada.')],
    });
  }
}

const command: Command = new ResumeCommand();

export default command;
