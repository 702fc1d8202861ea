import { SlashCommandBuilder, ChatInputCommandInteraction } from 'discord.js';
import { Command, CommandCategory } from '../../types/command';
import { BotContext } from '../../types/client';
import { BaseCommand } from '../../utils/base-command.util';
import { EmbedUtils } from '../../utils/embed-builder.util';

/**
 * Shuffle command - Reorders the upcoming tracks
 */
class ShuffleCommand extends BaseCommand {
  constructor() {
    super({
      data: new SlashCommandBuilder().setName('shuffle').setDescription('🔀 Embaralha a fila'),
      category: CommandCategory.MUSIC,
      cooldown: 3,
    });
  }

  async execute(interaction: ChatInputCommandInteraction, context: BotContext): Promise<void> {
    const control = await this.resolvePlayerControl(interaction, context);
    if (!control) {
      return;
    }

    if (control.player.queue.upcoming.length < 2) {
      await this.replyError(control.interaction, 'Não há músicas suficientes para embaralhar.');
      return;
    }

    await control.player.shuffle();

    await this.safeReply(control.interaction, {
      embeds: [EmbedUtils.createSuccessEmbed('Fila embaralhada', '🔀 As próximas músicas foram embaralhadas!')],
    });
  }
}

const command: Command = new ShuffleCommand();

export default command;
