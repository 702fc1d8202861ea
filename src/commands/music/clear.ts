import { SlashCommandBuilder, ChatInputCommandInteraction } from 'discord.js';
import { Command, CommandCategory } from '../../types/command';
import { BotContext } from '../../types/client';
import { BaseCommand } from '../../utils/base-command.util';
import { EmbedUtils } from '../../utils/embed-builder.util';

/**
 * Clear command - Empties the upcoming tracks, keeping the current one (DJ only)
 */
class ClearCommand extends BaseCommand {
  constructor() {
    super({
      data: new SlashCommandBuilder().setName('clear').setDescription('🧹 Limpa a fila (mantém a música atual)'),
      category: CommandCategory.MUSIC,
      cooldown: 3,
    });
  }

  async execute(interaction: ChatInputCommandInteraction, context: BotContext): Promise<void> {
    const control = await this.resolvePlayerControl(interaction, context);
    if (!control || !(await this.requireDj(control.interaction))) {
      return;
    }

    const removed = await control.player.clearQueue();

    await this.safeReply(control.interaction, {
      embeds: [EmbedUtils.createSuccessEmbed('Fila limpa', `🗑️ ${removed} músicas removidas.`)],
    });
  }
}

const command: Command = new ClearCommand();

export default command;
