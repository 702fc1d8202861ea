import { SlashCommandBuilder, ChatInputCommandInteraction } from 'discord.js';
import { Command, CommandCategory } from '../../types/command';
import { BotContext } from '../../types/client';
import { BaseCommand } from '../../utils/base-command.util';
import { EmbedUtils } from '../../utils/embed-builder.util';

/**
 * Remove command - Drops one track by its 1-based queue position
 */
class RemoveCommand extends BaseCommand {
  constructor() {
    super({
      data: new SlashCommandBuilder()
        .setName('remove')
        .setDescription('🗑️ Remove uma música da fila')
        .addIntegerOption(option =>
          option.setName('position').setDescription('Posição na fila (começa em 1)').setMinValue(1).setRequired(true),
        ),
      category: CommandCategory.MUSIC,
      cooldown: 2,
    });
  }

  async execute(interaction: ChatInputCommandInteraction, context: BotContext): Promise<void> {
    const control = await this.resolvePlayerControl(interaction, context);
    if (!control) {
      return;
    }

    const { player } = control;
    const index = control.interaction.options.getInteger('position', true) - 1;

    if (index < 0 || index >= player.queue.size) {
      await this.replyError(control.interaction, `Posição inválida. A fila tem ${player.queue.size} músicas.`);
      return;
    }

    if (index === player.queue.currentIndex && (player.isPlaying || player.isPaused)) {
      await this.replyError(control.interaction, 'Essa música está tocando agora. Use `/skip` para pulá-la.');
      return;
    }

    const removed = await player.removeTrack(index);
    if (!removed) {
      await this.replyError(control.interaction, 'Não foi possível remover a música.');
      return;
    }

    await this.safeReply(control.interaction, {
      embeds: [EmbedUtils.createSuccessEmbed('Música removida', `**${removed.displayTitle}**`)],
    });
  }
}

const command: Command = new RemoveCommand();

export default command;
