import { SlashCommandBuilder, ChatInputCommandInteraction } from 'discord.js';
import { Command, CommandCategory } from '../../types/command';
import { BotContext } from '../../types/client';
import { BaseCommand } from '../../utils/base-command.util';
import { EmbedUtils } from '../../utils/embed-builder.util';

/**
 * Move command - Relocates a track inside the queue (1-based positions)
 */
class MoveCommand extends BaseCommand {
  constructor() {
    super({
      data: new SlashCommandBuilder()
        .setName('move')
        .setDescription('↕️ Move uma música para outra posição da fila')
        .addIntegerOption(option =>
          option.setName('from').setDescription('Posição atual').setMinValue(1).setRequired(true),
        )
        .addIntegerOption(option =>
          option.setName('to').setDescription('Nova posição').setMinValue(1).setRequired(true),
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

    const from = control.interaction.options.getInteger('from', true);
    const to = control.interaction.options.getInteger('to', true);
    const track = control.player.queue.tracks[from - 1];

    if (!track || !(await control.player.moveTrack(from - 1, to - 1))) {
      await this.replyError(
        control.interaction,
        `Posições inválidas. A fila tem ${control.player.queue.size} músicas.`,
      );
      return;
    }

    await this.safeReply(control.interaction, {
      embeds: [EmbedUtils.createSuccessEmbed('Música movida', `**${track.displayTitle}** agora está na posição **${to}**.`)],
    });
  }
}

const command: Command = new MoveCommand();

export default command;
