import { SlashCommandBuilder, ChatInputCommandInteraction } from 'discord.js';
import { Command, CommandCategory } from '../../types/command';
import { BotContext } from '../../types/client';
import { LoopMode, parseLoopMode } from '../../music/queue';
import { BaseCommand } from '../../utils/base-command.util';
import { EmbedUtils, LOOP_MODE_EMOJIS } from '../../utils/embed-builder.util';

const LOOP_MODE_LABELS: Record<LoopMode, string> = {
  [LoopMode.OFF]: 'Desligado',
  [LoopMode.ONE]: 'Repetir música',
  [LoopMode.ALL]: 'Repetir fila',
};

/**
 * Loop command - Sets the repeat mode
 */
class LoopCommand extends BaseCommand {
  constructor() {
    super({
      data: new SlashCommandBuilder()
        .setName('loop')
        .setDescription('🔁 Define o modo de repetição')
        .addStringOption(option =>
          option
            .setName('mode')
            .setDescription('Modo de repetição')
            .setRequired(true)
            .addChoices(
              { name: LOOP_MODE_LABELS[LoopMode.OFF], value: LoopMode.OFF },
              { name: LOOP_MODE_LABELS[LoopMode.ONE], value: LoopMode.ONE },
              { name: LOOP_MODE_LABELS[LoopMode.ALL], value: LoopMode.ALL },
            ),
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

    const mode = parseLoopMode(control.interaction.options.getString('mode', true));
    await control.player.setLoop(mode);

    await this.safeReply(control.interaction, {
      embeds: [EmbedUtils.createMusicEmbed('Modo de repetição', `${LOOP_MODE_EMOJIS[mode]} **${LOOP_MODE_LABELS[mode]}**`)],
    });
  }
}

const command: Command = new LoopCommand();

export default command;
