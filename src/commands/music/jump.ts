import { SlashCommandBuilder, ChatInputCommandInteraction } from 'discord.js';
import { Command, CommandCategory } from '../../types/command';
import { BotContext } from '../../types/client';
import { BaseCommand } from '../../utils/base-command.util';
import { EmbedUtils } from '../../utils/embed-builder.util';

/**
 * Jump command - Plays the track at a 1-based queue position
 */
class JumpCommand extends BaseCommand {
  constructor() {
    super({
      data: new SlashCommandBuilder()
        .setName('jump')
        .setDescription('⤵️ Pula para uma posição da fila')
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

    const position = control.interaction.options.getInteger('position', true);
    if (position < 1 || position > control.player.queue.size) {
      await this.replyError(control.interaction, `Posição inválida. A fila tem ${control.player.queue.size} músicas.`);
      return;
    }

    await control.interaction.deferReply();
    const track = await control.player.jump(position - 1);

    if (!track) {
      await this.replyError(control.interaction, 'Não foi possível tocar a música dessa posição.');
      return;
    }

    await this.safeReply(control.interaction, {
      embeds: [EmbedUtils.createMusicEmbed('Pulando', `⤵️ **${track.displayTitle}** (posição ${position})`)],
    });
  }
}

const command: Command = new JumpCommand();

export default command;
