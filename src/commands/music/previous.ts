import { SlashCommandBuilder, ChatInputCommandInteraction } from 'discord.js';
import { Command, CommandCategory } from '../../types/command';
import { BotContext } from '../../types/client';
import { BaseCommand } from '../../utils/base-command.util';
import { EmbedUtils } from '../../utils/embed-builder.util';

/**
 * Previous command - Goes back one track
 */
class PreviousCommand extends BaseCommand {
  constructor() {
    super({
      data: new SlashCommandBuilder().setName('previous').setDescription('⏮️ Volta para a música anterior'),
      category: CommandCategory.MUSIC,
      cooldown: 2,
    });
  }

  async execute(interaction: ChatInputCommandInteraction, context: BotContext): Promise<void> {
    const control = await this.resolvePlayerControl(interaction, context);
    if (!control) {
      return;
    }

    await control.interaction.deferReply();
    const track = await control.player.previous();

    if (!track) {
      await this.replyError(control.interaction, 'Não há música anterior na fila.');
      return;
    }

    await this.safeReply(control.interaction, {
      embeds: [EmbedUtils.createMusicEmbed('Música anterior', `⏮️ **${track.displayTitle}**`)],
    });
  }
}

const command: Command = new PreviousCommand();

export default command;
