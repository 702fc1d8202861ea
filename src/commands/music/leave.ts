import { SlashCommandBuilder, ChatInputCommandInteraction } from 'discord.js';
import { Command, CommandCategory } from '../../types/command';
import { BotContext } from '../../types/client';
import { BaseCommand } from '../../utils/base-command.util';
import { EmbedUtils } from '../../utils/embed-builder.util';

/**
 * Leave command - Disconnects from voice, keeping the queue for later
 */
class LeaveCommand extends BaseCommand {
  constructor() {
    super({
      data: new SlashCommandBuilder().setName('leave').setDescription('👋 Sai do canal de voz'),
      category: CommandCategory.MUSIC,
      cooldown: 5,
    });
  }

  async execute(interaction: ChatInputCommandInteraction, context: BotContext): Promise<void> {
    const control = await this.resolvePlayerControl(interaction, context);
    if (!control) {
      return;
    }

    if (!control.player.isConnected) {
      await this.replyError(control.interaction, 'Não estou em um canal de voz.');
      return;
    }

    await control.player.disconnect();

    await this.safeReply(control.interaction, {
      embeds: [EmbedUtils.createInfoEmbed('Desconectado', '👋 Saí do canal de voz.')],
    });
  }
}

const command: Command = new LeaveCommand();

export default command;
