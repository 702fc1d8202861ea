import { SlashCommandBuilder, ChatInputCommandInteraction } from 'discord.js';
import { Command, CommandCategory } from '../../types/command';
import { BotContext } from '../../types/client';
import { BaseCommand } from '../../utils/base-command.util';
import { EmbedUtils } from '../../utils/embed-builder.util';

/**
 * Queue command - Shows one page of the guild queue
 */
class QueueCommand extends BaseCommand {
  constructor() {
    super({
      data: new SlashCommandBuilder()
        .setName('queue')
        .setDescription('📜 Mostra a fila de músicas')
        .addIntegerOption(option =>
          option.setName('page').setDescription('Número da página').setMinValue(1).setRequired(false),
        ),
      category: CommandCategory.MUSIC,
      cooldown: 3,
    });
  }

  async execute(interaction: ChatInputCommandInteraction, context: BotContext): Promise<void> {
    const guildInteraction = await this.requireGuild(interaction);
    if (!guildInteraction) {
      return;
    }

    const page = guildInteraction.options.getInteger('page') ?? 1;
    const player = await context.music.getPlayer(guildInteraction.guildId);
    const { embed } = EmbedUtils.createQueueEmbed(player.queue, page);

    await this.safeReply(guildInteraction, { embeds: [embed] });
  }
}

const command: Command = new QueueCommand();

export default command;
