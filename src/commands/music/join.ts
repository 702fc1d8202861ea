import { SlashCommandBuilder, ChatInputCommandInteraction } from 'discord.js';
import { Command, CommandCategory } from '../../types/command';
import { BotContext } from '../../types/client';
import { BaseCommand, toChannelRef } from '../../utils/base-command.util';
import { EmbedUtils } from '../../utils/embed-builder.util';

/**
 * Join command - Connects to (or moves into) the caller's voice channel
 */
class JoinCommand extends BaseCommand {
  constructor() {
    super({
      data: new SlashCommandBuilder().setName('join').setDescription('🔗 Entra no seu canal de voz'),
      category: CommandCategory.MUSIC,
      cooldown: 5,
    });
  }

  async execute(interaction: ChatInputCommandInteraction, context: BotContext): Promise<void> {
    const guildInteraction = await this.requireGuild(interaction);
    if (!guildInteraction) {
      return;
    }

    const channel = await this.requireVoiceChannel(guildInteraction);
    if (!channel) {
      return;
    }

    await guildInteraction.deferReply();
    const player = await context.music.getPlayer(guildInteraction.guildId);
    this.rememberChannel(guildInteraction, context);

    if (!(await player.connect(toChannelRef(channel)))) {
      await this.replyError(guildInteraction, 'Não foi possível entrar no canal de voz.');
      return;
    }

    await this.safeReply(guildInteraction, {
      embeds: [EmbedUtils.createSuccessEmbed('Conectado', `Entrei em <#${channel.id}>`)],
    });
  }
}

const command: Command = new JoinCommand();

export default command;
