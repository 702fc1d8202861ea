import { SlashCommandBuilder, ChatInputCommandInteraction, version as discordJsVersion } from 'discord.js';
import { Command, CommandCategory } from '../../types/command';
import { BotContext } from '../../types/client';
import { BaseCommand } from '../../utils/base-command.util';
import { EmbedUtils } from '../../utils/embed-builder.util';
import { FormatUtils } from '../../utils/format.util';

/**
 * Info command - Uptime, reach and runtime details
 */
class InfoCommand extends BaseCommand {
  constructor() {
    super({
      data: new SlashCommandBuilder().setName('info').setDescription('ℹ️ Mostra informações sobre o bot'),
      category: CommandCategory.GENERAL,
      cooldown: 5,
    });
  }

  async execute(interaction: ChatInputCommandInteraction, context: BotContext): Promise<void> {
    const { client } = context;

    const embed = EmbedUtils.createCategoryEmbed('GENERAL', '🎵 Informações do Bot')
      .addFields(
        {
          name: '📊 Estatísticas',
          value: [
            `**Servidores:** ${client.guilds.cache.size}`,
            `**Players ativos:** ${context.music.playerCount}`,
            `**Uptime:** ${FormatUtils.formatDuration(client.uptime ?? 0)}`,
            `**Latência:** ${Math.max(0, Math.round(client.ws.ping))}ms`,
          ].join('\n'),
          inline: true,
        },
        {
          name: '⚙️ Sistema',
          value: [
            `**Node.js:** ${process.version}`,
            `**discord.js:** ${discordJsVersion}`,
            `**Armazenamento:** ${context.database.backend}`,
          ].join('\n'),
          inline: true,
        },
        {
          name: '🎶 Recursos',
          value: '• YouTube e SoundCloud\n• Gerenciamento de fila\n• Repetição e embaralhamento\n• Controle de volume\n• Playlists pessoais',
          inline: false,
        },
      )
      .setFooter({ text: 'Use /help para ver a lista de comandos' });

    if (client.user) {
      embed.setThumbnail(client.user.displayAvatarURL());
    }

    await this.safeReply(interaction, { embeds: [embed] });
  }
}

const command: Command = new InfoCommand();

export default command;
