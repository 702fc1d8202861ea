import { SlashCommandBuilder, ChatInputCommandInteraction, MessageFlags } from 'discord.js';
import { Command, CommandCategory } from '../../types/command';
import { BotContext } from '../../types/client';
import { CommandDeployer } from '../../services/command-deployer.service';
import { BaseCommand } from '../../utils/base-command.util';
import { EmbedUtils } from '../../utils/embed-builder.util';
import { ErrorHandler } from '../../utils/error-handler.util';

/**
 * Sync command - Redeploys the slash commands (owner only)
 */
class SyncCommand extends BaseCommand {
  constructor() {
    super({
      data: new SlashCommandBuilder()
        .setName('sync')
        .setDescription('🔄 Sincroniza os comandos slash (apenas dono)')
        .addBooleanOption(option =>
          option
            .setName('guild_only')
            .setDescription('Sincronizar só neste servidor (mais rápido)')
            .setRequired(false),
        ),
      category: CommandCategory.ADMIN,
      cooldown: 30,
      ownerOnly: true,
    });
  }

  async execute(interaction: ChatInputCommandInteraction, context: BotContext): Promise<void> {
    if (!(await this.requireOwner(interaction, context))) {
      return;
    }

    const guildOnly = interaction.options.getBoolean('guild_only') ?? false;
    const guildId = guildOnly ? interaction.guildId ?? undefined : undefined;

    await interaction.deferReply({ flags: MessageFlags.Ephemeral });

    const clientId = context.config.clientId || context.client.user?.id;
    if (!clientId) {
      await this.replyError(interaction, 'ID da aplicação desconhecido. Defina DISCORD_CLIENT_ID.');
      return;
    }

    try {
      const deployer = new CommandDeployer(context.config.discordToken, clientId);
      const count = await deployer.deploy(context.commands.all(), guildId);
      const scope = guildId ? 'neste servidor' : 'globalmente';
      await this.safeReply(interaction, {
        embeds: [EmbedUtils.createSuccessEmbed('Comandos sincronizados', `${count} comandos sincronizados ${scope}.`)],
      });
    } catch (error) {
      await this.replyError(interaction, 'Falha ao sincronizar', ErrorHandler.toError(error).message);
    }
  }
}

const command: Command = new SyncCommand();

export default command;
