import {
  SlashCommandBuilder,
  ChatInputCommandInteraction,
  AutocompleteInteraction,
  MessageFlags,
} from 'discord.js';
import { Command, CommandCategory } from '../../types/command';
import { BotContext } from '../../types/client';
import { BaseCommand } from '../../utils/base-command.util';
import { EmbedUtils } from '../../utils/embed-builder.util';

const CATEGORY_LABELS: Record<CommandCategory, string> = {
  [CommandCategory.MUSIC]: '🎶 Música',
  [CommandCategory.PLAYLIST]: '📂 Playlists',
  [CommandCategory.GENERAL]: '📋 Geral',
  [CommandCategory.ADMIN]: '🛡️ Admin',
};

const CATEGORY_ORDER: readonly CommandCategory[] = [
  CommandCategory.MUSIC,
  CommandCategory.PLAYLIST,
  CommandCategory.GENERAL,
  CommandCategory.ADMIN,
];

/**
 * Help command - Shows all available commands organized by category
 */
class HelpCommand extends BaseCommand {
  constructor() {
    super({
      data: new SlashCommandBuilder()
        .setName('help')
        .setDescription('❓ Mostra todos os comandos disponíveis')
        .addStringOption(option =>
          option
            .setName('command')
            .setDescription('Comando específico para obter ajuda detalhada')
            .setRequired(false)
            .setAutocomplete(true),
        ),
      category: CommandCategory.GENERAL,
      cooldown: 5,
    });
  }

  async execute(interaction: ChatInputCommandInteraction, context: BotContext): Promise<void> {
    const specificCommand = interaction.options.getString('command');

    if (specificCommand) {
      await this.handleSpecificCommand(interaction, context, specificCommand);
      return;
    }

    const embed = EmbedUtils.createCategoryEmbed(
      'GENERAL',
      '❓ Central de Ajuda',
      'Use `/help <comando>` para detalhes de um comando.',
    );

    for (const category of CATEGORY_ORDER) {
      const commands = context.commands.getCommandsByCategory(category);
      if (commands.length === 0) {
        continue;
      }
      embed.addFields({
        name: CATEGORY_LABELS[category],
        value: commands.map(command => `\`/${command.data.name}\``).join(' '),
        inline: false,
      });
    }

    await interaction.reply({ embeds: [embed], flags: MessageFlags.Ephemeral });
  }

  async autocomplete(interaction: AutocompleteInteraction, context: BotContext): Promise<void> {
    const focusedValue = interaction.options.getFocused().toLowerCase();

    const choices = context.commands
      .all()
      .filter(command => command.data.name.includes(focusedValue))
      .slice(0, 25)
      .map(command => ({
        name: `/${command.data.name} - ${command.data.description}`.slice(0, 100),
        value: command.data.name,
      }));

    await interaction.respond(choices);
  }

  private async handleSpecificCommand(
    interaction: ChatInputCommandInteraction,
    context: BotContext,
    commandName: string,
  ): Promise<void> {
    const command = context.commands.getCommand(commandName.replace(/^\//, '').toLowerCase());

    if (!command) {
      await this.replyError(
        interaction,
        'Comando Não Encontrado',
        `O comando \`${commandName}\` não existe.\nUse \`/help\` para ver todos os comandos disponíveis.`,
      );
      return;
    }

    const embed = EmbedUtils.createInfoEmbed(`Ajuda: /${command.data.name}`, command.data.description).addFields(
      { name: 'Categoria', value: CATEGORY_LABELS[command.category], inline: true },
      { name: 'Cooldown', value: `${command.cooldown || 0} segundos`, inline: true },
    );

    await interaction.reply({ embeds: [embed], flags: MessageFlags.Ephemeral });
  }
}

const command: Command = new HelpCommand();

export default command;
