import { SlashCommandBuilder, ChatInputCommandInteraction, EmbedBuilder } from 'discord.js';
import { Command, CommandCategory } from '../../types/command';
import { BotContext } from '../../types/client';
import { THEME_COLORS } from '../../constants/colors';
import { BaseCommand } from '../../utils/base-command.util';

export function describeLatency(latencyMs: number): { label: string; color: number } {
  if (latencyMs < 100) {
    return { label: 'Excelente', color: THEME_COLORS.SUCCESS };
  }
  if (latencyMs < 200) {
    return { label: 'Boa', color: THEME_COLORS.WARNING };
  }
  return { label: 'Ruim', color: THEME_COLORS.ERROR };
}

/**
 * Ping command - Gateway latency
 */
class PingCommand extends BaseCommand {
  constructor() {
    super({
      data: new SlashCommandBuilder().setName('ping').setDescription('🏓 Mostra a latência do bot'),
      category: CommandCategory.GENERAL,
      cooldown: 5,
    });
  }

  async execute(interaction: ChatInputCommandInteraction, context: BotContext): Promise<void> {
    // ws.ping is -1 until the first heartbeat
    const latency = Math.max(0, Math.round(context.client.ws.ping));
    const { label, color } = describeLatency(latency);

    const embed = new EmbedBuilder()
      .setTitle('🏓 Pong!')
      .setDescription(`**Latência:** ${latency}ms (${label})`)
      .setColor(color);

    await this.safeReply(interaction, { embeds: [embed] });
  }
}

const command: Command = new PingCommand();

export default command;
