import { SlashCommandBuilder, ChatInputCommandInteraction } from 'discord.js';
import { Command, CommandCategory } from '../../types/command';
import { BotContext } from '../../types/client';
import { MAX_VOLUME } from '../../music/player';
import { BaseCommand } from '../../utils/base-command.util';
import { EmbedUtils } from '../../utils/embed-builder.util';

export function volumeEmoji(level: number): string {
  if (level === 0) {
    return '🔇';
  }
  if (level < 50) {
    return '🔈';
  }
  if (level < 100) {
    return '🔉';
  }
  return '🔊';
}

/**
 * Volume command - Sets the playback volume (0-200%)
 */
class VolumeCommand extends BaseCommand {
  constructor() {
    super({
      data: new SlashCommandBuilder()
        .setName('volume')
        .setDescription('🔊 Ajusta o volume da reprodução')
        .addIntegerOption(option =>
          option
            .setName('level')
            .setDescription(`Volume (0-${MAX_VOLUME})`)
            .setMinValue(0)
            .setMaxValue(MAX_VOLUME)
            .setRequired(true),
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

    const level = control.interaction.options.getInteger('level', true);
    if (level < 0 || level > MAX_VOLUME) {
      await this.replyError(control.interaction, `O volume deve estar entre 0 e ${MAX_VOLUME}.`);
      return;
    }

    const applied = await control.player.setVolume(level);

    await this.safeReply(control.interaction, {
      embeds: [EmbedUtils.createMusicEmbed('Volume', `${volumeEmoji(applied)} Volume ajustado para **${applied}%**`)],
    });
  }
}

const command: Command = new VolumeCommand();

export default command;
