import {
  Collection,
  ChatInputCommandInteraction,
  AutocompleteInteraction,
  MessageFlags,
} from 'discord.js';
import { Command, CommandCategory, CooldownCheck } from '../types/command';
import { BotContext } from '../types/client';
import { Logger } from '../utils/logger';
import { RateLimiter } from '../utils/rate-limiter';
import { ErrorHandler } from '../utils/error-handler.util';
import { isBotOwner } from '../utils/base-command.util';

export interface CommandStats {
  totalCommands: number;
  categories: Record<string, number>;
  cooldowns: number;
}

/**
 * Command Manager - Holds the slash commands and dispatches interactions to them
 */
export class CommandManager {
  private logger: Logger;
  public commands: Collection<string, Command>;
  public cooldowns: Collection<string, Collection<string, number>>;
  private rateLimiter: RateLimiter;

  constructor(commands: readonly Command[], rateLimiter: RateLimiter, logger?: Logger) {
    this.logger = logger ?? new Logger();
    this.commands = new Collection();
    this.cooldowns = new Collection();
    this.rateLimiter = rateLimiter;

    for (const command of commands) {
      this.registerCommand(command);
    }
    this.logger.info(`Loaded ${this.commands.size} slash commands`);
  }

  private registerCommand(command: Command): void {
    if (this.commands.has(command.data.name)) {
      this.logger.warn(`Duplicate command name ignored: ${command.data.name}`);
      return;
    }
    this.commands.set(command.data.name, command);
    this.logger.debug(`Registered slash command: ${command.data.name}`);
  }

  public getCommand(name: string): Command | null {
    return this.commands.get(name) ?? null;
  }

  public all(): Command[] {
    return [...this.commands.values()];
  }

  /**
   * Check if user is on cooldown; a miss starts a new cooldown
   */
  public isOnCooldown(commandName: string, userId: string, now: number = Date.now()): CooldownCheck {
    const command = this.commands.get(commandName);
    if (!command || !command.cooldown) {
      return { onCooldown: false };
    }

    let timestamps = this.cooldowns.get(commandName);
    if (!timestamps) {
      timestamps = new Collection();
      this.cooldowns.set(commandName, timestamps);
    }

    const cooldownAmount = command.cooldown * 1000;
    const lastUsed = timestamps.get(userId);

    if (lastUsed !== undefined && now < lastUsed + cooldownAmount) {
      return { onCooldown: true, timeLeft: (lastUsed + cooldownAmount - now) / 1000 };
    }

    timestamps.set(userId, now);
    return { onCooldown: false };
  }

  public getCommandsByCategory(category: CommandCategory): Command[] {
    return this.commands.filter(command => command.category === category).map(cmd => cmd);
  }

  public getStats(): CommandStats {
    const categories: Record<string, number> = {};
    this.commands.forEach(command => {
      categories[command.category] = (categories[command.category] ?? 0) + 1;
    });

    return {
      totalCommands: this.commands.size,
      categories,
      cooldowns: this.cooldowns.size,
    };
  }

  /**
   * Handle slash command interactions
   */
  public async handleSlashCommand(interaction: ChatInputCommandInteraction, context: BotContext): Promise<void> {
    const command = this.getCommand(interaction.commandName);
    if (!command) {
      this.logger.warn(`Unknown command received: ${interaction.commandName}`);
      return;
    }

    const startedAt = Date.now();

    try {
      const rateLimit = this.rateLimiter.checkLimit(interaction.user.id);
      if (!rateLimit.allowed) {
        await interaction.reply({
          content: `🚫 **Rate limit atingido!**\n⏰ Aguarde ${rateLimit.retryAfterSeconds} segundos antes de usar comandos novamente.`,
          flags: MessageFlags.Ephemeral,
        });
        return;
      }

      if (command.ownerOnly && !isBotOwner(interaction.user.id, context.config.botOwnerId)) {
        await interaction.reply({
          content: '❌ Este comando é restrito ao dono do bot.',
          flags: MessageFlags.Ephemeral,
        });
        return;
      }

      const cooldownCheck = this.isOnCooldown(command.data.name, interaction.user.id);
      if (cooldownCheck.onCooldown) {
        await interaction.reply({
          content: `⏰ Você deve aguardar ${Math.ceil(cooldownCheck.timeLeft ?? 0)} segundos antes de usar este comando novamente.`,
          flags: MessageFlags.Ephemeral,
        });
        return;
      }

      await command.execute(interaction, context);
      this.logger.command(command.data.name, interaction.user.id, interaction.guildId ?? undefined, Date.now() - startedAt);
    } catch (error) {
      this.logger.command(
        command.data.name,
        interaction.user.id,
        interaction.guildId ?? undefined,
        Date.now() - startedAt,
        ErrorHandler.toError(error),
      );
      await this.sendFailure(interaction);
    }
  }

  /**
   * Handle autocomplete interactions
   */
  public async handleAutocomplete(interaction: AutocompleteInteraction, context: BotContext): Promise<void> {
    const command = this.getCommand(interaction.commandName);
    if (!command || !command.autocomplete) {
      return;
    }

    try {
      await command.autocomplete(interaction, context);
    } catch (error) {
      this.logger.error(`Error handling autocomplete for ${command.data.name}`, {
        commandName: command.data.name,
        error: ErrorHandler.toError(error),
      });
    }
  }

  public shutdown(): void {
    this.rateLimiter.destroy();
    this.logger.info('Command manager shut down');
  }

  private async sendFailure(interaction: ChatInputCommandInteraction): Promise<void> {
    const errorMessage = '❌ Ocorreu um erro ao executar este comando!';
    try {
      if (interaction.replied || interaction.deferred) {
        await interaction.followUp({ content: errorMessage, flags: MessageFlags.Ephemeral });
      } else {
        await interaction.reply({ content: errorMessage, flags: MessageFlags.Ephemeral });
      }
    } catch (replyError) {
      this.logger.error('Failed to send error message to user', {
        commandName: interaction.commandName,
        error: ErrorHandler.toError(replyError),
      });
    }
  }
}
