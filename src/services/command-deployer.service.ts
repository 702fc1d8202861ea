import { REST, Routes } from 'discord.js';
import { Command } from '../types/command';
import { Logger } from '../utils/logger';
import { ErrorHandler } from '../utils/error-handler.util';

/**
 * The slice of the discord.js REST client used for deployment
 */
export interface CommandRestClient {
  put(route: `/${string}`, options: { body: unknown }): Promise<unknown>;
}

/**
 * Deploy commands to Discord API
 */
export class CommandDeployer {
  private readonly rest: CommandRestClient;
  private readonly logger: Logger;

  constructor(
    token: string,
    private readonly clientId: string,
    options: { rest?: CommandRestClient; logger?: Logger } = {},
  ) {
    this.rest = options.rest ?? new REST({ version: '10' }).setToken(token);
    this.logger = options.logger ?? new Logger();
  }

  /**
   * Deploy commands globally; returns how many Discord accepted
   */
  public async deployGlobal(commands: readonly Command[]): Promise<number> {
    this.logger.info('Started refreshing application (/) commands globally.');
    const count = await this.put(Routes.applicationCommands(this.clientId), commands, 'global');
    this.logger.info(`Successfully reloaded ${count} application (/) commands globally.`);
    return count;
  }

  /**
   * Deploy commands to a specific guild (faster for development)
   */
  public async deployGuild(guildId: string, commands: readonly Command[]): Promise<number> {
    this.logger.info(`Started refreshing application (/) commands for guild ${guildId}.`);
    const count = await this.put(Routes.applicationGuildCommands(this.clientId, guildId), commands, guildId);
    this.logger.info(`Successfully reloaded ${count} application (/) commands for guild ${guildId}.`);
    return count;
  }

  /**
   * Guild deployment when a guild is given, global otherwise
   */
  public async deploy(commands: readonly Command[], guildId?: string): Promise<number> {
    return guildId ? this.deployGuild(guildId, commands) : this.deployGlobal(commands);
  }

  /**
   * Remove every command from the given scope
   */
  public async clear(guildId?: string): Promise<void> {
    const route = guildId
      ? Routes.applicationGuildCommands(this.clientId, guildId)
      : Routes.applicationCommands(this.clientId);
    await this.put(route, [], guildId ?? 'global');
    this.logger.info(`Cleared application (/) commands for ${guildId ? `guild ${guildId}` : 'global scope'}.`);
  }

  private async put(route: `/${string}`, commands: readonly Command[], scope: string): Promise<number> {
    const body = commands.map(command => command.data.toJSON());
    try {
      const data = await this.rest.put(route, { body });
      return Array.isArray(data) ? data.length : body.length;
    } catch (error) {
      this.logger.error(`Failed to deploy ${scope} commands`, { error: ErrorHandler.toError(error) });
      throw error;
    }
  }
}
