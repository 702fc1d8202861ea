import { Client, Guild } from 'discord.js';
import { MusicService } from '../services/music.service';
import { Logger, LogCategory } from '../utils/logger';
import { ErrorHandler } from '../utils/error-handler.util';

/**
 * Handles Discord guild-related events
 */
export class GuildEvents {
  private client: Client;
  private music: MusicService;
  private logger: Logger;

  constructor(client: Client, music: MusicService, logger?: Logger) {
    this.client = client;
    this.music = music;
    this.logger = logger ?? new Logger();
    this.setupEventListeners();
  }

  private setupEventListeners(): void {
    this.client.on('guildCreate', guild => this.handleGuildCreate(guild));
    this.client.on('guildDelete', guild => {
      this.handleGuildDelete(guild).catch(error => {
        this.logger.error('Failed to clean up after leaving guild', {
          category: LogCategory.EVENT,
          guildId: guild.id,
          error: ErrorHandler.toError(error),
        });
      });
    });
  }

  private handleGuildCreate(guild: Guild): void {
    this.logger.info(`Joined guild: ${guild.name}`, { category: LogCategory.EVENT, guildId: guild.id });
  }

  /**
   * The bot was removed from a guild: drop its player and stored queue
   */
  public async handleGuildDelete(guild: Guild): Promise<void> {
    this.logger.info(`Left guild: ${guild.name ?? guild.id}`, { category: LogCategory.EVENT, guildId: guild.id });
    await this.music.removeGuild(guild.id);
  }
}
