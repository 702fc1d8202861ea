import type { Client } from 'discord.js';
import type { BotConfig } from '../config/bot.config';
import type { DatabaseService } from '../database/database.service';
import type { MusicService } from '../services/music.service';
import type { CommandManager } from '../commands';
import type { Logger } from '../utils/logger';

/**
 * Services handed to every command and event handler
 */
export interface BotContext {
  client: Client;
  config: BotConfig;
  database: DatabaseService;
  music: MusicService;
  commands: CommandManager;
  logger: Logger;
}
