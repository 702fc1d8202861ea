import { Client, Events, GatewayIntentBits, ActivityType } from 'discord.js';
import * as dotenv from 'dotenv';
import { BotConfig, loadBotConfig } from './config/bot.config';
import { BotContext } from './types/client';
import { Logger, LogCategory } from './utils/logger';
import { ErrorHandler } from './utils/error-handler.util';
import { RateLimiter } from './utils/rate-limiter';
import { DatabaseService } from './database/database.service';
import { MusicService } from './services/music.service';
import { YtDlpExtractor } from './music/extractor';
import { DiscordVoiceTransport } from './music/voice-transport';
import { CommandManager } from './commands/index';
import { loadCommands } from './commands/registry';
import { VoiceEvents } from './events/voiceEvents';
import { GuildEvents } from './events/guildEvents';

// Load environment variables
dotenv.config();

/**
 * Main Bot Class - wires config, storage, players and commands together
 */
export class MusicBot {
  private readonly client: Client;
  private readonly logger: Logger;
  private readonly config: BotConfig;
  private readonly db: DatabaseService;
  private readonly music: MusicService;
  private readonly commands: CommandManager;
  private readonly context: BotContext;
  private isShuttingDown = false;

  constructor(config: BotConfig = loadBotConfig()) {
    this.logger = new Logger();
    this.config = config;

    this.client = new Client({
      intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildVoiceStates],
      allowedMentions: {
        parse: ['users'],
        repliedUser: false,
      },
    });

    this.db = new DatabaseService({
      useRedis: config.useRedis,
      redisUrl: config.redisUrl,
      logger: this.logger,
    });

    this.music = new MusicService({
      extractor: new YtDlpExtractor({
        binaryPath: config.ytdlpPath,
        cookiesPath: config.youtubeCookiesPath,
        logger: this.logger,
      }),
      transport: new DiscordVoiceTransport(this.client, this.logger),
      store: this.db,
      defaultVolume: config.defaultVolume,
      maxQueueSize: config.maxQueueSize,
      inactivityTimeout: config.inactivityTimeout,
      logger: this.logger,
    });

    const rateLimiter = new RateLimiter(
      {
        maxRequests: config.rateLimitCommands,
        windowMs: config.rateLimitWindowSeconds * 1000,
      },
      this.logger,
    );
    this.commands = new CommandManager(loadCommands(), rateLimiter, this.logger);

    this.context = {
      client: this.client,
      config: this.config,
      database: this.db,
      music: this.music,
      commands: this.commands,
      logger: this.logger,
    };
  }

  async start(): Promise<void> {
    this.logger.info('🚀 Starting music bot...', { category: LogCategory.SYSTEM });

    await this.initializeDatabase();
    this.setupEventListeners();

    await this.client.login(this.config.discordToken);
  }

  /**
   * Connect storage; the memory backend takes over when Redis is unavailable
   */
  private async initializeDatabase(): Promise<void> {
    await this.db.connect();
    this.logger.info(`✅ Storage ready (${this.db.backend})`, { category: LogCategory.DATABASE });
  }

  private setupEventListeners(): void {
    this.client.once(Events.ClientReady, readyClient => {
      this.logger.info(`🤖 Bot logged in as ${readyClient.user.tag}`, { category: LogCategory.SYSTEM });
      this.logger.info(`📊 Serving ${readyClient.guilds.cache.size} guilds`, { category: LogCategory.SYSTEM });

      readyClient.user.setActivity({
        name: '/play',
        type: ActivityType.Listening,
      });
    });

    this.client.on(Events.InteractionCreate, interaction => {
      const handled = interaction.isChatInputCommand()
        ? this.commands.handleSlashCommand(interaction, this.context)
        : interaction.isAutocomplete()
          ? this.commands.handleAutocomplete(interaction, this.context)
          : Promise.resolve();

      handled.catch(error => {
        this.logger.error('Interaction handling error', {
          category: LogCategory.EVENT,
          error: ErrorHandler.toError(error),
        });
      });
    });

    new VoiceEvents(this.client, this.music, this.logger);
    new GuildEvents(this.client, this.music, this.logger);

    this.client.on(Events.Error, error => {
      this.logger.error('Discord client error', { category: LogCategory.SYSTEM, error });
    });

    this.client.on(Events.Warn, warning => {
      this.logger.warn('Discord client warning', {
        category: LogCategory.SYSTEM,
        metadata: { warning },
      });
    });

    process.on('SIGINT', () => {
      void this.shutdown('SIGINT');
    });
    process.on('SIGTERM', () => {
      void this.shutdown('SIGTERM');
    });
    process.on('unhandledRejection', reason => {
      this.logger.error('Unhandled Promise Rejection', {
        category: LogCategory.SYSTEM,
        error: ErrorHandler.toError(reason),
      });
    });
  }

  /**
   * Graceful shutdown: players, then the gateway, then storage
   */
  async shutdown(signal: string): Promise<void> {
    if (this.isShuttingDown) {
      return;
    }
    this.isShuttingDown = true;

    this.logger.info(`🛑 Received ${signal}, shutting down gracefully...`, { category: LogCategory.SYSTEM });

    try {
      await this.music.shutdown();
      await this.client.destroy();
      await this.db.disconnect();
      this.commands.shutdown();

      this.logger.info('✅ Graceful shutdown completed', { category: LogCategory.SYSTEM });
      await this.logger.close();
      process.exit(0);
    } catch (error) {
      this.logger.error('Error during shutdown', {
        category: LogCategory.SYSTEM,
        error: ErrorHandler.toError(error),
      });
      process.exit(1);
    }
  }
}

// Start the bot
if (require.main === module) {
  const logger = new Logger();
  Promise.resolve()
    .then(() => new MusicBot().start())
    .catch(error => {
      logger.error('Failed to start bot', { category: LogCategory.SYSTEM, error: ErrorHandler.toError(error) });
      process.exit(1);
    });
}

export default MusicBot;
