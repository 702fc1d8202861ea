import { Client, VoiceState } from 'discord.js';
import { MusicService } from '../services/music.service';
import { Logger, LogCategory } from '../utils/logger';
import { ErrorHandler } from '../utils/error-handler.util';

/**
 * Watches the bot's own voice state so players notice when someone else
 * disconnects or moves the bot
 */
export class VoiceEvents {
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
    this.client.on('voiceStateUpdate', (oldState, newState) => {
      this.handleVoiceStateUpdate(oldState, newState).catch(error => {
        this.logger.error('Failed to handle voice state update', {
          category: LogCategory.EVENT,
          guildId: newState.guild.id,
          error: ErrorHandler.toError(error),
        });
      });
    });
  }

  /**
   * Handles voice state updates
   */
  public async handleVoiceStateUpdate(oldState: VoiceState, newState: VoiceState): Promise<void> {
    const botId = this.client.user?.id;
    if (!botId || newState.id !== botId) {
      return;
    }

    if (oldState.channelId === newState.channelId) {
      return;
    }

    const player = this.music.getExistingPlayer(newState.guild.id);
    if (!player) {
      return;
    }

    await player.handleVoiceStateChange(newState.channelId);
  }
}
