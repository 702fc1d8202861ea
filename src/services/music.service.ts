import { EmbedBuilder } from 'discord.js';
import { MusicPlayer } from '../music/player';
import { QueueStore, SearchExtractor, VoiceTransport } from '../types/music';
import { Logger, LogCategory } from '../utils/logger';
import { ErrorHandler } from '../utils/error-handler.util';
import { EmbedUtils } from '../utils/embed-builder.util';

export const SHUTDOWN_DISCONNECT_TIMEOUT_MS = 5_000;

/**
 * Anything a "now playing" message can be posted to
 */
export interface AnnouncementChannel {
  readonly id: string;
  send(options: { embeds: EmbedBuilder[] }): Promise<unknown>;
}

export interface MusicServiceOptions {
  extractor: SearchExtractor;
  transport: VoiceTransport;
  store: QueueStore;
  defaultVolume: number;
  maxQueueSize: number;
  inactivityTimeout: number;
  persistDebounceMs?: number;
  logger?: Logger;
}

/**
 * Owns one MusicPlayer per guild plus the collaborators they share
 */
export class MusicService {
  public readonly extractor: SearchExtractor;
  private readonly transport: VoiceTransport;
  private readonly store: QueueStore;
  private readonly logger: Logger;
  private readonly options: MusicServiceOptions;
  private readonly players = new Map<string, MusicPlayer>();
  private readonly pending = new Map<string, Promise<MusicPlayer>>();
  private readonly announcementChannels = new Map<string, AnnouncementChannel>();

  constructor(options: MusicServiceOptions) {
    this.options = options;
    this.extractor = options.extractor;
    this.transport = options.transport;
    this.store = options.store;
    this.logger = options.logger ?? new Logger();
  }

  get playerCount(): number {
    return this.players.size;
  }

  /**
   * Existing player, or a new one with its persisted state restored.
   * Concurrent first calls for a guild share one creation.
   */
  public async getPlayer(guildId: string): Promise<MusicPlayer> {
    const existing = this.players.get(guildId);
    if (existing) {
      return existing;
    }

    const inFlight = this.pending.get(guildId);
    if (inFlight) {
      return inFlight;
    }

    const creation = this.createPlayer(guildId).finally(() => {
      this.pending.delete(guildId);
    });
    this.pending.set(guildId, creation);
    return creation;
  }

  public getExistingPlayer(guildId: string): MusicPlayer | undefined {
    return this.players.get(guildId);
  }

  /**
   * Remember where to post track announcements for a guild
   */
  public setAnnouncementChannel(guildId: string, channel: AnnouncementChannel): void {
    this.announcementChannels.set(guildId, channel);
  }

  /**
   * The bot left the guild: close its player and forget its queue
   */
  public async removeGuild(guildId: string): Promise<void> {
    const player = this.players.get(guildId);
    this.players.delete(guildId);
    this.announcementChannels.delete(guildId);

    if (player) {
      await player.disconnect();
    }

    await ErrorHandler.safeExecute(
      () => this.store.clearGuildQueue(guildId),
      this.logger,
      'Clear guild queue',
      undefined,
      { category: LogCategory.DATABASE, guildId },
    );

    this.logger.info('Removed music state for guild', { category: LogCategory.MUSIC, guildId });
  }

  /**
   * Disconnect every player, each bounded by a short timeout
   */
  public async shutdown(): Promise<void> {
    const entries = [...this.players.entries()];

    await Promise.all(
      entries.map(async ([guildId, player]) => {
        try {
          await ErrorHandler.withTimeout(
            player.disconnect(),
            SHUTDOWN_DISCONNECT_TIMEOUT_MS,
            `Disconnect player ${guildId}`,
          );
        } catch (error) {
          this.logger.warn('Player did not disconnect cleanly, forcing it closed', {
            category: LogCategory.MUSIC,
            guildId,
            error: ErrorHandler.toError(error),
          });
          player.destroy();
        }
      }),
    );

    this.players.clear();
    this.announcementChannels.clear();
    this.logger.info(`Music service shut down (${entries.length} players)`, { category: LogCategory.MUSIC });
  }

  private async createPlayer(guildId: string): Promise<MusicPlayer> {
    const player = new MusicPlayer({
      guildId,
      extractor: this.extractor,
      transport: this.transport,
      store: this.store,
      logger: this.logger,
      defaultVolume: this.options.defaultVolume,
      maxQueueSize: this.options.maxQueueSize,
      inactivityTimeout: this.options.inactivityTimeout,
      persistDebounceMs: this.options.persistDebounceMs,
    });

    player.on('trackStart', track => {
      this.announce(guildId, EmbedUtils.createTrackEmbed(track, '🎵 Tocando Agora'));
    });

    player.on('queueEnd', () => {
      this.announce(
        guildId,
        EmbedUtils.createInfoEmbed('Fila finalizada', 'Use `/play` para adicionar mais músicas.'),
      );
    });

    await player.restoreState();
    this.players.set(guildId, player);
    return player;
  }

  private announce(guildId: string, embed: EmbedBuilder): void {
    const channel = this.announcementChannels.get(guildId);
    if (!channel) {
      return;
    }

    channel.send({ embeds: [embed] }).catch(error => {
      this.logger.warn('Failed to post music announcement', {
        category: LogCategory.MUSIC,
        guildId,
        channelId: channel.id,
        error: ErrorHandler.toError(error),
      });
    });
  }
}
