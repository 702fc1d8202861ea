import { Mutex } from 'async-mutex';
import { Track } from './track';
import { LoopMode, MusicQueue, DEFAULT_MAX_QUEUE_SIZE } from './queue';
import {
  Extractor,
  PlayerEventName,
  PlayerEvents,
  QueueStore,
  VoiceChannelRef,
  VoiceSession,
  VoiceTransport,
} from '../types/music';
import { Logger, LogCategory } from '../utils/logger';
import { ErrorHandler } from '../utils/error-handler.util';

export const WATCHDOG_INTERVAL_MS = 30_000;
export const MIN_INACTIVITY_TIMEOUT = 60;
export const DEFAULT_INACTIVITY_TIMEOUT = 300;
export const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;
export const DEFAULT_PERSIST_DEBOUNCE_MS = 2_000;
export const MAX_VOLUME = 200;
const CONNECT_ATTEMPTS = 2;

export interface PlayerOptions {
  guildId: string;
  extractor: Extractor;
  transport: VoiceTransport;
  store?: QueueStore;
  logger?: Logger;
  maxQueueSize?: number;
  /** Percent, 0-200 */
  defaultVolume?: number;
  /** Seconds; values below 60 are raised to 60 */
  inactivityTimeout?: number;
  connectTimeoutMs?: number;
  /** 0 writes every snapshot immediately */
  persistDebounceMs?: number;
}

export function clampVolume(percent: number): number {
  return Math.max(0, Math.min(MAX_VOLUME, Math.round(percent)));
}

/**
 * Per-guild playback state machine: Idle -> Connected -> Playing <-> Paused.
 *
 * Every entry point (commands, the watchdog tick and stream completion)
 * runs under one mutex, so queue mutations and track advancement never
 * interleave. Transport completion callbacks are only ever queued onto
 * that mutex, never applied directly.
 */
export class MusicPlayer {
  public readonly guildId: string;
  public readonly queue: MusicQueue;

  private readonly extractor: Extractor;
  private readonly transport: VoiceTransport;
  private readonly store?: QueueStore;
  private readonly logger: Logger;
  private readonly lock = new Mutex();
  private readonly inactivityTimeout: number;
  private readonly connectTimeoutMs: number;
  private readonly persistDebounceMs: number;

  private session: VoiceSession | null = null;
  private volumeMultiplier: number;
  private streaming = false;
  private paused = false;
  private exhausted = false;
  private streamCounter = 0;
  private activeStream: number | null = null;
  private playingTrack: Track | null = null;
  private positionOffset = 0;
  private positionStartedAt: number | null = null;
  private lastActivity = Date.now();
  private watchdog: NodeJS.Timeout | null = null;
  private saveTimer: NodeJS.Timeout | null = null;
  private listeners: Partial<PlayerEvents> = {};

  constructor(options: PlayerOptions) {
    this.guildId = options.guildId;
    this.extractor = options.extractor;
    this.transport = options.transport;
    this.store = options.store;
    this.logger = options.logger ?? new Logger();
    this.queue = new MusicQueue(options.maxQueueSize ?? DEFAULT_MAX_QUEUE_SIZE);
    this.volumeMultiplier = clampVolume(options.defaultVolume ?? 100) / 100;
    this.inactivityTimeout = Math.max(
      MIN_INACTIVITY_TIMEOUT,
      options.inactivityTimeout ?? DEFAULT_INACTIVITY_TIMEOUT,
    );
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.persistDebounceMs = options.persistDebounceMs ?? DEFAULT_PERSIST_DEBOUNCE_MS;
  }

  // ---- state -------------------------------------------------------------

  get isConnected(): boolean {
    return this.session !== null && this.session.isConnected();
  }

  /** A stream is running and not paused */
  get isPlaying(): boolean {
    return this.streaming && !this.paused;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  get currentTrack(): Track | null {
    return this.queue.current;
  }

  get channelId(): string | null {
    return this.session ? this.session.channelId : null;
  }

  /** Whole seconds into the current track, including any seek offset */
  get position(): number {
    if (this.positionStartedAt === null) {
      return this.positionOffset;
    }
    return this.positionOffset + Math.floor((Date.now() - this.positionStartedAt) / 1000);
  }

  /** Percent, 0-200 */
  get volume(): number {
    return Math.round(this.volumeMultiplier * 100);
  }

  get hasWatchdog(): boolean {
    return this.watchdog !== null;
  }

  /**
   * Register the single listener for an event, replacing any previous one
   */
  on<E extends PlayerEventName>(event: E, listener: PlayerEvents[E]): void {
    this.listeners[event] = listener;
  }

  off(event: PlayerEventName): void {
    delete this.listeners[event];
  }

  // ---- connection --------------------------------------------------------

  async connect(channel: VoiceChannelRef): Promise<boolean> {
    return this.lock.runExclusive(async () => {
      const session = this.session;

      if (session && session.isConnected()) {
        if (session.channelId === channel.id) {
          return true;
        }

        try {
          await session.moveTo(channel, this.connectTimeoutMs);
        } catch (error) {
          this.logger.warn(`Failed to move to voice channel ${channel.name}`, {
            category: LogCategory.MUSIC,
            guildId: this.guildId,
            channelId: channel.id,
            error: ErrorHandler.toError(error),
          });
          return false;
        }

        this.logger.music('move', this.guildId, undefined, channel.name);
        this.startWatchdog();
        return true;
      }

      const opened = await this.openSession(channel);
      if (!opened) {
        return false;
      }

      if (session) {
        await this.releaseSession(session);
      }

      // A dropped session never reports completion of its stream
      this.invalidateStream();
      this.streaming = false;
      this.paused = false;
      this.resetPosition();

      this.session = opened;
      this.startWatchdog();
      this.logger.music('connect', this.guildId, undefined, channel.name);
      return true;
    });
  }

  async disconnect(): Promise<void> {
    await this.lock.runExclusive(() => this.disconnectInternal());
  }

  /**
   * The gateway reported the bot's voice channel. Leaving voice, or landing
   * in a channel other than the session's, closes the player; a move made
   * through connect() has already updated the session by the time this runs.
   * Returns true when the player disconnected.
   */
  async handleVoiceStateChange(channelId: string | null): Promise<boolean> {
    return this.lock.runExclusive(async () => {
      if (!this.session || channelId === this.session.channelId) {
        return false;
      }

      this.logger.info(
        channelId ? `Moved to another voice channel (${channelId}), disconnecting` : 'Removed from voice, disconnecting',
        { category: LogCategory.MUSIC, guildId: this.guildId, channelId: channelId ?? undefined },
      );
      await this.disconnectInternal();
      return true;
    });
  }

  /**
   * Drop timers and the connection without waiting for the lock.
   * Used at shutdown when a graceful disconnect did not finish in time.
   */
  destroy(): void {
    this.stopWatchdog();
    if (this.saveTimer) {
      clearTimeout(this.saveTimer);
      this.saveTimer = null;
    }
    this.invalidateStream();
    const session = this.session;
    this.session = null;
    this.streaming = false;
    this.paused = false;
    if (session) {
      this.releaseSession(session).catch(error => {
        this.logger.warn('Forced voice disconnect failed', {
          category: LogCategory.MUSIC,
          guildId: this.guildId,
          error: ErrorHandler.toError(error),
        });
      });
    }
  }

  // ---- playback ----------------------------------------------------------

  /**
   * Start or continue playback. A supplied track goes right after the
   * current one. Returns false when not connected.
   */
  async play(track?: Track): Promise<boolean> {
    return this.lock.runExclusive(async () => {
      if (!this.isConnected) {
        return false;
      }

      if (track) {
        if (!this.queue.insert(this.queue.currentIndex + 1, track)) {
          return false;
        }
        await this.persist();
      }

      if (this.paused) {
        return this.resumeInternal();
      }

      if (this.streaming) {
        return true;
      }

      if (this.exhausted && this.queue.upcoming.length > 0) {
        this.queue.jump(this.queue.currentIndex + 1);
      }

      return this.playCurrent();
    });
  }

  async pause(): Promise<boolean> {
    return this.lock.runExclusive(() => {
      const session = this.session;
      if (!session || !this.streaming || this.paused) {
        return false;
      }
      if (!session.pause()) {
        return false;
      }
      this.positionOffset = this.position;
      this.positionStartedAt = null;
      this.paused = true;
      this.touch();
      return true;
    });
  }

  async resume(): Promise<boolean> {
    return this.lock.runExclusive(() => this.resumeInternal());
  }

  /**
   * Halt playback and empty the queue
   */
  async stop(): Promise<void> {
    await this.lock.runExclusive(async () => {
      this.haltStream();
      this.queue.clear();
      this.exhausted = false;
      await this.flushPersist();
      this.logger.music('stop', this.guildId);
    });
  }

  /**
   * Move past the current track and play whatever comes next.
   * Returns the new current track, or null when nothing follows.
   */
  async skip(): Promise<Track | null> {
    return this.lock.runExclusive(async () => {
      if (!this.queue.current) {
        return null;
      }
      if (!this.streaming && this.queue.loopMode === LoopMode.OFF && this.queue.upcoming.length === 0) {
        return null;
      }
      const finished = this.playingTrack;
      this.haltStream();
      return this.advanceAndPlay(finished);
    });
  }

  /**
   * Restart the current track at an offset. Rejects negative offsets and
   * offsets at or beyond a known duration.
   */
  async seek(seconds: number): Promise<boolean> {
    return this.lock.runExclusive(async () => {
      const track = this.queue.current;
      if (!track || !this.isConnected || !this.streaming) {
        return false;
      }
      if (!Number.isFinite(seconds) || seconds < 0) {
        return false;
      }
      if (track.duration > 0 && seconds >= track.duration) {
        return false;
      }

      const started = await this.startStream(track, Math.floor(seconds));
      if (started) {
        this.logger.music('seek', this.guildId, undefined, `${track.title} @ ${Math.floor(seconds)}s`);
      }
      return started;
    });
  }

  async previous(): Promise<Track | null> {
    return this.lock.runExclusive(async () => {
      const track = this.queue.previous();
      if (!track) {
        return null;
      }
      return this.restartAtCursor();
    });
  }

  async jump(index: number): Promise<Track | null> {
    return this.lock.runExclusive(async () => {
      const track = this.queue.jump(index);
      if (!track) {
        return null;
      }
      return this.restartAtCursor();
    });
  }

  /**
   * Set the volume in percent (clamped to 0-200); applies to the live
   * stream without restarting it
   */
  async setVolume(percent: number): Promise<number> {
    return this.lock.runExclusive(async () => {
      this.applyVolume(percent);
      await this.persist();
      return this.volume;
    });
  }

  // ---- queue management --------------------------------------------------

  async addTrack(track: Track): Promise<boolean> {
    return this.lock.runExclusive(async () => {
      const added = this.queue.add(track);
      if (added) {
        await this.persist();
      }
      return added;
    });
  }

  async addTracks(tracks: readonly Track[]): Promise<number> {
    return this.lock.runExclusive(async () => {
      const added = this.queue.addMany(tracks);
      if (added > 0) {
        await this.persist();
      }
      return added;
    });
  }

  /**
   * Remove a queued track. The track being streamed, paused or not, stays
   * until it is skipped.
   */
  async removeTrack(index: number): Promise<Track | null> {
    return this.lock.runExclusive(async () => {
      if (this.streaming && index === this.queue.currentIndex) {
        return null;
      }
      const removed = this.queue.remove(index);
      if (removed) {
        await this.persist();
      }
      return removed;
    });
  }

  async moveTrack(from: number, to: number): Promise<boolean> {
    return this.lock.runExclusive(async () => {
      const moved = this.queue.move(from, to);
      if (moved) {
        await this.persist();
      }
      return moved;
    });
  }

  /**
   * Remove every upcoming track; the current one keeps playing
   */
  async clearQueue(): Promise<number> {
    return this.lock.runExclusive(async () => {
      const removed = this.queue.clearUpcoming();
      await this.persist();
      return removed;
    });
  }

  async shuffle(): Promise<void> {
    await this.lock.runExclusive(async () => {
      this.queue.shuffle();
      await this.persist();
    });
  }

  async setLoop(mode: LoopMode): Promise<void> {
    await this.lock.runExclusive(async () => {
      this.queue.setLoopMode(mode);
      await this.persist();
    });
  }

  // ---- persistence -------------------------------------------------------

  /**
   * Load the last snapshot for this guild. Stream URLs are not stored, so
   * the first play after a restore re-resolves them.
   */
  async restoreState(): Promise<boolean> {
    return this.lock.runExclusive(async () => {
      if (!this.store) {
        return false;
      }

      try {
        const state = await this.store.loadQueue(this.guildId);
        if (!state) {
          return false;
        }

        const tracks = state.tracks.map(data => Track.fromDict(data));
        this.queue.restoreState(tracks, state.currentIndex, state.loopMode);
        this.applyVolume(state.volumePercent);
        this.exhausted = false;

        this.logger.info(`Restored ${tracks.length} queued tracks`, {
          category: LogCategory.MUSIC,
          guildId: this.guildId,
          metadata: { currentIndex: this.queue.currentIndex, loopMode: state.loopMode },
        });
        return true;
      } catch (error) {
        this.logger.error('Failed to restore queue state', {
          category: LogCategory.MUSIC,
          guildId: this.guildId,
          error: ErrorHandler.toError(error),
        });
        return false;
      }
    });
  }

  // ---- internals (caller holds the lock) ---------------------------------

  private async openSession(channel: VoiceChannelRef): Promise<VoiceSession | null> {
    for (let attempt = 1; attempt <= CONNECT_ATTEMPTS; attempt++) {
      try {
        return await this.transport.connect(channel, this.connectTimeoutMs);
      } catch (error) {
        this.logger.warn(`Voice connection attempt ${attempt}/${CONNECT_ATTEMPTS} failed`, {
          category: LogCategory.MUSIC,
          guildId: this.guildId,
          channelId: channel.id,
          error: ErrorHandler.toError(error),
        });
      }
    }
    return null;
  }

  private async releaseSession(session: VoiceSession): Promise<void> {
    try {
      session.stop();
      await session.disconnect();
    } catch (error) {
      this.logger.warn('Error while closing voice connection', {
        category: LogCategory.MUSIC,
        guildId: this.guildId,
        error: ErrorHandler.toError(error),
      });
    }
  }

  private async disconnectInternal(): Promise<void> {
    this.stopWatchdog();
    this.invalidateStream();

    const session = this.session;
    this.session = null;
    this.streaming = false;
    this.paused = false;
    this.resetPosition();

    if (session) {
      await this.releaseSession(session);
      this.logger.music('disconnect', this.guildId);
    }

    await this.flushPersist();
  }

  private resumeInternal(): boolean {
    const session = this.session;
    if (!session || !this.paused) {
      return false;
    }
    if (!session.resume()) {
      return false;
    }
    this.paused = false;
    this.positionStartedAt = Date.now();
    this.touch();
    return true;
  }

  /**
   * Play the current track; unplayable tracks are skipped, at most once per
   * queued track, before giving up and ending the queue
   */
  private async playCurrent(): Promise<boolean> {
    const attempts = Math.max(1, this.queue.size);

    for (let attempt = 0; attempt < attempts; attempt++) {
      const track = this.queue.current;
      if (!track) {
        break;
      }

      if (!this.isConnected) {
        this.streaming = false;
        this.paused = false;
        return false;
      }

      if (await this.startStream(track, 0)) {
        this.exhausted = false;
        this.logger.music('play', this.guildId, track.requesterId ?? undefined, track.title);
        this.emitTrackStart(track);
        await this.persist();
        return true;
      }

      this.logger.warn(`Skipping unplayable track: ${track.title}`, {
        category: LogCategory.MUSIC,
        guildId: this.guildId,
        metadata: { url: track.url },
      });

      if (!this.queue.next({ force: true })) {
        break;
      }
    }

    await this.finishQueue();
    return false;
  }

  /**
   * Resolve a fresh stream URL and start it. A failed refresh leaves any
   * running stream untouched.
   */
  private async startStream(track: Track, offsetSeconds: number): Promise<boolean> {
    let streamUrl: string | null = null;
    try {
      streamUrl = await this.extractor.getStreamUrl(track);
    } catch (error) {
      this.logger.warn('Stream URL refresh threw', {
        category: LogCategory.MUSIC,
        guildId: this.guildId,
        error: ErrorHandler.toError(error),
      });
    }

    const session = this.session;
    if (!streamUrl || !session || !session.isConnected()) {
      return false;
    }

    track.streamUrl = streamUrl;
    this.haltStream();

    const streamId = ++this.streamCounter;
    this.activeStream = streamId;

    try {
      session.play(
        streamUrl,
        { volume: this.volumeMultiplier, seekSeconds: offsetSeconds },
        error => this.handOffCompletion(streamId, error),
      );
    } catch (error) {
      this.activeStream = null;
      this.logger.warn('Failed to start audio stream', {
        category: LogCategory.MUSIC,
        guildId: this.guildId,
        error: ErrorHandler.toError(error),
      });
      return false;
    }

    this.playingTrack = track;
    this.streaming = true;
    this.paused = false;
    this.positionOffset = offsetSeconds;
    this.positionStartedAt = Date.now();
    this.touch();
    return true;
  }

  /**
   * Transport callback: queue the completion onto the player's lock
   */
  private handOffCompletion(streamId: number, error?: Error): void {
    this.lock
      .runExclusive(() => this.onStreamComplete(streamId, error))
      .catch(handoffError => {
        this.logger.error('Failed to handle end of track', {
          category: LogCategory.MUSIC,
          guildId: this.guildId,
          error: ErrorHandler.toError(handoffError),
        });
      });
  }

  private async onStreamComplete(streamId: number, error?: Error): Promise<void> {
    // Stale: the stream was replaced, stopped, or already completed
    if (streamId !== this.activeStream) {
      return;
    }
    const finished = this.playingTrack;
    this.invalidateStream();

    if (error) {
      this.logger.warn('Audio stream ended with an error', {
        category: LogCategory.MUSIC,
        guildId: this.guildId,
        error,
      });
    }

    await this.advanceAndPlay(finished);
  }

  /**
   * The single advance routine behind both skip() and natural track end.
   * `finished` is the track whose stream just stopped, if one was running.
   */
  private async advanceAndPlay(finished: Track | null): Promise<Track | null> {
    this.streaming = false;
    this.paused = false;
    this.resetPosition();

    if (finished) {
      this.emitTrackEnd(finished);
    }

    const next = this.queue.next();
    if (!next) {
      await this.finishQueue();
      return null;
    }

    if (!this.isConnected) {
      await this.persist();
      return next;
    }

    const started = await this.playCurrent();
    return started ? this.queue.current : null;
  }

  private async restartAtCursor(): Promise<Track | null> {
    this.exhausted = false;
    if (!this.isConnected) {
      await this.persist();
      return this.queue.current;
    }
    this.haltStream();
    const started = await this.playCurrent();
    return started ? this.queue.current : null;
  }

  private async finishQueue(): Promise<void> {
    this.streaming = false;
    this.paused = false;
    this.exhausted = true;
    this.resetPosition();
    this.logger.music('queue end', this.guildId);
    this.emitQueueEnd();
    await this.flushPersist();
  }

  private invalidateStream(): void {
    this.activeStream = null;
    this.playingTrack = null;
  }

  private haltStream(): void {
    this.invalidateStream();
    if (this.session) {
      try {
        this.session.stop();
      } catch (error) {
        this.logger.warn('Failed to stop audio stream', {
          category: LogCategory.MUSIC,
          guildId: this.guildId,
          error: ErrorHandler.toError(error),
        });
      }
    }
    this.streaming = false;
    this.paused = false;
    this.resetPosition();
  }

  private applyVolume(percent: number): void {
    if (!Number.isFinite(percent)) {
      return;
    }
    this.volumeMultiplier = clampVolume(percent) / 100;
    if (this.session && this.streaming) {
      this.session.setVolume(this.volumeMultiplier);
    }
  }

  private resetPosition(): void {
    this.positionOffset = 0;
    this.positionStartedAt = null;
  }

  private touch(): void {
    this.lastActivity = Date.now();
  }

  // ---- inactivity watchdog ----------------------------------------------

  private startWatchdog(): void {
    this.stopWatchdog();
    this.touch();

    const timer = setInterval(() => {
      this.lock.runExclusive(() => this.checkInactivity()).catch(error => {
        this.logger.error('Inactivity check failed', {
          category: LogCategory.MUSIC,
          guildId: this.guildId,
          error: ErrorHandler.toError(error),
        });
      });
    }, WATCHDOG_INTERVAL_MS);
    timer.unref();
    this.watchdog = timer;
  }

  private stopWatchdog(): void {
    if (this.watchdog) {
      clearInterval(this.watchdog);
      this.watchdog = null;
    }
  }

  private async checkInactivity(): Promise<void> {
    if (!this.watchdog) {
      return;
    }

    if (!this.isConnected) {
      await this.disconnectInternal();
      return;
    }

    if (this.isPlaying) {
      this.touch();
      return;
    }

    const idleSeconds = (Date.now() - this.lastActivity) / 1000;
    if (idleSeconds >= this.inactivityTimeout) {
      this.logger.info(`Leaving voice after ${Math.floor(idleSeconds)}s of inactivity`, {
        category: LogCategory.MUSIC,
        guildId: this.guildId,
      });
      await this.disconnectInternal();
    }
  }

  // ---- snapshots ---------------------------------------------------------

  /**
   * Best-effort snapshot, debounced unless persistDebounceMs is 0
   */
  private async persist(): Promise<void> {
    if (!this.store) {
      return;
    }

    if (this.persistDebounceMs <= 0) {
      await this.writeSnapshotSafely();
      return;
    }

    if (this.saveTimer) {
      clearTimeout(this.saveTimer);
    }
    const timer = setTimeout(() => {
      this.saveTimer = null;
      this.writeSnapshot().catch(error => this.logSnapshotFailure(error));
    }, this.persistDebounceMs);
    timer.unref();
    this.saveTimer = timer;
  }

  private async flushPersist(): Promise<void> {
    if (this.saveTimer) {
      clearTimeout(this.saveTimer);
      this.saveTimer = null;
    }
    await this.writeSnapshotSafely();
  }

  private async writeSnapshotSafely(): Promise<void> {
    try {
      await this.writeSnapshot();
    } catch (error) {
      this.logSnapshotFailure(error);
    }
  }

  private async writeSnapshot(): Promise<void> {
    if (!this.store) {
      return;
    }
    const { tracks, currentIndex, loopMode } = this.queue.getState();
    await this.store.saveQueue(this.guildId, tracks, currentIndex, loopMode, this.volume);
  }

  private logSnapshotFailure(error: unknown): void {
    this.logger.error('Failed to persist queue state', {
      category: LogCategory.DATABASE,
      guildId: this.guildId,
      error: ErrorHandler.toError(error),
    });
  }

  // ---- events ------------------------------------------------------------

  private emitTrackStart(track: Track): void {
    const listener = this.listeners.trackStart;
    if (listener) {
      this.notify('trackStart', () => listener(track));
    }
  }

  private emitTrackEnd(track: Track): void {
    const listener = this.listeners.trackEnd;
    if (listener) {
      this.notify('trackEnd', () => listener(track));
    }
  }

  private emitQueueEnd(): void {
    const listener = this.listeners.queueEnd;
    if (listener) {
      this.notify('queueEnd', () => listener());
    }
  }

  private notify(event: PlayerEventName, call: () => void): void {
    try {
      call();
    } catch (error) {
      this.logger.warn(`Listener for ${event} threw`, {
        category: LogCategory.EVENT,
        guildId: this.guildId,
        error: ErrorHandler.toError(error),
      });
    }
  }
}
