import { createClient } from 'redis';
import { Track } from '../music/track';
import { LoopMode, parseLoopMode } from '../music/queue';
import { PersistedQueue, PersistedTrack, PlaylistStore, QueueStore } from '../types/music';
import { Logger, LogCategory } from '../utils/logger';
import { ErrorHandler } from '../utils/error-handler.util';

export type RedisClient = ReturnType<typeof createClient>;

export interface DatabaseOptions {
  useRedis: boolean;
  redisUrl: string;
  logger?: Logger;
}

/** Queue snapshots expire a week after the last save */
export const QUEUE_TTL_SECONDS = 7 * 24 * 60 * 60;
const MAX_CONNECT_RETRIES = 3;

interface MemoryEntry {
  value: string | Record<string, string>;
  expiresAt: number | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseInteger(raw: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(raw ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function queueKey(guildId: string): string {
  return `queue:${guildId}`;
}

export function playlistKey(userId: string, name: string): string {
  return `playlist:${userId}:${name}`;
}

/**
 * Queue snapshots and user playlists, kept in Redis when enabled and in
 * process memory otherwise. Both backends share the same key layout.
 */
export class DatabaseService implements QueueStore, PlaylistStore {
  private client: RedisClient | null = null;
  private readonly memory = new Map<string, MemoryEntry>();
  private readonly logger: Logger;
  private readonly useRedis: boolean;
  private readonly redisUrl: string;

  constructor(options: DatabaseOptions) {
    this.useRedis = options.useRedis;
    this.redisUrl = options.redisUrl;
    this.logger = options.logger ?? new Logger();
  }

  get backend(): 'redis' | 'memory' {
    return this.client ? 'redis' : 'memory';
  }

  /**
   * Connect to Redis when enabled; any failure leaves the memory store in charge
   */
  public async connect(): Promise<void> {
    if (!this.useRedis) {
      this.logger.info('Redis disabled, using in-memory storage', { category: LogCategory.DATABASE });
      return;
    }

    const client = createClient({
      url: this.redisUrl,
      socket: {
        connectTimeout: 10000,
        reconnectStrategy: retries => {
          if (retries > MAX_CONNECT_RETRIES) {
            return new Error('Redis reconnection failed');
          }
          return Math.min(retries * 100, 3000);
        },
      },
    });

    client.on('error', error => {
      this.logger.error('Redis client error', {
        category: LogCategory.DATABASE,
        error: ErrorHandler.toError(error),
      });
    });

    client.on('reconnecting', () => {
      this.logger.warn('Redis client reconnecting', { category: LogCategory.DATABASE });
    });

    try {
      await client.connect();
      this.client = client;
      this.logger.info('✅ Connected to Redis', { category: LogCategory.DATABASE });
    } catch (error) {
      this.client = null;
      this.logger.warn('Redis not available, using in-memory storage', {
        category: LogCategory.DATABASE,
        error: ErrorHandler.toError(error),
      });
    }
  }

  public async disconnect(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (!client) {
      return;
    }

    try {
      await client.quit();
      this.logger.info('Disconnected from Redis', { category: LogCategory.DATABASE });
    } catch (error) {
      this.logger.warn('Error while closing Redis connection', {
        category: LogCategory.DATABASE,
        error: ErrorHandler.toError(error),
      });
    }
  }

  public async healthCheck(): Promise<boolean> {
    if (!this.client) {
      return true;
    }
    return ErrorHandler.safeExecute(
      async () => (await this.client?.ping()) === 'PONG',
      this.logger,
      'Redis health check',
      false,
      { category: LogCategory.DATABASE },
    );
  }

  // ---- queue snapshots ---------------------------------------------------

  public async saveQueue(
    guildId: string,
    tracks: readonly Track[],
    currentIndex: number,
    loopMode: LoopMode,
    volumePercent: number,
  ): Promise<void> {
    const key = queueKey(guildId);
    const fields: Record<string, string> = {
      queue_data: JSON.stringify(tracks.map(track => track.toDict())),
      current_index: String(currentIndex),
      loop_mode: loopMode,
      volume: String(volumePercent),
    };

    await ErrorHandler.safeExecute(
      async () => {
        if (this.client) {
          await this.client.hSet(key, fields);
          await this.client.expire(key, QUEUE_TTL_SECONDS);
        } else {
          this.memory.set(key, { value: fields, expiresAt: Date.now() + QUEUE_TTL_SECONDS * 1000 });
        }
      },
      this.logger,
      'Save queue',
      undefined,
      { category: LogCategory.DATABASE, guildId },
    );
  }

  public async loadQueue(guildId: string): Promise<PersistedQueue | null> {
    const key = queueKey(guildId);

    let fields: Record<string, string>;
    if (this.client) {
      fields = await this.client.hGetAll(key);
    } else {
      const stored = this.readMemory(key);
      fields = isRecord(stored) ? stored : {};
    }

    const raw = fields.queue_data;
    if (!raw) {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.logger.warn('Stored queue is not valid JSON, ignoring it', {
        category: LogCategory.DATABASE,
        guildId,
        error: ErrorHandler.toError(error),
      });
      return null;
    }

    if (!Array.isArray(parsed)) {
      this.logger.warn('Stored queue has an unexpected shape, ignoring it', {
        category: LogCategory.DATABASE,
        guildId,
      });
      return null;
    }

    return {
      tracks: this.normalizeTracks(parsed),
      currentIndex: parseInteger(fields.current_index, 0),
      loopMode: parseLoopMode(fields.loop_mode),
      volumePercent: parseInteger(fields.volume, 100),
    };
  }

  public async clearGuildQueue(guildId: string): Promise<void> {
    await this.deleteKey(queueKey(guildId));
  }

  // ---- playlists ---------------------------------------------------------

  public async savePlaylist(userId: string, name: string, tracks: readonly Track[]): Promise<boolean> {
    const key = playlistKey(userId, name);
    const payload = JSON.stringify(tracks.map(track => track.toDict()));

    return ErrorHandler.safeExecute(
      async () => {
        if (this.client) {
          await this.client.set(key, payload);
        } else {
          this.memory.set(key, { value: payload, expiresAt: null });
        }
        return true;
      },
      this.logger,
      'Save playlist',
      false,
      { category: LogCategory.DATABASE, userId },
    );
  }

  public async loadPlaylist(userId: string, name: string): Promise<PersistedTrack[] | null> {
    const key = playlistKey(userId, name);

    let raw: string | null;
    if (this.client) {
      raw = await this.client.get(key);
    } else {
      const stored = this.readMemory(key);
      raw = typeof stored === 'string' ? stored : null;
    }

    if (!raw) {
      return null;
    }

    try {
      const parsed: unknown = JSON.parse(raw);
      return Array.isArray(parsed) ? this.normalizeTracks(parsed) : null;
    } catch (error) {
      this.logger.warn(`Stored playlist "${name}" is not valid JSON`, {
        category: LogCategory.DATABASE,
        userId,
        error: ErrorHandler.toError(error),
      });
      return null;
    }
  }

  public async listPlaylists(userId: string): Promise<string[]> {
    const prefix = playlistKey(userId, '');

    let keys: string[];
    if (this.client) {
      keys = await this.client.keys(`${prefix}*`);
    } else {
      keys = [...this.memory.keys()].filter(key => key.startsWith(prefix) && this.readMemory(key) !== null);
    }

    return keys.map(key => key.slice(prefix.length)).sort((a, b) => a.localeCompare(b));
  }

  public async deletePlaylist(userId: string, name: string): Promise<boolean> {
    return ErrorHandler.safeExecute(
      () => this.deleteKey(playlistKey(userId, name)),
      this.logger,
      'Delete playlist',
      false,
      { category: LogCategory.DATABASE, userId },
    );
  }

  // ---- helpers -----------------------------------------------------------

  private async deleteKey(key: string): Promise<boolean> {
    if (this.client) {
      return (await this.client.del(key)) > 0;
    }
    return this.memory.delete(key);
  }

  private readMemory(key: string): string | Record<string, string> | null {
    const entry = this.memory.get(key);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt !== null && entry.expiresAt <= Date.now()) {
      this.memory.delete(key);
      return null;
    }
    return entry.value;
  }

  private normalizeTracks(raw: unknown[]): PersistedTrack[] {
    return raw.filter(isRecord).map(data => Track.fromDict(data).toDict());
  }
}
