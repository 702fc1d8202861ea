import { ConfigError } from '../utils/error-handler.util';

/**
 * Runtime settings, read from the environment (and .env through dotenv)
 */
export interface BotConfig {
  discordToken: string;
  clientId: string;
  /** Deploy commands to this guild only */
  devGuildId?: string;
  botOwnerId?: string;
  useRedis: boolean;
  redisUrl: string;
  defaultVolume: number;
  maxQueueSize: number;
  /** Seconds */
  inactivityTimeout: number;
  rateLimitCommands: number;
  rateLimitWindowSeconds: number;
  youtubeCookiesPath?: string;
  ytdlpPath: string;
}

export const DEFAULT_REDIS_URL = 'redis://localhost:6379/0';

function readInteger(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function readOptional(raw: string | undefined): string | undefined {
  const value = raw?.trim();
  return value ? value : undefined;
}

export function loadBotConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  const discordToken = readOptional(env.DISCORD_TOKEN);
  if (!discordToken) {
    throw new ConfigError('DISCORD_TOKEN is required');
  }

  const ownerId = readOptional(env.BOT_OWNER_ID);

  return {
    discordToken,
    clientId: readOptional(env.DISCORD_CLIENT_ID) ?? '',
    devGuildId: readOptional(env.DISCORD_GUILD_ID),
    botOwnerId: ownerId && ownerId !== '0' ? ownerId : undefined,
    useRedis: (env.USE_REDIS ?? '').trim().toLowerCase() === 'true',
    redisUrl: readOptional(env.REDIS_URL) ?? DEFAULT_REDIS_URL,
    defaultVolume: Math.max(0, Math.min(200, readInteger(env.DEFAULT_VOLUME, 100))),
    maxQueueSize: Math.max(1, readInteger(env.MAX_QUEUE_SIZE, 500)),
    inactivityTimeout: Math.max(60, readInteger(env.INACTIVITY_TIMEOUT, 300)),
    rateLimitCommands: Math.max(1, readInteger(env.RATE_LIMIT_COMMANDS, 20)),
    rateLimitWindowSeconds: Math.max(1, readInteger(env.RATE_LIMIT_WINDOW, 60)),
    youtubeCookiesPath: readOptional(env.YOUTUBE_COOKIES_PATH),
    ytdlpPath: readOptional(env.YTDLP_PATH) ?? 'yt-dlp',
  };
}
