import { describe, it, expect } from '@jest/globals';
import { loadBotConfig, DEFAULT_REDIS_URL } from '../../src/config/bot.config';
import { ConfigError } from '../../src/utils/error-handler.util';

describe('loadBotConfig', () => {
  it('deve exigir DISCORD_TOKEN', () => {
    expect(() => loadBotConfig({})).toThrow(ConfigError);
    expect(() => loadBotConfig({ DISCORD_TOKEN: '   ' })).toThrow('DISCORD_TOKEN is required');
  });

  it('deve aplicar os valores padrão', () => {
    expect(loadBotConfig({ DISCORD_TOKEN: 'test-token' })).toEqual({
      discordToken: 'test-token',
      clientId: '',
      devGuildId: undefined,
      botOwnerId: undefined,
      useRedis: false,
      redisUrl: DEFAULT_REDIS_URL,
      defaultVolume: 100,
      maxQueueSize: 500,
      inactivityTimeout: 300,
      rateLimitCommands: 20,
      rateLimitWindowSeconds: 60,
      youtubeCookiesPath: undefined,
      ytdlpPath: 'yt-dlp',
    });
  });

  it('deve limitar valores numéricos', () => {
    const config = loadBotConfig({
      DISCORD_TOKEN: 'test-token',
      DEFAULT_VOLUME: '500',
      MAX_QUEUE_SIZE: '0',
      INACTIVITY_TIMEOUT: '10',
      RATE_LIMIT_COMMANDS: '-3',
    });

    expect(config.defaultVolume).toBe(200);
    expect(config.maxQueueSize).toBe(1);
    expect(config.inactivityTimeout).toBe(60);
    expect(config.rateLimitCommands).toBe(1);
  });

  it('deve usar o padrão para números inválidos', () => {
    const config = loadBotConfig({ DISCORD_TOKEN: 'test-token', INACTIVITY_TIMEOUT: 'abc', DEFAULT_VOLUME: '' });
    expect(config.inactivityTimeout).toBe(300);
    expect(config.defaultVolume).toBe(100);
  });

  it('deve interpretar dono, Redis e caminhos opcionais', () => {
    const config = loadBotConfig({
      DISCORD_TOKEN: 'test-token',
      DISCORD_CLIENT_ID: 'app-1',
      DISCORD_GUILD_ID: 'guild-1',
      BOT_OWNER_ID: 'owner-1',
      USE_REDIS: 'TRUE',
      REDIS_URL: 'redis://cache:6379/1',
      YOUTUBE_COOKIES_PATH: '/data/cookies.txt',
      YTDLP_PATH: '/usr/local/bin/yt-dlp',
    });

    expect(config.clientId).toBe('app-1');
    expect(config.devGuildId).toBe('guild-1');
    expect(config.botOwnerId).toBe('owner-1');
    expect(config.useRedis).toBe(true);
    expect(config.redisUrl).toBe('redis://cache:6379/1');
    expect(config.youtubeCookiesPath).toBe('/data/cookies.txt');
    expect(config.ytdlpPath).toBe('/usr/local/bin/yt-dlp');
  });

  it('deve tratar BOT_OWNER_ID "0" como ausente', () => {
    expect(loadBotConfig({ DISCORD_TOKEN: 'test-token', BOT_OWNER_ID: '0' }).botOwnerId).toBeUndefined();
  });
});
