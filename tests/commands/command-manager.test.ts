import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { SlashCommandBuilder } from 'discord.js';
import { CommandManager } from '../../src/commands/index';
import { loadCommands } from '../../src/commands/registry';
import { Command, CommandCategory } from '../../src/types/command';
import { RateLimiter } from '../../src/utils/rate-limiter';

function fakeCommand(name: string, category: CommandCategory, cooldown?: number): Command {
  return {
    data: new SlashCommandBuilder().setName(name).setDescription(`${name} command`),
    category,
    cooldown,
    execute: async () => undefined,
  };
}

describe('CommandManager', () => {
  let limiter: RateLimiter;
  let manager: CommandManager;

  beforeEach(() => {
    limiter = new RateLimiter({ maxRequests: 20, windowMs: 60_000 });
    manager = new CommandManager(
      [
        fakeCommand('play', CommandCategory.MUSIC, 3),
        fakeCommand('skip', CommandCategory.MUSIC),
        fakeCommand('ping', CommandCategory.GENERAL),
        fakeCommand('play', CommandCategory.GENERAL),
      ],
      limiter,
    );
  });

  afterEach(() => {
    manager.shutdown();
  });

  it('deve ignorar nomes duplicados', () => {
    expect(manager.commands.size).toBe(3);
    expect(manager.getCommand('play')?.category).toBe(CommandCategory.MUSIC);
    expect(manager.getCommand('missing')).toBeNull();
  });

  describe('isOnCooldown', () => {
    it('deve aplicar o cooldown por usuário', () => {
      expect(manager.isOnCooldown('play', 'user-1', 10_000)).toEqual({ onCooldown: false });
      expect(manager.isOnCooldown('play', 'user-1', 11_000)).toEqual({ onCooldown: true, timeLeft: 2 });
      expect(manager.isOnCooldown('play', 'user-2', 11_000)).toEqual({ onCooldown: false });
      expect(manager.isOnCooldown('play', 'user-1', 13_000)).toEqual({ onCooldown: false });
    });

    it('deve ignorar comandos sem cooldown', () => {
      expect(manager.isOnCooldown('skip', 'user-1', 0)).toEqual({ onCooldown: false });
      expect(manager.isOnCooldown('skip', 'user-1', 1)).toEqual({ onCooldown: false });
    });
  });

  it('deve agrupar comandos por categoria', () => {
    expect(manager.getCommandsByCategory(CommandCategory.MUSIC).map(command => command.data.name)).toEqual([
      'play',
      'skip',
    ]);
    expect(manager.getStats()).toEqual({
      totalCommands: 3,
      categories: { music: 2, general: 1 },
      cooldowns: 0,
    });
  });
});

describe('loadCommands', () => {
  it('deve registrar todos os comandos com nomes únicos', () => {
    const names = loadCommands().map(command => command.data.name);

    expect(new Set(names).size).toBe(names.length);
    expect(names).toEqual(
      expect.arrayContaining(['play', 'search', 'queue', 'playlist', 'help', 'sync']),
    );
    expect(names).toHaveLength(24);
  });

  it('deve marcar sync como exclusivo do dono', () => {
    const sync = loadCommands().find(command => command.data.name === 'sync');
    expect(sync?.ownerOnly).toBe(true);
  });
});
