import { jest, describe, it, expect, beforeEach } from '@jest/globals';
import { SlashCommandBuilder } from 'discord.js';
import { CommandDeployer, CommandRestClient } from '../../src/services/command-deployer.service';
import { Command, CommandCategory } from '../../src/types/command';

const commands: Command[] = ['play', 'skip'].map(name => ({
  data: new SlashCommandBuilder().setName(name).setDescription(`${name} command`),
  category: CommandCategory.MUSIC,
  execute: async () => undefined,
}));

describe('CommandDeployer', () => {
  let put: jest.Mock<CommandRestClient['put']>;
  let deployer: CommandDeployer;

  beforeEach(() => {
    put = jest.fn<CommandRestClient['put']>();
    deployer = new CommandDeployer('test-token', 'app-1', { rest: { put } });
  });

  it('deve publicar globalmente sem guild', async () => {
    put.mockResolvedValue([{ id: '1' }, { id: '2' }]);

    expect(await deployer.deploy(commands)).toBe(2);
    expect(put).toHaveBeenCalledWith('/applications/app-1/commands', {
      body: commands.map(command => command.data.toJSON()),
    });
  });

  it('deve publicar em uma guild quando informada', async () => {
    put.mockResolvedValue(undefined);

    expect(await deployer.deploy(commands, 'guild-1')).toBe(2);
    expect(put.mock.calls[0][0]).toBe('/applications/app-1/guilds/guild-1/commands');
  });

  it('deve limpar os comandos publicados', async () => {
    put.mockResolvedValue([]);

    await deployer.clear('guild-1');
    expect(put).toHaveBeenCalledWith('/applications/app-1/guilds/guild-1/commands', { body: [] });
  });

  it('deve propagar falhas da API', async () => {
    put.mockRejectedValue(new Error('401: Unauthorized'));
    await expect(deployer.deployGlobal(commands)).rejects.toThrow('401: Unauthorized');
  });
});
