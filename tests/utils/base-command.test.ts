import { describe, it, expect } from '@jest/globals';
import { hasDjAccess, isBotOwner } from '../../src/utils/base-command.util';

describe('base-command.util', () => {
  describe('hasDjAccess', () => {
    it('deve liberar quem pode gerenciar o servidor', () => {
      expect(hasDjAccess({ hasManageGuild: true, roleNames: [], listenerCount: 5 })).toBe(true);
    });

    it('deve liberar o cargo DJ sem diferenciar maiúsculas', () => {
      expect(hasDjAccess({ hasManageGuild: false, roleNames: ['Membro', 'Dj'], listenerCount: 5 })).toBe(true);
    });

    it('deve liberar quem está sozinho com o bot', () => {
      expect(hasDjAccess({ hasManageGuild: false, roleNames: [], listenerCount: 1 })).toBe(true);
    });

    it('deve negar nos demais casos', () => {
      expect(hasDjAccess({ hasManageGuild: false, roleNames: ['DJs'], listenerCount: 2 })).toBe(false);
      expect(hasDjAccess({ hasManageGuild: false, roleNames: [], listenerCount: 0 })).toBe(false);
    });
  });

  describe('isBotOwner', () => {
    it('deve comparar com o dono configurado', () => {
      expect(isBotOwner('owner-1', 'owner-1')).toBe(true);
      expect(isBotOwner('user-1', 'owner-1')).toBe(false);
      expect(isBotOwner('user-1', undefined)).toBe(false);
    });
  });
});
