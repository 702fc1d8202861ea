import { describe, it, expect } from '@jest/globals';
import { FormatUtils } from '../../src/utils/format.util';

describe('Format Utils', () => {
  describe('formatClock', () => {
    it('deve formatar minutos e segundos', () => {
      expect(FormatUtils.formatClock(0)).toBe('0:00');
      expect(FormatUtils.formatClock(65)).toBe('1:05');
      expect(FormatUtils.formatClock(599.9)).toBe('9:59');
    });

    it('deve incluir horas a partir de uma hora', () => {
      expect(FormatUtils.formatClock(3600)).toBe('1:00:00');
      expect(FormatUtils.formatClock(3661)).toBe('1:01:01');
    });

    it('deve tratar valores negativos como zero', () => {
      expect(FormatUtils.formatClock(-5)).toBe('0:00');
    });
  });

  describe('formatQueueLength', () => {
    it('deve resumir a duração da fila', () => {
      expect(FormatUtils.formatQueueLength(250)).toBe('4m 10s');
      expect(FormatUtils.formatQueueLength(3900)).toBe('1h 5m');
    });
  });

  describe('formatDuration', () => {
    it('deve formatar durações em milissegundos', () => {
      expect(FormatUtils.formatDuration(90000)).toBe('1m 30s');
      expect(FormatUtils.formatDuration(90061000)).toBe('1d 1h 1m 1s');
    });

    it('deve lidar com zero', () => {
      expect(FormatUtils.formatDuration(0)).toBe('0s');
    });
  });

  describe('truncate', () => {
    it('deve truncar com sufixo', () => {
      expect(FormatUtils.truncate('abcdef', 5)).toBe('ab...');
      expect(FormatUtils.truncate('abc', 5)).toBe('abc');
    });
  });

  describe('capitalize', () => {
    it('deve capitalizar a primeira letra', () => {
      expect(FormatUtils.capitalize('bANDCAMP')).toBe('Bandcamp');
    });
  });

  describe('formatProgressBar', () => {
    it('deve preencher proporcionalmente', () => {
      expect(FormatUtils.formatProgressBar(5, 10)).toBe('█████░░░░░');
      expect(FormatUtils.formatProgressBar(20, 10)).toBe('██████████');
    });

    it('deve retornar barra vazia sem máximo', () => {
      expect(FormatUtils.formatProgressBar(3, 0, 4)).toBe('░░░░');
    });
  });
});
