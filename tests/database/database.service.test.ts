import { jest, describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { DatabaseService, QUEUE_TTL_SECONDS, playlistKey, queueKey } from '../../src/database/database.service';
import { LoopMode } from '../../src/music/queue';
import { makeTrack } from '../helpers/music-fakes';

describe('DatabaseService (memória)', () => {
  let db: DatabaseService;

  beforeEach(async () => {
    db = new DatabaseService({ useRedis: false, redisUrl: 'redis://localhost:6379/0' });
    await db.connect();
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await db.disconnect();
  });

  it('deve usar o backend em memória quando o Redis está desligado', async () => {
    expect(db.backend).toBe('memory');
    expect(await db.healthCheck()).toBe(true);
  });

  it('deve montar as chaves no mesmo formato do Redis', () => {
    expect(queueKey('guild-1')).toBe('queue:guild-1');
    expect(playlistKey('user-1', 'Favoritas')).toBe('playlist:user-1:Favoritas');
  });

  describe('fila', () => {
    it('deve salvar e carregar o estado da fila', async () => {
      await db.saveQueue('guild-1', [makeTrack(1), makeTrack(2)], 1, LoopMode.ALL, 80);

      const state = await db.loadQueue('guild-1');

      expect(state?.tracks.map(track => track.url)).toEqual(['https://example.com/1', 'https://example.com/2']);
      expect(state?.tracks[0]).toEqual(makeTrack(1).toDict());
      expect(state?.currentIndex).toBe(1);
      expect(state?.loopMode).toBe(LoopMode.ALL);
      expect(state?.volumePercent).toBe(80);
    });

    it('deve retornar null quando não há fila salva', async () => {
      expect(await db.loadQueue('guild-unknown')).toBeNull();
    });

    it('deve expirar a fila após o TTL', async () => {
      const savedAt = Date.now();
      jest.spyOn(Date, 'now').mockReturnValue(savedAt);
      await db.saveQueue('guild-1', [makeTrack(1)], 0, LoopMode.OFF, 100);

      jest.spyOn(Date, 'now').mockReturnValue(savedAt + QUEUE_TTL_SECONDS * 1000);
      expect(await db.loadQueue('guild-1')).toBeNull();
    });

    it('deve apagar a fila da guild', async () => {
      await db.saveQueue('guild-1', [makeTrack(1)], 0, LoopMode.OFF, 100);
      await db.clearGuildQueue('guild-1');
      expect(await db.loadQueue('guild-1')).toBeNull();
    });
  });

  describe('playlists', () => {
    it('deve salvar e carregar uma playlist', async () => {
      expect(await db.savePlaylist('user-1', 'Favoritas', [makeTrack(1), makeTrack(2)])).toBe(true);

      const tracks = await db.loadPlaylist('user-1', 'Favoritas');
      expect(tracks).toEqual([makeTrack(1).toDict(), makeTrack(2).toDict()]);
    });

    it('deve retornar null para playlists inexistentes', async () => {
      expect(await db.loadPlaylist('user-1', 'Nada')).toBeNull();
    });

    it('deve listar as playlists do usuário em ordem alfabética', async () => {
      await db.savePlaylist('user-1', 'Treino', [makeTrack(1)]);
      await db.savePlaylist('user-1', 'Estudo', [makeTrack(2)]);
      await db.savePlaylist('user-2', 'Outra', [makeTrack(3)]);

      expect(await db.listPlaylists('user-1')).toEqual(['Estudo', 'Treino']);
    });

    it('deve apagar playlists', async () => {
      await db.savePlaylist('user-1', 'Treino', [makeTrack(1)]);

      expect(await db.deletePlaylist('user-1', 'Treino')).toBe(true);
      expect(await db.deletePlaylist('user-1', 'Treino')).toBe(false);
      expect(await db.listPlaylists('user-1')).toEqual([]);
    });

    it('não deve expirar playlists', async () => {
      await db.savePlaylist('user-1', 'Treino', [makeTrack(1)]);
      jest.spyOn(Date, 'now').mockReturnValue(Date.now() + QUEUE_TTL_SECONDS * 2000);
      expect(await db.loadPlaylist('user-1', 'Treino')).toHaveLength(1);
    });
  });
});
