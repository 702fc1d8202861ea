import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { EmbedBuilder } from 'discord.js';
import { MusicService, AnnouncementChannel } from '../../src/services/music.service';
import { LoopMode } from '../../src/music/queue';
import {
  FakeExtractor,
  FakeTransport,
  RecordingStore,
  GUILD_ID,
  makeChannel,
  makeTrack,
} from '../helpers/music-fakes';

function recordingChannel(sent: EmbedBuilder[][]): AnnouncementChannel {
  return {
    id: 'text-1',
    send: async options => {
      sent.push(options.embeds);
      return undefined;
    },
  };
}

describe('MusicService', () => {
  let transport: FakeTransport;
  let store: RecordingStore;
  let service: MusicService;

  beforeEach(() => {
    transport = new FakeTransport();
    store = new RecordingStore();
    service = new MusicService({
      extractor: new FakeExtractor(),
      transport,
      store,
      defaultVolume: 100,
      maxQueueSize: 500,
      inactivityTimeout: 300,
      persistDebounceMs: 0,
    });
  });

  afterEach(async () => {
    await service.shutdown();
  });

  describe('getPlayer', () => {
    it('deve reutilizar o player da guild', async () => {
      const first = await service.getPlayer(GUILD_ID);
      expect(await service.getPlayer(GUILD_ID)).toBe(first);
      expect(service.getExistingPlayer(GUILD_ID)).toBe(first);
      expect(service.playerCount).toBe(1);
    });

    it('deve compartilhar a criação entre chamadas simultâneas', async () => {
      const [a, b] = await Promise.all([service.getPlayer(GUILD_ID), service.getPlayer(GUILD_ID)]);
      expect(a).toBe(b);
      expect(store.loads).toBe(1);
    });

    it('deve restaurar o estado salvo ao criar o player', async () => {
      store.stored = {
        tracks: [makeTrack(1).toDict(), makeTrack(2).toDict()],
        currentIndex: 0,
        loopMode: LoopMode.ONE,
        volumePercent: 70,
      };

      const player = await service.getPlayer(GUILD_ID);

      expect(player.queue.size).toBe(2);
      expect(player.queue.loopMode).toBe(LoopMode.ONE);
      expect(player.volume).toBe(70);
    });

    it('não deve criar player em getExistingPlayer', () => {
      expect(service.getExistingPlayer('guild-2')).toBeUndefined();
    });
  });

  describe('anúncios', () => {
    it('deve anunciar a faixa no canal de texto lembrado', async () => {
      const sent: EmbedBuilder[][] = [];
      service.setAnnouncementChannel(GUILD_ID, recordingChannel(sent));

      const player = await service.getPlayer(GUILD_ID);
      await player.addTrack(makeTrack(1));
      await player.connect(makeChannel());
      await player.play();

      expect(sent).toHaveLength(1);
      expect(sent[0][0].toJSON().title).toBe('🎵 Tocando Agora');
      expect(sent[0][0].toJSON().description).toBe('**[Track 1](https://example.com/1)**');
    });

    it('deve avisar quando a fila termina', async () => {
      const sent: EmbedBuilder[][] = [];
      service.setAnnouncementChannel(GUILD_ID, recordingChannel(sent));

      const player = await service.getPlayer(GUILD_ID);
      await player.addTrack(makeTrack(1));
      await player.connect(makeChannel());
      await player.play();
      await player.skip();

      expect(sent).toHaveLength(2);
      expect(sent[1][0].toJSON().title).toBe('ℹ️ Fila finalizada');
    });
  });

  describe('removeGuild', () => {
    it('deve desconectar o player e apagar a fila salva', async () => {
      const player = await service.getPlayer(GUILD_ID);
      await player.connect(makeChannel());

      await service.removeGuild(GUILD_ID);

      expect(transport.lastSession.disconnectCount).toBe(1);
      expect(service.getExistingPlayer(GUILD_ID)).toBeUndefined();
      expect(store.cleared).toEqual([GUILD_ID]);
    });
  });

  describe('shutdown', () => {
    it('deve desconectar todos os players', async () => {
      const first = await service.getPlayer('guild-1');
      const second = await service.getPlayer('guild-2');
      await first.connect(makeChannel('voice-1'));
      await second.connect({ id: 'voice-2', guildId: 'guild-2', name: 'Outro' });

      await service.shutdown();

      expect(transport.sessions.map(session => session.disconnectCount)).toEqual([1, 1]);
      expect(service.playerCount).toBe(0);
    });
  });
});
