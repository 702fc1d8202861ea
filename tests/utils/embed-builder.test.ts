import { describe, it, expect } from '@jest/globals';
import { EmbedUtils } from '../../src/utils/embed-builder.util';
import { THEME_COLORS } from '../../src/constants/colors';
import { MusicQueue, LoopMode } from '../../src/music/queue';
import { Track } from '../../src/music/track';
import { makeTrack } from '../helpers/music-fakes';

function queueOf(count: number): MusicQueue {
  const queue = new MusicQueue();
  for (let i = 1; i <= count; i++) {
    queue.add(makeTrack(i));
  }
  return queue;
}

describe('EmbedUtils', () => {
  it('deve criar embeds de status com ícone e cor', () => {
    const error = EmbedUtils.createErrorEmbed('Falhou', 'detalhes').toJSON();
    expect(error.title).toBe('❌ Falhou');
    expect(error.description).toBe('detalhes');
    expect(error.color).toBe(THEME_COLORS.ERROR);

    expect(EmbedUtils.createSuccessEmbed('Pronto').toJSON().title).toBe('✅ Pronto');
  });

  describe('createTrackEmbed', () => {
    it('deve mostrar duração, fonte e posição', () => {
      const embed = EmbedUtils.createTrackEmbed(makeTrack(1), '✅ Adicionado à Fila', 3).toJSON();

      expect(embed.title).toBe('✅ Adicionado à Fila');
      expect(embed.fields).toEqual([
        { name: '⏱️ Duração', value: '3:00', inline: true },
        { name: '🔗 Fonte', value: '▶️ YouTube', inline: true },
        { name: '📍 Posição na Fila', value: '#3', inline: true },
      ]);
      expect(embed.footer?.text).toBe('Solicitado por Tester');
    });

    it('deve capitalizar fontes desconhecidas', () => {
      const track = new Track({ url: 'https://example.com/b', source: 'bandcamp' });
      const embed = EmbedUtils.createTrackEmbed(track).toJSON();
      expect(embed.fields?.[1]).toEqual({ name: '🔗 Fonte', value: 'Bandcamp', inline: true });
    });
  });

  describe('createQueueEmbed', () => {
    it('deve indicar fila vazia', () => {
      const { embed, page, totalPages } = EmbedUtils.createQueueEmbed(new MusicQueue());
      expect(embed.toJSON().description).toBe('A fila está vazia. Use `/play` para adicionar músicas!');
      expect(page).toBe(1);
      expect(totalPages).toBe(1);
    });

    it('deve numerar as próximas faixas pela posição absoluta', () => {
      const queue = queueOf(3);
      const { embed } = EmbedUtils.createQueueEmbed(queue);
      const json = embed.toJSON();

      expect(json.fields?.[0].value).toBe('**[Track 1](https://example.com/1)** [3:00]');
      expect(json.fields?.[1]).toEqual({
        name: '📋 Próximas (2)',
        value: '`2.` [Track 2](https://example.com/2) [3:00]\n`3.` [Track 3](https://example.com/3) [3:00]',
        inline: false,
      });
      expect(json.footer?.text).toBe('Página 1/1 • 3 músicas • 9m 0s • Loop: ➡️');
    });

    it('deve paginar e limitar a página pedida', () => {
      const queue = queueOf(26);
      queue.setLoopMode(LoopMode.ALL);

      const second = EmbedUtils.createQueueEmbed(queue, 2);
      expect(second.totalPages).toBe(3);
      expect(second.embed.toJSON().fields?.[1].value.split('\n')[0]).toBe(
        '`12.` [Track 12](https://example.com/12) [3:00]',
      );

      const clamped = EmbedUtils.createQueueEmbed(queue, 9);
      expect(clamped.page).toBe(3);
      expect(clamped.embed.toJSON().footer?.text).toBe('Página 3/3 • 26 músicas • 1h 18m • Loop: 🔁');
    });
  });

  it('deve listar resultados de busca', () => {
    const embed = EmbedUtils.createSearchEmbed([makeTrack(1), makeTrack(2)], 'lofi').toJSON();
    expect(embed.title).toBe('🔍 Resultados para: lofi');
    expect(embed.description).toBe('`1.` **Track 1** [3:00]\n`2.` **Track 2** [3:00]');
  });
});
