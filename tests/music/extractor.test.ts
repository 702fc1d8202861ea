import { jest, describe, it, expect, beforeEach } from '@jest/globals';
import { YtDlpExtractor, ProcessRunner, parseExtraction } from '../../src/music/extractor';
import { Track } from '../../src/music/track';

describe('YtDlpExtractor', () => {
  let runner: jest.Mock<ProcessRunner>;
  let extractor: YtDlpExtractor;

  function lastArgs(): string[] {
    const call = runner.mock.calls[runner.mock.calls.length - 1];
    return call ? call[0] : [];
  }

  beforeEach(() => {
    runner = jest.fn<ProcessRunner>();
    extractor = new YtDlpExtractor({ runner });
  });

  describe('extract', () => {
    it('deve repassar URLs e converter o resultado em faixa', async () => {
      runner.mockResolvedValue(
        JSON.stringify({
          url: 'https://cdn.example.com/audio',
          webpage_url: 'https://www.youtube.com/watch?v=abc',
          title: 'Song',
          duration: 200,
          thumbnail: 'https://img.example.com/abc.jpg',
          extractor_key: 'Youtube',
        }),
      );

      const tracks = await extractor.extract('https://www.youtube.com/watch?v=abc', 'user-1', 'Ana');

      expect(lastArgs()[lastArgs().length - 1]).toBe('https://www.youtube.com/watch?v=abc');
      expect(lastArgs()).toContain('--dump-single-json');
      expect(tracks).toHaveLength(1);
      expect(tracks[0].url).toBe('https://www.youtube.com/watch?v=abc');
      expect(tracks[0].streamUrl).toBe('https://cdn.example.com/audio');
      expect(tracks[0].source).toBe('youtube');
      expect(tracks[0].thumbnail).toBe('https://img.example.com/abc.jpg');
      expect(tracks[0].requesterName).toBe('Ana');
    });

    it('deve buscar no YouTube quando o texto não é URL', async () => {
      runner.mockResolvedValue(
        JSON.stringify({
          title: 'lofi beats',
          entries: [
            { webpage_url: 'https://www.youtube.com/watch?v=1', title: 'First', duration: 60 },
            null,
            'garbage',
            { title: 'No url at all' },
          ],
        }),
      );

      const tracks = await extractor.extract('  lofi beats ', 'user-1', 'Ana');

      expect(lastArgs()[lastArgs().length - 1]).toBe('ytsearch1:lofi beats');
      expect(tracks.map(track => track.title)).toEqual(['First']);
    });

    it('deve passar o arquivo de cookies quando configurado', async () => {
      runner.mockResolvedValue('{}');
      const withCookies = new YtDlpExtractor({ runner, cookiesPath: 'cookies.txt' });

      await withCookies.extract('https://example.com/a', 'u', 'n');

      const args = lastArgs();
      expect(args[args.indexOf('--cookies') + 1]).toBe('cookies.txt');
    });

    it('deve retornar lista vazia quando o processo falha', async () => {
      runner.mockRejectedValue(new Error('yt-dlp exited with code 1'));
      expect(await extractor.extract('https://example.com/a', 'u', 'n')).toEqual([]);
    });

    it('deve retornar lista vazia para JSON inválido', async () => {
      runner.mockResolvedValue('not json');
      expect(await extractor.extract('https://example.com/a', 'u', 'n')).toEqual([]);
    });

    it('não deve executar nada para consultas vazias', async () => {
      expect(await extractor.extract('   ', 'u', 'n')).toEqual([]);
      expect(runner).not.toHaveBeenCalled();
    });
  });

  describe('search', () => {
    it('deve usar o prefixo da fonte e o limite', async () => {
      runner.mockResolvedValue(JSON.stringify({ entries: [] }));

      await extractor.search('rain sounds', 'u', 'n', 3, 'soundcloud');
      expect(lastArgs()[lastArgs().length - 1]).toBe('scsearch3:rain sounds');

      await extractor.search('rain sounds', 'u', 'n');
      expect(lastArgs()[lastArgs().length - 1]).toBe('ytsearch5:rain sounds');
    });
  });

  describe('getStreamUrl', () => {
    const track = new Track({ url: 'query', webpageUrl: 'https://www.youtube.com/watch?v=xyz', title: 'Song' });

    it('deve extrair a partir da página da faixa', async () => {
      runner.mockResolvedValue(JSON.stringify({ url: 'https://cdn.example.com/fresh' }));
      expect(await extractor.getStreamUrl(track)).toBe('https://cdn.example.com/fresh');
      expect(lastArgs()[lastArgs().length - 1]).toBe('https://www.youtube.com/watch?v=xyz');
    });

    it('deve usar a primeira entrada de uma coleção', async () => {
      runner.mockResolvedValue(JSON.stringify({ entries: [{ url: 'https://cdn.example.com/first' }] }));
      expect(await extractor.getStreamUrl(track)).toBe('https://cdn.example.com/first');
    });

    it('deve retornar null quando não há URL', async () => {
      runner.mockResolvedValue(JSON.stringify({ entries: [] }));
      expect(await extractor.getStreamUrl(track)).toBeNull();

      runner.mockRejectedValue(new Error('timed out'));
      expect(await extractor.getStreamUrl(track)).toBeNull();
    });
  });

  describe('URL helpers', () => {
    it('deve reconhecer URLs', () => {
      expect(YtDlpExtractor.isUrl('https://example.com/x')).toBe(true);
      expect(YtDlpExtractor.isUrl('example.com/x')).toBe(false);
      expect(YtDlpExtractor.isYoutubeUrl('https://youtu.be/abc')).toBe(true);
      expect(YtDlpExtractor.isSoundcloudUrl('https://soundcloud.com/artist/song')).toBe(true);
      expect(YtDlpExtractor.isSoundcloudUrl('https://www.youtube.com/watch?v=1')).toBe(false);
    });

    it('deve reconhecer playlists', () => {
      expect(YtDlpExtractor.isPlaylistUrl('https://www.youtube.com/watch?v=1&list=PL123')).toBe(true);
      expect(YtDlpExtractor.isPlaylistUrl('https://www.youtube.com/PLAYLIST?id=1')).toBe(true);
      expect(YtDlpExtractor.isPlaylistUrl('https://www.youtube.com/watch?v=1')).toBe(false);
    });
  });

  describe('parseExtraction', () => {
    it('deve rejeitar documentos que não são objetos', () => {
      expect(parseExtraction(null)).toBeNull();
      expect(parseExtraction([])).toBeNull();
      expect(parseExtraction('text')).toBeNull();
    });

    it('deve distinguir item único de coleção', () => {
      expect(parseExtraction({ title: 'One', duration: 'long' })).toEqual({
        kind: 'single',
        info: {
          url: undefined,
          originalUrl: undefined,
          webpageUrl: undefined,
          title: 'One',
          duration: undefined,
          thumbnail: undefined,
          extractor: undefined,
        },
      });
      expect(parseExtraction({ title: 'Many', entries: [] })).toEqual({ kind: 'collection', title: 'Many', entries: [] });
    });
  });
});
