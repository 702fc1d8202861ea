import { describe, it, expect } from '@jest/globals';
import { Track, sourceFromExtractor, DEFAULT_TITLE } from '../../src/music/track';

describe('Track', () => {
  describe('durationString', () => {
    it('deve mostrar Live para duração zero', () => {
      expect(new Track({ url: 'https://example.com/live', duration: 0 }).durationString).toBe('Live');
    });

    it('deve usar M:SS abaixo de uma hora', () => {
      expect(new Track({ url: 'u', duration: 59 }).durationString).toBe('0:59');
      expect(new Track({ url: 'u', duration: 605 }).durationString).toBe('10:05');
    });

    it('deve usar H:MM:SS a partir de uma hora', () => {
      expect(new Track({ url: 'u', duration: 3725 }).durationString).toBe('1:02:05');
    });
  });

  describe('displayTitle', () => {
    it('deve truncar títulos longos em 57 caracteres mais reticências', () => {
      const track = new Track({ url: 'u', title: 'a'.repeat(61) });
      expect(track.displayTitle).toBe(`${'a'.repeat(57)}...`);
    });

    it('deve manter títulos de até 60 caracteres', () => {
      const title = 'b'.repeat(60);
      expect(new Track({ url: 'u', title }).displayTitle).toBe(title);
    });
  });

  it('deve aplicar valores padrão no construtor', () => {
    const track = new Track({ url: 'https://example.com/x', title: '   ', duration: -4 });
    expect(track.title).toBe(DEFAULT_TITLE);
    expect(track.duration).toBe(0);
    expect(track.isLive).toBe(true);
    expect(track.source).toBe('unknown');
    expect(track.requesterName).toBe('Unknown');
    expect(track.requesterId).toBeNull();
    expect(track.link).toBe('https://example.com/x');
  });

  describe('toDict / fromDict', () => {
    it('não deve persistir a URL de stream', () => {
      const track = new Track({
        url: 'https://example.com/1',
        title: 'Song',
        duration: 200,
        webpageUrl: 'https://example.com/page/1',
        streamUrl: 'https://cdn.example.com/audio',
        source: 'youtube',
        requesterId: '42',
        requesterName: 'Ana',
      });

      expect(track.toDict()).toEqual({
        url: 'https://example.com/1',
        title: 'Song',
        duration: 200,
        thumbnail: null,
        webpage_url: 'https://example.com/page/1',
        source: 'youtube',
        requester_id: '42',
        requester_name: 'Ana',
      });
    });

    it('deve reconstruir a faixa a partir do dicionário', () => {
      const original = new Track({ url: 'https://example.com/2', title: 'Other', duration: 90, requesterId: '7' });
      const restored = Track.fromDict({ ...original.toDict() });

      expect(restored.url).toBe(original.url);
      expect(restored.title).toBe('Other');
      expect(restored.duration).toBe(90);
      expect(restored.requesterId).toBe('7');
      expect(restored.streamUrl).toBeNull();
    });

    it('deve aceitar requester_id numérico', () => {
      expect(Track.fromDict({ url: 'u', requester_id: 123 }).requesterId).toBe('123');
    });

    it('deve preencher padrões para campos ausentes', () => {
      const track = Track.fromDict({ url: 'u' });
      expect(track.title).toBe(DEFAULT_TITLE);
      expect(track.duration).toBe(0);
      expect(track.thumbnail).toBeNull();
      expect(track.webpageUrl).toBeNull();
      expect(track.source).toBe('unknown');
      expect(track.requesterId).toBeNull();
      expect(track.requesterName).toBe('Unknown');
    });
  });

  describe('fromExtractorInfo', () => {
    it('deve preferir a URL original e guardar a URL de stream', () => {
      const track = Track.fromExtractorInfo(
        {
          url: 'https://cdn.example.com/stream',
          originalUrl: 'https://youtu.be/abc',
          webpageUrl: 'https://www.youtube.com/watch?v=abc',
          title: 'Song',
          duration: 212.7,
          extractor: 'Youtube:Tab',
        },
        'user-1',
        'Ana',
      );

      expect(track.url).toBe('https://youtu.be/abc');
      expect(track.streamUrl).toBe('https://cdn.example.com/stream');
      expect(track.duration).toBe(212);
      expect(track.source).toBe('youtube');
      expect(track.requesterId).toBe('user-1');
      expect(track.requesterName).toBe('Ana');
    });

    it('deve cair para webpage_url e depois url', () => {
      expect(Track.fromExtractorInfo({ webpageUrl: 'https://page', url: 'https://s' }, 'u', 'n').url).toBe('https://page');
      expect(Track.fromExtractorInfo({ url: 'https://s' }, 'u', 'n').url).toBe('https://s');
    });
  });

  it('deve normalizar o nome do extrator', () => {
    expect(sourceFromExtractor('SoundcloudSet')).toBe('soundcloud');
    expect(sourceFromExtractor('Bandcamp')).toBe('bandcamp');
    expect(sourceFromExtractor(undefined)).toBe('unknown');
  });
});
