import { Track } from '../../src/music/track';
import { LoopMode } from '../../src/music/queue';
import {
  PersistedQueue,
  SearchExtractor,
  SearchSource,
  StreamCompletion,
  StreamOptions,
  QueueStore,
  VoiceChannelRef,
  VoiceSession,
  VoiceTransport,
} from '../../src/types/music';

export const GUILD_ID = 'guild-1';

export function makeChannel(id: string = 'voice-1', name: string = 'Geral'): VoiceChannelRef {
  return { id, guildId: GUILD_ID, name };
}

export function makeTrack(n: number, duration: number = 180): Track {
  return new Track({
    url: `https://example.com/${n}`,
    title: `Track ${n}`,
    duration,
    source: 'youtube',
    requesterId: 'user-1',
    requesterName: 'Tester',
  });
}

export interface RecordedPlay {
  url: string;
  options: StreamOptions;
  onComplete: StreamCompletion;
}

/**
 * Voice session that records what the player asks of it
 */
export class FakeSession implements VoiceSession {
  public channelId: string;
  public connected = true;
  public failMove = false;
  public plays: RecordedPlay[] = [];
  public volumes: number[] = [];
  public stopCount = 0;
  public disconnectCount = 0;

  constructor(channelId: string) {
    this.channelId = channelId;
  }

  isConnected(): boolean {
    return this.connected;
  }

  async moveTo(channel: VoiceChannelRef): Promise<void> {
    if (this.failMove) {
      throw new Error('move failed');
    }
    this.channelId = channel.id;
  }

  play(sourceUrl: string, options: StreamOptions, onComplete: StreamCompletion): void {
    this.plays.push({ url: sourceUrl, options, onComplete });
  }

  setVolume(multiplier: number): void {
    this.volumes.push(multiplier);
  }

  pause(): boolean {
    return true;
  }

  resume(): boolean {
    return true;
  }

  stop(): void {
    this.stopCount++;
  }

  async disconnect(): Promise<void> {
    this.connected = false;
    this.disconnectCount++;
  }

  /** Fire the completion callback of the most recent stream */
  finish(error?: Error): void {
    const last = this.plays[this.plays.length - 1];
    if (!last) {
      throw new Error('nothing is playing');
    }
    last.onComplete(error);
  }

  get playedUrls(): string[] {
    return this.plays.map(play => play.url);
  }
}

export class FakeTransport implements VoiceTransport {
  public sessions: FakeSession[] = [];
  public attempts = 0;
  /** Number of upcoming connect calls that fail */
  public failures = 0;

  async connect(channel: VoiceChannelRef): Promise<VoiceSession> {
    this.attempts++;
    if (this.failures > 0) {
      this.failures--;
      throw new Error('connect failed');
    }
    const session = new FakeSession(channel.id);
    this.sessions.push(session);
    return session;
  }

  get lastSession(): FakeSession {
    const session = this.sessions[this.sessions.length - 1];
    if (!session) {
      throw new Error('no session opened');
    }
    return session;
  }
}

/**
 * Stream URLs are "stream:<url>" unless the url is marked unplayable
 */
export class FakeExtractor implements SearchExtractor {
  public unplayable = new Set<string>();
  public results: Track[] = [];
  public searches: Array<{ query: string; limit?: number; source?: SearchSource }> = [];

  async extract(): Promise<Track[]> {
    return this.results;
  }

  async search(
    query: string,
    _requesterId: string,
    _requesterName: string,
    limit?: number,
    source?: SearchSource,
  ): Promise<Track[]> {
    this.searches.push({ query, limit, source });
    return this.results;
  }

  async getStreamUrl(track: Track): Promise<string | null> {
    return this.unplayable.has(track.url) ? null : `stream:${track.url}`;
  }
}

export interface SavedSnapshot {
  guildId: string;
  urls: string[];
  currentIndex: number;
  loopMode: LoopMode;
  volumePercent: number;
}

export class RecordingStore implements QueueStore {
  public saves: SavedSnapshot[] = [];
  public stored: PersistedQueue | null = null;
  public loads = 0;
  public cleared: string[] = [];

  async saveQueue(
    guildId: string,
    tracks: readonly Track[],
    currentIndex: number,
    loopMode: LoopMode,
    volumePercent: number,
  ): Promise<void> {
    this.saves.push({ guildId, urls: tracks.map(track => track.url), currentIndex, loopMode, volumePercent });
  }

  async loadQueue(): Promise<PersistedQueue | null> {
    this.loads++;
    return this.stored;
  }

  async clearGuildQueue(guildId: string): Promise<void> {
    this.cleared.push(guildId);
  }

  get lastSave(): SavedSnapshot | undefined {
    return this.saves[this.saves.length - 1];
  }
}
