import type { Track } from '../music/track';
import type { LoopMode } from '../music/queue';

/**
 * Metadata for one media item as reported by the extraction tool
 */
export interface MediaInfo {
  url?: string;
  originalUrl?: string;
  webpageUrl?: string;
  title?: string;
  duration?: number;
  thumbnail?: string;
  extractor?: string;
}

/**
 * Validated extraction output: one item, or a playlist/search result with entries
 */
export type ExtractionResult =
  | { kind: 'single'; info: MediaInfo }
  | { kind: 'collection'; title?: string; entries: MediaInfo[] };

export type SearchSource = 'youtube' | 'soundcloud';

/**
 * Resolves queries into tracks and refreshes expiring stream URLs.
 * Implementations never throw: failures come back as [] or null.
 */
export interface Extractor {
  extract(query: string, requesterId: string, requesterName: string): Promise<Track[]>;
  getStreamUrl(track: Track): Promise<string | null>;
}

/**
 * Extractor that can also list several candidates for free text
 */
export interface SearchExtractor extends Extractor {
  search(
    query: string,
    requesterId: string,
    requesterName: string,
    limit?: number,
    source?: SearchSource,
  ): Promise<Track[]>;
}

/**
 * Storage form of a track; the stream URL is never part of it
 */
export type PersistedTrack = {
  url: string;
  title: string;
  duration: number;
  thumbnail: string | null;
  webpage_url: string | null;
  source: string;
  requester_id: string | null;
  requester_name: string;
};

export interface PersistedQueue {
  tracks: PersistedTrack[];
  currentIndex: number;
  loopMode: LoopMode;
  volumePercent: number;
}

export interface QueueStore {
  saveQueue(
    guildId: string,
    tracks: readonly Track[],
    currentIndex: number,
    loopMode: LoopMode,
    volumePercent: number,
  ): Promise<void>;
  loadQueue(guildId: string): Promise<PersistedQueue | null>;
  clearGuildQueue(guildId: string): Promise<void>;
}

export interface PlaylistStore {
  savePlaylist(userId: string, name: string, tracks: readonly Track[]): Promise<boolean>;
  loadPlaylist(userId: string, name: string): Promise<PersistedTrack[] | null>;
  listPlaylists(userId: string): Promise<string[]>;
  deletePlaylist(userId: string, name: string): Promise<boolean>;
}

export interface VoiceChannelRef {
  id: string;
  guildId: string;
  name: string;
}

export interface StreamOptions {
  /** Linear gain, 1.0 is unchanged */
  volume: number;
  seekSeconds: number;
}

/**
 * Called once per started stream, with the error when it failed
 */
export type StreamCompletion = (error?: Error) => void;

/**
 * A live voice connection with its own audio output
 */
export interface VoiceSession {
  readonly channelId: string;
  isConnected(): boolean;
  moveTo(channel: VoiceChannelRef, timeoutMs: number): Promise<void>;
  play(sourceUrl: string, options: StreamOptions, onComplete: StreamCompletion): void;
  setVolume(multiplier: number): void;
  pause(): boolean;
  resume(): boolean;
  stop(): void;
  disconnect(): Promise<void>;
}

export interface VoiceTransport {
  /** Rejects when the connection is not ready within timeoutMs */
  connect(channel: VoiceChannelRef, timeoutMs: number): Promise<VoiceSession>;
}

export interface PlayerEvents {
  trackStart: (track: Track) => void;
  trackEnd: (track: Track) => void;
  queueEnd: () => void;
}

export type PlayerEventName = keyof PlayerEvents;
