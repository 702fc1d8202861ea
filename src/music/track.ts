import { MediaInfo, PersistedTrack } from '../types/music';
import { FormatUtils } from '../utils/format.util';

export const DEFAULT_TITLE = 'Unknown Title';
export const DEFAULT_REQUESTER_NAME = 'Unknown';
const DISPLAY_TITLE_MAX = 60;

export interface TrackInit {
  url: string;
  title?: string;
  duration?: number;
  thumbnail?: string | null;
  webpageUrl?: string | null;
  streamUrl?: string | null;
  source?: string;
  requesterId?: string | null;
  requesterName?: string;
  addedAt?: Date;
}

function optionalString(value: unknown): string | null {
  return typeof value === 'string' && value.length > 0 ? value : null;
}

function normalizeDuration(value: unknown): number {
  const numeric = typeof value === 'number' ? value : Number(value);
  if (!Number.isFinite(numeric) || numeric <= 0) {
    return 0;
  }
  return Math.floor(numeric);
}

function normalizeRequesterId(value: unknown): string | null {
  if (typeof value === 'string' && value.length > 0) {
    return value;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

/**
 * Map an extractor name (e.g. "youtube:tab", "soundcloud:set") to a source tag
 */
export function sourceFromExtractor(extractor: string | undefined): string {
  const name = (extractor || '').toLowerCase();
  if (name.includes('youtube')) {
    return 'youtube';
  }
  if (name.includes('soundcloud')) {
    return 'soundcloud';
  }
  return name || 'unknown';
}

/**
 * One playable item plus who asked for it.
 * The stream URL expires, so it is kept in memory only.
 */
export class Track {
  public readonly url: string;
  public readonly title: string;
  public readonly duration: number;
  public readonly thumbnail: string | null;
  public readonly webpageUrl: string | null;
  public streamUrl: string | null;
  public readonly source: string;
  public readonly requesterId: string | null;
  public readonly requesterName: string;
  public readonly addedAt: Date;

  constructor(init: TrackInit) {
    this.url = init.url;
    this.title = init.title && init.title.trim().length > 0 ? init.title : DEFAULT_TITLE;
    this.duration = normalizeDuration(init.duration);
    this.thumbnail = init.thumbnail ?? null;
    this.webpageUrl = init.webpageUrl ?? null;
    this.streamUrl = init.streamUrl ?? null;
    this.source = init.source || 'unknown';
    this.requesterId = init.requesterId ?? null;
    this.requesterName = init.requesterName || DEFAULT_REQUESTER_NAME;
    this.addedAt = init.addedAt ?? new Date();
  }

  get isLive(): boolean {
    return this.duration === 0;
  }

  get durationString(): string {
    return this.isLive ? 'Live' : FormatUtils.formatClock(this.duration);
  }

  get displayTitle(): string {
    return FormatUtils.truncate(this.title, DISPLAY_TITLE_MAX);
  }

  /** Link shown to users; falls back to the original query/url */
  get link(): string {
    return this.webpageUrl || this.url;
  }

  toDict(): PersistedTrack {
    return {
      url: this.url,
      title: this.title,
      duration: this.duration,
      thumbnail: this.thumbnail,
      webpage_url: this.webpageUrl,
      source: this.source,
      requester_id: this.requesterId,
      requester_name: this.requesterName,
    };
  }

  static fromDict(data: Record<string, unknown>): Track {
    return new Track({
      url: typeof data.url === 'string' ? data.url : '',
      title: typeof data.title === 'string' ? data.title : DEFAULT_TITLE,
      duration: normalizeDuration(data.duration),
      thumbnail: optionalString(data.thumbnail),
      webpageUrl: optionalString(data.webpage_url),
      source: typeof data.source === 'string' ? data.source : 'unknown',
      requesterId: normalizeRequesterId(data.requester_id),
      requesterName: typeof data.requester_name === 'string' ? data.requester_name : DEFAULT_REQUESTER_NAME,
    });
  }

  static fromExtractorInfo(info: MediaInfo, requesterId: string, requesterName: string): Track {
    return new Track({
      url: info.originalUrl || info.webpageUrl || info.url || '',
      title: info.title,
      duration: info.duration,
      thumbnail: info.thumbnail,
      webpageUrl: info.webpageUrl,
      streamUrl: info.url,
      source: sourceFromExtractor(info.extractor),
      requesterId,
      requesterName,
    });
  }
}
