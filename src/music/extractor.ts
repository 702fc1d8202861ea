import { spawn } from 'child_process';
import { Track } from './track';
import { ExtractionResult, Extractor, MediaInfo, SearchSource } from '../types/music';
import { Logger, LogCategory } from '../utils/logger';
import { ErrorHandler } from '../utils/error-handler.util';

/**
 * Runs yt-dlp with the given arguments and resolves with its stdout
 */
export type ProcessRunner = (args: string[]) => Promise<string>;

export interface YtDlpExtractorOptions {
  binaryPath?: string;
  cookiesPath?: string;
  timeoutMs?: number;
  runner?: ProcessRunner;
  logger?: Logger;
}

export const DEFAULT_EXTRACT_TIMEOUT_MS = 30_000;

const BASE_ARGS = [
  '--dump-single-json',
  '--no-warnings',
  '--no-check-certificates',
  '--ignore-errors',
  '--format',
  'bestaudio/best',
  '--default-search',
  'ytsearch',
  '--geo-bypass',
  '--skip-download',
  '--source-address',
  '0.0.0.0',
];

const URL_PATTERN = /^https?:\/\/[^\s]+/;
const YOUTUBE_PATTERN = /^(https?:\/\/)?(www\.)?(youtube\.com|youtu\.be)\/.+/;
const SOUNDCLOUD_PATTERN = /^(https?:\/\/)?(www\.)?soundcloud\.com\/.+/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function readNumber(record: Record<string, unknown>, key: string): number | undefined {
  const value = record[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function toMediaInfo(record: Record<string, unknown>): MediaInfo {
  return {
    url: readString(record, 'url'),
    originalUrl: readString(record, 'original_url'),
    webpageUrl: readString(record, 'webpage_url'),
    title: readString(record, 'title'),
    duration: readNumber(record, 'duration'),
    thumbnail: readString(record, 'thumbnail'),
    extractor: readString(record, 'extractor_key') ?? readString(record, 'extractor'),
  };
}

/**
 * Validate a yt-dlp JSON document. Null or malformed playlist entries are dropped.
 */
export function parseExtraction(raw: unknown): ExtractionResult | null {
  if (!isRecord(raw)) {
    return null;
  }

  const entries = raw.entries;
  if (Array.isArray(entries)) {
    return {
      kind: 'collection',
      title: readString(raw, 'title'),
      entries: entries.filter(isRecord).map(toMediaInfo),
    };
  }

  return { kind: 'single', info: toMediaInfo(raw) };
}

/**
 * Spawn yt-dlp without a shell; the child is killed once the timeout passes
 */
export function createProcessRunner(binaryPath: string, timeoutMs: number): ProcessRunner {
  return args =>
    new Promise((resolve, reject) => {
      const child = spawn(binaryPath, args, { stdio: ['ignore', 'pipe', 'pipe'] });

      let stdout = '';
      let stderr = '';
      let settled = false;

      const timer = setTimeout(() => {
        if (!settled) {
          settled = true;
          child.kill('SIGKILL');
          reject(new Error(`yt-dlp timed out after ${timeoutMs}ms`));
        }
      }, timeoutMs);

      child.stdout.on('data', (chunk: Buffer) => {
        stdout += chunk.toString();
      });

      child.stderr.on('data', (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      child.on('error', error => {
        clearTimeout(timer);
        if (!settled) {
          settled = true;
          reject(error);
        }
      });

      child.on('close', code => {
        clearTimeout(timer);
        if (settled) {
          return;
        }
        settled = true;
        // --ignore-errors can exit non-zero while still printing usable JSON
        if (stdout.trim().length > 0) {
          resolve(stdout);
        } else {
          reject(new Error(`yt-dlp exited with code ${code}: ${stderr.trim()}`));
        }
      });
    });
}

/**
 * Extractor backed by the yt-dlp command line tool
 */
export class YtDlpExtractor implements Extractor {
  private readonly runner: ProcessRunner;
  private readonly cookiesPath?: string;
  private readonly logger: Logger;

  constructor(options: YtDlpExtractorOptions = {}) {
    this.cookiesPath = options.cookiesPath;
    this.logger = options.logger ?? new Logger();
    this.runner =
      options.runner ??
      createProcessRunner(options.binaryPath ?? 'yt-dlp', options.timeoutMs ?? DEFAULT_EXTRACT_TIMEOUT_MS);
  }

  static isUrl(query: string): boolean {
    return URL_PATTERN.test(query.trim());
  }

  static isYoutubeUrl(url: string): boolean {
    return YOUTUBE_PATTERN.test(url.trim());
  }

  static isSoundcloudUrl(url: string): boolean {
    return SOUNDCLOUD_PATTERN.test(url.trim());
  }

  static isPlaylistUrl(url: string): boolean {
    return url.toLowerCase().includes('playlist') || url.includes('list=');
  }

  /**
   * Resolve a URL or free text into tracks. Free text becomes a YouTube search
   * for the first `searchLimit` results.
   */
  async extract(query: string, requesterId: string, requesterName: string, searchLimit: number = 1): Promise<Track[]> {
    const trimmed = query.trim();
    if (trimmed.length === 0) {
      return [];
    }
    const target = YtDlpExtractor.isUrl(trimmed) ? trimmed : `ytsearch${searchLimit}:${trimmed}`;
    return this.resolveTracks(target, requesterId, requesterName);
  }

  async search(
    query: string,
    requesterId: string,
    requesterName: string,
    limit: number = 5,
    source: SearchSource = 'youtube',
  ): Promise<Track[]> {
    const trimmed = query.trim();
    if (trimmed.length === 0) {
      return [];
    }
    const prefix = source === 'soundcloud' ? 'scsearch' : 'ytsearch';
    return this.resolveTracks(`${prefix}${limit}:${trimmed}`, requesterId, requesterName);
  }

  async getStreamUrl(track: Track): Promise<string | null> {
    const result = await this.run(track.link);
    if (!result) {
      return null;
    }

    if (result.kind === 'single') {
      return result.info.url ?? null;
    }

    const [first] = result.entries;
    return first?.url ?? null;
  }

  private async resolveTracks(target: string, requesterId: string, requesterName: string): Promise<Track[]> {
    const result = await this.run(target);
    if (!result) {
      return [];
    }

    const infos = result.kind === 'single' ? [result.info] : result.entries;
    return infos
      .filter(info => Boolean(info.originalUrl || info.webpageUrl || info.url))
      .map(info => Track.fromExtractorInfo(info, requesterId, requesterName));
  }

  private async run(target: string): Promise<ExtractionResult | null> {
    const args = [...BASE_ARGS];
    if (this.cookiesPath) {
      args.push('--cookies', this.cookiesPath);
    }
    args.push(target);

    try {
      const stdout = await this.runner(args);
      const parsed: unknown = JSON.parse(stdout);
      const result = parseExtraction(parsed);
      if (!result) {
        this.logger.warn(`yt-dlp returned an unexpected document for ${target}`, {
          category: LogCategory.MUSIC,
        });
      }
      return result;
    } catch (error) {
      this.logger.error(`Extraction failed for ${target}`, {
        category: LogCategory.MUSIC,
        error: ErrorHandler.toError(error),
      });
      return null;
    }
  }
}
