import { Track } from './track';

export enum LoopMode {
  OFF = 'off',
  ONE = 'one',
  ALL = 'all',
}

export const DEFAULT_MAX_QUEUE_SIZE = 500;
export const HISTORY_LIMIT = 50;

const LOOP_MODES: readonly string[] = Object.values(LoopMode);

function isLoopMode(value: string): value is LoopMode {
  return LOOP_MODES.includes(value);
}

/**
 * Parse a stored or user-supplied loop mode, falling back to OFF
 */
export function parseLoopMode(value: string | null | undefined): LoopMode {
  const normalized = (value || '').trim().toLowerCase();
  return isLoopMode(normalized) ? normalized : LoopMode.OFF;
}

export interface QueueState {
  tracks: Track[];
  currentIndex: number;
  loopMode: LoopMode;
}

export interface AdvanceOptions {
  /** Move on even when the loop mode is ONE */
  force?: boolean;
}

/**
 * Guild-scoped track list with a cursor, loop mode and play history.
 *
 * The cursor is an index, not a track reference: the same URL may be queued
 * more than once, and snapshots must survive a JSON round trip.
 * Whenever the queue is non-empty, 0 <= currentIndex < size.
 */
export class MusicQueue {
  private items: Track[] = [];
  private index = 0;
  private mode: LoopMode = LoopMode.OFF;
  private played: Track[] = [];

  constructor(
    public readonly maxSize: number = DEFAULT_MAX_QUEUE_SIZE,
    private readonly random: () => number = Math.random,
  ) {}

  get tracks(): Track[] {
    return [...this.items];
  }

  get current(): Track | null {
    return this.items[this.index] ?? null;
  }

  get currentIndex(): number {
    return this.index;
  }

  get loopMode(): LoopMode {
    return this.mode;
  }

  get size(): number {
    return this.items.length;
  }

  get isEmpty(): boolean {
    return this.items.length === 0;
  }

  get isFull(): boolean {
    return this.items.length >= this.maxSize;
  }

  get upcoming(): Track[] {
    return this.items.slice(this.index + 1);
  }

  /** Most recent last */
  get history(): Track[] {
    return [...this.played];
  }

  get totalDuration(): number {
    return this.items.reduce((total, track) => total + track.duration, 0);
  }

  setLoopMode(mode: LoopMode): void {
    this.mode = mode;
  }

  add(track: Track): boolean {
    if (this.isFull) {
      return false;
    }
    this.items.push(track);
    return true;
  }

  /**
   * Append as many tracks as fit; returns how many were accepted
   */
  addMany(tracks: readonly Track[]): number {
    const available = Math.max(0, this.maxSize - this.items.length);
    const accepted = tracks.slice(0, available);
    this.items.push(...accepted);
    return accepted.length;
  }

  /**
   * Insert a track, never at or before the cursor
   */
  insert(index: number, track: Track): boolean {
    if (this.isFull) {
      return false;
    }
    const position = Math.max(this.index + 1, Math.min(index, this.items.length));
    this.items.splice(position, 0, track);
    return true;
  }

  remove(index: number): Track | null {
    if (!Number.isInteger(index) || index < 0 || index >= this.items.length) {
      return null;
    }

    const [removed] = this.items.splice(index, 1);

    if (index < this.index) {
      this.index -= 1;
    } else if (index === this.index && this.index >= this.items.length) {
      this.index = Math.max(0, this.items.length - 1);
    }

    return removed;
  }

  clear(): void {
    this.items = [];
    this.index = 0;
  }

  /**
   * Drop everything after the current track; returns the number removed
   */
  clearUpcoming(): number {
    const removed = Math.max(0, this.items.length - this.index - 1);
    if (removed > 0) {
      this.items = this.items.slice(0, this.index + 1);
    }
    return removed;
  }

  /**
   * Advance according to the loop mode. Returns null when the queue is
   * exhausted, leaving the cursor on the last track.
   */
  next(options: AdvanceOptions = {}): Track | null {
    if (this.isEmpty) {
      return null;
    }

    const current = this.current;
    if (current) {
      this.played.push(current);
      if (this.played.length > HISTORY_LIMIT) {
        this.played.shift();
      }
    }

    if (this.mode === LoopMode.ONE && !options.force) {
      return current;
    }

    if (this.index + 1 < this.items.length) {
      this.index += 1;
      return this.current;
    }

    if (this.mode !== LoopMode.OFF) {
      this.index = 0;
      return this.current;
    }

    return null;
  }

  previous(): Track | null {
    if (this.index > 0) {
      this.index -= 1;
      return this.current;
    }

    if (this.mode === LoopMode.ALL && this.items.length > 0) {
      this.index = this.items.length - 1;
      return this.current;
    }

    return null;
  }

  jump(index: number): Track | null {
    if (!Number.isInteger(index) || index < 0 || index >= this.items.length) {
      return null;
    }
    this.index = index;
    return this.current;
  }

  /**
   * Fisher-Yates over the tracks after the cursor only
   */
  shuffle(): void {
    const start = this.index + 1;
    for (let i = this.items.length - 1; i > start; i--) {
      const j = start + Math.floor(this.random() * (i - start + 1));
      [this.items[i], this.items[j]] = [this.items[j], this.items[i]];
    }
  }

  /**
   * Relocate one track, keeping the cursor on the same logical track
   */
  move(from: number, to: number): boolean {
    const size = this.items.length;
    if (
      !Number.isInteger(from) ||
      !Number.isInteger(to) ||
      from < 0 ||
      from >= size ||
      to < 0 ||
      to >= size
    ) {
      return false;
    }

    const [track] = this.items.splice(from, 1);
    this.items.splice(to, 0, track);

    if (from === this.index) {
      this.index = to;
    } else if (from < this.index && this.index <= to) {
      this.index -= 1;
    } else if (to <= this.index && this.index < from) {
      this.index += 1;
    }

    return true;
  }

  getState(): QueueState {
    return {
      tracks: this.tracks,
      currentIndex: this.index,
      loopMode: this.mode,
    };
  }

  restoreState(tracks: readonly Track[], currentIndex: number = 0, loopMode: LoopMode = LoopMode.OFF): void {
    this.items = tracks.slice(0, this.maxSize);
    const requested = Number.isInteger(currentIndex) ? currentIndex : 0;
    this.index = Math.max(0, Math.min(requested, this.items.length - 1));
    this.mode = loopMode;
  }
}
