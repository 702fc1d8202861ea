/**
 * Utility class for common formatting operations
 */
export class FormatUtils {
  /**
   * Clock-style track length: M:SS, or H:MM:SS from one hour up
   */
  static formatClock(totalSeconds: number): string {
    const safe = Math.max(0, Math.floor(totalSeconds));
    const hours = Math.floor(safe / 3600);
    const minutes = Math.floor((safe % 3600) / 60);
    const seconds = safe % 60;
    const ss = String(seconds).padStart(2, '0');

    if (hours > 0) {
      return `${hours}:${String(minutes).padStart(2, '0')}:${ss}`;
    }
    return `${minutes}:${ss}`;
  }

  /**
   * Queue length summary: "1h 5m" from one hour up, otherwise "4m 10s"
   */
  static formatQueueLength(totalSeconds: number): string {
    const safe = Math.max(0, Math.floor(totalSeconds));
    const hours = Math.floor(safe / 3600);
    const minutes = Math.floor((safe % 3600) / 60);
    const seconds = safe % 60;

    if (hours > 0) {
      return `${hours}h ${minutes}m`;
    }
    return `${minutes}m ${seconds}s`;
  }

  static formatDuration(milliseconds: number): string {
    const seconds = Math.floor(milliseconds / 1000);
    const minutes = Math.floor(seconds / 60);
    const hours = Math.floor(minutes / 60);
    const days = Math.floor(hours / 24);

    const parts: string[] = [];

    if (days > 0) {parts.push(`${days}d`);}
    if (hours % 24 > 0) {parts.push(`${hours % 24}h`);}
    if (minutes % 60 > 0) {parts.push(`${minutes % 60}m`);}
    if (seconds % 60 > 0) {parts.push(`${seconds % 60}s`);}

    return parts.join(' ') || '0s';
  }

  static capitalize(text: string): string {
    return text.charAt(0).toUpperCase() + text.slice(1).toLowerCase();
  }

  static truncate(text: string, maxLength: number, suffix: string = '...'): string {
    if (text.length <= maxLength) {
      return text;
    }
    return text.substring(0, maxLength - suffix.length) + suffix;
  }

  static formatProgressBar(
    current: number,
    max: number,
    length: number = 10,
    filledChar: string = '█',
    emptyChar: string = '░',
  ): string {
    if (max <= 0) {
      return emptyChar.repeat(length);
    }
    const ratio = Math.min(1, Math.max(0, current / max));
    const filled = Math.round(ratio * length);
    return filledChar.repeat(filled) + emptyChar.repeat(length - filled);
  }
}
