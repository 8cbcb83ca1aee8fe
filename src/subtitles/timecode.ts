import { TimestampNotation } from './types';

const TIMESTAMP_PATTERN = /^(?:(\d+):)?(\d{1,2}):(\d{2})(?:[.,](\d{1,3}))?$/;

/**
 * Exact shape of a timestamp in each notation. A value that already has the
 * target shape is written back untouched.
 */
const NOTATION_PATTERNS: Record<TimestampNotation, RegExp> = {
  srt: /^\d{2,}:\d{2}:\d{2},\d{3}$/,
  vtt: /^(?:\d{2,}:)?\d{2}:\d{2}\.\d{3}$/,
  sbv: /^\d+:\d{2}:\d{2}\.\d{3}$/,
  sub: /^\d{2,}:\d{2}:\d{2}\.\d{2}$/,
  ass: /^\d+:\d{2}:\d{2}\.\d{2}$/,
};

/**
 * Converts a timestamp in any supported notation to milliseconds
 * Accepts "HH:MM:SS,mmm", "HH:MM:SS.mmm", "H:MM:SS.cc" and "MM:SS.mmm"
 * @returns Milliseconds, or null if the value is not a recognised timestamp
 */
export function timestampToMs(timestamp: string): number | null {
  const match = timestamp.trim().match(TIMESTAMP_PATTERN);
  if (!match) {
    return null;
  }

  const hours = parseInt(match[1] ?? '0', 10);
  const minutes = parseInt(match[2] ?? '0', 10);
  const seconds = parseInt(match[3] ?? '0', 10);
  const milliseconds = parseInt((match[4] ?? '0').padEnd(3, '0'), 10);

  return ((hours * 60 + minutes) * 60 + seconds) * 1000 + milliseconds;
}

function pad(value: number, width: number): string {
  return value.toString().padStart(width, '0');
}

/**
 * Renders milliseconds in the given notation
 * Centisecond notations (sub, ass) round to the nearest 10ms.
 */
export function msToTimestamp(ms: number, notation: TimestampNotation): string {
  const centiseconds = notation === 'sub' || notation === 'ass';
  let total = Math.max(0, Math.round(ms));
  if (centiseconds) {
    total = Math.round(total / 10) * 10;
  }

  const hours = Math.floor(total / 3_600_000);
  const minutes = Math.floor((total % 3_600_000) / 60_000);
  const seconds = Math.floor((total % 60_000) / 1000);
  const millis = total % 1000;

  switch (notation) {
    case 'srt':
      return `${pad(hours, 2)}:${pad(minutes, 2)}:${pad(seconds, 2)},${pad(millis, 3)}`;
    case 'vtt':
      return `${pad(hours, 2)}:${pad(minutes, 2)}:${pad(seconds, 2)}.${pad(millis, 3)}`;
    case 'sbv':
      return `${hours}:${pad(minutes, 2)}:${pad(seconds, 2)}.${pad(millis, 3)}`;
    case 'sub':
      return `${pad(hours, 2)}:${pad(minutes, 2)}:${pad(seconds, 2)}.${pad(millis / 10, 2)}`;
    case 'ass':
      return `${hours}:${pad(minutes, 2)}:${pad(seconds, 2)}.${pad(millis / 10, 2)}`;
  }
}

/**
 * Rewrites a timestamp into the target notation.
 * Values already in that notation, and values that are not timestamps at all,
 * are returned unchanged.
 */
export function convertTimestamp(timestamp: string, notation: TimestampNotation): string {
  const value = timestamp.trim();
  if (NOTATION_PATTERNS[notation].test(value)) {
    return value;
  }

  const ms = timestampToMs(value);
  return ms === null ? timestamp : msToTimestamp(ms, notation);
}
