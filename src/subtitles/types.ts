/**
 * A single caption unit parsed from a subtitle file
 */
export interface SubtitleEntry {
  /** Position within the parsed file (1-based, no gaps) */
  index: number;
  /** Start time in the source format's own notation (e.g. "00:00:01,000") */
  startTime: string;
  /** End time in the source format's own notation */
  endTime: string;
  /** Caption text, multi-line captions joined with "\n" */
  text: string;
}

/**
 * Supported subtitle format tags
 */
export const SUPPORTED_FORMATS = ['srt', 'vtt', 'sbv', 'sub', 'ass', 'stl'] as const;

export type SubtitleFormat = (typeof SUPPORTED_FORMATS)[number];

/**
 * Timestamp notations used by the supported formats
 */
export type TimestampNotation = 'srt' | 'vtt' | 'sbv' | 'sub' | 'ass';
