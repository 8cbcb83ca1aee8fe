import path from 'path';
import { SubtitleEntry, SubtitleFormat, SUPPORTED_FORMATS } from './types';
import { UnsupportedFormatError } from './errors';
import { decodeSubtitleBuffer } from './encoding';
import { parseSrtContent, generateSrtContent } from './srtParser';
import { parseVttContent, generateVttContent } from './vttParser';
import { parseSbvContent, generateSbvContent } from './sbvParser';
import { parseSubViewerContent, generateSubViewerContent } from './subViewerParser';
import { parseAssContent, generateAssContent } from './assParser';

type SubtitleParser = (content: string) => SubtitleEntry[];
type SubtitleFormatter = (entries: SubtitleEntry[]) => string;

const PARSERS: Record<SubtitleFormat, SubtitleParser> = {
  srt: parseSrtContent,
  vtt: parseVttContent,
  sbv: parseSbvContent,
  sub: parseSubViewerContent,
  ass: parseAssContent,
  // STL files handled here follow the SRT layout
  stl: parseSrtContent,
};

const FORMATTERS: Record<SubtitleFormat, SubtitleFormatter> = {
  srt: generateSrtContent,
  vtt: generateVttContent,
  sbv: generateSbvContent,
  sub: generateSubViewerContent,
  ass: generateAssContent,
  stl: generateSrtContent,
};

/**
 * Resolves a format tag (case-insensitive) to a supported format
 * @returns The format, or null for unknown tags
 */
export function normalizeFormat(tag: string): SubtitleFormat | null {
  const lowered = tag.trim().toLowerCase();
  return SUPPORTED_FORMATS.find((format) => format === lowered) ?? null;
}

/**
 * Derives the subtitle format from a file name's extension
 */
export function formatFromFileName(fileName: string): SubtitleFormat | null {
  const ext = path.extname(fileName).replace(/^\./, '');
  return ext ? normalizeFormat(ext) : null;
}

/**
 * The format the formatter will actually write for a requested tag
 * Unknown tags fall back to SRT.
 */
export function resolveOutputFormat(tag: string): SubtitleFormat {
  return normalizeFormat(tag) ?? 'srt';
}

/**
 * Parses raw subtitle file content
 * @param raw - File bytes (encoding is detected) or already-decoded text
 * @param formatTag - One of the supported format tags
 * @returns Entries numbered from 1 in file order; empty for files without captions
 * @throws UnsupportedFormatError for unknown tags
 * @throws MalformedInputError when required structure is missing
 */
export function parseSubtitles(raw: Buffer | string, formatTag: string): SubtitleEntry[] {
  const format = normalizeFormat(formatTag);
  if (!format) {
    throw new UnsupportedFormatError(formatTag);
  }

  return PARSERS[format](decodeSubtitleBuffer(raw));
}

/**
 * Serializes entries into the requested format
 * Unknown tags are written as SRT rather than failing.
 */
export function formatSubtitles(entries: SubtitleEntry[], formatTag: string): string {
  return FORMATTERS[resolveOutputFormat(formatTag)](entries);
}
