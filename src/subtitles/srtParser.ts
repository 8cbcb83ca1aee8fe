import { SubtitleEntry } from './types';
import { splitIntoBlocks, matchTimedBlock, compactCaptionText } from './subtitleBlocks';
import { convertTimestamp } from './timecode';

const SRT_TIMING_PATTERN =
  /^(\d+:\d{2}:\d{2}(?:[,.]\d{1,3})?)\s*-->\s*(\d+:\d{2}:\d{2}(?:[,.]\d{1,3})?)/;

/**
 * Parses SRT content into subtitle entries
 * The sequence number line is optional; entries are re-numbered from 1 in file order.
 * Timestamps are normalized to "HH:MM:SS,mmm".
 * @param content - The raw SRT file content
 * @returns Array of parsed subtitle entries
 */
export function parseSrtContent(content: string): SubtitleEntry[] {
  const entries: SubtitleEntry[] = [];

  for (const lines of splitIntoBlocks(content)) {
    // Timing is either the first line or follows the sequence number
    const block = matchTimedBlock(lines, SRT_TIMING_PATTERN, 2);
    if (!block) {
      continue; // Skip blocks without a valid timing line
    }

    entries.push({
      index: entries.length + 1,
      startTime: convertTimestamp(block.start, 'srt'),
      endTime: convertTimestamp(block.end, 'srt'),
      text: block.textLines.join('\n').trim(),
    });
  }

  return entries;
}

/**
 * Generates SRT content from subtitle entries
 * Every block is followed by a blank line; entries are numbered by position.
 * @param entries - Entries in any source notation
 * @returns SRT file content as string
 */
export function generateSrtContent(entries: SubtitleEntry[]): string {
  const lines: string[] = [];

  entries.forEach((entry, position) => {
    const start = convertTimestamp(entry.startTime, 'srt');
    const end = convertTimestamp(entry.endTime, 'srt');
    lines.push(`${position + 1}`, `${start} --> ${end}`, compactCaptionText(entry.text), '');
  });

  return lines.join('\n');
}
