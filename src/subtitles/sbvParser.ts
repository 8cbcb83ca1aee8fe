import { SubtitleEntry } from './types';
import { splitIntoBlocks, matchTimedBlock, compactCaptionText } from './subtitleBlocks';
import { convertTimestamp } from './timecode';

const SBV_TIMING_PATTERN = /^(\d+:\d+:\d+\.\d+),(\d+:\d+:\d+\.\d+)$/;

/**
 * Parses YouTube SBV content ("start,end" line followed by text)
 */
export function parseSbvContent(content: string): SubtitleEntry[] {
  const entries: SubtitleEntry[] = [];

  for (const lines of splitIntoBlocks(content)) {
    const block = matchTimedBlock(lines, SBV_TIMING_PATTERN);
    if (!block) {
      continue;
    }

    entries.push({
      index: entries.length + 1,
      startTime: block.start,
      endTime: block.end,
      text: block.textLines.join('\n').trim(),
    });
  }

  return entries;
}

export function generateSbvContent(entries: SubtitleEntry[]): string {
  const lines: string[] = [];

  for (const entry of entries) {
    const start = convertTimestamp(entry.startTime, 'sbv');
    const end = convertTimestamp(entry.endTime, 'sbv');
    lines.push(`${start},${end}`, compactCaptionText(entry.text), '');
  }

  return lines.join('\n');
}
