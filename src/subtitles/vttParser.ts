import { SubtitleEntry } from './types';
import { splitIntoBlocks, matchTimedBlock, compactCaptionText } from './subtitleBlocks';
import { convertTimestamp } from './timecode';

const VTT_TIMING_PATTERN =
  /^((?:\d+:)?\d{2}:\d{2}\.\d{3})\s*-->\s*((?:\d+:)?\d{2}:\d{2}\.\d{3})/;

/**
 * Parses WebVTT content into subtitle entries
 * The WEBVTT header block, NOTE and STYLE blocks are skipped; cue identifiers
 * and cue settings are dropped.
 */
export function parseVttContent(content: string): SubtitleEntry[] {
  const entries: SubtitleEntry[] = [];

  for (const lines of splitIntoBlocks(content)) {
    if (lines[0]?.startsWith('WEBVTT')) {
      continue;
    }

    // Timing is the first line, or the second one after a cue identifier
    const block = matchTimedBlock(lines, VTT_TIMING_PATTERN, 2);
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

/**
 * Generates WebVTT content from subtitle entries
 */
export function generateVttContent(entries: SubtitleEntry[]): string {
  const lines: string[] = ['WEBVTT', ''];

  for (const entry of entries) {
    const start = convertTimestamp(entry.startTime, 'vtt');
    const end = convertTimestamp(entry.endTime, 'vtt');
    lines.push(`${start} --> ${end}`, compactCaptionText(entry.text), '');
  }

  return lines.join('\n');
}
