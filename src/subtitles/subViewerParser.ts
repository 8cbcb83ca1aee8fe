import { SubtitleEntry } from './types';
import { splitIntoBlocks, matchTimedBlock } from './subtitleBlocks';
import { convertTimestamp } from './timecode';

const SUB_TIMING_PATTERN = /^(\d{2}:\d{2}:\d{2}\.\d{2}),(\d{2}:\d{2}:\d{2}\.\d{2})$/;

// SubViewer writes line breaks inside a caption as a literal marker
const LINE_BREAK_MARKER = '[br]';

/**
 * Parses SubViewer content. Header lines ([INFORMATION] ... [END INFORMATION])
 * never match the timing pattern and are skipped.
 */
export function parseSubViewerContent(content: string): SubtitleEntry[] {
  const entries: SubtitleEntry[] = [];

  for (const lines of splitIntoBlocks(content)) {
    const block = matchTimedBlock(lines, SUB_TIMING_PATTERN);
    if (!block) {
      continue;
    }

    entries.push({
      index: entries.length + 1,
      startTime: block.start,
      endTime: block.end,
      text: block.textLines.join('\n').trim().split(LINE_BREAK_MARKER).join('\n'),
    });
  }

  return entries;
}

export function generateSubViewerContent(entries: SubtitleEntry[]): string {
  const lines: string[] = [];

  for (const entry of entries) {
    const start = convertTimestamp(entry.startTime, 'sub');
    const end = convertTimestamp(entry.endTime, 'sub');
    lines.push(`${start},${end}`, entry.text.split('\n').join(LINE_BREAK_MARKER), '');
  }

  return lines.join('\n');
}
