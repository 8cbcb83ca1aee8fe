import { SubtitleEntry } from './types';
import { MalformedInputError } from './errors';
import { normalizeLineEndings } from './subtitleBlocks';
import { convertTimestamp } from './timecode';

const SECTION_HEADER = /^\[.+\]$/;
const EVENTS_HEADER = /^\[events\]$/i;
const FORMAT_PREFIX = /^format\s*:(.*)$/i;
const DIALOGUE_PREFIX = /^dialogue\s*:(.*)$/i;
const ASS_TIME = /^\d+:\d{2}:\d{2}[.:]\d{2,3}$/;

/**
 * Field positions declared by the Events "Format:" line
 */
interface EventLayout {
  fieldCount: number;
  startIndex: number;
  endIndex: number;
  textIndex: number;
}

/**
 * Splits on the separator at most `maxSplits` times; the remainder stays in the last part
 */
export function splitCapped(value: string, separator: string, maxSplits: number): string[] {
  const parts: string[] = [];
  let rest = value;

  while (parts.length < maxSplits) {
    const at = rest.indexOf(separator);
    if (at === -1) break;
    parts.push(rest.slice(0, at));
    rest = rest.slice(at + separator.length);
  }

  parts.push(rest);
  return parts;
}

function parseLayout(formatValue: string): EventLayout | null {
  const fields = formatValue.split(',').map((field) => field.trim().toLowerCase());
  const startIndex = fields.indexOf('start');
  const endIndex = fields.indexOf('end');
  const textIndex = fields.indexOf('text');

  if (startIndex === -1 || endIndex === -1 || textIndex === -1) {
    return null;
  }

  return { fieldCount: fields.length, startIndex, endIndex, textIndex };
}

/**
 * Number of extra leading values a dialogue line carries compared to the
 * declared layout, found from the first adjacent pair of timestamps.
 */
function leadingFieldOffset(payload: string, layout: EventLayout): number {
  const values = payload.split(',').map((value) => value.trim());

  for (let i = layout.startIndex; i <= layout.textIndex && i < values.length - 1; i++) {
    if (ASS_TIME.test(values[i] ?? '') && ASS_TIME.test(values[i + 1] ?? '')) {
      return i - layout.startIndex;
    }
  }

  return 0;
}

function parseDialogue(
  payload: string,
  layout: EventLayout
): Omit<SubtitleEntry, 'index'> | null {
  const offset = leadingFieldOffset(payload, layout);
  // Text may contain commas: cap the split so it stays in one piece
  const values = splitCapped(payload, ',', layout.fieldCount - 1 + offset);

  if (values.length < layout.fieldCount + offset) {
    return null;
  }

  const startTime = values[layout.startIndex + offset]?.trim();
  const endTime = values[layout.endIndex + offset]?.trim();
  if (!startTime || !endTime) {
    return null;
  }

  const text = (values[layout.textIndex + offset] ?? '').trim().replace(/\\N/g, '\n');
  return { startTime, endTime, text };
}

/**
 * Parses Advanced SubStation (ASS/SSA) content
 * Reads the [Events] section: the "Format:" line names the fields and each
 * "Dialogue:" line becomes one entry. Without an [Events] header the whole
 * document is searched for an events Format line.
 * @throws MalformedInputError when no Format line declares Start, End and Text
 */
export function parseAssContent(content: string): SubtitleEntry[] {
  const lines = normalizeLineEndings(content).split('\n');
  const eventsHeaderIndex = lines.findIndex((line) => EVENTS_HEADER.test(line.trim()));
  const hasEventsSection = eventsHeaderIndex !== -1;

  const entries: SubtitleEntry[] = [];
  let layout: EventLayout | null = null;

  for (let i = hasEventsSection ? eventsHeaderIndex + 1 : 0; i < lines.length; i++) {
    const line = (lines[i] ?? '').trim();

    if (hasEventsSection && SECTION_HEADER.test(line)) {
      break; // End of the Events section
    }

    if (!layout) {
      const formatValue = line.match(FORMAT_PREFIX)?.[1];
      if (formatValue !== undefined) {
        layout = parseLayout(formatValue);
      }
      continue;
    }

    const payload = line.match(DIALOGUE_PREFIX)?.[1];
    if (payload === undefined) {
      continue;
    }

    const dialogue = parseDialogue(payload, layout);
    if (dialogue) {
      entries.push({ index: entries.length + 1, ...dialogue });
    }
  }

  if (!layout) {
    throw new MalformedInputError(
      'ass',
      hasEventsSection
        ? 'Events Format line must declare Start, End and Text'
        : 'no [Events] section with a Format line found'
    );
  }

  return entries;
}

const SCRIPT_HEADER = [
  '[Script Info]',
  'ScriptType: v4.00+',
  'PlayResX: 384',
  'PlayResY: 288',
  '',
  '[V4+ Styles]',
  'Format: Name, Fontname, Fontsize, PrimaryColour, SecondaryColour, OutlineColour, BackColour, Bold, Italic, Underline, StrikeOut, ScaleX, ScaleY, Spacing, Angle, BorderStyle, Outline, Shadow, Alignment, MarginL, MarginR, MarginV, Encoding',
  'Style: Default,Arial,20,&H00FFFFFF,&H000000FF,&H00000000,&H00000000,0,0,0,0,100,100,0,0,1,2,2,2,10,10,10,1',
  '',
  '[Events]',
  'Format: Layer, Start, End, Style, Name, MarginL, MarginR, MarginV, Effect, Text',
];

/**
 * Generates a minimal ASS script with one Default style
 */
export function generateAssContent(entries: SubtitleEntry[]): string {
  const dialogues = entries.map((entry) => {
    const start = convertTimestamp(entry.startTime, 'ass');
    const end = convertTimestamp(entry.endTime, 'ass');
    const text = entry.text.split('\n').join('\\N');
    return `Dialogue: 0,${start},${end},Default,,0,0,0,,${text}`;
  });

  return [...SCRIPT_HEADER, ...dialogues, ''].join('\n');
}
