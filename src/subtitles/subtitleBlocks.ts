/**
 * Normalizes line endings to "\n"
 */
export function normalizeLineEndings(content: string): string {
  return content.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
}

/**
 * Splits subtitle content into blank-line separated blocks of non-empty lines.
 * Trailing whitespace on each line is dropped, so whitespace-only lines count as blank.
 */
export function splitIntoBlocks(content: string): string[][] {
  const normalized = normalizeLineEndings(content)
    .split('\n')
    .map((line) => line.trimEnd())
    .join('\n');

  return normalized
    .split(/\n{2,}/)
    .map((block) => block.split('\n').filter((line) => line.length > 0))
    .filter((lines) => lines.length > 0);
}

/**
 * Caption text ready for a blank-line separated format: a blank line inside
 * the text would end the block, so blank and whitespace-only lines are dropped.
 */
export function compactCaptionText(text: string): string {
  return text
    .split('\n')
    .filter((line) => line.trim().length > 0)
    .join('\n');
}

/**
 * A block whose timing line matched, with the text lines that follow it
 */
export interface TimedBlock {
  start: string;
  end: string;
  textLines: string[];
}

/**
 * Finds the first line among `lines[0..searchLimit)` matching the timing pattern.
 * The pattern's first two capture groups must be the start and end timestamps.
 */
export function matchTimedBlock(
  lines: string[],
  timingPattern: RegExp,
  searchLimit: number = lines.length
): TimedBlock | null {
  const limit = Math.min(searchLimit, lines.length);

  for (let i = 0; i < limit; i++) {
    const match = lines[i]?.trim().match(timingPattern);
    if (match?.[1] && match[2]) {
      return {
        start: match[1],
        end: match[2],
        textLines: lines.slice(i + 1),
      };
    }
  }

  return null;
}
