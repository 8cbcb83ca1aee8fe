import { detect } from 'chardet';
import iconv from 'iconv-lite';

function hasUtf8Bom(buffer: Buffer): boolean {
  return buffer.length >= 3 && buffer[0] === 0xef && buffer[1] === 0xbb && buffer[2] === 0xbf;
}

/**
 * Guesses the character encoding of raw subtitle bytes
 * Falls back to UTF-8 when detection fails or names an encoding iconv-lite cannot decode.
 */
export function detectEncoding(buffer: Buffer): string {
  if (hasUtf8Bom(buffer)) {
    return 'utf-8';
  }

  const detected = detect(buffer);
  if (detected && iconv.encodingExists(detected)) {
    return detected;
  }

  return 'utf-8';
}

/**
 * Decodes subtitle file content to a string, stripping any byte-order mark
 */
export function decodeSubtitleBuffer(raw: Buffer | string): string {
  if (typeof raw === 'string') {
    return raw.replace(/^\uFEFF/, '');
  }

  return iconv.decode(raw, detectEncoding(raw));
}
