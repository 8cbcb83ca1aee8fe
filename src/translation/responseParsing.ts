/**
 * Reads `translations[0].text` from a Yandex or DeepL response body
 */
export function extractTranslationsText(data: unknown, service: string): string {
  if (typeof data === 'object' && data !== null && 'translations' in data) {
    const translations = data.translations;
    const first: unknown = Array.isArray(translations) ? translations[0] : undefined;

    if (typeof first === 'object' && first !== null && 'text' in first && typeof first.text === 'string') {
      return first.text;
    }
  }

  throw new Error(`Unexpected response from ${service}`);
}

/**
 * Joins the translated segments of a Google Translate (gtx) response:
 * `[[["Hola", "Hello", ...], ...], ...]`
 */
export function extractGoogleTranslation(data: unknown): string {
  const segments: unknown = Array.isArray(data) ? data[0] : undefined;
  if (!Array.isArray(segments)) {
    throw new Error('Unexpected response from Google Translate');
  }

  return segments
    .map((segment: unknown) =>
      Array.isArray(segment) && typeof segment[0] === 'string' ? segment[0] : ''
    )
    .join('');
}
