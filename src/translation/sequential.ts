import { TranslationBackend } from './types';

export function isBlank(text: string): boolean {
  return text.trim().length === 0;
}

export function pause(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs a remote translation request, falling back to the source text when
 * it throws or comes back empty
 */
export async function failSoft(
  backendId: string,
  text: string,
  request: () => Promise<string>
): Promise<string> {
  try {
    const result = await request();
    return result ? result : text;
  } catch (error) {
    console.warn(`[${backendId}] translation failed: ${errorMessage(error)}`);
    return text;
  }
}

/**
 * Calls `backend.translate`, returning the source text if the backend throws.
 * Built-in backends never throw; registered ones might.
 */
export async function translateSafely(
  backend: TranslationBackend,
  text: string,
  sourceLang: string,
  targetLang: string,
  context?: string
): Promise<string> {
  return failSoft(backend.id, text, () =>
    backend.translate(text, sourceLang, targetLang, context)
  );
}

/**
 * Default batch behaviour: translate each text in order, waiting the
 * backend's pace between calls
 */
export async function translateSequentially(
  backend: TranslationBackend,
  texts: string[],
  sourceLang: string,
  targetLang: string
): Promise<string[]> {
  const results: string[] = [];

  for (const [i, text] of texts.entries()) {
    if (i > 0) {
      await pause(backend.paceMs);
    }
    results.push(await translateSafely(backend, text, sourceLang, targetLang));
  }

  return results;
}
