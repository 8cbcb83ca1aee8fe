import { TranslationBackend } from './types';
import { pause, translateSafely } from './sequential';

/**
 * Context for the next item: the last `window` translated outputs, space-joined
 * @returns undefined when there is nothing to include
 */
export function buildContext(translated: readonly string[], window: number): string | undefined {
  const size = Math.floor(window);
  if (size <= 0 || translated.length === 0) {
    return undefined;
  }

  return translated.slice(-size).join(' ');
}

/**
 * Translates texts in order, giving item i the translated outputs of
 * items [max(0, i - window), i) as context.
 *
 * Written as a fold over the inputs: each step only sees the outputs
 * accumulated so far, so item i cannot start before item i - 1 finishes.
 */
export function translateWithContext(
  backend: TranslationBackend,
  texts: string[],
  sourceLang: string,
  targetLang: string,
  window: number
): Promise<string[]> {
  return texts.reduce<Promise<string[]>>(async (previous, text, i) => {
    const translated = await previous;
    if (i > 0) {
      await pause(backend.paceMs);
    }

    const context = buildContext(translated, window);
    const output = await translateSafely(backend, text, sourceLang, targetLang, context);
    return [...translated, output];
  }, Promise.resolve([]));
}
