import { describe, it, expect, vi, afterEach } from 'vitest';
import { buildContext, translateWithContext } from './contextChain';
import { TranslationBackend } from './types';

/**
 * Context-aware backend that appends a prime to each text and records the
 * context it was given and the time of each call
 */
function primeBackend(failOn: string[] = [], paceMs = 0) {
  const contexts: Array<string | undefined> = [];
  const calledAt: number[] = [];
  const backend: TranslationBackend = {
    id: 'prime',
    costClass: 'free',
    supportsContext: true,
    paceMs,
    translate: async (text, _sourceLang, _targetLang, context) => {
      contexts.push(context);
      calledAt.push(Date.now());
      if (failOn.includes(text)) {
        throw new Error(`cannot translate ${text}`);
      }
      return `${text}'`;
    },
    batchTranslate: async (texts) => texts,
    isAvailable: async () => true,
  };
  return { backend, contexts, calledAt };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('buildContext', () => {
  it('should join the last outputs within the window', () => {
    expect(buildContext(['a', 'b', 'c'], 2)).toBe('b c');
    expect(buildContext(['a', 'b'], 5)).toBe('a b');
  });

  it('should return undefined with no outputs or no window', () => {
    expect(buildContext([], 3)).toBeUndefined();
    expect(buildContext(['a'], 0)).toBeUndefined();
    expect(buildContext(['a'], -1)).toBeUndefined();
  });
});

describe('translateWithContext', () => {
  it('should give each item the previous translated outputs as context', async () => {
    const { backend, contexts } = primeBackend();

    const result = await translateWithContext(backend, ['a', 'b', 'c', 'd'], 'en', 'es', 2);

    expect(result).toEqual(["a'", "b'", "c'", "d'"]);
    expect(contexts).toEqual([undefined, "a'", "a' b'", "b' c'"]);
  });

  it('should keep the source text for a failing item and carry on', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { backend, contexts } = primeBackend(['b']);

    const result = await translateWithContext(backend, ['a', 'b', 'c'], 'en', 'es', 3);

    expect(result).toEqual(["a'", 'b', "c'"]);
    expect(contexts[2]).toBe("a' b");
  });

  it('should return an empty list for no input', async () => {
    const { backend, contexts } = primeBackend();

    expect(await translateWithContext(backend, [], 'en', 'es', 3)).toEqual([]);
    expect(contexts).toEqual([]);
  });

  it('should wait the pace between items but not before the first or after the last', async () => {
    vi.useFakeTimers();
    try {
      const { backend, contexts, calledAt } = primeBackend([], 100);
      const startedAt = Date.now();

      const pending = translateWithContext(backend, ['a', 'b', 'c'], 'en', 'es', 1);
      await vi.advanceTimersByTimeAsync(99);
      expect(calledAt.map((time) => time - startedAt)).toEqual([0]);

      await vi.runAllTimersAsync();
      expect(await pending).toEqual(["a'", "b'", "c'"]);
      expect(contexts).toEqual([undefined, "a'", "b'"]);
      expect(calledAt.map((time) => time - startedAt)).toEqual([0, 100, 200]);
      expect(Date.now() - startedAt).toBe(200);
    } finally {
      vi.useRealTimers();
    }
  });
});
