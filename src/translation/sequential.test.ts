import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { failSoft, pause, translateSequentially } from './sequential';
import { TranslationBackend } from './types';

/**
 * Upper-cases text and records when each call was made
 */
function clockedBackend(paceMs: number) {
  const calledAt: number[] = [];
  const backend: TranslationBackend = {
    id: 'clocked',
    costClass: 'free',
    supportsContext: false,
    paceMs,
    translate: async (text) => {
      calledAt.push(Date.now());
      if (text === 'fail') {
        throw new Error('service unavailable');
      }
      return text.toUpperCase();
    },
    batchTranslate: (texts, sourceLang, targetLang) => translateSequentially(backend, texts, sourceLang, targetLang),
    isAvailable: async () => true,
  };
  return { backend, calledAt };
}

describe('translateSequentially', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('should call the backend at once for the first item', async () => {
    const { backend, calledAt } = clockedBackend(100);
    const startedAt = Date.now();

    const pending = translateSequentially(backend, ['a', 'b', 'c'], 'en', 'es');
    await vi.advanceTimersByTimeAsync(99);

    expect(calledAt.map((time) => time - startedAt)).toEqual([0]);

    await vi.runAllTimersAsync();
    expect(await pending).toEqual(['A', 'B', 'C']);
  });

  it('should wait the pace between calls and not after the last one', async () => {
    const { backend, calledAt } = clockedBackend(100);
    const startedAt = Date.now();

    const pending = translateSequentially(backend, ['a', 'b', 'c'], 'en', 'es');
    await vi.runAllTimersAsync();
    await pending;

    expect(calledAt.map((time) => time - startedAt)).toEqual([0, 100, 200]);
    expect(Date.now() - startedAt).toBe(200);
  });

  it('should keep pacing after a failed item', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { backend, calledAt } = clockedBackend(50);
    const startedAt = Date.now();

    const pending = translateSequentially(backend, ['a', 'fail', 'b'], 'en', 'es');
    await vi.runAllTimersAsync();

    expect(await pending).toEqual(['A', 'fail', 'B']);
    expect(calledAt.map((time) => time - startedAt)).toEqual([0, 50, 100]);
  });

  it('should not schedule a timer when the pace is zero', async () => {
    const { backend } = clockedBackend(0);

    const result = await translateSequentially(backend, ['a', 'b'], 'en', 'es');

    expect(result).toEqual(['A', 'B']);
    expect(vi.getTimerCount()).toBe(0);
  });
});

describe('pause', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve after the given delay', async () => {
    vi.useFakeTimers();
    let done = false;
    const pending = pause(250).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(249);
    expect(done).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });
});

describe('failSoft', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should return the source text when the request throws or comes back empty', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(await failSoft('test', 'hello', async () => 'hola')).toBe('hola');
    expect(await failSoft('test', 'hello', async () => '')).toBe('hello');
    expect(await failSoft('test', 'hello', async () => Promise.reject(new Error('timeout')))).toBe('hello');
    expect(warn).toHaveBeenCalledWith('[test] translation failed: timeout');
  });
});
