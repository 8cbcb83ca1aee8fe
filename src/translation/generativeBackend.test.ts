import { describe, it, expect, vi, afterEach } from 'vitest';
import { GenerativeBackend } from './generativeBackend';
import { LLMProvider, TRANSLATION_SYSTEM_PROMPT } from '../llm';

function fakeProvider(hasCredentials = true) {
  const complete = vi.fn<(prompt: string, systemPrompt: string) => Promise<string>>();
  const provider: LLMProvider = { type: 'openai', hasCredentials, complete };
  return { provider, complete };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('GenerativeBackend', () => {
  it('should send the translation prompt to the provider', async () => {
    const { provider, complete } = fakeProvider();
    complete.mockResolvedValue('Hola');
    const backend = new GenerativeBackend('openai', provider, { paceMs: 0 });

    const result = await backend.translate('Hello', 'English', 'Spanish');

    expect(result).toBe('Hola');
    expect(complete).toHaveBeenCalledWith(
      'Translate the following text from English to Spanish. ' +
        'Provide ONLY the translation without explanations or additional text.\n\n' +
        'Text to translate:\nHello',
      TRANSLATION_SYSTEM_PROMPT
    );
  });

  it('should include context from previous subtitles', async () => {
    const { provider, complete } = fakeProvider();
    complete.mockResolvedValue('Ella se fue.');
    const backend = new GenerativeBackend('gemini', provider, { paceMs: 0 });

    await backend.translate('She left.', 'en', 'es', 'Mi hermana llegó.');

    expect(complete.mock.calls[0]?.[0]).toBe(
      'Translate the following text from en to es. ' +
        'Provide ONLY the translation without explanations or additional text.\n\n' +
        'Context from previous subtitles:\nMi hermana llegó.\n\n' +
        'Text to translate:\nShe left.'
    );
  });

  it('should return the input without a call when no key is configured', async () => {
    const { provider, complete } = fakeProvider(false);
    const backend = new GenerativeBackend('anthropic', provider, { paceMs: 0 });

    expect(await backend.translate('Hello', 'en', 'fr')).toBe('Hello');
    expect(await backend.isAvailable()).toBe(false);
    expect(complete).not.toHaveBeenCalled();
  });

  it('should return the input when the provider fails', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { provider, complete } = fakeProvider();
    complete.mockRejectedValue(new Error('Empty response from OpenAI'));
    const backend = new GenerativeBackend('openai', provider, { paceMs: 0 });

    expect(await backend.batchTranslate(['Hello', 'Bye'], 'en', 'fr')).toEqual(['Hello', 'Bye']);
    expect(complete).toHaveBeenCalledTimes(2);
  });

  it('should report itself as a paid context-aware backend', async () => {
    const { provider } = fakeProvider();
    const backend = new GenerativeBackend('gemini', provider);

    expect(backend.costClass).toBe('paid');
    expect(backend.supportsContext).toBe(true);
    expect(backend.paceMs).toBe(200);
    expect(await backend.isAvailable()).toBe(true);
  });
});
