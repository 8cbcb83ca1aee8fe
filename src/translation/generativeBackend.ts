import { BackendOptions, TranslationBackend } from './types';
import { failSoft, isBlank, translateSequentially } from './sequential';
import { LLMProvider, TRANSLATION_SYSTEM_PROMPT, buildTranslationPrompt } from '../llm';

/**
 * Translation through a generative model. Shared by the gemini, openai and
 * anthropic backends; the provider carries the vendor SDK.
 */
export class GenerativeBackend implements TranslationBackend {
  readonly id: string;
  readonly costClass = 'paid' as const;
  readonly supportsContext = true;
  readonly paceMs: number;
  private provider: LLMProvider;

  constructor(id: string, provider: LLMProvider, options: BackendOptions = {}) {
    this.id = id;
    this.provider = provider;
    this.paceMs = options.paceMs ?? 200;
  }

  async translate(
    text: string,
    sourceLang: string,
    targetLang: string,
    context?: string
  ): Promise<string> {
    if (isBlank(text) || !this.provider.hasCredentials) {
      return text;
    }

    const prompt = buildTranslationPrompt(text, sourceLang, targetLang, context);
    return failSoft(this.id, text, () => this.provider.complete(prompt, TRANSLATION_SYSTEM_PROMPT));
  }

  batchTranslate(texts: string[], sourceLang: string, targetLang: string): Promise<string[]> {
    return translateSequentially(this, texts, sourceLang, targetLang);
  }

  async isAvailable(): Promise<boolean> {
    return this.provider.hasCredentials;
  }
}
