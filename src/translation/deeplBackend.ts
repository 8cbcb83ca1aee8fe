import axios from 'axios';
import { BackendOptions, TranslationBackend } from './types';
import { failSoft, isBlank, translateSequentially } from './sequential';
import { extractTranslationsText } from './responseParsing';

const DEEPL_TRANSLATE_URL = 'https://api-free.deepl.com/v2/translate';

/**
 * DeepL REST v2. Language codes are sent upper-cased.
 */
export class DeepLBackend implements TranslationBackend {
  readonly id = 'deepl';
  readonly costClass = 'paid' as const;
  readonly supportsContext = false;
  readonly paceMs: number;
  private apiKey: string;
  private apiUrl: string;
  private timeoutMs: number;

  constructor(apiKey: string, options: BackendOptions = {}) {
    this.apiKey = apiKey;
    this.paceMs = options.paceMs ?? 150;
    this.apiUrl = options.apiUrl ?? DEEPL_TRANSLATE_URL;
    this.timeoutMs = options.timeoutMs ?? 15000;
  }

  async translate(text: string, sourceLang: string, targetLang: string): Promise<string> {
    if (isBlank(text) || !this.apiKey) {
      return text;
    }

    return failSoft(this.id, text, async () => {
      const body = new URLSearchParams({ text, target_lang: targetLang.toUpperCase() });
      if (sourceLang && sourceLang.toLowerCase() !== 'auto') {
        body.set('source_lang', sourceLang.toUpperCase());
      }

      const response = await axios.post<unknown>(this.apiUrl, body, {
        headers: { Authorization: `DeepL-Auth-Key ${this.apiKey}` },
        timeout: this.timeoutMs,
      });

      return extractTranslationsText(response.data, 'DeepL');
    });
  }

  batchTranslate(texts: string[], sourceLang: string, targetLang: string): Promise<string[]> {
    return translateSequentially(this, texts, sourceLang, targetLang);
  }

  async isAvailable(): Promise<boolean> {
    return !!this.apiKey;
  }
}
