import axios from 'axios';
import { BackendOptions, TranslationBackend } from './types';
import { failSoft, isBlank, translateSequentially } from './sequential';
import { extractTranslationsText } from './responseParsing';

const YANDEX_TRANSLATE_URL = 'https://translate.api.cloud.yandex.net/translate/v2/translate';

interface YandexTranslateRequest {
  targetLanguageCode: string;
  texts: string[];
  sourceLanguageCode?: string;
}

/**
 * Yandex Cloud Translate v2
 */
export class YandexBackend implements TranslationBackend {
  readonly id = 'yandex';
  readonly costClass = 'paid' as const;
  readonly supportsContext = false;
  readonly paceMs: number;
  private apiKey: string;
  private apiUrl: string;
  private timeoutMs: number;

  constructor(apiKey: string, options: BackendOptions = {}) {
    this.apiKey = apiKey;
    this.paceMs = options.paceMs ?? 100;
    this.apiUrl = options.apiUrl ?? YANDEX_TRANSLATE_URL;
    this.timeoutMs = options.timeoutMs ?? 15000;
  }

  async translate(text: string, sourceLang: string, targetLang: string): Promise<string> {
    if (isBlank(text) || !this.apiKey) {
      return text;
    }

    return failSoft(this.id, text, async () => {
      const body: YandexTranslateRequest = { targetLanguageCode: targetLang, texts: [text] };
      // Yandex detects the language itself when no source is sent
      if (sourceLang && sourceLang !== 'auto') {
        body.sourceLanguageCode = sourceLang;
      }

      const response = await axios.post<unknown>(this.apiUrl, body, {
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
        },
        timeout: this.timeoutMs,
      });

      return extractTranslationsText(response.data, 'Yandex');
    });
  }

  batchTranslate(texts: string[], sourceLang: string, targetLang: string): Promise<string[]> {
    return translateSequentially(this, texts, sourceLang, targetLang);
  }

  async isAvailable(): Promise<boolean> {
    return !!this.apiKey;
  }
}
