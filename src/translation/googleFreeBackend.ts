import axios from 'axios';
import { BackendOptions, TranslationBackend } from './types';
import { failSoft, isBlank, translateSequentially } from './sequential';
import { extractGoogleTranslation } from './responseParsing';

const GOOGLE_TRANSLATE_URL = 'https://translate.googleapis.com/translate_a/single';

/**
 * Free Google Translate web endpoint (no credential)
 */
export class GoogleFreeBackend implements TranslationBackend {
  readonly id = 'google';
  readonly costClass = 'free' as const;
  readonly supportsContext = false;
  readonly paceMs: number;
  private apiUrl: string;
  private timeoutMs: number;

  constructor(options: BackendOptions = {}) {
    this.paceMs = options.paceMs ?? 50;
    this.apiUrl = options.apiUrl ?? GOOGLE_TRANSLATE_URL;
    this.timeoutMs = options.timeoutMs ?? 15000;
  }

  async translate(text: string, sourceLang: string, targetLang: string): Promise<string> {
    if (isBlank(text)) {
      return text;
    }

    return failSoft(this.id, text, () => this.request(text, sourceLang, targetLang));
  }

  batchTranslate(texts: string[], sourceLang: string, targetLang: string): Promise<string[]> {
    return translateSequentially(this, texts, sourceLang, targetLang);
  }

  /**
   * Probes the endpoint with one short request
   */
  async isAvailable(): Promise<boolean> {
    try {
      await this.request('test', 'en', 'es');
      return true;
    } catch {
      return false;
    }
  }

  private async request(text: string, sourceLang: string, targetLang: string): Promise<string> {
    const response = await axios.get<unknown>(this.apiUrl, {
      params: {
        client: 'gtx',
        sl: sourceLang || 'auto',
        tl: targetLang,
        dt: 't',
        q: text,
      },
      timeout: this.timeoutMs,
    });

    return extractGoogleTranslation(response.data);
  }
}
