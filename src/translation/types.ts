/**
 * Pricing class reported for a backend
 */
export type CostClass = 'free' | 'paid';

/**
 * Capability set every translation backend implements
 */
export interface TranslationBackend {
  /** Identifier used to select the backend (e.g. "google") */
  readonly id: string;
  readonly costClass: CostClass;
  /** Whether `translate` makes use of the context argument */
  readonly supportsContext: boolean;
  /** Minimum delay between consecutive calls, in milliseconds */
  readonly paceMs: number;

  /**
   * Translates one text. Resolves to the original text when the service
   * fails, the credential is missing or the text is blank.
   * @param context - Previously translated lines, used by context-aware backends
   */
  translate(text: string, sourceLang: string, targetLang: string, context?: string): Promise<string>;

  /**
   * Translates texts in order, one call at a time, waiting `paceMs` between calls.
   * The result has the same length and order as the input.
   */
  batchTranslate(texts: string[], sourceLang: string, targetLang: string): Promise<string[]>;

  /**
   * Best-effort availability check. Key-based backends report whether a key is configured.
   */
  isAvailable(): Promise<boolean>;
}

/**
 * Summary of a backend for status endpoints
 */
export interface BackendInfo {
  available: boolean;
  costClass: CostClass;
  supportsContext: boolean;
}

/**
 * Options shared by the built-in backends
 */
export interface BackendOptions {
  /** Overrides the backend's default pace */
  paceMs?: number;
  /** HTTP request timeout */
  timeoutMs?: number;
  /** Overrides the service endpoint */
  apiUrl?: string;
}

export const BUILTIN_BACKEND_IDS = ['google', 'yandex', 'gemini', 'deepl', 'openai', 'anthropic'] as const;

export type BuiltinBackendId = (typeof BUILTIN_BACKEND_IDS)[number];
