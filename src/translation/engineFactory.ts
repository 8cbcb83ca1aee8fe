import { Config, config } from '../config';
import { createLLMProvider } from '../llm';
import { TranslationEngine } from './translationEngine';
import { GoogleFreeBackend } from './googleFreeBackend';
import { YandexBackend } from './yandexBackend';
import { DeepLBackend } from './deeplBackend';
import { GenerativeBackend } from './generativeBackend';
import { BUILTIN_BACKEND_IDS, BuiltinBackendId, TranslationBackend } from './types';

/**
 * Creates one built-in backend, credentials taken from config
 */
export function createBuiltinBackend(backendId: BuiltinBackendId, appConfig: Config): TranslationBackend {
  const timeoutMs = appConfig.httpTimeoutMs;

  switch (backendId) {
    case 'google':
      return new GoogleFreeBackend({ timeoutMs });
    case 'yandex':
      return new YandexBackend(appConfig.yandexApiKey, { timeoutMs, apiUrl: appConfig.yandexApiUrl });
    case 'deepl':
      return new DeepLBackend(appConfig.deeplApiKey, { timeoutMs, apiUrl: appConfig.deeplApiUrl });
    case 'gemini':
    case 'openai':
    case 'anthropic':
      return new GenerativeBackend(backendId, createLLMProvider(backendId, appConfig));
  }
}

/**
 * Builds an engine with every built-in backend
 */
export function createTranslationEngine(appConfig: Config): TranslationEngine {
  return new TranslationEngine(
    BUILTIN_BACKEND_IDS.map((backendId): [string, TranslationBackend] => [
      backendId,
      createBuiltinBackend(backendId, appConfig),
    ]),
    appConfig.defaultBackend
  );
}

// Singleton instance
export const translationEngine = createTranslationEngine(config);
