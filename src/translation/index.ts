export * from './types';
export { buildContext, translateWithContext } from './contextChain';
export { failSoft, translateSafely, translateSequentially } from './sequential';
export { GoogleFreeBackend } from './googleFreeBackend';
export { YandexBackend } from './yandexBackend';
export { DeepLBackend } from './deeplBackend';
export { GenerativeBackend } from './generativeBackend';
export { TranslationEngine } from './translationEngine';
export type { BatchOptions } from './translationEngine';
export { createBuiltinBackend, createTranslationEngine, translationEngine } from './engineFactory';
