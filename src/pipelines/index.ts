export {
  TranslationPipeline,
  translationPipeline,
  translatedFileName,
  countUntranslated,
} from './translationPipeline';
export type { ResultEntries, StartOutcome } from './translationPipeline';
