/**
 * Supported LLM provider types
 */
export type LLMProviderType = 'openai' | 'anthropic' | 'gemini';

/**
 * Configuration for an LLM provider
 */
export interface LLMProviderConfig {
  type: LLMProviderType;
  apiKey: string;
  model?: string;
  apiBase?: string;
  maxRetries?: number;
}

/**
 * LLM Provider interface - all providers must implement this
 */
export interface LLMProvider {
  /**
   * Provider type identifier
   */
  readonly type: LLMProviderType;

  /**
   * Whether an API key was supplied
   */
  readonly hasCredentials: boolean;

  /**
   * Sends a single prompt and returns the model's text reply
   * @throws when every attempt fails or the reply is empty
   */
  complete(prompt: string, systemPrompt: string): Promise<string>;
}

export const TRANSLATION_SYSTEM_PROMPT =
  'You are a professional subtitle translator. Reply with the translated subtitle text only.';

/**
 * Prompt template for translating one subtitle
 * Previous translated lines, when given, are included as context for
 * pronouns and terminology.
 */
export function buildTranslationPrompt(
  text: string,
  sourceLang: string,
  targetLang: string,
  context?: string
): string {
  let prompt = `Translate the following text from ${sourceLang} to ${targetLang}. `;
  prompt += 'Provide ONLY the translation without explanations or additional text.\n\n';

  if (context) {
    prompt += `Context from previous subtitles:\n${context}\n\n`;
  }

  prompt += `Text to translate:\n${text}`;
  return prompt;
}

/**
 * Waits before the next retry attempt (2s, 4s, 8s, ...)
 */
export function backoffDelay(attempt: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.pow(2, attempt) * 1000));
}
