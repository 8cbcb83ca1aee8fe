export * from './types';
export { OpenAILLMProvider } from './openaiProvider';
export { AnthropicLLMProvider } from './anthropicProvider';
export { GeminiLLMProvider } from './geminiProvider';
export { createLLMProvider } from './llmFactory';
