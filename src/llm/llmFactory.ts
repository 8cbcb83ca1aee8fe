import { LLMProvider, LLMProviderType } from './types';
import { OpenAILLMProvider } from './openaiProvider';
import { AnthropicLLMProvider } from './anthropicProvider';
import { GeminiLLMProvider } from './geminiProvider';
import { Config } from '../config';

/**
 * Factory function to create LLM providers from application config
 */
export function createLLMProvider(providerType: LLMProviderType, appConfig: Config): LLMProvider {
  switch (providerType) {
    case 'openai':
      return new OpenAILLMProvider({
        type: 'openai',
        apiKey: appConfig.openaiApiKey,
        model: appConfig.openaiModel,
        apiBase: appConfig.openaiApiBase,
        maxRetries: appConfig.llmMaxRetries,
      });

    case 'anthropic':
      return new AnthropicLLMProvider({
        type: 'anthropic',
        apiKey: appConfig.anthropicApiKey,
        model: appConfig.anthropicModel,
        maxRetries: appConfig.llmMaxRetries,
      });

    case 'gemini':
      return new GeminiLLMProvider({
        type: 'gemini',
        apiKey: appConfig.geminiApiKey,
        model: appConfig.geminiModel,
        maxRetries: appConfig.llmMaxRetries,
      });

    default:
      throw new Error(`Unknown LLM provider type: ${providerType as string}`);
  }
}

