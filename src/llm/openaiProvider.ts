import OpenAI from 'openai';
import { LLMProvider, LLMProviderConfig, backoffDelay } from './types';

export class OpenAILLMProvider implements LLMProvider {
  readonly type = 'openai' as const;
  readonly hasCredentials: boolean;
  // Created only when a key is configured; the SDK rejects a missing key
  private client: OpenAI | null;
  private model: string;
  private maxRetries: number;

  constructor(config: LLMProviderConfig) {
    if (config.type !== 'openai') {
      throw new Error('Invalid config type for OpenAILLMProvider');
    }

    this.hasCredentials = !!config.apiKey;
    this.client = config.apiKey
      ? new OpenAI({ apiKey: config.apiKey, baseURL: config.apiBase })
      : null;
    this.model = config.model ?? 'gpt-4o';
    this.maxRetries = config.maxRetries ?? 3;
  }

  async complete(prompt: string, systemPrompt: string): Promise<string> {
    const client = this.client;
    if (!client) {
      throw new Error('OpenAI API key is not configured');
    }

    let lastError: Error | undefined;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        const response = await client.chat.completions.create({
          model: this.model,
          messages: [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: prompt },
          ],
          temperature: 0.3,
        });

        const content = response.choices[0]?.message?.content;
        if (!content) {
          throw new Error('Empty response from OpenAI');
        }

        return content.trim();
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        console.warn(`OpenAI attempt ${attempt} failed: ${lastError.message}`);

        if (attempt < this.maxRetries) {
          await backoffDelay(attempt);
        }
      }
    }

    throw lastError ?? new Error('OpenAI call failed after retries');
  }
}
