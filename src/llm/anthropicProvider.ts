import Anthropic from '@anthropic-ai/sdk';
import { LLMProvider, LLMProviderConfig, backoffDelay } from './types';

export class AnthropicLLMProvider implements LLMProvider {
  readonly type = 'anthropic' as const;
  readonly hasCredentials: boolean;
  // Created only when a key is configured; the SDK rejects a missing key
  private client: Anthropic | null;
  private model: string;
  private maxRetries: number;

  constructor(config: LLMProviderConfig) {
    if (config.type !== 'anthropic') {
      throw new Error('Invalid config type for AnthropicLLMProvider');
    }

    this.hasCredentials = !!config.apiKey;
    this.client = config.apiKey ? new Anthropic({ apiKey: config.apiKey }) : null;
    this.model = config.model ?? 'claude-sonnet-4-20250514';
    this.maxRetries = config.maxRetries ?? 3;
  }

  async complete(prompt: string, systemPrompt: string): Promise<string> {
    const client = this.client;
    if (!client) {
      throw new Error('Anthropic API key is not configured');
    }

    let lastError: Error | undefined;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        const response = await client.messages.create({
          model: this.model,
          max_tokens: 1024,
          messages: [{ role: 'user', content: prompt }],
          system: systemPrompt,
        });

        const textBlock = response.content.find((block) => block.type === 'text');
        if (!textBlock || textBlock.type !== 'text') {
          throw new Error('No text response from Anthropic');
        }

        return textBlock.text.trim();
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        console.warn(`Anthropic attempt ${attempt} failed: ${lastError.message}`);

        if (attempt < this.maxRetries) {
          await backoffDelay(attempt);
        }
      }
    }

    throw lastError ?? new Error('Anthropic call failed after retries');
  }
}
