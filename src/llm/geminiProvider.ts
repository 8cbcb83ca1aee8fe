import { GoogleGenAI } from '@google/genai';
import { LLMProvider, LLMProviderConfig, backoffDelay } from './types';

export class GeminiLLMProvider implements LLMProvider {
  readonly type = 'gemini' as const;
  readonly hasCredentials: boolean;
  // Created only when a key is configured; the SDK rejects a missing key
  private client: GoogleGenAI | null;
  private model: string;
  private maxRetries: number;

  constructor(config: LLMProviderConfig) {
    if (config.type !== 'gemini') {
      throw new Error('Invalid config type for GeminiLLMProvider');
    }

    this.hasCredentials = !!config.apiKey;
    this.client = config.apiKey ? new GoogleGenAI({ apiKey: config.apiKey }) : null;
    this.model = config.model ?? 'gemini-2.0-flash';
    this.maxRetries = config.maxRetries ?? 3;
  }

  async complete(prompt: string, systemPrompt: string): Promise<string> {
    const client = this.client;
    if (!client) {
      throw new Error('Gemini API key is not configured');
    }

    let lastError: Error | undefined;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        const response = await client.models.generateContent({
          model: this.model,
          contents: prompt,
          config: {
            systemInstruction: systemPrompt,
            temperature: 0.3,
          },
        });

        const text = response.text;
        if (!text) {
          throw new Error('Empty response from Gemini');
        }

        return text.trim();
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        console.warn(`Gemini attempt ${attempt} failed: ${lastError.message}`);

        if (attempt < this.maxRetries) {
          await backoffDelay(attempt);
        }
      }
    }

    throw lastError ?? new Error('Gemini call failed after retries');
  }
}
