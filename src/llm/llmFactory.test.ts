import { describe, it, expect } from 'vitest';
import { createLLMProvider } from './llmFactory';
import { loadConfig } from '../config';

const noKeys = {
  ...loadConfig(),
  geminiApiKey: '',
  openaiApiKey: '',
  anthropicApiKey: '',
};

describe('createLLMProvider', () => {
  it('should build a provider of each type from config', () => {
    expect(createLLMProvider('openai', noKeys).type).toBe('openai');
    expect(createLLMProvider('anthropic', noKeys).type).toBe('anthropic');
    expect(createLLMProvider('gemini', noKeys).type).toBe('gemini');
  });

  it('should report credentials only when a key is set', () => {
    expect(createLLMProvider('openai', noKeys).hasCredentials).toBe(false);
    expect(createLLMProvider('openai', { ...noKeys, openaiApiKey: 'test-key' }).hasCredentials).toBe(true);
  });

  it('should reject completion without a key', async () => {
    await expect(createLLMProvider('gemini', noKeys).complete('Hi', 'system')).rejects.toThrow(
      'Gemini API key is not configured'
    );
    await expect(createLLMProvider('anthropic', noKeys).complete('Hi', 'system')).rejects.toThrow(
      'Anthropic API key is not configured'
    );
  });
});
