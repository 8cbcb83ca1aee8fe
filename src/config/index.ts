import dotenv from 'dotenv';
import path from 'path';

// Load environment variables
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

export interface Config {
  // Server
  port: number;
  nodeEnv: string;

  // File paths
  dataDir: string;
  uploadsDir: string;
  outputsDir: string;
  jobsDir: string;

  // Uploads
  maxFileSizeMb: number;
  maxFilesPerBatch: number;

  // Translation
  defaultBackend: string;
  contextWindowSize: number;
  useContextPreservation: boolean;
  httpTimeoutMs: number;

  // Gemini
  geminiApiKey: string;
  geminiModel: string;

  // DeepL
  deeplApiKey: string;
  deeplApiUrl: string;

  // Yandex
  yandexApiKey: string;
  yandexApiUrl: string;

  // OpenAI
  openaiApiKey: string;
  openaiApiBase: string;
  openaiModel: string;

  // Anthropic
  anthropicApiKey: string;
  anthropicModel: string;

  llmMaxRetries: number;
}

function getEnvString(key: string, defaultValue: string = ''): string {
  return process.env[key] ?? defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  return value.trim().toLowerCase() === 'true';
}

export function loadConfig(): Config {
  const dataDir = getEnvString('DATA_DIR', './data');

  return {
    // Server
    port: getEnvNumber('PORT', 3001),
    nodeEnv: getEnvString('NODE_ENV', 'development'),

    // File paths
    dataDir,
    uploadsDir: getEnvString('UPLOADS_DIR', `${dataDir}/uploads`),
    outputsDir: getEnvString('OUTPUTS_DIR', `${dataDir}/outputs`),
    jobsDir: getEnvString('JOBS_DIR', `${dataDir}/jobs`),

    // Uploads
    maxFileSizeMb: getEnvNumber('MAX_FILE_SIZE_MB', 1),
    maxFilesPerBatch: getEnvNumber('MAX_FILES_PER_BATCH', 20),

    // Translation
    defaultBackend: getEnvString('DEFAULT_TRANSLATION_BACKEND', 'google'),
    contextWindowSize: getEnvNumber('CONTEXT_WINDOW_SIZE', 5),
    useContextPreservation: getEnvBoolean('USE_CONTEXT_PRESERVATION', true),
    httpTimeoutMs: getEnvNumber('HTTP_TIMEOUT_MS', 15000),

    // Gemini
    geminiApiKey: getEnvString('GEMINI_API_KEY'),
    geminiModel: getEnvString('GEMINI_MODEL', 'gemini-2.0-flash'),

    // DeepL
    deeplApiKey: getEnvString('DEEPL_API_KEY'),
    deeplApiUrl: getEnvString('DEEPL_API_URL', 'https://api-free.deepl.com/v2/translate'),

    // Yandex
    yandexApiKey: getEnvString('YANDEX_API_KEY'),
    yandexApiUrl: getEnvString(
      'YANDEX_API_URL',
      'https://translate.api.cloud.yandex.net/translate/v2/translate'
    ),

    // OpenAI
    openaiApiKey: getEnvString('OPENAI_API_KEY'),
    openaiApiBase: getEnvString('OPENAI_API_BASE', 'https://api.openai.com/v1'),
    openaiModel: getEnvString('OPENAI_MODEL', 'gpt-4o'),

    // Anthropic
    anthropicApiKey: getEnvString('ANTHROPIC_API_KEY'),
    anthropicModel: getEnvString('ANTHROPIC_MODEL', 'claude-sonnet-4-20250514'),

    llmMaxRetries: getEnvNumber('LLM_MAX_RETRIES', 3),
  };
}

export const config = loadConfig();
