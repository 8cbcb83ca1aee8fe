import { JobConfig } from '../jobs/types';
import { SubtitleEntry } from '../subtitles/types';

export type ValidationResult<T> = { ok: true; value: T } | { ok: false; error: string };

export interface JobConfigDefaults {
  backend: string;
  useContext: boolean;
}

export interface EditedEntries {
  fileName: string;
  entries: SubtitleEntry[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): value is string | undefined {
  return value === undefined || typeof value === 'string';
}

/**
 * Validates a job creation body: `{ config: { targetLang, sourceLang?, backend?, useContext?, contextWindow?, outputFormat? } }`
 */
export function parseJobConfig(body: unknown, defaults: JobConfigDefaults): ValidationResult<JobConfig> {
  const input = isRecord(body) ? body.config : undefined;
  if (!isRecord(input)) {
    return { ok: false, error: 'Missing config' };
  }

  const { sourceLang, targetLang, backend, useContext, contextWindow, outputFormat } = input;

  if (typeof targetLang !== 'string' || !targetLang.trim()) {
    return { ok: false, error: 'targetLang is required' };
  }
  if (!optionalString(sourceLang) || !optionalString(backend) || !optionalString(outputFormat)) {
    return { ok: false, error: 'sourceLang, backend and outputFormat must be strings' };
  }
  if (useContext !== undefined && typeof useContext !== 'boolean') {
    return { ok: false, error: 'useContext must be a boolean' };
  }
  if (
    contextWindow !== undefined &&
    (typeof contextWindow !== 'number' || !Number.isInteger(contextWindow) || contextWindow < 1)
  ) {
    return { ok: false, error: 'contextWindow must be a positive integer' };
  }

  return {
    ok: true,
    value: {
      sourceLang: sourceLang?.trim() || 'auto',
      targetLang: targetLang.trim(),
      backend: backend?.trim() || defaults.backend,
      useContext: useContext ?? defaults.useContext,
      contextWindow,
      outputFormat: outputFormat?.trim() || undefined,
    },
  };
}

/**
 * Validates an editor save body: `{ fileName, entries: [{ startTime, endTime, text }] }`
 * Entries are renumbered from 1 in the given order.
 */
export function parseEditedEntries(body: unknown): ValidationResult<EditedEntries> {
  if (!isRecord(body)) {
    return { ok: false, error: 'Missing body' };
  }

  const { fileName, entries: items } = body;
  if (typeof fileName !== 'string' || !fileName) {
    return { ok: false, error: 'fileName is required' };
  }
  if (!Array.isArray(items)) {
    return { ok: false, error: 'entries must be an array' };
  }

  const entries: SubtitleEntry[] = [];
  const values: unknown[] = items;
  for (const [i, item] of values.entries()) {
    if (
      !isRecord(item) ||
      typeof item.startTime !== 'string' ||
      typeof item.endTime !== 'string' ||
      typeof item.text !== 'string'
    ) {
      return { ok: false, error: `entries[${i}] needs string startTime, endTime and text` };
    }
    entries.push({ index: i + 1, startTime: item.startTime, endTime: item.endTime, text: item.text });
  }

  return { ok: true, value: { fileName, entries } };
}
