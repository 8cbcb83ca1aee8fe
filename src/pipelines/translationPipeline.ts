import fs from 'fs';
import path from 'path';
import { Job, UploadedFile, FileResult } from '../jobs/types';
import { jobStore, JobStore } from '../jobs/jobStore';
import {
  SubtitleEntry,
  SubtitleFormat,
  parseSubtitles,
  formatSubtitles,
  resolveOutputFormat,
} from '../subtitles';
import { TranslationEngine, translationEngine } from '../translation';
import { config } from '../config';

/**
 * Entries of one translated file, as shown in the editor
 */
export interface ResultEntries {
  fileName: string;
  format: SubtitleFormat;
  entries: SubtitleEntry[];
}

/**
 * Outcome of a start request
 */
export type StartOutcome = 'started' | 'not_found' | 'already_started' | 'no_files';

type CompletedResult = Extract<FileResult, { status: 'completed' }>;

/**
 * Name of the translated file written for an input file: "<name>_translated.<ext>".
 * Names already taken in the job get a counter suffix ("<name>_translated_2.<ext>").
 */
export function translatedFileName(
  originalName: string,
  format: SubtitleFormat,
  taken: ReadonlySet<string> = new Set()
): string {
  const stem = `${path.parse(originalName).name}_translated`;
  let name = `${stem}.${format}`;

  for (let n = 2; taken.has(name); n++) {
    name = `${stem}_${n}.${format}`;
  }

  return name;
}

/**
 * Number of non-blank entries whose text came back unchanged
 */
export function countUntranslated(source: SubtitleEntry[], translated: string[]): number {
  return source.filter((entry, i) => entry.text.trim() !== '' && translated[i] === entry.text).length;
}

function completedResults(job: Job): CompletedResult[] {
  return job.results.filter((result): result is CompletedResult => result.status === 'completed');
}

/**
 * Translates every uploaded file of a job and writes the results to the job's output directory
 */
export class TranslationPipeline {
  private store: JobStore;
  private engine: TranslationEngine;
  private defaultContextWindow: number;
  // Jobs claimed by start() and not yet finished
  private active = new Set<string>();

  constructor(store?: JobStore, engine?: TranslationEngine, defaultContextWindow?: number) {
    this.store = store ?? jobStore;
    this.engine = engine ?? translationEngine;
    this.defaultContextWindow = defaultContextWindow ?? config.contextWindowSize;
  }

  /**
   * Marks a pending job as processing and runs it in the background.
   * The job is claimed before the first await, so only one of several
   * concurrent requests for the same job starts it.
   */
  async start(jobId: string): Promise<StartOutcome> {
    if (this.active.has(jobId)) {
      return 'already_started';
    }
    this.active.add(jobId);

    let outcome: StartOutcome;
    try {
      outcome = await this.claim(jobId);
    } catch (error) {
      this.active.delete(jobId);
      throw error;
    }

    if (outcome !== 'started') {
      this.active.delete(jobId);
      return outcome;
    }

    this.run(jobId)
      .finally(() => this.active.delete(jobId))
      .catch((error) => {
        console.error(`Pipeline failed for job ${jobId}:`, error);
      });

    return outcome;
  }

  private async claim(jobId: string): Promise<StartOutcome> {
    const job = await this.store.get(jobId);
    if (!job) {
      return 'not_found';
    }
    if (job.status !== 'pending') {
      return 'already_started';
    }
    if (job.files.length === 0) {
      return 'no_files';
    }

    await this.store.updateStatus(jobId, 'processing', 'Queued');
    return 'started';
  }

  /**
   * Runs the complete pipeline for a job
   */
  async run(jobId: string): Promise<void> {
    const job = await this.store.get(jobId);
    if (!job) {
      throw new Error(`Job ${jobId} not found`);
    }

    try {
      if (job.files.length === 0) {
        throw new Error('No subtitle files uploaded');
      }

      const total = job.files.length;
      const { sourceLang, targetLang, backend } = job.config;

      await this.store.updateStatus(jobId, 'processing', 'Starting translation');
      await this.store.addLog(
        jobId,
        'info',
        `Translating ${total} file(s) from ${sourceLang} to ${targetLang} using ${backend}`
      );

      let failed = 0;
      const outputNames = new Set<string>();
      for (const [i, file] of job.files.entries()) {
        await this.store.updateProgress(jobId, `Translating ${file.originalName}`, i, total);

        const result = await this.translateFile(job, file, outputNames);
        await this.store.addResult(jobId, result);

        if (result.status === 'completed') {
          outputNames.add(result.outputName);
          const note = result.untranslatedCount > 0 ? ` (${result.untranslatedCount} left untranslated)` : '';
          await this.store.addLog(
            jobId,
            'success',
            `${file.originalName}: ${result.entryCount} entries written to ${result.outputName}${note}`
          );
        } else {
          failed++;
          await this.store.addLog(jobId, 'error', `${file.originalName}: ${result.error}`);
        }
      }

      await this.store.updateProgress(jobId, 'All files processed', total, total);
      await this.store.updateStatus(
        jobId,
        'completed',
        failed > 0 ? `Completed with ${failed} failed file(s)` : 'Translation complete'
      );
      await this.store.addLog(jobId, 'success', `Translated ${total - failed} of ${total} file(s)`);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      await this.store.setFailed(jobId, message);
      throw error;
    }
  }

  /**
   * Parses, translates and writes a single file. Failures are returned, not thrown.
   */
  private async translateFile(
    job: Job,
    file: UploadedFile,
    takenNames: ReadonlySet<string>
  ): Promise<FileResult> {
    try {
      const entries = parseSubtitles(fs.readFileSync(file.path), file.format);
      const { sourceLang, targetLang, backend, useContext, contextWindow, outputFormat } = job.config;

      const translated = await this.engine.batchTranslate(
        entries.map((entry) => entry.text),
        sourceLang,
        targetLang,
        backend,
        { useContext, contextWindow: contextWindow ?? this.defaultContextWindow }
      );

      const translatedEntries = entries.map((entry, i) => ({
        ...entry,
        text: translated[i] ?? entry.text,
      }));

      const format = outputFormat ? resolveOutputFormat(outputFormat) : file.format;
      const outputName = translatedFileName(file.originalName, format, takenNames);
      const outputDir = this.store.getOutputDir(job.id);
      const outputPath = path.join(outputDir, outputName);

      fs.mkdirSync(outputDir, { recursive: true });
      fs.writeFileSync(outputPath, formatSubtitles(translatedEntries, format), 'utf-8');

      return {
        status: 'completed',
        sourceFile: file.originalName,
        storedName: file.storedName,
        outputName,
        outputPath,
        format,
        entryCount: entries.length,
        untranslatedCount: countUntranslated(entries, translated),
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[Pipeline] ${file.originalName} failed: ${message}`);
      return {
        status: 'failed',
        sourceFile: file.originalName,
        storedName: file.storedName,
        error: message,
      };
    }
  }

  /**
   * Path of a translated file, or null if the job has no such output
   */
  async getResultPath(jobId: string, fileName: string): Promise<string | null> {
    const job = await this.store.get(jobId);
    if (!job) {
      return null;
    }

    const result = completedResults(job).find((r) => r.outputName === fileName);
    return result && fs.existsSync(result.outputPath) ? result.outputPath : null;
  }

  /**
   * Re-parses every translated file of a job for editing
   */
  async readResultEntries(jobId: string): Promise<ResultEntries[]> {
    const job = await this.store.get(jobId);
    if (!job) {
      throw new Error(`Job ${jobId} not found`);
    }

    return completedResults(job)
      .filter((result) => fs.existsSync(result.outputPath))
      .map((result) => ({
        fileName: result.outputName,
        format: result.format,
        entries: parseSubtitles(fs.readFileSync(result.outputPath), result.format),
      }));
  }

  /**
   * Rewrites a translated file from edited entries, keeping its format
   * @returns false when the job has no output with that name
   */
  async saveResultEntries(jobId: string, fileName: string, entries: SubtitleEntry[]): Promise<boolean> {
    const job = await this.store.get(jobId);
    if (!job) {
      throw new Error(`Job ${jobId} not found`);
    }

    const result = completedResults(job).find((r) => r.outputName === fileName);
    if (!result) {
      return false;
    }

    const numbered = entries.map((entry, i) => ({ ...entry, index: i + 1 }));
    fs.writeFileSync(result.outputPath, formatSubtitles(numbered, result.format), 'utf-8');
    await this.store.addResult(jobId, { ...result, entryCount: numbered.length });
    await this.store.addLog(jobId, 'info', `${fileName}: saved ${numbered.length} edited entries`);

    return true;
  }
}

// Singleton instance
export const translationPipeline = new TranslationPipeline();
