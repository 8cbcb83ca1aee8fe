import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { JobStore } from './jobStore';
import { JobConfig } from './types';

const jobConfig: JobConfig = {
  sourceLang: 'en',
  targetLang: 'es',
  backend: 'google',
  useContext: false,
};

describe('JobStore', () => {
  let rootDir: string;
  let store: JobStore;

  beforeEach(() => {
    rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'job-store-'));
    store = new JobStore({
      jobsDir: path.join(rootDir, 'jobs'),
      uploadsDir: path.join(rootDir, 'uploads'),
      outputsDir: path.join(rootDir, 'outputs'),
    });
  });

  afterEach(() => {
    fs.rmSync(rootDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('should create a pending job with its directories', async () => {
    const job = await store.create({ config: jobConfig });

    expect(job.status).toBe('pending');
    expect(job.files).toEqual([]);
    expect(job.results).toEqual([]);
    expect(fs.existsSync(store.getUploadDir(job.id))).toBe(true);
    expect(fs.existsSync(store.getOutputDir(job.id))).toBe(true);
  });

  it('should read back a fresh snapshot with dates restored', async () => {
    const job = await store.create({ config: jobConfig });
    await store.addLog(job.id, 'info', 'Uploaded 1 file');

    const loaded = await store.get(job.id);

    expect(loaded).not.toBe(job);
    expect(loaded?.config).toEqual(jobConfig);
    expect(loaded?.createdAt).toBeInstanceOf(Date);
    expect(loaded?.progress.logs[0]?.timestamp).toBeInstanceOf(Date);
    expect(loaded?.progress.logs[0]?.message).toBe('Uploaded 1 file');
  });

  it('should return null for an unknown job', async () => {
    expect(await store.get('missing')).toBeNull();
  });

  it('should compute percent from processed files', async () => {
    const job = await store.create({ config: jobConfig });

    await store.updateStatus(job.id, 'processing', 'Translating');
    await store.updateProgress(job.id, 'Translated a.srt', 1, 3);

    const loaded = await store.get(job.id);
    expect(loaded?.status).toBe('processing');
    expect(loaded?.progress.startedAt).toBeInstanceOf(Date);
    expect(loaded?.progress.percent).toBe(33);
    expect(loaded?.progress.processedFiles).toBe(1);
    expect(loaded?.progress.totalFiles).toBe(3);
  });

  it('should set percent to 100 on completion', async () => {
    const job = await store.create({ config: jobConfig });

    await store.updateStatus(job.id, 'completed', 'Done');

    const loaded = await store.get(job.id);
    expect(loaded?.progress.percent).toBe(100);
    expect(loaded?.completedAt).toBeInstanceOf(Date);
  });

  it('should record a failure with a log entry', async () => {
    const job = await store.create({ config: jobConfig });

    await store.setFailed(job.id, 'disk full');

    const loaded = await store.get(job.id);
    expect(loaded?.status).toBe('failed');
    expect(loaded?.error).toBe('disk full');
    expect(loaded?.progress.errors).toEqual(['disk full']);
    expect(loaded?.progress.logs.at(-1)).toMatchObject({
      level: 'error',
      message: 'Translation failed: disk full',
    });
  });

  it('should keep only the last 100 log entries', async () => {
    const job = await store.create({ config: jobConfig });

    for (let i = 1; i <= 105; i++) {
      await store.addLog(job.id, 'info', `entry ${i}`);
    }

    const logs = (await store.get(job.id))?.progress.logs ?? [];
    expect(logs).toHaveLength(100);
    expect(logs[0]?.message).toBe('entry 6');
    expect(logs[99]?.message).toBe('entry 105');
  });

  it('should add files and replace results per stored file', async () => {
    const job = await store.create({ config: jobConfig });
    await store.addFiles(job.id, [
      { originalName: 'a.srt', storedName: 'a.srt', path: '/tmp/a.srt', size: 10, format: 'srt' },
    ]);

    await store.addResult(job.id, {
      status: 'failed',
      sourceFile: 'a.srt',
      storedName: 'a.srt',
      error: 'Malformed SRT file: empty',
    });
    await store.addResult(job.id, {
      status: 'completed',
      sourceFile: 'a.srt',
      storedName: 'a.srt',
      outputName: 'a_translated.srt',
      outputPath: '/tmp/a_translated.srt',
      format: 'srt',
      entryCount: 2,
      untranslatedCount: 0,
    });

    const loaded = await store.get(job.id);
    expect(loaded?.files).toHaveLength(1);
    expect(loaded?.results).toHaveLength(1);
    expect(loaded?.results[0]?.status).toBe('completed');
    expect(loaded?.progress.errors).toEqual(['a.srt: Malformed SRT file: empty']);
  });

  it('should keep results of different uploads with the same original name', async () => {
    const job = await store.create({ config: jobConfig });
    const completed = {
      status: 'completed' as const,
      sourceFile: 'a.srt',
      format: 'srt' as const,
      entryCount: 1,
      untranslatedCount: 0,
    };

    await store.addResult(job.id, {
      ...completed,
      storedName: 'first-a.srt',
      outputName: 'a_translated.srt',
      outputPath: '/tmp/a_translated.srt',
    });
    await store.addResult(job.id, {
      ...completed,
      storedName: 'second-a.srt',
      outputName: 'a_translated_2.srt',
      outputPath: '/tmp/a_translated_2.srt',
    });

    const loaded = await store.get(job.id);
    expect(loaded?.results.map((result) => result.storedName)).toEqual(['first-a.srt', 'second-a.srt']);
  });

  it('should throw when updating a missing job', async () => {
    await expect(store.updateStatus('missing', 'processing', 'x')).rejects.toThrow('Job missing not found');
  });

  it('should list jobs newest first', async () => {
    const first = await store.create({ config: jobConfig });
    const second = await store.create({ config: { ...jobConfig, targetLang: 'de' } });
    // Spread creation times apart so the order is deterministic
    const older = await store.get(first.id);
    if (older) {
      older.createdAt = new Date(Date.now() - 60_000);
      await store.save(older);
    }

    const jobs = await store.list();

    expect(jobs.map((job) => job.id)).toEqual([second.id, first.id]);
    expect(jobs[0]).toMatchObject({ targetLang: 'de', status: 'pending', fileCount: 0, progress: 0 });
  });

  it('should delete a job with its directories', async () => {
    const job = await store.create({ config: jobConfig });

    expect(await store.delete(job.id)).toBe(true);
    expect(await store.get(job.id)).toBeNull();
    expect(fs.existsSync(store.getUploadDir(job.id))).toBe(false);
    expect(await store.delete(job.id)).toBe(false);
  });
});
