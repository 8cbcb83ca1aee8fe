import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import {
  Job,
  JobStatus,
  JobLogLevel,
  CreateJobRequest,
  JobListItem,
  UploadedFile,
  FileResult,
} from './types';
import { config } from '../config';

const MAX_LOG_ENTRIES = 100;

export interface JobStoreDirs {
  jobsDir: string;
  uploadsDir: string;
  outputsDir: string;
}

/**
 * Simple file-based job store
 */
export class JobStore {
  private jobsDir: string;
  private uploadsDir: string;
  private outputsDir: string;

  constructor(dirs: JobStoreDirs = config) {
    this.jobsDir = dirs.jobsDir;
    this.uploadsDir = dirs.uploadsDir;
    this.outputsDir = dirs.outputsDir;
    this.ensureDirectory();
  }

  private ensureDirectory(): void {
    if (!fs.existsSync(this.jobsDir)) {
      fs.mkdirSync(this.jobsDir, { recursive: true });
    }
  }

  private getJobPath(jobId: string): string {
    return path.join(this.jobsDir, `${jobId}.json`);
  }

  private async getOrThrow(jobId: string): Promise<Job> {
    const job = await this.get(jobId);
    if (!job) {
      throw new Error(`Job ${jobId} not found`);
    }
    return job;
  }

  /**
   * Creates a new job
   */
  async create(request: CreateJobRequest): Promise<Job> {
    const jobId = uuidv4();
    const now = new Date();

    const job: Job = {
      id: jobId,
      config: request.config,
      status: 'pending',
      progress: {
        percent: 0,
        currentStep: 'Waiting for files',
        processedFiles: 0,
        totalFiles: 0,
        errors: [],
        logs: [],
      },
      files: [],
      results: [],
      createdAt: now,
      updatedAt: now,
    };

    await this.save(job);

    // Create upload and output directories for this job
    fs.mkdirSync(this.getUploadDir(jobId), { recursive: true });
    fs.mkdirSync(this.getOutputDir(jobId), { recursive: true });

    return job;
  }

  /**
   * Gets a job by ID
   */
  async get(jobId: string): Promise<Job | null> {
    const jobPath = this.getJobPath(jobId);

    if (!fs.existsSync(jobPath)) {
      return null;
    }

    try {
      const content = fs.readFileSync(jobPath, 'utf-8');
      const job = JSON.parse(content) as Job;

      // Convert date strings back to Date objects
      job.createdAt = new Date(job.createdAt);
      job.updatedAt = new Date(job.updatedAt);
      if (job.completedAt) {
        job.completedAt = new Date(job.completedAt);
      }
      if (job.progress.startedAt) {
        job.progress.startedAt = new Date(job.progress.startedAt);
      }
      for (const log of job.progress.logs) {
        log.timestamp = new Date(log.timestamp);
      }

      return job;
    } catch (error) {
      console.error(`Failed to read job ${jobId}:`, error);
      return null;
    }
  }

  /**
   * Saves a job
   */
  async save(job: Job): Promise<void> {
    job.updatedAt = new Date();
    fs.writeFileSync(this.getJobPath(job.id), JSON.stringify(job, null, 2), 'utf-8');
  }

  /**
   * Updates job status and current step
   */
  async updateStatus(jobId: string, status: JobStatus, currentStep: string): Promise<void> {
    const job = await this.getOrThrow(jobId);

    job.status = status;
    job.progress.currentStep = currentStep;

    if (status === 'processing' && !job.progress.startedAt) {
      job.progress.startedAt = new Date();
    }
    if (status === 'completed') {
      job.progress.percent = 100;
      job.completedAt = new Date();
    }

    await this.save(job);
  }

  /**
   * Updates file progress; percent is processed / total
   */
  async updateProgress(
    jobId: string,
    currentStep: string,
    processedFiles: number,
    totalFiles: number
  ): Promise<void> {
    const job = await this.getOrThrow(jobId);

    job.progress.currentStep = currentStep;
    job.progress.processedFiles = processedFiles;
    job.progress.totalFiles = totalFiles;
    job.progress.percent = totalFiles > 0 ? Math.round((processedFiles / totalFiles) * 100) : 0;

    await this.save(job);
  }

  /**
   * Sets job as failed with error message
   */
  async setFailed(jobId: string, error: string): Promise<void> {
    await this.addLog(jobId, 'error', `Translation failed: ${error}`);
    const job = await this.getOrThrow(jobId);

    job.status = 'failed';
    job.progress.errors.push(error);
    job.error = error;
    job.completedAt = new Date();

    await this.save(job);
  }

  /**
   * Adds a log entry to a job
   */
  async addLog(jobId: string, level: JobLogLevel, message: string): Promise<void> {
    const job = await this.get(jobId);
    if (!job) {
      console.warn(`Dropping log for missing job ${jobId}: ${message}`);
      return;
    }

    job.progress.logs.push({
      timestamp: new Date(),
      level,
      message,
      status: job.status,
    });

    // Keep only the most recent entries
    if (job.progress.logs.length > MAX_LOG_ENTRIES) {
      job.progress.logs = job.progress.logs.slice(-MAX_LOG_ENTRIES);
    }

    await this.save(job);
  }

  /**
   * Adds uploaded files to a job
   */
  async addFiles(jobId: string, files: UploadedFile[]): Promise<void> {
    const job = await this.getOrThrow(jobId);
    job.files.push(...files);
    await this.save(job);
  }

  /**
   * Records the outcome for one file. A later result for the same source file replaces the earlier one.
   */
  async addResult(jobId: string, result: FileResult): Promise<void> {
    const job = await this.getOrThrow(jobId);

    job.results = job.results.filter((existing) => existing.storedName !== result.storedName);
    job.results.push(result);
    if (result.status === 'failed') {
      job.progress.errors.push(`${result.sourceFile}: ${result.error}`);
    }

    await this.save(job);
  }

  /**
   * Lists all jobs, newest first
   */
  async list(): Promise<JobListItem[]> {
    this.ensureDirectory();
    const files = fs.readdirSync(this.jobsDir).filter((f) => f.endsWith('.json'));

    const jobs: JobListItem[] = [];

    for (const file of files) {
      const job = await this.get(path.basename(file, '.json'));

      if (job) {
        jobs.push({
          id: job.id,
          sourceLang: job.config.sourceLang,
          targetLang: job.config.targetLang,
          backend: job.config.backend,
          status: job.status,
          fileCount: job.files.length,
          createdAt: job.createdAt,
          progress: job.progress.percent,
        });
      }
    }

    return jobs.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  /**
   * Deletes a job and its files
   */
  async delete(jobId: string): Promise<boolean> {
    const jobPath = this.getJobPath(jobId);

    if (!fs.existsSync(jobPath)) {
      return false;
    }

    fs.unlinkSync(jobPath);
    fs.rmSync(this.getUploadDir(jobId), { recursive: true, force: true });
    fs.rmSync(this.getOutputDir(jobId), { recursive: true, force: true });

    return true;
  }

  /**
   * Gets the upload directory for a job
   */
  getUploadDir(jobId: string): string {
    return path.join(this.uploadsDir, jobId);
  }

  /**
   * Gets the output directory for a job
   */
  getOutputDir(jobId: string): string {
    return path.join(this.outputsDir, jobId);
  }
}

// Singleton instance
export const jobStore = new JobStore();
