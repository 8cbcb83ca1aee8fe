import { SubtitleFormat } from '../subtitles/types';

/**
 * Possible job status values
 */
export type JobStatus = 'pending' | 'processing' | 'completed' | 'failed';

export type JobLogLevel = 'info' | 'warn' | 'error' | 'success';

export interface JobLogEntry {
  timestamp: Date;
  level: JobLogLevel;
  message: string;
  status: JobStatus;
}

/**
 * Detailed progress information for a job
 */
export interface JobProgress {
  percent: number; // 0-100
  currentStep: string;
  processedFiles: number;
  totalFiles: number;
  startedAt?: Date;
  errors: string[];
  logs: JobLogEntry[];
}

/**
 * Job configuration input
 */
export interface JobConfig {
  sourceLang: string;
  targetLang: string;
  /** Translation backend id; unknown ids use the default backend */
  backend: string;
  useContext: boolean;
  contextWindow?: number;
  /** Output format tag; defaults to each file's own format */
  outputFormat?: string;
}

/**
 * File reference for uploaded files
 */
export interface UploadedFile {
  originalName: string;
  storedName: string;
  path: string;
  size: number;
  format: SubtitleFormat;
}

export type FileResult =
  | {
      status: 'completed';
      sourceFile: string;
      /** Stored name of the uploaded file; unique within a job */
      storedName: string;
      outputName: string;
      outputPath: string;
      format: SubtitleFormat;
      entryCount: number;
      /** Entries whose text came back unchanged */
      untranslatedCount: number;
    }
  | {
      status: 'failed';
      sourceFile: string;
      storedName: string;
      error: string;
    };

/**
 * Complete job definition
 */
export interface Job {
  id: string;
  config: JobConfig;
  status: JobStatus;
  progress: JobProgress;

  files: UploadedFile[];
  results: FileResult[];

  // Metadata
  createdAt: Date;
  updatedAt: Date;
  completedAt?: Date;
  error?: string;
}

/**
 * Job creation request
 */
export interface CreateJobRequest {
  config: JobConfig;
}

/**
 * Job list response
 */
export interface JobListItem {
  id: string;
  sourceLang: string;
  targetLang: string;
  backend: string;
  status: JobStatus;
  fileCount: number;
  createdAt: Date;
  progress: number; // 0-100
}
