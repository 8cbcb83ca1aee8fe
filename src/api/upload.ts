import { Router, Request, Response, NextFunction } from 'express';
import multer from 'multer';
import fs from 'fs';
import path from 'path';
import { jobStore, UploadedFile } from '../jobs';
import { formatFromFileName, UnsupportedFormatError } from '../subtitles';
import { config } from '../config';
import { asyncHandler } from './asyncHandler';
import { checkJobId } from './jobParam';

const router = Router();

router.param('jobId', checkJobId);

/**
 * Configure multer storage
 */
const storage = multer.diskStorage({
  destination: (req, _file, cb) => {
    const uploadDir = jobStore.getUploadDir(req.params.jobId ?? '');
    fs.mkdirSync(uploadDir, { recursive: true });
    cb(null, uploadDir);
  },
  filename: (_req, file, cb) => {
    // Timestamp prefix avoids collisions between uploads
    const safeName = file.originalname.replace(/[^a-zA-Z0-9.-]/g, '_');
    cb(null, `${Date.now()}_${safeName}`);
  },
});

const upload = multer({
  storage,
  limits: {
    fileSize: config.maxFileSizeMb * 1024 * 1024,
    files: config.maxFilesPerBatch,
  },
  fileFilter: (_req, file, cb) => {
    if (formatFromFileName(file.originalname)) {
      cb(null, true);
    } else {
      cb(new UnsupportedFormatError(path.extname(file.originalname) || file.originalname));
    }
  },
});

/**
 * Only pending jobs accept files; checked before anything is written to disk
 */
const requirePendingJob = asyncHandler(async (req: Request, res: Response, next: NextFunction) => {
  const job = await jobStore.get(req.params.jobId ?? '');

  if (!job) {
    res.status(404).json({ error: 'Job not found' });
    return;
  }

  if (job.status !== 'pending') {
    res.status(400).json({ error: 'Cannot upload files after job has started' });
    return;
  }

  next();
});

function removeFiles(files: Express.Multer.File[]): void {
  for (const file of files) {
    fs.rmSync(file.path, { force: true });
  }
}

/**
 * POST /api/upload/:jobId
 * Upload subtitle files for a job (multipart field "files")
 */
router.post(
  '/:jobId',
  requirePendingJob,
  upload.array('files', config.maxFilesPerBatch),
  asyncHandler(async (req: Request, res: Response) => {
    const jobId = req.params.jobId ?? '';
    const files = Array.isArray(req.files) ? req.files : [];

    if (files.length === 0) {
      res.status(400).json({ error: 'No files uploaded' });
      return;
    }

    const job = await jobStore.get(jobId);
    if (!job) {
      removeFiles(files);
      res.status(404).json({ error: 'Job not found' });
      return;
    }

    if (job.files.length + files.length > config.maxFilesPerBatch) {
      removeFiles(files);
      res.status(400).json({
        error: `A job can hold at most ${config.maxFilesPerBatch} files`,
      });
      return;
    }

    const uploadedFiles: UploadedFile[] = [];
    for (const file of files) {
      const format = formatFromFileName(file.originalname);
      if (format) {
        uploadedFiles.push({
          originalName: file.originalname,
          storedName: file.filename,
          path: file.path,
          size: file.size,
          format,
        });
      }
    }

    await jobStore.addFiles(jobId, uploadedFiles);
    await jobStore.addLog(jobId, 'info', `Uploaded ${uploadedFiles.length} file(s)`);

    res.json({
      message: `${uploadedFiles.length} subtitle file(s) uploaded`,
      files: uploadedFiles.map((f) => ({
        name: f.originalName,
        format: f.format,
        size: f.size,
      })),
    });
  })
);

export default router;
