import { Router, Request, Response } from 'express';
import { jobStore } from '../jobs';
import { translationPipeline } from '../pipelines';
import { config } from '../config';
import { asyncHandler } from './asyncHandler';
import { checkJobId } from './jobParam';
import { parseEditedEntries, parseJobConfig } from './validation';

const router = Router();

router.param('id', checkJobId);

/**
 * GET /api/jobs
 * List all jobs
 */
router.get(
  '/',
  asyncHandler(async (_req: Request, res: Response) => {
    const jobs = await jobStore.list();
    res.json({ jobs });
  })
);

/**
 * POST /api/jobs
 * Create a new job
 */
router.post(
  '/',
  asyncHandler(async (req: Request, res: Response) => {
    const parsed = parseJobConfig(req.body, {
      backend: config.defaultBackend,
      useContext: config.useContextPreservation,
    });

    if (!parsed.ok) {
      res.status(400).json({ error: parsed.error });
      return;
    }

    const job = await jobStore.create({ config: parsed.value });
    res.status(201).json({ job });
  })
);

/**
 * GET /api/jobs/:id
 * Get job details
 */
router.get(
  '/:id',
  asyncHandler(async (req: Request, res: Response) => {
    const job = await jobStore.get(req.params.id ?? '');

    if (!job) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }

    res.json({ job });
  })
);

/**
 * POST /api/jobs/:id/start
 * Start translating a job's files
 */
router.post(
  '/:id/start',
  asyncHandler(async (req: Request, res: Response) => {
    const jobId = req.params.id ?? '';
    // Marks the job processing, then runs the pipeline in background
    const outcome = await translationPipeline.start(jobId);

    if (outcome === 'not_found') {
      res.status(404).json({ error: 'Job not found' });
      return;
    }

    if (outcome === 'already_started') {
      res.status(400).json({ error: 'Job has already been started' });
      return;
    }

    if (outcome === 'no_files') {
      res.status(400).json({ error: 'No files uploaded' });
      return;
    }

    res.json({ message: 'Job started', jobId });
  })
);

/**
 * DELETE /api/jobs/:id
 * Delete a job
 */
router.delete(
  '/:id',
  asyncHandler(async (req: Request, res: Response) => {
    const jobId = req.params.id ?? '';
    const job = await jobStore.get(jobId);

    if (job?.status === 'processing') {
      res.status(400).json({ error: 'Cannot delete a job while it is processing' });
      return;
    }

    const deleted = await jobStore.delete(jobId);
    if (!deleted) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }

    res.json({ message: 'Job deleted' });
  })
);

/**
 * GET /api/jobs/:id/entries
 * Translated entries of every output file, for the editor
 */
router.get(
  '/:id/entries',
  asyncHandler(async (req: Request, res: Response) => {
    const jobId = req.params.id ?? '';
    const job = await jobStore.get(jobId);

    if (!job) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }

    if (job.status !== 'completed') {
      res.status(400).json({ error: 'Job not completed' });
      return;
    }

    const files = await translationPipeline.readResultEntries(jobId);
    res.json({ files });
  })
);

/**
 * PUT /api/jobs/:id/entries
 * Save edited entries back to an output file
 */
router.put(
  '/:id/entries',
  asyncHandler(async (req: Request, res: Response) => {
    const jobId = req.params.id ?? '';
    const job = await jobStore.get(jobId);

    if (!job) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }

    if (job.status !== 'completed') {
      res.status(400).json({ error: 'Job not completed' });
      return;
    }

    const parsed = parseEditedEntries(req.body);
    if (!parsed.ok) {
      res.status(400).json({ error: parsed.error });
      return;
    }

    const { fileName, entries } = parsed.value;
    const saved = await translationPipeline.saveResultEntries(jobId, fileName, entries);
    if (!saved) {
      res.status(404).json({ error: `${fileName} not found in job results` });
      return;
    }

    res.json({ message: 'Entries saved', fileName, entryCount: entries.length });
  })
);

/**
 * GET /api/jobs/:id/download/:fileName
 * Download one translated file
 */
router.get(
  '/:id/download/:fileName',
  asyncHandler(async (req: Request, res: Response) => {
    const fileName = req.params.fileName ?? '';
    const filePath = await translationPipeline.getResultPath(req.params.id ?? '', fileName);

    if (!filePath) {
      res.status(404).json({ error: 'File not found' });
      return;
    }

    res.download(filePath, fileName);
  })
);

export default router;
