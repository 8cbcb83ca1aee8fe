import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import fs from 'fs';
import multer from 'multer';
import apiRouter from './api';
import { config } from './config';
import { SubtitleError } from './subtitles';

// Ensure data directories exist
const dirs = [config.dataDir, config.uploadsDir, config.outputsDir, config.jobsDir];
for (const dir of dirs) {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

/**
 * HTTP status carried by body-parser errors (malformed JSON, oversized body)
 */
function clientErrorStatus(err: Error): number | null {
  const status = 'status' in err ? err.status : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

const app = express();

// Middleware
app.use(cors());
app.use(express.json({ limit: '5mb' }));

// API routes
app.use('/api', apiRouter);

// Error handling middleware
app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
  console.error('Error:', err.message);

  if (err instanceof multer.MulterError) {
    res.status(err.code === 'LIMIT_FILE_SIZE' ? 413 : 400).json({ error: err.message });
    return;
  }

  if (err instanceof SubtitleError) {
    res.status(400).json({ error: err.message });
    return;
  }

  const status = clientErrorStatus(err);
  if (status !== null) {
    res.status(status).json({ error: err.message });
    return;
  }

  res.status(500).json({
    error: config.nodeEnv === 'development' ? err.message : 'Internal server error',
  });
});

// 404 handler
app.use((_req: Request, res: Response) => {
  res.status(404).json({ error: 'Not found' });
});

// Start server
const port = config.port;

app.listen(port, () => {
  console.info(`\n🌐 Subtitle Translator`);
  console.info(`   Server running on http://localhost:${port}`);
  console.info(`   Environment: ${config.nodeEnv}`);
  console.info(`   Default backend: ${config.defaultBackend}`);
  console.info(`\n   API Endpoints:`);
  console.info(`   - GET  /api/health                    - Check backend status`);
  console.info(`   - GET  /api/services                  - List translation backends`);
  console.info(`   - GET  /api/languages                 - List languages`);
  console.info(`   - GET  /api/jobs                      - List all jobs`);
  console.info(`   - POST /api/jobs                      - Create new job`);
  console.info(`   - POST /api/upload/:id                - Upload subtitle files`);
  console.info(`   - POST /api/jobs/:id/start            - Start translating`);
  console.info(`   - GET  /api/jobs/:id/entries          - Translated entries for editing`);
  console.info(`   - GET  /api/jobs/:id/download/:file   - Download a translated file`);
  console.info(`\n`);
});

export default app;
