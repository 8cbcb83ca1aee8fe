import { Router, Request, Response } from 'express';
import { translationEngine } from '../translation';
import { SUPPORTED_FORMATS } from '../subtitles';
import { asyncHandler } from './asyncHandler';
import languages from '../data/languages.json';

const router = Router();

/**
 * GET /api/health
 * Health check with backend availability
 */
router.get(
  '/health',
  asyncHandler(async (_req: Request, res: Response) => {
    const backends = await translationEngine.describeBackends();
    const available = Object.values(backends).some((backend) => backend.available);

    res.json({
      status: available ? 'healthy' : 'degraded',
      defaultBackend: translationEngine.defaultBackend,
      backends,
      formats: SUPPORTED_FORMATS,
    });
  })
);

/**
 * GET /api/services
 * Translation backends and their capabilities
 */
router.get(
  '/services',
  asyncHandler(async (_req: Request, res: Response) => {
    const services = await translationEngine.describeBackends();
    res.json({ services, defaultBackend: translationEngine.defaultBackend });
  })
);

/**
 * GET /api/languages
 * Language code to display name
 */
router.get('/languages', (_req: Request, res: Response) => {
  res.json({ languages });
});

export default router;
