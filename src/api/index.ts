import { Router } from 'express';
import jobsRouter from './jobs';
import uploadRouter from './upload';
import servicesRouter from './services';

const router = Router();

router.use('/jobs', jobsRouter);
router.use('/upload', uploadRouter);
router.use('/', servicesRouter);

export default router;
