import { Router } from 'express';
import divisionRoutes from './divisionRoutes.js';

const router = Router();

// Health check (public)
router.get('/health', (_req, res) => {
  res.json({ status: 'ok', timestamp: new Date().toISOString() });
});

router.use('/api/divisions', divisionRoutes);

export default router;
