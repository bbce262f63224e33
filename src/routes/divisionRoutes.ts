/**
 * Search Division Routes
 *
 * Mounted at /api/divisions
 */
import { Router } from 'express';
import { validate } from '../middleware/errorHandler.js';
import { generateLimiter } from '../middleware/rateLimiter.js';
import { generateDivisionsPreview } from '../controllers/division/index.js';
import {
  generateDivisionsBodySchema,
  generateDivisionsQuerySchema,
} from '../types/index.js';

const router = Router();

router.post(
  '/generate',
  generateLimiter,
  validate(generateDivisionsQuerySchema, 'query'),
  validate(generateDivisionsBodySchema),
  generateDivisionsPreview,
);

export default router;
