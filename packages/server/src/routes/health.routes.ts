import type { HealthResponse } from '@gmat-tutor/shared';
import { Router } from 'express';

import { env } from '../config/env.js';

const router = Router();

// Liveness only. It never calls the generative service.
router.get('/health', (_req, res) => {
  const body: HealthResponse = {
    status: 'ok',
    model: env.LLM_MODEL,
    uptime: process.uptime(),
  };
  res.status(200).json(body);
});

export { router as healthRouter };
