import { testLlmBodySchema, type TestLlmBody, type TestLlmResponse } from '@gmat-tutor/shared';
import { Router } from 'express';

import { validate } from '../middleware/validate.middleware.js';
import { generationRateLimiter } from '../middleware/rateLimiter.middleware.js';
import { asyncHandler } from '../utils/asyncHandler.js';
import { testLlm } from '../services/diagnostics.service.js';

const router = Router();

// POST /test_llm
router.post(
  '/test_llm',
  generationRateLimiter,
  validate(testLlmBodySchema),
  asyncHandler<TestLlmBody>(async (req, res) => {
    const body: TestLlmResponse = {
      status: 'success',
      response: await testLlm(req.body.prompt),
    };
    res.status(200).json(body);
  }),
);

export { router as diagnosticsRouter };
