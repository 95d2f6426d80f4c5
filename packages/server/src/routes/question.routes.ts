import { generateQuestionBodySchema, type GenerateQuestionBody } from '@gmat-tutor/shared';
import { Router } from 'express';

import { validate } from '../middleware/validate.middleware.js';
import { generationRateLimiter } from '../middleware/rateLimiter.middleware.js';
import { asyncHandler } from '../utils/asyncHandler.js';
import * as questionService from '../services/question.service.js';

const router = Router();

// POST /generate_question
// Body fields are optional; an empty or missing body generates with the
// configured default topic and difficulty.
router.post(
  '/generate_question',
  generationRateLimiter,
  validate(generateQuestionBodySchema),
  asyncHandler<GenerateQuestionBody>(async (req, res) => {
    const question = await questionService.generateQuestion({
      topic: req.body.topic,
      difficulty: req.body.difficulty,
    });
    res.status(200).json(question);
  }),
);

export { router as questionRouter };
