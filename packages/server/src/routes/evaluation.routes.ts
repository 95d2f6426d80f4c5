import { evaluateAnswerBodySchema, type EvaluateAnswerBody } from '@gmat-tutor/shared';
import { Router } from 'express';

import { validate } from '../middleware/validate.middleware.js';
import { generationRateLimiter } from '../middleware/rateLimiter.middleware.js';
import { asyncHandler } from '../utils/asyncHandler.js';
import * as evaluationService from '../services/evaluation.service.js';

const router = Router();

// POST /evaluate_answer
router.post(
  '/evaluate_answer',
  generationRateLimiter,
  validate(evaluateAnswerBodySchema),
  asyncHandler<EvaluateAnswerBody>(async (req, res) => {
    const result = await evaluationService.evaluateAnswer({
      questionData: req.body.question_data,
      studentAnswer: req.body.student_answer,
    });
    res.status(200).json(result);
  }),
);

export { router as evaluationRouter };
