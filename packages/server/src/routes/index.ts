import { Router } from 'express';
import { healthRouter } from './health.routes.js';
import { questionRouter } from './question.routes.js';
import { evaluationRouter } from './evaluation.routes.js';
import { diagnosticsRouter } from './diagnostics.routes.js';

const router = Router();

router.use(healthRouter);
router.use(questionRouter);
router.use(evaluationRouter);
router.use(diagnosticsRouter);

export { router as apiRouter };
