import type { z } from 'zod';

import type {
  questionSchema,
  generateQuestionBodySchema,
} from '../schemas/question.schema.js';

export type Question = z.infer<typeof questionSchema>;
export type GenerateQuestionBody = z.infer<typeof generateQuestionBodySchema>;

import type {
  questionDataSchema,
  evaluateAnswerBodySchema,
  evaluationResultSchema,
} from '../schemas/evaluation.schema.js';

export type QuestionData = z.infer<typeof questionDataSchema>;
export type EvaluateAnswerBody = z.infer<typeof evaluateAnswerBodySchema>;
export type EvaluationResult = z.infer<typeof evaluationResultSchema>;

import type { testLlmBodySchema, testLlmResponseSchema } from '../schemas/diagnostics.schema.js';

export type TestLlmBody = z.infer<typeof testLlmBodySchema>;
export type TestLlmResponse = z.infer<typeof testLlmResponseSchema>;
