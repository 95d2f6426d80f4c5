// Enums
export { DifficultyLevel, ErrorCode } from './enums/index.js';

// Constants
export {
  OPTION_LABELS,
  OPTIONS_COUNT,
  TOPIC_MAX_LENGTH,
  STUDENT_ANSWER_MAX_LENGTH,
  DIAGNOSTIC_PROMPT_MAX_LENGTH,
  DEFAULT_DIAGNOSTIC_PROMPT,
} from './constants/question.constants.js';

// Schemas
export { apiErrorSchema, healthResponseSchema } from './schemas/common.schema.js';

export {
  questionSchema,
  generatedQuestionSchema,
  generateQuestionBodySchema,
} from './schemas/question.schema.js';

export {
  questionDataSchema,
  evaluateAnswerBodySchema,
  generatedEvaluationSchema,
  evaluationResultSchema,
} from './schemas/evaluation.schema.js';

export { testLlmBodySchema, testLlmResponseSchema } from './schemas/diagnostics.schema.js';

// Types
export type { ApiErrorResponse, HealthResponse } from './types/api.types.js';

export type {
  Question,
  GenerateQuestionBody,
  QuestionData,
  EvaluateAnswerBody,
  EvaluationResult,
  TestLlmBody,
  TestLlmResponse,
} from './types/index.js';
