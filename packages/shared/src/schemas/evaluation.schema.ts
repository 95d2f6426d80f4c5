import { z } from 'zod';
import { OPTION_LABELS, OPTIONS_COUNT } from '../constants/question.constants.js';

// A previously issued question, as echoed back by the caller. Options are only
// checked for cardinality; the answer label is trusted once it is a valid label.
export const questionDataSchema = z.object({
  question: z.string().trim().min(1, 'question_data.question is required'),
  options: z
    .array(z.string())
    .length(OPTIONS_COUNT, `question_data.options must contain exactly ${OPTIONS_COUNT} entries`),
  explanation: z.string().trim().min(1, 'question_data.explanation is required'),
  answer: z.string().trim().toUpperCase().pipe(z.enum(OPTION_LABELS)),
});

export const evaluateAnswerBodySchema = z.object({
  question_data: questionDataSchema,
  // Any non-empty string is accepted; one that is not a label is simply wrong.
  student_answer: z.string().min(1, 'student_answer is required'),
});

// What the generative service must produce. Any verdict it adds is dropped:
// correctness is decided locally.
export const generatedEvaluationSchema = z.object({
  feedback: z.string().trim().min(1, 'feedback must not be empty'),
  remediation_topic: z.string().trim().min(1, 'remediation_topic must not be empty'),
});

export const evaluationResultSchema = z.object({
  is_correct: z.boolean(),
  feedback: z.string().min(1),
  remediation_topic: z.string().min(1),
});
