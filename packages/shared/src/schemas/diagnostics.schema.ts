import { z } from 'zod';
import {
  DEFAULT_DIAGNOSTIC_PROMPT,
  DIAGNOSTIC_PROMPT_MAX_LENGTH,
} from '../constants/question.constants.js';

export const testLlmBodySchema = z.object({
  prompt: z
    .string()
    .trim()
    .min(1, 'prompt must not be empty')
    .max(DIAGNOSTIC_PROMPT_MAX_LENGTH)
    .default(DEFAULT_DIAGNOSTIC_PROMPT),
});

export const testLlmResponseSchema = z.object({
  status: z.literal('success'),
  response: z.string(),
});
