import {
  generatedQuestionSchema,
  type DifficultyLevel,
  type Question,
} from '@gmat-tutor/shared';

import { env } from '../config/env.js';
import { createLogger } from '../config/logger.js';
import { LLM_GENERATION_TEMPERATURE, QUESTION_BLOCK } from '../prompts/constants.js';
import { buildGenerationSystemPrompt } from '../prompts/generation/system.prompt.js';
import { buildGenerationUserMessage } from '../prompts/generation/user.prompt.js';
import { preparePromptField } from '../utils/sanitize.utils.js';
import { generateStructured } from './llm.service.js';

const logger = createLogger('question.service');

export interface GenerateQuestionParams {
  topic?: string | null;
  difficulty?: DifficultyLevel | null;
}

/**
 * Generates one GMAT Problem Solving question. A missing or blank topic and a
 * missing difficulty fall back to the configured defaults. The returned
 * question has exactly five options labelled A to E and a bare answer label.
 */
export const generateQuestion = async (params: GenerateQuestionParams = {}): Promise<Question> => {
  const topic = preparePromptField(params.topic ?? '', 'topic') || env.DEFAULT_TOPIC;
  const difficulty = params.difficulty ?? env.DEFAULT_DIFFICULTY;

  const question = await generateStructured({
    systemPrompt: buildGenerationSystemPrompt(),
    userMessage: buildGenerationUserMessage({ topic, difficulty }),
    blockName: QUESTION_BLOCK,
    schema: generatedQuestionSchema,
    temperature: LLM_GENERATION_TEMPERATURE,
    maxAttempts: env.LLM_MAX_ATTEMPTS,
  });

  logger.info({ topic, difficulty, answer: question.answer }, 'Question generated');
  return question;
};
