import {
  STUDENT_ANSWER_MAX_LENGTH,
  generatedEvaluationSchema,
  type EvaluationResult,
  type QuestionData,
} from '@gmat-tutor/shared';

import { env } from '../config/env.js';
import { createLogger } from '../config/logger.js';
import { EVALUATION_BLOCK, LLM_EVALUATION_TEMPERATURE } from '../prompts/constants.js';
import { buildEvaluationSystemPrompt } from '../prompts/evaluation/system.prompt.js';
import { buildEvaluationUserMessage } from '../prompts/evaluation/user.prompt.js';
import { isAnswerCorrect } from '../utils/answer.utils.js';
import { preparePromptField } from '../utils/sanitize.utils.js';
import { generateStructured } from './llm.service.js';

const logger = createLogger('evaluation.service');

export interface EvaluateAnswerParams {
  questionData: QuestionData;
  studentAnswer: string;
}

// The echoed question is caller-controlled text on its way into a prompt.
const sanitizeQuestionData = (questionData: QuestionData): QuestionData => ({
  question: preparePromptField(questionData.question, 'question_data.question'),
  options: questionData.options.map((option, index) =>
    preparePromptField(option, `question_data.options.${index}`),
  ),
  explanation: preparePromptField(questionData.explanation, 'question_data.explanation'),
  answer: questionData.answer,
});

/**
 * Evaluates a student's answer. Correctness is decided locally before any
 * external call and is never taken from generated text; the generative
 * service only writes the feedback and the remediation topic.
 */
export const evaluateAnswer = async (params: EvaluateAnswerParams): Promise<EvaluationResult> => {
  const { questionData, studentAnswer } = params;
  const isCorrect = isAnswerCorrect(studentAnswer, questionData.answer);

  const generated = await generateStructured({
    systemPrompt: buildEvaluationSystemPrompt(),
    userMessage: buildEvaluationUserMessage({
      question: sanitizeQuestionData(questionData),
      // Correctness uses the full answer; only the prompt copy is capped.
      studentAnswer: preparePromptField(
        studentAnswer.slice(0, STUDENT_ANSWER_MAX_LENGTH),
        'student_answer',
      ),
      isCorrect,
    }),
    blockName: EVALUATION_BLOCK,
    schema: generatedEvaluationSchema,
    temperature: LLM_EVALUATION_TEMPERATURE,
    maxAttempts: env.LLM_MAX_ATTEMPTS,
  });

  logger.info(
    { isCorrect, remediationTopic: generated.remediation_topic },
    'Answer evaluated',
  );

  return {
    is_correct: isCorrect,
    feedback: generated.feedback,
    remediation_topic: generated.remediation_topic,
  };
};
