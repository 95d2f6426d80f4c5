import type { QuestionData } from '@gmat-tutor/shared';

import { NO_ANSWER_SENTINEL } from '../constants.js';

export interface EvaluationUserPromptParams {
  question: QuestionData;
  studentAnswer: string;
  isCorrect: boolean;
}

const escapeTags = (text: string): string => text.replace(/</g, '&lt;').replace(/>/g, '&gt;');

/**
 * Builds the user-role message for an evaluation call. Every field here comes
 * from the caller, the echoed question included, so all free text has its
 * angle brackets escaped and cannot close or open a tag. A blank answer is
 * replaced by a sentinel so the model does not invent one.
 */
export const buildEvaluationUserMessage = (params: EvaluationUserPromptParams): string => {
  const { question, studentAnswer, isCorrect } = params;

  const answer = studentAnswer.trim() ? escapeTags(studentAnswer) : NO_ANSWER_SENTINEL;

  return `<question>${escapeTags(question.question)}</question>
<options>
${question.options.map(escapeTags).join('\n')}
</options>
<correct_answer>${question.answer}</correct_answer>
<explanation>${escapeTags(question.explanation)}</explanation>
<student_answer>${answer}</student_answer>
<verdict>${isCorrect ? 'correct' : 'incorrect'}</verdict>

Write feedback for this student. The verdict above is final.`.trim();
};
