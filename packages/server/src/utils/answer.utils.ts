const normalizeLabel = (value: string): string => value.trim().toUpperCase();

/**
 * Deterministic correctness check: trimmed, case-insensitive equality of the
 * student's answer with the stored label. Total over all strings; an answer
 * that is not a label at all is simply incorrect.
 */
export const isAnswerCorrect = (studentAnswer: string, correctAnswer: string): boolean =>
  normalizeLabel(studentAnswer) === normalizeLabel(correctAnswer);
