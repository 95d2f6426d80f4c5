// Answer choices are always labelled A-E, in this order.
export const OPTION_LABELS = ['A', 'B', 'C', 'D', 'E'] as const;
export const OPTIONS_COUNT = OPTION_LABELS.length;

export const TOPIC_MAX_LENGTH = 120;
export const STUDENT_ANSWER_MAX_LENGTH = 500;
export const DIAGNOSTIC_PROMPT_MAX_LENGTH = 2000;

export const DEFAULT_DIAGNOSTIC_PROMPT = "Say 'Hello, AI is working!'";
