// Embedded in every system prompt and checked against every response.
// A response that repeats it is treated as a prompt exfiltration attempt.
export const SYSTEM_MARKER = '[SYSTEM_MARKER_DO_NOT_REPEAT]';

// A single question with a worked explanation stays well under this.
export const LLM_MAX_TOKENS = 2048;

// Generation needs variety across calls with the same topic and difficulty.
export const LLM_GENERATION_TEMPERATURE = 0.7;

// Feedback should read the same way for the same mistake.
export const LLM_EVALUATION_TEMPERATURE = 0.3;

// Output block names. The system prompts and the parser must agree on these.
export const QUESTION_BLOCK = 'question';
export const EVALUATION_BLOCK = 'evaluation';

export const NO_ANSWER_SENTINEL = '[No answer provided]';
