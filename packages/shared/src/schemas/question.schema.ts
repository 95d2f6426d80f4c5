import { z } from 'zod';
import { OPTION_LABELS, OPTIONS_COUNT, TOPIC_MAX_LENGTH } from '../constants/question.constants.js';
import { DifficultyLevel } from '../enums/index.js';

type OptionLabel = (typeof OPTION_LABELS)[number];

// "A) 12", "A. 12", "A: 12" and "(A) 12" all carry label A.
const LABEL_PREFIX = /^\(?([A-E])[).:]/;

// Generated options sometimes carry lower-case labels ("a) 12").
const ANY_CASE_LABEL_PREFIX = /^\(?[A-Ea-e][).:]/;

const optionLabelSchema = z.enum(OPTION_LABELS);

/** Returns the label an option string starts with, or null when it carries none. */
export const getOptionLabel = (option: string): OptionLabel | null => {
  const match = LABEL_PREFIX.exec(option.trim());
  if (match === null) return null;
  return OPTION_LABELS.find((label) => label === match[1]) ?? null;
};

const stripOptionLabel = (option: string): string =>
  option.trim().replace(LABEL_PREFIX, '').trim();

const labelledOptionsSchema = z
  .array(z.string().trim().min(1, 'Option must not be empty'))
  .length(OPTIONS_COUNT, `Expected exactly ${OPTIONS_COUNT} options`)
  .superRefine((options, ctx) => {
    if (options.length !== OPTIONS_COUNT) return;
    options.forEach((option, index) => {
      const expected = OPTION_LABELS[index];
      if (getOptionLabel(option) !== expected) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index],
          message: `Option ${index + 1} must start with the label "${expected})"`,
        });
      }
    });
  });

// The strict contract every returned Question satisfies. Parsing an already
// valid Question yields an identical object.
export const questionSchema = z.object({
  question: z.string().trim().min(1, 'Question text must not be empty'),
  options: labelledOptionsSchema,
  explanation: z.string().trim().min(1, 'Explanation must not be empty'),
  answer: optionLabelSchema,
});

// --- Repair of generated output ---

// An option that already carries a label keeps it, upper-cased; a wrong label
// is left for strict validation to reject.
const labelOption = (option: string, index: number): string => {
  const trimmed = option.trim();
  const label = OPTION_LABELS[index];
  if (label === undefined || trimmed.length === 0) return trimmed;
  if (ANY_CASE_LABEL_PREFIX.test(trimmed)) {
    return trimmed.replace(ANY_CASE_LABEL_PREFIX, (prefix) => prefix.toUpperCase());
  }
  return `${label}) ${trimmed}`;
};

/**
 * Reduces a generated answer to a bare label where it is unambiguous:
 * "c" → "C", "C) 42" → "C", and "42" → "C" when option C reads "C) 42".
 * Anything else is returned upper-cased so strict validation reports it.
 */
export const normalizeAnswerLabel = (answer: string, options: string[]): string => {
  const trimmed = answer.trim();
  const upper = trimmed.toUpperCase();

  const bare = OPTION_LABELS.find((label) => label === upper);
  if (bare !== undefined) return bare;

  const prefixed = getOptionLabel(upper);
  if (prefixed !== null) return prefixed;

  const matchIndex = options.findIndex(
    (option) => option.trim() === trimmed || stripOptionLabel(option) === trimmed,
  );
  return OPTION_LABELS[matchIndex] ?? upper;
};

export const generatedQuestionSchema = z
  .object({
    question: z.string(),
    options: z.array(z.string()),
    explanation: z.string(),
    answer: z.string(),
  })
  .transform((raw) => {
    const options = raw.options.map(labelOption);
    return {
      question: raw.question,
      options,
      explanation: raw.explanation,
      answer: normalizeAnswerLabel(raw.answer, options),
    };
  })
  .pipe(questionSchema);

// --- Request schemas ---

export const generateQuestionBodySchema = z.object({
  topic: z
    .string()
    .trim()
    .max(TOPIC_MAX_LENGTH, `Topic must be at most ${TOPIC_MAX_LENGTH} characters`)
    .nullish(),
  difficulty: z
    .nativeEnum(DifficultyLevel, {
      errorMap: () => ({ message: 'Difficulty must be one of: Easy, Medium, Hard' }),
    })
    .nullish(),
});
