import { createLogger } from '../config/logger.js';

// Exported so tests can vi.spyOn(logger, 'warn')
export const logger = createLogger('sanitize');

/**
 * Removes characters that are invisible in a prompt but still reach the model:
 * ASCII control characters (tab, newline and carriage return are kept),
 * zero-width and bidi-control code points, and soft hyphens. Runs of three or
 * more newlines collapse to two, and the result is trimmed.
 */
export const sanitizeForPrompt = (input: string): string =>
  input
    // eslint-disable-next-line no-control-regex
    .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '')
    .replace(/[\u200B-\u200F\u2028-\u202F\u205F-\u206F\uFEFF\u00AD]/g, '')
    .replace(/\n{3,}/g, '\n\n')
    .trim();

const SUSPICIOUS_PATTERNS = [
  /ignore\s+(previous|above|all)\s+instructions/i,
  /forget\s+(previous|all)\s+instructions/i,
  /system\s+prompt/i,
  /\[INST\]/i,
  /<\|im_start\|>/i,
  /###\s*(system|instruction)/i,
  /<\/?(topic|question|options|student_answer|verdict)>/i,
];

/** Returns true and logs a warning when the input looks like a prompt injection attempt. */
export const logSuspiciousPatterns = (input: string, fieldName: string): boolean => {
  const pattern = SUSPICIOUS_PATTERNS.find((candidate) => candidate.test(input));
  if (pattern === undefined) return false;
  logger.warn({ fieldName, pattern: pattern.toString() }, 'Suspicious pattern detected in caller input');
  return true;
};

/** Sanitizes a caller-supplied field and records any injection-looking content. */
export const preparePromptField = (input: string, fieldName: string): string => {
  const sanitized = sanitizeForPrompt(input);
  logSuspiciousPatterns(sanitized, fieldName);
  return sanitized;
};
