import {
  AnthropicError,
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
} from '@anthropic-ai/sdk';
import type { MessageParam } from '@anthropic-ai/sdk/resources/messages.js';
import type { ZodError, ZodType, ZodTypeDef } from 'zod';

import anthropic from '../config/anthropic.js';
import { env } from '../config/env.js';
import { createLogger } from '../config/logger.js';
import { LLM_MAX_TOKENS, SYSTEM_MARKER } from '../prompts/constants.js';
import { buildCorrectiveMessage } from '../prompts/corrective.prompt.js';
import { UpstreamError, UpstreamTimeoutError, ValidationError } from '../utils/errors.js';

const logger = createLogger('llm.service');

// --- Public parameter types ---

export interface StructuredGenerationParams<T> {
  systemPrompt: string;
  userMessage: string;
  /** Name of the XML block the JSON object is expected in. */
  blockName: string;
  schema: ZodType<T, ZodTypeDef, unknown>;
  temperature: number;
  maxAttempts: number;
}

type ParseOutcome<T> = { success: true; data: T } | { success: false; error: string };

interface LlmCall {
  system?: string;
  messages: MessageParam[];
  temperature?: number;
}

// --- Pure helpers ---

/**
 * Extracts text between <blockName>...</blockName> tags.
 * Returns null if the opening or closing tag is not found.
 */
export const extractBlock = (response: string, blockName: string): string | null => {
  const openTag = `<${blockName}>`;
  const closeTag = `</${blockName}>`;
  const startIdx = response.indexOf(openTag);
  if (startIdx === -1) return null;
  const contentStart = startIdx + openTag.length;
  const endIdx = response.indexOf(closeTag, contentStart);
  if (endIdx === -1) return null;
  return response.slice(contentStart, endIdx).trim();
};

const CODE_FENCE = /^```(?:json)?\s*([\s\S]*?)\s*```$/;

/** Models sometimes wrap the JSON inside the block in a markdown fence. */
export const stripCodeFence = (block: string): string => {
  const match = CODE_FENCE.exec(block);
  return match ? match[1] : block;
};

export const formatZodIssues = (error: ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');

/**
 * Extracts, parses and validates one JSON block. On failure the outcome carries
 * a description of what was wrong, which is fed back to the model on retry.
 */
export const parseBlock = <T>(
  response: string,
  blockName: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
): ParseOutcome<T> => {
  const block = extractBlock(response, blockName);
  if (block === null) {
    return { success: false, error: `the response did not contain a <${blockName}> block` };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFence(block));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { success: false, error: `the <${blockName}> block is not valid JSON (${reason})` };
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    return { success: false, error: `schema validation failed: ${formatZodIssues(result.error)}` };
  }
  return { success: true, data: result.data };
};

// --- Private LLM helpers ---

// Only SDK errors are transport failures. Anything else is a bug and is
// rethrown untouched. APIUserAbortError extends APIError, so it is checked first.
const toUpstreamError = (err: unknown, deadlineExceeded: boolean): unknown => {
  if (
    deadlineExceeded ||
    err instanceof APIConnectionTimeoutError ||
    err instanceof APIUserAbortError
  ) {
    return new UpstreamTimeoutError('The generation service did not respond in time', {
      timeoutMs: env.LLM_TIMEOUT_MS,
    });
  }
  if (err instanceof APIError) {
    return new UpstreamError(`The generation service request failed: ${err.message}`, {
      status: err.status,
    });
  }
  if (err instanceof AnthropicError) {
    return new UpstreamError(`The generation service request failed: ${err.message}`);
  }
  return err;
};

// The client-level timeout stops once response headers arrive; the signal
// bounds the whole call, streamed body included.
async function callLlmStream({ system, messages, temperature }: LlmCall): Promise<string> {
  const deadline = AbortSignal.timeout(env.LLM_TIMEOUT_MS);
  try {
    const stream = anthropic.messages.stream(
      {
        model: env.LLM_MODEL,
        max_tokens: LLM_MAX_TOKENS,
        temperature,
        system,
        messages,
      },
      { signal: deadline },
    );
    return await stream.finalText();
  } catch (err) {
    throw toUpstreamError(err, deadline.aborted);
  }
}

const checkExfiltration = (response: string, blockName: string): void => {
  if (response.includes(SYSTEM_MARKER)) {
    logger.error({ blockName }, 'LLM response echoed the system marker');
    throw new ValidationError(
      'Generated output was rejected: it repeated the system instructions',
    );
  }
};

// The failed response goes back as the assistant turn so the corrective
// message can refer to it. The API rejects empty assistant turns, so a blank
// response is folded into the user turn instead.
const buildRetryMessages = (
  userMessage: string,
  failedResponse: string,
  correction: string,
): MessageParam[] => {
  if (failedResponse.trim().length === 0) {
    return [{ role: 'user', content: `${userMessage}\n\n${correction}` }];
  }
  return [
    { role: 'user', content: userMessage },
    { role: 'assistant', content: failedResponse },
    { role: 'user', content: correction },
  ];
};

// --- Public service functions ---

/**
 * Obtains a schema-conformant object from the generative service.
 *
 * Content failures (missing block, invalid JSON, schema violations) are retried
 * sequentially, each retry carrying the previous error as corrective context,
 * until maxAttempts calls have been made; then ValidationError is thrown with
 * the last error. Transport failures are never retried and surface immediately
 * as UpstreamError.
 */
export async function generateStructured<T>(params: StructuredGenerationParams<T>): Promise<T> {
  const { systemPrompt, userMessage, blockName, schema, temperature, maxAttempts } = params;

  let messages: MessageParam[] = [{ role: 'user', content: userMessage }];
  let lastError = 'no attempt was made';

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const response = await callLlmStream({ system: systemPrompt, messages, temperature });
    checkExfiltration(response, blockName);

    const outcome = parseBlock(response, blockName, schema);
    if (outcome.success) {
      if (attempt > 1) logger.info({ blockName, attempt }, 'LLM output accepted after retry');
      return outcome.data;
    }

    lastError = outcome.error;
    logger.warn(
      { blockName, attempt, maxAttempts, error: lastError, responseSnippet: response.slice(0, 300) },
      'LLM output rejected',
    );
    messages = buildRetryMessages(userMessage, response, buildCorrectiveMessage(blockName, lastError));
  }

  logger.error({ blockName, maxAttempts, lastError }, 'LLM output never matched the schema');
  throw new ValidationError(
    `Generated output did not match the required format after ${maxAttempts} attempt(s): ${lastError}`,
    { attempts: maxAttempts, lastError },
  );
}

/** Free-text pass-through with no schema. Used only for connectivity diagnostics. */
export const completeText = async (prompt: string): Promise<string> =>
  callLlmStream({ messages: [{ role: 'user', content: prompt }] });
