import { createLogger } from '../config/logger.js';
import { preparePromptField } from '../utils/sanitize.utils.js';
import { completeText } from './llm.service.js';

const logger = createLogger('diagnostics.service');

/** Sends a free-text prompt straight through, to check the upstream service is reachable. */
export const testLlm = async (prompt: string): Promise<string> => {
  const response = await completeText(preparePromptField(prompt, 'prompt'));
  logger.info({ responseLength: response.length }, 'Diagnostic completion succeeded');
  return response;
};
