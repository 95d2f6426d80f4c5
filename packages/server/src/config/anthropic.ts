import Anthropic from '@anthropic-ai/sdk';
import { env } from './env.js';

// One client for the process lifetime. Transport failures are never retried
// here (maxRetries: 0). `timeout` only covers the wait for response headers;
// llm.service bounds each whole call with an abort signal.
// Under test the key is absent and this module is mocked in setup.ts.
const anthropic = new Anthropic({
  apiKey: env.ANTHROPIC_API_KEY ?? '',
  baseURL: env.LLM_BASE_URL,
  timeout: env.LLM_TIMEOUT_MS,
  maxRetries: 0,
});

export default anthropic;
