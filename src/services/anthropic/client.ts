/**
 * Shared Anthropic client for the LLM-backed collaborators (scenario
 * rewriter, read-response generator). The validation core never uses it.
 */

import Anthropic from '@anthropic-ai/sdk';
import config from '../../config.js';
import { AppError } from '../../utils/errors.js';

let client: Anthropic | null = null;

/**
 * Lazily create the client so the server and the simulated rewriter run
 * without an API key.
 */
export function getClient(): Anthropic {
  if (client) return client;

  if (!config.anthropicApiKey) {
    throw new AppError('ANTHROPIC_API_KEY not configured', 'LLM_NOT_CONFIGURED');
  }
  client = new Anthropic({ apiKey: config.anthropicApiKey, maxRetries: 2 });
  return client;
}
