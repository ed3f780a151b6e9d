/**
 * Single-turn text completion used by the rewriter and the responder.
 */

import { AppError } from '../../utils/errors.js';
import { getClient } from './client.js';

export type CompletionRequest = {
  model: string;
  system: string;
  prompt: string;
  maxTokens?: number;
  temperature?: number;
};

/**
 * Send one user message and return the first text block of the reply.
 * Throws when the model answers with no text.
 */
export async function completeText(request: CompletionRequest): Promise<string> {
  const response = await getClient().messages.create({
    model: request.model,
    max_tokens: request.maxTokens ?? 1024,
    temperature: request.temperature,
    system: request.system,
    messages: [{ role: 'user', content: request.prompt }],
  });

  const textBlock = response.content.find(b => b.type === 'text');
  if (!textBlock || textBlock.type !== 'text' || textBlock.text.trim().length === 0) {
    throw new AppError('No text response from model', 'LLM_EMPTY_RESPONSE', true, { model: request.model });
  }
  return textBlock.text.trim();
}
