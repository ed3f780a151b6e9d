/**
 * Anthropic service - client and single-turn completion.
 */

export { getClient } from './client.js';
export { completeText } from './completion.js';
export type { CompletionRequest } from './completion.js';
