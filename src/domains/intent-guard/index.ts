/**
 * Intent guard - validates agent actions against the user's request.
 */

export { SecurityProxy } from './service/proxy.js';
export { IntentExtractor, buildVerbPattern } from './service/extractor.js';
export { ActionValidator, classifyAction } from './service/action-validator.js';
export { validateResponseContent } from './service/content-checker.js';
export { reviewWithGeneratedResponse } from './service/review.js';
export { AnthropicResponseGenerator } from './providers/response-generator.js';
export type { ResponseGenerator } from './providers/response-generator.js';
export { getSecurityProxy } from './runtime/index.js';
export { PARAM_KEYS } from './types.js';
export type * from './types.js';
