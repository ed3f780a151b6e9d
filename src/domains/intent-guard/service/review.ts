/**
 * Validation for callers that do not have the agent's response yet.
 */
import { withErrorContext } from '../../../utils/errors.js';
import type { ResponseGenerator } from '../providers/response-generator.js';
import type { ActionRequest, ValidationResult } from '../types.js';
import type { SecurityProxy } from './proxy.js';

/**
 * Fill in `proposedResponse` from `generator` when the request is a read
 * with email content and no response, then run the proxy.
 *
 * The generator is only called for requests that would reach the content
 * screen, so a rejected intent never costs an LLM call.
 */
export async function reviewWithGeneratedResponse(
  proxy: SecurityProxy,
  generator: ResponseGenerator,
  request: ActionRequest
): Promise<ValidationResult> {
  const { userPrompt, proposedAction, actionParams, emailContent, proposedResponse } = request;

  if (
    !emailContent ||
    proposedResponse !== undefined ||
    proxy.classifyAction(proposedAction) !== 'read' ||
    !proxy.validateAction(userPrompt, proposedAction, actionParams).approved
  ) {
    return proxy.processRequest(request);
  }

  const generated = await withErrorContext(
    () => generator.generate(userPrompt, emailContent),
    'generate_read_response'
  );

  return proxy.processRequest({ ...request, proposedResponse: generated });
}
