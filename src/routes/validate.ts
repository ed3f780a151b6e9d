/**
 * @fileoverview Validation API routes.
 *
 * Routes:
 * - POST /api/intent            - Classify a user prompt
 * - POST /api/validate          - Validate a proposed action (full request)
 * - POST /api/validate/content  - Screen a response against its email
 * - POST /api/validate/review   - Validate a read, generating the response first
 *
 * A rejected action is a normal outcome and returns 200; only malformed
 * bodies get 400.
 */

import { Router, type Request, type Response } from 'express';
import {
  AnthropicResponseGenerator,
  getSecurityProxy,
  reviewWithGeneratedResponse,
  type ResponseGenerator,
} from '../domains/intent-guard/index.js';
import {
  parseActionRequest,
  parseContentRequest,
  parsePromptRequest,
  type FieldError,
} from '../domains/intent-guard/service/request-parser.js';
import { createLogger, createRequestId, withLogContext } from '../utils/observability/index.js';

const logger = createLogger({ domain: 'http-validate' });

function sendInvalid(res: Response, errors: FieldError[]): void {
  logger.warn('invalid_request', { status: 400, error: errors.map(e => e.field).join(',') });
  res.status(400).json({ error: 'Invalid request', details: errors });
}

/**
 * Build the router. The response generator is injectable so the review
 * route can run without a model.
 */
export function createValidateRouter(
  generator: ResponseGenerator = new AnthropicResponseGenerator()
): Router {
  const router = Router();

  router.post('/api/intent', (req: Request, res: Response) => {
    const parsed = parsePromptRequest(req.body);
    if (!parsed.ok) {
      sendInvalid(res, parsed.errors);
      return;
    }
    res.json(getSecurityProxy().extractIntent(parsed.value.userPrompt));
  });

  router.post('/api/validate', (req: Request, res: Response) => {
    const parsed = parseActionRequest(req.body);
    if (!parsed.ok) {
      sendInvalid(res, parsed.errors);
      return;
    }
    const result = withLogContext({ requestId: createRequestId() }, () =>
      getSecurityProxy().processRequest(parsed.value)
    );
    res.json(result);
  });

  router.post('/api/validate/content', (req: Request, res: Response) => {
    const parsed = parseContentRequest(req.body);
    if (!parsed.ok) {
      sendInvalid(res, parsed.errors);
      return;
    }
    const { emailContent, proposedResponse } = parsed.value;
    res.json(getSecurityProxy().validateResponseContent(emailContent, proposedResponse));
  });

  router.post('/api/validate/review', async (req: Request, res: Response) => {
    const parsed = parseActionRequest(req.body);
    if (!parsed.ok) {
      sendInvalid(res, parsed.errors);
      return;
    }
    try {
      const result = await withLogContext({ requestId: createRequestId() }, () =>
        reviewWithGeneratedResponse(getSecurityProxy(), generator, parsed.value)
      );
      res.json(result);
    } catch (error) {
      logger.error('review_failed', {
        status: 502,
        error: error instanceof Error ? error.message : String(error),
      });
      res.status(502).json({ error: 'Response generation failed' });
    }
  });

  return router;
}
