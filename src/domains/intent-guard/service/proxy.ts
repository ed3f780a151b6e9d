/**
 * @fileoverview Security proxy for email agents.
 *
 * Sits between a user's request and the action an agent proposes for it,
 * and approves the action only when it matches what the user asked for.
 * Every call is synchronous and reads nothing but its arguments and the
 * tables built in the constructor; share one instance across callers.
 */
import { createLogger, type AppLogger } from '../../../utils/observability/index.js';
import type {
  ActionParams,
  ActionRequest,
  CheckedVerdict,
  ExtractedIntent,
  IntentKind,
  ValidationResult,
} from '../types.js';
import { ActionValidator, classifyAction } from './action-validator.js';
import { validateResponseContent } from './content-checker.js';
import { IntentExtractor } from './extractor.js';

export class SecurityProxy {
  private readonly extractor: IntentExtractor;
  private readonly validator: ActionValidator;
  private readonly logger: AppLogger;

  constructor(logger: AppLogger = createLogger({ domain: 'intent-guard' })) {
    this.extractor = new IntentExtractor();
    this.validator = new ActionValidator(this.extractor);
    this.logger = logger;
  }

  extractIntent(userPrompt: string): ExtractedIntent {
    return this.extractor.extractIntent(userPrompt);
  }

  classifyAction(proposedAction: string): IntentKind {
    return classifyAction(proposedAction);
  }

  validateAction(userPrompt: string, proposedAction: string, actionParams: ActionParams): CheckedVerdict {
    return this.validator.validateAction(userPrompt, proposedAction, actionParams);
  }

  validateResponseContent(emailContent: string, proposedResponse: string): CheckedVerdict {
    return validateResponseContent(emailContent, proposedResponse);
  }

  /**
   * Validate one request end to end.
   *
   * Read actions that pass parameter validation are additionally screened
   * against the email when both `emailContent` and `proposedResponse` are
   * supplied; a failed screen overturns the approval. An empty
   * `emailContent` counts as no email.
   */
  processRequest(request: ActionRequest): ValidationResult {
    const startTime = Date.now();
    const { userPrompt, proposedAction, actionParams, emailContent, proposedResponse } = request;

    const userIntent = this.extractor.extractIntent(userPrompt).intent;
    const actionIntent = classifyAction(proposedAction);
    let verdict = this.validator.validateAction(userPrompt, proposedAction, actionParams);

    if (
      verdict.approved &&
      actionIntent === 'read' &&
      emailContent &&
      proposedResponse !== undefined
    ) {
      const content = validateResponseContent(emailContent, proposedResponse);
      if (!content.approved) {
        verdict = {
          approved: false,
          check: content.check,
          reason: `Action approved but response validation failed: ${content.reason}`,
        };
      }
    }

    const result: ValidationResult = {
      approved: verdict.approved,
      reason: verdict.reason,
      userIntent,
      check: verdict.check,
    };

    this.logger.info('request_processed', {
      approved: result.approved,
      check: result.check,
      reason: result.reason,
      userIntent,
      actionIntent,
      proposedAction,
      promptLength: userPrompt.length,
      emailContentLength: emailContent?.length,
      responseLength: proposedResponse?.length,
      paramKeys: Object.keys(actionParams),
      durationMs: Date.now() - startTime,
    });

    return result;
  }
}
