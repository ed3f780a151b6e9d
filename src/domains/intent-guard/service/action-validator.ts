/**
 * Proposed-action validation against the user's extracted intent.
 */
import type { ActionParams, CheckedVerdict, ExtractedParams, IntentKind } from '../types.js';
import { ACTION_VERBS, KIND_PRIORITY } from '../vocabulary.js';
import type { IntentExtractor } from './extractor.js';

const PARAMETERS_OK = 'Parameters validated successfully';

/** Which address field binds the action for each kind. */
const ADDRESS_FIELD = {
  read: { key: 'from', label: 'From' },
  delete: { key: 'from', label: 'From' },
  write: { key: 'to', label: 'To' },
} as const;

/**
 * Classify an action identifier such as `read_email` by substring.
 * Read verbs are tested first, so `get_and_delete` counts as a read.
 */
export function classifyAction(proposedAction: string): IntentKind {
  const actionLower = proposedAction.toLowerCase();
  for (const kind of KIND_PRIORITY) {
    if (ACTION_VERBS[kind].some(verb => actionLower.includes(verb))) {
      return kind;
    }
  }
  return 'unknown';
}

/**
 * Compare one address field and the subject. Only keys present on both
 * sides are compared; a key either side leaves out is unconstrained.
 */
function reconcileParams(
  kind: keyof typeof ADDRESS_FIELD,
  userParams: ExtractedParams,
  actionParams: ActionParams
): CheckedVerdict {
  const { key, label } = ADDRESS_FIELD[kind];
  const userAddress = userParams[key];
  const actionAddress = actionParams[key];

  if (userAddress !== undefined && actionAddress !== undefined && userAddress !== String(actionAddress)) {
    return {
      approved: false,
      check: 'parameters',
      reason: `${label} address mismatch: User specified ${userAddress} but action uses ${String(actionAddress)}`,
    };
  }

  const userSubject = userParams.subject;
  const actionSubject = actionParams.subject;

  if (
    userSubject !== undefined &&
    actionSubject !== undefined &&
    userSubject.toLowerCase() !== String(actionSubject).toLowerCase()
  ) {
    return {
      approved: false,
      check: 'parameters',
      reason: `Subject mismatch: User specified '${userSubject}' but action uses '${String(actionSubject)}'`,
    };
  }

  return { approved: true, check: 'passed', reason: PARAMETERS_OK };
}

export class ActionValidator {
  constructor(private readonly extractor: IntentExtractor) {}

  /**
   * Decide whether `proposedAction` with `actionParams` is what the user asked for.
   */
  validateAction(userPrompt: string, proposedAction: string, actionParams: ActionParams): CheckedVerdict {
    const { intent: userIntent, params: userParams } = this.extractor.extractIntent(userPrompt);
    const actionIntent = classifyAction(proposedAction);

    if (userIntent !== actionIntent) {
      return {
        approved: false,
        check: 'intent',
        reason: `Intent mismatch: User intended ${userIntent} but action is ${actionIntent}`,
      };
    }

    switch (userIntent) {
      case 'read':
      case 'delete':
      case 'write':
        return reconcileParams(userIntent, userParams, actionParams);
      case 'unknown':
        return { approved: false, check: 'unknown_intent', reason: 'Unknown user intent' };
      default: {
        const exhaustive: never = userIntent;
        return exhaustive;
      }
    }
  }
}
