/**
 * Intent guard type definitions.
 */

/** Coarse category a user request or a proposed action falls into. */
export type IntentKind = 'read' | 'write' | 'delete' | 'unknown';

/** Parameter names the guard understands. Anything else is unconstrained. */
export type ParamKey = 'from' | 'to' | 'subject';

export const PARAM_KEYS: readonly ParamKey[] = ['from', 'to', 'subject'];

/**
 * Parameters stated by the user. An absent key means the user did not
 * constrain that field; it is never stored as an empty string.
 */
export type ExtractedParams = Partial<Record<ParamKey, string>>;

export type ActionParamValue = string | number | boolean;

/**
 * Parameters the agent proposes. Keys in {@link PARAM_KEYS} are reconciled
 * against the user's; extra keys (`limit`, `body`, ...) pass through untouched.
 */
export type ActionParams = Readonly<Record<string, ActionParamValue | undefined>>;

export type ExtractedIntent = {
  intent: IntentKind;
  params: ExtractedParams;
};

/** One unit of work for the proxy. Built fresh per call. */
export type ActionRequest = Readonly<{
  userPrompt: string;
  /** Short verb-phrase identifier, e.g. `read_email` */
  proposedAction: string;
  actionParams: ActionParams;
  /** Source email the agent read, when the action is a read */
  emailContent?: string;
  /** Text the agent intends to show the user for that email */
  proposedResponse?: string;
}>;

export type Verdict = {
  approved: boolean;
  reason: string;
};

/** Which check decided the outcome. */
export type CheckName =
  | 'intent'
  | 'unknown_intent'
  | 'parameters'
  | 'response_length'
  | 'response_indicator'
  | 'response_vocabulary'
  | 'passed';

export type CheckedVerdict = Verdict & { check: CheckName };

export type ValidationResult = Readonly<{
  approved: boolean;
  reason: string;
  userIntent: IntentKind;
  check: CheckName;
}>;
