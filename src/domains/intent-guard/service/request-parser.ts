/**
 * Parsers for untrusted JSON request bodies.
 * Every problem is reported with the field it concerns.
 */
import type { ActionParamValue, ActionRequest } from '../types.js';

export type FieldError = {
  field: string;
  message: string;
};

export type ParseResult<T> = { ok: true; value: T } | { ok: false; errors: FieldError[] };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isParamValue(value: unknown): value is ActionParamValue {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function optionalString(body: Record<string, unknown>, field: string, errors: FieldError[]): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    errors.push({ field, message: `${field} must be a string` });
    return undefined;
  }
  return value;
}

function requiredString(body: Record<string, unknown>, field: string, errors: FieldError[]): string {
  const value = body[field];
  if (typeof value !== 'string') {
    errors.push({ field, message: `${field} is required and must be a string` });
    return '';
  }
  return value;
}

export function parseActionRequest(body: unknown): ParseResult<ActionRequest> {
  if (!isRecord(body)) {
    return { ok: false, errors: [{ field: 'body', message: 'request body must be a JSON object' }] };
  }

  const errors: FieldError[] = [];
  const userPrompt = requiredString(body, 'userPrompt', errors);
  const proposedAction = requiredString(body, 'proposedAction', errors);
  if (proposedAction !== '' && proposedAction.trim().length === 0) {
    errors.push({ field: 'proposedAction', message: 'proposedAction must not be blank' });
  }

  const actionParams: Record<string, ActionParamValue> = {};
  const rawParams = body.actionParams;
  if (rawParams !== undefined && rawParams !== null) {
    if (!isRecord(rawParams)) {
      errors.push({ field: 'actionParams', message: 'actionParams must be an object' });
    } else {
      for (const [key, value] of Object.entries(rawParams)) {
        if (value === undefined || value === null) continue;
        if (!isParamValue(value)) {
          errors.push({ field: `actionParams.${key}`, message: 'values must be strings, numbers or booleans' });
          continue;
        }
        actionParams[key] = value;
      }
    }
  }

  const emailContent = optionalString(body, 'emailContent', errors);
  const proposedResponse = optionalString(body, 'proposedResponse', errors);

  if (errors.length > 0) {
    return { ok: false, errors };
  }

  return {
    ok: true,
    value: { userPrompt, proposedAction, actionParams, emailContent, proposedResponse },
  };
}

export function parseContentRequest(body: unknown): ParseResult<{ emailContent: string; proposedResponse: string }> {
  if (!isRecord(body)) {
    return { ok: false, errors: [{ field: 'body', message: 'request body must be a JSON object' }] };
  }
  const errors: FieldError[] = [];
  const emailContent = requiredString(body, 'emailContent', errors);
  const proposedResponse = requiredString(body, 'proposedResponse', errors);
  return errors.length > 0 ? { ok: false, errors } : { ok: true, value: { emailContent, proposedResponse } };
}

export function parsePromptRequest(body: unknown): ParseResult<{ userPrompt: string }> {
  if (!isRecord(body)) {
    return { ok: false, errors: [{ field: 'body', message: 'request body must be a JSON object' }] };
  }
  const errors: FieldError[] = [];
  const userPrompt = requiredString(body, 'userPrompt', errors);
  return errors.length > 0 ? { ok: false, errors } : { ok: true, value: { userPrompt } };
}

