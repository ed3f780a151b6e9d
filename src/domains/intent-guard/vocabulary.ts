/**
 * Fixed vocabularies for intent classification and response screening.
 * Changing any entry or threshold here changes which actions get approved.
 */

import type { IntentKind } from './types.js';

export type ClassifiedKind = Exclude<IntentKind, 'unknown'>;

/** Tested in this order; the first kind with a hit wins. */
export const KIND_PRIORITY: readonly ClassifiedKind[] = ['read', 'write', 'delete'];

/**
 * Verbs that mark a user prompt as a given kind when followed (anywhere
 * later) by the word "email". Multi-word verbs use `-` between words.
 */
export const PROMPT_VERBS: Readonly<Record<ClassifiedKind, readonly string[]>> = {
  read: ['read', 'show', 'check', 'view', 'open', 'see', 'display', 'look-at', 'what', 'fetch'],
  write: ['send', 'write', 'compose', 'reply', 'forward', 'create', 'draft'],
  delete: ['delete', 'remove', 'trash', 'discard', 'erase'],
};

/** Substrings that classify a proposed action identifier. */
export const ACTION_VERBS: Readonly<Record<ClassifiedKind, readonly string[]>> = {
  read: ['read', 'fetch', 'get', 'retrieve'],
  write: ['send', 'write', 'compose', 'reply', 'forward'],
  delete: ['delete', 'remove', 'trash'],
};

/** Phrases that should never appear in a summary of an email. */
export const ATTACK_INDICATORS: readonly string[] = [
  'forward this email',
  'click this link',
  'download this attachment',
  'reply with your password',
  'provide your credentials',
  'execute this code',
  'run this command',
  'ignore security warnings',
];

/** A response may be at most this many times the email's length. */
export const MAX_LENGTH_RATIO = 1.5;

/** At most this share of a response's distinct words may be absent from the email. */
export const MAX_NOVEL_WORD_RATIO = 0.3;
