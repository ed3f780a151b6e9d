/**
 * Intent extraction from free-text user prompts.
 *
 * Pattern tables are compiled once per extractor and never mutated, so a
 * single instance can serve any number of concurrent callers.
 */
import type { ExtractedIntent, ExtractedParams } from '../types.js';
import { KIND_PRIORITY, PROMPT_VERBS, type ClassifiedKind } from '../vocabulary.js';

/** Address following a `from` label: no whitespace or commas, one `@`. */
const FROM_PATTERN = /from[:\s]*([^\s,]+@[^\s,]+)/i;
const TO_PATTERN = /to[:\s]*([^\s,]+@[^\s,]+)/i;
/** Quoted string (single or double quotes) following a `subject` label. */
const SUBJECT_PATTERN = /subject[:\s]*['"]([^'"]+)['"]/i;

/**
 * Build the matcher for one verb: `look-at` becomes `look.*at.*email`.
 */
export function buildVerbPattern(verb: string): RegExp {
  const parts = verb.split('-').map(escapeRegExp);
  return new RegExp(`${parts.join('.*')}.*email`, 'i');
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function captureTrimmed(prompt: string, pattern: RegExp): string | undefined {
  const match = pattern.exec(prompt);
  const value = match?.[1]?.trim();
  return value ? value : undefined;
}

export class IntentExtractor {
  private readonly tables: ReadonlyArray<{ kind: ClassifiedKind; patterns: readonly RegExp[] }>;

  constructor() {
    this.tables = KIND_PRIORITY.map(kind => ({
      kind,
      patterns: PROMPT_VERBS[kind].map(buildVerbPattern),
    }));
  }

  /**
   * Classify a prompt and pull out the parameters the user stated.
   *
   * Kinds are tested in priority order (read, write, delete) and the first
   * kind with any matching verb wins, even if a later kind also matches.
   */
  extractIntent(userPrompt: string): ExtractedIntent {
    for (const { kind, patterns } of this.tables) {
      if (patterns.some(pattern => pattern.test(userPrompt))) {
        return { intent: kind, params: this.extractParams(kind, userPrompt) };
      }
    }
    return { intent: 'unknown', params: {} };
  }

  private extractParams(kind: ClassifiedKind, userPrompt: string): ExtractedParams {
    const params: ExtractedParams = {};

    if (kind === 'write') {
      const to = captureTrimmed(userPrompt, TO_PATTERN);
      if (to) params.to = to;
    } else {
      const from = captureTrimmed(userPrompt, FROM_PATTERN);
      if (from) params.from = from;
    }

    const subject = captureTrimmed(userPrompt, SUBJECT_PATTERN);
    if (subject) params.subject = subject;

    return params;
  }
}
