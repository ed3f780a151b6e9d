/**
 * Heuristic screen for responses generated from an email.
 *
 * Catches deceptive output: a summary that grew much longer than its
 * source, carries a known attack phrase, or talks about things the email
 * never mentioned. Deterministic and side-effect free; false positives and
 * negatives are expected.
 */
import type { CheckedVerdict } from '../types.js';
import { ATTACK_INDICATORS, MAX_LENGTH_RATIO, MAX_NOVEL_WORD_RATIO } from '../vocabulary.js';

// Unicode whitespace without U+FEFF, plus the \x1c-\x1f separators and U+0085.
const WORD_SEPARATOR = /[\t\n\v\f\r\x1c-\x1f \x85\xa0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]+/;

function wordSet(text: string): Set<string> {
  return new Set(text.toLowerCase().split(WORD_SEPARATOR).filter(word => word.length > 0));
}

/** Length in code points, so an emoji counts once. */
function charLength(text: string): number {
  return [...text].length;
}

/**
 * Run the length, indicator and vocabulary checks in that order.
 * The first failing check decides the verdict.
 */
export function validateResponseContent(emailContent: string, proposedResponse: string): CheckedVerdict {
  if (charLength(proposedResponse) > charLength(emailContent) * MAX_LENGTH_RATIO) {
    return {
      approved: false,
      check: 'response_length',
      reason: 'Response is significantly longer than email content, potential deceptive output',
    };
  }

  const responseLower = proposedResponse.toLowerCase();
  const indicator = ATTACK_INDICATORS.find(phrase => responseLower.includes(phrase));
  if (indicator !== undefined) {
    return {
      approved: false,
      check: 'response_indicator',
      reason: `Response contains potential attack indicator: '${indicator}'`,
    };
  }

  const emailWords = wordSet(emailContent);
  const responseWords = wordSet(proposedResponse);
  let novelCount = 0;
  for (const word of responseWords) {
    if (!emailWords.has(word)) novelCount++;
  }

  // An empty response has no words and passes: 0 > 0 is false.
  if (novelCount > responseWords.size * MAX_NOVEL_WORD_RATIO) {
    return {
      approved: false,
      check: 'response_vocabulary',
      reason: 'Response introduces many new concepts not present in the email',
    };
  }

  return { approved: true, check: 'passed', reason: 'Response content validated successfully' };
}
