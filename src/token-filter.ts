import type { ComplexityRule, FilterConfig, FilterOutcome } from './types';

export const SPECIAL_CHARACTERS = '!@#$%^&*()_+-=[]{}|;:,.<>?/~`';

// Whitespace plus the Unicode "other" (control, format, surrogate, private
// use, unassigned) and "separator" categories.
const UNPRINTABLE = /[\s\p{C}\p{Z}]/gu;

const UPPERCASE = /\p{Lu}/u;
const LOWERCASE = /\p{Ll}/u;
const DIGIT = /\p{Nd}/u;

export const fourClassComplexity: ComplexityRule = (token: string): boolean => {
  return UPPERCASE.test(token)
    && LOWERCASE.test(token)
    && DIGIT.test(token)
    && Array.from(token).some(char => SPECIAL_CHARACTERS.includes(char));
};

export function codePointLength(text: string): number {
  return Array.from(text).length;
}

export function stripUnprintable(text: string): string {
  return text.replace(UNPRINTABLE, '');
}

/**
 * Accepts or rejects one candidate. The checks run in a fixed order so that
 * every rejected candidate is counted under exactly one reason; length is
 * judged before cleaning.
 */
export function filterToken(candidate: string, config: FilterConfig): FilterOutcome {
  const trimmed = candidate.trim();
  if (trimmed.length === 0) {
    return { accepted: false, reason: 'empty' };
  }

  if (codePointLength(trimmed) > config.maxLength) {
    return { accepted: false, reason: 'too-long' };
  }

  const token = stripUnprintable(trimmed);
  if (token.length === 0) {
    return { accepted: false, reason: 'empty-after-cleaning' };
  }

  if (config.requireComplexity) {
    const rule = config.complexityRule ?? fourClassComplexity;
    if (!rule(token)) {
      return { accepted: false, reason: 'low-complexity' };
    }
  }

  return { accepted: true, token };
}
