const CLASS_SPECIALS = /[\\\]\[^-]/g;

export function buildSplitPattern(splitCharacters: ReadonlySet<string>): RegExp | undefined {
  if (splitCharacters.size === 0) {
    return undefined;
  }
  const escaped = Array.from(splitCharacters)
    .map(char => char.replace(CLASS_SPECIALS, '\\$&'))
    .join('');
  return new RegExp(`[${escaped}]+`, 'u');
}

/**
 * Splits cleaned cell text into candidate tokens. Runs of delimiter
 * characters collapse into one split point; with no delimiters the whole
 * text is the only candidate.
 */
export function tokenize(text: string, splitCharacters: ReadonlySet<string>): string[] {
  const pattern = buildSplitPattern(splitCharacters);
  return splitWith(text, pattern);
}

export function splitWith(text: string, pattern: RegExp | undefined): string[] {
  if (!pattern) {
    return [text];
  }
  // Only the edges can produce empty pieces: the pattern consumes whole runs.
  return text
    .split(pattern)
    .filter(piece => piece.length > 0)
    .map(piece => piece.trim());
}
