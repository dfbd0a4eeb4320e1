const ASCII_PUNCTUATION = /[!-/:-@[-`{-~]/g;

/**
 * Canonicalize a name for comparison: lower-case, ASCII punctuation removed.
 * Whitespace is kept as-is. Not meant for URLs, addresses or phone numbers.
 */
export function normalizeText(value: string | null | undefined): string {
  if (!value) {
    return "";
  }
  return value.toLowerCase().replace(ASCII_PUNCTUATION, "");
}
