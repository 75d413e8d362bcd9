/**
 * Truncate text to a maximum number of characters.
 * Returns the (possibly) shortened text and whether truncation occurred.
 */
export function truncateText(
  content: string,
  maxSize: number
): { content: string; truncated: boolean } {
  if (content.length <= maxSize) {
    return { content, truncated: false };
  }

  return {
    content: content.slice(0, maxSize),
    truncated: true,
  };
}

/** Rough token estimate for text that has not been sent to the API yet. */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}
