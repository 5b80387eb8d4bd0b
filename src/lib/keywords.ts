/**
 * Keyword extraction for the reference lookups
 */

const STOPWORDS = new Set([
  "a", "an", "and", "are", "as", "at", "be", "by", "can", "do", "does",
  "for", "from", "how", "i", "in", "is", "it", "me", "my", "of", "on",
  "or", "should", "tell", "that", "the", "this", "to", "what", "when",
  "where", "which", "who", "why", "will", "with", "would", "about",
  "according", "there", "their", "your",
]);

const MAX_KEYWORDS = 2;

/**
 * Pick up to two search terms from a question, in the order they appear.
 * Returns an empty list when nothing survives the filter.
 */
export function extractKeywords(question: string): string[] {
  return question
    .toLowerCase()
    .split(/\s+/)
    .filter((token) => token.length > 3 && !STOPWORDS.has(token))
    .slice(0, MAX_KEYWORDS);
}
