const MIN_KEYWORDS = 2;
const MIN_KEYWORD_LENGTH = 3;

const STOP_WORDS: ReadonlySet<string> = new Set([
  "the", "a", "an", "and", "or", "but", "in", "on", "at", "to", "for", "of", "with",
  "by", "is", "are", "was", "were", "be", "been", "have", "has", "had", "do", "does",
  "did", "will", "would", "could", "should", "may", "might", "can", "what", "how",
  "when", "where", "why", "who", "which", "this", "that", "these", "those"
]);

export type QueryExpansion = {
  query: string;
  keywords: string[];
  expanded: boolean;
};

export const extractKeywords = (question: string): string[] =>
  question
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, " ")
    .replace(/\s+/g, " ")
    .trim()
    .split(" ")
    .filter((word) => word.length >= MIN_KEYWORD_LENGTH && !STOP_WORDS.has(word));

/**
 * Appends extracted keywords to the question to widen vector recall. The
 * original question is always kept verbatim at the front.
 */
export const expandQuery = (question: string): QueryExpansion => {
  if (question.trim().length === 0) {
    return { query: question, keywords: [], expanded: false };
  }

  const keywords = extractKeywords(question);
  if (keywords.length < MIN_KEYWORDS) {
    return { query: question, keywords, expanded: false };
  }

  return {
    query: `${question} ${keywords.join(" ")}`,
    keywords,
    expanded: true
  };
};
