import type { CategoryCount, EmotionLexicon, Token } from "./types/sentiment";
import { joinLexicon } from "./sentiment";

/**
 * Emotion totals over a many-to-many join: a token whose word carries k
 * categories adds one to each of the k totals. Highest count first, ties in
 * alphabetical order.
 */
export function countEmotions(
  tokens: readonly Token[],
  lexicon: EmotionLexicon
): CategoryCount[] {
  const counts = new Map<string, number>();
  for (const { category } of joinLexicon(tokens, lexicon)) {
    counts.set(category, (counts.get(category) ?? 0) + 1);
  }

  return Array.from(counts.entries())
    .map(([sentiment, n]) => ({ sentiment, n }))
    .sort((a, b) => b.n - a.n || a.sentiment.localeCompare(b.sentiment));
}
