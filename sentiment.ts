import type {
  BinaryLexicon,
  BinarySentiment,
  CategoryCount,
  DailyScore,
  Lexicon,
  SentimentWordCount,
  Token,
} from "./types/sentiment";

export interface LexiconMatch<C extends string> {
  token: Token;
  category: C;
}

const SCORES: Record<BinarySentiment, number> = {
  positive: 1,
  negative: -1,
};

/**
 * Inner join on exact word match. Tokens with no lexicon entry are dropped;
 * a word listed under several categories yields one match per category.
 */
export function joinLexicon<C extends string>(
  tokens: readonly Token[],
  lexicon: Lexicon<C>
): LexiconMatch<C>[] {
  return tokens.flatMap((token) =>
    (lexicon.get(token.word) ?? []).map((category) => ({ token, category }))
  );
}

export function toDay(timestamp: Date): string {
  return timestamp.toISOString().split("T")[0];
}

// Sorted by count descending; ties keep the order words were first seen
export function countSentimentWords(
  tokens: readonly Token[],
  lexicon: BinaryLexicon
): SentimentWordCount[] {
  const counts = new Map<string, SentimentWordCount>();

  for (const { token, category } of joinLexicon(tokens, lexicon)) {
    const key = `${token.word}\u0000${category}`;
    const current = counts.get(key);
    counts.set(key, {
      word: token.word,
      sentiment: category,
      n: (current?.n ?? 0) + 1,
    });
  }

  return Array.from(counts.values()).sort((a, b) => b.n - a.n);
}

// One row per matched category, alphabetical
export function summarizeSentiment(
  tokens: readonly Token[],
  lexicon: BinaryLexicon
): CategoryCount<BinarySentiment>[] {
  const counts = new Map<BinarySentiment, number>();
  for (const { category } of joinLexicon(tokens, lexicon)) {
    counts.set(category, (counts.get(category) ?? 0) + 1);
  }

  return Array.from(counts.entries())
    .map(([sentiment, n]) => ({ sentiment, n }))
    .sort((a, b) => a.sentiment.localeCompare(b.sentiment));
}

/**
 * Net score per UTC day: +1 for every positive match, -1 for every negative.
 * Days without a single match do not appear in the result.
 */
export function sentimentByDay(
  tokens: readonly Token[],
  lexicon: BinaryLexicon
): DailyScore[] {
  const days = new Map<string, { total: number; count: number }>();

  for (const { token, category } of joinLexicon(tokens, lexicon)) {
    const day = toDay(token.timestamp);
    const current = days.get(day) ?? { total: 0, count: 0 };
    days.set(day, {
      total: current.total + SCORES[category],
      count: current.count + 1,
    });
  }

  return Array.from(days.entries())
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([day, { total, count }]) => ({
      day,
      totalScore: total,
      avgScore: total / count,
      wordCount: count,
    }));
}
