export type BinarySentiment = "positive" | "negative";

export interface LexiconEntry<C extends string = string> {
  word: string;
  category: C;
}

// Word -> categories, in the order the lexicon lists them
export type Lexicon<C extends string = string> = ReadonlyMap<
  string,
  readonly C[]
>;

export type BinaryLexicon = Lexicon<BinarySentiment>;
export type EmotionLexicon = Lexicon<string>;

export interface Token {
  readonly word: string;
  readonly timestamp: Date;
  readonly url: string;
}

export interface SentimentWordCount {
  readonly word: string;
  readonly sentiment: BinarySentiment;
  readonly n: number;
}

export interface CategoryCount<C extends string = string> {
  readonly sentiment: C;
  readonly n: number;
}

export interface DailyScore {
  readonly day: string; // YYYY-MM-DD (UTC)
  readonly totalScore: number;
  readonly avgScore: number;
  readonly wordCount: number;
}
