import { buildLexicon } from "../lexicon";
import {
  countSentimentWords,
  joinLexicon,
  sentimentByDay,
  summarizeSentiment,
  toDay,
} from "../sentiment";
import type { BinarySentiment, LexiconEntry } from "../types/sentiment";
import { token } from "./helpers";

const entries: LexiconEntry<BinarySentiment>[] = [
  { word: "great", category: "positive" },
  { word: "love", category: "positive" },
  { word: "terrible", category: "negative" },
  { word: "awful", category: "negative" },
  { word: "bug", category: "negative" },
];
const lexicon = buildLexicon(entries);

const DAY_1 = "2024-03-01T10:00:00Z";
const DAY_2 = "2024-03-02T15:30:00Z";

// "great battery love it", "terrible lag awful bug" on day 1 and
// "fine ok nothing special" on day 2, after stop-word removal
const tokens = [
  ...["great", "battery", "love"].map((w) => token(w, DAY_1)),
  ...["terrible", "lag", "awful", "bug"].map((w) => token(w, DAY_1)),
  ...["fine", "ok", "nothing", "special"].map((w) => token(w, DAY_2)),
];

describe("joinLexicon", () => {
  it("drops tokens without an exact lexicon match", () => {
    const matches = joinLexicon(tokens, lexicon);
    expect(matches.map((m) => m.token.word)).toEqual([
      "great",
      "love",
      "terrible",
      "awful",
      "bug",
    ]);
  });

  it("fans out words listed under both categories", () => {
    const mixed = buildLexicon<BinarySentiment>([
      { word: "envious", category: "positive" },
      { word: "envious", category: "negative" },
    ]);
    expect(
      joinLexicon([token("envious", DAY_1)], mixed).map((m) => m.category)
    ).toEqual(["positive", "negative"]);
  });
});

describe("summarizeSentiment", () => {
  it("counts positive and negative matches", () => {
    expect(summarizeSentiment(tokens, lexicon)).toEqual([
      { sentiment: "negative", n: 3 },
      { sentiment: "positive", n: 2 },
    ]);
  });

  it("sums to the number of matched tokens", () => {
    const total = summarizeSentiment(tokens, lexicon).reduce(
      (sum, row) => sum + row.n,
      0
    );
    expect(total).toBe(tokens.filter((t) => lexicon.has(t.word)).length);
  });

  it("omits categories with no matches", () => {
    expect(summarizeSentiment([token("love", DAY_1)], lexicon)).toEqual([
      { sentiment: "positive", n: 1 },
    ]);
  });
});

describe("countSentimentWords", () => {
  it("sorts by count and keeps first-seen order for ties", () => {
    const words = ["bug", "great", "bug", "great", "awful", "love", "bug"].map(
      (w) => token(w, DAY_1)
    );

    expect(countSentimentWords(words, lexicon)).toEqual([
      { word: "bug", sentiment: "negative", n: 3 },
      { word: "great", sentiment: "positive", n: 2 },
      { word: "awful", sentiment: "negative", n: 1 },
      { word: "love", sentiment: "positive", n: 1 },
    ]);
  });

  it("never counts a word more often than it occurs", () => {
    const words = ["great", "great", "lag", "bug"].map((w) => token(w, DAY_1));

    countSentimentWords(words, lexicon).forEach((row) => {
      const occurrences = words.filter((t) => t.word === row.word).length;
      expect(row.n).toBeLessThanOrEqual(occurrences);
    });
  });
});

describe("sentimentByDay", () => {
  it("scores matched tokens per day and drops days without matches", () => {
    const daily = sentimentByDay(tokens, lexicon);

    expect(daily).toHaveLength(1);
    expect(daily[0].day).toBe("2024-03-01");
    expect(daily[0].totalScore).toBe(-1);
    expect(daily[0].wordCount).toBe(5);
    expect(daily[0].avgScore).toBeCloseTo(-0.2, 10);
  });

  it("never contains a day with zero words", () => {
    const daily = sentimentByDay(tokens, lexicon);
    expect(daily.some((d) => d.day === "2024-03-02")).toBe(false);
    daily.forEach((d) => expect(d.wordCount).toBeGreaterThan(0));
  });

  it("averages as total score over word count", () => {
    const daily = sentimentByDay(
      [
        token("great", "2024-03-03T01:00:00Z"),
        token("love", "2024-03-03T02:00:00Z"),
        token("bug", "2024-03-03T03:00:00Z"),
        token("awful", "2024-03-01T03:00:00Z"),
      ],
      lexicon
    );

    expect(daily.map((d) => d.day)).toEqual(["2024-03-01", "2024-03-03"]);
    daily.forEach((d) => {
      expect(d.avgScore).toBeCloseTo(d.totalScore / d.wordCount, 10);
    });
    expect(daily[1].totalScore).toBe(1);
    expect(daily[1].avgScore).toBeCloseTo(1 / 3, 10);
  });

  it("groups by UTC calendar day", () => {
    expect(toDay(new Date("2024-03-01T23:59:59Z"))).toBe("2024-03-01");

    const daily = sentimentByDay(
      [
        token("great", "2024-03-01T23:30:00Z"),
        token("bug", "2024-03-02T00:10:00Z"),
      ],
      lexicon
    );
    expect(daily).toEqual([
      { day: "2024-03-01", totalScore: 1, avgScore: 1, wordCount: 1 },
      { day: "2024-03-02", totalScore: -1, avgScore: -1, wordCount: 1 },
    ]);
  });
});
