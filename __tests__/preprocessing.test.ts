import path from "path";
import {
  keepAlphabetic,
  loadStopwords,
  parseStopwords,
  preprocessText,
  removeStopwords,
  tokenize,
  tokenizeComments,
} from "../preprocessing";
import { LexiconError } from "../errors";
import type { Comment } from "../types/reddit";

const STOPWORDS = parseStopwords("it\nis\nand\nthe\ni\ndon't");

describe("tokenize", () => {
  it("lowercases, strips punctuation and drops urls", () => {
    expect(tokenize("Great battery, LOVE it! https://example.com/a?b=1")).toEqual([
      "great",
      "battery",
      "love",
      "it",
    ]);
  });

  it("composes decomposed accents instead of splitting on them", () => {
    expect(tokenize("Re\u0301sume\u0301 ready")).toEqual([
      "r\u00e9sum\u00e9",
      "ready",
    ]);
  });

  it("keeps combining marks that have no precomposed form", () => {
    expect(tokenize("x\u0301y z")).toEqual(["x\u0301y", "z"]);
  });

  it("keeps inner apostrophes and splits on underscores", () => {
    expect(tokenize("Don’t 'quote' 123 abc_def")).toEqual([
      "don't",
      "quote",
      "123",
      "abc",
      "def",
    ]);
  });

  it("returns nothing for whitespace", () => {
    expect(tokenize("   \n\t ")).toEqual([]);
  });
});

describe("stop words and alphabetic filter", () => {
  it("removes stop words", () => {
    expect(removeStopwords(["the", "phone", "is", "fast"], STOPWORDS)).toEqual([
      "phone",
      "fast",
    ]);
  });

  it("drops tokens without letters", () => {
    expect(keepAlphabetic(["2024", "v2", "15", "pro"])).toEqual(["v2", "pro"]);
  });

  it("applies both filters after tokenizing", () => {
    expect(
      preprocessText("It is 2024 and the v2 phone rocks", STOPWORDS)
    ).toEqual(["v2", "phone", "rocks"]);
  });

  it("yields zero tokens for empty or whitespace-only text", () => {
    expect(preprocessText("", STOPWORDS)).toEqual([]);
    expect(preprocessText("    ", STOPWORDS)).toEqual([]);
  });
});

describe("tokenizeComments", () => {
  const comments: Comment[] = [
    {
      text: "I don't LOVE the new Camera, it's 48MP!!",
      timestamp: new Date("2024-03-01T08:00:00Z"),
      url: "https://www.reddit.com/r/test/comments/a/",
    },
    {
      text: "100% ... 42",
      timestamp: new Date("2024-03-02T08:00:00Z"),
      url: "https://www.reddit.com/r/test/comments/b/",
    },
  ];

  it("keeps the timestamp and url of the source comment", () => {
    const tokens = tokenizeComments(comments, STOPWORDS);

    expect(tokens.map((t) => t.word)).toEqual([
      "love",
      "new",
      "camera",
      "it's",
      "48mp",
    ]);
    tokens.forEach((t) => {
      expect(t.timestamp).toBe(comments[0].timestamp);
      expect(t.url).toBe(comments[0].url);
    });
  });

  it("only produces lowercase, alphabetic, non-stop-word tokens", () => {
    const tokens = tokenizeComments(comments, STOPWORDS);

    tokens.forEach(({ word }) => {
      expect(word).toBe(word.toLowerCase());
      expect(word).toMatch(/[a-z]/);
      expect(STOPWORDS.has(word)).toBe(false);
    });
  });
});

describe("stop-word files", () => {
  it("skips blank and comment lines", () => {
    expect(parseStopwords("# list\nThe\n\n  a  \n")).toEqual(
      new Set(["the", "a"])
    );
  });

  it("loads the bundled list", async () => {
    const stopwords = await loadStopwords(
      path.join(__dirname, "..", "data", "stopwords.txt")
    );
    expect(stopwords.has("the")).toBe(true);
    expect(stopwords.has("don't")).toBe(true);
    expect(stopwords.has("battery")).toBe(false);
  });

  it("fails with a LexiconError when the file is missing", async () => {
    await expect(
      loadStopwords(path.join(__dirname, "missing-stopwords.txt"))
    ).rejects.toBeInstanceOf(LexiconError);
  });
});
