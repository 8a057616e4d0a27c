/**
 * Text Preprocessing Module
 *
 * This module handles:
 * - Tokenization: Breaking comment text into lowercase words
 * - Stopword removal: Filtering out common words that don't carry sentiment
 * - Alphabetic filtering: Dropping numbers and other tokens without letters
 */

import fs from "fs-extra";
import type { Comment } from "./types/reddit";
import type { Token } from "./types/sentiment";
import { LexiconError, describeError } from "./errors";

const ALPHABETIC = /[a-z]/;

export function tokenize(text: string): string[] {
  const withoutUrls = text.normalize("NFC").replace(/https?:\/\/\S+/g, "");

  return withoutUrls
    .replace(/[‘’]/g, "'")
    .replace(/[^\p{L}\p{M}\p{N}\s']/gu, " ")
    .toLowerCase()
    .split(/\s+/)
    .map((token) => token.replace(/^'+|'+$/g, ""))
    .filter((token) => token.length > 0);
}

export function removeStopwords(
  tokens: string[],
  stopwords: ReadonlySet<string>
): string[] {
  return tokens.filter((token) => !stopwords.has(token));
}

export function keepAlphabetic(tokens: string[]): string[] {
  return tokens.filter((token) => ALPHABETIC.test(token));
}

export function preprocessText(
  text: string,
  stopwords: ReadonlySet<string>
): string[] {
  if (!text || text.trim() === "") return [];
  return keepAlphabetic(removeStopwords(tokenize(text), stopwords));
}

export function tokenizeComments(
  comments: readonly Comment[],
  stopwords: ReadonlySet<string>
): Token[] {
  return comments.flatMap((comment) =>
    preprocessText(comment.text, stopwords).map((word) => ({
      word,
      timestamp: comment.timestamp,
      url: comment.url,
    }))
  );
}

export function parseStopwords(content: string): Set<string> {
  return new Set(
    content
      .split(/\r?\n/)
      .map((line) => line.trim().toLowerCase())
      .filter((line) => line.length > 0 && !line.startsWith("#"))
  );
}

// One word per line, "#" starts a comment line
export async function loadStopwords(filePath: string): Promise<Set<string>> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf8");
  } catch (error) {
    throw new LexiconError(describeError(error), filePath);
  }

  const stopwords = parseStopwords(content);
  if (stopwords.size === 0) {
    throw new LexiconError("stop-word list is empty", filePath);
  }
  return stopwords;
}
