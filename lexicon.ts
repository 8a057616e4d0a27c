import fs from "fs-extra";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import type {
  BinaryLexicon,
  BinarySentiment,
  EmotionLexicon,
  Lexicon,
  LexiconEntry,
} from "./types/sentiment";
import { LexiconError, describeError } from "./errors";

const csvRowsSchema = z.array(z.record(z.string()));
const tsvRowsSchema = z.array(z.array(z.string()));

function isBinarySentiment(value: string): value is BinarySentiment {
  return value === "positive" || value === "negative";
}

function isHeaderRow(row: readonly string[]): boolean {
  return row[0] === "word" && (row[1] === "sentiment" || row[1] === "category");
}

/**
 * Two layouts are accepted:
 * - CSV with a header naming `word` and `sentiment` (or `category`) columns
 * - tab-separated `word<TAB>category[<TAB>flag]` rows; rows whose flag is
 *   not 1 are skipped
 */
export function parseLexicon(
  content: string,
  filePath: string
): LexiconEntry[] {
  const text = content.replace(/^\uFEFF/, "");
  const firstLine = text.split(/\r?\n/).find((line) => line.trim() !== "");
  if (!firstLine) {
    throw new LexiconError("lexicon is empty", filePath);
  }

  if (firstLine.includes("\t")) {
    const rows = tsvRowsSchema.parse(
      parse(text, {
        delimiter: "\t",
        quote: false,
        relax_column_count: true,
        skip_empty_lines: true,
      })
    );
    return rows
      .map((row) => row.map((cell) => cell.trim()))
      .filter((row, index) => !(index === 0 && isHeaderRow(row)))
      .filter(
        (row) => row.length >= 2 && (row[2] === undefined || row[2] === "1")
      )
      .map(([word, category]) => ({ word, category }));
  }

  const rows = csvRowsSchema.parse(
    parse(text, { columns: true, skip_empty_lines: true, trim: true })
  );
  const header = Object.keys(rows[0] ?? {});
  const categoryColumn = header.includes("sentiment")
    ? "sentiment"
    : header.includes("category")
      ? "category"
      : null;
  if (!header.includes("word") || !categoryColumn) {
    throw new LexiconError(
      `expected word and sentiment columns, found: ${header.join(", ")}`,
      filePath
    );
  }

  return rows.flatMap((row) => {
    const word = row.word;
    const category = row[categoryColumn];
    return word && category ? [{ word, category }] : [];
  });
}

export function buildLexicon<C extends string>(
  entries: readonly LexiconEntry<C>[]
): Lexicon<C> {
  const lexicon = new Map<string, C[]>();
  for (const { word, category } of entries) {
    const categories = lexicon.get(word) ?? [];
    if (!categories.includes(category)) {
      categories.push(category);
    }
    lexicon.set(word, categories);
  }
  return lexicon;
}

async function readLexiconEntries(filePath: string): Promise<LexiconEntry[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf8");
  } catch (error) {
    throw new LexiconError(describeError(error), filePath);
  }

  let entries: LexiconEntry[];
  try {
    entries = parseLexicon(content, filePath);
  } catch (error) {
    if (error instanceof LexiconError) throw error;
    throw new LexiconError(describeError(error), filePath);
  }

  if (entries.length === 0) {
    throw new LexiconError("lexicon has no entries", filePath);
  }
  return entries;
}

export function toBinaryEntries(
  entries: readonly LexiconEntry[],
  filePath: string
): LexiconEntry<BinarySentiment>[] {
  return entries.map(({ word, category }) => {
    if (!isBinarySentiment(category)) {
      throw new LexiconError(
        `"${word}" has category "${category}", expected positive or negative`,
        filePath
      );
    }
    return { word, category };
  });
}

export async function loadBinaryLexicon(
  filePath: string
): Promise<BinaryLexicon> {
  const entries = await readLexiconEntries(filePath);
  const lexicon = buildLexicon(toBinaryEntries(entries, filePath));
  console.log(`📖 Loaded binary lexicon: ${lexicon.size} words`);
  return lexicon;
}

export async function loadEmotionLexicon(
  filePath: string
): Promise<EmotionLexicon> {
  const lexicon = buildLexicon(await readLexiconEntries(filePath));
  console.log(`📖 Loaded emotion lexicon: ${lexicon.size} words`);
  return lexicon;
}
