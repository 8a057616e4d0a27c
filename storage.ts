import fs from "fs-extra";
import path from "path";
import { stringify } from "csv-stringify/sync";
import type { Comment, Thread } from "./types/reddit";
import type {
  CategoryCount,
  DailyScore,
  SentimentWordCount,
  Token,
} from "./types/sentiment";

export interface Column<T> {
  header: string;
  value: (row: T) => string | number;
}

export const commentColumns: Column<Comment>[] = [
  { header: "comment", value: (c) => c.text },
  { header: "date", value: (c) => c.timestamp.toISOString() },
  { header: "url", value: (c) => c.url },
];

export const tokenColumns: Column<Token>[] = [
  { header: "word", value: (t) => t.word },
  { header: "date", value: (t) => t.timestamp.toISOString() },
  { header: "url", value: (t) => t.url },
];

export const sentimentWordColumns: Column<SentimentWordCount>[] = [
  { header: "word", value: (w) => w.word },
  { header: "sentiment", value: (w) => w.sentiment },
  { header: "n", value: (w) => w.n },
];

export const categoryColumns: Column<CategoryCount>[] = [
  { header: "sentiment", value: (c) => c.sentiment },
  { header: "n", value: (c) => c.n },
];

export const dailyColumns: Column<DailyScore>[] = [
  { header: "day", value: (d) => d.day },
  { header: "total_score", value: (d) => d.totalScore },
  { header: "avg_score", value: (d) => d.avgScore },
  { header: "word_count", value: (d) => d.wordCount },
];

export const threadColumns: Column<Thread>[] = [
  { header: "title", value: (t) => t.title },
  { header: "comments", value: (t) => t.comments },
  { header: "url", value: (t) => t.url },
];

/**
 * Get the organized output directory for a run: <root>/DDMMYYYY/<subreddit>
 */
export function getOutputPath(
  root: string,
  subreddit: string,
  date: Date = new Date()
): string {
  const dateStr = date
    .toLocaleDateString("en-GB", {
      day: "2-digit",
      month: "2-digit",
      year: "numeric",
    })
    .replace(/\//g, "");

  const subredditDir = subreddit.replace(/[^a-zA-Z0-9-_]/g, "_").toLowerCase();

  return path.join(root, dateStr, subredditDir);
}

export function toCsv<T>(columns: Column<T>[], rows: readonly T[]): string {
  return stringify([
    columns.map((column) => column.header),
    ...rows.map((row) => columns.map((column) => column.value(row))),
  ]);
}

/**
 * Write one table as comma-delimited text with a header row
 */
export async function writeTable<T>(
  dir: string,
  fileName: string,
  columns: Column<T>[],
  rows: readonly T[]
): Promise<string> {
  await fs.ensureDir(dir);
  const filePath = path.join(dir, fileName);
  await fs.writeFile(filePath, toCsv(columns, rows), "utf8");
  console.log(`💾 Saved ${rows.length} rows to ${filePath}`);
  return filePath;
}

export async function writeChart(
  dir: string,
  fileName: string,
  svg: string
): Promise<string> {
  await fs.ensureDir(dir);
  const filePath = path.join(dir, fileName);
  await fs.writeFile(filePath, svg, "utf8");
  console.log(`🖼️ Saved chart to ${filePath}`);
  return filePath;
}

export async function writeRunSummary(
  dir: string,
  summary: object
): Promise<string> {
  await fs.ensureDir(dir);
  const filePath = path.join(dir, "run_summary.json");
  await fs.writeJson(filePath, summary, { spaces: 2 });
  console.log(`✅ Run summary saved to ${filePath}`);
  return filePath;
}
