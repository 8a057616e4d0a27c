import { z } from "zod";
import type { Comment } from "./types/reddit";
import { StructuralError } from "./errors";

const REQUIRED_FIELDS = ["comment", "date", "url"] as const;

const rawCommentSchema = z.object({
  comment: z.string().nullable().optional(),
  date: z.union([z.number(), z.string()]).nullable().optional(),
  url: z.string(),
});

function hasField(row: unknown, field: string): boolean {
  return typeof row === "object" && row !== null && field in row;
}

export function parseTimestamp(
  value: number | string | null | undefined
): Date | null {
  if (value === null || value === undefined) return null;

  const date =
    typeof value === "number"
      ? new Date(value * 1000) // Epoch seconds
      : /^\d+(\.\d+)?$/.test(value.trim())
        ? new Date(Number(value) * 1000)
        : new Date(value);

  return isNaN(date.getTime()) ? null : date;
}

/**
 * Keep comments with text and a usable timestamp, restricted to
 * text/timestamp/url. Throws when the collection is empty or a required
 * field is missing from every row.
 */
export function normalizeComments(rows: readonly unknown[]): Comment[] {
  if (rows.length === 0) {
    throw new StructuralError("no comments were collected", "normalize");
  }

  const missing = REQUIRED_FIELDS.filter(
    (field) => !rows.some((row) => hasField(row, field))
  );
  if (missing.length > 0) {
    throw new StructuralError(
      `input has no ${missing.join(", ")} field`,
      "normalize"
    );
  }

  const comments = rows.flatMap((row): Comment[] => {
    const parsed = rawCommentSchema.safeParse(row);
    if (!parsed.success) return [];

    const text = parsed.data.comment;
    if (!text || text.trim() === "") return [];

    const timestamp = parseTimestamp(parsed.data.date);
    if (!timestamp) return [];

    return [{ text, timestamp, url: parsed.data.url }];
  });

  if (comments.length === 0) {
    throw new StructuralError(
      "no comments with text survived normalization",
      "normalize"
    );
  }

  return comments;
}
