import type { RawComment, Thread, ThreadSource } from "./types/reddit";
import { describeError } from "./errors";

export const DEFAULT_TOP_THREADS = 40;

// A missing argument means the default; anything but a positive integer is null
export function parseThreadCount(value?: string): number | null {
  if (value === undefined || value === "") return DEFAULT_TOP_THREADS;
  if (!/^\d+$/.test(value)) return null;
  const count = parseInt(value, 10);
  return count >= 1 ? count : null;
}

// Most active discussions first; threads with equal counts keep listing order
export function rankThreads(threads: readonly Thread[]): Thread[] {
  return [...threads].sort((a, b) => b.comments - a.comments);
}

export function selectTopThreads(
  ranked: readonly Thread[],
  limit: number = DEFAULT_TOP_THREADS
): Thread[] {
  return ranked.slice(0, Math.max(0, limit));
}

/**
 * Fetch the comment tree of every selected thread and merge the results.
 * A failing thread is logged and contributes nothing; no retries.
 */
export async function collectComments(
  source: ThreadSource,
  threads: readonly Thread[]
): Promise<readonly RawComment[]> {
  const batches: RawComment[][] = [];

  for (const [index, thread] of threads.entries()) {
    console.log(`📌 Fetching thread ${index + 1} of ${threads.length}`);

    try {
      const comments = await source.fetchThreadComments(thread);
      if (comments.length === 0) {
        console.warn(`⚠️ No comments returned for ${thread.url}, skipping`);
        continue;
      }
      batches.push(comments);
    } catch (error) {
      console.warn(`⚠️ Skipping thread: ${describeError(error)}`);
    }
  }

  const merged = batches.reduce<readonly RawComment[]>(
    (all, batch) => [...all, ...batch],
    []
  );
  console.log(
    `📊 Collected ${merged.length} comments from ${batches.length} of ${threads.length} threads`
  );
  return merged;
}
