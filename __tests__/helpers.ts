import type { Thread } from "../types/reddit";
import type { Token } from "../types/sentiment";

export function token(
  word: string,
  iso: string,
  url = "https://www.reddit.com/r/test/comments/t1/"
): Token {
  return { word, timestamp: new Date(iso), url };
}

export function thread(id: string, comments: number): Thread {
  return {
    id,
    title: `Thread ${id}`,
    url: `https://www.reddit.com/r/test/comments/${id}/thread_${id}/`,
    comments,
    createdAt: new Date("2024-03-01T12:00:00Z"),
  };
}

export function silenceConsole(): void {
  jest.spyOn(console, "log").mockImplementation(() => undefined);
  jest.spyOn(console, "warn").mockImplementation(() => undefined);
  jest.spyOn(console, "error").mockImplementation(() => undefined);
}
