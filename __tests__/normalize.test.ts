import { normalizeComments, parseTimestamp } from "../normalize";
import { StructuralError } from "../errors";

const URL_A = "https://www.reddit.com/r/test/comments/a/";

describe("parseTimestamp", () => {
  it("reads epoch seconds as numbers or numeric strings", () => {
    expect(parseTimestamp(1709251200)?.toISOString()).toBe(
      "2024-03-01T00:00:00.000Z"
    );
    expect(parseTimestamp("1709251200")?.toISOString()).toBe(
      "2024-03-01T00:00:00.000Z"
    );
  });

  it("reads ISO dates", () => {
    expect(parseTimestamp("2024-03-02")?.toISOString()).toBe(
      "2024-03-02T00:00:00.000Z"
    );
  });

  it("returns null for missing or invalid values", () => {
    expect(parseTimestamp(null)).toBeNull();
    expect(parseTimestamp(undefined)).toBeNull();
    expect(parseTimestamp("not a date")).toBeNull();
  });
});

describe("normalizeComments", () => {
  it("drops rows without text and keeps only text, timestamp and url", () => {
    const comments = normalizeComments([
      { comment: "Battery is great", date: 1709251200, url: URL_A, score: 12 },
      { comment: null, date: 1709251200, url: URL_A },
      { comment: "", date: 1709251200, url: URL_A },
      { comment: "   ", date: 1709251200, url: URL_A },
      { comment: "No date here", date: "not a date", url: URL_A },
      { comment: "Second day", date: "2024-03-02", url: URL_A },
    ]);

    expect(comments).toEqual([
      {
        text: "Battery is great",
        timestamp: new Date("2024-03-01T00:00:00Z"),
        url: URL_A,
      },
      {
        text: "Second day",
        timestamp: new Date("2024-03-02T00:00:00Z"),
        url: URL_A,
      },
    ]);
  });

  it("fails when nothing was collected", () => {
    expect(() => normalizeComments([])).toThrow(StructuralError);
  });

  it("fails when a required field is missing from every row", () => {
    expect(() =>
      normalizeComments([
        { comment: "hello", date: 1709251200 },
        { comment: "world", date: 1709251200 },
      ])
    ).toThrow("normalize: input has no url field");
  });

  it("fails when no row has usable text", () => {
    expect(() =>
      normalizeComments([
        { comment: null, date: 1709251200, url: URL_A },
        { comment: " ", date: 1709251200, url: URL_A },
      ])
    ).toThrow(StructuralError);
  });
});
