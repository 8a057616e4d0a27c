export const listingSorts = [
  "hot",
  "new",
  "top",
  "rising",
  "controversial",
] as const;
export type ListingSort = (typeof listingSorts)[number];

export const timeFilters = [
  "hour",
  "day",
  "week",
  "month",
  "year",
  "all",
] as const;
export type TimeFilter = (typeof timeFilters)[number];

export interface Thread {
  id: string;
  title: string;
  url: string; // Full permalink, also used to fetch the comment tree
  comments: number; // Comment count reported by the listing
  createdAt: Date;
}

// A comment exactly as the collector produced it, before normalization
export interface RawComment {
  comment: string | null;
  date: number | string | null; // Epoch seconds or an ISO string
  url: string; // Thread url the comment belongs to
}

export interface Comment {
  readonly text: string;
  readonly timestamp: Date;
  readonly url: string;
}

export interface ThreadSource {
  listThreads(
    subreddit: string,
    sort: ListingSort,
    period: TimeFilter
  ): Promise<Thread[]>;
  fetchThreadComments(thread: Thread): Promise<RawComment[]>;
}
