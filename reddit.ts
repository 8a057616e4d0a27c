import axios from "axios";
import type { AxiosAdapter, AxiosInstance, AxiosResponse } from "axios";
import { z } from "zod";
import type {
  ListingSort,
  RawComment,
  Thread,
  ThreadSource,
  TimeFilter,
} from "./types/reddit";
import { ThreadFetchError, describeError } from "./errors";

const TOKEN_URL = "https://www.reddit.com/api/v1/access_token";
const PUBLIC_BASE_URL = "https://www.reddit.com";
const OAUTH_BASE_URL = "https://oauth.reddit.com";
const PAGE_SIZE = 100;

const childSchema = z.object({
  kind: z.string(),
  data: z.unknown(),
});

const listingSchema = z.object({
  kind: z.literal("Listing"),
  data: z.object({
    after: z.string().nullable().optional(),
    children: z.array(childSchema),
  }),
});

const submissionSchema = z.object({
  id: z.string(),
  title: z.string(),
  permalink: z.string(),
  num_comments: z.number(),
  created_utc: z.number(),
});

const commentSchema = z.object({
  body: z.string().nullable().optional(),
  created_utc: z.number().nullable().optional(),
  replies: z.unknown().optional(),
});

const threadResponseSchema = z.tuple([listingSchema, listingSchema]);

const tokenResponseSchema = z.object({
  access_token: z.string(),
});

type Listing = z.infer<typeof listingSchema>;

export interface RedditClientOptions {
  userAgent: string;
  timeoutMs: number;
  maxPages: number;
  accessToken?: string;
  adapter?: AxiosAdapter; // Swapped out in tests
}

export interface RedditCredentials {
  clientId: string;
  clientSecret: string;
  userAgent: string;
  timeoutMs: number;
  adapter?: AxiosAdapter;
}

async function getAccessToken(
  credentials: RedditCredentials
): Promise<string | null> {
  try {
    const response = await axios.post(
      TOKEN_URL,
      new URLSearchParams({
        grant_type: "client_credentials",
      }),
      {
        auth: {
          username: credentials.clientId,
          password: credentials.clientSecret,
        },
        headers: {
          "User-Agent": credentials.userAgent,
        },
        timeout: credentials.timeoutMs,
        ...(credentials.adapter ? { adapter: credentials.adapter } : {}),
      }
    );

    const parsed = tokenResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      console.error("❌ Token response did not contain an access token");
      return null;
    }

    console.log("✅ Obtained application-only access token");
    return parsed.data.access_token;
  } catch (error) {
    console.error("❌ Failed to get access token:", describeError(error));
    return null;
  }
}

/**
 * Flatten a comment listing depth-first, replies directly after their parent.
 * "more" stubs carry no text and are skipped.
 */
export function flattenCommentListing(
  listing: Listing,
  threadUrl: string
): RawComment[] {
  return listing.data.children.flatMap((child) => {
    if (child.kind !== "t1") return [];

    const parsed = commentSchema.safeParse(child.data);
    if (!parsed.success) return [];

    const comment: RawComment = {
      comment: parsed.data.body ?? null,
      date: parsed.data.created_utc ?? null,
      url: threadUrl,
    };

    const replies = listingSchema.safeParse(parsed.data.replies);
    return replies.success
      ? [comment, ...flattenCommentListing(replies.data, threadUrl)]
      : [comment];
  });
}

export class RedditClient implements ThreadSource {
  private readonly http: AxiosInstance;
  private readonly oauth: boolean;

  constructor(private readonly options: RedditClientOptions) {
    this.oauth = Boolean(options.accessToken);
    this.http = axios.create({
      baseURL: this.oauth ? OAUTH_BASE_URL : PUBLIC_BASE_URL,
      timeout: options.timeoutMs,
      headers: {
        "User-Agent": options.userAgent,
        ...(options.accessToken
          ? { Authorization: `Bearer ${options.accessToken}` }
          : {}),
      },
      // Status codes are checked by the caller
      validateStatus: () => true,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  async listThreads(
    subreddit: string,
    sort: ListingSort,
    period: TimeFilter
  ): Promise<Thread[]> {
    const threads: Thread[] = [];
    let after: string | null = null;

    for (let page = 0; page < this.options.maxPages; page++) {
      const listing = await this.getListing(`/r/${subreddit}/${sort}`, {
        t: period,
        limit: PAGE_SIZE,
        raw_json: 1,
        ...(after ? { after } : {}),
      });

      for (const child of listing.data.children) {
        if (child.kind !== "t3") continue;
        const post = submissionSchema.safeParse(child.data);
        if (!post.success) continue;

        threads.push({
          id: post.data.id,
          title: post.data.title,
          url: `${PUBLIC_BASE_URL}${post.data.permalink}`,
          comments: post.data.num_comments,
          createdAt: new Date(post.data.created_utc * 1000),
        });
      }

      after = listing.data.after ?? null;
      if (!after) break;
    }

    return threads;
  }

  async fetchThreadComments(thread: Thread): Promise<RawComment[]> {
    const permalink = new URL(thread.url).pathname.replace(/\/$/, "");
    const response = await this.request(thread.url, permalink, {
      limit: 500,
      raw_json: 1,
    });

    const parsed = threadResponseSchema.safeParse(response);
    if (!parsed.success) {
      throw new ThreadFetchError("response has no comment listing", thread.url);
    }

    return flattenCommentListing(parsed.data[1], thread.url);
  }

  private async getListing(
    path: string,
    params: Record<string, string | number>
  ): Promise<Listing> {
    const data = await this.request(path, path, params);
    const parsed = listingSchema.safeParse(data);
    if (!parsed.success) {
      throw new ThreadFetchError("response is not a listing", path);
    }
    return parsed.data;
  }

  private async request(
    label: string,
    path: string,
    params: Record<string, string | number>
  ): Promise<unknown> {
    const url = this.oauth ? path : `${path}.json`;

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(url, { params });
    } catch (error) {
      throw new ThreadFetchError(describeError(error), label);
    }

    if (response.status < 200 || response.status >= 300) {
      throw new ThreadFetchError(
        `HTTP ${response.status}`,
        label,
        response.status
      );
    }
    return response.data;
  }
}

export async function initializeReddit(options: {
  clientId?: string;
  clientSecret?: string;
  userAgent: string;
  timeoutMs: number;
  maxPages: number;
  adapter?: AxiosAdapter;
}): Promise<RedditClient> {
  if (!options.clientId || !options.clientSecret) {
    console.log("🌐 No Reddit credentials set, using public JSON endpoints");
    return new RedditClient(options);
  }

  const accessToken = await getAccessToken({
    clientId: options.clientId,
    clientSecret: options.clientSecret,
    userAgent: options.userAgent,
    timeoutMs: options.timeoutMs,
    adapter: options.adapter,
  });
  if (!accessToken) {
    throw new Error("Failed to get access token");
  }

  return new RedditClient({ ...options, accessToken });
}
