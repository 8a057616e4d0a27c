import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== "" ? value : undefined));

const configSchema = z.object({
  REDDIT_CLIENT_ID: optionalString,
  REDDIT_CLIENT_SECRET: optionalString,
  USER_AGENT: z.string().min(1).default("topic-sentiment/0.1"),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  LISTING_MAX_PAGES: z.coerce.number().int().positive().default(10),
  BINARY_LEXICON_PATH: z.string().min(1).default("data/lexicons/binary.csv"),
  EMOTION_LEXICON_PATH: z.string().min(1).default("data/lexicons/emotions.csv"),
  STOPWORDS_PATH: z.string().min(1).default("data/stopwords.txt"),
  OUTPUT_DIR: z.string().min(1).default("output"),
});

export interface AppConfig {
  reddit: {
    clientId?: string;
    clientSecret?: string;
    userAgent: string;
    timeoutMs: number;
    maxPages: number;
  };
  binaryLexiconPath: string;
  emotionLexiconPath: string;
  stopwordsPath: string;
  outputDir: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const cfg = parsed.data;
  return {
    reddit: {
      clientId: cfg.REDDIT_CLIENT_ID,
      clientSecret: cfg.REDDIT_CLIENT_SECRET,
      userAgent: cfg.USER_AGENT,
      timeoutMs: cfg.REQUEST_TIMEOUT_MS,
      maxPages: cfg.LISTING_MAX_PAGES,
    },
    binaryLexiconPath: cfg.BINARY_LEXICON_PATH,
    emotionLexiconPath: cfg.EMOTION_LEXICON_PATH,
    stopwordsPath: cfg.STOPWORDS_PATH,
    outputDir: cfg.OUTPUT_DIR,
  };
}
