import type { AppConfig } from "./config";
import type { ListingSort, ThreadSource, TimeFilter } from "./types/reddit";
import { StructuralError } from "./errors";
import { collectComments, rankThreads, selectTopThreads } from "./collector";
import { normalizeComments } from "./normalize";
import { loadStopwords, tokenizeComments } from "./preprocessing";
import { loadBinaryLexicon, loadEmotionLexicon } from "./lexicon";
import {
  countSentimentWords,
  sentimentByDay,
  summarizeSentiment,
} from "./sentiment";
import { countEmotions } from "./emotions";
import {
  emotionChart,
  sentimentTrendChart,
  topWordsChart,
} from "./charts";
import {
  categoryColumns,
  commentColumns,
  dailyColumns,
  getOutputPath,
  sentimentWordColumns,
  threadColumns,
  tokenColumns,
  writeChart,
  writeRunSummary,
  writeTable,
} from "./storage";

export interface RunSettings {
  subreddit: string;
  sort: ListingSort;
  period: TimeFilter;
  topThreads: number;
}

export interface RunReport {
  outputDir: string;
  threadsFound: number;
  threadsUsed: number;
  comments: number;
  tokens: number;
  sentimentWords: number;
  files: string[];
}

export function filePrefix(subreddit: string): string {
  return `${subreddit.replace(/[^a-zA-Z0-9-_]/g, "_").toLowerCase()}_`;
}

export async function runPipeline(
  settings: RunSettings,
  config: AppConfig,
  source: ThreadSource,
  now: Date = new Date()
): Promise<RunReport> {
  const outputDir = getOutputPath(config.outputDir, settings.subreddit, now);
  const prefix = filePrefix(settings.subreddit);
  const files: string[] = [];

  // 1. Collect
  console.log(
    `🔍 Fetching ${settings.sort} threads from r/${settings.subreddit} (${settings.period})`
  );
  const threads = await source.listThreads(
    settings.subreddit,
    settings.sort,
    settings.period
  );
  console.log(`📊 Total threads found: ${threads.length}`);
  if (threads.length === 0) {
    throw new StructuralError(
      `no threads found in r/${settings.subreddit}`,
      "collect"
    );
  }

  const ranked = rankThreads(threads);
  ranked.slice(0, 10).forEach((thread, index) => {
    console.log(`   ${index + 1}. ${thread.title} (${thread.comments} comments)`);
  });
  const selected = selectTopThreads(ranked, settings.topThreads);
  const raw = await collectComments(source, selected);

  // 2. Normalize
  const comments = normalizeComments(raw);
  console.log(`💬 Total comments scraped: ${comments.length}`);
  files.push(
    await writeTable(
      outputDir,
      `${prefix}comments_raw.csv`,
      commentColumns,
      comments
    )
  );

  // 3. Tokenize
  const stopwords = await loadStopwords(config.stopwordsPath);
  const tokens = tokenizeComments(comments, stopwords);
  console.log(`🔤 Total tokens after cleaning: ${tokens.length}`);
  files.push(
    await writeTable(outputDir, `${prefix}tokens.csv`, tokenColumns, tokens)
  );

  // 4. Sentiment
  const binaryLexicon = await loadBinaryLexicon(config.binaryLexiconPath);
  const sentimentWords = countSentimentWords(tokens, binaryLexicon);
  const sentimentSummary = summarizeSentiment(tokens, binaryLexicon);
  console.log("\n📈 Overall Sentiment Distribution:");
  sentimentSummary.forEach((row) => console.log(`   ${row.sentiment}: ${row.n}`));
  files.push(
    await writeTable(
      outputDir,
      `${prefix}sentiment_words.csv`,
      sentimentWordColumns,
      sentimentWords
    ),
    await writeTable(
      outputDir,
      `${prefix}sentiment_summary.csv`,
      categoryColumns,
      sentimentSummary
    )
  );

  const daily = sentimentByDay(tokens, binaryLexicon);
  console.log("\n📅 Sentiment by Day:");
  daily.slice(0, 6).forEach((row) => {
    console.log(
      `   ${row.day}: total=${row.totalScore} avg=${row.avgScore.toFixed(3)} words=${row.wordCount}`
    );
  });
  files.push(
    await writeTable(
      outputDir,
      `${prefix}sentiment_by_day.csv`,
      dailyColumns,
      daily
    )
  );

  // 5. Emotions
  const emotionLexicon = await loadEmotionLexicon(config.emotionLexiconPath);
  const emotions = countEmotions(tokens, emotionLexicon);
  console.log("\n🎭 Emotion Breakdown:");
  emotions.forEach((row) => console.log(`   ${row.sentiment}: ${row.n}`));
  files.push(
    await writeTable(
      outputDir,
      `${prefix}emotions.csv`,
      categoryColumns,
      emotions
    )
  );

  // 6. Charts and thread metadata
  files.push(
    await writeChart(
      outputDir,
      "top_positive_words.svg",
      topWordsChart(sentimentWords, "positive")
    ),
    await writeChart(
      outputDir,
      "top_negative_words.svg",
      topWordsChart(sentimentWords, "negative")
    ),
    await writeChart(
      outputDir,
      "sentiment_trend.svg",
      sentimentTrendChart(daily, settings.subreddit)
    ),
    await writeChart(
      outputDir,
      "emotion_breakdown.svg",
      emotionChart(emotions)
    ),
    await writeTable(
      outputDir,
      `${prefix}threads_used.csv`,
      threadColumns,
      selected
    )
  );

  const report: RunReport = {
    outputDir,
    threadsFound: threads.length,
    threadsUsed: selected.length,
    comments: comments.length,
    tokens: tokens.length,
    sentimentWords: sentimentSummary.reduce((sum, row) => sum + row.n, 0),
    files,
  };

  files.push(
    await writeRunSummary(outputDir, {
      ...settings,
      completedAt: now.toISOString(),
      threadsFound: report.threadsFound,
      threadsUsed: report.threadsUsed,
      comments: report.comments,
      tokens: report.tokens,
      sentimentWords: report.sentimentWords,
      sentiment: sentimentSummary,
      files: files.map((file) => file.slice(outputDir.length + 1)),
    })
  );

  return report;
}
