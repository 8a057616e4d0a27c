#!/usr/bin/env node
import { loadConfig } from "./config";
import { initializeReddit } from "./reddit";
import { runPipeline } from "./pipeline";
import { DEFAULT_TOP_THREADS, parseThreadCount } from "./collector";
import { PipelineError, describeError } from "./errors";
import {
  listingSorts,
  timeFilters,
  type ListingSort,
  type TimeFilter,
} from "./types/reddit";

function isListingSort(value: string): value is ListingSort {
  return listingSorts.some((sort) => sort === value);
}

function isTimeFilter(value: string): value is TimeFilter {
  return timeFilters.some((filter) => filter === value);
}

function usage(): never {
  console.error(
    "❌ Usage: topic-sentiment [subreddit] [sort] [time_filter] [top_threads]"
  );
  console.error("\nDefaults: iPhone top month", DEFAULT_TOP_THREADS);
  console.error("Sorts:", listingSorts.join(", "));
  console.error("Time filters:", timeFilters.join(", "));
  process.exit(1);
}

const subredditArg = process.argv[2] || "iPhone";
const sortArg = process.argv[3] || "top";
const timeFilterArg = process.argv[4] || "month";
const topThreadsArg = parseThreadCount(process.argv[5]);

if (!/^[A-Za-z0-9_]+$/.test(subredditArg)) {
  console.error(`❌ Invalid subreddit "${subredditArg}"`);
  usage();
}
if (!isListingSort(sortArg)) {
  console.error(`❌ Invalid sort "${sortArg}"`);
  usage();
}
if (!isTimeFilter(timeFilterArg)) {
  console.error(`❌ Invalid time filter "${timeFilterArg}"`);
  usage();
}
if (topThreadsArg === null) {
  console.error(`❌ Invalid thread count "${process.argv[5]}"`);
  usage();
}

async function run(
  sort: ListingSort,
  period: TimeFilter,
  topThreads: number
) {
  console.log(`🚀 Starting Reddit sentiment analysis...`);
  console.log(
    `📊 Settings: Subreddit: r/${subredditArg}, Sort: ${sort}, Time Filter: ${period}, Threads: ${topThreads}`
  );

  const config = loadConfig();
  const reddit = await initializeReddit(config.reddit);

  const report = await runPipeline(
    {
      subreddit: subredditArg,
      sort,
      period,
      topThreads,
    },
    config,
    reddit
  );

  console.log("\n==========================================");
  console.log("  ANALYSIS COMPLETE");
  console.log("==========================================");
  console.log(`Threads used: ${report.threadsUsed} of ${report.threadsFound}`);
  console.log(`Comments scraped: ${report.comments}`);
  console.log(`Tokens generated: ${report.tokens}`);
  console.log(`Sentiment words: ${report.sentimentWords}`);
  console.log(`\nFiles saved in ${report.outputDir}:`);
  report.files.forEach((file) => console.log(`  - ${file}`));
}

run(sortArg, timeFilterArg, topThreadsArg)
  .then(() => process.exit(0))
  .catch((error: unknown) => {
    if (error instanceof PipelineError) {
      console.error(`❌ ${error.name}: ${error.message}`);
    } else {
      console.error("❌ Analysis failed:", describeError(error));
    }
    process.exit(1);
  });
