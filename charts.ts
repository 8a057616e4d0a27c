import * as d3 from "d3";
import { format, parseISO } from "date-fns";
import type {
  CategoryCount,
  DailyScore,
  SentimentWordCount,
  BinarySentiment,
} from "./types/sentiment";

export interface ChartSize {
  width: number;
  height: number;
}

export interface BarDatum {
  label: string;
  value: number;
}

export const BAR_CHART_SIZE: ChartSize = { width: 800, height: 600 };
export const TREND_CHART_SIZE: ChartSize = { width: 1000, height: 500 };

export const COLORS = {
  positive: "#2ecc71",
  negative: "#e74c3c",
  trend: "#3498db",
  emotion: "#9b59b6",
  zeroLine: "#7f7f7f",
  grid: "#ebebeb",
  text: "#333333",
} as const;

const MARGIN = { top: 50, right: 30, bottom: 50, left: 130 };

function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function round(value: number): number {
  return Math.round(value * 100) / 100;
}

function svgDocument(size: ChartSize, title: string, body: string[]): string {
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${size.width}" height="${size.height}" viewBox="0 0 ${size.width} ${size.height}" font-family="Helvetica, Arial, sans-serif">`,
    `<rect width="${size.width}" height="${size.height}" fill="#ffffff"/>`,
    `<text x="${MARGIN.left}" y="30" font-size="18" fill="${COLORS.text}">${escapeXml(title)}</text>`,
    ...body,
    "</svg>",
    "",
  ].join("\n");
}

function emptyNotice(size: ChartSize): string {
  return `<text x="${size.width / 2}" y="${size.height / 2}" text-anchor="middle" font-size="14" fill="${COLORS.text}">No data</text>`;
}

/**
 * Horizontal bar chart, largest value at the top
 */
export function renderBarChart(options: {
  title: string;
  data: readonly BarDatum[];
  color: string;
  axisLabel: string;
  size?: ChartSize;
}): string {
  const size = options.size ?? BAR_CHART_SIZE;
  if (options.data.length === 0) {
    return svgDocument(size, options.title, [emptyNotice(size)]);
  }

  const data = [...options.data].sort((a, b) => b.value - a.value);
  const x = d3
    .scaleLinear()
    .domain([0, d3.max(data, (d) => d.value) ?? 1])
    .nice()
    .range([MARGIN.left, size.width - MARGIN.right]);
  const y = d3
    .scaleBand<string>()
    .domain(data.map((d) => d.label))
    .range([MARGIN.top, size.height - MARGIN.bottom])
    .padding(0.15);

  const bottom = size.height - MARGIN.bottom;
  const grid = x
    .ticks(5)
    .map(
      (tick) =>
        `<line x1="${round(x(tick))}" x2="${round(x(tick))}" y1="${MARGIN.top}" y2="${bottom}" stroke="${COLORS.grid}"/>` +
        `<text x="${round(x(tick))}" y="${bottom + 18}" text-anchor="middle" font-size="11" fill="${COLORS.text}">${tick}</text>`
    );

  const bars = data.map((d) => {
    const top = y(d.label) ?? 0;
    const middle = round(top + y.bandwidth() / 2);
    return (
      `<rect x="${MARGIN.left}" y="${round(top)}" width="${round(x(d.value) - MARGIN.left)}" height="${round(y.bandwidth())}" fill="${options.color}"/>` +
      `<text x="${MARGIN.left - 6}" y="${middle}" dy="0.35em" text-anchor="end" font-size="11" fill="${COLORS.text}">${escapeXml(d.label)}</text>`
    );
  });

  const axisLabel = `<text x="${round((MARGIN.left + size.width - MARGIN.right) / 2)}" y="${size.height - 12}" text-anchor="middle" font-size="12" fill="${COLORS.text}">${escapeXml(options.axisLabel)}</text>`;

  return svgDocument(size, options.title, [...grid, ...bars, axisLabel]);
}

/**
 * Daily average score as a line, with a dashed reference line at zero
 */
export function renderTrendChart(options: {
  title: string;
  data: readonly DailyScore[];
  size?: ChartSize;
}): string {
  const size = options.size ?? TREND_CHART_SIZE;
  if (options.data.length === 0) {
    return svgDocument(size, options.title, [emptyNotice(size)]);
  }

  const points = options.data.map((d) => ({
    date: parseISO(d.day),
    value: d.avgScore,
  }));
  const dates = points.map((p) => p.date);
  const low = Math.min(0, d3.min(points, (p) => p.value) ?? 0);
  const high = Math.max(0, d3.max(points, (p) => p.value) ?? 0);

  const x = d3
    .scaleTime()
    .domain([d3.min(dates) ?? dates[0], d3.max(dates) ?? dates[0]])
    .range([MARGIN.left, size.width - MARGIN.right]);
  const y = d3
    .scaleLinear()
    .domain(low === high ? [-1, 1] : [low, high])
    .nice()
    .range([size.height - MARGIN.bottom, MARGIN.top]);

  const line = d3
    .line<{ date: Date; value: number }>()
    .x((p) => round(x(p.date)))
    .y((p) => round(y(p.value)));

  const bottom = size.height - MARGIN.bottom;
  const yTicks = y
    .ticks(5)
    .map(
      (tick) =>
        `<line x1="${MARGIN.left}" x2="${size.width - MARGIN.right}" y1="${round(y(tick))}" y2="${round(y(tick))}" stroke="${COLORS.grid}"/>` +
        `<text x="${MARGIN.left - 6}" y="${round(y(tick))}" dy="0.35em" text-anchor="end" font-size="11" fill="${COLORS.text}">${y.tickFormat(5)(tick)}</text>`
    );
  const xTicks = x
    .ticks(Math.min(8, points.length))
    .map(
      (tick) =>
        `<text x="${round(x(tick))}" y="${bottom + 18}" text-anchor="middle" font-size="11" fill="${COLORS.text}">${format(tick, "MMM dd")}</text>`
    );

  const zero = `<line x1="${MARGIN.left}" x2="${size.width - MARGIN.right}" y1="${round(y(0))}" y2="${round(y(0))}" stroke="${COLORS.zeroLine}" stroke-dasharray="6 4"/>`;
  const path = `<path d="${line(points) ?? ""}" fill="none" stroke="${COLORS.trend}" stroke-width="2"/>`;
  const markers = points.map(
    (p) =>
      `<circle cx="${round(x(p.date))}" cy="${round(y(p.value))}" r="3" fill="${COLORS.trend}"/>`
  );
  const labels = [
    `<text x="${round((MARGIN.left + size.width - MARGIN.right) / 2)}" y="${size.height - 12}" text-anchor="middle" font-size="12" fill="${COLORS.text}">Date</text>`,
    `<text transform="translate(16 ${round(size.height / 2)}) rotate(-90)" text-anchor="middle" font-size="12" fill="${COLORS.text}">Average Sentiment Score</text>`,
  ];

  return svgDocument(size, options.title, [
    ...yTicks,
    ...xTicks,
    zero,
    path,
    ...markers,
    ...labels,
  ]);
}

export function topWordsChart(
  words: readonly SentimentWordCount[],
  sentiment: BinarySentiment,
  limit = 20
): string {
  const label = sentiment === "positive" ? "Positive" : "Negative";
  return renderBarChart({
    title: `Top ${limit} ${label} Words`,
    data: words
      .filter((w) => w.sentiment === sentiment)
      .slice(0, limit)
      .map((w) => ({ label: w.word, value: w.n })),
    color: COLORS[sentiment],
    axisLabel: "Count",
  });
}

export function sentimentTrendChart(
  daily: readonly DailyScore[],
  subreddit: string
): string {
  return renderTrendChart({
    title: `Daily Sentiment Trend - r/${subreddit}`,
    data: daily,
  });
}

export function emotionChart(emotions: readonly CategoryCount[]): string {
  return renderBarChart({
    title: "Emotion Breakdown",
    data: emotions.map((e) => ({ label: e.sentiment, value: e.n })),
    color: COLORS.emotion,
    axisLabel: "Word Count",
  });
}
