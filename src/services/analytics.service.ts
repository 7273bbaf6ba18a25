import { FeedbackRecord, SENTIMENTS, Sentiment } from '../types/feedback.types';

export type RatingValue = 1 | 2 | 3 | 4 | 5;

export const RATING_VALUES: readonly RatingValue[] = [1, 2, 3, 4, 5];

export type RatingDistribution = Record<RatingValue, number>;

export interface LabelCount {
  label: string;
  count: number;
}

export type SentimentByRating = Record<RatingValue, Record<Sentiment, number>>;

export interface FeedbackStats {
  total: number;
  averageRating: number;
  positiveCount: number;
  negativeCount: number;
  neutralCount: number;
}

export interface Dashboard {
  stats: FeedbackStats;
  satisfactionRate: number;
  ratingDistribution: RatingDistribution;
  sentimentBreakdown: LabelCount[];
  categoryBreakdown: LabelCount[];
  averageRatingByCategory: Record<string, number>;
  sentimentByRating: SentimentByRating;
  recent: FeedbackRecord[];
}

const DAY_MS = 24 * 60 * 60 * 1000;

function isRatingValue(value: number): value is RatingValue {
  return (RATING_VALUES as readonly number[]).includes(value);
}

function emptyDistribution(): RatingDistribution {
  return { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 };
}

/**
 * Counts occurrences and orders them by descending count. Equal counts keep
 * the order in which the labels were first seen.
 */
function countBy(records: FeedbackRecord[], key: (record: FeedbackRecord) => string): LabelCount[] {
  const counts = new Map<string, number>();
  for (const record of records) {
    const label = key(record);
    counts.set(label, (counts.get(label) ?? 0) + 1);
  }
  return Array.from(counts, ([label, count]) => ({ label, count })).sort(
    (a, b) => b.count - a.count
  );
}

export function ratingDistribution(records: FeedbackRecord[]): RatingDistribution {
  const distribution = emptyDistribution();
  for (const { rating } of records) {
    if (isRatingValue(rating)) {
      distribution[rating] += 1;
    }
  }
  return distribution;
}

export function sentimentBreakdown(records: FeedbackRecord[]): LabelCount[] {
  return countBy(records, (record) => record.sentiment);
}

export function categoryBreakdown(records: FeedbackRecord[], topN?: number): LabelCount[] {
  const counts = countBy(records, (record) => record.category);
  return topN === undefined ? counts : counts.slice(0, Math.max(0, topN));
}

export function topCategories(records: FeedbackRecord[], n = 5): Record<string, number> {
  return Object.fromEntries(
    categoryBreakdown(records, n).map(({ label, count }) => [label, count])
  );
}

export function averageRatingByCategory(records: FeedbackRecord[]): Record<string, number> {
  const totals = new Map<string, { sum: number; count: number }>();
  for (const { category, rating } of records) {
    const entry = totals.get(category) ?? { sum: 0, count: 0 };
    entry.sum += rating;
    entry.count += 1;
    totals.set(category, entry);
  }
  return Object.fromEntries(
    Array.from(totals, ([category, { sum, count }]) => [category, sum / count])
  );
}

export function sentimentByRating(records: FeedbackRecord[]): SentimentByRating {
  const row = (): Record<Sentiment, number> => ({ positive: 0, negative: 0, neutral: 0 });
  const table: SentimentByRating = { 1: row(), 2: row(), 3: row(), 4: row(), 5: row() };
  for (const { rating, sentiment } of records) {
    if (isRatingValue(rating) && SENTIMENTS.includes(sentiment)) {
      table[rating][sentiment] += 1;
    }
  }
  return table;
}

/**
 * Percentage (0-100) of records rated 4 or 5.
 */
export function satisfactionRate(records: FeedbackRecord[]): number {
  if (records.length === 0) return 0;
  const satisfied = records.filter((record) => record.rating >= 4).length;
  return (satisfied / records.length) * 100;
}

export function filterByDateRange(
  records: FeedbackRecord[],
  days = 30,
  now: Date = new Date()
): FeedbackRecord[] {
  const cutoff = now.getTime() - days * DAY_MS;
  return records.filter((record) => record.createdAt.getTime() >= cutoff);
}

export function calculateStats(records: FeedbackRecord[]): FeedbackStats {
  if (records.length === 0) {
    return { total: 0, averageRating: 0, positiveCount: 0, negativeCount: 0, neutralCount: 0 };
  }

  const bySentiment = (sentiment: Sentiment) =>
    records.filter((record) => record.sentiment === sentiment).length;

  return {
    total: records.length,
    averageRating: records.reduce((sum, record) => sum + record.rating, 0) / records.length,
    positiveCount: bySentiment('positive'),
    negativeCount: bySentiment('negative'),
    neutralCount: bySentiment('neutral'),
  };
}

/** Records are assumed newest first, as every store list returns them. */
export function recentFeedback(records: FeedbackRecord[], n = 10): FeedbackRecord[] {
  return records.slice(0, n);
}

export function buildDashboard(records: FeedbackRecord[]): Dashboard {
  return {
    stats: calculateStats(records),
    satisfactionRate: satisfactionRate(records),
    ratingDistribution: ratingDistribution(records),
    sentimentBreakdown: sentimentBreakdown(records),
    categoryBreakdown: categoryBreakdown(records),
    averageRatingByCategory: averageRatingByCategory(records),
    sentimentByRating: sentimentByRating(records),
    recent: recentFeedback(records),
  };
}
