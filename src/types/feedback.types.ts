export const SENTIMENTS = ['positive', 'negative', 'neutral'] as const;

export type Sentiment = (typeof SENTIMENTS)[number];

export const FEEDBACK_CATEGORIES = [
  'General Feedback',
  'Feature Request',
  'Bug Report',
  'Performance',
  'UI/UX',
  'Documentation',
  'Customer Service',
  'Other',
] as const;

export type FeedbackCategory = (typeof FEEDBACK_CATEGORIES)[number];

export const MIN_RATING = 1;
export const MAX_RATING = 5;
export const MIN_MESSAGE_LENGTH = 10;

export interface FeedbackRecord {
  id: number;
  userName: string;
  email?: string;
  category: string;
  rating: number;
  message: string;
  sentiment: Sentiment;
  summary: string;
  aiResponse: string;
  recommendations?: string;
  createdAt: Date;
}

/** A record as handed to the store, before id and createdAt are assigned. */
export type NewFeedback = Omit<FeedbackRecord, 'id' | 'createdAt'>;

export interface Enrichment {
  sentiment: Sentiment;
  summary: string;
  aiResponse: string;
  recommendations: string;
}

export interface SubmitFeedbackInput {
  userName: string;
  email?: string;
  category: string;
  rating: number;
  message: string;
}

export interface FeedbackFilter {
  categories?: string[];
  sentiments?: Sentiment[];
  minRating?: number;
  maxRating?: number;
}
