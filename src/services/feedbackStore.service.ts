import { FilterQuery } from 'mongoose';
import { Counter, Feedback } from '../models';
import { IFeedback } from '../models/Feedback';
import { FeedbackRecord, NewFeedback, Sentiment } from '../types/feedback.types';
import { StoreError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('feedback-store');

const FEEDBACK_SEQUENCE = 'feedback';

/**
 * Persistence for feedback records.
 *
 * Reads are fail-soft: an engine failure is logged and yields an empty list.
 * Writes are fail-loud: a failed insert rejects with a StoreError.
 * Every list is ordered newest first, ties broken by the higher id.
 */
export interface FeedbackStore {
  initialize(): Promise<void>;
  insert(feedback: NewFeedback): Promise<number>;
  findById(id: number): Promise<FeedbackRecord | null>;
  listAll(): Promise<FeedbackRecord[]>;
  listByCategory(category: string): Promise<FeedbackRecord[]>;
  listBySentiment(sentiment: Sentiment): Promise<FeedbackRecord[]>;
  listByRatingRange(minRating: number, maxRating: number): Promise<FeedbackRecord[]>;
}

export function newestFirst(a: FeedbackRecord, b: FeedbackRecord): number {
  return b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id;
}

interface FeedbackDoc {
  feedbackId: number;
  userName: string;
  email?: string | null;
  category: string;
  rating: number;
  message: string;
  sentiment: Sentiment;
  summary: string;
  aiResponse: string;
  recommendations?: string | null;
  createdAt: Date;
}

function toRecord(doc: FeedbackDoc): FeedbackRecord {
  return {
    id: doc.feedbackId,
    userName: doc.userName,
    ...(doc.email ? { email: doc.email } : {}),
    category: doc.category,
    rating: doc.rating,
    message: doc.message,
    sentiment: doc.sentiment,
    summary: doc.summary,
    aiResponse: doc.aiResponse,
    ...(doc.recommendations ? { recommendations: doc.recommendations } : {}),
    createdAt: new Date(doc.createdAt),
  };
}

/**
 * MongoDB-backed store. Integer ids come from an atomic `$inc` on a counter
 * document; each record is a single-document write.
 */
export class MongoFeedbackStore implements FeedbackStore {
  async initialize(): Promise<void> {
    await Feedback.createCollection();
    await Counter.createCollection();
    await Feedback.syncIndexes();
    logger.info('Feedback collection ready');
  }

  async insert(feedback: NewFeedback): Promise<number> {
    try {
      const counter = await Counter.findOneAndUpdate(
        { _id: FEEDBACK_SEQUENCE },
        { $inc: { seq: 1 } },
        { new: true, upsert: true }
      ).lean();
      if (!counter) {
        throw new Error('Sequence counter was not returned');
      }

      await Feedback.create({
        ...feedback,
        feedbackId: counter.seq,
        createdAt: new Date(),
      });

      logger.info('Feedback stored', { id: counter.seq, category: feedback.category });
      return counter.seq;
    } catch (error) {
      logger.error('Failed to store feedback', {
        error: error instanceof Error ? error.message : String(error),
      });
      throw new StoreError('Failed to store feedback', error);
    }
  }

  async findById(id: number): Promise<FeedbackRecord | null> {
    const [record] = await this.list({ feedbackId: id });
    return record ?? null;
  }

  listAll(): Promise<FeedbackRecord[]> {
    return this.list({});
  }

  listByCategory(category: string): Promise<FeedbackRecord[]> {
    return this.list({ category });
  }

  listBySentiment(sentiment: Sentiment): Promise<FeedbackRecord[]> {
    return this.list({ sentiment });
  }

  listByRatingRange(minRating: number, maxRating: number): Promise<FeedbackRecord[]> {
    return this.list({ rating: { $gte: minRating, $lte: maxRating } });
  }

  private async list(filter: FilterQuery<IFeedback>): Promise<FeedbackRecord[]> {
    try {
      const docs = await Feedback.find(filter)
        .sort({ createdAt: -1, feedbackId: -1 })
        .lean<FeedbackDoc[]>();
      return docs.map(toRecord);
    } catch (error) {
      logger.error('Feedback read failed, returning no records', {
        filter,
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }
  }
}

/**
 * Process-local store. Contents do not survive a restart.
 */
export class InMemoryFeedbackStore implements FeedbackStore {
  private records: FeedbackRecord[] = [];
  private nextId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async initialize(): Promise<void> {
    logger.info('Using in-memory feedback store');
  }

  async insert(feedback: NewFeedback): Promise<number> {
    const id = this.nextId++;
    this.records.push({ ...feedback, id, createdAt: this.now() });
    return id;
  }

  async findById(id: number): Promise<FeedbackRecord | null> {
    const record = this.records.find((item) => item.id === id);
    return record ? { ...record } : null;
  }

  async listAll(): Promise<FeedbackRecord[]> {
    return this.list(() => true);
  }

  async listByCategory(category: string): Promise<FeedbackRecord[]> {
    return this.list((record) => record.category === category);
  }

  async listBySentiment(sentiment: Sentiment): Promise<FeedbackRecord[]> {
    return this.list((record) => record.sentiment === sentiment);
  }

  async listByRatingRange(minRating: number, maxRating: number): Promise<FeedbackRecord[]> {
    return this.list((record) => record.rating >= minRating && record.rating <= maxRating);
  }

  private list(predicate: (record: FeedbackRecord) => boolean): FeedbackRecord[] {
    return this.records
      .filter(predicate)
      .map((record) => ({ ...record }))
      .sort(newestFirst);
  }
}
