import { z } from 'zod';
import {
  FEEDBACK_CATEGORIES,
  FeedbackFilter,
  FeedbackRecord,
  MAX_RATING,
  MIN_MESSAGE_LENGTH,
  MIN_RATING,
  SubmitFeedbackInput,
} from '../types/feedback.types';
import { NotFoundError, ValidationError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { EnrichmentService } from './enrichment.service';
import { FeedbackStore } from './feedbackStore.service';

const logger = createLogger('feedback');

export const clampRating = (rating: number): number =>
  Math.min(MAX_RATING, Math.max(MIN_RATING, Math.round(rating)));

const submissionSchema = z.object({
  userName: z.string({ required_error: 'Name is required' }).trim().min(1, 'Name is required'),
  email: z
    .string()
    .trim()
    .optional()
    .transform((value) => value || undefined)
    .pipe(z.string().email('Invalid email address').optional()),
  category: z.enum(FEEDBACK_CATEGORIES, {
    errorMap: () => ({ message: `Category must be one of: ${FEEDBACK_CATEGORIES.join(', ')}` }),
  }),
  rating: z
    .union([z.number(), z.string().trim().min(1, 'Rating is required')], {
      errorMap: () => ({ message: 'Rating is required' }),
    })
    .pipe(z.coerce.number({ invalid_type_error: 'Rating must be a number' }).finite('Rating must be a number'))
    .transform(clampRating),
  message: z
    .string({ required_error: 'Feedback message is required' })
    .trim()
    .min(MIN_MESSAGE_LENGTH, `Feedback must be at least ${MIN_MESSAGE_LENGTH} characters long`),
});

/**
 * Validates a raw submission. Throws ValidationError listing every failing
 * field.
 */
export function parseSubmission(body: unknown): SubmitFeedbackInput {
  const parsed = submissionSchema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError(
      'Invalid feedback submission',
      parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }
  return parsed.data;
}

function matches(record: FeedbackRecord, filter: FeedbackFilter): boolean {
  const { categories, sentiments, minRating = MIN_RATING, maxRating = MAX_RATING } = filter;
  return (
    (!categories?.length || categories.includes(record.category)) &&
    (!sentiments?.length || sentiments.includes(record.sentiment)) &&
    record.rating >= minRating &&
    record.rating <= maxRating
  );
}

/**
 * Entry point for the presentation layer: submission and record retrieval.
 */
export class FeedbackService {
  constructor(
    private readonly store: FeedbackStore,
    private readonly enrichment: EnrichmentService,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Validate, enrich and persist one submission. Validation failures reject
   * before any gateway call; enrichment failures never reject; store write
   * failures do.
   */
  async submit(body: unknown): Promise<FeedbackRecord> {
    const input = parseSubmission(body);
    const enrichment = await this.enrichment.enrich(input.message, input.category);

    const id = await this.store.insert({
      userName: input.userName,
      ...(input.email ? { email: input.email } : {}),
      category: input.category,
      rating: input.rating,
      message: input.message,
      sentiment: enrichment.sentiment,
      summary: enrichment.summary,
      aiResponse: enrichment.aiResponse,
      recommendations: enrichment.recommendations,
    });

    const stored = await this.store.findById(id);
    if (stored) return stored;

    // Reads are fail-soft, so a just-written record may not come back.
    logger.warn('Stored feedback could not be read back', { id });
    return {
      id,
      userName: input.userName,
      ...(input.email ? { email: input.email } : {}),
      category: input.category,
      rating: input.rating,
      message: input.message,
      ...enrichment,
      createdAt: this.now(),
    };
  }

  fetchAll(): Promise<FeedbackRecord[]> {
    return this.store.listAll();
  }

  async fetchFiltered(filter: FeedbackFilter): Promise<FeedbackRecord[]> {
    const { categories, sentiments, minRating, maxRating } = filter;

    let base: FeedbackRecord[];
    if (categories?.length === 1) {
      base = await this.store.listByCategory(categories[0]);
    } else if (sentiments?.length === 1) {
      base = await this.store.listBySentiment(sentiments[0]);
    } else if (minRating !== undefined || maxRating !== undefined) {
      base = await this.store.listByRatingRange(minRating ?? MIN_RATING, maxRating ?? MAX_RATING);
    } else {
      base = await this.store.listAll();
    }

    return base.filter((record) => matches(record, filter));
  }

  async fetchById(id: number): Promise<FeedbackRecord> {
    const record = await this.store.findById(id);
    if (!record) {
      throw new NotFoundError(`Feedback ${id} not found`);
    }
    return record;
  }
}
