import { Request, Response } from 'express';
import { z } from 'zod';
import { FeedbackService } from '../services/feedback.service';
import { exportCsv, exportJson } from '../services/export.service';
import {
  FEEDBACK_CATEGORIES,
  FeedbackFilter,
  MAX_RATING,
  MIN_RATING,
  SENTIMENTS,
} from '../types/feedback.types';
import { ValidationError } from '../utils/errors';

// ?sentiment=positive&sentiment=neutral and ?sentiment=positive,neutral both work
const multiValue = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform((value) =>
    value === undefined
      ? undefined
      : (Array.isArray(value) ? value : value.split(','))
          .map((item) => item.trim())
          .filter(Boolean)
  );

const ratingBound = z.coerce.number().int().min(MIN_RATING).max(MAX_RATING).optional();

const filterQuerySchema = z
  .object({
    category: multiValue,
    sentiment: multiValue.pipe(z.array(z.enum(SENTIMENTS)).optional()),
    minRating: ratingBound,
    maxRating: ratingBound,
  })
  .refine(
    ({ minRating, maxRating }) =>
      minRating === undefined || maxRating === undefined || minRating <= maxRating,
    { message: 'minRating must be <= maxRating', path: ['minRating'] }
  );

const idParamSchema = z.object({ id: z.coerce.number().int().positive() });

const exportQuerySchema = z.object({ format: z.enum(['csv', 'json']).default('csv') });

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, value: unknown, message: string): z.infer<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(
      message,
      parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    );
  }
  return parsed.data;
}

export function parseFilter(query: unknown): FeedbackFilter {
  const { category, sentiment, minRating, maxRating } = parseOrThrow(
    filterQuerySchema,
    query,
    'Invalid filter'
  );
  return {
    ...(category?.length ? { categories: category } : {}),
    ...(sentiment?.length ? { sentiments: sentiment } : {}),
    ...(minRating !== undefined ? { minRating } : {}),
    ...(maxRating !== undefined ? { maxRating } : {}),
  };
}

export const createFeedbackController = (feedbackService: FeedbackService) => ({
  submitFeedback: async (req: Request, res: Response) => {
    const record = await feedbackService.submit(req.body);
    res.status(201).json({
      message: 'Thank you for your feedback!',
      feedback: record
    });
  },

  listFeedback: async (req: Request, res: Response) => {
    const filter = parseFilter(req.query);
    const [records, all] = await Promise.all([
      feedbackService.fetchFiltered(filter),
      feedbackService.fetchAll()
    ]);
    res.json({ total: all.length, count: records.length, feedback: records });
  },

  getFeedback: async (req: Request, res: Response) => {
    const { id } = parseOrThrow(idParamSchema, req.params, 'Invalid feedback id');
    res.json(await feedbackService.fetchById(id));
  },

  exportFeedback: async (req: Request, res: Response) => {
    const { format } = parseOrThrow(exportQuerySchema, { format: req.query.format }, 'Invalid export format');
    const records = await feedbackService.fetchFiltered(parseFilter(req.query));

    if (format === 'json') {
      res.attachment('feedback_export.json').type('application/json').send(exportJson(records));
      return;
    }
    res.attachment('feedback_export.csv').type('text/csv').send(exportCsv(records));
  },

  listCategories: async (_req: Request, res: Response) => {
    res.json({ categories: FEEDBACK_CATEGORIES });
  }
});

export type FeedbackController = ReturnType<typeof createFeedbackController>;
