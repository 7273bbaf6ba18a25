import { Request, Response } from 'express';
import { z } from 'zod';
import { FeedbackService } from '../services/feedback.service';
import { buildDashboard, filterByDateRange } from '../services/analytics.service';
import { ValidationError } from '../utils/errors';

const dashboardQuerySchema = z.object({
  days: z.coerce.number().int().positive().optional()
});

export const createAnalyticsController = (feedbackService: FeedbackService) => ({
  getDashboard: async (req: Request, res: Response) => {
    const parsed = dashboardQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      throw new ValidationError('Invalid dashboard query', [
        { path: 'days', message: 'days must be a positive integer' }
      ]);
    }

    const all = await feedbackService.fetchAll();
    const { days } = parsed.data;
    const records = days === undefined ? all : filterByDateRange(all, days);

    res.json({
      ...(days !== undefined ? { days } : {}),
      ...buildDashboard(records)
    });
  }
});

export type AnalyticsController = ReturnType<typeof createAnalyticsController>;
