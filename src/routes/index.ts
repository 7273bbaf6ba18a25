import express from 'express';
import { createFeedbackController } from '../controllers/feedback.controller';
import { createAnalyticsController } from '../controllers/analytics.controller';
import { FeedbackService } from '../services/feedback.service';
import { createFeedbackRouter } from './feedback.routes';
import { createAnalyticsRouter } from './analytics.routes';

export const createApiRouter = (feedbackService: FeedbackService) => {
  const router = express.Router();

  // Mount all routes
  router.use('/feedback', createFeedbackRouter(createFeedbackController(feedbackService)));
  router.use('/analytics', createAnalyticsRouter(createAnalyticsController(feedbackService)));

  return router;
};
