import express from 'express';
import { AnalyticsController } from '../controllers/analytics.controller';
import { asyncHandler } from '../middleware/error.middleware';

export const createAnalyticsRouter = (analyticsController: AnalyticsController) => {
  const router = express.Router();

  router.get('/dashboard', asyncHandler(analyticsController.getDashboard));

  return router;
};
