import express from 'express';
import { FeedbackController } from '../controllers/feedback.controller';
import { asyncHandler } from '../middleware/error.middleware';

export const createFeedbackRouter = (feedbackController: FeedbackController) => {
  const router = express.Router();

  // Submit a feedback form
  router.post('/', asyncHandler(feedbackController.submitFeedback));
  // List feedback, optionally filtered by category, sentiment and rating range
  router.get('/', asyncHandler(feedbackController.listFeedback));
  // Download the filtered list as CSV or JSON
  router.get('/export', asyncHandler(feedbackController.exportFeedback));
  router.get('/categories', asyncHandler(feedbackController.listCategories));
  router.get('/:id', asyncHandler(feedbackController.getFeedback));

  return router;
};
