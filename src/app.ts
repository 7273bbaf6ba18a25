import express from 'express';
import cors from 'cors';
import { createApiRouter } from './routes';
import { asyncHandler, errorHandler, notFoundHandler } from './middleware/error.middleware';
import { FeedbackService } from './services/feedback.service';
import { LLMGateway } from './types/llm.types';
import { createLogger } from './utils/logger';

const logger = createLogger('app');

export interface AppDependencies {
  feedbackService: FeedbackService;
  gateway: LLMGateway;
  corsOrigins?: string[];
}

export function createApp({ feedbackService, gateway, corsOrigins = [] }: AppDependencies) {
  const app = express();

  app.use(cors({
    origin: function(origin, callback) {
      // Requests with no origin (curl, server-to-server) are always allowed
      if (!origin || corsOrigins.length === 0 || corsOrigins.includes(origin)) {
        callback(null, true);
      } else {
        logger.warn('CORS blocked for origin', { origin });
        callback(null, false);
      }
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Origin', 'Accept'],
    exposedHeaders: ['Content-Disposition'],
    maxAge: 86400
  }));
  app.use(express.json({ limit: '100kb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      time: new Date().toISOString(),
      aiEnabled: gateway.isConfigured,
      provider: gateway.provider
    });
  });

  // Live round-trip to the language-model provider
  app.get('/health/ai', asyncHandler(async (_req, res) => {
    const result = await gateway.testConnection();
    if (result.ok) {
      res.json({ ok: true, provider: gateway.provider });
    } else {
      res.status(503).json({ ok: false, provider: gateway.provider, error: result.error.kind, message: result.error.message });
    }
  }));

  app.use('/api', createApiRouter(feedbackService));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
