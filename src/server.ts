import 'dotenv/config';
import { createApp } from './app';
import { loadConfig } from './config';
import connectDB, { disconnectDB } from './config/database';
import { EnrichmentService } from './services/enrichment.service';
import { FeedbackService } from './services/feedback.service';
import {
  FeedbackStore,
  InMemoryFeedbackStore,
  MongoFeedbackStore,
} from './services/feedbackStore.service';
import { createGateway } from './services/llmGateway.service';
import { appLogger } from './utils/logger';

async function main(): Promise<void> {
  const config = loadConfig();

  const gateway = createGateway(config.llm);
  if (!gateway.isConfigured) {
    appLogger.warn('No API key configured for the language-model provider; AI enrichment will use fallback values', {
      provider: config.llm.provider,
      variable: config.llm.provider === 'anthropic' ? 'ANTHROPIC_API_KEY' : 'PERPLEXITY_API_KEY',
    });
  }

  let store: FeedbackStore;
  if (config.store === 'mongo') {
    await connectDB(config.mongoUri);
    store = new MongoFeedbackStore();
  } else {
    store = new InMemoryFeedbackStore();
  }
  await store.initialize();

  const feedbackService = new FeedbackService(store, new EnrichmentService(gateway));
  const app = createApp({ feedbackService, gateway, corsOrigins: config.corsOrigins });

  const server = app.listen(config.port, () => {
    appLogger.info(`Server is running on port ${config.port}`, { store: config.store });
  });

  const shutdown = (signal: string) => {
    appLogger.info('Shutting down', { signal });
    server.close(() => {
      const done = config.store === 'mongo' ? disconnectDB() : Promise.resolve();
      done
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          appLogger.error('Error during shutdown', {
            error: error instanceof Error ? error.message : String(error),
          });
          process.exit(1);
        });
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  appLogger.error('Failed to start server', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
