// Checks that the provider credential is present and accepted.
// Usage: npm run build && npm run check-key
import 'dotenv/config';
import { loadConfig } from '../config';
import { createGateway } from '../services/llmGateway.service';
import { createLogger } from '../utils/logger';

const logger = createLogger('check-api-key');

async function checkApiKey(): Promise<boolean> {
  const config = loadConfig();
  const gateway = createGateway(config.llm);

  if (!gateway.isConfigured) {
    logger.error('API key not configured', { provider: config.llm.provider });
    return false;
  }
  logger.info('API key found', {
    provider: config.llm.provider,
    model: config.llm.model,
    keyLength: config.llm.apiKey?.length ?? 0,
  });

  const result = await gateway.testConnection();
  if (!result.ok) {
    logger.error('API connection failed', { kind: result.error.kind, error: result.error.message });
    return false;
  }

  logger.info('API connection successful');
  return true;
}

checkApiKey()
  .then((ok) => {
    process.exitCode = ok ? 0 : 1;
  })
  .catch((error: unknown) => {
    logger.error('API key check crashed', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exitCode = 1;
  });
