import 'dotenv/config';
import { createApp } from './app.js';
import { loadLeadServiceConfig } from '../infrastructure/config.js';
import { createLeadApiClient } from '../infrastructure/lead-api/index.js';
import { logger } from '../infrastructure/logger.js';

async function main(): Promise<void> {
  const config = loadLeadServiceConfig();
  if (!config.ok) {
    logger.fatal({ errorCode: config.error.code, details: config.error.details }, config.error.message);
    process.exit(1);
  }

  const { port, api, polling, reuseWindowDays } = config.value;
  const app = createApp({ api: createLeadApiClient(api), polling, reuseWindowDays });

  app.listen(port, () => {
    logger.info({ port }, 'Lead service API started');
  });
}

main().catch((err) => {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Failed to start server');
  process.exit(1);
});
