import express from 'express';
import { setupOpenAPI } from './openapi/index.js';
import { createLeadRouter } from './routes/leads.js';
import { requestLogger } from './middleware/request-logger.js';
import { errorHandler } from './middleware/error-handler.js';
import type { LeadServiceDeps } from '../services/lead/index.js';

export function createApp(deps: LeadServiceDeps): express.Express {
  const app = express();

  app.use(express.json({ limit: '1mb' }));
  app.use(requestLogger);

  setupOpenAPI(app);

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(createLeadRouter(deps));

  app.use(errorHandler);

  return app;
}
