import express from 'express';
import cors from 'cors';
import { env } from './config/env.js';
import { createV1Routes } from './routes/v1/index.js';
import { apiRateLimit } from './middleware/rateLimit.js';
import { auditLogger } from './middleware/audit.js';
import { errorHandler } from './middleware/errorHandler.js';
import { requestContext } from './middleware/requestContext.js';
import { responseWrapper } from './middleware/responseWrapper.js';
import { createRouteMetricMiddleware } from './observability/metrics.js';
import { createTraceMiddleware } from './observability/telemetry.js';
import { createModelHealthService, type ModelHealthService } from './services/modelHealth/modelHealthService.js';

export interface AppDependencies {
  modelHealthService?: ModelHealthService;
}

export function createApp(dependencies: AppDependencies = {}) {
  const app = express();
  const modelHealthService = dependencies.modelHealthService ?? createModelHealthService(env);

  app.use(requestContext);
  app.use(responseWrapper);

  // Credentials are only allowed for the configured dashboard origin.
  app.use(cors(env.FRONTEND_URL
    ? { origin: env.FRONTEND_URL, credentials: true }
    : { origin: true }));

  app.use(express.json());
  app.use(createTraceMiddleware());
  app.use(apiRateLimit);
  app.use(auditLogger);
  app.use(createRouteMetricMiddleware());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/v1', createV1Routes(modelHealthService));

  app.use((_req, res) => {
    res.status(404).json({ error: { code: 'NOT_FOUND', message: 'Route not found' } });
  });

  app.use(errorHandler);

  return app;
}
