import { env } from './config/env.js';
import { logger } from './utils/logger.js';
import { createApp } from './app.js';

const app = createApp();

const server = app.listen(Number(env.PORT), () => {
  logger.info('Server started', { port: env.PORT, prediction_api: env.PREDICTION_API_BASE_URL });
});

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    logger.info('Shutting down', { signal });
    server.close(() => process.exit(0));
  });
}
