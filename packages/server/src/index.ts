import 'dotenv/config';
import { env } from './config/env.js';
import { createLogger } from './config/logger.js';
import { createApp } from './app.js';

const logger = createLogger('server');
const app = createApp();

const server = app.listen(env.PORT, () => {
  logger.info(
    { port: env.PORT, env: env.NODE_ENV, model: env.LLM_MODEL },
    'Server started',
  );
});

const shutdown = () => {
  logger.info('Shutting down gracefully...');
  server.close(() => {
    process.exit(0);
  });
};

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
