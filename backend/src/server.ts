import 'dotenv/config';
import { createServer } from 'node:http';
import { createServerAdapter } from '@whatwg-node/server';
import { readConfig, createEnv } from './config';
import { createRouter } from './index';
import { initializeFirstAdmin } from './services/userService';
import { peekCurrentNumber } from './services/numberingService';
import { logger } from './utils/logger';

async function main(): Promise<void> {
  const config = readConfig();
  const env = createEnv(config);

  await initializeFirstAdmin(config.adminEmail, env);

  const router = createRouter(config.allowedOrigins);
  const adapter = createServerAdapter((request: Request) => router.fetch(request, env));
  const server = createServer(adapter);

  server.listen(config.port, () => {
    logger.info(`Policy docket API listening on port ${config.port}`);
    logger.info(`Database: ${config.databasePath}; last ${config.documentPrefix} number issued: ${peekCurrentNumber(env)}`);
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    server.close(() => {
      env.DB.close();
      process.exit(0);
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  logger.error('Failed to start server:', error);
  process.exit(1);
});
