import fs from 'fs/promises';
import path from 'path';
import { loadConfig } from './config/index.js';
import { createApp } from './app.js';
import { ConfigError } from './utils/errors.js';
import type { AppConfig } from './schemas/config.js';

async function ensureLogsDirectory(logFile: string | undefined): Promise<void> {
  if (!logFile) return;
  await fs.mkdir(path.dirname(logFile), { recursive: true });
}

async function main(): Promise<void> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error('❌ Invalid configuration:');
      for (const issue of error.issues) {
        console.error(`   - ${issue}`);
      }
      process.exit(1);
    }
    throw error;
  }

  await ensureLogsDirectory(config.logging.logFile);

  const app = createApp(config);
  const { logger, api } = app;

  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}, shutting down`);
    api.stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        const errorMessage = error instanceof Error ? error.message : 'Unknown error';
        logger.error('Shutdown failed', { error: errorMessage });
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await api.start();
  logger.info('SocketSentry is running', {
    perPortTimeoutMs: config.scanner.perPortTimeoutMs,
    totalBudgetMs: config.scanner.totalBudgetMs,
    maxConcurrency: config.scanner.maxConcurrency,
  });
}

main().catch((error: unknown) => {
  const errorMessage = error instanceof Error ? error.message : 'Unknown error';
  console.error('❌ Error:', errorMessage);
  process.exit(1);
});
