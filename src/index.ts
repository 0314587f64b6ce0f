#!/usr/bin/env node

import 'dotenv/config';
import { PlaywrightApplicationRunner } from './applicationRunner';
import { AutoApplyWorker } from './autoApplyWorker';
import { loadConfig } from './config/env';
import { createServices } from './services';
import { runSystemCheck } from './systemCheck';
import logger from './utils/logger';

function argValue(args: string[], name: string): string | undefined {
  return args.find((arg) => arg.startsWith(`${name}=`))?.split('=')[1];
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  try {
    logger.info('Starting Apply Wizard');
    const config = loadConfig();
    const services = createServices(config);

    if (args.includes('--check')) {
      const results = await runSystemCheck(config, services);
      process.exit(results.every((result) => result.ok) ? 0 : 1);
    }

    if (args.includes('--stats')) {
      const stats = await services.ledger.stats();
      logger.info(`Applications: ${stats.successful} successful, ${stats.failed} failed (${services.ledger.name} ledger)`);
      process.exit(0);
    }

    const runner = new PlaywrightApplicationRunner({
      config,
      store: services.store,
      oracle: services.oracle,
      coverLetters: services.coverLetters,
      ledger: services.ledger,
    });
    const worker = new AutoApplyWorker({
      config: config.worker,
      jobsFile: config.paths.jobsFile,
      ledger: services.ledger,
      runner,
    });

    const jobId = argValue(args, '--job-id');
    if (args.includes('--manual') || jobId) {
      logger.info('Running in manual mode');
      const summary = await worker.runBatch(jobId);
      logger.info(`Run summary: ${JSON.stringify({ ...summary, results: undefined })}`);
      process.exit(0);
    }

    const shutdown = async (signal: string): Promise<void> => {
      logger.info(`Received ${signal}, shutting down gracefully...`);
      worker.stopScheduler();
      try {
        await runner.close();
      } catch (error) {
        logger.error('Error closing the browser during shutdown:', error);
      }
      process.exit(0);
    };
    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));

    worker.startScheduler();
    logger.info('Apply Wizard is running. Press Ctrl+C to stop.');
  } catch (error) {
    logger.error('Failed to start Apply Wizard:', error);
    process.exit(1);
  }
}

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception:', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason, promise) => {
  logger.error('Unhandled Rejection at:', promise, 'reason:', reason);
  process.exit(1);
});

void main();
