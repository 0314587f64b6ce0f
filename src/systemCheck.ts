import * as fs from 'fs';
import { loadJobQueue } from './autoApplyWorker';
import type { AppConfig } from './config/env';
import type { Services } from './services';
import logger from './utils/logger';

export interface CheckResult {
  name: string;
  ok: boolean;
  detail: string;
}

/**
 * Check the answers file, the job queue, the ledger and OpenAI connectivity.
 * Resolves with one result per check; nothing here throws.
 */
export async function runSystemCheck(config: AppConfig, services: Services): Promise<CheckResult[]> {
  const results: CheckResult[] = [];
  const report = (name: string, ok: boolean, detail: string): void => {
    results.push({ name, ok, detail });
    if (ok) {
      logger.info(`✅ ${name}: ${detail}`);
    } else {
      logger.error(`❌ ${name}: ${detail}`);
    }
  };

  logger.info('🧪 Running system check...');

  report('Answers', true, `${services.store.size} stored answers in ${config.paths.answersFile}`);

  if (fs.existsSync(config.paths.jobsFile)) {
    report('Job queue', true, `${loadJobQueue(config.paths.jobsFile).length} valid jobs in ${config.paths.jobsFile}`);
  } else {
    report('Job queue', false, `${config.paths.jobsFile} does not exist`);
  }

  try {
    const stats = await services.ledger.stats();
    report('Ledger', true, `${services.ledger.name}: ${stats.successful} successful, ${stats.failed} failed`);
  } catch (error) {
    report('Ledger', false, `${services.ledger.name} ledger is not reachable`);
    logger.error('Ledger check failed:', error);
  }

  if (config.paths.cvPath) {
    report('CV', fs.existsSync(config.paths.cvPath), config.paths.cvPath);
  }

  if (services.openai) {
    report('OpenAI', await services.openai.ping(), `model ${config.openai.model}`);
  } else if (config.oracleMode !== 'human') {
    report('OpenAI', false, 'OPENAI_API_KEY is not set');
  }

  const failed = results.filter((result) => !result.ok).length;
  logger.info(failed === 0 ? '🎉 All checks passed' : `${failed} check(s) failed`);
  return results;
}
