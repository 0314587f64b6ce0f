import * as fs from 'fs';
import cron, { type ScheduledTask } from 'node-cron';
import { z } from 'zod';
import { toJobContext, type ApplicationRunner } from './applicationRunner';
import type { AppConfig } from './config/env';
import { describeError } from './errors';
import type { ApplicationLedger } from './ledger/applicationLedger';
import type { ApplicationOutcome, ApplicationResult, QueuedJob, RunSummary } from './types';
import logger from './utils/logger';

const queuedJobSchema = z.object({
  id: z.union([z.string(), z.number()]).transform((id) => String(id)),
  title: z.string(),
  company: z.string(),
  description: z.string().default(''),
  location: z.string().default(''),
  url: z.string().url(),
});

const jobQueueSchema = z.array(queuedJobSchema);

/**
 * Read the job queue file. A missing or invalid file is logged and yields an
 * empty queue.
 */
export function loadJobQueue(filePath: string): QueuedJob[] {
  if (!fs.existsSync(filePath)) {
    logger.warn(`No jobs file at ${filePath}`);
    return [];
  }
  try {
    const parsed = jobQueueSchema.safeParse(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      logger.error(`Jobs file ${filePath} is invalid:\n${issues.join('\n')}`);
      return [];
    }
    return parsed.data;
  } catch (error) {
    logger.error(`Error reading jobs file ${filePath}:`, error);
    return [];
  }
}

export type JobFilters = Pick<AppConfig['worker'], 'blacklistedCompanies' | 'skipKeywords'>;

/** Reason a job is excluded, or null when it passes the filters. */
export function exclusionReason(job: QueuedJob, filters: JobFilters): string | null {
  const company = job.company.toLowerCase();
  const blacklisted = filters.blacklistedCompanies.find((name) => company.includes(name));
  if (blacklisted) {
    return `Blacklisted company: ${job.company}`;
  }
  const text = `${job.title} ${job.description}`.toLowerCase();
  const keyword = filters.skipKeywords.find((word) => text.includes(word));
  if (keyword) {
    return `Skip keyword "${keyword}"`;
  }
  return null;
}

export interface AutoApplyWorkerDeps {
  config: AppConfig['worker'];
  jobsFile: string;
  ledger: ApplicationLedger;
  runner: ApplicationRunner;
  delay?: (ms: number) => Promise<void>;
  random?: () => number;
}

function resultFor(job: QueuedJob, status: ApplicationResult['status'], reason?: string): ApplicationResult {
  return { success: status === 'success', jobId: job.id, jobTitle: job.title, companyName: job.company, status, reason };
}

export class AutoApplyWorker {
  private isRunning = false;
  private task: ScheduledTask | null = null;
  private readonly delay: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(private readonly deps: AutoApplyWorkerDeps) {
    this.delay = deps.delay ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.random = deps.random ?? Math.random;
  }

  get running(): boolean {
    return this.isRunning;
  }

  /**
   * Start the cron job scheduler
   */
  startScheduler(): void {
    if (this.task) {
      return;
    }
    const interval = this.deps.config.cronIntervalMinutes;
    const cronExpression = `*/${interval} * * * *`;
    logger.info(`Starting auto-apply scheduler with interval: ${interval} minutes`);

    this.task = cron.schedule(cronExpression, async () => {
      if (this.isRunning) {
        logger.info('Previous run still in progress, skipping this iteration');
        return;
      }
      await this.runBatch();
    });

    logger.info('Auto-apply scheduler started');
  }

  /**
   * Stop the scheduler
   */
  stopScheduler(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      logger.info('Auto-apply scheduler stopped');
    }
  }

  private async pendingJobs(summary: RunSummary, onlyJobId?: string): Promise<QueuedJob[]> {
    let jobs = loadJobQueue(this.deps.jobsFile);
    if (onlyJobId) {
      jobs = jobs.filter((job) => job.id === onlyJobId);
      if (jobs.length === 0) {
        logger.error(`No queued job with ID: ${onlyJobId}`);
        return [];
      }
    }

    const pending: QueuedJob[] = [];
    for (const job of jobs) {
      const excluded = exclusionReason(job, this.deps.config);
      if (excluded) {
        logger.info(`Skipping ${job.title} at ${job.company}: ${excluded}`);
        summary.skipped += 1;
        summary.results.push(resultFor(job, 'skipped', excluded));
      } else if (await this.deps.ledger.hasApplied(job.id)) {
        logger.info(`Already applied to ${job.title} at ${job.company}`);
        summary.skipped += 1;
        summary.results.push(resultFor(job, 'duplicate', 'Already applied'));
      } else {
        pending.push(job);
      }
    }
    return pending.slice(0, this.deps.config.maxApplicationsPerRun);
  }

  private tally(summary: RunSummary, job: QueuedJob, outcome: ApplicationOutcome): void {
    summary.attempted += 1;
    if (outcome.status === 'success') {
      summary.succeeded += 1;
    } else if (outcome.status === 'incomplete') {
      summary.incomplete += 1;
    } else {
      summary.failed += 1;
    }
    summary.results.push(resultFor(job, outcome.status, outcome.reason));
  }

  private async recordCrash(job: QueuedJob, error: unknown): Promise<ApplicationOutcome> {
    const outcome: ApplicationOutcome = {
      status: 'failure',
      reason: describeError(error),
      timestamp: new Date().toISOString(),
      job: toJobContext(job),
      cause: 'driver-error',
      steps: 0,
    };
    try {
      await this.deps.ledger.recordOutcome(outcome);
    } catch (ledgerError) {
      logger.error(`Failed to record outcome for job ${job.id}:`, ledgerError);
    }
    return outcome;
  }

  /**
   * Apply to the queued jobs that pass the filters, one at a time
   */
  async runBatch(onlyJobId?: string): Promise<RunSummary> {
    const summary: RunSummary = { attempted: 0, succeeded: 0, failed: 0, incomplete: 0, skipped: 0, results: [] };
    this.isRunning = true;
    const startTime = Date.now();
    let opened = false;

    try {
      logger.info('Starting auto-apply run');
      const jobs = await this.pendingJobs(summary, onlyJobId);
      if (jobs.length === 0) {
        logger.info('No jobs to apply to');
        return summary;
      }

      logger.info(`Applying to ${jobs.length} jobs`);
      await this.deps.runner.open();
      opened = true;

      for (const [index, job] of jobs.entries()) {
        try {
          this.tally(summary, job, await this.deps.runner.apply(job));
        } catch (error) {
          logger.error(`Error applying to job ${job.title}:`, error);
          this.tally(summary, job, await this.recordCrash(job, error));
        }

        if (index < jobs.length - 1) {
          await this.delay(2000 + this.random() * 3000);
        }
      }

      logger.info(
        `Auto-apply run completed in ${Date.now() - startTime}ms: ${summary.succeeded} applied, ${summary.failed} failed, ${summary.incomplete} incomplete, ${summary.skipped} skipped`,
      );
    } catch (error) {
      logger.error('Error in auto-apply run:', error);
    } finally {
      if (opened) {
        try {
          await this.deps.runner.close();
        } catch (error) {
          logger.error('Error closing the browser after the run:', error);
        }
      }
      this.isRunning = false;
    }
    return summary;
  }
}
