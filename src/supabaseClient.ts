import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { ApplicationLedger, LedgerStats } from './ledger/applicationLedger';
import type { ApplicationOutcome, OutcomeStatus } from './types';
import logger from './utils/logger';

const TABLE = 'applied_jobs';

/**
 * Ledger over the `applied_jobs` table. A job id is inserted at most once per
 * status; `hasApplied` looks for a successful row.
 */
export class SupabaseLedger implements ApplicationLedger {
  readonly name = 'supabase';
  private client: SupabaseClient;

  constructor(supabaseUrl: string, supabaseKey: string) {
    this.client = createClient(supabaseUrl, supabaseKey);
    logger.info('Supabase client initialized');
  }

  private async hasRow(jobId: string, status: OutcomeStatus): Promise<boolean> {
    const { data, error } = await this.client.from(TABLE).select('id').eq('job_id', jobId).eq('status', status).limit(1);

    if (error) {
      logger.error('Error checking applied_jobs:', error);
      throw error;
    }
    return (data?.length || 0) > 0;
  }

  private async countRows(status: OutcomeStatus | OutcomeStatus[]): Promise<number> {
    const statuses = Array.isArray(status) ? status : [status];
    const { count, error } = await this.client.from(TABLE).select('id', { count: 'exact', head: true }).in('status', statuses);

    if (error) {
      logger.error('Error counting applied_jobs:', error);
      throw error;
    }
    return count ?? 0;
  }

  /**
   * Log an outcome to the applied_jobs table
   */
  async recordOutcome(outcome: ApplicationOutcome): Promise<void> {
    const { job, status } = outcome;
    try {
      if (await this.hasRow(job.id, status)) {
        logger.info(`Job ID ${job.id} already logged as ${status}`);
        return;
      }

      const { error } = await this.client.from(TABLE).insert({
        job_id: job.id,
        job_title: job.title,
        company_name: job.company,
        job_url: job.url ?? null,
        status,
        reason: outcome.reason,
        applied_at: outcome.timestamp,
      });

      if (error) {
        logger.error('Error logging application:', error);
        throw error;
      }

      logger.info(`Logged ${status} application for job: ${job.title} at ${job.company}`);
    } catch (error) {
      logger.error('Failed to log application:', error);
      throw error;
    }
  }

  /**
   * Check if a job has already been applied to successfully
   */
  async hasApplied(jobId: string): Promise<boolean> {
    try {
      return await this.hasRow(jobId, 'success');
    } catch (error) {
      logger.error('Failed to check if job already applied:', error);
      throw error;
    }
  }

  /**
   * Get application statistics
   */
  async stats(): Promise<LedgerStats> {
    try {
      return {
        successful: await this.countRows('success'),
        failed: await this.countRows(['failure', 'incomplete']),
      };
    } catch (error) {
      logger.error('Failed to get application stats:', error);
      throw error;
    }
  }
}
