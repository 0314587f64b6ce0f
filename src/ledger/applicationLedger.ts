import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { ApplicationOutcome } from '../types';
import logger from '../utils/logger';

export interface LedgerStats {
  successful: number;
  failed: number;
}

/**
 * Where outcomes are recorded. Each job id appears at most once per ledger,
 * however many times it is reported.
 */
export interface ApplicationLedger {
  readonly name: string;
  recordOutcome(outcome: ApplicationOutcome): Promise<void>;
  /** True once the job has been applied to successfully. */
  hasApplied(jobId: string): Promise<boolean>;
  stats(): Promise<LedgerStats>;
}

const idListSchema = z.array(z.union([z.string(), z.number()]).transform((id) => String(id)));

const archiveEntrySchema = z.object({
  job_id: z.union([z.string(), z.number()]).transform((id) => String(id)),
  title: z.string(),
  company: z.string(),
  description: z.string(),
  timestamp: z.string(),
});

type ArchiveEntry = z.infer<typeof archiveEntrySchema>;

export const SUCCESSFUL_FILE = 'successful_applications.json';
export const FAILED_FILE = 'failed_applications.json';
export const ARCHIVE_FILE = 'job_descriptions_applied.json';

/**
 * JSON files under the data directory: two id lists (successful, failed) and
 * a write-once archive of the descriptions of jobs applied to. Incomplete
 * outcomes go to the failed list. Unreadable files count as empty.
 */
export class JsonFileLedger implements ApplicationLedger {
  readonly name = 'file';

  constructor(private readonly dataDir: string) {}

  private filePath(file: string): string {
    return path.join(this.dataDir, file);
  }

  private readList<T>(file: string, schema: z.ZodType<T[], z.ZodTypeDef, unknown>): T[] {
    const filePath = this.filePath(file);
    if (!fs.existsSync(filePath)) {
      return [];
    }
    try {
      const parsed = schema.safeParse(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
      if (parsed.success) {
        return parsed.data;
      }
      logger.warn(`${filePath} has an unexpected shape, starting it over`);
    } catch (error) {
      logger.warn(`Error reading ${filePath}, starting it over:`, error);
    }
    return [];
  }

  private writeJson(file: string, data: unknown): void {
    fs.mkdirSync(this.dataDir, { recursive: true });
    fs.writeFileSync(this.filePath(file), JSON.stringify(data, null, 2));
  }

  private appendId(file: string, jobId: string): void {
    const ids = this.readList(file, idListSchema);
    if (ids.includes(jobId)) {
      logger.info(`Job ID ${jobId} already in ${file}`);
      return;
    }
    ids.push(jobId);
    this.writeJson(file, ids);
    logger.info(`Added job ID ${jobId} to ${file} (total: ${ids.length})`);
  }

  private archiveDescription(outcome: ApplicationOutcome): void {
    const entries = this.readList(ARCHIVE_FILE, z.array(archiveEntrySchema));
    const { job } = outcome;
    if (entries.some((entry) => entry.job_id === job.id)) {
      logger.info(`Job description for ID ${job.id} already saved`);
      return;
    }
    const entry: ArchiveEntry = {
      job_id: job.id,
      title: job.title,
      company: job.company,
      description: job.description,
      timestamp: outcome.timestamp,
    };
    entries.push(entry);
    this.writeJson(ARCHIVE_FILE, entries);
    logger.info(`Saved job description for ${job.title} at ${job.company} (ID: ${job.id})`);
  }

  async recordOutcome(outcome: ApplicationOutcome): Promise<void> {
    if (outcome.status === 'success') {
      this.appendId(SUCCESSFUL_FILE, outcome.job.id);
      this.archiveDescription(outcome);
    } else {
      this.appendId(FAILED_FILE, outcome.job.id);
    }
  }

  async hasApplied(jobId: string): Promise<boolean> {
    return this.readList(SUCCESSFUL_FILE, idListSchema).includes(jobId);
  }

  async stats(): Promise<LedgerStats> {
    return {
      successful: this.readList(SUCCESSFUL_FILE, idListSchema).length,
      failed: this.readList(FAILED_FILE, idListSchema).length,
    };
  }
}
