import * as fs from 'fs';
import * as path from 'path';
import cron, { type ScheduledTask } from 'node-cron';
import logger from '../utils/logger';

/** Anything that can write the browser's cookies and local storage to a file. */
export interface StorageStateSource {
  saveStorageState(filePath: string): Promise<void>;
}

const THROTTLE_SLACK_MS = 1000;

export interface SessionSaver {
  saveNow(force?: boolean): Promise<boolean>;
}

/** Cron expression firing every `seconds` (6-field, seconds first). */
export function cronExpressionForSeconds(seconds: number): string {
  if (seconds < 60) {
    return `*/${Math.max(1, Math.floor(seconds))} * * * * *`;
  }
  const minutes = Math.min(59, Math.max(1, Math.round(seconds / 60)));
  return `0 */${minutes} * * * *`;
}

/**
 * Owns the periodic save of the browser session. Non-forced saves are
 * throttled to one per interval and skipped while another save is running;
 * forced saves wait for the running save and then write again.
 */
export class SessionPersistence implements SessionSaver {
  private lastSavedAt: number | null = null;
  private inFlight: Promise<boolean> | null = null;
  private task: ScheduledTask | null = null;

  constructor(
    private readonly source: StorageStateSource,
    private readonly filePath: string,
    private readonly intervalSeconds: number,
    private readonly now: () => number = Date.now,
  ) {}

  private async write(startedAt: number): Promise<boolean> {
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      await this.source.saveStorageState(this.filePath);
      this.lastSavedAt = startedAt;
      logger.debug(`Session state saved to ${this.filePath}`);
      return true;
    } catch (error) {
      logger.error(`Error saving session state to ${this.filePath}:`, error);
      return false;
    }
  }

  async saveNow(force = false): Promise<boolean> {
    if (this.inFlight) {
      if (!force) {
        logger.debug('Session save already running, skipping');
        return false;
      }
      await this.inFlight;
    }

    const startedAt = this.now();
    if (!force && this.lastSavedAt !== null && startedAt - this.lastSavedAt < this.intervalSeconds * 1000 - THROTTLE_SLACK_MS) {
      return false;
    }

    const save = this.write(startedAt);
    this.inFlight = save;
    try {
      return await save;
    } finally {
      if (this.inFlight === save) {
        this.inFlight = null;
      }
    }
  }

  /**
   * Start the periodic save
   */
  start(): void {
    if (this.task) {
      return;
    }
    const expression = cronExpressionForSeconds(this.intervalSeconds);
    this.task = cron.schedule(expression, async () => {
      await this.saveNow(false);
    });
    logger.info(`Session persistence started (${expression})`);
  }

  /**
   * Stop the periodic save
   */
  stop(): void {
    if (!this.task) {
      return;
    }
    this.task.stop();
    this.task = null;
    logger.info('Session persistence stopped');
  }

  get running(): boolean {
    return this.task !== null;
  }
}
