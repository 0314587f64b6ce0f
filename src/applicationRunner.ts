import type { AnswerOracle } from './answers/answerOracle';
import type { AnswerStore } from './answers/answerStore';
import type { CoverLetterGenerator } from './answers/coverLetterGenerator';
import { createApplicationWizard } from './apply/applicationWizard';
import type { AppConfig } from './config/env';
import type { ApplicationLedger } from './ledger/applicationLedger';
import { PlaywrightBrowser } from './playwrightBrowser';
import { SessionPersistence } from './session/sessionPersistence';
import type { ApplicationOutcome, JobContext, QueuedJob } from './types';
import logger from './utils/logger';

/** Opens a browser once per batch and applies to queued jobs one at a time. */
export interface ApplicationRunner {
  open(): Promise<void>;
  apply(job: QueuedJob): Promise<ApplicationOutcome>;
  close(): Promise<void>;
}

export function toJobContext(job: QueuedJob): JobContext {
  return {
    id: job.id,
    title: job.title,
    company: job.company,
    description: job.description,
    location: job.location,
    url: job.url,
    entryAlreadyTriggered: false,
  };
}

export interface PlaywrightRunnerOptions {
  config: AppConfig;
  store: AnswerStore;
  oracle: AnswerOracle;
  coverLetters: CoverLetterGenerator;
  ledger: ApplicationLedger;
}

export class PlaywrightApplicationRunner implements ApplicationRunner {
  private browser: PlaywrightBrowser | null = null;
  private session: SessionPersistence | null = null;

  constructor(private readonly options: PlaywrightRunnerOptions) {}

  async open(): Promise<void> {
    const { config } = this.options;
    const browser = new PlaywrightBrowser(config.browser, config.paths.sessionState);
    await browser.initialize();
    this.browser = browser;

    this.session = new SessionPersistence(browser, config.paths.sessionState, config.sessionSaveIntervalSeconds);
    this.session.start();
  }

  async apply(job: QueuedJob): Promise<ApplicationOutcome> {
    if (!this.browser) {
      throw new Error('Runner not opened');
    }
    await this.browser.openJob(job.url);

    const { config, store, oracle, coverLetters, ledger } = this.options;
    const wizard = createApplicationWizard({
      driver: this.browser.driver,
      store,
      oracle,
      coverLetters,
      ledger,
      session: this.session ?? undefined,
      limits: config.wizard,
    });
    return wizard.startApplication(toJobContext(job));
  }

  async close(): Promise<void> {
    if (this.session) {
      this.session.stop();
      await this.session.saveNow(true);
      this.session = null;
    }
    if (this.browser) {
      await this.browser.cleanup();
      this.browser = null;
    }
    logger.info('Application runner closed');
  }
}
