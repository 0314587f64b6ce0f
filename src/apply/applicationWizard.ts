import { createHash } from 'crypto';
import type { AnswerOracle } from '../answers/answerOracle';
import type { AnswerRules } from '../answers/answerRules';
import type { AnswerStore } from '../answers/answerStore';
import type { CoverLetterGenerator } from '../answers/coverLetterGenerator';
import { describeError } from '../errors';
import type { ApplicationLedger } from '../ledger/applicationLedger';
import type { SessionSaver } from '../session/sessionPersistence';
import type { ApplicationOutcome, ElementSet, FailureCause, JobContext, OutcomeStatus, UiDriver } from '../types';
import logger from '../utils/logger';
import { escalatingClick } from './clickStrategies';
import { EmergencyExit, type ExitProcedure } from './emergencyExit';
import { createFieldProcessors } from './fieldProcessors';
import { FormStepProcessor, type StepProcessor } from './formStepProcessor';
import { DEFAULT_SELECTORS, type WizardSelectors } from './selectors';

export interface WizardLimits {
  maxSteps: number;
  duplicateThreshold: number;
  stuckThreshold: number;
}

export interface WizardTimings {
  renderWaitMs: number;
  stepSettleMs: number;
  afterContinueMs: number;
  afterAlternateMs: number;
  afterSubmitMs: number;
  afterDoneMs: number;
}

export const DEFAULT_LIMITS: WizardLimits = { maxSteps: 8, duplicateThreshold: 2, stuckThreshold: 5 };

export const DEFAULT_TIMINGS: WizardTimings = {
  renderWaitMs: 1500,
  stepSettleMs: 800,
  afterContinueMs: 1500,
  afterAlternateMs: 2000,
  afterSubmitMs: 2000,
  afterDoneMs: 1000,
};

export interface ApplicationWizardDeps {
  driver: UiDriver;
  store: AnswerStore;
  stepProcessor: StepProcessor;
  exit?: ExitProcedure;
  ledger?: ApplicationLedger;
  session?: SessionSaver;
  selectors?: WizardSelectors;
  limits?: Partial<WizardLimits>;
  timings?: Partial<WizardTimings>;
  clock?: () => Date;
}

type Advance = 'clicked' | 'failed' | 'none-found';

interface AttemptState {
  stepCount: number;
}

export function stepFingerprint(html: string): string {
  return createHash('sha1').update(html).digest('hex');
}

function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return '';
  }
}

/**
 * Drives one multi-step application form from its entry control to a
 * terminal outcome. Each iteration checks the form is still open, compares
 * the step against the previous one, fills the fields, then submits or moves
 * on. Unrecoverable states close the form through the emergency exit first.
 * `startApplication` never rejects.
 */
export class ApplicationWizard {
  private readonly driver: UiDriver;
  private readonly store: AnswerStore;
  private readonly stepProcessor: StepProcessor;
  private readonly exit: ExitProcedure;
  private readonly ledger?: ApplicationLedger;
  private readonly session?: SessionSaver;
  private readonly selectors: WizardSelectors;
  private readonly limits: WizardLimits;
  private readonly timings: WizardTimings;
  private readonly clock: () => Date;

  constructor(deps: ApplicationWizardDeps) {
    this.driver = deps.driver;
    this.store = deps.store;
    this.stepProcessor = deps.stepProcessor;
    this.selectors = deps.selectors ?? DEFAULT_SELECTORS;
    this.exit = deps.exit ?? new EmergencyExit(deps.driver, this.selectors);
    this.ledger = deps.ledger;
    this.session = deps.session;
    this.limits = { ...DEFAULT_LIMITS, ...deps.limits };
    this.timings = { ...DEFAULT_TIMINGS, ...deps.timings };
    this.clock = deps.clock ?? (() => new Date());
  }

  async startApplication(job: JobContext): Promise<ApplicationOutcome> {
    logger.info(`Starting application for ${job.title} at ${job.company} (ID: ${job.id})`);
    const state: AttemptState = { stepCount: 0 };

    let outcome: ApplicationOutcome;
    try {
      outcome = await this.run(job, state);
    } catch (error) {
      logger.error('Error during application process:', error);
      outcome = await this.abort(job, state.stepCount, describeError(error), 'driver-error');
    }

    logger.info(`Application ${outcome.status} for ${job.title} at ${job.company}: ${outcome.reason}`);
    await this.record(outcome);
    return outcome;
  }

  private outcome(job: JobContext, status: OutcomeStatus, reason: string, steps: number, cause?: FailureCause): ApplicationOutcome {
    return { status, reason, timestamp: this.clock().toISOString(), job, cause, steps };
  }

  private async runExit(): Promise<boolean> {
    try {
      return await this.exit.run();
    } catch (error) {
      logger.error('Emergency exit threw:', error);
      return false;
    }
  }

  /** Close the form, then fail with the exit result appended to the reason. */
  private async abort(job: JobContext, steps: number, reason: string, cause: FailureCause): Promise<ApplicationOutcome> {
    const closed = await this.runExit();
    const detail = closed ? 'form closed' : 'form may still be open';
    return this.outcome(job, 'failure', `${reason} (emergency exit: ${detail})`, steps, cause);
  }

  private async record(outcome: ApplicationOutcome): Promise<void> {
    if (this.ledger) {
      try {
        await this.ledger.recordOutcome(outcome);
      } catch (error) {
        logger.error(`Failed to record outcome for job ${outcome.job.id}:`, error);
      }
    }
    if (this.session) {
      try {
        await this.session.saveNow(true);
      } catch (error) {
        logger.error('Failed to save session after outcome:', error);
      }
    }
  }

  private async wait(ms: number): Promise<void> {
    if (ms > 0) {
      await this.driver.waitForTimeout(ms);
    }
  }

  private async run(job: JobContext, state: AttemptState): Promise<ApplicationOutcome> {
    const startHost = hostOf(this.driver.currentUrl());

    if (job.entryAlreadyTriggered) {
      await this.wait(this.timings.renderWaitMs);
    } else {
      const entry = this.driver.locate(this.selectors.entry);
      if ((await entry.count()) === 0) {
        logger.warn('No entry control found');
        return this.outcome(job, 'failure', 'No entry control found', 0, 'no-entry-control');
      }
      await entry.first().click();
      await this.wait(this.timings.renderWaitMs);

      const host = hostOf(this.driver.currentUrl());
      if (startHost && host && host !== startHost) {
        logger.warn(`Entry control redirected to ${host}`);
        return this.outcome(job, 'incomplete', `Application continues on external site ${host}`, 0, 'external-redirect');
      }
    }

    const { maxSteps, duplicateThreshold, stuckThreshold } = this.limits;
    let previousFingerprint: string | null = null;
    let duplicateCount = 0;
    let stuckCount = 0;
    const alternatesClicked = new Set<number>();

    for (;;) {
      const step = state.stepCount + 1;
      if (state.stepCount >= maxSteps) {
        logger.warn(`Reached max steps (${maxSteps}) without submitting`);
        return this.abort(job, state.stepCount, `max steps reached (${maxSteps}) without a Submit control`, 'max-steps');
      }
      if (stuckCount >= stuckThreshold) {
        logger.warn(`Navigation stuck on step ${step}`);
        return this.abort(job, state.stepCount, `Navigation stuck on step ${step} after ${stuckCount} failed attempts`, 'stuck-navigation');
      }

      logger.info(`Processing application step ${step}`);
      const modals = this.driver.locate(this.selectors.modal);
      if ((await modals.count()) === 0) {
        logger.warn('Application form not found');
        return this.abort(job, state.stepCount, `Application modal disappeared at step ${step}`, 'modal-missing');
      }
      const modal = modals.first();

      const fingerprint = stepFingerprint(await modal.innerHtml());
      if (fingerprint === previousFingerprint) {
        duplicateCount += 1;
        logger.warn(`Same step content as before (${duplicateCount}/${duplicateThreshold})`);
        if (duplicateCount >= duplicateThreshold) {
          if (await this.clickAlternate(modal, alternatesClicked)) {
            state.stepCount += 1;
            continue;
          }
          logger.error(`Infinite loop detected at step ${step}`);
          return this.abort(job, state.stepCount, `Infinite loop detected at step ${step}`, 'loop-detected');
        }
      } else {
        duplicateCount = 0;
        previousFingerprint = fingerprint;
      }

      const filled = await this.stepProcessor.processStep(modal, this.store, job);
      this.store.save();
      if (!filled) {
        logger.warn(`Some fields failed to process on step ${step}`);
      }
      await this.wait(this.timings.stepSettleMs);

      const submit = modal.locate(this.selectors.submit);
      if ((await submit.count()) > 0) {
        return this.submit(job, modal, submit, step);
      }

      const advance = await this.clickContinue(modal);
      if (advance === 'clicked') {
        state.stepCount += 1;
        stuckCount = 0;
        await this.wait(this.timings.afterContinueMs);
        continue;
      }
      if (advance === 'none-found') {
        logger.warn(`Could not find a continue control on step ${step}`);
        return this.abort(job, state.stepCount, `No working continue control on step ${step}`, 'no-continue-control');
      }
      stuckCount += 1;
      logger.warn(`Every continue control failed on step ${step} (${stuckCount}/${stuckThreshold})`);
    }
  }

  private async clickContinue(modal: ElementSet): Promise<Advance> {
    let matched = false;
    for (const candidate of this.selectors.continueCandidates) {
      const found = modal.locate(candidate.selector);
      const count = await found.count();
      if (count === 0) {
        continue;
      }

      let target = found.first();
      if (candidate.lastMatching) {
        target = found.nth(count - 1);
        const text = (await target.innerText()).trim();
        if (!candidate.lastMatching.test(text)) {
          continue;
        }
      }

      matched = true;
      logger.info(`Found continue control: ${candidate.name}`);
      if (await escalatingClick(this.driver, target, candidate.pageQuery, candidate.name)) {
        return 'clicked';
      }
    }
    return matched ? 'failed' : 'none-found';
  }

  /** Click a navigation-looking button other than the first that has not been tried yet. */
  private async clickAlternate(modal: ElementSet, tried: Set<number>): Promise<boolean> {
    const buttons = modal.locate('button');
    const count = await buttons.count();
    for (let i = 1; i < count; i++) {
      if (tried.has(i)) {
        continue;
      }
      const button = buttons.nth(i);
      const text = (await button.innerText()).trim().toLowerCase();
      if (!this.selectors.navigationWords.some((word) => text.includes(word))) {
        continue;
      }
      tried.add(i);
      logger.info(`Trying alternate button ${i}: "${text}"`);
      if (await escalatingClick(this.driver, button, null, `alternate button "${text}"`)) {
        await this.wait(this.timings.afterAlternateMs);
        return true;
      }
    }
    return false;
  }

  private async findDone(modal: ElementSet): Promise<ElementSet | null> {
    if ((await this.driver.locate(this.selectors.modal).count()) > 0) {
      const inForm = modal.locate(this.selectors.done);
      if ((await inForm.count()) > 0) {
        logger.info('Found Done control in the application form');
        return inForm.first();
      }
    }
    const anywhere = this.driver.locate(this.selectors.done);
    if ((await anywhere.count()) > 0) {
      logger.info('Found Done control on the page');
      return anywhere.first();
    }
    return null;
  }

  private async submit(job: JobContext, modal: ElementSet, submit: ElementSet, step: number): Promise<ApplicationOutcome> {
    logger.info('Found Submit control, this is the final step');
    if (!(await escalatingClick(this.driver, submit.first(), this.selectors.submitPageQuery, 'Submit'))) {
      return this.abort(job, step, 'Submit click failed', 'submit-click-failed');
    }
    await this.wait(this.timings.afterSubmitMs);

    const done = await this.findDone(modal);
    if (!done) {
      logger.warn('Did not find a Done control after submission');
      return this.abort(job, step, 'No Done control after submission', 'no-done-control');
    }
    try {
      await done.scriptClick();
      await this.wait(this.timings.afterDoneMs);
    } catch (error) {
      logger.warn(`Clicking Done failed: ${describeError(error)}`);
    }
    return this.outcome(job, 'success', 'Application submitted', step);
  }
}

export interface WizardFactoryOptions {
  driver: UiDriver;
  store: AnswerStore;
  oracle: AnswerOracle;
  coverLetters: CoverLetterGenerator;
  rules?: AnswerRules;
  ledger?: ApplicationLedger;
  session?: SessionSaver;
  limits?: Partial<WizardLimits>;
  timings?: Partial<WizardTimings>;
  selectors?: WizardSelectors;
}

/** Wire a wizard with the standard step processor, field processors and emergency exit. */
export function createApplicationWizard(options: WizardFactoryOptions): ApplicationWizard {
  const selectors = options.selectors ?? DEFAULT_SELECTORS;
  const processors = createFieldProcessors({
    oracle: options.oracle,
    coverLetters: options.coverLetters,
    rules: options.rules,
  });
  return new ApplicationWizard({
    driver: options.driver,
    store: options.store,
    stepProcessor: new FormStepProcessor(options.driver, processors, selectors),
    exit: new EmergencyExit(options.driver, selectors),
    ledger: options.ledger,
    session: options.session,
    selectors,
    limits: options.limits,
    timings: options.timings,
  });
}
