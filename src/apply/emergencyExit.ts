import { describeError } from '../errors';
import type { UiDriver } from '../types';
import logger from '../utils/logger';
import { pageClickScript, textClickScript } from './clickStrategies';
import { DEFAULT_SELECTORS, type WizardSelectors } from './selectors';

export interface ExitProcedure {
  /** Close and discard the open form. Resolves true once the form is verified gone. */
  run(): Promise<boolean>;
}

type ExitStrategy = { name: string; selector: string } | { name: string; script: string };

const EXIT_CLICK_TIMEOUT = 2000;

/**
 * Forcibly closes a stuck application form: Close, then Discard on the
 * confirmation dialog, then verify the form container is gone. Never throws.
 */
export class EmergencyExit implements ExitProcedure {
  constructor(
    private readonly driver: UiDriver,
    private readonly selectors: WizardSelectors = DEFAULT_SELECTORS,
    private readonly settleMs = 1000,
  ) {}

  private async modalOpen(): Promise<boolean> {
    return (await this.driver.locate(this.selectors.modal).count()) > 0;
  }

  private async tryStrategies(step: string, strategies: readonly ExitStrategy[]): Promise<boolean> {
    for (const strategy of strategies) {
      try {
        if ('selector' in strategy) {
          const target = this.driver.locate(strategy.selector);
          if ((await target.count()) === 0) {
            continue;
          }
          await target.first().click({ timeout: EXIT_CLICK_TIMEOUT });
        } else if ((await this.driver.evaluate(strategy.script)) !== true) {
          continue;
        }
        logger.info(`Emergency exit: ${step} clicked (${strategy.name})`);
        return true;
      } catch (error) {
        logger.warn(`Emergency exit: ${step} via ${strategy.name} failed: ${describeError(error)}`);
      }
    }
    logger.warn(`Emergency exit: no ${step} control worked`);
    return false;
  }

  async run(): Promise<boolean> {
    try {
      if (!(await this.modalOpen())) {
        logger.info('Emergency exit: no application form open');
        return true;
      }

      logger.warn('Emergency exit: closing the application form');
      await this.tryStrategies('close', [
        { name: 'close selector', selector: this.selectors.close },
        { name: 'close icon', selector: this.selectors.closeIcon },
        { name: 'scripted close', script: pageClickScript(this.selectors.closePageQuery) },
      ]);
      await this.driver.waitForTimeout(this.settleMs);

      if (!(await this.modalOpen())) {
        logger.info('Emergency exit: application form closed without a discard prompt');
        return true;
      }

      await this.tryStrategies('discard', [
        { name: 'discard selector', selector: this.selectors.discard },
        { name: 'discard text', selector: this.selectors.discardFallback },
        { name: 'scripted discard', script: textClickScript('Discard') },
      ]);
      await this.driver.waitForTimeout(this.settleMs);

      const closed = !(await this.modalOpen());
      if (closed) {
        logger.info('Emergency exit: application form closed');
      } else {
        logger.error('Emergency exit: application form is still open');
      }
      return closed;
    } catch (error) {
      logger.error('Emergency exit failed:', error);
      return false;
    }
  }
}
