import type { AnswerStore } from '../../answers/answerStore';
import { describeError } from '../../errors';
import type { ElementSet, FieldDescriptor, JobContext } from '../../types';
import logger from '../../utils/logger';
import { FieldProcessor } from './base';
import { parseYesNo } from './optionMatching';

const CHECKBOX_TIMEOUT = 5000;

/**
 * Checkbox groups are read as one boolean: yes checks the first box, no
 * unchecks it. Best effort; never blocks the step.
 */
export class CheckboxFieldProcessor extends FieldProcessor {
  private async toggle(box: ElementSet, checked: boolean, label: string): Promise<void> {
    try {
      if (checked) {
        await box.check({ timeout: CHECKBOX_TIMEOUT });
      } else {
        await box.uncheck({ timeout: CHECKBOX_TIMEOUT });
      }
      logger.info(`${checked ? 'Checked' : 'Unchecked'} checkbox "${label}"`);
      return;
    } catch (error) {
      logger.warn(`Checkbox "${label}" toggle failed: ${describeError(error)}. Trying scripted click.`);
    }
    try {
      await box.scriptClick();
      logger.info(`Toggled checkbox "${label}" via script`);
    } catch (error) {
      logger.error(`Scripted click on checkbox "${label}" failed:`, error);
    }
  }

  async process(field: FieldDescriptor, store: AnswerStore, _job: JobContext): Promise<boolean> {
    const stored = store.get(field.label);
    const wanted = stored === undefined ? true : parseYesNo(stored);
    if (wanted === undefined) {
      logger.warn(`Stored answer for checkbox "${field.label}" is not yes or no, leaving it as is`);
      return true;
    }

    try {
      const box = field.handle.first();
      const checked = await box.isChecked();
      if (checked !== wanted) {
        await this.toggle(box, wanted, field.label);
      }
    } catch (error) {
      logger.error(`Error processing checkbox "${field.label}":`, error);
    }
    return true;
  }
}
