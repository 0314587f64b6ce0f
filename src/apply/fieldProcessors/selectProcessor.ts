import type { AnswerStore } from '../../answers/answerStore';
import type { FieldDescriptor, JobContext } from '../../types';
import logger from '../../utils/logger';
import { ChoiceFieldProcessor } from './base';

export class SelectFieldProcessor extends ChoiceFieldProcessor {
  async process(field: FieldDescriptor, store: AnswerStore, job: JobContext): Promise<boolean> {
    const answer = await this.resolveChoice(field, store, job);
    if (answer === null) {
      logger.warn(`Could not resolve select "${field.label}"`);
      return false;
    }
    this.logResolved(field, answer);
    if (answer.persist) {
      store.set(field.label, answer.value);
    }

    try {
      await field.handle.selectOption(answer.value);
      logger.info(`Selected option for "${field.label}"`);
      return true;
    } catch (error) {
      logger.error(`Error selecting option for "${field.label}":`, error);
      return false;
    }
  }
}
