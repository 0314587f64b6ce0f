import type { AnswerStore } from '../../answers/answerStore';
import { describeError } from '../../errors';
import type { ChoiceHandle, FieldDescriptor, JobContext } from '../../types';
import logger from '../../utils/logger';
import { ChoiceFieldProcessor } from './base';

const RESUME_QUESTION = /\b(resume|cv|curriculum vitae)\b/i;
const RADIO_CLICK_TIMEOUT = 3000;

/**
 * Radio groups. Resolution is shared with selects; clicking tries the
 * option's label, then the input itself, then a scripted click.
 */
export class RadioFieldProcessor extends ChoiceFieldProcessor {
  private async clickChoice(choice: ChoiceHandle): Promise<boolean> {
    const attempts: Array<[string, () => Promise<void>]> = [
      ['input', () => choice.input.click({ timeout: RADIO_CLICK_TIMEOUT, force: true })],
      ['scripted', () => choice.input.scriptClick()],
    ];
    if (choice.label) {
      const label = choice.label;
      attempts.unshift(['label', () => label.click({ timeout: RADIO_CLICK_TIMEOUT })]);
    }

    for (const [how, attempt] of attempts) {
      try {
        await attempt();
        logger.info(`Clicked radio option "${choice.text}" (${how})`);
        return true;
      } catch (error) {
        logger.warn(`Radio ${how} click on "${choice.text}" failed: ${describeError(error)}`);
      }
    }
    return false;
  }

  async process(field: FieldDescriptor, store: AnswerStore, job: JobContext): Promise<boolean> {
    if (RESUME_QUESTION.test(field.label)) {
      logger.info(`Skipping resume radio group "${field.label}"`);
      return true;
    }

    const answer = await this.resolveChoice(field, store, job);
    if (answer === null) {
      logger.warn(`Could not resolve radio group "${field.label}", leaving it unanswered`);
      return false;
    }
    this.logResolved(field, answer);
    if (answer.persist) {
      store.set(field.label, answer.value);
    }

    const choice = (field.choices ?? []).find((candidate) => candidate.text === answer.value);
    if (!choice) {
      logger.error(`No radio input for option "${answer.value}" in "${field.label}"`);
      return false;
    }
    return this.clickChoice(choice);
  }
}
