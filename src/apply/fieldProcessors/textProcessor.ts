import { isResolved } from '../../answers/answerOracle';
import type { AnswerStore } from '../../answers/answerStore';
import { fallbackCoverLetter } from '../../answers/coverLetterGenerator';
import type { FieldDescriptor, JobContext } from '../../types';
import logger from '../../utils/logger';
import { FieldProcessor, type ResolvedAnswer } from './base';

/**
 * Single- and multi-line text. Stored answer, then rule default, then the
 * oracle, then a rule fallback. Cover letters are written fresh every time.
 */
export class TextFieldProcessor extends FieldProcessor {
  private async coverLetter(store: AnswerStore, job: JobContext): Promise<string> {
    try {
      return await this.deps.coverLetters.generate(job, store.snapshot());
    } catch (error) {
      logger.error('Cover letter generator failed, using template:', error);
      return fallbackCoverLetter(job, store.snapshot());
    }
  }

  private async resolve(field: FieldDescriptor, store: AnswerStore, job: JobContext): Promise<ResolvedAnswer | null> {
    const { label, kind } = field;

    if (this.rules.isFreshEachTime(label, kind)) {
      return { value: await this.coverLetter(store, job), source: 'generated', persist: true };
    }

    const stored = store.get(label);
    if (stored !== undefined && stored.trim().length > 0) {
      return { value: stored, source: 'stored', persist: false };
    }

    const preset = this.rules.defaultAnswer(label, kind);
    if (preset) {
      return { value: preset.answer, source: 'rule', persist: true };
    }

    const answer = await this.askOracle(label, kind, job);
    if (isResolved(answer)) {
      return { value: answer, source: 'oracle', persist: true };
    }

    const fallback = this.rules.fallback(label, kind);
    return fallback === undefined ? null : { value: fallback, source: 'fallback', persist: false };
  }

  async process(field: FieldDescriptor, store: AnswerStore, job: JobContext): Promise<boolean> {
    const answer = await this.resolve(field, store, job);
    if (answer === null) {
      logger.warn(`No answer for ${field.kind} "${field.label}", leaving it empty`);
      return false;
    }

    if (answer.source === 'generated') {
      logger.info(`Cover letter for "${field.label}" generated (${answer.value.length} characters)`);
    } else {
      this.logResolved(field, answer);
    }
    if (answer.persist) {
      store.set(field.label, answer.value);
    }

    try {
      await field.handle.fill(answer.value);
      logger.info(`Filled ${field.kind} "${field.label}"`);
      return true;
    } catch (error) {
      logger.error(`Error filling ${field.kind} "${field.label}":`, error);
      return false;
    }
  }
}
