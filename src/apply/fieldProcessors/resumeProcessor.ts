import type { AnswerStore } from '../../answers/answerStore';
import type { FieldDescriptor, JobContext } from '../../types';
import logger from '../../utils/logger';
import { FieldProcessor } from './base';

/** The resume already chosen on the form is kept as it is. */
export class ResumeFieldProcessor extends FieldProcessor {
  async process(field: FieldDescriptor, _store: AnswerStore, _job: JobContext): Promise<boolean> {
    logger.info(`Keeping the selected resume for "${field.label}"`);
    return true;
  }
}
