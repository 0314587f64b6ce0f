import { formatChoiceQuestion, isResolved, UNRESOLVED, type AnswerOracle, type OracleAnswer } from '../../answers/answerOracle';
import { defaultAnswerRules, type AnswerRules } from '../../answers/answerRules';
import type { AnswerStore } from '../../answers/answerStore';
import type { CoverLetterGenerator } from '../../answers/coverLetterGenerator';
import type { FieldDescriptor, FieldKind, JobContext } from '../../types';
import logger from '../../utils/logger';
import { matchOption } from './optionMatching';

export interface FieldProcessorDeps {
  oracle: AnswerOracle;
  coverLetters: CoverLetterGenerator;
  rules?: AnswerRules;
}

export type AnswerSource = 'stored' | 'rule' | 'oracle' | 'fallback' | 'generated' | 'default';

export interface ResolvedAnswer {
  value: string;
  source: AnswerSource;
  /** Whether the value is written to the answer store. */
  persist: boolean;
}

export abstract class FieldProcessor {
  protected readonly rules: AnswerRules;

  constructor(protected readonly deps: FieldProcessorDeps) {
    this.rules = deps.rules ?? defaultAnswerRules;
  }

  /**
   * Resolve an answer for the field and apply it. Resolves true when the field
   * ended up answered.
   */
  abstract process(field: FieldDescriptor, store: AnswerStore, job: JobContext): Promise<boolean>;

  protected async askOracle(question: string, kind: FieldKind, job: JobContext): Promise<OracleAnswer> {
    try {
      return await this.deps.oracle.resolve(question, kind, job);
    } catch (error) {
      logger.error(`Answer oracle "${this.deps.oracle.name}" failed:`, error);
      return UNRESOLVED;
    }
  }

  protected logResolved(field: FieldDescriptor, answer: ResolvedAnswer): void {
    logger.info(`Answer for ${field.kind} "${field.label}" from ${answer.source}`);
    logger.debug(`"${field.label}" -> "${answer.value}"`);
  }
}

/**
 * Shared resolution for single-choice kinds (select, radio). Critical
 * questions skip stored answers and rule defaults and always go to the
 * oracle. Whatever is persisted is the matched option text.
 */
export abstract class ChoiceFieldProcessor extends FieldProcessor {
  protected async resolveChoice(field: FieldDescriptor, store: AnswerStore, job: JobContext): Promise<ResolvedAnswer | null> {
    const { label, kind, options } = field;
    if (options.length === 0) {
      logger.warn(`No options found for ${kind} "${label}"`);
      return null;
    }

    const critical = this.rules.isCritical(label, kind);
    if (critical) {
      logger.info(`Critical question "${label}", resolving again`);
    } else {
      const stored = store.get(label);
      if (stored !== undefined) {
        const option = options.find((candidate) => candidate.trim().toLowerCase() === stored.trim().toLowerCase());
        if (option !== undefined) {
          return { value: option, source: 'stored', persist: false };
        }
        logger.warn(`Stored answer for "${label}" matches none of the options`);
      }

      const preset = this.rules.defaultAnswer(label, kind, options);
      if (preset) {
        const option = matchOption(preset.answer, options);
        if (option !== null) {
          logger.info(`Rule "${preset.rule.id}" applies to "${label}"`);
          return { value: option, source: 'rule', persist: true };
        }
      }
    }

    const answer = await this.askOracle(formatChoiceQuestion(label, options), kind, job);
    if (isResolved(answer)) {
      const option = matchOption(answer, options);
      if (option !== null) {
        return { value: option, source: 'oracle', persist: true };
      }
      logger.warn(`Oracle answer for "${label}" matches none of the options`);
    }

    const fallback = this.rules.fallback(label, kind);
    if (fallback !== undefined) {
      const option = matchOption(fallback, options);
      if (option !== null) {
        return { value: option, source: 'fallback', persist: false };
      }
    }
    return null;
  }
}
