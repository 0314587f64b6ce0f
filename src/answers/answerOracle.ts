import { createInterface } from 'readline/promises';
import type { FieldKind, JobContext } from '../types';
import logger from '../utils/logger';

/** Returned when no answer could be produced. Never written to the answer store. */
export const UNRESOLVED: unique symbol = Symbol('unresolved');

export type OracleAnswer = string | typeof UNRESOLVED;

export interface AnswerOracle {
  readonly name: string;
  resolve(question: string, fieldKind: FieldKind, job?: JobContext): Promise<OracleAnswer>;
}

export function isResolved(answer: OracleAnswer): answer is string {
  return answer !== UNRESOLVED;
}

/** Render a choice question the same way for every oracle. */
export function formatChoiceQuestion(label: string, options: readonly string[]): string {
  if (options.length === 0) {
    return label;
  }
  const numbered = options.map((option, index) => `${index + 1}. ${option}`);
  return `${label}\nOptions:\n${numbered.join('\n')}`;
}

/** Asks each oracle in turn and returns the first resolved answer. */
export class ChainedAnswerOracle implements AnswerOracle {
  readonly name: string;

  constructor(private readonly oracles: readonly AnswerOracle[]) {
    this.name = oracles.map((oracle) => oracle.name).join('+') || 'none';
  }

  async resolve(question: string, fieldKind: FieldKind, job?: JobContext): Promise<OracleAnswer> {
    for (const oracle of this.oracles) {
      const answer = await oracle.resolve(question, fieldKind, job);
      if (isResolved(answer)) {
        return answer;
      }
      logger.info(`Oracle "${oracle.name}" could not resolve "${firstLine(question)}", trying next`);
    }
    return UNRESOLVED;
  }
}

export type Ask = (prompt: string) => Promise<string>;

function terminalAsk(prompt: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  return rl.question(prompt).finally(() => rl.close());
}

/** Puts the question to a person at the terminal. An empty reply is unresolved. */
export class HumanAnswerOracle implements AnswerOracle {
  readonly name = 'human';

  constructor(private readonly ask: Ask = terminalAsk) {}

  async resolve(question: string, fieldKind: FieldKind, job?: JobContext): Promise<OracleAnswer> {
    const context = job ? ` [${job.title} at ${job.company}]` : '';
    const reply = await this.ask(`\n[APPLICATION FORM]${context} (${fieldKind})\n${question}\n> `);
    const answer = reply.trim();
    return answer.length > 0 ? answer : UNRESOLVED;
  }
}

function firstLine(text: string): string {
  return text.split('\n', 1)[0] ?? text;
}
