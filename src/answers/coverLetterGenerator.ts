import * as fs from 'fs';
import type { OpenAIManager } from '../openaiClient';
import type { JobContext } from '../types';
import logger from '../utils/logger';
import { normalizeLabel } from './answerStore';

export interface CoverLetterGenerator {
  generate(job: JobContext, answers: Readonly<Record<string, string>>): Promise<string>;
}

function lookup(answers: Readonly<Record<string, string>>, label: string): string | undefined {
  const wanted = normalizeLabel(label);
  for (const [key, value] of Object.entries(answers)) {
    if (normalizeLabel(key) === wanted && value.trim().length > 0) {
      return value.trim();
    }
  }
  return undefined;
}

export function applicantName(answers: Readonly<Record<string, string>>): string {
  const parts = [lookup(answers, 'First name'), lookup(answers, 'Last name')].filter(
    (part): part is string => part !== undefined,
  );
  return parts.length > 0 ? parts.join(' ') : 'Applicant';
}

/** Local template letter used whenever generation fails. */
export function fallbackCoverLetter(job: JobContext, answers: Readonly<Record<string, string>>): string {
  const title = job.title || 'the position';
  const company = job.company || 'your company';

  return `Dear Hiring Manager,

I am writing to express my interest in the ${title} position at ${company}. I was excited to learn about this opportunity and believe my skills and experience align well with the requirements of the role.

I am particularly interested in joining ${company} and I am confident that my background and enthusiasm make me a strong candidate for this position.

I welcome the opportunity to discuss how my qualifications match your needs. Thank you for considering my application.

Sincerely,
${applicantName(answers)}
`;
}

export class TemplateCoverLetterGenerator implements CoverLetterGenerator {
  async generate(job: JobContext, answers: Readonly<Record<string, string>>): Promise<string> {
    return fallbackCoverLetter(job, answers);
  }
}

/**
 * Writes letters with OpenAI from the CV and job description. Never throws:
 * any failure yields the template letter.
 */
export class OpenAICoverLetterGenerator implements CoverLetterGenerator {
  constructor(
    private readonly manager: OpenAIManager,
    private readonly cvPath?: string,
  ) {}

  private readCv(): string {
    if (!this.cvPath) {
      return '';
    }
    try {
      return fs.readFileSync(this.cvPath, 'utf-8');
    } catch (error) {
      logger.error(`Failed to read CV file ${this.cvPath}:`, error);
      return '';
    }
  }

  async generate(job: JobContext, answers: Readonly<Record<string, string>>): Promise<string> {
    logger.info(`Generating cover letter for ${job.title} at ${job.company}`);
    try {
      const letter = await this.manager.generateCoverLetter(job, applicantName(answers), this.readCv());
      logger.info(`Generated cover letter (${letter.length} characters)`);
      return letter;
    } catch (error) {
      logger.error('Failed to generate cover letter, using template:', error);
      return fallbackCoverLetter(job, answers);
    }
  }
}
