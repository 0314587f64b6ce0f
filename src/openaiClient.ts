import OpenAI from 'openai';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import { z } from 'zod';
import { UNRESOLVED, type AnswerOracle, type OracleAnswer } from './answers/answerOracle';
import { describeError, OracleError } from './errors';
import type { FieldKind, JobContext } from './types';
import logger from './utils/logger';

/** The part of the OpenAI SDK this module calls. */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
    };
  };
}

export interface OpenAIManagerOptions {
  model: string;
  maxAttempts?: number;
  /** Base delay; attempt n waits backoffMs * 2^(n-1) before retrying. */
  backoffMs?: number;
  /** Stored answers used as the applicant profile. */
  profile?: () => Readonly<Record<string, string>>;
}

const structuredAnswerSchema = z.object({
  answer: z.union([z.string(), z.number(), z.boolean()]).transform((value) => String(value)),
  confidence: z.number().optional(),
  reasoning: z.string().optional(),
});

const PLACEHOLDER_ANSWERS = new Set(['', 'not specified', 'unknown', 'n/a']);

const CHOICE_KINDS: readonly FieldKind[] = ['select', 'radio', 'checkbox'];

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Strip wrapping quotes and a leading "Answer:" the model sometimes adds. */
export function cleanAnswer(raw: string): string {
  return raw
    .trim()
    .replace(/^answer\s*:\s*/i, '')
    .replace(/^["'`]+|["'`]+$/g, '')
    .trim();
}

/**
 * Read the model's reply. JSON of the form {"answer": ...} is preferred; any
 * other text is taken as the answer itself.
 */
export function parseAnswer(content: string): string {
  try {
    const parsed = structuredAnswerSchema.safeParse(JSON.parse(content));
    if (parsed.success) {
      return cleanAnswer(parsed.data.answer);
    }
  } catch {
    logger.debug('OpenAI reply is not JSON, using raw text');
  }
  return cleanAnswer(content);
}

/**
 * OpenAI-backed answer oracle and cover-letter writer. Provider failures,
 * empty replies and placeholder answers are retried with exponential backoff;
 * after the last attempt the question is reported as unresolved.
 */
export class OpenAIManager implements AnswerOracle {
  readonly name = 'openai';
  private readonly model: string;
  private readonly maxAttempts: number;
  private readonly backoffMs: number;
  private readonly profile: () => Readonly<Record<string, string>>;

  constructor(
    private readonly client: ChatCompletionClient,
    options: OpenAIManagerOptions,
  ) {
    this.model = options.model;
    this.maxAttempts = options.maxAttempts ?? 3;
    this.backoffMs = options.backoffMs ?? 1000;
    this.profile = options.profile ?? (() => ({}));
  }

  static fromApiKey(apiKey: string, options: OpenAIManagerOptions): OpenAIManager {
    const manager = new OpenAIManager(new OpenAI({ apiKey }), options);
    logger.info(`OpenAI client initialized (model ${options.model})`);
    return manager;
  }

  /**
   * Generate a system prompt from the stored answers and the job
   */
  private createSystemPrompt(job?: JobContext): string {
    const jobBlock = job
      ? `\nThe job being applied to:\n${JSON.stringify(
          { title: job.title, company: job.company, location: job.location, description: job.description },
          null,
          2,
        )}\n`
      : '';

    return `You are helping a job applicant fill out a job application form.

The applicant's stored answers to earlier questions are:
${JSON.stringify(this.profile(), null, 2)}
${jobBlock}
IMPORTANT GUIDELINES:
1. Always be truthful and consistent with the stored answers
2. Keep answers short; a number, a word or one sentence
3. For numeric questions answer with a number only
4. For multiple-choice questions answer with the number of the chosen option only
5. If the answer cannot be derived, answer "Not specified"

Respond with a JSON object:
{
  "answer": "the answer",
  "confidence": 0.9,
  "reasoning": "brief explanation"
}`;
  }

  private async complete(messages: ChatCompletionMessageParam[], temperature: number, maxTokens: number): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages,
      temperature,
      max_tokens: maxTokens,
    });

    const content = completion.choices[0]?.message?.content;
    if (!content || content.trim().length === 0) {
      throw new OracleError('No response received from OpenAI');
    }
    return content;
  }

  private async withRetry<T>(what: string, attemptFn: () => Promise<T>): Promise<T> {
    let lastError: unknown;
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        return await attemptFn();
      } catch (error) {
        lastError = error;
        logger.warn(`OpenAI ${what} attempt ${attempt}/${this.maxAttempts} failed: ${describeError(error)}`);
        if (attempt < this.maxAttempts) {
          await sleep(this.backoffMs * 2 ** (attempt - 1));
        }
      }
    }
    throw new OracleError(`OpenAI ${what} failed after ${this.maxAttempts} attempts`, { cause: lastError });
  }

  async resolve(question: string, fieldKind: FieldKind, job?: JobContext): Promise<OracleAnswer> {
    const kindHint = CHOICE_KINDS.includes(fieldKind)
      ? 'Answer with the number of the chosen option.'
      : 'Answer with the value to type into the field.';

    try {
      return await this.withRetry('answer', async () => {
        const content = await this.complete(
          [
            { role: 'system', content: this.createSystemPrompt(job) },
            { role: 'user', content: `Question (${fieldKind} field): ${question}\n\n${kindHint}` },
          ],
          0.3,
          300,
        );
        const answer = parseAnswer(content);
        if (PLACEHOLDER_ANSWERS.has(answer.toLowerCase())) {
          throw new OracleError(`Unusable answer "${answer}"`);
        }
        return answer;
      });
    } catch (error) {
      logger.error('Error generating answer with OpenAI:', error);
      return UNRESOLVED;
    }
  }

  /**
   * Write a cover letter for the job. Throws OracleError when every attempt
   * fails or the reply is too short to be a letter.
   */
  async generateCoverLetter(job: JobContext, applicantName: string, cvText: string): Promise<string> {
    const prompt = `Write a professional, personalized cover letter for a job application.

JOB DETAILS:
- Position: ${job.title}
- Company: ${job.company}
- Location: ${job.location}
- Job Description: ${job.description}

APPLICANT CV:
${cvText || 'Not provided'}

REQUIREMENTS:
1. Write from the perspective of ${applicantName}
2. Address it to the Hiring Manager
3. Reference skills and experience from the CV that relate to the job
4. Keep it between 300 and 400 words
5. Include a salutation and closing, but no date or address blocks
6. Plain text for a form field, with no placeholders or blank fields`;

    return this.withRetry('cover letter', async () => {
      const content = await this.complete(
        [
          { role: 'system', content: 'You are a professional cover letter writer. Write concise, well-structured cover letters.' },
          { role: 'user', content: prompt },
        ],
        0.7,
        1000,
      );
      const letter = content.trim();
      if (letter.length < 50) {
        throw new OracleError(`Cover letter too short (${letter.length} characters)`);
      }
      return letter;
    });
  }

  /**
   * Round-trip a trivial prompt; used by the system check.
   */
  async ping(): Promise<boolean> {
    try {
      await this.complete([{ role: 'user', content: 'Reply with OK.' }], 0, 5);
      return true;
    } catch (error) {
      logger.error('OpenAI connectivity check failed:', error);
      return false;
    }
  }
}
