import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { ChatCompletion } from 'openai/resources/chat/completions';
import { beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { UNRESOLVED } from '../answers/answerOracle';
import { applicantName, OpenAICoverLetterGenerator } from '../answers/coverLetterGenerator';
import { cleanAnswer, OpenAIManager, parseAnswer, type ChatCompletionClient } from '../openaiClient';
import type { JobContext } from '../types';

type Create = ChatCompletionClient['chat']['completions']['create'];

const job: JobContext = {
  id: '9',
  title: 'Frontend Developer',
  company: 'Hooli',
  description: 'React and TypeScript',
  location: 'Amsterdam',
  entryAlreadyTriggered: true,
};

const LETTER = 'Dear Hiring Manager,\n\nI would love to build interfaces at Hooli with React and TypeScript.\n\nSincerely,\nAda';

function completion(content: string | null): ChatCompletion {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 0,
    model: 'gpt-4o-mini',
    choices: [{ index: 0, finish_reason: 'stop', logprobs: null, message: { role: 'assistant', content, refusal: null } }],
  };
}

describe('answer parsing', () => {
  it('reads a structured JSON answer', () => {
    expect(parseAnswer('{"answer": "5", "confidence": 0.9, "reasoning": "from the CV"}')).toBe('5');
    expect(parseAnswer('{"answer": 3}')).toBe('3');
  });

  it('takes plain text as the answer', () => {
    expect(parseAnswer('Answer: "Lisbon"')).toBe('Lisbon');
    expect(parseAnswer('{"city": "Lisbon"}')).toBe('{"city": "Lisbon"}');
    expect(cleanAnswer("  'Yes'  ")).toBe('Yes');
  });
});

describe('OpenAIManager', () => {
  let create: Mock<Create>;
  let manager: OpenAIManager;

  beforeEach(() => {
    create = vi.fn<Create>();
    manager = new OpenAIManager(
      { chat: { completions: { create } } },
      { model: 'gpt-4o-mini', maxAttempts: 3, backoffMs: 0, profile: () => ({ City: 'Lisbon' }) },
    );
  });

  it('asks with the stored answers and the job as context', async () => {
    create.mockResolvedValue(completion('{"answer": "5"}'));

    expect(await manager.resolve('Years of TypeScript?', 'text', job)).toBe('5');

    const body = create.mock.calls[0]?.[0];
    expect(body).toMatchObject({
      model: 'gpt-4o-mini',
      temperature: 0.3,
      max_tokens: 300,
      messages: [
        { role: 'system' },
        { role: 'user', content: 'Question (text field): Years of TypeScript?\n\nAnswer with the value to type into the field.' },
      ],
    });
    expect(body?.messages[0]?.content).toContain('"City": "Lisbon"');
    expect(body?.messages[0]?.content).toContain('"company": "Hooli"');
  });

  it('asks for an option number on choice fields', async () => {
    create.mockResolvedValue(completion('2'));

    expect(await manager.resolve('Degree?\nOptions:\n1. BSc\n2. MSc', 'radio')).toBe('2');
    expect(create.mock.calls[0]?.[0].messages[1]?.content).toBe(
      'Question (radio field): Degree?\nOptions:\n1. BSc\n2. MSc\n\nAnswer with the number of the chosen option.',
    );
  });

  it('retries provider errors and placeholder answers', async () => {
    create
      .mockRejectedValueOnce(new Error('503 Service Unavailable'))
      .mockResolvedValueOnce(completion('{"answer": "Not specified"}'))
      .mockResolvedValueOnce(completion('{"answer": "Berlin"}'));

    expect(await manager.resolve('City', 'text')).toBe('Berlin');
    expect(create).toHaveBeenCalledTimes(3);
  });

  it('is unresolved after the last attempt', async () => {
    create.mockResolvedValue(completion(null));

    expect(await manager.resolve('City', 'text')).toBe(UNRESOLVED);
    expect(create).toHaveBeenCalledTimes(3);
  });

  it('writes a cover letter and rejects a reply too short to be one', async () => {
    create.mockResolvedValueOnce(completion('Thanks!')).mockResolvedValueOnce(completion(`  ${LETTER}\n`));

    expect(await manager.generateCoverLetter(job, 'Ada', 'Five years of React')).toBe(LETTER);
    expect(create).toHaveBeenCalledTimes(2);
    expect(create.mock.calls[1]?.[0]).toMatchObject({ temperature: 0.7, max_tokens: 1000 });
  });

  it('throws when every cover letter attempt fails', async () => {
    create.mockResolvedValue(completion('Hi'));

    await expect(manager.generateCoverLetter(job, 'Ada', '')).rejects.toThrow('OpenAI cover letter failed after 3 attempts');
  });

  it('pings the model', async () => {
    create.mockResolvedValueOnce(completion('OK')).mockRejectedValueOnce(new Error('401 Unauthorized'));

    expect(await manager.ping()).toBe(true);
    expect(await manager.ping()).toBe(false);
  });
});

describe('OpenAICoverLetterGenerator', () => {
  let create: Mock<Create>;
  let manager: OpenAIManager;

  beforeEach(() => {
    create = vi.fn<Create>();
    manager = new OpenAIManager({ chat: { completions: { create } } }, { model: 'gpt-4o-mini', maxAttempts: 1, backoffMs: 0 });
  });

  it('names the applicant from stored answers', () => {
    expect(applicantName({ 'first name': ' Ada ', 'Last Name': 'Lovelace' })).toBe('Ada Lovelace');
    expect(applicantName({ 'First name': '' })).toBe('Applicant');
  });

  it('writes from the CV file', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cv-'));
    const cvPath = path.join(dir, 'cv.txt');
    fs.writeFileSync(cvPath, 'Five years of React at Initech');
    create.mockResolvedValue(completion(LETTER));

    const letter = await new OpenAICoverLetterGenerator(manager, cvPath).generate(job, { 'First name': 'Ada' });

    expect(letter).toBe(LETTER);
    const prompt = create.mock.calls[0]?.[0].messages[1]?.content;
    expect(prompt).toContain('APPLICANT CV:\nFive years of React at Initech');
    expect(prompt).toContain('1. Write from the perspective of Ada');
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('falls back to the template letter', async () => {
    create.mockRejectedValue(new Error('quota exceeded'));

    const letter = await new OpenAICoverLetterGenerator(manager, '/nonexistent/cv.txt').generate(job, {});

    expect(letter.startsWith('Dear Hiring Manager,\n\nI am writing to express my interest in the Frontend Developer position at Hooli.')).toBe(true);
    expect(letter.endsWith('Sincerely,\nApplicant\n')).toBe(true);
  });
});
