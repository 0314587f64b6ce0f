import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import logger from '../utils/logger';

const answersFileSchema = z.record(
  z.string(),
  z.union([z.string(), z.number(), z.boolean()]).transform((value) => String(value)),
);

interface StoredAnswer {
  label: string;
  answer: string;
}

/**
 * Normalize a question label for lookup: trimmed, inner whitespace collapsed,
 * case-folded. Nothing else; two labels that differ by a word never match.
 */
export function normalizeLabel(label: string): string {
  return label.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Durable label -> answer mapping backed by a JSON file. Every `set` rewrites
 * the file. Lookups are exact on the normalized label only.
 */
export class AnswerStore {
  private readonly entries = new Map<string, StoredAnswer>();

  constructor(private readonly filePath: string) {}

  static load(filePath: string): AnswerStore {
    const store = new AnswerStore(filePath);
    store.reload();
    return store;
  }

  reload(): void {
    this.entries.clear();
    if (!fs.existsSync(this.filePath)) {
      logger.info(`No answers file at ${this.filePath}, starting with an empty answer store`);
      return;
    }

    try {
      const raw: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
      const parsed = answersFileSchema.safeParse(raw);
      if (!parsed.success) {
        logger.error(`Answers file ${this.filePath} is not a label -> answer object, ignoring it`);
        return;
      }
      for (const [label, answer] of Object.entries(parsed.data)) {
        this.entries.set(normalizeLabel(label), { label, answer });
      }
      logger.info(`Loaded ${this.entries.size} stored answers from ${this.filePath}`);
    } catch (error) {
      logger.error(`Error loading answers file ${this.filePath}:`, error);
    }
  }

  get(label: string): string | undefined {
    return this.entries.get(normalizeLabel(label))?.answer;
  }

  has(label: string): boolean {
    return this.entries.has(normalizeLabel(label));
  }

  set(label: string, answer: string): void {
    this.entries.set(normalizeLabel(label), { label: label.trim(), answer });
    this.save();
  }

  get size(): number {
    return this.entries.size;
  }

  snapshot(): Readonly<Record<string, string>> {
    const out: Record<string, string> = {};
    for (const { label, answer } of this.entries.values()) {
      out[label] = answer;
    }
    return out;
  }

  save(): void {
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(this.filePath, JSON.stringify(this.snapshot(), null, 2));
      logger.debug(`Answers saved to ${this.filePath}`);
    } catch (error) {
      logger.error(`Error saving answers to ${this.filePath}:`, error);
    }
  }
}
