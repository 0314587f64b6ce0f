import { ChainedAnswerOracle, HumanAnswerOracle, type AnswerOracle } from './answers/answerOracle';
import { AnswerStore } from './answers/answerStore';
import {
  OpenAICoverLetterGenerator,
  TemplateCoverLetterGenerator,
  type CoverLetterGenerator,
} from './answers/coverLetterGenerator';
import type { AppConfig } from './config/env';
import { JsonFileLedger, type ApplicationLedger } from './ledger/applicationLedger';
import { OpenAIManager } from './openaiClient';
import { SupabaseLedger } from './supabaseClient';
import logger from './utils/logger';

export interface Services {
  store: AnswerStore;
  ledger: ApplicationLedger;
  openai: OpenAIManager | null;
  oracle: AnswerOracle;
  coverLetters: CoverLetterGenerator;
}

export function createLedger(config: AppConfig): ApplicationLedger {
  const { backend, supabaseUrl, supabaseKey } = config.ledger;
  if (backend === 'supabase' && supabaseUrl && supabaseKey) {
    return new SupabaseLedger(supabaseUrl, supabaseKey);
  }
  return new JsonFileLedger(config.paths.dataDir);
}

export function createOracle(config: AppConfig, openai: OpenAIManager | null): AnswerOracle {
  const oracles: AnswerOracle[] = [];
  if (config.oracleMode !== 'human') {
    if (openai) {
      oracles.push(openai);
    } else {
      logger.warn('OPENAI_API_KEY is not set, questions will not be answered by OpenAI');
    }
  }
  if (config.oracleMode !== 'openai') {
    oracles.push(new HumanAnswerOracle());
  }
  return new ChainedAnswerOracle(oracles);
}

/**
 * Build the long-lived collaborators from configuration
 */
export function createServices(config: AppConfig): Services {
  const store = AnswerStore.load(config.paths.answersFile);
  const openai = config.openai.apiKey
    ? OpenAIManager.fromApiKey(config.openai.apiKey, { model: config.openai.model, profile: () => store.snapshot() })
    : null;

  return {
    store,
    ledger: createLedger(config),
    openai,
    oracle: createOracle(config, openai),
    coverLetters: openai ? new OpenAICoverLetterGenerator(openai, config.paths.cvPath) : new TemplateCoverLetterGenerator(),
  };
}
