import { z } from 'zod';

const booleanString = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const commaList = z
  .string()
  .default('')
  .transform((value) =>
    value
      .split(',')
      .map((item) => item.trim().toLowerCase())
      .filter((item) => item.length > 0),
  );

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const envSchema = z.object({
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  ORACLE_MODE: z.enum(['openai', 'human', 'openai+human']).default('openai+human'),

  LEDGER_BACKEND: z.enum(['file', 'supabase']).default('file'),
  SUPABASE_URL: optionalString,
  SUPABASE_SERVICE_ROLE_KEY: optionalString,
  SUPABASE_ANON_KEY: optionalString,

  DATA_DIR: z.string().default('data'),
  ANSWERS_FILE: z.string().default('answers/default.json'),
  JOBS_FILE: z.string().default('data/jobs.json'),
  CV_PATH: optionalString,
  SESSION_STATE_PATH: z.string().default('data/session.json'),
  SESSION_SAVE_INTERVAL_SECONDS: z.coerce.number().int().positive().default(30),

  BROWSER_HEADLESS: booleanString.default('false'),
  BROWSER_TIMEOUT: z.coerce.number().int().positive().default(30000),
  BROWSER_VIEWPORT_WIDTH: z.coerce.number().int().positive().default(1920),
  BROWSER_VIEWPORT_HEIGHT: z.coerce.number().int().positive().default(1080),

  WIZARD_MAX_STEPS: z.coerce.number().int().positive().default(8),
  WIZARD_DUPLICATE_THRESHOLD: z.coerce.number().int().positive().default(2),
  WIZARD_STUCK_THRESHOLD: z.coerce.number().int().positive().default(5),

  CRON_INTERVAL: z.coerce.number().int().min(1).max(59).default(15),
  MAX_APPLICATIONS_PER_RUN: z.coerce.number().int().positive().default(10),
  BLACKLISTED_COMPANIES: commaList,
  SKIP_KEYWORDS: commaList,
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  openai: {
    apiKey?: string;
    model: string;
  };
  oracleMode: Env['ORACLE_MODE'];
  ledger: {
    backend: Env['LEDGER_BACKEND'];
    supabaseUrl?: string;
    supabaseKey?: string;
  };
  paths: {
    dataDir: string;
    answersFile: string;
    jobsFile: string;
    cvPath?: string;
    sessionState: string;
  };
  sessionSaveIntervalSeconds: number;
  browser: {
    headless: boolean;
    timeout: number;
    viewport: { width: number; height: number };
  };
  wizard: {
    maxSteps: number;
    duplicateThreshold: number;
    stuckThreshold: number;
  };
  worker: {
    cronIntervalMinutes: number;
    maxApplicationsPerRun: number;
    blacklistedCompanies: string[];
    skipKeywords: string[];
  };
}

/**
 * Validate the environment and shape it into the application config.
 * Throws with the zod issue list when a value is invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration:\n${issues.join('\n')}`);
  }
  const e = parsed.data;

  if (e.LEDGER_BACKEND === 'supabase' && (!e.SUPABASE_URL || !(e.SUPABASE_SERVICE_ROLE_KEY || e.SUPABASE_ANON_KEY))) {
    throw new Error(
      'Invalid configuration:\nLEDGER_BACKEND=supabase requires SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY (or SUPABASE_ANON_KEY)',
    );
  }

  return {
    openai: { apiKey: e.OPENAI_API_KEY, model: e.OPENAI_MODEL },
    oracleMode: e.ORACLE_MODE,
    ledger: {
      backend: e.LEDGER_BACKEND,
      supabaseUrl: e.SUPABASE_URL,
      supabaseKey: e.SUPABASE_SERVICE_ROLE_KEY || e.SUPABASE_ANON_KEY,
    },
    paths: {
      dataDir: e.DATA_DIR,
      answersFile: e.ANSWERS_FILE,
      jobsFile: e.JOBS_FILE,
      cvPath: e.CV_PATH,
      sessionState: e.SESSION_STATE_PATH,
    },
    sessionSaveIntervalSeconds: e.SESSION_SAVE_INTERVAL_SECONDS,
    browser: {
      headless: e.BROWSER_HEADLESS,
      timeout: e.BROWSER_TIMEOUT,
      viewport: { width: e.BROWSER_VIEWPORT_WIDTH, height: e.BROWSER_VIEWPORT_HEIGHT },
    },
    wizard: {
      maxSteps: e.WIZARD_MAX_STEPS,
      duplicateThreshold: e.WIZARD_DUPLICATE_THRESHOLD,
      stuckThreshold: e.WIZARD_STUCK_THRESHOLD,
    },
    worker: {
      cronIntervalMinutes: e.CRON_INTERVAL,
      maxApplicationsPerRun: e.MAX_APPLICATIONS_PER_RUN,
      blacklistedCompanies: e.BLACKLISTED_COMPANIES,
      skipKeywords: e.SKIP_KEYWORDS,
    },
  };
}
