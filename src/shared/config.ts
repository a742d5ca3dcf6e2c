import 'dotenv/config';
import { readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import { DEFAULTS, LOG_LEVELS, TRANSCRIPT_SOURCES } from './constants';
import type { LogLevel } from './logger';

// ---------------------------------------------------------------------------
// Settings handed to each component
// ---------------------------------------------------------------------------

export interface ExtractionSettings {
  readonly fencePattern: string;
  readonly questionKeywords: readonly string[];
  readonly answerKeywords: readonly string[];
  readonly headerDatePattern: string;
}

export interface CleaningSettings {
  readonly logFilterEnabled: boolean;
  readonly maxLineLength: number;
}

export interface ReviewSettings {
  readonly extraction: ExtractionSettings;
  readonly cleaning: CleaningSettings;
  readonly maxChars: number;
  readonly allowPartial: boolean;
}

export interface OracleSettings {
  readonly baseUrl: string;
  readonly apiKey: string;
  readonly model: string;
  readonly temperature: number;
  readonly timeoutMs: number;
  readonly certFile?: string;
  readonly promptTemplate: string;
}

export interface NotificationSettings {
  readonly enabled: boolean;
  readonly defaultWebhookUrl: string;
  readonly rejectWebhookUrl: string;
  readonly timeoutMs: number;
  readonly caseBaseUrl: string;
}

export interface TranscriptSettings {
  readonly source: (typeof TRANSCRIPT_SOURCES)[number];
  readonly baseUrl: string;
  readonly dir: string;
  readonly apiToken: string;
  readonly timeoutMs: number;
}

export interface MonitorSettings {
  readonly monitorDir: string;
  readonly workDir: string;
  readonly caseIdDigits: number;
  readonly pollIntervalMs: number;
  readonly processExisting: boolean;
}

export interface AppConfig {
  readonly nodeEnv: string;
  readonly port: number;
  readonly corsOrigin: string;
  readonly databaseUrl?: string;
  readonly logging: { readonly enabled: boolean; readonly level: LogLevel };
  readonly review: ReviewSettings;
  readonly oracle: OracleSettings;
  readonly notifications: NotificationSettings;
  readonly transcripts: TranscriptSettings;
  readonly monitor: MonitorSettings;
  readonly isDev: boolean;
  readonly isProd: boolean;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ---------------------------------------------------------------------------
// Environment schema
// ---------------------------------------------------------------------------

const TRUTHY = new Set(['1', 'true', 'yes']);

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === '' ? fallback : TRUTHY.has(v.trim().toLowerCase())));

const text = (fallback: string) => z.string().default(fallback);

// blank counts as unset
const filled = (fallback: string) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === '' ? fallback : v));

const LEVEL_ALIASES: Record<string, string> = { warning: 'warn', critical: 'error' };

const envSchema = z.object({
  NODE_ENV: text('development'),
  PORT: z.coerce.number().int().positive().default(3002),
  CORS_ORIGIN: text('*'),
  DATABASE_URL: z.string().optional(),

  FIELD_SEPARATOR_PATTERN: text(DEFAULTS.fencePattern),
  QUESTION_KEYWORD: filled(DEFAULTS.questionKeyword),
  ANSWER_KEYWORD: filled(DEFAULTS.answerKeyword),
  HEADER_DATE_PATTERN: text(DEFAULTS.headerDatePattern),
  MAX_CHARS: z.coerce.number().int().nonnegative().default(DEFAULTS.maxChars),
  LOG_FILTER_ENABLED: flag(true),
  LOG_FILTER_MAX_LINE_LEN: z.coerce.number().int().positive().default(DEFAULTS.maxLineLength),

  LLM_BASE_URL: text(DEFAULTS.oracleBaseUrl),
  LLM_API_KEY: text(''),
  LLM_MODEL: text(DEFAULTS.oracleModel),
  LLM_PROMPT: text(''),
  LLM_PROMPT_FILE: text(DEFAULTS.promptFile),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(DEFAULTS.oracleTemperature),
  LLM_TIMEOUT: z.coerce.number().positive().default(DEFAULTS.oracleTimeoutSeconds),
  LLM_CERT_FILE: text(''),
  LLM_ALLOW_PARTIAL: flag(false),

  TEAMS_ENABLED: flag(true),
  TEAMS_WEBHOOK_URL: text(''),
  TEAMS_REJECT_WEBHOOK_URL: text(''),
  NOTIFY_TIMEOUT: z.coerce.number().positive().default(DEFAULTS.notifyTimeoutSeconds),
  BASE_URL: text(DEFAULTS.caseBaseUrl),

  TRANSCRIPT_SOURCE: z.enum(TRANSCRIPT_SOURCES).default('file'),
  TRANSCRIPT_DIR: z.string().optional(),
  TRANSCRIPT_API_TOKEN: text(''),
  TRANSCRIPT_TIMEOUT: z.coerce.number().positive().default(DEFAULTS.transcriptTimeoutSeconds),

  MONITOR_DIR: text('monitor'),
  WORK_DIR: text('work'),
  CASE_ID_DIGITS: z.coerce.number().int().positive().default(DEFAULTS.caseIdDigits),
  POLL_INTERVAL: z.coerce.number().positive().default(DEFAULTS.pollIntervalSeconds),
  PROCESS_EXISTING: flag(false),

  LOG_ENABLED: flag(true),
  LOG_LEVEL: z
    .string()
    .default('info')
    .transform((v) => {
      const level = v.trim().toLowerCase();
      return LEVEL_ALIASES[level] ?? level;
    })
    .pipe(z.enum(LOG_LEVELS)),
});

export type RawEnv = Record<string, string | undefined>;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function parseKeywordList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function assertPattern(name: string, pattern: string): void {
  try {
    new RegExp(pattern);
  } catch (err) {
    throw new ConfigError(`${name} is not a valid regular expression: ${errorMessage(err)}`);
  }
}

function loadPromptTemplate(inline: string, file: string): string {
  if (inline) return inline;
  try {
    return readFileSync(path.resolve(file), 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read prompt template ${file}: ${errorMessage(err)}`);
  }
}

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

export function loadConfig(env: RawEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;

  assertPattern('FIELD_SEPARATOR_PATTERN', e.FIELD_SEPARATOR_PATTERN);
  assertPattern('HEADER_DATE_PATTERN', e.HEADER_DATE_PATTERN);

  const questionKeywords = parseKeywordList(e.QUESTION_KEYWORD);
  const answerKeywords = parseKeywordList(e.ANSWER_KEYWORD);
  if (questionKeywords.length === 0 || answerKeywords.length === 0) {
    throw new ConfigError('QUESTION_KEYWORD and ANSWER_KEYWORD need at least one keyword each');
  }

  const config: AppConfig = {
    nodeEnv: e.NODE_ENV,
    port: e.PORT,
    corsOrigin: e.CORS_ORIGIN,
    databaseUrl: e.DATABASE_URL || undefined,
    logging: Object.freeze({ enabled: e.LOG_ENABLED, level: e.LOG_LEVEL }),
    review: Object.freeze({
      extraction: Object.freeze({
        fencePattern: e.FIELD_SEPARATOR_PATTERN,
        questionKeywords: Object.freeze(questionKeywords),
        answerKeywords: Object.freeze(answerKeywords),
        headerDatePattern: e.HEADER_DATE_PATTERN,
      }),
      cleaning: Object.freeze({
        logFilterEnabled: e.LOG_FILTER_ENABLED,
        maxLineLength: e.LOG_FILTER_MAX_LINE_LEN,
      }),
      maxChars: e.MAX_CHARS,
      allowPartial: e.LLM_ALLOW_PARTIAL,
    }),
    oracle: Object.freeze({
      baseUrl: e.LLM_BASE_URL,
      apiKey: e.LLM_API_KEY,
      model: e.LLM_MODEL,
      temperature: e.LLM_TEMPERATURE,
      timeoutMs: Math.round(e.LLM_TIMEOUT * 1000),
      certFile: e.LLM_CERT_FILE || undefined,
      promptTemplate: loadPromptTemplate(e.LLM_PROMPT, e.LLM_PROMPT_FILE),
    }),
    notifications: Object.freeze({
      enabled: e.TEAMS_ENABLED,
      defaultWebhookUrl: e.TEAMS_WEBHOOK_URL,
      rejectWebhookUrl: e.TEAMS_REJECT_WEBHOOK_URL,
      timeoutMs: Math.round(e.NOTIFY_TIMEOUT * 1000),
      caseBaseUrl: e.BASE_URL,
    }),
    transcripts: Object.freeze({
      source: e.TRANSCRIPT_SOURCE,
      baseUrl: e.BASE_URL,
      dir: e.TRANSCRIPT_DIR || e.WORK_DIR,
      apiToken: e.TRANSCRIPT_API_TOKEN,
      timeoutMs: Math.round(e.TRANSCRIPT_TIMEOUT * 1000),
    }),
    monitor: Object.freeze({
      monitorDir: e.MONITOR_DIR,
      workDir: e.WORK_DIR,
      caseIdDigits: e.CASE_ID_DIGITS,
      pollIntervalMs: Math.round(e.POLL_INTERVAL * 1000),
      processExisting: e.PROCESS_EXISTING,
    }),
    isDev: e.NODE_ENV === 'development',
    isProd: e.NODE_ENV === 'production',
  };

  return Object.freeze(config);
}
