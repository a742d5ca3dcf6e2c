export const API_PREFIX = '/api';

export const ENTRY_TYPES = ['Question', 'Answer', 'Unknown'] as const;

export const VERDICTS = ['Approved', 'Rejected', 'Unknown', 'Unparsed'] as const;

export const SKIP_REASONS = ['no_entries', 'last_entry_not_answer', 'no_answer_entry'] as const;

export const OUTCOME_STATUSES = ['skipped', 'judged', 'failed'] as const;

export const NOTIFICATION_TARGETS = ['default', 'reject'] as const;

export const TRANSCRIPT_SOURCES = ['file', 'http'] as const;

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

// Localized tokens of the default review prompt's output format.
export const RESULT_TOKENS = {
  approve: '承認',
  reject: '却下',
  unknown: '不明',
} as const;

export const REJECT_SYNONYMS = ['reject', 'rejected', 'ng', 'fail', RESULT_TOKENS.reject] as const;
export const APPROVE_SYNONYMS = ['approve', 'approved', 'ok', 'pass', RESULT_TOKENS.approve] as const;

export const ENTRIES_PLACEHOLDER = '{entries}';

export const DEFAULTS = {
  fencePattern: '[ー\\-]+',
  questionKeyword: 'QUESTION',
  answerKeyword: 'ANSWER',
  headerDatePattern: '\\d{4}/\\d{2}/\\d{2}\\s+\\d{2}:\\d{2}',
  maxChars: 6000,
  maxLineLength: 200,
  promptFile: 'prompts/consistency-review.txt',
  oracleBaseUrl: 'http://localhost:11434/v1',
  oracleModel: 'llama3.2:1b',
  oracleTemperature: 0.2,
  oracleTimeoutSeconds: 60,
  notifyTimeoutSeconds: 10,
  transcriptTimeoutSeconds: 30,
  caseBaseUrl: 'http://localhost:8080/',
  caseIdDigits: 8,
  pollIntervalSeconds: 2,
} as const;
