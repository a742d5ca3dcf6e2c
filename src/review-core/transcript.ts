import type { ReviewSettings } from '@shared/config';
import type { Entry } from '@shared/types';
import { silentLogger, type Logger } from '@shared/logger';
import { extractEntries } from './entries';
import { cleanEntryData } from './cleaner';
import { trimRecentEntries } from './trimmer';
import type { HeaderPatterns } from './header';

/** Extract → clean → drop empty. */
export function cleanTranscript(
  text: string,
  settings: ReviewSettings,
  patterns: HeaderPatterns,
  logger: Logger = silentLogger,
): Entry[] {
  const cleaned: Entry[] = [];

  for (const entry of extractEntries(text, patterns, logger)) {
    const data = cleanEntryData(entry.data, settings.cleaning);
    if (!data) {
      logger.debug(`transcript: dropping empty ${entry.type} entry dated ${entry.date}`);
      continue;
    }
    cleaned.push({ ...entry, data });
  }
  return cleaned;
}

/** Cleaned entries cut to the character budget, newest entries first in line. */
export function buildTranscript(
  text: string,
  settings: ReviewSettings,
  patterns: HeaderPatterns,
  logger: Logger = silentLogger,
): Entry[] {
  const cleaned = cleanTranscript(text, settings, patterns, logger);
  const trimmed = trimRecentEntries(cleaned, settings.maxChars);
  logger.debug(`transcript: cleaned=${cleaned.length} kept=${trimmed.length} budget=${settings.maxChars}`);
  return trimmed;
}
