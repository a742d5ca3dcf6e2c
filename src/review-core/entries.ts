import type { Entry } from '@shared/types';
import { silentLogger, type Logger } from '@shared/logger';
import { segmentRecords } from './segmenter';
import { classifyHeader, type HeaderPatterns } from './header';

const MAX_MISS_SAMPLES = 5;

/**
 * Extracts the ordered `{date, type, data}` entries of a transcript.
 * Records whose header does not match are dropped without error.
 */
export function extractEntries(
  text: string,
  patterns: HeaderPatterns,
  logger: Logger = silentLogger,
): Entry[] {
  const records = segmentRecords(text, patterns.isFence);
  const entries: Entry[] = [];
  const misses: string[] = [];

  for (const record of records) {
    const header = classifyHeader(record.header, patterns);
    if (!header) {
      if (misses.length < MAX_MISS_SAMPLES) misses.push(`${record.line}: ${record.header}`);
      continue;
    }
    entries.push({
      date: header.date,
      type: header.type,
      data: record.body.join('\n').trim(),
    });
  }

  logger.debug(`extract: records=${records.length} entries=${entries.length}`);
  if (misses.length > 0) {
    logger.debug(`extract: unrecognized headers ${JSON.stringify(misses)}`);
  }
  return entries;
}
