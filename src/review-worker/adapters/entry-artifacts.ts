import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { Entry } from '@shared/types';
import type { EntryArtifactSink } from '@core/pipeline';

/** Writes the judged entries to `<workDir>/<caseId>.json`. */
export class FileEntryArtifactSink implements EntryArtifactSink {
  constructor(private readonly workDir: string) {}

  async saveEntries(caseId: string, entries: readonly Entry[]): Promise<void> {
    await mkdir(this.workDir, { recursive: true });
    await writeFile(
      path.join(this.workDir, `${caseId}.json`),
      JSON.stringify(entries, null, 4),
      'utf-8',
    );
  }
}
