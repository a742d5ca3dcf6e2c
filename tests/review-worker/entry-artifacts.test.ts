import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { FileEntryArtifactSink } from '@worker/adapters/entry-artifacts';
import { entry } from '../helpers/settings';

describe('FileEntryArtifactSink', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'artifacts-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the entries as indented JSON, creating the directory', async () => {
    const workDir = path.join(dir, 'work');
    const entries = [entry('Answer', '了解しました')];
    await new FileEntryArtifactSink(workDir).saveEntries('00000001', entries);

    const written = await readFile(path.join(workDir, '00000001.json'), 'utf-8');
    expect(written).toBe(JSON.stringify(entries, null, 4));
    expect(JSON.parse(written)).toEqual(entries);
  });
});
