import { readdir, stat, unlink, mkdir } from 'fs/promises';
import path from 'path';
import { setTimeout as sleep } from 'timers/promises';
import type { MonitorSettings } from '@shared/config';
import { silentLogger, type Logger } from '@shared/logger';
import { describeError } from '@core/errors';
import type { StopToken } from './stop-token';

export type CaseHandler = (caseId: string) => Promise<unknown>;

export interface MonitorOptions {
  settings: MonitorSettings;
  handler: CaseHandler;
  stopToken: StopToken;
  logger?: Logger;
  /** Size checks before a trigger file counts as fully written. */
  stabilityChecks?: number;
  stabilityIntervalMs?: number;
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Polls a directory for `<caseId>.txt` trigger files and runs the handler
 * once per new file, one case at a time.
 */
export class DirectoryMonitor {
  private readonly processed = new Set<string>();
  private readonly triggerPattern: RegExp;
  private readonly logger: Logger;
  private readonly stabilityChecks: number;
  private readonly stabilityIntervalMs: number;

  constructor(private readonly options: MonitorOptions) {
    this.triggerPattern = new RegExp(`^(?<caseId>\\d{${options.settings.caseIdDigits}})\\.txt$`);
    this.logger = options.logger ?? silentLogger;
    this.stabilityChecks = options.stabilityChecks ?? 5;
    this.stabilityIntervalMs = options.stabilityIntervalMs ?? 1000;
  }

  get processedCount(): number {
    return this.processed.size;
  }

  private caseIdOf(fileName: string): string | undefined {
    return this.triggerPattern.exec(fileName)?.groups?.caseId;
  }

  private async listTriggers(): Promise<{ file: string; caseId: string }[]> {
    const dir = this.options.settings.monitorDir;
    const names = (await readdir(dir, { withFileTypes: true }))
      .filter((d) => d.isFile())
      .map((d) => d.name)
      .sort();

    const triggers: { file: string; caseId: string }[] = [];
    for (const name of names) {
      const caseId = this.caseIdOf(name);
      if (caseId) triggers.push({ file: path.join(dir, name), caseId });
    }
    return triggers;
  }

  /** Marks the trigger files already present as done. */
  async prepare(): Promise<void> {
    await mkdir(this.options.settings.monitorDir, { recursive: true });
    if (this.options.settings.processExisting) return;
    for (const { file } of await this.listTriggers()) this.processed.add(file);
    this.logger.debug(`ignoring ${this.processed.size} existing trigger files`);
  }

  /** False when the file vanished or a stop was requested while waiting. */
  async waitForStableSize(file: string): Promise<boolean> {
    let lastSize = -1;
    for (let i = 0; i < this.stabilityChecks; i += 1) {
      if (this.options.stopToken.stopRequested) return false;
      let size: number;
      try {
        size = (await stat(file)).size;
      } catch (err) {
        if (isMissing(err)) return false;
        throw err;
      }
      if (size === lastSize) return true;
      lastSize = size;
      await sleep(this.stabilityIntervalMs);
    }
    this.logger.debug(`size of ${file} did not settle; processing anyway`);
    return true;
  }

  /** One pass over the directory. Returns the number of cases handled. */
  async scanOnce(): Promise<number> {
    let handled = 0;
    for (const { file, caseId } of await this.listTriggers()) {
      if (this.options.stopToken.stopRequested) break;
      if (this.processed.has(file)) continue;
      if (!(await this.waitForStableSize(file))) continue;

      await this.options.handler(caseId);
      handled += 1;
      this.processed.add(file);
      try {
        await unlink(file);
      } catch (err) {
        if (!isMissing(err)) throw err;
      }
    }
    return handled;
  }

  async run(): Promise<void> {
    await this.prepare();
    this.logger.info(`watching ${this.options.settings.monitorDir}`);

    while (!this.options.stopToken.stopRequested) {
      try {
        await this.scanOnce();
      } catch (err) {
        this.logger.error(`Monitor loop error: ${describeError(err)}`);
      }
      if (this.options.stopToken.stopRequested) break;
      await sleep(this.options.settings.pollIntervalMs);
    }
    this.logger.info('stop requested; monitor finished');
  }
}
