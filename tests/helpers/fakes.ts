import type { Logger } from '@shared/logger';
import type { ChatMessage, JudgementOracle } from '@core/prompt';
import type { NotificationPayload, Notifier } from '@core/notification';
import type { EntryArtifactSink, TranscriptSource } from '@core/pipeline';
import type { Entry } from '@shared/types';

export class FakeOracle implements JudgementOracle {
  readonly calls: { caseId: string; messages: ChatMessage[] }[] = [];

  constructor(private readonly reply: string | Error) {}

  async complete(caseId: string, messages: ChatMessage[]): Promise<string> {
    this.calls.push({ caseId, messages });
    if (this.reply instanceof Error) throw this.reply;
    return this.reply;
  }
}

export class RecordingNotifier implements Notifier {
  readonly sent: { url: string; payload: NotificationPayload }[] = [];

  constructor(private readonly failing: ReadonlySet<string> = new Set()) {}

  async deliver(url: string, payload: NotificationPayload): Promise<void> {
    if (this.failing.has(url)) throw new Error(`HTTP 500 from ${url}`);
    this.sent.push({ url, payload });
  }
}

export class MapSource implements TranscriptSource {
  constructor(private readonly transcripts: Record<string, string>) {}

  async fetchTranscript(caseId: string): Promise<string> {
    const text = this.transcripts[caseId];
    if (text === undefined) throw new Error(`no transcript for ${caseId}`);
    return text;
  }
}

export class MemoryArtifacts implements EntryArtifactSink {
  readonly saved = new Map<string, readonly Entry[]>();

  async saveEntries(caseId: string, entries: readonly Entry[]): Promise<void> {
    this.saved.set(caseId, entries);
  }
}

/** Logger that keeps `level message` lines for assertions. */
export function memoryLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    debug: (message) => lines.push(`debug ${message}`),
    info: (message) => lines.push(`info ${message}`),
    warn: (message) => lines.push(`warn ${message}`),
    error: (message) => lines.push(`error ${message}`),
  };
}
