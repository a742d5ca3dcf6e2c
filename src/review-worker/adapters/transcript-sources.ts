import { readFile } from 'fs/promises';
import path from 'path';
import { request, type Dispatcher } from 'undici';
import type { TranscriptSource } from '@core/pipeline';
import { TranscriptFetchError, describeError } from '@core/errors';
import { buildCaseUrl } from '@core/notification';

// --- File ---

/** Reads `<dir>/<caseId>.txt`, as left behind by an export job. */
export class FileTranscriptSource implements TranscriptSource {
  constructor(private readonly dir: string) {}

  async fetchTranscript(caseId: string): Promise<string> {
    const file = path.join(this.dir, `${caseId}.txt`);
    try {
      return await readFile(file, 'utf-8');
    } catch (err) {
      throw new TranscriptFetchError(caseId, `Cannot read transcript ${file}: ${describeError(err)}`, {
        cause: err,
      });
    }
  }
}

// --- HTTP ---

export interface HttpTranscriptOptions {
  baseUrl: string;
  apiToken?: string;
  timeoutMs: number;
  dispatcher?: Dispatcher;
}

/** GETs the case page as text. Sign-in flows are not handled here. */
export class HttpTranscriptSource implements TranscriptSource {
  constructor(private readonly options: HttpTranscriptOptions) {}

  async fetchTranscript(caseId: string): Promise<string> {
    const url = buildCaseUrl(this.options.baseUrl, caseId);
    const headers: Record<string, string> = { accept: 'text/plain, text/html;q=0.9' };
    if (this.options.apiToken) headers.authorization = `Bearer ${this.options.apiToken}`;

    let statusCode: number;
    let text: string;
    try {
      const response = await request(url, {
        method: 'GET',
        headers,
        headersTimeout: this.options.timeoutMs,
        bodyTimeout: this.options.timeoutMs,
        dispatcher: this.options.dispatcher,
      });
      statusCode = response.statusCode;
      text = await response.body.text();
    } catch (err) {
      throw new TranscriptFetchError(caseId, `GET ${url} failed: ${describeError(err)}`, { cause: err });
    }

    if (statusCode < 200 || statusCode >= 300) {
      throw new TranscriptFetchError(caseId, `GET ${url} returned HTTP ${statusCode}`);
    }
    return text;
  }
}

// --- Inline ---

/** Serves text that is already in hand, e.g. from an API request body. */
export class StaticTranscriptSource implements TranscriptSource {
  constructor(private readonly texts: ReadonlyMap<string, string>) {}

  async fetchTranscript(caseId: string): Promise<string> {
    const text = this.texts.get(caseId);
    if (text === undefined) throw new TranscriptFetchError(caseId, `No transcript supplied for case ${caseId}`);
    return text;
  }
}
