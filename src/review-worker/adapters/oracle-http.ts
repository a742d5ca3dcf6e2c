import { readFileSync } from 'fs';
import { Agent, request, type Dispatcher } from 'undici';
import { z } from 'zod';
import type { OracleSettings } from '@shared/config';
import type { ChatMessage, JudgementOracle } from '@core/prompt';
import { OracleCallError, describeError } from '@core/errors';

const COMPLETIONS_PATH = '/chat/completions';

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string() }),
      }),
    )
    .min(1),
});

/** Accepts either the API base (…/v1) or the full completions URL. */
export function buildCompletionsUrl(baseUrl: string): string {
  const base = baseUrl.replace(/\/+$/, '');
  return base.endsWith(COMPLETIONS_PATH) ? base : `${base}${COMPLETIONS_PATH}`;
}

function certificateAgent(certFile: string): Agent {
  // PEM bundle holding both the client certificate and its key
  const pem = readFileSync(certFile);
  return new Agent({ connect: { cert: pem, key: pem } });
}

/**
 * OpenAI-compatible chat-completions client. One request per call, no
 * retries: any transport error or non-2xx status is an OracleCallError.
 */
export class OracleHttpClient implements JudgementOracle {
  private readonly dispatcher?: Dispatcher;

  constructor(
    private readonly settings: OracleSettings,
    dispatcher?: Dispatcher,
  ) {
    this.dispatcher = dispatcher ?? (settings.certFile ? certificateAgent(settings.certFile) : undefined);
  }

  async complete(caseId: string, messages: ChatMessage[]): Promise<string> {
    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (this.settings.apiKey) headers.authorization = `Bearer ${this.settings.apiKey}`;

    let statusCode: number;
    let raw: string;
    try {
      const response = await request(buildCompletionsUrl(this.settings.baseUrl), {
        method: 'POST',
        headers,
        body: JSON.stringify({
          model: this.settings.model,
          messages,
          temperature: this.settings.temperature,
        }),
        headersTimeout: this.settings.timeoutMs,
        bodyTimeout: this.settings.timeoutMs,
        dispatcher: this.dispatcher,
      });
      statusCode = response.statusCode;
      raw = await response.body.text();
    } catch (err) {
      throw new OracleCallError(`Oracle request for case ${caseId} failed: ${describeError(err)}`, undefined, {
        cause: err,
      });
    }

    if (statusCode < 200 || statusCode >= 300) {
      throw new OracleCallError(
        `Oracle returned HTTP ${statusCode} for case ${caseId}: ${raw.slice(0, 200)}`,
        statusCode,
      );
    }

    let body: unknown;
    try {
      body = JSON.parse(raw);
    } catch (err) {
      throw new OracleCallError(`Oracle response for case ${caseId} is not JSON`, statusCode, {
        cause: err,
      });
    }
    const parsed = completionSchema.safeParse(body);
    if (!parsed.success) {
      throw new OracleCallError(
        `Oracle response for case ${caseId} has no message content`,
        statusCode,
      );
    }
    return parsed.data.choices[0].message.content;
  }
}
