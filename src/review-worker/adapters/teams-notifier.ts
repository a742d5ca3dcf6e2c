import { request, type Dispatcher } from 'undici';
import type { NotificationPayload, Notifier } from '@core/notification';
import { NotificationError, describeError } from '@core/errors';

export const ADAPTIVE_CARD_CONTENT_TYPE = 'application/vnd.microsoft.card.adaptive';
export const ADAPTIVE_CARD_SCHEMA = 'http://adaptivecards.io/schemas/adaptive-card.json';

export interface TeamsMessage {
  type: 'message';
  summary: string;
  attachments: {
    contentType: typeof ADAPTIVE_CARD_CONTENT_TYPE;
    content: {
      $schema: typeof ADAPTIVE_CARD_SCHEMA;
      type: 'AdaptiveCard';
      version: '1.4';
      body: NotificationPayload['body'];
    };
  }[];
}

export function toTeamsMessage(payload: NotificationPayload): TeamsMessage {
  return {
    type: 'message',
    summary: payload.summary,
    attachments: [
      {
        contentType: ADAPTIVE_CARD_CONTENT_TYPE,
        content: {
          $schema: ADAPTIVE_CARD_SCHEMA,
          type: 'AdaptiveCard',
          version: '1.4',
          body: payload.body,
        },
      },
    ],
  };
}

/** Posts Adaptive Card messages to Teams incoming webhooks. */
export class TeamsWebhookNotifier implements Notifier {
  constructor(
    private readonly timeoutMs: number,
    private readonly dispatcher?: Dispatcher,
  ) {}

  async deliver(url: string, payload: NotificationPayload): Promise<void> {
    let statusCode: number;
    try {
      const response = await request(url, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify(toTeamsMessage(payload)),
        headersTimeout: this.timeoutMs,
        bodyTimeout: this.timeoutMs,
        dispatcher: this.dispatcher,
      });
      statusCode = response.statusCode;
      await response.body.dump();
    } catch (err) {
      throw new NotificationError(`Webhook delivery failed: ${describeError(err)}`, undefined, { cause: err });
    }

    if (statusCode < 200 || statusCode >= 300) {
      throw new NotificationError(`Webhook returned HTTP ${statusCode}`, statusCode);
    }
  }
}
