import type {
  DeliveryResult,
  JudgementResult,
  NotificationTarget,
} from '@shared/types';
import { describeError } from './errors';

// ── Adaptive Card elements ──────────────────────────────────────────────────

export interface TextBlock {
  type: 'TextBlock';
  text: string;
  wrap: boolean;
  size?: 'Small' | 'Medium' | 'Large';
  weight?: 'Lighter' | 'Default' | 'Bolder';
  color?: 'Default' | 'Good' | 'Attention' | 'Warning';
  spacing?: 'Small' | 'Medium' | 'Large';
}

export interface Container {
  type: 'Container';
  items: TextBlock[];
  style?: 'default' | 'emphasis' | 'good' | 'attention' | 'warning';
  bleed?: boolean;
}

export interface NotificationPayload {
  summary: string;
  body: Container[];
}

/** Delivery transport; rejects when the endpoint does not accept the payload. */
export interface Notifier {
  deliver(url: string, payload: NotificationPayload): Promise<void>;
}

export type TargetEndpoints = Record<NotificationTarget, string>;

// ── Case links ──────────────────────────────────────────────────────────────

export function buildCaseUrl(baseUrl: string, caseId: string): string {
  if (baseUrl.includes('?') || baseUrl.endsWith('=')) return `${baseUrl}${caseId}`;
  const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  return new URL(caseId, base).toString();
}

// ── Payload ─────────────────────────────────────────────────────────────────

function caseLink(caseId: string, caseUrl: string): TextBlock {
  return { type: 'TextBlock', text: `[Case #${caseId}](${caseUrl})`, wrap: true, spacing: 'Small' };
}

export function buildNotificationPayload(
  caseId: string,
  caseUrl: string,
  judgement: JudgementResult,
): NotificationPayload {
  const { verdict, reason, rawText } = judgement;

  if (verdict === 'Rejected') {
    return {
      summary: `Case ID ${caseId} caseid mismatch`,
      body: [
        {
          type: 'Container',
          style: 'attention',
          bleed: true,
          items: [
            {
              type: 'TextBlock',
              text: '🚨 Possible case ID mismatch',
              size: 'Large',
              weight: 'Bolder',
              color: 'Attention',
              wrap: true,
            },
            caseLink(caseId, caseUrl),
            {
              type: 'TextBlock',
              text: 'The last answer appears to belong to a different case. Please check it urgently.',
              wrap: true,
              spacing: 'Medium',
              color: 'Attention',
            },
            { type: 'TextBlock', text: `Reason: ${reason ?? rawText}`, wrap: true, spacing: 'Small' },
          ],
        },
      ],
    };
  }

  if (verdict === 'Approved') {
    return {
      summary: `Case ID ${caseId} approved`,
      body: [
        {
          type: 'Container',
          bleed: true,
          items: [
            {
              type: 'TextBlock',
              text: '✅ **Ticket approved**',
              size: 'Large',
              weight: 'Bolder',
              color: 'Good',
              wrap: true,
            },
            caseLink(caseId, caseUrl),
            { type: 'TextBlock', text: reason ? `Reason: ${reason}` : rawText, wrap: true },
          ],
        },
      ],
    };
  }

  return {
    summary: verdict === 'Unknown' ? `Case ID ${caseId} unknown` : `Case ID ${caseId}`,
    body: [
      {
        type: 'Container',
        items: [
          { type: 'TextBlock', text: '❔ Verdict unclear', size: 'Large', weight: 'Bolder', wrap: true },
          caseLink(caseId, caseUrl),
          { type: 'TextBlock', text: rawText, wrap: true },
        ],
      },
    ],
  };
}

// ── Dispatch ────────────────────────────────────────────────────────────────

/**
 * Sends the payload to every target on its own; one failed delivery does not
 * affect the others.
 */
export async function dispatchNotification(
  targets: readonly NotificationTarget[],
  endpoints: TargetEndpoints,
  payload: NotificationPayload,
  notifier: Notifier,
  enabled = true,
): Promise<DeliveryResult[]> {
  if (!enabled) {
    return targets.map((target) => ({ target, delivered: false, skipped: 'disabled' }));
  }

  const settled = await Promise.allSettled(
    targets.map(async (target): Promise<DeliveryResult> => {
      const url = endpoints[target];
      if (!url) return { target, delivered: false, skipped: 'no_url' };
      await notifier.deliver(url, payload);
      return { target, delivered: true };
    }),
  );

  return settled.map((result, i) =>
    result.status === 'fulfilled'
      ? result.value
      : { target: targets[i], delivered: false, error: describeError(result.reason) },
  );
}
