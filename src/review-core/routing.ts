import type { JudgementResult, NotificationTarget } from '@shared/types';

export function isRejection(judgement: JudgementResult): boolean {
  return judgement.verdict === 'Rejected';
}

/** The default channel always hears about a verdict; rejections also go to the reject channel. */
export function selectTargets(judgement: JudgementResult): NotificationTarget[] {
  return isRejection(judgement) ? ['default', 'reject'] : ['default'];
}

export function resultLabel(judgement: JudgementResult): string {
  switch (judgement.verdict) {
    case 'Approved':
      return 'approved';
    case 'Rejected':
      return 'rejected';
    case 'Unknown':
      return 'unknown';
    case 'Unparsed':
      return 'unparsed';
  }
}
