import type { AppConfig } from '@shared/config';
import { createLogger } from '@shared/logger';
import { buildHeaderPatterns } from '@core/header';
import type { ReviewDependencies, TranscriptSource } from '@core/pipeline';
import { OracleHttpClient } from './adapters/oracle-http';
import { TeamsWebhookNotifier } from './adapters/teams-notifier';
import { FileTranscriptSource, HttpTranscriptSource } from './adapters/transcript-sources';
import { FileEntryArtifactSink } from './adapters/entry-artifacts';

export function createTranscriptSource(config: AppConfig): TranscriptSource {
  const { transcripts } = config;
  if (transcripts.source === 'http') {
    return new HttpTranscriptSource({
      baseUrl: transcripts.baseUrl,
      apiToken: transcripts.apiToken || undefined,
      timeoutMs: transcripts.timeoutMs,
    });
  }
  return new FileTranscriptSource(transcripts.dir);
}

/** Builds the pipeline's collaborators once from the loaded configuration. */
export function createReviewDependencies(
  config: AppConfig,
  overrides: Partial<ReviewDependencies> = {},
): ReviewDependencies {
  return {
    settings: config.review,
    promptTemplate: config.oracle.promptTemplate,
    source: createTranscriptSource(config),
    oracle: new OracleHttpClient(config.oracle),
    notifier: new TeamsWebhookNotifier(config.notifications.timeoutMs),
    notifications: {
      enabled: config.notifications.enabled,
      endpoints: {
        default: config.notifications.defaultWebhookUrl,
        reject: config.notifications.rejectWebhookUrl,
      },
      caseBaseUrl: config.notifications.caseBaseUrl,
    },
    artifacts: new FileEntryArtifactSink(config.monitor.workDir),
    patterns: buildHeaderPatterns(config.review.extraction),
    logger: createLogger('PIPELINE'),
    ...overrides,
  };
}
