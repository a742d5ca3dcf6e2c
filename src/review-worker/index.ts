// review-worker: watches the trigger directory and reviews one case per
// new trigger file.

import { loadConfig } from '@shared/config';
import { configureLogging, createLogger } from '@shared/logger';
import { reviewCase } from '@core/pipeline';
import { describeError } from '@core/errors';
import { createReviewDependencies } from './wiring';
import { DirectoryMonitor } from './monitor';
import { StopToken, installStopSignals } from './stop-token';
import { createReviewStore } from '@db/review-store';

export const REVIEW_WORKER_VERSION = '0.1.0';

const log = createLogger('WORKER');

async function main() {
  const config = loadConfig();
  configureLogging(config.logging);

  const deps = createReviewDependencies(config);
  const store = config.databaseUrl ? createReviewStore(config.databaseUrl) : undefined;
  const stopToken = new StopToken();

  installStopSignals(stopToken, {
    onStop: (signal) => log.info(`${signal} received — stopping after the current case`),
    onForce: (signal) => {
      log.error(`${signal} received again — exiting immediately`);
      process.exit(1);
    },
  });

  const monitor = new DirectoryMonitor({
    settings: config.monitor,
    stopToken,
    logger: createLogger('MONITOR'),
    handler: async (caseId) => {
      const outcome = await reviewCase(caseId, deps);
      if (store) {
        try {
          await store.record(outcome);
        } catch (err) {
          log.error(`case_id=${caseId} could not be recorded: ${describeError(err)}`);
        }
      }
      return outcome;
    },
  });

  log.info(
    `Ticket review worker v${REVIEW_WORKER_VERSION} (source=${config.transcripts.source}, partial=${config.review.allowPartial})`,
  );
  await monitor.run();
  if (store) await store.close();
}

main().catch((err) => {
  log.error('Worker failed:', err);
  process.exit(1);
});
