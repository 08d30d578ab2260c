import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import { ConfigError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { VocabularyRefreshJob } from './VocabularyRefreshJob.js';

const logger = createLogger({ component: 'scheduler' });

export function scheduleVocabularyRefresh(job: VocabularyRefreshJob, cronExpression: string): ScheduledTask {
  if (!cron.validate(cronExpression)) {
    throw new ConfigError(`Invalid VOCABULARY_REFRESH_CRON expression: ${cronExpression}`);
  }

  logger.info({ cronExpression }, 'Scheduling vocabulary refresh job');

  return cron.schedule(cronExpression, () => {
    job.run().catch((error: unknown) => {
      logger.error({ error }, 'Vocabulary refresh job failed');
    });
  });
}
