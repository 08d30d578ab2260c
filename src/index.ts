// Load environment variables first
import 'dotenv/config';

import { config } from './config/index.js';
import { createLogger } from './utils/logger.js';
import { loadLexicon } from './core/nlp/lexicon.js';
import { createInterpreter } from './core/interpreter/createInterpreter.js';
import { ResponseComposer } from './core/interpreter/ResponseComposer.js';
import { createFallbackInterpreter } from './adapters/fallback/createFallbackInterpreter.js';
import { JsonFileVocabularyAdapter } from './adapters/vocabulary/JsonFileVocabularyAdapter.js';
import { DeviceRepository } from './persistence/repositories/DeviceRepository.js';
import { getDatabase } from './persistence/database.js';
import type { DeviceVocabularyPort } from './ports/DeviceVocabularyPort.js';
import { VocabularyRefreshJob } from './scheduler/VocabularyRefreshJob.js';
import { scheduleVocabularyRefresh } from './scheduler/index.js';
import { startServer } from './server.js';

const logger = createLogger({ component: 'index' });

async function main(): Promise<void> {
  logger.info({ locales: config.locales, fallback: config.fallbackProvider }, 'Starting home command interpreter');

  try {
    const lexicon = loadLexicon(config.lexiconDir);

    const orchestrator = createInterpreter({
      lexicon,
      locales: config.locales,
      defaultLocale: config.defaultLocale,
      tuning: {
        intentThreshold: config.intentThreshold,
        deviceThreshold: config.deviceThreshold,
        leadingMatchBonus: config.leadingMatchBonus,
      },
      fallbackTimeoutMs: config.fallbackTimeoutMs,
      fallback: (devices) => createFallbackInterpreter(config, devices),
    });

    const vocabularySource: DeviceVocabularyPort =
      config.devicesSource === 'database'
        ? new DeviceRepository(getDatabase(config.databasePath))
        : new JsonFileVocabularyAdapter(config.devicesFile);
    const refreshJob = new VocabularyRefreshJob(vocabularySource, orchestrator);

    // Start with an empty vocabulary rather than refuse to boot; /devices/reload can retry
    const initial = await refreshJob.run();
    if (!initial.ok) {
      logger.warn({ error: initial.error }, 'Initial vocabulary load failed');
    }

    if (config.vocabularyRefreshCron) {
      scheduleVocabularyRefresh(refreshJob, config.vocabularyRefreshCron);
    }

    await startServer(
      {
        orchestrator,
        composer: new ResponseComposer(lexicon),
        refreshJob,
        locales: config.locales,
        defaultLocale: config.defaultLocale,
      },
      config.port,
      config.host
    );

    logger.info({ host: config.host, port: config.port }, 'Server started successfully');
  } catch (error) {
    logger.error({ error }, 'Failed to start application');
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
