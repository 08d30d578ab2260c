import type { ReloadOutcome } from '../core/interpreter/InterpretationOrchestrator.js';
import type { DeviceVocabularyPort } from '../ports/DeviceVocabularyPort.js';
import { describeError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

export interface VocabularyTarget {
  reloadVocabulary(raw: unknown): ReloadOutcome;
}

/** Pulls the device vocabulary from its source and swaps it in. */
export class VocabularyRefreshJob {
  private readonly logger = createLogger({ job: 'VocabularyRefreshJob' });

  constructor(
    private readonly source: DeviceVocabularyPort,
    private readonly target: VocabularyTarget
  ) {}

  async run(): Promise<ReloadOutcome> {
    const logger = this.logger.child({ method: 'run', source: this.source.name });

    let raw: unknown;
    try {
      raw = await this.source.loadSnapshot();
    } catch (error) {
      logger.error({ error }, 'Vocabulary source failed; keeping current snapshot');
      return { ok: false, error: describeError(error) };
    }

    const outcome = this.target.reloadVocabulary(raw);
    if (outcome.ok) {
      logger.info({ devices: outcome.deviceCount }, 'Vocabulary refreshed');
    } else {
      logger.warn({ error: outcome.error }, 'Vocabulary refresh rejected');
    }
    return outcome;
  }
}
