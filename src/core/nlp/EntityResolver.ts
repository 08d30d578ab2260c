import { createLogger } from '../../utils/logger.js';
import { VocabularySnapshot } from './VocabularySnapshot.js';
import type { SnapshotContext } from './VocabularySnapshot.js';
import type { DeviceMatch, DeviceRecord } from './types.js';

/**
 * Resolves device and room mentions against the current vocabulary
 * snapshot. Reloading swaps the snapshot reference in one assignment, so a
 * caller that took `snapshot()` keeps a consistent view for its request.
 */
export class EntityResolver {
  private current: VocabularySnapshot;
  private readonly logger = createLogger({ component: 'entity-resolver' });

  constructor(
    private readonly context: SnapshotContext,
    records: readonly DeviceRecord[] = []
  ) {
    this.current = VocabularySnapshot.build(records, context);
  }

  snapshot(): VocabularySnapshot {
    return this.current;
  }

  reload(records: readonly DeviceRecord[]): VocabularySnapshot {
    const next = VocabularySnapshot.build(records, this.context);
    const previousSize = this.current.size;
    this.current = next;
    this.logger.info({ devices: next.size, previousSize }, 'Vocabulary swapped');
    return next;
  }

  match(text: string, snapshot: VocabularySnapshot = this.current): DeviceMatch {
    return snapshot.matchDevice(text);
  }

  matchRoom(text: string, snapshot: VocabularySnapshot = this.current): string | null {
    return snapshot.matchRoom(text)?.room ?? null;
  }
}
