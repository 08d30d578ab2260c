/**
 * Copies the JSON device vocabulary into the SQLite devices table.
 * Usage: npm run seed:devices [-- path/to/devices.json]
 */
import 'dotenv/config';

import { JsonFileVocabularyAdapter } from '../src/adapters/vocabulary/JsonFileVocabularyAdapter.js';
import { parseVocabulary } from '../src/core/nlp/VocabularySnapshot.js';
import { closeDatabase, getDatabase } from '../src/persistence/database.js';
import { DeviceRepository } from '../src/persistence/repositories/DeviceRepository.js';
import { createLogger } from '../src/utils/logger.js';

const logger = createLogger({ component: 'seed-devices' });

async function main(): Promise<void> {
  const file = process.argv[2] ?? process.env.DEVICES_FILE ?? 'data/devices.json';
  const records = parseVocabulary(await new JsonFileVocabularyAdapter(file).loadSnapshot());
  const repository = new DeviceRepository(getDatabase());
  const written = repository.replaceAll(records);
  logger.info({ file, written }, 'Devices seeded');
  closeDatabase();
}

main().catch((error) => {
  logger.error({ error }, 'Seeding failed');
  process.exit(1);
});
