import { readFile } from 'node:fs/promises';
import type { DeviceVocabularyPort } from '../../ports/DeviceVocabularyPort.js';
import { VocabularyError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { resolveFromRoot } from '../../utils/paths.js';

/** Device vocabulary kept in a JSON file: a top-level array of wire-form devices. */
export class JsonFileVocabularyAdapter implements DeviceVocabularyPort {
  readonly name = 'json';
  private readonly logger = createLogger({ adapter: 'JsonFileVocabularyAdapter' });
  private readonly path: string;

  constructor(path: string) {
    this.path = resolveFromRoot(path);
  }

  async loadSnapshot(): Promise<unknown> {
    const logger = this.logger.child({ method: 'loadSnapshot', path: this.path });

    let content: string;
    try {
      content = await readFile(this.path, 'utf8');
    } catch (error) {
      logger.error({ error }, 'Device file not readable');
      throw new VocabularyError(`Cannot read device file ${this.path}`, { cause: error });
    }

    try {
      return JSON.parse(content);
    } catch (error) {
      throw new VocabularyError(`Device file ${this.path} is not valid JSON`, { cause: error });
    }
  }
}
