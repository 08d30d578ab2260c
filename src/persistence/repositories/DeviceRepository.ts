import type { Database } from 'better-sqlite3';
import type { DeviceRecord } from '../../core/nlp/types.js';
import type { DeviceVocabularyPort } from '../../ports/DeviceVocabularyPort.js';
import { VocabularyError } from '../../utils/errors.js';
import { getDatabase } from '../database.js';

interface DeviceRow {
  device_key: string;
  name: string;
  category: string;
  room: string | null;
  aliases: string;
  position: number;
}

/** Wire-form device as stored; validated by the vocabulary schema on load. */
export interface StoredDevice {
  device_key: string;
  name: string;
  category: string;
  room: string | null;
  aliases: unknown;
}

export class DeviceRepository implements DeviceVocabularyPort {
  readonly name = 'database';
  private readonly db: Database;

  constructor(db?: Database) {
    this.db = db || getDatabase();
  }

  getAll(): StoredDevice[] {
    const rows = this.db
      .prepare<[], DeviceRow>('SELECT * FROM devices ORDER BY position ASC, device_key ASC')
      .all();
    return rows.map(rowToDevice);
  }

  count(): number {
    const row = this.db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM devices').get();
    return row?.total ?? 0;
  }

  /** Replaces the whole table; list order becomes registration order. */
  replaceAll(devices: readonly DeviceRecord[]): number {
    const remove = this.db.prepare('DELETE FROM devices');
    const insert = this.db.prepare(`
      INSERT INTO devices (device_key, name, category, room, aliases, position)
      VALUES (@deviceKey, @name, @category, @room, @aliases, @position)
    `);

    const write = this.db.transaction((records: readonly DeviceRecord[]) => {
      remove.run();
      records.forEach((device, position) => {
        insert.run({
          deviceKey: device.deviceKey,
          name: device.name,
          category: device.category,
          room: device.room,
          aliases: JSON.stringify(device.aliases),
          position,
        });
      });
    });
    write(devices);
    return devices.length;
  }

  async loadSnapshot(): Promise<unknown> {
    return this.getAll();
  }
}

function rowToDevice(row: DeviceRow): StoredDevice {
  let aliases: unknown;
  try {
    aliases = JSON.parse(row.aliases);
  } catch (error) {
    throw new VocabularyError(`Stored aliases of ${row.device_key} are not valid JSON`, { cause: error });
  }
  return {
    device_key: row.device_key,
    name: row.name,
    category: row.category,
    room: row.room,
    aliases,
  };
}
