import { vi } from 'vitest';
import { createInterpreter } from '../../core/interpreter/createInterpreter.js';
import type { InterpreterOptions } from '../../core/interpreter/createInterpreter.js';
import { loadLexicon } from '../../core/nlp/lexicon.js';
import { Normalizer } from '../../core/nlp/Normalizer.js';
import { parseVocabulary } from '../../core/nlp/VocabularySnapshot.js';
import type { SnapshotContext } from '../../core/nlp/VocabularySnapshot.js';
import { DEFAULT_TUNING } from '../../core/nlp/types.js';
import type { DeviceRecord } from '../../core/nlp/types.js';
import type { FallbackInterpreterPort } from '../../ports/FallbackInterpreterPort.js';

export const lexicon = loadLexicon();

export const normalizer = new Normalizer(lexicon);

export const snapshotContext: SnapshotContext = { normalizer, lexicon, tuning: DEFAULT_TUNING };

export const wireDevices = [
  { device_key: 'luz_sala', name: 'Luz de la sala', category: 'light', room: 'sala', aliases: ['luz', 'luz de la sala'] },
  { device_key: 'luz_comedor', name: 'Luz del comedor', category: 'light', room: 'comedor', aliases: ['luz', 'luz del comedor'] },
  { device_key: 'ventilador_sala', name: 'Ventilador de techo', category: 'fan', room: 'sala', aliases: ['ventilador de la sala'] },
  { device_key: 'puerta_garage', name: 'Porton', category: 'door', room: 'cochera', aliases: ['puerta del garage'] },
  { device_key: 'cortina_dormitorio', name: 'Cortina', category: 'curtain', room: 'dormitorio' },
  { device_key: 'sensor_atico', name: 'Sensor del atico', category: 'sensor', room: 'atico' },
];

export function testDevices(): DeviceRecord[] {
  return parseVocabulary(wireDevices);
}

export function stubFallback(
  interpret: FallbackInterpreterPort['interpret'] = vi.fn().mockResolvedValue({ intent: 'unknown', device: null })
): FallbackInterpreterPort {
  return { name: 'stub', interpret };
}

export function testInterpreter(overrides: Partial<InterpreterOptions> = {}) {
  return createInterpreter({
    lexicon,
    locales: ['es', 'en'],
    defaultLocale: 'es',
    devices: testDevices(),
    ...overrides,
  });
}
