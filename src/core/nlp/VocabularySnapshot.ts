import { z } from 'zod';
import { VocabularyError } from '../../utils/errors.js';
import { AliasTable } from './AliasTable.js';
import type { AliasHit, AliasSource } from './AliasTable.js';
import type { Lexicon } from './lexicon.js';
import type { Normalizer } from './Normalizer.js';
import { DEVICE_CATEGORIES, MATCH_STRATEGIES } from './types.js';
import type { DeviceMatch, DeviceRecord, InterpreterTuning, MatchStrategy } from './types.js';

const deviceWireSchema = z
  .object({
    device_key: z.string().trim().min(1),
    name: z.string().trim().min(1).optional(),
    category: z.enum(DEVICE_CATEGORIES),
    room: z.string().trim().min(1).nullish(),
    aliases: z.array(z.string().trim().min(1)).default([]),
  })
  .transform(
    (device): DeviceRecord => ({
      deviceKey: device.device_key,
      name: device.name ?? device.device_key,
      category: device.category,
      room: device.room ?? null,
      aliases: device.aliases,
    })
  );

/** Wire form of the device vocabulary: an ordered list, unique keys. */
export const vocabularySchema = z.array(deviceWireSchema).superRefine((devices, ctx) => {
  const seen = new Set<string>();
  devices.forEach((device, index) => {
    if (seen.has(device.deviceKey)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, 'device_key'],
        message: `duplicate device_key "${device.deviceKey}"`,
      });
    }
    seen.add(device.deviceKey);
  });
});

export function parseVocabulary(raw: unknown): DeviceRecord[] {
  const result = vocabularySchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new VocabularyError(`Invalid device vocabulary:\n${issues.join('\n')}`);
  }
  return result.data;
}

export function toWireDevice(device: DeviceRecord): z.input<typeof deviceWireSchema> {
  return {
    device_key: device.deviceKey,
    name: device.name,
    category: device.category,
    room: device.room,
    aliases: [...device.aliases],
  };
}

export interface SnapshotContext {
  normalizer: Normalizer;
  lexicon: Pick<Lexicon, 'rooms' | 'skipWords' | 'stopwords'>;
  tuning: Pick<InterpreterTuning, 'strategyConfidence' | 'partialMinTokenLength'>;
}

export interface RoomMatch {
  room: string;
  strategy: MatchStrategy;
  alias: string;
}

interface Candidate {
  device: DeviceRecord;
  strategy: MatchStrategy;
  alias: string;
}

/**
 * Immutable device and room vocabulary. Requests hold on to one snapshot;
 * a reload builds a new one instead of editing this.
 */
export class VocabularySnapshot {
  readonly devices: readonly DeviceRecord[];
  private readonly byKey: ReadonlyMap<string, DeviceRecord>;
  private readonly deviceAliases: AliasTable<string>;
  private readonly roomAliases: AliasTable<string>;
  private readonly stopwords: ReadonlySet<string>;

  private constructor(
    private readonly context: SnapshotContext,
    devices: readonly DeviceRecord[],
    roomAliases: AliasTable<string>
  ) {
    const normalize = (text: string): string => context.normalizer.normalize(text);
    this.devices = Object.freeze(devices.map((device) => Object.freeze({ ...device })));
    this.byKey = new Map(this.devices.map((device) => [device.deviceKey, device]));
    this.roomAliases = roomAliases;
    this.deviceAliases = AliasTable.build(
      this.devices.map((device) => ({ target: device.deviceKey, aliases: [device.name, ...device.aliases] })),
      { normalize, skipWords: context.lexicon.skipWords }
    );
    this.stopwords = new Set(context.lexicon.stopwords);
  }

  /**
   * Device rooms are mapped onto the built-in room names when they match
   * one ("Cocina", "kitchen" → cocina); unknown rooms join the room table.
   */
  static build(records: readonly DeviceRecord[], context: SnapshotContext): VocabularySnapshot {
    const normalize = (text: string): string => context.normalizer.normalize(text);
    const options = { normalize, skipWords: context.lexicon.skipWords };
    const builtIn: AliasSource<string>[] = Object.entries(context.lexicon.rooms).map(([room, aliases]) => ({
      target: room,
      aliases,
    }));
    const builtInTable = AliasTable.build(builtIn, options);

    const extraRooms: AliasSource<string>[] = [];
    const devices = records.map((device) => {
      if (!device.room) {
        return device;
      }
      const known = builtInTable.lookup(normalize(device.room.replace(/_/g, ' ')))[0];
      if (known) {
        return { ...device, room: known };
      }
      if (!extraRooms.some((room) => room.target === device.room)) {
        extraRooms.push({ target: device.room, aliases: [] });
      }
      return device;
    });

    const roomTable = extraRooms.length ? AliasTable.build([...builtIn, ...extraRooms], options) : builtInTable;
    return new VocabularySnapshot(context, devices, roomTable);
  }

  get size(): number {
    return this.devices.length;
  }

  device(deviceKey: string): DeviceRecord | undefined {
    return this.byKey.get(deviceKey);
  }

  /** Same cascade as devices: "luz de huespedes" finds "cuarto de huéspedes". */
  matchRoom(text: string): RoomMatch | null {
    const tokens = this.context.normalizer.tokenize(text);
    for (const strategy of MATCH_STRATEGIES) {
      const hit = this.aliasHits(this.roomAliases, strategy, tokens)[0];
      const room = hit?.targets[0];
      if (hit && room) {
        return { room, strategy, alias: hit.alias };
      }
    }
    return null;
  }

  /**
   * First strategy with a hit decides. When the text names a room, a device
   * of the same category in that room is preferred, searched in the winning
   * strategy first and then in the later ones.
   */
  matchDevice(text: string): DeviceMatch {
    const tokens = this.context.normalizer.tokenize(text);
    const room = this.matchRoom(text)?.room ?? null;

    let primary: Candidate | null = null;
    for (const strategy of MATCH_STRATEGIES) {
      const candidates = this.candidates(strategy, this.aliasHits(this.deviceAliases, strategy, tokens));
      if (!primary) {
        primary = candidates[0] ?? null;
        if (!primary) {
          continue;
        }
        if (!room) {
          break;
        }
      }
      const category = primary.device.category;
      const inRoom = candidates.find(
        (candidate) => candidate.device.category === category && candidate.device.room === room
      );
      if (inRoom) {
        return this.resolved(inRoom, room);
      }
    }

    if (!primary) {
      return { deviceKey: null, confidence: 0, strategy: null, room: null, detectedRoom: room };
    }
    return this.resolved(primary, room);
  }

  private aliasHits(
    table: AliasTable<string>,
    strategy: MatchStrategy,
    tokens: readonly string[]
  ): AliasHit<string>[] {
    switch (strategy) {
      case 'exact':
        return table.exact(tokens);
      case 'ngram':
        return table.ngram(tokens);
      case 'partial':
        return table.partial(tokens, this.stopwords, this.context.tuning.partialMinTokenLength);
    }
  }

  private candidates(strategy: MatchStrategy, hits: readonly AliasHit<string>[]): Candidate[] {
    const candidates: Candidate[] = [];
    for (const hit of hits) {
      for (const deviceKey of hit.targets) {
        const device = this.byKey.get(deviceKey);
        if (device) {
          candidates.push({ device, strategy, alias: hit.alias });
        }
      }
    }
    return candidates;
  }

  private resolved(candidate: Candidate, room: string | null): DeviceMatch {
    return {
      deviceKey: candidate.device.deviceKey,
      confidence: this.context.tuning.strategyConfidence[candidate.strategy],
      strategy: candidate.strategy,
      alias: candidate.alias,
      room: candidate.device.room,
      detectedRoom: room,
    };
  }
}
