import type { FallbackInterpreterPort } from '../../ports/FallbackInterpreterPort.js';
import { EntityResolver } from '../nlp/EntityResolver.js';
import { IntentClassifier } from '../nlp/IntentClassifier.js';
import type { Lexicon } from '../nlp/lexicon.js';
import { NegationDetector } from '../nlp/NegationDetector.js';
import { Normalizer } from '../nlp/Normalizer.js';
import { DEFAULT_TUNING } from '../nlp/types.js';
import type { DeviceRecord, InterpreterTuning, Locale } from '../nlp/types.js';
import { InterpretationOrchestrator } from './InterpretationOrchestrator.js';

export interface InterpreterOptions {
  lexicon: Lexicon;
  locales: readonly Locale[];
  defaultLocale?: Locale;
  devices?: readonly DeviceRecord[];
  /** Builds the fallback port; receives the live device catalogue. */
  fallback?: (devices: () => readonly DeviceRecord[]) => FallbackInterpreterPort | null;
  tuning?: Partial<InterpreterTuning>;
  fallbackTimeoutMs?: number;
}

export function resolveTuning(overrides: Partial<InterpreterTuning> = {}): InterpreterTuning {
  return {
    ...DEFAULT_TUNING,
    ...overrides,
    strategyConfidence: { ...DEFAULT_TUNING.strategyConfidence, ...overrides.strategyConfidence },
  };
}

/** Wires the rule stages and the gate from one lexicon. */
export function createInterpreter(options: InterpreterOptions): InterpretationOrchestrator {
  const tuning = resolveTuning(options.tuning);
  const normalizer = new Normalizer(options.lexicon);
  const resolver = new EntityResolver({ normalizer, lexicon: options.lexicon, tuning }, options.devices);
  const devices = (): readonly DeviceRecord[] => resolver.snapshot().devices;

  return new InterpretationOrchestrator({
    normalizer,
    negation: new NegationDetector(options.lexicon, options.locales),
    classifier: new IntentClassifier(options.lexicon, {
      locales: options.locales,
      leadingMatchBonus: tuning.leadingMatchBonus,
    }),
    resolver,
    fallback: options.fallback?.(devices) ?? null,
    tuning,
    fallbackTimeoutMs: options.fallbackTimeoutMs,
    defaultLocale: options.defaultLocale,
  });
}
