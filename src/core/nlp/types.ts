export const INTENT_KINDS = ['turn_on', 'turn_off', 'open', 'close', 'status', 'toggle', 'unknown'] as const;
export type IntentKind = (typeof INTENT_KINDS)[number];

export const DEVICE_CATEGORIES = [
  'light',
  'fan',
  'door',
  'window',
  'curtain',
  'lock',
  'alarm',
  'sensor',
  'climate',
  'other',
] as const;
export type DeviceCategory = (typeof DEVICE_CATEGORIES)[number];

export const LOCALES = ['es', 'en'] as const;
export type Locale = (typeof LOCALES)[number];

/** Listed in precedence order: earlier types win when several match. */
export const NEGATION_TYPES = ['direct', 'pronoun', 'compound', 'prohibitive', 'implicit'] as const;
export type NegationType = (typeof NEGATION_TYPES)[number];

/** Listed in cascade order. */
export const MATCH_STRATEGIES = ['exact', 'ngram', 'partial'] as const;
export type MatchStrategy = (typeof MATCH_STRATEGIES)[number];

export interface TextSpan {
  start: number;
  end: number;
}

export interface PatternRule {
  id: string;
  intent: Exclude<IntentKind, 'unknown'>;
  expressions: readonly string[];
  baseConfidence: number;
  locale: Locale;
}

export type NegationResult =
  | {
      isNegated: false;
      confidence: 0;
    }
  | {
      isNegated: true;
      type: NegationType;
      trigger: string;
      confidence: number;
      /** Span removed by `removeNegation`, in normalized-text offsets. */
      span: TextSpan;
    };

export interface IntentMatch {
  intent: IntentKind;
  confidence: number;
  ruleId: string | null;
  span: TextSpan | null;
  matchedText: string;
}

export interface DeviceRecord {
  deviceKey: string;
  name: string;
  category: DeviceCategory;
  room: string | null;
  aliases: readonly string[];
}

export type DeviceMatch =
  | {
      deviceKey: string;
      confidence: number;
      strategy: MatchStrategy;
      alias: string;
      /** Room of the resolved device. */
      room: string | null;
      /** Room named in the text, if any. */
      detectedRoom: string | null;
    }
  | {
      deviceKey: null;
      confidence: 0;
      strategy: null;
      room: null;
      detectedRoom: string | null;
    };

export type InterpretationSource = 'rules' | 'fallback';

export interface Interpretation {
  readonly intent: IntentKind;
  readonly device: string | null;
  readonly negated: boolean;
  readonly source: InterpretationSource;
  /** Caveat for downstream consumers, e.g. why a fallback was not used. */
  readonly note: string | null;
}

export interface InterpreterTuning {
  intentThreshold: number;
  deviceThreshold: number;
  leadingMatchBonus: number;
  strategyConfidence: Record<MatchStrategy, number>;
  partialMinTokenLength: number;
  /** Intents that pass the gate without a resolved device. */
  deviceOptionalIntents: readonly IntentKind[];
}

export const DEFAULT_TUNING: InterpreterTuning = {
  intentThreshold: 0.8,
  deviceThreshold: 0.7,
  leadingMatchBonus: 0.05,
  strategyConfidence: {
    exact: 0.95,
    ngram: 0.85,
    partial: 0.7,
  },
  partialMinTokenLength: 3,
  deviceOptionalIntents: ['status'],
};

/** Clamps to [0, 1] and rounds to four decimals so sums like 0.8 + 0.05 compare exactly. */
export function clampConfidence(value: number): number {
  if (Number.isNaN(value)) {
    return 0;
  }
  return Math.round(Math.min(1, Math.max(0, value)) * 10_000) / 10_000;
}

export function isIntentKind(value: string): value is IntentKind {
  return (INTENT_KINDS as readonly string[]).includes(value);
}

export function isLocale(value: string): value is Locale {
  return (LOCALES as readonly string[]).includes(value);
}
