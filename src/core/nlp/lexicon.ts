import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { LexiconError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { resolveFromRoot } from '../../utils/paths.js';
import { INTENT_KINDS, LOCALES, NEGATION_TYPES } from './types.js';
import type { IntentKind, Locale, NegationType, PatternRule } from './types.js';

const logger = createLogger({ component: 'lexicon' });

const confidenceSchema = z.number().min(0).max(1);
const localeSchema = z.enum(LOCALES);
const ruleIntentSchema = z.enum(INTENT_KINDS).refine((intent) => intent !== 'unknown', {
  message: 'rules cannot target the unknown intent',
});

const normalizerSchema = z.object({
  colloquialisms: z.record(z.string().min(1)),
  typos: z.record(z.string().min(1)),
});

const functionWordsSchema = z.object({
  skipWords: z.array(z.string().min(1)),
  stopwords: z.array(z.string().min(1)),
});

const roomsSchema = z.object({
  rooms: z.record(z.array(z.string().min(1))),
});

const intentRulesSchema = z.object({
  rules: z
    .array(
      z.object({
        id: z.string().min(1),
        intent: ruleIntentSchema,
        locale: localeSchema,
        baseConfidence: confidenceSchema,
        expressions: z.array(z.string().min(1)).min(1),
      })
    )
    .min(1),
});

const negationPatternSchema = z.object({
  locale: localeSchema,
  expression: z.string().min(1),
});

const negationRulesSchema = z.object({
  families: z.array(
    z.object({
      type: z.enum(NEGATION_TYPES),
      confidence: confidenceSchema,
      patterns: z.array(negationPatternSchema).min(1),
    })
  ),
  exclusions: z.array(negationPatternSchema),
});

const templatesSchema = z.array(z.string().min(1)).min(1);
const intentTemplatesSchema = z.object({ normal: templatesSchema, negated: templatesSchema });
const localeResponsesSchema = z.object({
  intents: z.object({
    turn_on: intentTemplatesSchema,
    turn_off: intentTemplatesSchema,
    open: intentTemplatesSchema,
    close: intentTemplatesSchema,
    status: intentTemplatesSchema,
    toggle: intentTemplatesSchema,
    unknown: intentTemplatesSchema,
  }),
  noDevice: templatesSchema,
  error: templatesSchema,
});
const responsesSchema = z.object({ es: localeResponsesSchema, en: localeResponsesSchema });

export interface NegationPattern {
  locale: Locale;
  expression: string;
}

export interface NegationFamily {
  type: NegationType;
  confidence: number;
  patterns: readonly NegationPattern[];
}

export interface IntentTemplates {
  normal: readonly string[];
  negated: readonly string[];
}

export interface LocaleResponses {
  intents: Record<IntentKind, IntentTemplates>;
  noDevice: readonly string[];
  error: readonly string[];
}

export interface Lexicon {
  colloquialisms: Readonly<Record<string, string>>;
  typos: Readonly<Record<string, string>>;
  skipWords: readonly string[];
  stopwords: readonly string[];
  /** Canonical room key → aliases. */
  rooms: Readonly<Record<string, readonly string[]>>;
  /** In registry order. */
  intentRules: readonly PatternRule[];
  negationFamilies: readonly NegationFamily[];
  negationExclusions: readonly NegationPattern[];
  responses: Readonly<Record<Locale, LocaleResponses>>;
}

function readJson<T>(dir: string, file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const path = join(dir, file);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    throw new LexiconError(`Cannot read lexicon file ${path}`, { cause: error });
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new LexiconError(`Invalid lexicon file ${file}:\n${issues.join('\n')}`);
  }
  return result.data;
}

function assertUniqueRuleIds(rules: readonly PatternRule[]): void {
  const seen = new Set<string>();
  for (const rule of rules) {
    if (seen.has(rule.id)) {
      throw new LexiconError(`Duplicate intent rule id "${rule.id}"`);
    }
    seen.add(rule.id);
  }
}

/** Reads and validates every lexicon file in `dir`. Uncached. */
export function readLexicon(dir: string): Lexicon {
  const normalizer = readJson(dir, 'normalizer.json', normalizerSchema);
  const functionWords = readJson(dir, 'function-words.json', functionWordsSchema);
  const { rooms } = readJson(dir, 'rooms.json', roomsSchema);
  const { rules } = readJson(dir, 'intent-rules.json', intentRulesSchema);
  const negation = readJson(dir, 'negation-rules.json', negationRulesSchema);
  const responses = readJson(dir, 'responses.json', responsesSchema);

  const intentRules: PatternRule[] = [];
  for (const rule of rules) {
    // zod's refine keeps the wider type
    if (rule.intent === 'unknown') {
      continue;
    }
    intentRules.push({ ...rule, intent: rule.intent });
  }
  assertUniqueRuleIds(intentRules);

  logger.debug(
    { dir, rules: intentRules.length, rooms: Object.keys(rooms).length },
    'Lexicon loaded'
  );

  return Object.freeze({
    colloquialisms: normalizer.colloquialisms,
    typos: normalizer.typos,
    skipWords: functionWords.skipWords,
    stopwords: functionWords.stopwords,
    rooms,
    intentRules: Object.freeze(intentRules),
    negationFamilies: negation.families,
    negationExclusions: negation.exclusions,
    responses,
  });
}

export const DEFAULT_LEXICON_DIR = 'data/lexicon';

const cache = new Map<string, Lexicon>();

/** Process-wide lexicon, read once per directory. */
export function loadLexicon(dir: string = DEFAULT_LEXICON_DIR): Lexicon {
  const path = resolveFromRoot(dir);
  const cached = cache.get(path);
  if (cached) {
    return cached;
  }
  const lexicon = readLexicon(path);
  cache.set(path, lexicon);
  return lexicon;
}
