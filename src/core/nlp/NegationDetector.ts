import { LexiconError } from '../../utils/errors.js';
import type { Lexicon } from './lexicon.js';
import { compileTokenPattern, groupNames } from './patterns.js';
import type { Locale, NegationResult, NegationType, TextSpan } from './types.js';

interface CompiledFamily {
  type: NegationType;
  confidence: number;
  patterns: readonly RegExp[];
}

interface StripMatch {
  span: TextSpan;
  trigger: string;
}

const NOT_NEGATED: NegationResult = Object.freeze({ isNegated: false, confidence: 0 });

export type NegationTables = Pick<Lexicon, 'negationFamilies' | 'negationExclusions'>;

/**
 * Detects negated commands ("no enciendas la luz", "don't open the door")
 * in normalized text. Families are tried in precedence order and the first
 * family with a match decides; inside a family the earliest match wins.
 */
export class NegationDetector {
  private readonly families: readonly CompiledFamily[];
  private readonly exclusions: readonly RegExp[];

  constructor(tables: NegationTables, locales: readonly Locale[]) {
    const enabled = new Set(locales);
    this.families = tables.negationFamilies.map((family) => ({
      type: family.type,
      confidence: family.confidence,
      patterns: family.patterns
        .filter((pattern) => enabled.has(pattern.locale))
        .map((pattern) => {
          const regex = compileTokenPattern(pattern.expression, 'du');
          if (!groupNames(regex).includes('strip')) {
            throw new LexiconError(`Negation pattern lacks a "strip" group: ${pattern.expression}`);
          }
          return regex;
        }),
    }));
    this.exclusions = tables.negationExclusions
      .filter((pattern) => enabled.has(pattern.locale))
      .map((pattern) => compileTokenPattern(pattern.expression));
  }

  detect(normalizedText: string): NegationResult {
    if (!normalizedText || this.exclusions.some((exclusion) => exclusion.test(normalizedText))) {
      return NOT_NEGATED;
    }

    for (const family of this.families) {
      let best: StripMatch | null = null;
      for (const pattern of family.patterns) {
        const found = findStrip(pattern, normalizedText);
        if (found && (!best || found.span.start < best.span.start)) {
          best = found;
        }
      }
      if (best) {
        return {
          isNegated: true,
          type: family.type,
          trigger: best.trigger,
          confidence: family.confidence,
          span: best.span,
        };
      }
    }

    return NOT_NEGATED;
  }

  /** Text with the negation span cut out; unchanged when nothing is negated. */
  removeNegation(normalizedText: string, result: NegationResult = this.detect(normalizedText)): string {
    if (!result.isNegated) {
      return normalizedText;
    }
    const { start, end } = result.span;
    return `${normalizedText.slice(0, start)} ${normalizedText.slice(end)}`.replace(/\s+/g, ' ').trim();
  }
}

function findStrip(pattern: RegExp, text: string): StripMatch | null {
  const match = pattern.exec(text);
  const range = match?.indices?.groups?.strip;
  if (!match || !range) {
    return null;
  }
  const [start, end] = range;
  return { span: { start, end }, trigger: text.slice(start, end).trim() };
}
