import type { Lexicon } from './lexicon.js';
import { compileTokenPattern } from './patterns.js';
import { DEFAULT_TUNING, clampConfidence } from './types.js';
import type { IntentMatch, Locale, PatternRule, TextSpan } from './types.js';

interface CompiledRule {
  rule: PatternRule;
  index: number;
  expressions: readonly RegExp[];
}

interface RuleHit {
  span: TextSpan;
  matchedText: string;
}

export interface IntentClassifierOptions {
  locales: readonly Locale[];
  leadingMatchBonus?: number;
}

export const UNKNOWN_INTENT: IntentMatch = Object.freeze({
  intent: 'unknown',
  confidence: 0,
  ruleId: null,
  span: null,
  matchedText: '',
});

/**
 * Rule-based intent classification over normalized text. The registry is
 * compiled once and never changes; registry order breaks the last ties.
 */
export class IntentClassifier {
  private readonly rules: readonly CompiledRule[];
  private readonly leadingMatchBonus: number;

  constructor(lexicon: Pick<Lexicon, 'intentRules'>, options: IntentClassifierOptions) {
    const enabled = new Set(options.locales);
    this.leadingMatchBonus = options.leadingMatchBonus ?? DEFAULT_TUNING.leadingMatchBonus;
    this.rules = Object.freeze(
      lexicon.intentRules
        .map((rule, index) => ({
          rule,
          index,
          expressions: rule.expressions.map((expression) => compileTokenPattern(expression)),
        }))
        .filter((compiled) => enabled.has(compiled.rule.locale))
    );
  }

  get ruleCount(): number {
    return this.rules.length;
  }

  match(text: string): IntentMatch {
    return this.matchAll(text)[0] ?? UNKNOWN_INTENT;
  }

  /** Every matching rule, best first. */
  matchAll(text: string): IntentMatch[] {
    if (!text) {
      return [];
    }

    const scored: Array<IntentMatch & { index: number; start: number }> = [];
    for (const compiled of this.rules) {
      const hit = this.firstHit(compiled, text);
      if (!hit) {
        continue;
      }
      const bonus = hit.span.start === 0 ? this.leadingMatchBonus : 0;
      scored.push({
        intent: compiled.rule.intent,
        confidence: clampConfidence(compiled.rule.baseConfidence + bonus),
        ruleId: compiled.rule.id,
        span: hit.span,
        matchedText: hit.matchedText,
        index: compiled.index,
        start: hit.span.start,
      });
    }

    scored.sort((a, b) => b.confidence - a.confidence || a.start - b.start || a.index - b.index);
    return scored.map(({ intent, confidence, ruleId, span, matchedText }) => ({
      intent,
      confidence,
      ruleId,
      span,
      matchedText,
    }));
  }

  private firstHit(compiled: CompiledRule, text: string): RuleHit | null {
    let best: RuleHit | null = null;
    for (const expression of compiled.expressions) {
      const match = expression.exec(text);
      if (match && (!best || match.index < best.span.start)) {
        best = {
          span: { start: match.index, end: match.index + match[0].length },
          matchedText: match[0],
        };
      }
    }
    return best;
  }
}
