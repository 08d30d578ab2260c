import { LexiconError } from '../../utils/errors.js';
import type { Lexicon } from './lexicon.js';

const COMBINING_TILDE = '\u0303';

/** Characters outside letters, digits, whitespace and the numeric separators. */
const DISALLOWED = /[^\p{L}\p{N}\s%.,]/gu;
/** `.` or `,` not sitting between two digits. */
const STRAY_SEPARATOR = /(?<!\p{N})[.,]|[.,](?!\p{N})/gu;
/** `%` not directly after a digit. */
const STRAY_PERCENT = /(?<!\p{N})%/gu;
const NUMBER = /\p{N}+(?:[.,]\p{N}+)*%?/gu;

export type NormalizerTables = Pick<Lexicon, 'colloquialisms' | 'typos'>;

/**
 * Canonical text form shared by every later stage: lowercase, no diacritics
 * except ñ, no punctuation except inside numbers, single spaces, and
 * colloquialisms and common typos expanded token by token.
 */
export class Normalizer {
  private readonly expansions: ReadonlyMap<string, string>;

  constructor(tables: NormalizerTables) {
    const expansions = new Map<string, string>();
    for (const [from, to] of [...Object.entries(tables.typos), ...Object.entries(tables.colloquialisms)]) {
      expansions.set(this.clean(from), this.clean(to));
    }
    // An expansion whose output is itself a key would make normalize() non-idempotent.
    for (const [from, to] of expansions) {
      for (const token of to.split(' ')) {
        if (expansions.has(token)) {
          throw new LexiconError(`Expansion "${from}" -> "${to}" produces expandable token "${token}"`);
        }
      }
    }
    this.expansions = expansions;
  }

  normalize(text: string): string {
    const cleaned = this.clean(text);
    if (!cleaned) {
      return '';
    }
    return cleaned
      .split(' ')
      .map((token) => this.expansions.get(token) ?? token)
      .join(' ');
  }

  tokenize(text: string): string[] {
    const normalized = this.normalize(text);
    return normalized ? normalized.split(' ') : [];
  }

  /** Digit spans of the normalized text, decimal separators and a trailing `%` included. */
  extractNumbers(text: string): string[] {
    return this.normalize(text).match(NUMBER) ?? [];
  }

  private clean(text: string): string {
    return stripDiacritics(text.toLowerCase())
      .replace(DISALLOWED, ' ')
      .replace(STRAY_SEPARATOR, ' ')
      .replace(STRAY_PERCENT, ' ')
      .replace(/\s+/g, ' ')
      .trim();
  }
}

function stripDiacritics(text: string): string {
  return text
    .normalize('NFD')
    .replace(new RegExp(`n${COMBINING_TILDE}`, 'g'), 'ñ')
    .replace(/\p{M}/gu, '')
    .normalize('NFC');
}
