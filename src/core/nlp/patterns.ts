import { LexiconError } from '../../utils/errors.js';

/**
 * Wraps an expression so it only matches whole tokens: "no" never matches
 * inside "nombre" and "luz" never inside "luzca". Unicode-aware, unlike `\b`.
 */
export function tokenBounded(expression: string): string {
  return `(?<![\\p{L}\\p{N}])(?:${expression})(?![\\p{L}\\p{N}])`;
}

export function compileTokenPattern(expression: string, flags = 'u'): RegExp {
  try {
    return new RegExp(tokenBounded(expression), flags);
  } catch (error) {
    throw new LexiconError(`Invalid pattern expression: ${expression}`, { cause: error });
  }
}

/** Named capture groups an expression declares. */
export function groupNames(pattern: RegExp): string[] {
  const probe = new RegExp(`${pattern.source}|`, pattern.flags.replace('g', ''));
  return Object.keys(probe.exec('')?.groups ?? {});
}
