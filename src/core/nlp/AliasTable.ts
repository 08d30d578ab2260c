export interface AliasSource<T extends string> {
  target: T;
  aliases: Iterable<string>;
}

export interface AliasHit<T extends string> {
  alias: string;
  targets: readonly T[];
  /** Token index of the first matched token. */
  position: number;
}

export interface AliasTableOptions {
  normalize: (text: string) => string;
  skipWords: Iterable<string>;
}

interface AliasEntry<T extends string> {
  alias: string;
  tokens: readonly string[];
  order: number;
  targets: T[];
}

/**
 * Inverted alias index: surface form → canonical targets, in registration
 * order. Built once; a vocabulary change builds a new table.
 */
export class AliasTable<T extends string> {
  private readonly entries: ReadonlyMap<string, AliasEntry<T>>;
  /** Alias with skip words removed → aliases sharing that form. */
  private readonly stripped: ReadonlyMap<string, readonly AliasEntry<T>[]>;
  private readonly skipWords: ReadonlySet<string>;

  private constructor(entries: Map<string, AliasEntry<T>>, skipWords: ReadonlySet<string>) {
    this.entries = entries;
    this.skipWords = skipWords;

    const stripped = new Map<string, AliasEntry<T>[]>();
    for (const entry of entries.values()) {
      const key = this.withoutSkipWords(entry.tokens);
      if (key.length < 2) {
        continue;
      }
      const joined = key.join(' ');
      const list = stripped.get(joined) ?? [];
      list.push(entry);
      stripped.set(joined, list);
    }
    this.stripped = stripped;
  }

  /**
   * Every target is reachable through its own key (underscores read as
   * spaces) plus its aliases, all normalized.
   */
  static build<T extends string>(sources: Iterable<AliasSource<T>>, options: AliasTableOptions): AliasTable<T> {
    const entries = new Map<string, AliasEntry<T>>();
    for (const { target, aliases } of sources) {
      const forms = [options.normalize(target.replace(/_/g, ' ')), ...[...aliases].map((alias) => options.normalize(alias))];
      for (const alias of new Set(forms)) {
        if (!alias) {
          continue;
        }
        const entry = entries.get(alias);
        if (!entry) {
          entries.set(alias, { alias, tokens: alias.split(' '), order: entries.size, targets: [target] });
        } else if (!entry.targets.includes(target)) {
          entry.targets.push(target);
        }
      }
    }
    return new AliasTable(entries, new Set(options.skipWords));
  }

  get size(): number {
    return this.entries.size;
  }

  lookup(alias: string): readonly T[] {
    return this.entries.get(alias)?.targets ?? [];
  }

  /**
   * Aliases occurring as complete token runs. Longest alias first, then
   * earliest position, then registration order.
   */
  exact(tokens: readonly string[]): AliasHit<T>[] {
    const hits: Array<AliasHit<T> & { order: number }> = [];
    for (const entry of this.entries.values()) {
      const position = indexOfRun(tokens, entry.tokens);
      if (position >= 0) {
        hits.push({ alias: entry.alias, targets: entry.targets, position, order: entry.order });
      }
    }
    hits.sort((a, b) => b.alias.length - a.alias.length || a.position - b.position || a.order - b.order);
    return hits.map(({ alias, targets, position }) => ({ alias, targets, position }));
  }

  /**
   * 3- then 2-token windows of the text without skip words, compared with
   * aliases stripped the same way ("luz cocina" finds "luz de la cocina").
   */
  ngram(tokens: readonly string[]): AliasHit<T>[] {
    const content = this.withoutSkipWords(tokens);
    const hits: AliasHit<T>[] = [];
    for (const size of [3, 2]) {
      for (let start = 0; start + size <= content.length; start++) {
        const window = content.slice(start, start + size).join(' ');
        for (const entry of this.stripped.get(window) ?? []) {
          hits.push({ alias: entry.alias, targets: entry.targets, position: start });
        }
      }
    }
    return hits;
  }

  /**
   * A single content token equal to one token of a multi-word alias. Text
   * order first, then registration order.
   */
  partial(tokens: readonly string[], stopwords: ReadonlySet<string>, minTokenLength: number): AliasHit<T>[] {
    const hits: AliasHit<T>[] = [];
    tokens.forEach((token, position) => {
      if (token.length < minTokenLength || stopwords.has(token) || this.skipWords.has(token)) {
        return;
      }
      for (const entry of this.entries.values()) {
        if (entry.tokens.length > 1 && entry.tokens.includes(token)) {
          hits.push({ alias: entry.alias, targets: entry.targets, position });
        }
      }
    });
    return hits;
  }

  private withoutSkipWords(tokens: readonly string[]): string[] {
    return tokens.filter((token) => !this.skipWords.has(token));
  }
}

function indexOfRun(tokens: readonly string[], run: readonly string[]): number {
  for (let start = 0; start + run.length <= tokens.length; start++) {
    if (run.every((token, offset) => tokens[start + offset] === token)) {
      return start;
    }
  }
  return -1;
}
