/**
 * docveil: Literal Replacement
 *
 * Replaces many literal strings in one left-to-right pass. Candidates are
 * tried longest first at every position and replaced text is never scanned
 * again, so a key that is a substring of another key (or of a replacement)
 * cannot corrupt it.
 *
 * @module pipeline/literal-replace
 */

export interface ReplacementOutcome {
  text: string;
  /** Occurrences replaced, by key */
  counts: Map<string, number>;
  total: number;
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Keys ordered longest first; equal lengths in code-unit order
 */
export function orderLongestFirst(keys: Iterable<string>): string[] {
  return [...new Set(keys)]
    .filter(key => key.length > 0)
    .sort((a, b) => b.length - a.length || (a < b ? -1 : a > b ? 1 : 0));
}

export class LiteralReplacer {
  private readonly replacements: ReadonlyMap<string, string>;
  private readonly pattern: RegExp | null;

  /**
   * @param replacements - Literal → replacement; empty keys are ignored
   */
  constructor(replacements: ReadonlyMap<string, string>) {
    this.replacements = replacements;
    const keys = orderLongestFirst(replacements.keys());
    this.pattern = keys.length > 0 ? new RegExp(keys.map(escapeRegExp).join('|'), 'g') : null;
  }

  get size(): number {
    return this.replacements.size;
  }

  replace(text: string): ReplacementOutcome {
    const counts = new Map<string, number>();
    if (!this.pattern) {
      return { text, counts, total: 0 };
    }

    let total = 0;
    const replaced = text.replace(this.pattern, (match) => {
      counts.set(match, (counts.get(match) ?? 0) + 1);
      total++;
      return this.replacements.get(match) ?? match;
    });

    return { text: replaced, counts, total };
  }
}

/**
 * One-off convenience over {@link LiteralReplacer}
 */
export function replaceLiterals(text: string, replacements: ReadonlyMap<string, string>): ReplacementOutcome {
  return new LiteralReplacer(replacements).replace(text);
}
