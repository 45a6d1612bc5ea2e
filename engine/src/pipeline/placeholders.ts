/**
 * docveil: Placeholders
 *
 * Intermediate tokens standing in for a detected value between detection and
 * generation. Tokens are framed by two private-use code points, and the tag
 * inside is an entity type plus a counter, so no token can be a prefix of
 * another.
 *
 * @module pipeline/placeholders
 */

import type { EntityType } from '../contracts/index.js';

export const PLACEHOLDER_OPEN = '\uE000';
export const PLACEHOLDER_CLOSE = '\uE001';

/**
 * Whether `text` already carries a placeholder mark of its own
 */
export function containsPlaceholderMarks(text: string): boolean {
  return text.includes(PLACEHOLDER_OPEN) || text.includes(PLACEHOLDER_CLOSE);
}

export function formatPlaceholder(entityType: EntityType, index: number): string {
  return `${PLACEHOLDER_OPEN}${entityType}_${index}${PLACEHOLDER_CLOSE}`;
}

export interface PlaceholderEntry {
  placeholder: string;
  entityType: EntityType;
  value: string;
}

/**
 * Placeholder allocation for one file: one token per distinct value,
 * numbered per type in order of first appearance
 */
export class PlaceholderTable {
  private readonly byValue = new Map<string, PlaceholderEntry>();
  private readonly counters = new Map<EntityType, number>();

  /**
   * Token for `value`; a value already allocated keeps its first type
   */
  allocate(entityType: EntityType, value: string): PlaceholderEntry {
    const existing = this.byValue.get(value);
    if (existing) {
      return existing;
    }

    const index = (this.counters.get(entityType) ?? 0) + 1;
    this.counters.set(entityType, index);
    const entry = { placeholder: formatPlaceholder(entityType, index), entityType, value };
    this.byValue.set(value, entry);
    return entry;
  }

  get entries(): PlaceholderEntry[] {
    return [...this.byValue.values()];
  }

  /**
   * value → placeholder, for the sanitizing pass
   */
  toSanitizingMap(): Map<string, string> {
    return new Map(this.entries.map(entry => [entry.value, entry.placeholder]));
  }
}
