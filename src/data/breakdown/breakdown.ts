import type { Individual } from '../account/account';
import type { BreakdownEntry, BreakdownKey, NestedBreakdown } from './types';

const SEPARATOR = '\u0000';

function toKey(person: string, criticality: string, category: string): string {
  return [person, criticality, category].join(SEPARATOR);
}

/**
 * Summed amounts keyed by (person, criticality, category).
 *
 * Lookups of absent keys return 0. Entries keep their first-insertion order.
 */
export class Breakdown {
  private readonly amounts = new Map<string, BreakdownEntry>();

  /**
   * Adds to the amount stored for the key, starting from 0 the first time a key is seen.
   */
  add(key: BreakdownKey, amount: number): void {
    const id = toKey(key.person, key.criticality, key.category);
    const existing = this.amounts.get(id);
    this.amounts.set(id, { ...key, amount: (existing?.amount ?? 0) + amount });
  }

  get(person: Individual, criticality: string, category: string): number {
    return this.amounts.get(toKey(person, criticality, category))?.amount ?? 0;
  }

  entries(): BreakdownEntry[] {
    return [...this.amounts.values()].map((entry) => ({ ...entry }));
  }

  /**
   * Category totals for one person and criticality.
   */
  categories(person: Individual, criticality: string): Map<string, number> {
    const result = new Map<string, number>();
    for (const entry of this.amounts.values()) {
      if (entry.person === person && entry.criticality === criticality) {
        result.set(entry.category, entry.amount);
      }
    }
    return result;
  }

  /**
   * Sum over every entry matching the given key prefix.
   */
  total(person?: Individual, criticality?: string): number {
    let sum = 0;
    for (const entry of this.amounts.values()) {
      if ((person === undefined || entry.person === person) && (criticality === undefined || entry.criticality === criticality)) {
        sum += entry.amount;
      }
    }
    return sum;
  }

  /**
   * The nested person -> criticality -> category view. Josh and Anna always have an
   * Essential and a NonEssential map, even when empty; other criticality labels found in
   * the data get their own map.
   */
  toNested(): NestedBreakdown {
    const nested: NestedBreakdown = {
      Josh: { Essential: {}, NonEssential: {} },
      Anna: { Essential: {}, NonEssential: {} },
    };
    for (const entry of this.amounts.values()) {
      const byCriticality = nested[entry.person];
      const categories = byCriticality[entry.criticality] ?? {};
      categories[entry.category] = entry.amount;
      byCriticality[entry.criticality] = categories;
    }
    return nested;
  }
}
