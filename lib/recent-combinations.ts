import { RECENT_COMBINATIONS_LIMIT } from './config';
import type { CardAesthetics, Color, ColorCombination } from './types';

const WHITE = '#ffffff';

function same(a: Color | null | undefined, b: Color | null | undefined): boolean {
  return (a ?? null) === (b ?? null);
}

function matches(existing: ColorCombination, incoming: ColorCombination): boolean {
  if (incoming.primary != null && incoming.secondary != null) {
    return same(existing.primary, incoming.primary) && same(existing.secondary, incoming.secondary);
  }
  return same(existing.background, incoming.background) && same(existing.border, incoming.border);
}

/**
 * Returns a new list with `combination` at the front. Entries it matches are
 * dropped, and the list is cut to `limit`.
 */
export function addRecentCombination(
  list: readonly ColorCombination[],
  combination: ColorCombination,
  limit: number = RECENT_COMBINATIONS_LIMIT,
): ColorCombination[] {
  const rest = list.filter(existing => !matches(existing, combination));
  return [combination, ...rest].slice(0, limit);
}

/** Most-recently-used colour combinations for the preset picker. */
export class RecentCombinations {
  private entries: ColorCombination[] = [];

  constructor(private readonly limit: number = RECENT_COMBINATIONS_LIMIT) {}

  add(combination: ColorCombination): void {
    this.entries = addRecentCombination(this.entries, { ...combination }, this.limit);
  }

  list(): ColorCombination[] {
    return this.entries.map(entry => ({ ...entry }));
  }

  get size(): number {
    return this.entries.length;
  }
}

export function combinationFromAesthetics(aesthetics: CardAesthetics): ColorCombination {
  return {
    primary: aesthetics.primaryColor,
    secondary: aesthetics.secondaryColor,
    background: aesthetics.backgroundColor,
    border: aesthetics.borderColor,
  };
}

/** Only customised backgrounds or borders are worth offering again. */
export function shouldRemember(aesthetics: CardAesthetics): boolean {
  return aesthetics.backgroundColor !== null || aesthetics.borderColor !== WHITE;
}
