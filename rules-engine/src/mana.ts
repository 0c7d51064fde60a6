// rules-engine/src/mana.ts
// Pure mana calculation and parsing utilities (Rule 106, Rule 202)

import type { ManaCategory, ManaCost, ManaPool } from '../../shared/src';
import { MANA_CATEGORIES } from '../../shared/src';

/**
 * Order in which leftover mana is spent on a generic requirement.
 * Colorless first so colored mana stays available for later strict costs.
 */
export const GENERIC_PAYMENT_ORDER: readonly ManaCategory[] = ['C', 'generic', 'W', 'U', 'B', 'R', 'G'];

/** Categories a cost demands exactly (everything but generic) */
const STRICT_CATEGORIES: readonly ManaCategory[] = ['W', 'U', 'B', 'R', 'G', 'C'];

export type PaymentResult =
  | { readonly success: true; readonly remainingPool: ManaPool; readonly spent: ManaPool }
  | { readonly success: false; readonly error: 'INSUFFICIENT_MANA'; readonly reason: string };

/**
 * Create an empty mana pool.
 */
export function createEmptyManaPool(): ManaPool {
  return { W: 0, U: 0, B: 0, R: 0, G: 0, C: 0, generic: 0 };
}

/**
 * Build a full cost record from the categories that matter.
 */
export function createManaCost(parts: Partial<Record<ManaCategory, number>> = {}): ManaCost {
  return { ...createEmptyManaPool(), ...parts };
}

/** Same shape as a cost; handy for tests and mana effects */
export function createManaPool(parts: Partial<Record<ManaCategory, number>> = {}): ManaPool {
  return { ...createEmptyManaPool(), ...parts };
}

/**
 * Parse a mana cost string (e.g., "{2}{U}{U}") into a ManaCost.
 * - {W} {U} {B} {R} {G}: one of that color
 * - {C}: one colorless
 * - {N}: N generic
 * - {X}: the caller-supplied X value as generic
 * - hybrid and Phyrexian symbols ({R/G}, {2/W}, {B/P}): one generic
 */
export function parseManaCost(manaCost: string | undefined, options: { x?: number } = {}): ManaCost {
  const cost: Record<ManaCategory, number> = { ...createEmptyManaPool() };
  if (!manaCost) return cost;

  const symbols = manaCost.match(/\{[^}]+\}/g) || [];

  for (const symbol of symbols) {
    const inner = symbol.slice(1, -1).toUpperCase();

    if (inner === 'W' || inner === 'U' || inner === 'B' || inner === 'R' || inner === 'G' || inner === 'C') {
      cost[inner]++;
    } else if (/^\d+$/.test(inner)) {
      cost.generic += parseInt(inner, 10);
    } else if (inner === 'X') {
      cost.generic += Math.max(0, options.x ?? 0);
    } else if (inner.includes('/')) {
      cost.generic += 1;
    }
  }

  return cost;
}

/**
 * Rule 106.3 - Add mana to a pool
 */
export function addMana(pool: ManaPool, category: ManaCategory, amount: number = 1): ManaPool {
  return { ...pool, [category]: pool[category] + amount };
}

export function totalMana(pool: ManaPool): number {
  return MANA_CATEGORIES.reduce((sum, category) => sum + pool[category], 0);
}

/** Rule 202.3 - mana value of a cost */
export function manaValue(cost: ManaCost): number {
  return totalMana(cost);
}

/**
 * Check whether a pool can pay a cost. Strict requirements are checked per
 * category with no borrowing; the generic part must fit in whatever is left.
 */
export function canPay(pool: ManaPool, cost: ManaCost): boolean {
  let leftover = 0;
  for (const category of STRICT_CATEGORIES) {
    if (pool[category] < cost[category]) {
      return false;
    }
    leftover += pool[category] - cost[category];
  }
  leftover += pool.generic;
  return cost.generic <= leftover;
}

/**
 * Rule 601.2h - Pay a cost from a pool.
 * Returns a new pool; the input is never modified, so a failed payment leaves
 * nothing half-spent.
 */
export function pay(pool: ManaPool, cost: ManaCost): PaymentResult {
  if (!canPay(pool, cost)) {
    return {
      success: false,
      error: 'INSUFFICIENT_MANA',
      reason: `Cannot pay ${formatMana(cost)} from ${formatMana(pool)}`,
    };
  }

  const next: Record<ManaCategory, number> = { ...pool };
  const spent: Record<ManaCategory, number> = { ...createEmptyManaPool() };

  for (const category of STRICT_CATEGORIES) {
    next[category] -= cost[category];
    spent[category] += cost[category];
  }

  let remaining = cost.generic;
  for (const category of GENERIC_PAYMENT_ORDER) {
    if (remaining === 0) break;
    const used = Math.min(next[category], remaining);
    next[category] -= used;
    spent[category] += used;
    remaining -= used;
  }

  return { success: true, remainingPool: next, spent };
}

/**
 * Render a pool or cost in brace notation, e.g. "{2}{R}{G}". An empty
 * amount renders as "{0}".
 */
export function formatMana(amount: ManaPool | ManaCost): string {
  const parts: string[] = [];
  if (amount.generic > 0) parts.push(`{${amount.generic}}`);
  for (const category of STRICT_CATEGORIES) {
    for (let i = 0; i < amount[category]; i++) {
      parts.push(`{${category}}`);
    }
  }
  return parts.length > 0 ? parts.join('') : '{0}';
}
