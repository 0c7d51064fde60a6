/**
 * core/errors.ts
 */

export type RulesErrorCode =
  | 'INSUFFICIENT_MANA'
  | 'ILLEGAL_TIMING'
  | 'TARGET_INVALID'
  | 'UNPAYABLE_COST'
  | 'ILLEGAL_ATTACK'
  | 'ILLEGAL_BLOCK';

/** Popping an empty stack is a caller bug, not a game event */
export class EmptyStackError extends Error {
  constructor() {
    super('Cannot pop from an empty stack');
    this.name = 'EmptyStackError';
  }
}

/**
 * Exhaustiveness guard for tagged unions.
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
