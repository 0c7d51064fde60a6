/**
 * core/types.ts
 *
 * Result types shared by the engine operations. Recoverable failures come
 * back as values; only contract violations throw (see core/errors.ts).
 */

import type { RulesErrorCode } from './errors';

/**
 * Result type for engine operations
 */
export type EngineResult<T> =
  | { readonly success: true; readonly value: T; readonly log: readonly string[] }
  | {
      readonly success: false;
      readonly error: RulesErrorCode;
      readonly reason: string;
      readonly log: readonly string[];
    };

/**
 * Action validation result
 */
export type ActionValidation =
  | { readonly legal: true }
  | { readonly legal: false; readonly error: RulesErrorCode; readonly reason: string };

export const LEGAL: ActionValidation = { legal: true };

export function ok<T>(value: T, log: readonly string[] = []): EngineResult<T> {
  return { success: true, value, log };
}

export function fail<T>(error: RulesErrorCode, reason: string): EngineResult<T> {
  return { success: false, error, reason, log: [reason] };
}

export function illegal(error: RulesErrorCode, reason: string): ActionValidation {
  return { legal: false, error, reason };
}
