/**
 * Leveled console output for the simulator
 *
 * Debug levels (DEBUG_STATE):
 * - 0: silent
 * - 1: game flow - game start/end, turns, spells, combat, deaths
 * - 2: card-level detail - mana, taps, draws, every engine event
 *
 * Usage:
 * import { debug } from './utils/debug';
 *
 * debug(1, '[batch] game 3 finished');
 * debug(2, '[game] mana added:', data);
 */

let cachedDebugLevel: number | null = null;

/** Clamp a raw level to 0..2; anything unreadable is 0 */
export function parseDebugLevel(level: string | undefined): number {
  if (level === undefined || level === '') return 0;
  const parsed = parseInt(level, 10);
  if (isNaN(parsed) || parsed < 0) return 0;
  return Math.min(parsed, 2);
}

function getDebugLevel(): number {
  if (cachedDebugLevel === null) {
    cachedDebugLevel = parseDebugLevel(process.env.DEBUG_STATE);
  }
  return cachedDebugLevel;
}

/**
 * Override the cached level (the CLI's --log-level flag)
 */
export function setDebugLevel(level: number): void {
  cachedDebugLevel = Math.max(0, Math.min(level, 2));
}

/** Forget the cached level so the next call re-reads DEBUG_STATE */
export function resetDebugLevel(): void {
  cachedDebugLevel = null;
}

/**
 * Log a message if the current debug level is >= the required level
 */
export function debug(requiredLevel: number, ...args: unknown[]): void {
  if (getDebugLevel() >= requiredLevel) {
    console.log(...args);
  }
}

export function debugWarn(requiredLevel: number, ...args: unknown[]): void {
  if (getDebugLevel() >= requiredLevel) {
    console.warn(...args);
  }
}

export function debugError(requiredLevel: number, ...args: unknown[]): void {
  if (getDebugLevel() >= requiredLevel) {
    console.error(...args);
  }
}

export function isDebugEnabled(requiredLevel: number): boolean {
  return getDebugLevel() >= requiredLevel;
}
