/**
 * Deck Simulator Rules Engine
 * Rules core for two-player games: mana, the stack, priority, casting,
 * combat and state-based actions, plus the turn driver and the AI player.
 */

export * from './core/types';
export * from './core/errors';
export * from './core/events';

export * from './mana';
export * from './stack';
export * from './priority';
export * from './gameState';
export * from './damage';
export * from './targeting';
export * from './effects';
export * from './stateBasedActions';
export * from './spellCasting';
export * from './combat';
export * from './AIEngine';
export * from './Game';
