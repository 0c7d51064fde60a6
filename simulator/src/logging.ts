/**
 * Console output for a running game, driven by its engine events
 */
import { type Game, RulesEngineEvent, type RulesEvent } from '../../rules-engine/src';
import { debug, isDebugEnabled } from './utils/debug';

/** Events shown at level 1; everything else needs level 2 */
export const GAME_FLOW_EVENTS: ReadonlySet<RulesEngineEvent> = new Set([
  RulesEngineEvent.GAME_STARTED,
  RulesEngineEvent.TURN_STARTED,
  RulesEngineEvent.SPELL_CAST,
  RulesEngineEvent.SPELL_COUNTERED,
  RulesEngineEvent.SPELL_FIZZLED,
  RulesEngineEvent.LAND_PLAYED,
  RulesEngineEvent.ATTACKERS_DECLARED,
  RulesEngineEvent.BLOCKERS_DECLARED,
  RulesEngineEvent.COMBAT_DECLARATION_REJECTED,
  RulesEngineEvent.CREATURE_DIED,
  RulesEngineEvent.PLAYER_LOST,
  RulesEngineEvent.GAME_ENDED,
]);

export function eventLevel(type: RulesEngineEvent): number {
  return GAME_FLOW_EVENTS.has(type) ? 1 : 2;
}

export function formatEvent(event: RulesEvent): string {
  return `[${event.gameId}] ${event.message}`;
}

/**
 * Print the game's events at the current debug level.
 * Returns the unsubscribe function.
 */
export function attachGameLogger(game: Game): () => void {
  if (!isDebugEnabled(1)) {
    return () => {};
  }
  return game.events.onAny(event => {
    debug(eventLevel(event.type), formatEvent(event));
  });
}
