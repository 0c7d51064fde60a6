/**
 * Rule 704: State-Based Actions
 *
 * State-based actions are game actions that happen automatically whenever
 * certain conditions are met. They don't use the stack.
 */

import type { PermanentID, PlayerID } from '../../shared/src';
import { RulesEngineEvent } from './core/events';
import {
  type GameState,
  getToughness,
  hasKeyword,
  isCreature,
  removePermanent,
} from './gameState';

export interface StateBasedAction {
  readonly type: StateBasedActionType;
  readonly affectedObjectId: string;
  readonly reason: string;
}

export enum StateBasedActionType {
  // Rule 704.5a
  PLAYER_ZERO_LIFE = 'player-zero-life',

  // Rule 704.5b
  PLAYER_LIBRARY_EMPTY = 'player-library-empty',

  // Rule 704.5f
  CREATURE_ZERO_TOUGHNESS = 'creature-zero-toughness',

  // Rule 704.5g
  CREATURE_LETHAL_DAMAGE = 'creature-lethal-damage',

  // Rule 704.5h
  CREATURE_DEATHTOUCH_DAMAGE = 'creature-deathtouch-damage',
}

export interface StateBasedActionResult {
  readonly actions: readonly StateBasedAction[];
  readonly destroyed: readonly PermanentID[];
  readonly losers: readonly PlayerID[];
  readonly log: readonly string[];
}

/**
 * Find every state-based action that applies right now, without performing any.
 */
export function findStateBasedActions(state: GameState): StateBasedAction[] {
  const actions: StateBasedAction[] = [];

  for (const player of state.players) {
    if (player.hasLost) continue;
    if (player.life <= 0) {
      actions.push({
        type: StateBasedActionType.PLAYER_ZERO_LIFE,
        affectedObjectId: player.id,
        reason: `${player.name} has ${player.life} life`,
      });
    } else if (player.drewFromEmptyLibrary) {
      actions.push({
        type: StateBasedActionType.PLAYER_LIBRARY_EMPTY,
        affectedObjectId: player.id,
        reason: `${player.name} drew from an empty library`,
      });
    }
  }

  for (const permanent of state.permanents.values()) {
    if (!isCreature(permanent)) continue;
    const toughness = getToughness(permanent);
    const name = permanent.card.data.name;

    // Rule 704.5f ignores indestructible
    if (toughness <= 0) {
      actions.push({
        type: StateBasedActionType.CREATURE_ZERO_TOUGHNESS,
        affectedObjectId: permanent.id,
        reason: `${name} has ${toughness} toughness`,
      });
      continue;
    }
    if (hasKeyword(permanent, 'indestructible')) continue;

    if (permanent.damage >= toughness) {
      actions.push({
        type: StateBasedActionType.CREATURE_LETHAL_DAMAGE,
        affectedObjectId: permanent.id,
        reason: `${name} has ${permanent.damage} damage and ${toughness} toughness`,
      });
    } else if (permanent.deathtouchDamage && permanent.damage > 0) {
      actions.push({
        type: StateBasedActionType.CREATURE_DEATHTOUCH_DAMAGE,
        affectedObjectId: permanent.id,
        reason: `${name} was dealt damage by a deathtouch source`,
      });
    }
  }

  return actions;
}

/**
 * Performs state-based actions until none apply (rule 704.3). Running it on a
 * stable state changes nothing.
 */
export class StateBasedActionChecker {
  constructor(private readonly state: GameState) {}

  check(): StateBasedActionResult {
    const performed: StateBasedAction[] = [];
    const destroyed: PermanentID[] = [];
    const losers: PlayerID[] = [];
    const log: string[] = [];

    for (;;) {
      const actions = findStateBasedActions(this.state);
      if (actions.length === 0) break;

      // All applicable actions happen simultaneously (rule 704.3)
      for (const action of actions) {
        performed.push(action);
        log.push(action.reason);
        switch (action.type) {
          case StateBasedActionType.PLAYER_ZERO_LIFE:
          case StateBasedActionType.PLAYER_LIBRARY_EMPTY:
            this.markLost(action.affectedObjectId, action.reason);
            losers.push(action.affectedObjectId);
            break;
          case StateBasedActionType.CREATURE_ZERO_TOUGHNESS:
          case StateBasedActionType.CREATURE_LETHAL_DAMAGE:
          case StateBasedActionType.CREATURE_DEATHTOUCH_DAMAGE:
            if (removePermanent(this.state, action.affectedObjectId, 'graveyard')) {
              destroyed.push(action.affectedObjectId);
            }
            break;
        }
      }
    }

    if (performed.length > 0) {
      this.state.events.emit(
        RulesEngineEvent.STATE_BASED_ACTIONS,
        `${performed.length} state-based action(s) performed`,
        { count: performed.length }
      );
    }

    return { actions: performed, destroyed, losers, log };
  }

  private markLost(playerId: PlayerID, reason: string): void {
    const player = this.state.players.find(p => p.id === playerId);
    if (!player) return;
    player.hasLost = true;
    this.state.events.emit(RulesEngineEvent.PLAYER_LOST, `${player.name} lost: ${reason}`, {
      playerId,
      reason,
    });
  }
}
