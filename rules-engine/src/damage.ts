/**
 * damage.ts
 *
 * Damage application shared by combat and spell effects.
 *
 * Rules Reference:
 * - Rule 120: Damage
 * - Rule 702.2: Deathtouch
 * - Rule 702.15: Lifelink
 * - Rule 702.16e: Protection prevents damage
 */

import type { ManaColor, Permanent, PermanentID, PlayerID } from '../../shared/src';
import { RulesEngineEvent } from './core/events';
import {
  colorsOf,
  gainLife,
  type GameState,
  hasKeyword,
  isArtifact,
  isProtectedFrom,
  requirePlayer,
} from './gameState';

/**
 * Damage source characteristics
 */
export interface DamageSource {
  readonly sourceId: PermanentID | null;
  readonly sourceName: string;
  readonly controllerId: PlayerID;
  readonly colors: readonly ManaColor[];
  readonly isArtifact: boolean;
  readonly hasDeathtouch: boolean;
  readonly hasLifelink: boolean;
}

export function damageSourceFromPermanent(permanent: Permanent): DamageSource {
  return {
    sourceId: permanent.id,
    sourceName: permanent.card.data.name,
    controllerId: permanent.owner,
    colors: colorsOf(permanent.card),
    isArtifact: isArtifact(permanent),
    hasDeathtouch: hasKeyword(permanent, 'deathtouch'),
    hasLifelink: hasKeyword(permanent, 'lifelink'),
  };
}

/**
 * Mark damage on a creature. Returns the amount actually dealt (0 if prevented).
 * Lifelink is not applied here so combat can total it per source.
 */
export function markDamageOnPermanent(
  state: GameState,
  source: DamageSource,
  permanent: Permanent,
  amount: number
): number {
  if (amount <= 0) return 0;
  if (isProtectedFrom(permanent, source.colors, source.isArtifact)) {
    return 0;
  }
  permanent.damage += amount;
  if (source.hasDeathtouch) {
    permanent.deathtouchDamage = true;
  }
  state.events.emit(
    RulesEngineEvent.DAMAGE_DEALT,
    `${source.sourceName} deals ${amount} damage to ${permanent.card.data.name}`,
    { sourceId: source.sourceId, recipientId: permanent.id, amount }
  );
  return amount;
}

/** Damage to a player is loss of life (rule 120.3a) */
export function markDamageOnPlayer(
  state: GameState,
  source: DamageSource,
  playerId: PlayerID,
  amount: number
): number {
  if (amount <= 0) return 0;
  const player = requirePlayer(state, playerId);
  player.life -= amount;
  state.events.emit(
    RulesEngineEvent.DAMAGE_DEALT,
    `${source.sourceName} deals ${amount} damage to ${player.name} (${player.life})`,
    { sourceId: source.sourceId, recipientId: playerId, amount, life: player.life }
  );
  return amount;
}

export function applyLifelink(state: GameState, source: DamageSource, dealt: number): void {
  if (source.hasLifelink && dealt > 0) {
    gainLife(state, source.controllerId, dealt);
  }
}
