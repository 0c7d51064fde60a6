/**
 * effects.ts
 *
 * Applies resolved Effect values to the game (rule 608.2). One case per
 * Effect variant; the switch is exhaustive.
 */

import type {
  Effect,
  EffectTarget,
  Permanent,
  PermanentID,
  PlayerID,
  Target,
} from '../../shared/src';
import { assertNever } from './core/errors';
import { RulesEngineEvent } from './core/events';
import {
  applyLifelink,
  type DamageSource,
  markDamageOnPermanent,
  markDamageOnPlayer,
} from './damage';
import {
  destroyPermanent,
  drawCards,
  gainLife,
  type GameState,
  getPermanent,
  hasKeyword,
  isCreature,
  loseLife,
  removePermanent,
  requirePlayer,
  tapPermanent,
  untapPermanent,
} from './gameState';
import { addMana } from './mana';
import { isLegalTarget, type TargetingSource } from './targeting';

export interface EffectContext extends TargetingSource {
  readonly controller: PlayerID;
  /** Permanent the effect comes from, if any (abilities, not spells) */
  readonly sourceId: PermanentID | null;
  readonly sourceName: string;
  readonly targets: readonly Target[];
}

type ResolvedTarget =
  | { readonly kind: 'player'; readonly id: PlayerID }
  | { readonly kind: 'permanent'; readonly permanent: Permanent }
  | { readonly kind: 'stackItem'; readonly id: string };

/**
 * Turn an effect's target specification into the objects it affects now.
 * Chosen targets that became illegal are dropped (rule 608.2b).
 */
function resolveTargets(state: GameState, selector: EffectTarget, ctx: EffectContext): ResolvedTarget[] {
  switch (selector.kind) {
    case 'self': {
      const permanent = ctx.sourceId === null ? undefined : getPermanent(state, ctx.sourceId);
      return permanent ? [{ kind: 'permanent', permanent }] : [];
    }
    case 'controller':
      return [{ kind: 'player', id: ctx.controller }];
    case 'eachOpponent':
      return requirePlayer(state, ctx.controller)
        .opponents.filter(id => !requirePlayer(state, id).hasLost)
        .map((id): ResolvedTarget => ({ kind: 'player', id }));
    case 'chosen': {
      const target = ctx.targets[selector.index];
      if (target === undefined || !isLegalTarget(state, target, selector.requirement, ctx)) {
        return [];
      }
      if (target.kind === 'permanent') {
        const permanent = getPermanent(state, target.id);
        return permanent ? [{ kind: 'permanent', permanent }] : [];
      }
      return [target];
    }
    default:
      return assertNever(selector);
  }
}

function damageSourceFor(state: GameState, ctx: EffectContext): DamageSource {
  const permanent = ctx.sourceId === null ? undefined : getPermanent(state, ctx.sourceId);
  return {
    sourceId: ctx.sourceId,
    sourceName: ctx.sourceName,
    controllerId: ctx.controller,
    colors: ctx.colors,
    isArtifact: ctx.isArtifact,
    hasDeathtouch: permanent !== undefined && hasKeyword(permanent, 'deathtouch'),
    hasLifelink: permanent !== undefined && hasKeyword(permanent, 'lifelink'),
  };
}

function playersOf(targets: readonly ResolvedTarget[]): PlayerID[] {
  const result: PlayerID[] = [];
  for (const t of targets) {
    if (t.kind === 'player') result.push(t.id);
  }
  return result;
}

function permanentsOf(targets: readonly ResolvedTarget[]): Permanent[] {
  const result: Permanent[] = [];
  for (const t of targets) {
    if (t.kind === 'permanent') result.push(t.permanent);
  }
  return result;
}

/**
 * Apply a single effect. Returns log lines.
 */
export function applyEffect(state: GameState, effect: Effect, ctx: EffectContext): string[] {
  const log: string[] = [];

  switch (effect.kind) {
    case 'dealDamage': {
      const source = damageSourceFor(state, ctx);
      const targets = resolveTargets(state, effect.target, ctx);
      let dealt = 0;
      for (const playerId of playersOf(targets)) {
        dealt += markDamageOnPlayer(state, source, playerId, effect.amount);
        log.push(`${ctx.sourceName} deals ${effect.amount} damage to ${playerId}`);
      }
      for (const permanent of permanentsOf(targets)) {
        if (!isCreature(permanent)) continue;
        dealt += markDamageOnPermanent(state, source, permanent, effect.amount);
        log.push(`${ctx.sourceName} deals ${effect.amount} damage to ${permanent.card.data.name}`);
      }
      applyLifelink(state, source, dealt);
      break;
    }

    case 'gainLife':
      for (const playerId of playersOf(resolveTargets(state, effect.target, ctx))) {
        gainLife(state, playerId, effect.amount);
        log.push(`${playerId} gains ${effect.amount} life`);
      }
      break;

    case 'loseLife':
      for (const playerId of playersOf(resolveTargets(state, effect.target, ctx))) {
        loseLife(state, playerId, effect.amount);
        log.push(`${playerId} loses ${effect.amount} life`);
      }
      break;

    case 'drawCards':
      for (const playerId of playersOf(resolveTargets(state, effect.target, ctx))) {
        const drawn = drawCards(state, playerId, effect.amount);
        log.push(`${playerId} draws ${drawn} card(s)`);
      }
      break;

    case 'addMana': {
      const player = requirePlayer(state, ctx.controller);
      player.manaPool = addMana(player.manaPool, effect.mana, effect.amount);
      state.events.emit(RulesEngineEvent.MANA_ADDED, `${player.name} adds ${effect.amount} ${effect.mana}`, {
        playerId: player.id,
        mana: effect.mana,
        amount: effect.amount,
      });
      log.push(`${player.name} adds ${effect.amount} ${effect.mana} mana`);
      break;
    }

    case 'modifyStats':
      for (const permanent of permanentsOf(resolveTargets(state, effect.target, ctx))) {
        if (!isCreature(permanent)) continue;
        permanent.modifiers.push({
          power: effect.power,
          toughness: effect.toughness,
          duration: effect.duration,
        });
        log.push(`${permanent.card.data.name} gets ${signed(effect.power)}/${signed(effect.toughness)}`);
      }
      break;

    case 'grantKeyword':
      for (const permanent of permanentsOf(resolveTargets(state, effect.target, ctx))) {
        permanent.grantedKeywords.push({ keyword: effect.keyword, duration: effect.duration });
        log.push(`${permanent.card.data.name} gains ${effect.keyword}`);
      }
      break;

    case 'destroy':
      for (const permanent of permanentsOf(resolveTargets(state, effect.target, ctx))) {
        const destroyed = destroyPermanent(state, permanent.id);
        log.push(
          destroyed
            ? `${permanent.card.data.name} is destroyed`
            : `${permanent.card.data.name} is indestructible`
        );
      }
      break;

    case 'counterSpell':
      for (const target of resolveTargets(state, effect.target, ctx)) {
        if (target.kind !== 'stackItem') continue;
        const item = state.stack.find(target.id);
        if (!item) continue;
        item.countered = true;
        log.push(`${ctx.sourceName} counters ${item.kind === 'spell' ? item.card.data.name : item.sourceName}`);
      }
      break;

    case 'tapPermanent':
      for (const permanent of permanentsOf(resolveTargets(state, effect.target, ctx))) {
        if (tapPermanent(state, permanent)) log.push(`${permanent.card.data.name} is tapped`);
      }
      break;

    case 'untapPermanent':
      for (const permanent of permanentsOf(resolveTargets(state, effect.target, ctx))) {
        if (untapPermanent(state, permanent)) log.push(`${permanent.card.data.name} is untapped`);
      }
      break;

    case 'returnToHand':
      for (const permanent of permanentsOf(resolveTargets(state, effect.target, ctx))) {
        removePermanent(state, permanent.id, 'hand');
        log.push(`${permanent.card.data.name} returns to its owner's hand`);
      }
      break;

    default:
      return assertNever(effect);
  }

  return log;
}

/**
 * Apply effects in printed order (rule 608.2c).
 */
export function applyEffects(state: GameState, effects: readonly Effect[], ctx: EffectContext): string[] {
  const log: string[] = [];
  for (const effect of effects) {
    log.push(...applyEffect(state, effect, ctx));
  }
  return log;
}

function signed(n: number): string {
  return n >= 0 ? `+${n}` : `${n}`;
}
