/**
 * AIEngine.ts
 *
 * Heuristic decision-making for simulated players:
 * - Land drops and spell selection
 * - Mana source tapping
 * - Target selection
 * - Counterspell responses
 * - Attack/block decisions with keyword ability awareness
 * - Discard to hand size
 */

import type {
  Effect,
  GameCard,
  ManaAbility,
  ManaColor,
  ManaCost,
  ManaPool,
  Permanent,
  PlayerID,
  Target,
  TargetRequirement,
} from '../../shared/src';
import { MANA_COLORS } from '../../shared/src';
import { type BlockAssignment, canAttack, canBlock } from './combat';
import {
  colorsOf,
  creaturesControlledBy,
  type GameState,
  getPower,
  getToughness,
  hasKeyword,
  isArtifactCard,
  isLandCard,
  manaAbilitiesOf,
  type PendingTrigger,
  permanentsControlledBy,
  requirePlayer,
} from './gameState';
import { addMana, canPay, manaValue, parseManaCost } from './mana';
import type { PriorityManager } from './priority';
import type { SpellCastingEngine } from './spellCasting';
import { isLegalTarget, targetRequirements, type TargetingSource } from './targeting';

/**
 * What a player controller sees when it holds priority
 */
export interface DecisionContext {
  readonly state: GameState;
  readonly engine: SpellCastingEngine;
  readonly priority: PriorityManager;
  readonly playerId: PlayerID;
}

/**
 * Decisions the turn driver asks of each player
 */
export interface PlayerController {
  /** Take one action while holding priority. Returns false to pass. */
  takeAction(ctx: DecisionContext): boolean;
  chooseAttackers(state: GameState, playerId: PlayerID, defender: PlayerID): Permanent[];
  chooseBlockers(state: GameState, defender: PlayerID): BlockAssignment[];
  chooseDiscards(state: GameState, playerId: PlayerID, count: number): GameCard[];
  chooseTriggerTargets(
    state: GameState,
    trigger: PendingTrigger,
    requirements: readonly TargetRequirement[]
  ): Target[] | null;
}

/** A planned mana ability activation */
export interface ManaTap {
  readonly permanent: Permanent;
  readonly ability: ManaAbility;
  readonly choice: ManaColor | 'C' | undefined;
}

const HARMFUL_EFFECTS: ReadonlySet<Effect['kind']> = new Set<Effect['kind']>([
  'dealDamage',
  'loseLife',
  'destroy',
  'counterSpell',
  'tapPermanent',
  'returnToHand',
]);

/**
 * A tap-only mana ability on an untapped permanent
 */
function usableManaAbility(permanent: Permanent): ManaAbility | undefined {
  if (permanent.tapped) return undefined;
  return manaAbilitiesOf(permanent.card).find(
    ability => ability.cost.tap && manaValue(ability.cost.mana) === 0
  );
}

/**
 * Colors and categories a mana ability can add
 */
function productionOptions(ability: ManaAbility): Array<ManaColor | 'C'> {
  const options: Array<ManaColor | 'C'> = [];
  for (const produced of ability.produces) {
    if (produced === 'any') {
      options.push(...MANA_COLORS);
    } else if (!options.includes(produced)) {
      options.push(produced);
    }
  }
  return options;
}

/**
 * Choose which mana sources to tap for a cost on top of the current pool.
 * Strict requirements are covered first by the least flexible source able to
 * make them; generic mana takes whatever is left. Returns null when the cost
 * cannot be met.
 */
export function planManaPayment(state: GameState, playerId: PlayerID, cost: ManaCost): ManaTap[] | null {
  const player = requirePlayer(state, playerId);
  let pool: ManaPool = player.manaPool;
  if (canPay(pool, cost)) return [];

  const sources: Array<{ permanent: Permanent; ability: ManaAbility; options: Array<ManaColor | 'C'> }> = [];
  for (const permanent of permanentsControlledBy(state, playerId)) {
    const ability = usableManaAbility(permanent);
    if (ability) sources.push({ permanent, ability, options: productionOptions(ability) });
  }
  sources.sort((a, b) => a.options.length - b.options.length);

  const taps: ManaTap[] = [];
  const used = new Set<Permanent>();

  for (const category of [...MANA_COLORS, 'C'] as const) {
    while (pool[category] < cost[category]) {
      const source = sources.find(s => !used.has(s.permanent) && s.options.includes(category));
      if (!source) return null;
      used.add(source.permanent);
      taps.push({ permanent: source.permanent, ability: source.ability, choice: category });
      pool = addMana(pool, category, source.ability.amount);
    }
  }

  for (const source of sources) {
    if (canPay(pool, cost)) break;
    if (used.has(source.permanent)) continue;
    const choice = source.options[0];
    if (choice === undefined) continue;
    used.add(source.permanent);
    taps.push({ permanent: source.permanent, ability: source.ability, choice });
    pool = addMana(pool, choice, source.ability.amount);
  }

  return canPay(pool, cost) ? taps : null;
}

/**
 * AI Engine - simple heuristics, no lookahead
 */
export class AIEngine implements PlayerController {
  takeAction(ctx: DecisionContext): boolean {
    const { state, priority, playerId } = ctx;
    const sorceryTiming =
      priority.activePlayer === playerId && ctx.engine.hasSorceryTiming(playerId).legal;

    if (sorceryTiming && this.playLand(ctx)) return true;
    if (!state.stack.isEmpty()) return this.respond(ctx);
    if (sorceryTiming) return this.castBestSpell(ctx);
    return false;
  }

  /**
   * One land per turn, preferring one that makes a color the hand needs.
   */
  private playLand(ctx: DecisionContext): boolean {
    const player = requirePlayer(ctx.state, ctx.playerId);
    if (player.landsPlayedThisTurn > 0) return false;
    const lands = player.hand.filter(card => isLandCard(card.data));
    if (lands.length === 0) return false;

    const wanted = new Set<string>();
    for (const card of player.hand) {
      for (const color of colorsOf(card)) wanted.add(color);
    }
    const land =
      lands.find(card =>
        manaAbilitiesOf(card).some(ability =>
          productionOptions(ability).some(option => wanted.has(option))
        )
      ) ?? lands[0];
    return ctx.engine.playLand(land, ctx.playerId).success;
  }

  /**
   * Answer the opponent's spell on top of the stack with a counterspell.
   */
  private respond(ctx: DecisionContext): boolean {
    const top = ctx.state.stack.peek();
    if (!top || top.controller === ctx.playerId || top.kind !== 'spell') return false;

    const player = requirePlayer(ctx.state, ctx.playerId);
    for (const card of player.hand) {
      if (!card.spellEffects.some(effect => effect.kind === 'counterSpell')) continue;
      if (!ctx.engine.validateSpellTiming(card, ctx.playerId).legal) continue;
      if (!this.tapManaFor(ctx, parseManaCost(card.data.mana_cost))) continue;
      if (ctx.engine.counterSpell(card, ctx.playerId, top).success) return true;
    }
    return false;
  }

  /**
   * Cast the most expensive spell that can be paid for and has targets.
   */
  private castBestSpell(ctx: DecisionContext): boolean {
    const player = requirePlayer(ctx.state, ctx.playerId);
    const candidates = player.hand
      .filter(card => !isLandCard(card.data))
      .filter(card => !card.spellEffects.some(effect => effect.kind === 'counterSpell'))
      .map(card => ({ card, cost: parseManaCost(card.data.mana_cost) }))
      .sort((a, b) => manaValue(b.cost) - manaValue(a.cost));

    for (const { card, cost } of candidates) {
      if (planManaPayment(ctx.state, ctx.playerId, cost) === null) continue;
      const targets = this.chooseTargets(ctx.state, ctx.playerId, card.spellEffects, {
        colors: colorsOf(card),
        isArtifact: isArtifactCard(card.data),
      });
      if (targets === null) continue;
      if (!this.tapManaFor(ctx, cost)) continue;
      if (ctx.engine.castSpell(card, ctx.playerId, targets).success) return true;
    }
    return false;
  }

  private tapManaFor(ctx: DecisionContext, cost: ManaCost): boolean {
    const plan = planManaPayment(ctx.state, ctx.playerId, cost);
    if (plan === null) return false;
    for (const tap of plan) {
      const result = ctx.engine.activateManaAbility(tap.ability, tap.permanent.id, ctx.playerId, tap.choice);
      if (!result.success) return false;
    }
    return true;
  }

  /* ---------------------------------------------------------------- */
  /* Targets                                                           */
  /* ---------------------------------------------------------------- */

  /**
   * One target per slot. Harmful effects aim at the opponent's side:
   * the best creature the effect kills, otherwise the opponent. Helpful
   * effects aim at our own side. Null when some slot has no legal choice.
   */
  chooseTargets(
    state: GameState,
    playerId: PlayerID,
    effects: readonly Effect[],
    source: TargetingSource
  ): Target[] | null {
    const requirements = targetRequirements(effects);
    const targets: Target[] = [];
    for (let slot = 0; slot < requirements.length; slot++) {
      const effect = effects.find(e => 'target' in e && e.target.kind === 'chosen' && e.target.index === slot);
      const harmful = effect !== undefined && isHarmful(effect);
      const target = this.chooseTarget(state, playerId, requirements[slot], effect, harmful, source);
      if (!target) return null;
      targets.push(target);
    }
    return targets;
  }

  private chooseTarget(
    state: GameState,
    playerId: PlayerID,
    requirement: TargetRequirement,
    effect: Effect | undefined,
    harmful: boolean,
    source: TargetingSource
  ): Target | undefined {
    const player = requirePlayer(state, playerId);
    const opponent = player.opponents.find(id => !requirePlayer(state, id).hasLost);
    const legal = (target: Target): boolean => isLegalTarget(state, target, requirement, source);

    if (requirement === 'spell') {
      const top = state.stack.peek();
      if (top && top.controller !== playerId) {
        const target: Target = { kind: 'stackItem', id: top.id };
        if (legal(target)) return target;
      }
      return undefined;
    }

    const side = harmful && opponent !== undefined ? opponent : playerId;
    if (requirement !== 'player') {
      const creatures = creaturesControlledBy(state, side)
        .filter(p => legal({ kind: 'permanent', id: p.id }))
        .sort((a, b) => getPower(b) - getPower(a));
      const candidates = harmful && effect ? creatures.filter(p => effectKills(effect, p)) : creatures;
      const best = candidates[0];
      if (best && (requirement !== 'any' || harmful)) {
        return { kind: 'permanent', id: best.id };
      }
      if (requirement === 'permanent') {
        const any = permanentsControlledBy(state, side).find(p => legal({ kind: 'permanent', id: p.id }));
        if (any) return { kind: 'permanent', id: any.id };
      }
    }

    if (requirement === 'player' || requirement === 'any') {
      const target: Target = { kind: 'player', id: side };
      if (legal(target)) return target;
    }
    return undefined;
  }

  chooseTriggerTargets(
    state: GameState,
    trigger: PendingTrigger,
    requirements: readonly TargetRequirement[]
  ): Target[] | null {
    const targets = this.chooseTargets(state, trigger.controller, trigger.ability.effects, {
      colors: colorsOf(trigger.sourceCard),
      isArtifact: isArtifactCard(trigger.sourceCard.data),
    });
    return targets !== null && targets.length === requirements.length ? targets : null;
  }

  /* ---------------------------------------------------------------- */
  /* Combat                                                            */
  /* ---------------------------------------------------------------- */

  /**
   * Attack with everything able to attack.
   */
  chooseAttackers(state: GameState, playerId: PlayerID, _defender: PlayerID): Permanent[] {
    return creaturesControlledBy(state, playerId).filter(canAttack);
  }

  /**
   * Block when the blocker kills the attacker or survives it. Menace
   * attackers are left alone rather than single-blocked.
   */
  chooseBlockers(state: GameState, defender: PlayerID): BlockAssignment[] {
    const attackers = [...state.permanents.values()]
      .filter(p => p.attacking === defender)
      .sort((a, b) => getPower(b) - getPower(a));
    const available = creaturesControlledBy(state, defender).filter(p => !p.tapped);
    const used = new Set<Permanent>();
    const blocks: BlockAssignment[] = [];

    for (const attacker of attackers) {
      if (hasKeyword(attacker, 'menace')) continue;
      const attackerPower = getPower(attacker);
      const attackerToughness = getToughness(attacker) - attacker.damage;
      const blocker = available.find(candidate => {
        if (used.has(candidate) || !canBlock(attacker, candidate)) return false;
        const kills = getPower(candidate) >= attackerToughness || hasKeyword(candidate, 'deathtouch');
        const survives =
          getToughness(candidate) - candidate.damage > attackerPower &&
          !hasKeyword(attacker, 'deathtouch');
        return kills || survives;
      });
      if (blocker) {
        used.add(blocker);
        blocks.push({ blockerId: blocker.id, attackerId: attacker.id });
      }
    }
    return blocks;
  }

  /**
   * Discard the most expensive cards first, keeping lands.
   */
  chooseDiscards(state: GameState, playerId: PlayerID, count: number): GameCard[] {
    const hand = [...requirePlayer(state, playerId).hand];
    hand.sort((a, b) => discardScore(b) - discardScore(a));
    return hand.slice(0, count);
  }
}

function isHarmful(effect: Effect): boolean {
  if (effect.kind === 'modifyStats') return effect.power < 0 || effect.toughness < 0;
  return HARMFUL_EFFECTS.has(effect.kind);
}

/**
 * Would this effect remove the creature?
 */
function effectKills(effect: Effect, creature: Permanent): boolean {
  const toughnessLeft = getToughness(creature) - creature.damage;
  switch (effect.kind) {
    case 'dealDamage':
      return effect.amount >= toughnessLeft && !hasKeyword(creature, 'indestructible');
    case 'destroy':
      return !hasKeyword(creature, 'indestructible');
    case 'modifyStats':
      return getToughness(creature) + effect.toughness <= 0;
    default:
      return true;
  }
}

function discardScore(card: GameCard): number {
  if (isLandCard(card.data)) return -1;
  return manaValue(parseManaCost(card.data.mana_cost));
}
