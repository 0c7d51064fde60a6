/**
 * Rule 601: Casting Spells
 * Rule 602: Activating Activated Abilities
 * Rule 605: Mana Abilities
 * Rule 608: Resolving Spells and Abilities
 *
 * SpellCastingEngine owns every transition that touches the stack. Each
 * operation either fails with nothing changed or applies fully and finishes
 * with a state-based action check.
 */

import type {
  AbilityStackItem,
  ActivatedAbility,
  GameCard,
  ManaAbility,
  ManaCategory,
  ManaColor,
  Permanent,
  PermanentID,
  PlayerID,
  SpellStackItem,
  StackItem,
  Target,
  TargetRequirement,
} from '../../shared/src';
import { GameStep } from '../../shared/src';
import { RulesEngineEvent } from './core/events';
import {
  type ActionValidation,
  type EngineResult,
  fail,
  illegal,
  LEGAL,
  ok,
} from './core/types';
import { applyEffects, type EffectContext } from './effects';
import {
  cardHasKeyword,
  colorsOf,
  createPermanent,
  type GameState,
  getPermanent,
  hasKeyword,
  isArtifactCard,
  isInstantCard,
  isLandCard,
  type PendingTrigger,
  permanentKindOf,
  requirePlayer,
  tapPermanent,
} from './gameState';
import { addMana, formatMana, parseManaCost, pay } from './mana';
import type { PriorityManager } from './priority';
import { StateBasedActionChecker, type StateBasedActionResult } from './stateBasedActions';
import {
  allTargetsIllegal,
  targetRequirements,
  type TargetingSource,
  validateTargets,
} from './targeting';

export interface CastOptions {
  /** Value chosen for {X} */
  readonly x?: number;
}

export type ResolutionOutcome = 'resolved' | 'countered' | 'fizzled';

export interface ResolutionResult {
  readonly item: StackItem;
  readonly outcome: ResolutionOutcome;
  readonly stateBasedActions: StateBasedActionResult;
  readonly log: readonly string[];
}

export type AbilityActivation =
  | { readonly kind: 'stack'; readonly item: AbilityStackItem }
  | { readonly kind: 'mana'; readonly mana: ManaCategory; readonly amount: number };

/**
 * Picks targets for a triggered ability as it goes on the stack (rule 603.3d).
 * Returning null leaves the trigger off the stack.
 */
export type TriggerTargetChooser = (
  state: GameState,
  trigger: PendingTrigger,
  requirements: readonly TargetRequirement[]
) => Target[] | null;

export interface SpellCastingOptions {
  readonly chooseTriggerTargets?: TriggerTargetChooser;
}

const MAIN_PHASES: readonly GameStep[] = [GameStep.MAIN1, GameStep.MAIN2];

export class SpellCastingEngine {
  readonly stateBasedActions: StateBasedActionChecker;

  constructor(
    private readonly state: GameState,
    private readonly priority: PriorityManager,
    private readonly options: SpellCastingOptions = {}
  ) {
    this.stateBasedActions = new StateBasedActionChecker(state);
  }

  /* ---------------------------------------------------------------- */
  /* Timing                                                            */
  /* ---------------------------------------------------------------- */

  /**
   * Rule 307.1 - sorcery timing: own main phase, holding priority, empty stack.
   */
  hasSorceryTiming(player: PlayerID): ActionValidation {
    if (!this.priority.hasPriority(player)) {
      return illegal('ILLEGAL_TIMING', `${player} does not hold priority`);
    }
    if (this.priority.activePlayer !== player) {
      return illegal('ILLEGAL_TIMING', `It is not ${player}'s turn`);
    }
    if (!MAIN_PHASES.includes(this.state.step)) {
      return illegal('ILLEGAL_TIMING', `Not a main phase (${this.state.step})`);
    }
    if (!this.state.stack.isEmpty()) {
      return illegal('ILLEGAL_TIMING', 'The stack is not empty');
    }
    return LEGAL;
  }

  /**
   * Instants and flash permanents need priority only; everything else needs
   * sorcery timing. Lands are never cast (rule 305.9).
   */
  validateSpellTiming(card: GameCard, caster: PlayerID): ActionValidation {
    if (isLandCard(card.data)) {
      return illegal('ILLEGAL_TIMING', `${card.data.name} is a land and cannot be cast`);
    }
    if (isInstantCard(card.data) || cardHasKeyword(card, 'flash')) {
      return this.priority.hasPriority(caster)
        ? LEGAL
        : illegal('ILLEGAL_TIMING', `${caster} does not hold priority`);
    }
    return this.hasSorceryTiming(caster);
  }

  /* ---------------------------------------------------------------- */
  /* Casting                                                           */
  /* ---------------------------------------------------------------- */

  /**
   * Rule 601.2 - cast a spell from hand. Checks timing, then targets, then
   * pays the mana cost. On success the card is on the stack and the caster
   * keeps priority.
   */
  castSpell(
    card: GameCard,
    caster: PlayerID,
    targets: readonly Target[] = [],
    options: CastOptions = {}
  ): EngineResult<SpellStackItem> {
    const player = requirePlayer(this.state, caster);
    const handIndex = player.hand.findIndex(c => c.id === card.id);
    if (handIndex === -1) {
      throw new Error(`${card.data.name} (${card.id}) is not in ${player.name}'s hand`);
    }

    const timing = this.validateSpellTiming(card, caster);
    if (!timing.legal) return fail(timing.error, timing.reason);

    const targeting: TargetingSource = {
      colors: colorsOf(card),
      isArtifact: isArtifactCard(card.data),
    };
    const targetCheck = validateTargets(this.state, card.spellEffects, targets, targeting);
    if (!targetCheck.legal) return fail(targetCheck.error, targetCheck.reason);

    const cost = parseManaCost(card.data.mana_cost, { x: options.x });
    const payment = pay(player.manaPool, cost);
    if (!payment.success) return fail(payment.error, payment.reason);

    player.manaPool = payment.remainingPool;
    player.hand.splice(handIndex, 1);

    const item: SpellStackItem = {
      kind: 'spell',
      id: this.state.nextId('stack'),
      controller: caster,
      card,
      targets: [...targets],
      timestamp: this.state.stack.size(),
      countered: false,
    };
    this.state.stack.push(item);
    this.priority.playerActed(caster);

    this.state.events.emit(RulesEngineEvent.MANA_SPENT, `${player.name} paid ${formatMana(cost)}`, {
      playerId: caster,
      cost: formatMana(cost),
    });
    this.state.events.emit(RulesEngineEvent.SPELL_CAST, `${player.name} cast ${card.data.name}`, {
      playerId: caster,
      cardName: card.data.name,
      stackItemId: item.id,
    });

    const sba = this.stateBasedActions.check();
    return ok(item, [`${player.name} cast ${card.data.name} paying ${formatMana(cost)}`, ...sba.log]);
  }

  /**
   * Cast a counterspell aimed at a stack item. The target is only marked
   * countered when the counterspell resolves.
   */
  counterSpell(
    counterCard: GameCard,
    caster: PlayerID,
    targetItem: StackItem,
    options: CastOptions = {}
  ): EngineResult<SpellStackItem> {
    if (!counterCard.spellEffects.some(effect => effect.kind === 'counterSpell')) {
      return fail('TARGET_INVALID', `${counterCard.data.name} cannot counter spells`);
    }
    return this.castSpell(counterCard, caster, [{ kind: 'stackItem', id: targetItem.id }], options);
  }

  /**
   * Rule 305.1 - playing a land is a special action: no stack, one per turn,
   * sorcery timing.
   */
  playLand(card: GameCard, playerId: PlayerID): EngineResult<Permanent> {
    const player = requirePlayer(this.state, playerId);
    const handIndex = player.hand.findIndex(c => c.id === card.id);
    if (handIndex === -1) {
      throw new Error(`${card.data.name} (${card.id}) is not in ${player.name}'s hand`);
    }
    if (!isLandCard(card.data)) {
      return fail('ILLEGAL_TIMING', `${card.data.name} is not a land`);
    }
    const timing = this.hasSorceryTiming(playerId);
    if (!timing.legal) return fail(timing.error, timing.reason);
    if (player.landsPlayedThisTurn >= 1) {
      return fail('ILLEGAL_TIMING', `${player.name} already played a land this turn`);
    }

    player.hand.splice(handIndex, 1);
    player.landsPlayedThisTurn++;
    const permanent = createPermanent(this.state, card, playerId);
    this.priority.playerActed(playerId);
    this.state.events.emit(RulesEngineEvent.LAND_PLAYED, `${player.name} played ${card.data.name}`, {
      playerId,
      permanentId: permanent.id,
    });

    const sba = this.stateBasedActions.check();
    return ok(permanent, [`${player.name} played ${card.data.name}`, ...sba.log]);
  }

  /* ---------------------------------------------------------------- */
  /* Abilities                                                         */
  /* ---------------------------------------------------------------- */

  private validateTapCost(source: Permanent, isManaAbility: boolean): ActionValidation {
    if (source.tapped) {
      return illegal('UNPAYABLE_COST', `${source.card.data.name} is already tapped`);
    }
    // Rule 302.6, with mana abilities exempt
    if (
      !isManaAbility &&
      source.kind === 'creature' &&
      source.summoningSick &&
      !hasKeyword(source, 'haste')
    ) {
      return illegal('UNPAYABLE_COST', `${source.card.data.name} has summoning sickness`);
    }
    return LEGAL;
  }

  private requireOwnSource(sourceId: PermanentID, controller: PlayerID): Permanent | undefined {
    const source = getPermanent(this.state, sourceId);
    return source && source.owner === controller ? source : undefined;
  }

  /**
   * Rule 602.2 - activate an ability of a permanent. Mana abilities are
   * routed to activateManaAbility and never touch the stack.
   */
  activateAbility(
    ability: ActivatedAbility | ManaAbility,
    sourceId: PermanentID,
    controller: PlayerID,
    targets: readonly Target[] = [],
    manaChoice?: ManaColor | 'C'
  ): EngineResult<AbilityActivation> {
    if (ability.kind === 'mana') {
      const result = this.activateManaAbility(ability, sourceId, controller, manaChoice);
      return result.success
        ? ok<AbilityActivation>({ kind: 'mana', mana: result.value.mana, amount: result.value.amount }, result.log)
        : result;
    }

    const source = this.requireOwnSource(sourceId, controller);
    if (!source) {
      return fail('UNPAYABLE_COST', `${controller} controls no permanent ${sourceId}`);
    }

    if (ability.timing === 'sorcery') {
      const timing = this.hasSorceryTiming(controller);
      if (!timing.legal) return fail(timing.error, timing.reason);
    } else if (ability.timing === 'instant' && !this.priority.hasPriority(controller)) {
      return fail('ILLEGAL_TIMING', `${controller} does not hold priority`);
    }

    if (ability.cost.tap) {
      const tapCheck = this.validateTapCost(source, false);
      if (!tapCheck.legal) return fail(tapCheck.error, tapCheck.reason);
    }

    const player = requirePlayer(this.state, controller);
    const payment = pay(player.manaPool, ability.cost.mana);
    if (!payment.success) return fail(payment.error, payment.reason);

    const targeting: TargetingSource = {
      colors: colorsOf(source.card),
      isArtifact: isArtifactCard(source.card.data),
    };
    const targetCheck = validateTargets(this.state, ability.effects, targets, targeting);
    if (!targetCheck.legal) return fail(targetCheck.error, targetCheck.reason);

    if (ability.cost.tap) tapPermanent(this.state, source);
    player.manaPool = payment.remainingPool;

    const item: AbilityStackItem = {
      kind: 'ability',
      id: this.state.nextId('stack'),
      controller,
      ability,
      sourceId,
      sourceName: source.card.data.name,
      sourceCard: source.card,
      targets: [...targets],
      timestamp: this.state.stack.size(),
      countered: false,
    };
    this.state.stack.push(item);
    this.priority.playerActed(controller);
    this.state.events.emit(
      RulesEngineEvent.ABILITY_ACTIVATED,
      `${player.name} activated ${source.card.data.name}: ${ability.name}`,
      { playerId: controller, permanentId: sourceId, stackItemId: item.id }
    );

    const sba = this.stateBasedActions.check();
    return ok<AbilityActivation>({ kind: 'stack', item }, [`${player.name} activated ${ability.name}`, ...sba.log]);
  }

  /**
   * Rule 605.3 - mana abilities resolve immediately. An "any color" ability
   * adds the chosen color, or generic mana when no color is chosen.
   */
  activateManaAbility(
    ability: ManaAbility,
    sourceId: PermanentID,
    controller: PlayerID,
    choice?: ManaColor | 'C'
  ): EngineResult<{ mana: ManaCategory; amount: number }> {
    const source = this.requireOwnSource(sourceId, controller);
    if (!source) {
      return fail('UNPAYABLE_COST', `${controller} controls no permanent ${sourceId}`);
    }
    if (ability.cost.tap) {
      const tapCheck = this.validateTapCost(source, true);
      if (!tapCheck.legal) return fail(tapCheck.error, tapCheck.reason);
    }
    const player = requirePlayer(this.state, controller);
    const payment = pay(player.manaPool, ability.cost.mana);
    if (!payment.success) return fail(payment.error, payment.reason);

    const mana = producedCategory(ability, choice);
    if (ability.cost.tap) tapPermanent(this.state, source);
    player.manaPool = addMana(payment.remainingPool, mana, ability.amount);

    this.state.events.emit(
      RulesEngineEvent.MANA_ABILITY_ACTIVATED,
      `${player.name} tapped ${source.card.data.name} for ${ability.amount} ${mana}`,
      { playerId: controller, permanentId: sourceId, mana, amount: ability.amount }
    );
    this.state.events.emit(RulesEngineEvent.MANA_ADDED, `${player.name} adds ${ability.amount} ${mana}`, {
      playerId: controller,
      mana,
      amount: ability.amount,
    });
    return ok({ mana, amount: ability.amount }, [
      `${player.name} adds ${ability.amount} ${mana} from ${source.card.data.name}`,
    ]);
  }

  /* ---------------------------------------------------------------- */
  /* Triggers                                                          */
  /* ---------------------------------------------------------------- */

  /**
   * Rule 603.3b - put waiting triggers on the stack, active player's first
   * (so the non-active player's resolve first).
   */
  putTriggersOnStack(): string[] {
    const log: string[] = [];
    const pending = this.state.pendingTriggers;
    if (pending.length === 0) return log;
    this.state.pendingTriggers = [];

    const active = this.priority.activePlayer;
    const ordered = [
      ...pending.filter(t => t.controller === active),
      ...pending.filter(t => t.controller !== active),
    ];

    for (const trigger of ordered) {
      const requirements = targetRequirements(trigger.ability.effects);
      let targets: Target[] = [];
      if (requirements.length > 0) {
        const chosen = this.options.chooseTriggerTargets?.(this.state, trigger, requirements) ?? null;
        if (chosen === null) {
          log.push(`${trigger.sourceCard.data.name}: ${trigger.ability.name} has no legal targets`);
          continue;
        }
        const check = validateTargets(this.state, trigger.ability.effects, chosen, {
          colors: colorsOf(trigger.sourceCard),
          isArtifact: isArtifactCard(trigger.sourceCard.data),
        });
        if (!check.legal) {
          log.push(`${trigger.sourceCard.data.name}: ${check.reason}`);
          continue;
        }
        targets = chosen;
      }

      const item: AbilityStackItem = {
        kind: 'ability',
        id: this.state.nextId('stack'),
        controller: trigger.controller,
        ability: trigger.ability,
        sourceId: trigger.sourceId,
        sourceName: trigger.sourceCard.data.name,
        sourceCard: trigger.sourceCard,
        targets,
        timestamp: this.state.stack.size(),
        countered: false,
      };
      this.state.stack.push(item);
      log.push(`${item.sourceName}: ${trigger.ability.name} put on the stack`);
    }
    return log;
  }

  /* ---------------------------------------------------------------- */
  /* Resolution                                                        */
  /* ---------------------------------------------------------------- */

  private effectContext(item: StackItem): EffectContext {
    if (item.kind === 'spell') {
      return {
        controller: item.controller,
        sourceId: null,
        sourceName: item.card.data.name,
        colors: colorsOf(item.card),
        isArtifact: isArtifactCard(item.card.data),
        stackItemId: item.id,
        targets: item.targets,
      };
    }
    return {
      controller: item.controller,
      sourceId: item.sourceId,
      sourceName: item.sourceName,
      colors: colorsOf(item.sourceCard),
      isArtifact: isArtifactCard(item.sourceCard.data),
      stackItemId: item.id,
      targets: item.targets,
    };
  }

  /**
   * Rule 608.2b - fizzle check. Activated abilities also fizzle once their
   * source has left the battlefield.
   */
  private fizzles(item: StackItem): boolean {
    const ctx = this.effectContext(item);
    if (item.kind === 'spell') {
      return allTargetsIllegal(this.state, item.card.spellEffects, item.targets, ctx);
    }
    if (item.ability.kind === 'activated' && !this.state.permanents.has(item.sourceId)) {
      return true;
    }
    return allTargetsIllegal(this.state, item.ability.effects, item.targets, ctx);
  }

  /**
   * Resolve the top stack item (rule 608). Countered and fizzled spells go to
   * their owner's graveyard without effect. Afterwards state-based actions
   * are checked and the active player receives priority.
   */
  resolveTop(): ResolutionResult {
    const item = this.state.stack.pop();
    const log: string[] = [];
    const name = item.kind === 'spell' ? item.card.data.name : `${item.sourceName}: ${item.ability.name}`;
    let outcome: ResolutionOutcome;

    if (item.countered) {
      outcome = 'countered';
      if (item.kind === 'spell') {
        requirePlayer(this.state, item.controller).graveyard.push(item.card);
      }
      log.push(`${name} was countered`);
      this.state.events.emit(RulesEngineEvent.SPELL_COUNTERED, `${name} was countered`, {
        stackItemId: item.id,
      });
    } else if (this.fizzles(item)) {
      outcome = 'fizzled';
      if (item.kind === 'spell') {
        requirePlayer(this.state, item.controller).graveyard.push(item.card);
      }
      log.push(`${name} fizzled`);
      this.state.events.emit(RulesEngineEvent.SPELL_FIZZLED, `${name} fizzled`, { stackItemId: item.id });
    } else if (item.kind === 'spell') {
      outcome = 'resolved';
      log.push(...this.resolveSpell(item));
      this.state.events.emit(RulesEngineEvent.SPELL_RESOLVED, `${name} resolved`, {
        stackItemId: item.id,
        cardName: item.card.data.name,
      });
    } else {
      outcome = 'resolved';
      log.push(...applyEffects(this.state, item.ability.effects, this.effectContext(item)));
      this.state.events.emit(RulesEngineEvent.ABILITY_RESOLVED, `${name} resolved`, {
        stackItemId: item.id,
      });
    }

    const stateBasedActions = this.stateBasedActions.check();
    log.push(...stateBasedActions.log);
    this.priority.resetToActive();
    return { item, outcome, stateBasedActions, log };
  }

  private resolveSpell(item: SpellStackItem): string[] {
    // Rule 608.3 - permanent spells enter the battlefield
    if (permanentKindOf(item.card.data) !== null) {
      const permanent = createPermanent(this.state, item.card, item.controller);
      return [`${item.card.data.name} entered the battlefield (${permanent.id})`];
    }
    // Rule 608.2n - instants and sorceries go to the graveyard last
    const log = applyEffects(this.state, item.card.spellEffects, this.effectContext(item));
    requirePlayer(this.state, item.controller).graveyard.push(item.card);
    return log;
  }

  /**
   * Resolve until the stack is empty or a player has lost, putting new
   * triggers on the stack between resolutions.
   */
  resolveStack(): ResolutionResult[] {
    const results: ResolutionResult[] = [];
    this.putTriggersOnStack();
    while (!this.state.stack.isEmpty() && !this.state.players.some(p => p.hasLost)) {
      results.push(this.resolveTop());
      this.putTriggersOnStack();
    }
    return results;
  }
}

/**
 * Which category a mana ability adds for a given choice. A choice the ability
 * cannot make falls back to its first option.
 */
export function producedCategory(ability: ManaAbility, choice?: ManaColor | 'C'): ManaCategory {
  if (choice !== undefined) {
    if (ability.produces.includes(choice)) return choice;
    if (choice !== 'C' && ability.produces.includes('any')) return choice;
  }
  const first = ability.produces[0];
  if (first === undefined || first === 'any') return 'generic';
  return first;
}
