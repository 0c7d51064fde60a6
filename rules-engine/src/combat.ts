/**
 * combat.ts
 *
 * Combat declarations and damage (rules 506-511).
 *
 * Block legality follows the evasion keywords in a fixed order; protection
 * (rule 702.16) is checked last and overrides anything permissive before it.
 * Menace is a restriction on the whole block declaration, so it is enforced
 * by declareBlockers rather than canBlock.
 */

import type { Permanent, PermanentID, PlayerID } from '../../shared/src';
import { RulesEngineEvent } from './core/events';
import { type EngineResult, fail, ok } from './core/types';
import {
  applyLifelink,
  type DamageSource,
  damageSourceFromPermanent,
  markDamageOnPermanent,
  markDamageOnPlayer,
} from './damage';
import {
  clearCombatState,
  colorsOf,
  type GameState,
  getPermanent,
  getPower,
  getToughness,
  hasKeyword,
  isArtifact,
  isCreature,
  isProtectedFrom,
  requirePlayer,
  tapPermanent,
} from './gameState';
import type { StateBasedActionChecker, StateBasedActionResult } from './stateBasedActions';

export interface BlockValidation {
  readonly legal: boolean;
  readonly reason?: string;
}

export interface BlockAssignment {
  readonly blockerId: PermanentID;
  readonly attackerId: PermanentID;
}

/* ------------------------------------------------------------------ */
/* Legality                                                            */
/* ------------------------------------------------------------------ */

/**
 * Rule 508.1a - can this creature attack at all?
 */
export function checkAttack(attacker: Permanent): BlockValidation {
  const name = attacker.card.data.name;
  if (!isCreature(attacker)) return { legal: false, reason: `${name} is not a creature` };
  if (attacker.tapped) return { legal: false, reason: `${name} is tapped` };
  if (attacker.summoningSick && !hasKeyword(attacker, 'haste')) {
    return { legal: false, reason: `${name} has summoning sickness` };
  }
  if (hasKeyword(attacker, 'defender')) return { legal: false, reason: `${name} has defender` };
  return { legal: true };
}

export function canAttack(attacker: Permanent): boolean {
  return checkAttack(attacker).legal;
}

/**
 * Rule 509.1b - can `blocker` block `attacker`? Summoning sickness does not
 * matter for blocking.
 */
export function checkBlock(attacker: Permanent, blocker: Permanent): BlockValidation {
  const a = attacker.card.data.name;
  const b = blocker.card.data.name;

  if (!isCreature(blocker)) return { legal: false, reason: `${b} is not a creature` };
  if (blocker.tapped) return { legal: false, reason: `${b} is tapped` };

  if (hasKeyword(attacker, 'unblockable')) {
    return { legal: false, reason: `${a} can't be blocked` };
  }

  // Flying: can only be blocked by flying or reach
  if (hasKeyword(attacker, 'flying') && !hasKeyword(blocker, 'flying') && !hasKeyword(blocker, 'reach')) {
    return { legal: false, reason: `${b} can't block ${a} (flying)` };
  }

  // Intimidate: artifact creatures or creatures that share a color
  if (hasKeyword(attacker, 'intimidate') && !isArtifact(blocker)) {
    const blockerColors = colorsOf(blocker.card);
    const sharesColor = colorsOf(attacker.card).some(c => blockerColors.includes(c));
    if (!sharesColor) {
      return { legal: false, reason: `${b} can't block ${a} (intimidate)` };
    }
  }

  // Shadow works both ways (rule 702.28b)
  const attackerShadow = hasKeyword(attacker, 'shadow');
  const blockerShadow = hasKeyword(blocker, 'shadow');
  if (attackerShadow && !blockerShadow) {
    return { legal: false, reason: `${b} can't block ${a} (shadow)` };
  }
  if (blockerShadow && !attackerShadow) {
    return { legal: false, reason: `${b} has shadow and can only block creatures with shadow` };
  }

  // Fear: artifact creatures or black creatures
  if (hasKeyword(attacker, 'fear') && !isArtifact(blocker) && !colorsOf(blocker.card).includes('B')) {
    return { legal: false, reason: `${b} can't block ${a} (fear)` };
  }

  if (hasKeyword(attacker, 'horsemanship') && !hasKeyword(blocker, 'horsemanship')) {
    return { legal: false, reason: `${b} can't block ${a} (horsemanship)` };
  }

  if (isProtectedFrom(attacker, colorsOf(blocker.card), isArtifact(blocker))) {
    return { legal: false, reason: `${a} has protection from ${b}` };
  }

  return { legal: true };
}

export function canBlock(attacker: Permanent, blocker: Permanent): boolean {
  return checkBlock(attacker, blocker).legal;
}

/* ------------------------------------------------------------------ */
/* Declarations                                                        */
/* ------------------------------------------------------------------ */

/**
 * Rule 508 - declare attackers. All-or-nothing: any illegal attacker rejects
 * the whole declaration. Goaded creatures that are able to attack must.
 */
export function declareAttackers(
  state: GameState,
  attackingPlayer: PlayerID,
  attackerIds: readonly PermanentID[],
  defendingPlayer: PlayerID
): EngineResult<Permanent[]> {
  const defender = requirePlayer(state, defendingPlayer);
  if (defender.hasLost || defendingPlayer === attackingPlayer) {
    return fail('ILLEGAL_ATTACK', `${defendingPlayer} cannot be attacked`);
  }

  const attackers: Permanent[] = [];
  for (const id of attackerIds) {
    const attacker = getPermanent(state, id);
    if (!attacker || attacker.owner !== attackingPlayer) {
      return fail('ILLEGAL_ATTACK', `${attackingPlayer} controls no creature ${id}`);
    }
    if (attackers.includes(attacker)) {
      return fail('ILLEGAL_ATTACK', `${attacker.card.data.name} is declared twice`);
    }
    const check = checkAttack(attacker);
    if (!check.legal) {
      return fail('ILLEGAL_ATTACK', check.reason ?? `${attacker.card.data.name} cannot attack`);
    }
    attackers.push(attacker);
  }

  for (const permanent of state.permanents.values()) {
    if (
      permanent.owner === attackingPlayer &&
      permanent.goaded &&
      canAttack(permanent) &&
      !attackers.includes(permanent)
    ) {
      return fail('ILLEGAL_ATTACK', `${permanent.card.data.name} is goaded and must attack`);
    }
  }

  const log: string[] = [];
  for (const attacker of attackers) {
    attacker.attacking = defendingPlayer;
    attacker.blockedBy = [];
    // Rule 702.20b - vigilance
    if (!hasKeyword(attacker, 'vigilance')) {
      tapPermanent(state, attacker);
    }
    log.push(`${attacker.card.data.name} attacks ${defender.name}`);
  }

  if (attackers.length > 0) {
    state.events.emit(
      RulesEngineEvent.ATTACKERS_DECLARED,
      `${requirePlayer(state, attackingPlayer).name} attacks with ${attackers.length} creature(s)`,
      { playerId: attackingPlayer, count: attackers.length }
    );
  }
  return ok(attackers, log);
}

/**
 * Rule 509 - declare blockers. Each blocker blocks one attacker; an attacker
 * with menace must end up with zero or at least two blockers.
 */
export function declareBlockers(
  state: GameState,
  defendingPlayer: PlayerID,
  blocks: readonly BlockAssignment[]
): EngineResult<readonly BlockAssignment[]> {
  const usedBlockers = new Set<PermanentID>();
  const blockersPerAttacker = new Map<PermanentID, number>();
  const pairs: Array<{ attacker: Permanent; blocker: Permanent }> = [];

  for (const block of blocks) {
    const blocker = getPermanent(state, block.blockerId);
    const attacker = getPermanent(state, block.attackerId);
    if (!blocker || blocker.owner !== defendingPlayer) {
      return fail('ILLEGAL_BLOCK', `${defendingPlayer} controls no creature ${block.blockerId}`);
    }
    if (!attacker || attacker.attacking !== defendingPlayer) {
      return fail('ILLEGAL_BLOCK', `${block.attackerId} is not attacking ${defendingPlayer}`);
    }
    if (usedBlockers.has(blocker.id)) {
      return fail('ILLEGAL_BLOCK', `${blocker.card.data.name} can only block one creature`);
    }
    const check = checkBlock(attacker, blocker);
    if (!check.legal) {
      return fail('ILLEGAL_BLOCK', check.reason ?? `${blocker.card.data.name} cannot block`);
    }
    usedBlockers.add(blocker.id);
    blockersPerAttacker.set(attacker.id, (blockersPerAttacker.get(attacker.id) ?? 0) + 1);
    pairs.push({ attacker, blocker });
  }

  // Rule 702.111b - menace
  for (const [attackerId, count] of blockersPerAttacker) {
    const attacker = getPermanent(state, attackerId);
    if (attacker && count < 2 && hasKeyword(attacker, 'menace')) {
      return fail('ILLEGAL_BLOCK', `${attacker.card.data.name} has menace and needs two or more blockers`);
    }
  }

  const log: string[] = [];
  for (const { attacker, blocker } of pairs) {
    blocker.blocking = attacker.id;
    attacker.blockedBy.push(blocker.id);
    log.push(`${blocker.card.data.name} blocks ${attacker.card.data.name}`);
  }
  if (pairs.length > 0) {
    state.events.emit(
      RulesEngineEvent.BLOCKERS_DECLARED,
      `${requirePlayer(state, defendingPlayer).name} blocks with ${pairs.length} creature(s)`,
      { playerId: defendingPlayer, count: pairs.length }
    );
  }
  return ok(blocks, log);
}

/** Rule 511.3 - creatures stop being attacking and blocking creatures */
export function endCombat(state: GameState): void {
  for (const permanent of state.permanents.values()) {
    clearCombatState(permanent);
  }
  state.events.emit(RulesEngineEvent.COMBAT_ENDED, 'Combat ended');
}

/* ------------------------------------------------------------------ */
/* Damage                                                              */
/* ------------------------------------------------------------------ */

export enum CombatDamageStage {
  FIRST_STRIKE_DAMAGE = 'firstStrikeDamage',
  CLEANUP_1 = 'cleanup1',
  REGULAR_DAMAGE = 'regularDamage',
  CLEANUP_2 = 'cleanup2',
  DONE = 'done',
}

interface DamageAssignment {
  readonly source: DamageSource;
  readonly recipient: { readonly kind: 'player'; readonly id: PlayerID } | { readonly kind: 'permanent'; readonly id: PermanentID };
  readonly amount: number;
}

/**
 * Damage each blocker needs before the rest may move on (rule 510.1c-d).
 * Deathtouch makes 1 lethal.
 */
export function lethalDamageFor(blocker: Permanent, attackerHasDeathtouch: boolean): number {
  const remaining = Math.max(0, getToughness(blocker) - blocker.damage);
  return attackerHasDeathtouch ? Math.min(1, remaining) : remaining;
}

/**
 * Runs combat damage as a state machine:
 * FirstStrikeDamage -> Cleanup1 -> RegularDamage -> Cleanup2 -> Done.
 * Assignments within a damage step are all computed before any is dealt.
 */
export class CombatResolver {
  private current: CombatDamageStage = CombatDamageStage.FIRST_STRIKE_DAMAGE;
  private readonly log: string[] = [];

  constructor(
    private readonly state: GameState,
    private readonly checker: StateBasedActionChecker
  ) {}

  get stage(): CombatDamageStage {
    return this.current;
  }

  /** Perform the current stage and move to the next one */
  step(): CombatDamageStage {
    switch (this.current) {
      case CombatDamageStage.FIRST_STRIKE_DAMAGE:
        this.dealDamage(p => hasKeyword(p, 'first strike') || hasKeyword(p, 'double strike'));
        this.current = CombatDamageStage.CLEANUP_1;
        break;
      case CombatDamageStage.CLEANUP_1:
        this.cleanup();
        this.current = CombatDamageStage.REGULAR_DAMAGE;
        break;
      case CombatDamageStage.REGULAR_DAMAGE:
        this.dealDamage(p => !hasKeyword(p, 'first strike') || hasKeyword(p, 'double strike'));
        this.current = CombatDamageStage.CLEANUP_2;
        break;
      case CombatDamageStage.CLEANUP_2:
        this.cleanup();
        this.current = CombatDamageStage.DONE;
        break;
      case CombatDamageStage.DONE:
        break;
    }
    return this.current;
  }

  /** Run every remaining stage. Returns the combat log. */
  run(): readonly string[] {
    while (this.current !== CombatDamageStage.DONE) {
      this.step();
    }
    return this.log;
  }

  private cleanup(): StateBasedActionResult {
    const result = this.checker.check();
    this.log.push(...result.log);
    return result;
  }

  private attackers(): Permanent[] {
    const result: Permanent[] = [];
    for (const permanent of this.state.permanents.values()) {
      if (permanent.attacking !== null) result.push(permanent);
    }
    return result;
  }

  private assignAttackerDamage(attacker: Permanent, defender: PlayerID): DamageAssignment[] {
    const source = damageSourceFromPermanent(attacker);
    let remaining = getPower(attacker);
    if (remaining <= 0) return [];

    const blockers = attacker.blockedBy
      .map(id => getPermanent(this.state, id))
      .filter((p): p is Permanent => p !== undefined);
    const wasBlocked = attacker.blockedBy.length > 0;
    const trample = hasKeyword(attacker, 'trample');

    if (!wasBlocked) {
      return [{ source, recipient: { kind: 'player', id: defender }, amount: remaining }];
    }

    const assignments: DamageAssignment[] = [];
    if (blockers.length === 0) {
      // Rule 509.1h - stays blocked; only trample gets damage through
      return trample ? [{ source, recipient: { kind: 'player', id: defender }, amount: remaining }] : [];
    }

    for (let i = 0; i < blockers.length && remaining > 0; i++) {
      const blocker = blockers[i];
      const isLast = i === blockers.length - 1;
      const lethal = lethalDamageFor(blocker, source.hasDeathtouch);
      const amount = isLast && !trample ? remaining : Math.min(remaining, lethal);
      if (amount > 0) {
        assignments.push({ source, recipient: { kind: 'permanent', id: blocker.id }, amount });
        remaining -= amount;
      }
    }
    if (remaining > 0 && trample) {
      assignments.push({ source, recipient: { kind: 'player', id: defender }, amount: remaining });
    }
    return assignments;
  }

  private dealDamage(participates: (p: Permanent) => boolean): void {
    const assignments: DamageAssignment[] = [];

    for (const attacker of this.attackers()) {
      if (attacker.attacking === null || !participates(attacker)) continue;
      assignments.push(...this.assignAttackerDamage(attacker, attacker.attacking));
    }

    for (const blocker of this.state.permanents.values()) {
      if (blocker.blocking === null || !participates(blocker)) continue;
      const attacker = getPermanent(this.state, blocker.blocking);
      const power = getPower(blocker);
      if (!attacker || power <= 0) continue;
      assignments.push({
        source: damageSourceFromPermanent(blocker),
        recipient: { kind: 'permanent', id: attacker.id },
        amount: power,
      });
    }

    // Rule 510.2 - all combat damage is dealt simultaneously
    const dealtBySource = new Map<DamageSource, number>();
    for (const assignment of assignments) {
      let dealt = 0;
      if (assignment.recipient.kind === 'player') {
        dealt = markDamageOnPlayer(this.state, assignment.source, assignment.recipient.id, assignment.amount);
      } else {
        const recipient = getPermanent(this.state, assignment.recipient.id);
        if (recipient) {
          dealt = markDamageOnPermanent(this.state, assignment.source, recipient, assignment.amount);
        }
      }
      if (dealt > 0) {
        this.log.push(`${assignment.source.sourceName} deals ${dealt} combat damage`);
      }
      dealtBySource.set(assignment.source, (dealtBySource.get(assignment.source) ?? 0) + dealt);
    }

    for (const [source, dealt] of dealtBySource) {
      applyLifelink(this.state, source, dealt);
    }
  }
}
