// Targeting following rule 115
import type {
  Effect,
  ManaColor,
  StackItemID,
  Target,
  TargetRequirement,
} from '../../shared/src';
import { illegal, LEGAL, type ActionValidation } from './core/types';
import { getPlayer, type GameState, isCreature, isProtectedFrom } from './gameState';

/** What is doing the targeting; protection and self-targeting are judged against it */
export interface TargetingSource {
  readonly colors: readonly ManaColor[];
  readonly isArtifact: boolean;
  /** The stack item doing the targeting, which cannot target itself */
  readonly stackItemId?: StackItemID;
}

/**
 * The target slots an ordered effect list asks for. Slot i is the
 * requirement of the first effect naming chosen target i.
 */
export function targetRequirements(effects: readonly Effect[]): TargetRequirement[] {
  const slots: TargetRequirement[] = [];
  for (const effect of effects) {
    if (!('target' in effect)) continue;
    const target = effect.target;
    if (target.kind === 'chosen' && slots[target.index] === undefined) {
      slots[target.index] = target.requirement;
    }
  }
  // Parser numbers slots densely; fill any hole so lengths line up
  for (let i = 0; i < slots.length; i++) {
    if (slots[i] === undefined) slots[i] = 'any';
  }
  return slots;
}

/**
 * Rule 115.4 / 702.16b - is this object a legal target right now?
 * "Any target" means a player or a creature.
 */
export function isLegalTarget(
  state: GameState,
  target: Target,
  requirement: TargetRequirement,
  source: TargetingSource
): boolean {
  switch (target.kind) {
    case 'player': {
      if (requirement !== 'player' && requirement !== 'any') return false;
      const player = getPlayer(state, target.id);
      return player !== undefined && !player.hasLost;
    }
    case 'permanent': {
      if (requirement === 'player' || requirement === 'spell') return false;
      const permanent = state.permanents.get(target.id);
      if (!permanent) return false;
      if ((requirement === 'creature' || requirement === 'any') && !isCreature(permanent)) {
        return false;
      }
      return !isProtectedFrom(permanent, source.colors, source.isArtifact);
    }
    case 'stackItem': {
      if (requirement !== 'spell') return false;
      if (target.id === source.stackItemId) return false;
      const item = state.stack.find(target.id);
      return item !== undefined && item.kind === 'spell';
    }
  }
}

/**
 * Cast-time validation (rule 601.2c): one target per slot, each legal.
 */
export function validateTargets(
  state: GameState,
  effects: readonly Effect[],
  targets: readonly Target[],
  source: TargetingSource
): ActionValidation {
  const requirements = targetRequirements(effects);
  if (targets.length !== requirements.length) {
    return illegal(
      'TARGET_INVALID',
      `Expected ${requirements.length} target(s), got ${targets.length}`
    );
  }
  for (let i = 0; i < requirements.length; i++) {
    if (!isLegalTarget(state, targets[i], requirements[i], source)) {
      return illegal('TARGET_INVALID', `Target ${i + 1} is not a legal ${requirements[i]} target`);
    }
  }
  return LEGAL;
}

/**
 * Rule 608.2b - a targeted spell or ability whose targets are all illegal on
 * resolution does nothing.
 */
export function allTargetsIllegal(
  state: GameState,
  effects: readonly Effect[],
  targets: readonly Target[],
  source: TargetingSource
): boolean {
  const requirements = targetRequirements(effects);
  if (requirements.length === 0) return false;
  return requirements.every((requirement, i) => {
    const target = targets[i];
    return target === undefined || !isLegalTarget(state, target, requirement, source);
  });
}
