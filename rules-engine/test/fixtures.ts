/**
 * Builders for cards, permanents and games used across the rules engine tests
 */
import type {
  Ability,
  CardData,
  Effect,
  GameCard,
  Keyword,
  ManaAbility,
  ManaProduction,
  Permanent,
  PlayerID,
  ProtectionQuality,
  StaticAbility,
} from '../../shared/src';
import { GameStep } from '../../shared/src';
import { createPermanent, createPlayer, addPlayerToState, GameState } from '../src/gameState';
import { createManaCost } from '../src/mana';
import { PriorityManager } from '../src/priority';
import { SpellCastingEngine, type SpellCastingOptions } from '../src/spellCasting';
import type { EngineResult } from '../src/core/types';

let cardCounter = 0;

export function makeCard(
  data: CardData,
  abilities: readonly Ability[] = [],
  spellEffects: readonly Effect[] = []
): GameCard {
  cardCounter++;
  return { id: `card-${cardCounter}`, data, abilities, spellEffects };
}

export function keywords(...list: Keyword[]): StaticAbility {
  return { kind: 'static', id: `static-${list.join('-')}`, name: list.join(', '), keywords: list, protections: [] };
}

export function protection(...qualities: ProtectionQuality[]): StaticAbility {
  return {
    kind: 'static',
    id: `protection-${qualities.join('-')}`,
    name: `Protection from ${qualities.join(', ')}`,
    keywords: [],
    protections: qualities,
  };
}

export function tapForMana(produces: ManaProduction): ManaAbility {
  return {
    kind: 'mana',
    id: `mana-${produces}`,
    name: `{T}: Add ${produces}`,
    cost: { tap: true, mana: createManaCost() },
    produces: [produces],
    amount: 1,
  };
}

const BASIC_LANDS: Readonly<Record<string, ManaProduction>> = {
  Plains: 'W',
  Island: 'U',
  Swamp: 'B',
  Mountain: 'R',
  Forest: 'G',
};

export function basicLand(name: string): GameCard {
  const produces = BASIC_LANDS[name] ?? 'C';
  return makeCard({ name, type_line: `Basic Land — ${name}` }, [tapForMana(produces)]);
}

export function creatureCard(
  name: string,
  power: number,
  toughness: number,
  options: { manaCost?: string; colors?: string[]; abilities?: Ability[]; typeLine?: string } = {}
): GameCard {
  return makeCard(
    {
      name,
      mana_cost: options.manaCost ?? '{1}',
      type_line: options.typeLine ?? 'Creature — Test',
      colors: options.colors ?? [],
      power: String(power),
      toughness: String(toughness),
    },
    options.abilities ?? []
  );
}

export function instantCard(
  name: string,
  manaCost: string,
  effects: Effect[],
  options: { colors?: string[]; typeLine?: string; abilities?: Ability[] } = {}
): GameCard {
  return makeCard(
    { name, mana_cost: manaCost, type_line: options.typeLine ?? 'Instant', colors: options.colors ?? [] },
    options.abilities ?? [],
    effects
  );
}

export const shock = (): GameCard =>
  instantCard('Shock', '{R}', [{ kind: 'dealDamage', amount: 2, target: { kind: 'chosen', index: 0, requirement: 'any' } }], {
    colors: ['R'],
  });

export const cancel = (): GameCard =>
  instantCard('Cancel', '{1}{U}{U}', [{ kind: 'counterSpell', target: { kind: 'chosen', index: 0, requirement: 'spell' } }], {
    colors: ['U'],
  });

export interface TestGame {
  readonly state: GameState;
  readonly priority: PriorityManager;
  readonly engine: SpellCastingEngine;
  readonly p1: PlayerID;
  readonly p2: PlayerID;
}

/**
 * Two players at 20 life in p1's first main phase, p1 holding priority
 */
export function setupGame(options: SpellCastingOptions = {}): TestGame {
  const state = new GameState('test-game');
  addPlayerToState(state, createPlayer('p1', 'Alice', 20));
  addPlayerToState(state, createPlayer('p2', 'Bob', 20));
  state.step = GameStep.MAIN1;
  state.turn = 1;
  const priority = new PriorityManager(['p1', 'p2'], 'p1');
  const engine = new SpellCastingEngine(state, priority, options);
  return { state, priority, engine, p1: 'p1', p2: 'p2' };
}

/**
 * Put a card straight onto the battlefield. Creatures are ready to attack
 * unless `summoningSick` is set.
 */
export function battlefield(
  state: GameState,
  card: GameCard,
  owner: PlayerID,
  options: { summoningSick?: boolean } = {}
): Permanent {
  const permanent = createPermanent(state, card, owner);
  permanent.summoningSick = options.summoningSick ?? false;
  return permanent;
}

export function toHand(state: GameState, owner: PlayerID, card: GameCard): GameCard {
  const player = state.players.find(p => p.id === owner);
  if (!player) throw new Error(`Unknown player ${owner}`);
  player.hand.push(card);
  return card;
}

/** Unwrap a successful result, failing the test with the engine's reason otherwise */
export function expectOk<T>(result: EngineResult<T>): T {
  if (!result.success) {
    throw new Error(`Expected success, got ${result.error}: ${result.reason}`);
  }
  return result.value;
}
