/**
 * Turn driver integration tests: full games between two AI players
 */
import { describe, it, expect } from 'vitest';
import type {
  AbilityParser,
  CardData,
  CardDatabase,
  ParsedCardText,
  Permanent,
  PlayerID,
  TriggeredAbility,
} from '../../shared/src';
import { GameStep } from '../../shared/src';
import { AIEngine } from '../src/AIEngine';
import type { BlockAssignment } from '../src/combat';
import { type RulesEvent, RulesEngineEvent } from '../src/core/events';
import { Game, type GameOptions } from '../src/Game';
import { emptyManaPools, type GameState, requirePlayer } from '../src/gameState';
import { createManaPool } from '../src/mana';
import { keywords, setupGame, tapForMana } from './fixtures';

const CARDS: CardData[] = [
  { name: 'Mountain', type_line: 'Basic Land — Mountain' },
  {
    name: 'Raging Goblin',
    mana_cost: '{R}',
    type_line: 'Creature — Goblin Berserker',
    colors: ['R'],
    power: '1',
    toughness: '1',
    oracle_text: 'Haste',
  },
  {
    name: 'Zero Goblin',
    mana_cost: '{0}',
    type_line: 'Creature — Goblin',
    power: '1',
    toughness: '1',
  },
  {
    name: 'Martyr',
    mana_cost: '{0}',
    type_line: 'Creature — Cleric',
    power: '1',
    toughness: '1',
  },
];

const martyrTrigger: TriggeredAbility = {
  kind: 'triggered',
  id: 'martyr-dies',
  name: 'When this dies, you gain 3 life',
  trigger: 'dies',
  effects: [{ kind: 'gainLife', amount: 3, target: { kind: 'controller' } }],
};

const PARSED: Record<string, ParsedCardText> = {
  Mountain: { abilities: [tapForMana('R')], spellEffects: [] },
  'Raging Goblin': { abilities: [keywords('haste')], spellEffects: [] },
  'Zero Goblin': { abilities: [keywords('haste')], spellEffects: [] },
  Martyr: { abilities: [martyrTrigger], spellEffects: [] },
};

const cardDatabase: CardDatabase = {
  getCardByName: name => CARDS.find(card => card.name === name),
  size: () => CARDS.length,
};

const abilityParser: AbilityParser = {
  parse: card => PARSED[card.name] ?? { abilities: [], spellEffects: [] },
};

function seeded(seed: number): () => number {
  let s = seed;
  return () => {
    s = (s * 16807) % 2147483647;
    return (s - 1) / 2147483646;
  };
}

function repeat(name: string, count: number): string[] {
  return Array.from({ length: count }, () => name);
}

/** Only the first player ever attacks */
class OneSidedController extends AIEngine {
  chooseAttackers(state: GameState, playerId: PlayerID, defender: PlayerID): Permanent[] {
    return playerId === 'p1' ? super.chooseAttackers(state, playerId, defender) : [];
  }
}

/** Declares one blocker twice against the same attacker */
class DoubleBlockController extends OneSidedController {
  chooseBlockers(state: GameState, defender: PlayerID): BlockAssignment[] {
    const permanents = [...state.permanents.values()];
    const attacker = permanents.find(p => p.attacking === defender);
    const blocker = permanents.find(p => p.owner === defender && !p.tapped);
    if (!attacker || !blocker) return [];
    const block = { blockerId: blocker.id, attackerId: attacker.id };
    return [block, block];
  }
}

function newGame(options: Partial<GameOptions> = {}): Game {
  return new Game(cardDatabase, { abilityParser, ...options });
}

describe('Game', () => {
  describe('Setup', () => {
    it('should not start with fewer than two players', () => {
      const game = newGame();
      game.addPlayer({ name: 'Red', cards: repeat('Mountain', 10) });

      expect(game.start()).toEqual({ outcome: 'noResult', turns: 0, reason: 'notEnoughPlayers' });
    });

    it('should refuse a third player', () => {
      const game = newGame();
      game.addPlayer({ name: 'A', cards: ['Mountain'] });
      game.addPlayer({ name: 'B', cards: ['Mountain'] });

      expect(game.addPlayer({ name: 'C', cards: ['Mountain'] })).toMatchObject({
        success: false,
        error: 'TOO_MANY_PLAYERS',
      });
    });

    it('should need a deck importer for deck paths', () => {
      const game = newGame();
      expect(game.addPlayer('decks/red.txt')).toMatchObject({ success: false, error: 'NO_DECK_IMPORTER' });
    });

    it('should report a deck the importer cannot read', () => {
      const game = newGame({
        deckImporter: {
          importDeck: source => {
            throw new Error(`ENOENT: ${source}`);
          },
        },
      });

      expect(game.addPlayer('missing.txt')).toEqual({
        success: false,
        error: 'DECK_UNREADABLE',
        reason: 'ENOENT: missing.txt',
      });
    });

    it('should build the library from known cards and list the rest', () => {
      const game = newGame();

      const result = game.addPlayer({ name: 'Red', cards: ['Mountain', 'Unknown Card', 'Raging Goblin'] });

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.missing).toEqual(['Unknown Card']);
      expect(result.player.id).toBe('p1');
      expect(result.player.library.map(card => card.data.name)).toEqual(['Mountain', 'Raging Goblin']);
      expect(result.player.life).toBe(20);
    });

    it('should reject a deck with no playable cards', () => {
      const game = newGame();
      expect(game.addPlayer({ name: 'Nothing', cards: ['Unknown Card'] })).toMatchObject({
        success: false,
        error: 'EMPTY_DECK',
      });
    });

    it('should use the importer for deck paths', () => {
      const game = newGame({
        deckImporter: {
          importDeck: source => ({ name: source, cards: [CARDS[0]], sideboard: [], missing: [] }),
        },
      });

      const result = game.addPlayer('mono-red');

      expect(result).toMatchObject({ success: true, missing: [] });
      expect(game.players[0].name).toBe('mono-red');
    });
  });

  describe('Game loop', () => {
    it('should end when a player draws from an empty library', () => {
      const game = newGame();
      game.addPlayer({ name: 'Red A', cards: repeat('Mountain', 7) });
      game.addPlayer({ name: 'Red B', cards: repeat('Mountain', 7) });

      const result = game.start();

      expect(result).toEqual({
        outcome: 'win',
        winner: 'p1',
        loser: 'p2',
        winnerName: 'Red A',
        loserName: 'Red B',
        turns: 1,
        reason: 'emptyLibrary',
      });
      // The starting player skipped the first draw and played one land
      expect(game.players[0].hand).toHaveLength(6);
      expect(game.players[0].battlefield.land.size).toBe(1);
    });

    it('should call the game at the turn limit', () => {
      const game = newGame({ maxTurns: 3 });
      game.addPlayer({ name: 'Red A', cards: repeat('Mountain', 20) });
      game.addPlayer({ name: 'Red B', cards: repeat('Mountain', 20) });

      expect(game.start()).toEqual({ outcome: 'noResult', turns: 3, reason: 'turnLimit' });
      expect(game.players[0].battlefield.land.size).toBe(3);
      expect(game.players[1].battlefield.land.size).toBe(3);
    });

    it('should play a full game to a winner', () => {
      const game = newGame({ rng: seeded(42) });
      const deck = [...repeat('Mountain', 16), ...repeat('Raging Goblin', 24)];
      game.addPlayer({ name: 'Goblins A', cards: deck });
      game.addPlayer({ name: 'Goblins B', cards: deck });

      const result = game.start();

      expect(result.outcome).toBe('win');
      expect(result.turns).toBeGreaterThan(0);
      expect(result.turns).toBeLessThanOrEqual(100);
    });

    it('should replay identically from the same seed', () => {
      const play = (): { result: ReturnType<Game['start']>; messages: string[] } => {
        const game = newGame({ rng: seeded(7), gameId: 'replay' });
        const messages: string[] = [];
        game.events.onAny(event => messages.push(event.message));
        const deck = [...repeat('Mountain', 16), ...repeat('Raging Goblin', 24)];
        game.addPlayer({ name: 'Goblins A', cards: deck });
        game.addPlayer({ name: 'Goblins B', cards: deck });
        return { result: game.start(), messages };
      };

      const first = play();
      const second = play();

      expect(second.result).toEqual(first.result);
      expect(second.messages).toEqual(first.messages);
    });

    it('should announce the start and end of the game', () => {
      const game = newGame({ maxTurns: 1 });
      const types: RulesEngineEvent[] = [];
      game.events.onAny(event => types.push(event.type));
      game.addPlayer({ name: 'Red A', cards: repeat('Mountain', 10) });
      game.addPlayer({ name: 'Red B', cards: repeat('Mountain', 10) });

      game.start();

      expect(types[0]).toBe(RulesEngineEvent.GAME_STARTED);
      expect(types[types.length - 1]).toBe(RulesEngineEvent.GAME_ENDED);
      expect(types.filter(type => type === RulesEngineEvent.TURN_STARTED)).toHaveLength(2);
    });

    it('should not start twice', () => {
      const game = newGame({ maxTurns: 1 });
      game.addPlayer({ name: 'Red A', cards: repeat('Mountain', 10) });
      game.addPlayer({ name: 'Red B', cards: repeat('Mountain', 10) });
      game.start();

      expect(() => game.start()).toThrow('Game already started');
    });
  });

  describe('Combat steps', () => {
    it('should report a rejected block declaration and let the attack through', () => {
      const game = newGame({ maxTurns: 2, controller: new DoubleBlockController() });
      const rejected: RulesEvent[] = [];
      const blocks: RulesEvent[] = [];
      game.events.on(RulesEngineEvent.COMBAT_DECLARATION_REJECTED, event => rejected.push(event));
      game.events.on(RulesEngineEvent.BLOCKERS_DECLARED, event => blocks.push(event));
      game.addPlayer({ name: 'Goblins A', cards: repeat('Zero Goblin', 20) });
      game.addPlayer({ name: 'Goblins B', cards: repeat('Zero Goblin', 20) });

      game.start();

      expect(rejected).toHaveLength(1);
      expect(rejected[0].message).toBe(
        "Goblins B's block declaration was rejected: Zero Goblin can only block one creature"
      );
      expect(rejected[0].data).toEqual({ playerId: 'p2', declaration: 'block', error: 'ILLEGAL_BLOCK' });
      expect(blocks).toHaveLength(0);
      // 7 unblocked goblins on the first turn, 8 on the second
      expect(game.players[1].life).toBe(5);
    });

    it('should resolve dies triggers from combat damage in the damage step', () => {
      const game = newGame({ maxTurns: 2, controller: new OneSidedController() });
      const steps: GameStep[] = [];
      game.events.on(RulesEngineEvent.LIFE_GAINED, () => steps.push(game.state.step));
      game.addPlayer({ name: 'Goblins', cards: repeat('Zero Goblin', 20) });
      game.addPlayer({ name: 'Martyrs', cards: repeat('Martyr', 20) });

      game.start();

      expect(steps).toHaveLength(8);
      expect(new Set(steps)).toEqual(new Set([GameStep.COMBAT_DAMAGE]));
      expect(game.players[1].life).toBe(20 - 7 + 8 * 3);
    });
  });

  describe('Events', () => {
    it('should announce priority passes', () => {
      const game = newGame({ maxTurns: 1 });
      const passes: RulesEvent[] = [];
      game.events.on(RulesEngineEvent.PRIORITY_PASSED, event => passes.push(event));
      game.addPlayer({ name: 'Red A', cards: repeat('Mountain', 10) });
      game.addPlayer({ name: 'Red B', cards: repeat('Mountain', 10) });

      game.start();

      expect(passes[0].message).toBe('Red A passed priority');
      expect(passes[0].data).toEqual({ playerId: 'p1', to: 'p2' });
    });

    it('should announce unspent mana leaving a pool', () => {
      const { state } = setupGame();
      requirePlayer(state, 'p1').manaPool = createManaPool({ R: 1 });
      const messages: string[] = [];
      const stop = state.events.on(RulesEngineEvent.MANA_POOL_EMPTIED, event => messages.push(event.message));

      emptyManaPools(state);
      stop();
      requirePlayer(state, 'p2').manaPool = createManaPool({ G: 1 });
      emptyManaPools(state);

      expect(messages).toEqual(["Alice's unspent {R} emptied"]);
      expect(requirePlayer(state, 'p2').manaPool).toEqual(createManaPool());
    });
  });
});
