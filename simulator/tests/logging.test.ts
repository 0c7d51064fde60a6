import { describe, it, expect, vi, afterEach } from 'vitest';
import { Game, RulesEngineEvent } from '../../rules-engine/src';
import { attachGameLogger, eventLevel } from '../src/logging';
import { OracleAbilityParser } from '../src/services/abilityParser';
import { JsonCardDatabase } from '../src/services/cardDatabase';
import { resetDebugLevel, setDebugLevel } from '../src/utils/debug';

const cardDatabase = JsonCardDatabase.fromCards([{ name: 'Mountain', type_line: 'Basic Land — Mountain' }]);
const mountains = Array.from({ length: 10 }, () => 'Mountain');

function newGame(): Game {
  const game = new Game(cardDatabase, { abilityParser: new OracleAbilityParser(), maxTurns: 1, gameId: 'log-test' });
  game.addPlayer({ name: 'Red A', cards: mountains });
  game.addPlayer({ name: 'Red B', cards: mountains });
  return game;
}

describe('attachGameLogger', () => {
  afterEach(() => {
    resetDebugLevel();
    vi.restoreAllMocks();
  });

  it('should rank game flow events ahead of card detail', () => {
    expect(eventLevel(RulesEngineEvent.TURN_STARTED)).toBe(1);
    expect(eventLevel(RulesEngineEvent.MANA_ADDED)).toBe(2);
  });

  it('should print game flow at level 1', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    setDebugLevel(1);
    const game = newGame();

    attachGameLogger(game);
    game.start();

    expect(log.mock.calls[0]).toEqual(['[log-test] Starting game between Red A and Red B']);
    expect(log).toHaveBeenCalledWith("[log-test] Turn 1: Red A's turn");
  });

  it('should stop printing once detached', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    setDebugLevel(2);
    const game = newGame();

    const detach = attachGameLogger(game);
    detach();
    game.start();

    expect(log).not.toHaveBeenCalled();
  });

  it('should not subscribe when output is off', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    setDebugLevel(0);
    const game = newGame();

    attachGameLogger(game);
    game.start();

    expect(log).not.toHaveBeenCalled();
  });
});
