import { describe, it, expect, beforeEach } from 'vitest';
import type { GameResult } from '../../shared/src';
import { SimulationResults, winPercentage } from '../src/results';

function win(winnerName: string, loserName: string, turns = 8): GameResult {
  return { outcome: 'win', winner: 'p1', loser: 'p2', winnerName, loserName, turns, reason: 'lifeTotal' };
}

describe('SimulationResults', () => {
  let results: SimulationResults;

  beforeEach(() => {
    results = new SimulationResults();
  });

  it('should credit the winner and the loser of each game', () => {
    results.addGame(win('Red', 'Green'), ['Red', 'Green']);
    results.addGame(win('Green', 'Red'), ['Green', 'Red']);
    results.addGame(win('Red', 'Green'), ['Red', 'Green']);

    expect(results.getDeckResult('Red')).toEqual({ name: 'Red', wins: 2, losses: 1, noResults: 0 });
    expect(results.getDeckResult('Green')).toEqual({ name: 'Green', wins: 1, losses: 2, noResults: 0 });
    expect(results.gamesPlayed).toBe(3);
  });

  it('should count a game without a winner for both decks', () => {
    results.addGame({ outcome: 'noResult', turns: 100, reason: 'turnLimit' }, ['Red', 'Blue']);

    expect(results.getDeckResult('Red')?.noResults).toBe(1);
    expect(results.getDeckResult('Blue')?.noResults).toBe(1);
    expect(results.averageTurns).toBe(100);
  });

  it('should sort by win rate', () => {
    results.addGame(win('Blue', 'Red'), ['Blue', 'Red']);
    results.addGame(win('Green', 'Blue'), ['Green', 'Blue']);
    results.addGame(win('Green', 'Red'), ['Green', 'Red']);

    expect(results.sortedByWinRate().map(record => record.name)).toEqual(['Green', 'Blue', 'Red']);
  });

  it('should format one ranking line per decided deck', () => {
    results.addGame(win('Red', 'Green'), ['Red', 'Green']);
    results.addGame(win('Red', 'Green'), ['Red', 'Green']);
    results.addGame(win('Green', 'Red'), ['Green', 'Red']);
    results.addNoResult('Idle');

    expect(results.formatRanking()).toEqual([
      'Deck: Red Wins: 2, Losses: 1, No result: 0, Win Rate: 66.67%',
      'Deck: Green Wins: 1, Losses: 2, No result: 0, Win Rate: 33.33%',
    ]);
  });

  it('should return copies of its records', () => {
    results.addWin('Red');
    const record = results.getDeckResult('Red');
    if (record) record.wins = 50;

    expect(results.getDeckResult('Red')?.wins).toBe(1);
  });

  describe('deck performance', () => {
    beforeEach(() => {
      results.addGame(win('Red', 'Green', 6), ['Red', 'Green'], [14, 0]);
      results.addGame(win('Green', 'Red', 10), ['Red', 'Green'], [-2, 9]);
      results.addGame(win('Red', 'Blue', 8), ['Blue', 'Red'], [0, 5]);
      results.addGame({ outcome: 'noResult', turns: 20, reason: 'turnLimit' }, ['Red', 'Blue']);
    });

    it('should keep head-to-head records and averages per deck', () => {
      const red = results.getDeckPerformance('Red');

      expect(red).toMatchObject({
        name: 'Red',
        games: 4,
        wins: 2,
        losses: 1,
        noResults: 1,
        averageTurns: 11,
        averageWinningLife: 9.5,
        averageLosingLife: -2,
        matchups: [
          { opponent: 'Blue', wins: 1, losses: 0, noResults: 1 },
          { opponent: 'Green', wins: 1, losses: 1, noResults: 0 },
        ],
      });
      expect(red?.winRate).toBeCloseTo(66.667, 2);
    });

    it('should leave an average life unknown without a game to take it from', () => {
      const blue = results.getDeckPerformance('Blue');

      expect(blue?.averageWinningLife).toBeNull();
      expect(blue?.averageLosingLife).toBe(0);
      expect(blue?.averageTurns).toBe(14);
      expect(results.getDeckPerformance('Purple')).toBeUndefined();
    });

    it('should not take final life from games recorded without it', () => {
      results.addGame(win('Blue', 'Green', 4), ['Blue', 'Green']);

      expect(results.getDeckPerformance('Blue')?.averageWinningLife).toBeNull();
      expect(results.getDeckPerformance('Green')?.averageLosingLife).toBe(0);
    });

    it('should rank the top decks and honor the limit', () => {
      expect(results.topDecks().map(deck => deck.name)).toEqual(['Red', 'Green', 'Blue']);
      expect(results.topDecks(2).map(deck => deck.name)).toEqual(['Red', 'Green']);
    });

    it('should format a breakdown per deck', () => {
      expect(results.formatDetails()).toEqual([
        '--- Red ---',
        'Overall: 2-1-1 (66.7% win rate)',
        'Average turns per game: 11.0',
        'Average life when winning: 9.5',
        'Average life when losing: -2.0',
        '  vs Blue: 1-0-1 (100.0%)',
        '  vs Green: 1-1-0 (50.0%)',
        '--- Green ---',
        'Overall: 1-1-0 (50.0% win rate)',
        'Average turns per game: 8.0',
        'Average life when winning: 9.0',
        'Average life when losing: 0.0',
        '  vs Red: 1-1-0 (50.0%)',
        '--- Blue ---',
        'Overall: 0-1-1 (0.0% win rate)',
        'Average turns per game: 14.0',
        'Average life when losing: 0.0',
        '  vs Red: 0-1-1 (0.0%)',
      ]);
    });
  });

  it('should break win rate ties by games played', () => {
    results.addGame(win('A', 'B'), ['A', 'B']);
    results.addGame(win('C', 'D'), ['C', 'D']);
    results.addGame(win('C', 'D'), ['C', 'D']);

    expect(results.topDecks().map(deck => deck.name)).toEqual(['C', 'A', 'D', 'B']);
  });

  it('should start over when cleared', () => {
    results.addGame(win('Red', 'Green'), ['Red', 'Green']);
    results.clear();

    expect(results.gamesPlayed).toBe(0);
    expect(results.sortedByWinRate()).toEqual([]);
  });
});

describe('winPercentage', () => {
  it('should be 0 without decided games', () => {
    expect(winPercentage({ name: 'Idle', wins: 0, losses: 0, noResults: 3 })).toBe(0);
  });

  it('should ignore games without a result', () => {
    expect(winPercentage({ name: 'Red', wins: 1, losses: 3, noResults: 5 })).toBe(25);
  });
});
