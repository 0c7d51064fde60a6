import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, it, expect, afterEach } from 'vitest';
import { CachingAbilityParser, runBatch, schedulePairings } from '../src/batch';
import { MatchHistoryStore } from '../src/db/matchHistory';
import { OracleAbilityParser } from '../src/services/abilityParser';
import { JsonCardDatabase } from '../src/services/cardDatabase';
import { listDeckFiles } from '../src/services/deckImport';
import { mulberry32 } from '../src/utils/rng';

const FIXTURES = path.join(path.dirname(fileURLToPath(import.meta.url)), 'fixtures');
const DECK_DIR = path.join(FIXTURES, 'decks');
const cardDatabase = JsonCardDatabase.fromFile(path.join(FIXTURES, 'cards.json'));

function clock(stepMs: number): () => number {
  let t = 0;
  return () => (t += stepMs);
}

describe('fixtures', () => {
  it('should load every valid card and the three decks', () => {
    expect(cardDatabase.report).toEqual({ loaded: 6, skipped: 1 });
    expect(listDeckFiles(DECK_DIR).map(file => path.basename(file))).toEqual(['bears.txt', 'goblins.txt', 'mixed.dek']);
  });
});

describe('runBatch', () => {
  let history: MatchHistoryStore | null = null;

  afterEach(() => {
    history?.close();
    history = null;
  });

  it('should play every game and credit both decks', () => {
    const summary = runBatch({ games: 4, deckDir: DECK_DIR, cardDatabase, seed: 42, maxTurns: 30, now: clock(500) });

    expect(summary.seed).toBe(42);
    expect(summary.gamesPlayed).toBe(4);
    expect(summary.skipped).toBe(0);
    expect(summary.elapsedMs).toBe(500);
    expect(summary.gamesPerSecond).toBe(8);

    const records = summary.results.sortedByWinRate();
    const entries = records.reduce((sum, record) => sum + record.wins + record.losses + record.noResults, 0);
    expect(entries).toBe(8);
    for (const record of records) {
      expect(['Goblins', 'bears', 'mixed']).toContain(record.name);
    }
  });

  it('should replay the same batch from the same seed', () => {
    const first = runBatch({ games: 3, deckDir: DECK_DIR, cardDatabase, seed: 7, maxTurns: 30 });
    const second = runBatch({ games: 3, deckDir: DECK_DIR, cardDatabase, seed: 7, maxTurns: 30 });

    expect(second.results.sortedByWinRate()).toEqual(first.results.sortedByWinRate());
    expect(second.results.averageTurns).toBe(first.results.averageTurns);
  });

  it('should record each game in the match history', () => {
    history = new MatchHistoryStore(':memory:');

    runBatch({ games: 3, deckDir: DECK_DIR, cardDatabase, seed: 3, maxTurns: 30, history });

    const matches = history.listRecentMatches(10);
    expect(matches).toHaveLength(3);
    expect(matches.map(match => match.game_id).sort()).toEqual(['game-1', 'game-2', 'game-3']);
    for (const match of matches) {
      expect(match.seed).toBe(3);
      expect(match.deck_a).not.toBe(match.deck_b);
    }
  });

  it('should play every pair of decks the same number of times', () => {
    history = new MatchHistoryStore(':memory:');

    const summary = runBatch({
      games: 1,
      pairing: 'allPairs',
      gamesPerMatchup: 2,
      deckDir: DECK_DIR,
      cardDatabase,
      seed: 5,
      maxTurns: 30,
      history,
    });

    expect(summary.pairing).toBe('allPairs');
    expect(summary.gamesPlayed).toBe(6);
    for (const name of ['Goblins', 'bears', 'mixed']) {
      const deck = summary.results.getDeckPerformance(name);
      expect(deck?.games).toBe(4);
      expect(deck?.matchups.map(matchup => matchup.wins + matchup.losses + matchup.noResults)).toEqual([2, 2]);
    }

    const orders = history.listRecentMatches(10).map(match => `${match.deck_a}>${match.deck_b}`).sort();
    expect(orders).toEqual([
      'Goblins>bears',
      'Goblins>mixed',
      'bears>Goblins',
      'bears>mixed',
      'mixed>Goblins',
      'mixed>bears',
    ]);
  });

  it('should need two decks', () => {
    expect(() =>
      runBatch({ games: 1, deckFiles: [path.join(DECK_DIR, 'bears.txt')], cardDatabase, seed: 1 })
    ).toThrow('Need at least two deck files, found 1');
  });

  it('should skip games whose deck cannot be read', () => {
    const summary = runBatch({
      games: 2,
      deckFiles: [path.join(DECK_DIR, 'missing-a.txt'), path.join(DECK_DIR, 'missing-b.txt')],
      cardDatabase,
      seed: 1,
    });

    expect(summary.gamesPlayed).toBe(0);
    expect(summary.skipped).toBe(2);
  });
});

describe('schedulePairings', () => {
  it('should list every pair, swapping the first player each game', () => {
    const schedule = schedulePairings(3, 'allPairs', { games: 99, gamesPerMatchup: 2 }, mulberry32(1));

    expect(schedule).toEqual([
      [0, 1],
      [1, 0],
      [0, 2],
      [2, 0],
      [1, 2],
      [2, 1],
    ]);
  });

  it('should draw two distinct decks per game in random pairing', () => {
    const schedule = schedulePairings(4, 'random', { games: 25, gamesPerMatchup: 2 }, mulberry32(9));

    expect(schedule).toHaveLength(25);
    for (const [a, b] of schedule) {
      expect(a).not.toBe(b);
      expect(Math.max(a, b)).toBeLessThan(4);
    }
  });
});

describe('CachingAbilityParser', () => {
  it('should parse each card name once', () => {
    let calls = 0;
    const inner = new OracleAbilityParser();
    const parser = new CachingAbilityParser({
      parse: card => {
        calls++;
        return inner.parse(card);
      },
    });
    const card = { name: 'Forest', type_line: 'Basic Land — Forest' };

    const first = parser.parse(card);
    const second = parser.parse(card);

    expect(second).toBe(first);
    expect(calls).toBe(1);
  });
});
