import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config';

describe('loadConfig', () => {
  it('should fall back to defaults', () => {
    expect(loadConfig({})).toEqual({
      games: 1,
      deckDir: 'decks/1v1',
      cardDbPath: 'cardDB.json',
      maxTurns: 100,
      seed: undefined,
      resultsDbPath: undefined,
      startingLife: 20,
      handSize: 7,
      pairing: 'random',
      gamesPerMatchup: 10,
    });
  });

  it('should read the environment', () => {
    const config = loadConfig({
      SIM_GAMES: '250',
      SIM_DECK_DIR: 'decks/test',
      SIM_CARD_DB: 'cards.json',
      SIM_MAX_TURNS: '40',
      SIM_SEED: '12345',
      SIM_RESULTS_DB: 'data/history.sqlite',
      SIM_PAIRING: 'allPairs',
      SIM_MATCHUP_GAMES: '4',
    });

    expect(config).toMatchObject({
      games: 250,
      deckDir: 'decks/test',
      cardDbPath: 'cards.json',
      maxTurns: 40,
      seed: 12345,
      resultsDbPath: 'data/history.sqlite',
      pairing: 'allPairs',
      gamesPerMatchup: 4,
    });
  });

  it('should ignore numbers it cannot read', () => {
    const config = loadConfig({ SIM_GAMES: 'many', SIM_SEED: 'abc' });
    expect(config.games).toBe(1);
    expect(config.seed).toBeUndefined();
  });

  it('should fall back to random pairing for unknown modes', () => {
    expect(loadConfig({ SIM_PAIRING: 'swiss' }).pairing).toBe('random');
  });
});
