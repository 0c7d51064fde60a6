import { describe, it, expect } from 'vitest';
import { parseArgs } from '../src/args';
import { loadConfig } from '../src/config';

const base = loadConfig({});

describe('parseArgs', () => {
  it('should keep the config without flags', () => {
    expect(parseArgs([], base)).toEqual({ kind: 'run', options: base });
  });

  it('should override config values with flags', () => {
    const parsed = parseArgs(
      ['--games', '10', '--decks', 'decks/test', '--cards', 'cards.json', '--max-turns', '30', '--seed', '42', '--results-db', 'h.sqlite', '--log-level', '5'],
      base
    );

    expect(parsed).toEqual({
      kind: 'run',
      options: {
        ...base,
        games: 10,
        deckDir: 'decks/test',
        cardDbPath: 'cards.json',
        maxTurns: 30,
        seed: 42,
        resultsDbPath: 'h.sqlite',
        logLevel: 2,
      },
    });
  });

  it('should accept short flags', () => {
    const parsed = parseArgs(['-n', '3', '-s', '9'], base);
    expect(parsed).toMatchObject({ kind: 'run', options: { games: 3, seed: 9 } });
  });

  it('should switch to all pairs with a game count per pair', () => {
    const parsed = parseArgs(['--all-pairs', '--matchup-games', '4', '--seed', '1'], base);
    expect(parsed).toEqual({
      kind: 'run',
      options: { ...base, pairing: 'allPairs', gamesPerMatchup: 4, seed: 1 },
    });
  });

  it('should ask for help', () => {
    expect(parseArgs(['--games', '2', '--help'], base)).toEqual({ kind: 'help' });
  });

  it('should reject unknown flags, missing values and bad numbers', () => {
    expect(parseArgs(['--verbose'], base)).toEqual({ kind: 'error', message: 'Unknown option --verbose' });
    expect(parseArgs(['--matchup-games', '-1'], base)).toEqual({
      kind: 'error',
      message: '--matchup-games expects a non-negative number, got "-1"',
    });
    expect(parseArgs(['--games'], base)).toEqual({ kind: 'error', message: 'Missing value for --games' });
    expect(parseArgs(['--games', 'ten'], base)).toEqual({
      kind: 'error',
      message: '--games expects a non-negative number, got "ten"',
    });
  });
});
