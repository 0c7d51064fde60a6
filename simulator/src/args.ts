/**
 * Command-line flags of the simulator. Flags override the loaded config.
 */
import type { SimulatorConfig } from './config';

export interface CliOptions extends SimulatorConfig {
  /** DEBUG_STATE override, 0..2 */
  readonly logLevel?: number;
}

export type ParsedArgs =
  | { readonly kind: 'run'; readonly options: CliOptions }
  | { readonly kind: 'help' }
  | { readonly kind: 'error'; readonly message: string };

const NUMERIC_FLAGS = new Set(['-n', '--games', '--max-turns', '-s', '--seed', '--log-level', '--matchup-games']);
const VALUE_FLAGS = new Set([...NUMERIC_FLAGS, '--decks', '--cards', '--results-db']);

export function parseArgs(argv: readonly string[], base: SimulatorConfig): ParsedArgs {
  let options: CliOptions = { ...base };

  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    if (flag === '-h' || flag === '--help') {
      return { kind: 'help' };
    }
    if (flag === '--all-pairs') {
      options = { ...options, pairing: 'allPairs' };
      continue;
    }

    if (!VALUE_FLAGS.has(flag)) {
      return { kind: 'error', message: `Unknown option ${flag}` };
    }

    const value = argv[i + 1];
    if (value === undefined || value.startsWith('--')) {
      return { kind: 'error', message: `Missing value for ${flag}` };
    }
    i++;

    const n = parseInt(value, 10);
    if (NUMERIC_FLAGS.has(flag) && (isNaN(n) || n < 0)) {
      return { kind: 'error', message: `${flag} expects a non-negative number, got "${value}"` };
    }

    switch (flag) {
      case '-n':
      case '--games':
        options = { ...options, games: n };
        break;
      case '--decks':
        options = { ...options, deckDir: value };
        break;
      case '--cards':
        options = { ...options, cardDbPath: value };
        break;
      case '--max-turns':
        options = { ...options, maxTurns: n };
        break;
      case '-s':
      case '--seed':
        options = { ...options, seed: n };
        break;
      case '--results-db':
        options = { ...options, resultsDbPath: value };
        break;
      case '--matchup-games':
        options = { ...options, gamesPerMatchup: n };
        break;
      case '--log-level':
        options = { ...options, logLevel: Math.min(n, 2) };
        break;
      default:
        return { kind: 'error', message: `Unknown option ${flag}` };
    }
  }

  return { kind: 'run', options };
}

export const HELP_TEXT = `
Deck simulator

Usage: tsx simulator/src/cli.ts [options]

Options:
  -n, --games <n>        Number of games to simulate (SIM_GAMES, default: 1)
  --decks <dir>          Directory of .txt/.dek deck files (SIM_DECK_DIR, default: decks/1v1)
  --cards <file>         Card database JSON (SIM_CARD_DB, default: cardDB.json)
  --max-turns <n>        Turns before a game is called (SIM_MAX_TURNS, default: 100)
  -s, --seed <n>         Random seed for reproducibility (SIM_SEED)
  --all-pairs            Play every pair of decks instead of random pairs (SIM_PAIRING=allPairs)
  --matchup-games <n>    Games per pair with --all-pairs (SIM_MATCHUP_GAMES, default: 10)
  --results-db <file>    SQLite file for match history (SIM_RESULTS_DB)
  --log-level <0-2>      Console detail (DEBUG_STATE)
  -h, --help             Show this help message

Examples:
  tsx simulator/src/cli.ts --games 100 --seed 42
  tsx simulator/src/cli.ts --decks decks/1v1 --results-db data/history.sqlite
  tsx simulator/src/cli.ts --all-pairs --matchup-games 20
`;
