/**
 * Simulator configuration
 */
import dotenv from 'dotenv';

dotenv.config();

/** Random deck pairs, or every pair of decks in turn */
export type Pairing = 'random' | 'allPairs';

export interface SimulatorConfig {
  readonly games: number;
  readonly deckDir: string;
  readonly cardDbPath: string;
  readonly maxTurns: number;
  readonly seed?: number;
  /** No persistence when unset */
  readonly resultsDbPath?: string;
  readonly startingLife: number;
  readonly handSize: number;
  readonly pairing: Pairing;
  readonly gamesPerMatchup: number;
}

type Env = Readonly<Record<string, string | undefined>>;

function intOr(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return isNaN(parsed) ? fallback : parsed;
}

export function loadConfig(env: Env = process.env): SimulatorConfig {
  const seed = parseInt(env.SIM_SEED || '', 10);
  return {
    games: intOr(env.SIM_GAMES, 1),
    deckDir: env.SIM_DECK_DIR || 'decks/1v1',
    cardDbPath: env.SIM_CARD_DB || 'cardDB.json',
    maxTurns: intOr(env.SIM_MAX_TURNS, 100),
    seed: isNaN(seed) ? undefined : seed,
    resultsDbPath: env.SIM_RESULTS_DB || undefined,
    startingLife: intOr(env.SIM_STARTING_LIFE, 20),
    handSize: intOr(env.SIM_HAND_SIZE, 7),
    pairing: env.SIM_PAIRING === 'allPairs' ? 'allPairs' : 'random',
    gamesPerMatchup: intOr(env.SIM_MATCHUP_GAMES, 10),
  };
}

export const config = loadConfig();
