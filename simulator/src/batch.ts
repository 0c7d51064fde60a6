/**
 * Batch simulation: many games between pairs of decks from a directory,
 * either random pairs or every pair in turn, with reproducible deck choice
 * and shuffles.
 */
import type { AbilityParser, CardData, CardDatabase, DeckImporter, ImportedDeck, ParsedCardText } from '../../shared/src';
import { Game } from '../../rules-engine/src';
import type { Pairing } from './config';
import type { MatchHistoryStore } from './db/matchHistory';
import { attachGameLogger } from './logging';
import { SimulationResults } from './results';
import { OracleAbilityParser } from './services/abilityParser';
import { FileDeckImporter, listDeckFiles } from './services/deckImport';
import { debug, debugWarn } from './utils/debug';
import { mulberry32, pickTwoDistinct, type Rng } from './utils/rng';

export const DEFAULT_GAMES_PER_MATCHUP = 10;

export interface BatchOptions {
  /** Games in random pairing; ignored for all pairs */
  readonly games: number;
  /** Defaults to random */
  readonly pairing?: Pairing;
  /** Games each pair of decks plays in all-pairs mode */
  readonly gamesPerMatchup?: number;
  /** Directory scanned for deck files, unless `deckFiles` is given */
  readonly deckDir?: string;
  readonly deckFiles?: readonly string[];
  readonly cardDatabase: CardDatabase;
  readonly abilityParser?: AbilityParser;
  readonly maxTurns?: number;
  readonly startingLife?: number;
  readonly handSize?: number;
  /** Batch seed; taken from the clock when absent */
  readonly seed?: number;
  readonly history?: MatchHistoryStore;
  readonly now?: () => number;
}

export interface BatchSummary {
  readonly seed: number;
  readonly pairing: Pairing;
  readonly results: SimulationResults;
  readonly gamesPlayed: number;
  /** Games not played because a deck could not be loaded */
  readonly skipped: number;
  readonly elapsedMs: number;
  readonly gamesPerSecond: number;
}

/**
 * Parse each card name once for the whole batch
 */
export class CachingAbilityParser implements AbilityParser {
  private readonly cache = new Map<string, ParsedCardText>();

  constructor(private readonly inner: AbilityParser) {}

  parse(card: CardData): ParsedCardText {
    let parsed = this.cache.get(card.name);
    if (!parsed) {
      parsed = this.inner.parse(card);
      this.cache.set(card.name, parsed);
    }
    return parsed;
  }
}

/** Reads each deck file once; missing cards are reported on first read */
class CachingDeckImporter implements DeckImporter {
  private readonly cache = new Map<string, ImportedDeck>();

  constructor(private readonly inner: DeckImporter) {}

  importDeck(source: string): ImportedDeck {
    let deck = this.cache.get(source);
    if (!deck) {
      deck = this.inner.importDeck(source);
      if (deck.missing.length > 0) {
        debugWarn(1, `[batch] ${deck.name}: ${deck.missing.length} unknown card(s): ${deck.missing.join(', ')}`);
      }
      this.cache.set(source, deck);
    }
    return deck;
  }
}

/**
 * Deck index pairs to play, first player first. Random pairing draws two
 * distinct decks per game. All pairs plays every pair `gamesPerMatchup`
 * times, swapping who goes first on every other game.
 */
export function schedulePairings(
  deckCount: number,
  pairing: Pairing,
  counts: { readonly games: number; readonly gamesPerMatchup: number },
  rng: Rng
): Array<[number, number]> {
  const schedule: Array<[number, number]> = [];
  if (pairing === 'allPairs') {
    for (let a = 0; a < deckCount; a++) {
      for (let b = a + 1; b < deckCount; b++) {
        for (let g = 0; g < counts.gamesPerMatchup; g++) {
          schedule.push(g % 2 === 0 ? [a, b] : [b, a]);
        }
      }
    }
    return schedule;
  }
  for (let i = 0; i < counts.games; i++) {
    schedule.push(pickTwoDistinct(rng, deckCount));
  }
  return schedule;
}

export function runBatch(options: BatchOptions): BatchSummary {
  const now = options.now ?? Date.now;
  const seed = (options.seed ?? now()) >>> 0;
  const rng = mulberry32(seed);

  const deckFiles = options.deckFiles ?? (options.deckDir ? listDeckFiles(options.deckDir) : []);
  if (deckFiles.length < 2) {
    throw new Error(`Need at least two deck files, found ${deckFiles.length}`);
  }

  const pairing = options.pairing ?? 'random';
  const schedule = schedulePairings(
    deckFiles.length,
    pairing,
    { games: options.games, gamesPerMatchup: options.gamesPerMatchup ?? DEFAULT_GAMES_PER_MATCHUP },
    rng
  );

  const abilityParser = new CachingAbilityParser(options.abilityParser ?? new OracleAbilityParser());
  const deckImporter = new CachingDeckImporter(new FileDeckImporter(options.cardDatabase));
  const results = new SimulationResults();
  let skipped = 0;

  debug(1, `[batch] ${schedule.length} game(s) over ${deckFiles.length} decks (${pairing}), seed ${seed}`);
  const startedAt = now();

  for (let i = 0; i < schedule.length; i++) {
    const [a, b] = schedule[i];
    const gameId = `game-${i + 1}`;
    const game = new Game(options.cardDatabase, {
      abilityParser,
      deckImporter,
      maxTurns: options.maxTurns,
      startingLife: options.startingLife,
      handSize: options.handSize,
      rng,
      gameId,
    });

    const first = game.addPlayer(deckFiles[a]);
    const second = game.addPlayer(deckFiles[b]);
    if (!first.success) {
      debugWarn(1, `[batch] ${gameId} skipped: ${first.error} ${first.reason}`);
      skipped++;
      continue;
    }
    if (!second.success) {
      debugWarn(1, `[batch] ${gameId} skipped: ${second.error} ${second.reason}`);
      skipped++;
      continue;
    }

    const detach = attachGameLogger(game);
    const result = game.start();
    detach();

    const decks: [string, string] = [first.player.name, second.player.name];
    results.addGame(result, decks, [first.player.life, second.player.life]);
    options.history?.recordGame({ gameId, decks, result, seed });

    debug(
      1,
      result.outcome === 'win'
        ? `[batch] ${gameId}: ${result.winnerName} beat ${result.loserName} on turn ${result.turns} (${result.reason})`
        : `[batch] ${gameId}: no result after ${result.turns} turn(s) (${result.reason})`
    );
  }

  const elapsedMs = now() - startedAt;
  const gamesPlayed = results.gamesPlayed;
  return {
    seed,
    pairing,
    results,
    gamesPlayed,
    skipped,
    elapsedMs,
    gamesPerSecond: elapsedMs > 0 ? (gamesPlayed * 1000) / elapsedMs : gamesPlayed,
  };
}
