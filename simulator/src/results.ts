/**
 * Per-deck win/loss tallies across a batch of games, with head-to-head
 * records and average game length and final life per deck.
 */
import type { GameResult } from '../../shared/src';

export interface DeckRecord {
  readonly name: string;
  wins: number;
  losses: number;
  noResults: number;
}

/** One deck's record against one opponent */
export interface MatchupRecord {
  readonly opponent: string;
  wins: number;
  losses: number;
  noResults: number;
}

export interface DeckPerformance {
  readonly name: string;
  readonly games: number;
  readonly wins: number;
  readonly losses: number;
  readonly noResults: number;
  readonly winRate: number;
  readonly averageTurns: number;
  /** Null until a win with a known final life is recorded */
  readonly averageWinningLife: number | null;
  readonly averageLosingLife: number | null;
  /** Sorted by opponent name */
  readonly matchups: readonly MatchupRecord[];
}

interface LifeTally {
  total: number;
  count: number;
}

interface DeckTally {
  readonly record: DeckRecord;
  turns: number;
  readonly winningLife: LifeTally;
  readonly losingLife: LifeTally;
  readonly matchups: Map<string, MatchupRecord>;
}

/** Wins over decided games, as a percentage. 0 when nothing was decided. */
export function winPercentage(record: DeckRecord | MatchupRecord): number {
  const decided = record.wins + record.losses;
  return decided === 0 ? 0 : (record.wins / decided) * 100;
}

function averageOf(tally: LifeTally): number | null {
  return tally.count === 0 ? null : tally.total / tally.count;
}

export class SimulationResults {
  private readonly tallies = new Map<string, DeckTally>();
  private games = 0;
  private turns = 0;

  private tallyFor(deckName: string): DeckTally {
    let tally = this.tallies.get(deckName);
    if (!tally) {
      tally = {
        record: { name: deckName, wins: 0, losses: 0, noResults: 0 },
        turns: 0,
        winningLife: { total: 0, count: 0 },
        losingLife: { total: 0, count: 0 },
        matchups: new Map(),
      };
      this.tallies.set(deckName, tally);
    }
    return tally;
  }

  private matchupFor(deckName: string, opponent: string): MatchupRecord {
    const matchups = this.tallyFor(deckName).matchups;
    let matchup = matchups.get(opponent);
    if (!matchup) {
      matchup = { opponent, wins: 0, losses: 0, noResults: 0 };
      matchups.set(opponent, matchup);
    }
    return matchup;
  }

  addWin(deckName: string): void {
    this.tallyFor(deckName).record.wins++;
  }

  addLoss(deckName: string): void {
    this.tallyFor(deckName).record.losses++;
  }

  addNoResult(deckName: string): void {
    this.tallyFor(deckName).record.noResults++;
  }

  /**
   * Record one finished game between two named decks. `finalLife` follows
   * the order of `deckNames`.
   */
  addGame(
    result: GameResult,
    deckNames: readonly [string, string],
    finalLife?: readonly [number, number]
  ): void {
    this.games++;
    this.turns += result.turns;
    const [first, second] = deckNames;
    this.tallyFor(first).turns += result.turns;
    this.tallyFor(second).turns += result.turns;

    if (result.outcome !== 'win') {
      this.addNoResult(first);
      this.addNoResult(second);
      this.matchupFor(first, second).noResults++;
      this.matchupFor(second, first).noResults++;
      return;
    }

    this.addWin(result.winnerName);
    this.addLoss(result.loserName);
    this.matchupFor(result.winnerName, result.loserName).wins++;
    this.matchupFor(result.loserName, result.winnerName).losses++;

    if (finalLife) {
      const winnerIndex = first === result.winnerName ? 0 : 1;
      const winning = this.tallyFor(result.winnerName).winningLife;
      winning.total += finalLife[winnerIndex];
      winning.count++;
      const losing = this.tallyFor(result.loserName).losingLife;
      losing.total += finalLife[1 - winnerIndex];
      losing.count++;
    }
  }

  get gamesPlayed(): number {
    return this.games;
  }

  get averageTurns(): number {
    return this.games === 0 ? 0 : this.turns / this.games;
  }

  getDeckResult(deckName: string): DeckRecord | undefined {
    const tally = this.tallies.get(deckName);
    return tally ? { ...tally.record } : undefined;
  }

  /**
   * Copies of every record, best win rate first. Ties keep first-seen order.
   */
  sortedByWinRate(): DeckRecord[] {
    return Array.from(this.tallies.values(), tally => ({ ...tally.record })).sort(
      (a, b) => winPercentage(b) - winPercentage(a)
    );
  }

  getDeckPerformance(deckName: string): DeckPerformance | undefined {
    const tally = this.tallies.get(deckName);
    if (!tally) return undefined;
    const { name, wins, losses, noResults } = tally.record;
    const games = wins + losses + noResults;
    return {
      name,
      games,
      wins,
      losses,
      noResults,
      winRate: winPercentage(tally.record),
      averageTurns: games === 0 ? 0 : tally.turns / games,
      averageWinningLife: averageOf(tally.winningLife),
      averageLosingLife: averageOf(tally.losingLife),
      matchups: Array.from(tally.matchups.values(), matchup => ({ ...matchup })).sort((a, b) =>
        a.opponent.localeCompare(b.opponent)
      ),
    };
  }

  /**
   * Best win rate first, then most games played. A limit of 0 returns all.
   */
  topDecks(limit = 0): DeckPerformance[] {
    const decks: DeckPerformance[] = [];
    for (const name of this.tallies.keys()) {
      const performance = this.getDeckPerformance(name);
      if (performance) decks.push(performance);
    }
    decks.sort((a, b) => b.winRate - a.winRate || b.games - a.games);
    return limit > 0 ? decks.slice(0, limit) : decks;
  }

  /** One line per deck with at least one decided game */
  formatRanking(): string[] {
    return this.sortedByWinRate()
      .filter(record => record.wins + record.losses > 0)
      .map(
        record =>
          `Deck: ${record.name} Wins: ${record.wins}, Losses: ${record.losses}, ` +
          `No result: ${record.noResults}, Win Rate: ${winPercentage(record).toFixed(2)}%`
      );
  }

  /**
   * Per-deck breakdown: overall record, average length, average final life
   * and the head-to-head record against each opponent.
   */
  formatDetails(): string[] {
    const lines: string[] = [];
    for (const deck of this.topDecks()) {
      lines.push(`--- ${deck.name} ---`);
      lines.push(`Overall: ${deck.wins}-${deck.losses}-${deck.noResults} (${deck.winRate.toFixed(1)}% win rate)`);
      lines.push(`Average turns per game: ${deck.averageTurns.toFixed(1)}`);
      if (deck.averageWinningLife !== null) {
        lines.push(`Average life when winning: ${deck.averageWinningLife.toFixed(1)}`);
      }
      if (deck.averageLosingLife !== null) {
        lines.push(`Average life when losing: ${deck.averageLosingLife.toFixed(1)}`);
      }
      for (const matchup of deck.matchups) {
        lines.push(
          `  vs ${matchup.opponent}: ${matchup.wins}-${matchup.losses}-${matchup.noResults} ` +
            `(${winPercentage(matchup).toFixed(1)}%)`
        );
      }
    }
    return lines;
  }

  clear(): void {
    this.tallies.clear();
    this.games = 0;
    this.turns = 0;
  }
}
