/**
 * Match history database: one row per completed simulated game, plus
 * per-deck aggregates.
 */
import fs from 'node:fs';
import path from 'node:path';
import { randomUUID } from 'node:crypto';
import Database from 'better-sqlite3';
import type { GameEndReason, GameResult } from '../../../shared/src';
import { debug } from '../utils/debug';

type DB = Database.Database;

export interface Match {
  id: string;
  game_id: string;
  ended_at: number;
  seed: number | null;
  deck_a: string;
  deck_b: string;
  winner_deck: string | null;
  loser_deck: string | null;
  outcome: GameResult['outcome'];
  reason: GameEndReason;
  turn_count: number;
}

export interface DeckStats {
  deck_name: string;
  games: number;
  wins: number;
  losses: number;
  no_results: number;
  avg_turns: number;
}

export interface RecordGameInput {
  readonly gameId: string;
  readonly decks: readonly [string, string];
  readonly result: GameResult;
  readonly seed?: number;
}

const SCHEMA = `
CREATE TABLE IF NOT EXISTS matches (
  id TEXT PRIMARY KEY,
  game_id TEXT NOT NULL,
  ended_at INTEGER NOT NULL,
  seed INTEGER,
  deck_a TEXT NOT NULL,
  deck_b TEXT NOT NULL,
  winner_deck TEXT,
  loser_deck TEXT,
  outcome TEXT NOT NULL,
  reason TEXT NOT NULL,
  turn_count INTEGER NOT NULL DEFAULT 0
);
CREATE INDEX IF NOT EXISTS matches_ended_at_idx ON matches(ended_at DESC);
CREATE INDEX IF NOT EXISTS matches_deck_a_idx ON matches(deck_a);
CREATE INDEX IF NOT EXISTS matches_deck_b_idx ON matches(deck_b);
`;

// Each game counts once for each deck that played it
const DECK_STATS_SQL = `
  SELECT
    deck_name,
    COUNT(*) AS games,
    SUM(CASE WHEN winner_deck = deck_name THEN 1 ELSE 0 END) AS wins,
    SUM(CASE WHEN loser_deck = deck_name THEN 1 ELSE 0 END) AS losses,
    SUM(CASE WHEN outcome = 'noResult' THEN 1 ELSE 0 END) AS no_results,
    AVG(turn_count) AS avg_turns
  FROM (
    SELECT deck_a AS deck_name, winner_deck, loser_deck, outcome, turn_count FROM matches
    UNION ALL
    SELECT deck_b AS deck_name, winner_deck, loser_deck, outcome, turn_count FROM matches
  )
`;

export class MatchHistoryStore {
  private readonly db: DB;
  private readonly insertMatchStmt: Database.Statement<[Match]>;
  private readonly getMatchStmt: Database.Statement<[string], Match>;
  private readonly listRecentStmt: Database.Statement<[number], Match>;
  private readonly deckStatsStmt: Database.Statement<[string], DeckStats>;
  private readonly allDeckStatsStmt: Database.Statement<[], DeckStats>;

  /**
   * Open (and create) the database at `dbPath`; ':memory:' keeps it in process.
   */
  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.exec(SCHEMA);

    this.insertMatchStmt = this.db.prepare<[Match]>(`
      INSERT INTO matches (id, game_id, ended_at, seed, deck_a, deck_b, winner_deck, loser_deck, outcome, reason, turn_count)
      VALUES (@id, @game_id, @ended_at, @seed, @deck_a, @deck_b, @winner_deck, @loser_deck, @outcome, @reason, @turn_count)
    `);
    this.getMatchStmt = this.db.prepare<[string], Match>('SELECT * FROM matches WHERE id = ?');
    this.listRecentStmt = this.db.prepare<[number], Match>(
      'SELECT * FROM matches ORDER BY ended_at DESC, rowid DESC LIMIT ?'
    );
    this.deckStatsStmt = this.db.prepare<[string], DeckStats>(`${DECK_STATS_SQL} WHERE deck_name = ? GROUP BY deck_name`);
    this.allDeckStatsStmt = this.db.prepare<[], DeckStats>(
      `${DECK_STATS_SQL} GROUP BY deck_name ORDER BY CAST(wins AS REAL) / MAX(wins + losses, 1) DESC, deck_name`
    );
  }

  /**
   * Record a completed game.
   */
  recordGame(input: RecordGameInput): Match {
    const { result } = input;
    const match: Match = {
      id: `match_${randomUUID()}`,
      game_id: input.gameId,
      ended_at: Date.now(),
      seed: input.seed ?? null,
      deck_a: input.decks[0],
      deck_b: input.decks[1],
      winner_deck: result.outcome === 'win' ? result.winnerName : null,
      loser_deck: result.outcome === 'win' ? result.loserName : null,
      outcome: result.outcome,
      reason: result.reason,
      turn_count: result.turns,
    };
    this.insertMatchStmt.run(match);
    debug(2, `[matchHistory] recorded ${match.id} (${match.deck_a} vs ${match.deck_b})`);
    return match;
  }

  getMatch(id: string): Match | undefined {
    return this.getMatchStmt.get(id);
  }

  listRecentMatches(limit = 20): Match[] {
    return this.listRecentStmt.all(limit);
  }

  getDeckStats(deckName: string): DeckStats | undefined {
    return this.deckStatsStmt.get(deckName);
  }

  /** Every deck seen, best win rate first */
  listDeckStats(): DeckStats[] {
    return this.allDeckStatsStmt.all();
  }

  close(): void {
    this.db.close();
  }
}
