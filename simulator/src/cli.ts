/**
 * cli.ts
 *
 * Runs a batch of games between decks and prints the deck ranking and
 * per-deck matchup details.
 */
import { parseArgs, HELP_TEXT } from './args';
import { runBatch } from './batch';
import { config } from './config';
import { MatchHistoryStore } from './db/matchHistory';
import { JsonCardDatabase } from './services/cardDatabase';
import { setDebugLevel } from './utils/debug';

function main(argv: readonly string[]): number {
  const parsed = parseArgs(argv, config);
  if (parsed.kind === 'help') {
    console.log(HELP_TEXT);
    return 0;
  }
  if (parsed.kind === 'error') {
    console.error(parsed.message);
    console.error('Run with --help for usage.');
    return 2;
  }

  const options = parsed.options;
  if (options.logLevel !== undefined) setDebugLevel(options.logLevel);

  const cardDatabase = JsonCardDatabase.fromFile(options.cardDbPath);
  const history = options.resultsDbPath ? new MatchHistoryStore(options.resultsDbPath) : undefined;

  try {
    const summary = runBatch({
      games: options.games,
      pairing: options.pairing,
      gamesPerMatchup: options.gamesPerMatchup,
      deckDir: options.deckDir,
      cardDatabase,
      maxTurns: options.maxTurns,
      startingLife: options.startingLife,
      handSize: options.handSize,
      seed: options.seed,
      history,
    });

    console.log(`\n${'='.repeat(70)}`);
    console.log(`Simulated ${summary.gamesPlayed} game(s) in ${(summary.elapsedMs / 1000).toFixed(2)}s ` +
      `(${summary.gamesPerSecond.toFixed(2)} games/s), seed ${summary.seed}`);
    if (summary.skipped > 0) {
      console.log(`Skipped ${summary.skipped} game(s) with unreadable decks`);
    }
    console.log(`Average game length: ${summary.results.averageTurns.toFixed(1)} turns`);
    console.log('='.repeat(70));
    for (const line of summary.results.formatRanking()) {
      console.log(line);
    }
    console.log('');
    for (const line of summary.results.formatDetails()) {
      console.log(line);
    }
    const top = summary.results.topDecks(3);
    if (top.length > 0) {
      console.log(`\nTop decks: ${top.map((deck, i) => `${i + 1}. ${deck.name} (${deck.winRate.toFixed(1)}%)`).join(', ')}`);
    }
  } finally {
    history?.close();
  }
  return 0;
}

try {
  process.exitCode = main(process.argv.slice(2));
} catch (err) {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
}
