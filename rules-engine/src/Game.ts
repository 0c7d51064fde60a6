/**
 * Game.ts
 *
 * Turn driver for one two-player game. Owns the game state, the priority
 * manager and the spell casting engine, and asks a PlayerController for
 * every decision.
 *
 * Features:
 * - Deck loading through a DeckImporter or a list of card names
 * - Seeded shuffles through an injected RNG
 * - Full turn structure with priority rounds in each step that grants it
 * - Turn budget with a noResult outcome when exceeded
 */

import type {
  AbilityParser,
  CardData,
  CardDatabase,
  DeckImporter,
  GameCard,
  GameEndReason,
  GameResult,
  ImportedDeck,
  ParsedCardText,
  Player,
  PlayerID,
} from '../../shared/src';
import { GameStep, TURN_STEPS } from '../../shared/src';
import { AIEngine, type PlayerController } from './AIEngine';
import { CombatResolver, declareAttackers, declareBlockers, endCombat } from './combat';
import type { RulesErrorCode } from './core/errors';
import { type EventBus, RulesEngineEvent } from './core/events';
import {
  addPlayerToState,
  createPlayer,
  drawCards,
  emptyManaPools,
  GameState,
  makeGameCard,
  permanentsControlledBy,
  queueUpkeepTriggers,
  requirePlayer,
  untapPermanent,
} from './gameState';
import { PriorityManager } from './priority';
import { SpellCastingEngine } from './spellCasting';

export const DEFAULT_MAX_TURNS = 100;
export const DEFAULT_STARTING_LIFE = 20;
export const DEFAULT_HAND_SIZE = 7;

/** Upper bound on actions one player round may take before only passing */
const MAX_ACTIONS_PER_STEP = 100;

export interface GameOptions {
  readonly abilityParser: AbilityParser;
  readonly deckImporter?: DeckImporter;
  /** Full rounds (each player takes a turn) before the game is called */
  readonly maxTurns?: number;
  readonly startingLife?: number;
  readonly handSize?: number;
  /** Uniform [0, 1) source for shuffles */
  readonly rng?: () => number;
  readonly gameId?: string;
  readonly controller?: PlayerController;
}

/** An in-memory deck: card names resolved through the card database */
export interface DeckList {
  readonly name: string;
  readonly cards: readonly string[];
}

export type DeckSource = string | DeckList;

export type AddPlayerError = 'TOO_MANY_PLAYERS' | 'NO_DECK_IMPORTER' | 'DECK_UNREADABLE' | 'EMPTY_DECK';

export type AddPlayerResult =
  | { readonly success: true; readonly player: Player; readonly missing: readonly string[] }
  | { readonly success: false; readonly error: AddPlayerError; readonly reason: string };

export interface TurnContext {
  /** Round number, starting at 1 */
  readonly turn: number;
  readonly activePlayer: PlayerID;
  readonly defendingPlayer: PlayerID;
  /** The first turn of the game skips its draw */
  readonly firstTurn: boolean;
}

interface Session {
  readonly priority: PriorityManager;
  readonly engine: SpellCastingEngine;
}

export class Game {
  readonly state: GameState;
  private readonly controller: PlayerController;
  private readonly rng: () => number;
  private readonly maxTurns: number;
  private readonly startingLife: number;
  private readonly handSize: number;
  private readonly parsedCards = new Map<string, ParsedCardText>();
  private session: Session | null = null;

  constructor(
    private readonly cardDatabase: CardDatabase,
    private readonly options: GameOptions
  ) {
    this.state = new GameState(options.gameId);
    this.controller = options.controller ?? new AIEngine();
    this.rng = options.rng ?? Math.random;
    this.maxTurns = options.maxTurns ?? DEFAULT_MAX_TURNS;
    this.startingLife = options.startingLife ?? DEFAULT_STARTING_LIFE;
    this.handSize = options.handSize ?? DEFAULT_HAND_SIZE;
  }

  get events(): EventBus {
    return this.state.events;
  }

  get players(): readonly Player[] {
    return this.state.players;
  }

  /* ---------------------------------------------------------------- */
  /* Setup                                                             */
  /* ---------------------------------------------------------------- */

  /**
   * Add a player with a deck read through the DeckImporter (string source)
   * or resolved from card names. Unknown names are reported in `missing`.
   */
  addPlayer(source: DeckSource): AddPlayerResult {
    if (this.state.players.length >= 2) {
      return { success: false, error: 'TOO_MANY_PLAYERS', reason: 'A game has exactly two players' };
    }

    let deck: ImportedDeck;
    if (typeof source === 'string') {
      if (!this.options.deckImporter) {
        return { success: false, error: 'NO_DECK_IMPORTER', reason: 'No deck importer configured' };
      }
      try {
        deck = this.options.deckImporter.importDeck(source);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        return { success: false, error: 'DECK_UNREADABLE', reason };
      }
    } else {
      deck = this.resolveDeckList(source);
    }

    if (deck.cards.length === 0) {
      return { success: false, error: 'EMPTY_DECK', reason: `${deck.name} has no playable cards` };
    }

    const player = createPlayer(`p${this.state.players.length + 1}`, deck.name, this.startingLife);
    player.library = deck.cards.map(data => this.makeCard(data));
    addPlayerToState(this.state, player);
    return { success: true, player, missing: deck.missing };
  }

  private resolveDeckList(list: DeckList): ImportedDeck {
    const cards: CardData[] = [];
    const missing: string[] = [];
    for (const name of list.cards) {
      const data = this.cardDatabase.getCardByName(name);
      if (data) {
        cards.push(data);
      } else {
        missing.push(name);
      }
    }
    return { name: list.name, cards, sideboard: [], missing };
  }

  private makeCard(data: CardData): GameCard {
    let parsed = this.parsedCards.get(data.name);
    if (!parsed) {
      parsed = this.options.abilityParser.parse(data);
      this.parsedCards.set(data.name, parsed);
    }
    return makeGameCard(this.state.nextId('card'), data, parsed);
  }

  /**
   * Shuffle an array using Fisher-Yates algorithm with the game's RNG
   */
  private shuffle<T>(array: T[]): void {
    for (let i = array.length - 1; i > 0; i--) {
      const j = Math.floor(this.rng() * (i + 1));
      [array[i], array[j]] = [array[j], array[i]];
    }
  }

  private requireSession(): Session {
    if (!this.session) {
      throw new Error('Game has not started');
    }
    return this.session;
  }

  /* ---------------------------------------------------------------- */
  /* Game loop                                                         */
  /* ---------------------------------------------------------------- */

  /**
   * Play the game to completion. The first player added takes the first turn.
   */
  start(): GameResult {
    if (this.session) {
      throw new Error('Game already started');
    }
    const players = this.state.players;
    if (players.length < 2) {
      return { outcome: 'noResult', turns: 0, reason: 'notEnoughPlayers' };
    }

    const priority = new PriorityManager(
      players.map(p => p.id),
      players[0].id
    );
    const engine = new SpellCastingEngine(this.state, priority, {
      chooseTriggerTargets: (state, trigger, requirements) =>
        this.controller.chooseTriggerTargets(state, trigger, requirements),
    });
    this.session = { priority, engine };

    this.state.events.emit(
      RulesEngineEvent.GAME_STARTED,
      `Starting game between ${players[0].name} and ${players[1].name}`,
      { players: players.length }
    );
    for (const player of players) {
      this.shuffle(player.library);
      drawCards(this.state, player.id, this.handSize);
    }

    for (let turn = 1; turn <= this.maxTurns; turn++) {
      this.state.turn = turn;
      for (let index = 0; index < players.length; index++) {
        const active = players[index];
        const defending = players[(index + 1) % players.length];
        this.playTurn({
          turn,
          activePlayer: active.id,
          defendingPlayer: defending.id,
          firstTurn: turn === 1 && index === 0,
        });
        const result = this.checkGameOver(turn);
        if (result) return this.finish(result);
      }
    }

    return this.finish({ outcome: 'noResult', turns: this.maxTurns, reason: 'turnLimit' });
  }

  private finish(result: GameResult): GameResult {
    const message =
      result.outcome === 'win'
        ? `${result.winnerName} wins (${result.reason}) after ${result.turns} turns`
        : `No result (${result.reason}) after ${result.turns} turns`;
    this.state.events.emit(RulesEngineEvent.GAME_ENDED, message, {
      outcome: result.outcome,
      reason: result.reason,
      turns: result.turns,
    });
    return result;
  }

  private isOver(): boolean {
    return this.state.players.some(p => p.hasLost);
  }

  private checkGameOver(turn: number): GameResult | null {
    const losers = this.state.players.filter(p => p.hasLost);
    if (losers.length === 0) return null;
    if (losers.length > 1) {
      return { outcome: 'noResult', turns: turn, reason: 'simultaneousLoss' };
    }
    const loser = losers[0];
    const winner = this.state.players.find(p => !p.hasLost);
    if (!winner) return null;
    const reason: GameEndReason =
      loser.life > 0 && loser.drewFromEmptyLibrary ? 'emptyLibrary' : 'lifeTotal';
    return {
      outcome: 'win',
      winner: winner.id,
      loser: loser.id,
      winnerName: winner.name,
      loserName: loser.name,
      turns: turn,
      reason,
    };
  }

  /**
   * One player's turn: every step in order until someone loses.
   */
  playTurn(ctx: TurnContext): void {
    const { priority } = this.requireSession();
    priority.setActivePlayer(ctx.activePlayer);
    const active = requirePlayer(this.state, ctx.activePlayer);
    active.landsPlayedThisTurn = 0;
    this.state.events.emit(RulesEngineEvent.TURN_STARTED, `Turn ${ctx.turn}: ${active.name}'s turn`, {
      turn: ctx.turn,
      playerId: ctx.activePlayer,
      life: active.life,
    });

    for (const step of TURN_STEPS) {
      this.playStep(step, ctx);
      if (this.isOver()) return;
    }
  }

  /**
   * Perform one step's turn-based actions, then its priority round where the
   * step has one. Mana pools empty when the step ends.
   */
  playStep(step: GameStep, ctx: TurnContext): void {
    const { engine } = this.requireSession();
    this.state.step = step;
    this.state.events.emit(RulesEngineEvent.STEP_STARTED, `Step: ${step}`, { step, turn: ctx.turn });

    switch (step) {
      case GameStep.UNTAP:
        // Rule 502.3 - no player receives priority
        for (const permanent of permanentsControlledBy(this.state, ctx.activePlayer)) {
          untapPermanent(this.state, permanent);
          permanent.summoningSick = false;
        }
        break;

      case GameStep.UPKEEP:
        queueUpkeepTriggers(this.state, ctx.activePlayer);
        this.runPriorityRound();
        break;

      case GameStep.DRAW:
        // Rule 103.8a - the starting player skips the first draw
        if (!ctx.firstTurn) {
          drawCards(this.state, ctx.activePlayer, 1);
          engine.stateBasedActions.check();
        }
        this.runPriorityRound();
        break;

      case GameStep.MAIN1:
      case GameStep.MAIN2:
      case GameStep.END:
        this.runPriorityRound();
        break;

      case GameStep.DECLARE_ATTACKERS: {
        const attackers = this.controller.chooseAttackers(this.state, ctx.activePlayer, ctx.defendingPlayer);
        if (attackers.length > 0) {
          const result = declareAttackers(
            this.state,
            ctx.activePlayer,
            attackers.map(p => p.id),
            ctx.defendingPlayer
          );
          if (result.success) {
            this.runPriorityRound();
          } else {
            // Rejected as a whole: the turn goes on without an attack
            this.reportRejected(ctx.activePlayer, 'attack', result.error, result.reason);
          }
        }
        break;
      }

      case GameStep.DECLARE_BLOCKERS:
        if (this.hasAttackers()) {
          const blocks = this.controller.chooseBlockers(this.state, ctx.defendingPlayer);
          const result = declareBlockers(this.state, ctx.defendingPlayer, blocks);
          if (!result.success) {
            this.reportRejected(ctx.defendingPlayer, 'block', result.error, result.reason);
          }
          this.runPriorityRound();
        }
        break;

      case GameStep.COMBAT_DAMAGE:
        if (this.hasAttackers()) {
          new CombatResolver(this.state, engine.stateBasedActions).run();
          // Dies triggers from combat damage go on the stack in this step
          this.runPriorityRound();
        }
        break;

      case GameStep.END_COMBAT:
        if (this.hasAttackers()) endCombat(this.state);
        break;

      case GameStep.CLEANUP:
        this.cleanup(ctx.activePlayer);
        break;
    }

    emptyManaPools(this.state);
  }

  private reportRejected(playerId: PlayerID, declaration: 'attack' | 'block', error: RulesErrorCode, reason: string): void {
    const player = requirePlayer(this.state, playerId);
    this.state.events.emit(
      RulesEngineEvent.COMBAT_DECLARATION_REJECTED,
      `${player.name}'s ${declaration} declaration was rejected: ${reason}`,
      { playerId, declaration, error }
    );
  }

  private hasAttackers(): boolean {
    for (const permanent of this.state.permanents.values()) {
      if (permanent.attacking !== null) return true;
    }
    return false;
  }

  /**
   * Players act in turn until everyone passes in succession with an empty
   * stack. Each all-pass with a non-empty stack resolves the top item.
   */
  private runPriorityRound(): void {
    const { priority, engine } = this.requireSession();
    priority.resetToActive();
    let actions = 0;

    while (!this.isOver()) {
      engine.putTriggersOnStack();
      const holder = priority.holder;

      if (actions < MAX_ACTIONS_PER_STEP) {
        const acted = this.controller.takeAction({ state: this.state, engine, priority, playerId: holder });
        if (acted) {
          actions++;
          continue;
        }
      }

      const pass = priority.passPriority(holder, this.state.stack.isEmpty());
      if (pass.kind === 'priorityPassed') {
        this.state.events.emit(
          RulesEngineEvent.PRIORITY_PASSED,
          `${requirePlayer(this.state, holder).name} passed priority`,
          { playerId: holder, to: pass.to }
        );
      } else if (pass.kind === 'resolveTop') {
        engine.resolveTop();
      } else if (pass.kind === 'stepEnded') {
        break;
      } else if (pass.kind === 'rejected') {
        throw new Error(pass.reason);
      }
    }
  }

  /**
   * Rule 514 - discard to hand size, then remove damage and end
   * "until end of turn" effects.
   */
  private cleanup(activePlayer: PlayerID): void {
    const player = requirePlayer(this.state, activePlayer);
    const excess = player.hand.length - this.handSize;
    if (excess > 0) {
      const discards = this.controller.chooseDiscards(this.state, activePlayer, excess);
      for (const card of discards) {
        const index = player.hand.indexOf(card);
        if (index === -1) continue;
        player.hand.splice(index, 1);
        player.graveyard.push(card);
        this.state.events.emit(RulesEngineEvent.CARD_DISCARDED, `${player.name} discarded ${card.data.name}`, {
          playerId: activePlayer,
          cardName: card.data.name,
        });
      }
    }

    for (const permanent of this.state.permanents.values()) {
      permanent.damage = 0;
      permanent.deathtouchDamage = false;
      permanent.modifiers = permanent.modifiers.filter(m => m.duration === 'permanent');
      permanent.grantedKeywords = permanent.grantedKeywords.filter(g => g.duration === 'permanent');
    }
  }
}
