// Priority implementation following rule 117
import type { PlayerID } from '../../shared/src';

export type PassResult =
  | { readonly kind: 'rejected'; readonly reason: string }
  | { readonly kind: 'priorityPassed'; readonly to: PlayerID }
  /** All players passed in succession with a non-empty stack (rule 117.4) */
  | { readonly kind: 'resolveTop' }
  /** All players passed with an empty stack; the step ends (rule 500.2) */
  | { readonly kind: 'stepEnded' };

/**
 * Tracks who holds priority and the run of consecutive passes.
 */
export class PriorityManager {
  private readonly playerOrder: PlayerID[];
  private active: PlayerID;
  private current: PlayerID;
  private readonly passed = new Set<PlayerID>();

  constructor(players: readonly PlayerID[], activePlayer: PlayerID) {
    if (!players.includes(activePlayer)) {
      throw new Error(`Active player ${activePlayer} is not in the game`);
    }
    this.playerOrder = [...players];
    this.active = activePlayer;
    this.current = activePlayer;
  }

  get holder(): PlayerID {
    return this.current;
  }

  get activePlayer(): PlayerID {
    return this.active;
  }

  hasPriority(player: PlayerID): boolean {
    return this.current === player;
  }

  /**
   * Pass priority (rule 117.3d). Only the holder may pass.
   */
  passPriority(player: PlayerID, stackEmpty: boolean): PassResult {
    if (player !== this.current) {
      return { kind: 'rejected', reason: `${player} cannot pass priority - doesn't have it` };
    }

    this.passed.add(player);

    if (this.passed.size >= this.playerOrder.length) {
      this.passed.clear();
      this.current = this.active;
      return stackEmpty ? { kind: 'stepEnded' } : { kind: 'resolveTop' };
    }

    const index = this.playerOrder.indexOf(player);
    this.current = this.playerOrder[(index + 1) % this.playerOrder.length];
    return { kind: 'priorityPassed', to: this.current };
  }

  /**
   * A player cast a spell, activated an ability or took a special action:
   * the pass record starts over and that player keeps priority (rule 117.3c).
   */
  playerActed(player: PlayerID): void {
    this.passed.clear();
    this.current = player;
  }

  /**
   * After resolution and at the start of each step the active player
   * receives priority (rule 117.3a, 117.3b).
   */
  resetToActive(): void {
    this.passed.clear();
    this.current = this.active;
  }

  /** Start of a new turn */
  setActivePlayer(player: PlayerID): void {
    if (!this.playerOrder.includes(player)) {
      throw new Error(`Player ${player} is not in the game`);
    }
    this.active = player;
    this.resetToActive();
  }
}
