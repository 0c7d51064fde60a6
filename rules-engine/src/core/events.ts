/**
 * core/events.ts
 *
 * Centralized event definitions for the Rules Engine.
 * All events that can be emitted by the engine are defined here.
 */

/**
 * Engine events that can be observed by logging and simulation layers
 */
export enum RulesEngineEvent {
  // Game flow
  GAME_STARTED = 'gameStarted',
  TURN_STARTED = 'turnStarted',
  STEP_STARTED = 'stepStarted',
  PRIORITY_PASSED = 'priorityPassed',

  // Spell casting
  SPELL_CAST = 'spellCast',
  SPELL_COUNTERED = 'spellCountered',
  SPELL_RESOLVED = 'spellResolved',
  SPELL_FIZZLED = 'spellFizzled',
  LAND_PLAYED = 'landPlayed',

  // Abilities
  ABILITY_ACTIVATED = 'abilityActivated',
  ABILITY_RESOLVED = 'abilityResolved',
  TRIGGERED_ABILITY = 'triggeredAbility',

  // Mana
  MANA_ABILITY_ACTIVATED = 'manaAbilityActivated',
  MANA_ADDED = 'manaAdded',
  MANA_SPENT = 'manaSpent',
  MANA_POOL_EMPTIED = 'manaPoolEmptied',

  // Combat
  ATTACKERS_DECLARED = 'attackersDeclared',
  BLOCKERS_DECLARED = 'blockersDeclared',
  COMBAT_DECLARATION_REJECTED = 'combatDeclarationRejected',
  DAMAGE_DEALT = 'damageDealt',
  COMBAT_ENDED = 'combatEnded',

  // State changes
  STATE_BASED_ACTIONS = 'stateBasedActions',
  PLAYER_LOST = 'playerLost',
  GAME_ENDED = 'gameEnded',

  // Card actions
  CARD_DRAWN = 'cardDrawn',
  CARD_DISCARDED = 'cardDiscarded',
  PERMANENT_DESTROYED = 'permanentDestroyed',
  PERMANENT_LEFT_BATTLEFIELD = 'permanentLeftBattlefield',
  CREATURE_DIED = 'creatureDied',
  PERMANENT_TAPPED = 'permanentTapped',
  PERMANENT_UNTAPPED = 'permanentUntapped',

  // Life changes
  LIFE_GAINED = 'lifeGained',
  LIFE_LOST = 'lifeLost',
}

export type RulesEventValue = string | number | boolean | null;

export interface RulesEvent {
  readonly type: RulesEngineEvent;
  readonly timestamp: number;
  readonly gameId: string;
  /** Human readable summary, one log line */
  readonly message: string;
  readonly data: Readonly<Record<string, RulesEventValue>>;
}

export type RulesEventListener = (event: RulesEvent) => void;

/**
 * Event emitter interface for the rules engine
 */
export interface EventEmitter {
  emit(type: RulesEngineEvent, message: string, data?: Record<string, RulesEventValue>): void;
  on(eventType: RulesEngineEvent, callback: RulesEventListener): () => void;
}

/**
 * Listener registry keyed by event type. One bus per game.
 */
export class EventBus implements EventEmitter {
  private readonly eventListeners = new Map<RulesEngineEvent, Set<RulesEventListener>>();
  private readonly anyListeners = new Set<RulesEventListener>();
  private sequence = 0;

  constructor(private readonly gameId: string) {
    // Initialize event listener map for all event types
    for (const eventType of Object.values(RulesEngineEvent)) {
      this.eventListeners.set(eventType, new Set());
    }
  }

  /**
   * Register an event listener; returns the unsubscribe function
   */
  on(eventType: RulesEngineEvent, callback: RulesEventListener): () => void {
    const listeners = this.eventListeners.get(eventType);
    if (listeners) {
      listeners.add(callback);
    }
    return () => {
      listeners?.delete(callback);
    };
  }

  /** Listen to every event type; returns the unsubscribe function */
  onAny(callback: RulesEventListener): () => void {
    this.anyListeners.add(callback);
    return () => {
      this.anyListeners.delete(callback);
    };
  }

  /**
   * Emit an event to all registered listeners
   */
  emit(type: RulesEngineEvent, message: string, data: Record<string, RulesEventValue> = {}): void {
    const event: RulesEvent = {
      type,
      // sequence number, not wall clock
      timestamp: ++this.sequence,
      gameId: this.gameId,
      message,
      data,
    };
    const listeners = this.eventListeners.get(type);
    if (listeners) {
      listeners.forEach(callback => callback(event));
    }
    this.anyListeners.forEach(callback => callback(event));
  }
}
