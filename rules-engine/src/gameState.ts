/**
 * gameState.ts
 *
 * Mutable state of one game: players, the permanent arena, the stack and the
 * queue of triggered abilities waiting to be put on the stack. Permanents are
 * stored once, keyed by id; players and combat fields hold ids only.
 */

import type {
  Battlefield,
  CardData,
  GameCard,
  GameID,
  Keyword,
  ManaAbility,
  ManaColor,
  ManaProduction,
  ParsedCardText,
  Permanent,
  PermanentID,
  PermanentKind,
  Player,
  PlayerID,
  ProtectionQuality,
  TriggerCondition,
  TriggeredAbility,
} from '../../shared/src';
import { GameStep, MANA_COLORS, parseStat } from '../../shared/src';
import { EventBus, RulesEngineEvent } from './core/events';
import { createEmptyManaPool, formatMana, totalMana } from './mana';
import { PriorityStack } from './stack';

/** A triggered ability that fired and waits to be put on the stack (rule 603.3) */
export interface PendingTrigger {
  readonly ability: TriggeredAbility;
  readonly controller: PlayerID;
  readonly sourceId: PermanentID;
  readonly sourceCard: GameCard;
}

export type LeaveDestination = 'graveyard' | 'hand' | 'exile';

export class GameState {
  readonly events: EventBus;
  readonly permanents = new Map<PermanentID, Permanent>();
  readonly players: Player[] = [];
  readonly stack = new PriorityStack();
  pendingTriggers: PendingTrigger[] = [];
  turn = 0;
  step: GameStep = GameStep.UNTAP;
  private idCounter = 0;

  constructor(readonly id: GameID = 'game') {
    this.events = new EventBus(id);
  }

  nextId(prefix: string): string {
    this.idCounter++;
    return `${prefix}-${this.idCounter}`;
  }
}

export function createEmptyBattlefield(): Battlefield {
  return {
    creature: new Set(),
    land: new Set(),
    artifact: new Set(),
    enchantment: new Set(),
    planeswalker: new Set(),
  };
}

export function createPlayer(id: PlayerID, name: string, life: number): Player {
  return {
    id,
    name,
    life,
    library: [],
    hand: [],
    graveyard: [],
    exile: [],
    battlefield: createEmptyBattlefield(),
    manaPool: createEmptyManaPool(),
    opponents: [],
    landsPlayedThisTurn: 0,
    drewFromEmptyLibrary: false,
    hasLost: false,
  };
}

export function addPlayerToState(state: GameState, player: Player): void {
  for (const other of state.players) {
    other.opponents.push(player.id);
    player.opponents.push(other.id);
  }
  state.players.push(player);
}

export function getPlayer(state: GameState, id: PlayerID): Player | undefined {
  return state.players.find(p => p.id === id);
}

/** For ids the engine itself produced; an unknown id here is a bug */
export function requirePlayer(state: GameState, id: PlayerID): Player {
  const player = getPlayer(state, id);
  if (!player) {
    throw new Error(`Unknown player ${id}`);
  }
  return player;
}

export function getPermanent(state: GameState, id: PermanentID): Permanent | undefined {
  return state.permanents.get(id);
}

export function makeGameCard(id: string, data: CardData, parsed: ParsedCardText): GameCard {
  return { id, data, abilities: parsed.abilities, spellEffects: parsed.spellEffects };
}

/* ------------------------------------------------------------------ */
/* Card characteristics                                                */
/* ------------------------------------------------------------------ */

/**
 * Which battlefield subset a card lands in. Artifact creatures are creatures.
 * Instants and sorceries have none.
 */
export function permanentKindOf(data: CardData): PermanentKind | null {
  const typeLine = data.type_line.toLowerCase();
  if (typeLine.includes('creature')) return 'creature';
  if (typeLine.includes('land')) return 'land';
  if (typeLine.includes('planeswalker')) return 'planeswalker';
  if (typeLine.includes('artifact')) return 'artifact';
  if (typeLine.includes('enchantment')) return 'enchantment';
  return null;
}

export function isLandCard(data: CardData): boolean {
  return data.type_line.toLowerCase().includes('land');
}

export function isInstantCard(data: CardData): boolean {
  return data.type_line.toLowerCase().includes('instant');
}

export function isArtifactCard(data: CardData): boolean {
  return data.type_line.toLowerCase().includes('artifact');
}

export function colorsOf(card: GameCard): ManaColor[] {
  const colors = card.data.colors ?? [];
  return MANA_COLORS.filter(color => colors.includes(color));
}

export function cardHasKeyword(card: GameCard, keyword: Keyword): boolean {
  return card.abilities.some(a => a.kind === 'static' && a.keywords.includes(keyword));
}

export function manaAbilitiesOf(card: GameCard): ManaAbility[] {
  return card.abilities.filter((a): a is ManaAbility => a.kind === 'mana');
}

/* ------------------------------------------------------------------ */
/* Permanent characteristics                                           */
/* ------------------------------------------------------------------ */

export function hasKeyword(permanent: Permanent, keyword: Keyword): boolean {
  return (
    cardHasKeyword(permanent.card, keyword) ||
    permanent.grantedKeywords.some(grant => grant.keyword === keyword)
  );
}

export function protectionsOf(permanent: Permanent): ProtectionQuality[] {
  const result: ProtectionQuality[] = [];
  for (const ability of permanent.card.abilities) {
    if (ability.kind === 'static') {
      result.push(...ability.protections);
    }
  }
  return result;
}

/**
 * Protection check against a source with the given colors (rule 702.16).
 */
export function isProtectedFrom(
  permanent: Permanent,
  sourceColors: readonly ManaColor[],
  sourceIsArtifact: boolean
): boolean {
  return protectionsOf(permanent).some(quality =>
    quality === 'artifacts' ? sourceIsArtifact : sourceColors.includes(quality)
  );
}

export function getPower(permanent: Permanent): number {
  return permanent.modifiers.reduce((sum, m) => sum + m.power, permanent.basePower);
}

export function getToughness(permanent: Permanent): number {
  return permanent.modifiers.reduce((sum, m) => sum + m.toughness, permanent.baseToughness);
}

export function isArtifact(permanent: Permanent): boolean {
  return isArtifactCard(permanent.card.data);
}

export function isCreature(permanent: Permanent): boolean {
  return permanent.kind === 'creature';
}

export function permanentsControlledBy(state: GameState, playerId: PlayerID): Permanent[] {
  const result: Permanent[] = [];
  for (const permanent of state.permanents.values()) {
    if (permanent.owner === playerId) {
      result.push(permanent);
    }
  }
  return result;
}

export function creaturesControlledBy(state: GameState, playerId: PlayerID): Permanent[] {
  return permanentsControlledBy(state, playerId).filter(isCreature);
}

/* ------------------------------------------------------------------ */
/* Zone changes                                                        */
/* ------------------------------------------------------------------ */

function queueTriggers(state: GameState, permanent: Permanent, trigger: TriggerCondition): void {
  for (const ability of permanent.card.abilities) {
    if (ability.kind === 'triggered' && ability.trigger === trigger) {
      state.pendingTriggers.push({
        ability,
        controller: permanent.owner,
        sourceId: permanent.id,
        sourceCard: permanent.card,
      });
      state.events.emit(
        RulesEngineEvent.TRIGGERED_ABILITY,
        `${permanent.card.data.name} triggers: ${ability.name}`,
        { permanentId: permanent.id, trigger }
      );
    }
  }
}

/**
 * Upkeep triggers of everything the player controls (rule 503.1)
 */
export function queueUpkeepTriggers(state: GameState, playerId: PlayerID): void {
  for (const permanent of permanentsControlledBy(state, playerId)) {
    queueTriggers(state, permanent, 'beginningOfUpkeep');
  }
}

/**
 * Put a card onto the battlefield under its owner's control.
 * Creatures enter with summoning sickness (rule 302.6).
 */
export function createPermanent(state: GameState, card: GameCard, owner: PlayerID): Permanent {
  const kind = permanentKindOf(card.data);
  if (kind === null) {
    throw new Error(`${card.data.name} is not a permanent card`);
  }
  const player = requirePlayer(state, owner);
  const manaTypes: ManaProduction[] = [];
  for (const ability of manaAbilitiesOf(card)) {
    for (const produced of ability.produces) {
      if (!manaTypes.includes(produced)) manaTypes.push(produced);
    }
  }

  const permanent: Permanent = {
    id: state.nextId('perm'),
    owner,
    kind,
    card,
    basePower: parseStat(card.data.power),
    baseToughness: parseStat(card.data.toughness),
    modifiers: [],
    grantedKeywords: [],
    damage: 0,
    deathtouchDamage: false,
    tapped: false,
    summoningSick: kind === 'creature',
    manaProducer: manaTypes.length > 0,
    manaTypes,
    attacking: null,
    blocking: null,
    blockedBy: [],
    goaded: false,
  };

  state.permanents.set(permanent.id, permanent);
  player.battlefield[kind].add(permanent.id);
  queueTriggers(state, permanent, 'entersBattlefield');
  return permanent;
}

export function clearCombatState(permanent: Permanent): void {
  permanent.attacking = null;
  permanent.blocking = null;
  permanent.blockedBy = [];
}

/**
 * Move a permanent from the battlefield to one of its owner's zones.
 */
export function removePermanent(
  state: GameState,
  id: PermanentID,
  destination: LeaveDestination
): Permanent | undefined {
  const permanent = state.permanents.get(id);
  if (!permanent) return undefined;

  const owner = requirePlayer(state, permanent.owner);
  owner.battlefield[permanent.kind].delete(id);
  state.permanents.delete(id);

  // An attacker stays blocked after its blockers leave (rule 509.1h), so
  // blockedBy keeps the id; arena lookups skip it.
  for (const other of state.permanents.values()) {
    if (other.blocking === id) other.blocking = null;
  }
  clearCombatState(permanent);

  owner[destination].push(permanent.card);

  if (destination === 'graveyard' && permanent.kind === 'creature') {
    state.events.emit(RulesEngineEvent.CREATURE_DIED, `${permanent.card.data.name} died`, {
      permanentId: id,
      owner: owner.id,
    });
    queueTriggers(state, permanent, 'dies');
  } else {
    state.events.emit(
      RulesEngineEvent.PERMANENT_LEFT_BATTLEFIELD,
      `${permanent.card.data.name} left the battlefield to ${destination}`,
      { permanentId: id, owner: owner.id, destination }
    );
  }
  return permanent;
}

/**
 * Destroy (rule 701.8). Indestructible permanents are unaffected.
 * Returns whether the permanent left the battlefield.
 */
export function destroyPermanent(state: GameState, id: PermanentID): boolean {
  const permanent = state.permanents.get(id);
  if (!permanent || hasKeyword(permanent, 'indestructible')) {
    return false;
  }
  state.events.emit(RulesEngineEvent.PERMANENT_DESTROYED, `${permanent.card.data.name} was destroyed`, {
    permanentId: id,
  });
  removePermanent(state, id, 'graveyard');
  return true;
}

/** Rule 701.26a - a tapped permanent cannot be tapped again */
export function tapPermanent(state: GameState, permanent: Permanent): boolean {
  if (permanent.tapped) return false;
  permanent.tapped = true;
  state.events.emit(RulesEngineEvent.PERMANENT_TAPPED, `${permanent.card.data.name} tapped`, {
    permanentId: permanent.id,
  });
  return true;
}

export function untapPermanent(state: GameState, permanent: Permanent): boolean {
  if (!permanent.tapped) return false;
  permanent.tapped = false;
  state.events.emit(RulesEngineEvent.PERMANENT_UNTAPPED, `${permanent.card.data.name} untapped`, {
    permanentId: permanent.id,
  });
  return true;
}

/**
 * Draw from the top of the library (index 0). Drawing from an empty library
 * is recorded for the next state-based action check (rule 704.5b).
 */
export function drawCards(state: GameState, playerId: PlayerID, count: number): number {
  const player = requirePlayer(state, playerId);
  let drawn = 0;
  for (let i = 0; i < count; i++) {
    const card = player.library.shift();
    if (!card) {
      player.drewFromEmptyLibrary = true;
      break;
    }
    player.hand.push(card);
    drawn++;
    state.events.emit(RulesEngineEvent.CARD_DRAWN, `${player.name} drew ${card.data.name}`, {
      playerId,
      cardName: card.data.name,
    });
  }
  return drawn;
}

export function gainLife(state: GameState, playerId: PlayerID, amount: number): void {
  if (amount <= 0) return;
  const player = requirePlayer(state, playerId);
  player.life += amount;
  state.events.emit(RulesEngineEvent.LIFE_GAINED, `${player.name} gained ${amount} life (${player.life})`, {
    playerId,
    amount,
    life: player.life,
  });
}

export function loseLife(state: GameState, playerId: PlayerID, amount: number): void {
  if (amount <= 0) return;
  const player = requirePlayer(state, playerId);
  player.life -= amount;
  state.events.emit(RulesEngineEvent.LIFE_LOST, `${player.name} lost ${amount} life (${player.life})`, {
    playerId,
    amount,
    life: player.life,
  });
}

/** Rule 500.4 - unspent mana empties between steps */
export function emptyManaPools(state: GameState): void {
  for (const player of state.players) {
    if (totalMana(player.manaPool) === 0) continue;
    const lost = formatMana(player.manaPool);
    player.manaPool = createEmptyManaPool();
    state.events.emit(RulesEngineEvent.MANA_POOL_EMPTIED, `${player.name}'s unspent ${lost} emptied`, {
      playerId: player.id,
    });
  }
}
