// shared/src/types.ts
// Canonical shared types used by the rules engine and the simulator.

export type GameID = string;
export type PlayerID = string;
export type PermanentID = string;
export type StackItemID = string;
export type CardInstanceID = string;

/* ------------------------------------------------------------------ */
/* Mana                                                                */
/* ------------------------------------------------------------------ */

/**
 * Mana categories. The five colors, colorless ({C}) and generic/any are
 * three distinct groups: colorless mana is not "any" mana.
 */
export type ManaColor = 'W' | 'U' | 'B' | 'R' | 'G';
export type ManaCategory = ManaColor | 'C' | 'generic';

export const MANA_COLORS: readonly ManaColor[] = ['W', 'U', 'B', 'R', 'G'];
export const MANA_CATEGORIES: readonly ManaCategory[] = ['W', 'U', 'B', 'R', 'G', 'C', 'generic'];

/** Unspent mana, keyed by category. Counts are never negative. */
export type ManaPool = Readonly<Record<ManaCategory, number>>;

/**
 * A mana requirement. Colors and 'C' must be paid by that exact category;
 * 'generic' may be paid by anything left over.
 */
export type ManaCost = Readonly<Record<ManaCategory, number>>;

/** What a mana ability can produce: a fixed category, or a color of the controller's choosing. */
export type ManaProduction = ManaColor | 'C' | 'any';

/* ------------------------------------------------------------------ */
/* Cards                                                               */
/* ------------------------------------------------------------------ */

/** Card data as served by the card database (Scryfall field names). */
export interface CardData {
  readonly name: string;
  readonly mana_cost?: string;
  readonly cmc?: number;
  readonly type_line: string;
  readonly oracle_text?: string;
  readonly keywords?: readonly string[];
  readonly colors?: readonly string[];
  readonly power?: string;
  readonly toughness?: string;
  readonly loyalty?: string;
}

/** A card instance inside a game, with the parser's structured reading of its text. */
export interface GameCard {
  readonly id: CardInstanceID;
  readonly data: CardData;
  readonly abilities: readonly Ability[];
  /** Effects an instant or sorcery has when it resolves */
  readonly spellEffects: readonly Effect[];
}

export type PermanentKind = 'creature' | 'land' | 'artifact' | 'enchantment' | 'planeswalker';

export const PERMANENT_KINDS: readonly PermanentKind[] = [
  'creature',
  'land',
  'artifact',
  'enchantment',
  'planeswalker',
];

/* ------------------------------------------------------------------ */
/* Keywords                                                            */
/* ------------------------------------------------------------------ */

export type Keyword =
  | 'flying'
  | 'reach'
  | 'haste'
  | 'vigilance'
  | 'trample'
  | 'lifelink'
  | 'deathtouch'
  | 'first strike'
  | 'double strike'
  | 'indestructible'
  | 'menace'
  | 'intimidate'
  | 'fear'
  | 'shadow'
  | 'horsemanship'
  | 'defender'
  | 'flash'
  | 'unblockable';

export const KEYWORDS: readonly Keyword[] = [
  'flying',
  'reach',
  'haste',
  'vigilance',
  'trample',
  'lifelink',
  'deathtouch',
  'first strike',
  'double strike',
  'indestructible',
  'menace',
  'intimidate',
  'fear',
  'shadow',
  'horsemanship',
  'defender',
  'flash',
  'unblockable',
];

/** Qualities a "protection from" ability can name */
export type ProtectionQuality = ManaColor | 'artifacts';

/* ------------------------------------------------------------------ */
/* Effects and abilities                                               */
/* ------------------------------------------------------------------ */

export type EffectDuration = 'instant' | 'untilEndOfTurn' | 'permanent';

/** What a chosen target may be */
export type TargetRequirement = 'any' | 'creature' | 'player' | 'permanent' | 'spell';

/** Who or what an effect applies to */
export type EffectTarget =
  | { readonly kind: 'self' }
  | { readonly kind: 'controller' }
  | { readonly kind: 'eachOpponent' }
  | { readonly kind: 'chosen'; readonly index: number; readonly requirement: TargetRequirement };

export type Effect =
  | { readonly kind: 'dealDamage'; readonly amount: number; readonly target: EffectTarget }
  | { readonly kind: 'gainLife'; readonly amount: number; readonly target: EffectTarget }
  | { readonly kind: 'loseLife'; readonly amount: number; readonly target: EffectTarget }
  | { readonly kind: 'drawCards'; readonly amount: number; readonly target: EffectTarget }
  | { readonly kind: 'addMana'; readonly mana: ManaCategory; readonly amount: number }
  | {
      readonly kind: 'modifyStats';
      readonly power: number;
      readonly toughness: number;
      readonly duration: EffectDuration;
      readonly target: EffectTarget;
    }
  | {
      readonly kind: 'grantKeyword';
      readonly keyword: Keyword;
      readonly duration: EffectDuration;
      readonly target: EffectTarget;
    }
  | { readonly kind: 'destroy'; readonly target: EffectTarget }
  | { readonly kind: 'counterSpell'; readonly target: EffectTarget }
  | { readonly kind: 'tapPermanent'; readonly target: EffectTarget }
  | { readonly kind: 'untapPermanent'; readonly target: EffectTarget }
  | { readonly kind: 'returnToHand'; readonly target: EffectTarget };

export type EffectKind = Effect['kind'];

/**
 * Timing restriction of an activated ability.
 * - anyTime: no priority needed (mana abilities)
 * - instant: whenever the controller holds priority
 * - sorcery: controller's main phase, with priority, on an empty stack
 */
export type AbilityTiming = 'anyTime' | 'instant' | 'sorcery';

export interface AbilityCost {
  readonly tap: boolean;
  readonly mana: ManaCost;
}

export type TriggerCondition = 'entersBattlefield' | 'dies' | 'beginningOfUpkeep';

export interface ActivatedAbility {
  readonly kind: 'activated';
  readonly id: string;
  readonly name: string;
  readonly cost: AbilityCost;
  readonly timing: AbilityTiming;
  readonly effects: readonly Effect[];
}

export interface TriggeredAbility {
  readonly kind: 'triggered';
  readonly id: string;
  readonly name: string;
  readonly trigger: TriggerCondition;
  readonly effects: readonly Effect[];
}

export interface StaticAbility {
  readonly kind: 'static';
  readonly id: string;
  readonly name: string;
  readonly keywords: readonly Keyword[];
  readonly protections: readonly ProtectionQuality[];
}

export interface ManaAbility {
  readonly kind: 'mana';
  readonly id: string;
  readonly name: string;
  readonly cost: AbilityCost;
  readonly produces: readonly ManaProduction[];
  readonly amount: number;
}

export type Ability = ActivatedAbility | TriggeredAbility | StaticAbility | ManaAbility;

/* ------------------------------------------------------------------ */
/* Battlefield                                                         */
/* ------------------------------------------------------------------ */

export interface StatModifier {
  readonly power: number;
  readonly toughness: number;
  readonly duration: EffectDuration;
}

export interface KeywordGrant {
  readonly keyword: Keyword;
  readonly duration: EffectDuration;
}

export interface Permanent {
  readonly id: PermanentID;
  readonly owner: PlayerID;
  readonly kind: PermanentKind;
  readonly card: GameCard;
  basePower: number;
  baseToughness: number;
  modifiers: StatModifier[];
  grantedKeywords: KeywordGrant[];
  damage: number;
  /** Set when any damage marked this turn came from a deathtouch source */
  deathtouchDamage: boolean;
  tapped: boolean;
  summoningSick: boolean;
  manaProducer: boolean;
  manaTypes: ManaProduction[];
  attacking: PlayerID | null;
  blocking: PermanentID | null;
  blockedBy: PermanentID[];
  goaded: boolean;
}

export type Battlefield = Record<PermanentKind, Set<PermanentID>>;

export interface Player {
  readonly id: PlayerID;
  readonly name: string;
  life: number;
  library: GameCard[];
  hand: GameCard[];
  graveyard: GameCard[];
  exile: GameCard[];
  battlefield: Battlefield;
  manaPool: ManaPool;
  opponents: PlayerID[];
  landsPlayedThisTurn: number;
  drewFromEmptyLibrary: boolean;
  hasLost: boolean;
}

/* ------------------------------------------------------------------ */
/* Stack                                                               */
/* ------------------------------------------------------------------ */

export type Target =
  | { readonly kind: 'player'; readonly id: PlayerID }
  | { readonly kind: 'permanent'; readonly id: PermanentID }
  | { readonly kind: 'stackItem'; readonly id: StackItemID };

interface StackItemBase {
  readonly id: StackItemID;
  readonly controller: PlayerID;
  readonly targets: readonly Target[];
  readonly timestamp: number;
  countered: boolean;
}

export interface SpellStackItem extends StackItemBase {
  readonly kind: 'spell';
  readonly card: GameCard;
}

export interface AbilityStackItem extends StackItemBase {
  readonly kind: 'ability';
  readonly ability: ActivatedAbility | TriggeredAbility;
  readonly sourceId: PermanentID;
  readonly sourceName: string;
  /** Card of the source, kept for protection checks after the source is gone */
  readonly sourceCard: GameCard;
}

export type StackItem = SpellStackItem | AbilityStackItem;

/* ------------------------------------------------------------------ */
/* Turn structure                                                      */
/* ------------------------------------------------------------------ */

export enum GameStep {
  UNTAP = 'untap',
  UPKEEP = 'upkeep',
  DRAW = 'draw',
  MAIN1 = 'main1',
  DECLARE_ATTACKERS = 'declareAttackers',
  DECLARE_BLOCKERS = 'declareBlockers',
  COMBAT_DAMAGE = 'combatDamage',
  END_COMBAT = 'endCombat',
  MAIN2 = 'main2',
  END = 'end',
  CLEANUP = 'cleanup',
}

export const TURN_STEPS: readonly GameStep[] = [
  GameStep.UNTAP,
  GameStep.UPKEEP,
  GameStep.DRAW,
  GameStep.MAIN1,
  GameStep.DECLARE_ATTACKERS,
  GameStep.DECLARE_BLOCKERS,
  GameStep.COMBAT_DAMAGE,
  GameStep.END_COMBAT,
  GameStep.MAIN2,
  GameStep.END,
  GameStep.CLEANUP,
];

/* ------------------------------------------------------------------ */
/* Collaborators                                                       */
/* ------------------------------------------------------------------ */

export interface CardDatabase {
  getCardByName(name: string): CardData | undefined;
  size(): number;
}

export interface ImportedDeck {
  readonly name: string;
  readonly cards: readonly CardData[];
  readonly sideboard: readonly CardData[];
  readonly missing: readonly string[];
}

export interface DeckImporter {
  importDeck(source: string): ImportedDeck;
}

export interface ParsedCardText {
  readonly abilities: readonly Ability[];
  readonly spellEffects: readonly Effect[];
}

export interface AbilityParser {
  parse(card: CardData): ParsedCardText;
}

/* ------------------------------------------------------------------ */
/* Results                                                             */
/* ------------------------------------------------------------------ */

export type GameEndReason =
  | 'lifeTotal'
  | 'emptyLibrary'
  | 'simultaneousLoss'
  | 'turnLimit'
  | 'notEnoughPlayers';

export type GameResult =
  | {
      readonly outcome: 'win';
      readonly winner: PlayerID;
      readonly loser: PlayerID;
      readonly winnerName: string;
      readonly loserName: string;
      readonly turns: number;
      readonly reason: GameEndReason;
    }
  | {
      readonly outcome: 'noResult';
      readonly turns: number;
      readonly reason: GameEndReason;
    };
