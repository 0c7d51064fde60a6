/**
 * abilityParser.ts
 *
 * Turns a card's oracle text into the structured abilities and spell effects
 * the rules engine runs.
 *
 * Follows the structural templates of the Comprehensive Rules:
 * 1. Keyword and static abilities (Rule 702, Rule 604)
 * 2. Mana abilities (Rule 605) - "{T}: Add {G}."
 * 3. Activated abilities (Rule 602) - Cost: Effect
 * 4. Triggered abilities (Rule 603) - When/At triggers
 * 5. Spell effects of instants and sorceries (Rule 608.2)
 *
 * Text the parser does not understand is dropped; the card still plays as
 * its type line and printed stats.
 */

import type {
  Ability,
  AbilityCost,
  ActivatedAbility,
  AbilityParser,
  CardData,
  Effect,
  EffectTarget,
  Keyword,
  ManaAbility,
  ManaCategory,
  ManaProduction,
  ParsedCardText,
  ProtectionQuality,
  StaticAbility,
  TargetRequirement,
  TriggerCondition,
  TriggeredAbility,
} from '../../../shared/src';
import { KEYWORDS, parseNumberFromText } from '../../../shared/src';
import { createManaCost, parseManaCost } from '../../../rules-engine/src';
import { debug } from '../utils/debug';

/** Basic land types and the mana they imply (Rule 305.6) */
const BASIC_LAND_MANA: ReadonlyArray<readonly [string, ManaProduction]> = [
  ['plains', 'W'],
  ['island', 'U'],
  ['swamp', 'B'],
  ['mountain', 'R'],
  ['forest', 'G'],
];

const COLOR_WORDS: Readonly<Partial<Record<string, ProtectionQuality>>> = {
  white: 'W',
  blue: 'U',
  black: 'B',
  red: 'R',
  green: 'G',
  artifacts: 'artifacts',
};

const KEYWORD_SET: ReadonlySet<string> = new Set(KEYWORDS);

function isKeyword(word: string): word is Keyword {
  return KEYWORD_SET.has(word);
}

// =============================================================================
// Text preparation
// =============================================================================

/** Remove reminder text in parentheses */
function stripReminderText(line: string): string {
  return line.replace(/\s*\([^)]*\)/g, '').trim();
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Replace the card's own name (and its short name, "Krenko" for
 * "Krenko, Mob Boss") with "this".
 */
function selfReferences(line: string, cardName: string): string {
  const names = [cardName];
  const short = cardName.split(',')[0].trim();
  if (short !== cardName) names.push(short);
  let result = line;
  for (const name of names) {
    result = result.replace(new RegExp(escapeRegExp(name), 'g'), 'this');
  }
  return result;
}

/** Split effect text into sentences, then sentences into "and"-joined clauses */
function splitClauses(text: string): string[] {
  return text
    .split(/\.(?:\s+|$)/)
    .flatMap(sentence =>
      sentence.split(/,?\s+and\s+(?=(?:you|target|each|draw|this|it|destroy|tap|untap|return|counter|add)\b)/i)
    )
    .map(clause => clause.trim().replace(/\.$/, ''))
    .filter(Boolean);
}

function amountOf(text: string): number | null {
  const n = parseNumberFromText(text, NaN);
  return isNaN(n) || n < 0 ? null : n;
}

// =============================================================================
// Effects (Rule 608.2)
// =============================================================================

/** Allocates target slots in reading order across one ability or spell */
class TargetSlots {
  private next = 0;

  chosen(requirement: TargetRequirement): EffectTarget {
    return { kind: 'chosen', index: this.next++, requirement };
  }
}

/** "target creature", "any target", "each opponent", ... */
function parseRecipient(text: string, slots: TargetSlots): EffectTarget | null {
  const t = text.trim().toLowerCase();
  if (t === 'any target' || t === 'target creature or player') {
    return slots.chosen('any');
  }
  if (t === 'target creature' || t === 'target attacking creature' || t === 'target blocking creature') {
    return slots.chosen('creature');
  }
  if (t === 'target player' || t === 'target opponent' || t === 'target player or planeswalker') {
    return slots.chosen('player');
  }
  if (/^target (?:nonland )?permanent$|^target (?:artifact|enchantment|land)$/.test(t)) {
    return slots.chosen('permanent');
  }
  if (t === 'each opponent') return { kind: 'eachOpponent' };
  if (t === 'you') return { kind: 'controller' };
  if (t === 'this' || t === 'it') return { kind: 'self' };
  return null;
}

/** "{R}{R}" -> two R; "{C}" -> one C */
function parseAddedMana(symbols: string): Effect[] {
  const counts = new Map<ManaCategory, number>();
  for (const symbol of symbols.match(/\{[^}]+\}/g) ?? []) {
    const inner = symbol.slice(1, -1).toUpperCase();
    if (inner === 'W' || inner === 'U' || inner === 'B' || inner === 'R' || inner === 'G' || inner === 'C') {
      counts.set(inner, (counts.get(inner) ?? 0) + 1);
    } else {
      return [];
    }
  }
  return Array.from(counts.entries()).map(([mana, amount]): Effect => ({ kind: 'addMana', mana, amount }));
}

type ClauseParser = (match: RegExpMatchArray, slots: TargetSlots) => Effect[] | null;

/**
 * Clause templates, tried in order against one lower-cased clause
 */
const CLAUSE_PATTERNS: ReadonlyArray<readonly [RegExp, ClauseParser]> = [
  [
    /deals (\w+) damage to (.+)$/,
    (m, slots) => {
      const amount = amountOf(m[1]);
      const target = parseRecipient(m[2], slots);
      return amount === null || !target ? null : [{ kind: 'dealDamage', amount, target }];
    },
  ],
  [
    /^counter target (?:\w+ )?(?:or \w+ )?spell$/,
    (_m, slots) => [{ kind: 'counterSpell', target: slots.chosen('spell') }],
  ],
  [
    /^(?:you )?draw (\w+) cards?$/,
    m => {
      const amount = amountOf(m[1]);
      return amount === null ? null : [{ kind: 'drawCards', amount, target: { kind: 'controller' } }];
    },
  ],
  [
    /^(target player|target opponent|each opponent) draws (\w+) cards?$/,
    (m, slots) => {
      const target = parseRecipient(m[1], slots);
      const amount = amountOf(m[2]);
      return amount === null || !target ? null : [{ kind: 'drawCards', amount, target }];
    },
  ],
  [
    /^(?:you )?gain (\w+) life$/,
    m => {
      const amount = amountOf(m[1]);
      return amount === null ? null : [{ kind: 'gainLife', amount, target: { kind: 'controller' } }];
    },
  ],
  [
    /^(target player|target opponent|each opponent|you) loses? (\w+) life$/,
    (m, slots) => {
      const target = parseRecipient(m[1], slots);
      const amount = amountOf(m[2]);
      return amount === null || !target ? null : [{ kind: 'loseLife', amount, target }];
    },
  ],
  [
    /^destroy (target (?:creature|artifact|enchantment|land|permanent|nonland permanent))$/,
    (m, slots) => {
      const target = parseRecipient(m[1], slots);
      return target ? [{ kind: 'destroy', target }] : null;
    },
  ],
  [
    /^(target creature|this) gets ([+-]\d+)\/([+-]\d+) until end of turn$/,
    (m, slots) => {
      const target = parseRecipient(m[1], slots);
      if (!target) return null;
      return [
        {
          kind: 'modifyStats',
          power: parseInt(m[2], 10),
          toughness: parseInt(m[3], 10),
          duration: 'untilEndOfTurn',
          target,
        },
      ];
    },
  ],
  [
    /^(target creature|this) gains ([a-z ]+) until end of turn$/,
    (m, slots) => {
      const keyword = m[2].trim();
      if (!isKeyword(keyword)) return null;
      const target = parseRecipient(m[1], slots);
      return target ? [{ kind: 'grantKeyword', keyword, duration: 'untilEndOfTurn', target }] : null;
    },
  ],
  [
    /^(tap|untap) (target (?:creature|artifact|land|permanent))$/,
    (m, slots) => {
      const target = parseRecipient(m[2], slots);
      if (!target) return null;
      return m[1] === 'tap' ? [{ kind: 'tapPermanent', target }] : [{ kind: 'untapPermanent', target }];
    },
  ],
  [
    /^return (target (?:creature|nonland permanent|permanent)) to its owner's hand$/,
    (m, slots) => {
      const target = parseRecipient(m[1], slots);
      return target ? [{ kind: 'returnToHand', target }] : null;
    },
  ],
  [/^add ((?:\{[^}]+\})+)$/, m => {
    const effects = parseAddedMana(m[1]);
    return effects.length > 0 ? effects : null;
  }],
];

/**
 * Parse effect text into effects. Returns an empty list when any clause is
 * not understood, so a half-read ability never runs.
 */
export function parseEffectText(text: string): Effect[] {
  const slots = new TargetSlots();
  const effects: Effect[] = [];
  for (const clause of splitClauses(text)) {
    const lower = clause.toLowerCase();
    let parsed: Effect[] | null = null;
    for (const [pattern, build] of CLAUSE_PATTERNS) {
      const match = lower.match(pattern);
      if (match) {
        parsed = build(match, slots);
        if (parsed) break;
      }
    }
    if (!parsed) {
      debug(2, `[abilityParser] unsupported clause: "${clause}"`);
      return [];
    }
    effects.push(...parsed);
  }
  return effects;
}

// =============================================================================
// Costs and mana abilities (Rule 602.1, Rule 605)
// =============================================================================

/**
 * "{T}", "{2}{G}, {T}" -> tap flag plus mana. Costs with anything else
 * (sacrifice, discard, life) are not supported.
 */
export function parseAbilityCost(costText: string): AbilityCost | null {
  const parts = costText.split(',').map(part => part.trim()).filter(Boolean);
  let tap = false;
  let manaText = '';
  for (const part of parts) {
    if (/^\{T\}$/i.test(part)) {
      tap = true;
    } else if (/^(?:\{[0-9WUBRGCX/]+\})+$/i.test(part)) {
      manaText += part;
    } else {
      return null;
    }
  }
  if (parts.length === 0) return null;
  return { tap, mana: manaText ? parseManaCost(manaText) : createManaCost() };
}

/**
 * What an "Add ..." mana ability text makes:
 * - "{G}" / "{C}{C}": one fixed category, counted
 * - "{R} or {G}", "{W}, {U}, or {B}": one mana of a listed choice
 * - "one mana of any color": 'any'
 */
export function parseManaProduction(
  text: string
): { produces: ManaProduction[]; amount: number } | null {
  const t = text.trim().replace(/\.$/, '');
  if (/^one mana of any color$/i.test(t)) {
    return { produces: ['any'], amount: 1 };
  }
  const manaOf = (symbol: string): ManaProduction | null => {
    const inner = symbol.slice(1, -1).toUpperCase();
    return inner === 'W' || inner === 'U' || inner === 'B' || inner === 'R' || inner === 'G' || inner === 'C'
      ? inner
      : null;
  };

  if (/\bor\b/i.test(t)) {
    const produces: ManaProduction[] = [];
    for (const option of t.split(/,?\s*\bor\b\s*|,\s*/i).map(o => o.trim()).filter(Boolean)) {
      const mana = /^\{[^}]+\}$/.test(option) ? manaOf(option) : null;
      if (!mana) return null;
      produces.push(mana);
    }
    return produces.length > 0 ? { produces, amount: 1 } : null;
  }

  if (!/^(?:\{[^}]+\})+$/.test(t)) return null;
  const symbols: string[] = t.match(/\{[^}]+\}/g) ?? [];
  const first = symbols.length > 0 ? manaOf(symbols[0]) : null;
  if (!first || symbols.some(symbol => manaOf(symbol) !== first)) return null;
  return { produces: [first], amount: symbols.length };
}

// =============================================================================
// Parser
// =============================================================================

const TRIGGER_PATTERNS: ReadonlyArray<readonly [RegExp, TriggerCondition]> = [
  [/^when(?:ever)? this(?: creature)? enters(?: the battlefield)?,\s*(.+)$/i, 'entersBattlefield'],
  [/^when(?:ever)? this(?: creature)? dies,\s*(.+)$/i, 'dies'],
  [/^at the beginning of your upkeep,\s*(.+)$/i, 'beginningOfUpkeep'],
];

const SORCERY_SPEED = /\s*Activate only as a sorcery\.?$/i;

export class OracleAbilityParser implements AbilityParser {
  parse(card: CardData): ParsedCardText {
    const typeLine = card.type_line.toLowerCase();
    const isSpell = typeLine.includes('instant') || typeLine.includes('sorcery');
    const ids = new AbilityIds(card.name);

    const keywords = new Set<Keyword>();
    const protections = new Set<ProtectionQuality>();
    for (const keyword of card.keywords ?? []) {
      const lower = keyword.toLowerCase();
      if (isKeyword(lower)) keywords.add(lower);
    }

    const abilities: Ability[] = [];
    const spellLines: string[] = [];

    const lines = (card.oracle_text ?? '')
      .split('\n')
      .map(line => selfReferences(stripReminderText(line), card.name))
      .filter(Boolean);

    for (const line of lines) {
      if (this.readStaticLine(line, keywords, protections)) continue;

      if (isSpell) {
        spellLines.push(/\.$/.test(line) ? line : `${line}.`);
        continue;
      }

      const ability = this.parseAbilityLine(line, ids);
      if (ability) {
        abilities.push(ability);
      } else {
        debug(2, `[abilityParser] ${card.name}: unsupported text "${line}"`);
      }
    }

    // One text so target slots number across every sentence of the spell
    const spellEffects = spellLines.length > 0 ? parseEffectText(spellLines.join(' ')) : [];

    const landMana = this.basicLandMana(typeLine, ids);
    if (landMana && !abilities.some(ability => ability.kind === 'mana')) {
      abilities.unshift(landMana);
    }

    if (keywords.size > 0 || protections.size > 0) {
      const names = [...keywords, ...[...protections].map(q => `protection from ${q}`)];
      const staticAbility: StaticAbility = {
        kind: 'static',
        id: ids.next('static'),
        name: names.join(', '),
        keywords: [...keywords],
        protections: [...protections],
      };
      abilities.unshift(staticAbility);
    }

    return { abilities, spellEffects };
  }

  /**
   * Keyword lines ("Flying, haste"), protection and "can't be blocked".
   * Returns true when the whole line was consumed.
   */
  private readStaticLine(line: string, keywords: Set<Keyword>, protections: Set<ProtectionQuality>): boolean {
    const lower = line.toLowerCase().replace(/\.$/, '');

    if (/^this can't be blocked$/.test(lower)) {
      keywords.add('unblockable');
      return true;
    }

    const protection = lower.match(/^protection from (.+)$/);
    if (protection) {
      const qualities = protection[1].split(/\s*(?:,|\band\b)\s*(?:from\s+)?/).map(q => q.trim()).filter(Boolean);
      const parsed: ProtectionQuality[] = [];
      for (const word of qualities) {
        const quality = COLOR_WORDS[word];
        if (!quality) return false;
        parsed.push(quality);
      }
      parsed.forEach(quality => protections.add(quality));
      return true;
    }

    const words = lower.split(/\s*[,;]\s*/);
    if (words.every(isKeyword)) {
      words.forEach(word => keywords.add(word));
      return true;
    }
    return false;
  }

  private parseAbilityLine(line: string, ids: AbilityIds): Ability | null {
    for (const [pattern, trigger] of TRIGGER_PATTERNS) {
      const match = line.match(pattern);
      if (match) {
        const effects = parseEffectText(match[1]);
        if (effects.length === 0) return null;
        const triggered: TriggeredAbility = { kind: 'triggered', id: ids.next('triggered'), name: line, trigger, effects };
        return triggered;
      }
    }

    const activated = line.match(/^([^:]+):\s*(.+)$/);
    if (!activated) return null;
    const cost = parseAbilityCost(activated[1]);
    if (!cost) return null;

    const effectText = activated[2].trim();
    const addMana = effectText.match(/^Add (.+?)\.?$/i);
    if (addMana) {
      const production = parseManaProduction(addMana[1]);
      if (!production) return null;
      const mana: ManaAbility = { kind: 'mana', id: ids.next('mana'), name: line, cost, ...production };
      return mana;
    }

    const sorcery = SORCERY_SPEED.test(effectText);
    const effects = parseEffectText(effectText.replace(SORCERY_SPEED, ''));
    if (effects.length === 0) return null;
    const ability: ActivatedAbility = {
      kind: 'activated',
      id: ids.next('activated'),
      name: line,
      cost,
      timing: sorcery ? 'sorcery' : 'instant',
      effects,
    };
    return ability;
  }

  private basicLandMana(typeLine: string, ids: AbilityIds): ManaAbility | null {
    const produces = BASIC_LAND_MANA.filter(([type]) => new RegExp(`\\b${type}\\b`).test(typeLine)).map(
      ([, mana]) => mana
    );
    if (!typeLine.includes('land') || produces.length === 0) return null;
    return {
      kind: 'mana',
      id: ids.next('mana'),
      name: `{T}: Add ${produces.map(mana => `{${mana}}`).join(' or ')}`,
      cost: { tap: true, mana: createManaCost() },
      produces,
      amount: 1,
    };
  }
}

/** Stable ability ids per card: "Llanowar Elves:mana:0" */
class AbilityIds {
  private counter = 0;

  constructor(private readonly cardName: string) {}

  next(kind: string): string {
    return `${this.cardName}:${kind}:${this.counter++}`;
  }
}
