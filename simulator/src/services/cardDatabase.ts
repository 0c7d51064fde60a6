/**
 * simulator/src/services/cardDatabase.ts
 *
 * Card database backed by a Scryfall bulk-data JSON array.
 *
 * Notes:
 * - Entries are validated one by one; an invalid entry is skipped and counted,
 *   it never fails the whole load.
 * - Names are indexed exactly as printed. Double-faced cards are also reachable
 *   by their front face name.
 * - Cards without oracle text at the top level take it from their front face.
 */
import fs from 'node:fs';
import { z } from 'zod';
import type { CardData, CardDatabase } from '../../../shared/src';
import { debug, debugWarn } from '../utils/debug';

const CardFaceSchema = z.object({
  name: z.string().optional(),
  mana_cost: z.string().optional(),
  type_line: z.string().optional(),
  oracle_text: z.string().optional(),
  colors: z.array(z.string()).optional(),
  power: z.string().optional(),
  toughness: z.string().optional(),
  loyalty: z.string().optional(),
});

export const ScryfallCardSchema = z.object({
  name: z.string().min(1),
  mana_cost: z.string().optional(),
  cmc: z.number().nonnegative().optional(),
  type_line: z.string().min(1),
  oracle_text: z.string().optional(),
  keywords: z.array(z.string()).optional(),
  colors: z.array(z.string()).optional(),
  power: z.string().optional(),
  toughness: z.string().optional(),
  loyalty: z.string().optional(),
  card_faces: z.array(CardFaceSchema).optional(),
});

export type ScryfallCard = z.infer<typeof ScryfallCardSchema>;

export interface CardLoadReport {
  readonly loaded: number;
  readonly skipped: number;
}

/** Flatten a validated entry into the fields the engine reads */
export function toCardData(card: ScryfallCard): CardData {
  const front = card.card_faces?.[0];
  return {
    name: card.name,
    mana_cost: card.mana_cost ?? front?.mana_cost,
    cmc: card.cmc,
    type_line: card.type_line,
    oracle_text: card.oracle_text ?? front?.oracle_text,
    keywords: card.keywords ?? [],
    colors: card.colors ?? front?.colors ?? [],
    power: card.power ?? front?.power,
    toughness: card.toughness ?? front?.toughness,
    loyalty: card.loyalty ?? front?.loyalty,
  };
}

export class JsonCardDatabase implements CardDatabase {
  private readonly cards = new Map<string, CardData>();
  private readonly faceNames = new Map<string, string>();
  private skippedEntries = 0;

  /**
   * Validate and index a parsed JSON document. Anything but an array is an error.
   */
  constructor(entries: unknown) {
    const list = z.array(z.unknown()).safeParse(entries);
    if (!list.success) {
      throw new Error('Card database must be a JSON array of cards');
    }

    list.data.forEach((entry, index) => {
      const parsed = ScryfallCardSchema.safeParse(entry);
      if (!parsed.success) {
        this.skippedEntries++;
        debug(2, `[cardDatabase] skipping entry ${index}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
        return;
      }
      this.add(parsed.data);
    });
  }

  static fromFile(filePath: string): JsonCardDatabase {
    const raw = fs.readFileSync(filePath, 'utf-8');
    let entries: unknown;
    try {
      entries = JSON.parse(raw);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new Error(`Error parsing ${filePath}: ${reason}`);
    }
    const db = new JsonCardDatabase(entries);
    debug(1, `[cardDatabase] loaded ${db.size()} cards from ${filePath}`);
    if (db.skipped > 0) {
      debugWarn(1, `[cardDatabase] skipped ${db.skipped} invalid entries`);
    }
    return db;
  }

  /** Build a database from cards already in memory */
  static fromCards(cards: readonly CardData[]): JsonCardDatabase {
    return new JsonCardDatabase(cards);
  }

  get skipped(): number {
    return this.skippedEntries;
  }

  get report(): CardLoadReport {
    return { loaded: this.cards.size, skipped: this.skippedEntries };
  }

  getCardByName(name: string): CardData | undefined {
    const exact = this.cards.get(name);
    if (exact) return exact;
    const full = this.faceNames.get(name);
    return full === undefined ? undefined : this.cards.get(full);
  }

  size(): number {
    return this.cards.size;
  }

  private add(card: ScryfallCard): void {
    this.cards.set(card.name, toCardData(card));
    const frontName = card.card_faces?.[0]?.name;
    if (frontName && frontName !== card.name) {
      this.faceNames.set(frontName, card.name);
    }
  }
}
