// Deck list parsing and file import
import fs from 'node:fs';
import path from 'node:path';
import type { CardData, CardDatabase, DeckImporter, ImportedDeck } from '../../../shared/src';
import { normalizeName } from '../../../shared/src';
import { debug } from '../utils/debug';

export type ParsedLine = { name: string; count: number };

export interface ParsedDecklist {
  /** From an `About` / `Name <deck name>` header, when present */
  readonly name?: string;
  readonly main: ParsedLine[];
  readonly sideboard: ParsedLine[];
}

export const DECK_FILE_EXTENSIONS: readonly string[] = ['.txt', '.dek'];

/**
 * Check if a line carries no card: blanks, comments and section headers.
 */
export function shouldSkipDeckLine(line: string): boolean {
  const trimmed = line.trim();
  if (!trimmed) return true;
  if (/^(\/\/|#)/.test(trimmed)) return true;
  if (/^(DECK|MAINBOARD|MAIN|COMMANDER|MAYBEBOARD|CONSIDERING)$/i.test(trimmed)) return true;
  return false;
}

/**
 * Strip set and collector number suffixes from a card name:
 *   - "Elvish Mystic (CMM) 284" -> "Elvish Mystic"
 *   - "Elvish Mystic (CMM:284)" -> "Elvish Mystic"
 *   - "Elvish Mystic 284 (CMM)" -> "Elvish Mystic"
 *   - "Elvish Mystic (CMM)" -> "Elvish Mystic"
 */
export function stripSetCollectorNumber(name: string): string {
  let result = name;
  result = result.replace(/\s+\([A-Za-z0-9][A-Za-z0-9 ]{0,14}\)\s+\d+[A-Za-z]?$/i, '');
  result = result.replace(/\s+\([A-Za-z0-9]{2,10}:\d+[A-Za-z]?\)$/i, '');
  result = result.replace(/\s+\d+[A-Za-z]?\s+\([A-Za-z0-9]{2,10}\)$/i, '');
  result = result.replace(/\s+\([A-Za-z0-9]{2,10}\)$/i, '');
  return result.trim();
}

/** "4x Name", "4 Name", "Name x4" or a bare name */
export function parseDeckLine(raw: string): ParsedLine | null {
  let name: string;
  let count = 1;

  const mPrefix = raw.match(/^(\d+)x?\s+(.+)$/i);
  const mSuffix = raw.match(/^(.*\S)\s+x(\d+)$/i);
  if (mPrefix) {
    count = parseInt(mPrefix[1], 10);
    name = mPrefix[2];
  } else if (mSuffix) {
    name = mSuffix[1];
    count = parseInt(mSuffix[2], 10);
  } else {
    name = raw;
  }

  name = normalizeName(stripSetCollectorNumber(name));
  if (!name || count < 1) return null;
  return { name, count };
}

function addLine(acc: Map<string, number>, line: ParsedLine): void {
  acc.set(line.name, (acc.get(line.name) ?? 0) + line.count);
}

function toLines(acc: Map<string, number>): ParsedLine[] {
  return Array.from(acc.entries()).map(([name, count]) => ({ name, count }));
}

export function parseDecklist(list: string): ParsedDecklist {
  const main = new Map<string, number>();
  const sideboard = new Map<string, number>();
  let deckName: string | undefined;
  let inHeader = false;
  let inSideboard = false;

  for (const rawLine of list.split(/\r?\n/)) {
    const raw = rawLine.trim();
    if (shouldSkipDeckLine(raw)) continue;

    if (/^about$/i.test(raw)) {
      inHeader = true;
      continue;
    }
    if (inHeader) {
      const mName = raw.match(/^Name\s+(.+)$/);
      if (mName) {
        deckName = mName[1].trim();
        continue;
      }
      inHeader = false;
    }

    if (/^sideboard:?$/i.test(raw)) {
      inSideboard = true;
      continue;
    }

    // "SB: 2 Negate" puts a single line in the sideboard
    const mSb = raw.match(/^SB:\s*(.+)$/i);
    const line = parseDeckLine(mSb ? mSb[1] : raw);
    if (!line) continue;
    addLine(inSideboard || mSb ? sideboard : main, line);
  }

  return { name: deckName, main: toLines(main), sideboard: toLines(sideboard) };
}

/**
 * Expand parsed lines into card data, one entry per copy. Names the database
 * does not know go to `missing`.
 */
export function resolveDeckList(
  lines: readonly ParsedLine[],
  cardDatabase: CardDatabase
): { cards: CardData[]; missing: string[] } {
  const cards: CardData[] = [];
  const missing: string[] = [];
  for (const { name, count } of lines) {
    const card = cardDatabase.getCardByName(name);
    if (!card) {
      debug(1, `[deckImport] card not found: ${name}`);
      missing.push(name);
      continue;
    }
    for (let i = 0; i < count; i++) cards.push(card);
  }
  return { cards, missing };
}

/**
 * Reads deck files from disk. The deck takes its header name, or the file
 * name without extension.
 */
export class FileDeckImporter implements DeckImporter {
  constructor(private readonly cardDatabase: CardDatabase) {}

  importDeck(source: string): ImportedDeck {
    const text = fs.readFileSync(source, 'utf-8');
    return this.importText(text, path.basename(source, path.extname(source)));
  }

  importText(text: string, fallbackName: string): ImportedDeck {
    const parsed = parseDecklist(text);
    const main = resolveDeckList(parsed.main, this.cardDatabase);
    const side = resolveDeckList(parsed.sideboard, this.cardDatabase);
    return {
      name: parsed.name ?? fallbackName,
      cards: main.cards,
      sideboard: side.cards,
      missing: [...main.missing, ...side.missing],
    };
  }
}

/** Deck files directly inside `dir`, sorted by name */
export function listDeckFiles(dir: string): string[] {
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter(entry => entry.isFile() && DECK_FILE_EXTENSIONS.includes(path.extname(entry.name).toLowerCase()))
    .map(entry => path.join(dir, entry.name))
    .sort();
}
