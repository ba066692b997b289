/**
 * JLPT flashcard packages
 *
 * A package is a stack of nested decks, one per level, with easier levels
 * nested inside harder ones:
 *
 *   Core Japanese Vocabulary
 *   Core Japanese Vocabulary::JLPT N1
 *   Core Japanese Vocabulary::JLPT N1::JLPT N2
 *   ...
 *   Core Japanese Vocabulary::JLPT N1::JLPT N2::JLPT N3::JLPT N4::JLPT N5
 */

import path from 'path';
import { dp, type DeckRecord, type DifficultyTier } from '@kotoba-deck/core';

export type PackageKind = 'core' | 'extended';

export const PACKAGE_KINDS: readonly PackageKind[] = ['core', 'extended'];

export const PACKAGE_NAMES: Record<PackageKind, string> = {
  core: 'Core Japanese Vocabulary',
  extended: 'Core Japanese Vocabulary Extended'
};

export const CORE_FIELDS = [
  'Expression',
  'English definition',
  'Reading',
  'Grammar',
  'Additional definitions'
] as const;

export const EXTENDED_FIELDS = [...CORE_FIELDS, 'Sound'] as const;

const LEVEL_DECKS = ['JLPT N1', 'JLPT N2', 'JLPT N3', 'JLPT N4', 'JLPT N5'];

// Position in the deck stack; COMMON words sit in the root deck
const DECK_INDEX: Record<DifficultyTier, number> = {
  COMMON: 0,
  N1: 1,
  N2: 2,
  N3: 3,
  N4: 4,
  N5: 5
};

export interface Note {
  fields: string[];
  tags: string[];
  /** Position of the note within its deck */
  due: number;
}

export interface Deck {
  name: string;
  notes: Note[];
}

export function isPackageKind(value: string): value is PackageKind {
  return value === 'core' || value === 'extended';
}

export function deckNames(root: string): string[] {
  return [root, ...LEVEL_DECKS.map((_, i) => [root, ...LEVEL_DECKS.slice(0, i + 1)].join('::'))];
}

export function soundField(audioPath: string): string {
  return `[sound:${path.basename(audioPath)}]`;
}

export class DeckPackage {
  readonly name: string;
  readonly fieldNames: readonly string[];
  readonly decks: Deck[];

  // Expressions already added; a second card for the same headword is skipped
  private readonly entries = new Set<string>();
  private readonly media: string[] = [];

  constructor(readonly kind: PackageKind = 'core') {
    this.name = PACKAGE_NAMES[kind];
    this.fieldNames = kind === 'extended' ? EXTENDED_FIELDS : CORE_FIELDS;
    this.decks = deckNames(this.name).map(name => ({ name, notes: [] }));
  }

  get hasAudio(): boolean {
    return this.kind === 'extended';
  }

  getDeck(tier: DifficultyTier): Deck {
    return this.decks[DECK_INDEX[tier]];
  }

  /**
   * Add a note for `record` to its level's deck. Returns false when a note with
   * the same expression is already in the package.
   */
  addNote(record: DeckRecord): boolean {
    if (this.entries.has(record.expression)) {
      dp(`Not adding duplicate note ${record.expression} (${record.seq})`);
      return false;
    }

    const deck = this.getDeck(record.tier);
    const fields = [
      record.expression,
      record.englishDefinition,
      record.reading,
      record.grammar,
      record.additional
    ];
    if (this.hasAudio) {
      if (record.audioPath) {
        fields.push(soundField(record.audioPath));
        this.media.push(record.audioPath);
      } else {
        fields.push('');
      }
    }

    deck.notes.push({ fields, tags: [...record.tags], due: deck.notes.length });
    this.entries.add(record.expression);
    return true;
  }

  addNotes(records: readonly DeckRecord[]): number {
    let added = 0;
    for (const record of records) {
      if (this.addNote(record)) added++;
    }
    return added;
  }

  get mediaFiles(): readonly string[] {
    return this.media;
  }

  /** Number of notes in each deck, by full deck name */
  getCardCounts(): Record<string, number> {
    return Object.fromEntries(this.decks.map(d => [d.name, d.notes.length]));
  }
}
