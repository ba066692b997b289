/**
 * Output files: Anki text-import decks and the full CSV export
 */

import fs from 'fs';
import path from 'path';
import { stringify } from 'csv-stringify/sync';
import type { DeckRecord } from '@kotoba-deck/core';
import type { DeckPackage } from './deck.js';
import { noteTypeFor, type NoteType } from './note-type.js';

export const FULL_CSV_COLUMNS = [
  'jlpt_level',
  'expression',
  'english_definition',
  'reading',
  'grammar',
  'additional',
  'tags',
  'audio_path'
] as const;

// Anki tags are whitespace separated
function ankiTag(tag: string): string {
  return tag.trim().replace(/\s+/g, '_');
}

/**
 * Render a package in Anki's text import format: one note per line with the
 * deck name first and the tags last.
 */
export function renderAnkiText(pkg: DeckPackage): string {
  const header = [
    '#separator:tab',
    '#html:true',
    `#notetype:${pkg.name}`,
    '#deck column:1',
    `#tags column:${pkg.fieldNames.length + 2}`
  ].join('\n');

  const rows: string[][] = [];
  for (const deck of pkg.decks) {
    for (const note of deck.notes) {
      rows.push([deck.name, ...note.fields, note.tags.map(ankiTag).join(' ')]);
    }
  }

  return `${header}\n${stringify(rows, { delimiter: '\t' })}`;
}

export interface WrittenPackage {
  file: string;
  notes: number;
  media: number;
  /** Folder holding the note type the import file expects */
  noteType: string;
}

/**
 * Write a note type as `<name> note type/`: `fields.txt` (one field per
 * line, in import column order), a front and back HTML file per card
 * template, and `style.css`.
 */
export function writeNoteType(noteType: NoteType, folder: string): string {
  const dir = path.join(folder, `${noteType.name} note type`);
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(path.join(dir, 'fields.txt'), `${noteType.fields.join('\n')}\n`, 'utf-8');
  for (const template of noteType.templates) {
    fs.writeFileSync(path.join(dir, `${template.name} front.html`), template.front, 'utf-8');
    fs.writeFileSync(path.join(dir, `${template.name} back.html`), template.back, 'utf-8');
  }
  fs.writeFileSync(path.join(dir, 'style.css'), noteType.css, 'utf-8');
  return dir;
}

/**
 * Write `<package name>.txt` into `folder` along with its note type, copying
 * audio into `folder/media` for packages that carry it.
 */
export function writeAnkiText(
  pkg: DeckPackage,
  folder: string,
  noteType: NoteType = noteTypeFor(pkg.kind)
): WrittenPackage {
  fs.mkdirSync(folder, { recursive: true });
  const file = path.join(folder, `${pkg.name}.txt`);
  console.log(`Saving ${pkg.kind} package to ${file}`);
  fs.writeFileSync(file, renderAnkiText(pkg), 'utf-8');

  let media = 0;
  if (pkg.hasAudio && pkg.mediaFiles.length > 0) {
    const mediaDir = path.join(folder, 'media');
    fs.mkdirSync(mediaDir, { recursive: true });
    for (const source of pkg.mediaFiles) {
      fs.copyFileSync(source, path.join(mediaDir, path.basename(source)));
      media++;
    }
  }

  const noteTypeDir = writeNoteType(noteType, folder);

  const notes = pkg.decks.reduce((sum, deck) => sum + deck.notes.length, 0);
  return { file, notes, media, noteType: noteTypeDir };
}

export function renderFullCsv(records: readonly DeckRecord[]): string {
  return stringify(
    records.map(r => ({
      jlpt_level: r.tier,
      expression: r.expression,
      english_definition: r.englishDefinition,
      reading: r.reading,
      grammar: r.grammar,
      additional: r.additional,
      tags: r.tags.join(' '),
      audio_path: r.audioPath ?? ''
    })),
    { header: true, columns: [...FULL_CSV_COLUMNS] }
  );
}

export function writeFullCsv(records: readonly DeckRecord[], file: string): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  console.log(`Saving csv to ${file}`);
  fs.writeFileSync(file, renderFullCsv(records), 'utf-8');
}
