/**
 * Anki note types for the packages: field list, Recognition and Recall card
 * templates, and the shared stylesheet. Templates live in ../templates.
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { DataError } from '@kotoba-deck/core';
import { CORE_FIELDS, EXTENDED_FIELDS, PACKAGE_NAMES, type PackageKind } from './deck.js';

export const TEMPLATE_DIR = fileURLToPath(new URL('../templates/', import.meta.url));

const STYLE_FILE = 'style.css';

export interface CardTemplate {
  name: string;
  /** Question side */
  front: string;
  /** Answer side */
  back: string;
}

export interface NoteType {
  name: string;
  fields: readonly string[];
  templates: CardTemplate[];
  css: string;
}

// Extended cards play the Sound field on the answer side
const TEMPLATE_FILES: Record<PackageKind, Array<{ name: string; front: string; back: string }>> = {
  core: [
    { name: 'Recognition', front: 'recognition_front.html', back: 'recognition_back.html' },
    { name: 'Recall', front: 'recall_front.html', back: 'recall_back.html' }
  ],
  extended: [
    { name: 'Recognition', front: 'recognition_front.html', back: 'recognition_back_sound.html' },
    { name: 'Recall', front: 'recall_front.html', back: 'recall_back_sound.html' }
  ]
};

function readTemplate(file: string, templateDir: string): string {
  const templatePath = path.join(templateDir, file);
  try {
    return fs.readFileSync(templatePath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new DataError(`Cannot read card template: ${message}`, templatePath);
  }
}

export function noteTypeFor(kind: PackageKind, templateDir: string = TEMPLATE_DIR): NoteType {
  return {
    name: PACKAGE_NAMES[kind],
    fields: kind === 'extended' ? EXTENDED_FIELDS : CORE_FIELDS,
    templates: TEMPLATE_FILES[kind].map(t => ({
      name: t.name,
      front: readTemplate(t.front, templateDir),
      back: readTemplate(t.back, templateDir)
    })),
    css: readTemplate(STYLE_FILE, templateDir)
  };
}

/**
 * Field names a template refers to, section markers and field filters
 * (`{{#Field}}`, `{{furigana:Field}}`) included. `FrontSide` is Anki's own.
 */
export function templateFields(template: string): string[] {
  const names = new Set<string>();
  for (const match of template.matchAll(/\{\{[#^/]?(?:[a-z]+:)?([^}]+)\}\}/g)) {
    const name = match[1].trim();
    if (name !== 'FrontSide') names.add(name);
  }
  return [...names];
}
