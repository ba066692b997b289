// @kotoba-deck/deck - load stage: deck packages and output files

export {
  type PackageKind,
  type Note,
  type Deck,
  PACKAGE_KINDS,
  PACKAGE_NAMES,
  CORE_FIELDS,
  EXTENDED_FIELDS,
  isPackageKind,
  deckNames,
  soundField,
  DeckPackage
} from './deck.js';
export {
  type WrittenPackage,
  FULL_CSV_COLUMNS,
  renderAnkiText,
  writeNoteType,
  writeAnkiText,
  renderFullCsv,
  writeFullCsv
} from './write.js';
export {
  type CardTemplate,
  type NoteType,
  TEMPLATE_DIR,
  noteTypeFor,
  templateFields
} from './note-type.js';
