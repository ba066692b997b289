/**
 * Deck build: extract word lists, dictionary and audio, transform them into
 * deck records, then write the Anki packages and the full CSV.
 */

import path from 'path';
import { createTagMapping, setDebug, transform } from '@kotoba-deck/core';
import { loadDictionary, loadJlptCsvs, scanAudioFolder } from '@kotoba-deck/data';
import { DeckPackage, writeAnkiText, writeFullCsv, type WrittenPackage } from '@kotoba-deck/deck';
import type { BuildConfig } from './config.js';

export const FULL_CSV_FILE = 'full.csv';

export interface BuildSummary {
  records: number;
  missing: number[];
  incomplete: number[];
  emptyReadings: number[];
  duplicates: number[];
  packages: WrittenPackage[];
  csv: string;
}

export async function runBuild(config: BuildConfig): Promise<BuildSummary> {
  if (config.debug) {
    setDebug(true);
  }

  console.log(`Loading JLPT word lists from ${config.dataDir}...`);
  const rows = loadJlptCsvs(config.dataDir);
  console.log(`✓ Loaded ${rows.length} rows`);

  const dictionary = await loadDictionary(config.dictionary);
  const tagMapping = createTagMapping(dictionary.tags);
  const audio = config.packages.includes('extended')
    ? scanAudioFolder(config.audioDir)
    : new Map<number, string>();

  const result = transform(rows, dictionary, tagMapping, audio, { seed: config.seed });
  console.log(`✓ ${result.records.length} records ready`);
  if (result.missing.length > 0) {
    console.warn(`${result.missing.length} words not found in the dictionary`);
  }

  const packages: WrittenPackage[] = [];
  for (const kind of config.packages) {
    const pkg = new DeckPackage(kind);
    pkg.addNotes(result.records);
    packages.push(writeAnkiText(pkg, config.outDir));

    console.log(`Cards in ${pkg.name}:`);
    for (const [deck, count] of Object.entries(pkg.getCardCounts())) {
      console.log(`  ${deck}: ${count}`);
    }
  }

  const csv = path.join(config.outDir, FULL_CSV_FILE);
  writeFullCsv(result.records, csv);

  return {
    records: result.records.length,
    missing: result.missing,
    incomplete: result.incomplete,
    emptyReadings: result.emptyReadings,
    duplicates: result.duplicates,
    packages,
    csv
  };
}
