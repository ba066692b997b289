/**
 * JLPT word list loading
 *
 * Each level lives in its own CSV (n5.csv ... n1.csv, plus an optional
 * common.csv) with the columns jmdict_seq, kana, kanji, waller_definition.
 */

import fs from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { DataError, TIERS, dp, type DifficultyTier, type JlptRow } from '@kotoba-deck/core';

const jlptCsvRowSchema = z.object({
  jmdict_seq: z.string().default(''),
  kana: z.string().default(''),
  kanji: z.string().default(''),
  waller_definition: z.string().default('')
});

export type JlptCsvRow = z.infer<typeof jlptCsvRowSchema>;

/**
 * Sequence numbers sometimes come through as floats ("1234.0") when a list was
 * written by a spreadsheet tool; anything that is not a whole number is null.
 */
export function parseSeq(value: string): number | null {
  const trimmed = value.trim();
  if (trimmed === '') return null;
  const seq = Number(trimmed);
  return Number.isInteger(seq) ? seq : null;
}

export function jlptCsvPath(folder: string, tier: DifficultyTier): string {
  return path.join(folder, `${tier.toLowerCase()}.csv`);
}

/**
 * Parse one JLPT CSV document, tagging every row with `tier`.
 */
export function parseJlptCsv(content: string, tier: DifficultyTier, source = `${tier.toLowerCase()}.csv`): JlptRow[] {
  let records: unknown[];
  try {
    records = parse(content, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      bom: true,
      relax_column_count: true
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new DataError(`Malformed CSV: ${message}`, source);
  }

  return records.map((record, i) => {
    const result = jlptCsvRowSchema.safeParse(record);
    if (!result.success) {
      throw new DataError(`Row ${i + 1}: ${result.error.issues[0]?.message ?? 'invalid row'}`, source);
    }
    const row = result.data;
    return {
      seq: parseSeq(row.jmdict_seq),
      kana: row.kana,
      kanji: row.kanji,
      definition: row.waller_definition,
      tier
    };
  });
}

/**
 * Load every JLPT list present in `folder`, easiest level first.
 */
export function loadJlptCsvs(folder: string): JlptRow[] {
  const rows: JlptRow[] = [];
  let files = 0;

  for (const tier of TIERS) {
    const csvPath = jlptCsvPath(folder, tier);
    if (!fs.existsSync(csvPath)) {
      dp(`No word list for ${tier} at ${csvPath}`);
      continue;
    }
    const content = fs.readFileSync(csvPath, 'utf-8');
    const tierRows = parseJlptCsv(content, tier, csvPath);
    dp(`Loaded ${tierRows.length} ${tier} rows from ${csvPath}`);
    rows.push(...tierRows);
    files++;
  }

  if (files === 0) {
    throw new DataError('No JLPT word lists (n5.csv ... n1.csv) found', folder);
  }
  return rows;
}
