/**
 * jmdict-simplified JSON loading (https://github.com/scriptin/jmdict-simplified)
 *
 * Accepts the plain .json release or a gzipped copy (.json.gz).
 */

import fs from 'fs';
import { promisify } from 'util';
import { gunzip } from 'zlib';
import { z } from 'zod';
import { DataError, type Dictionary, type DictionaryWord } from '@kotoba-deck/core';

const gunzipAsync = promisify(gunzip);

const kanjiSchema = z.object({
  text: z.string(),
  common: z.boolean().default(false),
  tags: z.array(z.string()).default([])
});

const kanaSchema = z.object({
  text: z.string(),
  common: z.boolean().default(false),
  tags: z.array(z.string()).default([]),
  appliesToKanji: z.array(z.string()).default(['*'])
});

const glossSchema = z.object({
  lang: z.string().default('eng'),
  text: z.string()
});

const senseSchema = z.object({
  partOfSpeech: z.array(z.string()).default([]),
  misc: z.array(z.string()).default([]),
  gloss: z.array(glossSchema).default([])
});

export const dictionaryWordSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  kanji: z.array(kanjiSchema).default([]),
  kana: z.array(kanaSchema).default([]),
  sense: z.array(senseSchema).default([])
});

export const jmdictSimplifiedSchema = z.object({
  version: z.string().optional(),
  dictDate: z.string().optional(),
  tags: z.record(z.string()).default({}),
  words: z.array(dictionaryWordSchema)
});

/**
 * Validate a parsed jmdict-simplified document and index its words by
 * sequence number.
 */
export function parseJmdictJson(data: unknown, source = 'jmdict'): Dictionary {
  const result = jmdictSimplifiedSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid document';
    throw new DataError(`Not a jmdict-simplified document (${where})`, source);
  }

  const words = new Map<number, DictionaryWord>();
  for (const word of result.data.words) {
    const seq = Number(word.id);
    if (!Number.isInteger(seq)) {
      throw new DataError(`Word id "${word.id}" is not a sequence number`, source);
    }
    words.set(seq, word);
  }
  return { words, tags: result.data.tags };
}

export async function loadJmdictJson(path: string): Promise<Dictionary> {
  if (!fs.existsSync(path)) {
    throw new DataError('Dictionary file not found', path);
  }

  console.log(`Loading dictionary from ${path}...`);
  const startTime = Date.now();

  let raw: Buffer = await fs.promises.readFile(path);
  if (path.endsWith('.gz')) {
    raw = await gunzipAsync(raw);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw.toString('utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new DataError(`Invalid JSON: ${message}`, path);
  }

  const dictionary = parseJmdictJson(data, path);
  const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
  console.log(`✓ Loaded ${dictionary.words.size} words in ${elapsed}s`);
  return dictionary;
}
