/**
 * JMdict XML loading (JMdict_e / JMdict_e.gz from EDRDG)
 *
 * Entries are streamed one <entry> at a time and converted to the same word
 * shape the jmdict-simplified loader produces.
 */

import fs from 'fs';
import { createReadStream } from 'fs';
import { createGunzip } from 'zlib';
import type { Readable } from 'stream';
import { XMLParser } from 'fast-xml-parser';
import {
  DataError,
  dp,
  type Dictionary,
  type DictionaryKana,
  type DictionaryKanji,
  type DictionarySense,
  type DictionaryWord
} from '@kotoba-deck/core';

// Largest JMdict entry is ~50KB; anything past this is an unclosed <entry>
const MAX_BUFFER_SIZE = 10 * 1024 * 1024;

const DEFAULT_PROGRESS_INTERVAL = 50000;

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  parseTagValue: false,
  trimValues: true,
  ignoreDeclaration: true,
  processEntities: true,
  isArray: (name) => [
    'k_ele', 'r_ele', 'sense', 'keb', 'reb', 'ke_inf', 'ke_pri', 're_inf', 're_pri', 're_restr',
    'pos', 'misc', 'gloss'
  ].includes(name)
});

type XmlNode = string | number | boolean | XmlElement | XmlNode[];

interface XmlElement {
  [key: string]: XmlNode | undefined;
}

function isElement(node: unknown): node is XmlElement {
  return typeof node === 'object' && node !== null && !Array.isArray(node);
}

/**
 * Text content of a parsed node, attributes excluded
 */
function nodeText(node: XmlNode | undefined): string {
  if (node === undefined) return '';
  if (typeof node === 'string') return node;
  if (typeof node === 'number' || typeof node === 'boolean') return String(node);
  if (Array.isArray(node)) return node.map(n => nodeText(n)).join('');

  const values: string[] = [];
  for (const key in node) {
    if (!key.startsWith('@_')) {
      values.push(nodeText(node[key]));
    }
  }
  return values.join('');
}

function asArray(node: XmlNode | undefined): XmlNode[] {
  if (node === undefined) return [];
  return Array.isArray(node) ? node : [node];
}

function children(node: XmlElement, tag: string): XmlElement[] {
  return asArray(node[tag]).filter(isElement);
}

// &n; → n, matching the abbreviations jmdict-simplified uses
function entityName(text: string): string {
  return text.startsWith('&') && text.endsWith(';') ? text.slice(1, -1) : text;
}

function texts(node: XmlElement, tag: string): string[] {
  return asArray(node[tag]).map(n => entityName(nodeText(n)));
}

/**
 * Collect `<!ENTITY abbr "description">` declarations from the DOCTYPE.
 */
export function parseEntityDeclarations(header: string): Record<string, string> {
  const tags: Record<string, string> = {};
  for (const match of header.matchAll(/<!ENTITY\s+([^\s]+)\s+"([^"]*)"\s*>/g)) {
    tags[match[1]] = match[2];
  }
  return tags;
}

/**
 * Convert a single `<entry>...</entry>` document to a dictionary word.
 * Returns null when the entry has no sequence number.
 */
export function parseEntryXml(xml: string): DictionaryWord | null {
  const parsed: unknown = xmlParser.parse(xml);
  if (!isElement(parsed)) return null;
  const node = parsed.entry;
  if (!isElement(node)) return null;

  const id = nodeText(node.ent_seq).trim();
  if (!id) return null;

  const kanji: DictionaryKanji[] = children(node, 'k_ele').map(k => ({
    text: nodeText(k.keb),
    common: k.ke_pri !== undefined,
    tags: texts(k, 'ke_inf')
  }));

  const kana: DictionaryKana[] = children(node, 'r_ele').map(r => {
    const restrictions = texts(r, 're_restr');
    return {
      text: nodeText(r.reb),
      common: r.re_pri !== undefined,
      tags: texts(r, 're_inf'),
      appliesToKanji: r.re_nokanji !== undefined ? [] : restrictions.length > 0 ? restrictions : ['*']
    };
  });

  // Part of speech carries over to following senses until restated
  let partOfSpeech: string[] = [];
  const sense: DictionarySense[] = children(node, 'sense').map(s => {
    const pos = texts(s, 'pos');
    if (pos.length > 0) {
      partOfSpeech = pos;
    }
    const gloss = asArray(s.gloss)
      .map(g => ({
        lang: isElement(g) ? nodeText(g['@_xml:lang']) || 'eng' : 'eng',
        text: nodeText(g)
      }))
      .filter(g => g.lang === 'eng');
    return { partOfSpeech, misc: texts(s, 'misc'), gloss };
  });

  return { id, kanji, kana, sense };
}

/**
 * Stream `<entry>` elements, handing the text before the first entry (the
 * DOCTYPE) to `onHeader`.
 */
export async function* streamJmdictEntries(
  path: string,
  onHeader: (header: string) => void = () => {}
): AsyncGenerator<string, void, undefined> {
  let stream: Readable = createReadStream(path);
  if (path.endsWith('.gz')) {
    stream = stream.pipe(createGunzip());
  }
  // Decode across chunk boundaries; a kana split between two reads stays intact
  stream.setEncoding('utf8');

  let buffer = '';
  let headerSeen = false;

  for await (const chunk of stream) {
    buffer += String(chunk);

    if (buffer.length > MAX_BUFFER_SIZE) {
      throw new DataError(
        `XML buffer exceeded ${MAX_BUFFER_SIZE} bytes - likely malformed entry ` +
        `(buffer starts with: ${buffer.substring(0, 200).replace(/\n/g, ' ')}...)`,
        path
      );
    }

    while (true) {
      const start = buffer.indexOf('<entry>');
      if (start === -1) break;

      if (!headerSeen) {
        onHeader(buffer.slice(0, start));
        headerSeen = true;
      }

      const close = buffer.indexOf('</entry>', start);
      if (close === -1) {
        buffer = buffer.slice(start);
        break;
      }

      const end = close + '</entry>'.length;
      yield buffer.slice(start, end);
      buffer = buffer.slice(end);
    }
  }
}

export interface LoadJmdictXmlOptions {
  /** Stop after this many entries (default: unlimited) */
  maxEntries?: number;
  /** Progress reporting interval (default: 50000) */
  progressInterval?: number;
}

export async function loadJmdictXml(path: string, options: LoadJmdictXmlOptions = {}): Promise<Dictionary> {
  const { maxEntries = Infinity, progressInterval = DEFAULT_PROGRESS_INTERVAL } = options;

  if (!fs.existsSync(path)) {
    throw new DataError('Dictionary file not found', path);
  }

  console.log(`Loading JMdict XML from ${path}...`);
  const startTime = Date.now();

  const words = new Map<number, DictionaryWord>();
  let tags: Record<string, string> = {};
  let count = 0;

  for await (const entryXml of streamJmdictEntries(path, header => { tags = parseEntityDeclarations(header); })) {
    if (count >= maxEntries) break;

    const word = parseEntryXml(entryXml);
    if (!word) {
      dp(`Skipping entry without sequence number: ${entryXml.slice(0, 80)}`);
      continue;
    }
    words.set(Number(word.id), word);
    count++;

    if (count % progressInterval === 0) {
      console.log(`  ${count} entries...`);
    }
  }

  const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
  console.log(`✓ Loaded ${count} entries in ${elapsed}s`);
  return { words, tags };
}
