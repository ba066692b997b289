/**
 * Dictionary loading, dispatched on file extension
 */

import { DataError, type Dictionary } from '@kotoba-deck/core';
import { loadJmdictJson } from './load-jmdict-json.js';
import { loadJmdictXml } from './load-jmdict-xml.js';

export type DictionaryFormat = 'json' | 'xml';

export function detectDictionaryFormat(path: string): DictionaryFormat {
  const lower = path.toLowerCase();
  if (lower.endsWith('.json') || lower.endsWith('.json.gz')) return 'json';
  // JMdict_e.gz is the XML release
  if (lower.endsWith('.xml') || lower.endsWith('.xml.gz') || lower.endsWith('.gz') || /jmdict(_e)?$/.test(lower)) {
    return 'xml';
  }
  throw new DataError('Unrecognised dictionary format (expected .json, .json.gz, .xml or .gz)', path);
}

export async function loadDictionary(path: string): Promise<Dictionary> {
  return detectDictionaryFormat(path) === 'json' ? loadJmdictJson(path) : loadJmdictXml(path);
}
