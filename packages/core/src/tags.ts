// Dictionary abbreviation descriptions and study-card tags

import type { TagMapping } from './types.js';

/** Descriptions that replace the dictionary's own wording. */
export const TAG_OVERRIDES: Readonly<Record<string, string>> = {
  n: 'noun',
  hon: 'honorific/尊敬語',
  pol: 'polite/丁寧語',
  hum: 'humble/謙譲語'
};

export const FORMALITY_MISC: readonly string[] = ['hon', 'pol', 'hum'];

export const USUALLY_KANA_MISC = 'uk';
export const RARE_MISC = 'rare';

export const USUALLY_KANA_TAG = 'usually_kana';
export const RARE_TAG = 'rare_term';

/**
 * Build the immutable abbreviation → description mapping handed to the
 * normalizer, layering TAG_OVERRIDES over the dictionary's descriptions.
 */
export function createTagMapping(dictionaryTags: Readonly<Record<string, string>> = {}): TagMapping {
  const mapping = new Map<string, string>(Object.entries(dictionaryTags));
  for (const [abbr, description] of Object.entries(TAG_OVERRIDES)) {
    mapping.set(abbr, description);
  }
  return mapping;
}

export function describeTag(mapping: TagMapping, abbr: string): string {
  return mapping.get(abbr) ?? abbr;
}

/**
 * Tags for a word: formality labels in misc order, then the usually-kana
 * marker, then the rare marker.
 */
export function buildTags(misc: readonly string[], mapping: TagMapping): string[] {
  const tags = misc
    .filter(m => FORMALITY_MISC.includes(m))
    .map(m => describeTag(mapping, m));
  if (misc.includes(USUALLY_KANA_MISC)) {
    tags.push(USUALLY_KANA_TAG);
  }
  if (misc.includes(RARE_MISC)) {
    tags.push(RARE_TAG);
  }
  return tags;
}
