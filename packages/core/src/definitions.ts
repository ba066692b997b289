// Selection and reduction of secondary English definitions

import type { SecondarySense } from './types.js';

/** Senses carrying one of these misc markers never contribute definitions. */
export const EXCLUDED_SENSE_MISC: readonly string[] = ['arch', 'place'];

export const DEFAULT_DEFINITION_BUDGET = 200;

export interface DefinitionFilterOptions {
  /** Maximum total characters across the kept definitions (default 200) */
  budget?: number;
}

function samePartOfSpeech(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((pos, i) => pos === b[i]);
}

/**
 * Definitions of every secondary sense usable alongside the primary sense.
 *
 * A sense is skipped whole when it is archaic or a place name, or when its
 * part of speech differs from the primary one (an intransitive reading of a
 * transitive verb, for instance).
 */
export function collectAdditionalSenses(
  senses: readonly SecondarySense[],
  primaryPartOfSpeech: readonly string[]
): string[][] {
  const groups: string[][] = [];
  for (const sense of senses) {
    if (sense.misc.some(m => EXCLUDED_SENSE_MISC.includes(m))) continue;
    if (!samePartOfSpeech(sense.partOfSpeech, primaryPartOfSpeech)) continue;
    groups.push([...sense.definitions]);
  }
  return groups;
}

/**
 * Drop definitions already given by the primary sense or earlier groups
 * (case-insensitively), then cut the list at the first definition that takes
 * the running length over the budget.
 */
export function reduceDefinitions(
  groups: readonly (readonly string[])[],
  primaryDefinitions: readonly string[],
  options: DefinitionFilterOptions = {}
): string[] {
  const budget = options.budget ?? DEFAULT_DEFINITION_BUDGET;
  const primary = new Set(primaryDefinitions.map(d => d.toLowerCase()));
  const seen = new Set<string>();
  const kept: string[] = [];

  for (const group of groups) {
    for (const definition of group) {
      const key = definition.toLowerCase();
      if (primary.has(key) || seen.has(key)) continue;
      kept.push(definition);
      seen.add(key);
    }
  }

  let length = 0;
  for (let i = 0; i < kept.length; i++) {
    length += [...kept[i]].length;
    if (length > budget) {
      return kept.slice(0, i);
    }
  }
  return kept;
}

export function filterAdditionalDefinitions(
  senses: readonly SecondarySense[],
  primaryDefinitions: readonly string[],
  primaryPartOfSpeech: readonly string[],
  options: DefinitionFilterOptions = {}
): string[] {
  return reduceDefinitions(
    collectAdditionalSenses(senses, primaryPartOfSpeech),
    primaryDefinitions,
    options
  );
}
