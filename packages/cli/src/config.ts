// Build configuration: command line options over environment over defaults

import path from 'path';
import { InvalidInputError, DEFAULT_SHUFFLE_SEED } from '@kotoba-deck/core';
import { PACKAGE_KINDS, isPackageKind, type PackageKind } from '@kotoba-deck/deck';

export const DEFAULT_DATA_DIR = 'original_data';
export const DEFAULT_OUTPUT_DIR = 'output';
export const DEFAULT_DICTIONARY_FILE = 'jmdict-eng.json';

export interface CliOptions {
  dataDir?: string;
  dictionary?: string;
  audioDir?: string;
  out?: string;
  seed?: string;
  packages?: string[];
  debug?: boolean;
}

export interface BuildConfig {
  dataDir: string;
  dictionary: string;
  audioDir: string;
  outDir: string;
  seed: number;
  packages: PackageKind[];
  debug: boolean;
}

export type Env = Readonly<Record<string, string | undefined>>;

function parseSeed(value: string | undefined): number {
  if (value === undefined) return DEFAULT_SHUFFLE_SEED;
  const seed = Number(value.trim());
  if (value.trim() === '' || !Number.isInteger(seed)) {
    throw new InvalidInputError('seed', `expected an integer, got "${value}"`);
  }
  return seed;
}

function parsePackages(values: readonly string[] | undefined): PackageKind[] {
  if (values === undefined || values.length === 0) return [...PACKAGE_KINDS];
  const kinds: PackageKind[] = [];
  for (const value of values) {
    if (!isPackageKind(value)) {
      throw new InvalidInputError('packages', `unknown package "${value}" (expected ${PACKAGE_KINDS.join(' or ')})`);
    }
    if (!kinds.includes(value)) kinds.push(value);
  }
  return kinds;
}

function isTruthy(value: string | undefined): boolean {
  return value !== undefined && ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
}

/**
 * Resolve the build configuration. Reads nothing but its arguments.
 */
export function resolveConfig(options: CliOptions, env: Env = {}): BuildConfig {
  const dataDir = options.dataDir || env.KOTOBA_DATA_DIR || DEFAULT_DATA_DIR;
  return {
    dataDir,
    dictionary: options.dictionary || env.KOTOBA_DICTIONARY || path.join(dataDir, DEFAULT_DICTIONARY_FILE),
    audioDir: options.audioDir || path.join(dataDir, 'audio'),
    outDir: options.out || env.KOTOBA_OUTPUT_DIR || DEFAULT_OUTPUT_DIR,
    seed: parseSeed(options.seed),
    packages: parsePackages(options.packages),
    debug: options.debug === true || isTruthy(env.KOTOBA_DEBUG)
  };
}
