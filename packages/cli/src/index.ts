#!/usr/bin/env tsx

/**
 * Command line interface for kotoba-deck
 */

import fs from 'fs';
import { fileURLToPath } from 'url';
import { Command } from 'commander';
import { config } from 'dotenv';
import { KotobaError, dp, makeFurigana } from '@kotoba-deck/core';
import { runBuild } from './build.js';
import { resolveConfig, type CliOptions } from './config.js';

export { runBuild, FULL_CSV_FILE, type BuildSummary } from './build.js';
export {
  resolveConfig,
  DEFAULT_DATA_DIR,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_DICTIONARY_FILE,
  type BuildConfig,
  type CliOptions,
  type Env
} from './config.js';

/**
 * 1 for bad input or bad data, 2 for anything unexpected
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof KotobaError ? 1 : 2;
}

export function createProgram(env: NodeJS.ProcessEnv = process.env): Command {
  const program = new Command();

  program
    .name('kotoba-deck')
    .description('Build JLPT vocabulary flashcard decks from JMdict')
    .version('0.1.0');

  program
    .command('build')
    .description('build the Anki decks and the full CSV')
    .option('--data-dir <dir>', 'folder holding n5.csv ... n1.csv (env KOTOBA_DATA_DIR)')
    .option('--dictionary <file>', 'JMdict file, .json(.gz) or XML (env KOTOBA_DICTIONARY)')
    .option('--audio-dir <dir>', 'folder of <seq>.<ext> audio files (default <data-dir>/audio)')
    .option('--out <dir>', 'output folder (env KOTOBA_OUTPUT_DIR)')
    .option('--seed <n>', 'shuffle seed')
    .option('--packages <kinds...>', 'packages to write: core, extended')
    .option('-d, --debug', 'print debug output (env KOTOBA_DEBUG)')
    .action(async (options: CliOptions) => {
      const summary = await runBuild(resolveConfig(options, env));
      console.log(`Done: ${summary.records} records, ${summary.packages.length} packages, ${summary.csv}`);
    });

  program
    .command('furigana')
    .description('print the furigana alignment of a word')
    .argument('<kanji>', 'written form')
    .argument('<kana>', 'reading')
    .action((kanji: string, kana: string) => {
      console.log(makeFurigana(kanji, kana));
    });

  return program;
}

async function main(): Promise<void> {
  config();
  try {
    await createProgram().parseAsync(process.argv);
  } catch (error) {
    console.error(`ERROR: ${error instanceof Error ? error.message : String(error)}`);
    if (!(error instanceof KotobaError) && error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    process.exit(exitCodeFor(error));
  }
}

/**
 * True when `script` (process.argv[1]) is this module, following the
 * symlink npm installs for the bin.
 */
export function isEntryPoint(moduleUrl: string, script: string | undefined): boolean {
  if (!script) return false;
  try {
    return fs.realpathSync(script) === fs.realpathSync(fileURLToPath(moduleUrl));
  } catch (error) {
    dp(`Cannot resolve entry point ${script}: ${error}`);
    return false;
  }
}

// Run main if this is the entry point
if (isEntryPoint(import.meta.url, process.argv[1])) {
  main().catch((error) => {
    console.error(`FATAL: ${error}`);
    process.exit(2);
  });
}
