// Furigana alignment for dictionary headwords

import { kanjiRuns, nextKanaRun } from './characters.js';
import { dp } from './debug.js';
import { InvalidInputError } from './errors.js';

const FURIGANA_OPEN = '[';
const FURIGANA_CLOSE = ']';

/**
 * Annotate the kanji runs of a headword with the part of the reading they
 * consume, in Anki's `漢字[かんじ]` furigana syntax.
 *
 * Kana between kanji runs is matched against the reading to find where each
 * run's furigana ends; it is copied through unbracketed. When that kana cannot
 * be found in the reading the pairing is treated as broken and `''` is
 * returned.
 *
 * @example
 * makeFurigana('取り扱い', 'とりあつかい') // '取[と]り 扱[あつか]い'
 * makeFurigana('７日', 'なのか')          // '７日[なのか]'
 *
 * @throws {InvalidInputError} when `kana` is empty
 */
export function makeFurigana(kanji: string, kana: string): string {
  if (!kana) {
    throw new InvalidInputError('kana', `no reading provided for "${kanji}"`);
  }
  if (!kanji) {
    return kana;
  }

  // Kana characters eaten by kanji runs beyond one per kanji character so far
  let eaten = 0;
  let lastRunEnd = 0;
  let out = '';

  for (const run of kanjiRuns(kanji)) {
    const readingStart = run.start + eaten;
    let furigana: string;

    const okurigana = nextKanaRun(kanji, run.end);
    if (okurigana) {
      const searchFrom = run.end + eaten;
      const found = kana.indexOf(okurigana.text, searchFrom);
      if (found === -1) {
        dp(`No "${okurigana.text}" in ${kana} after ${searchFrom} for ${kanji}`);
        return '';
      }
      furigana = kana.slice(readingStart, found);
      eaten += found - searchFrom;
    } else {
      furigana = kana.slice(readingStart);
    }

    out += kanji.slice(lastRunEnd, run.start) + ' ' + run.text + FURIGANA_OPEN + furigana + FURIGANA_CLOSE;
    lastRunEnd = run.end;
  }

  out += kanji.slice(lastRunEnd);
  return out.trim();
}
