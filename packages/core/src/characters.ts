// Character runs for furigana alignment

// Wide digits and wide Latin capitals show up inside JMdict headwords (７日, Ｔシャツ)
// and take furigana like any other kanji.
export const KANJI_RUN_REGEX = /[一-龯々０-９Ａ-Ｚ]+/g;
export const KANA_RUN_REGEX = /[ぁ-んァ-ヿ]+/g;

export interface CharRun {
  text: string;
  start: number;
  end: number;
}

/**
 * Maximal runs of characters that take furigana, left to right.
 */
export function kanjiRuns(word: string): CharRun[] {
  const runs: CharRun[] = [];
  for (const match of word.matchAll(KANJI_RUN_REGEX)) {
    const start = match.index ?? 0;
    runs.push({ text: match[0], start, end: start + match[0].length });
  }
  return runs;
}

/**
 * First maximal kana run at or after `from`, or null.
 */
export function nextKanaRun(word: string, from: number): CharRun | null {
  const regex = new RegExp(KANA_RUN_REGEX.source, 'g');
  regex.lastIndex = from;
  const match = regex.exec(word);
  if (!match) return null;
  return { text: match[0], start: match.index, end: match.index + match[0].length };
}
