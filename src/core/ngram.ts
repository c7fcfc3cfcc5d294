/**
 * N-gram extraction over normalized text.
 *
 * A window of up to three characters slides over the text. Spaces reset it,
 * and so does a change of script category between two letters, so no gram
 * ever mixes scripts.
 */

import { scriptOf, type ScriptCategory } from './unicode-script';

/** Longest gram produced */
export const N_GRAM = 3;

/**
 * Grams in text order: after each character its unigram, bigram and trigram
 * (where the window is long enough). The text is padded with a space on both
 * ends so word-initial and word-final grams (" t", "he ") are included.
 */
export function* extractNGrams(text: string): Generator<string, void, undefined> {
  let window: string[] = [' '];

  function* add(ch: string): Generator<string, void, undefined> {
    const last = window[window.length - 1];
    if (last === ' ') {
      window = [' '];
      if (ch === ' ') return;
    } else if (window.length >= N_GRAM) {
      window.shift();
    }
    window.push(ch);

    if (ch !== ' ') yield ch;
    for (let n = 2; n <= N_GRAM && n <= window.length; n++) {
      yield window.slice(-n).join('');
    }
  }

  let prevScript: ScriptCategory | null = null;
  for (const raw of ` ${text} `) {
    const script = raw === ' ' ? null : scriptOf(raw);
    const ch = script === null ? ' ' : raw;

    if (script !== null && prevScript !== null && script !== prevScript) {
      yield* add(' ');
    }
    yield* add(ch);
    prevScript = script;
  }
}

/**
 * Evidence multiset: occurrence count of every extracted gram
 */
export function countNGrams(text: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const gram of extractNGrams(text)) {
    counts.set(gram, (counts.get(gram) ?? 0) + 1);
  }
  return counts;
}

/**
 * Length of a gram in characters (code points)
 */
export function gramLength(gram: string): number {
  return Array.from(gram).length;
}
