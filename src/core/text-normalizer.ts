/**
 * Text cleaning ahead of n-gram extraction.
 *
 * Output contains only canonical letters separated by single spaces:
 * punctuation, digits, URLs and e-mail addresses become boundaries, and a run
 * of one repeated character is capped so degenerate input ("aaaaaaaa...")
 * cannot dominate the gram counts.
 */

import { CONFIG } from '../config';
import { canonicalChar, classifyChar, isLatinLetter } from './unicode-script';

const URL_PATTERN = /https?:\/\/[-_.?&~;+=/#%0-9A-Za-z]{1,2076}/g;
const MAIL_PATTERN = /[-_.0-9A-Za-z]{1,64}@[-_0-9A-Za-z]{1,255}[-_.0-9A-Za-z]{1,255}/g;

interface RunState {
  last: string;
  run: number;
}

/**
 * Recover the space/run state at the end of an already normalized buffer.
 */
function tailState(tail: string, maxRepeat: number): RunState {
  // Enough code units for maxRepeat characters even if all are surrogate pairs
  const chars = Array.from(tail.slice(-(maxRepeat * 2 + 2)));
  const last = chars[chars.length - 1] ?? '';
  if (last === '') return { last, run: 0 };

  let run = 0;
  for (let i = chars.length - 1; i >= 0 && chars[i] === last && run < maxRepeat; i--) {
    run++;
  }
  return { last, run };
}

/**
 * Strip URLs and e-mail addresses
 */
export function stripLinks(text: string): string {
  return text.replace(URL_PATTERN, ' ').replace(MAIL_PATTERN, ' ');
}

/**
 * Normalize raw text into canonical letters and single spaces.
 *
 * @param tail - end of the buffer this text will be appended to, so space
 *   collapsing and run capping continue across the join
 */
export function normalizeText(
  text: string,
  tail = '',
  maxRepeat: number = CONFIG.text.maxRepeat
): string {
  const source = stripLinks(text.normalize('NFC'));
  let { last, run } = tailState(tail, maxRepeat);
  let out = '';

  for (const raw of source) {
    const category = classifyChar(raw);
    if (category === 'mark') continue;

    const ch = category === null ? ' ' : canonicalChar(raw);

    if (ch === ' ') {
      // No leading spaces and no doubled ones
      if (last === ' ' || last === '') continue;
      out += ch;
      last = ch;
      run = 1;
      continue;
    }

    // Runs are counted on the letter itself, not its canonical class, so
    // distinct kana or Hangul syllables are never capped
    const key = raw.toLowerCase();
    if (key === last) {
      run++;
      if (run > maxRepeat) continue;
    } else {
      last = key;
      run = 1;
    }
    out += ch;
  }

  return out;
}

/**
 * Drop Latin letters from text dominated by another script, so embedded
 * brand names or code words in e.g. Japanese text do not outvote it.
 * Applies when Latin letters are fewer than half the non-Latin letters.
 */
export function cleanLatinMinority(text: string): string {
  let latin = 0;
  let nonLatin = 0;
  for (const ch of text) {
    if (ch === ' ') continue;
    if (isLatinLetter(ch)) latin++;
    else nonLatin++;
  }

  if (latin * 2 >= nonLatin) return text;

  let out = '';
  for (const ch of text) {
    const next = isLatinLetter(ch) ? ' ' : ch;
    if (next === ' ' && (out === '' || out.endsWith(' '))) continue;
    out += next;
  }
  return out;
}
