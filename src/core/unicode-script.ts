/**
 * Script categories and canonical character forms.
 *
 * Grams never cross a change of category, and characters that only differ
 * orthographically (case, kana shape, individual Hangul syllables) share
 * one canonical form so they pool their evidence.
 */

export type ScriptCategory =
  | 'latin'
  | 'greek'
  | 'cyrillic'
  | 'armenian'
  | 'hebrew'
  | 'arabic'
  | 'devanagari'
  | 'thai'
  | 'georgian'
  | 'hangul'
  | 'cjk'
  | 'other';

type CodeRange = readonly [number, number];

const SCRIPT_RANGES: ReadonlyArray<readonly [Exclude<ScriptCategory, 'other'>, CodeRange[]]> = [
  [
    'latin',
    [
      [0x0041, 0x005a], // Basic Latin uppercase
      [0x0061, 0x007a], // Basic Latin lowercase
      [0x00c0, 0x00d6], // Latin-1 Supplement letters (× excluded)
      [0x00d8, 0x00f6], // (÷ excluded)
      [0x00f8, 0x024f], // Latin-1 Supplement + Extended-A/B
      [0x1e00, 0x1eff], // Latin Extended Additional
    ],
  ],
  [
    'greek',
    [
      [0x0370, 0x03ff], // Greek and Coptic
      [0x1f00, 0x1fff], // Greek Extended
    ],
  ],
  [
    'cyrillic',
    [
      [0x0400, 0x04ff], // Cyrillic
      [0x0500, 0x052f], // Cyrillic Supplement
    ],
  ],
  ['armenian', [[0x0530, 0x058f]]],
  ['hebrew', [[0x0590, 0x05ff]]],
  [
    'arabic',
    [
      [0x0600, 0x06ff], // Arabic
      [0x0750, 0x077f], // Arabic Supplement
      [0x08a0, 0x08ff], // Arabic Extended-A
    ],
  ],
  ['devanagari', [[0x0900, 0x097f]]],
  ['thai', [[0x0e00, 0x0e7f]]],
  ['georgian', [[0x10a0, 0x10ff]]],
  [
    'hangul',
    [
      [0x1100, 0x11ff], // Hangul Jamo
      [0x3130, 0x318f], // Hangul Compatibility Jamo
      [0xac00, 0xd7af], // Hangul Syllables
    ],
  ],
  [
    'cjk',
    [
      [0x3040, 0x309f], // Hiragana
      [0x30a0, 0x30ff], // Katakana
      [0x3100, 0x312f], // Bopomofo
      [0x31f0, 0x31ff], // Katakana Phonetic Extensions
      [0x3400, 0x4dbf], // CJK Unified Ideographs Extension A
      [0x4e00, 0x9fff], // CJK Unified Ideographs
      [0xf900, 0xfaff], // CJK Compatibility Ideographs
      [0xff66, 0xff9f], // Halfwidth Katakana
    ],
  ],
];

const LETTER = /\p{L}/u;
const MARK = /\p{M}/u;

// Canonical representatives
const HIRAGANA = 'あ';
const KATAKANA = 'ア';
const BOPOMOFO = 'ㄅ';
const HANGUL_SYLLABLE = '가';
const LATIN_EXT_ADDITIONAL = 'ể';
const ARABIC_YEH = 'ي';

const isCodeInRanges = (code: number, ranges: readonly CodeRange[]): boolean => {
  for (const [start, end] of ranges) {
    if (code >= start && code <= end) {
      return true;
    }
  }
  return false;
};

/**
 * Script category of a single character, or null for characters that carry no
 * signal (punctuation, digits, symbols, whitespace, controls).
 * Combining marks outside the script ranges report 'mark'.
 */
export function classifyChar(ch: string): ScriptCategory | 'mark' | null {
  const code = ch.codePointAt(0);
  if (code === undefined) return null;

  for (const [script, ranges] of SCRIPT_RANGES) {
    if (isCodeInRanges(code, ranges)) {
      // Range members that are not letters (Greek punctuation, Arabic digits, ...)
      // are still noise
      if (LETTER.test(ch) || MARK.test(ch)) return script;
      return null;
    }
  }

  if (LETTER.test(ch)) return 'other';
  if (MARK.test(ch)) return 'mark';
  return null;
}

/**
 * Script category of a character already in canonical form.
 * Spaces and anything else without a category return null.
 */
export function scriptOf(ch: string): ScriptCategory | null {
  const category = classifyChar(ch);
  return category === 'mark' ? null : category;
}

/**
 * Canonical form of a letter: lower case, then one representative per
 * orthographic class.
 */
export function canonicalChar(ch: string): string {
  const lowered = ch.toLowerCase();
  const base = [...lowered].length === 1 ? lowered : ch;
  const code = base.codePointAt(0);
  if (code === undefined) return base;

  if (code >= 0x3040 && code <= 0x309f) return HIRAGANA;
  if ((code >= 0x30a0 && code <= 0x30ff) || (code >= 0x31f0 && code <= 0x31ff) || (code >= 0xff66 && code <= 0xff9f)) {
    return KATAKANA;
  }
  if (code >= 0x3100 && code <= 0x312f) return BOPOMOFO;
  if (code >= 0xac00 && code <= 0xd7af) return HANGUL_SYLLABLE;
  if (code >= 0x1ea0 && code <= 0x1eff) return LATIN_EXT_ADDITIONAL;
  if (code === 0x06cc) return ARABIC_YEH;
  return base;
}

/**
 * Latin letters, for the Latin-minority cleaning step
 */
export function isLatinLetter(ch: string): boolean {
  return scriptOf(ch) === 'latin';
}
