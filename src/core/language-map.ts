/**
 * Language code helpers
 * Profile names are ISO 639-1 codes, optionally with a region ("zh-cn").
 */

import ISO6391 from 'iso-639-1';

/**
 * Normalize a language code to lowercase with '-' as region separator
 * @param code - Language code in any format ("ZH_TW", " en ")
 */
export function normalizeLanguageCode(code: string): string {
  return code.trim().toLowerCase().replace(/_/g, '-');
}

/**
 * Get human-readable language name from a profile name
 * @returns English name with the region in parentheses ("Chinese (TW)"),
 *   or the code itself if unknown
 */
export function getLanguageName(code: string): string {
  const [base, region] = normalizeLanguageCode(code).split('-');
  const name = ISO6391.getName(base);
  if (!name) return code;
  return region ? `${name} (${region.toUpperCase()})` : name;
}

/**
 * Check whether a profile name starts with a valid ISO 639-1 code
 */
export function isKnownLanguage(code: string): boolean {
  const [base] = normalizeLanguageCode(code).split('-');
  return ISO6391.validate(base);
}
