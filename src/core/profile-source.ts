/**
 * Profile source: turns JSON profile files into validated ProfileRecords.
 *
 * File format:
 *   { "name": "en", "freq": { "e": 120, "th": 40, "the": 21 }, "totals": [1000, 900, 800] }
 * `n_words` is accepted in place of `totals`.
 */

import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { errorMessage, FormatError, SourceUnavailableError } from './errors';
import { createLogger } from './logger';
import type { ProfileRecord } from './types';

const log = createLogger('ProfileSource');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCount(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

/**
 * Validate an already decoded profile object.
 * Every gram of length 1-3 needs a positive total for its length.
 */
export function validateProfile(value: unknown, source: string): ProfileRecord {
  if (!isRecord(value)) {
    throw new FormatError(source, 'profile must be an object');
  }

  const { name, freq } = value;
  const totals = value.totals ?? value.n_words;

  if (typeof name !== 'string' || name.trim().length === 0) {
    throw new FormatError(source, 'missing language name');
  }
  if (!isRecord(freq)) {
    throw new FormatError(source, 'freq must be an object');
  }
  if (!Array.isArray(totals) || totals.length !== 3) {
    throw new FormatError(source, 'totals must hold three counts');
  }

  const [uni, bi, tri]: unknown[] = totals;
  if (!isCount(uni) || !isCount(bi) || !isCount(tri)) {
    throw new FormatError(source, 'totals must be non-negative numbers');
  }
  const counts: [number, number, number] = [uni, bi, tri];

  const grams: Record<string, number> = {};
  for (const [gram, count] of Object.entries(freq)) {
    if (!isCount(count)) {
      throw new FormatError(source, `invalid count for gram "${gram}"`);
    }
    const length = Array.from(gram).length;
    if (length >= 1 && length <= 3 && count > 0 && counts[length - 1] === 0) {
      throw new FormatError(source, `no ${length}-gram total for gram "${gram}"`);
    }
    grams[gram] = count;
  }

  return Object.freeze({
    name,
    freq: Object.freeze(grams),
    totals: Object.freeze(counts),
  });
}

/**
 * Decode and validate one profile from JSON text
 */
export function parseProfile(json: string, source: string): ProfileRecord {
  let decoded: unknown;
  try {
    decoded = JSON.parse(json);
  } catch (error) {
    throw new FormatError(source, errorMessage(error), { cause: error });
  }
  return validateProfile(decoded, source);
}

/**
 * Regular, non-hidden files of a directory, sorted by name
 */
export async function listProfileFiles(directory: string): Promise<string[]> {
  try {
    const entries = await readdir(directory, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && !entry.name.startsWith('.'))
      .map((entry) => entry.name)
      .sort();
  } catch (error) {
    throw new SourceUnavailableError(directory, { cause: error });
  }
}

/**
 * Read every profile file of a directory, one profile per file.
 * Nothing is returned unless all files parse.
 */
export async function readProfileDirectory(directory: string): Promise<ProfileRecord[]> {
  const files = await listProfileFiles(directory);
  log.debug(`Reading ${files.length} profile files from ${directory}`);

  const profiles: ProfileRecord[] = [];
  for (const file of files) {
    const path = join(directory, file);
    let json: string;
    try {
      json = await readFile(path, 'utf-8');
    } catch (error) {
      throw new SourceUnavailableError(file, { cause: error });
    }
    profiles.push(parseProfile(json, file));
  }
  return profiles;
}
