/**
 * Shared type definitions for profiles, probability tables and detection
 */

// ============================================================================
// Profiles
// ============================================================================

/**
 * Per-language n-gram statistics, supplied fully formed by a profile source.
 */
export interface ProfileRecord {
  /** Language identifier, unique within one registry */
  readonly name: string;
  /** Occurrence count of each gram (1 to 3 characters) */
  readonly freq: Readonly<Record<string, number>>;
  /** Corpus-wide gram counts: [unigrams, bigrams, trigrams] */
  readonly totals: readonly [number, number, number];
}

/**
 * Gram → per-language probability, one column per language in load order.
 * Cells past the end of a row read as zero. Rows are shared between
 * detectors and must not be written to.
 */
export interface ProbabilityTable {
  readonly languages: readonly string[];
  readonly rows: ReadonlyMap<string, Float64Array>;
}

// ============================================================================
// Detection
// ============================================================================

export type DetectorState = 'fresh' | 'accumulating' | 'estimated';

export type PriorityMode = 'additive' | 'replace';

/**
 * Caller weighting applied after estimation
 */
export interface PriorityMap {
  weights: Readonly<Record<string, number>>;
  mode: PriorityMode;
}

export interface DetectorOptions {
  /** Smoothing strength in [0, 1] */
  alpha?: number;
  /** Normalized UTF-16 code units kept; the rest of the input is dropped */
  maxTextLength?: number;
  priorityMap?: PriorityMap;
  /** Fixes trial randomness for reproducible results (unsigned 32-bit integer) */
  seed?: number;
  trials?: number;
  /** Gram updates allowed per trial */
  iterationLimit?: number;
  convergenceThreshold?: number;
  /** Cut-off for getProbabilities() */
  probabilityThreshold?: number;
  /** Cut-off for detect() */
  minConfidence?: number;
  /** Log every trial */
  verbose?: boolean;
}

export interface LanguageProbability {
  lang: string;
  probability: number;
}
