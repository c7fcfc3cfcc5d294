/**
 * Centralized configuration constants for the language identifier.
 * Detector and registry defaults are read from here.
 */

export const CONFIG = {
  /**
   * Monte Carlo estimation defaults (overridable per detector)
   */
  detection: {
    /** Smoothing weight between profile probability and the uniform fallback */
    alpha: 0.5,
    /** Half-width of the uniform jitter added to alpha in every trial */
    alphaWidth: 0.05,
    /** Independent randomized trials averaged into one result */
    trials: 7,
    /** Maximum gram updates per trial */
    iterationLimit: 1000,
    /** A trial stops once its leading probability exceeds this */
    convergenceThreshold: 0.99999,
    /** Languages at or below this are left out of getProbabilities() */
    probabilityThreshold: 0.1,
    /** detect() reports 'unknown' unless the top language exceeds this */
    minConfidence: 0.5,
  },

  /**
   * Text accumulation limits
   */
  text: {
    /** Maximum normalized UTF-16 code units kept by a detector */
    maxTextLength: 10000,
    /** Longest run of one repeated character kept by the normalizer */
    maxRepeat: 3,
  },

  /**
   * Registry names and bundled profile sets
   */
  registry: {
    /** Reserved name of the standard-length default registry */
    defaultName: 'default',
    /** Reserved name of the short-text default registry */
    shortTextName: 'short',
    /** Bundled profile directories, relative to the profile root */
    defaultProfileDir: 'standard',
    shortTextProfileDir: 'short',
    /** Fewest profiles a batch load accepts */
    minProfiles: 2,
  },

  /**
   * Logging
   */
  logging: {
    /** Minimum level written; LANGID_LOG_LEVEL overrides it */
    level: 'warn',
  },
} as const;

/**
 * Type for accessing nested config values
 */
export type Config = typeof CONFIG;
