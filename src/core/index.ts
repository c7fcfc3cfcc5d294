/**
 * Core module exports
 */

// Configuration
export { CONFIG, type Config } from '../config';

// Error handling
export {
  type ErrorCode,
  LanguageIdError,
  NotReadyError,
  DuplicateLanguageError,
  FormatError,
  SourceUnavailableError,
  ReservedNameError,
  InsufficientProfilesError,
  isLanguageIdError,
  isLoadError,
} from './errors';

// Shared types
export type {
  ProfileRecord,
  ProbabilityTable,
  DetectorState,
  PriorityMode,
  PriorityMap,
  DetectorOptions,
  LanguageProbability,
} from './types';

// Text normalization and n-grams
export { type ScriptCategory, classifyChar, canonicalChar, scriptOf } from './unicode-script';
export { normalizeText, stripLinks, cleanLatinMinority } from './text-normalizer';
export { N_GRAM, extractNGrams, countNGrams, gramLength } from './ngram';

// Profiles
export { validateProfile, parseProfile, listProfileFiles, readProfileDirectory } from './profile-source';

// Registries
export { ProfileRegistry } from './registry';
export {
  type RegistryManagerOptions,
  RegistryManager,
  BUNDLED_PROFILE_ROOT,
} from './registry-manager';

// Detection
export { Detector, UNKNOWN_LANGUAGE } from './detector';
export { Random } from './random';

// Language utilities
export { getLanguageName, normalizeLanguageCode, isKnownLanguage } from './language-map';

// Logging
export { type Logger, type LogLevel, createLogger } from './logger';
