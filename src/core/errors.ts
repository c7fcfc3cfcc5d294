/**
 * Error types for profile loading and registry management.
 * Detection itself never throws for weak or missing evidence; it reports
 * the 'unknown' sentinel instead.
 */

// Error codes for routing to appropriate handlers
export type ErrorCode =
  | 'not_ready'
  | 'duplicate_language'
  | 'format'
  | 'source_unavailable'
  | 'reserved_name'
  | 'insufficient_profiles';

/**
 * Base class of every error raised by this package
 */
export abstract class LanguageIdError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A detector was requested from a registry holding no languages */
export class NotReadyError extends LanguageIdError {
  readonly code = 'not_ready';

  constructor(registry: string) {
    super(`Registry "${registry}" has no language profiles loaded`);
  }
}

/** A profile name collides with one already loaded in the same registry */
export class DuplicateLanguageError extends LanguageIdError {
  readonly code = 'duplicate_language';

  constructor(readonly lang: string) {
    super(`Duplicate language profile: ${lang}`);
  }
}

/** A profile record is malformed */
export class FormatError extends LanguageIdError {
  readonly code = 'format';

  constructor(
    readonly source: string,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super(`Profile format error in '${source}': ${detail}`, options);
  }
}

/** A profile source could not be opened or read */
export class SourceUnavailableError extends LanguageIdError {
  readonly code = 'source_unavailable';

  constructor(readonly source: string, options?: { cause?: unknown }) {
    super(`Can't open profile source '${source}'`, options);
  }
}

/** A reserved registry name was requested outside its dedicated accessor */
export class ReservedNameError extends LanguageIdError {
  readonly code = 'reserved_name';

  constructor(readonly registryName: string) {
    super(`Registry name "${registryName}" is reserved`);
  }
}

/** A batch load carried fewer profiles than a table needs to discriminate */
export class InsufficientProfilesError extends LanguageIdError {
  readonly code = 'insufficient_profiles';

  constructor(readonly count: number, readonly required: number) {
    super(`Need at least ${required} profiles, got ${count}`);
  }
}

/**
 * Check if a thrown value is one of ours
 */
export function isLanguageIdError(error: unknown): error is LanguageIdError {
  return error instanceof LanguageIdError;
}

/**
 * Load-time errors leave the registry unusable until it is cleared and reloaded
 */
export function isLoadError(error: unknown): boolean {
  if (!isLanguageIdError(error)) return false;
  return (
    error.code === 'duplicate_language' ||
    error.code === 'format' ||
    error.code === 'source_unavailable' ||
    error.code === 'insufficient_profiles'
  );
}

/**
 * Extract a message from any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
