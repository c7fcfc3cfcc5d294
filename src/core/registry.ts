/**
 * Profile Registry
 *
 * Compiles language profiles into one probability table: for every gram a row
 * holding P(gram | language) per language column, columns in load order.
 * Detectors receive an immutable snapshot of the table; loads after a
 * snapshot was handed out copy the table first, so existing detectors never
 * see them.
 */

import { CONFIG } from '../config';
import { Detector } from './detector';
import { DuplicateLanguageError, InsufficientProfilesError, NotReadyError } from './errors';
import { createLogger } from './logger';
import { gramLength, N_GRAM } from './ngram';
import { readProfileDirectory, validateProfile } from './profile-source';
import type { DetectorOptions, ProbabilityTable, ProfileRecord } from './types';

const log = createLogger('Registry');

const EMPTY_TABLE: ProbabilityTable = Object.freeze({
  languages: Object.freeze([]),
  rows: new Map<string, Float64Array>(),
});

export class ProfileRegistry {
  private rows = new Map<string, Float64Array>();
  private langList: string[] = [];
  /** Snapshot handed out since the last mutation, if any */
  private frozen: ProbabilityTable | null = null;
  /** Tail of the serialized load queue */
  private loadQueue: Promise<void> = Promise.resolve();

  constructor(readonly name: string = 'anonymous') {}

  /** Loaded languages in column order */
  get languages(): readonly string[] {
    return this.langList.slice();
  }

  get size(): number {
    return this.langList.length;
  }

  has(lang: string): boolean {
    return this.langList.includes(lang);
  }

  /**
   * Write one profile into column `index`.
   * Rows are created zero-filled at `totalLanguages` width; narrower rows
   * are widened when touched.
   */
  addProfile(profile: ProfileRecord, index: number, totalLanguages: number): void {
    const record = validateProfile(profile, profile.name);
    const lang = record.name;

    if (this.langList.includes(lang)) {
      throw new DuplicateLanguageError(lang);
    }
    if (index !== this.langList.length || totalLanguages <= index) {
      throw new RangeError(
        `Column ${index} of ${totalLanguages} does not follow ${this.langList.length} loaded languages`
      );
    }

    this.beginMutation();
    this.langList.push(lang);

    let written = 0;
    for (const [gram, count] of Object.entries(record.freq)) {
      const length = gramLength(gram);
      if (length < 1 || length > N_GRAM || count <= 0) continue;

      let row = this.rows.get(gram);
      if (!row) {
        row = new Float64Array(totalLanguages);
        this.rows.set(gram, row);
      } else if (row.length <= index) {
        const wider = new Float64Array(totalLanguages);
        wider.set(row);
        row = wider;
        this.rows.set(gram, row);
      }
      row[index] = count / record.totals[length - 1];
      written++;
    }

    log.debug(`Added profile ${lang} at column ${index}`, { grams: written });
  }

  /**
   * Load a batch of in-memory profiles after the languages already present.
   * A failure part way through keeps the profiles added before it.
   */
  loadFromRecords(records: readonly ProfileRecord[]): void {
    if (records.length < CONFIG.registry.minProfiles) {
      throw new InsufficientProfilesError(records.length, CONFIG.registry.minProfiles);
    }

    const offset = this.langList.length;
    const total = offset + records.length;
    records.forEach((record, i) => this.addProfile(record, offset + i, total));

    log.info(`Loaded ${records.length} profiles into registry "${this.name}"`, {
      languages: this.langList.length,
    });
  }

  /**
   * Load one profile per regular, non-hidden file of a directory.
   * Loads on the same registry run one after another.
   */
  loadFromDirectory(directory: string): Promise<void> {
    const run = this.loadQueue.then(async () => {
      const records = await readProfileDirectory(directory);
      this.loadFromRecords(records);
    });
    // Keep the queue alive after a failed load; the caller still sees the error
    this.loadQueue = run.catch((error: unknown) => {
      log.warn(`Profile load from ${directory} failed`, error);
    });
    return run;
  }

  /**
   * View of the current table, shared with every detector created from it.
   * Callers must treat the rows as read-only: writing into one changes the
   * results of those detectors. Later loads never touch a handed-out view.
   */
  snapshot(): ProbabilityTable {
    if (this.langList.length === 0) return EMPTY_TABLE;
    if (!this.frozen) {
      this.frozen = Object.freeze({
        languages: Object.freeze(this.langList.slice()),
        rows: this.rows,
      });
    }
    return this.frozen;
  }

  /**
   * Construct a detector over the current snapshot
   */
  create(options: DetectorOptions = {}): Detector {
    if (this.langList.length === 0) {
      throw new NotReadyError(this.name);
    }
    return new Detector(this.snapshot(), options);
  }

  /**
   * Drop every profile so the registry can be loaded again
   */
  clear(): void {
    this.rows = new Map();
    this.langList = [];
    this.frozen = null;
    log.debug(`Cleared registry "${this.name}"`);
  }

  /**
   * Copy-on-write: the first mutation after a snapshot clones the rows the
   * snapshot shares
   */
  private beginMutation(): void {
    if (!this.frozen) return;
    const copy = new Map<string, Float64Array>();
    for (const [gram, row] of this.rows) {
      copy.set(gram, row.slice());
    }
    this.rows = copy;
    this.frozen = null;
  }
}
