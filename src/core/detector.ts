/**
 * Language Detector
 *
 * One detection session: accumulates normalized text, then estimates a
 * probability distribution over the registry's languages. Each of several
 * randomized trials walks the observed grams in shuffled order, applying a
 * smoothed Bayesian update per gram; the trials are averaged to even out the
 * effect of ordering and of the jittered smoothing weight.
 *
 * Sessions are cheap and not meant to be shared between callers. The table
 * they read is an immutable registry snapshot.
 *
 * @example
 * const detector = registry.create({ seed: 42 });
 * detector.append('The children were playing in the garden.');
 * detector.detect(); // 'en'
 */

import { CONFIG } from '../config';
import { getLanguageName } from './language-map';
import { createLogger } from './logger';
import { countNGrams } from './ngram';
import { Random } from './random';
import { cleanLatinMinority, normalizeText } from './text-normalizer';
import type {
  DetectorOptions,
  DetectorState,
  LanguageProbability,
  PriorityMap,
  ProbabilityTable,
} from './types';

const log = createLogger('Detector');

/** Result of detect() when no language is confident enough */
export const UNKNOWN_LANGUAGE = 'unknown';

const MAX_SEED = 0xffffffff;

interface ResolvedOptions {
  alpha: number;
  maxTextLength: number;
  priorityMap: PriorityMap | null;
  seed: number | null;
  trials: number;
  iterationLimit: number;
  convergenceThreshold: number;
  probabilityThreshold: number;
  minConfidence: number;
  verbose: boolean;
}

function assertUnitInterval(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new RangeError(`${name} must be between 0 and 1, got ${value}`);
  }
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

function assertPriorityMap(map: PriorityMap): void {
  if (map.mode !== 'additive' && map.mode !== 'replace') {
    throw new RangeError(`Unknown priority mode: ${String(map.mode)}`);
  }
  for (const [lang, weight] of Object.entries(map.weights)) {
    if (!Number.isFinite(weight) || weight < 0) {
      throw new RangeError(`Priority weight for ${lang} must be a non-negative number`);
    }
  }
}

function resolveOptions(options: DetectorOptions): ResolvedOptions {
  const defaults = CONFIG.detection;
  const resolved: ResolvedOptions = {
    alpha: options.alpha ?? defaults.alpha,
    maxTextLength: options.maxTextLength ?? CONFIG.text.maxTextLength,
    priorityMap: options.priorityMap ?? null,
    seed: options.seed ?? null,
    trials: options.trials ?? defaults.trials,
    iterationLimit: options.iterationLimit ?? defaults.iterationLimit,
    convergenceThreshold: options.convergenceThreshold ?? defaults.convergenceThreshold,
    probabilityThreshold: options.probabilityThreshold ?? defaults.probabilityThreshold,
    minConfidence: options.minConfidence ?? defaults.minConfidence,
    verbose: options.verbose ?? false,
  };

  assertUnitInterval('alpha', resolved.alpha);
  assertUnitInterval('convergenceThreshold', resolved.convergenceThreshold);
  assertUnitInterval('probabilityThreshold', resolved.probabilityThreshold);
  assertUnitInterval('minConfidence', resolved.minConfidence);
  assertPositiveInteger('maxTextLength', resolved.maxTextLength);
  assertPositiveInteger('trials', resolved.trials);
  assertPositiveInteger('iterationLimit', resolved.iterationLimit);
  const { seed } = resolved;
  if (seed !== null && !(Number.isInteger(seed) && seed >= 0 && seed <= MAX_SEED)) {
    throw new RangeError(`seed must be an unsigned 32-bit integer, got ${seed}`);
  }
  if (resolved.priorityMap) assertPriorityMap(resolved.priorityMap);

  return resolved;
}

/**
 * Scale a vector in place to sum to 1 and return its largest entry.
 * Returns -1 and leaves the vector alone when the sum is unusable.
 */
function normalizeInPlace(prob: Float64Array): number {
  let sum = 0;
  for (let i = 0; i < prob.length; i++) sum += prob[i];
  if (!(sum > 0) || !Number.isFinite(sum)) return -1;

  let max = 0;
  for (let i = 0; i < prob.length; i++) {
    prob[i] /= sum;
    if (prob[i] > max) max = prob[i];
  }
  return max;
}

export class Detector {
  private readonly table: ProbabilityTable;
  private options: ResolvedOptions;
  private text = '';
  private cached: Float64Array | null = null;
  private truncatedInput = false;

  constructor(table: ProbabilityTable, options: DetectorOptions = {}) {
    this.table = table;
    this.options = resolveOptions(options);
  }

  get state(): DetectorState {
    if (this.cached) return 'estimated';
    return this.text.length > 0 ? 'accumulating' : 'fresh';
  }

  /** Languages of the underlying table, in column order */
  get languages(): readonly string[] {
    return this.table.languages;
  }

  /** Normalized text accumulated so far */
  get normalizedText(): string {
    return this.text;
  }

  /** True once input was dropped for exceeding maxTextLength */
  get truncated(): boolean {
    return this.truncatedInput;
  }

  setAlpha(alpha: number): void {
    this.reconfigure({ alpha });
  }

  setMaxTextLength(maxTextLength: number): void {
    this.reconfigure({ maxTextLength });
  }

  setPriorityMap(priorityMap: PriorityMap | undefined): void {
    this.reconfigure({ priorityMap });
  }

  setSeed(seed: number | undefined): void {
    this.reconfigure({ seed });
  }

  setVerbose(verbose: boolean): void {
    this.options = { ...this.options, verbose };
    this.cached = null;
  }

  /**
   * Add text to the session. Normalized input beyond maxTextLength UTF-16
   * code units is dropped, never splitting a surrogate pair.
   */
  append(text: string): this {
    this.cached = null;

    const room = this.options.maxTextLength - this.text.length;
    if (room <= 0) {
      this.markTruncated();
      return this;
    }

    let chunk = normalizeText(text, this.text);
    if (chunk.length > room) {
      chunk = chunk.slice(0, room);
      // Do not keep half of a surrogate pair
      const lastCode = chunk.charCodeAt(chunk.length - 1);
      if (lastCode >= 0xd800 && lastCode <= 0xdbff) chunk = chunk.slice(0, -1);
      this.markTruncated();
    }
    this.text += chunk;
    return this;
  }

  /**
   * Most probable language, or UNKNOWN_LANGUAGE when there is no evidence
   * or the best candidate is not above minConfidence
   */
  detect(): string {
    const [top] = this.getProbabilities();
    if (top && top.probability > this.options.minConfidence) {
      return top.lang;
    }
    return UNKNOWN_LANGUAGE;
  }

  /**
   * Languages above probabilityThreshold, most probable first; ties keep
   * column order. In replace mode every mapped language the table knows is
   * reported, whatever its probability.
   */
  getProbabilities(): LanguageProbability[] {
    const prob = this.estimate();
    if (!prob.some((p) => p > 0)) return [];

    const threshold = this.options.probabilityThreshold;
    const map = this.options.priorityMap;
    const mapped = (lang: string) =>
      map?.mode === 'replace' && Object.prototype.hasOwnProperty.call(map.weights, lang);
    const result: LanguageProbability[] = [];

    this.table.languages.forEach((lang, i) => {
      if (prob[i] > threshold || mapped(lang)) result.push({ lang, probability: prob[i] });
    });
    // Array#sort is stable, so equal probabilities stay in column order
    return result.sort((a, b) => b.probability - a.probability);
  }

  /**
   * Probability of every language in column order (all zero without evidence)
   */
  getDistribution(): number[] {
    return Array.from(this.estimate());
  }

  private reconfigure(patch: DetectorOptions): void {
    const current: DetectorOptions = {
      ...this.options,
      priorityMap: this.options.priorityMap ?? undefined,
      seed: this.options.seed ?? undefined,
    };
    this.options = resolveOptions({ ...current, ...patch });
    this.cached = null;
  }

  private markTruncated(): void {
    if (!this.truncatedInput) {
      log.debug(`Input truncated at ${this.options.maxTextLength} code units`);
    }
    this.truncatedInput = true;
  }

  private estimate(): Float64Array {
    if (!this.cached) {
      this.cached = this.computeDistribution();
    }
    return this.cached;
  }

  /**
   * Observed grams that have a table row, repeated per occurrence, in
   * first-seen order
   */
  private collectEvidence(): string[] {
    const text = cleanLatinMinority(this.text);
    const evidence: string[] = [];
    for (const [gram, count] of countNGrams(text)) {
      if (!this.table.rows.has(gram)) continue;
      for (let k = 0; k < count; k++) evidence.push(gram);
    }
    return evidence;
  }

  private computeDistribution(): Float64Array {
    const n = this.table.languages.length;
    const evidence = this.collectEvidence();
    const result = new Float64Array(n);
    if (evidence.length === 0 || n === 0) {
      return result;
    }

    const { trials, seed, verbose } = this.options;
    const random = new Random(seed ?? Random.entropySeed());

    for (let t = 0; t < trials; t++) {
      const alpha = Math.min(1, Math.max(0, this.options.alpha + random.jitter(CONFIG.detection.alphaWidth)));
      const order = random.shuffle(evidence.slice());
      const prob = this.runTrial(order, alpha);

      if (verbose) {
        log.debug(`Trial ${t + 1}/${trials} (alpha ${alpha.toFixed(4)})`, this.describe(prob));
      }
      for (let i = 0; i < n; i++) {
        result[i] += prob[i] / trials;
      }
    }

    return this.applyPriority(result);
  }

  /**
   * One randomized pass of smoothed Bayesian updates from a uniform prior
   */
  private runTrial(grams: readonly string[], alpha: number): Float64Array {
    const n = this.table.languages.length;
    const prob = new Float64Array(n).fill(1 / n);
    const next = new Float64Array(n);
    const uniform = alpha / n;
    const limit = Math.min(grams.length, this.options.iterationLimit);

    for (let k = 0; k < limit; k++) {
      const row = this.table.rows.get(grams[k]);
      if (!row) continue;

      for (let i = 0; i < n; i++) {
        const p = i < row.length ? row[i] : 0;
        next[i] = prob[i] * ((1 - alpha) * p + uniform);
      }
      // A zero or overflowing sum would destroy the prior; skip that gram
      const max = normalizeInPlace(next);
      if (max < 0) continue;
      prob.set(next);

      if (max > this.options.convergenceThreshold) break;
    }
    return prob;
  }

  private applyPriority(prob: Float64Array): Float64Array {
    const map = this.options.priorityMap;
    if (!map) return prob;

    const languages = this.table.languages;
    for (const lang of Object.keys(map.weights)) {
      if (!languages.includes(lang)) {
        log.warn(`Priority map names unknown language ${lang}`);
      }
    }

    if (map.mode === 'replace') {
      const keep = languages.map((lang) => Object.prototype.hasOwnProperty.call(map.weights, lang));
      const restricted = prob.map((p, i) => (keep[i] ? p : 0));
      if (normalizeInPlace(restricted) < 0) {
        const count = keep.filter(Boolean).length;
        return restricted.map((_, i) => (keep[i] && count > 0 ? 1 / count : 0));
      }
      return restricted;
    }

    const boosted = prob.map((p, i) => p + (map.weights[languages[i]] ?? 0));
    normalizeInPlace(boosted);
    return boosted;
  }

  private describe(prob: Float64Array): string {
    return this.table.languages
      .map((lang, i) => ({ lang, p: prob[i] }))
      .filter(({ p }) => p > this.options.probabilityThreshold)
      .map(({ lang, p }) => `${getLanguageName(lang)}:${p.toFixed(5)}`)
      .join(' ');
  }
}
