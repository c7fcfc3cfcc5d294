import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Detector, UNKNOWN_LANGUAGE } from './detector';
import { ProfileRegistry } from './registry';
import type { DetectorOptions, ProbabilityTable, ProfileRecord } from './types';

const profile = (name: string, freq: Record<string, number>): ProfileRecord => ({
  name,
  freq,
  totals: [10, 10, 10],
});

function buildTable(records: ProfileRecord[]): ProbabilityTable {
  const registry = new ProfileRegistry('detector-test');
  registry.loadFromRecords(records);
  return registry.snapshot();
}

// 'a' favours xa strongly, xc weakly and xb not at all
const SKEWED = buildTable([
  profile('xa', { a: 8, b: 2 }),
  profile('xb', { b: 8, c: 2 }),
  profile('xc', { c: 8, a: 2 }),
]);

// 'e' is equally likely everywhere
const FLAT = buildTable([
  profile('ya', { e: 1, a: 1 }),
  profile('yb', { e: 1, b: 1 }),
  profile('yc', { e: 1, c: 1 }),
]);

const sum = (values: number[]) => values.reduce((total, v) => total + v, 0);

describe('Detector', () => {
  describe('without evidence', () => {
    it('reports unknown for a fresh session', () => {
      const detector = new Detector(SKEWED);

      expect(detector.state).toBe('fresh');
      expect(detector.detect()).toBe(UNKNOWN_LANGUAGE);
      expect(detector.getProbabilities()).toEqual([]);
      expect(detector.getDistribution()).toEqual([0, 0, 0]);
    });

    it('reports unknown for text without letters', () => {
      const detector = new Detector(SKEWED).append('12345 !!! ???');
      expect(detector.normalizedText).toBe('');
      expect(detector.detect()).toBe('unknown');
    });

    it('reports unknown when no gram is in the table', () => {
      const detector = new Detector(SKEWED).append('zzz');
      expect(detector.getProbabilities()).toEqual([]);
      expect(detector.detect()).toBe('unknown');
    });
  });

  describe('estimation', () => {
    it('ranks languages by the evidence', () => {
      const detector = new Detector(SKEWED, { probabilityThreshold: 0 }).append('a a a a');
      const result = detector.getProbabilities();

      expect(result.map((r) => r.lang)).toEqual(['xa', 'xc', 'xb']);
      expect(result[0].probability).toBeGreaterThan(0.9);
      expect(sum(result.map((r) => r.probability))).toBeCloseTo(1, 10);
    });

    it('drops languages at or below the probability threshold', () => {
      const detector = new Detector(SKEWED).append('a a a a');

      expect(detector.getProbabilities().map((r) => r.lang)).toEqual(['xa']);
      expect(detector.detect()).toBe('xa');
    });

    it('returns a full distribution in column order', () => {
      const distribution = new Detector(SKEWED).append('a a a a').getDistribution();

      expect(distribution).toHaveLength(3);
      expect(sum(distribution)).toBeCloseTo(1, 10);
      expect(distribution[0]).toBeGreaterThan(distribution[2]);
      expect(distribution[2]).toBeGreaterThan(distribution[1]);
    });

    it('keeps column order for equal probabilities', () => {
      const result = new Detector(FLAT).append('eee').getProbabilities();

      expect(result.map((r) => r.lang)).toEqual(['ya', 'yb', 'yc']);
      expect(result[0].probability).toBe(result[1].probability);
      expect(result[1].probability).toBe(result[2].probability);
      expect(result[0].probability).toBeCloseTo(1 / 3, 10);
    });

    it('only names a language above minConfidence', () => {
      expect(new Detector(FLAT).append('eee').detect()).toBe('unknown');
      expect(new Detector(FLAT, { minConfidence: 0.3 }).append('eee').detect()).toBe('ya');
    });

    it('is reproducible with a seed', () => {
      const text = 'a b a c a b';
      const first = new Detector(SKEWED, { seed: 5 }).append(text).getDistribution();
      const second = new Detector(SKEWED, { seed: 5 }).append(text).getDistribution();

      expect(second).toEqual(first);
    });

    it('caches the estimate until the input changes', () => {
      const detector = new Detector(SKEWED).append('a b c a');
      const first = detector.getDistribution();

      expect(detector.getDistribution()).toEqual(first);
      expect(detector.state).toBe('estimated');
    });

    it('stops each trial at the iteration limit', () => {
      const limited = new Detector(SKEWED, { iterationLimit: 1 }).append('a a a a');
      const full = new Detector(SKEWED).append('a a a a');

      // One update from a uniform prior leaves xa at (1 - alpha) * 0.8 + alpha / 3
      expect(limited.getDistribution()[0]).toBeLessThan(0.7);
      expect(full.getDistribution()[0]).toBeGreaterThan(0.9);
    });

    it('stops each trial once a language passes the convergence threshold', () => {
      const detector = new Detector(SKEWED, { convergenceThreshold: 0.5 }).append('a a a a');
      expect(detector.getDistribution()[0]).toBeLessThan(0.7);
    });

    it('ignores Latin letters in text dominated by another script', () => {
      const table = buildTable([profile('ru', { д: 5, о: 5 }), profile('en', { d: 5, o: 5 })]);
      const detector = new Detector(table, { seed: 3 }).append('додо до дом do');

      expect(detector.detect()).toBe('ru');
      expect(detector.getDistribution()[0]).toBeGreaterThan(0.99);
    });
  });

  describe('priority map', () => {
    it('restricts results to the mapped languages in replace mode', () => {
      const detector = new Detector(SKEWED, {
        probabilityThreshold: 0,
        priorityMap: { weights: { xb: 1, xc: 1 }, mode: 'replace' },
      }).append('a a a a');

      const result = detector.getProbabilities();
      expect(result.map((r) => r.lang)).toEqual(['xc', 'xb']);
      expect(sum(result.map((r) => r.probability))).toBeCloseTo(1, 10);
      expect(detector.getDistribution()[0]).toBe(0);
    });

    it('reports every mapped language in replace mode, even below the threshold', () => {
      const detector = new Detector(SKEWED, {
        priorityMap: { weights: { xa: 1, xb: 1 }, mode: 'replace' },
      }).append('a a a a');

      const result = detector.getProbabilities();
      expect(result.map((r) => r.lang)).toEqual(['xa', 'xb']);
      expect(result[1].probability).toBeLessThan(0.1);
      expect(detector.detect()).toBe('xa');
    });

    it('reports nothing in replace mode without evidence', () => {
      const detector = new Detector(SKEWED, {
        priorityMap: { weights: { xa: 1, xb: 1 }, mode: 'replace' },
      }).append('zzz');

      expect(detector.getProbabilities()).toEqual([]);
    });

    it('boosts weighted languages in additive mode', () => {
      const text = 'a a a a';
      const plain = new Detector(SKEWED, { probabilityThreshold: 0 }).append(text);
      const boosted = new Detector(SKEWED, {
        probabilityThreshold: 0,
        priorityMap: { weights: { xb: 2 }, mode: 'additive' },
      }).append(text);

      const rank = (detector: Detector) => detector.getProbabilities().findIndex((r) => r.lang === 'xb');
      expect(rank(plain)).toBe(2);
      expect(rank(boosted)).toBe(0);
      expect(sum(boosted.getDistribution())).toBeCloseTo(1, 10);
    });

    it('can be changed after construction', () => {
      const detector = new Detector(SKEWED).append('a a a a');
      expect(detector.detect()).toBe('xa');

      detector.setPriorityMap({ weights: { xb: 1 }, mode: 'replace' });
      expect(detector.detect()).toBe('xb');

      detector.setPriorityMap(undefined);
      expect(detector.detect()).toBe('xa');
    });

    it('warns about languages the table does not have', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

      new Detector(SKEWED, { priorityMap: { weights: { zz: 1 }, mode: 'additive' } })
        .append('a a a a')
        .detect();

      expect(warn).toHaveBeenCalledWith('[Detector]', 'Priority map names unknown language zz');
      warn.mockRestore();
    });
  });

  describe('input handling', () => {
    it('moves between states', () => {
      const detector = new Detector(SKEWED);
      expect(detector.state).toBe('fresh');

      detector.append('a');
      expect(detector.state).toBe('accumulating');

      detector.getProbabilities();
      expect(detector.state).toBe('estimated');

      detector.append('b');
      expect(detector.state).toBe('accumulating');

      detector.getProbabilities();
      detector.setAlpha(0.3);
      expect(detector.state).toBe('accumulating');
    });

    it('continues normalization across appends', () => {
      const detector = new Detector(SKEWED);
      detector.append('Hello ').append(' World');
      expect(detector.normalizedText).toBe('hello world');

      detector.append('!!!').append('ooooo');
      expect(detector.normalizedText).toBe('hello world ooo');
    });

    it('drops input beyond maxTextLength', () => {
      const detector = new Detector(SKEWED, { maxTextLength: 5 });

      detector.append('abcdefgh');
      expect(detector.normalizedText).toBe('abcde');
      expect(detector.truncated).toBe(true);

      detector.append('xyz');
      expect(detector.normalizedText).toBe('abcde');
    });

    it('measures maxTextLength in UTF-16 code units', () => {
      const detector = new Detector(SKEWED, { maxTextLength: 4 }).append('𠀋𠀋𠀋');
      expect(detector.normalizedText).toBe('𠀋𠀋');
      expect(detector.normalizedText.length).toBe(4);
    });

    it('does not split a surrogate pair when truncating', () => {
      const detector = new Detector(SKEWED, { maxTextLength: 3 }).append('ab𠀋');
      expect(detector.normalizedText).toBe('ab');
      expect(detector.truncated).toBe(true);
    });

    it('is not truncated when input fits', () => {
      const detector = new Detector(SKEWED, { maxTextLength: 5 }).append('abcde');
      expect(detector.truncated).toBe(false);
    });

    it('applies a smaller maxTextLength to later input only', () => {
      const detector = new Detector(SKEWED).append('abc');
      detector.setMaxTextLength(4);
      detector.append('def');

      expect(detector.normalizedText).toBe('abcd');
    });
  });

  describe('options', () => {
    it.each<[string, DetectorOptions]>([
      ['alpha above 1', { alpha: 1.5 }],
      ['negative alpha', { alpha: -0.1 }],
      ['zero trials', { trials: 0 }],
      ['fractional iteration limit', { iterationLimit: 2.5 }],
      ['zero maxTextLength', { maxTextLength: 0 }],
      ['fractional seed', { seed: 1.5 }],
      ['negative seed', { seed: -1 }],
      ['seed beyond 32 bits', { seed: 2 ** 32 + 1 }],
      ['threshold above 1', { probabilityThreshold: 2 }],
      ['negative priority weight', { priorityMap: { weights: { xa: -1 }, mode: 'additive' } }],
    ])('rejects %s', (_label, options) => {
      expect(() => new Detector(SKEWED, options)).toThrow(RangeError);
    });

    it('validates setters and keeps the previous options on failure', () => {
      const detector = new Detector(SKEWED, { seed: 9 }).append('a a a a');
      const before = detector.getDistribution();

      expect(() => detector.setAlpha(2)).toThrow(RangeError);
      expect(detector.getDistribution()).toEqual(before);
    });

    it('uses a new seed for later estimates', () => {
      const text = 'a b c a b c a';
      const reference = new Detector(SKEWED, { seed: 21 }).append(text).getDistribution();

      const detector = new Detector(SKEWED, { seed: 4 }).append(text);
      detector.getDistribution();
      detector.setSeed(21);

      expect(detector.getDistribution()).toEqual(reference);
    });
  });

  describe('verbose mode', () => {
    beforeEach(() => {
      vi.stubEnv('LANGID_LOG_LEVEL', 'debug');
    });

    afterEach(() => {
      vi.unstubAllEnvs();
      vi.restoreAllMocks();
    });

    it('logs every trial', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      const detector = new Detector(SKEWED, { trials: 3, verbose: true }).append('a a a a');

      detector.getDistribution();

      const trialLines = log.mock.calls.filter(([, msg]) => typeof msg === 'string' && msg.startsWith('Trial '));
      expect(trialLines).toHaveLength(3);
      expect(trialLines[0][0]).toBe('[Detector]');
      expect(trialLines[0][1]).toMatch(/^Trial 1\/3 \(alpha 0\.\d{4}\)$/);
    });

    it('logs trials when verbose is switched on after an estimate', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      const detector = new Detector(SKEWED, { trials: 2 }).append('a a a a');
      detector.detect();

      detector.setVerbose(true);
      detector.detect();

      const trialLines = log.mock.calls.filter(([, msg]) => typeof msg === 'string' && msg.startsWith('Trial '));
      expect(trialLines).toHaveLength(2);
    });

    it('stays quiet when not verbose', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      new Detector(SKEWED, { trials: 3 }).append('a a a a').getDistribution();

      expect(log.mock.calls.some(([, msg]) => typeof msg === 'string' && msg.startsWith('Trial '))).toBe(false);
    });
  });
});
