import { describe, it, expect } from 'vitest';
import { DEFAULT_ENGINE_CONFIG } from '@beatflash/config';
import { EventClassifier, isStrictlyIncreasing } from '../EventClassifier.js';
import { RollingHistory } from '../RollingHistory.js';

const historyOf = (...values: number[]): RollingHistory => {
  const history = new RollingHistory(10);
  values.forEach(v => history.push(v));
  return history;
};

describe('EventClassifier', () => {
  const classifier = new EventClassifier(DEFAULT_ENGINE_CONFIG.classifier, 5);
  const flatMid = historyOf(100, 100, 100, 100, 100);

  it('should classify a large bass jump as bass_drop', () => {
    // mean 2000: 6000 > 4000 and > 5000
    expect(classifier.classify(6000, 100, historyOf(1000, 1000, 1000, 1000, 6000), flatMid)).toBe('bass_drop');
  });

  it('should classify a moderate bass jump as rhythm', () => {
    // mean 2400: 4000 < 4800, 4000 > 3600 and > 3000
    expect(classifier.classify(4000, 100, historyOf(2000, 2000, 2000, 2000, 4000), flatMid)).toBe('rhythm');
  });

  it('should prefer bass_drop when rhythm also matches', () => {
    expect(classifier.classify(9000, 100, historyOf(1000, 1000, 1000, 1000, 9000), flatMid)).toBe('bass_drop');
  });

  it('should not call rhythm below its absolute floor', () => {
    // 2900 > 1.5 × mean (1660) but under 3000
    expect(classifier.classify(2900, 100, historyOf(1350, 1350, 1350, 1350, 2900), flatMid)).toBeNull();
  });

  it('should classify a dominant mid jump as vocal', () => {
    const bass = historyOf(1000, 1000, 1000, 1000, 1000);
    // mean 1200: 2000 > 1560 and 2000 > 1200
    expect(classifier.classify(1000, 2000, bass, historyOf(1000, 1000, 1000, 1000, 2000))).toBe('vocal');
  });

  it('should not call vocal when bass dominates', () => {
    const bass = historyOf(1800, 1800, 1800, 1800, 1800);
    expect(classifier.classify(1800, 2000, bass, historyOf(1000, 1000, 1000, 1000, 2000))).toBeNull();
  });

  it('should classify a strictly rising bass history as build', () => {
    expect(classifier.classify(500, 100, historyOf(100, 200, 300, 400, 500), flatMid)).toBe('build');
  });

  it('should not call build on a plateau', () => {
    expect(classifier.classify(400, 100, historyOf(100, 200, 200, 300, 400), flatMid)).toBeNull();
  });

  it('should return null before warm-up', () => {
    expect(classifier.classify(90000, 100, historyOf(1000, 1000, 1000, 90000), historyOf(100, 100, 100, 100))).toBeNull();
  });

  it('should give the same answer for the same inputs', () => {
    const bass = historyOf(1000, 1000, 1000, 1000, 6000);
    const first = classifier.classify(6000, 100, bass, flatMid);

    expect(classifier.classify(6000, 100, bass, flatMid)).toBe(first);
    expect(bass.values()).toEqual([1000, 1000, 1000, 1000, 6000]);
  });

  it('should fall back to the configured kind', () => {
    const fallback = new EventClassifier({ ...DEFAULT_ENGINE_CONFIG.classifier, fallbackKind: 'rhythm' }, 5);
    expect(fallback.classify(1000, 100, historyOf(1000, 1000, 1000, 1000, 1000), flatMid)).toBe('rhythm');
  });
});

describe('isStrictlyIncreasing', () => {
  it('should require enough values', () => {
    expect(isStrictlyIncreasing([1, 2, 3], 5)).toBe(false);
    expect(isStrictlyIncreasing([1, 2, 3, 4, 5], 5)).toBe(true);
  });

  it('should reject equal neighbours', () => {
    expect(isStrictlyIncreasing([1, 2, 2, 3, 4], 5)).toBe(false);
  });
});
