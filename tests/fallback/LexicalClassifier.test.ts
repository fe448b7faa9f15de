import { describe, it, expect } from 'vitest';
import {
  EMPTY_TEXT_CONFIDENCE,
  FALLBACK_CONFIDENCE,
  LexicalClassifier,
  MAX_LINKS,
} from '../../src/fallback/LexicalClassifier.js';
import { MAX_TEXT_LENGTH } from '../../src/services/FeedbackService.js';
import { compileLexicon } from '../../src/fallback/lexicon.js';
import { CATEGORIES, URGENCIES } from '../../src/types/models.js';

describe('LexicalClassifier', () => {
  const classifier = new LexicalClassifier();

  // --- reference scenarios ---

  it('should classify a gas leak as critical safety', () => {
    const analysis = classifier.analyze(
      'Gas leak on Main Street near the school, very dangerous!!'
    );

    expect(analysis.classification).toEqual({
      category: 'safety',
      urgency: 'critical',
      isSpam: false,
      confidence: FALLBACK_CONFIDENCE,
      source: 'fallback',
    });
    expect(analysis.categoryScores).toEqual({ safety: 5, water: 1 });
    expect(analysis.urgencyScore).toBe(7);
  });

  it('should flag keyboard mash as spam', () => {
    const analysis = classifier.analyze('asdkjf asdkjf');

    expect(analysis.classification).toEqual({
      category: 'other',
      urgency: 'low',
      isSpam: true,
      confidence: FALLBACK_CONFIDENCE,
      source: 'fallback',
    });
    expect(analysis.spamReasons).toHaveLength(2);
  });

  // --- empty input ---

  it.each(['', '   ', '\n\t '])('should return low-confidence other/low for blank text %j', (text) => {
    expect(classifier.classify(text)).toEqual({
      category: 'other',
      urgency: 'low',
      isSpam: false,
      confidence: EMPTY_TEXT_CONFIDENCE,
      source: 'fallback',
    });
  });

  // --- category scoring ---

  it('should pick the highest scoring category', () => {
    const result = classifier.classify('Overflowing bins near the bus stop');
    expect(result.category).toBe('sanitation');
  });

  it('should break ties by category priority order', () => {
    // water: leak (1), traffic: bus (1)
    const analysis = classifier.analyze('Leak near the bus stop every morning');
    expect(analysis.categoryScores).toEqual({ water: 1, traffic: 1 });
    expect(analysis.classification.category).toBe('water');
  });

  it('should break ties with a custom table too', () => {
    const custom = new LexicalClassifier(
      compileLexicon({
        categories: { sanitation: { bins: 1 }, safety: { fence: 1 } },
        urgency: {},
        priorityBoost: [],
        spamPatterns: [],
      })
    );
    expect(custom.classify('Broken fence next to the bins').category).toBe('safety');
  });

  it('should fall back to other when nothing matches', () => {
    expect(classifier.classify('The library opening hours changed recently').category).toBe(
      'other'
    );
  });

  // --- urgency ---

  it('should map a single severity term to medium', () => {
    const result = classifier.classify('The streetlight on my road is broken');
    expect(result).toMatchObject({ category: 'infrastructure', urgency: 'medium' });
  });

  it('should add intensity for exclamation runs and shouting', () => {
    const analysis = classifier.analyze('The streetlight is broken!! PLEASE fix it');
    // broken (2) + "!!" (1) + PLEASE (1)
    expect(analysis.urgencyScore).toBe(4);
    expect(analysis.classification.urgency).toBe('high');
  });

  // --- spam rules ---

  it('should flag very short text', () => {
    expect(classifier.analyze('Hi!').spamReasons).toEqual(['too short (3 characters)']);
  });

  it('should flag text without letters', () => {
    expect(classifier.analyze('1234567890 555').spamReasons).toEqual(['no letters']);
  });

  it('should flag excessive punctuation', () => {
    expect(classifier.analyze('Water leak??? !!! ??? !!!').spamReasons).toEqual([
      'excessive punctuation',
    ]);
  });

  it('should flag commercial bait', () => {
    const analysis = classifier.analyze('Click here to claim free money now');
    expect(analysis.classification.isSpam).toBe(true);
    expect(analysis.spamReasons).toHaveLength(1);
    expect(analysis.spamReasons[0]).toMatch(/^matches denylist pattern /);
  });

  it('should flag text with too many links', () => {
    const analysis = classifier.analyze(
      'Report at http://a.example/x http://b.example/y https://c.example/z please'
    );
    expect(MAX_LINKS).toBe(3);
    expect(analysis.spamReasons).toEqual(['too many links (3)']);
  });

  it('should not flag two links', () => {
    const analysis = classifier.analyze(
      'Pothole photos at http://a.example/x and https://b.example/y'
    );
    expect(analysis.spamReasons).toEqual([]);
  });

  it('should classify a maximum-length text with two long links quickly', () => {
    const prefix =
      'Broken streetlight, see http://example.org/' +
      'a'.repeat(1600) +
      ' and http://example.org/' +
      'b'.repeat(1600) +
      ' ';
    const text = prefix + 'x'.repeat(MAX_TEXT_LENGTH - prefix.length);
    expect(text).toHaveLength(MAX_TEXT_LENGTH);

    const started = performance.now();
    const analysis = classifier.analyze(text);
    const elapsed = performance.now() - started;

    expect(analysis.spamReasons).toEqual(['matches denylist pattern ([a-z])\\1{5,}']);
    expect(elapsed).toBeLessThan(500);
  });

  it('should not flag an ordinary report', () => {
    expect(classifier.analyze('Leak near the bus stop every morning').spamReasons).toEqual([]);
  });

  // --- invariants ---

  it('should be deterministic', () => {
    const text = 'No water in the whole building for three days, urgent';
    expect(classifier.classify(text)).toEqual(classifier.classify(text));
    expect(new LexicalClassifier().classify(text)).toEqual(classifier.classify(text));
  });

  it('should always return members of the closed enumerations', () => {
    const inputs = [
      'x',
      '!!!!!!!!!!!!!!',
      'FIRE FIRE FIRE',
      'Pothole. Garbage. Power outage. Burst pipe. Robbery.',
      'ünïcödé téxt wïth äccents only',
      'a'.repeat(5000),
    ];

    for (const text of inputs) {
      const result = classifier.classify(text);
      expect(CATEGORIES).toContain(result.category);
      expect(URGENCIES).toContain(result.urgency);
      expect(result.confidence).toBeGreaterThanOrEqual(0);
      expect(result.confidence).toBeLessThanOrEqual(1);
    }
  });
});
