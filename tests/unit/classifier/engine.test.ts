import { describe, it, expect } from 'vitest';
import path from 'node:path';
import { DEFAULT_WEIGHTS, loadWeights, scoreRequest } from '../../../src/classifier/engine.js';
import { scoreExplicitHint, scoreCodePresence, countWords } from '../../../src/classifier/dimensions.js';

const weights = loadWeights(path.resolve('data/classifier-weights.json'));

const COMPLEX_PROMPT =
  'Design a detailed architecture and implement the algorithm step-by-step. Return the result as JSON with a schema.';

describe('loadWeights', () => {
  it('reads the shipped weights file', () => {
    expect(weights).toEqual(DEFAULT_WEIGHTS);
  });

  it('falls back to defaults when the file is missing', () => {
    expect(loadWeights(path.resolve('data/does-not-exist.json'))).toEqual(DEFAULT_WEIGHTS);
  });
});

describe('scoreRequest', () => {
  it('clamps a greeting to zero', () => {
    const result = scoreRequest({ prompt: 'hello there' }, weights);
    expect(result.value).toBe(0);
    expect(result.degraded).toBe(false);
    expect(result.features.simpleIndicators).toBe(0.5);
  });

  it('scores a reasoning-heavy prompt from its features', () => {
    const result = scoreRequest({ prompt: COMPLEX_PROMPT }, weights);
    expect(result.features.reasoningMarkers).toBe(1);
    expect(result.features.structuredOutput).toBe(1);
    expect(result.features.codePresence).toBe(0);
    // 0.30 + 0.15 + (17 / 150) * 0.20
    expect(result.value).toBeCloseTo(0.4727, 3);
  });

  it('is deterministic for the same input', () => {
    const a = scoreRequest({ prompt: COMPLEX_PROMPT, complexityHint: 'medium' }, weights);
    const b = scoreRequest({ prompt: COMPLEX_PROMPT, complexityHint: 'medium' }, weights);
    expect(a).toEqual(b);
  });

  it('adds the explicit hint and clamps to 1', () => {
    const hinted = scoreRequest({ prompt: COMPLEX_PROMPT, complexityHint: 'high' }, weights);
    expect(hinted.value).toBeCloseTo(0.8727, 3);

    const saturated = scoreRequest({ prompt: `${COMPLEX_PROMPT}\n\`\`\`ts\nconst x = 1;\n\`\`\``, complexityHint: 1 }, weights);
    expect(saturated.value).toBe(1);
  });

  it('returns the degraded minimum for a non-string prompt', () => {
    const result = scoreRequest({ prompt: 42 }, weights);
    expect(result).toEqual({
      value: 0,
      degraded: true,
      features: {
        length: 0,
        codePresence: 0,
        structuredOutput: 0,
        reasoningMarkers: 0,
        simpleIndicators: 0,
        explicitHint: 0,
      },
    });
  });

  it('returns the degraded minimum when weights produce a non-finite score', () => {
    const result = scoreRequest({ prompt: 'hello' }, { ...weights, length: Number.NaN });
    expect(result.degraded).toBe(true);
    expect(result.value).toBe(0);
  });

  it('treats an empty prompt as the simplest request', () => {
    const result = scoreRequest({ prompt: '' }, weights);
    expect(result.value).toBe(0);
    expect(result.degraded).toBe(false);
  });
});

describe('dimensions', () => {
  it('maps hint words and clamps numeric hints', () => {
    expect(scoreExplicitHint('low')).toBe(0);
    expect(scoreExplicitHint(' Medium ')).toBe(0.5);
    expect(scoreExplicitHint('high')).toBe(1);
    expect(scoreExplicitHint('urgent')).toBe(0);
    expect(scoreExplicitHint(3)).toBe(1);
    expect(scoreExplicitHint(-1)).toBe(0);
    expect(scoreExplicitHint(Number.POSITIVE_INFINITY)).toBe(0);
    expect(scoreExplicitHint({ level: 'high' })).toBe(0);
  });

  it('saturates code presence on a fenced block', () => {
    expect(scoreCodePresence('see ```x```')).toBe(1);
    expect(scoreCodePresence('const total = items.map(i => i.price);')).toBe(0.75);
  });

  it('counts whitespace-separated words', () => {
    expect(countWords('  one   two\nthree ')).toBe(3);
    expect(countWords('   ')).toBe(0);
  });
});
