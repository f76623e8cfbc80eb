import fs from 'node:fs';
import { z } from 'zod';
import type {
  ClassifiableRequest,
  ComplexityScore,
  FeatureKey,
  FeatureScores,
  FeatureWeights,
} from './types.js';
import {
  scoreLength,
  scoreCodePresence,
  scoreStructuredOutput,
  scoreReasoningMarkers,
  scoreSimpleIndicators,
  scoreExplicitHint,
} from './dimensions.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('classifier');

export const DEFAULT_WEIGHTS: FeatureWeights = {
  length: 0.20,
  codePresence: 0.25,
  structuredOutput: 0.15,
  reasoningMarkers: 0.30,
  simpleIndicators: -0.20,
  explicitHint: 0.40,
};

const FEATURE_KEYS: FeatureKey[] = [
  'length', 'codePresence', 'structuredOutput',
  'reasoningMarkers', 'simpleIndicators', 'explicitHint',
];

const weightsSchema = z.object({
  length: z.number(),
  codePresence: z.number(),
  structuredOutput: z.number(),
  reasoningMarkers: z.number(),
  simpleIndicators: z.number(),
  explicitHint: z.number(),
});

export function loadWeights(weightsPath: string): FeatureWeights {
  if (!weightsPath || !fs.existsSync(weightsPath)) {
    return { ...DEFAULT_WEIGHTS };
  }
  const raw: unknown = JSON.parse(fs.readFileSync(weightsPath, 'utf-8'));
  return weightsSchema.parse(raw);
}

function zeroFeatures(): FeatureScores {
  return {
    length: 0,
    codePresence: 0,
    structuredOutput: 0,
    reasoningMarkers: 0,
    simpleIndicators: 0,
    explicitHint: 0,
  };
}

function minimumScore(reason: string): ComplexityScore {
  log.debug(`Classification degraded, using minimum score: ${reason}`);
  return { value: 0, features: zeroFeatures(), degraded: true };
}

/**
 * Scores how demanding a request is. Pure and deterministic: the same
 * prompt and hint always give the same score. Never throws; anything it
 * cannot make sense of is treated as the simplest possible request so
 * routing can still proceed.
 */
export function scoreRequest(request: ClassifiableRequest, weights: FeatureWeights): ComplexityScore {
  if (typeof request.prompt !== 'string') {
    return minimumScore(`prompt is ${typeof request.prompt}`);
  }

  try {
    const text = request.prompt;
    const features: FeatureScores = {
      length: scoreLength(text),
      codePresence: scoreCodePresence(text),
      structuredOutput: scoreStructuredOutput(text),
      reasoningMarkers: scoreReasoningMarkers(text),
      simpleIndicators: scoreSimpleIndicators(text),
      explicitHint: scoreExplicitHint(request.complexityHint),
    };

    let composite = 0;
    for (const key of FEATURE_KEYS) {
      composite += features[key] * weights[key];
    }

    if (!Number.isFinite(composite)) {
      return minimumScore('non-finite composite');
    }

    return {
      value: Math.max(0, Math.min(1, composite)),
      features,
      degraded: false,
    };
  } catch (err) {
    return minimumScore(err instanceof Error ? err.message : String(err));
  }
}
