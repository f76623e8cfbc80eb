export type FeatureKey =
  | 'length'
  | 'codePresence'
  | 'structuredOutput'
  | 'reasoningMarkers'
  | 'simpleIndicators'
  | 'explicitHint';

export type FeatureScores = Record<FeatureKey, number>;
export type FeatureWeights = Record<FeatureKey, number>;

export type ComplexityHint = 'low' | 'medium' | 'high' | number;

/** The parts of a request the classifier looks at. */
export interface ClassifiableRequest {
  prompt: unknown;
  complexityHint?: unknown;
}

export interface ComplexityScore {
  /** Composite score in [0, 1]. */
  value: number;
  /** Raw feature values before weighting. */
  features: FeatureScores;
  /** True when scoring fell back to the minimum score. */
  degraded: boolean;
}
