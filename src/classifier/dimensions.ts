const LENGTH_SATURATION_WORDS = 150;

const CODE_MARKERS: RegExp[] = [
  /\bfunction\b/,
  /\bdef\s+\w+\s*\(/,
  /\bclass\s+[A-Z]\w*/,
  /\bimport\s+[\w{]/,
  /\breturn\b/,
  /=>/,
  /\b(const|let|var)\s+\w+\s*=/,
  /;\s*$/m,
];

const STRUCTURED_MARKERS: RegExp[] = [
  /\bjson\b/i,
  /\bya?ml\b/i,
  /\bxml\b/i,
  /\bcsv\b/i,
  /\btable\b/i,
  /\bschema\b/i,
  /\bformat(ted)?\s+as\b/i,
];

const REASONING_KEYWORDS: RegExp[] = [
  /\banaly[sz]e\b/i,
  /\barchitecture\b/i,
  /\balgorithm\b/i,
  /\bstrategy\b/i,
  /\bdesign\b/i,
  /\bimplement\b/i,
  /\boptimi[sz]ation\b/i,
  /\bintegration\b/i,
  /\bframework\b/i,
  /\btechnical\b/i,
  /\bdetailed\b/i,
  /\bstep[- ]by[- ]step\b/i,
];

const SIMPLE_INDICATORS: RegExp[] = [
  /^\s*(hello|hi|hey)\b/i,
  /\bthanks?\b/i,
  /\bwhat is\b/i,
  /\bquick\b/i,
  /\bsimple\b/i,
  /\bbasic\b/i,
];

const HINT_VALUES: Record<string, number> = {
  low: 0,
  medium: 0.5,
  high: 1,
};

function countMatches(text: string, patterns: RegExp[]): number {
  return patterns.reduce((n, p) => (p.test(text) ? n + 1 : n), 0);
}

function saturate(hits: number, divisor: number): number {
  return Math.min(1, hits / divisor);
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length;
}

export function scoreLength(text: string): number {
  return saturate(countWords(text), LENGTH_SATURATION_WORDS);
}

export function scoreCodePresence(text: string): number {
  if (/```/.test(text)) return 1;
  return saturate(countMatches(text, CODE_MARKERS), 4);
}

export function scoreStructuredOutput(text: string): number {
  return saturate(countMatches(text, STRUCTURED_MARKERS), 2);
}

export function scoreReasoningMarkers(text: string): number {
  return saturate(countMatches(text, REASONING_KEYWORDS), 3);
}

export function scoreSimpleIndicators(text: string): number {
  return saturate(countMatches(text, SIMPLE_INDICATORS), 2);
}

/** Unknown or malformed hints count as no hint. */
export function scoreExplicitHint(hint: unknown): number {
  if (typeof hint === 'number') {
    return Number.isFinite(hint) ? Math.max(0, Math.min(1, hint)) : 0;
  }
  if (typeof hint === 'string') {
    return HINT_VALUES[hint.trim().toLowerCase()] ?? 0;
  }
  return 0;
}
