import { round4, toUnitInterval, sum, average, ratio } from './math.js';
import type {
  ComplexityScore,
  DominantNamingConvention,
  EntityInventory,
  NamingConvention,
  QualityMetrics,
  QualityOptions,
} from './types.js';

// Disjoint by construction: snake has no capitals, camel needs one after a
// lowercase start, Pascal starts upper.
const NAMING_PATTERNS: ReadonlyArray<[NamingConvention, RegExp]> = [
  ['snake_case', /^[a-z][a-z0-9]*(?:_[a-z0-9]+)*$/],
  ['camelCase', /^[a-z][a-z0-9]*(?:[A-Z][a-z0-9]*)+$/],
  ['PascalCase', /^[A-Z][a-zA-Z0-9]*$/],
];

/** Convention a single name follows; dunder and private underscores are ignored */
export function classifyName(name: string): NamingConvention | null {
  const core = name.replace(/^_+|_+$/g, '');
  for (const [convention, pattern] of NAMING_PATTERNS) {
    if (pattern.test(core)) return convention;
  }
  return null;
}

export interface NamingSummary {
  consistency: number;
  dominant: DominantNamingConvention;
}

/** Share of names following the most common convention, ties going to the first seen */
export function summarizeNaming(names: readonly string[], mixedThreshold: number): NamingSummary {
  const counts = new Map<NamingConvention, number>();
  for (const name of names) {
    const convention = classifyName(name);
    if (convention) counts.set(convention, (counts.get(convention) ?? 0) + 1);
  }

  let dominant: NamingConvention | null = null;
  let best = 0;
  for (const [convention, count] of counts) {
    if (count > best) {
      dominant = convention;
      best = count;
    }
  }

  const consistency = ratio(best, names.length);
  if (dominant === null || consistency < mixedThreshold) {
    return { consistency, dominant: 'mixed' };
  }
  return { consistency, dominant };
}

/** Documentation, naming, size and complexity figures blended into one [0, 1] score */
export function scoreQuality(
  inventory: EntityInventory,
  scores: ReadonlyMap<string, ComplexityScore>,
  options: QualityOptions
): QualityMetrics {
  const callables = inventory.callables;
  const callableScores = callables.flatMap(entity => {
    const score = scores.get(entity.id);
    return score ? [score] : [];
  });

  const docstringCoverage = ratio(callables.filter(entity => entity.hasDocstring).length, callables.length);
  const naming = summarizeNaming(callables.map(entity => entity.name), options.mixedNamingThreshold);
  const averageLength = average(callableScores.map(score => score.lines));
  const complexityRatio =
    ratio(sum(callableScores.map(score => score.cyclomatic)), callables.length) * options.complexityRatioScale;

  const overall = blendQuality(
    {
      docstringCoverage,
      namingConsistency: naming.consistency,
      averageFunctionLength: averageLength,
      complexityRatio,
    },
    options
  );

  return {
    docstring_coverage: round4(docstringCoverage),
    naming_consistency: round4(naming.consistency),
    average_function_length: round4(averageLength),
    complexity_ratio: round4(complexityRatio),
    overall_quality: round4(overall),
    dominant_naming_convention: naming.dominant,
  };
}

export interface QualityInputs {
  docstringCoverage: number;
  namingConsistency: number;
  averageFunctionLength: number;
  complexityRatio: number;
}

/**
 * Weighted mean of the four component scores. Non-decreasing in coverage and
 * consistency, non-increasing in length and complexity ratio.
 */
export function blendQuality(inputs: QualityInputs, options: QualityOptions): number {
  const { weights } = options;
  const lengthScore = decayAbove(inputs.averageFunctionLength, options.functionLengthThreshold);
  const complexityScore = decayAbove(inputs.complexityRatio, options.complexityRatioThreshold);

  const weightTotal = weights.docstring + weights.naming + weights.functionLength + weights.complexity;
  const weighted =
    weights.docstring * toUnitInterval(inputs.docstringCoverage) +
    weights.naming * toUnitInterval(inputs.namingConsistency) +
    weights.functionLength * lengthScore +
    weights.complexity * complexityScore;

  return toUnitInterval(ratio(weighted, weightTotal));
}

/** 1 up to the threshold, threshold / value beyond it */
function decayAbove(value: number, threshold: number): number {
  return value <= threshold ? 1 : toUnitInterval(threshold / value);
}
