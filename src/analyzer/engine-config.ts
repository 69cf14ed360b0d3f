import type { CodeProbeConfig, EngineConfig } from './types.js';

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  complexity: {
    // Flat code scores cognitive = 1.5 x cyclomatic
    flatMultiplier: 1.5,
    // Each enclosing block adds half of a flat decision's cost
    nestingIncrement: 0.5,
  },
  quality: {
    weights: {
      docstring: 0.3,
      naming: 0.2,
      functionLength: 0.2,
      complexity: 0.3,
    },
    // Average callable length (lines) above which the length score decays
    functionLengthThreshold: 30,
    // complexity_ratio = average cyclomatic x scale
    complexityRatioScale: 100,
    // Ratio above which the complexity score decays
    complexityRatioThreshold: 500,
    // Below this share of the dominant convention, naming is reported as "mixed"
    mixedNamingThreshold: 0.5,
  },
};

type EngineOverrides = Pick<CodeProbeConfig, 'complexity' | 'quality'>;

/** Merge partial overrides key by key over the defaults */
export function resolveEngineConfig(
  overrides: EngineOverrides = {},
  base: EngineConfig = DEFAULT_ENGINE_CONFIG
): EngineConfig {
  const quality = overrides.quality ?? {};
  return {
    complexity: { ...base.complexity, ...overrides.complexity },
    quality: {
      ...base.quality,
      ...quality,
      weights: { ...base.quality.weights, ...quality.weights },
    },
  };
}
