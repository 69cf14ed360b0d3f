export { analyzeSource, assembleReport, computeMetrics } from './analyzer/report.js';
export type { AnalysisResult, FrozenReport } from './analyzer/report.js';
export { parsePython } from './analyzer/python/parser.js';
export { extractEntities } from './analyzer/entity-extractor.js';
export { analyzeComplexity, scoreCallable } from './analyzer/complexity.js';
export { buildDependencyGraph, toDependencyReport, DependencyGraph } from './analyzer/dependency-graph.js';
export { summarizeDataFlow } from './analyzer/data-flow.js';
export { scoreQuality, blendQuality } from './analyzer/quality.js';
export { PatternRegistry } from './analyzer/patterns/registry.js';
export type { Probe, ProbeDefinition } from './analyzer/patterns/registry.js';
export type { ProbeContext } from './analyzer/patterns/context.js';
export { DEFAULT_PROBES, createDefaultRegistry } from './analyzer/patterns/probes.js';
export { DEFAULT_ENGINE_CONFIG, resolveEngineConfig } from './analyzer/engine-config.js';
export { MalformedSourceError, ConfigError } from './analyzer/errors.js';
export type { UnsupportedConstructWarning } from './analyzer/errors.js';
export { analyzeFile, runBatch } from './analyzer/pipeline.js';
export { serializeReport, writeOutput } from './analyzer/output.js';
export { formatSummary } from './analyzer/summary.js';
export { resolveConfig } from './cli/config.js';
export type * from './analyzer/types.js';
