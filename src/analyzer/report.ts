import { parsePython } from './python/parser.js';
import { extractEntities } from './entity-extractor.js';
import { analyzeComplexity } from './complexity.js';
import { buildDependencyGraph, toDependencyReport } from './dependency-graph.js';
import { summarizeDataFlow } from './data-flow.js';
import { scoreQuality } from './quality.js';
import { buildProbeContext } from './patterns/context.js';
import { createDefaultRegistry } from './patterns/probes.js';
import type { PatternRegistry } from './patterns/registry.js';
import { DEFAULT_ENGINE_CONFIG } from './engine-config.js';
import type { UnsupportedConstructWarning } from './errors.js';
import type {
  DeepReadonly,
  EngineConfig,
  EntityInventory,
  FileMetrics,
  ParsedSource,
  Report,
} from './types.js';

export type FrozenReport = DeepReadonly<Report>;

export interface AnalysisResult {
  report: FrozenReport;
  warnings: readonly UnsupportedConstructWarning[];
}

/** File-level counts from the raw text and the inventory */
export function computeMetrics(parsed: ParsedSource, inventory: EntityInventory): FileMetrics {
  return {
    total_lines: parsed.lines.length,
    non_empty_lines: parsed.lines.filter(line => line.trim().length > 0).length,
    // Code points, not UTF-16 units
    character_count: Array.from(parsed.text).length,
    import_count: inventory.importCount,
    class_count: inventory.classes.length,
    function_count: inventory.callables.length,
  };
}

/** Place the stage outputs under their report keys and freeze the whole tree */
export function assembleReport(parts: Report): FrozenReport {
  const report: Report = {
    metrics: parts.metrics,
    complexity: parts.complexity,
    dependencies: parts.dependencies,
    algorithms: parts.algorithms,
    data_flow: parts.data_flow,
    code_quality: parts.code_quality,
  };
  deepFreeze(report);
  return report;
}

function deepFreeze(value: object): void {
  for (const child of Object.values(value)) {
    if (typeof child === 'object' && child !== null) {
      deepFreeze(child);
    }
  }
  Object.freeze(value);
}

/**
 * Analyze one Python source text.
 * Throws MalformedSourceError when the text does not parse; nothing is produced then.
 */
export function analyzeSource(
  text: string,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG,
  registry: PatternRegistry = createDefaultRegistry()
): AnalysisResult {
  const parsed = parsePython(text);
  const inventory = extractEntities(parsed);
  const metrics = computeMetrics(parsed, inventory);

  const complexity = analyzeComplexity(inventory, metrics.non_empty_lines, config.complexity);
  const graph = buildDependencyGraph(inventory);
  const algorithms = registry.evaluate(buildProbeContext(parsed, inventory));
  const dataFlow = summarizeDataFlow(inventory, graph);
  const quality = scoreQuality(inventory, complexity.scores, config.quality);

  const report = assembleReport({
    metrics,
    complexity: complexity.report,
    dependencies: toDependencyReport(inventory, graph),
    algorithms,
    data_flow: dataFlow,
    code_quality: quality,
  });

  return { report, warnings: Object.freeze([...complexity.warnings]) };
}
