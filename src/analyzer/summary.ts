import type { FrozenReport } from './report.js';

type Section<K extends keyof FrozenReport> = FrozenReport[K];

export function formatMetricsSummary(metrics: Section<'metrics'>): string {
  return [
    `Total lines of code: ${metrics.total_lines}`,
    `Number of classes: ${metrics.class_count}`,
    `Number of functions: ${metrics.function_count}`,
    `Number of imports: ${metrics.import_count}`,
  ].join('\n');
}

export function formatComplexitySummary(complexity: Section<'complexity'>): string {
  const { overall } = complexity;
  return [
    `Overall cyclomatic complexity: ${overall.total_cyclomatic.toFixed(1)}`,
    `Average function complexity: ${overall.average_cyclomatic.toFixed(1)}`,
  ].join('\n');
}

export function formatQualitySummary(quality: Section<'code_quality'>): string {
  return [
    `Docstring coverage: ${percent(quality.docstring_coverage)}`,
    `Naming consistency: ${percent(quality.naming_consistency)} (${quality.dominant_naming_convention})`,
    `Average function length: ${quality.average_function_length.toFixed(1)} lines`,
    `Complexity ratio: ${quality.complexity_ratio.toFixed(1)}`,
    `Overall quality: ${quality.overall_quality.toFixed(2)}`,
  ].join('\n');
}

/** Human-readable digest of a report, one figure per line */
export function formatSummary(report: FrozenReport): string {
  return [
    formatMetricsSummary(report.metrics),
    formatComplexitySummary(report.complexity),
    formatQualitySummary(report.code_quality),
  ].join('\n');
}

function percent(share: number): string {
  return `${(share * 100).toFixed(1)}%`;
}
