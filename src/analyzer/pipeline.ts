import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { glob } from 'glob';
import { analyzeSource, type AnalysisResult, type FrozenReport } from './report.js';
import { writeOutput } from './output.js';
import { createDefaultRegistry } from './patterns/probes.js';
import type { PatternRegistry } from './patterns/registry.js';
import type { UnsupportedConstructWarning } from './errors.js';
import type { EngineConfig, ResolvedConfig } from './types.js';

export interface FileAnalysis {
  /** Path relative to the project root */
  file: string;
  outputPath: string;
  report: FrozenReport;
  warnings: readonly UnsupportedConstructWarning[];
}

export interface FileFailure {
  file: string;
  error: Error;
}

export interface BatchResult {
  analyzed: FileAnalysis[];
  failed: FileFailure[];
  analysisTimeMs: number;
}

/** Read and analyze one file */
export function analyzeFile(
  filePath: string,
  engine: EngineConfig,
  registry?: PatternRegistry
): AnalysisResult {
  const text = readFileSync(filePath, 'utf-8');
  return analyzeSource(text, engine, registry);
}

/** Get resolved file paths matching include/exclude patterns, sorted */
export async function resolveFiles(config: ResolvedConfig): Promise<string[]> {
  const included: string[] = [];

  for (const pattern of config.include) {
    const matches = await glob(pattern, {
      cwd: config.projectRoot,
      absolute: false,
      ignore: config.exclude,
      nodir: true,
      posix: true,
    });
    included.push(...matches);
  }

  // Deduplicate
  return [...new Set(included)].sort();
}

/** Where the report of a project-relative source file is written */
export function reportPathFor(config: ResolvedConfig, file: string): string {
  return resolve(config.projectRoot, config.outDir, `${file}.json`);
}

/**
 * Analyze every matching file one after the other and write a report per file.
 * A failing file is recorded and the batch carries on.
 */
export async function runBatch(
  config: ResolvedConfig,
  registry: PatternRegistry = createDefaultRegistry()
): Promise<BatchResult> {
  const startTime = Date.now();
  const files = await resolveFiles(config);
  const analyzed: FileAnalysis[] = [];
  const failed: FileFailure[] = [];

  for (const file of files) {
    try {
      const { report, warnings } = analyzeFile(resolve(config.projectRoot, file), config.engine, registry);
      const outputPath = reportPathFor(config, file);
      writeOutput(report, outputPath);
      analyzed.push({ file, outputPath, report, warnings });
    } catch (err) {
      failed.push({ file, error: err instanceof Error ? err : new Error(String(err)) });
    }
  }

  return { analyzed, failed, analysisTimeMs: Date.now() - startTime };
}
