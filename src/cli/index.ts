import { Command } from 'commander';
import { resolve, relative } from 'node:path';
import { resolveConfig } from './config.js';
import { startWatcher } from './watch.js';
import { analyzeFile, runBatch } from '../analyzer/pipeline.js';
import { serializeReport, writeOutput } from '../analyzer/output.js';
import { formatSummary } from '../analyzer/summary.js';
import type { UnsupportedConstructWarning } from '../analyzer/errors.js';
import type { ResolvedConfig } from '../analyzer/types.js';

interface CommonOptions {
  config?: string;
  root: string;
}

interface AnalyzeOptions extends CommonOptions {
  output?: string;
  stdout?: boolean;
  watch?: boolean;
}

interface BatchOptions extends CommonOptions {
  include?: string[];
  exclude?: string[];
  outDir?: string;
}

function reportWarnings(warnings: readonly UnsupportedConstructWarning[]): void {
  for (const warning of warnings) {
    console.warn(`Warning: ${warning.message}`);
  }
}

function fail(err: unknown): void {
  console.error('Analysis failed:', err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
}

/** Analyze one file and write (or print) its report; nothing is written on failure */
function analyzeOnce(filePath: string, config: ResolvedConfig, options: AnalyzeOptions): void {
  const { report, warnings } = analyzeFile(filePath, config.engine);
  reportWarnings(warnings);

  if (options.stdout) {
    console.log(serializeReport(report));
    return;
  }

  const outputPath = resolve(config.projectRoot, config.output);
  writeOutput(report, outputPath);

  console.log(`\nAnalysis complete!`);
  console.log(`  Classes: ${report.metrics.class_count}`);
  console.log(`  Functions: ${report.metrics.function_count}`);
  console.log(`  Overall quality: ${report.code_quality.overall_quality.toFixed(2)}`);
  console.log(`\nOutput written to: ${outputPath}`);
}

export function createCli(): Command {
  const program = new Command();

  program
    .name('codeprobe')
    .description('Static structural analysis of Python source files')
    .version('1.0.0');

  program
    .command('analyze')
    .description('Analyze one Python file and write the report as JSON')
    .argument('<file>', 'Python source file')
    .option('-o, --output <path>', 'Output JSON file path')
    .option('-c, --config <path>', 'Path to config file')
    .option('-r, --root <path>', 'Project root directory', '.')
    .option('--stdout', 'Print the report instead of writing it')
    .option('--watch', 'Re-analyze on file changes')
    .action((file: string, options: AnalyzeOptions) => {
      const filePath = resolve(file);
      let config: ResolvedConfig;
      try {
        config = resolveConfig(resolve(options.root), {
          output: options.output,
          config: options.config,
        });
      } catch (err) {
        fail(err);
        return;
      }

      try {
        if (!options.stdout) {
          console.log(`Analyzing ${filePath}...`);
        }
        analyzeOnce(filePath, config, options);
      } catch (err) {
        // In watch mode a failed first pass still starts the watcher
        fail(err);
      }

      if (options.watch) {
        startWatcher(filePath, async () => analyzeOnce(filePath, config, options));
      }
    });

  program
    .command('batch')
    .description('Analyze every matching Python file under the project root')
    .option('-i, --include <patterns...>', 'File patterns to include')
    .option('-x, --exclude <patterns...>', 'File patterns to exclude')
    .option('-d, --out-dir <path>', 'Directory for the per-file reports')
    .option('-c, --config <path>', 'Path to config file')
    .option('-r, --root <path>', 'Project root directory', '.')
    .action(async (options: BatchOptions) => {
      try {
        const config = resolveConfig(resolve(options.root), {
          include: options.include,
          exclude: options.exclude,
          outDir: options.outDir,
          config: options.config,
        });

        console.log(`Analyzing Python files under ${config.projectRoot}...`);
        console.log(`Include: ${config.include.join(', ')}`);
        console.log(`Exclude: ${config.exclude.length} patterns`);

        const result = await runBatch(config);

        for (const entry of result.analyzed) {
          reportWarnings(entry.warnings);
        }
        for (const failure of result.failed) {
          console.error(`  ${failure.file}: ${failure.error.message}`);
        }

        console.log(`\nAnalysis complete!`);
        console.log(`  Files analyzed: ${result.analyzed.length}`);
        console.log(`  Files failed: ${result.failed.length}`);
        console.log(`  Time: ${result.analysisTimeMs}ms`);
        console.log(`\nReports written to: ${relative(process.cwd(), resolve(config.projectRoot, config.outDir)) || '.'}`);

        if (result.failed.length > 0) {
          process.exitCode = 1;
        }
      } catch (err) {
        fail(err);
      }
    });

  program
    .command('summary')
    .description('Print a human-readable summary of one Python file')
    .argument('<file>', 'Python source file')
    .option('-c, --config <path>', 'Path to config file')
    .option('-r, --root <path>', 'Project root directory', '.')
    .action((file: string, options: CommonOptions) => {
      try {
        const config = resolveConfig(resolve(options.root), { config: options.config });
        const { report, warnings } = analyzeFile(resolve(file), config.engine);
        reportWarnings(warnings);
        console.log(formatSummary(report));
      } catch (err) {
        fail(err);
      }
    });

  return program;
}
