import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { load as loadYaml } from 'js-yaml';
import { z } from 'zod';
import { ConfigError } from '../analyzer/errors.js';
import { resolveEngineConfig } from '../analyzer/engine-config.js';
import type { CodeProbeConfig, ResolvedConfig } from '../analyzer/types.js';

const CONFIG_FILENAMES = ['codeprobe.config.json', 'codeprobe.config.yaml', 'codeprobe.config.yml'];

const DEFAULT_INCLUDE = ['**/*.py'];

const DEFAULT_EXCLUDE = [
  'node_modules/**',
  'dist/**',
  'build/**',
  'vendor/**',
  '**/__pycache__/**',
  '.git/**',
  '.venv/**',
  'venv/**',
  '.tox/**',
  '**/*_test.py',
  '**/test_*.py',
];

const DEFAULT_OUTPUT = './analysis_result.json';
const DEFAULT_OUT_DIR = './codeprobe-reports';

const weightsSchema = z
  .object({
    docstring: z.number().nonnegative(),
    naming: z.number().nonnegative(),
    functionLength: z.number().nonnegative(),
    complexity: z.number().nonnegative(),
  })
  .partial()
  .strict();

const configSchema = z
  .object({
    include: z.array(z.string().min(1)),
    exclude: z.array(z.string().min(1)),
    output: z.string().min(1),
    outDir: z.string().min(1),
    complexity: z
      .object({
        flatMultiplier: z.number().positive(),
        nestingIncrement: z.number().nonnegative(),
      })
      .partial()
      .strict(),
    quality: z
      .object({
        weights: weightsSchema,
        functionLengthThreshold: z.number().positive(),
        complexityRatioScale: z.number().positive(),
        complexityRatioThreshold: z.number().positive(),
        mixedNamingThreshold: z.number().min(0).max(1),
      })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

/** Find the config file in the project root */
export function findConfigFile(projectRoot: string): string | null {
  for (const name of CONFIG_FILENAMES) {
    const path = resolve(projectRoot, name);
    if (existsSync(path)) {
      return path;
    }
  }
  return null;
}

/** Load and validate a config file */
export function loadConfigFile(configPath: string): Partial<CodeProbeConfig> {
  let content: string;
  try {
    content = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${configPath}: ${errorMessage(err)}`);
  }

  let raw: unknown;
  try {
    raw = configPath.endsWith('.yaml') || configPath.endsWith('.yml')
      ? loadYaml(content)
      : JSON.parse(content);
  } catch (err) {
    throw new ConfigError(`Cannot parse config file ${configPath}: ${errorMessage(err)}`);
  }

  // An empty YAML document loads as undefined
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(issue => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `  ${path}: ${issue.message}`;
    });
    throw new ConfigError(`Invalid config file ${configPath}:\n${issues.join('\n')}`);
  }
  return result.data;
}

/** CLI options that can override config */
export interface CliOptions {
  include?: string[];
  exclude?: string[];
  output?: string;
  outDir?: string;
  config?: string;
}

/** Merge CLI options with config file and defaults to produce a resolved config */
export function resolveConfig(projectRoot: string, cliOptions: CliOptions = {}): ResolvedConfig {
  const absRoot = resolve(projectRoot);

  let fileConfig: Partial<CodeProbeConfig> = {};
  if (cliOptions.config) {
    const configPath = resolve(absRoot, cliOptions.config);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    fileConfig = loadConfigFile(configPath);
  } else {
    const found = findConfigFile(absRoot);
    if (found) fileConfig = loadConfigFile(found);
  }

  // Merge include patterns (CLI > file > defaults)
  const include = cliOptions.include?.length
    ? cliOptions.include
    : fileConfig.include?.length
      ? fileConfig.include
      : DEFAULT_INCLUDE;

  // Merge exclude patterns (CLI appends to defaults + file)
  const exclude = [
    ...DEFAULT_EXCLUDE,
    ...(fileConfig.exclude ?? []),
    ...(cliOptions.exclude ?? []),
  ];

  return {
    include,
    exclude: [...new Set(exclude)],
    output: cliOptions.output ?? fileConfig.output ?? DEFAULT_OUTPUT,
    outDir: cliOptions.outDir ?? fileConfig.outDir ?? DEFAULT_OUT_DIR,
    engine: resolveEngineConfig({ complexity: fileConfig.complexity, quality: fileConfig.quality }),
    projectRoot: absRoot,
  };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
