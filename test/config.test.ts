import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { resolveConfig, loadConfigFile, findConfigFile } from '../src/cli/config.js';
import { ConfigError } from '../src/analyzer/errors.js';
import { DEFAULT_ENGINE_CONFIG } from '../src/analyzer/engine-config.js';

describe('config', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'codeprobe-config-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('should fall back to defaults without a config file', () => {
    const config = resolveConfig(root);
    expect(config.projectRoot).toBe(root);
    expect(config.include).toEqual(['**/*.py']);
    expect(config.exclude).toContain('**/__pycache__/**');
    expect(config.output).toBe('./analysis_result.json');
    expect(config.outDir).toBe('./codeprobe-reports');
    expect(config.engine).toEqual(DEFAULT_ENGINE_CONFIG);
  });

  it('should load a JSON config and merge engine settings key by key', () => {
    writeFileSync(
      join(root, 'codeprobe.config.json'),
      JSON.stringify({
        include: ['src/**/*.py'],
        exclude: ['src/generated/**'],
        quality: { weights: { docstring: 0.5 }, functionLengthThreshold: 40 },
      })
    );

    const config = resolveConfig(root);
    expect(config.include).toEqual(['src/**/*.py']);
    expect(config.exclude).toContain('src/generated/**');
    expect(config.exclude).toContain('.git/**');
    expect(config.engine.quality.weights).toEqual({
      docstring: 0.5,
      naming: 0.2,
      functionLength: 0.2,
      complexity: 0.3,
    });
    expect(config.engine.quality.functionLengthThreshold).toBe(40);
    expect(config.engine.quality.complexityRatioThreshold).toBe(500);
    expect(config.engine.complexity).toEqual(DEFAULT_ENGINE_CONFIG.complexity);
  });

  it('should load a YAML config', () => {
    writeFileSync(
      join(root, 'codeprobe.config.yaml'),
      ['outDir: reports', 'complexity:', '  nestingIncrement: 1'].join('\n')
    );

    const config = resolveConfig(root);
    expect(config.outDir).toBe('reports');
    expect(config.engine.complexity).toEqual({ flatMultiplier: 1.5, nestingIncrement: 1 });
  });

  it('should treat an empty YAML file as no settings', () => {
    const path = join(root, 'codeprobe.config.yml');
    writeFileSync(path, '');
    expect(findConfigFile(root)).toBe(path);
    expect(loadConfigFile(path)).toEqual({});
  });

  it('should let CLI options win over the config file', () => {
    writeFileSync(join(root, 'codeprobe.config.json'), JSON.stringify({ output: 'from-file.json', include: ['a/**'] }));

    const config = resolveConfig(root, { output: 'from-cli.json', include: ['b/**'], exclude: ['b/skip/**'] });
    expect(config.output).toBe('from-cli.json');
    expect(config.include).toEqual(['b/**']);
    expect(config.exclude).toContain('b/skip/**');
  });

  it('should load an explicit config path', () => {
    writeFileSync(join(root, 'custom.json'), JSON.stringify({ outDir: 'custom-out' }));
    expect(resolveConfig(root, { config: 'custom.json' }).outDir).toBe('custom-out');
  });

  it('should reject a missing explicit config file', () => {
    expect(() => resolveConfig(root, { config: 'nope.json' })).toThrow(ConfigError);
  });

  it('should list every invalid key', () => {
    const path = join(root, 'codeprobe.config.json');
    writeFileSync(path, JSON.stringify({ include: 'src', quality: { mixedNamingThreshold: 2 }, colour: 'red' }));

    let caught: unknown;
    try {
      loadConfigFile(path);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof Error)) return;
    expect(caught.message).toContain(`Invalid config file ${path}:`);
    expect(caught.message).toContain('  include: Expected array, received string');
    expect(caught.message).toContain('  quality.mixedNamingThreshold:');
    expect(caught.message).toContain('  (root): Unrecognized key(s) in object: \'colour\'');
  });

  it('should reject unparsable JSON', () => {
    const path = join(root, 'codeprobe.config.json');
    writeFileSync(path, '{ "include": ');
    expect(() => loadConfigFile(path)).toThrow(/^Cannot parse config file/);
  });
});
