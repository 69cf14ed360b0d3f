import { describe, it, expect } from 'vitest';
import { analyzeSource } from '../../src/analyzer/report.js';
import { serializeReport } from '../../src/analyzer/output.js';
import { resolveEngineConfig } from '../../src/analyzer/engine-config.js';
import { MalformedSourceError } from '../../src/analyzer/errors.js';
import { PatternRegistry } from '../../src/analyzer/patterns/registry.js';
import { readFixture, source } from '../helpers.js';

describe('analyzeSource', () => {
  const text = readFixture('transformer.py');

  it('should produce every report section', () => {
    const { report } = analyzeSource(text);
    expect(Object.keys(report)).toEqual([
      'metrics',
      'complexity',
      'dependencies',
      'algorithms',
      'data_flow',
      'code_quality',
    ]);
  });

  it('should count the transformer fixture', () => {
    const { report, warnings } = analyzeSource(text);
    expect(report.metrics).toEqual({
      total_lines: 119,
      non_empty_lines: 72,
      character_count: 3772,
      import_count: 1,
      class_count: 3,
      function_count: 9,
    });
    expect(warnings).toEqual([]);
  });

  it('should score every definition of a property', () => {
    const { report } = analyzeSource(
      source(
        'class Box:',
        '    def __init__(self, width):',
        '        self._width = width',
        '',
        '    @property',
        '    def width(self):',
        '        """Current width."""',
        '        if self._width < 0:',
        '            return 0',
        '        return self._width',
        '',
        '    @width.setter',
        '    def width(self, value):',
        '        self._width = value'
      )
    );

    expect(report.metrics.function_count).toBe(3);
    expect(report.complexity.functions['Box.width']).toEqual({ cyclomatic: 2, cognitive: 3, lines: 6 });
    expect(report.complexity.functions['Box.width#2']).toEqual({ cyclomatic: 1, cognitive: 1.5, lines: 3 });
    expect(report.complexity.classes.Box.methods.map(m => m.name)).toEqual(['__init__', 'width', 'width']);
    // 14-line class minus 2 + 6 + 3 method lines
    expect(report.complexity.classes.Box.lines).toBe(3);
    expect(report.complexity.overall.total_cyclomatic).toBe(4);
    expect(report.code_quality.docstring_coverage).toBe(0.3333);
  });

  it('should count characters as code points', () => {
    const { report } = analyzeSource('s = "日本"\nt = "😀"\n');
    expect(report.metrics.character_count).toBe(17);
    expect(report.metrics.total_lines).toBe(2);
  });

  it('should be deterministic', () => {
    expect(serializeReport(analyzeSource(text).report)).toBe(serializeReport(analyzeSource(text).report));
  });

  it('should deep-freeze the report', () => {
    const { report } = analyzeSource(text);
    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.complexity.classes.Encoder.methods)).toBe(true);
    expect(Object.isFrozen(report.complexity.classes.Encoder.methods[0])).toBe(true);
    expect(Object.isFrozen(report.dependencies.Encoder.depends_on)).toBe(true);
    expect(Object.isFrozen(report.algorithms.neural_network)).toBe(true);
  });

  it('should keep every dependency pair symmetric', () => {
    const { report } = analyzeSource(readFixture('registry.py'));
    for (const [id, entry] of Object.entries(report.dependencies)) {
      for (const target of entry.depends_on) {
        expect(report.dependencies[target].depended_by).toContain(id);
      }
    }
  });

  it('should throw instead of producing a report for malformed input', () => {
    expect(() => analyzeSource(readFixture('malformed.py'))).toThrow(MalformedSourceError);
  });

  it('should surface unsupported constructs as warnings', () => {
    const { report, warnings } = analyzeSource(readFixture('legacy.py'));
    expect(warnings.map(w => [w.entity, w.construct, w.line])).toEqual([['greet', 'print_statement', 2]]);
    expect(report.complexity.functions.greet.cyclomatic).toBe(1);
  });

  it('should apply engine overrides', () => {
    const config = resolveEngineConfig({ complexity: { flatMultiplier: 2 } });
    const { report } = analyzeSource(source('def f(x):', '    if x:', '        return 1', '    return 0'), config);
    expect(report.complexity.functions.f).toEqual({ cyclomatic: 2, cognitive: 4, lines: 4 });
  });

  it('should evaluate a caller-supplied registry', () => {
    const registry = new PatternRegistry([
      { category: 'style', flag: 'has_main_guard', probe: ctx => ctx.identifiers.has('__name__') },
    ]);
    const { report } = analyzeSource(source('if __name__ == "__main__":', '    pass'), undefined, registry);
    expect(report.algorithms).toEqual({ style: { has_main_guard: true } });
  });
});
