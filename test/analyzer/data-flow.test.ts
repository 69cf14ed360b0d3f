import { describe, it, expect } from 'vitest';
import { summarizeDataFlow, exitLabels } from '../../src/analyzer/data-flow.js';
import { buildDependencyGraph } from '../../src/analyzer/dependency-graph.js';
import { inventoryOf, readFixture, callable, source } from '../helpers.js';

describe('summarizeDataFlow', () => {
  const { inventory } = inventoryOf(readFixture('transformer.py'));
  const flow = summarizeDataFlow(inventory, buildDependencyGraph(inventory));

  it('should list every callable with its parameters', () => {
    expect(flow.entry_points).toHaveLength(9);
    expect(flow.entry_points[0]).toEqual({ function: 'get_angles', parameters: ['pos', 'i', 'd_model'] });
    expect(flow.entry_points.find(e => e.function === 'MultiHeadAttention.call')).toEqual({
      function: 'MultiHeadAttention.call',
      parameters: ['self', 'v', 'k', 'q', 'mask'],
    });
  });

  it('should label returns and omit callables that never return', () => {
    expect(flow.exit_points).toEqual([
      { function: 'get_angles', returns: ['pos'] },
      { function: 'positional_encoding', returns: ['tf.cast'] },
      { function: 'MultiHeadAttention.split_heads', returns: ['tf.transpose'] },
      { function: 'MultiHeadAttention.call', returns: ['tuple'] },
      { function: 'EncoderLayer.call', returns: ['self.layernorm2'] },
      { function: 'Encoder.call', returns: ['x'] },
    ]);
  });

  it('should follow calls between entities', () => {
    expect(flow.data_paths).toEqual([
      { from: 'positional_encoding', to: 'get_angles' },
      { from: 'MultiHeadAttention.call', to: 'MultiHeadAttention.split_heads' },
      { from: 'EncoderLayer.__init__', to: 'MultiHeadAttention' },
      { from: 'Encoder.__init__', to: 'positional_encoding' },
      { from: 'Encoder.__init__', to: 'EncoderLayer' },
    ]);
  });
});

describe('exitLabels', () => {
  it('should label literals, bare returns and yields', () => {
    const { inventory } = inventoryOf(
      source(
        'def pick(flag, items):',
        '    if flag:',
        '        return',
        '    if flag is None:',
        '        return None',
        '    if items:',
        '        yield {"a": 1}',
        '    yield [i for i in items]',
        '    return "done"'
      )
    );
    expect(exitLabels(callable(inventory, 'pick'))).toEqual(['None', 'None', 'dict', 'list', 'str']);
  });

  it('should skip returns of nested functions and lambdas', () => {
    const { inventory } = inventoryOf(
      source(
        'def outer(values):',
        '    def inner(v):',
        '        return v * 2',
        '    key = lambda v: v',
        '    return sorted(values, key=key)[0]'
      )
    );
    expect(exitLabels(callable(inventory, 'outer'))).toEqual(['sorted']);
  });

  it('should fall back to unknown for unclassified heads', () => {
    const { inventory } = inventoryOf(source('def f(a):', '    return -a'));
    expect(exitLabels(callable(inventory, 'f'))).toEqual(['unknown']);
  });
});
