import { describe, it, expect } from 'vitest';
import { buildProbeContext } from '../../src/analyzer/patterns/context.js';
import { createDefaultRegistry, DEFAULT_PROBES } from '../../src/analyzer/patterns/probes.js';
import { PatternRegistry } from '../../src/analyzer/patterns/registry.js';
import type { ProbeContext } from '../../src/analyzer/patterns/context.js';
import { inventoryOf, readFixture, source } from '../helpers.js';

function contextOf(text: string): ProbeContext {
  const { parsed, inventory } = inventoryOf(text);
  return buildProbeContext(parsed, inventory);
}

describe('default probes', () => {
  it('should recognise the building blocks of a transformer', () => {
    const flags = createDefaultRegistry().evaluate(contextOf(readFixture('transformer.py')));

    expect(flags).toEqual({
      neural_network: {
        layers: true,
        activation_functions: true,
        normalization: true,
        dropout: true,
        embedding: true,
        feed_forward: true,
      },
      optimization: {
        loss_function: false,
        optimizer: false,
        learning_rate_schedule: false,
        gradient_computation: false,
      },
      attention_mechanism: {
        query_key_value: true,
        softmax_attention: true,
        multi_head: true,
        scaled_dot_product: true,
        masking: true,
        positional_encoding: true,
      },
      linear_algebra: {
        matrix_multiplication: true,
        transpose: true,
        reshape: true,
        scaling: true,
      },
      design_patterns: {
        inheritance: true,
        composition: true,
        factory_method: false,
        decorators: false,
        abstract_base: false,
      },
    });
  });

  it('should recognise training loops', () => {
    const flags = createDefaultRegistry().evaluate(
      contextOf(
        source(
          'import torch',
          '',
          'def train(model, data):',
          '    optimizer = torch.optim.Adam(model.parameters(), lr=1e-3)',
          '    scheduler = torch.optim.lr_scheduler.StepLR(optimizer, step_size=10)',
          '    for batch in data:',
          '        loss = torch.nn.functional.cross_entropy(model(batch), batch.y)',
          '        optimizer.zero_grad()',
          '        loss.backward()',
          '        optimizer.step()',
          '        scheduler.step()'
        )
      )
    );

    expect(flags.optimization).toEqual({
      loss_function: true,
      optimizer: true,
      learning_rate_schedule: true,
      gradient_computation: true,
    });
    expect(flags.neural_network.layers).toBe(false);
    expect(flags.attention_mechanism.softmax_attention).toBe(false);
  });

  it('should recognise object-oriented structure', () => {
    const flags = createDefaultRegistry().evaluate(contextOf(readFixture('registry.py')));

    expect(flags.design_patterns).toEqual({
      inheritance: true,
      composition: false,
      factory_method: true,
      decorators: true,
      abstract_base: true,
    });
    expect(flags.neural_network.layers).toBe(false);
  });

  it('should treat the matrix multiplication operator as a product', () => {
    const flags = createDefaultRegistry().evaluate(contextOf(source('def f(a, b):', '    return a @ b')));

    expect(flags.linear_algebra).toEqual({
      matrix_multiplication: true,
      transpose: false,
      reshape: false,
      scaling: false,
    });
  });

  it('should report every flag false for an empty file', () => {
    const flags = createDefaultRegistry().evaluate(contextOf(''));
    const values = Object.values(flags).flatMap(group => Object.values(group));

    expect(values).toHaveLength(DEFAULT_PROBES.length);
    expect(values.every(value => value === false)).toBe(true);
  });
});

describe('PatternRegistry', () => {
  it('should reject a flag registered twice', () => {
    const registry = createDefaultRegistry();
    expect(() => registry.register({ category: 'linear_algebra', flag: 'reshape', probe: () => true })).toThrow(
      'Probe already registered: linear_algebra.reshape'
    );
  });

  it('should evaluate added probes without touching the others', () => {
    const context = contextOf(readFixture('registry.py'));
    const base = createDefaultRegistry();
    const extended = base.clone().register({
      category: 'design_patterns',
      flag: 'singleton',
      probe: ctx => ctx.identifiers.has('_instance'),
    });

    const before = base.evaluate(context);
    const after = extended.evaluate(context);

    expect(after.design_patterns.singleton).toBe(false);
    expect(base.has('design_patterns', 'singleton')).toBe(false);
    expect(after.design_patterns.abstract_base).toBe(before.design_patterns.abstract_base);
    expect(after.neural_network).toEqual(before.neural_network);
  });

  it('should drop a category once its last probe is removed', () => {
    const registry = new PatternRegistry([
      { category: 'custom', flag: 'always', probe: () => true },
    ]);
    expect(registry.evaluate(contextOf(''))).toEqual({ custom: { always: true } });

    expect(registry.unregister('custom', 'always')).toBe(true);
    expect(registry.size).toBe(0);
    expect(registry.evaluate(contextOf(''))).toEqual({});
  });
});
