import { splitWords } from '../python/syntax.js';
import { PatternRegistry, type ProbeDefinition } from './registry.js';
import type { ProbeContext } from './context.js';

// Helpers

function callsAny(context: ProbeContext, names: readonly string[]): boolean {
  return names.some(name => context.callees.has(name.toLowerCase()));
}

function hasAnyWord(context: ProbeContext, words: readonly string[]): boolean {
  return words.some(word => context.words.has(word));
}

function hasAllWords(context: ProbeContext, words: readonly string[]): boolean {
  return words.every(word => context.words.has(word));
}

/** Last dotted segment: "tf.keras.layers.Layer" -> "Layer" */
function lastSegment(expression: string): string {
  const parts = expression.split('.');
  return parts[parts.length - 1];
}

const FRAMEWORK_BASES = new Set(['Layer', 'Module', 'Model']);

const LAYER_CALLS = [
  'Dense', 'Linear', 'Conv1D', 'Conv2D', 'Conv1d', 'Conv2d', 'LSTM', 'GRU', 'Sequential',
];

const ACTIVATION_CALLS = [
  'relu', 'gelu', 'sigmoid', 'tanh', 'softmax', 'leaky_relu', 'elu', 'selu', 'swish', 'silu',
];

const NORMALIZATION_CALLS = [
  'LayerNormalization', 'BatchNormalization', 'LayerNorm', 'BatchNorm1d', 'BatchNorm2d',
  'GroupNorm', 'layer_norm', 'batch_norm',
];

const OPTIMIZER_CALLS = ['Adam', 'AdamW', 'SGD', 'RMSprop', 'Adagrad', 'Adadelta', 'Nadam'];

const GRADIENT_CALLS = ['GradientTape', 'backward', 'gradient', 'apply_gradients', 'zero_grad'];

const QKV_ROLES: readonly (readonly string[])[] = [
  ['q', 'query', 'queries', 'wq', 'w_q', 'q_proj', 'query_proj'],
  ['k', 'key', 'keys', 'wk', 'w_k', 'k_proj', 'key_proj'],
  ['v', 'value', 'values', 'wv', 'w_v', 'v_proj', 'value_proj'],
];

// Neural network

function detectLayers(context: ProbeContext): boolean {
  const subclassesLayer = context.inventory.classes.some(cls =>
    cls.superclasses.some(base => FRAMEWORK_BASES.has(lastSegment(base)))
  );
  return subclassesLayer || callsAny(context, LAYER_CALLS);
}

function detectActivations(context: ProbeContext): boolean {
  return callsAny(context, ACTIVATION_CALLS) || context.keywordArguments.has('activation');
}

function detectFeedForward(context: ProbeContext): boolean {
  return hasAllWords(context, ['feed', 'forward']) || hasAnyWord(context, ['ffn', 'mlp']);
}

// Attention mechanism

/** An attention-named class whose parameters/attributes cover query, key and value */
function detectQueryKeyValue(context: ProbeContext): boolean {
  return context.inventory.classes.some(cls => {
    if (!splitWords(cls.name).includes('attention')) return false;
    const names = new Set(
      [...cls.attributes, ...cls.methods.flatMap(method => method.parameters)].map(n => n.toLowerCase())
    );
    return QKV_ROLES.every(role => role.some(name => names.has(name)));
  });
}

function detectSoftmaxAttention(context: ProbeContext): boolean {
  for (const callees of context.calleesByCallable.values()) {
    for (const name of callees) {
      const lower = name.toLowerCase();
      if (lower === 'softmax' || lower === 'log_softmax') return true;
    }
  }
  return false;
}

function detectMultiHead(context: ProbeContext): boolean {
  return context.words.has('heads') || hasAllWords(context, ['multi', 'head']);
}

function detectScaledDotProduct(context: ProbeContext): boolean {
  if (hasAllWords(context, ['scaled', 'dot', 'product'])) return true;
  const multiplies = callsAny(context, ['matmul', 'bmm', 'einsum']) || context.operators.has('@');
  return multiplies && callsAny(context, ['sqrt', 'rsqrt']);
}

function detectPositionalEncoding(context: ProbeContext): boolean {
  return hasAnyWord(context, ['positional', 'position']) && hasAnyWord(context, ['encoding', 'embedding']);
}

// Design patterns

function detectInheritance(context: ProbeContext): boolean {
  return context.inventory.classes.some(cls => cls.superclasses.some(base => base !== 'object'));
}

/** A class whose methods instantiate another class of the same file */
function detectComposition(context: ProbeContext): boolean {
  const classNames = new Set(context.inventory.classes.map(cls => cls.name));
  return context.inventory.classes.some(cls =>
    cls.methods.some(method => {
      const callees = context.calleesByCallable.get(method.id);
      if (!callees) return false;
      return [...callees].some(name => name !== cls.name && classNames.has(name));
    })
  );
}

/** A callable that returns a fresh instance of a class defined in the file */
function detectFactoryMethod(context: ProbeContext): boolean {
  const classNames = new Set(context.inventory.classes.map(cls => cls.name));
  for (const returned of context.returnedCallsByCallable.values()) {
    if (returned.some(name => classNames.has(name))) return true;
  }
  return false;
}

function detectDecorators(context: ProbeContext): boolean {
  return context.inventory.entities.some(entity => entity.decorators.length > 0);
}

function detectAbstractBase(context: ProbeContext): boolean {
  return context.inventory.classes.some(cls =>
    cls.superclasses.some(base => lastSegment(base) === 'ABC') ||
    (cls.metaclass !== null && lastSegment(cls.metaclass) === 'ABCMeta') ||
    cls.methods.some(method => method.decorators.some(name => lastSegment(name) === 'abstractmethod'))
  );
}

/** The built-in probe table */
export const DEFAULT_PROBES: readonly ProbeDefinition[] = [
  { category: 'neural_network', flag: 'layers', probe: detectLayers },
  { category: 'neural_network', flag: 'activation_functions', probe: detectActivations },
  { category: 'neural_network', flag: 'normalization', probe: c => callsAny(c, NORMALIZATION_CALLS) },
  { category: 'neural_network', flag: 'dropout', probe: c => callsAny(c, ['Dropout', 'dropout']) },
  { category: 'neural_network', flag: 'embedding', probe: c => callsAny(c, ['Embedding', 'embedding']) },
  { category: 'neural_network', flag: 'feed_forward', probe: detectFeedForward },

  { category: 'optimization', flag: 'loss_function', probe: c => hasAnyWord(c, ['loss', 'crossentropy']) },
  {
    category: 'optimization',
    flag: 'optimizer',
    probe: c => callsAny(c, OPTIMIZER_CALLS) || c.words.has('optimizer'),
  },
  {
    category: 'optimization',
    flag: 'learning_rate_schedule',
    probe: c => hasAnyWord(c, ['schedule', 'scheduler', 'warmup']),
  },
  { category: 'optimization', flag: 'gradient_computation', probe: c => callsAny(c, GRADIENT_CALLS) },

  { category: 'attention_mechanism', flag: 'query_key_value', probe: detectQueryKeyValue },
  { category: 'attention_mechanism', flag: 'softmax_attention', probe: detectSoftmaxAttention },
  { category: 'attention_mechanism', flag: 'multi_head', probe: detectMultiHead },
  { category: 'attention_mechanism', flag: 'scaled_dot_product', probe: detectScaledDotProduct },
  { category: 'attention_mechanism', flag: 'masking', probe: c => c.words.has('mask') },
  { category: 'attention_mechanism', flag: 'positional_encoding', probe: detectPositionalEncoding },

  {
    category: 'linear_algebra',
    flag: 'matrix_multiplication',
    probe: c => callsAny(c, ['matmul', 'dot', 'einsum', 'mm', 'bmm']) || c.operators.has('@'),
  },
  { category: 'linear_algebra', flag: 'transpose', probe: c => callsAny(c, ['transpose', 'permute']) },
  { category: 'linear_algebra', flag: 'reshape', probe: c => callsAny(c, ['reshape', 'view']) },
  { category: 'linear_algebra', flag: 'scaling', probe: c => callsAny(c, ['sqrt', 'rsqrt']) },

  { category: 'design_patterns', flag: 'inheritance', probe: detectInheritance },
  { category: 'design_patterns', flag: 'composition', probe: detectComposition },
  { category: 'design_patterns', flag: 'factory_method', probe: detectFactoryMethod },
  { category: 'design_patterns', flag: 'decorators', probe: detectDecorators },
  { category: 'design_patterns', flag: 'abstract_base', probe: detectAbstractBase },
];

/** A fresh registry holding the built-in probes */
export function createDefaultRegistry(): PatternRegistry {
  return new PatternRegistry(DEFAULT_PROBES);
}
