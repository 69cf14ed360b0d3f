import { traverse, dottedName, SCOPE_TYPES } from './python/syntax.js';
import { callableReferenceEdges, type DependencyGraph } from './dependency-graph.js';
import type { DataFlowReport, EntityInventory, ExitPoint, FunctionEntity, SyntaxNode } from './types.js';

const LITERAL_LABELS: Readonly<Record<string, string>> = {
  string: 'str',
  concatenated_string: 'str',
  integer: 'int',
  float: 'float',
  true: 'bool',
  false: 'bool',
  none: 'None',
  list: 'list',
  list_comprehension: 'list',
  dictionary: 'dict',
  dictionary_comprehension: 'dict',
  set: 'set',
  set_comprehension: 'set',
  tuple: 'tuple',
  expression_list: 'tuple',
  generator_expression: 'generator',
  lambda: 'lambda',
  comparison_operator: 'bool',
  not_operator: 'bool',
};

/**
 * Static label for a returned expression: the identifier or expression head,
 * or "unknown" when the head cannot be classified.
 */
export function labelExpression(node: SyntaxNode | null): string {
  if (!node) return 'None';

  const literal = LITERAL_LABELS[node.type];
  if (literal) return literal;

  switch (node.type) {
    case 'identifier':
    case 'attribute':
      return dottedName(node) ?? 'unknown';
    case 'call': {
      const fn = node.childForFieldName('function');
      return fn ? dottedName(fn) ?? labelExpression(fn) : 'unknown';
    }
    case 'subscript':
      return labelExpression(node.childForFieldName('value'));
    case 'binary_operator':
      return labelExpression(node.childForFieldName('left'));
    case 'conditional_expression':
    case 'parenthesized_expression':
    case 'await':
      return labelExpression(node.firstNamedChild);
    default:
      return 'unknown';
  }
}

/** Value node of a `return` or `yield`, null when bare */
function returnedValue(node: SyntaxNode): SyntaxNode | null {
  return node.namedChildren.find(child => child.type !== 'comment') ?? null;
}

/** Labels of every return/yield in the callable's own body, nested scopes excluded */
export function exitLabels(entity: FunctionEntity): string[] {
  const labels: string[] = [];
  const visits = traverse(entity.body, { prune: node => SCOPE_TYPES.has(node.type) });

  for (const { node } of visits) {
    if (node.type === 'return_statement' || node.type === 'yield') {
      labels.push(labelExpression(returnedValue(node)));
    }
  }
  return labels;
}

/** Syntactic entry/exit summary per callable plus the call paths between entities */
export function summarizeDataFlow(inventory: EntityInventory, graph: DependencyGraph): DataFlowReport {
  const exitPoints: ExitPoint[] = [];
  for (const entity of inventory.callables) {
    const returns = exitLabels(entity);
    if (returns.length > 0) {
      exitPoints.push({ function: entity.id, returns });
    }
  }

  return {
    entry_points: inventory.callables.map(entity => ({
      function: entity.id,
      parameters: [...entity.parameters],
    })),
    exit_points: exitPoints,
    data_paths: callableReferenceEdges(graph, inventory.callables).map(edge => ({
      from: edge.source,
      to: edge.target,
    })),
  };
}
