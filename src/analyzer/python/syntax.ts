import type { SyntaxNode } from '../types.js';

/** One step of the syntax stream */
export interface SyntaxVisit {
  node: SyntaxNode;
  /** Statement blocks enclosing the node, not counting the traversal root */
  nesting: number;
}

export interface TraverseOptions {
  /** Return true to skip a node's subtree (the node itself is still yielded) */
  prune?: (node: SyntaxNode) => boolean;
}

/** Definition node types that open a new scope */
export const SCOPE_TYPES: ReadonlySet<string> = new Set([
  'function_definition',
  'class_definition',
  'lambda',
]);

/**
 * Pre-order walk over the named nodes below `root` (root excluded).
 * Every stage that needs more than a node's direct children reads the tree
 * through this stream.
 */
export function* traverse(root: SyntaxNode, options: TraverseOptions = {}): Generator<SyntaxVisit> {
  const stack: SyntaxVisit[] = [];
  pushChildren(stack, root, 0);

  while (stack.length > 0) {
    const visit = stack.pop();
    if (!visit) break;
    yield visit;

    if (options.prune?.(visit.node)) continue;
    const childNesting = visit.node.type === 'block' ? visit.nesting + 1 : visit.nesting;
    pushChildren(stack, visit.node, childNesting);
  }
}

function pushChildren(stack: SyntaxVisit[], node: SyntaxNode, nesting: number): void {
  const children = node.namedChildren;
  for (let i = children.length - 1; i >= 0; i--) {
    const child = children[i];
    if (child.type === 'comment') continue;
    stack.push({ node: child, nesting });
  }
}

/** Named children with comments filtered out */
export function statements(node: SyntaxNode): SyntaxNode[] {
  return node.namedChildren.filter(child => child.type !== 'comment');
}

/** Unwrap `decorated_definition` to the function/class definition it decorates */
export function unwrapDefinition(node: SyntaxNode): SyntaxNode | null {
  if (node.type === 'function_definition' || node.type === 'class_definition') {
    return node;
  }
  if (node.type === 'decorated_definition') {
    return node.childForFieldName('definition');
  }
  return null;
}

/** Decorator names of a decorated definition, e.g. "property" or "tf.function" */
export function decoratorNames(node: SyntaxNode): string[] {
  if (node.type !== 'decorated_definition') return [];
  const names: string[] = [];
  for (const child of node.namedChildren) {
    if (child.type !== 'decorator') continue;
    const expr = child.firstNamedChild;
    if (!expr) continue;
    const target = expr.type === 'call' ? expr.childForFieldName('function') : expr;
    names.push(target ? target.text : expr.text);
  }
  return names;
}

/** True when the first statement of a body block is a string literal */
export function hasDocstring(body: SyntaxNode): boolean {
  const first = statements(body)[0];
  if (!first || first.type !== 'expression_statement') return false;
  const expr = first.firstNamedChild;
  return expr !== null && (expr.type === 'string' || expr.type === 'concatenated_string');
}

/** Dotted name of an identifier/attribute chain, null for anything else */
export function dottedName(node: SyntaxNode): string | null {
  if (node.type === 'identifier') return node.text;
  if (node.type === 'attribute') {
    const object = node.childForFieldName('object');
    const attribute = node.childForFieldName('attribute');
    if (!object || !attribute) return null;
    const head = dottedName(object);
    return head === null ? null : `${head}.${attribute.text}`;
  }
  return null;
}

/** Last segment of a call's callee: `tf.nn.softmax(x)` -> "softmax" */
export function calleeName(call: SyntaxNode): string | null {
  const fn = call.childForFieldName('function');
  if (!fn) return null;
  if (fn.type === 'identifier') return fn.text;
  if (fn.type === 'attribute') {
    return fn.childForFieldName('attribute')?.text ?? null;
  }
  return null;
}

/**
 * True when an identifier is used as a bare name reference, i.e. it is not
 * the attribute part of `obj.name` nor the name of a keyword argument.
 */
export function isNameReference(identifier: SyntaxNode): boolean {
  const parent = identifier.parent;
  if (!parent) return true;
  if (parent.type === 'attribute') {
    return !isField(parent, 'attribute', identifier);
  }
  if (parent.type === 'keyword_argument') {
    return !isField(parent, 'name', identifier);
  }
  return true;
}

function isField(parent: SyntaxNode, field: string, node: SyntaxNode): boolean {
  const child = parent.childForFieldName(field);
  return child !== null && child.startIndex === node.startIndex && child.endIndex === node.endIndex;
}

/** Split an identifier into lowercase words on underscores and case changes */
export function splitWords(name: string): string[] {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .split(/[^A-Za-z0-9]+/)
    .filter(word => word.length > 0)
    .map(word => word.toLowerCase());
}
