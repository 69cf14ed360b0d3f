import {
  statements,
  traverse,
  unwrapDefinition,
  decoratorNames,
  hasDocstring,
  SCOPE_TYPES,
} from './python/syntax.js';
import type {
  ParsedSource,
  SyntaxNode,
  Entity,
  EntityInventory,
  FunctionEntity,
  ClassEntity,
} from './types.js';

const IMPORT_TYPES: ReadonlySet<string> = new Set([
  'import_statement',
  'import_from_statement',
  'future_import_statement',
]);

const SELF_NAMES: ReadonlySet<string> = new Set(['self', 'cls']);

/**
 * Walk the module and collect imports, module-level functions, classes and
 * their methods. The returned inventory is frozen.
 */
export function extractEntities(parsed: ParsedSource): EntityInventory {
  let importCount = 0;
  for (const { node } of traverse(parsed.root)) {
    if (IMPORT_TYPES.has(node.type)) importCount++;
  }

  const topLevel: (FunctionEntity | ClassEntity)[] = [];
  const moduleIds = new ScopeIds(null);

  for (const statement of statements(parsed.root)) {
    const definition = unwrapDefinition(statement);
    if (!definition) continue;

    if (definition.type === 'function_definition') {
      const fn = createFunction(statement, definition, null, moduleIds);
      if (fn) topLevel.push(fn);
    } else {
      const cls = createClass(statement, definition, moduleIds);
      if (cls) topLevel.push(cls);
    }
  }

  const functions: FunctionEntity[] = [];
  const classes: ClassEntity[] = [];
  const callables: FunctionEntity[] = [];
  const entities: Entity[] = [];

  for (const entity of topLevel) {
    entities.push(entity);
    if (entity.kind === 'class') {
      classes.push(entity);
      entities.push(...entity.methods);
      callables.push(...entity.methods);
    } else {
      functions.push(entity);
      callables.push(entity);
    }
  }

  return Object.freeze({
    importCount,
    functions: Object.freeze(functions),
    classes: Object.freeze(classes),
    callables: Object.freeze(callables),
    entities: Object.freeze(entities),
  });
}

/**
 * Hands out entity ids within one scope. Every definition is kept, so a name
 * defined again (a property setter, an overload stub) gets `name#2`, `name#3`...
 */
class ScopeIds {
  private readonly seen = new Map<string, number>();

  constructor(private readonly prefix: string | null) {}

  next(name: string): string {
    const count = (this.seen.get(name) ?? 0) + 1;
    this.seen.set(name, count);
    const id = this.prefix ? `${this.prefix}.${name}` : name;
    return count === 1 ? id : `${id}#${count}`;
  }
}

function span(node: SyntaxNode): { startLine: number; endLine: number; lineCount: number } {
  const startLine = node.startPosition.row + 1;
  const endLine = node.endPosition.row + 1;
  return { startLine, endLine, lineCount: endLine - startLine + 1 };
}

function createFunction(
  outer: SyntaxNode,
  definition: SyntaxNode,
  ownerClass: string | null,
  ids: ScopeIds
): FunctionEntity | null {
  const nameNode = definition.childForFieldName('name');
  const body = definition.childForFieldName('body');
  if (!nameNode || !body) return null;

  const name = nameNode.text;
  const parametersNode = definition.childForFieldName('parameters');

  return Object.freeze({
    id: ids.next(name),
    name,
    kind: ownerClass ? 'method' : 'function',
    ownerClass,
    parameters: Object.freeze(parametersNode ? extractParameterNames(parametersNode) : []),
    ...span(outer),
    hasDocstring: hasDocstring(body),
    decorators: Object.freeze(decoratorNames(outer)),
    node: outer,
    body,
  } satisfies FunctionEntity);
}

function createClass(outer: SyntaxNode, definition: SyntaxNode, ids: ScopeIds): ClassEntity | null {
  const nameNode = definition.childForFieldName('name');
  const body = definition.childForFieldName('body');
  if (!nameNode || !body) return null;

  const name = nameNode.text;
  const id = ids.next(name);
  const { superclasses, metaclass } = extractBases(definition);

  const methodIds = new ScopeIds(id);
  const methods: FunctionEntity[] = [];
  const classAttributes: string[] = [];

  for (const statement of statements(body)) {
    const inner = unwrapDefinition(statement);
    if (inner?.type === 'function_definition') {
      const method = createFunction(statement, inner, id, methodIds);
      if (method) methods.push(method);
    } else if (statement.type === 'expression_statement') {
      for (const target of assignmentTargets(statement)) {
        if (target.type === 'identifier') classAttributes.push(target.text);
      }
    }
  }

  const instanceAttributes = methods.flatMap(method => selfAttributes(method.body));

  return Object.freeze({
    id,
    name,
    kind: 'class',
    superclasses: Object.freeze(superclasses),
    metaclass,
    attributes: Object.freeze([...new Set([...classAttributes, ...instanceAttributes])]),
    methods: Object.freeze(methods),
    ...span(outer),
    hasDocstring: hasDocstring(body),
    decorators: Object.freeze(decoratorNames(outer)),
    node: outer,
    body,
  } satisfies ClassEntity);
}

/**
 * Parameter names in declaration order. Splat parameters keep their stars;
 * the bare `*` and `/` separators are skipped.
 */
export function extractParameterNames(parameters: SyntaxNode): string[] {
  const names: string[] = [];

  for (const param of parameters.namedChildren) {
    switch (param.type) {
      case 'identifier':
      case 'list_splat_pattern':
      case 'dictionary_splat_pattern':
      case 'tuple_pattern':
        names.push(param.text);
        break;
      case 'typed_parameter': {
        const inner = param.firstNamedChild;
        if (inner) names.push(inner.text);
        break;
      }
      case 'default_parameter':
      case 'typed_default_parameter': {
        const name = param.childForFieldName('name');
        if (name) names.push(name.text);
        break;
      }
      default:
        // keyword_separator, positional_separator, comment
        break;
    }
  }

  return names;
}

function extractBases(definition: SyntaxNode): { superclasses: string[]; metaclass: string | null } {
  const superclasses: string[] = [];
  let metaclass: string | null = null;

  const argumentList = definition.childForFieldName('superclasses');
  if (!argumentList) return { superclasses, metaclass };

  for (const arg of argumentList.namedChildren) {
    if (arg.type === 'comment') continue;
    if (arg.type === 'keyword_argument') {
      if (arg.childForFieldName('name')?.text === 'metaclass') {
        metaclass = arg.childForFieldName('value')?.text ?? null;
      }
      continue;
    }
    if (arg.type === 'list_splat' || arg.type === 'dictionary_splat') continue;
    superclasses.push(arg.text);
  }

  return { superclasses, metaclass };
}

/** Targets of an assignment statement, with tuple targets flattened */
function assignmentTargets(statement: SyntaxNode): SyntaxNode[] {
  const assignment = statement.firstNamedChild;
  if (!assignment || assignment.type !== 'assignment') return [];
  const left = assignment.childForFieldName('left');
  if (!left) return [];
  if (left.type === 'pattern_list' || left.type === 'tuple_pattern') {
    return left.namedChildren;
  }
  return [left];
}

/** `self.<name>` assignment targets inside a method body, nested scopes excluded */
function selfAttributes(body: SyntaxNode): string[] {
  const names: string[] = [];
  const visits = traverse(body, { prune: node => SCOPE_TYPES.has(node.type) });

  for (const { node } of visits) {
    if (node.type !== 'expression_statement') continue;
    for (const target of assignmentTargets(node)) {
      if (target.type !== 'attribute') continue;
      const object = target.childForFieldName('object');
      const attribute = target.childForFieldName('attribute');
      if (object && attribute && object.type === 'identifier' && SELF_NAMES.has(object.text)) {
        names.push(attribute.text);
      }
    }
  }

  return names;
}
