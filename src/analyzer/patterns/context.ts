import { traverse, calleeName, splitWords, SCOPE_TYPES } from '../python/syntax.js';
import type { EntityInventory, ParsedSource, SyntaxNode } from '../types.js';

/** Read-only facts about one source file, shared by every probe */
export interface ProbeContext {
  readonly source: string;
  readonly inventory: EntityInventory;
  /** Every identifier in the file, case preserved */
  readonly identifiers: ReadonlySet<string>;
  /** Lowercase words from splitting every identifier */
  readonly words: ReadonlySet<string>;
  /** Lowercase last segment of every callee in the file */
  readonly callees: ReadonlySet<string>;
  /** Callee names (case preserved) per callable id */
  readonly calleesByCallable: ReadonlyMap<string, ReadonlySet<string>>;
  /** Names used as keyword arguments, e.g. "activation" */
  readonly keywordArguments: ReadonlySet<string>;
  /** Binary operator tokens, e.g. "@" */
  readonly operators: ReadonlySet<string>;
  /** Callee names of values returned from each callable's own body */
  readonly returnedCallsByCallable: ReadonlyMap<string, readonly string[]>;
}

/** Collect the probe context in one pass over the tree plus one per callable */
export function buildProbeContext(parsed: ParsedSource, inventory: EntityInventory): ProbeContext {
  const identifiers = new Set<string>();
  const words = new Set<string>();
  const callees = new Set<string>();
  const keywordArguments = new Set<string>();
  const operators = new Set<string>();

  for (const { node } of traverse(parsed.root)) {
    switch (node.type) {
      case 'identifier':
        identifiers.add(node.text);
        for (const word of splitWords(node.text)) words.add(word);
        break;
      case 'call': {
        const name = calleeName(node);
        if (name) callees.add(name.toLowerCase());
        break;
      }
      case 'keyword_argument': {
        const name = node.childForFieldName('name');
        if (name) keywordArguments.add(name.text);
        break;
      }
      case 'binary_operator': {
        const operator = node.childForFieldName('operator');
        if (operator) operators.add(operator.type);
        break;
      }
      default:
        break;
    }
  }

  const calleesByCallable = new Map<string, ReadonlySet<string>>();
  const returnedCallsByCallable = new Map<string, readonly string[]>();
  for (const entity of inventory.callables) {
    calleesByCallable.set(entity.id, collectCallees(entity.body));
    returnedCallsByCallable.set(entity.id, collectReturnedCalls(entity.body));
  }

  return Object.freeze({
    source: parsed.text,
    inventory,
    identifiers,
    words,
    callees,
    calleesByCallable,
    keywordArguments,
    operators,
    returnedCallsByCallable,
  });
}

function collectCallees(body: SyntaxNode): Set<string> {
  const names = new Set<string>();
  for (const { node } of traverse(body)) {
    if (node.type !== 'call') continue;
    const name = calleeName(node);
    if (name) names.add(name);
  }
  return names;
}

function collectReturnedCalls(body: SyntaxNode): string[] {
  const names: string[] = [];
  const visits = traverse(body, { prune: node => SCOPE_TYPES.has(node.type) });
  for (const { node } of visits) {
    if (node.type !== 'return_statement') continue;
    const value = node.firstNamedChild;
    if (value?.type !== 'call') continue;
    const name = calleeName(value);
    if (name) names.push(name);
  }
  return names;
}
