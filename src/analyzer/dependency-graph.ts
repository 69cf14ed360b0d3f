import { traverse, isNameReference, unwrapDefinition, statements } from './python/syntax.js';
import type {
  ClassEntity,
  DependencyEdge,
  DependencyReport,
  EdgeOrigin,
  Entity,
  EntityInventory,
  FunctionEntity,
  SyntaxNode,
} from './types.js';

const SELF_NAMES: ReadonlySet<string> = new Set(['self', 'cls']);

/**
 * Intra-file dependency graph. The edge array is the only stored relation;
 * both adjacency views are indices over it.
 */
export class DependencyGraph {
  readonly edges: readonly DependencyEdge[];
  private readonly outgoing: ReadonlyMap<string, readonly string[]>;
  private readonly incoming: ReadonlyMap<string, readonly string[]>;

  constructor(edges: readonly DependencyEdge[]) {
    this.edges = Object.freeze(edges.map(edge => Object.freeze({ ...edge })));
    const { outgoing, incoming } = indexEdges(this.edges);
    this.outgoing = outgoing;
    this.incoming = incoming;
  }

  dependsOn(id: string): readonly string[] {
    return this.outgoing.get(id) ?? [];
  }

  dependedBy(id: string): readonly string[] {
    return this.incoming.get(id) ?? [];
  }

  /**
   * Rebuild the outgoing index from the incoming one and compare.
   * Throws if the two views disagree.
   */
  verifySymmetry(): void {
    const rebuilt = new Map<string, Set<string>>();
    for (const [target, sources] of this.incoming) {
      for (const source of sources) {
        const targets = rebuilt.get(source) ?? new Set<string>();
        targets.add(target);
        rebuilt.set(source, targets);
      }
    }

    const ids = new Set([...this.outgoing.keys(), ...rebuilt.keys()]);
    for (const id of ids) {
      const expected = rebuilt.get(id) ?? new Set<string>();
      const actual = this.dependsOn(id);
      if (actual.length !== expected.size || actual.some(target => !expected.has(target))) {
        throw new Error(`Dependency index out of sync for ${id}`);
      }
    }
  }
}

function indexEdges(edges: readonly DependencyEdge[]): {
  outgoing: Map<string, string[]>;
  incoming: Map<string, string[]>;
} {
  const outgoing = new Map<string, string[]>();
  const incoming = new Map<string, string[]>();

  for (const edge of edges) {
    const targets = outgoing.get(edge.source) ?? [];
    targets.push(edge.target);
    outgoing.set(edge.source, targets);

    const sources = incoming.get(edge.target) ?? [];
    sources.push(edge.source);
    incoming.set(edge.target, sources);
  }

  return { outgoing, incoming };
}

/** Collects deduplicated edges in insertion order */
class EdgeCollector {
  private readonly seen = new Set<string>();
  readonly edges: DependencyEdge[] = [];

  constructor(private readonly known: ReadonlySet<string>) {}

  add(source: string, target: string, origin: EdgeOrigin): void {
    if (source === target) return;
    if (!this.known.has(source) || !this.known.has(target)) return;

    const key = `${source}\u0000${target}`;
    if (this.seen.has(key)) return;
    this.seen.add(key);
    this.edges.push({ source, target, origin });
  }
}

/**
 * Infer edges between the entities of one inventory: class/method membership
 * plus name co-occurrence inside each entity's own body.
 */
export function buildDependencyGraph(inventory: EntityInventory): DependencyGraph {
  const known = new Set(inventory.entities.map(entity => entity.id));
  const topLevel = new Set([
    ...inventory.functions.map(fn => fn.id),
    ...inventory.classes.map(cls => cls.id),
  ]);
  const classesById = new Map(inventory.classes.map(cls => [cls.id, cls]));
  const collector = new EdgeCollector(known);

  for (const entity of inventory.entities) {
    if (entity.kind === 'class') {
      for (const method of entity.methods) {
        collector.add(entity.id, method.id, 'membership');
      }
    } else if (entity.ownerClass) {
      collector.add(entity.id, entity.ownerClass, 'membership');
    }

    const owner = entity.kind === 'method' && entity.ownerClass
      ? classesById.get(entity.ownerClass)
      : undefined;

    for (const target of referencedEntities(entity, topLevel, owner)) {
      collector.add(entity.id, target, 'reference');
    }
  }

  const graph = new DependencyGraph(collector.edges);
  graph.verifySymmetry();
  return graph;
}

/** Ids of inventory entities referenced from an entity's own body, in order */
function referencedEntities(
  entity: Entity,
  topLevel: ReadonlySet<string>,
  owner: ClassEntity | undefined
): string[] {
  const targets: string[] = [];
  const ownerMethods = new Set(owner?.methods.map(method => method.name) ?? []);

  for (const root of scanRoots(entity)) {
    for (const { node } of traverse(root)) {
      if (node.type === 'identifier') {
        if (topLevel.has(node.text) && isNameReference(node)) {
          targets.push(node.text);
        }
      } else if (owner && node.type === 'attribute') {
        const object = node.childForFieldName('object');
        const attribute = node.childForFieldName('attribute');
        if (
          object?.type === 'identifier' &&
          SELF_NAMES.has(object.text) &&
          attribute &&
          ownerMethods.has(attribute.text)
        ) {
          targets.push(`${owner.id}.${attribute.text}`);
        }
      }
    }
  }

  return targets;
}

/**
 * Subtrees that make up an entity's body for reference scanning:
 * callables scan their body, classes scan their bases and every class-body
 * statement that is not a method.
 */
function scanRoots(entity: Entity): SyntaxNode[] {
  if (entity.kind !== 'class') {
    return [entity.body];
  }

  const roots: SyntaxNode[] = [];
  const definition = unwrapDefinition(entity.node);
  const bases = definition?.childForFieldName('superclasses');
  if (bases) roots.push(bases);

  for (const statement of statements(entity.body)) {
    if (unwrapDefinition(statement)?.type === 'function_definition') continue;
    roots.push(statement);
  }
  return roots;
}

/** Render the graph as the report's name -> { type, depends_on, depended_by } map */
export function toDependencyReport(inventory: EntityInventory, graph: DependencyGraph): DependencyReport {
  const report: DependencyReport = {};
  for (const entity of inventory.entities) {
    report[entity.id] = {
      type: entity.kind,
      depends_on: [...graph.dependsOn(entity.id)],
      depended_by: [...graph.dependedBy(entity.id)],
    };
  }
  return report;
}

/** Reference edges leaving a function or method, i.e. the calls/instantiations it makes */
export function callableReferenceEdges(
  graph: DependencyGraph,
  callables: readonly FunctionEntity[]
): DependencyEdge[] {
  const callableIds = new Set(callables.map(fn => fn.id));
  return graph.edges.filter(edge => edge.origin === 'reference' && callableIds.has(edge.source));
}
