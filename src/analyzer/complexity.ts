import { traverse } from './python/syntax.js';
import { unsupportedConstruct, type UnsupportedConstructWarning } from './errors.js';
import { round4, sum, ratio } from './math.js';
import type {
  ClassComplexity,
  ComplexityOptions,
  ComplexityReport,
  ComplexityScore,
  EntityInventory,
  FunctionEntity,
} from './types.js';

/** Node types that add one independent path through a body */
const DECISION_TYPES: ReadonlySet<string> = new Set([
  'if_statement',
  'elif_clause',
  'for_statement',
  'while_statement',
  'except_clause',
  'except_group_clause',
  'boolean_operator',
  'conditional_expression',
  'for_in_clause',
  'if_clause',
  'case_clause',
]);

/** Python 2 statements the scorer has no model for */
const UNSUPPORTED_TYPES: ReadonlySet<string> = new Set(['print_statement', 'exec_statement']);

export interface ComplexityAnalysis {
  report: ComplexityReport;
  /** Scores keyed by callable id, shared with the quality scorer */
  scores: ReadonlyMap<string, ComplexityScore>;
  warnings: UnsupportedConstructWarning[];
}

/**
 * Score one callable body.
 * Returns the warning instead of a score when the body cannot be scored.
 */
export function scoreCallable(
  entity: FunctionEntity,
  options: ComplexityOptions
): ComplexityScore | UnsupportedConstructWarning {
  let decisions = 0;
  let weighted = 0;

  for (const { node, nesting } of traverse(entity.body)) {
    if (UNSUPPORTED_TYPES.has(node.type)) {
      return unsupportedConstruct(entity.id, node.type, node.startPosition.row + 1);
    }
    if (DECISION_TYPES.has(node.type)) {
      decisions++;
      weighted += 1 + options.nestingIncrement * nesting;
    }
  }

  return {
    cyclomatic: 1 + decisions,
    cognitive: round4(options.flatMultiplier * (1 + weighted)),
    lines: entity.lineCount,
  };
}

/** Baseline score for a callable that could not be analyzed */
export function baselineScore(entity: FunctionEntity, options: ComplexityOptions): ComplexityScore {
  return { cyclomatic: 1, cognitive: round4(options.flatMultiplier), lines: entity.lineCount };
}

/** Score every callable and roll the results up per class and per file */
export function analyzeComplexity(
  inventory: EntityInventory,
  nonEmptyLines: number,
  options: ComplexityOptions
): ComplexityAnalysis {
  const scores = new Map<string, ComplexityScore>();
  const warnings: UnsupportedConstructWarning[] = [];

  for (const entity of inventory.callables) {
    const result = scoreCallable(entity, options);
    if ('kind' in result) {
      warnings.push(result);
      scores.set(entity.id, baselineScore(entity, options));
    } else {
      scores.set(entity.id, result);
    }
  }

  const functions: Record<string, ComplexityScore> = {};
  for (const entity of inventory.callables) {
    functions[entity.id] = { ...scoreOf(scores, entity.id) };
  }

  const classes: Record<string, ClassComplexity> = {};
  for (const cls of inventory.classes) {
    const methods = cls.methods.map(method => ({ name: method.name, ...scoreOf(scores, method.id) }));
    classes[cls.id] = {
      methods,
      total_cyclomatic: sum(methods.map(m => m.cyclomatic)),
      total_cognitive: round4(sum(methods.map(m => m.cognitive))),
      lines: cls.lineCount - sum(cls.methods.map(m => m.lineCount)),
      inherits_from: [...cls.superclasses],
      attributes: cls.attributes.map(name => ({ name })),
    };
  }

  const all = [...scores.values()];
  const totalCyclomatic = sum(all.map(s => s.cyclomatic));
  const totalCognitive = round4(sum(all.map(s => s.cognitive)));

  return {
    report: {
      functions,
      classes,
      overall: {
        total_cyclomatic: totalCyclomatic,
        total_cognitive: totalCognitive,
        average_cyclomatic: round4(ratio(totalCyclomatic, all.length)),
        average_cognitive: round4(ratio(totalCognitive, all.length)),
        complexity_density: round4(ratio(totalCyclomatic, nonEmptyLines)),
      },
    },
    scores,
    warnings,
  };
}

function scoreOf(scores: ReadonlyMap<string, ComplexityScore>, id: string): ComplexityScore {
  const score = scores.get(id);
  if (!score) {
    throw new Error(`No complexity score recorded for ${id}`);
  }
  return score;
}
