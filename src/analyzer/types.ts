import type Parser from 'tree-sitter';

export type SyntaxNode = Parser.SyntaxNode;

/** The kind of extracted code unit */
export type EntityKind = 'function' | 'method' | 'class';

/** Naming conventions recognised by the quality scorer */
export type NamingConvention = 'snake_case' | 'camelCase' | 'PascalCase';

export type DominantNamingConvention = NamingConvention | 'mixed';

/** Parsed source text, produced once per run */
export interface ParsedSource {
  text: string;
  tree: Parser.Tree;
  root: SyntaxNode;
  /** Physical lines (splitlines semantics, no terminators) */
  lines: readonly string[];
}

interface EntityBase {
  /** Unique key within one inventory: `Class.method` for methods, `name#2` for a repeated name */
  id: string;
  name: string;
  startLine: number;
  endLine: number;
  lineCount: number;
  hasDocstring: boolean;
  /** Decorator names, e.g. ["property", "tf.function"] */
  decorators: readonly string[];
  /** The definition node (decorated_definition when decorated) */
  node: SyntaxNode;
  body: SyntaxNode;
}

/** A module-level function or a method of a class */
export interface FunctionEntity extends EntityBase {
  kind: 'function' | 'method';
  parameters: readonly string[];
  /** Owning class id, null for module-level functions */
  ownerClass: string | null;
}

export interface ClassEntity extends EntityBase {
  kind: 'class';
  /** Positional base-class expressions as written */
  superclasses: readonly string[];
  metaclass: string | null;
  attributes: readonly string[];
  methods: readonly FunctionEntity[];
}

export type Entity = FunctionEntity | ClassEntity;

/** Immutable structural inventory handed from stage to stage */
export interface EntityInventory {
  importCount: number;
  functions: readonly FunctionEntity[];
  classes: readonly ClassEntity[];
  /** Functions and methods in source order */
  callables: readonly FunctionEntity[];
  /** Every entity in source order, each class followed by its methods */
  entities: readonly Entity[];
}

/** Per-callable complexity score */
export interface ComplexityScore {
  cyclomatic: number;
  cognitive: number;
  lines: number;
}

export interface MethodComplexity extends ComplexityScore {
  name: string;
}

export interface ClassComplexity {
  methods: MethodComplexity[];
  total_cyclomatic: number;
  total_cognitive: number;
  lines: number;
  inherits_from: string[];
  attributes: { name: string }[];
}

export interface OverallComplexity {
  total_cyclomatic: number;
  total_cognitive: number;
  average_cyclomatic: number;
  average_cognitive: number;
  complexity_density: number;
}

export interface ComplexityReport {
  functions: Record<string, ComplexityScore>;
  classes: Record<string, ClassComplexity>;
  overall: OverallComplexity;
}

/** File-level counts */
export interface FileMetrics {
  total_lines: number;
  non_empty_lines: number;
  character_count: number;
  import_count: number;
  class_count: number;
  function_count: number;
}

/** How an edge came to exist */
export type EdgeOrigin = 'membership' | 'reference';

/** A directed "references" relation between two entities of the same file */
export interface DependencyEdge {
  source: string;
  target: string;
  origin: EdgeOrigin;
}

export interface DependencyEntry {
  type: EntityKind;
  depends_on: string[];
  depended_by: string[];
}

export type DependencyReport = Record<string, DependencyEntry>;

export type PatternCategory =
  | 'neural_network'
  | 'optimization'
  | 'attention_mechanism'
  | 'linear_algebra'
  | 'design_patterns';

export type PatternFlags = Record<string, Record<string, boolean>>;

export interface EntryPoint {
  function: string;
  parameters: string[];
}

export interface ExitPoint {
  function: string;
  returns: string[];
}

export interface DataPath {
  from: string;
  to: string;
}

export interface DataFlowReport {
  entry_points: EntryPoint[];
  exit_points: ExitPoint[];
  data_paths: DataPath[];
}

export interface QualityMetrics {
  docstring_coverage: number;
  naming_consistency: number;
  average_function_length: number;
  complexity_ratio: number;
  overall_quality: number;
  dominant_naming_convention: DominantNamingConvention;
}

/** The complete output of one analysis run */
export interface Report {
  metrics: FileMetrics;
  complexity: ComplexityReport;
  dependencies: DependencyReport;
  algorithms: PatternFlags;
  data_flow: DataFlowReport;
  code_quality: QualityMetrics;
}

/** Recursively read-only view of a value */
export type DeepReadonly<T> = T extends (infer U)[]
  ? readonly DeepReadonly<U>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

/** Engine tuning constants */
export interface ComplexityOptions {
  /** Cognitive cost of one flat decision point (and of the baseline) */
  flatMultiplier: number;
  /** Extra fraction of flatMultiplier charged per nesting level */
  nestingIncrement: number;
}

export interface QualityWeights {
  docstring: number;
  naming: number;
  functionLength: number;
  complexity: number;
}

export interface QualityOptions {
  weights: QualityWeights;
  functionLengthThreshold: number;
  complexityRatioScale: number;
  complexityRatioThreshold: number;
  mixedNamingThreshold: number;
}

export interface EngineConfig {
  complexity: ComplexityOptions;
  quality: QualityOptions;
}

/** Configuration file schema */
export interface CodeProbeConfig {
  include: string[];
  exclude: string[];
  output: string;
  outDir: string;
  complexity?: Partial<ComplexityOptions>;
  quality?: Partial<Omit<QualityOptions, 'weights'>> & { weights?: Partial<QualityWeights> };
}

/** Resolved config (with defaults applied) */
export interface ResolvedConfig {
  include: string[];
  exclude: string[];
  output: string;
  outDir: string;
  engine: EngineConfig;
  projectRoot: string;
}
