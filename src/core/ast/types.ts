/**
 * Core type definitions for structural analysis of Python sources
 */

/**
 * Kind of code entity
 */
export type EntityKind = 'function' | 'async_function' | 'class' | 'import';

export type FunctionKind = Extract<EntityKind, 'function' | 'async_function'>;

export const RELATION_KINDS = ['calls', 'inherits', 'imports', 'uses', 'depends_on'] as const;

/**
 * Kind of relationship between entities
 */
export type RelationKind = (typeof RELATION_KINDS)[number];

/**
 * Values allowed in entity and relationship metadata
 */
export type MetadataValue = string | number | boolean | null | string[];

export type Metadata = Readonly<Record<string, MetadataValue>>;

/**
 * Position of an entity or relationship in a source file
 */
export interface Location {
  /** File path, relative to the project root when produced by the aggregator */
  readonly filePath: string;
  /** Starting line number (1-based) */
  readonly lineStart: number;
  /** Ending line number (1-based), when known */
  readonly lineEnd?: number;
  /** Starting column (0-based) */
  readonly columnStart: number;
}

interface EntityBase {
  readonly name: string;
  readonly location: Location;
  readonly docstring?: string;
  /** First lines of the definition */
  readonly sourceCode?: string;
  readonly metadata: Metadata;
}

/**
 * A function or method
 */
export interface FunctionEntity extends EntityBase {
  readonly kind: FunctionKind;
}

/**
 * A class with its methods in definition order
 */
export interface ClassEntity extends EntityBase {
  readonly kind: 'class';
  readonly methods: readonly FunctionEntity[];
  readonly baseClasses: readonly string[];
}

/**
 * One imported name
 */
export interface ImportEntity extends EntityBase {
  readonly kind: 'import';
  readonly module: string;
  readonly alias?: string;
  /** Whether this came from a `from X import Y` statement */
  readonly isFrom: boolean;
}

export type Entity = FunctionEntity | ClassEntity | ImportEntity;

/**
 * A directed, name-based edge between two entities.
 *
 * Source and target are plain names, not resolved references: a call to
 * `self.repo.save` is recorded as `self.repo.save` whether or not anything
 * with that name exists in the project.
 */
export interface Relationship {
  readonly source: string;
  readonly target: string;
  readonly kind: RelationKind;
  readonly sourceLocation?: Location;
  readonly metadata: Metadata;
}

/**
 * Result of analyzing one file. Non-empty errors mean the parse-level
 * entities are absent.
 */
export interface FileAnalysis {
  readonly filePath: string;
  readonly entities: readonly Entity[];
  readonly relationships: readonly Relationship[];
  readonly errors: readonly string[];
}

/**
 * Result of analyzing a project
 */
export interface ProjectAnalysis {
  readonly projectName: string;
  readonly rootPath: string;
  readonly fileAnalyses: readonly FileAnalysis[];
  /** Relationships re-emitted with file-qualified ends because they cross files */
  readonly allRelationships: readonly Relationship[];
  readonly errors: readonly string[];
}
