/**
 * Workflow inference: shortest call paths between entities tagged with a
 * pattern's start and end concepts.
 *
 * Hints are not deduplicated. The same path can be reported by several
 * patterns or (start, end) pairs.
 */

import type { Relationship } from '../ast/types.js';
import { silentLogger, type Logger } from '../logger.js';
import { ACCOUNTING_WORKFLOW_PATTERNS } from './concepts.js';
import type { DomainContext, WorkflowHint, WorkflowPattern, WorkflowRole, WorkflowStep } from './types.js';

/**
 * An entity with its domain context, as the detector sees it.
 */
export interface TaggedEntity {
  name: string;
  filePath: string;
  context: DomainContext;
}

export type CallGraph = Map<string, Set<string>>;

export interface WorkflowDetectorOptions {
  patterns?: readonly WorkflowPattern[];
  logger?: Logger;
}

/**
 * Caller → callees from `calls` relationships, in the order they were
 * recorded.
 */
export function buildCallGraph(relationships: readonly Relationship[]): CallGraph {
  const graph: CallGraph = new Map();
  for (const rel of relationships) {
    if (rel.kind !== 'calls') {
      continue;
    }
    let callees = graph.get(rel.source);
    if (!callees) {
      callees = new Set();
      graph.set(rel.source, callees);
    }
    callees.add(rel.target);
  }
  return graph;
}

/**
 * Breadth-first search from `start` to `end`. Returns the first path found,
 * which has the fewest edges, or null.
 */
export function findCallPath(start: string, end: string, graph: CallGraph): string[] | null {
  const visited = new Set<string>([start]);
  const queue: string[][] = [[start]];

  for (let head = 0; head < queue.length; head++) {
    const path = queue[head] ?? [];
    const current = path[path.length - 1];
    if (current === undefined) {
      continue;
    }
    if (current === end) {
      return path;
    }
    for (const next of graph.get(current) ?? []) {
      if (!visited.has(next)) {
        visited.add(next);
        queue.push([...path, next]);
      }
    }
  }

  return null;
}

function roleAt(index: number, length: number): WorkflowRole {
  if (index === 0) {
    return 'initiator';
  }
  return index === length - 1 ? 'finalizer' : 'processor';
}

export class WorkflowDetector {
  private readonly patterns: readonly WorkflowPattern[];
  private readonly logger: Logger;

  constructor(options: WorkflowDetectorOptions = {}) {
    this.patterns = options.patterns ?? ACCOUNTING_WORKFLOW_PATTERNS;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Detect workflow hints over tagged entities and their call relationships.
   *
   * Entities are looked up by bare name; when two share a name the later one
   * is used.
   */
  detect(entities: readonly TaggedEntity[], relationships: readonly Relationship[]): WorkflowHint[] {
    const byName = new Map<string, TaggedEntity>();
    for (const entity of entities) {
      byName.set(entity.name, entity);
    }
    const graph = buildCallGraph(relationships);

    const hints: WorkflowHint[] = [];
    for (const pattern of this.patterns) {
      const starts = candidates(byName, pattern.startConcepts);
      const ends = candidates(byName, pattern.endConcepts);

      for (const start of starts) {
        for (const end of ends) {
          if (start === end) {
            continue;
          }
          const path = findCallPath(start, end, graph);
          if (!path) {
            continue;
          }
          const hint = buildHint(pattern, path, byName);
          if (hint) {
            hints.push(hint);
          }
        }
      }
    }

    this.logger.info('Detected workflow hints', { workflows: hints.length });
    return hints;
  }
}

function candidates(byName: ReadonlyMap<string, TaggedEntity>, concepts: readonly string[]): string[] {
  return [...byName.values()]
    .filter(entity => entity.context.primaryTag !== undefined && concepts.includes(entity.context.primaryTag))
    .map(entity => entity.name);
}

function buildHint(
  pattern: WorkflowPattern,
  path: readonly string[],
  byName: ReadonlyMap<string, TaggedEntity>
): WorkflowHint | null {
  const steps: WorkflowStep[] = [];
  let totalConfidence = 0;

  path.forEach((name, index) => {
    const entity = byName.get(name);
    // Unknown callees stay in the path but get no step
    if (!entity) {
      return;
    }
    steps.push({
      entityName: entity.name,
      filePath: entity.filePath,
      domainTags: entity.context.tags.map(tag => tag.tag),
      role: roleAt(index, path.length),
    });
    totalConfidence += entity.context.tags[0]?.confidence ?? 0;
  });

  if (steps.length === 0) {
    return null;
  }

  const route = path.join(' -> ');
  return {
    name: `${pattern.name}: ${steps.map(step => step.entityName).join(' -> ')}`,
    steps,
    confidence: Math.min(totalConfidence / steps.length, 1),
    reasoning: [`Found call path: ${route}`, `Matches ${pattern.name} pattern`, `Business process: ${pattern.businessProcess}`],
    businessProcess: pattern.businessProcess,
  };
}
