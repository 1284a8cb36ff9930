import { classesOf, functionsOf, importsOf } from './ast/entities.js';
import type { FileAnalysis, ImportEntity } from './ast/types.js';

export type ChunkKind = 'imports' | 'function' | 'class' | 'placeholder';

/**
 * A text description of part of a file, ready for embedding.
 */
export interface Chunk {
  /** The chunk content */
  content: string;
  /** Index of this chunk in the sequence */
  index: number;
  /** File the chunk describes */
  filePath: string;
  /** Estimated token count */
  estimatedTokens: number;
  /** Line number of the described entity (1-based) */
  startLine?: number;
  metadata: {
    type: ChunkKind;
    /** Name of the function or class */
    name?: string;
  };
}

export const EMPTY_ANALYSIS_TEXT = 'No code entities found in analysis';

/**
 * Average characters per token for estimation.
 */
const CHARS_PER_TOKEN = 4;

/**
 * Estimate the number of tokens in a text string.
 * This is a simple heuristic - actual token counts vary by model.
 */
export function estimateTokens(text: string): number {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return 0;
  }
  return Math.ceil(trimmed.length / CHARS_PER_TOKEN);
}

function importLabel(entity: ImportEntity): string {
  return entity.isFrom ? `${entity.module}.${entity.name}` : entity.name;
}

/**
 * Callee names per caller, first-seen order, no repeats.
 */
function calleesBySource(analysis: FileAnalysis): Map<string, string[]> {
  const callees = new Map<string, string[]>();
  for (const relationship of analysis.relationships) {
    if (relationship.kind !== 'calls') {
      continue;
    }
    const targets = callees.get(relationship.source) ?? [];
    if (!targets.includes(relationship.target)) {
      targets.push(relationship.target);
    }
    callees.set(relationship.source, targets);
  }
  return callees;
}

/**
 * Describe a file analysis as text chunks: one for its imports, one per
 * top-level function with the names it calls, one per class with its bases
 * and methods. An analysis with none of these yields a single placeholder.
 */
export function createChunks(analysis: FileAnalysis): Chunk[] {
  const drafts: Array<Omit<Chunk, 'index' | 'filePath' | 'estimatedTokens'>> = [];

  const imports = importsOf(analysis);
  if (imports.length > 0) {
    drafts.push({
      content: `Imports: ${imports.map(importLabel).join(', ')}`,
      metadata: { type: 'imports' },
    });
  }

  const callees = calleesBySource(analysis);
  for (const fn of functionsOf(analysis)) {
    let content = `Function: ${fn.name} at line ${fn.location.lineStart}`;
    const calls = callees.get(fn.name);
    if (calls) {
      content += `. Calls: ${calls.join(', ')}`;
    }
    drafts.push({ content, startLine: fn.location.lineStart, metadata: { type: 'function', name: fn.name } });
  }

  for (const cls of classesOf(analysis)) {
    let content = `Class: ${cls.name} at line ${cls.location.lineStart}`;
    if (cls.baseClasses.length > 0) {
      content += `. Bases: ${cls.baseClasses.join(', ')}`;
    }
    if (cls.methods.length > 0) {
      content += `. Methods: ${cls.methods.map(method => method.name).join(', ')}`;
    }
    drafts.push({ content, startLine: cls.location.lineStart, metadata: { type: 'class', name: cls.name } });
  }

  if (drafts.length === 0) {
    drafts.push({ content: EMPTY_ANALYSIS_TEXT, metadata: { type: 'placeholder' } });
  }

  return drafts.map((draft, index) => ({
    ...draft,
    index,
    filePath: analysis.filePath,
    estimatedTokens: estimateTokens(draft.content),
  }));
}
