/**
 * Retrieval over code chunks.
 *
 * Embedding, storage and answer generation are ports: the pipeline only
 * orders the calls. {@link MemoryVectorStore} is the one store shipped here.
 */

import type { FileAnalysis } from './ast/types.js';
import { createChunks, type Chunk } from './chunker.js';
import { silentLogger, type Logger } from './logger.js';

export const DEFAULT_TOP_K = 5;

export const NO_RELEVANT_CODE_MESSAGE =
  'No relevant code found in the indexed codebase. Index the project before asking questions about it.';

export type ChunkProducer = (analysis: FileAnalysis) => Chunk[];

export interface EmbeddingGenerator {
  embed(texts: string[]): Promise<number[][]>;
  embedQuery(query: string): Promise<number[]>;
}

export interface RetrievedChunk extends Chunk {
  /** Similarity to the query, higher is closer */
  score: number;
}

export interface VectorStore {
  add(chunks: Chunk[], vectors: number[][]): Promise<void>;
  search(vector: number[], topK: number): Promise<RetrievedChunk[]>;
}

export interface AnswerGenerator {
  generateAnswer(query: string, context: string): Promise<string>;
}

export interface RagDeps {
  embeddings: EmbeddingGenerator;
  store: VectorStore;
  generator: AnswerGenerator;
  logger?: Logger;
}

/**
 * Calculate cosine similarity between two vectors.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error('Vectors must have the same length');
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;
  a.forEach((aVal, i) => {
    const bVal = b[i] ?? 0;
    dotProduct += aVal * bVal;
    normA += aVal * aVal;
    normB += bVal * bVal;
  });

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  if (denominator === 0) {
    return 0;
  }
  return dotProduct / denominator;
}

/**
 * Brute-force cosine search over vectors held in memory.
 */
export class MemoryVectorStore implements VectorStore {
  private readonly rows: Array<{ chunk: Chunk; vector: number[] }> = [];

  get size(): number {
    return this.rows.length;
  }

  async add(chunks: Chunk[], vectors: number[][]): Promise<void> {
    if (chunks.length !== vectors.length) {
      throw new Error(`Got ${vectors.length} vectors for ${chunks.length} chunks`);
    }
    chunks.forEach((chunk, i) => {
      this.rows.push({ chunk, vector: vectors[i] ?? [] });
    });
  }

  async search(vector: number[], topK: number): Promise<RetrievedChunk[]> {
    return this.rows
      .map(row => ({ ...row.chunk, score: cosineSimilarity(vector, row.vector) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, topK);
  }
}

/**
 * Embed chunks and add them to the store.
 */
export async function indexChunks(chunks: Chunk[], deps: Pick<RagDeps, 'embeddings' | 'store' | 'logger'>): Promise<number> {
  if (chunks.length === 0) {
    return 0;
  }
  const vectors = await deps.embeddings.embed(chunks.map(chunk => chunk.content));
  await deps.store.add(chunks, vectors);
  (deps.logger ?? silentLogger).info('Indexed chunks', { chunks: chunks.length });
  return chunks.length;
}

/**
 * Chunk every analyzed file and index the chunks. Files that failed to parse
 * are skipped.
 */
export async function indexFileAnalyses(
  analyses: readonly FileAnalysis[],
  deps: Pick<RagDeps, 'embeddings' | 'store' | 'logger'>,
  produceChunks: ChunkProducer = createChunks
): Promise<number> {
  const chunks = analyses.filter(analysis => analysis.errors.length === 0).flatMap(produceChunks);
  return indexChunks(chunks, deps);
}

/**
 * Answer a question from the closest stored chunks. Without any retrieved
 * chunk the generator is not called.
 */
export async function answerQuery(query: string, deps: RagDeps, topK: number = DEFAULT_TOP_K): Promise<string> {
  const logger = deps.logger ?? silentLogger;
  logger.info('Answering query', { query: query.slice(0, 50), topK });

  const vector = await deps.embeddings.embedQuery(query);
  const retrieved = await deps.store.search(vector, topK);
  if (retrieved.length === 0) {
    logger.warn('No code chunks retrieved');
    return NO_RELEVANT_CODE_MESSAGE;
  }

  const context = retrieved.map(chunk => chunk.content).join('\n');
  logger.debug('Built answer context', { characters: context.length, chunks: retrieved.length });
  return deps.generator.generateAnswer(query, context);
}
