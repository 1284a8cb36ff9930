import { describe, it, expect, vi } from 'vitest';
import {
  answerQuery,
  cosineSimilarity,
  indexChunks,
  indexFileAnalyses,
  MemoryVectorStore,
  NO_RELEVANT_CODE_MESSAGE,
  type AnswerGenerator,
  type EmbeddingGenerator,
} from './rag.js';
import type { Chunk } from './chunker.js';
import { MemoryLogger } from './logger.js';
import { createFileAnalysis, createFunction, createLocation } from './ast/entities.js';

function chunk(content: string, index: number): Chunk {
  return { content, index, filePath: 'ledger.py', estimatedTokens: 1, metadata: { type: 'function' } };
}

/**
 * Two-dimensional embedding: [mentions ledger, mentions tax].
 */
function createFakeEmbeddings(): EmbeddingGenerator {
  const vectorFor = (text: string): number[] => [text.includes('ledger') ? 1 : 0, text.includes('tax') ? 1 : 0];
  return {
    embed: vi.fn(async (texts: string[]) => texts.map(vectorFor)),
    embedQuery: vi.fn(async (query: string) => vectorFor(query)),
  };
}

function createFakeGenerator(): AnswerGenerator {
  return { generateAnswer: vi.fn(async (query: string, context: string) => `${query} => ${context}`) };
}

describe('rag', () => {
  describe('cosineSimilarity', () => {
    it('should score identical directions as 1 and orthogonal ones as 0', () => {
      expect(cosineSimilarity([1, 0], [2, 0])).toBe(1);
      expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    });

    it('should return 0 for a zero vector', () => {
      expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    });

    it('should reject vectors of different lengths', () => {
      expect(() => cosineSimilarity([1], [1, 0])).toThrow('Vectors must have the same length');
    });
  });

  describe('MemoryVectorStore', () => {
    it('should return the closest chunks first', async () => {
      const store = new MemoryVectorStore();
      await store.add([chunk('a', 0), chunk('b', 1), chunk('c', 2)], [[0, 1], [1, 0], [1, 1]]);

      const results = await store.search([1, 0], 2);

      expect(results.map(r => r.content)).toEqual(['b', 'c']);
      expect(results[0]?.score).toBe(1);
      expect(store.size).toBe(3);
    });

    it('should reject a vector count that does not match the chunks', async () => {
      const store = new MemoryVectorStore();

      await expect(store.add([chunk('a', 0)], [])).rejects.toThrow('Got 0 vectors for 1 chunks');
    });
  });

  describe('answerQuery', () => {
    it('should answer from the retrieved chunks in similarity order', async () => {
      const embeddings = createFakeEmbeddings();
      const store = new MemoryVectorStore();
      const generator = createFakeGenerator();
      await indexChunks([chunk('compute tax', 0), chunk('post to ledger', 1)], { embeddings, store });

      const answer = await answerQuery('where is the ledger written', { embeddings, store, generator }, 1);

      expect(answer).toBe('where is the ledger written => post to ledger');
    });

    it('should join several chunks with newlines', async () => {
      const embeddings = createFakeEmbeddings();
      const store = new MemoryVectorStore();
      const generator = createFakeGenerator();
      await indexChunks([chunk('tax only', 0), chunk('ledger and tax', 1)], { embeddings, store });

      await answerQuery('tax', { embeddings, store, generator });

      expect(generator.generateAnswer).toHaveBeenCalledWith('tax', 'tax only\nledger and tax');
    });

    it('should not call the generator when nothing is retrieved', async () => {
      const logger = new MemoryLogger();
      const generator = createFakeGenerator();

      const answer = await answerQuery(
        'anything',
        { embeddings: createFakeEmbeddings(), store: new MemoryVectorStore(), generator, logger },
        3
      );

      expect(answer).toBe(NO_RELEVANT_CODE_MESSAGE);
      expect(generator.generateAnswer).not.toHaveBeenCalled();
      expect(logger.messages('warn')).toEqual(['No code chunks retrieved']);
    });
  });

  describe('indexChunks', () => {
    it('should skip embedding when there is nothing to index', async () => {
      const embeddings = createFakeEmbeddings();

      expect(await indexChunks([], { embeddings, store: new MemoryVectorStore() })).toBe(0);
      expect(embeddings.embed).not.toHaveBeenCalled();
    });
  });

  describe('indexFileAnalyses', () => {
    it('should chunk parsed files and skip failed ones', async () => {
      const embeddings = createFakeEmbeddings();
      const store = new MemoryVectorStore();
      const ledger = createFileAnalysis('ledger.py', [
        createFunction({ name: 'post_to_ledger', kind: 'function', location: createLocation('ledger.py', 3) }),
      ]);
      const broken = createFileAnalysis('broken.py', [], [], ['Syntax error at line 1: def broken(:']);

      const count = await indexFileAnalyses([ledger, broken], { embeddings, store });

      expect(count).toBe(1);
      expect(embeddings.embed).toHaveBeenCalledWith(['Function: post_to_ledger at line 3']);
    });

    it('should use the given chunk producer', async () => {
      const embeddings = createFakeEmbeddings();
      const store = new MemoryVectorStore();

      await indexFileAnalyses([createFileAnalysis('empty.py')], { embeddings, store }, analysis => [
        chunk(`custom ${analysis.filePath}`, 0),
      ]);

      expect(embeddings.embed).toHaveBeenCalledWith(['custom empty.py']);
    });
  });
});
