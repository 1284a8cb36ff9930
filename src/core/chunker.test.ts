import { describe, it, expect } from 'vitest';
import { createChunks, estimateTokens, EMPTY_ANALYSIS_TEXT } from './chunker.js';
import { createFileAnalysis, createImport, createLocation } from './ast/entities.js';
import { PythonFileParser } from './ast/file-parser.js';

const LEDGER_SOURCE = [
  'class Ledger(Base, Mixin):',
  '    def post(self):',
  '        self.save()',
  '',
  'def total(items):',
  '    return sum(items)',
  '',
  'def report():',
  '    total([])',
  '    total([1])',
  "    print('x')",
  '',
].join('\n');

describe('chunker', () => {
  describe('estimateTokens', () => {
    it('should count four characters per token, rounding up', () => {
      expect(estimateTokens('abcdefghi')).toBe(3);
    });

    it('should return 0 for blank text', () => {
      expect(estimateTokens('')).toBe(0);
      expect(estimateTokens('   \n')).toBe(0);
    });
  });

  describe('createChunks', () => {
    it('should describe functions with their callees and classes with bases and methods', () => {
      const analysis = new PythonFileParser().parseSource(LEDGER_SOURCE, 'books/ledger.py');
      const chunks = createChunks(analysis);

      expect(chunks.map(chunk => chunk.content)).toEqual([
        'Function: total at line 5. Calls: sum',
        'Function: report at line 8. Calls: total, print',
        'Class: Ledger at line 1. Bases: Base, Mixin. Methods: post',
      ]);
      expect(chunks.map(chunk => chunk.index)).toEqual([0, 1, 2]);
      expect(chunks[2]).toMatchObject({
        filePath: 'books/ledger.py',
        startLine: 1,
        metadata: { type: 'class', name: 'Ledger' },
      });
    });

    it('should leave out calls for a function that makes none', () => {
      const analysis = new PythonFileParser().parseSource('def noop():\n    pass\n', 'noop.py');

      expect(createChunks(analysis).map(chunk => chunk.content)).toEqual(['Function: noop at line 1']);
    });

    it('should list imports first in a single chunk', () => {
      const analysis = createFileAnalysis('app.py', [
        createImport({ name: 'os', location: createLocation('app.py', 1), module: 'os' }),
        createImport({ name: 'Decimal', location: createLocation('app.py', 2), module: 'decimal', isFrom: true }),
      ]);

      const chunks = createChunks(analysis);

      expect(chunks).toEqual([
        {
          content: 'Imports: os, decimal.Decimal',
          index: 0,
          filePath: 'app.py',
          estimatedTokens: 7,
          metadata: { type: 'imports' },
        },
      ]);
    });

    it('should return a placeholder when the analysis has no entities', () => {
      const chunks = createChunks(createFileAnalysis('empty.py', [], [], ['empty.py: Syntax error at line 1: x']));

      expect(chunks).toHaveLength(1);
      expect(chunks[0]?.content).toBe(EMPTY_ANALYSIS_TEXT);
      expect(chunks[0]?.metadata).toEqual({ type: 'placeholder' });
    });
  });
});
