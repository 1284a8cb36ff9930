import { describe, it, expect } from 'vitest';
import { ContextScorer, tierForScore } from './context-scorer.js';
import {
  createClass,
  createFileAnalysis,
  createFunction,
  createLocation,
  createProjectAnalysis,
  createRelationship,
} from '../ast/entities.js';
import type { Entity, FileAnalysis, Relationship } from '../ast/types.js';

function fn(name: string, docstring?: string) {
  return createFunction({
    kind: 'function',
    name,
    location: createLocation('mod.py', 1),
    ...(docstring !== undefined ? { docstring } : {}),
  });
}

function projectOf(files: FileAnalysis[], allRelationships: Relationship[] = []) {
  return createProjectAnalysis({ projectName: 'books', rootPath: '/srv/books', fileAnalyses: files, allRelationships });
}

function fileScore(filePath: string, entities: Entity[] = [], relationships: Relationship[] = []) {
  const file = createFileAnalysis(filePath, entities, relationships);
  return new ContextScorer().scoreFile(file, projectOf([file]));
}

describe('ContextScorer', () => {
  describe('tierForScore', () => {
    it('should apply the tier boundaries exactly', () => {
      expect(tierForScore(1)).toBe('HIGH');
      expect(tierForScore(0.7)).toBe('HIGH');
      expect(tierForScore(0.6999)).toBe('MEDIUM');
      expect(tierForScore(0.4)).toBe('MEDIUM');
      expect(tierForScore(0.3999)).toBe('LOW');
      expect(tierForScore(0)).toBe('LOW');
    });
  });

  describe('scoreFile', () => {
    it('should score an undocumented tax helper file', () => {
      const score = fileScore('tax_utils.py', [fn('calculate_tax_amount')]);

      expect(score.overallScore).toBe('LOW');
      expect(score.domainRelevance).toBeCloseTo(0.22);
      expect(score.relationshipDensity).toBe(0);
      expect(score.docstringQuality).toBe(0);
      expect(score.testCoverage).toBe(0);
      expect(score.reasoning).toEqual([
        'Low domain relevance - utility or generic code',
        'Low connectivity - peripheral code',
        'Poorly documented - missing docstrings',
        'Test coverage unclear - not identified as test code',
      ]);
    });

    it('should combine docstring coverage and length', () => {
      const score = fileScore('mod.py', [fn('a', 'x'.repeat(100)), fn('b')]);
      expect(score.docstringQuality).toBeCloseTo(0.3);
    });

    it('should count internal and cross-file relationships per entity', () => {
      const file = createFileAnalysis('a.py', [fn('run'), fn('helper')], [createRelationship('run', 'helper', 'calls')]);
      const project = projectOf(
        [file],
        [
          createRelationship('a.py::run', 'b.py::load', 'calls', undefined, {
            cross_file: true,
            source_file: 'a.py',
            target_file: 'b.py',
          }),
          createRelationship('c.py::go', 'b.py::load', 'calls', undefined, {
            cross_file: true,
            source_file: 'c.py',
            target_file: 'b.py',
          }),
        ]
      );

      expect(new ContextScorer().scoreFile(file, project).relationshipDensity).toBeCloseTo(0.1);
    });

    it('should recognise test files by path token', () => {
      expect(fileScore('tests/helpers.py').testCoverage).toBe(0.8);
      expect(fileScore('ledger_test.py').testCoverage).toBe(0.8);
      expect(fileScore('contest.py').testCoverage).toBe(0);
    });

    it('should recognise test functions', () => {
      expect(fileScore('checks.py', [fn('test_posting')]).testCoverage).toBe(0.6);
    });

    it('should score an empty file as zero on every entity factor', () => {
      const score = fileScore('empty.py');
      expect([score.relationshipDensity, score.docstringQuality]).toEqual([0, 0]);
    });
  });

  describe('scoreEntity', () => {
    function entityScore(entity: Entity, relationships: Relationship[] = [], cross: Relationship[] = []) {
      const file = createFileAnalysis('a.py', [entity], relationships);
      return new ContextScorer().scoreEntity(entity, file, projectOf([file], cross));
    }

    it('should score an undocumented tax function', () => {
      const score = entityScore(fn('calculate_tax_amount'));

      expect(score).toEqual({
        overallScore: 'LOW',
        domainRelevance: 0.5,
        relationshipDensity: 0,
        docstringQuality: 0,
        testCoverage: 0,
        reasoning: [
          'Medium domain relevance - domain-related',
          'Low connectivity - rarely used',
          'Undocumented - missing or poor docstring',
          'Test coverage assessment requires test file analysis',
        ],
      });
    });

    it('should reward structured and descriptive docstrings', () => {
      expect(entityScore(fn('f', 'Args: x')).docstringQuality).toBeCloseTo(0.214);
      expect(entityScore(fn('f', 'Validate the entry before it is posted.')).docstringQuality).toBeCloseTo(0.478);
    });

    it('should count method relationships towards their class', () => {
      const ledger = createClass({ name: 'Ledger', location: createLocation('a.py', 1) });
      const score = entityScore(
        ledger,
        [createRelationship('Ledger.post', 'helper', 'calls'), createRelationship('run', 'Ledger', 'calls')],
        [createRelationship('a.py::Ledger.post', 'b.py::save', 'calls', undefined, { cross_file: true })]
      );

      expect(score.relationshipDensity).toBeCloseTo(0.6);
    });

    it('should not count a longer name as the entity', () => {
      const score = entityScore(fn('post'), [createRelationship('post_all', 'helper', 'calls')]);
      expect(score.relationshipDensity).toBe(0);
    });

    it('should reach HIGH for a documented, connected domain function', () => {
      const docstring =
        'Post the invoice payment to the ledger account.\n\nArgs:\n    invoice: the invoice to settle\n\nReturns:\n    the created ledger posting';
      const score = entityScore(fn('post_invoice_payment', docstring), [
        createRelationship('post_invoice_payment', 'a', 'calls'),
        createRelationship('post_invoice_payment', 'b', 'calls'),
        createRelationship('post_invoice_payment', 'c', 'calls'),
        createRelationship('post_invoice_payment', 'd', 'calls'),
        createRelationship('post_invoice_payment', 'e', 'calls'),
      ]);

      expect(score.domainRelevance).toBe(1);
      expect(score.relationshipDensity).toBe(1);
      expect(score.overallScore).toBe('HIGH');
    });
  });

  it('should accept custom keyword tables', () => {
    const scorer = new ContextScorer({ entityKeywords: ['parcel'], businessVerbs: ['ship'] });
    const entity = fn('ship_parcel');
    const file = createFileAnalysis('a.py', [entity]);

    expect(scorer.scoreEntity(entity, file, projectOf([file])).domainRelevance).toBeCloseTo(0.5);
  });
});
