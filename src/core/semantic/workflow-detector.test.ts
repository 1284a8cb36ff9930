import { describe, it, expect } from 'vitest';
import { WorkflowDetector, buildCallGraph, findCallPath, type TaggedEntity } from './workflow-detector.js';
import { createRelationship } from '../ast/entities.js';
import type { DomainContext, WorkflowPattern } from './types.js';

function tagged(name: string, tag?: string, confidence = 0.4, filePath = 'books.py'): TaggedEntity {
  const context: DomainContext = tag
    ? { tags: [{ tag, confidence, reasoning: [] }], primaryTag: tag, isDomainRelated: true }
    : { tags: [], isDomainRelated: false };
  return { name, filePath, context };
}

function calls(...edges: Array<[string, string]>) {
  return edges.map(([source, target]) => createRelationship(source, target, 'calls'));
}

describe('workflow detection', () => {
  describe('findCallPath', () => {
    it('should return a shortest path', () => {
      const graph = buildCallGraph(
        calls(['a', 'c'], ['c', 'e'], ['e', 'd'], ['a', 'b'], ['b', 'd'])
      );
      expect(findCallPath('a', 'd', graph)).toEqual(['a', 'b', 'd']);
    });

    it('should terminate on cycles without a path', () => {
      const graph = buildCallGraph(calls(['a', 'b'], ['b', 'a']));
      expect(findCallPath('a', 'z', graph)).toBeNull();
    });

    it('should ignore relationships other than calls', () => {
      const graph = buildCallGraph([createRelationship('Child', 'Base', 'inherits')]);
      expect(graph.size).toBe(0);
    });
  });

  describe('WorkflowDetector', () => {
    const detector = new WorkflowDetector();

    it('should infer a ledger posting workflow from a call chain', () => {
      const entities = [
        tagged('post_journal_entry', 'journal_entry', 0.6),
        tagged('validate_entry'),
        tagged('write_to_ledger', 'ledger', 0.4, 'ledger.py'),
      ];
      const relationships = calls(['post_journal_entry', 'validate_entry'], ['validate_entry', 'write_to_ledger']);

      const hints = detector.detect(entities, relationships);

      expect(hints).toHaveLength(1);
      const [hint] = hints;
      expect(hint?.name).toBe('journal_to_ledger: post_journal_entry -> validate_entry -> write_to_ledger');
      expect(hint?.businessProcess).toBe('ledger_posting');
      expect(hint?.confidence).toBeCloseTo(1 / 3);
      expect(hint?.steps).toEqual([
        { entityName: 'post_journal_entry', filePath: 'books.py', domainTags: ['journal_entry'], role: 'initiator' },
        { entityName: 'validate_entry', filePath: 'books.py', domainTags: [], role: 'processor' },
        { entityName: 'write_to_ledger', filePath: 'ledger.py', domainTags: ['ledger'], role: 'finalizer' },
      ]);
      expect(hint?.reasoning).toEqual([
        'Found call path: post_journal_entry -> validate_entry -> write_to_ledger',
        'Matches journal_to_ledger pattern',
        'Business process: ledger_posting',
      ]);
    });

    it('should leave callees that are not entities out of the steps', () => {
      const entities = [tagged('post_journal_entry', 'journal_entry'), tagged('write_to_ledger', 'ledger')];
      const relationships = calls(['post_journal_entry', 'self.helper'], ['self.helper', 'write_to_ledger']);

      const [hint] = detector.detect(entities, relationships);

      expect(hint?.name).toBe('journal_to_ledger: post_journal_entry -> write_to_ledger');
      expect(hint?.steps.map(s => s.role)).toEqual(['initiator', 'finalizer']);
      expect(hint?.reasoning[0]).toBe('Found call path: post_journal_entry -> self.helper -> write_to_ledger');
    });

    it('should emit nothing when no path connects the concepts', () => {
      const entities = [tagged('post_journal_entry', 'journal_entry'), tagged('write_to_ledger', 'ledger')];
      expect(detector.detect(entities, calls(['write_to_ledger', 'post_journal_entry']))).toEqual([]);
    });

    it('should report the same path once per matching pattern', () => {
      const entities = [tagged('bill_customer', 'invoice', 0.2), tagged('apply_tax', 'tax', 0.6)];
      const patterns: WorkflowPattern[] = [
        { name: 'first', startConcepts: ['invoice'], endConcepts: ['tax'], intermediateConcepts: [], businessProcess: 'one' },
        { name: 'second', startConcepts: ['invoice'], endConcepts: ['tax'], intermediateConcepts: [], businessProcess: 'two' },
      ];

      const hints = new WorkflowDetector({ patterns }).detect(entities, calls(['bill_customer', 'apply_tax']));

      expect(hints.map(h => h.name)).toEqual(['first: bill_customer -> apply_tax', 'second: bill_customer -> apply_tax']);
      expect(hints[0]?.confidence).toBeCloseTo(0.4);
    });

    it('should produce identical hints on repeated runs', () => {
      const entities = [
        tagged('create_invoice', 'invoice'),
        tagged('route_a'),
        tagged('route_b'),
        tagged('record_payment', 'payment'),
      ];
      const relationships = calls(
        ['create_invoice', 'route_a'],
        ['create_invoice', 'route_b'],
        ['route_a', 'record_payment'],
        ['route_b', 'record_payment']
      );

      const first = detector.detect(entities, relationships);
      const second = detector.detect(entities, relationships);

      expect(first).toEqual(second);
      expect(first[0]?.name).toBe('invoice_to_payment: create_invoice -> route_a -> record_payment');
    });
  });
});
