import { describe, it, expect } from 'vitest';
import { DomainTagger } from './domain-tagger.js';
import { createFileAnalysis, createFunction, createLocation } from '../ast/entities.js';
import { MemoryLogger } from '../logger.js';

function fn(name: string, filePath = 'mod.py', docstring?: string) {
  return createFunction({
    kind: 'function',
    name,
    location: createLocation(filePath, 1),
    ...(docstring !== undefined ? { docstring } : {}),
  });
}

describe('DomainTagger', () => {
  const tagger = new DomainTagger();

  describe('tagText', () => {
    it('should match keywords inside snake_case names', () => {
      expect(tagger.tagText('calculate_tax_amount', 'entity name')).toEqual([
        { tag: 'tax', confidence: 0.2, reasoning: ['Found 1 keyword matches in entity name: tax'] },
      ]);
    });

    it('should match keywords inside camelCase names', () => {
      const tags = tagger.tagText('postJournalEntry', 'entity name');

      expect(tags.map(t => t.tag)).toEqual(['ledger', 'journal_entry']);
      expect(tags[1]?.confidence).toBeCloseTo(0.6);
      expect(tags[1]?.reasoning).toEqual([
        'Found 3 keyword matches in entity name: journal, journal_entry, entry',
      ]);
    });

    it('should match multi-word keywords across spaces', () => {
      const [ledger] = tagger.tagText('Post a journal entry to the general ledger', 'docstring');

      expect(ledger?.reasoning).toEqual(['Found 3 keyword matches in docstring: ledger, entry, general_ledger']);
    });

    it('should cap one text and summarize long keyword lists', () => {
      expect(tagger.tagText('ledger posting debit credit balance', 'docstring')).toEqual([
        {
          tag: 'ledger',
          confidence: 0.8,
          reasoning: ['Found 5 keyword matches in docstring: ledger, posting, debit (and 2 more)'],
        },
      ]);
    });

    it('should only match whole words', () => {
      expect(tagger.tagText('taxonomy_builder', 'entity name')).toEqual([]);
    });
  });

  describe('tagEntity', () => {
    it('should make the strongest tag primary', () => {
      expect(tagger.tagEntity(fn('calculate_tax_amount'))).toEqual({
        tags: [{ tag: 'tax', confidence: 0.2, reasoning: ['Found 1 keyword matches in entity name: tax'] }],
        primaryTag: 'tax',
        isDomainRelated: true,
      });
    });

    it('should add name and docstring matches', () => {
      const context = tagger.tagEntity(fn('settle', 'mod.py', 'Record the payment of an invoice.'));

      expect(context.tags.map(t => [t.tag, t.confidence])).toEqual([
        ['invoice', 0.2],
        ['payment', 0.2],
      ]);
      expect(context.tags[1]?.reasoning).toEqual([
        'Found 1 keyword matches in docstring: payment',
      ]);
    });

    it('should break confidence ties by vocabulary order', () => {
      expect(tagger.tagEntity(fn('validate_entry')).primaryTag).toBe('ledger');
    });

    it('should leave unrelated entities untagged', () => {
      expect(tagger.tagEntity(fn('slugify'))).toEqual({ tags: [], isDomainRelated: false });
    });
  });

  describe('tagFile', () => {
    it('should sum file name and entity matches', () => {
      const file = createFileAnalysis('tax_utils.py', [fn('calculate_tax_amount', 'tax_utils.py')]);

      expect(tagger.tagFile(file)).toEqual({
        tags: [
          {
            tag: 'tax',
            confidence: 0.4,
            reasoning: [
              'Found 1 keyword matches in file name: tax',
              'Found 1 keyword matches in name of calculate_tax_amount: tax',
            ],
          },
        ],
        primaryTag: 'tax',
        isDomainRelated: true,
      });
    });

    it('should boost every found concept on a path match', () => {
      const file = createFileAnalysis('accounts/helpers.py', [fn('make_invoice', 'accounts/helpers.py')]);

      expect(tagger.tagFile(file).tags).toEqual([
        {
          tag: 'invoice',
          confidence: 0.5,
          reasoning: [
            'Found 1 keyword matches in name of make_invoice: invoice',
            'File path matches domain pattern: accounts',
          ],
        },
      ]);
    });

    it('should mark a matching path as domain-related without tags', () => {
      expect(tagger.tagFile(createFileAnalysis('finance/util.py'))).toEqual({ tags: [], isDomainRelated: true });
    });

    it('should log each tagged file', () => {
      const logger = new MemoryLogger();
      new DomainTagger({ logger }).tagFile(createFileAnalysis('tax.py'));

      expect(logger.entries).toEqual([
        { level: 'debug', message: 'Tagged file', fields: { file: 'tax.py', tags: 1, primary: 'tax' } },
      ]);
    });
  });

  it('should use a custom vocabulary', () => {
    const shipping = new DomainTagger({
      vocabulary: { concepts: { shipping: ['parcel', 'courier'] }, pathPatterns: [/logistics/i] },
    });

    expect(shipping.tagText('sendParcelByCourier', 'entity name')).toEqual([
      { tag: 'shipping', confidence: 0.4, reasoning: ['Found 2 keyword matches in entity name: parcel, courier'] },
    ]);
    expect(shipping.tagText('calculate_tax', 'entity name')).toEqual([]);
  });
});
