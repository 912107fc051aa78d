import { describe, expect, it } from '@jest/globals';

import { KeywordRetriever } from './keyword.retriever.js';
import { KnowledgeBase } from './knowledge-base.js';
import { NO_GUIDE_FALLBACK } from './knowledge.retriever.js';

describe('KeywordRetriever', () => {
  const knowledgeBase = KnowledgeBase.networkGuides();
  const retriever = new KeywordRetriever(knowledgeBase);
  const documentFor = (trigger: string): string => {
    const entry = knowledgeBase
      .list()
      .find((candidate) => candidate.trigger === trigger);
    if (!entry) {
      throw new Error(`missing guide ${trigger}`);
    }
    return entry.document;
  };

  it('returns the same document for repeated lookups', () => {
    const query = 'There is NO INTERNET in my flat';
    const first = retriever.lookup(query);

    expect(retriever.lookup(query)).toBe(first);
    expect(first).toBe(documentFor('no internet'));
  });

  it('resolves a query with two triggers to the first declared entry', () => {
    const result = retriever.retrieve(
      'slow network yesterday and now no internet at all',
    );

    expect(result.trigger).toBe('no internet');
    expect(result.document).toBe(documentFor('no internet'));
    expect(result.document).not.toContain('Slow Network Speed');
  });

  it('returns the fallback notice when nothing matches', () => {
    expect(retriever.lookup('why is my toaster broken')).toBe(
      NO_GUIDE_FALLBACK,
    );
    expect(retriever.retrieve('why is my toaster broken')).toEqual({
      matched: false,
      document: NO_GUIDE_FALLBACK,
    });
  });

  it('matches a guide through one of its aliases', () => {
    const result = retriever.retrieve('My wifi is not working');

    expect(result).toEqual({
      matched: true,
      trigger: 'wi-fi not working',
      title: "Troubleshooting 'Wi-Fi Connection Issues'",
      document: documentFor('wi-fi not working'),
    });
  });

  it('matches the trigger phrase itself case-insensitively', () => {
    expect(retriever.retrieve('How do I renew my IP Address?').trigger).toBe(
      'ip address',
    );
  });

  it('works against any knowledge base', () => {
    const custom = new KeywordRetriever(
      KnowledgeBase.fromEntries([
        { trigger: 'dns', title: 'DNS', document: 'flush the cache' },
        { trigger: 'dns server', title: 'DNS server', document: 'unused' },
      ]),
    );

    expect(custom.lookup('my DNS server is down')).toBe('flush the cache');
  });
});

describe('KnowledgeBase', () => {
  it('loads the network guides in declared order', () => {
    const triggers = KnowledgeBase.networkGuides()
      .list()
      .map((entry) => entry.trigger);

    expect(triggers).toEqual([
      'no internet',
      'slow network',
      'wi-fi not working',
      'ip address',
    ]);
  });

  it('rejects triggers that differ only by case', () => {
    expect(() =>
      KnowledgeBase.fromEntries([
        { trigger: 'No Internet', title: 'a', document: 'a' },
        { trigger: 'no internet', title: 'b', document: 'b' },
      ]),
    ).toThrow('Duplicate knowledge trigger: "no internet"');
  });

  it('rejects an alias that repeats another trigger', () => {
    expect(() =>
      KnowledgeBase.fromEntries([
        { trigger: 'wifi', title: 'a', document: 'a' },
        { trigger: 'wireless', aliases: ['WIFI'], title: 'b', document: 'b' },
      ]),
    ).toThrow('Duplicate knowledge trigger: "WIFI"');
  });

  it('rejects entries without a document', () => {
    expect(() =>
      KnowledgeBase.fromEntries([
        { trigger: 'lan', title: 'LAN', document: '' },
      ]),
    ).toThrow();
  });

  it('cannot be mutated through its entries', () => {
    const entries = KnowledgeBase.networkGuides().list();

    expect(Object.isFrozen(entries)).toBe(true);
    expect(Object.isFrozen(entries[0])).toBe(true);
  });
});
