import { describe, expect, test } from 'vitest';

import {
  bm25Search,
  contentTokens,
  keywordSearch,
  parseLexicalQuery,
  reciprocalRankFusion,
  tokenCoverage,
  tokenize
} from '../src/server/memory/lexical';
import { effectiveRetriever, rankDocuments } from '../src/server/operations/ranking';

describe('tokenize', () => {
  test('lowercases and splits on non-word characters', () => {
    expect(tokenize("My FAVORITE color: blue-green, isn't it?")).toEqual(['my', 'favorite', 'color', 'blue', 'green', 'isn', 't', 'it']);
  });

  test('content tokens drop stopwords', () => {
    expect(contentTokens('What is my favorite color?')).toEqual(['favorite', 'color']);
  });
});

describe('parseLexicalQuery', () => {
  test('reads must, exclude, phrase and field terms', () => {
    expect(parseLexicalQuery('+Blue -grass "Blue Sky" color:red plain-word')).toEqual([
      { value: 'blue', phrase: false, field: null, mode: 'must' },
      { value: 'grass', phrase: false, field: null, mode: 'exclude' },
      { value: 'blue sky', phrase: true, field: null, mode: 'should' },
      { value: 'red', phrase: false, field: 'color', mode: 'should' },
      { value: 'plain', phrase: false, field: null, mode: 'should' },
      { value: 'word', phrase: false, field: null, mode: 'should' }
    ]);
  });
});

describe('keywordSearch', () => {
  const documents = [
    { id: 'a', text: 'blue blue sky', fields: { color: 'navy' } },
    { id: 'b', text: 'blue sky grass' },
    { id: 'c', text: 'blue' },
    { id: 'd', text: 'red roses', fields: { color: 'red' } }
  ];

  test('weights phrases above terms and drops excluded documents', () => {
    expect(keywordSearch('+blue -grass "blue sky" color:red', documents, 10)).toEqual([
      { id: 'a', score: 3.5 },
      { id: 'c', score: 1.5 }
    ]);
  });

  test('field terms only match the named field', () => {
    expect(keywordSearch('color:red', documents, 10)).toEqual([{ id: 'd', score: 1.5 }]);
  });

  test('an empty query matches nothing', () => {
    expect(keywordSearch('  ', documents, 10)).toEqual([]);
  });
});

describe('bm25Search', () => {
  test('scores term frequency against document length', () => {
    const hits = bm25Search(
      'blue',
      [
        { id: 'sky', text: 'blue blue sky' },
        { id: 'field', text: 'green grass' }
      ],
      10
    );

    expect(hits.map((hit) => hit.id)).toEqual(['sky']);
    expect(hits[0].score).toBeCloseTo((Math.log(2) * 4.4) / 3.38, 10);
  });

  test('ignores stopword-only queries', () => {
    expect(bm25Search('what is it', [{ id: 'x', text: 'what is it' }], 10)).toEqual([]);
  });

  test('respects the limit and breaks ties by id', () => {
    const hits = bm25Search(
      'tea',
      [
        { id: 'b', text: 'tea time' },
        { id: 'a', text: 'tea time' },
        { id: 'c', text: 'coffee time' }
      ],
      1
    );

    expect(hits.map((hit) => hit.id)).toEqual(['a']);
  });
});

describe('reciprocalRankFusion', () => {
  test('rewards documents ranked by several lists', () => {
    const fused = reciprocalRankFusion(
      [
        [
          { id: 'a', score: 9 },
          { id: 'b', score: 8 }
        ],
        [
          { id: 'b', score: 3 },
          { id: 'c', score: 1 }
        ]
      ],
      10
    );

    expect(fused.map((hit) => hit.id)).toEqual(['b', 'a', 'c']);
    expect(fused[0].score).toBeCloseTo(1 / 61 + 1 / 62, 12);
    expect(fused[2].score).toBeCloseTo(1 / 62, 12);
  });
});

describe('tokenCoverage', () => {
  test('reports the share of query words found and the missing ones', () => {
    const { coverage, missing } = tokenCoverage('favorite color of the sky', 'My favorite color is blue');

    expect(coverage).toBeCloseTo(2 / 3, 12);
    expect(missing).toEqual(['sky']);
  });

  test('a query without content words covers nothing', () => {
    expect(tokenCoverage('what is it', 'anything')).toEqual({ coverage: 0, missing: [] });
  });
});

describe('rankDocuments', () => {
  const documents = [
    { id: 'tea', text: 'green tea every morning' },
    { id: 'run', text: 'morning run by the river' }
  ];

  test('vector mode falls back to bm25 without vector hits', () => {
    expect(effectiveRetriever('vector', false)).toBe('bm25');
    expect(effectiveRetriever('vector', true)).toBe('vector');
    expect(rankDocuments('vector', 'green tea', documents, [], 5).map((hit) => hit.id)).toEqual(['tea']);
  });

  test('vector hits for unknown documents are dropped', () => {
    const ranked = rankDocuments(
      'vector',
      'river',
      documents,
      [
        { id: 'gone', score: 0.99 },
        { id: 'run', score: 0.8 }
      ],
      5
    );

    expect(ranked).toEqual([{ id: 'run', score: 0.8 }]);
  });

  test('extra lists trail lexical hits outside hybrid mode', () => {
    const ranked = rankDocuments('bm25', 'green tea', documents, [], 5, [[{ id: 'run', score: 1 }]]);

    expect(ranked.map((hit) => [hit.id, hit.score > 0])).toEqual([
      ['tea', true],
      ['run', false]
    ]);
  });

  test('hybrid mode fuses lexical lists with the extra lists', () => {
    const ranked = rankDocuments('hybrid', 'morning', documents, [], 5, [[{ id: 'run', score: 1 }]]);

    expect(ranked.map((hit) => hit.id)).toEqual(['run', 'tea']);
  });
});
