import stopwordList from './data/stopwords.json';

const STOPWORDS = new Set<string>(stopwordList);

export type LexicalDocument = {
  id: string;
  text: string;
  fields?: Record<string, string>;
};

export type LexicalHit = { id: string; score: number };

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\w]+/)
    .filter(Boolean);
}

export function contentTokens(text: string): string[] {
  return tokenize(text).filter((token) => !STOPWORDS.has(token));
}

type QueryTerm = {
  value: string;
  phrase: boolean;
  field: string | null;
  mode: 'should' | 'must' | 'exclude';
};

/**
 * Parses `+must -exclude "a phrase" field:term` into weighted terms. Bare
 * words are optional matches.
 */
export function parseLexicalQuery(query: string): QueryTerm[] {
  const terms: QueryTerm[] = [];
  const pattern = /([+-]?)(?:(\w+):)?(?:"([^"]+)"|(\S+))/g;
  for (const match of query.matchAll(pattern)) {
    const [, prefix, field, phrase, word] = match;
    const raw = phrase ?? word ?? '';
    const value = tokenize(raw).join(' ');
    if (!value) continue;
    const mode = prefix === '+' ? 'must' : prefix === '-' ? 'exclude' : 'should';
    if (!phrase && value.includes(' ')) {
      for (const token of value.split(' ')) {
        terms.push({ value: token, phrase: false, field: field ?? null, mode });
      }
      continue;
    }
    terms.push({ value, phrase: Boolean(phrase), field: field ?? null, mode });
  }
  return terms;
}

const WEIGHTS = {
  term: { should: 1, must: 1.5 },
  phrase: { should: 2, must: 3 },
  fieldTerm: { should: 1.5, must: 2.5 },
  fieldPhrase: { should: 2.5, must: 3.5 }
} as const;

function termMatches(term: QueryTerm, document: LexicalDocument): boolean {
  const haystack = term.field ? document.fields?.[term.field] : document.text;
  if (haystack === undefined) {
    return false;
  }
  if (term.phrase) {
    return ` ${tokenize(haystack).join(' ')} `.includes(` ${term.value} `);
  }
  return tokenize(haystack).includes(term.value);
}

function termWeight(term: QueryTerm): number {
  const mode = term.mode === 'must' ? 'must' : 'should';
  if (term.field) {
    return term.phrase ? WEIGHTS.fieldPhrase[mode] : WEIGHTS.fieldTerm[mode];
  }
  return term.phrase ? WEIGHTS.phrase[mode] : WEIGHTS.term[mode];
}

/** Boolean keyword scoring. Documents missing a must term or hitting an exclude are dropped. */
export function keywordSearch(query: string, documents: LexicalDocument[], limit: number): LexicalHit[] {
  const terms = parseLexicalQuery(query);
  if (terms.length === 0) {
    return [];
  }
  const hits: LexicalHit[] = [];
  for (const document of documents) {
    let score = 0;
    let rejected = false;
    for (const term of terms) {
      const matched = termMatches(term, document);
      if (term.mode === 'exclude') {
        if (matched) rejected = true;
        continue;
      }
      if (!matched) {
        if (term.mode === 'must') rejected = true;
        continue;
      }
      score += termWeight(term);
    }
    if (!rejected && score > 0) {
      hits.push({ id: document.id, score });
    }
  }
  return rank(hits, limit);
}

export const BM25_K1 = 1.2;
export const BM25_B = 0.75;

export function bm25Search(query: string, documents: LexicalDocument[], limit: number): LexicalHit[] {
  const queryTokens = [...new Set(contentTokens(query))];
  if (queryTokens.length === 0 || documents.length === 0) {
    return [];
  }
  const tokenized = documents.map((document) => ({ id: document.id, tokens: tokenize(document.text) }));
  const averageLength = tokenized.reduce((total, doc) => total + doc.tokens.length, 0) / tokenized.length || 1;
  const documentFrequency = new Map<string, number>();
  for (const doc of tokenized) {
    for (const token of new Set(doc.tokens)) {
      documentFrequency.set(token, (documentFrequency.get(token) ?? 0) + 1);
    }
  }

  const total = tokenized.length;
  const hits: LexicalHit[] = [];
  for (const doc of tokenized) {
    const frequencies = new Map<string, number>();
    for (const token of doc.tokens) {
      frequencies.set(token, (frequencies.get(token) ?? 0) + 1);
    }
    let score = 0;
    for (const token of queryTokens) {
      const tf = frequencies.get(token) ?? 0;
      if (tf === 0) continue;
      const n = documentFrequency.get(token) ?? 0;
      const idf = Math.log((total - n + 0.5) / (n + 0.5) + 1);
      const norm = tf + BM25_K1 * (1 - BM25_B + (BM25_B * doc.tokens.length) / averageLength);
      score += idf * ((tf * (BM25_K1 + 1)) / norm);
    }
    if (score > 0) {
      hits.push({ id: doc.id, score });
    }
  }
  return rank(hits, limit);
}

export const RRF_K = 60;

/** Reciprocal Rank Fusion of several ranked lists. */
export function reciprocalRankFusion(lists: LexicalHit[][], limit: number, k = RRF_K): LexicalHit[] {
  const fused = new Map<string, number>();
  for (const list of lists) {
    list.forEach((hit, index) => {
      fused.set(hit.id, (fused.get(hit.id) ?? 0) + 1 / (k + index + 1));
    });
  }
  return rank(
    [...fused.entries()].map(([id, score]) => ({ id, score })),
    limit
  );
}

function rank(hits: LexicalHit[], limit: number): LexicalHit[] {
  return hits.sort((a, b) => b.score - a.score || a.id.localeCompare(b.id)).slice(0, Math.max(0, limit));
}

/** Share of the query's content tokens present in the text. */
export function tokenCoverage(query: string, text: string): { coverage: number; missing: string[] } {
  const wanted = [...new Set(contentTokens(query))];
  if (wanted.length === 0) {
    return { coverage: 0, missing: [] };
  }
  const present = new Set(tokenize(text));
  const missing = wanted.filter((token) => !present.has(token));
  return { coverage: (wanted.length - missing.length) / wanted.length, missing };
}
