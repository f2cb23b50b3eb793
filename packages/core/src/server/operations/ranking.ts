import type { RetrieverMode } from '../memory/config';
import {
  bm25Search,
  keywordSearch,
  reciprocalRankFusion,
  type LexicalDocument,
  type LexicalHit
} from '../memory/lexical';

/** The mode actually used once vector search may have been switched off. */
export function effectiveRetriever(mode: RetrieverMode, vectorEnabled: boolean): RetrieverMode {
  return mode === 'vector' && !vectorEnabled ? 'bm25' : mode;
}

function appendUnranked(ranked: LexicalHit[], extra: LexicalHit[][], limit: number): LexicalHit[] {
  const seen = new Set(ranked.map((hit) => hit.id));
  const merged = [...ranked];
  for (const list of extra) {
    for (const hit of list) {
      if (seen.has(hit.id)) continue;
      seen.add(hit.id);
      merged.push({ id: hit.id, score: 0 });
    }
  }
  return merged.slice(0, limit);
}

/**
 * Ranks documents with the configured retriever. `vectorHits` come from the
 * vector index and are empty when vector search is off. `extra` lists (such
 * as category members) join the fusion in hybrid mode and otherwise trail
 * the ranked hits with a zero score.
 */
export function rankDocuments(
  mode: RetrieverMode,
  query: string,
  documents: LexicalDocument[],
  vectorHits: LexicalHit[],
  limit: number,
  extra: LexicalHit[][] = []
): LexicalHit[] {
  const known = new Set(documents.map((document) => document.id));
  const vector = vectorHits.filter((hit) => known.has(hit.id));
  switch (mode) {
    case 'keyword':
      return appendUnranked(keywordSearch(query, documents, limit), extra, limit);
    case 'bm25':
      return appendUnranked(bm25Search(query, documents, limit), extra, limit);
    case 'vector':
      return appendUnranked(vector.length > 0 ? vector.slice(0, limit) : bm25Search(query, documents, limit), extra, limit);
    case 'hybrid': {
      const lists = [vector, bm25Search(query, documents, limit), keywordSearch(query, documents, limit), ...extra];
      return reciprocalRankFusion(
        lists.filter((list) => list.length > 0),
        limit
      );
    }
  }
}
