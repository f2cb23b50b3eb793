import {
  CAPTURE_CATEGORY_TAXONOMY,
  isStableCategory,
  memoryTypeFor,
  scoreUtterance,
  splitUtterances
} from './capture';
import {
  succeed,
  type CandidateFact,
  type CapabilityResult,
  type ExtractRequest,
  type IntentionDraft,
  type ItemRevision,
  type RankedCandidate,
  type ReasoningCapability,
  type SufficiencyVerdict
} from './capabilities';
import { tokenCoverage, tokenize, contentTokens } from './lexical';
import type { MemoryType, Modality, PreprocessArtifacts } from './models';

const MAX_INTENTION_ENTRIES = 10;

function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, Math.max(0, maxLength - 3)).trimEnd()}...`;
}

/**
 * Deterministic local reasoner. Extraction uses the capture scorer; the
 * remaining tasks work from token overlap. Suitable for development and tests.
 */
export class HeuristicReasoner implements ReasoningCapability {
  readonly name = 'heuristic';

  async extract(request: ExtractRequest): Promise<CapabilityResult<CandidateFact[]>> {
    const known = new Set(request.categories.map((category) => category.name));
    const facts: CandidateFact[] = [];
    for (const utterance of splitUtterances(request.content, request.modality)) {
      const scored = scoreUtterance(utterance, request.threshold);
      if (!scored.recommended) continue;
      const taxonomyName = CAPTURE_CATEGORY_TAXONOMY[scored.category];
      facts.push({
        text: utterance.text,
        memoryType: memoryTypeFor(scored.category, utterance.text),
        confidence: scored.score,
        stable: isStableCategory(scored.category),
        categories: known.has(taxonomyName) ? [taxonomyName] : [],
        start: utterance.start,
        end: utterance.end
      });
    }
    return succeed(facts);
  }

  async describeMedia(request: {
    modality: Modality;
    uri: string | null;
    content: string | null;
  }): Promise<CapabilityResult<Pick<PreprocessArtifacts, 'caption' | 'transcription'>>> {
    const label = request.uri ?? 'inline content';
    const transcription = request.modality === 'audio' || request.modality === 'video' ? request.content : null;
    return succeed({ caption: `${request.modality} resource from ${label}`, transcription });
  }

  async summarize(request: {
    categoryName: string;
    description: string;
    items: string[];
    previousSummary: string;
    maxLength: number;
  }): Promise<CapabilityResult<string>> {
    const unique = [...new Set(request.items.map((item) => item.trim()).filter(Boolean))];
    if (unique.length === 0) {
      return succeed(request.previousSummary);
    }
    return succeed(truncate(unique.join('; '), request.maxLength));
  }

  async judgeSufficiency(request: {
    query: string;
    layer: 'intention' | 'category' | 'item';
    context: string[];
  }): Promise<CapabilityResult<SufficiencyVerdict>> {
    const context = request.context.join('\n');
    if (!context.trim()) {
      return succeed({ sufficient: false, rewrittenQuery: null, nextStepQuery: request.query });
    }
    const { coverage, missing } = tokenCoverage(request.query, context);
    const sufficient = coverage === 1;
    return succeed({
      sufficient,
      rewrittenQuery: null,
      nextStepQuery: sufficient ? null : missing.length > 0 && coverage > 0 ? missing.join(' ') : request.query
    });
  }

  async rerank(request: { query: string; candidates: RankedCandidate[] }): Promise<CapabilityResult<RankedCandidate[]>> {
    const wanted = new Set(contentTokens(request.query));
    const rescored = request.candidates.map((candidate, index) => {
      const tokens = new Set(tokenize(candidate.text));
      let overlap = 0;
      for (const token of wanted) {
        if (tokens.has(token)) overlap += 1;
      }
      return {
        candidate,
        index,
        score: wanted.size === 0 ? 0 : overlap / wanted.size
      };
    });
    rescored.sort((a, b) => b.score - a.score || a.index - b.index);
    return succeed(rescored.map((entry) => ({ ...entry.candidate, score: entry.score })));
  }

  async deriveIntention(request: {
    previous: IntentionDraft | null;
    facts: Array<{ text: string; memoryType: MemoryType }>;
  }): Promise<CapabilityResult<IntentionDraft>> {
    const goals = [...(request.previous?.goals ?? [])];
    const constraints = [...(request.previous?.constraints ?? [])];
    for (const fact of request.facts) {
      if (fact.memoryType === 'goal' && !goals.includes(fact.text)) {
        goals.push(fact.text);
      }
      if (fact.memoryType === 'behavior' && !constraints.includes(fact.text)) {
        constraints.push(fact.text);
      }
    }
    const keptGoals = goals.slice(-MAX_INTENTION_ENTRIES);
    const keptConstraints = constraints.slice(-MAX_INTENTION_ENTRIES);
    const parts: string[] = [];
    if (keptGoals.length) parts.push(`Goals: ${keptGoals.join('; ')}`);
    if (keptConstraints.length) parts.push(`Constraints: ${keptConstraints.join('; ')}`);
    return succeed({ goals: keptGoals, constraints: keptConstraints, summary: parts.join('. ') });
  }

  async reviseItem(request: {
    text: string;
    memoryType: MemoryType;
    confidence: number;
    excerpt: string;
  }): Promise<CapabilityResult<ItemRevision>> {
    const text = request.text.replace(/\s+/g, ' ').trim();
    const scored = scoreUtterance({ role: 'user', text });
    return succeed({
      text,
      confidence: scored.score,
      stable: isStableCategory(scored.category)
    });
  }
}
