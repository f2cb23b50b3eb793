import type { ScopeSelector } from './models';
import { countCombinations, isValueSet, isWildcard, selectorToFilter, type ScopeFilter } from './scope';

export type CrossScopeLimits = {
  maxScopeCombinations: number;
  vectorScopeCombinations: number;
  allowVectorWithWildcard: boolean;
  maxCandidates: number;
  maxRerankCandidates: number;
};

export type RetrievalPolicyContext = {
  selector: ScopeSelector;
  filter: ScopeFilter;
  exactFields: string[];
  setFields: string[];
  wildcardFields: string[];
  /** Concrete tenant combinations across bounded fields; wildcard fields are excluded. */
  boundedCombinations: number;
  vectorAvailable: boolean;
  requestedCandidates: number;
  requestedRerank: number;
};

export type RetrievalPolicyEffect = {
  reject?: string;
  candidateLimit?: number;
  rerankLimit?: number;
  vectorEnabled?: boolean;
  fallback?: 'category_routing';
};

export type RetrievalPolicy = {
  name: string;
  description?: string;
  summary?: {
    rejects?: boolean;
    candidateLimit?: number;
    rerankLimit?: number;
    fallback?: 'category_routing';
    notes?: string;
  };
  match: (context: RetrievalPolicyContext) => boolean;
  apply: (context: RetrievalPolicyContext) => RetrievalPolicyEffect;
};

export type RetrievalPolicyDecision = {
  allowed: boolean;
  violations: string[];
  candidateLimit: number;
  rerankLimit: number;
  vectorEnabled: boolean;
  fallback: 'category_routing' | null;
  appliedPolicies: string[];
  boundedCombinations: number;
  wildcardFields: string[];
};

export function buildPolicyContext(
  selector: ScopeSelector,
  options: { vectorAvailable: boolean; requestedCandidates: number; requestedRerank: number }
): RetrievalPolicyContext {
  const exactFields: string[] = [];
  const setFields: string[] = [];
  const wildcardFields: string[] = [];
  for (const [name, field] of Object.entries(selector)) {
    if (isWildcard(field)) {
      wildcardFields.push(name);
    } else if (isValueSet(field)) {
      setFields.push(name);
    } else {
      exactFields.push(name);
    }
  }
  const filter = selectorToFilter(selector);
  const bounded: ScopeFilter = {};
  for (const [name, allowed] of Object.entries(filter)) {
    if (allowed !== null) bounded[name] = allowed;
  }
  return {
    selector,
    filter,
    exactFields,
    setFields,
    wildcardFields,
    boundedCombinations: countCombinations(bounded) ?? 0,
    ...options
  };
}

function mergeEffect(target: RetrievalPolicyDecision, effect: RetrievalPolicyEffect) {
  if (effect.reject) {
    target.allowed = false;
    target.violations.push(effect.reject);
  }
  if (typeof effect.candidateLimit === 'number') {
    target.candidateLimit = Math.min(target.candidateLimit, effect.candidateLimit);
  }
  if (typeof effect.rerankLimit === 'number') {
    target.rerankLimit = Math.min(target.rerankLimit, effect.rerankLimit);
  }
  if (effect.vectorEnabled === false) {
    target.vectorEnabled = false;
  }
  if (effect.fallback) {
    target.fallback = effect.fallback;
  }
}

export function evaluateRetrievalPolicies(
  context: RetrievalPolicyContext,
  policies: RetrievalPolicy[]
): RetrievalPolicyDecision {
  const decision: RetrievalPolicyDecision = {
    allowed: true,
    violations: [],
    candidateLimit: context.requestedCandidates,
    rerankLimit: context.requestedRerank,
    vectorEnabled: context.vectorAvailable,
    fallback: null,
    appliedPolicies: [],
    boundedCombinations: context.boundedCombinations,
    wildcardFields: context.wildcardFields
  };

  for (const policy of policies) {
    if (policy.match(context)) {
      decision.appliedPolicies.push(policy.name);
      mergeEffect(decision, policy.apply(context));
    }
  }

  return decision;
}

export function buildDefaultRetrievalPolicies(limits: CrossScopeLimits): RetrievalPolicy[] {
  return [
    {
      name: 'require-bounded-field',
      description: 'At least one scope field must be exact or a finite set.',
      summary: { rejects: true },
      match: (context) => context.exactFields.length === 0 && context.setFields.length === 0,
      apply: () => ({ reject: 'selector wildcards every scope field' })
    },
    {
      name: 'combination-cap',
      description: 'Caps the number of concrete tenant combinations a finite-set expansion may produce.',
      summary: { rejects: true, notes: `more than ${limits.maxScopeCombinations} combinations` },
      match: (context) => context.boundedCombinations > limits.maxScopeCombinations,
      apply: (context) => ({
        reject: `selector expands to ${context.boundedCombinations} scope combinations (limit ${limits.maxScopeCombinations})`
      })
    },
    {
      name: 'candidate-cap',
      description: 'Bounds vector candidates and the rerank window for cross-scope reads.',
      summary: { candidateLimit: limits.maxCandidates, rerankLimit: limits.maxRerankCandidates },
      match: () => true,
      apply: () => ({ candidateLimit: limits.maxCandidates, rerankLimit: limits.maxRerankCandidates })
    },
    {
      name: 'wide-range-fallback',
      description: 'Wide scope ranges drop to category routing without vector search.',
      summary: { fallback: 'category_routing' },
      match: (context) =>
        (context.wildcardFields.length > 0 && !limits.allowVectorWithWildcard) ||
        context.boundedCombinations > limits.vectorScopeCombinations,
      apply: () => ({ vectorEnabled: false, fallback: 'category_routing' })
    },
    {
      name: 'vector-unavailable-fallback',
      description: 'Without a vector capability retrieval routes through categories and lexical recall.',
      summary: { fallback: 'category_routing' },
      match: (context) => !context.vectorAvailable,
      apply: () => ({ vectorEnabled: false, fallback: 'category_routing' })
    }
  ];
}

export type RetrievalPolicySummary = {
  name: string;
  description?: string;
  defaults?: RetrievalPolicy['summary'];
};

export function listRetrievalPolicySummaries(limits: CrossScopeLimits): RetrievalPolicySummary[] {
  return buildDefaultRetrievalPolicies(limits).map((policy) => ({
    name: policy.name,
    description: policy.description,
    defaults: policy.summary
  }));
}
