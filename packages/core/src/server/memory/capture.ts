import type { MemoryType, Modality } from './models';

export type UtteranceRole = 'user' | 'assistant' | 'system';

export type Utterance = {
  role: UtteranceRole;
  text: string;
  start: number;
  end: number;
};

export type CaptureCategory = 'preference' | 'fact' | 'task' | 'context' | 'other';

export type CaptureScore = {
  score: number;
  reasons: string[];
  category: CaptureCategory;
  recommended: boolean;
  threshold: number;
};

const KEYWORD_MAP: Record<CaptureCategory, RegExp[]> = {
  preference: [/\b(i\s*(?:do(?:n't)?|really)?\s*(?:like|love|prefer|hate))\b/i, /\bmy\s+(?:favorite|favourite|go[-\s]?to)/i, /\bcall\s+me\b/i, /\b(?:nickname|go by)\b/i],
  fact: [/\b(?:born|birthday|anniversary)\b/i, /\b(?:i\s+(?:am|live|work)|i'm)\b/i, /\b(?:address|email|phone|number)\b/i],
  task: [/\b(?:remind|reminder|todo|task|follow up|schedule|plan to|want to|goal)\b/i, /\b(?:tomorrow|next\s+(?:week|month)|on\s+\w+day|every\s+\w+)/i],
  context: [/\bproject\b/i, /\bmeeting\b/i, /\bstatus\b/i, /\bupdate\b/i],
  other: []
};

const CATEGORY_ORDER: CaptureCategory[] = ['preference', 'fact', 'task', 'context'];

const NEGATIVE_PATTERNS = [/\b(just\s+chatting|ignore this)\b/i, /\b(lorem ipsum|dummy text)\b/i];
const QUESTION_PATTERN = /\?\s*$/;
const CONTACT_PATTERN = /[\w.-]+@[\w.-]+|\b\+?\d{1,2}[\s-]?\(?(?:\d{3})\)?[\s-]?\d{3}[\s-]?\d{4}\b/i;
const MEMORY_VERB_PATTERN = /\b(?:remember|note|save|don't forget|should remember)\b/i;
const RULE_PATTERN = /\b(?:always|never|every time)\b/i;
const ROLE_PREFIX = /^\s*(user|assistant|system|human|ai)\s*:\s*/i;

const CATEGORY_BONUS: Record<CaptureCategory, number> = {
  preference: 0.35,
  fact: 0.35,
  task: 0.35,
  context: 0.2,
  other: 0
};

const ROLE_BONUS: Record<UtteranceRole, number> = {
  user: 0.25,
  assistant: -0.05,
  system: 0
};

const clampScore = (value: number, min = 0, max = 1): number => Math.min(Math.max(value, min), max);

function normalizeRole(raw: string): UtteranceRole {
  const role = raw.toLowerCase();
  if (role === 'assistant' || role === 'ai') return 'assistant';
  if (role === 'system') return 'system';
  return 'user';
}

/**
 * Splits content into scoreable utterances with offsets into the original
 * text. Conversations split per line with optional `role:` prefixes; other
 * modalities split per sentence.
 */
export function splitUtterances(content: string, modality: Modality): Utterance[] {
  const utterances: Utterance[] = [];
  const pattern = modality === 'conversation' ? /[^\n]+/g : /[^.!?\n]+[.!?]?/g;
  for (const match of content.matchAll(pattern)) {
    const offset = match.index ?? 0;
    let segment = match[0];
    let start = offset;
    let role: UtteranceRole = 'user';
    const prefix = modality === 'conversation' ? ROLE_PREFIX.exec(segment) : null;
    if (prefix) {
      role = normalizeRole(prefix[1]);
      start += prefix[0].length;
      segment = segment.slice(prefix[0].length);
    }
    const leading = segment.length - segment.trimStart().length;
    const text = segment.trim();
    if (!text) continue;
    start += leading;
    utterances.push({ role, text, start, end: start + text.length });
  }
  return utterances;
}

export function detectCategory(text: string): CaptureCategory {
  for (const category of CATEGORY_ORDER) {
    if (KEYWORD_MAP[category].some((pattern) => pattern.test(text))) {
      return category;
    }
  }
  return 'other';
}

export function scoreUtterance(utterance: Pick<Utterance, 'role' | 'text'>, threshold = 0.5): CaptureScore {
  let score = 0;
  const reasons: string[] = [];
  const text = utterance.text.trim();
  const category = detectCategory(text);

  if (CATEGORY_BONUS[category] > 0) {
    score += CATEGORY_BONUS[category];
    reasons.push(`Keyword match (${category})`);
  }

  const roleBonus = ROLE_BONUS[utterance.role];
  if (roleBonus !== 0) {
    score += roleBonus;
    reasons.push(roleBonus > 0 ? 'User-authored statement' : 'Assistant message');
  }

  if (text.length >= 160) {
    score += 0.12;
    reasons.push('Very detailed statement');
  } else if (text.length >= 100) {
    score += 0.08;
    reasons.push('Detailed statement');
  } else if (text.length < 40) {
    score -= 0.1;
    reasons.push('Very short utterance');
  }

  if (QUESTION_PATTERN.test(text)) {
    score -= 0.1;
    reasons.push('Question phrasing');
  }

  if (MEMORY_VERB_PATTERN.test(text)) {
    score += 0.25;
    reasons.push('Memory verb detected');
  }

  if (RULE_PATTERN.test(text)) {
    score += 0.1;
    reasons.push('Persistent preference or rule');
  }

  if (CONTACT_PATTERN.test(text)) {
    score += 0.2;
    reasons.push('Contains contact details');
  }

  if (NEGATIVE_PATTERNS.some((pattern) => pattern.test(text))) {
    score -= 0.3;
    reasons.push('Explicit opt-out language');
  }

  const normalized = clampScore(score);
  return {
    score: normalized,
    reasons,
    category,
    recommended: normalized >= threshold,
    threshold
  };
}

export function memoryTypeFor(category: CaptureCategory, text: string): MemoryType {
  switch (category) {
    case 'preference':
      return RULE_PATTERN.test(text) ? 'behavior' : 'profile';
    case 'fact':
      return 'profile';
    case 'task':
      return 'goal';
    case 'context':
      return 'event';
    default:
      return 'knowledge';
  }
}

export const CAPTURE_CATEGORY_TAXONOMY: Record<CaptureCategory, string> = {
  preference: 'preferences',
  fact: 'personal_info',
  task: 'goals',
  context: 'work_life',
  other: 'knowledge'
};

export function isStableCategory(category: CaptureCategory): boolean {
  return category === 'preference' || category === 'fact';
}
