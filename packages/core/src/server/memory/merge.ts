import { createHash } from 'node:crypto';

import type { MemoryItem, MemoryType, Modality } from './models';

export function normalizeText(text: string): string {
  return text.toLowerCase().replace(/\s+/g, ' ').trim();
}

export function itemContentHash(memoryType: MemoryType, text: string): string {
  return createHash('sha256').update(`${memoryType}:${normalizeText(text)}`).digest('hex').slice(0, 16);
}

export function resourceContentHash(modality: Modality, content: string): string {
  return createHash('sha256').update(`${modality}\n${content}`).digest('hex');
}

export type MergeDecision =
  | { action: 'create' }
  | { action: 'reinforce'; target: MemoryItem; reason: 'identical' | 'weaker_evidence' }
  | { action: 'supersede'; target: MemoryItem };

/**
 * Resolves a candidate against the closest active item of the same type.
 * An identical hash reinforces. A near duplicate is replaced by a new version
 * when the candidate's confidence is at least the existing one, otherwise the
 * existing item is reinforced and the candidate dropped.
 */
export function decideMerge(
  candidate: { contentHash: string; confidence: number; memoryType: MemoryType },
  match: { item: MemoryItem; similarity: number } | null,
  mergeSimilarity: number
): MergeDecision {
  if (!match) {
    return { action: 'create' };
  }
  if (match.item.contentHash === candidate.contentHash) {
    return { action: 'reinforce', target: match.item, reason: 'identical' };
  }
  if (match.item.memoryType !== candidate.memoryType || match.similarity < mergeSimilarity) {
    return { action: 'create' };
  }
  if (candidate.confidence >= match.item.confidence) {
    return { action: 'supersede', target: match.item };
  }
  return { action: 'reinforce', target: match.item, reason: 'weaker_evidence' };
}
