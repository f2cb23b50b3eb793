import type { CategoryDefinition } from '../memory/config';
import { contentTokens } from '../memory/lexical';
import type { MemoryCategory, MemoryItem } from '../memory/models';

function categoryTokens(category: Pick<CategoryDefinition, 'name' | 'description'>): Set<string> {
  return new Set([...category.name.split('_'), ...contentTokens(category.description)]);
}

/** Share of the text's content words that appear in the category name or description. */
export function categoryMatchScore(text: string, category: Pick<CategoryDefinition, 'name' | 'description'>): number {
  const tokens = [...new Set(contentTokens(text))];
  if (tokens.length === 0) {
    return 0;
  }
  const vocabulary = categoryTokens(category);
  const hits = tokens.filter((token) => vocabulary.has(token)).length;
  return hits / tokens.length;
}

/**
 * Categories for one fact: the reasoner's suggestions that exist in the
 * taxonomy, else the best lexical match above the threshold, else the
 * default category.
 */
export function chooseCategories(
  text: string,
  suggested: readonly string[],
  taxonomy: readonly CategoryDefinition[],
  threshold: number,
  defaultCategory: string
): string[] {
  const known = new Map(taxonomy.map((category) => [category.name.toLowerCase(), category.name]));
  const accepted: string[] = [];
  for (const name of suggested) {
    const canonical = known.get(name.toLowerCase());
    if (canonical && !accepted.includes(canonical)) {
      accepted.push(canonical);
    }
  }
  if (accepted.length > 0) {
    return accepted;
  }

  let best: { name: string; score: number } | null = null;
  for (const category of taxonomy) {
    const score = categoryMatchScore(text, category);
    if (score >= threshold && (!best || score > best.score)) {
      best = { name: category.name, score };
    }
  }
  return [best ? best.name : defaultCategory];
}

export function describeCategory(name: string, taxonomy: readonly CategoryDefinition[]): string {
  return taxonomy.find((category) => category.name.toLowerCase() === name.toLowerCase())?.description ?? '';
}

export function findCategoryByName<C extends Pick<MemoryCategory, 'name'>>(categories: readonly C[], name: string): C | null {
  const lowered = name.toLowerCase();
  return categories.find((category) => category.name.toLowerCase() === lowered) ?? null;
}

/** Highest-confidence, most reinforced, most recent items first. */
export function pickAnchors(items: readonly MemoryItem[], count: number): string[] {
  return [...items]
    .sort(
      (a, b) =>
        b.confidence - a.confidence ||
        b.reinforcementCount - a.reinforcementCount ||
        b.updatedAt.getTime() - a.updatedAt.getTime() ||
        a.id.localeCompare(b.id)
    )
    .slice(0, count)
    .map((item) => item.id);
}

/** Appends ids to an anchor list, most recent last, keeping at most `count`. */
export function appendAnchors(current: readonly string[], added: readonly string[], count: number): string[] {
  const next = current.filter((id) => !added.includes(id));
  next.push(...added);
  return next.slice(-count);
}
