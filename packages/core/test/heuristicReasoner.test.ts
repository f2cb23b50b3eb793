import { describe, expect, test } from 'vitest';

import type { CapabilityResult } from '../src/server/memory/capabilities';
import { DEFAULT_CATEGORIES } from '../src/server/memory/config';
import { HeuristicReasoner } from '../src/server/memory/heuristicReasoner';
import { ALICE } from './fixtures';

function valueOf<T>(result: CapabilityResult<T>): T {
  if (!result.ok) {
    throw new Error(`capability failed: ${result.reason}`);
  }
  return result.value;
}

const reasoner = new HeuristicReasoner();

describe('HeuristicReasoner', () => {
  test('extracts recommended utterances with offsets and categories', async () => {
    const facts = valueOf(
      await reasoner.extract({
        scope: ALICE,
        modality: 'conversation',
        content: 'user: My favorite color is blue.\nassistant: Sure, can I help with that?',
        categories: DEFAULT_CATEGORIES,
        threshold: 0.4
      })
    );

    expect(facts).toHaveLength(1);
    expect(facts[0]).toMatchObject({
      text: 'My favorite color is blue.',
      memoryType: 'profile',
      stable: true,
      categories: ['preferences'],
      start: 6,
      end: 32
    });
    expect(facts[0].confidence).toBeCloseTo(0.5, 10);
  });

  test('drops category suggestions missing from the taxonomy', async () => {
    const facts = valueOf(
      await reasoner.extract({
        scope: ALICE,
        modality: 'conversation',
        content: 'user: My favorite color is blue.',
        categories: [{ name: 'knowledge', description: 'Facts' }],
        threshold: 0.4
      })
    );

    expect(facts.map((fact) => fact.categories)).toEqual([[]]);
  });

  test('summarize joins distinct items and truncates', async () => {
    const request = { categoryName: 'preferences', description: '', previousSummary: 'earlier', maxLength: 400 };

    expect(valueOf(await reasoner.summarize({ ...request, items: ['a fact', ' a fact ', 'another'] }))).toBe('a fact; another');
    expect(valueOf(await reasoner.summarize({ ...request, items: ['a fact', 'another'], maxLength: 10 }))).toBe('a fact;...');
    expect(valueOf(await reasoner.summarize({ ...request, items: [] }))).toBe('earlier');
  });

  test('judges sufficiency by query coverage', async () => {
    const layer = 'category' as const;

    expect(
      valueOf(await reasoner.judgeSufficiency({ query: 'favorite color', layer, context: ['My favorite color is blue.'] }))
    ).toEqual({ sufficient: true, rewrittenQuery: null, nextStepQuery: null });
    expect(valueOf(await reasoner.judgeSufficiency({ query: 'favorite color', layer, context: ['My favorite food'] }))).toEqual({
      sufficient: false,
      rewrittenQuery: null,
      nextStepQuery: 'color'
    });
    expect(valueOf(await reasoner.judgeSufficiency({ query: 'favorite color', layer, context: [] }))).toEqual({
      sufficient: false,
      rewrittenQuery: null,
      nextStepQuery: 'favorite color'
    });
  });

  test('reranks by query word overlap and keeps the input order on ties', async () => {
    const ranked = valueOf(
      await reasoner.rerank({
        query: 'green tea',
        candidates: [
          { id: 'c1', text: 'black coffee', score: 0.9 },
          { id: 'c2', text: 'green tea daily', score: 0.1 },
          { id: 'c3', text: 'green juice', score: 0.5 },
          { id: 'c4', text: 'green smoothie', score: 0.4 }
        ]
      })
    );

    expect(ranked.map((candidate) => [candidate.id, candidate.score])).toEqual([
      ['c2', 1],
      ['c3', 0.5],
      ['c4', 0.5],
      ['c1', 0]
    ]);
  });

  test('derives the intention from goals and behaviors', async () => {
    const draft = valueOf(
      await reasoner.deriveIntention({
        previous: { goals: ['Run a marathon'], constraints: [], summary: 'Goals: Run a marathon' },
        facts: [
          { text: 'Run a marathon', memoryType: 'goal' },
          { text: 'Never eat after 9pm', memoryType: 'behavior' },
          { text: 'Learn Portuguese', memoryType: 'goal' },
          { text: 'Likes tea', memoryType: 'profile' }
        ]
      })
    );

    expect(draft).toEqual({
      goals: ['Run a marathon', 'Learn Portuguese'],
      constraints: ['Never eat after 9pm'],
      summary: 'Goals: Run a marathon; Learn Portuguese. Constraints: Never eat after 9pm'
    });
  });

  test('describes media and passes audio content through as a transcription', async () => {
    expect(valueOf(await reasoner.describeMedia({ modality: 'audio', uri: null, content: 'hello there' }))).toEqual({
      caption: 'audio resource from inline content',
      transcription: 'hello there'
    });
    expect(valueOf(await reasoner.describeMedia({ modality: 'image', uri: 'photos/cat.png', content: null }))).toEqual({
      caption: 'image resource from photos/cat.png',
      transcription: null
    });
  });

  test('revision normalizes whitespace and rescores', async () => {
    const revision = valueOf(
      await reasoner.reviseItem({ text: 'My   favorite color\nis blue.', memoryType: 'profile', confidence: 0.2, excerpt: '' })
    );

    expect(revision.text).toBe('My favorite color is blue.');
    expect(revision.confidence).toBeCloseTo(0.5, 10);
    expect(revision.stable).toBe(true);
  });
});
