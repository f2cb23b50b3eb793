import { describe, expect, test } from 'vitest';

import { detectCategory, isStableCategory, memoryTypeFor, scoreUtterance, splitUtterances } from '../src/server/memory/capture';

describe('splitUtterances', () => {
  test('conversations split per line and strip role prefixes', () => {
    const content = 'user: Hi there\nassistant:  Hello!\n\nsystem: ';

    expect(splitUtterances(content, 'conversation')).toEqual([
      { role: 'user', text: 'Hi there', start: 6, end: 14 },
      { role: 'assistant', text: 'Hello!', start: 27, end: 33 }
    ]);
  });

  test('offsets point back into the original content', () => {
    const content = 'AI: noted\nHuman: My favorite color is blue.';
    const [assistant, user] = splitUtterances(content, 'conversation');

    expect(assistant.role).toBe('assistant');
    expect(user.role).toBe('user');
    expect(content.slice(user.start, user.end)).toBe('My favorite color is blue.');
  });

  test('documents split per sentence', () => {
    expect(splitUtterances('First point. Second one!  Third', 'document')).toEqual([
      { role: 'user', text: 'First point.', start: 0, end: 12 },
      { role: 'user', text: 'Second one!', start: 13, end: 24 },
      { role: 'user', text: 'Third', start: 26, end: 31 }
    ]);
  });
});

describe('detectCategory', () => {
  test.each([
    { text: 'Call me Sam', category: 'preference' },
    { text: 'I live in Lisbon', category: 'fact' },
    { text: 'Schedule the dentist', category: 'task' },
    { text: 'The project status', category: 'context' },
    { text: 'Bananas are yellow', category: 'other' }
  ])('$text is $category', ({ text, category }) => {
    expect(detectCategory(text)).toBe(category);
  });
});

describe('scoreUtterance', () => {
  test('a short user preference lands on the default threshold', () => {
    const scored = scoreUtterance({ role: 'user', text: 'My favorite color is blue.' });

    expect(scored.score).toBeCloseTo(0.5, 10);
    expect(scored.category).toBe('preference');
    expect(scored.reasons).toEqual(['Keyword match (preference)', 'User-authored statement', 'Very short utterance']);
    expect(scored.threshold).toBe(0.5);
  });

  test('assistant questions clamp to zero', () => {
    const scored = scoreUtterance({ role: 'assistant', text: 'Sure, can I help with that?' });

    expect(scored).toEqual({
      score: 0,
      reasons: ['Assistant message', 'Very short utterance', 'Question phrasing'],
      category: 'other',
      recommended: false,
      threshold: 0.5
    });
  });

  test('memory verbs and rules raise the score', () => {
    const scored = scoreUtterance({ role: 'user', text: 'Remember that I always review pull requests before lunch.' }, 0.4);

    expect(scored.category).toBe('other');
    expect(scored.score).toBeCloseTo(0.6, 10);
    expect(scored.reasons).toEqual(['User-authored statement', 'Memory verb detected', 'Persistent preference or rule']);
    expect(scored.recommended).toBe(true);
  });

  test('opt-out language lowers the score', () => {
    const scored = scoreUtterance({ role: 'user', text: 'ignore this, just chatting about the project' });

    expect(scored.category).toBe('context');
    expect(scored.reasons).toContain('Explicit opt-out language');
    expect(scored.score).toBeCloseTo(0.15, 10);
    expect(scored.recommended).toBe(false);
  });
});

describe('memoryTypeFor', () => {
  test('maps capture categories to memory types', () => {
    expect(memoryTypeFor('preference', 'I like tea')).toBe('profile');
    expect(memoryTypeFor('preference', 'I always take the stairs')).toBe('behavior');
    expect(memoryTypeFor('fact', 'I live in Lisbon')).toBe('profile');
    expect(memoryTypeFor('task', 'Renew the passport')).toBe('goal');
    expect(memoryTypeFor('context', 'The project is late')).toBe('event');
    expect(memoryTypeFor('other', 'Water boils at 100C')).toBe('knowledge');
  });

  test('only preferences and facts are stable', () => {
    expect(isStableCategory('preference')).toBe(true);
    expect(isStableCategory('fact')).toBe(true);
    expect(isStableCategory('task')).toBe(false);
  });
});
