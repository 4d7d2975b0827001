import { describe, expect, it } from 'vitest';
import { groupReactions, previewText } from './message-helpers.js';

describe('groupReactions', () => {
  it('groups by emoji in first-seen order and flags the viewer', () => {
    const rows = [
      { emoji: '👍', userId: 'u1' },
      { emoji: '🎉', userId: 'u2' },
      { emoji: '👍', userId: 'u2' },
    ];
    expect(groupReactions(rows, 'u2')).toEqual([
      { emoji: '👍', count: 2, users: ['u1', 'u2'], me: true },
      { emoji: '🎉', count: 1, users: ['u2'], me: true },
    ]);
    expect(groupReactions(rows, 'u3').map((g) => g.me)).toEqual([false, false]);
  });

  it('returns nothing for no rows', () => {
    expect(groupReactions([], 'u1')).toEqual([]);
  });
});

describe('previewText', () => {
  it('trims short content', () => {
    expect(previewText('  hello  ')).toBe('hello');
  });

  it('truncates long content', () => {
    const long = 'a'.repeat(101);
    expect(previewText(long)).toBe(`${'a'.repeat(100)}...`);
    expect(previewText('b'.repeat(100))).toBe('b'.repeat(100));
  });

  it('keeps an emoji at the cut whole', () => {
    expect(previewText(`${'a'.repeat(99)}😀tail`)).toBe(`${'a'.repeat(99)}😀...`);
    expect(previewText('😀'.repeat(100))).toBe('😀'.repeat(100));
  });

  it('describes attachment-only messages', () => {
    expect(previewText('   ', true)).toBe('Sent an attachment');
    expect(previewText('')).toBe('');
  });
});
