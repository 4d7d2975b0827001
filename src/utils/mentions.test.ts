import { describe, expect, it } from 'vitest';
import { parseMentionHandles, resolveMentions } from './mentions.js';
import type { UserRecord } from '../services/chat-store.js';

function user(id: string, username: string, displayName: string): UserRecord {
  return {
    id,
    email: `${username}@example.test`,
    username,
    displayName,
    isActive: true,
    isAdmin: false,
    isBot: false,
    isOnline: false,
    lastSeenAt: null,
    createdAt: new Date(0),
  };
}

describe('parseMentionHandles', () => {
  it('collects word and quoted handles once, lowercased', () => {
    expect(parseMentionHandles('hi @Bob and @"Carol King", also @bob')).toEqual(['bob', 'carol king']);
  });

  it('returns nothing without mentions', () => {
    expect(parseMentionHandles('no mentions here')).toEqual([]);
  });
});

describe('resolveMentions', () => {
  const bob = user('id-bob', 'bob', 'Bob Stone');
  const carol = user('id-carol', 'ckings', 'Carol King');

  it('matches usernames and display names', () => {
    expect(resolveMentions('@bob meet @"Carol King"', [bob, carol])).toEqual(['id-bob', 'id-carol']);
  });

  it('matches email addresses in quotes', () => {
    expect(resolveMentions('ping @"ckings@example.test"', [bob, carol])).toEqual(['id-carol']);
  });

  it('drops handles that match no candidate', () => {
    expect(resolveMentions('@dave @bob', [bob, carol])).toEqual(['id-bob']);
  });
});
