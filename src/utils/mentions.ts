import type { UserRecord } from '../services/chat-store.js';

const MENTION_PATTERN = /@(\w+)|@"([^"]+)"/g;

/** Handles written as `@word` or `@"Full Name"`, lowercased, in order of first appearance. */
export function parseMentionHandles(content: string): string[] {
  const handles = new Set<string>();
  for (const match of content.matchAll(MENTION_PATTERN)) {
    const handle = match[1] ?? match[2];
    if (handle) handles.add(handle.trim().toLowerCase());
  }
  return [...handles];
}

/** Resolve handles against candidate users by username, display name or email. Unmatched handles are dropped. */
export function resolveMentions(content: string, candidates: UserRecord[]): string[] {
  const handles = parseMentionHandles(content);
  if (handles.length === 0) return [];

  const matched = new Set<string>();
  for (const handle of handles) {
    for (const user of candidates) {
      const names = [user.username, user.displayName, user.email].map((n) => n?.toLowerCase());
      if (names.includes(handle)) matched.add(user.id);
    }
  }
  return [...matched];
}
