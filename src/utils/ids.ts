import { uuidv7 } from 'uuidv7';

/** UUIDv7: time-ordered, so ids sort in insertion order. */
export function generateId(): string {
  return uuidv7();
}
