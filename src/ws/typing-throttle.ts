export interface ITypingThrottle {
  /** True when a typing start from this user in this room should be forwarded. */
  allowStart(userId: string, roomId: string): boolean;
  forget(userId: string): void;
}

/**
 * Forwards at most one typing start per user and room per interval. Stops
 * are never throttled, so they do not pass through here.
 */
export class TypingThrottle implements ITypingThrottle {
  // userId -> roomId -> time of the last forwarded start
  private lastStart = new Map<string, Map<string, number>>();

  constructor(
    private readonly intervalMs = 3000,
    private readonly now: () => number = Date.now,
  ) {}

  allowStart(userId: string, roomId: string): boolean {
    const t = this.now();
    let rooms = this.lastStart.get(userId);
    const last = rooms?.get(roomId);
    if (last !== undefined && t - last < this.intervalMs) return false;

    if (!rooms) {
      rooms = new Map();
      this.lastStart.set(userId, rooms);
    }
    rooms.set(roomId, t);
    return true;
  }

  /** Drop a user's state once their last session is gone. */
  forget(userId: string): void {
    this.lastStart.delete(userId);
  }

  get trackedUsers(): number {
    return this.lastStart.size;
  }
}
