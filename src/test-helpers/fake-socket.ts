import type { SocketLike } from '../ws/event-dispatcher.js';
import type { WsMessage } from '../shared/events.js';

export class FakeSocket implements SocketLike {
  readonly OPEN = 1;
  readyState = 1;
  readonly frames: WsMessage[] = [];
  closedWith: { code?: number; reason?: string } | null = null;

  send(data: string): void {
    const frame: WsMessage = JSON.parse(data);
    this.frames.push(frame);
  }

  close(code?: number, reason?: string): void {
    this.readyState = 3;
    this.closedWith = { code, reason };
  }

  /** Payloads of every frame with the given event name, in arrival order. */
  events(name: string): unknown[] {
    return this.frames.filter((f) => f.event === name).map((f) => f.data);
  }

  eventNames(): string[] {
    return this.frames.map((f) => f.event);
  }

  clear(): void {
    this.frames.length = 0;
  }
}
