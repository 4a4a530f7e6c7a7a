/** Broadcast capability handed to the task service. */
export interface Notifier {
  emit(event: string, payload: unknown, scope: string): void | Promise<void>;
}

export type RoomListener = (event: string, payload: unknown) => void;

/**
 * In-process rooms keyed by scope. Each SSE connection joins exactly one room,
 * so an event reaches the subscribers of its scope and nobody else.
 */
export class RoomNotifier implements Notifier {
  private rooms = new Map<string, Set<RoomListener>>();

  subscribe(scope: string, listener: RoomListener): () => void {
    let room = this.rooms.get(scope);
    if (!room) {
      room = new Set();
      this.rooms.set(scope, room);
    }
    room.add(listener);

    return () => {
      const current = this.rooms.get(scope);
      if (!current) return;
      current.delete(listener);
      if (current.size === 0) this.rooms.delete(scope);
    };
  }

  emit(event: string, payload: unknown, scope: string): void {
    const room = this.rooms.get(scope);
    if (!room) return;
    for (const listener of [...room]) listener(event, payload);
  }

  subscriberCount(scope: string): number {
    return this.rooms.get(scope)?.size ?? 0;
  }
}
