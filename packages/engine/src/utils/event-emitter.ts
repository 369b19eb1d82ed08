/** Event name to listener argument tuple. */
export type EventMap = Record<string, unknown[]>;

export type Listener<Args extends unknown[]> = (...args: Args) => void;

export class EventEmitter<Events extends EventMap> {
  private listeners: { [E in keyof Events]?: Array<Listener<Events[E]>> } = {};

  public on<E extends keyof Events>(event: E, listener: Listener<Events[E]>): this {
    const list = this.listeners[event] ?? [];
    list.push(listener);
    this.listeners[event] = list;
    return this;
  }

  public off<E extends keyof Events>(event: E, listener: Listener<Events[E]>): this {
    const list = this.listeners[event];
    if (!list) return this;
    const index = list.indexOf(listener);
    if (index !== -1) {
      list.splice(index, 1);
    }
    return this;
  }

  public once<E extends keyof Events>(event: E, listener: Listener<Events[E]>): this {
    const onceWrapper: Listener<Events[E]> = (...args) => {
      this.off(event, onceWrapper);
      listener(...args);
    };
    return this.on(event, onceWrapper);
  }

  /** Returns false when nobody was listening. */
  public emit<E extends keyof Events>(event: E, ...args: Events[E]): boolean {
    const list = this.listeners[event];
    if (!list || list.length === 0) return false;
    for (const listener of [...list]) {
      listener(...args);
    }
    return true;
  }

  public removeAllListeners(event?: keyof Events): this {
    if (event === undefined) {
      this.listeners = {};
    } else {
      delete this.listeners[event];
    }
    return this;
  }

  public listenerCount(event: keyof Events): number {
    return this.listeners[event]?.length ?? 0;
  }
}
