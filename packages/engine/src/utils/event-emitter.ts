/**
 * Minimal event emitter keyed by an event map, so `on("listening", cb)`
 * knows the listener's argument types.
 */
export type EventMap = Record<string, unknown[]>;

export type Listener<Args extends unknown[]> = (...args: Args) => void;

type ListenerTable<Events extends EventMap> = {
  [K in keyof Events]?: Array<Listener<Events[K]>>;
};

export class EventEmitter<Events extends EventMap> {
  private events: ListenerTable<Events> = {};

  public on<K extends keyof Events>(
    event: K,
    listener: Listener<Events[K]>,
  ): this {
    const listeners = this.events[event] ?? [];
    listeners.push(listener);
    this.events[event] = listeners;
    return this;
  }

  public off<K extends keyof Events>(
    event: K,
    listener: Listener<Events[K]>,
  ): this {
    const listeners = this.events[event];
    if (!listeners) return this;
    const index = listeners.indexOf(listener);
    if (index !== -1) {
      listeners.splice(index, 1);
    }
    return this;
  }

  public once<K extends keyof Events>(
    event: K,
    listener: Listener<Events[K]>,
  ): this {
    const onceWrapper: Listener<Events[K]> = (...args) => {
      this.off(event, onceWrapper);
      listener(...args);
    };
    return this.on(event, onceWrapper);
  }

  public emit<K extends keyof Events>(event: K, ...args: Events[K]): boolean {
    const listeners = this.events[event];
    if (!listeners || listeners.length === 0) return false;
    for (const listener of [...listeners]) {
      listener(...args);
    }
    return true;
  }

  public removeAllListeners(event?: keyof Events): this {
    if (event !== undefined) {
      delete this.events[event];
    } else {
      this.events = {};
    }
    return this;
  }

  public listenerCount(event: keyof Events): number {
    return this.events[event]?.length ?? 0;
  }
}
