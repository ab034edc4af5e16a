export type Listener<P> = (payload: P) => void;
export type Unsubscribe = () => void;

export interface EventBus<M> {
  on<K extends keyof M>(event: K, listener: Listener<M[K]>): Unsubscribe;
  emit<K extends keyof M>(event: K, payload: M[K]): void;
  listenerCount(event: keyof M): number;
  clear(): void;
}

type ListenerTable<M> = { [K in keyof M]?: Set<Listener<M[K]>> };

/**
 * Typed listener registry. Listeners run synchronously in registration order;
 * a listener added or removed during an emit takes effect from the next emit.
 */
export function createEventBus<M>(): EventBus<M> {
  let listeners: ListenerTable<M> = {};

  function on<K extends keyof M>(event: K, listener: Listener<M[K]>): Unsubscribe {
    const set: Set<Listener<M[K]>> = listeners[event] ?? new Set<Listener<M[K]>>();
    listeners[event] = set;
    set.add(listener);
    return () => {
      set.delete(listener);
    };
  }

  function emit<K extends keyof M>(event: K, payload: M[K]): void {
    const set = listeners[event];
    if (!set) return;
    for (const listener of [...set]) {
      listener(payload);
    }
  }

  return {
    on,
    emit,
    listenerCount: (event) => listeners[event]?.size ?? 0,
    clear: () => {
      listeners = {};
    },
  };
}
