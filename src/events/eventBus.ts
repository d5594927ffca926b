export type Unsubscribe = () => void;

type Listener<TEvent> = (event: TEvent) => void;

/**
 * Synchronous fan-out of events to subscribers, in emission order.
 * A subscriber that throws is reported on stderr; the emitter carries on.
 */
export class EventBus<TEvent> {
  private listeners: Set<Listener<TEvent>> = new Set();

  subscribe(cb: Listener<TEvent>, filter?: (event: TEvent) => boolean): Unsubscribe {
    const listener: Listener<TEvent> = filter ? event => (filter(event) ? cb(event) : undefined) : cb;
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(event: TEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        console.error('Event subscriber failed:', error);
      }
    }
  }
}
