export type Unsubscribe = () => void;

/**
 * Minimal synchronous event bus.
 *
 * - Never throws to callers (subscriber errors are counted and handed to `onError`)
 * - Preserves emission order for each subscriber
 */
export class EventBus<TEvent> {
  private subscribers: Set<(event: TEvent) => void> = new Set();
  private failures = 0;

  constructor(private readonly onError?: (error: unknown, event: TEvent) => void) {}

  get failureCount(): number {
    return this.failures;
  }

  subscribe(cb: (event: TEvent) => void): Unsubscribe {
    this.subscribers.add(cb);
    return () => {
      this.subscribers.delete(cb);
    };
  }

  emit(event: TEvent): void {
    for (const sub of this.subscribers) {
      try {
        sub(event);
      } catch (error) {
        this.failures++;
        this.onError?.(error, event);
      }
    }
  }
}
