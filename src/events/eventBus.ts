export type Unsubscribe = () => void;

export type SubscriberErrorHandler = (error: unknown) => void;

/**
 * Synchronous fan-out of events to subscribers, in subscription order.
 *
 * A throwing subscriber never reaches the emitter: its error goes to
 * `onSubscriberError` and the remaining subscribers still run.
 */
export class EventBus<TEvent> {
  private subscribers: Set<(event: TEvent) => void> = new Set();
  private onSubscriberError: SubscriberErrorHandler;

  constructor(opts?: { onSubscriberError?: SubscriberErrorHandler }) {
    this.onSubscriberError =
      opts?.onSubscriberError ??
      (error => {
        process.stderr.write(`event subscriber failed: ${error instanceof Error ? error.message : String(error)}\n`);
      });
  }

  get size(): number {
    return this.subscribers.size;
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
        this.onSubscriberError(error);
      }
    }
  }
}
