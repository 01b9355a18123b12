import type { Logger } from '../logger.js';

export interface PublisherObserver<T> {
  next?(value: T): void;
  error?(error: unknown): void;
  complete?(): void;
}

export type Unsubscribe = () => void;

type Outcome<T> =
  | { status: 'fulfilled'; value: T }
  | { status: 'rejected'; reason: unknown };

/**
 * Push-based view of a single in-flight call. The call is already running
 * when the publisher is created; each subscriber gets exactly one `next`
 * followed by `complete`, or exactly one `error`.
 *
 * Unsubscribing only stops delivery to that subscriber. The underlying
 * exchange has no abort hook and runs to completion regardless.
 */
export class SingleValuePublisher<T> {
  private outcome: Outcome<T> | undefined;
  private readonly observers = new Set<PublisherObserver<T>>();

  constructor(task: Promise<T>, private readonly logger: Logger) {
    void task.then(
      (value) => this.settle({ status: 'fulfilled', value }),
      (reason: unknown) => this.settle({ status: 'rejected', reason })
    );
  }

  get settled(): boolean {
    return this.outcome !== undefined;
  }

  subscribe(observer: PublisherObserver<T>): Unsubscribe {
    if (this.outcome) {
      this.deliver(observer, this.outcome);
      return () => {};
    }

    this.observers.add(observer);
    return () => {
      this.observers.delete(observer);
    };
  }

  private settle(outcome: Outcome<T>): void {
    this.outcome = outcome;
    const observers = [...this.observers];
    this.observers.clear();

    for (const observer of observers) {
      this.deliver(observer, outcome);
    }
  }

  private deliver(observer: PublisherObserver<T>, outcome: Outcome<T>): void {
    try {
      if (outcome.status === 'fulfilled') {
        observer.next?.(outcome.value);
        observer.complete?.();
      } else {
        observer.error?.(outcome.reason);
      }
    } catch (err) {
      // One broken subscriber must not keep the others from their result
      this.logger.warn({ err }, 'Publisher subscriber failed');
    }
  }
}
